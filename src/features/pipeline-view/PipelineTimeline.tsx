import React from "react";
import {
  HAZARD_LABELS,
  STAGES,
  disassembleInstruction,
  type HazardRecord,
  type PipelineSchedule,
  type PipelineStatisticsSnapshot,
  type ScheduledInstruction,
  type Stage,
} from "../../core";
import { StagePanel } from "./StagePanel";

export interface PipelineTimelineProps {
  schedule: PipelineSchedule;
  statistics: PipelineStatisticsSnapshot;
}

function stageAt(entry: ScheduledInstruction, cycle: number): Stage | null {
  return STAGES.find((stage) => entry.cycles[stage] === cycle) ?? null;
}

function TimelineRow({ entry, cycles }: { entry: ScheduledInstruction; cycles: number[] }): React.JSX.Element {
  return (
    <tr data-row={entry.index} data-stalled={entry.stalled}>
      <th scope="row" style={rowHeaderStyle}>
        {disassembleInstruction(entry.instruction).assembly}
      </th>
      {cycles.map((cycle) => (
        <StagePanel key={cycle} cycle={cycle} stage={stageAt(entry, cycle)} stalled={entry.stalled} />
      ))}
      <td style={badgeCellStyle}>{entry.stalled ? <span style={badgeStyle}>{`Stall +${entry.stallCycles}`}</span> : null}</td>
    </tr>
  );
}

function HazardList({ hazards }: { hazards: HazardRecord[] }): React.JSX.Element {
  if (hazards.length === 0) {
    return <p style={{ color: "#9ca3af" }}>No hazards detected.</p>;
  }

  return (
    <ul style={{ display: "flex", flexDirection: "column", gap: "0.35rem", paddingLeft: "1rem" }}>
      {hazards.map((hazard, index) => (
        <li key={`${hazard.consumer}-${hazard.round}-${index}`} data-governing={hazard.governing}>
          {`#${hazard.consumer} waits on #${hazard.producer}: ${HAZARD_LABELS[hazard.kind]} (${hazard.stage} after cycle ${hazard.resolvedAt}, +${hazard.stallCycles})`}
        </li>
      ))}
    </ul>
  );
}

export function PipelineTimeline({ schedule, statistics }: PipelineTimelineProps): React.JSX.Element {
  const cycles = Array.from({ length: schedule.totalCycles }, (_, index) => index + 1);
  const cpi = statistics.instructionCount === 0 ? "—" : statistics.cpi.toFixed(2);

  return (
    <section style={containerStyle}>
      <header style={{ display: "flex", gap: "1.5rem", marginBottom: "0.75rem" }}>
        <span data-metric="cycles">{`Cycles: ${statistics.cycleCount}`}</span>
        <span data-metric="instructions">{`Instructions: ${statistics.instructionCount}`}</span>
        <span data-metric="stalls">{`Stall cycles: ${statistics.stallCycles}`}</span>
        <span data-metric="cpi">{`CPI: ${cpi}`}</span>
      </header>
      <table style={{ borderCollapse: "collapse", fontFamily: "'JetBrains Mono', monospace" }}>
        <thead>
          <tr>
            <th scope="col">Instruction</th>
            {cycles.map((cycle) => (
              <th key={cycle} scope="col">
                {cycle}
              </th>
            ))}
            <th scope="col" />
          </tr>
        </thead>
        <tbody>
          {schedule.entries.map((entry) => (
            <TimelineRow key={entry.index} entry={entry} cycles={cycles} />
          ))}
        </tbody>
      </table>
      <h3 style={{ fontSize: "1rem", marginTop: "1rem" }}>Hazards</h3>
      <HazardList hazards={schedule.trace} />
    </section>
  );
}

const containerStyle: React.CSSProperties = {
  backgroundColor: "#0f172a",
  color: "#e5e7eb",
  borderRadius: "0.65rem",
  padding: "1rem",
};

const rowHeaderStyle: React.CSSProperties = {
  textAlign: "left",
  paddingRight: "0.75rem",
  whiteSpace: "nowrap",
};

const badgeCellStyle: React.CSSProperties = {
  paddingLeft: "0.5rem",
};

const badgeStyle: React.CSSProperties = {
  backgroundColor: "#f59e0b",
  color: "#0b1220",
  borderRadius: "9999px",
  padding: "0.2rem 0.55rem",
  fontSize: "0.75rem",
  fontWeight: 700,
};
