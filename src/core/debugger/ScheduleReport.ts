import type { HazardKind, HazardRecord, PipelineSchedule, ScheduledInstruction } from "../pipeline/PipelineTypes";
import { STAGES } from "../pipeline/PipelineTypes";
import { disassembleInstruction } from "./Disassembler";

export const HAZARD_LABELS: Record<HazardKind, string> = {
  raw: "RAW",
  war: "WAR",
  waw: "WAW",
  memory: "Memory",
  structural: "Structural",
};

export function describeEntry(entry: ScheduledInstruction): string {
  const stages = STAGES.map((stage) => `${stage}=${entry.cycles[stage]}`).join(" ");
  const suffix = entry.stalled ? ` (STALLED +${entry.stallCycles})` : "";
  return `Instruction ${entry.index} (${disassembleInstruction(entry.instruction).assembly}): ${stages}${suffix}`;
}

export function describeHazard(record: HazardRecord): string {
  const marker = record.governing ? "*" : " ";
  return (
    `${marker} round ${record.round}: ${HAZARD_LABELS[record.kind]} hazard on instruction ${record.producer}, ` +
    `${record.stage} must follow cycle ${record.resolvedAt} (stall ${record.stallCycles})`
  );
}

/** Plain-text narration of a schedule: one line per instruction, its hazards indented below. */
export function formatScheduleReport(schedule: PipelineSchedule): string[] {
  const lines: string[] = [];

  for (const entry of schedule.entries) {
    lines.push(describeEntry(entry));
    for (const record of schedule.trace) {
      if (record.consumer === entry.index) lines.push(`  ${describeHazard(record)}`);
    }
  }

  lines.push(`Total cycles: ${schedule.totalCycles}`);
  return lines;
}
