import React from "react";
import type { Stage } from "../../core";

export interface StagePanelProps {
  cycle: number;
  stage: Stage | null;
  stalled: boolean;
}

const STAGE_COLORS: Record<Stage, string> = {
  IF: "#1d4ed8",
  ID: "#7c3aed",
  EX: "#0f766e",
  MEM: "#b45309",
  WB: "#15803d",
};

export function StagePanel({ cycle, stage, stalled }: StagePanelProps): React.JSX.Element {
  if (stage === null) {
    return <td data-cycle={cycle} style={emptyCellStyle} />;
  }

  return (
    <td data-cycle={cycle} data-stage={stage} style={cellStyle(stage, stalled)}>
      {stage}
    </td>
  );
}

const cellStyle = (stage: Stage, stalled: boolean): React.CSSProperties => ({
  backgroundColor: STAGE_COLORS[stage],
  border: `1px solid ${stalled ? "#f59e0b" : "#1f2937"}`,
  color: "#f9fafb",
  fontWeight: 700,
  textAlign: "center",
  padding: "0.25rem 0.4rem",
});

const emptyCellStyle: React.CSSProperties = {
  border: "1px solid #1f2937",
  padding: "0.25rem 0.4rem",
};
