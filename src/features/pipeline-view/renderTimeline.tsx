import React from "react";
import { renderToStaticMarkup } from "react-dom/server";
import type { PipelineSchedule, PipelineStatisticsSnapshot } from "../../core";
import { PipelineTimeline } from "./PipelineTimeline";

function TimelineDocument({
  title,
  schedule,
  statistics,
}: {
  title: string;
  schedule: PipelineSchedule;
  statistics: PipelineStatisticsSnapshot;
}): React.JSX.Element {
  return (
    <html lang="en">
      <head>
        <meta charSet="utf-8" />
        <title>{title}</title>
      </head>
      <body style={{ margin: 0, padding: "1.5rem", backgroundColor: "#020617", fontFamily: "system-ui, sans-serif" }}>
        <PipelineTimeline schedule={schedule} statistics={statistics} />
      </body>
    </html>
  );
}

export function renderTimelineDocument(
  schedule: PipelineSchedule,
  statistics: PipelineStatisticsSnapshot,
  title = "Pipeline timeline",
): string {
  return `<!DOCTYPE html>${renderToStaticMarkup(
    <TimelineDocument title={title} schedule={schedule} statistics={statistics} />,
  )}`;
}
