import assert from "node:assert";
import { describe, test } from "node:test";
import { renderToStaticMarkup } from "react-dom/server";

import { add, load } from "../../src/core/cpu/Instruction";
import { PipelineSimulator } from "../../src/core/pipeline/PipelineSimulator";
import { createStatisticsSnapshot } from "../../src/core/pipeline/PipelineStatistics";
import { PipelineTimeline } from "../../src/features/pipeline-view/PipelineTimeline";
import { renderTimelineDocument } from "../../src/features/pipeline-view/renderTimeline";

const schedule = new PipelineSimulator().schedule([load("R1", "M1"), add("R2", "R1", "R3")]);
const statistics = createStatisticsSnapshot(schedule);

const countOccurrences = (haystack: string, needle: string): number => haystack.split(needle).length - 1;

describe("PipelineTimeline", () => {
  const markup = renderToStaticMarkup(<PipelineTimeline schedule={schedule} statistics={statistics} />);

  test("marks stalled rows and their delay", () => {
    assert.ok(markup.includes('<tr data-row="0" data-stalled="false">'));
    assert.ok(markup.includes('<tr data-row="1" data-stalled="true">'));
    assert.ok(markup.includes(">Stall +4</span>"));
    assert.ok(markup.includes(">ADD R2, R1, R3</th>"));
  });

  test("places each stage in its cycle column", () => {
    assert.ok(markup.includes('data-cycle="7" data-stage="ID"'));
    assert.ok(markup.includes('data-cycle="6" data-stage="WB"'));
    assert.strictEqual(countOccurrences(markup, 'data-stage="WB"'), 2);
    assert.strictEqual(countOccurrences(markup, "data-cycle="), 20);
  });

  test("summarises statistics and hazards", () => {
    assert.ok(markup.includes('<span data-metric="cycles">Cycles: 10</span>'));
    assert.ok(markup.includes('<span data-metric="cpi">CPI: 5.00</span>'));
    assert.ok(markup.includes('<li data-governing="true">#1 waits on #0: RAW (ID after cycle 6, +4)</li>'));
  });

  test("shows an empty hazard list for an empty program", () => {
    const empty = new PipelineSimulator().schedule([]);
    const emptyMarkup = renderToStaticMarkup(
      <PipelineTimeline schedule={empty} statistics={createStatisticsSnapshot(empty)} />,
    );

    assert.ok(emptyMarkup.includes(">No hazards detected.</p>"));
    assert.ok(emptyMarkup.includes('<span data-metric="cpi">CPI: —</span>'));
  });

  test("wraps the timeline in a standalone document", () => {
    const html = renderTimelineDocument(schedule, statistics, "Load use");

    assert.ok(html.startsWith('<!DOCTYPE html><html lang="en">'));
    assert.ok(html.includes("<title>Load use</title>"));
  });
});
