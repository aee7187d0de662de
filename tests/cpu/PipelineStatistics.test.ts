import assert from "node:assert";
import { describe, test } from "node:test";

import { add, load, store } from "../../src/core/cpu/Instruction";
import { PipelineSimulator } from "../../src/core/pipeline/PipelineSimulator";
import { PipelineStatistics, createStatisticsSnapshot } from "../../src/core/pipeline/PipelineStatistics";

describe("PipelineStatistics", () => {
  test("counts stalls under the hazard that governed them", () => {
    const schedule = new PipelineSimulator().schedule([load("R1", "M1"), store("R1", "M2")]);

    assert.deepStrictEqual(createStatisticsSnapshot(schedule), {
      cycleCount: 10,
      instructionCount: 2,
      stalledInstructions: 1,
      stallCycles: 4,
      stallsByKind: { raw: 1, war: 0, waw: 0, memory: 0, structural: 0 },
      cpi: 5,
    });
  });

  test("reports zero CPI for an empty program", () => {
    const snapshot = createStatisticsSnapshot(new PipelineSimulator().schedule([]));

    assert.strictEqual(snapshot.cpi, 0);
    assert.strictEqual(snapshot.cycleCount, 0);
  });

  test("accumulates across observed schedules until reset", () => {
    const simulator = new PipelineSimulator();
    const statistics = new PipelineStatistics();

    statistics.observe(simulator.schedule([add("R1", "R2", "R3")]));
    statistics.observe(simulator.schedule([load("R1", "M1"), store("R2", "M2")]));

    const snapshot = statistics.getSnapshot();
    assert.strictEqual(snapshot.cycleCount, 12);
    assert.strictEqual(snapshot.instructionCount, 3);
    assert.strictEqual(snapshot.stallsByKind.structural, 1);
    assert.strictEqual(snapshot.cpi, 4);

    statistics.reset();
    assert.deepStrictEqual(statistics.getSnapshot().stallsByKind, { raw: 0, war: 0, waw: 0, memory: 0, structural: 0 });
    assert.strictEqual(statistics.getSnapshot().instructionCount, 0);
  });
});
