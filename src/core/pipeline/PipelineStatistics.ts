import type { HazardKind, PipelineSchedule } from "./PipelineTypes";

export interface PipelineStatisticsSnapshot {
  cycleCount: number;
  instructionCount: number;
  stalledInstructions: number;
  stallCycles: number;
  /** Stall rounds, keyed by the hazard kind that governed each push. */
  stallsByKind: Record<HazardKind, number>;
  cpi: number;
}

const emptyKindCounts = (): Record<HazardKind, number> => ({
  raw: 0,
  war: 0,
  waw: 0,
  memory: 0,
  structural: 0,
});

export class PipelineStatistics {
  private cycleCount = 0;
  private instructionCount = 0;
  private stalledInstructions = 0;
  private stallCycles = 0;
  private stallsByKind = emptyKindCounts();

  observe(schedule: PipelineSchedule): void {
    this.cycleCount += schedule.totalCycles;
    this.instructionCount += schedule.entries.length;

    for (const entry of schedule.entries) {
      if (!entry.stalled) continue;
      this.stalledInstructions += 1;
      this.stallCycles += entry.stallCycles;
    }

    for (const record of schedule.trace) {
      if (record.governing) this.stallsByKind[record.kind] += 1;
    }
  }

  reset(): void {
    this.cycleCount = 0;
    this.instructionCount = 0;
    this.stalledInstructions = 0;
    this.stallCycles = 0;
    this.stallsByKind = emptyKindCounts();
  }

  getSnapshot(): PipelineStatisticsSnapshot {
    const cpi = this.instructionCount === 0 ? 0 : this.cycleCount / this.instructionCount;

    return {
      cycleCount: this.cycleCount,
      instructionCount: this.instructionCount,
      stalledInstructions: this.stalledInstructions,
      stallCycles: this.stallCycles,
      stallsByKind: { ...this.stallsByKind },
      cpi,
    };
  }
}

export function createStatisticsSnapshot(schedule: PipelineSchedule): PipelineStatisticsSnapshot {
  const statistics = new PipelineStatistics();
  statistics.observe(schedule);
  return statistics.getSnapshot();
}
