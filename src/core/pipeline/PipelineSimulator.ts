import type { Instruction } from "../cpu/Instruction";
import { HazardUnit, MEMORY_UNIT_SPACING, governingFinding, type HazardToggles } from "./HazardUnit";
import {
  seedCycles,
  shiftCycles,
  stageCycleSum,
  type HazardRecord,
  type PipelineSchedule,
  type ScheduledInstruction,
  type StageCycles,
} from "./PipelineTypes";

export interface SchedulerOptions {
  hazards?: Partial<HazardToggles>;
}

export const FIRST_FETCH_CYCLE = 1;

/**
 * Earliest fetch cycle at which no hazard against `history` can remain outstanding.
 * Every resolution cycle is at most one past the latest cycle already committed, so an
 * instruction fetched here has all of its stages beyond reach of any producer.
 */
export function schedulingHorizon(history: readonly ScheduledInstruction[]): number {
  const latest = history.reduce((max, entry) => Math.max(max, entry.cycles.WB), 0);
  return latest + MEMORY_UNIT_SPACING + 1;
}

export class PipelineSimulator {
  private readonly hazardUnit: HazardUnit;

  constructor(options: SchedulerOptions = {}) {
    this.hazardUnit = new HazardUnit(options.hazards);
  }

  getHazardUnit(): HazardUnit {
    return this.hazardUnit;
  }

  schedule(program: readonly Instruction[]): PipelineSchedule {
    const entries: ScheduledInstruction[] = [];
    const trace: HazardRecord[] = [];

    program.forEach((instruction, index) => {
      const previous = entries[index - 1];
      const fetchCycle = previous ? previous.cycles.IF + 1 : FIRST_FETCH_CYCLE;
      entries.push(this.scheduleInstruction(instruction, index, fetchCycle, entries, trace));
    });

    const totalCycles = entries.reduce((max, entry) => Math.max(max, entry.cycles.WB), 0);
    return { entries, totalCycles, trace };
  }

  private scheduleInstruction(
    instruction: Instruction,
    index: number,
    fetchCycle: number,
    history: readonly ScheduledInstruction[],
    trace: HazardRecord[],
  ): ScheduledInstruction {
    const seeded = seedCycles(instruction, fetchCycle);
    // Each push adds at least one cycle to every stage, so the sum climbs towards a fixed ceiling.
    const ceiling = stageCycleSum(seedCycles(instruction, schedulingHorizon(history)));

    let cycles: StageCycles = seeded;
    let rounds = 0;

    while (stageCycleSum(cycles) < ceiling) {
      const findings = this.hazardUnit.detectAll(instruction, cycles, history);
      const governing = governingFinding(findings);
      if (!governing) break;

      rounds += 1;
      for (const finding of findings) {
        trace.push({ consumer: index, round: rounds, ...finding, governing: finding === governing });
      }
      cycles = shiftCycles(cycles, governing.stallCycles);
    }

    const stallCycles = cycles.IF - seeded.IF;
    return {
      index,
      instruction,
      cycles,
      stalled: stallCycles > 0,
      stallCycles,
      stallRounds: rounds,
    };
  }
}
