import { describeHazardInfo, type HazardInfo, type Instruction } from "../cpu/Instruction";
import { HAZARD_KINDS, type HazardKind, type ScheduledInstruction, type Stage, type StageCycles } from "./PipelineTypes";

export type HazardToggles = Record<HazardKind, boolean>;

export interface HazardFinding {
  kind: HazardKind;
  producer: number;
  /** Candidate stage that must land strictly after `resolvedAt`. */
  stage: Stage;
  resolvedAt: number;
  stallCycles: number;
}

export const ALL_HAZARDS_ENABLED: HazardToggles = {
  raw: true,
  war: true,
  waw: true,
  memory: true,
  structural: true,
};

// The memory unit cannot serve two accesses closer than this many cycles apart.
export const MEMORY_UNIT_SPACING = 2;

export function resolveHazardToggles(overrides: Partial<HazardToggles> = {}): HazardToggles {
  const toggles = { ...ALL_HAZARDS_ENABLED };
  for (const kind of HAZARD_KINDS) {
    const value = overrides[kind];
    if (value !== undefined) toggles[kind] = value;
  }
  return toggles;
}

export class HazardUnit {
  private readonly toggles: HazardToggles;

  constructor(toggles: Partial<HazardToggles> = {}) {
    this.toggles = resolveHazardToggles(toggles);
  }

  isEnabled(kind: HazardKind): boolean {
    return this.toggles[kind];
  }

  /**
   * Reports every hazard between a candidate at its current tentative cycles and one
   * already-final producer. Only findings that still require a stall are returned.
   */
  detect(candidate: Instruction, cycles: StageCycles, producer: ScheduledInstruction): HazardFinding[] {
    const consumer = describeHazardInfo(candidate);
    const source = describeHazardInfo(producer.instruction);
    const findings: HazardFinding[] = [];

    const check = (kind: HazardKind, stage: Stage, resolvedAt: number): void => {
      if (!this.toggles[kind]) return;
      const stallCycles = Math.max(0, resolvedAt + 1 - cycles[stage]);
      if (stallCycles > 0) {
        findings.push({ kind, producer: producer.index, stage, resolvedAt, stallCycles });
      }
    };

    if (source.destination !== null && consumer.sources.includes(source.destination)) {
      check("raw", "ID", source.isLoad ? producer.cycles.WB : producer.cycles.MEM);
    }

    if (consumer.destination !== null && source.sources.includes(consumer.destination)) {
      check("war", "ID", producer.cycles.ID);
    }

    if (consumer.destination !== null && consumer.destination === source.destination) {
      check("waw", "WB", producer.cycles.WB);
    }

    if (accessesMemory(consumer) && accessesMemory(source)) {
      if (consumer.memLocation === source.memLocation) {
        check("memory", "MEM", producer.cycles.MEM);
      }
      check("structural", "MEM", producer.cycles.MEM + MEMORY_UNIT_SPACING - 1);
    }

    return findings;
  }

  detectAll(candidate: Instruction, cycles: StageCycles, history: readonly ScheduledInstruction[]): HazardFinding[] {
    return history.flatMap((producer) => this.detect(candidate, cycles, producer));
  }
}

const accessesMemory = (info: HazardInfo): boolean => info.isLoad || info.isStore;

export function governingFinding(findings: readonly HazardFinding[]): HazardFinding | null {
  let governing: HazardFinding | null = null;
  for (const finding of findings) {
    if (governing === null || finding.stallCycles > governing.stallCycles) {
      governing = finding;
    }
  }
  return governing;
}
