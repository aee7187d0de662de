import type { Instruction } from "../cpu/Instruction";

export const STAGES = ["IF", "ID", "EX", "MEM", "WB"] as const;

export type Stage = (typeof STAGES)[number];

export type StageCycles = Readonly<Record<Stage, number>>;

export type HazardKind = "raw" | "war" | "waw" | "memory" | "structural";

export const HAZARD_KINDS: readonly HazardKind[] = ["raw", "war", "waw", "memory", "structural"];

export interface ScheduledInstruction {
  index: number;
  instruction: Instruction;
  cycles: StageCycles;
  stalled: boolean;
  /** Total cycles the instruction was pushed past its seeded position. */
  stallCycles: number;
  stallRounds: number;
}

export interface HazardRecord {
  consumer: number;
  producer: number;
  kind: HazardKind;
  stage: Stage;
  resolvedAt: number;
  stallCycles: number;
  round: number;
  /** Set on the finding whose push was applied in this round. */
  governing: boolean;
}

export interface PipelineSchedule {
  entries: ScheduledInstruction[];
  totalCycles: number;
  trace: HazardRecord[];
}

// Load needs an extra cycle between memory access and writeback.
export const memoryToWritebackLatency = (instruction: Instruction): number => (instruction.kind === "load" ? 2 : 1);

export function seedCycles(instruction: Instruction, fetchCycle: number): StageCycles {
  const decode = fetchCycle + 1;
  const execute = decode + 1;
  const memory = execute + 1;
  return {
    IF: fetchCycle,
    ID: decode,
    EX: execute,
    MEM: memory,
    WB: memory + memoryToWritebackLatency(instruction),
  };
}

export function shiftCycles(cycles: StageCycles, amount: number): StageCycles {
  return {
    IF: cycles.IF + amount,
    ID: cycles.ID + amount,
    EX: cycles.EX + amount,
    MEM: cycles.MEM + amount,
    WB: cycles.WB + amount,
  };
}

export const stageCycleSum = (cycles: StageCycles): number =>
  STAGES.reduce((total, stage) => total + cycles[stage], 0);
