import { parseProgram } from "./assembler/Parser";
import type { Instruction } from "./cpu/Instruction";
import { PipelineSimulator, type SchedulerOptions } from "./pipeline/PipelineSimulator";
import { createStatisticsSnapshot, type PipelineStatisticsSnapshot } from "./pipeline/PipelineStatistics";
import type { PipelineSchedule } from "./pipeline/PipelineTypes";

export * from "./cpu/Instruction";
export * from "./assembler/Lexer";
export * from "./assembler/Parser";
export * from "./pipeline/PipelineTypes";
export * from "./pipeline/HazardUnit";
export * from "./pipeline/PipelineSimulator";
export * from "./pipeline/PipelineStatistics";
export * from "./debugger/Disassembler";
export * from "./debugger/ScheduleReport";
export * from "./config/SimulatorConfig";
export * from "./exceptions/InputExceptions";

export interface SimulationResult {
  program: Instruction[];
  schedule: PipelineSchedule;
  statistics: PipelineStatisticsSnapshot;
}

export function schedulePipeline(program: readonly Instruction[], options: SchedulerOptions = {}): PipelineSchedule {
  return new PipelineSimulator(options).schedule(program);
}

/** Parses a count-prefixed program and schedules it. Input errors propagate unchanged. */
export function simulate(source: string, options: SchedulerOptions = {}): SimulationResult {
  const program = parseProgram(source);
  const schedule = schedulePipeline(program, options);
  return { program, schedule, statistics: createStatisticsSnapshot(schedule) };
}
