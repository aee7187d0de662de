import { readFileSync, writeFileSync } from "node:fs";
import { parseArgs } from "node:util";

import {
  ConfigError,
  DEFAULT_SIMULATOR_CONFIG,
  HAZARD_KINDS,
  InputError,
  disassembleInstruction,
  formatScheduleReport,
  loadConfigFile,
  mergeConfig,
  simulate,
  type HazardKind,
  type SimulationResult,
  type SimulatorConfigOverrides,
} from "../core";
import { renderTimelineDocument } from "../features/pipeline-view/renderTimeline";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export interface CliIo {
  /** Reads the program from `path`, or from stdin when `path` is null. */
  readInput: (path: string | null) => string;
  writeFile: (path: string, contents: string) => void;
  stdout: (message: string) => void;
  stderr: (message: string) => void;
}

export const nodeIo: CliIo = {
  readInput: (path) => readFileSync(path ?? 0, "utf8"),
  writeFile: (path, contents) => writeFileSync(path, contents, "utf8"),
  stdout: (message) => console.log(message),
  stderr: (message) => console.error(message),
};

export const USAGE = [
  "Usage: pipeline-sim [file] [options]",
  "",
  "Reads a count-prefixed LOAD/STORE/ADD/SUB program (stdin when no file is given)",
  "and prints the number of cycles needed to retire it.",
  "",
  "Options:",
  "  --trace             write per-instruction stage cycles and hazards to stderr",
  "  --json              print the full schedule as JSON",
  "  --html <path>       write an HTML timeline of the schedule",
  "  --config <path>     read defaults from a JSON configuration file",
  `  --disable <hazard>  ignore a hazard class (${HAZARD_KINDS.join(", ")}); repeatable`,
  "  -h, --help          show this message",
].join("\n");

const LOG_PREFIX = "[pipeline-sim]";

const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));

const isHazardKind = (value: string): value is HazardKind => HAZARD_KINDS.some((kind) => kind === value);

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

interface CliArguments {
  inputPath: string | null;
  htmlPath: string | null;
  configPath: string | null;
  help: boolean;
  overrides: SimulatorConfigOverrides;
}

const readArgs = (argv: string[]) =>
  parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      trace: { type: "boolean" },
      json: { type: "boolean" },
      html: { type: "string" },
      config: { type: "string" },
      disable: { type: "string", multiple: true },
      help: { type: "boolean", short: "h" },
    },
  });

function parseCliArguments(argv: string[]): CliArguments {
  let parsed: ReturnType<typeof readArgs>;
  try {
    parsed = readArgs(argv);
  } catch (error) {
    throw new UsageError(describeError(error));
  }

  const { values, positionals } = parsed;
  if (positionals.length > 1) {
    throw new UsageError(`Expected at most one input file, got ${positionals.length}`);
  }

  const overrides: SimulatorConfigOverrides = {};
  if (values.trace) overrides.trace = true;
  if (values.json) overrides.format = "json";

  const disabled = values.disable ?? [];
  if (disabled.length > 0) {
    const hazards: Partial<Record<HazardKind, boolean>> = {};
    for (const name of disabled) {
      if (!isHazardKind(name)) {
        throw new UsageError(`Unknown hazard '${name}', expected one of ${HAZARD_KINDS.join(", ")}`);
      }
      hazards[name] = false;
    }
    overrides.hazards = hazards;
  }

  return {
    inputPath: positionals[0] ?? null,
    htmlPath: values.html ?? null,
    configPath: values.config ?? null,
    help: values.help ?? false,
    overrides,
  };
}

export function toJsonReport({ schedule, statistics }: SimulationResult): string {
  return JSON.stringify(
    {
      totalCycles: schedule.totalCycles,
      instructions: schedule.entries.map((entry) => ({
        index: entry.index,
        assembly: disassembleInstruction(entry.instruction).assembly,
        cycles: entry.cycles,
        stalled: entry.stalled,
        stallCycles: entry.stallCycles,
      })),
      hazards: schedule.trace,
      statistics,
    },
    null,
    2,
  );
}

export function runCli(argv: string[], io: CliIo = nodeIo): number {
  let args: CliArguments;
  try {
    args = parseCliArguments(argv);
  } catch (error) {
    if (!(error instanceof UsageError)) throw error;
    io.stderr(`${LOG_PREFIX} ${error.message}`);
    io.stderr(USAGE);
    return EXIT_USAGE;
  }

  if (args.help) {
    io.stdout(USAGE);
    return EXIT_OK;
  }

  try {
    const fromFile = args.configPath ? loadConfigFile(args.configPath, (path) => io.readInput(path)) : {};
    const config = mergeConfig(DEFAULT_SIMULATOR_CONFIG, fromFile, args.overrides);

    let source: string;
    try {
      source = io.readInput(args.inputPath);
    } catch (error) {
      io.stderr(`${LOG_PREFIX} Unable to read ${args.inputPath ?? "stdin"}: ${describeError(error)}`);
      return EXIT_FAILURE;
    }

    const result = simulate(source, { hazards: config.hazards });

    if (config.trace) {
      formatScheduleReport(result.schedule).forEach((line) => io.stderr(line));
    }

    if (args.htmlPath) {
      try {
        io.writeFile(args.htmlPath, renderTimelineDocument(result.schedule, result.statistics));
      } catch (error) {
        io.stderr(`${LOG_PREFIX} Unable to write ${args.htmlPath}: ${describeError(error)}`);
        return EXIT_FAILURE;
      }
      io.stderr(`${LOG_PREFIX} Wrote timeline to ${args.htmlPath}`);
    }

    io.stdout(config.format === "json" ? toJsonReport(result) : String(result.schedule.totalCycles));
    return EXIT_OK;
  } catch (error) {
    if (error instanceof InputError || error instanceof ConfigError) {
      io.stderr(`${LOG_PREFIX} ${error.name}: ${error.message}`);
      return EXIT_FAILURE;
    }
    throw error;
  }
}
