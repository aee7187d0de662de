import { readFileSync } from "node:fs";

import { ConfigError } from "../exceptions/InputExceptions";
import { ALL_HAZARDS_ENABLED, type HazardToggles } from "../pipeline/HazardUnit";
import { HAZARD_KINDS, type HazardKind } from "../pipeline/PipelineTypes";

export type OutputFormat = "plain" | "json";

export interface SimulatorConfig {
  hazards: HazardToggles;
  trace: boolean;
  format: OutputFormat;
}

export type SimulatorConfigOverrides = {
  hazards?: Partial<HazardToggles>;
  trace?: boolean;
  format?: OutputFormat;
};

export const DEFAULT_SIMULATOR_CONFIG: SimulatorConfig = {
  hazards: { ...ALL_HAZARDS_ENABLED },
  trace: false,
  format: "plain",
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isHazardKind = (value: string): value is HazardKind => HAZARD_KINDS.some((kind) => kind === value);

const isOutputFormat = (value: unknown): value is OutputFormat => value === "plain" || value === "json";

export function parseConfig(value: unknown, path: string | null = null): SimulatorConfigOverrides {
  if (!isRecord(value)) {
    throw new ConfigError("Configuration must be a JSON object", path);
  }

  const overrides: SimulatorConfigOverrides = {};

  for (const [key, entry] of Object.entries(value)) {
    switch (key) {
      case "trace":
        if (typeof entry !== "boolean") throw new ConfigError("'trace' must be a boolean", path);
        overrides.trace = entry;
        break;
      case "format":
        if (!isOutputFormat(entry)) throw new ConfigError("'format' must be \"plain\" or \"json\"", path);
        overrides.format = entry;
        break;
      case "hazards":
        overrides.hazards = parseHazardToggles(entry, path);
        break;
      default:
        throw new ConfigError(`Unknown configuration key '${key}'`, path);
    }
  }

  return overrides;
}

function parseHazardToggles(value: unknown, path: string | null): Partial<HazardToggles> {
  if (!isRecord(value)) {
    throw new ConfigError("'hazards' must be an object", path);
  }

  const toggles: Partial<HazardToggles> = {};
  for (const [key, enabled] of Object.entries(value)) {
    if (!isHazardKind(key)) {
      throw new ConfigError(`Unknown hazard '${key}', expected one of ${HAZARD_KINDS.join(", ")}`, path);
    }
    if (typeof enabled !== "boolean") {
      throw new ConfigError(`'hazards.${key}' must be a boolean`, path);
    }
    toggles[key] = enabled;
  }
  return toggles;
}

export function mergeConfig(
  base: SimulatorConfig,
  ...layers: SimulatorConfigOverrides[]
): SimulatorConfig {
  return layers.reduce<SimulatorConfig>(
    (merged, layer) => ({
      hazards: { ...merged.hazards, ...layer.hazards },
      trace: layer.trace ?? merged.trace,
      format: layer.format ?? merged.format,
    }),
    { ...base, hazards: { ...base.hazards } },
  );
}

const readUtf8 = (path: string): string => readFileSync(path, "utf8");

export function loadConfigFile(path: string, readFile: (path: string) => string = readUtf8): SimulatorConfigOverrides {
  let text: string;
  try {
    text = readFile(path);
  } catch (error) {
    throw new ConfigError(`Unable to read configuration: ${error instanceof Error ? error.message : String(error)}`, path);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Invalid JSON: ${error instanceof Error ? error.message : String(error)}`, path);
  }

  return parseConfig(parsed, path);
}
