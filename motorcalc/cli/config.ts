import { readFileSync } from "node:fs";
import { defaultConfig } from "../sim/defaults";
import type { CalcConfig, LogLevel, PeakStrategy } from "../sim/types";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const STRATEGIES: readonly PeakStrategy[] = ["iterative", "closed-form"];
const LOG_LEVELS: readonly LogLevel[] = ["DEBUG", "INFO", "WARN", "ERROR", "SILENT"];

type Section = Record<string, unknown>;

export const describeError = (error: unknown) =>
  error instanceof Error ? error.message : String(error);

const isSection = (value: unknown): value is Section =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const sectionOf = (root: Section, key: string): Section => {
  const value = root[key];
  if (value === undefined) return {};
  if (!isSection(value)) throw new ConfigError(`Configuration field ${key} must be an object`);
  return value;
};

const readNumber = (
  section: Section,
  path: string,
  key: string,
  fallback: number,
  valid: (v: number) => boolean,
  rule: string,
): number => {
  const value = section[key];
  if (value === undefined) return fallback;
  if (typeof value !== "number" || !Number.isFinite(value) || !valid(value)) {
    throw new ConfigError(`Configuration field ${path}.${key} must be ${rule}`);
  }
  return value;
};

const readChoice = <T extends string>(
  value: unknown,
  path: string,
  choices: readonly T[],
  fallback: T,
): T => {
  if (value === undefined) return fallback;
  const match = choices.find((choice) => choice === value);
  if (match === undefined) {
    throw new ConfigError(`Configuration field ${path} must be one of ${choices.join(", ")}`);
  }
  return match;
};

const positive = (v: number) => v > 0;
const nonNegative = (v: number) => v >= 0;
const wholeAbove = (min: number) => (v: number) => Number.isInteger(v) && v >= min;

/** Merges a parsed JSON document over the defaults, section by section. */
export const resolveConfig = (raw: unknown, base: CalcConfig = defaultConfig): CalcConfig => {
  if (!isSection(raw)) throw new ConfigError("Configuration must be a JSON object");

  const search = sectionOf(raw, "search");
  const validation = sectionOf(raw, "validation");
  const input = sectionOf(raw, "input");
  const display = sectionOf(raw, "display");

  return {
    search: {
      strategy: readChoice(search.strategy, "search.strategy", STRATEGIES, base.search.strategy),
      noLoadMarginA: readNumber(search, "search", "noLoadMarginA", base.search.noLoadMarginA, positive, "a positive number"),
      toleranceA: readNumber(search, "search", "toleranceA", base.search.toleranceA, positive, "a positive number"),
      divisions: readNumber(search, "search", "divisions", base.search.divisions, wholeAbove(2), "an integer of at least 2"),
      maxIterations: readNumber(search, "search", "maxIterations", base.search.maxIterations, wholeAbove(1), "an integer of at least 1"),
    },
    validation: {
      minRangeA: readNumber(validation, "validation", "minRangeA", base.validation.minRangeA, nonNegative, "a non-negative number"),
      openCircuitMarginA: readNumber(validation, "validation", "openCircuitMarginA", base.validation.openCircuitMarginA, nonNegative, "a non-negative number"),
      clampMarginA: readNumber(validation, "validation", "clampMarginA", base.validation.clampMarginA, nonNegative, "a non-negative number"),
    },
    input: {
      cellVoltage: readNumber(input, "input", "cellVoltage", base.input.cellVoltage, positive, "a positive number"),
    },
    display: {
      decimals: readNumber(display, "display", "decimals", base.display.decimals, wholeAbove(0), "a non-negative integer"),
      wattsPerHp: readNumber(display, "display", "wattsPerHp", base.display.wattsPerHp, positive, "a positive number"),
    },
    logLevel: readChoice(raw.logLevel, "logLevel", LOG_LEVELS, base.logLevel),
  };
};

export const parseConfig = (text: string): CalcConfig => {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Configuration is not valid JSON: ${describeError(error)}`);
  }
  return resolveConfig(raw);
};

export const loadConfig = (configPath?: string): CalcConfig => {
  if (!configPath) return defaultConfig;

  let text: string;
  try {
    text = readFileSync(configPath, "utf8");
  } catch (error) {
    throw new ConfigError(`Configuration file ${configPath} could not be read: ${describeError(error)}`);
  }
  return parseConfig(text);
};

export const parseStrategy = (value: string): PeakStrategy => {
  const match = STRATEGIES.find((strategy) => strategy === value);
  if (match === undefined) {
    throw new ConfigError(`Unknown search strategy "${value}", expected one of ${STRATEGIES.join(", ")}`);
  }
  return match;
};
