export type Objective = "power" | "efficiency";
export type PeakStrategy = "iterative" | "closed-form";
export type LogLevel = "DEBUG" | "INFO" | "WARN" | "ERROR" | "SILENT";

export interface MotorParameters {
  // RPM per volt at no load.
  kv: number;
  voltage: number;
  noLoadCurrent: number;
  maxCurrent: number;
  // Milliohms.
  armatureResistance: number;
}

export interface OperatingPoint {
  current: number;
  speed: number;
  // N·m
  torque: number;
  powerIn: number;
  powerOut: number;
  // Percent.
  efficiency: number;
}

export interface OperatingPeaks {
  power: OperatingPoint;
  efficiency: OperatingPoint;
}

export interface PeakAnalysis extends OperatingPeaks {
  searches: Record<Objective, PeakSearchResult>;
}

export interface PeakSearchResult {
  current: number;
  value: number;
  iterations: number;
  // Spacing of the last sampling pass; 0 when no sampling took place.
  resolution: number;
  strategy: PeakStrategy;
}

export type ValidationError =
  | { kind: "TooNarrowRange"; noLoadCurrent: number; maxCurrent: number }
  | { kind: "OpenCircuitAtNoLoad"; dropVolts: number; voltage: number };

export interface ClampedWarning {
  kind: "ClampedWarning";
  previousMaxCurrent: number;
  newMaxCurrent: number;
}

export type ValidationResult =
  | { ok: true; params: MotorParameters; warning: ClampedWarning | null }
  | { ok: false; error: ValidationError };

export interface SearchConfig {
  strategy: PeakStrategy;
  // Offset above the no-load current where the search starts.
  noLoadMarginA: number;
  toleranceA: number;
  // Samples per pass and the step reduction between passes.
  divisions: number;
  maxIterations: number;
}

export interface ValidationRules {
  minRangeA: number;
  openCircuitMarginA: number;
  clampMarginA: number;
}

export interface CalcConfig {
  search: SearchConfig;
  validation: ValidationRules;
  input: {
    // Nominal volts per cell when voltage is derived from a cell count.
    cellVoltage: number;
  };
  display: {
    decimals: number;
    wattsPerHp: number;
  };
  logLevel: LogLevel;
}
