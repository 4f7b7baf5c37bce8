import type { CalcConfig } from "./types";

export const defaultConfig: CalcConfig = {
  search: {
    strategy: "iterative",
    // Keeps the first sample off the zero-torque point.
    noLoadMarginA: 0.0001,
    // Four decimal places.
    toleranceA: 0.0001,
    divisions: 10,
    // Upper bound on refinement passes in case the window stops shrinking.
    maxIterations: 50,
  },
  validation: {
    minRangeA: 0.01,
    openCircuitMarginA: 0.0001,
    clampMarginA: 0.0001,
  },
  input: {
    cellVoltage: 3.7,
  },
  display: {
    decimals: 2,
    wattsPerHp: 745.69987158227,
  },
  logLevel: "ERROR",
};
