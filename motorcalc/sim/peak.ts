import { defaultConfig } from "./defaults";
import { evaluate, shortCircuitCurrent } from "./motor";
import type {
  MotorParameters,
  Objective,
  PeakAnalysis,
  PeakSearchResult,
  SearchConfig,
} from "./types";
import { clamp } from "./utils";

const OBJECTIVE_FIELD: Record<Objective, "powerOut" | "efficiency"> = {
  power: "powerOut",
  efficiency: "efficiency",
};

export const objectiveValue = (
  params: MotorParameters,
  objective: Objective,
  current: number,
) => evaluate(params, current)[OBJECTIVE_FIELD[objective]];

export const hardMinCurrent = (
  params: MotorParameters,
  search: SearchConfig = defaultConfig.search,
) => params.noLoadCurrent + search.noLoadMarginA;

/**
 * Points sampled by one pass over `[min, max]`. The last sample lands on `max`
 * exactly whenever the step would carry past it. A step that no longer moves
 * forward ends the pass.
 */
export const gridPoints = (min: number, max: number, step: number): number[] => {
  const points: number[] = [];
  let x = min;
  while (x <= max) {
    points.push(x);
    const next = x + step;
    if (next > max && x < max) x = max;
    else if (next > x) x = next;
    else break;
  }
  return points;
};

export interface RefinementResult {
  argmax: number;
  value: number;
  iterations: number;
  resolution: number;
}

/**
 * Coarse-to-fine grid refinement of `f` over `[lower, upper]`. Each pass samples
 * the window, keeps the strictly best value (ties keep the lower argument), then
 * narrows the window to one step either side of the best sample and divides the
 * step.
 *
 * Assumes `f` is unimodal over the interval.
 */
export const refineMaximum = (
  f: (x: number) => number,
  lower: number,
  upper: number,
  search: SearchConfig = defaultConfig.search,
): RefinementResult => {
  let minX = lower;
  let maxX = upper;
  let step = (upper - lower) / search.divisions;
  let best = Number.NEGATIVE_INFINITY;
  let argmax = lower;
  let iterations = 0;
  let resolution = 0;

  while (iterations < search.maxIterations) {
    iterations += 1;
    resolution = step;

    let improved = false;
    for (const x of gridPoints(minX, maxX, step)) {
      const value = f(x);
      if (value > best) {
        best = value;
        argmax = x;
        improved = true;
      }
    }

    // Nothing better at this resolution: the window already holds the peak.
    if (!improved) break;

    minX = Math.max(argmax - step, lower);
    maxX = Math.min(argmax + step, upper);
    step /= search.divisions;

    if (Math.max(maxX - argmax, argmax - minX) < search.toleranceA) break;
  }

  return { argmax, value: best, iterations, resolution };
};

export const findPeakIterative = (
  params: MotorParameters,
  objective: Objective,
  search: SearchConfig = defaultConfig.search,
): PeakSearchResult => {
  const result = refineMaximum(
    (current) => objectiveValue(params, objective, current),
    hardMinCurrent(params, search),
    params.maxCurrent,
    search,
  );
  return {
    current: result.argmax,
    value: result.value,
    iterations: result.iterations,
    resolution: result.resolution,
    strategy: "iterative",
  };
};

/**
 * Analytic peaks of the linear droop model. Output power is a parabola with
 * roots at the no-load and short-circuit currents, so it peaks at their mean;
 * efficiency peaks at their geometric mean.
 */
export const findPeakClosedForm = (
  params: MotorParameters,
  objective: Objective,
  search: SearchConfig = defaultConfig.search,
): PeakSearchResult => {
  const lower = hardMinCurrent(params, search);
  const upper = params.maxCurrent;
  const isc = shortCircuitCurrent(params);

  // Without resistance both objectives keep rising with current.
  let target = upper;
  if (Number.isFinite(isc)) {
    target =
      objective === "power"
        ? (params.noLoadCurrent + isc) / 2
        : Math.sqrt(params.noLoadCurrent * isc);
  }

  const current = clamp(target, lower, upper);
  return {
    current,
    value: objectiveValue(params, objective, current),
    iterations: 0,
    resolution: 0,
    strategy: "closed-form",
  };
};

export const searchPeak = (
  params: MotorParameters,
  objective: Objective,
  search: SearchConfig = defaultConfig.search,
): PeakSearchResult =>
  search.strategy === "closed-form"
    ? findPeakClosedForm(params, objective, search)
    : findPeakIterative(params, objective, search);

export const findPeak = (
  params: MotorParameters,
  objective: Objective,
  search: SearchConfig = defaultConfig.search,
): number => searchPeak(params, objective, search).current;

/** Runs both searches and evaluates the model at each peak. */
export const findOperatingPeaks = (
  params: MotorParameters,
  search: SearchConfig = defaultConfig.search,
): PeakAnalysis => {
  const power = searchPeak(params, "power", search);
  const efficiency = searchPeak(params, "efficiency", search);
  return {
    power: evaluate(params, power.current),
    efficiency: evaluate(params, efficiency.current),
    searches: { power, efficiency },
  };
};
