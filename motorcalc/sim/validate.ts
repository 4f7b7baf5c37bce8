import { defaultConfig } from "./defaults";
import type { MotorParameters, ValidationResult, ValidationRules } from "./types";

const resistiveDrop = (current: number, milliohms: number) => (current * milliohms) / 1000;

/**
 * Checks that the current range is usable before any search runs. A maximum
 * current past the open-circuit point is pulled back to it rather than rejected.
 * The input object is never modified.
 */
export const validateAndClamp = (
  params: MotorParameters,
  rules: ValidationRules = defaultConfig.validation,
): ValidationResult => {
  if (params.maxCurrent - params.noLoadCurrent < rules.minRangeA) {
    return {
      ok: false,
      error: {
        kind: "TooNarrowRange",
        noLoadCurrent: params.noLoadCurrent,
        maxCurrent: params.maxCurrent,
      },
    };
  }

  const noLoadDrop = resistiveDrop(
    params.noLoadCurrent + rules.openCircuitMarginA,
    params.armatureResistance,
  );
  if (noLoadDrop > params.voltage) {
    return {
      ok: false,
      error: { kind: "OpenCircuitAtNoLoad", dropVolts: noLoadDrop, voltage: params.voltage },
    };
  }

  if (resistiveDrop(params.maxCurrent, params.armatureResistance) >= params.voltage) {
    const newMaxCurrent = params.voltage / (params.armatureResistance / 1000) + rules.clampMarginA;
    return {
      ok: true,
      params: { ...params, maxCurrent: newMaxCurrent },
      warning: {
        kind: "ClampedWarning",
        previousMaxCurrent: params.maxCurrent,
        newMaxCurrent,
      },
    };
  }

  return { ok: true, params, warning: null };
};
