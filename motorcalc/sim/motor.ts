import type { MotorParameters, OperatingPoint } from "./types";

// Kt in oz·in/A from Kv, and oz·in to N·m.
const KT_FROM_KV = 1352;
const OZ_IN_TO_NM = 0.00706;

export const torqueConstant = (kv: number) => KT_FROM_KV / kv;

// Current at which the resistive drop eats the whole supply voltage.
export const shortCircuitCurrent = (params: MotorParameters) =>
  params.armatureResistance > 0
    ? (1000 * params.voltage) / params.armatureResistance
    : Number.POSITIVE_INFINITY;

/**
 * Steady-state operating point at a given current, using a linear droop model:
 * speed falls with the armature's resistive drop and torque grows with the
 * current above no-load.
 *
 * Only meaningful between the no-load current and the short-circuit current;
 * outside of it power and efficiency go negative or past 100%.
 */
export const evaluate = (params: MotorParameters, current: number): OperatingPoint => {
  const kt = torqueConstant(params.kv);
  const speed = (params.voltage - (current * params.armatureResistance) / 1000) * params.kv;
  const torque = kt * (current - params.noLoadCurrent) * OZ_IN_TO_NM;
  const powerOut = (torque * speed * (2 * Math.PI)) / 60;
  const powerIn = params.voltage * current;
  const efficiency = (powerOut / powerIn) * 100;

  return { current, speed, torque, powerIn, powerOut, efficiency };
};
