import type {
  CalcConfig,
  ClampedWarning,
  OperatingPeaks,
  OperatingPoint,
  ValidationError,
} from "../sim/types";
import { toHp, toNcm } from "../sim/utils";
import { BOLD_CYAN, BOLD_YELLOW, CYAN, RED, RESET, YELLOW } from "./ansi";

type DisplayConfig = CalcConfig["display"];

const value = (text: string) => `${BOLD_CYAN}${text}${RESET}`;

export const formatOperatingPoint = (
  title: string,
  point: OperatingPoint,
  display: DisplayConfig,
): string => {
  const fixed = (v: number) => v.toFixed(display.decimals);
  const hp = (watts: number) => toHp(watts, display.wattsPerHp).toFixed(display.decimals);

  return [
    `${title}:`,
    `${value(`${fixed(point.current)} A`)} current`,
    value(`${fixed(point.speed)} RPM`),
    `${value(`${fixed(toNcm(point.torque))} Ncm`)} torque`,
    `${value(`${fixed(point.powerIn)} W`)} in (${hp(point.powerIn)} HP)`,
    `${value(`${fixed(point.powerOut)} W`)} out (${hp(point.powerOut)} HP)`,
    `${value(`${fixed(point.efficiency)}%`)} efficiency`,
  ].join("\n");
};

export const formatPeakReport = (peaks: OperatingPeaks, display: DisplayConfig): string =>
  `\n\n${formatOperatingPoint("At maximum output power", peaks.power, display)}\n\n\n` +
  `${formatOperatingPoint("At maximum efficiency", peaks.efficiency, display)}\n\n\n`;

const VALIDATION_MESSAGES: Record<ValidationError["kind"], string> = {
  TooNarrowRange: "Maximum current is less than, equal to, or very close to unloaded current.",
  OpenCircuitAtNoLoad:
    "At minimum current or barely above, the motor would be an open circuit (Vdrop > Vin).",
};

export const formatValidationError = (error: ValidationError): string =>
  `\n\n${RED}Error: ${VALIDATION_MESSAGES[error.kind]}${RESET}\n\n\n`;

export const formatClampWarning = (warning: ClampedWarning, display: DisplayConfig): string =>
  `\n\n${BOLD_YELLOW}Warning: At maximum current, the motor would be an open circuit (Vdrop > Vin).\n` +
  `Maximum current has been reduced to ${CYAN}${warning.newMaxCurrent.toFixed(display.decimals)} A` +
  `${YELLOW}.${RESET}\n`;
