import { findOperatingPeaks } from "../sim/peak";
import type { CalcConfig, MotorParameters, PeakAnalysis } from "../sim/types";
import { validateAndClamp } from "../sim/validate";
import { waitForRestartChoice } from "./keypress";
import type { KeySource } from "./keypress";
import type { Logger } from "./logger";
import { PromptService, collectMotorParameters } from "./prompt";
import type { LineSource, TextSink } from "./prompt";
import { formatClampWarning, formatPeakReport, formatValidationError } from "./report";

export interface SessionDeps {
  // A fresh line reader per pass; it is closed before keystrokes are read.
  openLines: () => LineSource;
  keys: KeySource;
  out: TextSink;
  config: CalcConfig;
  logger: Logger;
}

const collectEntries = async (deps: SessionDeps): Promise<MotorParameters> => {
  const lines = deps.openLines();
  try {
    return await collectMotorParameters(
      new PromptService(lines, deps.out),
      deps.out,
      deps.config.input.cellVoltage,
    );
  } finally {
    lines.close();
  }
};

/** One pass: collect, validate, search and print. Null when validation failed. */
export const runCalculation = async (deps: SessionDeps): Promise<PeakAnalysis | null> => {
  const { out, config, logger } = deps;

  const entered = await collectEntries(deps);
  const validation = validateAndClamp(entered, config.validation);
  if (!validation.ok) {
    logger.logSignificant("Motor parameters rejected", { reason: validation.error.kind });
    out.write(formatValidationError(validation.error));
    return null;
  }

  const { params, warning } = validation;
  if (warning) {
    logger.warn(
      `Maximum current clamped from ${warning.previousMaxCurrent} A to ${warning.newMaxCurrent} A`,
    );
    out.write(formatClampWarning(warning, config.display));
  }

  const analysis = findOperatingPeaks(params, config.search);
  for (const [objective, search] of Object.entries(analysis.searches)) {
    logger.debug(
      `${objective} peak at ${search.current} A via ${search.strategy} search ` +
        `(${search.iterations} passes, resolution ${search.resolution} A)`,
    );
  }

  out.write(formatPeakReport(analysis, config.display));
  return analysis;
};

/** Repeats calculations until the user quits or input ends. */
export const runSession = async (deps: SessionDeps): Promise<void> => {
  for (;;) {
    await runCalculation(deps);
    const choice = await waitForRestartChoice(deps.keys, deps.out);
    if (choice === "quit") return;
    deps.logger.log("Restarting calculation");
  }
};
