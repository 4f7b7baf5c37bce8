#!/usr/bin/env node
import { parseArgs } from "node:util";
import { ConfigError, describeError, loadConfig, parseStrategy } from "./motorcalc/cli/config";
import { createKeySource } from "./motorcalc/cli/keypress";
import { Logger } from "./motorcalc/cli/logger";
import { InputClosedError, createLineSource } from "./motorcalc/cli/prompt";
import { runSession } from "./motorcalc/cli/session";
import { isInteractive, relaunchInTerminal } from "./motorcalc/cli/terminal";
import type { CalcConfig } from "./motorcalc/sim/types";

const readOptions = (argv: string[]) =>
  parseArgs({
    args: argv,
    options: {
      config: { type: "string", short: "c" },
      strategy: { type: "string", short: "s" },
      "in-terminal": { type: "boolean", default: false },
    },
    strict: true,
  }).values;

const buildConfig = (options: ReturnType<typeof readOptions>): CalcConfig => {
  const config = loadConfig(options.config);
  if (!options.strategy) return config;
  return { ...config, search: { ...config.search, strategy: parseStrategy(options.strategy) } };
};

const main = async (argv: string[]): Promise<number> => {
  let config: CalcConfig;
  let inTerminal: boolean;
  try {
    const options = readOptions(argv);
    config = buildConfig(options);
    inTerminal = options["in-terminal"] === true;
  } catch (error) {
    process.stderr.write(`${describeError(error)}\n`);
    return error instanceof ConfigError ? 1 : 2;
  }

  const logger = new Logger(config.logLevel);

  if (!inTerminal && !isInteractive(process.stdin, process.stdout)) {
    // Started without a terminal, probably from a file manager: open one.
    const programArgs = [process.execPath, ...process.execArgv, ...process.argv.slice(1)];
    const launched = await relaunchInTerminal(programArgs);
    if (launched === null) {
      logger.logException(new Error("No usable terminal emulator was found"));
      return 1;
    }
    logger.log(`Relaunched in ${launched}`);
    return 0;
  }

  try {
    await runSession({
      openLines: () => createLineSource(process.stdin),
      keys: createKeySource(process.stdin),
      out: process.stdout,
      config,
      logger,
    });
    return 0;
  } catch (error) {
    if (error instanceof InputClosedError) {
      logger.log(error.message);
      return 0;
    }
    logger.logException(error);
    return 1;
  }
};

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    new Logger().logException(error);
    process.exitCode = 1;
  },
);
