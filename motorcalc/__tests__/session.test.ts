import { Temporal } from "@js-temporal/polyfill";
import { describe, expect, it } from "vitest";
import { Logger } from "../cli/logger";
import { formatPeakReport } from "../cli/report";
import { runCalculation, runSession } from "../cli/session";
import type { SessionDeps } from "../cli/session";
import { defaultConfig } from "../sim/defaults";
import { CapturedOutput, ScriptedKeys, ScriptedLines } from "./fakes";

const fixedClock = () => Temporal.ZonedDateTime.from("2024-03-01T12:00:00+00:00[UTC]");

const scenario = ["1000", "y", "11.1", "0.5", "20", "100"];

const setup = (passes: string[][], keys: string[] = [], config = defaultConfig) => {
  const out = new CapturedOutput();
  const logLines: string[] = [];
  const opened: ScriptedLines[] = [];
  const deps: SessionDeps = {
    openLines: () => {
      const lines = new ScriptedLines(passes[opened.length] ?? []);
      opened.push(lines);
      return lines;
    },
    keys: new ScriptedKeys(keys),
    out,
    config,
    logger: new Logger("DEBUG", (line) => logLines.push(line), fixedClock),
  };
  return { deps, out, logLines, opened };
};

describe("runCalculation", () => {
  it("prints both peaks for a valid motor", async () => {
    const { deps, out, opened } = setup([scenario]);
    const analysis = await runCalculation(deps);

    expect(analysis).not.toBeNull();
    if (!analysis) return;
    expect(analysis.power.current).toBe(20);
    expect(analysis.efficiency.current).toBeCloseTo(7.4498, 3);
    expect(out.text.endsWith(formatPeakReport(analysis, defaultConfig.display))).toBe(true);
    expect(opened[0].closed).toBe(true);
  });

  it("logs the passes each search took", async () => {
    const { deps, logLines } = setup([scenario]);
    await runCalculation(deps);

    expect(logLines).toHaveLength(2);
    expect(logLines[0]).toBe(
      "[2024-03-01T12:00:00+00:00] DEBUG power peak at 20 A via iterative search (2 passes, resolution 0.194999 A)",
    );
    expect(logLines[1]).toContain("DEBUG efficiency peak at 7.44986");
  });

  it("reports a rejected range without searching", async () => {
    const { deps, out, logLines } = setup([["1000", "y", "11.1", "5", "5.005", "100"]]);

    await expect(runCalculation(deps)).resolves.toBeNull();
    expect(out.text.endsWith(
      "\n\n\x1b[31mError: Maximum current is less than, equal to, or very close to unloaded current.\x1b[0m\n\n\n",
    )).toBe(true);
    expect(out.text).not.toContain("At maximum output power");
    expect(logLines).toEqual([
      "[2024-03-01T12:00:00+00:00] INFO Motor parameters rejected | reason=TooNarrowRange",
    ]);
  });

  it("warns and searches the clamped range", async () => {
    const { deps, out, logLines } = setup([["1000", "y", "7.4", "0.5", "30", "400"]]);
    const analysis = await runCalculation(deps);

    expect(out.text).toContain("Maximum current has been reduced to \x1b[36m18.50 A");
    expect(logLines[0]).toBe(
      "[2024-03-01T12:00:00+00:00] WARN Maximum current clamped from 30 A to 18.5001 A",
    );
    expect(analysis?.power.current).toBeLessThanOrEqual(18.5001);
  });

  it("uses the configured strategy", async () => {
    const config = { ...defaultConfig, search: { ...defaultConfig.search, strategy: "closed-form" as const } };
    const { deps } = setup([scenario], [], config);
    const analysis = await runCalculation(deps);

    expect(analysis?.efficiency.current).toBeCloseTo(Math.sqrt(55.5), 9);
    expect(analysis?.searches.efficiency.strategy).toBe("closed-form");
  });

  it("closes the line input when it ends early", async () => {
    const { deps, opened } = setup([["1000"]]);

    await expect(runCalculation(deps)).rejects.toThrow("Input ended before all values were entered");
    expect(opened[0].closed).toBe(true);
  });
});

describe("runSession", () => {
  it("restarts on Enter and stops on Escape", async () => {
    const { deps, out, opened, logLines } = setup([scenario, scenario], ["x", "\r", "\x1b"]);
    await runSession(deps);

    expect(opened).toHaveLength(2);
    expect(out.text.split("Press [Esc] to quit or [Enter] to restart... \n")).toHaveLength(3);
    expect(logLines).toContain("[2024-03-01T12:00:00+00:00] INFO Restarting calculation");
  });

  it("offers a restart after a rejected range", async () => {
    const { deps, opened } = setup([["1000", "y", "11.1", "5", "5.005", "100"], scenario], ["\r", "\x1b"]);
    await runSession(deps);

    expect(opened).toHaveLength(2);
  });
});
