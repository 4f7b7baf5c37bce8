import { createInterface } from "node:readline";
import type { MotorParameters } from "../sim/types";
import { capitalize } from "../sim/utils";
import { RED, RESET, RESTORE_CURSOR, SAVE_CURSOR, eraseLinesAbove } from "./ansi";

export interface LineSource {
  // Resolves to null once the input has ended.
  readLine(): Promise<string | null>;
  close(): void;
}

export interface TextSink {
  write(text: string): unknown;
}

export type NumberConstraint = "positive" | "non-negative" | "positive-integer";

export class InputClosedError extends Error {
  constructor() {
    super("Input ended before all values were entered");
    this.name = "InputClosedError";
  }
}

const INVALID_ENTRY = `${RED}Invalid entry, try again.${RESET}\n`;

const YES = ["yes", "y", ""];
const NO = ["no", "n"];

export const parseNumber = (text: string, constraint: NumberConstraint): number | null => {
  const trimmed = text.trim();
  if (trimmed === "") return null;
  const value = Number(trimmed);
  if (!Number.isFinite(value)) return null;

  switch (constraint) {
    case "positive":
      return value > 0 ? value : null;
    case "non-negative":
      return value >= 0 ? value : null;
    case "positive-integer":
      return Number.isInteger(value) && value > 0 ? value : null;
  }
};

export const parseYesNo = (text: string): boolean | null => {
  const answer = text.trim().toLowerCase();
  if (YES.includes(answer)) return true;
  if (NO.includes(answer)) return false;
  return null;
};

/**
 * Line-based entry of values. Invalid answers are repeated in place: once an
 * answer is accepted every line the exchange printed is erased and replaced by a
 * single `Label: value` line.
 */
export class PromptService {
  constructor(
    private readonly lines: LineSource,
    private readonly out: TextSink,
  ) {}

  private async nextLine(): Promise<string> {
    const line = await this.lines.readLine();
    if (line === null) throw new InputClosedError();
    return line;
  }

  private accept(printedLines: number, summary: string) {
    this.out.write(`${eraseLinesAbove(printedLines)}${summary}\n`);
  }

  async requestNumber(label: string, constraint: NumberConstraint): Promise<number> {
    let printedLines = 0;

    for (;;) {
      this.out.write(`Enter ${label}: ${SAVE_CURSOR}`);
      printedLines += 1;

      let line = await this.nextLine();
      // A bare Enter keeps the cursor on the prompt line.
      while (line.trim() === "") {
        this.out.write(RESTORE_CURSOR);
        line = await this.nextLine();
      }

      const value = parseNumber(line, constraint);
      if (value !== null) {
        this.accept(printedLines, `${capitalize(label)}: ${value}`);
        return value;
      }

      this.out.write(INVALID_ENTRY);
      printedLines += 1;
    }
  }

  async confirm(question: string): Promise<boolean> {
    let printedLines = 0;

    for (;;) {
      this.out.write(`${question} [Y/n]: `);
      printedLines += 1;

      const answer = parseYesNo(await this.nextLine());
      if (answer !== null) {
        this.accept(printedLines, `${capitalize(question)}: ${answer ? "✓" : "X"}`);
        return answer;
      }

      this.out.write(INVALID_ENTRY);
      printedLines += 1;
    }
  }
}

export const collectMotorParameters = async (
  prompt: PromptService,
  out: TextSink,
  cellVoltage: number,
): Promise<MotorParameters> => {
  const kv = await prompt.requestNumber("Kv", "positive");

  let voltage: number;
  if (await prompt.confirm("Do you know the battery voltage?")) {
    voltage = await prompt.requestNumber("voltage", "positive");
  } else {
    const cells = await prompt.requestNumber("cell count (S)", "positive-integer");
    voltage = cells * cellVoltage;
    out.write(`Voltage: ${voltage}\n`);
  }

  const noLoadCurrent = await prompt.requestNumber("unloaded current (A)", "non-negative");
  const maxCurrent = await prompt.requestNumber("maximum current (A)", "positive");
  const armatureResistance = await prompt.requestNumber("armature resistance (mΩ)", "non-negative");

  return { kv, voltage, noLoadCurrent, maxCurrent, armatureResistance };
};

export const createLineSource = (input: NodeJS.ReadableStream): LineSource => {
  const rl = createInterface({ input, terminal: false });
  const lines = rl[Symbol.asyncIterator]();

  return {
    readLine: async () => {
      const next = await lines.next();
      return next.done ? null : next.value;
    },
    close: () => rl.close(),
  };
};
