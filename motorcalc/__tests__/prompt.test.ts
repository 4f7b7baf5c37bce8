import { PassThrough } from "node:stream";
import { describe, expect, it } from "vitest";
import {
  InputClosedError,
  PromptService,
  collectMotorParameters,
  createLineSource,
  parseNumber,
  parseYesNo,
} from "../cli/prompt";
import { CapturedOutput, ScriptedLines } from "./fakes";

const promptWith = (answers: string[]) => {
  const out = new CapturedOutput();
  return { out, prompt: new PromptService(new ScriptedLines(answers), out) };
};

describe("parseNumber", () => {
  it("applies the constraint", () => {
    expect(parseNumber(" 12.5 ", "positive")).toBe(12.5);
    expect(parseNumber("0", "positive")).toBeNull();
    expect(parseNumber("0", "non-negative")).toBe(0);
    expect(parseNumber("-1", "non-negative")).toBeNull();
    expect(parseNumber("4", "positive-integer")).toBe(4);
    expect(parseNumber("2.5", "positive-integer")).toBeNull();
  });

  it("rejects text that is not a finite number", () => {
    expect(parseNumber("12abc", "positive")).toBeNull();
    expect(parseNumber("Infinity", "positive")).toBeNull();
    expect(parseNumber("", "non-negative")).toBeNull();
  });
});

describe("parseYesNo", () => {
  it("treats an empty answer as yes", () => {
    expect(parseYesNo("")).toBe(true);
    expect(parseYesNo("Y")).toBe(true);
    expect(parseYesNo("yes")).toBe(true);
    expect(parseYesNo("N")).toBe(false);
    expect(parseYesNo("no")).toBe(false);
    expect(parseYesNo("maybe")).toBeNull();
  });
});

describe("PromptService.requestNumber", () => {
  it("replaces the prompt with a summary line", async () => {
    const { out, prompt } = promptWith(["1000"]);
    await expect(prompt.requestNumber("Kv", "positive")).resolves.toBe(1000);
    expect(out.text).toBe("Enter Kv: \x1b[s\x1b[1A\x1b[JKv: 1000\n");
  });

  it("asks again after an invalid entry and erases every printed line", async () => {
    const { out, prompt } = promptWith(["abc", "-2", "0.5"]);
    await expect(prompt.requestNumber("unloaded current (A)", "non-negative")).resolves.toBe(0.5);
    expect(out.text).toBe(
      "Enter unloaded current (A): \x1b[s" +
        "\x1b[31mInvalid entry, try again.\x1b[0m\n" +
        "Enter unloaded current (A): \x1b[s" +
        "\x1b[31mInvalid entry, try again.\x1b[0m\n" +
        "Enter unloaded current (A): \x1b[s" +
        "\x1b[5A\x1b[JUnloaded current (A): 0.5\n",
    );
  });

  it("keeps the cursor in place on an empty line", async () => {
    const { out, prompt } = promptWith(["", "  ", "20"]);
    await expect(prompt.requestNumber("maximum current (A)", "positive")).resolves.toBe(20);
    expect(out.text).toBe(
      "Enter maximum current (A): \x1b[s\x1b[u\x1b[u\x1b[1A\x1b[JMaximum current (A): 20\n",
    );
  });

  it("fails when input ends", async () => {
    const { prompt } = promptWith([]);
    await expect(prompt.requestNumber("Kv", "positive")).rejects.toBeInstanceOf(InputClosedError);
  });
});

describe("PromptService.confirm", () => {
  it("marks a yes with a tick", async () => {
    const { out, prompt } = promptWith([""]);
    await expect(prompt.confirm("do you know the battery voltage?")).resolves.toBe(true);
    expect(out.text).toBe(
      "do you know the battery voltage? [Y/n]: \x1b[1A\x1b[JDo you know the battery voltage?: ✓\n",
    );
  });

  it("marks a no with a cross after an invalid answer", async () => {
    const { out, prompt } = promptWith(["perhaps", "n"]);
    await expect(prompt.confirm("Continue?")).resolves.toBe(false);
    expect(out.text).toBe(
      "Continue? [Y/n]: \x1b[31mInvalid entry, try again.\x1b[0m\n" +
        "Continue? [Y/n]: \x1b[3A\x1b[JContinue?: X\n",
    );
  });
});

describe("collectMotorParameters", () => {
  it("collects the five parameters with a known voltage", async () => {
    const { out, prompt } = promptWith(["1000", "y", "11.1", "0.5", "20", "100"]);
    await expect(collectMotorParameters(prompt, out, 3.7)).resolves.toEqual({
      kv: 1000,
      voltage: 11.1,
      noLoadCurrent: 0.5,
      maxCurrent: 20,
      armatureResistance: 100,
    });
    expect(out.text).toContain("Armature resistance (mΩ): 100\n");
  });

  it("derives the voltage from a cell count", async () => {
    const { out, prompt } = promptWith(["1000", "n", "2.5", "4", "0.5", "20", "100"]);
    const params = await collectMotorParameters(prompt, out, 3.7);

    expect(params.voltage).toBe(14.8);
    expect(out.text).toContain("Cell count (S): 4\nVoltage: 14.8\nEnter unloaded current (A): ");
  });
});

describe("createLineSource", () => {
  it("reads lines until the stream ends", async () => {
    const input = new PassThrough();
    const lines = createLineSource(input);
    input.end("1000\n11.1\n");

    await expect(lines.readLine()).resolves.toBe("1000");
    await expect(lines.readLine()).resolves.toBe("11.1");
    await expect(lines.readLine()).resolves.toBeNull();
    lines.close();
  });
});
