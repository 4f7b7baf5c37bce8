import type { KeySource } from "../cli/keypress";
import type { LineSource, TextSink } from "../cli/prompt";

export class ScriptedLines implements LineSource {
  closed = false;
  private index = 0;

  constructor(private readonly answers: string[]) {}

  async readLine(): Promise<string | null> {
    if (this.index >= this.answers.length) return null;
    const answer = this.answers[this.index];
    this.index += 1;
    return answer;
  }

  close() {
    this.closed = true;
  }
}

export class ScriptedKeys implements KeySource {
  private index = 0;

  constructor(private readonly keys: string[]) {}

  async nextKey(): Promise<string | null> {
    if (this.index >= this.keys.length) return null;
    const key = this.keys[this.index];
    this.index += 1;
    return key;
  }
}

export class CapturedOutput implements TextSink {
  text = "";

  write(text: string) {
    this.text += text;
    return true;
  }
}
