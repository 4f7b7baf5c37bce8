import type { TextSink } from "./prompt";

export type RestartChoice = "continue" | "quit";

export interface KeySource {
  // Resolves to the raw characters of one keystroke, or null once input has ended.
  nextKey(): Promise<string | null>;
}

// The parts of a TTY read stream that raw key reads use.
export interface KeyInput extends NodeJS.ReadableStream {
  isTTY?: boolean;
  isRaw?: boolean;
  setRawMode?(mode: boolean): unknown;
}

const ESCAPE = "\x1b";
const CTRL_C = "\x03";

export const classifyKeys = (chunk: string): RestartChoice | null => {
  for (const ch of chunk) {
    if (ch === ESCAPE || ch === CTRL_C) return "quit";
    if (ch === "\r" || ch === "\n") return "continue";
  }
  return null;
};

export const waitForRestartChoice = async (
  keys: KeySource,
  out: TextSink,
): Promise<RestartChoice> => {
  out.write("Press [Esc] to quit or [Enter] to restart... \n");

  for (;;) {
    const chunk = await keys.nextKey();
    if (chunk === null) return "quit";
    const choice = classifyKeys(chunk);
    if (choice) return choice;
  }
};

/**
 * Reads single keystrokes without waiting for a line. Raw mode is switched on for
 * each read and put back the way it was afterwards, so line prompts keep working
 * between reads.
 */
export const createKeySource = (input: KeyInput): KeySource => ({
  nextKey: () =>
    new Promise<string | null>((resolve, reject) => {
      const wasRaw = input.isRaw ?? false;
      const setRaw = (mode: boolean) => {
        if (input.isTTY && input.setRawMode) input.setRawMode(mode);
      };
      setRaw(true);

      const cleanup = () => {
        input.off("data", onData);
        input.off("end", onEnd);
        input.off("error", onError);
        setRaw(wasRaw);
        input.pause();
      };
      const onData = (chunk: Buffer | string) => {
        cleanup();
        resolve(chunk.toString());
      };
      const onEnd = () => {
        cleanup();
        resolve(null);
      };
      const onError = (error: Error) => {
        cleanup();
        reject(error);
      };

      input.on("data", onData);
      input.on("end", onEnd);
      input.on("error", onError);
      input.resume();
    }),
});
