import { spawn } from "node:child_process";

export const APP_TITLE = "MotorCalc";
export const IN_TERMINAL_FLAG = "--in-terminal";

export interface TerminalCandidate {
  command: string;
  // Arguments placed before the program's own command line.
  args: string[];
}

// Tried in order; the first one that exists wins.
export const TERMINAL_CANDIDATES: readonly TerminalCandidate[] = [
  { command: "x-terminal-emulator", args: [`--title=${APP_TITLE}`, "-x"] },
  { command: "gnome-terminal", args: ["-t", APP_TITLE, "-x"] },
  { command: "konsole", args: ["-p", `tabtitle=${APP_TITLE}`, "-e"] },
  { command: "xfce4-terminal", args: [`-T=${APP_TITLE}`, "-x"] },
  { command: "xterm", args: ["-T", APP_TITLE, "-e"] },
];

export interface SpawnedProcess {
  once(event: "spawn", listener: () => void): unknown;
  once(event: "error", listener: (error: NodeJS.ErrnoException) => void): unknown;
  unref(): void;
}

export type SpawnProcess = (command: string, args: string[]) => SpawnedProcess;

const spawnDetached: SpawnProcess = (command, args) =>
  spawn(command, args, { detached: true, stdio: "ignore" });

export const isInteractive = (
  stdin: { isTTY?: boolean },
  stdout: { isTTY?: boolean },
) => Boolean(stdin.isTTY) && Boolean(stdout.isTTY);

// Resolves false when the binary does not exist; other spawn failures reject.
const trySpawn = (spawnProcess: SpawnProcess, command: string, args: string[]) =>
  new Promise<boolean>((resolve, reject) => {
    const child = spawnProcess(command, args);
    child.once("spawn", () => {
      child.unref();
      resolve(true);
    });
    child.once("error", (error) => {
      if (error.code === "ENOENT") resolve(false);
      else reject(error);
    });
  });

/**
 * Starts `programArgs` again inside the first terminal emulator found, with
 * {@link IN_TERMINAL_FLAG} appended so the new process does not do the same.
 * Returns the command that was launched, or null when none could be found.
 */
export const relaunchInTerminal = async (
  programArgs: string[],
  spawnProcess: SpawnProcess = spawnDetached,
): Promise<string | null> => {
  for (const candidate of TERMINAL_CANDIDATES) {
    const launched = await trySpawn(spawnProcess, candidate.command, [
      ...candidate.args,
      ...programArgs,
      IN_TERMINAL_FLAG,
    ]);
    if (launched) return candidate.command;
  }
  return null;
};
