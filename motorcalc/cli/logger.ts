import { Temporal } from "@js-temporal/polyfill";
import type { LogLevel } from "../sim/types";

const LEVEL_RANK: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARN: 30,
  ERROR: 40,
  SILENT: 100,
};

export type LogSink = (line: string) => void;
export type LogClock = () => Temporal.ZonedDateTime;

const stderrSink: LogSink = (line) => {
  process.stderr.write(`${line}\n`);
};

export class Logger {
  constructor(
    private readonly level: LogLevel = "ERROR",
    private readonly sink: LogSink = stderrSink,
    private readonly clock: LogClock = () => Temporal.Now.zonedDateTimeISO(),
  ) {}

  private timestamp(): string {
    return this.clock().toString({ timeZoneName: "never", smallestUnit: "second" });
  }

  private write(level: LogLevel, message: string) {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.level]) return;
    this.sink(`[${this.timestamp()}] ${level} ${message}`);
  }

  public debug(message: string) {
    this.write("DEBUG", message);
  }

  public log(message: string) {
    this.write("INFO", message);
  }

  public warn(message: string) {
    this.write("WARN", message);
  }

  public logException(error: unknown) {
    if (error instanceof Error) {
      this.write("ERROR", `${error.name}: ${error.message}`);
      if (error.stack) this.write("DEBUG", error.stack);
    } else {
      this.write("ERROR", String(error));
    }
  }

  // One line, `event | key=value, ...`, for events worth finding again later.
  public logSignificant(event: string, data?: Record<string, string | number | boolean>) {
    const details = data
      ? ` | ${Object.entries(data).map(([k, v]) => `${k}=${v}`).join(", ")}`
      : "";
    this.write("INFO", `${event}${details}`);
  }
}
