import type { LogLevel } from "@/lib/config";

const RANK: Record<LogLevel, number> = { silent: 0, error: 1, warn: 2, info: 3, debug: 4 };

export interface Logger {
  error(message: string, error?: unknown): void;
  warn(message: string): void;
  info(message: string): void;
  debug(message: string): void;
}

// Diagnostics go to stderr so stdout stays the quiz transcript
export function createLogger(level: LogLevel, sink: Pick<Console, "log" | "error"> = console): Logger {
  const enabled = (at: LogLevel) => RANK[at] <= RANK[level];
  return {
    error(message, error) {
      if (!enabled("error")) return;
      if (error === undefined) sink.error(message);
      else sink.error(message, error instanceof Error ? error.message : error);
    },
    warn(message) {
      if (enabled("warn")) sink.error(`warning: ${message}`);
    },
    info(message) {
      if (enabled("info")) sink.log(message);
    },
    debug(message) {
      if (enabled("debug")) sink.error(`[debug] ${message}`);
    },
  };
}
