/* eslint-disable no-console */

export const LOG_LEVELS = ["silent", "error", "warn", "info", "debug"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogSink = Pick<Console, "error" | "warn" | "info" | "debug">;

export type Logger = {
  error(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  debug(message: string, ...details: unknown[]): void;
};

const RANK: Record<LogLevel, number> = { silent: 0, error: 1, warn: 2, info: 3, debug: 4 };

/**
 * Console logger with a `[tag]` prefix, e.g. `[inventory/analysis] processed 20 items`.
 * Messages above `level` are dropped.
 */
export function createLogger(tag: string, level: LogLevel = "info", sink: LogSink = console): Logger {
  const emit =
    (method: Exclude<LogLevel, "silent">) =>
    (message: string, ...details: unknown[]) => {
      if (RANK[method] > RANK[level]) return;
      sink[method](`[${tag}] ${message}`, ...details);
    };

  return {
    error: emit("error"),
    warn: emit("warn"),
    info: emit("info"),
    debug: emit("debug"),
  };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
