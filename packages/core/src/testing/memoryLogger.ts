import type { LogLevel, Logger } from "../logger.js";

export type LogEntry = Readonly<{ level: Exclude<LogLevel, "silent">; message: string }>;

export type MemoryLogger = Logger & Readonly<{ entries: readonly LogEntry[] }>;

/** Logger that keeps every entry, for asserting on what was logged. */
export function createMemoryLogger(): MemoryLogger {
  const entries: LogEntry[] = [];
  const at =
    (level: LogEntry["level"]) =>
    (message: string): void => {
      entries.push(Object.freeze({ level, message }));
    };
  return Object.freeze({
    entries,
    debug: at("debug"),
    info: at("info"),
    warn: at("warn"),
    error: at("error"),
  });
}
