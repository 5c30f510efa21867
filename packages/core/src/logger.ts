/**
 * Minimal logging seam. Core writes through whatever Logger it is handed;
 * the node package supplies one that targets stderr, since stdout belongs to
 * the terminal.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type Logger = Readonly<{
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
}>;

export const LOG_LEVELS: readonly LogLevel[] = Object.freeze([
  "debug",
  "info",
  "warn",
  "error",
  "silent",
]);

const LEVEL_RANK: Readonly<Record<LogLevel, number>> = Object.freeze({
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
});

export function isLogLevel(v: unknown): v is LogLevel {
  return typeof v === "string" && LOG_LEVELS.some((l) => l === v);
}

export function levelEnabled(threshold: LogLevel, level: Exclude<LogLevel, "silent">): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[threshold];
}

const noop = (): void => {};

export const silentLogger: Logger = Object.freeze({
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
});

type ConsoleLike = { [K in Exclude<LogLevel, "silent">]?: (msg: string) => void };

/** Logger over `globalThis.console`, filtered by `level`. */
export function consoleLogger(level: LogLevel = "warn"): Logger {
  const c = (globalThis as { console?: ConsoleLike }).console;
  const at =
    (name: Exclude<LogLevel, "silent">) =>
    (message: string): void => {
      if (levelEnabled(level, name)) c?.[name]?.(message);
    };
  return Object.freeze({
    debug: at("debug"),
    info: at("info"),
    warn: at("warn"),
    error: at("error"),
  });
}
