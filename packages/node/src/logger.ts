/**
 * packages/node/src/logger.ts: stderr logger for the Node host.
 *
 * stdout carries the terminal protocol, so log lines never go there.
 */

import { type LogLevel, type Logger, levelEnabled } from "@textvision/core";

export type WritableLike = Readonly<{ write: (chunk: string) => unknown }>;

export type StderrLoggerOptions = Readonly<{
  level?: LogLevel;
  stream?: WritableLike;
}>;

export function createStderrLogger(opts: StderrLoggerOptions = {}): Logger {
  const level = opts.level ?? "warn";
  const stream = opts.stream ?? process.stderr;
  const at =
    (name: Exclude<LogLevel, "silent">) =>
    (message: string): void => {
      if (!levelEnabled(level, name)) return;
      stream.write(`[textvision] ${name} ${message}\n`);
    };
  return Object.freeze({
    debug: at("debug"),
    info: at("info"),
    warn: at("warn"),
    error: at("error"),
  });
}
