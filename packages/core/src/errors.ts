/**
 * packages/core/src/errors.ts: Error taxonomy for the event pipeline.
 *
 * Decode anomalies never surface here; the decoder resolves them to key 0 or
 * a bare ESC. Everything a backend or the router can fail on is a TvError.
 */

// =============================================================================
// TvErrorCode
// =============================================================================

export type TvErrorCode =
  | "TV_IO_ERROR"
  | "TV_BROKEN_PIPE"
  | "TV_TERMINAL_INIT"
  | "TV_INVALID_INPUT"
  | "TV_PARSE_ERROR"
  | "TV_FILE_OPERATION"
  | "TV_INVALID_STATE";

// =============================================================================
// TvError
// =============================================================================

export class TvError extends Error {
  override readonly name = "TvError";
  readonly code: TvErrorCode;

  constructor(code: TvErrorCode, message?: string, options?: Readonly<{ cause?: unknown }>) {
    super(message ?? code, options?.cause === undefined ? undefined : { cause: options.cause });
    this.code = code;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TvError);
    }
  }
}

export function isTvError(v: unknown, code?: TvErrorCode): v is TvError {
  if (!(v instanceof TvError)) return false;
  return code === undefined || v.code === code;
}

export function describeThrown(v: unknown): string {
  if (v instanceof Error) return `${v.name}: ${v.message}`;
  return String(v);
}

/** Shorthand for the disconnected-channel failure raised by poll and flush. */
export function brokenPipe(detail = "channel disconnected"): TvError {
  return new TvError("TV_BROKEN_PIPE", detail);
}
