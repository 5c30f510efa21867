/**
 * packages/core/src/input/escTracker.ts: Time-based ESC prefix handling.
 *
 * Terminals that cannot send Alt/Meta let the user press ESC and then a
 * letter. The tracker sits after the byte decoder in the local backend and
 * turns a bare ESC into a prefix for up to `timeoutMs`:
 *
 *   ESC, ESC within the window     -> KB_ESC_ESC
 *   ESC, letter within the window  -> Esc+letter (f h x a o e s v) or Alt+letter
 *   ESC, anything else             -> ESC, then that event
 *   ESC, nothing until the window  -> ESC (via expire())
 *
 * State is per instance; each backend owns its own tracker.
 */

import { TvError } from "../errors.js";
import { type Event, keyEvent } from "../events.js";
import { KB_ESC, KB_ESC_ESC, altLetterCode, escLetterCode } from "../keys/keyCodes.js";

export const MIN_ESC_TIMEOUT_MS = 250;
export const MAX_ESC_TIMEOUT_MS = 1500;
export const DEFAULT_ESC_TIMEOUT_MS = 500;

export function requireEscTimeout(ms: number): number {
  if (!Number.isInteger(ms) || ms < MIN_ESC_TIMEOUT_MS || ms > MAX_ESC_TIMEOUT_MS) {
    throw new TvError(
      "TV_INVALID_INPUT",
      `escTimeoutMs must be an integer between ${MIN_ESC_TIMEOUT_MS} and ${MAX_ESC_TIMEOUT_MS}`,
    );
  }
  return ms;
}

export class EscSequenceTracker {
  private _timeoutMs: number;
  private _pendingSince: number | null = null;

  constructor(timeoutMs: number = DEFAULT_ESC_TIMEOUT_MS) {
    this._timeoutMs = requireEscTimeout(timeoutMs);
  }

  get timeoutMs(): number {
    return this._timeoutMs;
  }

  setTimeout(ms: number): void {
    this._timeoutMs = requireEscTimeout(ms);
  }

  /** True while an ESC is held back waiting for its follow-up. */
  get pending(): boolean {
    return this._pendingSince !== null;
  }

  /** Time at which a held ESC is released as a plain key, or null. */
  deadline(): number | null {
    return this._pendingSince === null ? null : this._pendingSince + this._timeoutMs;
  }

  /** Feed one decoded event; returns the events to deliver now, in order. */
  push(event: Event, now: number): Event[] {
    const out = this.expire(now);

    if (event.kind !== "keyboard" || event.modifiers !== 0) {
      out.push(...this.releasePending(), event);
      return out;
    }

    if (event.keyCode === KB_ESC) {
      if (this._pendingSince !== null) {
        this._pendingSince = null;
        out.push(keyEvent(KB_ESC_ESC));
      } else {
        this._pendingSince = now;
      }
      return out;
    }

    if (this._pendingSince !== null) {
      const combined = combineWithLetter(event.keyCode);
      if (combined !== 0) {
        this._pendingSince = null;
        out.push(keyEvent(combined));
        return out;
      }
    }

    out.push(...this.releasePending(), event);
    return out;
  }

  /** Release a held ESC whose window has passed. */
  expire(now: number): Event[] {
    const deadline = this.deadline();
    if (deadline === null || now < deadline) return [];
    return this.releasePending();
  }

  reset(): void {
    this._pendingSince = null;
  }

  private releasePending(): Event[] {
    if (this._pendingSince === null) return [];
    this._pendingSince = null;
    return [keyEvent(KB_ESC)];
  }
}

function combineWithLetter(keyCode: number): number {
  const isLetter =
    (keyCode >= 0x41 && keyCode <= 0x5a) || (keyCode >= 0x61 && keyCode <= 0x7a);
  if (!isLetter) return 0;
  const ch = String.fromCharCode(keyCode).toLowerCase();
  const esc = escLetterCode(ch);
  return esc !== 0 ? esc : altLetterCode(ch);
}
