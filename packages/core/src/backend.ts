/**
 * Backend contract shared by every terminal transport.
 *
 * A Backend is owned by exactly one Terminal and drives one session. Local
 * terminals and remote channels both implement it, so everything above the
 * Terminal sees one event and I/O contract.
 */

import type { Event } from "./events.js";

// =============================================================================
// Capabilities
// =============================================================================

export type Capabilities = Readonly<{
  mouse: boolean;
  colors256: boolean;
  trueColor: boolean;
  bracketedPaste: boolean;
  focusEvents: boolean;
  kittyKeyboard: boolean;
}>;

export const DEFAULT_CAPABILITIES: Capabilities = Object.freeze({
  mouse: true,
  colors256: true,
  trueColor: false,
  bracketedPaste: false,
  focusEvents: false,
  kittyKeyboard: false,
});

export type TerminalSize = Readonly<{ cols: number; rows: number }>;

/** Cell height to width. */
export type CellAspectRatio = readonly [height: number, width: number];

export const DEFAULT_CELL_ASPECT_RATIO: CellAspectRatio = Object.freeze([2, 1] as const);

// =============================================================================
// Escape sequences
// =============================================================================

export const ALT_SCREEN_ON = "\x1b[?1049h";
export const ALT_SCREEN_OFF = "\x1b[?1049l";
export const MOUSE_TRACKING_ON = "\x1b[?1000h";
export const MOUSE_TRACKING_OFF = "\x1b[?1000l";
export const MOUSE_SGR_ON = "\x1b[?1006h";
export const MOUSE_SGR_OFF = "\x1b[?1006l";
export const MOUSE_DRAG_ON = "\x1b[?1002h";
export const MOUSE_DRAG_OFF = "\x1b[?1002l";
export const CURSOR_HIDE = "\x1b[?25l";
export const CURSOR_SHOW = "\x1b[?25h";
export const AUTOWRAP_OFF = "\x1b[?7l";
export const AUTOWRAP_ON = "\x1b[?7h";
export const SGR_RESET = "\x1b[0m";
export const BELL = "\x07";
export const CLEAR_HOME = "\x1b[2J\x1b[H";

export function cursorTo(x: number, y: number): string {
  return `\x1b[${y + 1};${x + 1}H`;
}

/**
 * Session setup, in send order. Cleanup is the same list reversed with each
 * mode flipped, followed by an attribute reset.
 */
export function setupSequences(mouse = true): readonly string[] {
  return mouse
    ? [ALT_SCREEN_ON, MOUSE_TRACKING_ON, MOUSE_SGR_ON, MOUSE_DRAG_ON, CURSOR_HIDE, AUTOWRAP_OFF]
    : [ALT_SCREEN_ON, CURSOR_HIDE, AUTOWRAP_OFF];
}

export function teardownSequences(mouse = true): readonly string[] {
  return mouse
    ? [
        CURSOR_SHOW,
        AUTOWRAP_ON,
        MOUSE_DRAG_OFF,
        MOUSE_SGR_OFF,
        MOUSE_TRACKING_OFF,
        ALT_SCREEN_OFF,
        SGR_RESET,
      ]
    : [CURSOR_SHOW, AUTOWRAP_ON, ALT_SCREEN_OFF, SGR_RESET];
}

// =============================================================================
// Backend
// =============================================================================

export interface Backend {
  /**
   * Enter raw mode, the alternate screen, mouse capture, hidden cursor and
   * autowrap off. Calling it twice is a no-op.
   */
  init(): Promise<void>;

  /** Exact inverse of init(). No-op when not initialized. */
  cleanup(): Promise<void>;

  /**
   * Temporary release for shell escapes. Terminal falls back to
   * cleanup()/init() when these are absent.
   */
  suspend?(): Promise<void>;
  resume?(): Promise<void>;

  size(): TerminalSize;

  /**
   * Next event, or null when none arrived within `timeoutMs`. Never waits
   * longer than the timeout. Rejects only on a hard transport failure.
   */
  pollEvent(timeoutMs: number): Promise<Event | null>;

  /** Queue output. Nothing reaches the transport before flush(). */
  writeRaw(data: string): void;

  /** Send queued output. No-op when nothing is queued. */
  flush(): Promise<void>;

  showCursor(x: number, y: number): void;
  hideCursor(): void;

  capabilities(): Capabilities;

  cellAspectRatio(): CellAspectRatio;

  bell(): Promise<void>;
  clearScreen(): Promise<void>;
}
