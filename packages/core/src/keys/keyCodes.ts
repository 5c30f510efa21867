/**
 * packages/core/src/keys/keyCodes.ts: DOS-style 16-bit key codes.
 *
 * High byte is the scan code, low byte the ASCII/control character where one
 * exists. Existing key-binding tables depend on these exact values.
 */

// =============================================================================
// Editing and control keys
// =============================================================================

export const KB_ESC = 0x011b;
export const KB_ENTER = 0x1c0d;
export const KB_BACKSPACE = 0x0e08;
export const KB_TAB = 0x0f09;
export const KB_SHIFT_TAB = 0x0f00;
/** Two ESC presses inside the ESC window. Dialogs read it as cancel. */
export const KB_ESC_ESC = 0x011c;

// =============================================================================
// Function keys
// =============================================================================

export const KB_F1 = 0x3b00;
export const KB_F2 = 0x3c00;
export const KB_F3 = 0x3d00;
export const KB_F4 = 0x3e00;
export const KB_F5 = 0x3f00;
export const KB_F6 = 0x4000;
export const KB_F7 = 0x4100;
export const KB_F8 = 0x4200;
export const KB_F9 = 0x4300;
export const KB_F10 = 0x4400;
export const KB_F11 = 0x8500;
export const KB_F12 = 0x8600;
export const KB_SHIFT_F12 = 0x8601;

export const FUNCTION_KEYS: readonly number[] = Object.freeze([
  KB_F1,
  KB_F2,
  KB_F3,
  KB_F4,
  KB_F5,
  KB_F6,
  KB_F7,
  KB_F8,
  KB_F9,
  KB_F10,
  KB_F11,
  KB_F12,
]);

// =============================================================================
// Navigation
// =============================================================================

export const KB_UP = 0x4800;
export const KB_DOWN = 0x5000;
export const KB_LEFT = 0x4b00;
export const KB_RIGHT = 0x4d00;
export const KB_HOME = 0x4700;
export const KB_END = 0x4f00;
export const KB_PGUP = 0x4900;
export const KB_PGDN = 0x5100;
export const KB_INS = 0x5200;
export const KB_DEL = 0x5300;

// =============================================================================
// Ctrl, Alt and Esc+letter
// =============================================================================

export const KB_CTRL_C = 0x03;

// Scan codes for a..z on the PC keyboard.
const LETTER_SCAN_CODES: readonly number[] = Object.freeze([
  0x1e, 0x30, 0x2e, 0x20, 0x12, 0x21, 0x22, 0x23, 0x17, 0x24, 0x25, 0x26, 0x32, 0x31, 0x18,
  0x19, 0x10, 0x13, 0x1f, 0x14, 0x16, 0x2f, 0x11, 0x2d, 0x15, 0x2c,
]);

/** Letters that have a dedicated Esc+letter code (low byte 0x01). */
export const ESC_LETTERS = "fhxaoesv";

function letterIndex(ch: string): number {
  if (ch.length !== 1) return -1;
  const c = ch.toLowerCase().charCodeAt(0);
  return c >= 0x61 && c <= 0x7a ? c - 0x61 : -1;
}

function scanCodeOf(ch: string): number {
  return LETTER_SCAN_CODES[letterIndex(ch)] ?? 0;
}

/** Alt+letter code, or 0 when `ch` is not an ASCII letter. */
export function altLetterCode(ch: string): number {
  return scanCodeOf(ch) << 8;
}

/**
 * Esc+letter emulation code for the letters in ESC_LETTERS, or 0 otherwise.
 */
export function escLetterCode(ch: string): number {
  const lower = ch.toLowerCase();
  if (lower.length !== 1 || !ESC_LETTERS.includes(lower)) return 0;
  return (scanCodeOf(lower) << 8) | 0x01;
}

/** Ctrl+letter is the literal control byte, 0x01..0x1A. */
export function ctrlLetterCode(ch: string): number {
  const idx = letterIndex(ch);
  return idx < 0 ? 0 : idx + 1;
}

export const KB_ALT_A = altLetterCode("a");
export const KB_ALT_E = altLetterCode("e");
export const KB_ALT_F = altLetterCode("f");
export const KB_ALT_H = altLetterCode("h");
export const KB_ALT_O = altLetterCode("o");
export const KB_ALT_X = altLetterCode("x");

export const KB_ESC_A = escLetterCode("a");
export const KB_ESC_E = escLetterCode("e");
export const KB_ESC_F = escLetterCode("f");
export const KB_ESC_H = escLetterCode("h");
export const KB_ESC_O = escLetterCode("o");
export const KB_ESC_S = escLetterCode("s");
export const KB_ESC_V = escLetterCode("v");
export const KB_ESC_X = escLetterCode("x");

/** Letter for an Alt+letter code, or undefined. */
export function letterOfAltCode(code: number): string | undefined {
  if ((code & 0xff) !== 0) return undefined;
  const idx = LETTER_SCAN_CODES.indexOf(code >> 8);
  return idx < 0 ? undefined : String.fromCharCode(0x61 + idx);
}
