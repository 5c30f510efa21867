/**
 * packages/core/src/keys/keyNames.ts: Human-readable key names.
 *
 * Why: Menu and status-line tables are easier to write as "alt+x" or "f10"
 * than as scan codes. This module maps names to the DOS key codes and back.
 *
 * Format examples:
 *   - Named key: "enter", "esc", "f1", "pgdn"
 *   - Printable character: "a", "?"
 *   - Modifier combos: "ctrl+c", "alt+x", "shift+tab", "shift+f12"
 *   - ESC prefix: "esc x", "esc esc"
 */

import { TvError } from "../errors.js";
import {
  FUNCTION_KEYS,
  KB_BACKSPACE,
  KB_DEL,
  KB_DOWN,
  KB_END,
  KB_ENTER,
  KB_ESC,
  KB_ESC_ESC,
  KB_F12,
  KB_HOME,
  KB_INS,
  KB_LEFT,
  KB_PGDN,
  KB_PGUP,
  KB_RIGHT,
  KB_SHIFT_F12,
  KB_SHIFT_TAB,
  KB_TAB,
  KB_UP,
  altLetterCode,
  ctrlLetterCode,
  escLetterCode,
  letterOfAltCode,
} from "./keyCodes.js";

export type KeyNameErrorCode = "EMPTY" | "UNKNOWN_KEY" | "UNKNOWN_MODIFIER" | "UNSUPPORTED_COMBO";

export type KeyNameError = Readonly<{ code: KeyNameErrorCode; detail: string }>;

export type ParseKeyNameResult =
  | Readonly<{ ok: true; value: number }>
  | Readonly<{ ok: false; error: KeyNameError }>;

const NAMED_KEYS: ReadonlyMap<string, number> = new Map<string, number>([
  ["enter", KB_ENTER],
  ["return", KB_ENTER],
  ["esc", KB_ESC],
  ["escape", KB_ESC],
  ["tab", KB_TAB],
  ["backspace", KB_BACKSPACE],
  ["up", KB_UP],
  ["down", KB_DOWN],
  ["left", KB_LEFT],
  ["right", KB_RIGHT],
  ["home", KB_HOME],
  ["end", KB_END],
  ["pgup", KB_PGUP],
  ["pageup", KB_PGUP],
  ["pgdn", KB_PGDN],
  ["pagedown", KB_PGDN],
  ["ins", KB_INS],
  ["insert", KB_INS],
  ["del", KB_DEL],
  ["delete", KB_DEL],
  ["space", 0x20],
  ...FUNCTION_KEYS.map((code, i): [string, number] => [`f${i + 1}`, code]),
]);

function fail(code: KeyNameErrorCode, detail: string): ParseKeyNameResult {
  return { ok: false, error: { code, detail } };
}

function baseKey(name: string): number | undefined {
  const named = NAMED_KEYS.get(name);
  if (named !== undefined) return named;
  if ([...name].length === 1) return (name.codePointAt(0) ?? 0) & 0xffff;
  return undefined;
}

function parseCombo(part: string): ParseKeyNameResult {
  const pieces = part.split("+");
  const keyPiece = pieces.pop();
  if (keyPiece === undefined || keyPiece.length === 0) {
    return fail("EMPTY", `missing key in "${part}"`);
  }

  const mods = new Set<string>();
  for (const piece of pieces) {
    if (piece === "ctrl" || piece === "control") mods.add("ctrl");
    else if (piece === "alt" || piece === "meta") mods.add("alt");
    else if (piece === "shift") mods.add("shift");
    else return fail("UNKNOWN_MODIFIER", `unknown modifier "${piece}" in "${part}"`);
  }

  if (mods.size === 0) {
    const code = baseKey(keyPiece);
    return code === undefined
      ? fail("UNKNOWN_KEY", `unknown key "${keyPiece}"`)
      : { ok: true, value: code };
  }

  if (mods.size > 1) return fail("UNSUPPORTED_COMBO", `no key code for "${part}"`);

  if (mods.has("ctrl")) {
    const code = ctrlLetterCode(keyPiece);
    return code !== 0 ? { ok: true, value: code } : fail("UNSUPPORTED_COMBO", `no key code for "${part}"`);
  }
  if (mods.has("alt")) {
    const code = altLetterCode(keyPiece);
    return code !== 0 ? { ok: true, value: code } : fail("UNSUPPORTED_COMBO", `no key code for "${part}"`);
  }
  if (keyPiece === "tab") return { ok: true, value: KB_SHIFT_TAB };
  if (keyPiece === "f12") return { ok: true, value: KB_SHIFT_F12 };
  return fail("UNSUPPORTED_COMBO", `no key code for "${part}"`);
}

/** Parse a key name (case-insensitive) to its 16-bit key code. */
export function parseKeyName(input: string): ParseKeyNameResult {
  const parts = input.trim().toLowerCase().split(/\s+/);
  const first = parts[0];
  if (first === undefined || first.length === 0) return fail("EMPTY", "empty key name");

  if (parts.length === 1) return parseCombo(first);

  const second = parts[1];
  if (parts.length === 2 && (first === "esc" || first === "escape") && second !== undefined) {
    if (second === "esc" || second === "escape") return { ok: true, value: KB_ESC_ESC };
    const code = escLetterCode(second);
    return code !== 0
      ? { ok: true, value: code }
      : fail("UNSUPPORTED_COMBO", `no ESC-prefix code for "${second}"`);
  }
  return fail("UNSUPPORTED_COMBO", `unsupported key sequence "${input}"`);
}

/** parseKeyName that throws TV_PARSE_ERROR. */
export function keyCodeOf(input: string): number {
  const res = parseKeyName(input);
  if (!res.ok) throw new TvError("TV_PARSE_ERROR", res.error.detail);
  return res.value;
}

const NAME_BY_CODE: ReadonlyMap<number, string> = (() => {
  const out = new Map<number, string>();
  // First name wins so "enter" is preferred over "return".
  for (const [name, code] of NAMED_KEYS) {
    if (!out.has(code)) out.set(code, name);
  }
  out.set(KB_ESC_ESC, "esc esc");
  out.set(KB_SHIFT_TAB, "shift+tab");
  out.set(KB_SHIFT_F12, "shift+f12");
  out.set(KB_F12, "f12");
  return out;
})();

/** Display name for a key code, e.g. "alt+x" or "ctrl+c". */
export function keyName(code: number): string {
  const named = NAME_BY_CODE.get(code);
  if (named !== undefined) return named;
  if (code >= 0x01 && code <= 0x1a) return `ctrl+${String.fromCharCode(0x60 + code)}`;
  if ((code & 0xff) === 0x01) {
    const letter = letterOfAltCode(code & 0xff00);
    if (letter !== undefined) return `esc ${letter}`;
  }
  const alt = letterOfAltCode(code);
  if (alt !== undefined) return `alt+${alt}`;
  if (code >= 0x20 && code < 0x7f) return String.fromCharCode(code);
  return `0x${code.toString(16).padStart(4, "0")}`;
}
