/**
 * packages/core/src/input/decoder.ts: Terminal byte stream to Event decoder.
 *
 * Bytes arrive in arbitrary chunks (a network read can split a sequence
 * anywhere). The decoder keeps unconsumed bytes and retries on the next feed,
 * so one feed of a sequence and the same bytes split over several feeds
 * produce the same events.
 *
 * Dialects: C0 controls, CSI (`ESC [`), SS3 (`ESC O`), tilde keys
 * (`ESC [ n ~`), X10 mouse (`ESC [ M b x y`), SGR mouse
 * (`ESC [ < b ; x ; y M|m`), ESC+letter as Alt, and UTF-8 text.
 *
 * Malformed input never throws: it resolves to key 0 or a bare ESC.
 */

import {
  type Event,
  KB_ALT,
  KB_CTRL,
  KB_SHIFT,
  MB_LEFT,
  MB_MIDDLE,
  MB_RIGHT,
  keyEvent,
  mouseEvent,
} from "../events.js";
import {
  KB_BACKSPACE,
  KB_DEL,
  KB_DOWN,
  KB_END,
  KB_ENTER,
  KB_ESC,
  KB_F1,
  KB_F10,
  KB_F11,
  KB_F12,
  KB_F2,
  KB_F3,
  KB_F4,
  KB_F5,
  KB_F6,
  KB_F7,
  KB_F8,
  KB_F9,
  KB_HOME,
  KB_INS,
  KB_LEFT,
  KB_PGDN,
  KB_PGUP,
  KB_RIGHT,
  KB_SHIFT_TAB,
  KB_TAB,
  KB_UP,
  altLetterCode,
} from "../keys/keyCodes.js";

const ESC = 0x1b;
const UNKNOWN_KEY = 0;

/** One decoded unit: the event and how many buffered bytes it used. */
type Decoded = readonly [event: Event, consumed: number];

export type InputDecoderOptions = Readonly<{
  /** Pending bytes above this limit are dropped. */
  maxBufferBytes?: number;
  onOverflow?: (droppedBytes: number) => void;
}>;

const DEFAULT_MAX_BUFFER_BYTES = 64 * 1024;
const EMPTY = new Uint8Array(0);
const textEncoder = new TextEncoder();
const strictUtf8 = new TextDecoder("utf-8", { fatal: true });

export class InputDecoder {
  private _buffer: Uint8Array = EMPTY;
  private readonly _maxBufferBytes: number;
  private readonly _onOverflow: ((droppedBytes: number) => void) | undefined;

  constructor(opts: InputDecoderOptions = {}) {
    this._maxBufferBytes = opts.maxBufferBytes ?? DEFAULT_MAX_BUFFER_BYTES;
    this._onOverflow = opts.onOverflow;
  }

  /** Bytes held back waiting for the rest of a sequence. */
  get pendingBytes(): number {
    return this._buffer.length;
  }

  /** Append bytes and drain every event they complete. */
  feed(data: Uint8Array | string): Event[] {
    const bytes = typeof data === "string" ? textEncoder.encode(data) : data;
    this.append(bytes);

    const out: Event[] = [];
    while (this._buffer.length > 0) {
      const decoded = decodeOne(this._buffer);
      if (decoded === null) break;
      const [event, consumed] = decoded;
      out.push(event);
      this._buffer = this._buffer.subarray(consumed);
    }

    if (this._buffer.length > this._maxBufferBytes) {
      const dropped = this._buffer.length;
      this._buffer = EMPTY;
      this._onOverflow?.(dropped);
    }
    return out;
  }

  /**
   * A buffer holding only ESC cannot be told apart from the start of a
   * sequence by bytes alone. Backends with a clock call this to release it as
   * a bare ESC key; returns null when the buffer holds anything else.
   */
  takeLoneEscape(): Event | null {
    if (this._buffer.length !== 1 || this._buffer[0] !== ESC) return null;
    this._buffer = EMPTY;
    return keyEvent(KB_ESC);
  }

  reset(): void {
    this._buffer = EMPTY;
  }

  private append(bytes: Uint8Array): void {
    if (bytes.length === 0) return;
    if (this._buffer.length === 0) {
      this._buffer = bytes.slice();
      return;
    }
    const next = new Uint8Array(this._buffer.length + bytes.length);
    next.set(this._buffer, 0);
    next.set(bytes, this._buffer.length);
    this._buffer = next;
  }
}

// =============================================================================
// Dispatch
// =============================================================================

/** Decode the unit at the start of `buf`, or null when more bytes are needed. */
export function decodeOne(buf: Uint8Array): Decoded | null {
  const b0 = buf[0];
  if (b0 === undefined) return null;

  if (b0 === ESC) return decodeEscape(buf);
  if (b0 === 0x0d) return [keyEvent(KB_ENTER), 1];
  if (b0 === 0x09) return [keyEvent(KB_TAB), 1];
  if (b0 === 0x7f || b0 === 0x08) return [keyEvent(KB_BACKSPACE), 1];
  if (b0 >= 0x01 && b0 <= 0x1a) return [keyEvent(b0), 1];
  if (b0 >= 0x20) return decodeUtf8(buf);
  return [keyEvent(UNKNOWN_KEY), 1];
}

function decodeEscape(buf: Uint8Array): Decoded | null {
  const b1 = buf[1];
  if (b1 === undefined) return null;
  if (b1 === 0x5b /* [ */) return decodeCsi(buf);
  if (b1 === 0x4f /* O */) return decodeSs3(buf);
  if (isAsciiLetter(b1)) {
    return [keyEvent(altLetterCode(String.fromCharCode(b1).toLowerCase())), 2];
  }
  return [keyEvent(KB_ESC), 1];
}

// =============================================================================
// CSI
// =============================================================================

function decodeCsi(buf: Uint8Array): Decoded | null {
  if (buf.length < 3) return null;
  const b2 = buf[2];
  if (b2 === 0x3c /* < */) return decodeSgrMouse(buf);
  if (b2 === 0x4d /* M */) return buf.length >= 6 ? decodeX10Mouse(buf) : null;

  let end = -1;
  for (let i = 2; i < buf.length; i++) {
    const b = buf[i] ?? 0;
    if (b >= 0x40 && b <= 0x7e) {
      end = i;
      break;
    }
  }
  if (end < 0) return null;

  const params = ascii(buf, 2, end);
  const final = buf[end] ?? 0;
  const modifiers = parseModifiers(params);

  let keyCode: number;
  switch (final) {
    case 0x41 /* A */:
      keyCode = KB_UP;
      break;
    case 0x42 /* B */:
      keyCode = KB_DOWN;
      break;
    case 0x43 /* C */:
      keyCode = KB_RIGHT;
      break;
    case 0x44 /* D */:
      keyCode = KB_LEFT;
      break;
    case 0x48 /* H */:
      keyCode = KB_HOME;
      break;
    case 0x46 /* F */:
      keyCode = KB_END;
      break;
    case 0x5a /* Z */:
      keyCode = KB_SHIFT_TAB;
      break;
    case 0x7e /* ~ */:
      keyCode = tildeKey(params);
      break;
    default:
      keyCode = UNKNOWN_KEY;
  }
  return [keyEvent(keyCode, modifiers), end + 1];
}

/**
 * Second `;` field is the xterm modifier value: 1 + (shift 1 | alt 2 | ctrl 4).
 */
function parseModifiers(params: string): number {
  const field = params.split(";")[1];
  const parsed = field === undefined ? Number.NaN : Number.parseInt(field, 10);
  const bits = (Number.isFinite(parsed) ? parsed : 1) - 1;
  if (bits <= 0) return 0;

  let mods = 0;
  if ((bits & 1) !== 0) mods |= KB_SHIFT;
  if ((bits & 2) !== 0) mods |= KB_ALT;
  if ((bits & 4) !== 0) mods |= KB_CTRL;
  return mods;
}

function tildeKey(params: string): number {
  const n = Number.parseInt(params.split(";")[0] ?? "", 10);
  switch (n) {
    case 1:
    case 7:
      return KB_HOME;
    case 2:
      return KB_INS;
    case 3:
      return KB_DEL;
    case 4:
    case 8:
      return KB_END;
    case 5:
      return KB_PGUP;
    case 6:
      return KB_PGDN;
    case 11:
      return KB_F1;
    case 12:
      return KB_F2;
    case 13:
      return KB_F3;
    case 14:
      return KB_F4;
    case 15:
      return KB_F5;
    case 17:
      return KB_F6;
    case 18:
      return KB_F7;
    case 19:
      return KB_F8;
    case 20:
      return KB_F9;
    case 21:
      return KB_F10;
    case 23:
      return KB_F11;
    case 24:
      return KB_F12;
    default:
      return UNKNOWN_KEY;
  }
}

// =============================================================================
// SS3
// =============================================================================

function decodeSs3(buf: Uint8Array): Decoded | null {
  if (buf.length < 3) return null;
  let keyCode: number;
  switch (buf[2]) {
    case 0x50 /* P */:
      keyCode = KB_F1;
      break;
    case 0x51 /* Q */:
      keyCode = KB_F2;
      break;
    case 0x52 /* R */:
      keyCode = KB_F3;
      break;
    case 0x53 /* S */:
      keyCode = KB_F4;
      break;
    case 0x41 /* A */:
      keyCode = KB_UP;
      break;
    case 0x42 /* B */:
      keyCode = KB_DOWN;
      break;
    case 0x43 /* C */:
      keyCode = KB_RIGHT;
      break;
    case 0x44 /* D */:
      keyCode = KB_LEFT;
      break;
    case 0x48 /* H */:
      keyCode = KB_HOME;
      break;
    case 0x46 /* F */:
      keyCode = KB_END;
      break;
    default:
      keyCode = UNKNOWN_KEY;
  }
  return [keyEvent(keyCode), 3];
}

// =============================================================================
// Mouse
// =============================================================================

function buttonFromLowBits(cb: number, fallback: number): number {
  switch (cb & 0x03) {
    case 0:
      return MB_LEFT;
    case 1:
      return MB_MIDDLE;
    case 2:
      return MB_RIGHT;
    default:
      return fallback;
  }
}

/** `ESC [ M Cb Cx Cy`, each field offset by 32, coordinates 1-based. */
function decodeX10Mouse(buf: Uint8Array): Decoded {
  const cb = ((buf[3] ?? 32) - 32) & 0xff;
  const x = Math.max(0, (buf[4] ?? 32) - 32 - 1);
  const y = Math.max(0, (buf[5] ?? 32) - 32 - 1);

  if ((cb & 0x40) !== 0) {
    return [mouseEvent((cb & 0x01) !== 0 ? "mouseWheelDown" : "mouseWheelUp", x, y), 6];
  }
  if ((cb & 0x03) === 3) {
    return [mouseEvent("mouseUp", x, y, 0), 6];
  }
  return [mouseEvent("mouseDown", x, y, buttonFromLowBits(cb, MB_LEFT)), 6];
}

/** `ESC [ < Cb ; Cx ; Cy (M|m)`, decimal fields, coordinates 1-based. */
function decodeSgrMouse(buf: Uint8Array): Decoded | null {
  let end = -1;
  for (let i = 3; i < buf.length; i++) {
    const b = buf[i];
    if (b === 0x4d /* M */ || b === 0x6d /* m */) {
      end = i;
      break;
    }
  }
  if (end < 0) return null;

  const fields = ascii(buf, 3, end).split(";");
  const cb = decimalOrZero(fields[0]);
  const x = Math.max(0, decimalOrZero(fields[1]) - 1);
  const y = Math.max(0, decimalOrZero(fields[2]) - 1);
  const pressed = buf[end] === 0x4d;
  const consumed = end + 1;

  if ((cb & 0x40) !== 0) {
    return [mouseEvent((cb & 0x01) !== 0 ? "mouseWheelDown" : "mouseWheelUp", x, y), consumed];
  }
  if ((cb & 0x20) !== 0) {
    return [mouseEvent("mouseMove", x, y, buttonFromLowBits(cb, 0)), consumed];
  }
  const button = buttonFromLowBits(cb, MB_LEFT);
  return [mouseEvent(pressed ? "mouseDown" : "mouseUp", x, y, button), consumed];
}

// =============================================================================
// UTF-8
// =============================================================================

function utf8Length(lead: number): number {
  if (lead < 0x80) return 1;
  if (lead >= 0xc2 && lead <= 0xdf) return 2;
  if (lead >= 0xe0 && lead <= 0xef) return 3;
  if (lead >= 0xf0 && lead <= 0xf4) return 4;
  return 0;
}

function decodeUtf8(buf: Uint8Array): Decoded | null {
  const lead = buf[0] ?? 0;
  const need = utf8Length(lead);
  if (need === 0) return [keyEvent(UNKNOWN_KEY), 1];

  if (buf.length < need) {
    // Wait for the tail, unless a byte already seen cannot continue it.
    for (let i = 1; i < buf.length; i++) {
      if (!isContinuation(buf[i] ?? 0)) return [keyEvent(UNKNOWN_KEY), 1];
    }
    return null;
  }

  let text: string;
  try {
    text = strictUtf8.decode(buf.subarray(0, need));
  } catch {
    return [keyEvent(UNKNOWN_KEY), 1];
  }
  const cp = text.codePointAt(0) ?? 0;
  return [keyEvent(cp & 0xffff), need];
}

// =============================================================================
// Helpers
// =============================================================================

function isAsciiLetter(b: number): boolean {
  return (b >= 0x41 && b <= 0x5a) || (b >= 0x61 && b <= 0x7a);
}

function isContinuation(b: number): boolean {
  return (b & 0xc0) === 0x80;
}

function ascii(buf: Uint8Array, start: number, end: number): string {
  let out = "";
  for (let i = start; i < end; i++) out += String.fromCharCode(buf[i] ?? 0);
  return out;
}

function decimalOrZero(field: string | undefined): number {
  if (field === undefined) return 0;
  const n = Number.parseInt(field, 10);
  return Number.isFinite(n) && n >= 0 ? n : 0;
}
