/**
 * packages/core/src/surface.ts: Character grid views draw into.
 *
 * Attributes are DOS attribute bytes: foreground in the low nibble,
 * background in the high nibble. Serialization is a full repaint; there is
 * no diffing against the previous frame.
 */

import { cursorTo, SGR_RESET } from "./backend.js";
import { type Rect, rectIntersect, rect as makeRect, rectIsEmpty } from "./geometry.js";

export const DEFAULT_ATTR = 0x07;

// DOS palette order (blue first) to ANSI order (red first).
const DOS_TO_ANSI: readonly number[] = Object.freeze([0, 4, 2, 6, 1, 5, 3, 7]);

export function attrToSgr(attr: number): string {
  const fg = attr & 0x0f;
  const bg = (attr >> 4) & 0x0f;
  const fgCode = (fg < 8 ? 30 : 90) + (DOS_TO_ANSI[fg & 0x07] ?? 7);
  const bgCode = (bg < 8 ? 40 : 100) + (DOS_TO_ANSI[bg & 0x07] ?? 0);
  return `\x1b[${fgCode};${bgCode}m`;
}

export class Surface {
  private _cols: number;
  private _rows: number;
  private _chars: string[];
  private _attrs: Uint8Array;

  constructor(cols: number, rows: number) {
    this._cols = Math.max(0, cols);
    this._rows = Math.max(0, rows);
    this._chars = new Array<string>(this._cols * this._rows).fill(" ");
    this._attrs = new Uint8Array(this._cols * this._rows).fill(DEFAULT_ATTR);
  }

  get cols(): number {
    return this._cols;
  }

  get rows(): number {
    return this._rows;
  }

  bounds(): Rect {
    return makeRect(0, 0, this._cols, this._rows);
  }

  /** Resize and blank the grid. */
  resize(cols: number, rows: number): void {
    this._cols = Math.max(0, cols);
    this._rows = Math.max(0, rows);
    this._chars = new Array<string>(this._cols * this._rows).fill(" ");
    this._attrs = new Uint8Array(this._cols * this._rows).fill(DEFAULT_ATTR);
  }

  clear(attr = DEFAULT_ATTR): void {
    this._chars.fill(" ");
    this._attrs.fill(attr);
  }

  putChar(x: number, y: number, ch: string, attr: number): void {
    if (x < 0 || y < 0 || x >= this._cols || y >= this._rows) return;
    const i = y * this._cols + x;
    this._chars[i] = ch;
    this._attrs[i] = attr;
  }

  /** Writes one cell per code point, clipped to the grid. Returns cells written. */
  putText(x: number, y: number, text: string, attr: number): number {
    let col = x;
    let written = 0;
    for (const ch of text) {
      if (col >= this._cols) break;
      if (col >= 0 && y >= 0 && y < this._rows) {
        this.putChar(col, y, ch, attr);
        written++;
      }
      col++;
    }
    return written;
  }

  fill(area: Rect, ch: string, attr: number): void {
    const clipped = rectIntersect(area, this.bounds());
    if (rectIsEmpty(clipped)) return;
    for (let y = clipped.a.y; y < clipped.b.y; y++) {
      for (let x = clipped.a.x; x < clipped.b.x; x++) this.putChar(x, y, ch, attr);
    }
  }

  charAt(x: number, y: number): string {
    if (x < 0 || y < 0 || x >= this._cols || y >= this._rows) return "";
    return this._chars[y * this._cols + x] ?? " ";
  }

  attrAt(x: number, y: number): number {
    if (x < 0 || y < 0 || x >= this._cols || y >= this._rows) return 0;
    return this._attrs[y * this._cols + x] ?? DEFAULT_ATTR;
  }

  /** Plain text rows, for dumps and tests. */
  lines(): string[] {
    const out: string[] = [];
    for (let y = 0; y < this._rows; y++) {
      out.push(this._chars.slice(y * this._cols, (y + 1) * this._cols).join(""));
    }
    return out;
  }

  /** Full repaint: every row positioned explicitly, attributes emitted on change. */
  toAnsi(): string {
    let out = "";
    for (let y = 0; y < this._rows; y++) {
      out += cursorTo(0, y);
      let current = -1;
      for (let x = 0; x < this._cols; x++) {
        const i = y * this._cols + x;
        const attr = this._attrs[i] ?? DEFAULT_ATTR;
        if (attr !== current) {
          out += attrToSgr(attr);
          current = attr;
        }
        out += this._chars[i] ?? " ";
      }
    }
    return out + SGR_RESET;
  }
}
