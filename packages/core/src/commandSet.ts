/**
 * packages/core/src/commandSet.ts: Enabled-command bitfield.
 *
 * One registry per Application (and so per remote session). Views read it
 * through ViewContext; the router watches `changed()` to decide when to
 * broadcast CM_COMMAND_SET_CHANGED.
 *
 * Invariants:
 *   - ids >= capacity read as enabled and writes to them are ignored
 *   - `changed()` flips only on an actual enabled/disabled transition
 */

export const COMMAND_CAPACITY = 65536;

const WORD_BITS = 32;

export class CommandRegistry {
  private readonly _words = new Uint32Array(COMMAND_CAPACITY / WORD_BITS);
  private _changed = false;

  constructor() {
    this._words.fill(0xffffffff);
  }

  enabled(id: number): boolean {
    if (!inRange(id)) return true;
    const word = this._words[id >>> 5] ?? 0;
    return (word & bit(id)) !== 0;
  }

  enable(id: number): void {
    this.write(id, true);
  }

  disable(id: number): void {
    this.write(id, false);
  }

  enableAll(ids: Iterable<number>): void {
    for (const id of ids) this.write(id, true);
  }

  disableAll(ids: Iterable<number>): void {
    for (const id of ids) this.write(id, false);
  }

  /** Enables `lo..=hi`. */
  enableRange(lo: number, hi: number): void {
    for (let id = lo; id <= hi; id++) this.write(id, true);
  }

  /** Disables `lo..=hi`. */
  disableRange(lo: number, hi: number): void {
    for (let id = lo; id <= hi; id++) this.write(id, false);
  }

  changed(): boolean {
    return this._changed;
  }

  clearChanged(): void {
    this._changed = false;
  }

  /**
   * Reset to "everything enabled" minus `blacklist`. Starts with a clean
   * changed flag.
   */
  init(blacklist: readonly number[]): void {
    this._words.fill(0xffffffff);
    for (const id of blacklist) {
      if (!inRange(id)) continue;
      this._words[id >>> 5] = (this._words[id >>> 5] ?? 0) & ~bit(id);
    }
    this._changed = false;
  }

  private write(id: number, on: boolean): void {
    if (!inRange(id) || this.enabled(id) === on) return;
    const index = id >>> 5;
    const word = this._words[index] ?? 0;
    this._words[index] = on ? word | bit(id) : word & ~bit(id);
    this._changed = true;
  }
}

function inRange(id: number): boolean {
  return Number.isInteger(id) && id >= 0 && id < COMMAND_CAPACITY;
}

function bit(id: number): number {
  return 1 << (id & 31);
}
