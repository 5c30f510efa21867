/**
 * packages/core/src/terminal.ts: The Terminal owns one Backend.
 *
 * It adds what every backend would otherwise repeat: a Surface sized to the
 * backend, a local queue for synthesized events, cursor bookkeeping and the
 * suspend/resume fallback.
 */

import type { Backend, CellAspectRatio, Capabilities, TerminalSize } from "./backend.js";
import { TvError, isTvError } from "./errors.js";
import type { Event } from "./events.js";
import type { Point } from "./geometry.js";
import { Surface } from "./surface.js";

export class Terminal {
  readonly surface: Surface;
  private readonly _backend: Backend;
  private readonly _pending: Event[] = [];
  private _initialized = false;
  private _cursor: Point | null = null;
  private _lastFrame: string | null = null;

  constructor(backend: Backend) {
    this._backend = backend;
    const { cols, rows } = backend.size();
    this.surface = new Surface(cols, rows);
  }

  get backend(): Backend {
    return this._backend;
  }

  get initialized(): boolean {
    return this._initialized;
  }

  /** Failures surface as TV_TERMINAL_INIT; the session cannot start. */
  async init(): Promise<void> {
    if (this._initialized) return;
    try {
      await this._backend.init();
    } catch (err) {
      if (isTvError(err, "TV_TERMINAL_INIT")) throw err;
      throw new TvError("TV_TERMINAL_INIT", `terminal init failed: ${String(err)}`, {
        cause: err,
      });
    }
    this._initialized = true;
    this._lastFrame = null;
    this.syncSize();
  }

  async shutdown(): Promise<void> {
    if (!this._initialized) return;
    this._initialized = false;
    await this._backend.cleanup();
  }

  size(): TerminalSize {
    return this._backend.size();
  }

  /** Match the surface to the backend size. Returns true when it changed. */
  syncSize(): boolean {
    const { cols, rows } = this._backend.size();
    if (cols === this.surface.cols && rows === this.surface.rows) return false;
    this.surface.resize(cols, rows);
    this._lastFrame = null;
    return true;
  }

  /** Queue an event ahead of backend input. */
  putEvent(event: Event): void {
    this._pending.push(event);
  }

  async pollEvent(timeoutMs: number): Promise<Event | null> {
    const queued = this._pending.shift();
    if (queued !== undefined) return queued;
    return this._backend.pollEvent(timeoutMs);
  }

  setCursor(x: number, y: number): void {
    this._cursor = { x, y };
  }

  hideCursor(): void {
    this._cursor = null;
  }

  /**
   * Send the surface. An unchanged frame with an unchanged cursor is not
   * resent.
   */
  async flush(): Promise<void> {
    const cursor = this._cursor;
    const body = this.surface.toAnsi();
    const frame = `${body}|${cursor ? `${cursor.x},${cursor.y}` : "-"}`;
    if (frame !== this._lastFrame) {
      this._backend.hideCursor();
      this._backend.writeRaw(body);
      if (cursor) this._backend.showCursor(cursor.x, cursor.y);
      this._lastFrame = frame;
    }
    await this._backend.flush();
  }

  /** Force the next flush to repaint. */
  invalidate(): void {
    this._lastFrame = null;
  }

  async suspend(): Promise<void> {
    if (this._backend.suspend) await this._backend.suspend();
    else await this._backend.cleanup();
  }

  async resume(): Promise<void> {
    if (this._backend.resume) await this._backend.resume();
    else await this._backend.init();
    this._lastFrame = null;
  }

  async bell(): Promise<void> {
    await this._backend.bell();
  }

  async clearScreen(): Promise<void> {
    await this._backend.clearScreen();
    this._lastFrame = null;
  }

  capabilities(): Capabilities {
    return this._backend.capabilities();
  }

  cellAspectRatio(): CellAspectRatio {
    return this._backend.cellAspectRatio();
  }

  snapshotLines(): string[] {
    return this.surface.lines();
  }
}
