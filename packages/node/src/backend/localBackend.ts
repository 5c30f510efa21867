/**
 * packages/node/src/backend/localBackend.ts: Backend for the local TTY.
 *
 * Why: The process's own terminal is driven through stdin/stdout in raw
 * mode. Input runs through three stages before it is queued:
 *
 *   bytes -> InputDecoder -> EscSequenceTracker -> DoubleClickDetector -> queue
 *
 * A lone ESC left at the end of a read stays in the decoder, so a sequence
 * split across reads decodes as if it arrived whole. Once the ESC timeout
 * passes without more input it goes to the tracker, stamped with its arrival
 * time.
 *
 * F12 and Shift+F12 never reach the application: the poll that dequeues
 * them runs the screen-dump or view-dump hook and returns null.
 */

import {
  BELL,
  type Backend,
  CLEAR_HOME,
  CURSOR_HIDE,
  CURSOR_SHOW,
  type Capabilities,
  type CellAspectRatio,
  type Clock,
  DoubleClickDetector,
  EscSequenceTracker,
  type Event,
  EventQueue,
  InputDecoder,
  KB_F12,
  KB_SHIFT,
  KB_SHIFT_F12,
  type Logger,
  type ResolvedAppConfig,
  type TerminalSize,
  TvError,
  brokenPipe,
  cursorTo,
  describeThrown,
  resolveAppConfig,
  setupSequences,
  silentLogger,
  systemClock,
  teardownSequences,
} from "@textvision/core";
import terminalSize from "terminal-size";
import { type TerminalProfile, terminalProfileFromNodeEnv } from "./terminalProfile.js";

export type InputStreamLike = {
  isTTY?: boolean;
  isRaw?: boolean;
  setRawMode?: (mode: boolean) => unknown;
  on(event: "data", listener: (chunk: string | Uint8Array) => void): unknown;
  off(event: "data", listener: (chunk: string | Uint8Array) => void): unknown;
  on(event: "end" | "close", listener: () => void): unknown;
  off(event: "end" | "close", listener: () => void): unknown;
  resume(): unknown;
  pause(): unknown;
};

export type OutputStreamLike = {
  columns?: number;
  rows?: number;
  write(chunk: string, callback?: (err?: Error | null) => void): boolean;
};

export type HotkeyHooks = Readonly<{
  /** F12. */
  screenDump?: () => void | Promise<void>;
  /** Shift+F12. */
  viewDump?: () => void | Promise<void>;
}>;

export type LocalBackendOptions = Readonly<{
  stdin?: InputStreamLike;
  stdout?: OutputStreamLike;
  config?: ResolvedAppConfig;
  profile?: TerminalProfile;
  /** Overrides the profile's [height, width] cell ratio. */
  cellAspectRatio?: CellAspectRatio;
  hooks?: HotkeyHooks;
  clock?: Clock;
  logger?: Logger;
}>;

const FALLBACK_SIZE: TerminalSize = Object.freeze({ cols: 80, rows: 24 });

function positiveInt(v: number | undefined): number | null {
  return typeof v === "number" && Number.isInteger(v) && v > 0 ? v : null;
}

export class LocalBackend implements Backend {
  private readonly _stdin: InputStreamLike;
  private readonly _stdout: OutputStreamLike;
  private readonly _profile: TerminalProfile;
  private readonly _aspect: CellAspectRatio;
  private readonly _clock: Clock;
  private readonly _logger: Logger;
  private readonly _decoder: InputDecoder;
  private readonly _tracker: EscSequenceTracker;
  private readonly _clicks: DoubleClickDetector;
  private _events = new EventQueue();
  private _hooks: HotkeyHooks;
  private _output: string[] = [];
  private _initialized = false;
  private _wasRaw = false;
  private _fallbackSize: TerminalSize | null = null;
  private _loneEscSince: number | null = null;

  private readonly _onData = (chunk: string | Uint8Array): void => {
    this.ingest(chunk);
  };

  private readonly _onEnd = (): void => {
    this._events.close();
  };

  constructor(opts: LocalBackendOptions = {}) {
    const config = opts.config ?? resolveAppConfig(undefined);
    this._stdin = opts.stdin ?? process.stdin;
    this._stdout = opts.stdout ?? process.stdout;
    this._profile = opts.profile ?? terminalProfileFromNodeEnv();
    this._aspect = opts.cellAspectRatio ?? this._profile.cellAspectRatio;
    this._clock = opts.clock ?? systemClock;
    this._logger = opts.logger ?? silentLogger;
    this._hooks = opts.hooks ?? {};
    this._decoder = new InputDecoder({
      maxBufferBytes: config.maxInputBufferBytes,
      onOverflow: (dropped) => this._logger.warn(`input buffer overflow, dropped ${dropped} bytes`),
    });
    this._tracker = new EscSequenceTracker(config.escTimeoutMs);
    this._clicks = new DoubleClickDetector(config.doubleClickMs);
  }

  get initialized(): boolean {
    return this._initialized;
  }

  setHooks(hooks: HotkeyHooks): void {
    this._hooks = hooks;
  }

  async init(): Promise<void> {
    if (this._initialized) return;
    const stdin = this._stdin;
    if (stdin.isTTY === true && typeof stdin.setRawMode !== "function") {
      throw new TvError("TV_TERMINAL_INIT", "stdin is a TTY without raw mode support");
    }
    this._wasRaw = stdin.isRaw === true;
    if (!this._wasRaw) stdin.setRawMode?.(true);

    if (this._events.closed) this._events = new EventQueue();
    this._decoder.reset();
    this._tracker.reset();
    this._loneEscSince = null;
    this._clicks.reset();

    stdin.on("data", this._onData);
    stdin.on("end", this._onEnd);
    stdin.resume();

    await this.write(setupSequences(this._profile.capabilities.mouse).join(""));
    this._initialized = true;
  }

  async cleanup(): Promise<void> {
    if (!this._initialized) return;
    this._initialized = false;
    const stdin = this._stdin;
    stdin.off("data", this._onData);
    stdin.off("end", this._onEnd);
    stdin.pause();
    this._output = [];
    try {
      await this.write(teardownSequences(this._profile.capabilities.mouse).join(""));
    } finally {
      if (!this._wasRaw) stdin.setRawMode?.(false);
    }
  }

  async suspend(): Promise<void> {
    await this.cleanup();
  }

  async resume(): Promise<void> {
    await this.init();
  }

  size(): TerminalSize {
    const cols = positiveInt(this._stdout.columns);
    const rows = positiveInt(this._stdout.rows);
    if (cols !== null && rows !== null) return { cols, rows };
    return this.fallbackSize();
  }

  async pollEvent(timeoutMs: number): Promise<Event | null> {
    const ready = this.takeReady();
    if (ready !== undefined) return this.deliver(ready);
    if (this._events.closed) throw brokenPipe("stdin closed");

    let wait = Math.max(0, timeoutMs);
    const deadline = this.escDeadline();
    if (deadline !== null) wait = Math.min(wait, Math.max(0, deadline - this._clock()));
    await this._events.waitForActivity(wait);

    const next = this.takeReady();
    if (next !== undefined) return this.deliver(next);
    if (this._events.closed) throw brokenPipe("stdin closed");
    return null;
  }

  writeRaw(data: string): void {
    this._output.push(data);
  }

  async flush(): Promise<void> {
    if (this._output.length === 0) return;
    const data = this._output.join("");
    this._output = [];
    await this.write(data);
  }

  showCursor(x: number, y: number): void {
    this._output.push(cursorTo(x, y), CURSOR_SHOW);
  }

  hideCursor(): void {
    this._output.push(CURSOR_HIDE);
  }

  capabilities(): Capabilities {
    return this._profile.capabilities;
  }

  cellAspectRatio(): CellAspectRatio {
    return this._aspect;
  }

  async bell(): Promise<void> {
    await this.write(BELL);
  }

  async clearScreen(): Promise<void> {
    await this.write(CLEAR_HOME);
  }

  /** Decode a chunk read from stdin and queue the resulting events. */
  ingest(chunk: string | Uint8Array): void {
    if (chunk.length === 0) return;
    const now = this._clock();
    for (const ev of this._decoder.feed(chunk)) this.track(ev, now);
    this._loneEscSince = this._decoder.pendingBytes === 1 ? now : null;
  }

  private track(ev: Event, at: number): void {
    for (const out of this._tracker.push(ev, at)) {
      this._events.push(this._clicks.apply(out, at));
    }
  }

  /** Earliest time a held ESC, in the decoder or the tracker, is due. */
  private escDeadline(): number | null {
    const tracked = this._tracker.deadline();
    if (this._loneEscSince === null) return tracked;
    const held = this._loneEscSince + this._tracker.timeoutMs;
    return tracked === null ? held : Math.min(tracked, held);
  }

  private takeReady(): Event | undefined {
    const now = this._clock();
    const since = this._loneEscSince;
    if (since !== null && now >= since + this._tracker.timeoutMs) {
      this._loneEscSince = null;
      const esc = this._decoder.takeLoneEscape();
      if (esc !== null) this.track(esc, since);
    }
    for (const ev of this._tracker.expire(now)) this._events.push(ev);
    return this._events.shift();
  }

  private async deliver(ev: Event): Promise<Event | null> {
    if (ev.kind !== "keyboard") return ev;
    const shifted = (ev.modifiers & KB_SHIFT) !== 0;
    if (ev.keyCode === KB_SHIFT_F12 || (ev.keyCode === KB_F12 && shifted)) {
      await this.runHook("view dump", this._hooks.viewDump);
      return null;
    }
    if (ev.keyCode === KB_F12) {
      await this.runHook("screen dump", this._hooks.screenDump);
      return null;
    }
    return ev;
  }

  private async runHook(
    name: string,
    hook: (() => void | Promise<void>) | undefined,
  ): Promise<void> {
    if (!hook) return;
    try {
      await hook();
    } catch (err) {
      this._logger.warn(`${name} failed: ${describeThrown(err)}`);
    }
  }

  private fallbackSize(): TerminalSize {
    if (this._fallbackSize !== null) return this._fallbackSize;
    let size = FALLBACK_SIZE;
    try {
      const { columns, rows } = terminalSize();
      const c = positiveInt(columns);
      const r = positiveInt(rows);
      if (c !== null && r !== null) size = Object.freeze({ cols: c, rows: r });
    } catch (err) {
      this._logger.debug(`terminal-size failed: ${describeThrown(err)}`);
    }
    this._fallbackSize = size;
    return size;
  }

  private write(data: string): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this._stdout.write(data, (err?: Error | null) => {
        if (!err) {
          resolve();
          return;
        }
        reject(new TvError("TV_IO_ERROR", `terminal write failed: ${err.message}`, { cause: err }));
      });
    });
  }
}
