/**
 * packages/core/src/backends/channelBackend.ts: Backend over a byte channel.
 *
 * Why: Remote sessions (SSH channels, sockets) have no OS terminal to drive.
 * The transport feeds raw bytes into the session handle, which decodes them
 * and queues events; the backend side polls that queue and writes output
 * back through the `send` sink. The two sides share only the queue and the
 * size cell.
 *
 * Invariants:
 *   - init/cleanup write literal setup/teardown sequences, guarded by an
 *     initialized flag; cleanup is the reverse of init
 *   - a disconnected channel rejects poll and flush with TV_BROKEN_PIPE
 *   - flush with nothing buffered does nothing
 *   - a lone ESC left in the decoder is released after escTimeoutMs
 */

import {
  BELL,
  type Backend,
  CLEAR_HOME,
  CURSOR_HIDE,
  CURSOR_SHOW,
  type Capabilities,
  type CellAspectRatio,
  DEFAULT_CAPABILITIES,
  DEFAULT_CELL_ASPECT_RATIO,
  type TerminalSize,
  cursorTo,
  setupSequences,
  teardownSequences,
} from "../backend.js";
import { type AppConfig, resolveAppConfig } from "../config.js";
import { brokenPipe } from "../errors.js";
import type { Event } from "../events.js";
import { type Clock, systemClock } from "../input/clock.js";
import { InputDecoder } from "../input/decoder.js";
import { DoubleClickDetector } from "../input/doubleClick.js";
import { EventQueue } from "../input/eventQueue.js";
import { type Logger, silentLogger } from "../logger.js";

export const DEFAULT_CHANNEL_SIZE: TerminalSize = Object.freeze({ cols: 80, rows: 24 });

export type ChannelSessionOptions = Readonly<{
  /** Outbound bytes. Called once per non-empty flush. */
  send: (bytes: Uint8Array) => void;
  size?: TerminalSize;
  config?: AppConfig;
  capabilities?: Partial<Capabilities>;
  clock?: Clock;
  logger?: Logger;
}>;

/** Transport-facing side of a channel session. */
export type ChannelSessionHandle = Readonly<{
  processInput: (data: Uint8Array | string) => void;
  resize: (cols: number, rows: number) => void;
  disconnect: () => void;
  isDisconnected: () => boolean;
}>;

export type ChannelSession = Readonly<{
  backend: ChannelBackend;
  handle: ChannelSessionHandle;
}>;

/** Shared, externally updated terminal size. */
export class SizeCell {
  private _size: TerminalSize;

  constructor(initial: TerminalSize) {
    this._size = initial;
  }

  get(): TerminalSize {
    return this._size;
  }

  set(cols: number, rows: number): void {
    this._size = Object.freeze({ cols: Math.max(1, cols), rows: Math.max(1, rows) });
  }
}

const encoder = new TextEncoder();

export class ChannelBackend implements Backend {
  private readonly _send: (bytes: Uint8Array) => void;
  private readonly _events: EventQueue;
  private readonly _size: SizeCell;
  private readonly _caps: Capabilities;
  private _output: string[] = [];
  private _initialized = false;

  constructor(
    send: (bytes: Uint8Array) => void,
    events: EventQueue,
    size: SizeCell,
    caps: Capabilities,
  ) {
    this._send = send;
    this._events = events;
    this._size = size;
    this._caps = caps;
  }

  async init(): Promise<void> {
    if (this._initialized) return;
    this._output.push(...setupSequences(this._caps.mouse));
    this.sendOutput();
    this._initialized = true;
  }

  async cleanup(): Promise<void> {
    if (!this._initialized) return;
    this._output.push(...teardownSequences(this._caps.mouse));
    this.sendOutput();
    this._initialized = false;
  }

  /** Remote sessions have no shell to escape to. */
  async suspend(): Promise<void> {}

  async resume(): Promise<void> {}

  size(): TerminalSize {
    return this._size.get();
  }

  async pollEvent(timeoutMs: number): Promise<Event | null> {
    const queued = this._events.shift();
    if (queued !== undefined) return queued;
    if (this._events.closed) throw brokenPipe();

    await this._events.waitForActivity(timeoutMs);

    const next = this._events.shift();
    if (next !== undefined) return next;
    if (this._events.closed) throw brokenPipe();
    return null;
  }

  writeRaw(data: string): void {
    this._output.push(data);
  }

  async flush(): Promise<void> {
    this.sendOutput();
  }

  showCursor(x: number, y: number): void {
    this._output.push(cursorTo(x, y), CURSOR_SHOW);
  }

  hideCursor(): void {
    this._output.push(CURSOR_HIDE);
  }

  capabilities(): Capabilities {
    return this._caps;
  }

  cellAspectRatio(): CellAspectRatio {
    return DEFAULT_CELL_ASPECT_RATIO;
  }

  async bell(): Promise<void> {
    this._output.push(BELL);
    this.sendOutput();
  }

  async clearScreen(): Promise<void> {
    this._output.push(CLEAR_HOME);
    this.sendOutput();
  }

  private sendOutput(): void {
    if (this._output.length === 0) return;
    if (this._events.closed) throw brokenPipe("channel closed");
    const data = this._output.join("");
    this._output = [];
    this._send(encoder.encode(data));
  }
}

/**
 * Build both halves of a channel session. The handle belongs to the
 * transport; the backend belongs to a Terminal.
 */
export function createChannelSession(opts: ChannelSessionOptions): ChannelSession {
  const config = resolveAppConfig(opts.config);
  const clock = opts.clock ?? systemClock;
  const logger = opts.logger ?? silentLogger;
  const events = new EventQueue();
  const size = new SizeCell(opts.size ?? DEFAULT_CHANNEL_SIZE);
  const caps: Capabilities = Object.freeze({ ...DEFAULT_CAPABILITIES, ...opts.capabilities });
  const decoder = new InputDecoder({
    maxBufferBytes: config.maxInputBufferBytes,
    onOverflow: (dropped) => logger.warn(`input buffer overflow, dropped ${dropped} bytes`),
  });
  const clicks = new DoubleClickDetector(config.doubleClickMs);

  const backend = new ChannelBackend(opts.send, events, size, caps);

  // A bare ESC has no terminator; release it once the ESC timeout passes
  // without more input.
  let escTimer: ReturnType<typeof setTimeout> | null = null;
  const cancelEscTimer = () => {
    if (escTimer !== null) clearTimeout(escTimer);
    escTimer = null;
  };
  const armEscTimer = () => {
    cancelEscTimer();
    if (decoder.pendingBytes !== 1) return;
    escTimer = setTimeout(() => {
      escTimer = null;
      const esc = decoder.takeLoneEscape();
      if (esc !== null && !events.closed) events.push(clicks.apply(esc, clock()));
    }, config.escTimeoutMs);
  };

  const handle: ChannelSessionHandle = Object.freeze({
    processInput: (data: Uint8Array | string) => {
      if (events.closed) return;
      const now = clock();
      for (const ev of decoder.feed(data)) events.push(clicks.apply(ev, now));
      armEscTimer();
    },
    resize: (cols: number, rows: number) => {
      size.set(cols, rows);
      events.notify();
    },
    disconnect: () => {
      cancelEscTimer();
      events.close();
    },
    isDisconnected: () => events.closed,
  });

  return Object.freeze({ backend, handle });
}
