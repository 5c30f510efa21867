import type { Event } from "../events.js";

type Deferred<T> = Readonly<{
  promise: Promise<T>;
  resolve: (value: T) => void;
}>;

function deferred<T>(): Deferred<T> {
  let resolve!: (value: T) => void;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

/**
 * FIFO between an input producer (stream data handler, remote transport) and
 * the single consumer polling the backend. Closing it is how a transport
 * reports a hard disconnect.
 */
export class EventQueue {
  private readonly _items: Event[] = [];
  private _closed = false;
  private _waiter: Deferred<void> | null = null;

  get closed(): boolean {
    return this._closed;
  }

  get size(): number {
    return this._items.length;
  }

  push(event: Event): void {
    if (this._closed) return;
    this._items.push(event);
    this.wake();
  }

  shift(): Event | undefined {
    return this._items.shift();
  }

  close(): void {
    if (this._closed) return;
    this._closed = true;
    this.wake();
  }

  /** Wake a pending wait without queueing anything. */
  notify(): void {
    this.wake();
  }

  /**
   * Resolves on the next push, close or notify, or after `timeoutMs`,
   * whichever comes first. Resolves at once if items are queued or the queue
   * is closed.
   */
  async waitForActivity(timeoutMs: number): Promise<void> {
    if (this._items.length > 0 || this._closed) return;
    const waiter = this._waiter ?? deferred<void>();
    this._waiter = waiter;
    const timer = setTimeout(() => this.wake(), Math.max(0, timeoutMs));
    try {
      await waiter.promise;
    } finally {
      clearTimeout(timer);
    }
  }

  private wake(): void {
    const waiter = this._waiter;
    if (!waiter) return;
    this._waiter = null;
    waiter.resolve();
  }
}
