import { pointEquals } from "../geometry.js";
import type { Event, MouseEvent } from "../events.js";

export const DEFAULT_DOUBLE_CLICK_MS = 500;

/**
 * Derives `doubleClick` on MouseDown: same cell as the previous MouseDown and
 * no more than `windowMs` later. A double click resets the history so a third
 * click starts a new pair.
 */
export class DoubleClickDetector {
  private _last: Readonly<{ mouse: MouseEvent; at: number }> | null = null;

  constructor(private readonly windowMs: number = DEFAULT_DOUBLE_CLICK_MS) {}

  apply(event: Event, now: number): Event {
    if (event.kind !== "mouseDown") return event;

    const last = this._last;
    const isDouble =
      last !== null &&
      pointEquals(last.mouse.pos, event.mouse.pos) &&
      now - last.at <= this.windowMs;

    if (isDouble) {
      this._last = null;
      return Object.freeze({
        kind: "mouseDown",
        mouse: Object.freeze({ ...event.mouse, doubleClick: true }),
      });
    }
    this._last = { mouse: event.mouse, at: now };
    return event;
  }

  reset(): void {
    this._last = null;
  }
}
