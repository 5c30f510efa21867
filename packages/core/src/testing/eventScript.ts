/**
 * packages/core/src/testing/eventScript.ts: Fluent builder for poll scripts.
 *
 * Keys may be given as codes or as names understood by parseKeyName
 * ("enter", "alt+x", "esc esc").
 */

import {
  type Event,
  MB_LEFT,
  type MouseKind,
  broadcastEvent,
  commandEvent,
  keyEvent,
  mouseEvent,
} from "../events.js";
import { keyCodeOf } from "../keys/keyNames.js";

export class EventScript {
  private readonly _entries: (Event | null)[] = [];

  key(key: number | string, modifiers = 0): this {
    const code = typeof key === "number" ? key : keyCodeOf(key);
    this._entries.push(keyEvent(code, modifiers));
    return this;
  }

  /** One key event per character. */
  text(s: string): this {
    for (const ch of s) this._entries.push(keyEvent((ch.codePointAt(0) ?? 0) & 0xffff));
    return this;
  }

  mouse(kind: MouseKind, x: number, y: number, buttons = 0): this {
    this._entries.push(mouseEvent(kind, x, y, buttons));
    return this;
  }

  /** mouseDown then mouseUp with the left button at the same cell. */
  click(x: number, y: number): this {
    return this.mouse("mouseDown", x, y, MB_LEFT).mouse("mouseUp", x, y, 0);
  }

  command(id: number): this {
    this._entries.push(commandEvent(id));
    return this;
  }

  broadcast(id: number): this {
    this._entries.push(broadcastEvent(id));
    return this;
  }

  /** `count` empty polls; each one lets the application idle. */
  idle(count = 1): this {
    for (let i = 0; i < count; i++) this._entries.push(null);
    return this;
  }

  build(): readonly (Event | null)[] {
    return Object.freeze([...this._entries]);
  }
}
