/**
 * packages/core/src/events.ts: Event union and routing slot.
 *
 * Every handler receives a RoutedEvent. Clearing it (kind "nothing") marks the
 * event consumed and stops routing for the rest of the pipeline.
 */

import type { Point } from "./geometry.js";

// =============================================================================
// Modifiers and buttons
// =============================================================================

export const KB_SHIFT = 0x01;
export const KB_CTRL = 0x02;
export const KB_ALT = 0x04;

export const MB_LEFT = 0x01;
export const MB_MIDDLE = 0x02;
export const MB_RIGHT = 0x04;

// =============================================================================
// Event masks
// =============================================================================

export const EV_NOTHING = 0x0000;
export const EV_MOUSE_DOWN = 0x0001;
export const EV_MOUSE_UP = 0x0002;
export const EV_MOUSE_MOVE = 0x0004;
export const EV_MOUSE_AUTO = 0x0008;
export const EV_MOUSE_WHEEL_UP = 0x0010;
export const EV_MOUSE_WHEEL_DOWN = 0x0020;
export const EV_MOUSE = 0x003f;
export const EV_KEYBOARD = 0x0040;
export const EV_COMMAND = 0x0100;
export const EV_BROADCAST = 0x0200;
export const EV_MESSAGE = 0xff00;

// =============================================================================
// Event union
// =============================================================================

export type MouseEvent = Readonly<{
  pos: Point;
  /** MB_* bitmask */
  buttons: number;
  doubleClick: boolean;
}>;

export type MouseButtonKind = "mouseDown" | "mouseUp" | "mouseMove" | "mouseAuto";
export type MouseWheelKind = "mouseWheelUp" | "mouseWheelDown";
export type MouseKind = MouseButtonKind | MouseWheelKind;

export type Event =
  | Readonly<{ kind: "nothing" }>
  | Readonly<{ kind: "keyboard"; keyCode: number; modifiers: number }>
  | Readonly<{ kind: MouseButtonKind; mouse: MouseEvent }>
  | Readonly<{ kind: MouseWheelKind; mouse: MouseEvent }>
  | Readonly<{ kind: "command"; command: number }>
  | Readonly<{ kind: "broadcast"; command: number }>;

export type EventKind = Event["kind"];
export type KeyboardEvent = Extract<Event, { kind: "keyboard" }>;
export type MouseInputEvent = Extract<Event, { kind: MouseKind }>;

export const NOTHING: Event = Object.freeze({ kind: "nothing" });

export function keyEvent(keyCode: number, modifiers = 0): Event {
  return Object.freeze({ kind: "keyboard", keyCode, modifiers });
}

export function mouseEvent(
  kind: MouseKind,
  x: number,
  y: number,
  buttons = 0,
  doubleClick = false,
): Event {
  return Object.freeze({
    kind,
    mouse: Object.freeze({ pos: Object.freeze({ x, y }), buttons, doubleClick }),
  });
}

export function commandEvent(command: number): Event {
  return Object.freeze({ kind: "command", command });
}

export function broadcastEvent(command: number): Event {
  return Object.freeze({ kind: "broadcast", command });
}

export function isMouseEvent(ev: Event): ev is MouseInputEvent {
  return (eventMask(ev) & EV_MOUSE) !== 0;
}

export function isKey(ev: Event, keyCode: number): boolean {
  return ev.kind === "keyboard" && ev.keyCode === keyCode;
}

export function eventMask(ev: Event): number {
  switch (ev.kind) {
    case "nothing":
      return EV_NOTHING;
    case "keyboard":
      return EV_KEYBOARD;
    case "mouseDown":
      return EV_MOUSE_DOWN;
    case "mouseUp":
      return EV_MOUSE_UP;
    case "mouseMove":
      return EV_MOUSE_MOVE;
    case "mouseAuto":
      return EV_MOUSE_AUTO;
    case "mouseWheelUp":
      return EV_MOUSE_WHEEL_UP;
    case "mouseWheelDown":
      return EV_MOUSE_WHEEL_DOWN;
    case "command":
      return EV_COMMAND;
    case "broadcast":
      return EV_BROADCAST;
  }
}

// =============================================================================
// RoutedEvent
// =============================================================================

/**
 * Mutable slot an event travels in while it is routed.
 *
 * Handlers either clear it (consumed) or replace it, e.g. a status line
 * turning a key press into a command the rest of the chain sees.
 */
export class RoutedEvent {
  private _event: Event;

  constructor(event: Event) {
    this._event = event;
  }

  get event(): Event {
    return this._event;
  }

  get consumed(): boolean {
    return this._event.kind === "nothing";
  }

  clear(): void {
    this._event = NOTHING;
  }

  replace(next: Event): void {
    this._event = next;
  }
}
