/**
 * packages/core/src/views/view.ts: The View contract.
 *
 * The router needs only bounds, draw, handleEvent, state and canFocus.
 * Handlers must clear (or replace) the RoutedEvent when they act on it, and
 * disabled views must still process broadcasts so they can re-enable
 * themselves.
 *
 * Bounds are absolute screen coordinates. Groups translate a child's
 * relative bounds when it is inserted.
 */

import type { CommandRegistry } from "../commandSet.js";
import type { RoutedEvent } from "../events.js";
import { type Rect, rectMove } from "../geometry.js";
import type { Surface } from "../surface.js";
import { OF_SELECTABLE, SF_DISABLED, SF_FOCUSED, SF_SELECTED, SF_VISIBLE } from "./flags.js";

/** What handlers may reach besides the event itself. */
export type ViewContext = Readonly<{
  commands: CommandRegistry;
}>;

export interface View {
  readonly state: number;
  readonly options: number;

  bounds(): Rect;
  setBounds(bounds: Rect): void;
  draw(surface: Surface): void;
  handleEvent(ev: RoutedEvent, ctx: ViewContext): void;

  hasState(flag: number): boolean;
  setState(flag: number, on: boolean): void;
  canFocus(): boolean;
  setFocused(focused: boolean): void;

  /** Called once per idle frame. */
  idle?(ctx: ViewContext): void;
  /** Attribute bytes indexed by the view's color slots. */
  getPalette?(): readonly number[];
  /** One-line description for view dumps. */
  describe(): string;
}

const FALLBACK_ATTR = 0x07;

export abstract class ViewBase implements View {
  state: number = SF_VISIBLE;
  options = 0;
  protected _bounds: Rect;

  constructor(bounds: Rect) {
    this._bounds = bounds;
  }

  bounds(): Rect {
    return this._bounds;
  }

  setBounds(bounds: Rect): void {
    this._bounds = bounds;
  }

  moveBy(dx: number, dy: number): void {
    this.setBounds(rectMove(this._bounds, dx, dy));
  }

  hasState(flag: number): boolean {
    return (this.state & flag) !== 0;
  }

  setState(flag: number, on: boolean): void {
    this.state = on ? this.state | flag : this.state & ~flag;
  }

  canFocus(): boolean {
    return (
      (this.options & OF_SELECTABLE) !== 0 &&
      this.hasState(SF_VISIBLE) &&
      !this.hasState(SF_DISABLED)
    );
  }

  setFocused(focused: boolean): void {
    this.setState(SF_FOCUSED | SF_SELECTED, focused);
  }

  abstract draw(surface: Surface): void;

  handleEvent(_ev: RoutedEvent, _ctx: ViewContext): void {}

  getPalette?(): readonly number[];

  describe(): string {
    const { a, b } = this._bounds;
    return `${this.constructor.name} (${a.x},${a.y})-(${b.x},${b.y})`;
  }

  /** Palette slot lookup; falls back to light grey on black. */
  protected color(slot: number): number {
    return this.getPalette?.()[slot] ?? FALLBACK_ATTR;
  }
}
