/**
 * packages/core/src/views/group.ts: Container view and focus routing.
 *
 * Routing rules:
 *   - mouse down/move/up: a dragging focused child keeps the pointer;
 *     otherwise the topmost child under the pointer gets the event, and a
 *     mouse down focuses it first
 *   - keyboard and command: OF_PRE_PROCESS children, then the focused child,
 *     then OF_POST_PROCESS children; Tab/Shift+Tab move focus if nobody
 *     consumed them
 *   - broadcast: every child, disabled ones included, until one clears it
 *   - anything else: the focused child
 *
 * A child that turns an event into a broadcast gets it re-dispatched here.
 */

import { type Event, type RoutedEvent, isKey } from "../events.js";
import { type Point, type Rect, rectContains, rectMove } from "../geometry.js";
import { KB_SHIFT_TAB, KB_TAB } from "../keys/keyCodes.js";
import type { Surface } from "../surface.js";
import { OF_POST_PROCESS, OF_PRE_PROCESS, SF_CLOSED, SF_DRAGGING, SF_VISIBLE } from "./flags.js";
import { type View, ViewBase, type ViewContext } from "./view.js";

export class Group extends ViewBase {
  protected readonly _children: View[] = [];
  private _focused: View | null = null;
  private _endState: number | null = null;

  get children(): readonly View[] {
    return this._children;
  }

  /** Focused child, or null. */
  get current(): View | null {
    return this._focused;
  }

  /** Where relative child bounds are anchored. */
  protected childOrigin(): Point {
    return this._bounds.a;
  }

  /** Insert on top, translating `child`'s bounds from group-relative to absolute. */
  insert(child: View): void {
    const origin = this.childOrigin();
    child.setBounds(rectMove(child.bounds(), origin.x, origin.y));
    this._children.push(child);
    if (child.canFocus()) this.focus(child);
  }

  remove(child: View): boolean {
    const idx = this._children.indexOf(child);
    if (idx < 0) return false;
    this._children.splice(idx, 1);
    if (this._focused === child) {
      child.setFocused(false);
      this._focused = null;
      this.focusTopmost();
    }
    return true;
  }

  /** Drop children flagged SF_CLOSED; returns what was removed. */
  removeClosed(): View[] {
    const closed = this._children.filter((c) => c.hasState(SF_CLOSED));
    for (const c of closed) this.remove(c);
    return closed;
  }

  focus(child: View): boolean {
    if (!this._children.includes(child) || !child.canFocus()) return false;
    if (this._focused === child) return true;
    this._focused?.setFocused(false);
    this._focused = child;
    child.setFocused(true);
    return true;
  }

  /** Move focus forward; false if no other child can take it. */
  selectNext(): boolean {
    return this.cycleFocus(1);
  }

  selectPrevious(): boolean {
    return this.cycleFocus(-1);
  }

  bringToFront(child: View): void {
    const idx = this._children.indexOf(child);
    if (idx < 0 || idx === this._children.length - 1) return;
    this._children.splice(idx, 1);
    this._children.push(child);
  }

  override setBounds(bounds: Rect): void {
    const dx = bounds.a.x - this._bounds.a.x;
    const dy = bounds.a.y - this._bounds.a.y;
    super.setBounds(bounds);
    if (dx === 0 && dy === 0) return;
    for (const child of this._children) child.setBounds(rectMove(child.bounds(), dx, dy));
  }

  override draw(surface: Surface): void {
    for (const child of this._children) {
      if (child.hasState(SF_VISIBLE)) child.draw(surface);
    }
  }

  idle(ctx: ViewContext): void {
    for (const child of this._children) child.idle?.(ctx);
  }

  override handleEvent(ev: RoutedEvent, ctx: ViewContext): void {
    const e = ev.event;
    switch (e.kind) {
      case "nothing":
        return;
      case "mouseDown":
      case "mouseMove":
      case "mouseUp":
        this.routeMouse(ev, ctx, e.kind, e.mouse.pos);
        return;
      case "keyboard":
      case "command":
        this.routeFocusChain(ev, ctx);
        if (isKey(ev.event, KB_TAB)) {
          if (this.selectNext()) ev.clear();
        } else if (isKey(ev.event, KB_SHIFT_TAB)) {
          if (this.selectPrevious()) ev.clear();
        }
        return;
      case "broadcast":
        for (const child of [...this._children]) {
          if (ev.consumed) break;
          child.handleEvent(ev, ctx);
        }
        return;
      default:
        this._focused?.handleEvent(ev, ctx);
    }
  }

  /** Ask this group's modal loop to finish with `command`. */
  endModal(command: number): void {
    this._endState = command;
  }

  /** Read and reset the pending end state. */
  takeEndState(): number | null {
    const s = this._endState;
    this._endState = null;
    return s;
  }

  private routeMouse(
    ev: RoutedEvent,
    ctx: ViewContext,
    kind: Extract<Event, { mouse: unknown }>["kind"],
    pos: Point,
  ): void {
    const focused = this._focused;
    if ((kind === "mouseMove" || kind === "mouseUp") && focused?.hasState(SF_DRAGGING)) {
      focused.handleEvent(ev, ctx);
      return;
    }

    let hit: View | null = null;
    for (let i = this._children.length - 1; i >= 0; i--) {
      const child = this._children[i];
      if (child?.hasState(SF_VISIBLE) && rectContains(child.bounds(), pos)) {
        hit = child;
        break;
      }
    }
    if (hit === null) return;

    if (kind === "mouseDown" && hit.canFocus()) this.focus(hit);
    hit.handleEvent(ev, ctx);
    if (ev.event.kind === "broadcast") this.handleEvent(ev, ctx);
  }

  private routeFocusChain(ev: RoutedEvent, ctx: ViewContext): void {
    const focused = this._focused;
    const children = [...this._children];

    for (const child of children) {
      if (ev.consumed) return;
      if (child !== focused && (child.options & OF_PRE_PROCESS) !== 0) child.handleEvent(ev, ctx);
    }
    if (ev.consumed) return;

    focused?.handleEvent(ev, ctx);

    for (const child of children) {
      if (ev.consumed) return;
      if (child !== focused && (child.options & OF_POST_PROCESS) !== 0) {
        child.handleEvent(ev, ctx);
      }
    }
    if (ev.event.kind === "broadcast") this.handleEvent(ev, ctx);
  }

  private cycleFocus(step: 1 | -1): boolean {
    const n = this._children.length;
    if (n === 0) return false;
    const start = this._focused ? this._children.indexOf(this._focused) : step === 1 ? -1 : n;
    for (let k = 1; k <= n; k++) {
      const idx = (((start + step * k) % n) + n) % n;
      const child = this._children[idx];
      if (child === undefined || child === this._focused) continue;
      if (child.canFocus()) return this.focus(child);
    }
    return false;
  }

  private focusTopmost(): void {
    for (let i = this._children.length - 1; i >= 0; i--) {
      const child = this._children[i];
      if (child?.canFocus()) {
        this.focus(child);
        return;
      }
    }
  }
}
