/**
 * packages/core/src/views/desktop.ts: Root of the window stack.
 *
 * A click raises the window under it unless the topmost window is modal,
 * in which case only that window sees input.
 */

import { CM_ZOOM } from "../commands.js";
import type { RoutedEvent } from "../events.js";
import type { Rect } from "../geometry.js";
import { rect, rectContains, rectHeight, rectWidth } from "../geometry.js";
import type { Surface } from "../surface.js";
import { OF_TILEABLE, SF_MODAL, SF_VISIBLE } from "./flags.js";
import { Group } from "./group.js";
import type { View, ViewContext } from "./view.js";
import { Window } from "./window.js";

const DESKTOP_PALETTE: readonly number[] = Object.freeze([0x71]);
const BACKGROUND_CHAR = "░";

export class Desktop extends Group {
  override getPalette(): readonly number[] {
    return DESKTOP_PALETTE;
  }

  override draw(surface: Surface): void {
    surface.fill(this._bounds, BACKGROUND_CHAR, this.color(0));
    super.draw(surface);
  }

  /** Desktop bounds follow the screen; windows keep their positions. */
  resize(bounds: Rect): void {
    this._bounds = bounds;
  }

  windows(): Window[] {
    return this.children.filter((c): c is Window => c instanceof Window);
  }

  windowCount(): number {
    return this.windows().length;
  }

  hasTileable(): boolean {
    return this.children.some((c) => (c.options & OF_TILEABLE) !== 0 && c.hasState(SF_VISIBLE));
  }

  topView(): View | undefined {
    return this.children[this.children.length - 1];
  }

  /** Focus the next window and raise it. */
  nextWindow(): void {
    if (this.selectNext() && this.current) this.bringToFront(this.current);
  }

  previousWindow(): void {
    if (this.selectPrevious() && this.current) this.bringToFront(this.current);
  }

  /** Lay tileable windows out in a near-square grid. */
  tile(): void {
    const wins = this.tileable();
    if (wins.length === 0) return;
    const cols = Math.ceil(Math.sqrt(wins.length));
    const rows = Math.ceil(wins.length / cols);
    const { a } = this._bounds;
    const w = rectWidth(this._bounds);
    const h = rectHeight(this._bounds);
    wins.forEach((win, i) => {
      const col = i % cols;
      const row = Math.floor(i / cols);
      const x0 = a.x + Math.floor((col * w) / cols);
      const x1 = a.x + Math.floor(((col + 1) * w) / cols);
      const y0 = a.y + Math.floor((row * h) / rows);
      const y1 = a.y + Math.floor(((row + 1) * h) / rows);
      win.setBounds(rect(x0, y0, x1, y1));
    });
  }

  /** Stack tileable windows diagonally, each offset by one cell. */
  cascade(): void {
    const wins = this.tileable();
    const { a, b } = this._bounds;
    wins.forEach((win, i) => {
      win.setBounds(rect(a.x + i, a.y + i, b.x, b.y));
    });
  }

  override handleEvent(ev: RoutedEvent, ctx: ViewContext): void {
    const top = this.topView();
    const modal = top?.hasState(SF_MODAL) === true;
    const e = ev.event;

    // Broadcasts still reach every window behind a modal view.
    if (modal && top && e.kind !== "broadcast") {
      top.handleEvent(ev, ctx);
      return;
    }

    if (e.kind === "mouseDown") {
      for (let i = this.children.length - 1; i >= 0; i--) {
        const child = this.children[i];
        if (child?.hasState(SF_VISIBLE) && rectContains(child.bounds(), e.mouse.pos)) {
          this.bringToFront(child);
          break;
        }
      }
    }

    super.handleEvent(ev, ctx);

    const after = ev.event;
    if (after.kind === "command" && after.command === CM_ZOOM) {
      const current = this.current;
      if (current instanceof Window) {
        current.zoom(this._bounds);
        ev.clear();
      }
    }
  }

  private tileable(): Window[] {
    return this.windows().filter(
      (w) => (w.options & OF_TILEABLE) !== 0 && w.hasState(SF_VISIBLE),
    );
  }
}
