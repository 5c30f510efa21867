/**
 * packages/core/src/views/window.ts: Framed, movable, closable window.
 *
 * Child bounds are relative to the interior (inside the frame). The close
 * icon sits at columns 2..4 of the top row; any other click on the top row
 * starts a drag.
 */

import { CM_CLOSE } from "../commands.js";
import { type RoutedEvent, commandEvent } from "../events.js";
import type { Point, Rect } from "../geometry.js";
import { point, rectHeight, rectMove, rectWidth } from "../geometry.js";
import type { Surface } from "../surface.js";
import {
  OF_SELECTABLE,
  OF_TILEABLE,
  OF_TOP_SELECT,
  SF_CLOSED,
  SF_DRAGGING,
  SF_FOCUSED,
  SF_SHADOW,
  SF_VISIBLE,
} from "./flags.js";
import { Group } from "./group.js";
import type { ViewContext } from "./view.js";

// frame passive, frame active, interior, title
const WINDOW_PALETTE: readonly number[] = Object.freeze([0x17, 0x1f, 0x17, 0x1e]);

const CLOSE_ICON = "[■]";
const CLOSE_ICON_OFFSET = 2;

export class Window extends Group {
  title: string;
  readonly number: number;
  private _restore: Rect | null = null;
  private _dragOffset: Point | null = null;

  constructor(bounds: Rect, title: string, number = 0) {
    super(bounds);
    this.title = title;
    this.number = number;
    this.options |= OF_SELECTABLE | OF_TOP_SELECT | OF_TILEABLE;
    this.setState(SF_SHADOW, true);
  }

  protected override childOrigin(): Point {
    return point(this._bounds.a.x + 1, this._bounds.a.y + 1);
  }

  override getPalette(): readonly number[] {
    return WINDOW_PALETTE;
  }

  get zoomed(): boolean {
    return this._restore !== null;
  }

  /** Toggle between `area` and the size before the last zoom. */
  zoom(area: Rect): void {
    if (this._restore !== null) {
      this.setBounds(this._restore);
      this._restore = null;
    } else {
      this._restore = this._bounds;
      this.setBounds(area);
    }
  }

  close(): void {
    this.setState(SF_CLOSED, true);
    this.setState(SF_VISIBLE, false);
  }

  override draw(surface: Surface): void {
    const { a, b } = this._bounds;
    const w = rectWidth(this._bounds);
    const h = rectHeight(this._bounds);
    if (w < 2 || h < 2) return;

    const active = this.hasState(SF_FOCUSED);
    const frame = this.color(active ? 1 : 0);
    const [tl, tr, bl, br, hz, vt] = active
      ? (["╔", "╗", "╚", "╝", "═", "║"] as const)
      : (["┌", "┐", "└", "┘", "─", "│"] as const);

    surface.fill({ a: point(a.x + 1, a.y + 1), b: point(b.x - 1, b.y - 1) }, " ", this.color(2));
    surface.putText(a.x, a.y, `${tl}${hz.repeat(w - 2)}${tr}`, frame);
    for (let y = a.y + 1; y < b.y - 1; y++) {
      surface.putChar(a.x, y, vt, frame);
      surface.putChar(b.x - 1, y, vt, frame);
    }
    surface.putText(a.x, b.y - 1, `${bl}${hz.repeat(w - 2)}${br}`, frame);

    if (active) surface.putText(a.x + CLOSE_ICON_OFFSET, a.y, CLOSE_ICON, frame);
    const label = this.number > 0 ? ` ${this.title} ${this.number} ` : ` ${this.title} `;
    const room = w - 2 * (CLOSE_ICON_OFFSET + CLOSE_ICON.length);
    if (room > 0) {
      const text = label.slice(0, room);
      const x = a.x + Math.floor((w - text.length) / 2);
      surface.putText(x, a.y, text, this.color(3));
    }

    super.draw(surface);
  }

  override handleEvent(ev: RoutedEvent, ctx: ViewContext): void {
    const e = ev.event;
    const { a } = this._bounds;

    if (e.kind === "mouseDown" && e.mouse.pos.y === a.y) {
      const dx = e.mouse.pos.x - a.x;
      if (dx >= CLOSE_ICON_OFFSET && dx < CLOSE_ICON_OFFSET + CLOSE_ICON.length) {
        ev.replace(commandEvent(CM_CLOSE));
      } else {
        this._dragOffset = point(dx, 0);
        this.setState(SF_DRAGGING, true);
        ev.clear();
        return;
      }
    } else if (this.hasState(SF_DRAGGING) && (e.kind === "mouseMove" || e.kind === "mouseUp")) {
      const offset = this._dragOffset ?? point(0, 0);
      this.setBounds(
        rectMove(this._bounds, e.mouse.pos.x - offset.x - a.x, e.mouse.pos.y - offset.y - a.y),
      );
      if (e.kind === "mouseUp") {
        this.setState(SF_DRAGGING, false);
        this._dragOffset = null;
      }
      ev.clear();
      return;
    }

    super.handleEvent(ev, ctx);

    const after = ev.event;
    if (after.kind === "command" && after.command === CM_CLOSE) {
      this.close();
      ev.clear();
    }
  }

  override describe(): string {
    return `Window "${this.title}"${this.number > 0 ? ` #${this.number}` : ""}`;
  }
}
