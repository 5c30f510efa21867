/**
 * packages/core/src/views/menuBar.ts: Top menu bar with drop-down menus.
 *
 * Closed:
 *   - F10 opens the first menu
 *   - Alt+hotkey or a click on a title opens that menu (or emits the
 *     command of a menu without items)
 *   - item accelerators emit their command when it is enabled
 * Open:
 *   - Up/Down move the selection, Left/Right switch menus
 *   - Enter or a click on an item emits its command
 *   - ESC, F10 or a click outside closes the menu
 *   - every other key is swallowed
 *
 * Commands are emitted by replacing the event, so the rest of the router
 * sees a command event.
 */

import { CM_COMMAND_SET_CHANGED } from "../commands.js";
import { type RoutedEvent, commandEvent } from "../events.js";
import { type Rect, rect, rectContains, rectWidthClamped } from "../geometry.js";
import {
  KB_DOWN,
  KB_ENTER,
  KB_ESC,
  KB_ESC_ESC,
  KB_F10,
  KB_LEFT,
  KB_RIGHT,
  KB_UP,
  altLetterCode,
} from "../keys/keyCodes.js";
import { keyName } from "../keys/keyNames.js";
import type { Surface } from "../surface.js";
import { OF_PRE_PROCESS } from "./flags.js";
import { ViewBase, type ViewContext } from "./view.js";

export type MenuItem = Readonly<{
  label: string;
  command: number;
  /** Accelerator that works while the bar is closed. */
  keyCode?: number;
}>;

export type Menu = Readonly<{
  title: string;
  /** Alt+letter code; defaults to Alt + the title's first letter. */
  hotKey?: number;
  items?: readonly MenuItem[];
  /** Emitted directly when the menu has no items. */
  command?: number;
}>;

// bar, bar selected, item, item selected, item disabled
const MENU_PALETTE: readonly number[] = Object.freeze([0x70, 0x20, 0x70, 0x20, 0x78]);

type TitleSpan = Readonly<{ start: number; end: number }>;

export class MenuBar extends ViewBase {
  readonly menus: readonly Menu[];
  private _open: number | null = null;
  private _selected = 0;
  private readonly _disabled = new Set<number>();

  constructor(bounds: Rect, menus: readonly Menu[]) {
    super(bounds);
    this.menus = menus;
    this.options |= OF_PRE_PROCESS;
  }

  override getPalette(): readonly number[] {
    return MENU_PALETTE;
  }

  get openMenu(): number | null {
    return this._open;
  }

  get selectedItem(): number {
    return this._selected;
  }

  open(index: number): void {
    if (index < 0 || index >= this.menus.length) return;
    this._open = index;
    this._selected = this.firstEnabled(index, 0, 1);
  }

  close(): void {
    this._open = null;
    this._selected = 0;
  }

  /** Screen area of the open drop-down, or null. */
  dropDownBounds(): Rect | null {
    if (this._open === null) return null;
    const items = this.menus[this._open]?.items ?? [];
    if (items.length === 0) return null;
    const span = this.titleSpans()[this._open];
    if (!span) return null;
    const inner = Math.max(...items.map((it) => this.itemText(it).length));
    const y = this._bounds.a.y + 1;
    return rect(span.start, y, span.start + inner + 2, y + items.length + 2);
  }

  override draw(surface: Surface): void {
    const { a } = this._bounds;
    surface.fill(this._bounds, " ", this.color(0));
    const spans = this.titleSpans();
    this.menus.forEach((menu, i) => {
      const span = spans[i];
      if (!span) return;
      surface.putText(span.start, a.y, ` ${menu.title} `, this.color(i === this._open ? 1 : 0));
    });
    this.drawDropDown(surface);
  }

  override handleEvent(ev: RoutedEvent, ctx: ViewContext): void {
    const e = ev.event;
    if (e.kind === "broadcast") {
      if (e.command === CM_COMMAND_SET_CHANGED) this.refreshDisabled(ctx);
      return;
    }
    if (this._open !== null) this.handleOpen(ev, ctx);
    else this.handleClosed(ev, ctx);
  }

  override describe(): string {
    return `MenuBar [${this.menus.map((m) => m.title).join(", ")}]${this._open !== null ? " open" : ""}`;
  }

  private handleClosed(ev: RoutedEvent, ctx: ViewContext): void {
    const e = ev.event;
    if (e.kind === "keyboard") {
      if (e.keyCode === KB_F10 && this.menus.length > 0) {
        this.open(0);
        ev.clear();
        return;
      }
      const index = this.menus.findIndex((m) => this.hotKeyOf(m) === e.keyCode);
      if (index >= 0) {
        this.activate(index, ev, ctx);
        return;
      }
      for (const menu of this.menus) {
        for (const item of menu.items ?? []) {
          if (item.keyCode === e.keyCode && ctx.commands.enabled(item.command)) {
            ev.replace(commandEvent(item.command));
            return;
          }
        }
      }
      return;
    }

    if (e.kind === "mouseDown" && rectContains(this._bounds, e.mouse.pos)) {
      const index = this.titleAt(e.mouse.pos.x);
      if (index >= 0) this.activate(index, ev, ctx);
      else ev.clear();
    }
  }

  private handleOpen(ev: RoutedEvent, ctx: ViewContext): void {
    const e = ev.event;
    const open = this._open ?? 0;
    const items = this.menus[open]?.items ?? [];

    if (e.kind === "keyboard") {
      switch (e.keyCode) {
        case KB_ESC:
        case KB_ESC_ESC:
        case KB_F10:
          this.close();
          break;
        case KB_UP:
          this._selected = this.firstEnabled(open, this._selected - 1, -1);
          break;
        case KB_DOWN:
          this._selected = this.firstEnabled(open, this._selected + 1, 1);
          break;
        case KB_LEFT:
          this.open((open - 1 + this.menus.length) % this.menus.length);
          break;
        case KB_RIGHT:
          this.open((open + 1) % this.menus.length);
          break;
        case KB_ENTER:
          this.choose(items[this._selected], ev, ctx);
          return;
        default: {
          const index = this.menus.findIndex((m) => this.hotKeyOf(m) === e.keyCode);
          if (index >= 0) {
            this.close();
            this.activate(index, ev, ctx);
            return;
          }
        }
      }
      ev.clear();
      return;
    }

    if (e.kind === "mouseDown" || e.kind === "mouseMove" || e.kind === "mouseUp") {
      const pos = e.mouse.pos;
      const drop = this.dropDownBounds();
      if (drop && rectContains(drop, pos)) {
        const row = pos.y - drop.a.y - 1;
        if (row >= 0 && row < items.length) {
          this._selected = row;
          if (e.kind === "mouseDown") {
            this.choose(items[row], ev, ctx);
            return;
          }
        }
      } else if (e.kind === "mouseDown") {
        const index = rectContains(this._bounds, pos) ? this.titleAt(pos.x) : -1;
        if (index >= 0 && index !== open) this.open(index);
        else this.close();
      }
      ev.clear();
    }
  }

  /** Open a menu with items, or emit the command of one without. */
  private activate(index: number, ev: RoutedEvent, ctx: ViewContext): void {
    const menu = this.menus[index];
    if (!menu) return;
    if ((menu.items ?? []).length > 0) {
      this.open(index);
      ev.clear();
      return;
    }
    if (menu.command !== undefined && ctx.commands.enabled(menu.command)) {
      ev.replace(commandEvent(menu.command));
    } else {
      ev.clear();
    }
  }

  private choose(item: MenuItem | undefined, ev: RoutedEvent, ctx: ViewContext): void {
    if (item === undefined || !ctx.commands.enabled(item.command)) {
      ev.clear();
      return;
    }
    this.close();
    ev.replace(commandEvent(item.command));
  }

  private refreshDisabled(ctx: ViewContext): void {
    this._disabled.clear();
    for (const menu of this.menus) {
      for (const item of menu.items ?? []) {
        if (!ctx.commands.enabled(item.command)) this._disabled.add(item.command);
      }
    }
  }

  private firstEnabled(menuIndex: number, from: number, step: 1 | -1): number {
    const items = this.menus[menuIndex]?.items ?? [];
    const n = items.length;
    if (n === 0) return 0;
    for (let k = 0; k < n; k++) {
      const idx = (((from + step * k) % n) + n) % n;
      const item = items[idx];
      if (item && !this._disabled.has(item.command)) return idx;
    }
    return 0;
  }

  private hotKeyOf(menu: Menu): number {
    return menu.hotKey ?? altLetterCode(menu.title.charAt(0));
  }

  private titleSpans(): TitleSpan[] {
    const spans: TitleSpan[] = [];
    let x = this._bounds.a.x + 1;
    for (const menu of this.menus) {
      const w = menu.title.length + 2;
      spans.push({ start: x, end: x + w });
      x += w;
    }
    return spans;
  }

  private titleAt(x: number): number {
    return this.titleSpans().findIndex((s) => x >= s.start && x < s.end);
  }

  private itemText(item: MenuItem): string {
    const accel = item.keyCode === undefined ? "" : `  ${keyName(item.keyCode)}`;
    return ` ${item.label}${accel} `;
  }

  private drawDropDown(surface: Surface): void {
    const drop = this.dropDownBounds();
    const items = this._open === null ? [] : (this.menus[this._open]?.items ?? []);
    if (!drop) return;
    const width = rectWidthClamped(drop);
    const frame = this.color(2);
    surface.putText(drop.a.x, drop.a.y, `┌${"─".repeat(width - 2)}┐`, frame);
    items.forEach((item, i) => {
      const y = drop.a.y + 1 + i;
      const slot = this._disabled.has(item.command) ? 4 : i === this._selected ? 3 : 2;
      surface.putChar(drop.a.x, y, "│", frame);
      surface.putText(drop.a.x + 1, y, this.itemText(item).padEnd(width - 2), this.color(slot));
      surface.putChar(drop.b.x - 1, y, "│", frame);
    });
    surface.putText(drop.a.x, drop.b.y - 1, `└${"─".repeat(width - 2)}┘`, frame);
  }
}
