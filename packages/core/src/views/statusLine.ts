import { CM_COMMAND_SET_CHANGED } from "../commands.js";
import { type RoutedEvent, commandEvent } from "../events.js";
import { type Rect, rectContains } from "../geometry.js";
import type { Surface } from "../surface.js";
import { OF_PRE_PROCESS } from "./flags.js";
import { ViewBase, type ViewContext } from "./view.js";

export type StatusItem = Readonly<{
  text: string;
  keyCode: number;
  command: number;
}>;

// normal, disabled
const STATUS_PALETTE: readonly number[] = Object.freeze([0x70, 0x78]);

/**
 * Bottom status line. Item keys and clicks become the item's command while
 * that command is enabled.
 */
export class StatusLine extends ViewBase {
  readonly items: readonly StatusItem[];
  private readonly _disabled = new Set<number>();

  constructor(bounds: Rect, items: readonly StatusItem[]) {
    super(bounds);
    this.items = items;
    this.options |= OF_PRE_PROCESS;
  }

  override getPalette(): readonly number[] {
    return STATUS_PALETTE;
  }

  override draw(surface: Surface): void {
    surface.fill(this._bounds, " ", this.color(0));
    let x = this._bounds.a.x + 1;
    for (const item of this.items) {
      const slot = this._disabled.has(item.command) ? 1 : 0;
      surface.putText(x, this._bounds.a.y, ` ${item.text} `, this.color(slot));
      x += item.text.length + 2;
    }
  }

  /** Item under column `x`, if any. */
  itemAt(x: number): StatusItem | undefined {
    let start = this._bounds.a.x + 1;
    for (const item of this.items) {
      const end = start + item.text.length + 2;
      if (x >= start && x < end) return item;
      start = end;
    }
    return undefined;
  }

  override handleEvent(ev: RoutedEvent, ctx: ViewContext): void {
    const e = ev.event;
    switch (e.kind) {
      case "broadcast":
        if (e.command === CM_COMMAND_SET_CHANGED) {
          this._disabled.clear();
          for (const item of this.items) {
            if (!ctx.commands.enabled(item.command)) this._disabled.add(item.command);
          }
        }
        return;
      case "keyboard": {
        const item = this.items.find((it) => it.keyCode === e.keyCode);
        if (item && ctx.commands.enabled(item.command)) ev.replace(commandEvent(item.command));
        return;
      }
      case "mouseDown": {
        if (!rectContains(this._bounds, e.mouse.pos)) return;
        const item = this.itemAt(e.mouse.pos.x);
        if (item && ctx.commands.enabled(item.command)) ev.replace(commandEvent(item.command));
        else ev.clear();
        return;
      }
      default:
        return;
    }
  }

  override describe(): string {
    return `StatusLine [${this.items.map((it) => it.text).join(", ")}]`;
  }
}
