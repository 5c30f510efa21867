import { CM_COMMAND_SET_CHANGED } from "../commands.js";
import { type RoutedEvent, commandEvent } from "../events.js";
import type { Rect } from "../geometry.js";
import { rectWidthClamped } from "../geometry.js";
import { KB_ENTER } from "../keys/keyCodes.js";
import type { Surface } from "../surface.js";
import { OF_FIRST_CLICK, OF_SELECTABLE, SF_DEFAULT, SF_DISABLED, SF_FOCUSED } from "./flags.js";
import { ViewBase, type ViewContext } from "./view.js";

export type ButtonOptions = Readonly<{
  /** Enter anywhere in the owning dialog activates this button. */
  isDefault?: boolean;
}>;

// normal, focused, disabled
const BUTTON_PALETTE: readonly number[] = Object.freeze([0x20, 0x2f, 0x28]);

/**
 * Emits `command` on Enter or Space while focused, or on a click. Tracks
 * whether its command is enabled through CM_COMMAND_SET_CHANGED, which it
 * receives even while disabled.
 */
export class Button extends ViewBase {
  readonly title: string;
  readonly command: number;
  readonly isDefault: boolean;

  constructor(bounds: Rect, title: string, command: number, opts: ButtonOptions = {}) {
    super(bounds);
    this.title = title;
    this.command = command;
    this.isDefault = opts.isDefault === true;
    this.options |= OF_SELECTABLE | OF_FIRST_CLICK;
    if (this.isDefault) this.setState(SF_DEFAULT, true);
  }

  override getPalette(): readonly number[] {
    return BUTTON_PALETTE;
  }

  override draw(surface: Surface): void {
    const attr = this.hasState(SF_DISABLED)
      ? this.color(2)
      : this.hasState(SF_FOCUSED)
        ? this.color(1)
        : this.color(0);
    const width = rectWidthClamped(this._bounds);
    const label = this.isDefault ? `>${this.title}<` : ` ${this.title} `;
    const pad = Math.max(0, width - label.length);
    const left = Math.floor(pad / 2);
    const text = `${" ".repeat(left)}${label}${" ".repeat(pad - left)}`.slice(0, width);
    surface.putText(this._bounds.a.x, this._bounds.a.y, text, attr);
  }

  override handleEvent(ev: RoutedEvent, ctx: ViewContext): void {
    const e = ev.event;
    if (e.kind === "broadcast") {
      if (e.command === CM_COMMAND_SET_CHANGED) {
        this.setState(SF_DISABLED, !ctx.commands.enabled(this.command));
      }
      return;
    }
    if (this.hasState(SF_DISABLED)) return;

    if (e.kind === "keyboard" && this.hasState(SF_FOCUSED)) {
      if (e.keyCode === KB_ENTER || e.keyCode === 0x20) this.press(ev);
      return;
    }
    if (e.kind === "mouseDown") this.press(ev);
  }

  private press(ev: RoutedEvent): void {
    ev.replace(commandEvent(this.command));
  }

  override describe(): string {
    return `Button "${this.title}" cmd=${this.command}${this.hasState(SF_DISABLED) ? " disabled" : ""}`;
  }
}
