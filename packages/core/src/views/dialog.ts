/**
 * packages/core/src/views/dialog.ts: Modal-capable window.
 *
 * On top of Window handling, a dialog:
 *   - turns ESC and double-ESC into CM_CANCEL
 *   - turns Enter into the default button's command when that button is
 *     enabled, and swallows Enter otherwise
 *   - while modal, ends its modal loop on any command below
 *     INTERNAL_COMMAND_BASE; higher ids stay internal to its children
 */

import type { Application } from "../app/application.js";
import { CM_CANCEL, isTerminalCommand } from "../commands.js";
import { type RoutedEvent, commandEvent } from "../events.js";
import type { Rect } from "../geometry.js";
import { KB_ENTER, KB_ESC, KB_ESC_ESC } from "../keys/keyCodes.js";
import { Button } from "./button.js";
import { OF_TILEABLE, SF_MODAL } from "./flags.js";
import type { ViewContext } from "./view.js";
import { Window } from "./window.js";

// frame passive, frame active, interior, title
const DIALOG_PALETTE: readonly number[] = Object.freeze([0x70, 0x7f, 0x70, 0x70]);

export class Dialog extends Window {
  constructor(bounds: Rect, title: string) {
    super(bounds, title);
    this.options &= ~OF_TILEABLE;
  }

  override getPalette(): readonly number[] {
    return DIALOG_PALETTE;
  }

  /** Run this dialog in `app`'s modal loop; resolves with the ending command. */
  execute(app: Application): Promise<number> {
    return app.execView(this);
  }

  defaultButton(): Button | null {
    for (const child of this.children) {
      if (child instanceof Button && child.isDefault) return child;
    }
    return null;
  }

  /** Closing a modal dialog cancels it instead of destroying it. */
  override close(): void {
    if (this.hasState(SF_MODAL)) this.endModal(CM_CANCEL);
    else super.close();
  }

  override handleEvent(ev: RoutedEvent, ctx: ViewContext): void {
    super.handleEvent(ev, ctx);

    const e = ev.event;
    if (e.kind === "keyboard") {
      if (e.keyCode === KB_ESC_ESC || e.keyCode === KB_ESC) {
        ev.replace(commandEvent(CM_CANCEL));
      } else if (e.keyCode === KB_ENTER) {
        const button = this.defaultButton();
        if (button?.canFocus()) ev.replace(commandEvent(button.command));
        else ev.clear();
      }
    }

    const after = ev.event;
    if (after.kind === "command" && this.hasState(SF_MODAL) && isTerminalCommand(after.command)) {
      this.endModal(after.command);
      ev.clear();
    }
  }

  override describe(): string {
    return `Dialog "${this.title}"${this.hasState(SF_MODAL) ? " modal" : ""}`;
  }
}
