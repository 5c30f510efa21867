/**
 * packages/core/src/app/application.ts: Main loop and event router.
 *
 * Why: Owns the per-frame cycle (draw, flush, poll, route, idle) and the
 * nested modal loop dialogs run in. There is no other control flow; the
 * only suspension point is the backend poll.
 *
 * Routing order for each event, stopping as soon as a stage clears it:
 *   1. menu bar
 *   2. desktop (focus chain through nested groups)
 *   3. status line
 *   4. application fallbacks (quit keys, window commands)
 * A command produced by the menu bar or status line is routed again from
 * stage 1 so windows can act on it.
 *
 * Invariants:
 *   - idle() runs only on frames where the poll returned no event
 *   - CM_COMMAND_SET_CHANGED is broadcast to every top-level view before
 *     the registry's changed flag is cleared
 *   - a failed flush is logged and the loop continues; a failed init is fatal
 *   - modal loops end on commands below INTERNAL_COMMAND_BASE only
 */

import {
  CM_CANCEL,
  CM_CASCADE,
  CM_CLOSE,
  CM_COMMAND_SET_CHANGED,
  CM_NEXT,
  CM_PREV,
  CM_QUIT,
  CM_TILE,
  CM_ZOOM,
  isTerminalCommand,
} from "../commands.js";
import { CommandRegistry } from "../commandSet.js";
import { type AppConfig, type ResolvedAppConfig, resolveAppConfig } from "../config.js";
import { TvError, describeThrown } from "../errors.js";
import { type Event, RoutedEvent, broadcastEvent } from "../events.js";
import { rect } from "../geometry.js";
import { KB_ALT_X, KB_CTRL_C, KB_ESC_X, KB_F10 } from "../keys/keyCodes.js";
import { type Logger, silentLogger } from "../logger.js";
import type { Terminal } from "../terminal.js";
import { Desktop } from "../views/desktop.js";
import { SF_CLOSED, SF_MODAL } from "../views/flags.js";
import type { Group } from "../views/group.js";
import type { MenuBar } from "../views/menuBar.js";
import type { StatusLine } from "../views/statusLine.js";
import type { View, ViewContext } from "../views/view.js";
import { Window } from "../views/window.js";

const QUIT_KEYS: ReadonlySet<number> = new Set([KB_CTRL_C, KB_F10, KB_ALT_X, KB_ESC_X]);

export type ApplicationOptions = Readonly<{
  terminal: Terminal;
  menuBar?: MenuBar;
  statusLine?: StatusLine;
  config?: AppConfig;
  logger?: Logger;
  /** Commands disabled at start. Defaults to [CM_CLOSE]. */
  initiallyDisabled?: readonly number[];
}>;

export class Application {
  readonly terminal: Terminal;
  readonly commands = new CommandRegistry();
  readonly desktop: Desktop;
  readonly menuBar: MenuBar | null;
  readonly statusLine: StatusLine | null;
  readonly config: ResolvedAppConfig;
  private readonly _logger: Logger;
  private readonly _ctx: ViewContext;
  private readonly _overlays: View[] = [];
  private _running = false;
  private _started = false;

  constructor(opts: ApplicationOptions) {
    this.terminal = opts.terminal;
    this.menuBar = opts.menuBar ?? null;
    this.statusLine = opts.statusLine ?? null;
    this.config = resolveAppConfig(opts.config);
    this._logger = opts.logger ?? silentLogger;
    this.commands.init(opts.initiallyDisabled ?? [CM_CLOSE]);
    this._ctx = Object.freeze({ commands: this.commands });
    this.desktop = new Desktop(rect(0, 0, 0, 0));
    this.layout();
  }

  get running(): boolean {
    return this._running;
  }

  get context(): ViewContext {
    return this._ctx;
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /** Init the terminal, loop until quit, then shut the terminal down. */
  async run(): Promise<void> {
    if (this._started) {
      throw new TvError("TV_INVALID_STATE", "Application.run() called while already running");
    }
    this._started = true;

    try {
      await this.terminal.init();
    } catch (err) {
      this._started = false;
      this._logger.error(`terminal init failed: ${describeThrown(err)}`);
      throw err;
    }

    this._running = true;
    try {
      while (this._running) {
        const ev = await this.getEvent();
        if (ev !== null) this.handleEvent(ev);
      }
    } finally {
      this._running = false;
      this._started = false;
      try {
        await this.terminal.shutdown();
      } catch (err) {
        this._logger.warn(`terminal shutdown failed: ${describeThrown(err)}`);
      }
    }
  }

  quit(): void {
    this._running = false;
  }

  /**
   * One frame: draw, flush, then poll up to `timeoutMs`. Runs idle() when no
   * event arrived.
   */
  async getEvent(timeoutMs: number = this.config.pollIntervalMs): Promise<Event | null> {
    this.layout();
    this.draw();
    await this.flushFrame();
    const ev = await this.terminal.pollEvent(timeoutMs);
    if (ev === null) this.idle();
    return ev;
  }

  // ===========================================================================
  // Views
  // ===========================================================================

  insertWindow(win: Window): void {
    this.desktop.insert(win);
  }

  /** Overlays are drawn and idled every frame, modal loops included. */
  addOverlay(view: View): void {
    if (!this._overlays.includes(view)) this._overlays.push(view);
  }

  removeOverlay(view: View): boolean {
    const idx = this._overlays.indexOf(view);
    if (idx < 0) return false;
    this._overlays.splice(idx, 1);
    return true;
  }

  /** Place menu bar, desktop and status line for the current screen size. */
  layout(): void {
    this.terminal.syncSize();
    const { cols, rows } = this.terminal.surface;
    const top = this.menuBar ? 1 : 0;
    const bottom = this.statusLine ? rows - 1 : rows;
    this.menuBar?.setBounds(rect(0, 0, cols, 1));
    this.statusLine?.setBounds(rect(0, rows - 1, cols, rows));
    this.desktop.resize(rect(0, top, cols, Math.max(top, bottom)));
  }

  /** Full visual stack: desktop, menu bar, status line, overlays. */
  draw(): void {
    const surface = this.terminal.surface;
    this.desktop.draw(surface);
    this.menuBar?.draw(surface);
    this.statusLine?.draw(surface);
    for (const overlay of this._overlays) overlay.draw(surface);
    this.terminal.hideCursor();
  }

  /** Focused views from the desktop down, one per line. */
  describeFocusChain(): string[] {
    const lines: string[] = [];
    let node: View | null = this.desktop;
    let depth = 0;
    while (node !== null) {
      lines.push(`${"  ".repeat(depth)}${node.describe()}`);
      node = isGroup(node) ? node.current : null;
      depth++;
    }
    for (const overlay of this._overlays) lines.push(`overlay ${overlay.describe()}`);
    return lines;
  }

  // ===========================================================================
  // Routing
  // ===========================================================================

  handleEvent(event: Event): void {
    this.dispatch(new RoutedEvent(event), true);
  }

  /**
   * Broadcast CM_COMMAND_SET_CHANGED if the registry changed, refresh window
   * command enablement, idle overlays and views, drop closed windows.
   */
  idle(): void {
    for (const overlay of this._overlays) overlay.idle?.(this._ctx);
    this.desktop.idle(this._ctx);

    this.desktop.removeClosed();
    this.updateWindowCommands();

    if (this.commands.changed()) {
      const targets: View[] = [];
      if (this.menuBar) targets.push(this.menuBar);
      targets.push(this.desktop);
      if (this.statusLine) targets.push(this.statusLine);
      for (const view of targets) {
        view.handleEvent(new RoutedEvent(broadcastEvent(CM_COMMAND_SET_CHANGED)), this._ctx);
      }
      this.commands.clearChanged();
    }
  }

  /**
   * Modal loop scoped to `view`. Resolves with the first command below
   * INTERNAL_COMMAND_BASE the view produces, or CM_CANCEL if the application
   * stops running first.
   */
  async execView(view: Group): Promise<number> {
    const inserted = !this.desktop.children.includes(view);
    if (inserted) this.desktop.insert(view);
    else this.desktop.bringToFront(view);
    this.desktop.focus(view);
    view.setState(SF_MODAL, true);
    view.takeEndState();

    try {
      while (!this.stopped()) {
        this.layout();
        this.draw();
        await this.flushFrame();

        const ev = await this.terminal.pollEvent(this.config.modalPollIntervalMs);
        if (ev === null) {
          this.idle();
        } else {
          for (const overlay of this._overlays) overlay.idle?.(this._ctx);
          const routed = new RoutedEvent(ev);
          view.handleEvent(routed, this._ctx);
          let out = routed.event;
          if (out !== ev && out.kind === "command" && !isTerminalCommand(out.command)) {
            view.handleEvent(routed, this._ctx);
            out = routed.event;
          }
          if (out.kind === "command" && isTerminalCommand(out.command)) return out.command;
        }

        const end = view.takeEndState();
        if (end !== null) return end;
      }
      return CM_CANCEL;
    } finally {
      view.setState(SF_MODAL, false);
      if (inserted) this.desktop.remove(view);
    }
  }

  /** True once run() has started and quit() has been called since. */
  private stopped(): boolean {
    return this._started && !this._running;
  }

  private dispatch(routed: RoutedEvent, allowReroute: boolean): void {
    const incoming = routed.event;
    const stages: View[] = [];
    if (this.menuBar) stages.push(this.menuBar);
    stages.push(this.desktop);
    if (this.statusLine) stages.push(this.statusLine);

    for (const stage of stages) {
      stage.handleEvent(routed, this._ctx);
      if (routed.consumed) return;
      const produced = routed.event;
      if (
        allowReroute &&
        stage !== this.desktop &&
        produced !== incoming &&
        produced.kind === "command"
      ) {
        this.dispatch(new RoutedEvent(produced), false);
        return;
      }
    }
    this.handleAppEvent(routed);
  }

  private handleAppEvent(routed: RoutedEvent): void {
    const e = routed.event;
    if (e.kind === "keyboard" && QUIT_KEYS.has(e.keyCode)) {
      this.quit();
      routed.clear();
      return;
    }
    if (e.kind !== "command") return;

    switch (e.command) {
      case CM_QUIT:
        this.quit();
        break;
      case CM_TILE:
        this.desktop.tile();
        break;
      case CM_CASCADE:
        this.desktop.cascade();
        break;
      case CM_NEXT:
        this.desktop.nextWindow();
        break;
      case CM_PREV:
        this.desktop.previousWindow();
        break;
      case CM_CLOSE: {
        const top = this.desktop.current;
        if (top === null) return;
        if (top instanceof Window) top.close();
        else top.setState(SF_CLOSED, true);
        this.desktop.removeClosed();
        break;
      }
      default:
        return;
    }
    routed.clear();
  }

  private updateWindowCommands(): void {
    const hasWindows = this.desktop.windowCount() > 0;
    for (const id of [CM_CLOSE, CM_NEXT, CM_PREV, CM_ZOOM]) {
      if (hasWindows) this.commands.enable(id);
      else this.commands.disable(id);
    }
    if (this.desktop.hasTileable()) this.commands.enableAll([CM_TILE, CM_CASCADE]);
    else this.commands.disableAll([CM_TILE, CM_CASCADE]);
  }

  private async flushFrame(): Promise<void> {
    try {
      await this.terminal.flush();
    } catch (err) {
      this._logger.warn(`flush failed: ${describeThrown(err)}`);
    }
  }
}

function isGroup(view: View): view is Group {
  return "current" in view && "takeEndState" in view;
}
