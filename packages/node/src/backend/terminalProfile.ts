import {
  type Capabilities,
  type CellAspectRatio,
  DEFAULT_CAPABILITIES,
  DEFAULT_CELL_ASPECT_RATIO,
} from "@textvision/core";

export type EnvMap = Readonly<Record<string, string | undefined>>;

export type TerminalProfile = Readonly<{
  id: string;
  capabilities: Capabilities;
  cellAspectRatio: CellAspectRatio;
}>;

function envText(env: EnvMap, key: string): string | undefined {
  const value = env[key];
  if (typeof value !== "string") return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function envLower(env: EnvMap, key: string): string | undefined {
  const value = envText(env, key);
  return value?.toLowerCase();
}

export function envInt(env: EnvMap, key: string): number | undefined {
  const raw = envText(env, key);
  if (!raw) return undefined;
  const value = Number.parseInt(raw, 10);
  if (!Number.isFinite(value) || value <= 0) return undefined;
  return value;
}

function envBool(env: EnvMap, key: string): boolean | undefined {
  const raw = envLower(env, key);
  if (!raw) return undefined;
  if (raw === "1" || raw === "true" || raw === "yes" || raw === "on") return true;
  if (raw === "0" || raw === "false" || raw === "no" || raw === "off") return false;
  return undefined;
}

function gcd(a: number, b: number): number {
  let x = a;
  let y = b;
  while (y !== 0) {
    const t = y;
    y = x % y;
    x = t;
  }
  return x;
}

/** [height, width] from cell pixel sizes, reduced to lowest terms. */
export function cellAspectRatioFromPixels(widthPx: number, heightPx: number): CellAspectRatio {
  const d = gcd(heightPx, widthPx);
  return Object.freeze([heightPx / d, widthPx / d] as const);
}

function detectTerminalId(env: EnvMap): string {
  const term = envLower(env, "TERM") ?? "";
  const termProgram = envLower(env, "TERM_PROGRAM");

  if (envText(env, "KITTY_WINDOW_ID") !== undefined || term.includes("kitty")) return "kitty";
  if (envText(env, "WEZTERM_PANE") !== undefined || termProgram === "wezterm") return "wezterm";
  if (envText(env, "ITERM_SESSION_ID") !== undefined || termProgram === "iterm.app") return "iterm2";
  if (termProgram === "ghostty" || term.includes("ghostty")) return "ghostty";
  if (envText(env, "WT_SESSION") !== undefined) return "windows-terminal";
  if (envText(env, "TMUX") !== undefined || term.startsWith("tmux")) return "tmux";
  if (term.includes("xterm")) return "xterm";
  if (term === "linux") return "linux-console";
  return "unknown";
}

/**
 * Capabilities and cell geometry for the terminal described by `env`.
 * Explicit TEXTVISION_* overrides win over detection.
 */
export function terminalProfileFromNodeEnv(env: EnvMap = process.env): TerminalProfile {
  const id = detectTerminalId(env);
  const term = envLower(env, "TERM") ?? "";
  const colorterm = envLower(env, "COLORTERM");
  const dumb = term === "dumb";

  const trueColor = colorterm === "truecolor" || colorterm === "24bit";
  const colors256 = !dumb && (trueColor || term.includes("256color") || id !== "unknown");
  const modern = id === "kitty" || id === "wezterm" || id === "ghostty" || id === "iterm2";

  const capabilities: Capabilities = Object.freeze({
    ...DEFAULT_CAPABILITIES,
    mouse: envBool(env, "TEXTVISION_MOUSE") ?? !dumb,
    colors256,
    trueColor,
    bracketedPaste: !dumb && id !== "unknown" && id !== "linux-console",
    focusEvents: modern || id === "xterm",
    kittyKeyboard: id === "kitty" || id === "ghostty",
  });

  const widthPx = envInt(env, "TEXTVISION_CELL_WIDTH_PX");
  const heightPx = envInt(env, "TEXTVISION_CELL_HEIGHT_PX");
  const cellAspectRatio =
    widthPx !== undefined && heightPx !== undefined
      ? cellAspectRatioFromPixels(widthPx, heightPx)
      : DEFAULT_CELL_ASPECT_RATIO;

  return Object.freeze({ id, capabilities, cellAspectRatio });
}
