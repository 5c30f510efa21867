import { assert, test } from "@textvision/testkit";
import {
  cellAspectRatioFromPixels,
  envInt,
  terminalProfileFromNodeEnv,
} from "../backend/terminalProfile.js";

test("terminalProfileFromNodeEnv detects kitty and pixel size hints", () => {
  const profile = terminalProfileFromNodeEnv({
    TERM: "xterm-kitty",
    KITTY_WINDOW_ID: "1",
    TEXTVISION_CELL_WIDTH_PX: "10",
    TEXTVISION_CELL_HEIGHT_PX: "22",
  });
  assert.equal(profile.id, "kitty");
  assert.equal(profile.capabilities.kittyKeyboard, true);
  assert.equal(profile.capabilities.focusEvents, true);
  assert.deepEqual(profile.cellAspectRatio, [11, 5]);
});

test("terminalProfileFromNodeEnv reads truecolor from COLORTERM", () => {
  const profile = terminalProfileFromNodeEnv({ TERM: "xterm-256color", COLORTERM: "truecolor" });
  assert.equal(profile.id, "xterm");
  assert.deepEqual(profile.capabilities, {
    mouse: true,
    colors256: true,
    trueColor: true,
    bracketedPaste: true,
    focusEvents: true,
    kittyKeyboard: false,
  });
  assert.deepEqual(profile.cellAspectRatio, [2, 1]);
});

test("terminalProfileFromNodeEnv treats a dumb terminal as bare", () => {
  const profile = terminalProfileFromNodeEnv({ TERM: "dumb" });
  assert.equal(profile.id, "unknown");
  assert.equal(profile.capabilities.mouse, false);
  assert.equal(profile.capabilities.colors256, false);
  assert.equal(profile.capabilities.bracketedPaste, false);
});

test("terminalProfileFromNodeEnv honors the mouse override", () => {
  assert.equal(terminalProfileFromNodeEnv({ TERM: "dumb", TEXTVISION_MOUSE: "on" }).capabilities.mouse, true);
  assert.equal(terminalProfileFromNodeEnv({ TERM: "xterm", TEXTVISION_MOUSE: "0" }).capabilities.mouse, false);
});

test("terminalProfileFromNodeEnv detects multiplexers and consoles", () => {
  assert.equal(terminalProfileFromNodeEnv({ TERM: "screen", TMUX: "/tmp/tmux-1/default" }).id, "tmux");
  assert.equal(terminalProfileFromNodeEnv({ TERM: "linux" }).id, "linux-console");
  assert.equal(terminalProfileFromNodeEnv({ WT_SESSION: "abc" }).id, "windows-terminal");
  assert.equal(terminalProfileFromNodeEnv({ TERM_PROGRAM: "iTerm.app" }).id, "iterm2");
});

test("envInt accepts only positive integers", () => {
  assert.equal(envInt({ A: " 12 " }, "A"), 12);
  assert.equal(envInt({ A: "abc" }, "A"), undefined);
  assert.equal(envInt({ A: "-3" }, "A"), undefined);
  assert.equal(envInt({}, "A"), undefined);
});

test("cellAspectRatioFromPixels reduces to lowest terms", () => {
  assert.deepEqual(cellAspectRatioFromPixels(8, 16), [2, 1]);
  assert.deepEqual(cellAspectRatioFromPixels(9, 21), [7, 3]);
});
