import { assert, describe, test } from "@textvision/testkit";
import { isTvError } from "../errors.js";
import { KB_CTRL, MB_LEFT, keyEvent, mouseEvent } from "../events.js";
import { DoubleClickDetector } from "../input/doubleClick.js";
import { EscSequenceTracker, requireEscTimeout } from "../input/escTracker.js";
import { KB_ESC, KB_ESC_ESC, KB_ESC_X, KB_UP } from "../keys/keyCodes.js";

const ESC = keyEvent(KB_ESC);

describe("EscSequenceTracker", () => {
  test("ESC then a prefix letter inside the window is Esc+letter", () => {
    const t = new EscSequenceTracker(500);
    assert.deepEqual(t.push(ESC, 0), []);
    assert.equal(t.pending, true);
    assert.equal(t.deadline(), 500);
    assert.deepEqual(t.push(keyEvent(0x78), 100), [keyEvent(KB_ESC_X)]);
    assert.equal(t.pending, false);
  });

  test("uppercase letters combine like lowercase", () => {
    const t = new EscSequenceTracker(500);
    t.push(ESC, 0);
    assert.deepEqual(t.push(keyEvent(0x58), 10), [keyEvent(KB_ESC_X)]);
  });

  test("letters without an Esc code become Alt+letter", () => {
    const t = new EscSequenceTracker(500);
    t.push(ESC, 0);
    assert.deepEqual(t.push(keyEvent(0x62), 10), [keyEvent(0x3000)]);
  });

  test("two ESC presses inside the window are ESC ESC", () => {
    const t = new EscSequenceTracker(500);
    t.push(ESC, 0);
    assert.deepEqual(t.push(ESC, 499), [keyEvent(KB_ESC_ESC)]);
  });

  test("a held ESC expires at the deadline", () => {
    const t = new EscSequenceTracker(500);
    t.push(ESC, 0);
    assert.deepEqual(t.expire(499), []);
    assert.deepEqual(t.expire(500), [ESC]);
    assert.equal(t.deadline(), null);
  });

  test("a letter after the window is delivered after the released ESC", () => {
    const t = new EscSequenceTracker(500);
    t.push(ESC, 0);
    assert.deepEqual(t.push(keyEvent(0x78), 600), [ESC, keyEvent(0x78)]);
  });

  test("non-letter keys, modified keys and mouse events release the ESC first", () => {
    const t = new EscSequenceTracker(500);
    t.push(ESC, 0);
    assert.deepEqual(t.push(keyEvent(KB_UP), 10), [ESC, keyEvent(KB_UP)]);

    t.push(ESC, 20);
    const ctrlX = keyEvent(0x78, KB_CTRL);
    assert.deepEqual(t.push(ctrlX, 30), [ESC, ctrlX]);

    t.push(ESC, 40);
    const down = mouseEvent("mouseDown", 1, 1, MB_LEFT);
    assert.deepEqual(t.push(down, 50), [ESC, down]);
  });

  test("timeout must lie in 250..1500", () => {
    assert.equal(requireEscTimeout(250), 250);
    assert.equal(requireEscTimeout(1500), 1500);
    assert.throws(() => new EscSequenceTracker(249), (err) => isTvError(err, "TV_INVALID_INPUT"));
    assert.throws(() => new EscSequenceTracker(1501), (err) => isTvError(err, "TV_INVALID_INPUT"));
  });
});

describe("DoubleClickDetector", () => {
  const down = (x: number, y: number) => mouseEvent("mouseDown", x, y, MB_LEFT);

  test("second press on the same cell inside the window is a double click", () => {
    const d = new DoubleClickDetector(500);
    assert.deepEqual(d.apply(down(3, 4), 0), down(3, 4));
    assert.deepEqual(d.apply(down(3, 4), 500), mouseEvent("mouseDown", 3, 4, MB_LEFT, true));
  });

  test("a third press starts a new pair", () => {
    const d = new DoubleClickDetector(500);
    d.apply(down(3, 4), 0);
    d.apply(down(3, 4), 100);
    assert.deepEqual(d.apply(down(3, 4), 200), down(3, 4));
  });

  test("presses too far apart in time or space are single clicks", () => {
    const slow = new DoubleClickDetector(500);
    slow.apply(down(3, 4), 0);
    assert.deepEqual(slow.apply(down(3, 4), 600), down(3, 4));

    const moved = new DoubleClickDetector(500);
    moved.apply(down(3, 4), 0);
    assert.deepEqual(moved.apply(down(4, 4), 100), down(4, 4));
  });

  test("other events pass through untouched", () => {
    const d = new DoubleClickDetector(500);
    const up = mouseEvent("mouseUp", 3, 4);
    assert.equal(d.apply(up, 0), up);
  });
});
