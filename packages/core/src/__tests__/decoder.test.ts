import { assert, chunkEvery, describe, test, twoWaySplits } from "@textvision/testkit";
import {
  type Event,
  KB_ALT,
  KB_CTRL,
  KB_SHIFT,
  MB_LEFT,
  MB_MIDDLE,
  keyEvent,
  mouseEvent,
} from "../events.js";
import { InputDecoder } from "../input/decoder.js";
import {
  KB_ALT_X,
  KB_BACKSPACE,
  KB_DEL,
  KB_DOWN,
  KB_ENTER,
  KB_ESC,
  KB_F1,
  KB_F12,
  KB_F4,
  KB_F5,
  KB_RIGHT,
  KB_SHIFT_TAB,
  KB_TAB,
  KB_UP,
} from "../keys/keyCodes.js";

function decode(input: string | Uint8Array): Event[] {
  return new InputDecoder().feed(input);
}

function x10(cb: number, col: number, row: number): Uint8Array {
  return new Uint8Array([0x1b, 0x5b, 0x4d, 32 + cb, 32 + col, 32 + row]);
}

describe("InputDecoder keys", () => {
  test("C0 controls map to DOS key codes", () => {
    assert.deepEqual(decode("\r\t\x7f\x08\x03"), [
      keyEvent(KB_ENTER),
      keyEvent(KB_TAB),
      keyEvent(KB_BACKSPACE),
      keyEvent(KB_BACKSPACE),
      keyEvent(0x03),
    ]);
  });

  test("CSI cursor keys carry xterm modifiers", () => {
    assert.deepEqual(decode("\x1b[A"), [keyEvent(KB_UP)]);
    assert.deepEqual(decode("\x1b[1;5C"), [keyEvent(KB_RIGHT, KB_CTRL)]);
    assert.deepEqual(decode("\x1b[1;2B"), [keyEvent(KB_DOWN, KB_SHIFT)]);
    assert.deepEqual(decode("\x1b[1;3A"), [keyEvent(KB_UP, KB_ALT)]);
    assert.deepEqual(decode("\x1b[1;8A"), [keyEvent(KB_UP, KB_SHIFT | KB_ALT | KB_CTRL)]);
    assert.deepEqual(decode("\x1b[Z"), [keyEvent(KB_SHIFT_TAB)]);
  });

  test("tilde keys", () => {
    assert.deepEqual(decode("\x1b[3~"), [keyEvent(KB_DEL)]);
    assert.deepEqual(decode("\x1b[15~"), [keyEvent(KB_F5)]);
    assert.deepEqual(decode("\x1b[24;2~"), [keyEvent(KB_F12, KB_SHIFT)]);
    assert.deepEqual(decode("\x1b[99~"), [keyEvent(0)]);
  });

  test("SS3 function keys", () => {
    assert.deepEqual(decode("\x1bOP\x1bOS"), [keyEvent(KB_F1), keyEvent(KB_F4)]);
  });

  test("ESC followed by a letter is Alt+letter in either case", () => {
    assert.deepEqual(decode("\x1bx\x1bX"), [keyEvent(KB_ALT_X), keyEvent(KB_ALT_X)]);
  });

  test("ESC followed by a non-letter is a bare ESC then that key", () => {
    assert.deepEqual(decode("\x1b1"), [keyEvent(KB_ESC), keyEvent(0x31)]);
  });

  test("UTF-8 text yields the code point truncated to 16 bits", () => {
    assert.deepEqual(decode("aé€😀"), [
      keyEvent(0x61),
      keyEvent(0xe9),
      keyEvent(0x20ac),
      keyEvent(0xf600),
    ]);
  });

  test("invalid UTF-8 yields key 0 one byte at a time", () => {
    assert.deepEqual(decode(new Uint8Array([0xff, 0xc3, 0x41])), [
      keyEvent(0),
      keyEvent(0),
      keyEvent(0x41),
    ]);
  });
});

describe("InputDecoder mouse", () => {
  test("SGR press and release", () => {
    assert.deepEqual(decode("\x1b[<0;11;6M"), [mouseEvent("mouseDown", 10, 5, MB_LEFT)]);
    assert.deepEqual(decode("\x1b[<0;11;6m"), [mouseEvent("mouseUp", 10, 5, MB_LEFT)]);
    assert.deepEqual(decode("\x1b[<1;1;1M"), [mouseEvent("mouseDown", 0, 0, MB_MIDDLE)]);
  });

  test("SGR motion and wheel", () => {
    assert.deepEqual(decode("\x1b[<32;5;5M"), [mouseEvent("mouseMove", 4, 4, MB_LEFT)]);
    assert.deepEqual(decode("\x1b[<35;5;5M"), [mouseEvent("mouseMove", 4, 4, 0)]);
    assert.deepEqual(decode("\x1b[<64;3;4M"), [mouseEvent("mouseWheelUp", 2, 3)]);
    assert.deepEqual(decode("\x1b[<65;3;4M"), [mouseEvent("mouseWheelDown", 2, 3)]);
  });

  test("SGR malformed fields read as zero", () => {
    assert.deepEqual(decode("\x1b[<0;;M"), [mouseEvent("mouseDown", 0, 0, MB_LEFT)]);
  });

  test("X10 press, release and wheel", () => {
    assert.deepEqual(decode(x10(0, 11, 6)), [mouseEvent("mouseDown", 10, 5, MB_LEFT)]);
    assert.deepEqual(decode(x10(3, 11, 6)), [mouseEvent("mouseUp", 10, 5, 0)]);
    assert.deepEqual(decode(x10(65, 1, 1)), [mouseEvent("mouseWheelDown", 0, 0)]);
  });

  test("X10 waits for all six bytes", () => {
    const d = new InputDecoder();
    const bytes = x10(0, 2, 2);
    assert.deepEqual(d.feed(bytes.subarray(0, 4)), []);
    assert.equal(d.pendingBytes, 4);
    assert.deepEqual(d.feed(bytes.subarray(4)), [mouseEvent("mouseDown", 1, 1, MB_LEFT)]);
  });
});

describe("InputDecoder buffering", () => {
  const stream = "a\x1b[A\x1b[<0;11;6M\x1b[<0;11;6m€\x1bOP\x1b[15~\x1b[1;5C\x1bx\r";

  test("every two-way split decodes like a single feed", () => {
    const whole = decode(stream);
    assert.equal(whole.length, 10);
    for (const [head, tail] of twoWaySplits(stream)) {
      const d = new InputDecoder();
      const events = [...d.feed(head ?? new Uint8Array()), ...d.feed(tail ?? new Uint8Array())];
      assert.deepEqual(events, whole);
      assert.equal(d.pendingBytes, 0);
    }
  });

  test("byte-at-a-time feed decodes like a single feed", () => {
    const d = new InputDecoder();
    const events = chunkEvery(stream, 1).flatMap((chunk) => d.feed(chunk));
    assert.deepEqual(events, decode(stream));
  });

  test("incomplete UTF-8 waits for its tail", () => {
    const d = new InputDecoder();
    assert.deepEqual(d.feed(new Uint8Array([0xe2, 0x82])), []);
    assert.equal(d.pendingBytes, 2);
    assert.deepEqual(d.feed(new Uint8Array([0xac])), [keyEvent(0x20ac)]);
  });

  test("a lone ESC is held until takeLoneEscape releases it", () => {
    const d = new InputDecoder();
    assert.deepEqual(d.feed("\x1b"), []);
    assert.equal(d.pendingBytes, 1);
    assert.deepEqual(d.takeLoneEscape(), keyEvent(KB_ESC));
    assert.equal(d.pendingBytes, 0);
    assert.equal(d.takeLoneEscape(), null);
  });

  test("takeLoneEscape leaves a partial sequence alone", () => {
    const d = new InputDecoder();
    d.feed("\x1b[");
    assert.equal(d.takeLoneEscape(), null);
    assert.deepEqual(d.feed("A"), [keyEvent(KB_UP)]);
  });

  test("overflowing the buffer drops it and reports the size", () => {
    const dropped: number[] = [];
    const d = new InputDecoder({ maxBufferBytes: 4, onOverflow: (n) => dropped.push(n) });
    assert.deepEqual(d.feed("\x1b[<0;11"), []);
    assert.deepEqual(dropped, [7]);
    assert.equal(d.pendingBytes, 0);
  });
});
