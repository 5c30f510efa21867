import { assert, describe, test } from "@textvision/testkit";
import {
  rect,
  rectContains,
  rectEquals,
  rectIntersect,
  rectIsEmpty,
  rectMove,
  rectUnion,
} from "../geometry.js";
import { Surface, attrToSgr } from "../surface.js";

describe("geometry", () => {
  test("contains is half-open", () => {
    const r = rect(2, 2, 5, 4);
    assert.equal(rectContains(r, { x: 2, y: 2 }), true);
    assert.equal(rectContains(r, { x: 4, y: 3 }), true);
    assert.equal(rectContains(r, { x: 5, y: 3 }), false);
    assert.equal(rectContains(r, { x: 4, y: 4 }), false);
  });

  test("zero-height rects hit their own row", () => {
    const line = rect(0, 3, 10, 3);
    assert.equal(rectContains(line, { x: 4, y: 3 }), true);
    assert.equal(rectContains(line, { x: 4, y: 4 }), false);
  });

  test("intersect, union and move", () => {
    const a = rect(0, 0, 4, 4);
    const b = rect(2, 2, 6, 6);
    assert.equal(rectEquals(rectIntersect(a, b), rect(2, 2, 4, 4)), true);
    assert.equal(rectEquals(rectUnion(a, b), rect(0, 0, 6, 6)), true);
    assert.equal(rectIsEmpty(rectIntersect(a, rect(5, 5, 7, 7))), true);
    assert.deepEqual(rectMove(a, 1, -1), rect(1, -1, 5, 3));
  });
});

describe("Surface", () => {
  test("putText clips and reports cells written", () => {
    const s = new Surface(5, 2);
    assert.equal(s.putText(3, 0, "abcd", 0x07), 2);
    assert.equal(s.putText(-1, 1, "xyz", 0x07), 2);
    assert.deepEqual(s.lines(), ["   ab", "yz   "]);
  });

  test("fill clips to the grid", () => {
    const s = new Surface(3, 3);
    s.fill(rect(1, 1, 9, 9), "#", 0x1f);
    assert.deepEqual(s.lines(), ["   ", " ##", " ##"]);
    assert.equal(s.attrAt(2, 2), 0x1f);
    assert.equal(s.charAt(9, 9), "");
  });

  test("attrToSgr maps DOS colors to ANSI", () => {
    assert.equal(attrToSgr(0x07), "\x1b[37;40m");
    assert.equal(attrToSgr(0x1f), "\x1b[97;44m");
    assert.equal(attrToSgr(0x4e), "\x1b[93;41m");
  });

  test("toAnsi positions every row and emits SGR on change", () => {
    const s = new Surface(2, 2);
    s.putChar(1, 1, "x", 0x1f);
    assert.equal(
      s.toAnsi(),
      "\x1b[1;1H\x1b[37;40m  \x1b[2;1H\x1b[37;40m \x1b[97;44mx\x1b[0m",
    );
  });

  test("resize blanks the grid", () => {
    const s = new Surface(2, 1);
    s.putText(0, 0, "ab", 0x07);
    s.resize(3, 1);
    assert.deepEqual(s.lines(), ["   "]);
  });
});
