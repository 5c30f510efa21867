/**
 * Point and Rect value types.
 *
 * A Rect spans `a` (inclusive) to `b` (exclusive). Width and height may go
 * negative for malformed rects; use the clamped accessors for sizes.
 */

export type Point = Readonly<{ x: number; y: number }>;

export type Rect = Readonly<{ a: Point; b: Point }>;

export function point(x: number, y: number): Point {
  return Object.freeze({ x, y });
}

export function rect(ax: number, ay: number, bx: number, by: number): Rect {
  return Object.freeze({ a: point(ax, ay), b: point(bx, by) });
}

export function pointEquals(p: Point, q: Point): boolean {
  return p.x === q.x && p.y === q.y;
}

export function rectWidth(r: Rect): number {
  return r.b.x - r.a.x;
}

export function rectHeight(r: Rect): number {
  return r.b.y - r.a.y;
}

export function rectWidthClamped(r: Rect): number {
  return Math.max(0, rectWidth(r));
}

export function rectHeightClamped(r: Rect): number {
  return Math.max(0, rectHeight(r));
}

export function rectEquals(r: Rect, s: Rect): boolean {
  return pointEquals(r.a, s.a) && pointEquals(r.b, s.b);
}

export function rectIsEmpty(r: Rect): boolean {
  return rectWidth(r) <= 0 || rectHeight(r) <= 0;
}

/**
 * Hit test. A zero-width or zero-height rect is treated as a single column,
 * row or point rather than as empty, so one-row controls stay clickable.
 */
export function rectContains(r: Rect, p: Point): boolean {
  const w = rectWidth(r);
  const h = rectHeight(r);
  const inX = w === 0 ? p.x === r.a.x : p.x >= r.a.x && p.x < r.b.x;
  const inY = h === 0 ? p.y === r.a.y : p.y >= r.a.y && p.y < r.b.y;
  return inX && inY;
}

export function rectIntersect(r: Rect, s: Rect): Rect {
  return rect(
    Math.max(r.a.x, s.a.x),
    Math.max(r.a.y, s.a.y),
    Math.min(r.b.x, s.b.x),
    Math.min(r.b.y, s.b.y),
  );
}

export function rectIntersects(r: Rect, s: Rect): boolean {
  return r.a.x < s.b.x && s.a.x < r.b.x && r.a.y < s.b.y && s.a.y < r.b.y;
}

export function rectUnion(r: Rect, s: Rect): Rect {
  return rect(
    Math.min(r.a.x, s.a.x),
    Math.min(r.a.y, s.a.y),
    Math.max(r.b.x, s.b.x),
    Math.max(r.b.y, s.b.y),
  );
}

export function rectGrow(r: Rect, dx: number, dy: number): Rect {
  return rect(r.a.x - dx, r.a.y - dy, r.b.x + dx, r.b.y + dy);
}

export function rectMove(r: Rect, dx: number, dy: number): Rect {
  return rect(r.a.x + dx, r.a.y + dy, r.b.x + dx, r.b.y + dy);
}
