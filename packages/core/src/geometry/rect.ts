/**
 * packages/core/src/geometry/rect.ts — Axis-aligned rectangles.
 *
 * All rectangles are half-open: a point on the right or bottom edge is
 * outside, so adjacent widgets sharing an edge never both match.
 * Zero-area rectangles contain nothing and intersect nothing.
 */

export type Rect = Readonly<{ x: number; y: number; w: number; h: number }>;

export const EMPTY_RECT: Rect = Object.freeze({ x: 0, y: 0, w: 0, h: 0 });

export function rect(x: number, y: number, w: number, h: number): Rect {
  return Object.freeze({ x, y, w, h });
}

export function isEmptyRect(r: Rect): boolean {
  return !(r.w > 0 && r.h > 0);
}

export function isFiniteRect(r: Rect): boolean {
  return (
    Number.isFinite(r.x) && Number.isFinite(r.y) && Number.isFinite(r.w) && Number.isFinite(r.h)
  );
}

/** Check if point (x,y) is inside rect (exclusive of right/bottom edges). */
export function contains(r: Rect, x: number, y: number): boolean {
  return x >= r.x && x < r.x + r.w && y >= r.y && y < r.y + r.h;
}

/** True when both rectangles share a non-empty area. */
export function intersects(a: Rect, b: Rect): boolean {
  if (isEmptyRect(a) || isEmptyRect(b)) return false;
  return a.x < b.x + b.w && b.x < a.x + a.w && a.y < b.y + b.h && b.y < a.y + a.h;
}

export function intersectRect(a: Rect, b: Rect): Rect | null {
  const x0 = Math.max(a.x, b.x);
  const y0 = Math.max(a.y, b.y);
  const x1 = Math.min(a.x + a.w, b.x + b.w);
  const y1 = Math.min(a.y + a.h, b.y + b.h);
  if (x1 <= x0 || y1 <= y0) return null;
  return { x: x0, y: y0, w: x1 - x0, h: y1 - y0 };
}

export function rectEquals(a: Rect, b: Rect): boolean {
  return a.x === b.x && a.y === b.y && a.w === b.w && a.h === b.h;
}
