/**
 * packages/core/src/layout/geometry.ts — Pure rectangle math.
 *
 * All functions are total: degenerate input (zero-size rects, inverted points)
 * produces a well-defined result instead of throwing.
 */

import type { AnchorPoint, Point, Rect, Size, Spacing, SpacingInput } from "./types.js";

export const ZERO_RECT: Rect = Object.freeze({ x: 0, y: 0, w: 0, h: 0 });

/** Build a frozen rect; negative sizes clamp to 0. */
export function rect(x: number, y: number, w: number, h: number): Rect {
  return Object.freeze({ x, y, w: w > 0 ? w : 0, h: h > 0 ? h : 0 });
}

/** Check if point (x,y) is inside rect (exclusive of right/bottom edges). */
export function containsPoint(r: Rect, x: number, y: number): boolean {
  return x >= r.x && x < r.x + r.w && y >= r.y && y < r.y + r.h;
}

/** Positive-area intersection, or null when the rects only touch or are disjoint. */
export function intersectRect(a: Rect, b: Rect): Rect | null {
  const x0 = Math.max(a.x, b.x);
  const y0 = Math.max(a.y, b.y);
  const x1 = Math.min(a.x + a.w, b.x + b.w);
  const y1 = Math.min(a.y + a.h, b.y + b.h);
  if (x1 <= x0 || y1 <= y0) return null;
  return { x: x0, y: y0, w: x1 - x0, h: y1 - y0 };
}

/**
 * Rubber-band test. The band is a closed region, so a zero-width or zero-height
 * band still crosses the boxes it passes over; `r` keeps the half-open edges of
 * `containsPoint` and must have positive size.
 */
export function bandIntersects(band: Rect, r: Rect): boolean {
  if (r.w <= 0 || r.h <= 0) return false;
  return (
    band.x < r.x + r.w && r.x <= band.x + band.w && band.y < r.y + r.h && r.y <= band.y + band.h
  );
}

export function rectsIntersect(a: Rect, b: Rect): boolean {
  return intersectRect(a, b) !== null;
}

export function overlapArea(a: Rect, b: Rect): number {
  const r = intersectRect(a, b);
  return r === null ? 0 : r.w * r.h;
}

/** Normalized rect spanning two corner points (rubber band). */
export function rectFromPoints(a: Point, b: Point): Rect {
  const x = Math.min(a.x, b.x);
  const y = Math.min(a.y, b.y);
  return { x, y, w: Math.abs(b.x - a.x), h: Math.abs(b.y - a.y) };
}

export function boundingRect(rects: readonly Rect[]): Rect | null {
  let out: Rect | null = null;
  for (const r of rects) {
    if (out === null) {
      out = r;
      continue;
    }
    const x0 = Math.min(out.x, r.x);
    const y0 = Math.min(out.y, r.y);
    const x1 = Math.max(out.x + out.w, r.x + r.w);
    const y1 = Math.max(out.y + out.h, r.y + r.h);
    out = { x: x0, y: y0, w: x1 - x0, h: y1 - y0 };
  }
  return out;
}

export function translateRect(r: Rect, dx: number, dy: number): Rect {
  return { x: r.x + dx, y: r.y + dy, w: r.w, h: r.h };
}

/**
 * Offset of a named point from a rect's top-left corner.
 * Center offsets floor, so every resolved position stays on the integer grid
 * when sizes are integers.
 */
export function anchorOffset(point: AnchorPoint, size: Size): Point {
  let x = 0;
  let y = 0;
  switch (point) {
    case "top-left":
      break;
    case "top-center":
      x = Math.floor(size.w / 2);
      break;
    case "top-right":
      x = size.w;
      break;
    case "center-left":
      y = Math.floor(size.h / 2);
      break;
    case "center":
      x = Math.floor(size.w / 2);
      y = Math.floor(size.h / 2);
      break;
    case "center-right":
      x = size.w;
      y = Math.floor(size.h / 2);
      break;
    case "bottom-left":
      y = size.h;
      break;
    case "bottom-center":
      x = Math.floor(size.w / 2);
      y = size.h;
      break;
    case "bottom-right":
      x = size.w;
      y = size.h;
      break;
  }
  return { x, y };
}

/**
 * Top-left origin that puts `selfPoint` of a `size`-sized rect onto
 * `targetPoint` of `target`, shifted by `offset`.
 */
export function alignToPoint(
  size: Size,
  selfPoint: AnchorPoint,
  target: Rect,
  targetPoint: AnchorPoint,
  offset: Point,
): Point {
  const t = anchorOffset(targetPoint, target);
  const s = anchorOffset(selfPoint, size);
  return { x: target.x + t.x - s.x + offset.x, y: target.y + t.y - s.y + offset.y };
}

/**
 * Shift `r` (size preserved) so it lies inside `bounds`. When `r` is larger than
 * `bounds` on an axis, its start edge is pinned to the bounds' start edge.
 */
export function clampRectWithin(r: Rect, bounds: Rect): Rect {
  let x = r.x;
  let y = r.y;
  if (x + r.w > bounds.x + bounds.w) x = bounds.x + bounds.w - r.w;
  if (x < bounds.x) x = bounds.x;
  if (y + r.h > bounds.y + bounds.h) y = bounds.y + bounds.h - r.h;
  if (y < bounds.y) y = bounds.y;
  return x === r.x && y === r.y ? r : { x, y, w: r.w, h: r.h };
}

export function rectsEqual(a: Rect, b: Rect): boolean {
  return a.x === b.x && a.y === b.y && a.w === b.w && a.h === b.h;
}

export function resolveSpacing(input: SpacingInput | undefined): Spacing {
  if (input === undefined) return { top: 0, right: 0, bottom: 0, left: 0 };
  if (typeof input === "number") return { top: input, right: input, bottom: input, left: input };
  return {
    top: input.top ?? 0,
    right: input.right ?? 0,
    bottom: input.bottom ?? 0,
    left: input.left ?? 0,
  };
}
