/**
 * packages/core/src/layout/types.ts — Layout primitive type definitions.
 *
 * Why: Defines the fundamental geometric types used throughout the layout
 * system. Coordinates are screen units with the origin at the top-left,
 * x growing right and y growing down.
 */

/** Point in screen units. */
export type Point = Readonly<{ x: number; y: number }>;

/** Size dimensions (width and height). */
export type Size = Readonly<{ w: number; h: number }>;

/** Rectangle with position (x,y) and dimensions (w,h). Containment is half-open. */
export type Rect = Readonly<{ x: number; y: number; w: number; h: number }>;

/** Layout axis: row (horizontal) or column (vertical) stacking. */
export type Axis = "row" | "column";

/** One of the nine named points of a rectangle. */
export type AnchorPoint =
  | "top-left"
  | "top-center"
  | "top-right"
  | "center-left"
  | "center"
  | "center-right"
  | "bottom-left"
  | "bottom-center"
  | "bottom-right";

export const ANCHOR_POINTS: readonly AnchorPoint[] = Object.freeze([
  "top-left",
  "top-center",
  "top-right",
  "center-left",
  "center",
  "center-right",
  "bottom-left",
  "bottom-center",
  "bottom-right",
]);

/** Per-side inset. */
export type Spacing = Readonly<{ top: number; right: number; bottom: number; left: number }>;

/** Uniform inset or per-side inset with missing sides at 0. */
export type SpacingInput = number | Readonly<Partial<Spacing>>;

/** Main-axis distribution of excess space inside a fixed-size group. */
export type Align = "start" | "end" | "center" | "justify";

/** Cross-axis placement of a child inside its lane or cell. */
export type CrossAlign = "start" | "end" | "center" | "stretch";

/** Measured input to a group layout pass. */
export type LayoutItem = Readonly<{ w: number; h: number; stretchable: boolean }>;

/** Output of a group layout pass: the group's own size and each member's rect. */
export type GroupLayout = Readonly<{ size: Size; rects: readonly Rect[] }>;
