/**
 * packages/core/src/widgets/containers.ts — Layout group factories.
 */

import type { LayoutKind, LayoutPolicyInput } from "../layout/group.js";
import { Box, type BoxOptions } from "../runtime/box.js";

/** Box options plus every layout policy field except `kind`. */
export type GroupOptions = Omit<BoxOptions, "layout"> & Omit<LayoutPolicyInput, "kind">;

function makeGroup(kind: LayoutKind, opts: GroupOptions): Box {
  const { spacing, padding, align, crossAlign, reverse, width, height, columns, aspectRatio, ...box } =
    opts;
  return new Box({
    ...box,
    layout: { kind, spacing, padding, align, crossAlign, reverse, width, height, columns, aspectRatio },
  });
}

/** Children left to right. */
export function makeRow(opts: GroupOptions = {}): Box {
  return makeGroup("row", opts);
}

/** Children top to bottom. */
export function makeColumn(opts: GroupOptions = {}): Box {
  return makeGroup("column", opts);
}

/** Children row-major; `columns`, or the column count closest to `aspectRatio` (default 1). */
export function makeGrid(opts: GroupOptions = {}): Box {
  return makeGroup("grid", opts);
}
