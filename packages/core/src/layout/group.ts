/**
 * packages/core/src/layout/group.ts — Layout groups and the lazy flush.
 *
 * Why: A box with a `layout` policy arranges its member children (visible and
 * not anchored). Mutations only set dirty flags; `flushDirtyGroups` does the
 * work once, deepest group first. A group whose own size changes dirties its
 * nearest ancestor group, which sits higher and is therefore still ahead in the
 * same flush. Nested groups are never stretched, so no group is recomputed
 * twice in one flush.
 */

import { invalidProps } from "../errors.js";
import type { Box } from "../runtime/box.js";
import { resolveSpacing } from "./geometry.js";
import { computeGridLayout } from "./grid.js";
import { computeStackLayout } from "./stack.js";
import type { Align, CrossAlign, GroupLayout, LayoutItem, Spacing, SpacingInput } from "./types.js";

export type LayoutKind = "row" | "column" | "grid";

export type LayoutPolicy = Readonly<{
  kind: LayoutKind;
  spacing: number;
  padding: Spacing;
  align: Align;
  crossAlign: CrossAlign;
  reverse: boolean;
  /** Fixed outer width; null sizes to content. */
  width: number | null;
  height: number | null;
  /** Grid only. */
  columns: number | null;
  /** Grid only; used when `columns` is null. */
  aspectRatio: number | null;
}>;

export type LayoutPolicyInput = Readonly<{
  kind: LayoutKind;
  spacing?: number;
  padding?: SpacingInput;
  align?: Align;
  crossAlign?: CrossAlign;
  reverse?: boolean;
  width?: number;
  height?: number;
  columns?: number;
  aspectRatio?: number;
}>;

const ALIGNS: readonly Align[] = ["start", "end", "center", "justify"];
const CROSS_ALIGNS: readonly CrossAlign[] = ["start", "end", "center", "stretch"];

function requireNonNegativeInt(name: string, v: number): number {
  if (!Number.isInteger(v) || v < 0) invalidProps(`${name} must be an integer >= 0`);
  return v;
}

function optionalNonNegativeInt(name: string, v: number | undefined): number | null {
  return v === undefined ? null : requireNonNegativeInt(name, v);
}

export function resolveLayoutPolicy(input: LayoutPolicyInput): LayoutPolicy {
  const kind = input.kind;
  if (kind !== "row" && kind !== "column" && kind !== "grid") {
    invalidProps(`layout.kind must be "row", "column" or "grid"`);
  }
  const align = input.align ?? "start";
  if (!ALIGNS.includes(align)) invalidProps(`${kind}.align is not a valid alignment`);
  const crossAlign = input.crossAlign ?? "start";
  if (!CROSS_ALIGNS.includes(crossAlign)) invalidProps(`${kind}.crossAlign is not a valid alignment`);

  const padding = resolveSpacing(input.padding);
  requireNonNegativeInt(`${kind}.padding.top`, padding.top);
  requireNonNegativeInt(`${kind}.padding.right`, padding.right);
  requireNonNegativeInt(`${kind}.padding.bottom`, padding.bottom);
  requireNonNegativeInt(`${kind}.padding.left`, padding.left);

  let columns: number | null = null;
  let aspectRatio: number | null = null;
  if (kind === "grid") {
    if (input.columns !== undefined) {
      if (!Number.isInteger(input.columns) || input.columns < 1) {
        invalidProps("grid.columns must be an integer >= 1");
      }
      columns = input.columns;
    } else {
      const ratio = input.aspectRatio ?? 1;
      if (!Number.isFinite(ratio) || ratio <= 0) invalidProps("grid.aspectRatio must be a finite number > 0");
      aspectRatio = ratio;
    }
  }

  return Object.freeze({
    kind,
    spacing: requireNonNegativeInt(`${kind}.spacing`, input.spacing ?? 0),
    padding: Object.freeze(padding),
    align,
    crossAlign,
    reverse: input.reverse ?? false,
    width: optionalNonNegativeInt(`${kind}.width`, input.width),
    height: optionalNonNegativeInt(`${kind}.height`, input.height),
    columns,
    aspectRatio,
  });
}

export function computeGroupLayout(policy: LayoutPolicy, items: readonly LayoutItem[]): GroupLayout {
  if (policy.kind === "grid") return computeGridLayout(policy, items);
  return computeStackLayout(policy.kind, policy, items);
}

/** Children that take part in the group's flow. */
export function groupMembers(group: Box): Box[] {
  return group.children.filter((c) => c.visible && c.anchor === null);
}

/**
 * Place `group`'s members and size the group. Touches only the group and its
 * members. Returns true when the group's own size changed.
 */
export function recomputeGroup(group: Box, policy: LayoutPolicy): boolean {
  const members = groupMembers(group);
  const items: LayoutItem[] = members.map((m) => ({
    w: m.naturalSize.w,
    h: m.naturalSize.h,
    stretchable: m.layout === null,
  }));
  const result = computeGroupLayout(policy, items);

  members.forEach((m, i) => {
    const r = result.rects[i];
    if (r !== undefined) m.internal_applyLayoutRect(r, false);
  });

  const own = group.rect;
  const sizeChanged = own.w !== result.size.w || own.h !== result.size.h;
  group.internal_applyLayoutRect({ x: own.x, y: own.y, w: result.size.w, h: result.size.h }, true);
  return sizeChanged;
}

/**
 * Recompute every dirty group under `root`, deepest first.
 * Returns the number of groups recomputed.
 */
export function flushDirtyGroups(root: Box): number {
  // Bucket dirty groups by depth; ancestors dirtied mid-flush land in a
  // shallower bucket that has not been drained yet.
  const buckets: Box[][] = [];
  const depthOf = new Map<Box, number>();
  let maxDepth = -1;

  const stack: Array<{ box: Box; depth: number }> = [{ box: root, depth: 0 }];
  while (stack.length > 0) {
    const top = stack.pop();
    if (top === undefined) break;
    const { box, depth } = top;
    depthOf.set(box, depth);
    if (box.layoutDirty) {
      (buckets[depth] ??= []).push(box);
      if (depth > maxDepth) maxDepth = depth;
    }
    for (const c of box.children) stack.push({ box: c, depth: depth + 1 });
  }

  let count = 0;
  for (let d = maxDepth; d >= 0; d--) {
    const bucket = buckets[d];
    if (bucket === undefined) continue;
    for (let i = 0; i < bucket.length; i++) {
      const group = bucket[i];
      if (group === undefined || !group.layoutDirty) continue;
      const sizeChanged = group.recompute();
      count++;
      if (!sizeChanged) continue;
      for (let a = group.parent; a !== null; a = a.parent) {
        if (a.layout === null) continue;
        if (!a.layoutDirty) {
          a.internal_markLayoutDirty();
          const ad = depthOf.get(a);
          if (ad !== undefined) (buckets[ad] ??= []).push(a);
        }
        break;
      }
    }
  }
  return count;
}
