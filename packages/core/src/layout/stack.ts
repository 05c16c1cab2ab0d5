/**
 * packages/core/src/layout/stack.ts — Row/column placement.
 *
 * Pure: takes measured member sizes and returns member rects relative to the
 * group's top-left plus the group's own size. Same input, same output.
 */

import { distributeInteger } from "./distributeInteger.js";
import type { Align, Axis, CrossAlign, GroupLayout, LayoutItem, Rect, Spacing } from "./types.js";

export type StackPolicy = Readonly<{
  spacing: number;
  padding: Spacing;
  align: Align;
  crossAlign: CrossAlign;
  reverse: boolean;
  width: number | null;
  height: number | null;
}>;

function mainOf(axis: Axis, item: LayoutItem): number {
  return axis === "row" ? item.w : item.h;
}

function crossOf(axis: Axis, item: LayoutItem): number {
  return axis === "row" ? item.h : item.w;
}

/** Offset of each item along the main axis, before padding and before `reverse`. */
function mainOffsets(
  sizes: readonly number[],
  spacing: number,
  align: Align,
  excess: number,
): number[] {
  const n = sizes.length;
  let lead = 0;
  let gaps: number[] = [];
  switch (align) {
    case "end":
      lead = excess;
      break;
    case "center":
      lead = Math.floor(excess / 2);
      break;
    case "justify":
      if (n > 1) gaps = distributeInteger(excess, new Array<number>(n - 1).fill(1));
      break;
    case "start":
      break;
  }

  const out: number[] = [];
  let cursor = lead;
  for (let i = 0; i < n; i++) {
    out.push(cursor);
    cursor += (sizes[i] ?? 0) + spacing + (gaps[i] ?? 0);
  }
  return out;
}

export function crossPlacement(
  align: CrossAlign,
  lane: number,
  size: number,
  stretchable: boolean,
): Readonly<{ offset: number; size: number }> {
  switch (align) {
    case "stretch":
      return stretchable ? { offset: 0, size: lane } : { offset: 0, size };
    case "end":
      return { offset: lane - size, size };
    case "center":
      return { offset: Math.floor((lane - size) / 2), size };
    case "start":
      return { offset: 0, size };
  }
}

export function computeStackLayout(
  axis: Axis,
  policy: StackPolicy,
  items: readonly LayoutItem[],
): GroupLayout {
  const pad = policy.padding;
  const padMainStart = axis === "row" ? pad.left : pad.top;
  const padMainEnd = axis === "row" ? pad.right : pad.bottom;
  const padCrossStart = axis === "row" ? pad.top : pad.left;
  const padCrossEnd = axis === "row" ? pad.bottom : pad.right;
  const fixedMain = axis === "row" ? policy.width : policy.height;
  const fixedCross = axis === "row" ? policy.height : policy.width;

  const n = items.length;
  const mainSizes = items.map((it) => mainOf(axis, it));
  const mainContent = mainSizes.reduce((a, b) => a + b, 0) + (n > 1 ? policy.spacing * (n - 1) : 0);
  let crossContent = 0;
  for (const it of items) crossContent = Math.max(crossContent, crossOf(axis, it));

  const outerMain = fixedMain ?? padMainStart + mainContent + padMainEnd;
  const outerCross = fixedCross ?? padCrossStart + crossContent + padCrossEnd;
  const innerMain = Math.max(0, outerMain - padMainStart - padMainEnd);
  const innerCross = Math.max(0, outerCross - padCrossStart - padCrossEnd);
  const excess = Math.max(0, innerMain - mainContent);

  const offsets = mainOffsets(mainSizes, policy.spacing, policy.align, excess);

  const rects: Rect[] = [];
  for (let i = 0; i < n; i++) {
    const it = items[i];
    if (it === undefined) continue;
    const mainSize = mainSizes[i] ?? 0;
    const forward = offsets[i] ?? 0;
    const mainPos = policy.reverse ? innerMain - forward - mainSize : forward;
    const cross = crossPlacement(policy.crossAlign, innerCross, crossOf(axis, it), it.stretchable);

    rects.push(
      axis === "row"
        ? { x: padMainStart + mainPos, y: padCrossStart + cross.offset, w: mainSize, h: cross.size }
        : { x: padCrossStart + cross.offset, y: padMainStart + mainPos, w: cross.size, h: mainSize },
    );
  }

  return {
    size: axis === "row" ? { w: outerMain, h: outerCross } : { w: outerCross, h: outerMain },
    rects,
  };
}
