/**
 * packages/core/src/layout/grid.ts — Row-major grid placement.
 *
 * Column width is the widest member in the column, row height the tallest in the
 * row. With an aspect ratio instead of a column count, the column count whose
 * content box w/h is closest to the ratio wins (fewer columns on ties).
 */

import { crossPlacement } from "./stack.js";
import type { CrossAlign, GroupLayout, LayoutItem, Rect, Size, Spacing } from "./types.js";

export type GridPolicy = Readonly<{
  spacing: number;
  padding: Spacing;
  crossAlign: CrossAlign;
  width: number | null;
  height: number | null;
  columns: number | null;
  aspectRatio: number | null;
}>;

type Tracks = Readonly<{ colWidths: number[]; rowHeights: number[] }>;

function measureTracks(items: readonly LayoutItem[], columns: number): Tracks {
  const usedCols = Math.min(columns, items.length);
  const rows = usedCols === 0 ? 0 : Math.ceil(items.length / usedCols);
  const colWidths = new Array<number>(usedCols).fill(0);
  const rowHeights = new Array<number>(rows).fill(0);
  items.forEach((it, i) => {
    const c = i % usedCols;
    const r = Math.floor(i / usedCols);
    colWidths[c] = Math.max(colWidths[c] ?? 0, it.w);
    rowHeights[r] = Math.max(rowHeights[r] ?? 0, it.h);
  });
  return { colWidths, rowHeights };
}

function trackTotal(tracks: readonly number[], spacing: number): number {
  if (tracks.length === 0) return 0;
  return tracks.reduce((a, b) => a + b, 0) + spacing * (tracks.length - 1);
}

function contentSize(tracks: Tracks, spacing: number): Size {
  return { w: trackTotal(tracks.colWidths, spacing), h: trackTotal(tracks.rowHeights, spacing) };
}

export function chooseGridColumns(
  items: readonly LayoutItem[],
  spacing: number,
  aspectRatio: number,
): number {
  const n = items.length;
  if (n <= 1) return 1;
  let best = 1;
  let bestDiff = Number.POSITIVE_INFINITY;
  for (let c = 1; c <= n; c++) {
    const size = contentSize(measureTracks(items, c), spacing);
    if (size.h <= 0) continue;
    const diff = Math.abs(size.w / size.h - aspectRatio);
    if (diff < bestDiff) {
      bestDiff = diff;
      best = c;
    }
  }
  return best;
}

export function computeGridLayout(policy: GridPolicy, items: readonly LayoutItem[]): GroupLayout {
  const columns = Math.max(
    1,
    policy.columns ?? chooseGridColumns(items, policy.spacing, policy.aspectRatio ?? 1),
  );
  const tracks = measureTracks(items, columns);
  const content = contentSize(tracks, policy.spacing);
  const pad = policy.padding;

  const colStarts: number[] = [];
  let x = pad.left;
  for (const w of tracks.colWidths) {
    colStarts.push(x);
    x += w + policy.spacing;
  }
  const rowStarts: number[] = [];
  let y = pad.top;
  for (const h of tracks.rowHeights) {
    rowStarts.push(y);
    y += h + policy.spacing;
  }

  const usedCols = tracks.colWidths.length;
  const rects: Rect[] = [];
  items.forEach((it, i) => {
    const c = i % usedCols;
    const r = Math.floor(i / usedCols);
    const cellW = tracks.colWidths[c] ?? 0;
    const cellH = tracks.rowHeights[r] ?? 0;
    const px = crossPlacement(policy.crossAlign, cellW, it.w, it.stretchable);
    const py = crossPlacement(policy.crossAlign, cellH, it.h, it.stretchable);
    rects.push({
      x: (colStarts[c] ?? 0) + px.offset,
      y: (rowStarts[r] ?? 0) + py.offset,
      w: px.size,
      h: py.size,
    });
  });

  return {
    size: {
      w: policy.width ?? pad.left + content.w + pad.right,
      h: policy.height ?? pad.top + content.h + pad.bottom,
    },
    rects,
  };
}
