import { assert, describe, test } from "@boxweave/testkit";
import { chooseGridColumns } from "../grid.js";
import { computeGroupLayout, resolveLayoutPolicy } from "../group.js";
import type { LayoutItem } from "../types.js";

const square = (n: number): LayoutItem[] =>
  Array.from({ length: n }, () => ({ w: 10, h: 10, stretchable: true }));

describe("grid layout", () => {
  test("aspect ratio 1 picks the squarest arrangement", () => {
    assert.equal(chooseGridColumns(square(4), 0, 1), 2);
    const out = computeGroupLayout(resolveLayoutPolicy({ kind: "grid" }), square(4));
    assert.deepEqual(out.size, { w: 20, h: 20 });
    assert.deepEqual(
      out.rects.map((r) => [r.x, r.y]),
      [
        [0, 0],
        [10, 0],
        [0, 10],
        [10, 10],
      ],
    );
  });

  test("a wide ratio picks more columns", () => {
    assert.equal(chooseGridColumns(square(4), 0, 4), 4);
  });

  test("ties keep fewer columns", () => {
    // 1 column: 10/20 = 0.5, 2 columns: 20/10 = 2; both 0.75 away from 1.25.
    assert.equal(chooseGridColumns(square(2), 0, 1.25), 1);
  });

  test("tracks take the largest member per column and row", () => {
    const out = computeGroupLayout(resolveLayoutPolicy({ kind: "grid", columns: 3, spacing: 2, padding: 1 }), [
      { w: 10, h: 5, stretchable: true },
      { w: 20, h: 8, stretchable: true },
      { w: 6, h: 6, stretchable: true },
      { w: 4, h: 4, stretchable: true },
    ]);
    assert.deepEqual(out.size, { w: 42, h: 16 });
    assert.deepEqual(out.rects, [
      { x: 1, y: 1, w: 10, h: 5 },
      { x: 13, y: 1, w: 20, h: 8 },
      { x: 35, y: 1, w: 6, h: 6 },
      { x: 1, y: 11, w: 4, h: 4 },
    ]);
  });

  test("stretch fills the cell", () => {
    const out = computeGroupLayout(resolveLayoutPolicy({ kind: "grid", columns: 2, crossAlign: "stretch" }), [
      { w: 10, h: 4, stretchable: true },
      { w: 6, h: 8, stretchable: true },
    ]);
    assert.deepEqual(out.rects, [
      { x: 0, y: 0, w: 10, h: 8 },
      { x: 10, y: 0, w: 6, h: 8 },
    ]);
  });
});
