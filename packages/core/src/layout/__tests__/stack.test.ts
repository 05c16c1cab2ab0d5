import { assert, describe, test } from "@boxweave/testkit";
import { BoxError } from "../../errors.js";
import { type LayoutPolicyInput, computeGroupLayout, resolveLayoutPolicy } from "../group.js";
import type { LayoutItem } from "../types.js";

function item(w: number, h: number, stretchable = true): LayoutItem {
  return { w, h, stretchable };
}

function layout(input: LayoutPolicyInput, items: readonly LayoutItem[]) {
  return computeGroupLayout(resolveLayoutPolicy(input), items);
}

describe("row/column placement", () => {
  test("row packs children left to right with spacing", () => {
    const out = layout({ kind: "row", spacing: 5 }, [item(10, 5), item(20, 10), item(30, 5)]);
    assert.deepEqual(out.size, { w: 70, h: 10 });
    assert.deepEqual(
      out.rects.map((r) => r.x),
      [0, 15, 40],
    );
  });

  test("cross-axis center rounds down", () => {
    const out = layout({ kind: "row", spacing: 5, crossAlign: "center" }, [
      item(10, 5),
      item(20, 10),
      item(30, 5),
    ]);
    assert.deepEqual(
      out.rects.map((r) => r.y),
      [2, 0, 2],
    );
  });

  test("main-axis center uses the floor of half the excess", () => {
    const out = layout({ kind: "row", spacing: 5, width: 100, align: "center" }, [item(10, 4), item(20, 4)]);
    assert.deepEqual(
      out.rects.map((r) => r.x),
      [32, 47],
    );
  });

  test("justify spreads the excess over the gaps", () => {
    const out = layout({ kind: "column", height: 100, align: "justify" }, [
      item(4, 10),
      item(4, 10),
      item(4, 10),
    ]);
    assert.deepEqual(
      out.rects.map((r) => r.y),
      [0, 45, 90],
    );
    assert.deepEqual(out.size, { w: 4, h: 100 });
  });

  test("reverse mirrors the main axis", () => {
    const out = layout({ kind: "row", reverse: true }, [item(10, 4), item(20, 4)]);
    assert.deepEqual(
      out.rects.map((r) => r.x),
      [20, 0],
    );
  });

  test("stretch fills the lane except for non-stretchable members", () => {
    const out = layout({ kind: "row", crossAlign: "stretch" }, [
      item(10, 10),
      item(10, 4, false),
      item(10, 6),
    ]);
    assert.deepEqual(
      out.rects.map((r) => r.h),
      [10, 4, 10],
    );
  });

  test("padding offsets members and grows the group", () => {
    const out = layout({ kind: "row", padding: { top: 1, right: 2, bottom: 3, left: 4 } }, [item(10, 5)]);
    assert.deepEqual(out.size, { w: 16, h: 9 });
    assert.deepEqual(out.rects[0], { x: 4, y: 1, w: 10, h: 5 });
  });

  test("an empty group is as large as its padding", () => {
    const out = layout({ kind: "column", padding: 3 }, []);
    assert.deepEqual(out.size, { w: 6, h: 6 });
    assert.deepEqual(out.rects, []);
  });
});

describe("resolveLayoutPolicy", () => {
  test("names the offending field", () => {
    assert.throws(
      () => resolveLayoutPolicy({ kind: "row", spacing: -1 }),
      (e: unknown) =>
        e instanceof BoxError && e.code === "BOX_INVALID_PROPS" && e.message === "row.spacing must be an integer >= 0",
    );
    assert.throws(
      () => resolveLayoutPolicy({ kind: "column", padding: { left: 1.5 } }),
      (e: unknown) => e instanceof BoxError && e.message === "column.padding.left must be an integer >= 0",
    );
    assert.throws(
      () => resolveLayoutPolicy({ kind: "grid", columns: 0 }),
      (e: unknown) => e instanceof BoxError && e.message === "grid.columns must be an integer >= 1",
    );
  });

  test("defaults", () => {
    const p = resolveLayoutPolicy({ kind: "grid" });
    assert.equal(p.align, "start");
    assert.equal(p.crossAlign, "start");
    assert.equal(p.columns, null);
    assert.equal(p.aspectRatio, 1);
  });
});
