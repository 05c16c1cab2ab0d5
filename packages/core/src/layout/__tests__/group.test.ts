import { assert, describe, test } from "@boxweave/testkit";
import { Box } from "../../runtime/box.js";
import { type LayoutPolicyInput, flushDirtyGroups, groupMembers, recomputeGroup, resolveLayoutPolicy } from "../group.js";

function build() {
  const a = new Box({ id: "a", w: 5, h: 5 });
  const b = new Box({ id: "b", w: 7, h: 3 });
  const c = new Box({ id: "c", w: 10, h: 4 });
  const inner = new Box({ id: "inner", layout: { kind: "row", spacing: 1 }, children: [a, b] });
  const outer = new Box({ id: "outer", layout: { kind: "column", spacing: 2 }, children: [inner, c] });
  return { a, b, c, inner, outer };
}

describe("flushDirtyGroups", () => {
  test("recomputes nested groups deepest first", () => {
    const { a, b, c, inner, outer } = build();
    assert.equal(flushDirtyGroups(outer), 2);
    assert.deepEqual(a.rect, { x: 0, y: 0, w: 5, h: 5 });
    assert.deepEqual(b.rect, { x: 6, y: 0, w: 7, h: 3 });
    assert.deepEqual(inner.rect, { x: 0, y: 0, w: 13, h: 5 });
    assert.deepEqual(c.rect, { x: 0, y: 7, w: 10, h: 4 });
    assert.deepEqual(outer.rect, { x: 0, y: 0, w: 13, h: 11 });
    assert.equal(flushDirtyGroups(outer), 0);
  });

  test("a size change propagates to the enclosing group", () => {
    const { a, b, inner, outer } = build();
    flushDirtyGroups(outer);
    a.setSize(9, 5);
    assert.equal(inner.layoutDirty, true);
    assert.equal(outer.layoutDirty, false);
    assert.equal(flushDirtyGroups(outer), 2);
    assert.deepEqual(b.rect, { x: 10, y: 0, w: 7, h: 3 });
    assert.deepEqual(outer.rect, { x: 0, y: 0, w: 17, h: 11 });
  });

  test("position-only changes leave layout clean", () => {
    const { c, outer } = build();
    flushDirtyGroups(outer);
    c.setPosition(3, 3);
    assert.equal(outer.layoutDirty, false);
    assert.equal(flushDirtyGroups(outer), 0);
  });

  test("hidden and anchored children take no space", () => {
    const { a, b, inner, outer } = build();
    const tag = new Box({ id: "tag", w: 50, h: 50, anchor: { target: "top-right" } });
    inner.addChild(tag);
    flushDirtyGroups(outer);
    assert.deepEqual(
      groupMembers(inner).map((m) => m.id),
      ["a", "b"],
    );
    assert.deepEqual(inner.rect, { x: 0, y: 0, w: 13, h: 5 });

    b.setVisible(false);
    flushDirtyGroups(outer);
    assert.deepEqual(inner.rect, { x: 0, y: 0, w: 5, h: 5 });
    assert.deepEqual(outer.rect, { x: 0, y: 0, w: 10, h: 11 });
    assert.deepEqual(a.rect, { x: 0, y: 0, w: 5, h: 5 });
  });

  test("recomputing an unchanged row yields identical rects", () => {
    const input: LayoutPolicyInput = {
      kind: "row",
      spacing: 2,
      padding: 3,
      align: "justify",
      crossAlign: "center",
      width: 40,
    };
    const kids = [new Box({ id: "p", w: 5, h: 9 }), new Box({ id: "q", w: 7, h: 3 }), new Box({ id: "r", w: 4, h: 6 })];
    const row = new Box({ id: "row", layout: input, children: kids });
    const policy = resolveLayoutPolicy(input);

    recomputeGroup(row, policy);
    const first = kids.map((k) => k.rect);
    const firstSize = row.rect;
    assert.equal(recomputeGroup(row, policy), false);
    assert.deepEqual(
      kids.map((k) => k.rect),
      first,
    );
    assert.deepEqual(row.rect, firstSize);
  });
});
