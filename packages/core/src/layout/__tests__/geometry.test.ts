import { assert, describe, test } from "@boxweave/testkit";
import {
  alignToPoint,
  anchorOffset,
  boundingRect,
  clampRectWithin,
  containsPoint,
  intersectRect,
  overlapArea,
  rect,
  rectFromPoints,
  resolveSpacing,
} from "../geometry.js";

describe("rect helpers", () => {
  test("rect clamps negative sizes to zero", () => {
    assert.deepEqual(rect(5, 6, -3, 4), { x: 5, y: 6, w: 0, h: 4 });
  });

  test("containsPoint is half-open", () => {
    const r = rect(10, 10, 20, 20);
    assert.equal(containsPoint(r, 10, 10), true);
    assert.equal(containsPoint(r, 29, 29), true);
    assert.equal(containsPoint(r, 30, 15), false);
    assert.equal(containsPoint(r, 15, 30), false);
  });

  test("intersectRect returns null for edge-touching rects", () => {
    assert.equal(intersectRect(rect(0, 0, 10, 10), rect(10, 0, 10, 10)), null);
    assert.deepEqual(intersectRect(rect(0, 0, 10, 10), rect(5, 6, 10, 10)), { x: 5, y: 6, w: 5, h: 4 });
  });

  test("overlapArea", () => {
    assert.equal(overlapArea(rect(0, 0, 10, 10), rect(5, 6, 10, 10)), 20);
    assert.equal(overlapArea(rect(0, 0, 10, 10), rect(50, 50, 1, 1)), 0);
  });

  test("rectFromPoints normalizes either drag direction", () => {
    assert.deepEqual(rectFromPoints({ x: 50, y: 40 }, { x: 10, y: 0 }), { x: 10, y: 0, w: 40, h: 40 });
  });

  test("boundingRect", () => {
    assert.equal(boundingRect([]), null);
    assert.deepEqual(boundingRect([rect(0, 5, 10, 10), rect(20, 0, 5, 5)]), { x: 0, y: 0, w: 25, h: 15 });
  });

  test("clampRectWithin shifts inside and pins oversized rects to the start edge", () => {
    const bounds = rect(0, 0, 100, 100);
    assert.deepEqual(clampRectWithin(rect(90, -5, 20, 20), bounds), { x: 80, y: 0, w: 20, h: 20 });
    assert.deepEqual(clampRectWithin(rect(30, 30, 150, 10), bounds), { x: 0, y: 30, w: 150, h: 10 });
  });

  test("resolveSpacing", () => {
    assert.deepEqual(resolveSpacing(3), { top: 3, right: 3, bottom: 3, left: 3 });
    assert.deepEqual(resolveSpacing({ left: 2 }), { top: 0, right: 0, bottom: 0, left: 2 });
  });
});

describe("anchor points", () => {
  test("centers round down", () => {
    assert.deepEqual(anchorOffset("center", { w: 5, h: 7 }), { x: 2, y: 3 });
    assert.deepEqual(anchorOffset("bottom-right", { w: 5, h: 7 }), { x: 5, y: 7 });
  });

  test("alignToPoint puts the self point on the target point plus offset", () => {
    const p = alignToPoint({ w: 20, h: 10 }, "top-right", rect(100, 50, 40, 30), "top-right", { x: -2, y: 2 });
    assert.deepEqual(p, { x: 118, y: 52 });
  });

  test("center on center", () => {
    const p = alignToPoint({ w: 10, h: 10 }, "center", rect(0, 0, 100, 60), "center", { x: 0, y: 0 });
    assert.deepEqual(p, { x: 45, y: 25 });
  });
});
