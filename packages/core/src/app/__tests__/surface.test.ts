import { assert, createCallLog, describe, test } from "@boxweave/testkit";
import { BoxError, NotFocusableError } from "../../errors.js";
import { keyDown, pointerPress, pointerRelease } from "../../events.js";
import { Box } from "../../runtime/box.js";
import { createSurface } from "../surface.js";

describe("Surface", () => {
  test("rejects an invalid screen", () => {
    assert.throws(
      () => createSurface({ screen: { w: -1, h: 10 } }),
      (e: unknown) =>
        e instanceof BoxError &&
        e.code === "BOX_INVALID_CONFIG" &&
        e.message === "screen must have non-negative integer w and h",
    );
  });

  test("the draw list follows paint order and skips hidden subtrees", () => {
    const s = createSurface({ screen: { w: 200, h: 100 }, root: { fill: "bg" } });
    const ship = new Box({ x: 5, y: 5, w: 8, h: 8, texture: "ship", fill: "unused" });
    const panel = new Box({ x: 10, y: 10, w: 50, h: 30, fill: "panel", label: "Hi", children: [ship] });
    const ghost = new Box({ w: 5, h: 5, fill: "ghost", visible: false });
    s.root.addChild(panel).addChild(ghost);
    assert.deepEqual(
      s.drawList().map((d) => [d.kind, d.z, d.rect]),
      [
        ["rect", 0, { x: 0, y: 0, w: 200, h: 100 }],
        ["rect", 1, { x: 10, y: 10, w: 50, h: 30 }],
        ["text", 2, { x: 10, y: 10, w: 50, h: 30 }],
        ["sprite", 3, { x: 15, y: 15, w: 8, h: 8 }],
      ],
    );
  });

  test("tick flushes layout, drains events in order and draws", () => {
    const s = createSurface({ screen: { w: 200, h: 100 } });
    const column = new Box({
      layout: { kind: "column", spacing: 4 },
      children: [new Box({ w: 10, h: 10 }), new Box({ w: 20, h: 10 })],
    });
    s.root.addChild(column);
    s.enqueue(keyDown("a"));
    s.enqueue(keyDown("b"));
    assert.equal(s.pending(), 2);
    const report = s.tick({ frameId: 7, timeMs: 112, dtMs: 16 });
    assert.equal(report.frame?.frameId, 7);
    assert.equal(report.results.length, 2);
    assert.equal(report.layoutRecomputed, 1);
    assert.equal(s.pending(), 0);
    assert.deepEqual(column.rect, { x: 0, y: 0, w: 20, h: 24 });
    assert.equal(s.tick().layoutRecomputed, 0);
  });

  test("a box added by a handler is hit-testable on the next event", () => {
    const s = createSurface({ screen: { w: 200, h: 100 } });
    const added = new Box({ id: "added", x: 100, y: 0, w: 20, h: 20, onPress: () => true });
    s.root.addChild(
      new Box({
        w: 20,
        h: 20,
        onClick: () => {
          s.root.addChild(added);
        },
      }),
    );
    s.enqueue(pointerPress(5, 5));
    s.enqueue(pointerRelease(5, 5));
    s.enqueue(pointerPress(105, 5));
    const report = s.tick();
    assert.equal(report.results[2]?.consumedBy, added);
  });

  test("resize follows the screen", () => {
    const s = createSurface({ screen: { w: 200, h: 100 } });
    s.resize({ w: 320, h: 240 });
    assert.deepEqual(s.root.rect, { x: 0, y: 0, w: 320, h: 240 });
    assert.deepEqual(s.screen(), { x: 0, y: 0, w: 320, h: 240 });
  });

  test("boxes from elsewhere are rejected", () => {
    const s = createSurface({ screen: { w: 10, h: 10 } });
    assert.throws(
      () => s.absoluteRect(new Box({ id: "stray" })),
      (e: unknown) => e instanceof BoxError && e.code === "BOX_FOREIGN_SURFACE" && e.message === "box#stray is not in this surface",
    );
  });

  test("an anchor to a box outside the surface falls back to its parent and warns once", () => {
    const log = createCallLog();
    const s = createSurface({ screen: { w: 100, h: 100 }, config: { devMode: true, warn: log.fn("warn", (m: string) => m) } });
    const loose = new Box({ id: "loose", x: 50, y: 50, w: 10, h: 10 });
    const tip = new Box({ id: "tip", x: 3, y: 4, w: 5, h: 5, anchor: { ref: loose } });
    s.root.addChild(tip);
    assert.deepEqual(s.absoluteRect(tip), { x: 3, y: 4, w: 5, h: 5 });
    tip.setPosition(6, 4);
    assert.deepEqual(s.absoluteRect(tip), { x: 6, y: 4, w: 5, h: 5 });
    assert.deepEqual(log.entries(), [
      "warn:[boxweave][layout] box#tip is anchored to box#loose, which is not in this surface",
    ]);
  });
});

describe("modal layers", () => {
  function setup() {
    const s = createSurface({ screen: { w: 200, h: 100 } });
    const outside = new Box({ id: "outside", w: 20, h: 20, focusable: true, onPress: () => true });
    const ok = new Box({ id: "ok", x: 5, y: 5, w: 10, h: 10, focusable: true });
    const dlg = new Box({ id: "dlg", x: 50, y: 20, w: 60, h: 40, children: [ok] });
    s.root.addChild(outside).addChild(dlg);
    s.requestFocus(outside);
    return { s, outside, ok, dlg };
  }

  test("confines hit testing and focus to the layer", () => {
    const { s, ok, dlg } = setup();
    s.openModal(dlg);
    assert.equal(s.activeModal(), dlg);
    assert.equal(s.focused(), ok);
    assert.equal(s.hitTest(5, 5), null);
    assert.equal(s.hitTest(60, 30), ok);
    assert.equal(s.dispatch(pointerPress(5, 5)).route, "blocked");
    assert.throws(
      () => s.requestFocus(s.root.children[0] ?? ok),
      (e: unknown) => e instanceof NotFocusableError && e.reason === "outside-modal",
    );
  });

  test("Escape runs onClose; closing restores focus", () => {
    const { s, outside, dlg } = setup();
    s.openModal(dlg, { onClose: () => s.closeModal(dlg) });
    const r = s.dispatch(keyDown("Escape"));
    assert.equal(r.route, "box");
    assert.equal(r.consumedBy, dlg);
    assert.equal(s.activeModal(), null);
    assert.equal(s.focused(), outside);
    assert.equal(s.closeModal(dlg), false);
  });

  test("closeOnEscape false keeps the layer open", () => {
    const { s, dlg } = setup();
    s.openModal(dlg, { closeOnEscape: false, onClose: () => s.closeModal(dlg) });
    assert.equal(s.dispatch(keyDown("Escape")).route, "unhandled");
    assert.equal(s.activeModal(), dlg);
  });

  test("destroying the layer box pops it and restores focus", () => {
    const { s, outside, dlg } = setup();
    s.openModal(dlg);
    dlg.destroy();
    assert.equal(s.activeModal(), null);
    assert.equal(s.focused(), outside);
    assert.equal(s.dispatch(pointerPress(5, 5)).consumedBy, outside);
  });
});
