import { assert, createCallLog, describe, test } from "@boxweave/testkit";
import { createSurface } from "../../app/surface.js";
import type { BoxError } from "../../errors.js";
import { type KeyEvent, MOD_CTRL, keyDown, pointerMove, pointerPress, pointerRelease } from "../../events.js";
import { createKeyMap } from "../../keybindings/keyMap.js";
import { Box } from "../box.js";

function setup() {
  const log = createCallLog();
  const errors: BoxError[] = [];
  const s = createSurface({
    screen: { w: 200, h: 100 },
    config: { onError: (e) => errors.push(e) },
  });
  const left = new Box({
    id: "left",
    x: 0,
    y: 0,
    w: 50,
    h: 50,
    onClick: log.fn("click:left"),
    onRelease: log.fn("release:left"),
    onHover: log.fn("hover:left"),
    onUnhover: log.fn("unhover:left"),
  });
  const right = new Box({ id: "right", x: 100, y: 0, w: 50, h: 50, onClick: log.fn("click:right") });
  s.root.addChild(left).addChild(right);
  return { s, log, errors, left, right };
}

describe("pointer routing", () => {
  test("a click needs press and release on the same box", () => {
    const { s, log } = setup();
    s.dispatch(pointerPress(10, 10));
    s.dispatch(pointerRelease(110, 10));
    assert.deepEqual(log.entries(), []);
    s.dispatch(pointerPress(10, 10));
    s.dispatch(pointerRelease(12, 12));
    assert.deepEqual(log.entries(), ["release:left", "click:left"]);
  });

  test("handlers bubble until one consumes", () => {
    const { s, log } = setup();
    const child = new Box({ id: "child", x: 5, y: 5, w: 10, h: 10, onPress: log.fn("press:child") });
    const parent = new Box({
      id: "parent",
      x: 60,
      y: 60,
      w: 30,
      h: 30,
      children: [child],
      onPress: () => {
        log.push("press:parent");
        return true;
      },
    });
    s.root.addChild(parent);
    const r = s.dispatch(pointerPress(70, 70));
    assert.equal(r.route, "box");
    assert.equal(r.target, child);
    assert.equal(r.consumedBy, parent);
    assert.deepEqual(log.entries(), ["press:child", "press:parent"]);
  });

  test("nothing hit is not an error", () => {
    const { s, errors } = setup();
    const r = s.dispatch(pointerPress(250, 250));
    assert.deepEqual(r, { handled: false, target: null, consumedBy: null, route: "unhandled" });
    assert.deepEqual(errors, []);
  });

  test("hover and unhover follow the pointer", () => {
    const { s, log, left } = setup();
    s.dispatch(pointerMove(10, 10));
    s.dispatch(pointerMove(20, 10));
    assert.equal(s.hovered(), left);
    s.dispatch(pointerMove(80, 10));
    assert.deepEqual(log.entries(), ["hover:left", "unhover:left"]);
    assert.equal(s.hovered(), s.root);
  });

  test("another button's release keeps the pending click", () => {
    const { s, log } = setup();
    s.dispatch(pointerPress(10, 10));
    s.dispatch(pointerRelease(10, 10, "right"));
    s.dispatch(pointerRelease(12, 12));
    assert.deepEqual(log.entries(), ["release:left", "release:left", "click:left"]);
  });

  test("a release of the unpressed button never clicks", () => {
    const { s, log } = setup();
    s.dispatch(pointerPress(10, 10, "right"));
    s.dispatch(pointerRelease(10, 10));
    assert.deepEqual(log.entries(), ["release:left"]);
  });

  test("a throwing handler goes to the error sink", () => {
    const { s, errors, right } = setup();
    right.on("onPress", () => {
      throw new Error("boom");
    });
    const r = s.dispatch(pointerPress(110, 10));
    assert.equal(r.route, "unhandled");
    assert.equal(errors.length, 1);
    assert.equal(errors[0]?.code, "BOX_USER_CODE_THROW");
    assert.equal(errors[0]?.message, "right.onPress threw: Error: boom");
  });
});

describe("key routing", () => {
  test("keys go to the focused box and bubble", () => {
    const { s, log } = setup();
    const field = new Box({
      id: "field",
      w: 10,
      h: 10,
      focusable: true,
      onKey: log.fn("key:field", (_b: Box, e: KeyEvent) => e.key),
    });
    const form = new Box({
      id: "form",
      x: 0,
      y: 60,
      w: 40,
      h: 40,
      children: [field],
      onKey: (_b, e) => e.key === "Enter",
    });
    s.root.addChild(form);
    s.requestFocus(field);
    const r = s.dispatch(keyDown("Enter"));
    assert.equal(r.route, "box");
    assert.equal(r.target, field);
    assert.equal(r.consumedBy, form);
    assert.equal(s.dispatch(keyDown("x")).route, "unhandled");
    assert.deepEqual(log.entries(), ["key:field:Enter", "key:field:x"]);
  });

  test("keys with nothing focused are unhandled", () => {
    const { s } = setup();
    assert.deepEqual(s.dispatch(keyDown("a")), { handled: false, target: null, consumedBy: null, route: "unhandled" });
  });

  function modalScene(closeOnEscape?: boolean) {
    const { s } = setup();
    const opener = new Box({ id: "opener", x: 60, y: 0, w: 20, h: 20, focusable: true });
    const dlg = new Box({ id: "dlg", x: 0, y: 60, w: 40, h: 40, focusable: true });
    s.root.addChild(opener).addChild(dlg);
    s.requestFocus(opener);
    s.openModal(dlg, closeOnEscape === undefined ? {} : { closeOnEscape });
    return { s, opener, dlg };
  }

  test("Escape pops a modal layer that has no close handler", () => {
    const { s, opener, dlg } = modalScene();
    assert.equal(s.focused(), dlg);
    const r = s.dispatch(keyDown("Escape"));
    assert.equal(r.route, "box");
    assert.equal(r.target, dlg);
    assert.equal(r.consumedBy, dlg);
    assert.equal(s.activeModal(), null);
    assert.equal(s.focused(), opener);
  });

  test("Escape leaves a layer opened with closeOnEscape off", () => {
    const { s, dlg } = modalScene(false);
    assert.equal(s.dispatch(keyDown("Escape")).route, "unhandled");
    assert.equal(s.activeModal(), dlg);
  });

  function undoMap(log: { push: (entry: string) => void }) {
    return createKeyMap([
      {
        chords: ["ctrl+z"],
        onPress: () => {
          log.push("undo");
          return true;
        },
      },
    ]);
  }

  test("surface key maps see keys no box consumed", () => {
    const { s, log } = setup();
    const remove = s.addKeyMap(undoMap(log));
    assert.deepEqual(s.dispatch(keyDown("z", MOD_CTRL)), {
      handled: true,
      target: null,
      consumedBy: null,
      route: "keyMap",
    });
    remove();
    assert.equal(s.dispatch(keyDown("z", MOD_CTRL)).route, "unhandled");
    assert.deepEqual(log.entries(), ["undo"]);
  });

  test("surface key maps are skipped while a modal layer is open", () => {
    const { s } = modalScene();
    const log = createCallLog();
    s.addKeyMap(undoMap(log));
    assert.equal(s.dispatch(keyDown("z", MOD_CTRL)).route, "unhandled");
    assert.deepEqual(log.entries(), []);
  });

  test("a key map can serve as a box's key handler", () => {
    const { s, log } = setup();
    const editor = new Box({ id: "editor", x: 0, y: 60, w: 30, h: 30, focusable: true, onKey: undoMap(log).onKey });
    s.root.addChild(editor);
    s.requestFocus(editor);
    const r = s.dispatch(keyDown("z", MOD_CTRL));
    assert.equal(r.route, "box");
    assert.equal(r.consumedBy, editor);
    assert.deepEqual(log.entries(), ["undo"]);
  });
});
