import { assert, describe, test } from "@boxweave/testkit";
import { createSurface } from "../../app/surface.js";
import { Box } from "../../runtime/box.js";
import { hidePopUp, isPopUpShown, showPopUp, togglePopUp } from "../popUp.js";

function setup() {
  const s = createSurface({ screen: { w: 200, h: 200 } });
  const button = new Box({ id: "button", x: 10, y: 10, w: 40, h: 20 });
  const panel = new Box({ id: "panel", x: 20, y: 30, w: 100, h: 100, children: [button] });
  const sibling = new Box({ id: "sibling", zIndex: 5 });
  const menu = new Box({ id: "menu", w: 30, h: 15 });
  s.root.addChild(panel).addChild(sibling);
  return { s, button, menu };
}

describe("pop-ups", () => {
  test("show below the anchor box, above everything else", () => {
    const { s, button, menu } = setup();
    showPopUp(button, menu);
    assert.equal(menu.parent, s.root);
    assert.equal(menu.zIndex, 6);
    assert.deepEqual(s.absoluteRect(menu), { x: 30, y: 60, w: 30, h: 15 });
  });

  test("custom placement", () => {
    const { s, button, menu } = setup();
    showPopUp(button, menu, { anchor: { self: "bottom-left", target: "top-left", offset: { y: -2 } } });
    assert.deepEqual(s.absoluteRect(menu), { x: 30, y: 23, w: 30, h: 15 });
  });

  test("toggle shows and hides", () => {
    const { button, menu } = setup();
    assert.equal(togglePopUp(button, menu), true);
    assert.equal(isPopUpShown(menu), true);
    assert.equal(togglePopUp(button, menu), false);
    assert.equal(isPopUpShown(menu), false);
    assert.equal(menu.destroyed, false);
    assert.equal(hidePopUp(menu), false);
  });

  test("hiding forgets the anchor box", () => {
    const { s, button, menu } = setup();
    showPopUp(button, menu);
    assert.equal(hidePopUp(menu), true);
    assert.equal(menu.anchor, null);
    button.destroy();
    showPopUp(s.root, menu);
    assert.deepEqual(s.absoluteRect(menu), { x: 0, y: 200, w: 30, h: 15 });
  });
});
