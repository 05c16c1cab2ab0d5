import { assert, describe, test } from "@boxweave/testkit";
import { Box } from "../box.js";
import { createModalStackState, modalsWithin, popModal, pushModal, topmostModal } from "../layers.js";

describe("modal layer stack", () => {
  test("push, topmost and pop", () => {
    const a = new Box({ id: "a" });
    const b = new Box({ id: "b" });
    let state = createModalStackState();
    assert.equal(topmostModal(state), null);
    state = pushModal(state, a);
    state = pushModal(state, b, { closeOnEscape: false });
    assert.equal(topmostModal(state)?.box, b);
    assert.equal(topmostModal(state)?.closeOnEscape, false);

    const popped = popModal(state, b);
    assert.equal(popped.layer?.box, b);
    assert.equal(topmostModal(popped.state)?.box, a);
    assert.equal(topmostModal(state)?.box, b);
  });

  test("pushing an open layer moves it to the top", () => {
    const a = new Box();
    const b = new Box();
    const state = pushModal(pushModal(pushModal(createModalStackState(), a), b), a);
    assert.deepEqual(
      state.stack.map((l) => l.box),
      [b, a],
    );
  });

  test("popping an unknown box is a no-op", () => {
    const state = pushModal(createModalStackState(), new Box());
    const out = popModal(state, new Box());
    assert.equal(out.state, state);
    assert.equal(out.layer, undefined);
  });

  test("modalsWithin lists layers inside a subtree, topmost first", () => {
    const inner = new Box({ id: "inner" });
    const outer = new Box({ id: "outer", children: [inner] });
    const other = new Box({ id: "other" });
    let state = createModalStackState();
    state = pushModal(state, outer);
    state = pushModal(state, other);
    state = pushModal(state, inner);
    assert.deepEqual(
      modalsWithin(state, outer).map((l) => l.box.id),
      ["inner", "outer"],
    );
  });
});
