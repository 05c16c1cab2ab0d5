import { assert, createCallLog, describe, test } from "@boxweave/testkit";
import { createSurface } from "../../app/surface.js";
import { BoxError } from "../../errors.js";
import { pointerPress, pointerRelease } from "../../events.js";
import { type MultipleChoiceOptions, makeMultipleChoice } from "../multipleChoice.js";

function logged(opts: Omit<MultipleChoiceOptions, "onSelect">) {
  const log = createCallLog();
  const mc = makeMultipleChoice({
    ...opts,
    onSelect: (selected, changed, on) => log.push(`${changed}:${String(on)}:${selected.join(",")}`),
  });
  return { mc, log };
}

describe("makeMultipleChoice", () => {
  test("single choice turns the previous one off first", () => {
    const { mc, log } = logged({ choices: ["red", "green", "blue"], defaults: ["green"] });
    assert.deepEqual(mc.selected(), ["green"]);
    mc.select("blue");
    assert.deepEqual(mc.selected(), ["blue"]);
    assert.equal(mc.buttons.get("green")?.isToggled(), false);
    assert.deepEqual(log.entries(), ["green:false:blue", "blue:true:blue"]);
  });

  test("multiple choice keeps every selection", () => {
    const { mc, log } = logged({ choices: ["a", "b", "c"], allowMultiple: true, defaults: ["a", "c"] });
    mc.select("b");
    mc.select("a", false);
    assert.deepEqual(mc.selected(), ["b", "c"]);
    mc.resetToDefaults();
    assert.deepEqual(mc.selected(), ["a", "c"]);
    assert.deepEqual(log.entries(), ["b:true:a,b,c", "a:false:b,c", "a:true:a,b,c", "b:false:a,c"]);
  });

  test("clicking a button selects its choice", () => {
    const s = createSurface({ screen: { w: 200, h: 200 } });
    const { mc } = logged({ id: "answer", choices: ["yes", "no"] });
    s.root.addChild(mc.box);
    // yes spans x 0..40, no 44..76.
    s.dispatch(pointerPress(50, 10));
    s.dispatch(pointerRelease(50, 10));
    assert.deepEqual(mc.selected(), ["no"]);
    assert.equal(mc.buttons.get("no")?.box.id, "answer.no");
    assert.deepEqual(s.absoluteRect(mc.box), { x: 0, y: 0, w: 76, h: 24 });
  });

  test("bad definitions are rejected", () => {
    const cases: [MultipleChoiceOptions, string][] = [
      [{ choices: ["a", "a"] }, 'multiple choice: duplicate choice "a"'],
      [{ choices: ["a"], defaults: ["z"] }, 'multiple choice: default "z" is not a choice'],
      [{ choices: ["a", "b"], defaults: ["a", "b"] }, "multiple choice: more than one default needs allowMultiple"],
    ];
    for (const [opts, message] of cases) {
      assert.throws(
        () => makeMultipleChoice(opts),
        (e: unknown) => e instanceof BoxError && e.code === "BOX_INVALID_PROPS" && e.message === message,
      );
    }
    const mc = makeMultipleChoice({ choices: ["a"] });
    assert.throws(() => mc.select("b"), (e: unknown) => e instanceof BoxError && e.message === 'multiple choice: unknown choice "b"');
  });
});
