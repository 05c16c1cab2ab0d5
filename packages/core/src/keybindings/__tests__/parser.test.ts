import { assert, describe, test } from "@boxweave/testkit";
import { BoxError } from "../../errors.js";
import { LOCK_MODIFIERS, MOD_CTRL, MOD_SHIFT } from "../../events.js";
import { chord, formatChord, parseChord } from "../parser.js";

describe("parseChord", () => {
  test("modifiers combine and the key is normalized", () => {
    assert.deepEqual(parseChord("ctrl+shift+S"), {
      ok: true,
      value: { key: "s", mods: MOD_CTRL | MOD_SHIFT, ignoreMods: LOCK_MODIFIERS },
    });
    assert.deepEqual(parseChord("Esc"), { ok: true, value: { key: "escape", mods: 0, ignoreMods: LOCK_MODIFIERS } });
  });

  test("a custom ignore set never covers the chord's own modifiers", () => {
    const r = parseChord("shift+tab", MOD_SHIFT | MOD_CTRL);
    assert.deepEqual(r, { ok: true, value: { key: "tab", mods: MOD_SHIFT, ignoreMods: MOD_CTRL } });
  });

  test("malformed chords report a code and detail", () => {
    const cases: [string, string, string][] = [
      ["", "EMPTY_CHORD", "empty chord"],
      ["ctrl+", "INVALID_KEY", 'empty component in "ctrl+"'],
      ["shift", "INVALID_KEY", 'modifier "shift" cannot be the final key in "shift"'],
      ["ctrl+control+a", "INVALID_MODIFIER", 'duplicate modifier "control" in "ctrl+control+a"'],
      ["a+b", "INVALID_MODIFIER", '"a" is not a valid modifier in "a+b"'],
    ];
    for (const [input, code, detail] of cases) {
      assert.deepEqual(parseChord(input), { ok: false, error: { code, detail } }, input);
    }
  });
});

describe("chord / formatChord", () => {
  test("format is canonical", () => {
    assert.equal(formatChord(chord("shift+ctrl+plus")), "ctrl+shift+plus");
    assert.equal(formatChord(chord("cmd+Enter")), "meta+enter");
  });

  test("chord throws on bad input", () => {
    assert.throws(
      () => chord("bogus+a"),
      (e: unknown) =>
        e instanceof BoxError &&
        e.code === "BOX_INVALID_PROPS" &&
        e.message === 'INVALID_MODIFIER: "bogus" is not a valid modifier in "bogus+a"',
    );
  });
});
