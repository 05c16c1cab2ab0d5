/**
 * packages/core/src/keybindings/keyMap.ts — Chord-to-action registry.
 *
 * Binds chords such as "ctrl+s" to handlers in place of a hand-written
 * `onKey` switch. A map is consulted either from a box (pass
 * `map.onKey` as the box's `onKey`, so it follows focus and modal scope) or
 * from the surface (`Surface.addKeyMap`), where it sees keys that no focused
 * box consumed.
 *
 * Every action matching the event runs, in registration order; the event is
 * consumed when any handler returns true.
 */

import { BoxError } from "../errors.js";
import type { KeyEvent } from "../events.js";
import type { Box } from "../runtime/box.js";
import { normalizeKeyName, parseChord } from "./parser.js";
import type { KeyAction, KeyChord, KeyMapBoxHandler, KeyMapEntry, KeyTrigger, TextChord } from "./types.js";

export type KeyMap = Readonly<{
  /** Register `action`. Re-adding a registered action is a no-op. @throws BoxError on a bad chord string */
  add: (action: KeyAction) => KeyAction;
  remove: (action: KeyAction) => boolean;
  entries: () => readonly KeyMapEntry[];
  /** Run the actions matching `event`. Returns whether one consumed it. */
  handle: (event: KeyEvent) => boolean;
  /** `handle` shaped as a box `onKey` handler. */
  onKey: KeyMapBoxHandler;
}>;

function isTextChord(t: KeyTrigger): t is TextChord {
  return "text" in t;
}

export function chordMatches(c: KeyChord, event: KeyEvent): boolean {
  return normalizeKeyName(event.key) === c.key && (event.mods & ~c.ignoreMods) === c.mods;
}

function resolveTriggers(action: KeyAction): readonly KeyTrigger[] {
  const out: KeyTrigger[] = [];
  for (const c of action.chords) {
    if (typeof c !== "string") {
      out.push(c);
      continue;
    }
    const parsed = parseChord(c);
    if (!parsed.ok) {
      throw new BoxError("BOX_INVALID_PROPS", `key action chord "${c}": ${parsed.error.detail}`);
    }
    out.push(parsed.value);
  }
  return Object.freeze(out);
}

export function createKeyMap(initial: readonly KeyAction[] = []): KeyMap {
  let entries: readonly KeyMapEntry[] = Object.freeze([]);

  const add = (action: KeyAction): KeyAction => {
    if (entries.some((e) => e.action === action)) return action;
    const triggers = resolveTriggers(action);
    entries = Object.freeze([...entries, Object.freeze({ action, triggers })]);
    return action;
  };

  const remove = (action: KeyAction): boolean => {
    const next = entries.filter((e) => e.action !== action);
    if (next.length === entries.length) return false;
    entries = Object.freeze(next);
    return true;
  };

  const handle = (event: KeyEvent): boolean => {
    let consumed = false;
    const run = (h: KeyAction["onPress"]): void => {
      if (h !== undefined && h() === true) consumed = true;
    };
    // Snapshot: handlers may add or remove actions.
    for (const { action, triggers } of entries) {
      if (event.kind === "keyDown") {
        if (triggers.some((t) => !isTextChord(t) && chordMatches(t, event))) run(action.onPress);
        if (triggers.some((t) => isTextChord(t) && t.text === event.key)) {
          run(action.onPress);
          run(action.onRelease);
        }
      } else if (triggers.some((t) => !isTextChord(t) && chordMatches(t, event))) {
        run(action.onRelease);
      }
    }
    return consumed;
  };

  for (const action of initial) add(action);

  return Object.freeze({
    add,
    remove,
    entries: () => entries,
    handle,
    onKey: (_box: Box, event: KeyEvent) => handle(event),
  });
}
