/**
 * packages/core/src/keybindings/types.ts — Key map type definitions.
 */

import type { KeyEvent } from "../events.js";
import type { Box } from "../runtime/box.js";

/**
 * A key plus an exact modifier set. Modifiers in `ignoreMods` (the lock keys by
 * default) may be held or not without affecting the match.
 */
export type KeyChord = Readonly<{
  /** Normalized key name (see normalizeKeyName). */
  key: string;
  mods: number;
  ignoreMods: number;
}>;

/**
 * A typed character, matched case-sensitively against the key name whatever
 * the modifiers. Text has no release: a match runs `onPress` then `onRelease`
 * on key down.
 */
export type TextChord = Readonly<{ text: string }>;

export type KeyTrigger = KeyChord | TextChord;

/** `true` marks the key as consumed. */
export type KeyActionHandler = () => boolean | void;

export type KeyAction = Readonly<{
  /** Chord strings ("ctrl+s"), parsed chords, or text triggers. */
  chords: readonly (string | KeyTrigger)[];
  onPress?: KeyActionHandler;
  onRelease?: KeyActionHandler;
  description?: string;
}>;

export type KeyMapEntry = Readonly<{
  action: KeyAction;
  triggers: readonly KeyTrigger[];
}>;

export type ChordParseError = Readonly<{
  code: "EMPTY_CHORD" | "INVALID_KEY" | "INVALID_MODIFIER";
  detail: string;
}>;

export type ParseChordResult =
  | Readonly<{ ok: true; value: KeyChord }>
  | Readonly<{ ok: false; error: ChordParseError }>;

/** Signature of a box `onKey` handler. */
export type KeyMapBoxHandler = (box: Box, event: KeyEvent) => boolean;
