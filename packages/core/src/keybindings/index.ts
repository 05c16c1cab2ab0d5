/**
 * packages/core/src/keybindings/index.ts — Key map public exports.
 */

export { chordMatches, createKeyMap, type KeyMap } from "./keyMap.js";
export { chord, formatChord, normalizeKeyName, parseChord } from "./parser.js";
export type {
  ChordParseError,
  KeyAction,
  KeyActionHandler,
  KeyChord,
  KeyMapBoxHandler,
  KeyMapEntry,
  KeyTrigger,
  ParseChordResult,
  TextChord,
} from "./types.js";
