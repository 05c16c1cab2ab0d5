/**
 * packages/core/src/keybindings/parser.ts — Parse chord strings like "ctrl+s".
 *
 * Format:
 *   - Single key: "a", "escape", "f1"
 *   - With modifiers: "ctrl+s", "shift+a", "ctrl+shift+z"
 *
 * Key names are case-insensitive and normalized (see `normalizeKeyName`), so a
 * parsed chord matches the engine's "Enter" as well as "enter".
 */

import { BoxError } from "../errors.js";
import { LOCK_MODIFIERS, MOD_ALT, MOD_CTRL, MOD_META, MOD_SHIFT } from "../events.js";
import type { ChordParseError, KeyChord, ParseChordResult } from "./types.js";

const MODIFIERS: ReadonlyMap<string, number> = new Map([
  ["shift", MOD_SHIFT],
  ["ctrl", MOD_CTRL],
  ["control", MOD_CTRL],
  ["alt", MOD_ALT],
  ["option", MOD_ALT],
  ["meta", MOD_META],
  ["cmd", MOD_META],
  ["command", MOD_META],
  ["super", MOD_META],
]);

const KEY_ALIASES: ReadonlyMap<string, string> = new Map([
  ["esc", "escape"],
  ["return", "enter"],
  [" ", "space"],
  ["spacebar", "space"],
  ["del", "delete"],
  ["plus", "+"],
  ["arrowup", "up"],
  ["arrowdown", "down"],
  ["arrowleft", "left"],
  ["arrowright", "right"],
]);

/** Canonical, lower-case form of a key name. */
export function normalizeKeyName(key: string): string {
  const lower = key.toLowerCase();
  return KEY_ALIASES.get(lower) ?? lower;
}

function fail(code: ChordParseError["code"], detail: string): ParseChordResult {
  return { ok: false, error: Object.freeze({ code, detail }) };
}

export function parseChord(input: string, ignoreMods: number = LOCK_MODIFIERS): ParseChordResult {
  const trimmed = input.trim();
  if (trimmed.length === 0) return fail("EMPTY_CHORD", "empty chord");

  const pieces = trimmed.split("+");
  let mods = 0;
  let key: string | null = null;
  for (let i = 0; i < pieces.length; i++) {
    const piece = pieces[i]?.trim().toLowerCase() ?? "";
    if (piece.length === 0) return fail("INVALID_KEY", `empty component in "${input}"`);
    const isLast = i === pieces.length - 1;
    const mod = MODIFIERS.get(piece);
    if (mod !== undefined) {
      if (isLast) return fail("INVALID_KEY", `modifier "${piece}" cannot be the final key in "${input}"`);
      if ((mods & mod) !== 0) return fail("INVALID_MODIFIER", `duplicate modifier "${piece}" in "${input}"`);
      mods |= mod;
      continue;
    }
    if (!isLast) return fail("INVALID_MODIFIER", `"${piece}" is not a valid modifier in "${input}"`);
    key = normalizeKeyName(piece);
  }
  if (key === null) return fail("INVALID_KEY", `no key found in "${input}"`);
  return { ok: true, value: Object.freeze({ key, mods, ignoreMods: ignoreMods & ~mods }) };
}

/** Like `parseChord`, but throws BOX_INVALID_PROPS. */
export function chord(input: string, ignoreMods: number = LOCK_MODIFIERS): KeyChord {
  const parsed = parseChord(input, ignoreMods);
  if (!parsed.ok) throw new BoxError("BOX_INVALID_PROPS", `${parsed.error.code}: ${parsed.error.detail}`);
  return parsed.value;
}

/** Inverse of `parseChord`: "ctrl+shift+a". */
export function formatChord(c: KeyChord): string {
  const parts: string[] = [];
  if ((c.mods & MOD_CTRL) !== 0) parts.push("ctrl");
  if ((c.mods & MOD_ALT) !== 0) parts.push("alt");
  if ((c.mods & MOD_SHIFT) !== 0) parts.push("shift");
  if ((c.mods & MOD_META) !== 0) parts.push("meta");
  parts.push(c.key === "+" ? "plus" : c.key);
  return parts.join("+");
}
