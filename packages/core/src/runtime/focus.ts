/**
 * packages/core/src/runtime/focus.ts — Keyboard focus.
 *
 * Why: One focused box per surface. Requests are validated against the
 * surface's rules before anything changes: the box must be focus-capable,
 * attached, interactive and inside the active modal layer.
 *
 * Focus rules:
 *   - Traversal order: depth-first preorder, children in paint order
 *   - Tab cycles forward through the list; Shift+Tab cycles backward
 *   - A focused box that leaves the tree or becomes non-interactive loses
 *     focus; nothing else gains it implicitly
 */

import type { Diagnostics } from "../diagnostics.js";
import { NotFocusableError, type NotFocusableReason } from "../errors.js";
import type { Box } from "./box.js";

export type FocusMove = "next" | "prev";

/** Focus-capable, interactive boxes under `scope` in traversal order. */
export function computeFocusList(scope: Box): Box[] {
  return scope.subtree().filter((b) => b.focusable && b.isInteractive());
}

/**
 * Next focus target for a Tab move. Wraps around; with nothing focused (or a
 * focused box outside the list), `next` picks the first and `prev` the last.
 */
export function computeMovedFocus(
  focusList: readonly Box[],
  focused: Box | null,
  move: FocusMove,
): Box | null {
  const n = focusList.length;
  if (n === 0) return null;

  const first = focusList[0];
  const last = focusList[n - 1];
  if (first === undefined || last === undefined) return null;

  if (focused === null) return move === "next" ? first : last;

  const idx = focusList.indexOf(focused);
  if (idx < 0) return move === "next" ? first : last;

  const nextIdx = move === "next" ? (idx + 1) % n : (idx - 1 + n) % n;
  return focusList[nextIdx] ?? null;
}

export type FocusManagerDeps = Readonly<{
  /** Root of the surface's tree. */
  root: Box;
  /** Active modal layer, or null. */
  scope: () => Box | null;
  diagnostics: Diagnostics;
}>;

export type FocusManager = Readonly<{
  focused: () => Box | null;
  /** Null when `box` may take focus, otherwise why not. */
  check: (box: Box) => NotFocusableReason | null;
  /** @throws NotFocusableError */
  request: (box: Box) => void;
  clear: () => void;
  move: (move: FocusMove) => Box | null;
  /** Drop focus held anywhere inside `subtree`. Returns true when focus was cleared. */
  releaseSubtree: (subtree: Box) => boolean;
  /** Drop focus when the focused box is no longer allowed to hold it. */
  revalidate: () => void;
}>;

export function createFocusManager(deps: FocusManagerDeps): FocusManager {
  const { root, diagnostics } = deps;
  let current: Box | null = null;

  const check = (box: Box): NotFocusableReason | null => {
    if (!box.focusable) return "not-focus-capable";
    if (box.destroyed || box.root() !== root) return "detached";
    if (!box.isInteractive()) return "disabled";
    const scope = deps.scope();
    if (scope !== null && !scope.contains(box)) return "outside-modal";
    return null;
  };

  const blur = (): void => {
    const prev = current;
    if (prev === null) return;
    current = null;
    const onBlur = prev.handler("onBlur");
    if (onBlur) diagnostics.guard(`${prev.id}.onBlur`, () => onBlur(prev));
  };

  const focus = (box: Box): void => {
    current = box;
    if (box.raiseOnFocus) {
      // Raise the box and each raise-on-focus ancestor (window inside window).
      for (let b: Box | null = box; b !== null; b = b.parent) {
        if (b.raiseOnFocus) b.bringToFront();
      }
    }
    const onFocus = box.handler("onFocus");
    if (onFocus) diagnostics.guard(`${box.id}.onFocus`, () => onFocus(box));
  };

  const request = (box: Box): void => {
    const reason = check(box);
    if (reason !== null) throw new NotFocusableError(box.id, reason);
    if (current === box) return;
    blur();
    focus(box);
  };

  const revalidate = (): void => {
    if (current !== null && check(current) !== null) {
      diagnostics.devWarn("focus", `lost:${current.id}`, `box#${current.id} lost focus`);
      blur();
    }
  };

  return Object.freeze({
    focused: () => current,
    check,
    request,
    clear: blur,
    move: (move: FocusMove) => {
      const scope = deps.scope() ?? root;
      const next = computeMovedFocus(computeFocusList(scope), current, move);
      if (next !== null && next !== current) request(next);
      return next;
    },
    releaseSubtree: (subtree: Box) => {
      if (current === null || !subtree.contains(current)) return false;
      blur();
      return true;
    },
    revalidate,
  });
}
