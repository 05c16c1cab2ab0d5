/**
 * packages/core/src/runtime/layers.ts — Modal layer stack.
 *
 * Why: While a modal layer is open, hit testing, Tab traversal and focus
 * requests are confined to its subtree. Layers stack; the topmost one is the
 * active scope. Each entry remembers the box that held focus when it opened so
 * closing can hand focus back.
 *
 * State is immutable; every operation returns a new state.
 */

import type { Box } from "./box.js";

export type ModalLayer = Readonly<{
  box: Box;
  /** Focus holder when the layer opened. */
  returnFocus: Box | null;
  closeOnEscape: boolean;
  onClose: (() => void) | undefined;
}>;

export type ModalStackState = Readonly<{
  stack: readonly ModalLayer[];
}>;

export type ModalLayerInput = Readonly<{
  returnFocus?: Box | null;
  closeOnEscape?: boolean;
  onClose?: () => void;
}>;

export function createModalStackState(): ModalStackState {
  return Object.freeze({ stack: Object.freeze([]) });
}

/** Push (or move to the top) the layer rooted at `box`. */
export function pushModal(
  state: ModalStackState,
  box: Box,
  input: ModalLayerInput = {},
): ModalStackState {
  const layer: ModalLayer = Object.freeze({
    box,
    returnFocus: input.returnFocus ?? null,
    closeOnEscape: input.closeOnEscape ?? true,
    onClose: input.onClose,
  });
  return Object.freeze({
    stack: Object.freeze([...state.stack.filter((l) => l.box !== box), layer]),
  });
}

/** Remove the layer rooted at `box`. `layer` is the removed entry, if there was one. */
export function popModal(
  state: ModalStackState,
  box: Box,
): { state: ModalStackState; layer: ModalLayer | undefined } {
  const layer = state.stack.find((l) => l.box === box);
  if (layer === undefined) return { state, layer };
  return {
    state: Object.freeze({ stack: Object.freeze(state.stack.filter((l) => l !== layer)) }),
    layer,
  };
}

export function topmostModal(state: ModalStackState): ModalLayer | null {
  const len = state.stack.length;
  if (len === 0) return null;
  return state.stack[len - 1] ?? null;
}

/** Layers whose root lies inside `subtree`, topmost first. */
export function modalsWithin(state: ModalStackState, subtree: Box): ModalLayer[] {
  return state.stack.filter((l) => subtree.contains(l.box)).reverse();
}
