/**
 * packages/core/src/events.ts — Input events and dispatch results.
 *
 * Events arrive from the engine in screen coordinates. `mods` is a bitmask of
 * the MOD_* constants below; `timeMs` is the engine's timestamp for the event.
 */

import type { Box } from "./runtime/box.js";

export const MOD_SHIFT = 1 << 0;
export const MOD_CTRL = 1 << 1;
export const MOD_ALT = 1 << 2;
export const MOD_META = 1 << 3;
/** Lock states the engine may report alongside real modifiers. */
export const MOD_CAPS_LOCK = 1 << 4;
export const MOD_NUM_LOCK = 1 << 5;
export const MOD_SCROLL_LOCK = 1 << 6;
export const LOCK_MODIFIERS = MOD_CAPS_LOCK | MOD_NUM_LOCK | MOD_SCROLL_LOCK;

export type PointerButton = "left" | "middle" | "right";

export type PointerPressEvent = Readonly<{
  kind: "pointerPress";
  x: number;
  y: number;
  button: PointerButton;
  mods: number;
  timeMs: number;
}>;

export type PointerMoveEvent = Readonly<{
  kind: "pointerMove";
  x: number;
  y: number;
  mods: number;
  timeMs: number;
}>;

export type PointerReleaseEvent = Readonly<{
  kind: "pointerRelease";
  x: number;
  y: number;
  button: PointerButton;
  mods: number;
  timeMs: number;
}>;

export type KeyDownEvent = Readonly<{
  kind: "keyDown";
  /** Key name, e.g. "Enter", "Escape", "Tab", "a". */
  key: string;
  mods: number;
  timeMs: number;
}>;

export type KeyUpEvent = Readonly<{
  kind: "keyUp";
  key: string;
  mods: number;
  timeMs: number;
}>;

export type KeyEvent = KeyDownEvent | KeyUpEvent;

export type PointerEvent = PointerPressEvent | PointerMoveEvent | PointerReleaseEvent;
export type InputEvent = PointerEvent | KeyEvent;

export function hasModifier(mods: number, mask: number): boolean {
  return mask !== 0 && (mods & mask) === mask;
}

export function pointerPress(
  x: number,
  y: number,
  button: PointerButton = "left",
  mods = 0,
  timeMs = 0,
): PointerPressEvent {
  return Object.freeze({ kind: "pointerPress", x, y, button, mods, timeMs });
}

export function pointerMove(x: number, y: number, mods = 0, timeMs = 0): PointerMoveEvent {
  return Object.freeze({ kind: "pointerMove", x, y, mods, timeMs });
}

export function pointerRelease(
  x: number,
  y: number,
  button: PointerButton = "left",
  mods = 0,
  timeMs = 0,
): PointerReleaseEvent {
  return Object.freeze({ kind: "pointerRelease", x, y, button, mods, timeMs });
}

export function keyDown(key: string, mods = 0, timeMs = 0): KeyDownEvent {
  return Object.freeze({ kind: "keyDown", key, mods, timeMs });
}

export function keyUp(key: string, mods = 0, timeMs = 0): KeyUpEvent {
  return Object.freeze({ kind: "keyUp", key, mods, timeMs });
}

/**
 * How an event was routed.
 * - `drag`: consumed by the drag controller
 * - `box`: a box handler returned true
 * - `focus`: Tab navigation moved focus
 * - `keyMap`: a surface key map consumed the key
 * - `blocked`: outside the active modal layer
 * - `ignored`: a press while a drag session was already active
 * - `unhandled`: nobody consumed it (including "nothing hit" and "nothing focused")
 */
export type DispatchRoute = "drag" | "box" | "focus" | "keyMap" | "blocked" | "ignored" | "unhandled";

export type DispatchResult = Readonly<{
  handled: boolean;
  /** Hit box for pointer events, focused box for key events. */
  target: Box | null;
  /** Box whose handler consumed the event. */
  consumedBy: Box | null;
  route: DispatchRoute;
}>;

export function dispatchResult(
  route: DispatchRoute,
  target: Box | null,
  consumedBy: Box | null = null,
): DispatchResult {
  return Object.freeze({
    handled: route === "drag" || route === "box" || route === "focus" || route === "keyMap",
    target,
    consumedBy,
    route,
  });
}
