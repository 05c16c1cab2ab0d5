/**
 * packages/core/src/runtime/router.ts — Event routing to box handlers.
 *
 * Deterministic routing rules:
 * - Pointer events hit-test (confined to the active modal layer), go to the
 *   drag controller first, then to the hit box, bubbling through ancestors
 *   until a handler returns true. Bubbling never leaves the modal layer.
 * - A click is a release over the same box that received the press.
 * - Key events go to the focused box and bubble; Escape cancels a drag first.
 *   Keys no box consumed go to the surface key maps while no modal layer is
 *   open. Unconsumed Tab / Shift+Tab move focus; unconsumed Escape closes the top
 *   modal layer when it allows it: through the layer's `onClose` when it has
 *   one, else by popping the layer via `closeModal`.
 *
 * `pointer` is surface-local state and MUST be maintained by the caller.
 */

import type { ResolvedSurfaceConfig } from "../config.js";
import type { Diagnostics } from "../diagnostics.js";
import {
  type DispatchResult,
  type InputEvent,
  type KeyEvent,
  MOD_SHIFT,
  type PointerButton,
  type PointerMoveEvent,
  type PointerPressEvent,
  type PointerReleaseEvent,
  dispatchResult,
  hasModifier,
} from "../events.js";
import type { KeyMap } from "../keybindings/keyMap.js";
import { type RectLookup, hitTest } from "../layout/hitTest.js";
import type { Box } from "./box.js";
import type { DragController } from "./drag.js";
import type { FocusManager } from "./focus.js";
import type { ModalLayer } from "./layers.js";

export type PointerState = {
  /** Box that received the last press; cleared on the matching release. */
  pressed: Box | null;
  pressedButton: PointerButton | null;
  hovered: Box | null;
};

export type RoutingCtx = Readonly<{
  root: Box;
  /** Topmost modal layer, or null. */
  modal: ModalLayer | null;
  rectOf: RectLookup;
  drag: DragController;
  focus: FocusManager;
  config: ResolvedSurfaceConfig;
  diagnostics: Diagnostics;
  pointer: PointerState;
  /** Surface-level key maps, in registration order. */
  keyMaps: readonly KeyMap[];
  /** Pops `box`'s modal layer and restores the focus it saved. */
  closeModal: (box: Box) => boolean;
}>;

/** Walk from `start` to the root (or the scope box) until `tryBox` consumes. */
function bubble(start: Box, scope: Box | null, tryBox: (box: Box) => boolean): Box | null {
  for (let b: Box | null = start; b !== null; b = b.parent) {
    if (tryBox(b)) return b;
    if (b === scope) break;
  }
  return null;
}

function scopeOf(ctx: RoutingCtx): Box | null {
  return ctx.modal?.box ?? null;
}

function hit(ctx: RoutingCtx, x: number, y: number): Box | null {
  return hitTest(ctx.root, x, y, ctx.rectOf, { scope: scopeOf(ctx) });
}

function routePress(event: PointerPressEvent, ctx: RoutingCtx): DispatchResult {
  const { drag, focus, diagnostics, pointer } = ctx;
  const target = hit(ctx, event.x, event.y);
  const scope = scopeOf(ctx);

  if (scope !== null && target === null && drag.phase() === "idle") {
    pointer.pressed = null;
    pointer.pressedButton = null;
    return dispatchResult("blocked", null);
  }
  if (drag.press(event, target) === "ignored") return dispatchResult("ignored", target);

  pointer.pressed = target;
  pointer.pressedButton = event.button;
  if (target === null) return dispatchResult("unhandled", null);

  const consumer = bubble(target, scope, (b) => {
    const h = b.handler("onPress");
    return h !== undefined && diagnostics.guard(`${b.id}.onPress`, () => h(b, event)) === true;
  });
  if (consumer === null) return dispatchResult("unhandled", target);

  // Click-to-focus. The consumer may have been detached by its own handler.
  if (consumer.focusable && focus.check(consumer) === null) focus.request(consumer);
  return dispatchResult("box", target, consumer);
}

function routeMove(event: PointerMoveEvent, ctx: RoutingCtx): DispatchResult {
  const { diagnostics, pointer } = ctx;
  if (ctx.drag.move(event)) return dispatchResult("drag", ctx.drag.session()?.subject ?? null);

  const target = hit(ctx, event.x, event.y);
  const prev = pointer.hovered;
  if (prev !== target) {
    pointer.hovered = target;
    if (prev !== null) {
      const h = prev.handler("onUnhover");
      if (h) diagnostics.guard(`${prev.id}.onUnhover`, () => h(prev, event));
    }
    if (target !== null) {
      const h = target.handler("onHover");
      if (h) diagnostics.guard(`${target.id}.onHover`, () => h(target, event));
    }
  }
  return dispatchResult("unhandled", target);
}

function routeRelease(event: PointerReleaseEvent, ctx: RoutingCtx): DispatchResult {
  const { diagnostics, pointer } = ctx;
  const dragged = ctx.drag.release(event);
  // Another button's release leaves the pending press (and its click) alone.
  const pressed = pointer.pressedButton === event.button ? pointer.pressed : null;
  if (pressed !== null || pointer.pressed === null) {
    pointer.pressed = null;
    pointer.pressedButton = null;
  }
  if (dragged.consumed) {
    const o = dragged.outcome;
    const subject = o.kind === "dropped" || o.kind === "released" || o.kind === "cancelled" ? o.subject : null;
    return dispatchResult("drag", subject);
  }

  const target = hit(ctx, event.x, event.y);
  const scope = scopeOf(ctx);
  if (target === null) return dispatchResult(scope !== null ? "blocked" : "unhandled", null);

  const releaseConsumer = bubble(target, scope, (b) => {
    const h = b.handler("onRelease");
    return h !== undefined && diagnostics.guard(`${b.id}.onRelease`, () => h(b, event)) === true;
  });

  let clickConsumer: Box | null = null;
  if (pressed !== null && pressed === target) {
    clickConsumer = bubble(target, scope, (b) => {
      const h = b.handler("onClick");
      return h !== undefined && diagnostics.guard(`${b.id}.onClick`, () => h(b, event)) === true;
    });
  }

  const consumer = clickConsumer ?? releaseConsumer;
  return consumer === null ? dispatchResult("unhandled", target) : dispatchResult("box", target, consumer);
}

function routeKey(event: KeyEvent, ctx: RoutingCtx): DispatchResult {
  const { drag, focus, diagnostics, modal } = ctx;
  const isDown = event.kind === "keyDown";

  if (isDown && event.key === "Escape" && drag.phase() !== "idle") {
    drag.cancel(true);
    return dispatchResult("drag", null);
  }

  const focused = focus.focused();
  const scope = scopeOf(ctx);
  if (focused !== null && scope !== null && !scope.contains(focused)) {
    return dispatchResult("blocked", focused);
  }

  if (focused !== null) {
    const consumer = bubble(focused, scope, (b) => {
      const h = b.handler("onKey");
      return h !== undefined && diagnostics.guard(`${b.id}.onKey`, () => h(b, event)) === true;
    });
    if (consumer !== null) return dispatchResult("box", focused, consumer);
  }

  if (modal === null) {
    for (const map of ctx.keyMaps) {
      if (diagnostics.guard("keyMap.handle", () => map.handle(event)) === true) {
        return dispatchResult("keyMap", focused);
      }
    }
  }

  if (isDown && event.key === "Tab" && ctx.config.tabNavigation) {
    const next = focus.move(hasModifier(event.mods, MOD_SHIFT) ? "prev" : "next");
    if (next !== null) return dispatchResult("focus", next);
  }

  if (isDown && event.key === "Escape" && modal !== null && modal.closeOnEscape) {
    const onClose = modal.onClose;
    if (onClose) diagnostics.guard(`${modal.box.id}.onClose`, onClose);
    else ctx.closeModal(modal.box);
    return dispatchResult("box", focused, modal.box);
  }

  return dispatchResult("unhandled", focused);
}

/** Route one event. Never throws for events that hit nothing or find no focus. */
export function routeEvent(event: InputEvent, ctx: RoutingCtx): DispatchResult {
  switch (event.kind) {
    case "pointerPress":
      return routePress(event, ctx);
    case "pointerMove":
      return routeMove(event, ctx);
    case "pointerRelease":
      return routeRelease(event, ctx);
    case "keyDown":
    case "keyUp":
      return routeKey(event, ctx);
  }
}
