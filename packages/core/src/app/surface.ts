/**
 * packages/core/src/app/surface.ts — Per-window runtime context.
 *
 * Why: A Surface owns one box tree and everything that is "one per window":
 * focus, the drag session, the modal stack, the event queue and the cached
 * absolute geometry. Boxes reach it through the BoxHost interface bound to the
 * root, so mutations anywhere in the tree can invalidate layout, release focus
 * or cancel a drag without the caller passing the surface around.
 *
 * Frame contract (`tick`):
 *   1. flush dirty layout
 *   2. drain queued events in arrival order (layout is flushed lazily before
 *      each event, so a box added by a handler is hit-testable on the next one)
 *   3. flush again
 *   4. build the draw list in paint order
 */

import { type ResolvedSurfaceConfig, type SurfaceConfig, resolveSurfaceConfig } from "../config.js";
import { type Diagnostics, createDiagnostics } from "../diagnostics.js";
import { BoxError, describeThrown } from "../errors.js";
import { type DispatchResult, type InputEvent, dispatchResult } from "../events.js";
import type { KeyMap } from "../keybindings/keyMap.js";
import { resolveAbsoluteRects } from "../layout/anchor.js";
import { flushDirtyGroups } from "../layout/group.js";
import { hitTest } from "../layout/hitTest.js";
import type { Rect, Size } from "../layout/types.js";
import { Box, type BoxHost, type BoxOptions, anchorGraph, describeBox } from "../runtime/box.js";
import {
  type DragController,
  type DragPhase,
  type DragSession,
  createDragController,
} from "../runtime/drag.js";
import { type FocusManager, createFocusManager } from "../runtime/focus.js";
import {
  type ModalLayerInput,
  type ModalStackState,
  createModalStackState,
  modalsWithin,
  popModal,
  pushModal,
  topmostModal,
} from "../runtime/layers.js";
import { type PointerState, routeEvent } from "../runtime/router.js";

export type FrameInfo = Readonly<{ frameId: number; timeMs: number; dtMs: number }>;

export type DrawCommand =
  | Readonly<{ kind: "rect"; box: Box; rect: Rect; z: number; fill: string }>
  | Readonly<{ kind: "sprite"; box: Box; rect: Rect; z: number; texture: string }>
  | Readonly<{ kind: "text"; box: Box; rect: Rect; z: number; text: string }>;

export type FrameReport = Readonly<{
  frame: FrameInfo | null;
  results: readonly DispatchResult[];
  /** Groups recomputed by the frame's own flushes. */
  layoutRecomputed: number;
  draws: readonly DrawCommand[];
}>;

export type SurfaceOptions = Readonly<{
  screen: Size;
  config?: SurfaceConfig;
  /** Options for the root box; its rect defaults to the screen. */
  root?: BoxOptions;
}>;

export type OpenModalOptions = Omit<ModalLayerInput, "returnFocus">;

function requireScreen(size: Size): Rect {
  if (!Number.isInteger(size.w) || !Number.isInteger(size.h) || size.w < 0 || size.h < 0) {
    throw new BoxError("BOX_INVALID_CONFIG", "screen must have non-negative integer w and h");
  }
  return Object.freeze({ x: 0, y: 0, w: size.w, h: size.h });
}

export class Surface implements BoxHost {
  readonly root: Box;
  readonly config: ResolvedSurfaceConfig;
  readonly diagnostics: Diagnostics;

  private readonly focusManager: FocusManager;
  private readonly dragController: DragController;
  private modals: ModalStackState = createModalStackState();
  private readonly queue: InputEvent[] = [];
  private keyMaps: readonly KeyMap[] = [];
  private readonly pointer: PointerState = { pressed: null, pressedButton: null, hovered: null };
  private screenRect: Rect;
  private layoutDirty = true;
  private geometryDirty = true;
  private geometry = new Map<Box, Rect>();

  constructor(opts: SurfaceOptions) {
    this.config = resolveSurfaceConfig(opts.config);
    this.screenRect = requireScreen(opts.screen);
    this.diagnostics = createDiagnostics(this.config);
    this.root = new Box({ w: this.screenRect.w, h: this.screenRect.h, id: "root", ...opts.root });
    this.root.internal_bindHost(this);

    const scope = (): Box | null => topmostModal(this.modals)?.box ?? null;
    const rectOf = (box: Box): Rect => this.absoluteRectOf(box);
    this.focusManager = createFocusManager({ root: this.root, scope, diagnostics: this.diagnostics });
    this.dragController = createDragController({
      root: this.root,
      scope,
      rectOf,
      screen: () => this.screenRect,
      config: this.config,
      diagnostics: this.diagnostics,
    });
  }

  /* ========== BoxHost ========== */

  noteLayoutDirty(): void {
    this.layoutDirty = true;
    this.geometryDirty = true;
  }

  noteGeometryDirty(): void {
    this.geometryDirty = true;
  }

  noteDetached(subtree: Box): void {
    this.geometryDirty = true;
    this.focusManager.releaseSubtree(subtree);
    this.dragController.releaseSubtree(subtree);
    const p = this.pointer;
    if (p.pressed !== null && subtree.contains(p.pressed)) p.pressed = null;
    if (p.hovered !== null && subtree.contains(p.hovered)) p.hovered = null;
    for (const layer of modalsWithin(this.modals, subtree)) {
      this.modals = popModal(this.modals, layer.box).state;
      this.restoreFocus(layer.returnFocus);
    }
  }

  noteInteractivityChanged(box: Box): void {
    this.focusManager.revalidate();
    const hovered = this.pointer.hovered;
    if (hovered !== null && box.contains(hovered) && !hovered.isInteractive()) {
      this.pointer.hovered = null;
    }
  }

  absoluteRectOf(box: Box): Rect {
    if (box.root() !== this.root) {
      throw new BoxError("BOX_FOREIGN_SURFACE", `${describeBox(box)} is not in this surface`);
    }
    this.ensureGeometry();
    return this.geometry.get(box) ?? box.rect;
  }

  /* ========== Geometry ========== */

  screen(): Rect {
    return this.screenRect;
  }

  resize(size: Size): void {
    this.screenRect = requireScreen(size);
    if (this.root.layout === null) this.root.setSize(size.w, size.h);
    this.geometryDirty = true;
  }

  absoluteRect(box: Box): Rect {
    return this.absoluteRectOf(box);
  }

  /** Recompute dirty layout groups now. Returns how many were recomputed. */
  flushLayout(): number {
    if (!this.layoutDirty) return 0;
    this.layoutDirty = false;
    return flushDirtyGroups(this.root);
  }

  private ensureGeometry(): void {
    if (this.layoutDirty) this.flushLayout();
    if (!this.geometryDirty) return;
    this.geometryDirty = false;

    const nodes = anchorGraph([this.root]);
    if (this.config.devMode) {
      const inTree = new Set(nodes.map((n) => n.key));
      for (const n of nodes) {
        const ref = n.anchor?.ref;
        if (ref !== undefined && ref !== "parent" && ref !== "screen" && !inTree.has(ref.key)) {
          this.diagnostics.devWarn(
            "layout",
            `anchor:${n.key.id}`,
            `${describeBox(n.key)} is anchored to ${describeBox(ref.key)}, which is not in this surface`,
          );
        }
      }
    }
    this.geometry = resolveAbsoluteRects(nodes, this.screenRect, describeBox);
  }

  hitTest(x: number, y: number): Box | null {
    return hitTest(this.root, x, y, (b) => this.absoluteRectOf(b), { scope: this.activeModal() });
  }

  /* ========== Focus ========== */

  focused(): Box | null {
    return this.focusManager.focused();
  }

  /** @throws NotFocusableError */
  requestFocus(box: Box): void {
    this.focusManager.request(box);
  }

  clearFocus(): void {
    this.focusManager.clear();
  }

  /** Move focus like Tab / Shift+Tab. */
  moveFocus(move: "next" | "prev"): Box | null {
    return this.focusManager.move(move);
  }

  private restoreFocus(box: Box | null): void {
    if (box !== null && this.focusManager.check(box) === null) this.focusManager.request(box);
  }

  /* ========== Modal layers ========== */

  activeModal(): Box | null {
    return topmostModal(this.modals)?.box ?? null;
  }

  /**
   * Confine input to `box`'s subtree and move focus into it (the box itself
   * when focusable, else its first focusable descendant).
   */
  openModal(box: Box, opts: OpenModalOptions = {}): void {
    if (box.root() !== this.root) {
      throw new BoxError("BOX_FOREIGN_SURFACE", `${describeBox(box)} is not in this surface`);
    }
    const prevFocus = this.focusManager.focused();
    this.modals = pushModal(this.modals, box, { ...opts, returnFocus: prevFocus });
    if (prevFocus !== null && box.contains(prevFocus)) return;
    this.focusManager.clear();
    if (this.focusManager.check(box) === null) this.focusManager.request(box);
    else this.focusManager.move("next");
  }

  /** Pop `box`'s layer and hand focus back. Returns false when no such layer is open. */
  closeModal(box: Box): boolean {
    const { state, layer } = popModal(this.modals, box);
    if (layer === undefined) return false;
    this.modals = state;
    this.restoreFocus(layer.returnFocus);
    return true;
  }

  /* ========== Key maps ========== */

  /**
   * Consult `map` for keys no focused box consumed, while no modal layer is
   * open. Returns a function that removes it again.
   */
  addKeyMap(map: KeyMap): () => void {
    if (!this.keyMaps.includes(map)) this.keyMaps = [...this.keyMaps, map];
    return () => {
      this.keyMaps = this.keyMaps.filter((m) => m !== map);
    };
  }

  /* ========== Drag & selection ========== */

  dragPhase(): DragPhase {
    return this.dragController.phase();
  }

  dragSession(): DragSession | null {
    return this.dragController.session();
  }

  /** Cancel the active drag, restoring a moved box. */
  cancelDrag(): boolean {
    return this.dragController.cancel(true);
  }

  selection(): readonly Box[] {
    return this.dragController.selection();
  }

  clearSelection(): void {
    this.dragController.clearSelection();
  }

  hovered(): Box | null {
    return this.pointer.hovered;
  }

  /* ========== Events & frames ========== */

  enqueue(event: InputEvent): void {
    this.queue.push(event);
  }

  pending(): number {
    return this.queue.length;
  }

  /** Route one event now. */
  dispatch(event: InputEvent): DispatchResult {
    this.flushLayout();
    try {
      return routeEvent(event, {
        root: this.root,
        modal: topmostModal(this.modals),
        rectOf: (b) => this.absoluteRectOf(b),
        drag: this.dragController,
        focus: this.focusManager,
        config: this.config,
        diagnostics: this.diagnostics,
        pointer: this.pointer,
        keyMaps: this.keyMaps,
        closeModal: (box) => this.closeModal(box),
      });
    } catch (e: unknown) {
      const err =
        e instanceof BoxError
          ? e
          : new BoxError("BOX_USER_CODE_THROW", `dispatch ${event.kind} threw: ${describeThrown(e)}`);
      this.diagnostics.error(err);
      return dispatchResult("unhandled", null);
    }
  }

  tick(frame: FrameInfo | null = null): FrameReport {
    let recomputed = this.flushLayout();
    const results: DispatchResult[] = [];
    for (let ev = this.queue.shift(); ev !== undefined; ev = this.queue.shift()) {
      results.push(this.dispatch(ev));
    }
    recomputed += this.flushLayout();
    return Object.freeze({
      frame,
      results: Object.freeze(results),
      layoutRecomputed: recomputed,
      draws: this.drawList(),
    });
  }

  /** Visible boxes in paint order; one command per fill, texture and label. */
  drawList(): readonly DrawCommand[] {
    this.ensureGeometry();
    const out: DrawCommand[] = [];
    const stack: Box[] = [this.root];
    while (stack.length > 0) {
      const box = stack.pop();
      if (box === undefined || !box.visible) continue;
      const rect = this.geometry.get(box) ?? box.rect;
      const { fill, texture, label } = box.appearance;
      if (texture !== null) out.push({ kind: "sprite", box, rect, z: out.length, texture });
      else if (fill !== null) out.push({ kind: "rect", box, rect, z: out.length, fill });
      if (label !== null) out.push({ kind: "text", box, rect, z: out.length, text: label });
      const kids = box.paintOrder();
      for (let i = kids.length - 1; i >= 0; i--) {
        const k = kids[i];
        if (k !== undefined) stack.push(k);
      }
    }
    return Object.freeze(out);
  }
}

export function createSurface(opts: SurfaceOptions): Surface {
  return new Surface(opts);
}

