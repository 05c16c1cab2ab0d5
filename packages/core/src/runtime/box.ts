/**
 * packages/core/src/runtime/box.ts — The retained widget node.
 *
 * Why: A Box owns its children and holds a non-owning reference to its parent.
 * Every structural mutation is validated before anything changes, so a failed
 * call leaves the tree exactly as it was.
 *
 * Rects are parent-relative. Layout groups write member rects; drags write
 * positions. Everything that needs absolute geometry asks the owning surface
 * (BoxHost), which resolves anchors lazily.
 *
 * Dirty tracking:
 * - structural and size changes dirty the nearest layout group at or above the
 *   changed parent, and tell the host
 * - position-only changes only invalidate absolute geometry
 */

import { BoxError, CycleError, CyclicAnchorError, invalidProps } from "../errors.js";
import type {
  KeyEvent,
  PointerMoveEvent,
  PointerPressEvent,
  PointerReleaseEvent,
} from "../events.js";
import { type AnchorNode, type AnchorSpec, findAnchorCycle, resolveAbsoluteRects } from "../layout/anchor.js";
import { ZERO_RECT, rectsEqual } from "../layout/geometry.js";
import {
  type LayoutPolicy,
  type LayoutPolicyInput,
  recomputeGroup,
  resolveLayoutPolicy,
} from "../layout/group.js";
import type { AnchorPoint, Point, Rect, Size } from "../layout/types.js";

/* ========== Capabilities ========== */

export type PositionalAnchor = Readonly<{
  self: AnchorPoint;
  target: AnchorPoint;
  ref: "parent" | "screen" | Box;
  offset: Point;
}>;

/** `self` defaults to `target`, `target` to "top-left", `ref` to "parent". */
export type PositionalAnchorInput = Readonly<{
  self?: AnchorPoint;
  target?: AnchorPoint;
  ref?: "parent" | "screen" | Box;
  offset?: Partial<Point>;
}>;

export type DragPolicy = Readonly<{
  /** Which box moves: the handle itself, or its parent (title-bar drag). */
  moveTarget: "self" | "parent";
  /** Return to the pre-drag rect when released over no accepting target. */
  snapBack: boolean;
  /** Keep the moved box inside this box's absolute rect. */
  bounds: Box | null;
}>;

export type DropTarget = Readonly<{
  /** Point of both rects aligned on a drop. */
  dropAnchor: AnchorPoint;
  /** Default: accept when unoccupied or already holding the subject. */
  canReceive: ((target: Box, subject: Box) => boolean) | null;
  onReceive: ((target: Box, subject: Box) => void) | null;
  /** The occupant left for somewhere else. */
  onRelease: ((target: Box, subject: Box) => void) | null;
}>;

export type Selectable = Readonly<{
  onHighlight: ((box: Box) => void) | null;
  onUnhighlight: ((box: Box) => void) | null;
  onSelect: ((box: Box) => void) | null;
  onDeselect: ((box: Box) => void) | null;
}>;

/* ========== Handlers ========== */

/** Pointer and key handlers return `true` to consume the event and stop bubbling. */
export type BoxHandlers = {
  onPress?: (box: Box, event: PointerPressEvent) => boolean | void;
  onRelease?: (box: Box, event: PointerReleaseEvent) => boolean | void;
  onClick?: (box: Box, event: PointerReleaseEvent) => boolean | void;
  onHover?: (box: Box, event: PointerMoveEvent) => void;
  onUnhover?: (box: Box, event: PointerMoveEvent) => void;
  onKey?: (box: Box, event: KeyEvent) => boolean | void;
  onDragStart?: (box: Box) => void;
  onDrop?: (box: Box, target: Box) => void;
  onFocus?: (box: Box) => void;
  onBlur?: (box: Box) => void;
};

export type HandlerName = keyof BoxHandlers;

/* ========== Options ========== */

export type BoxOptions = Readonly<
  {
    id?: string;
    x?: number;
    y?: number;
    w?: number;
    h?: number;
    zIndex?: number;
    visible?: boolean;
    inputEnabled?: boolean;
    focusable?: boolean;
    raiseOnFocus?: boolean;
    /** Presses here start rubber-band selection like empty space does. */
    selectionArea?: boolean;
    fill?: string;
    texture?: string;
    label?: string;
    anchor?: PositionalAnchorInput;
    layout?: LayoutPolicyInput;
    drag?: boolean | Partial<DragPolicy>;
    dropTarget?: boolean | Partial<DropTarget>;
    selectable?: boolean | Partial<Selectable>;
    children?: readonly Box[];
  } & BoxHandlers
>;

export type Appearance = Readonly<{
  fill: string | null;
  texture: string | null;
  label: string | null;
}>;

/**
 * What a box needs from the surface that owns its tree.
 * Only the root box of a surface is bound to a host.
 */
export interface BoxHost {
  noteLayoutDirty(): void;
  noteGeometryDirty(): void;
  /** `subtree` just left this host's tree (removed, destroyed or moved elsewhere). */
  noteDetached(subtree: Box): void;
  /** Visibility or input-enabled changed on `box`. */
  noteInteractivityChanged(box: Box): void;
  absoluteRectOf(box: Box): Rect;
}

let nextSerial = 1;

const HANDLER_NAMES: readonly HandlerName[] = [
  "onPress",
  "onRelease",
  "onClick",
  "onHover",
  "onUnhover",
  "onKey",
  "onDragStart",
  "onDrop",
  "onFocus",
  "onBlur",
];

function requireFinite(name: string, v: number): number {
  if (!Number.isFinite(v)) invalidProps(`${name} must be a finite number`);
  return v;
}

function requireSize(name: string, v: number): number {
  if (!Number.isFinite(v) || v < 0) invalidProps(`${name} must be a finite number >= 0`);
  return v;
}

export function resolveDragPolicy(input: boolean | Partial<DragPolicy> | null): DragPolicy | null {
  if (input === null || input === false) return null;
  const p = input === true ? {} : input;
  return Object.freeze({
    moveTarget: p.moveTarget ?? "self",
    snapBack: p.snapBack ?? false,
    bounds: p.bounds ?? null,
  });
}

export function resolveDropTarget(input: boolean | Partial<DropTarget> | null): DropTarget | null {
  if (input === null || input === false) return null;
  const p = input === true ? {} : input;
  return Object.freeze({
    dropAnchor: p.dropAnchor ?? "center",
    canReceive: p.canReceive ?? null,
    onReceive: p.onReceive ?? null,
    onRelease: p.onRelease ?? null,
  });
}

export function resolveSelectable(input: boolean | Partial<Selectable> | null): Selectable | null {
  if (input === null || input === false) return null;
  const p = input === true ? {} : input;
  return Object.freeze({
    onHighlight: p.onHighlight ?? null,
    onUnhighlight: p.onUnhighlight ?? null,
    onSelect: p.onSelect ?? null,
    onDeselect: p.onDeselect ?? null,
  });
}

export function resolveAnchor(input: PositionalAnchorInput): PositionalAnchor {
  const target = input.target ?? "top-left";
  return Object.freeze({
    self: input.self ?? target,
    target,
    ref: input.ref ?? "parent",
    offset: Object.freeze({
      x: requireFinite("anchor.offset.x", input.offset?.x ?? 0),
      y: requireFinite("anchor.offset.y", input.offset?.y ?? 0),
    }),
  });
}

function toAnchorSpec(a: PositionalAnchor): AnchorSpec<Box> {
  return {
    self: a.self,
    target: a.target,
    ref: a.ref === "parent" || a.ref === "screen" ? a.ref : { key: a.ref },
    offset: a.offset,
  };
}

export function describeBox(box: Box): string {
  return `box#${box.id}`;
}

/**
 * Anchor graph of every box under `roots`.
 * `override` substitutes one box's parent or anchor, to test a mutation before applying it.
 */
export function anchorGraph(
  roots: readonly Box[],
  override?: Readonly<{ box: Box; parent?: Box | null; anchor?: PositionalAnchor | null }>,
): AnchorNode<Box>[] {
  const out: AnchorNode<Box>[] = [];
  for (const root of roots) {
    for (const b of root.subtree()) {
      const parent = override?.box === b && override.parent !== undefined ? override.parent : b.parent;
      const anchor = override?.box === b && override.anchor !== undefined ? override.anchor : b.anchor;
      out.push({
        key: b,
        parent,
        rect: b.rect,
        anchor: anchor === null ? null : toAnchorSpec(anchor),
      });
    }
  }
  return out;
}

export class Box {
  readonly id: string;
  readonly serial: number;

  private rectValue: Rect;
  private naturalSizeValue: Size;
  private parentRef: Box | null = null;
  private readonly childList: Box[] = [];
  private hostRef: BoxHost | null = null;
  private destroyedFlag = false;

  private zIndexValue: number;
  private visibleValue: boolean;
  private inputEnabledValue: boolean;
  private focusableValue: boolean;
  private anchorValue: PositionalAnchor | null = null;
  private layoutValue: LayoutPolicy | null = null;
  private layoutDirtyFlag = false;
  private dragValue: DragPolicy | null;
  private dropValue: DropTarget | null;
  private selectableValue: Selectable | null;
  private appearanceValue: Appearance;
  private readonly handlers: BoxHandlers = {};

  raiseOnFocus: boolean;
  selectionArea: boolean;

  /* Interaction state, written by the surface's controllers. */
  private selectedFlag = false;
  private highlightedFlag = false;
  private occupantRef: Box | null = null;
  private occupyingRef: Box | null = null;

  constructor(opts: BoxOptions = {}) {
    this.serial = nextSerial++;
    this.id = opts.id ?? `box-${String(this.serial)}`;
    const x = requireFinite("x", opts.x ?? 0);
    const y = requireFinite("y", opts.y ?? 0);
    const w = requireSize("w", opts.w ?? 0);
    const h = requireSize("h", opts.h ?? 0);
    this.rectValue = Object.freeze({ x, y, w, h });
    this.naturalSizeValue = Object.freeze({ w, h });
    this.zIndexValue = requireFinite("zIndex", opts.zIndex ?? 0);
    this.visibleValue = opts.visible ?? true;
    this.inputEnabledValue = opts.inputEnabled ?? true;
    this.focusableValue = opts.focusable ?? false;
    this.raiseOnFocus = opts.raiseOnFocus ?? false;
    this.selectionArea = opts.selectionArea ?? false;
    this.dragValue = resolveDragPolicy(opts.drag ?? null);
    this.dropValue = resolveDropTarget(opts.dropTarget ?? null);
    this.selectableValue = resolveSelectable(opts.selectable ?? null);
    this.appearanceValue = Object.freeze({
      fill: opts.fill ?? null,
      texture: opts.texture ?? null,
      label: opts.label ?? null,
    });
    if (opts.layout !== undefined) {
      this.layoutValue = resolveLayoutPolicy(opts.layout);
      this.layoutDirtyFlag = true;
    }
    for (const name of HANDLER_NAMES) {
      const fn = opts[name];
      if (fn !== undefined) this.setHandler(name, fn);
    }
    if (opts.anchor !== undefined) this.setAnchor(opts.anchor);
    for (const child of opts.children ?? []) this.addChild(child);
  }

  /* ========== Queries ========== */

  get rect(): Rect {
    return this.rectValue;
  }

  /** Size the box asks for; layout may stretch `rect` beyond it. */
  get naturalSize(): Size {
    return this.naturalSizeValue;
  }

  get parent(): Box | null {
    return this.parentRef;
  }

  get children(): readonly Box[] {
    return this.childList;
  }

  get destroyed(): boolean {
    return this.destroyedFlag;
  }

  get zIndex(): number {
    return this.zIndexValue;
  }

  get visible(): boolean {
    return this.visibleValue;
  }

  get inputEnabled(): boolean {
    return this.inputEnabledValue;
  }

  get focusable(): boolean {
    return this.focusableValue;
  }

  get anchor(): PositionalAnchor | null {
    return this.anchorValue;
  }

  get layout(): LayoutPolicy | null {
    return this.layoutValue;
  }

  get layoutDirty(): boolean {
    return this.layoutDirtyFlag;
  }

  get dragPolicy(): DragPolicy | null {
    return this.dragValue;
  }

  get dropTarget(): DropTarget | null {
    return this.dropValue;
  }

  get selectable(): Selectable | null {
    return this.selectableValue;
  }

  get appearance(): Appearance {
    return this.appearanceValue;
  }

  get selected(): boolean {
    return this.selectedFlag;
  }

  get highlighted(): boolean {
    return this.highlightedFlag;
  }

  /** Box currently snapped onto this drop target. */
  get occupant(): Box | null {
    return this.occupantRef;
  }

  /** Drop target this box is snapped onto. */
  get occupying(): Box | null {
    return this.occupyingRef;
  }

  handler<K extends HandlerName>(name: K): BoxHandlers[K] {
    return this.handlers[name];
  }

  root(): Box {
    let b: Box = this;
    while (b.parentRef !== null) b = b.parentRef;
    return b;
  }

  host(): BoxHost | null {
    return this.root().hostRef;
  }

  isAncestorOf(other: Box): boolean {
    for (let b = other.parentRef; b !== null; b = b.parentRef) {
      if (b === this) return true;
    }
    return false;
  }

  /** `other` is this box or inside it. */
  contains(other: Box): boolean {
    return other === this || this.isAncestorOf(other);
  }

  /** Visible and input-enabled, together with every ancestor. */
  isInteractive(): boolean {
    for (let b: Box | null = this; b !== null; b = b.parentRef) {
      if (!b.visibleValue || !b.inputEnabledValue) return false;
    }
    return true;
  }

  /** Children in paint order: ascending zIndex, ties by child index. */
  paintOrder(): readonly Box[] {
    const list = this.childList;
    for (let i = 1; i < list.length; i++) {
      const prev = list[i - 1];
      const cur = list[i];
      if (prev !== undefined && cur !== undefined && prev.zIndexValue > cur.zIndexValue) {
        return list
          .map((box, index) => ({ box, index }))
          .sort((a, b) => a.box.zIndexValue - b.box.zIndexValue || a.index - b.index)
          .map((e) => e.box);
      }
    }
    return list;
  }

  /** This box and every descendant, depth-first preorder in paint order. */
  subtree(): Box[] {
    const out: Box[] = [];
    const stack: Box[] = [this];
    while (stack.length > 0) {
      const b = stack.pop();
      if (b === undefined) break;
      out.push(b);
      const kids = b.paintOrder();
      for (let i = kids.length - 1; i >= 0; i--) {
        const k = kids[i];
        if (k !== undefined) stack.push(k);
      }
    }
    return out;
  }

  descendants(): Box[] {
    return this.subtree().slice(1);
  }

  absoluteRect(): Rect {
    const host = this.host();
    if (host !== null) return host.absoluteRectOf(this);
    const rects = resolveAbsoluteRects(anchorGraph([this.root()]), ZERO_RECT, describeBox);
    return rects.get(this) ?? this.rectValue;
  }

  /* ========== Structure ========== */

  addChild(child: Box, index?: number): this {
    this.assertAlive("addChild");
    child.assertAlive("addChild");
    if (child === this || child.isAncestorOf(this)) {
      throw new CycleError(`${describeBox(child)} cannot become a child of ${describeBox(this)}`);
    }
    if (child.hostRef !== null) {
      throw new BoxError("BOX_FOREIGN_SURFACE", `${describeBox(child)} is the root of a surface`);
    }
    const available = this.childList.length - (child.parentRef === this ? 1 : 0);
    const at = index ?? available;
    if (!Number.isInteger(at) || at < 0 || at > available) {
      invalidProps(`addChild index ${String(at)} out of range [0, ${String(available)}]`);
    }

    const roots = child.root() === this.root() ? [this.root()] : [this.root(), child.root()];
    const cycle = findAnchorCycle(anchorGraph(roots, { box: child, parent: this }));
    if (cycle !== null) throw new CyclicAnchorError(cycle.map(describeBox));

    const oldParent = child.parentRef;
    const oldHost = child.host();
    if (oldParent !== null) oldParent.unlinkChild(child);
    this.childList.splice(at, 0, child);
    child.parentRef = this;

    if (oldParent !== null) markStructureChanged(oldParent);
    markStructureChanged(this);
    const newHost = this.host();
    if (oldHost !== null && oldHost !== newHost) oldHost.noteDetached(child);
    return this;
  }

  /** Returns false when `child` is not a child of this box. */
  removeChild(child: Box): boolean {
    this.assertAlive("removeChild");
    if (child.parentRef !== this) return false;
    const host = this.host();
    this.unlinkChild(child);
    markStructureChanged(this);
    host?.noteDetached(child);
    return true;
  }

  /** Detach from the parent and reject further structural mutation on the whole subtree. */
  destroy(): void {
    if (this.destroyedFlag) return;
    if (this.hostRef !== null) invalidProps("a surface root cannot be destroyed");
    this.parentRef?.removeChild(this);
    for (const b of this.subtree()) b.destroyedFlag = true;
  }

  private unlinkChild(child: Box): void {
    const i = this.childList.indexOf(child);
    if (i >= 0) this.childList.splice(i, 1);
    child.parentRef = null;
  }

  private assertAlive(op: string): void {
    if (this.destroyedFlag) {
      throw new BoxError("BOX_DESTROYED", `${op}: ${describeBox(this)} is destroyed`);
    }
  }

  /* ========== Geometry ========== */

  setRect(r: Rect): this {
    const x = requireFinite("rect.x", r.x);
    const y = requireFinite("rect.y", r.y);
    const w = requireSize("rect.w", r.w);
    const h = requireSize("rect.h", r.h);
    const next: Rect = Object.freeze({ x, y, w, h });
    const sizeChanged = w !== this.naturalSizeValue.w || h !== this.naturalSizeValue.h;
    if (!sizeChanged && rectsEqual(next, this.rectValue)) return this;
    this.rectValue = next;
    this.naturalSizeValue = Object.freeze({ w, h });
    if (sizeChanged) {
      if (this.layoutValue !== null) this.layoutDirtyFlag = true;
      markSizeChanged(this);
    } else {
      this.host()?.noteGeometryDirty();
    }
    return this;
  }

  setPosition(x: number, y: number): this {
    const r = this.rectValue;
    if (r.x === x && r.y === y) return this;
    requireFinite("x", x);
    requireFinite("y", y);
    this.rectValue = Object.freeze({ x, y, w: r.w, h: r.h });
    this.host()?.noteGeometryDirty();
    return this;
  }

  setSize(w: number, h: number): this {
    return this.setRect({ x: this.rectValue.x, y: this.rectValue.y, w, h });
  }

  setZIndex(z: number): this {
    requireFinite("zIndex", z);
    if (z === this.zIndexValue) return this;
    this.zIndexValue = z;
    this.host()?.noteGeometryDirty();
    return this;
  }

  /** Raise above every sibling. No-op when already topmost. */
  bringToFront(): this {
    const parent = this.parentRef;
    if (parent === null) return this;
    const order = parent.paintOrder();
    if (order[order.length - 1] === this) return this;
    let maxZ = this.zIndexValue;
    for (const sib of parent.childList) {
      if (sib !== this && sib.zIndexValue > maxZ) maxZ = sib.zIndexValue;
    }
    return this.setZIndex(maxZ + 1);
  }

  setAnchor(input: PositionalAnchorInput | null): this {
    this.assertAlive("setAnchor");
    const next = input === null ? null : resolveAnchor(input);
    if (next !== null) {
      const roots = [this.root()];
      if (next.ref !== "parent" && next.ref !== "screen" && next.ref.root() !== this.root()) {
        roots.push(next.ref.root());
      }
      const cycle = findAnchorCycle(anchorGraph(roots, { box: this, anchor: next }));
      if (cycle !== null) throw new CyclicAnchorError(cycle.map(describeBox));
    }
    const wasAnchored = this.anchorValue !== null;
    this.anchorValue = next;
    if (wasAnchored !== (next !== null) && this.parentRef !== null) {
      // Entering or leaving group flow.
      markStructureChanged(this.parentRef);
    } else {
      this.host()?.noteGeometryDirty();
    }
    return this;
  }

  setLayout(input: LayoutPolicyInput | null): this {
    this.assertAlive("setLayout");
    this.layoutValue = input === null ? null : resolveLayoutPolicy(input);
    this.layoutDirtyFlag = this.layoutValue !== null;
    markSizeChanged(this);
    return this;
  }

  /** Recompute this box's layout group now. Returns true when the group's own size changed. */
  recompute(): boolean {
    if (this.layoutValue === null) return false;
    const changed = recomputeGroup(this, this.layoutValue);
    this.layoutDirtyFlag = false;
    return changed;
  }

  /* ========== Flags & capabilities ========== */

  setVisible(visible: boolean): this {
    if (visible === this.visibleValue) return this;
    this.visibleValue = visible;
    // Hidden members take no space.
    if (this.parentRef !== null) markStructureChanged(this.parentRef);
    this.host()?.noteInteractivityChanged(this);
    return this;
  }

  setInputEnabled(enabled: boolean): this {
    if (enabled === this.inputEnabledValue) return this;
    this.inputEnabledValue = enabled;
    this.host()?.noteInteractivityChanged(this);
    return this;
  }

  setFocusable(focusable: boolean): this {
    if (focusable === this.focusableValue) return this;
    this.focusableValue = focusable;
    this.host()?.noteInteractivityChanged(this);
    return this;
  }

  setDragPolicy(policy: boolean | Partial<DragPolicy> | null): this {
    this.dragValue = resolveDragPolicy(policy);
    return this;
  }

  setDropTarget(target: boolean | Partial<DropTarget> | null): this {
    this.dropValue = resolveDropTarget(target);
    return this;
  }

  setSelectable(selectable: boolean | Partial<Selectable> | null): this {
    this.selectableValue = resolveSelectable(selectable);
    return this;
  }

  setAppearance(patch: Partial<Appearance>): this {
    this.appearanceValue = Object.freeze({ ...this.appearanceValue, ...patch });
    return this;
  }

  /** Register (or with `undefined`, remove) a handler. */
  on<K extends HandlerName>(name: K, fn: BoxHandlers[K]): this {
    this.setHandler(name, fn);
    return this;
  }

  private setHandler<K extends HandlerName>(name: K, fn: BoxHandlers[K]): void {
    if (fn === undefined) {
      delete this.handlers[name];
      return;
    }
    if (typeof fn !== "function") invalidProps(`${name} must be a function`);
    this.handlers[name] = fn;
  }

  /* ========== Internal: surface and controllers ========== */

  /** @internal Bind this box as the root of a surface. */
  internal_bindHost(host: BoxHost): void {
    if (this.parentRef !== null) invalidProps("a surface root cannot have a parent");
    if (this.hostRef !== null && this.hostRef !== host) {
      throw new BoxError("BOX_FOREIGN_SURFACE", `${describeBox(this)} already belongs to a surface`);
    }
    this.hostRef = host;
  }

  /** @internal Layout writes: never dirties layout. `natural` also updates the requested size. */
  internal_applyLayoutRect(r: Rect, natural: boolean): void {
    if (natural) this.naturalSizeValue = Object.freeze({ w: r.w, h: r.h });
    if (rectsEqual(r, this.rectValue)) return;
    this.rectValue = Object.freeze({ x: r.x, y: r.y, w: r.w, h: r.h });
    this.host()?.noteGeometryDirty();
  }

  /** @internal */
  internal_markLayoutDirty(): void {
    if (this.layoutValue !== null) this.layoutDirtyFlag = true;
  }

  /** @internal */
  internal_setSelected(v: boolean): void {
    this.selectedFlag = v;
  }

  /** @internal */
  internal_setHighlighted(v: boolean): void {
    this.highlightedFlag = v;
  }

  /** @internal Link `subject` onto this drop target (or clear with null). */
  internal_setOccupant(subject: Box | null): void {
    const prev = this.occupantRef;
    if (prev !== null && prev.occupyingRef === this) prev.occupyingRef = null;
    this.occupantRef = subject;
    if (subject !== null) {
      const prevTarget = subject.occupyingRef;
      if (prevTarget !== null && prevTarget !== this) prevTarget.occupantRef = null;
      subject.occupyingRef = this;
    }
  }
}

/** Nearest layout group at or above `from`. */
export function nearestGroup(from: Box | null): Box | null {
  for (let b = from; b !== null; b = b.parent) {
    if (b.layout !== null) return b;
  }
  return null;
}

/** `parent`'s child set (or a member's flow participation) changed. */
function markStructureChanged(parent: Box): void {
  nearestGroup(parent)?.internal_markLayoutDirty();
  const host = parent.host();
  host?.noteLayoutDirty();
}

/** `box`'s requested size changed. */
function markSizeChanged(box: Box): void {
  nearestGroup(box.parent)?.internal_markLayoutDirty();
  const host = box.host();
  host?.noteLayoutDirty();
}

export function makeBox(opts: BoxOptions = {}): Box {
  return new Box(opts);
}
