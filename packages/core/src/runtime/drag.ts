/**
 * packages/core/src/runtime/drag.ts — Drag-to-move and rubber-band selection.
 *
 * Why: One session per surface, driven by the router:
 *
 *   idle --press--> pressed --move >= threshold--> dragging --release--> idle
 *                      \--release (no drag)--> idle
 *
 * A press never gets consumed here, so the pressed box still sees it. Moves and
 * the release are consumed only while dragging. A second press during a session
 * is ignored and reported through diagnostics.
 *
 * Move mode commits onto the best drop target under the release point (largest
 * overlap with the moved box, then topmost), snaps back, or stays put.
 * Select mode keeps a provisional set while the band is open and turns it into
 * the selection on release.
 */

import type { ResolvedSurfaceConfig } from "../config.js";
import type { Diagnostics } from "../diagnostics.js";
import {
  type PointerButton,
  type PointerMoveEvent,
  type PointerPressEvent,
  type PointerReleaseEvent,
  hasModifier,
} from "../events.js";
import {
  alignToPoint,
  clampRectWithin,
  overlapArea,
  rectFromPoints,
  translateRect,
} from "../layout/geometry.js";
import { type RectLookup, collectIntersecting, hitTestAll } from "../layout/hitTest.js";
import type { Point, Rect } from "../layout/types.js";
import { type Box, type DragPolicy, describeBox } from "./box.js";

export type DragMode = "move" | "select";
export type DragPhase = "idle" | "pressed" | "dragging";

export type DragSession = Readonly<{
  mode: DragMode;
  /** Box that was pressed (move mode). */
  handle: Box | null;
  /** Box that moves (move mode). */
  subject: Box | null;
  origin: Point;
  current: Point;
  /** Subject's parent-relative rect at press time. */
  startRect: Rect;
  startedAt: number;
  phase: "pressed" | "dragging";
  button: PointerButton;
  additive: boolean;
  provisional: readonly Box[];
}>;

export type DragOutcome =
  | Readonly<{ kind: "none" }>
  | Readonly<{ kind: "dropped"; subject: Box; target: Box }>
  | Readonly<{ kind: "cancelled"; subject: Box | null }>
  | Readonly<{ kind: "released"; subject: Box }>
  | Readonly<{ kind: "selected"; selection: readonly Box[] }>;

export type DragRelease = Readonly<{ consumed: boolean; outcome: DragOutcome }>;

export type DragControllerDeps = Readonly<{
  root: Box;
  scope: () => Box | null;
  rectOf: RectLookup;
  screen: () => Rect;
  config: ResolvedSurfaceConfig;
  diagnostics: Diagnostics;
}>;

export type DragController = Readonly<{
  phase: () => DragPhase;
  session: () => DragSession | null;
  selection: () => readonly Box[];
  /** "ignored" when a session was already active. */
  press: (event: PointerPressEvent, hit: Box | null) => "started" | "ignored" | "none";
  /** True when the move was consumed (dragging). */
  move: (event: PointerMoveEvent) => boolean;
  release: (event: PointerReleaseEvent) => DragRelease;
  /** `restore` puts a moved subject back and clears highlights with callbacks. */
  cancel: (restore: boolean) => boolean;
  clearSelection: () => void;
  /** Forget every reference into `subtree` without calling into it. */
  releaseSubtree: (subtree: Box) => void;
}>;

type MutableSession = {
  mode: DragMode;
  handle: Box | null;
  subject: Box | null;
  policy: DragPolicy | null;
  origin: Point;
  current: Point;
  startRect: Rect;
  startAbs: Rect;
  startedAt: number;
  phase: "pressed" | "dragging";
  button: PointerButton;
  additive: boolean;
  provisional: Box[];
};

const NONE: DragOutcome = Object.freeze({ kind: "none" });

/** Nearest ancestor-or-self with a drag policy, without leaving `scope`. */
function findDragHandle(hit: Box | null, scope: Box | null): Box | null {
  for (let b = hit; b !== null; b = b.parent) {
    if (b.dragPolicy !== null) return b;
    if (b === scope) break;
  }
  return null;
}

export function createDragController(deps: DragControllerDeps): DragController {
  const { root, rectOf, config, diagnostics } = deps;
  let session: MutableSession | null = null;
  let selection: Box[] = [];

  const guard = (label: string, fn: () => void): void => {
    diagnostics.guard(label, fn);
  };

  const snapshot = (s: MutableSession): DragSession =>
    Object.freeze({
      mode: s.mode,
      handle: s.handle,
      subject: s.subject,
      origin: s.origin,
      current: s.current,
      startRect: s.startRect,
      startedAt: s.startedAt,
      phase: s.phase,
      button: s.button,
      additive: s.additive,
      provisional: Object.freeze(s.provisional.slice()),
    });

  const setHighlighted = (box: Box, on: boolean): void => {
    box.internal_setHighlighted(on);
    const sel = box.selectable;
    const cb = on ? sel?.onHighlight : sel?.onUnhighlight;
    if (cb) guard(`${box.id}.${on ? "onHighlight" : "onUnhighlight"}`, () => cb(box));
  };

  const setSelected = (box: Box, on: boolean): void => {
    box.internal_setSelected(on);
    const sel = box.selectable;
    const cb = on ? sel?.onSelect : sel?.onDeselect;
    if (cb) guard(`${box.id}.${on ? "onSelect" : "onDeselect"}`, () => cb(box));
  };

  /* ---------- move mode ---------- */

  const positionSubject = (s: MutableSession): void => {
    const subject = s.subject;
    if (subject === null) return;
    let candidate = translateRect(s.startAbs, s.current.x - s.origin.x, s.current.y - s.origin.y);
    const bounds = s.policy?.bounds ?? null;
    if (bounds !== null) {
      if (bounds.root() === root) {
        candidate = clampRectWithin(candidate, rectOf(bounds));
      } else {
        diagnostics.devWarn(
          "drag",
          `bounds:${bounds.id}`,
          `bounds ${describeBox(bounds)} is not attached; drag is unclamped`,
        );
      }
    }
    subject.setPosition(
      s.startRect.x + candidate.x - s.startAbs.x,
      s.startRect.y + candidate.y - s.startAbs.y,
    );
  };

  const accepts = (target: Box, subject: Box): boolean => {
    const dt = target.dropTarget;
    if (dt === null) return false;
    if (dt.canReceive === null) return target.occupant === null || target.occupant === subject;
    const canReceive = dt.canReceive;
    return diagnostics.guard(`${target.id}.canReceive`, () => canReceive(target, subject)) === true;
  };

  const pickDropTarget = (subject: Box, x: number, y: number): Box | null => {
    const candidates = hitTestAll(root, x, y, rectOf, {
      scope: deps.scope(),
      accept: (b) => b.dropTarget !== null && !subject.contains(b),
    });
    const subjectRect = rectOf(subject);
    let best: Box | null = null;
    let bestArea = -1;
    // Later candidates are higher in paint order, so >= lets them win ties.
    for (const c of candidates) {
      if (!accepts(c, subject)) continue;
      const area = overlapArea(subjectRect, rectOf(c));
      if (area >= bestArea) {
        best = c;
        bestArea = area;
      }
    }
    return best;
  };

  const commitDrop = (s: MutableSession, subject: Box, target: Box): DragOutcome => {
    const dt = target.dropTarget;
    const point = dt?.dropAnchor ?? "center";
    const aligned = alignToPoint(subject.rect, point, rectOf(target), point, { x: 0, y: 0 });
    subject.setPosition(
      s.startRect.x + aligned.x - s.startAbs.x,
      s.startRect.y + aligned.y - s.startAbs.y,
    );

    const prev = subject.occupying;
    target.internal_setOccupant(subject);
    if (prev !== null && prev !== target) {
      const onRelease = prev.dropTarget?.onRelease;
      if (onRelease) guard(`${prev.id}.onRelease`, () => onRelease(prev, subject));
    }
    const onReceive = dt?.onReceive;
    if (onReceive) guard(`${target.id}.onReceive`, () => onReceive(target, subject));
    const onDrop = subject.handler("onDrop");
    if (onDrop) guard(`${subject.id}.onDrop`, () => onDrop(subject, target));
    return Object.freeze({ kind: "dropped", subject, target });
  };

  const finishMove = (s: MutableSession, event: PointerReleaseEvent): DragOutcome => {
    const subject = s.subject;
    if (subject === null) return NONE;
    positionSubject(s);
    const target = pickDropTarget(subject, event.x, event.y);
    if (target !== null) return commitDrop(s, subject, target);

    if (s.policy?.snapBack === true) {
      subject.setPosition(s.startRect.x, s.startRect.y);
      return Object.freeze({ kind: "cancelled", subject });
    }

    const prev = subject.occupying;
    if (prev !== null) {
      prev.internal_setOccupant(null);
      const onRelease = prev.dropTarget?.onRelease;
      if (onRelease) guard(`${prev.id}.onRelease`, () => onRelease(prev, subject));
    }
    return Object.freeze({ kind: "released", subject });
  };

  /* ---------- select mode ---------- */

  const updateBand = (s: MutableSession): void => {
    const band = rectFromPoints(s.origin, s.current);
    const hits = collectIntersecting(deps.scope() ?? root, band, rectOf, (b) => b.selectable !== null);
    const prev = s.provisional;
    s.provisional = hits;
    for (const b of prev) if (!hits.includes(b)) setHighlighted(b, false);
    for (const b of hits) if (!prev.includes(b)) setHighlighted(b, true);
  };

  const finishSelect = (s: MutableSession): DragOutcome => {
    const picked = s.provisional;
    s.provisional = [];
    for (const b of picked) setHighlighted(b, false);

    const prev = selection;
    const next = s.additive ? [...prev, ...picked.filter((b) => !prev.includes(b))] : picked;
    selection = next;
    for (const b of prev) if (!next.includes(b)) setSelected(b, false);
    for (const b of next) if (!prev.includes(b)) setSelected(b, true);
    return Object.freeze({ kind: "selected", selection: Object.freeze(next.slice()) });
  };

  /* ---------- transitions ---------- */

  const beginDragging = (s: MutableSession): void => {
    s.phase = "dragging";
    const subject = s.subject;
    if (s.mode !== "move" || subject === null) return;
    if (subject.anchor !== null) {
      // An anchored box is pinned where it currently resolves.
      subject.setAnchor(null);
      subject.setPosition(s.startRect.x, s.startRect.y);
    }
    const onDragStart = subject.handler("onDragStart");
    if (onDragStart) guard(`${subject.id}.onDragStart`, () => onDragStart(subject));
  };

  const press = (event: PointerPressEvent, hit: Box | null): "started" | "ignored" | "none" => {
    if (session !== null) {
      diagnostics.warn(
        "drag",
        `press at (${String(event.x)},${String(event.y)}) ignored: a ${session.mode} drag is active`,
      );
      return "ignored";
    }
    if (event.button !== "left") return "none";

    const origin: Point = { x: event.x, y: event.y };
    const scope = deps.scope();
    const handle = findDragHandle(hit, scope);
    if (handle !== null) {
      const policy = handle.dragPolicy;
      const subject = policy?.moveTarget === "parent" ? handle.parent : handle;
      if (subject === null || policy === null) return "none";
      const startAbs = rectOf(subject);
      const parentAbs = subject.parent === null ? deps.screen() : rectOf(subject.parent);
      session = {
        mode: "move",
        handle,
        subject,
        policy,
        origin,
        current: origin,
        startRect: {
          x: startAbs.x - parentAbs.x,
          y: startAbs.y - parentAbs.y,
          w: startAbs.w,
          h: startAbs.h,
        },
        startAbs,
        startedAt: event.timeMs,
        phase: "pressed",
        button: event.button,
        additive: false,
        provisional: [],
      };
      return "started";
    }

    const emptySpace = hit === null || hit === root || hit.selectionArea;
    if (!config.rubberBand || !emptySpace) return "none";
    session = {
      mode: "select",
      handle: null,
      subject: null,
      policy: null,
      origin,
      current: origin,
      startRect: { x: origin.x, y: origin.y, w: 0, h: 0 },
      startAbs: { x: origin.x, y: origin.y, w: 0, h: 0 },
      startedAt: event.timeMs,
      phase: "pressed",
      button: event.button,
      additive: hasModifier(event.mods, config.additiveModifier),
      provisional: [],
    };
    return "started";
  };

  const move = (event: PointerMoveEvent): boolean => {
    const s = session;
    if (s === null) return false;
    s.current = { x: event.x, y: event.y };
    if (s.phase === "pressed") {
      const dist = Math.hypot(s.current.x - s.origin.x, s.current.y - s.origin.y);
      if (dist < config.dragThreshold) return false;
      beginDragging(s);
      // A callback may have cancelled the session.
      if (session !== s) return true;
    }
    if (s.mode === "move") positionSubject(s);
    else updateBand(s);
    return true;
  };

  const release = (event: PointerReleaseEvent): DragRelease => {
    const s = session;
    if (s === null || event.button !== s.button) return { consumed: false, outcome: NONE };
    session = null;
    s.current = { x: event.x, y: event.y };

    if (s.phase === "pressed") {
      // A click on empty space still settles the selection.
      return { consumed: false, outcome: s.mode === "select" ? finishSelect(s) : NONE };
    }
    if (s.mode === "move") return { consumed: true, outcome: finishMove(s, event) };
    updateBand(s);
    return { consumed: true, outcome: finishSelect(s) };
  };

  const cancel = (restore: boolean): boolean => {
    const s = session;
    if (s === null) return false;
    session = null;
    if (!restore) return true;
    if (s.mode === "move" && s.phase === "dragging" && s.subject !== null) {
      s.subject.setPosition(s.startRect.x, s.startRect.y);
    }
    for (const b of s.provisional) setHighlighted(b, false);
    return true;
  };

  const releaseSubtree = (subtree: Box): void => {
    const s = session;
    if (s !== null) {
      const owned =
        (s.subject !== null && subtree.contains(s.subject)) ||
        (s.handle !== null && subtree.contains(s.handle));
      if (owned) {
        diagnostics.devWarn("drag", `detached:${subtree.id}`, `drag cancelled: ${describeBox(subtree)} left the surface`);
        session = null;
      } else {
        s.provisional = s.provisional.filter((b) => !subtree.contains(b));
      }
    }

    selection = selection.filter((b) => !subtree.contains(b));
    for (const b of subtree.subtree()) {
      b.internal_setHighlighted(false);
      b.internal_setSelected(false);
      const target = b.occupying;
      if (target !== null && !subtree.contains(target)) target.internal_setOccupant(null);
      const occupant = b.occupant;
      if (occupant !== null && !subtree.contains(occupant)) b.internal_setOccupant(null);
    }
  };

  return Object.freeze({
    phase: (): DragPhase => (session === null ? "idle" : session.phase),
    session: () => (session === null ? null : snapshot(session)),
    selection: () => Object.freeze(selection.slice()),
    press,
    move,
    release,
    cancel,
    clearSelection: () => {
      const prev = selection;
      selection = [];
      for (const b of prev) setSelected(b, false);
    },
    releaseSubtree,
  });
}
