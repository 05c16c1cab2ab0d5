/**
 * packages/core/src/layout/anchor.ts — Absolute rect resolution with anchors.
 *
 * Why: A node's absolute rect depends on its parent (relative placement) or on
 * its anchor reference. Anchors can point at any other node, so resolution walks
 * an explicit dependency graph instead of the tree. The walk is iterative with
 * an on-path set; a back edge is an anchor cycle.
 *
 * Results depend only on the graph, never on the order nodes are supplied in.
 */

import { CyclicAnchorError } from "../errors.js";
import { alignToPoint } from "./geometry.js";
import type { AnchorPoint, Point, Rect } from "./types.js";

export type AnchorRef<K> = "parent" | "screen" | Readonly<{ key: K }>;

export type AnchorSpec<K> = Readonly<{
  self: AnchorPoint;
  target: AnchorPoint;
  ref: AnchorRef<K>;
  offset: Point;
}>;

export type AnchorNode<K> = Readonly<{
  key: K;
  parent: K | null;
  /** Parent-relative rect; only the size is used when `anchor` is set. */
  rect: Rect;
  anchor: AnchorSpec<K> | null;
}>;

const ON_PATH = 1;
const DONE = 2;

type Frame<K> = { key: K; deps: readonly K[]; next: number };

function dependenciesOf<K>(node: AnchorNode<K>, known: ReadonlyMap<K, AnchorNode<K>>): K[] {
  const deps: K[] = [];
  const anchor = node.anchor;
  if (anchor === null || anchor.ref === "parent") {
    if (node.parent !== null && known.has(node.parent)) deps.push(node.parent);
  } else if (anchor.ref !== "screen" && known.has(anchor.ref.key)) {
    deps.push(anchor.ref.key);
  }
  return deps;
}

/**
 * Walk every node in dependency order. `visit` runs once per node, after all of
 * its dependencies. Returns the cycle path (closing key repeated) on a back edge.
 */
function walk<K>(nodes: Iterable<AnchorNode<K>>, visit: (node: AnchorNode<K>) => void): K[] | null {
  const byKey = new Map<K, AnchorNode<K>>();
  for (const n of nodes) byKey.set(n.key, n);

  const state = new Map<K, number>();
  const path: K[] = [];

  for (const start of byKey.values()) {
    if (state.has(start.key)) continue;
    const stack: Frame<K>[] = [{ key: start.key, deps: dependenciesOf(start, byKey), next: 0 }];
    state.set(start.key, ON_PATH);
    path.push(start.key);

    while (stack.length > 0) {
      const top = stack[stack.length - 1];
      if (top === undefined) break;
      const dep = top.deps[top.next];
      if (dep !== undefined) {
        top.next++;
        const s = state.get(dep);
        if (s === DONE) continue;
        if (s === ON_PATH) {
          const from = path.indexOf(dep);
          return [...path.slice(from), dep];
        }
        const depNode = byKey.get(dep);
        if (depNode === undefined) continue;
        state.set(dep, ON_PATH);
        path.push(dep);
        stack.push({ key: dep, deps: dependenciesOf(depNode, byKey), next: 0 });
        continue;
      }
      stack.pop();
      path.pop();
      state.set(top.key, DONE);
      const node = byKey.get(top.key);
      if (node !== undefined) visit(node);
    }
  }
  return null;
}

/** The first anchor cycle found, as a key path with the closing key repeated, or null. */
export function findAnchorCycle<K>(nodes: Iterable<AnchorNode<K>>): K[] | null {
  return walk(nodes, () => {});
}

/**
 * Absolute rect for every node. Nodes without a parent resolve against `screen`.
 * A reference to a key missing from `nodes` falls back to parent-relative
 * placement.
 *
 * @throws CyclicAnchorError when the dependency graph has a cycle
 */
export function resolveAbsoluteRects<K>(
  nodes: Iterable<AnchorNode<K>>,
  screen: Rect,
  describe: (key: K) => string = String,
): Map<K, Rect> {
  const out = new Map<K, Rect>();

  const originOf = (key: K | null): Rect => {
    if (key === null) return screen;
    return out.get(key) ?? screen;
  };

  const cycle = walk(nodes, (node) => {
    const { rect, anchor } = node;
    const parentAbs = originOf(node.parent);

    if (anchor !== null) {
      let refRect: Rect | undefined;
      if (anchor.ref === "parent") refRect = parentAbs;
      else if (anchor.ref === "screen") refRect = screen;
      else refRect = out.get(anchor.ref.key);

      if (refRect !== undefined) {
        const p = alignToPoint(rect, anchor.self, refRect, anchor.target, anchor.offset);
        out.set(node.key, { x: p.x, y: p.y, w: rect.w, h: rect.h });
        return;
      }
    }

    out.set(node.key, { x: parentAbs.x + rect.x, y: parentAbs.y + rect.y, w: rect.w, h: rect.h });
  });

  if (cycle !== null) throw new CyclicAnchorError(cycle.map(describe));
  return out;
}
