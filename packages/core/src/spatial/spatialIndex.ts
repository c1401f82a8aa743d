/**
 * packages/core/src/spatial/spatialIndex.ts — Dual interval tree hit testing.
 *
 * Why: Answers "which widget is at (x,y)" and "which widgets overlap R" in
 * O(log n + k) while bounds change every frame. One interval tree per axis
 * indexes each widget's projection; a 2-D query runs both axis queries and
 * lets the smaller candidate set drive an exact rectangle check.
 *
 * Tie-break rule: when several widgets contain a point, the one highest in
 * z-order wins. Z-order comes from `compareZ` when provided (the widget tree
 * passes paint order), else from insertion order: later inserts paint on top.
 * `update` keeps a widget's position in the default insertion order.
 */

import { WidgetFlowError } from "../errors.js";
import { type Rect, contains, intersects, isEmptyRect, isFiniteRect } from "../geometry/rect.js";
import { perfMarkEnd, perfMarkStart } from "../perf/perf.js";
import type { WidgetId } from "../tree/types.js";
import { IntervalTree, type IntervalTreeStats } from "./intervalTree.js";

/** Positive when `a` paints above `b`. */
export type ZOrderComparator = (a: WidgetId, b: WidgetId) => number;

export type SpatialIndexOptions = Readonly<{
  compareZ?: ZOrderComparator;
}>;

export type SpatialIndexStats = Readonly<{
  entries: number;
  x: IntervalTreeStats;
  y: IntervalTreeStats;
}>;

export type SpatialIndex = Readonly<{
  /** Add a widget. An id already present is replaced and moves to the top of insertion order. */
  insert: (id: WidgetId, bounds: Rect) => void;
  /** Remove every entry of the widget. Returns false when it was not indexed. */
  remove: (id: WidgetId) => boolean;
  /** Remove then reinsert. Absent widgets are inserted. */
  update: (id: WidgetId, bounds: Rect) => void;
  /** Topmost widget containing the point, or null. */
  queryPoint: (x: number, y: number) => WidgetId | null;
  /** Every widget containing the point, topmost first. */
  queryPointAll: (x: number, y: number) => WidgetId[];
  /** Every widget intersecting the rectangle, in no particular order. */
  queryRegion: (region: Rect) => WidgetId[];
  has: (id: WidgetId) => boolean;
  boundsOf: (id: WidgetId) => Rect | null;
  ids: () => WidgetId[];
  size: () => number;
  clear: () => void;
  /** Replace the whole content; entries are inserted in iteration order. */
  rebuild: (entries: Iterable<readonly [WidgetId, Rect]>) => void;
  stats: () => SpatialIndexStats;
  /** Both axis trees valid, balanced and in agreement with the entry table. */
  verifyIntegrity: () => boolean;
}>;

/** Query-only view handed out by owners that keep the index in sync themselves. */
export type ReadonlySpatialIndex = Pick<
  SpatialIndex,
  | "queryPoint"
  | "queryPointAll"
  | "queryRegion"
  | "has"
  | "boundsOf"
  | "ids"
  | "size"
  | "stats"
  | "verifyIntegrity"
>;

type Entry = {
  readonly id: WidgetId;
  bounds: Rect;
  seq: number;
};

function requireFiniteRect(id: WidgetId, bounds: Rect): Rect {
  if (!isFiniteRect(bounds)) {
    throw new WidgetFlowError(
      "WF_INVALID_ARGUMENT",
      `spatial index: bounds of widget ${String(id)} must be finite ` +
        `(got ${JSON.stringify(bounds)})`,
    );
  }
  return Object.freeze({ x: bounds.x, y: bounds.y, w: bounds.w, h: bounds.h });
}

export function createSpatialIndex(opts: SpatialIndexOptions = {}): SpatialIndex {
  const entries = new Map<WidgetId, Entry>();
  const xTree = new IntervalTree<Entry>();
  const yTree = new IntervalTree<Entry>();
  const compareZ = opts.compareZ;
  let nextSeq = 1;

  // Scratch buffers reused across queries.
  const xHits: Entry[] = [];
  const yHits: Entry[] = [];

  const compareEntries = (a: Entry, b: Entry): number =>
    compareZ ? compareZ(a.id, b.id) : a.seq - b.seq;

  function unlink(entry: Entry): void {
    xTree.remove(entry.bounds.x, entry.id);
    yTree.remove(entry.bounds.y, entry.id);
  }

  function link(entry: Entry): void {
    const b = entry.bounds;
    xTree.insert(b.x, b.x + b.w, entry.id, entry);
    yTree.insert(b.y, b.y + b.h, entry.id, entry);
  }

  function insert(id: WidgetId, bounds: Rect): void {
    const frozen = requireFiniteRect(id, bounds);
    const prev = entries.get(id);
    if (prev) unlink(prev);
    const entry: Entry = { id, bounds: frozen, seq: nextSeq++ };
    entries.set(id, entry);
    link(entry);
  }

  function remove(id: WidgetId): boolean {
    const entry = entries.get(id);
    if (!entry) return false;
    unlink(entry);
    entries.delete(id);
    return true;
  }

  function update(id: WidgetId, bounds: Rect): void {
    const entry = entries.get(id);
    if (!entry) {
      insert(id, bounds);
      return;
    }
    const frozen = requireFiniteRect(id, bounds);
    unlink(entry);
    entry.bounds = frozen;
    link(entry);
  }

  function pointHits(x: number, y: number): Entry[] {
    const hits: Entry[] = [];
    if (!Number.isFinite(x) || !Number.isFinite(y) || entries.size === 0) return hits;
    xHits.length = 0;
    yHits.length = 0;
    xTree.queryPoint(x, xHits);
    if (xHits.length === 0) return hits;
    yTree.queryPoint(y, yHits);
    const driver = xHits.length <= yHits.length ? xHits : yHits;
    for (const entry of driver) {
      if (contains(entry.bounds, x, y)) hits.push(entry);
    }
    return hits;
  }

  function queryPoint(x: number, y: number): WidgetId | null {
    const token = perfMarkStart();
    const hits = pointHits(x, y);
    let top: Entry | null = null;
    for (const entry of hits) {
      if (top === null || compareEntries(entry, top) > 0) top = entry;
    }
    perfMarkEnd("hit_test", token);
    return top === null ? null : top.id;
  }

  function queryPointAll(x: number, y: number): WidgetId[] {
    const hits = pointHits(x, y);
    hits.sort((a, b) => compareEntries(b, a));
    return hits.map((e) => e.id);
  }

  function queryRegion(region: Rect): WidgetId[] {
    const out: WidgetId[] = [];
    if (!isFiniteRect(region) || isEmptyRect(region) || entries.size === 0) return out;
    xHits.length = 0;
    yHits.length = 0;
    xTree.queryOverlap(region.x, region.x + region.w, xHits);
    if (xHits.length === 0) return out;
    yTree.queryOverlap(region.y, region.y + region.h, yHits);
    const driver = xHits.length <= yHits.length ? xHits : yHits;
    for (const entry of driver) {
      if (intersects(entry.bounds, region)) out.push(entry.id);
    }
    return out;
  }

  function clear(): void {
    entries.clear();
    xTree.clear();
    yTree.clear();
  }

  return Object.freeze({
    insert,
    remove,
    update,
    queryPoint,
    queryPointAll,
    queryRegion,
    has: (id: WidgetId) => entries.has(id),
    boundsOf: (id: WidgetId) => entries.get(id)?.bounds ?? null,
    ids: () => Array.from(entries.keys()),
    size: () => entries.size,
    clear,
    rebuild: (items: Iterable<readonly [WidgetId, Rect]>) => {
      clear();
      for (const [id, bounds] of items) insert(id, bounds);
    },
    stats: () =>
      Object.freeze({
        entries: entries.size,
        x: xTree.stats(),
        y: yTree.stats(),
      }),
    verifyIntegrity: () =>
      xTree.size === entries.size &&
      yTree.size === entries.size &&
      xTree.validate() &&
      yTree.validate(),
  });
}
