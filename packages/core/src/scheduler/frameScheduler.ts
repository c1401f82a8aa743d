/**
 * packages/core/src/scheduler/frameScheduler.ts — Dirty collection and the frame sequence.
 *
 * Why: Reactive writes and input handlers only mark widgets. The scheduler
 * turns those marks into per-frame work at one defined point:
 *
 *   drain input (budgeted) → collect → layout → collect → render → consume
 *
 * Flags are cleared on consume, never on set. Layout flags collected before
 * the layout hook are consumed after it. Render flags are consumed as the
 * render hook starts, so a widget marked while it runs stays dirty for the
 * next frame. If the render hook throws, the widgets it was given are marked
 * again; a throwing layout hook leaves every flag in place.
 */

import { type CoreConfig, type ResolvedCoreConfig, resolveCoreConfig } from "../config.js";
import { type Logger, formatLogMessage, silentLogger } from "../diagnostics/logger.js";
import { WidgetFlowError, describeThrown } from "../errors.js";
import type { EventManager } from "../events/eventManager.js";
import { monotonicNow, perfMarkEnd, perfMarkStart } from "../perf/perf.js";
import type { WidgetTree } from "../tree/widgetTree.js";
import type { WidgetId } from "../tree/types.js";

export type FrameWork = Readonly<{
  frame: number;
  /** Attached dirty widgets in paint order. */
  dirty: readonly WidgetId[];
  /** Topmost layout-dirty widgets: no ancestor is layout-dirty. */
  layoutRoots: readonly WidgetId[];
}>;

export type FrameContext = Readonly<{
  frame: number;
  budgetMs: number;
  tree: WidgetTree;
  now: () => number;
}>;

export type FrameHooks = Readonly<{
  /** Assign bounds through tree.setBounds for each subtree root. */
  layout?: (roots: readonly WidgetId[], ctx: FrameContext) => void;
  render?: (dirty: readonly WidgetId[], ctx: FrameContext) => void;
}>;

export type FrameReport = Readonly<{
  frame: number;
  eventsProcessed: number;
  eventsRemaining: number;
  layoutRoots: number;
  rendered: number;
  durationMs: number;
}>;

export type FrameSchedulerOptions = Readonly<{
  tree: WidgetTree;
  /** Drained at the start of each frame when present. */
  events?: EventManager;
  config?: CoreConfig;
  logger?: Logger;
  now?: () => number;
}>;

export type FrameScheduler = Readonly<{
  collect: () => FrameWork;
  consume: (ids: Iterable<WidgetId>) => void;
  consumeAll: () => void;
  hasWork: () => boolean;
  /** Attached widgets currently marked dirty. */
  pendingCount: () => number;
  frameNumber: () => number;
  runFrame: (hooks?: FrameHooks) => FrameReport;
}>;

export function createFrameScheduler(opts: FrameSchedulerOptions): FrameScheduler {
  const tree = opts.tree;
  const events = opts.events;
  const config: ResolvedCoreConfig = resolveCoreConfig(opts.config);
  const logger = opts.logger ?? silentLogger;
  const now = opts.now ?? monotonicNow;
  let frame = 0;
  let running = false;

  const byPaintOrder = (a: WidgetId, b: WidgetId): number =>
    tree.paintOrderOf(a) - tree.paintOrderOf(b);

  function collect(): FrameWork {
    const token = perfMarkStart();
    const dirty = tree.dirtyIds().filter((id) => tree.isAttached(id));
    dirty.sort(byPaintOrder);

    const layoutRoots: WidgetId[] = [];
    for (const id of tree.layoutDirtyIds()) {
      if (!tree.isAttached(id)) continue;
      if (tree.ancestorsOf(id).some((a) => tree.isLayoutDirty(a))) continue;
      layoutRoots.push(id);
    }
    layoutRoots.sort(byPaintOrder);
    perfMarkEnd("collect", token);

    return Object.freeze({
      frame,
      dirty: Object.freeze(dirty),
      layoutRoots: Object.freeze(layoutRoots),
    });
  }

  function pendingCount(): number {
    let n = 0;
    for (const id of tree.dirtyIds()) if (tree.isAttached(id)) n++;
    return n;
  }

  function consume(ids: Iterable<WidgetId>): void {
    for (const id of ids) tree.clearDirty(id);
  }

  function consumeAll(): void {
    consume(tree.dirtyIds());
    consume(tree.layoutDirtyIds());
  }

  function runHook(name: "layout" | "render", fn: () => void): void {
    const token = perfMarkStart();
    try {
      fn();
    } catch (e: unknown) {
      throw new WidgetFlowError(
        "WF_USER_CODE_THROW",
        `${name} hook threw in frame ${String(frame)}: ${describeThrown(e)}`,
      );
    } finally {
      perfMarkEnd(name, token);
    }
  }

  function runFrame(hooks: FrameHooks = {}): FrameReport {
    if (running) {
      throw new WidgetFlowError(
        "WF_REENTRANT_CALL",
        "runFrame: called while a frame is in progress (from inside a hook?)",
      );
    }
    running = true;
    const frameToken = perfMarkStart();
    const start = now();
    try {
      frame++;
      const ctx: FrameContext = Object.freeze({
        frame,
        budgetMs: config.frameBudgetMs,
        tree,
        now,
      });

      const eventsProcessed = events ? events.drain(config.frameBudgetMs) : 0;

      const before = collect();
      const laidOut = tree.layoutDirtyIds().filter((id) => tree.isAttached(id));
      const layout = hooks.layout;
      if (layout && before.layoutRoots.length > 0) {
        runHook("layout", () => layout(before.layoutRoots, ctx));
      }
      for (const id of laidOut) tree.clearDirty(id, "layout");

      const work = collect();
      for (const id of work.dirty) tree.clearDirty(id, "render");
      const render = hooks.render;
      if (render && work.dirty.length > 0) {
        try {
          runHook("render", () => render(work.dirty, ctx));
        } catch (e: unknown) {
          for (const id of work.dirty) tree.markDirty(id, { layout: false });
          throw e;
        }
      }

      const eventsRemaining = events ? events.pendingCount() : 0;
      if (config.diagnostics && eventsRemaining > 0) {
        logger.debug(
          formatLogMessage(
            "scheduler",
            `frame ${String(frame)} ended with ${String(eventsRemaining)} queued events`,
          ),
        );
      }

      return Object.freeze({
        frame,
        eventsProcessed,
        eventsRemaining,
        layoutRoots: before.layoutRoots.length,
        rendered: work.dirty.length,
        durationMs: now() - start,
      });
    } finally {
      running = false;
      perfMarkEnd("frame", frameToken);
    }
  }

  return Object.freeze({
    collect,
    consume,
    consumeAll,
    hasWork: () =>
      pendingCount() > 0 ||
      tree.layoutDirtyIds().some((id) => tree.isAttached(id)) ||
      (events !== undefined && events.hasPendingEvents()),
    pendingCount,
    frameNumber: () => frame,
    runFrame,
  });
}
