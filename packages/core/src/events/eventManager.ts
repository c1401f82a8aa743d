/**
 * packages/core/src/events/eventManager.ts — Budgeted input dispatch.
 *
 * Why: Input is queued as it arrives and processed at a defined point in
 * the frame, under a time budget, so a burst of input cannot starve layout
 * and rendering. Leftover events stay queued, in order, for the next drain.
 *
 * Dispatch rules:
 *   - pointer-class events go to the topmost widget under (x,y) at drain time
 *   - keyboard-class events go to the focused widget
 *   - an event with no target is dropped and counted
 *   - the target handler runs first, then each ancestor up to the root until
 *     one returns true; disabled widgets are passed over
 *   - a handler that throws is recorded as a fault; bubbling of that event
 *     stops and the drain moves on to the next event
 *   - a keyDown matching a focus key moves focus and is not dispatched;
 *     neither is the keyUp that releases it
 *
 * Budget: checked before every event against an injectable clock. One event
 * is always processed when the queue is non-empty, so a single slow handler
 * cannot stall the queue forever.
 */

import {
  type CoreConfig,
  type ResolvedCoreConfig,
  type ResolvedKeyBinding,
  resolveCoreConfig,
} from "../config.js";
import { type Logger, formatLogMessage, silentLogger } from "../diagnostics/logger.js";
import { WidgetFlowError, describeThrown } from "../errors.js";
import { monotonicNow, perfMarkEnd, perfMarkStart } from "../perf/perf.js";
import type { WidgetTree } from "../tree/widgetTree.js";
import type { WidgetId } from "../tree/types.js";
import { EventQueue } from "./eventQueue.js";
import {
  type FocusController,
  type FocusMove,
  type FocusNotification,
  createFocusController,
} from "./focus.js";
import { type InputEvent, type InputEventKind, type KeyInput, isPointerInput } from "./types.js";

export type EventManagerState = "idle" | "draining";

export type FaultPhase = "event" | FocusNotification;

export type HandlerFault = Readonly<{
  widgetId: WidgetId;
  phase: FaultPhase;
  /** Kind of the event being dispatched; null for focus notifications. */
  eventKind: InputEventKind | null;
  detail: string;
}>;

export type EventKindStats = Readonly<{
  count: number;
  totalMs: number;
  avgMs: number;
  maxMs: number;
}>;

export type EventManagerStats = Readonly<{
  posted: number;
  coalesced: number;
  processed: number;
  /** Events that resolved to no widget. */
  dropped: number;
  faults: number;
  /** Drains that ended with events still queued. */
  deferredDrains: number;
  byKind: Readonly<Partial<Record<InputEventKind, EventKindStats>>>;
}>;

export type DrainReport = Readonly<{
  processed: number;
  remaining: number;
  elapsedMs: number;
  budgetMs: number;
}>;

export type EventManagerOptions = Readonly<{
  tree: WidgetTree;
  config?: CoreConfig;
  logger?: Logger;
  /** Millisecond clock used for the drain budget and timing stats. */
  now?: () => number;
}>;

export type EventManager = Readonly<{
  post: (event: InputEvent) => void;
  /** Process queued events; returns how many were processed. */
  drain: (budgetMs?: number) => number;
  lastDrain: () => DrainReport | null;
  setFocus: (id: WidgetId | null) => void;
  focusedId: () => WidgetId | null;
  focusNext: () => WidgetId | null;
  focusPrev: () => WidgetId | null;
  hasPendingEvents: () => boolean;
  pendingCount: () => number;
  pendingEvents: () => readonly InputEvent[];
  state: () => EventManagerState;
  faults: () => readonly HandlerFault[];
  clearFaults: () => void;
  stats: () => EventManagerStats;
  dispose: () => void;
}>;

type KindTiming = { count: number; totalMs: number; maxMs: number };

export function createEventManager(opts: EventManagerOptions): EventManager {
  const tree = opts.tree;
  const config: ResolvedCoreConfig = resolveCoreConfig(opts.config);
  const logger = opts.logger ?? silentLogger;
  const now = opts.now ?? monotonicNow;

  const queue = new EventQueue(config.coalesceWindow, config.coalescePolicy);
  const faultRing: HandlerFault[] = [];
  const timings = new Map<InputEventKind, KindTiming>();
  // Keys whose focus-moving keyDown was handled and whose keyUp is still due.
  const heldFocusKeys = new Set<string>();

  let state: EventManagerState = "idle";
  let disposed = false;
  let lastPostedMs = Number.NEGATIVE_INFINITY;
  let lastDrain: DrainReport | null = null;
  let posted = 0;
  let coalesced = 0;
  let processed = 0;
  let dropped = 0;
  let faultCount = 0;
  let deferredDrains = 0;

  function recordFault(fault: HandlerFault): void {
    faultCount++;
    faultRing.push(Object.freeze(fault));
    if (faultRing.length > config.faultLogCapacity) faultRing.shift();
    const during = fault.eventKind ?? fault.phase;
    logger.error(
      formatLogMessage(
        fault.phase === "event" ? "events" : "focus",
        `handler fault in ${tree.describe(fault.widgetId)} during ${during}: ${fault.detail}`,
      ),
    );
  }

  const focus: FocusController = createFocusController(tree, (widgetId, phase, detail) => {
    recordFault({ widgetId, phase, eventKind: null, detail });
  });

  function requireLive(op: string): void {
    if (disposed) {
      throw new WidgetFlowError("WF_INVALID_STATE", `${op}: event manager was disposed`);
    }
  }

  function normalizeTime(event: InputEvent): InputEvent {
    if (!Number.isFinite(event.timeMs)) {
      throw new WidgetFlowError(
        "WF_INVALID_ARGUMENT",
        `post: ${event.kind} timeMs must be a finite number (got ${String(event.timeMs)})`,
      );
    }
    if (event.timeMs >= lastPostedMs) {
      lastPostedMs = event.timeMs;
      return event;
    }
    if (config.diagnostics) {
      throw new WidgetFlowError(
        "WF_INVALID_ARGUMENT",
        `post: ${event.kind} timeMs ${String(event.timeMs)} is earlier than ` +
          `the previous event (${String(lastPostedMs)})`,
      );
    }
    return Object.freeze({ ...event, timeMs: lastPostedMs });
  }

  function post(event: InputEvent): void {
    requireLive("post");
    const stamped = normalizeTime(event);
    posted++;
    const target =
      queue.policyOf(stamped.kind) !== "none" && isPointerInput(stamped)
        ? tree.hitTest(stamped.x, stamped.y)
        : focus.focusedId();
    if (queue.push(stamped, target) === "coalesced") coalesced++;
  }

  function recordTiming(kind: InputEventKind, dt: number): void {
    let t = timings.get(kind);
    if (!t) {
      t = { count: 0, totalMs: 0, maxMs: 0 };
      timings.set(kind, t);
    }
    t.count++;
    t.totalMs += dt;
    if (dt > t.maxMs) t.maxMs = dt;
  }

  function drop(event: InputEvent): void {
    dropped++;
    if (config.diagnostics) {
      logger.debug(formatLogMessage("events", `${event.kind} dropped: no target widget`));
    }
  }

  /** Offer the event to the target, then its ancestors. */
  function bubble(event: InputEvent, targetId: WidgetId): void {
    const chain = [targetId, ...tree.ancestorsOf(targetId)];
    for (let i = 0; i < chain.length; i++) {
      const id = chain[i];
      if (id === undefined || !tree.isEnabled(id)) continue;
      const handler = tree.capabilitiesOf(id)?.onEvent;
      if (!handler) continue;
      let consumed: boolean;
      try {
        consumed = handler({
          input: event,
          targetId,
          currentTargetId: id,
          phase: i === 0 ? "target" : "bubble",
        });
      } catch (e: unknown) {
        recordFault({
          widgetId: id,
          phase: "event",
          eventKind: event.kind,
          detail: describeThrown(e),
        });
        return;
      }
      if (consumed === true) return;
    }
  }

  function focusMoveFor(event: KeyInput): FocusMove | null {
    const mods = event.mods ?? 0;
    const matches = (b: ResolvedKeyBinding): boolean => b.key === event.key && b.mods === mods;
    if (config.focusKeys.next.some(matches)) return "next";
    if (config.focusKeys.prev.some(matches)) return "prev";
    return null;
  }

  /** True when the event was taken for focus navigation. */
  function handleFocusKey(event: KeyInput): boolean {
    if (!config.tabNavigation) return false;
    if (event.kind === "keyUp") return heldFocusKeys.delete(event.key);
    const move = focusMoveFor(event);
    if (move === null) return false;
    heldFocusKeys.add(event.key);
    focus.move(move);
    return true;
  }

  function dispatch(event: InputEvent): void {
    if (isPointerInput(event)) {
      const hit = tree.hitTest(event.x, event.y);
      if (hit !== null && event.kind === "pointerDown" && config.focusOnPointerDown) {
        focus.focusNearest(hit);
      }
      if (hit === null) {
        drop(event);
        return;
      }
      bubble(event, hit);
      return;
    }

    if ((event.kind === "keyDown" || event.kind === "keyUp") && handleFocusKey(event)) return;

    const focused = focus.focusedId();
    if (focused === null) {
      drop(event);
      return;
    }
    bubble(event, focused);
  }

  function drain(budgetMs: number = config.frameBudgetMs): number {
    requireLive("drain");
    if (state === "draining") {
      throw new WidgetFlowError(
        "WF_REENTRANT_CALL",
        "drain: called while a drain is in progress (from inside an event handler?)",
      );
    }
    if (typeof budgetMs !== "number" || Number.isNaN(budgetMs) || budgetMs < 0) {
      throw new WidgetFlowError(
        "WF_INVALID_ARGUMENT",
        `drain: budgetMs must be a number >= 0 (got ${String(budgetMs)})`,
      );
    }

    const token = perfMarkStart();
    const start = now();
    let count = 0;
    state = "draining";
    try {
      while (queue.length > 0) {
        if (count > 0 && now() - start >= budgetMs) break;
        const item = queue.shift();
        if (item === undefined) break;
        const dispatchToken = perfMarkStart();
        const t0 = now();
        dispatch(item.event);
        recordTiming(item.event.kind, now() - t0);
        perfMarkEnd("dispatch", dispatchToken);
        count++;
      }
    } finally {
      state = "idle";
    }

    processed += count;
    const remaining = queue.length;
    const elapsedMs = now() - start;
    lastDrain = Object.freeze({ processed: count, remaining, elapsedMs, budgetMs });
    if (remaining > 0) {
      deferredDrains++;
      if (config.diagnostics) {
        logger.debug(
          formatLogMessage(
            "events",
            `drain budget of ${String(budgetMs)}ms used after ${String(count)} events; ` +
              `${String(remaining)} deferred`,
          ),
        );
      }
    }
    perfMarkEnd("drain", token);
    return count;
  }

  function stats(): EventManagerStats {
    const byKind: Partial<Record<InputEventKind, EventKindStats>> = {};
    for (const [kind, t] of timings) {
      byKind[kind] = Object.freeze({
        count: t.count,
        totalMs: t.totalMs,
        avgMs: t.count === 0 ? 0 : t.totalMs / t.count,
        maxMs: t.maxMs,
      });
    }
    return Object.freeze({
      posted,
      coalesced,
      processed,
      dropped,
      faults: faultCount,
      deferredDrains,
      byKind: Object.freeze(byKind),
    });
  }

  return Object.freeze({
    post,
    drain,
    lastDrain: () => lastDrain,
    setFocus: (id: WidgetId | null) => {
      requireLive("setFocus");
      focus.setFocus(id);
    },
    focusedId: () => focus.focusedId(),
    focusNext: () => focus.move("next"),
    focusPrev: () => focus.move("prev"),
    hasPendingEvents: () => queue.length > 0,
    pendingCount: () => queue.length,
    pendingEvents: () => Object.freeze(queue.toArray()),
    state: () => state,
    faults: () => Object.freeze(faultRing.slice()),
    clearFaults: () => {
      faultRing.length = 0;
    },
    stats,
    dispose: () => {
      if (disposed) return;
      disposed = true;
      queue.clear();
      heldFocusKeys.clear();
      focus.dispose();
    },
  });
}
