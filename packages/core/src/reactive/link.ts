/**
 * packages/core/src/reactive/link.ts — Reactive cells with per-cell dependents.
 *
 * Why: A write costs O(number of widgets observing this cell), not O(tree).
 * Each Link keeps its own dependent set; there is no global observer list.
 *
 * Write rules:
 *   - set() stores the value, marks every dependent dirty, then runs the
 *     change callback, all before returning
 *   - every write counts as a change; values are never compared
 *   - dead dependents (destroyed widgets never removed) are skipped
 *
 * Re-entrancy: change callbacks may call set() on any link. Links created
 * from one LinkScope share a depth counter; past `maxReentrancy` nested
 * writes still store and mark, but their callbacks are skipped with a
 * warning, so a callback cycle terminates instead of overflowing the stack.
 */

import { describeThrown } from "../errors.js";
import {
  type Logger,
  type WarnOnce,
  createWarnOnce,
  formatLogMessage,
  silentLogger,
} from "../diagnostics/logger.js";
import type { DirtySink, WidgetId } from "../tree/types.js";

export type ChangeCallback<T> = (next: T, prev: T) => void;

export type Link<T> = Readonly<{
  get: () => T;
  set: (value: T) => void;
  update: (fn: (prev: T) => T) => void;
  addDependent: (id: WidgetId) => void;
  removeDependent: (id: WidgetId) => void;
  hasDependent: (id: WidgetId) => boolean;
  dependentCount: () => number;
  dependents: () => WidgetId[];
  /** Register (or clear with null) the change callback. */
  setOnChange: (callback: ChangeCallback<T> | null) => void;
  toString: () => string;
}>;

export type LinkScopeOptions = Readonly<{
  sink: DirtySink;
  logger?: Logger;
  /** Warn (once per link and widget) about dead dependents. */
  diagnostics?: boolean;
  /** Nested set() depth at which change callbacks stop firing. Default 32. */
  maxReentrancy?: number;
}>;

export type LinkScope = Readonly<{
  createLink: <T>(initial: T) => Link<T>;
  /** Current nesting of change callbacks. */
  depth: () => number;
}>;

type ScopeState = {
  readonly sink: DirtySink;
  readonly logger: Logger;
  readonly diagnostics: boolean;
  readonly maxReentrancy: number;
  readonly warnOnce: WarnOnce;
  depth: number;
  nextLinkId: number;
};

const DEFAULT_MAX_REENTRANCY = 32;

function createScopeState(opts: LinkScopeOptions): ScopeState {
  const logger = opts.logger ?? silentLogger;
  return {
    sink: opts.sink,
    logger,
    diagnostics: opts.diagnostics === true,
    maxReentrancy: opts.maxReentrancy ?? DEFAULT_MAX_REENTRANCY,
    warnOnce: createWarnOnce(logger),
    depth: 0,
    nextLinkId: 1,
  };
}

function createLinkIn<T>(scope: ScopeState, initial: T): Link<T> {
  const linkId = scope.nextLinkId++;
  const dependents = new Set<WidgetId>();
  let value = initial;
  let onChange: ChangeCallback<T> | null = null;

  function set(next: T): void {
    const prev = value;
    value = next;

    for (const id of dependents) {
      if (!scope.sink.markDirty(id) && scope.diagnostics) {
        scope.warnOnce(
          `dead:${String(linkId)}:${String(id)}`,
          "link",
          `link ${String(linkId)} still lists destroyed widget ${String(id)} as a dependent. ` +
            "Hint: call removeDependent when the widget is torn down.",
        );
      }
    }

    const callback = onChange;
    if (callback === null) return;
    if (scope.depth >= scope.maxReentrancy) {
      scope.logger.warn(
        formatLogMessage(
          "link",
          `change callback of link ${String(linkId)} skipped: ` +
            `nested set() depth reached ${String(scope.maxReentrancy)}`,
        ),
      );
      return;
    }
    scope.depth++;
    try {
      callback(next, prev);
    } catch (e: unknown) {
      scope.logger.error(
        formatLogMessage(
          "link",
          `change callback of link ${String(linkId)} threw: ${describeThrown(e)}`,
        ),
      );
    } finally {
      scope.depth--;
    }
  }

  return Object.freeze({
    get: () => value,
    set,
    update: (fn: (prev: T) => T) => set(fn(value)),
    addDependent: (id: WidgetId) => {
      dependents.add(id);
    },
    removeDependent: (id: WidgetId) => {
      dependents.delete(id);
    },
    hasDependent: (id: WidgetId) => dependents.has(id),
    dependentCount: () => dependents.size,
    dependents: () => Array.from(dependents),
    setOnChange: (callback: ChangeCallback<T> | null) => {
      onChange = callback;
    },
    toString: () => `Link(${String(value)}, ${String(dependents.size)} deps)`,
  });
}

/** Scope whose links share one sink, logger and re-entrancy counter. */
export function createLinkScope(opts: LinkScopeOptions): LinkScope {
  const state = createScopeState(opts);
  return Object.freeze({
    createLink: <T>(initial: T) => createLinkIn(state, initial),
    depth: () => state.depth,
  });
}

/**
 * Create a standalone link with its own re-entrancy counter.
 *
 * @example
 * ```ts
 * const counter = createLink(0, { sink: tree });
 * counter.addDependent(label);
 * counter.set(5); // label is dirty before set() returns
 * ```
 */
export function createLink<T>(initial: T, opts: LinkScopeOptions): Link<T> {
  return createLinkIn(createScopeState(opts), initial);
}

/** Register `id` as a dependent; the returned function unregisters it. */
export function bindLink<T>(link: Link<T>, id: WidgetId): () => void {
  link.addDependent(id);
  return () => link.removeDependent(id);
}
