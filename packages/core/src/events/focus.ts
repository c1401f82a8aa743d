/**
 * packages/core/src/events/focus.ts — Keyboard focus ownership.
 *
 * Why: At most one widget holds focus. Keyboard-class events resolve to it,
 * and the focus keys walk the focus chain.
 *
 * Focus rules:
 *   - Focus chain: attached, visible, enabled, focusable widgets in
 *     depth-first preorder, left-to-right children; the tree caches it
 *   - "next" cycles forward through the chain; "prev" cycles backward
 *   - setFocus blurs the previous widget before focusing the next one; both
 *     notifications run before setFocus returns
 *   - A focused widget that is detached or destroyed loses focus silently;
 *     one that is hidden, disabled or made unfocusable receives onBlur
 */

import { WidgetFlowError, describeThrown } from "../errors.js";
import type { WidgetTree } from "../tree/widgetTree.js";
import type { FocusChain, TreeChange, WidgetId } from "../tree/types.js";

/** Focus traversal direction. */
export type FocusMove = "next" | "prev";

export type FocusNotification = "focus" | "blur";

export type FocusFaultHandler = (id: WidgetId, phase: FocusNotification, detail: string) => void;

export type FocusController = Readonly<{
  focusedId: () => WidgetId | null;
  /** Throws WF_INVALID_TARGET when `id` cannot receive focus. */
  setFocus: (id: WidgetId | null) => void;
  /** Move along the focus chain; returns the newly focused id. */
  move: (direction: FocusMove) => WidgetId | null;
  /** Focus the widget or its nearest ancestor that can take focus. */
  focusNearest: (id: WidgetId) => WidgetId | null;
  dispose: () => void;
}>;

/**
 * Next or previous id along the chain, wrapping at both ends. With nothing
 * focused, or a focused id missing from the chain, it starts at the first
 * (next) or last (prev) entry.
 */
export function computeMovedFocusId(
  chain: FocusChain,
  focusedId: WidgetId | null,
  move: FocusMove,
): WidgetId | null {
  const { order } = chain;
  const n = order.length;
  const edge = move === "next" ? order[0] : order[n - 1];
  if (edge === undefined) return null;

  const at = focusedId === null ? undefined : chain.indexOf.get(focusedId);
  if (at === undefined) return edge;
  const step = move === "next" ? 1 : n - 1;
  return order[(at + step) % n] ?? null;
}

export function createFocusController(
  tree: WidgetTree,
  onFault: FocusFaultHandler,
): FocusController {
  let focused: WidgetId | null = null;
  // Notifications nest: an onFocus that hides its own widget runs onBlur inside it.
  let notifyDepth = 0;

  function notify(id: WidgetId, phase: FocusNotification): void {
    const caps = tree.capabilitiesOf(id);
    const fn = phase === "focus" ? caps?.onFocus : caps?.onBlur;
    if (!fn) return;
    notifyDepth++;
    try {
      fn();
    } catch (e: unknown) {
      onFault(id, phase, describeThrown(e));
    } finally {
      notifyDepth--;
    }
  }

  function setFocus(id: WidgetId | null): void {
    if (notifyDepth > 0) {
      throw new WidgetFlowError(
        "WF_REENTRANT_CALL",
        "setFocus: called from inside a focus or blur notification",
      );
    }
    if (id !== null && !tree.canReceiveFocus(id)) {
      throw new WidgetFlowError(
        "WF_INVALID_TARGET",
        `setFocus: widget ${tree.describe(id)} is not attached, visible, enabled and focusable`,
      );
    }
    if (id === focused) return;
    const prev = focused;
    focused = null;
    if (prev !== null) notify(prev, "blur");
    focused = id;
    if (id !== null) notify(id, "focus");
  }

  function move(direction: FocusMove): WidgetId | null {
    const next = computeMovedFocusId(tree.focusChain(), focused, direction);
    if (next !== null) setFocus(next);
    return next;
  }

  function focusNearest(id: WidgetId): WidgetId | null {
    const candidates = [id, ...tree.ancestorsOf(id)];
    for (const candidate of candidates) {
      if (tree.canReceiveFocus(candidate)) {
        setFocus(candidate);
        return candidate;
      }
    }
    return null;
  }

  function onTreeChange(change: TreeChange): void {
    if (focused === null || !change.ids.includes(focused)) return;
    const lost = focused;
    focused = null;
    if (change.kind === "hidden" || change.kind === "disabled" || change.kind === "unfocusable") {
      notify(lost, "blur");
    }
  }

  const unsubscribe = tree.subscribe(onTreeChange);

  return Object.freeze({
    focusedId: () => focused,
    setFocus,
    move,
    focusNearest,
    dispose: unsubscribe,
  });
}
