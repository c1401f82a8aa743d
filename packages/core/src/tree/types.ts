/**
 * Widget tree types shared by the reactive, spatial and event layers.
 *
 * Widgets are addressed by WidgetId handles, never by object reference.
 * A handle stays unique for the tree's lifetime; once its widget is
 * destroyed every lookup through it reports "not alive" instead of
 * reaching a stale node.
 */

import type { InputEvent } from "../events/types.js";
import type { Rect } from "../geometry/rect.js";

export type WidgetId = number;

export type DispatchPhase = "target" | "bubble";

/** Event as offered to a widget handler. */
export type DispatchedEvent = Readonly<{
  input: InputEvent;
  /** Widget the event resolved to (hit widget or focused widget). */
  targetId: WidgetId;
  /** Widget whose handler is running. */
  currentTargetId: WidgetId;
  phase: DispatchPhase;
}>;

/** Returns true when the event is consumed; false lets it bubble to the parent. */
export type WidgetEventHandler = (event: DispatchedEvent) => boolean;

/**
 * Capabilities a widget opts into. The event manager only ever sees these
 * callbacks, never the concrete widget type behind them.
 */
export type WidgetCapabilities = Readonly<{
  onEvent?: WidgetEventHandler;
  onFocus?: () => void;
  onBlur?: () => void;
}>;

export type WidgetSpec = Readonly<{
  /** Diagnostic name used in log messages. */
  label?: string;
  bounds?: Rect;
  focusable?: boolean;
  enabled?: boolean;
  visible?: boolean;
  capabilities?: WidgetCapabilities;
}>;

/** Read-only snapshot of one widget. */
export type WidgetView = Readonly<{
  id: WidgetId;
  label: string | null;
  parent: WidgetId | null;
  children: readonly WidgetId[];
  bounds: Rect;
  dirty: boolean;
  layoutDirty: boolean;
  focusable: boolean;
  enabled: boolean;
  visible: boolean;
  attached: boolean;
}>;

export type MarkDirtyOptions = Readonly<{
  /**
   * Also flag the widget and its parent for re-layout (content may change
   * size). Default: true.
   */
  layout?: boolean;
}>;

export type DirtyFlags = "all" | "render" | "layout";

/** Cached focus chain with each id's position in it. */
export type FocusChain = Readonly<{
  order: readonly WidgetId[];
  indexOf: ReadonlyMap<WidgetId, number>;
}>;

/**
 * What a reactive cell needs from the tree: mark by handle.
 * `markDirty` returns false for dead handles and changes nothing.
 */
export type DirtySink = Readonly<{
  markDirty: (id: WidgetId, opts?: MarkDirtyOptions) => boolean;
}>;

/**
 * Widgets that left the interactive set. Listeners drop any reference they
 * hold to these ids (the event manager drops focus).
 */
export type TreeChange = Readonly<{
  kind: "detached" | "destroyed" | "hidden" | "disabled" | "unfocusable";
  ids: readonly WidgetId[];
}>;

export type TreeChangeListener = (change: TreeChange) => void;
