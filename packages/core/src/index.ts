/**
 * @widgetflow/core
 *
 * Reactive widget tree engine: per-cell dependent tracking, spatial hit
 * testing and budgeted input dispatch. Runtime-agnostic; this package MUST
 * NOT use Node-specific APIs (Buffer, worker_threads, node:* imports).
 */

// =============================================================================
// Errors, configuration, logging
// =============================================================================

export {
  WidgetFlowError,
  type WidgetFlowErrorCode,
  describeThrown,
  isWidgetFlowError,
} from "./errors.js";

export {
  type CoalescePolicyConfig,
  type CoalesceWindowConfig,
  type CoreConfig,
  DEFAULT_CORE_CONFIG,
  type FocusKeysConfig,
  type KeyBinding,
  type ResolvedCoreConfig,
  type ResolvedKeyBinding,
  resolveCoreConfig,
} from "./config.js";

export {
  type LogArea,
  type LogLevel,
  type LogRecord,
  type LogSink,
  type Logger,
  type LoggerOptions,
  type MemoryLogger,
  type WarnOnce,
  consoleSink,
  createLogger,
  createMemoryLogger,
  createWarnOnce,
  formatLogMessage,
  silentLogger,
} from "./diagnostics/logger.js";

export {
  type InstrumentationPhase,
  type PerfSnapshot,
  type PhaseStats,
  PERF_ENABLED,
  monotonicNow,
  perfReset,
  perfSnapshot,
} from "./perf/perf.js";

// =============================================================================
// Geometry and spatial index
// =============================================================================

export {
  EMPTY_RECT,
  type Rect,
  contains,
  intersectRect,
  intersects,
  isEmptyRect,
  isFiniteRect,
  rect,
  rectEquals,
} from "./geometry/rect.js";

export { IntervalTree, type IntervalTreeStats } from "./spatial/intervalTree.js";
export {
  type ReadonlySpatialIndex,
  type SpatialIndex,
  type SpatialIndexOptions,
  type SpatialIndexStats,
  type ZOrderComparator,
  createSpatialIndex,
} from "./spatial/spatialIndex.js";

// =============================================================================
// Widget tree and reactive cells
// =============================================================================

export type {
  DirtyFlags,
  DirtySink,
  DispatchPhase,
  DispatchedEvent,
  FocusChain,
  MarkDirtyOptions,
  TreeChange,
  TreeChangeListener,
  WidgetCapabilities,
  WidgetEventHandler,
  WidgetId,
  WidgetSpec,
  WidgetView,
} from "./tree/types.js";
export { type WidgetTree, createWidgetTree } from "./tree/widgetTree.js";

export {
  type ChangeCallback,
  type Link,
  type LinkScope,
  type LinkScopeOptions,
  bindLink,
  createLink,
  createLinkScope,
} from "./reactive/link.js";

// =============================================================================
// Input events and focus
// =============================================================================

export {
  BUTTON_MIDDLE,
  BUTTON_PRIMARY,
  BUTTON_SECONDARY,
  type CoalescePolicy,
  type EventClass,
  INPUT_EVENT_KINDS,
  type InputEvent,
  type InputEventKind,
  type KeyInput,
  MOD_ALT,
  MOD_CTRL,
  MOD_META,
  MOD_SHIFT,
  type PointerInput,
  type TextInput,
  type WheelInput,
  eventClassOf,
  hasMod,
  isInputEventKind,
  isPointerInput,
} from "./events/types.js";

export {
  type CoalescePolicyTable,
  type CoalesceWindow,
  mergeWheel,
} from "./events/eventQueue.js";

export { type FocusMove, computeMovedFocusId } from "./events/focus.js";

export {
  type DrainReport,
  type EventKindStats,
  type EventManager,
  type EventManagerOptions,
  type EventManagerState,
  type EventManagerStats,
  type FaultPhase,
  type HandlerFault,
  createEventManager,
} from "./events/eventManager.js";

// =============================================================================
// Frame scheduling and the engine facade
// =============================================================================

export {
  type FrameContext,
  type FrameHooks,
  type FrameReport,
  type FrameScheduler,
  type FrameSchedulerOptions,
  type FrameWork,
  createFrameScheduler,
} from "./scheduler/frameScheduler.js";

export { type Engine, type EngineOptions, createEngine } from "./engine.js";
