/**
 * packages/core/src/engine.ts — Engine factory wiring the core components.
 *
 * Why: The tree, its spatial index, the event manager and the frame
 * scheduler must share one configuration, logger and clock. This factory is
 * the single place that wiring happens; each component stays usable on its
 * own for tests.
 */

import { type CoreConfig, type ResolvedCoreConfig, resolveCoreConfig } from "./config.js";
import { type Logger, createLogger } from "./diagnostics/logger.js";
import { type EventManager, createEventManager } from "./events/eventManager.js";
import { monotonicNow } from "./perf/perf.js";
import { type Link, type LinkScope, createLinkScope } from "./reactive/link.js";
import {
  type FrameHooks,
  type FrameReport,
  type FrameScheduler,
  createFrameScheduler,
} from "./scheduler/frameScheduler.js";
import type { ReadonlySpatialIndex } from "./spatial/spatialIndex.js";
import { type WidgetTree, createWidgetTree } from "./tree/widgetTree.js";

export type EngineOptions = Readonly<{
  config?: CoreConfig;
  /** Defaults to a console-backed logger at "warn" ("debug" with diagnostics on). */
  logger?: Logger;
  now?: () => number;
}>;

export type Engine = Readonly<{
  config: ResolvedCoreConfig;
  logger: Logger;
  tree: WidgetTree;
  index: ReadonlySpatialIndex;
  events: EventManager;
  scheduler: FrameScheduler;
  /** Link whose dependents are widgets of this engine's tree. */
  createLink: <T>(initial: T) => Link<T>;
  links: LinkScope;
  runFrame: (hooks?: FrameHooks) => FrameReport;
  dispose: () => void;
}>;

/**
 * Create an engine instance.
 *
 * @example
 * ```ts
 * const engine = createEngine({ config: { frameBudgetMs: 4 } });
 * const { tree } = engine;
 * const root = tree.createWidget({ label: "root", bounds: rect(0, 0, 80, 24) });
 * tree.setRoot(root);
 *
 * const count = engine.createLink(0);
 * count.addDependent(root);
 * count.set(1);
 *
 * engine.runFrame({ render: (dirty) => paint(dirty) });
 * ```
 */
export function createEngine(opts: EngineOptions = {}): Engine {
  const config = resolveCoreConfig(opts.config);
  const logger =
    opts.logger ?? createLogger({ minLevel: config.diagnostics ? "debug" : "warn" });
  const now = opts.now ?? monotonicNow;

  const tree = createWidgetTree();
  const events = createEventManager({ tree, config, logger, now });
  const scheduler = createFrameScheduler({ tree, events, config, logger, now });
  const links = createLinkScope({
    sink: tree,
    logger,
    diagnostics: config.diagnostics,
    maxReentrancy: config.maxLinkReentrancy,
  });

  return Object.freeze({
    config,
    logger,
    tree,
    index: tree.index,
    events,
    scheduler,
    createLink: <T>(initial: T) => links.createLink(initial),
    links,
    runFrame: (hooks?: FrameHooks) => scheduler.runFrame(hooks),
    dispose: () => events.dispose(),
  });
}
