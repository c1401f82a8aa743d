/**
 * packages/core/src/perf/perf.ts — Lightweight perf instrumentation.
 *
 * Opt-in via WIDGETFLOW_PERF=1 environment variable. Zero-cost when disabled.
 */

/** Phases tracked by the instrumentation system. */
export type InstrumentationPhase =
  | "drain"
  | "dispatch"
  | "hit_test"
  | "collect"
  | "layout"
  | "render"
  | "frame";

export const PERF_PHASES: readonly InstrumentationPhase[] = Object.freeze([
  "drain",
  "dispatch",
  "hit_test",
  "collect",
  "layout",
  "render",
  "frame",
]);

/** Statistics for a single phase. */
export type PhaseStats = Readonly<{
  count: number;
  avg: number;
  p50: number;
  p95: number;
  p99: number;
  max: number;
  /** Top 10 worst (highest) samples for spike analysis. */
  worst10: readonly number[];
}>;

/** Aggregated perf snapshot. */
export type PerfSnapshot = Readonly<{
  phases: Readonly<{ [K in InstrumentationPhase]?: PhaseStats }>;
}>;

/** Token returned by markStart for timing correlation. */
export type PerfToken = number;

/**
 * Check if perf mode is enabled.
 * Reads the `process` global without importing node:process, so the core
 * stays loadable where no such global exists.
 */
export const PERF_ENABLED: boolean =
  typeof process !== "undefined" && process.env["WIDGETFLOW_PERF"] === "1";

/**
 * High-resolution monotonic timer in milliseconds.
 * Falls back to Date.now() if performance.now() is unavailable.
 * Also the default clock of the event manager.
 */
export const monotonicNow: () => number =
  typeof performance !== "undefined" && typeof performance.now === "function"
    ? () => performance.now()
    : () => Date.now();

/** Maximum samples kept per phase (ring buffer). */
const RING_CAP = 1024;

/** Ring buffer for a single phase. */
type PhaseRing = {
  samples: Float64Array;
  cursor: number;
  count: number;
  sum: number;
  max: number;
};

function createPhaseRing(): PhaseRing {
  return {
    samples: new Float64Array(RING_CAP),
    cursor: 0,
    count: 0,
    sum: 0,
    max: 0,
  };
}

function recordSample(ring: PhaseRing, dt: number): void {
  // Subtract old value if overwriting
  if (ring.count >= RING_CAP) {
    const old = ring.samples[ring.cursor] ?? 0;
    ring.sum -= old;
  }

  ring.samples[ring.cursor] = dt;
  ring.sum += dt;
  ring.cursor = (ring.cursor + 1) % RING_CAP;
  ring.count = Math.min(ring.count + 1, RING_CAP);

  if (dt > ring.max) {
    ring.max = dt;
  }
}

/** Percentile summary of a ring. Exported for the unit tests. */
export function summarizeSamples(samples: readonly number[]): PhaseStats | null {
  if (samples.length === 0) return null;

  const arr = samples.slice().sort((a, b) => a - b);
  let sum = 0;
  for (const s of arr) sum += s;

  const p50Idx = Math.min(arr.length - 1, Math.floor(arr.length * 0.5));
  const p95Idx = Math.min(arr.length - 1, Math.floor(arr.length * 0.95));
  const p99Idx = Math.min(arr.length - 1, Math.floor(arr.length * 0.99));

  // Worst 10 sit at the end of the sorted array
  const worst10Start = Math.max(0, arr.length - 10);
  const worst10 = Object.freeze(arr.slice(worst10Start).reverse());

  return Object.freeze({
    count: arr.length,
    avg: sum / arr.length,
    p50: arr[p50Idx] ?? 0,
    p95: arr[p95Idx] ?? 0,
    p99: arr[p99Idx] ?? 0,
    max: arr[arr.length - 1] ?? 0,
    worst10,
  });
}

function computeStats(ring: PhaseRing): PhaseStats | null {
  if (ring.count === 0) return null;
  const arr: number[] = [];
  const n = Math.min(ring.count, RING_CAP);
  for (let i = 0; i < n; i++) {
    const sample = ring.samples[i];
    if (sample !== undefined) arr.push(sample);
  }
  return summarizeSamples(arr);
}

/** Global perf aggregator. */
class PerfAggregator {
  private readonly rings = new Map<InstrumentationPhase, PhaseRing>();

  markStart(): PerfToken {
    return monotonicNow();
  }

  markEnd(phase: InstrumentationPhase, token: PerfToken): void {
    this.record(phase, monotonicNow() - token);
  }

  /** Record a duration directly (for cases where timing is computed elsewhere). */
  record(phase: InstrumentationPhase, durationMs: number): void {
    let ring = this.rings.get(phase);
    if (!ring) {
      ring = createPhaseRing();
      this.rings.set(phase, ring);
    }
    recordSample(ring, durationMs);
  }

  snapshot(): PerfSnapshot {
    const phases: { [K in InstrumentationPhase]?: PhaseStats } = {};
    for (const p of PERF_PHASES) {
      const ring = this.rings.get(p);
      if (ring) {
        const stats = computeStats(ring);
        if (stats) {
          phases[p] = stats;
        }
      }
    }
    return Object.freeze({ phases: Object.freeze(phases) });
  }

  reset(): void {
    this.rings.clear();
  }
}

/** Global aggregator instance (only used when PERF_ENABLED). */
let globalAggregator: PerfAggregator | null = null;

function getAggregator(): PerfAggregator {
  if (!globalAggregator) {
    globalAggregator = new PerfAggregator();
  }
  return globalAggregator;
}

/**
 * Mark the start of a phase. Returns a token to pass to markEnd.
 * No-op when perf is disabled.
 */
export function perfMarkStart(): PerfToken {
  if (!PERF_ENABLED) return 0;
  return getAggregator().markStart();
}

/**
 * Mark the end of a phase.
 * No-op when perf is disabled.
 */
export function perfMarkEnd(phase: InstrumentationPhase, token: PerfToken): void {
  if (!PERF_ENABLED) return;
  getAggregator().markEnd(phase, token);
}

/**
 * Record a duration directly for a phase.
 * No-op when perf is disabled.
 */
export function perfRecord(phase: InstrumentationPhase, durationMs: number): void {
  if (!PERF_ENABLED) return;
  getAggregator().record(phase, durationMs);
}

/**
 * Get a snapshot of all collected perf data.
 * Returns empty snapshot when perf is disabled.
 */
export function perfSnapshot(): PerfSnapshot {
  if (!PERF_ENABLED) {
    return Object.freeze({ phases: Object.freeze({}) });
  }
  return getAggregator().snapshot();
}

/**
 * Reset all perf data.
 * No-op when perf is disabled.
 */
export function perfReset(): void {
  if (!PERF_ENABLED) return;
  getAggregator().reset();
}
