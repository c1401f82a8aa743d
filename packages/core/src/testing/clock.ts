/**
 * Manual clock for budget tests. Time moves only when a test (or a handler
 * under test) advances it.
 */

export type ManualClock = Readonly<{
  now: () => number;
  advance: (ms: number) => number;
  set: (ms: number) => void;
}>;

export function createManualClock(startMs = 0): ManualClock {
  let t = startMs;
  return Object.freeze({
    now: () => t,
    advance: (ms: number) => {
      if (!Number.isFinite(ms) || ms < 0) {
        throw new Error(`ManualClock: advance(ms) needs a number >= 0 (got ${String(ms)})`);
      }
      t += ms;
      return t;
    },
    set: (ms: number) => {
      if (ms < t) {
        throw new Error(`ManualClock: time cannot go backwards (${String(ms)} < ${String(t)})`);
      }
      t = ms;
    },
  });
}
