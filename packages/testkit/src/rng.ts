/**
 * Seeded pseudo-random numbers for randomized tests. Same seed, same
 * sequence, so a failing seed can be replayed.
 */

export type Rng = Readonly<{
  /** Next 32-bit unsigned value. */
  u32: () => number;
  /** Uniform in [0, 1). */
  next: () => number;
  /** Integer in [min, max], both inclusive. */
  int: (min: number, max: number) => number;
  pick: <T>(items: readonly T[]) => T;
}>;

export function createRng(seed: number): Rng {
  let state = seed >>> 0;
  const u32 = (): number => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state;
  };
  const int = (min: number, max: number): number => min + (u32() % (max - min + 1));
  return Object.freeze({
    u32,
    next: () => u32() / 4294967296,
    int,
    pick: <T>(items: readonly T[]): T => {
      const item = items[int(0, items.length - 1)];
      if (item === undefined) throw new Error("Rng.pick: empty list");
      return item;
    },
  });
}
