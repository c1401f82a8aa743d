import { assert, createRng, describe, test } from "../index.js";

describe("createRng", () => {
  test("same seed replays the same sequence", () => {
    const a = createRngSequence(42, 5);
    const b = createRngSequence(42, 5);
    assert.deepEqual(a, b);
  });

  test("first value follows the LCG step from the seed", () => {
    assert.equal(createRng(0).u32(), 1013904223);
    assert.equal(createRng(0).next(), 1013904223 / 4294967296);
  });

  test("int stays within inclusive bounds", () => {
    const rng = createRng(7);
    for (let i = 0; i < 200; i++) {
      const v = rng.int(3, 5);
      assert.ok(v >= 3 && v <= 5, `out of range: ${String(v)}`);
    }
  });

  test("pick throws on an empty list", () => {
    const rng = createRng(1);
    assert.throws(() => rng.pick([]), /empty list/);
  });
});

function createRngSequence(seed: number, n: number): number[] {
  const rng = createRng(seed);
  const out: number[] = [];
  for (let i = 0; i < n; i++) out.push(rng.next());
  return out;
}
