import { assert, createRng, describe, test } from "@widgetflow/testkit";
import { IntervalTree } from "../intervalTree.js";

function sorted(values: string[]): string[] {
  return values.slice().sort();
}

describe("IntervalTree", () => {
  test("point queries treat intervals as half-open", () => {
    const tree = new IntervalTree<string>();
    tree.insert(0, 10, 1, "a");
    tree.insert(10, 20, 2, "b");

    assert.deepEqual(tree.queryPoint(0, []), ["a"]);
    assert.deepEqual(tree.queryPoint(9.5, []), ["a"]);
    assert.deepEqual(tree.queryPoint(10, []), ["b"]);
    assert.deepEqual(tree.queryPoint(20, []), []);
    assert.deepEqual(tree.queryPoint(-1, []), []);
  });

  test("overlap queries exclude touching edges and empty query ranges", () => {
    const tree = new IntervalTree<string>();
    tree.insert(0, 10, 1, "a");
    tree.insert(5, 15, 2, "b");
    tree.insert(20, 30, 3, "c");

    assert.deepEqual(sorted(tree.queryOverlap(9, 21, [])), ["a", "b", "c"]);
    assert.deepEqual(tree.queryOverlap(15, 20, []), []);
    assert.deepEqual(tree.queryOverlap(5, 5, []), []);
    assert.deepEqual(tree.queryOverlap(8, 2, []), []);
  });

  test("empty intervals are stored but never match", () => {
    const tree = new IntervalTree<string>();
    tree.insert(4, 4, 1, "empty");
    assert.equal(tree.size, 1);
    assert.deepEqual(tree.queryPoint(4, []), []);
    assert.deepEqual(tree.queryOverlap(0, 10, []), []);
  });

  test("same start with different keys keeps both intervals", () => {
    const tree = new IntervalTree<string>();
    tree.insert(0, 5, 1, "a");
    tree.insert(0, 8, 2, "b");
    assert.equal(tree.size, 2);
    assert.deepEqual(sorted(tree.queryPoint(6, [])), ["b"]);
    assert.deepEqual(sorted(tree.queryPoint(1, [])), ["a", "b"]);
  });

  test("insert of an existing (start, key) overwrites end and value", () => {
    const tree = new IntervalTree<string>();
    tree.insert(0, 5, 1, "old");
    tree.insert(0, 50, 1, "new");
    assert.equal(tree.size, 1);
    assert.deepEqual(tree.queryPoint(40, []), ["new"]);
    assert.equal(tree.validate(), true);
  });

  test("remove reports whether the interval existed", () => {
    const tree = new IntervalTree<string>();
    tree.insert(0, 5, 1, "a");
    assert.equal(tree.remove(0, 2), false);
    assert.equal(tree.remove(0, 1), true);
    assert.equal(tree.remove(0, 1), false);
    assert.equal(tree.size, 0);
    assert.deepEqual(tree.queryPoint(1, []), []);
  });

  test("queries append to the caller's buffer", () => {
    const tree = new IntervalTree<string>();
    tree.insert(0, 5, 1, "a");
    const out = ["seed"];
    const returned = tree.queryPoint(2, out);
    assert.equal(returned, out);
    assert.deepEqual(out, ["seed", "a"]);
  });

  test("sorted insertion stays balanced", () => {
    const tree = new IntervalTree<number>();
    for (let i = 0; i < 1024; i++) tree.insert(i, i + 1, i, i);
    assert.equal(tree.size, 1024);
    assert.equal(tree.isBalanced(), true);
    // An AVL tree of 1024 nodes is at most 1.44 * log2(1026) high.
    assert.ok(tree.height() <= 14, `height ${String(tree.height())}`);
    assert.deepEqual(tree.stats(), { size: 1024, height: tree.height(), balanced: true });
  });

  test("random inserts and removes agree with a brute-force scan", () => {
    const rng = createRng(0x5eed);
    const tree = new IntervalTree<number>();
    const live = new Map<number, readonly [number, number]>();

    for (let step = 0; step < 2000; step++) {
      const key = rng.int(0, 199);
      const existing = live.get(key);
      if (existing && rng.int(0, 2) === 0) {
        assert.equal(tree.remove(existing[0], key), true);
        live.delete(key);
      } else {
        if (existing) tree.remove(existing[0], key);
        const start = rng.int(0, 500);
        const end = start + rng.int(0, 60);
        tree.insert(start, end, key, key);
        live.set(key, [start, end]);
      }

      if (step % 97 === 0) {
        assert.equal(tree.validate(), true, `invalid after step ${String(step)}`);
        const coord = rng.int(0, 560);
        const expected: number[] = [];
        for (const [k, [s, e]] of live) if (s <= coord && coord < e) expected.push(k);
        const actual = tree.queryPoint(coord, []);
        assert.deepEqual(
          actual.slice().sort((a, b) => a - b),
          expected.sort((a, b) => a - b),
        );
      }
    }
    assert.equal(tree.size, live.size);
    assert.equal(tree.validate(), true);
  });

  test("clear drops everything", () => {
    const tree = new IntervalTree<string>();
    tree.insert(0, 5, 1, "a");
    tree.insert(3, 9, 2, "b");
    tree.clear();
    assert.equal(tree.size, 0);
    assert.equal(tree.height(), 0);
    assert.deepEqual(tree.queryOverlap(0, 10, []), []);
  });
});
