/**
 * packages/core/src/spatial/intervalTree.ts — AVL-balanced interval tree.
 *
 * Stores half-open intervals [start, end) ordered by (start, key). Every node
 * caches the maximum `end` in its subtree so point and overlap queries can
 * prune whole subtrees: O(log n + k) for k results.
 *
 * Intervals are never resized in place. Callers remove and reinsert, which
 * keeps the cached `maxEnd` values and the balance consistent.
 *
 * Empty intervals (start >= end) may be stored but never match a query.
 */

type IntervalNode<T> = {
  start: number;
  end: number;
  key: number;
  value: T;
  maxEnd: number;
  height: number;
  left: IntervalNode<T> | null;
  right: IntervalNode<T> | null;
};

function nodeHeight<T>(node: IntervalNode<T> | null): number {
  return node === null ? 0 : node.height;
}

function balanceOf<T>(node: IntervalNode<T>): number {
  return nodeHeight(node.left) - nodeHeight(node.right);
}

function refresh<T>(node: IntervalNode<T>): void {
  node.height = 1 + Math.max(nodeHeight(node.left), nodeHeight(node.right));
  let maxEnd = node.end;
  if (node.left !== null && node.left.maxEnd > maxEnd) maxEnd = node.left.maxEnd;
  if (node.right !== null && node.right.maxEnd > maxEnd) maxEnd = node.right.maxEnd;
  node.maxEnd = maxEnd;
}

function compareKey(start: number, key: number, node: IntervalNode<unknown>): number {
  if (start < node.start) return -1;
  if (start > node.start) return 1;
  if (key < node.key) return -1;
  if (key > node.key) return 1;
  return 0;
}

function rotateRight<T>(y: IntervalNode<T>): IntervalNode<T> {
  const x = y.left;
  if (x === null) return y;
  y.left = x.right;
  x.right = y;
  refresh(y);
  refresh(x);
  return x;
}

function rotateLeft<T>(x: IntervalNode<T>): IntervalNode<T> {
  const y = x.right;
  if (y === null) return x;
  x.right = y.left;
  y.left = x;
  refresh(x);
  refresh(y);
  return y;
}

function rebalance<T>(node: IntervalNode<T>): IntervalNode<T> {
  refresh(node);
  const balance = balanceOf(node);
  if (balance > 1 && node.left !== null) {
    if (balanceOf(node.left) < 0) node.left = rotateLeft(node.left);
    return rotateRight(node);
  }
  if (balance < -1 && node.right !== null) {
    if (balanceOf(node.right) > 0) node.right = rotateRight(node.right);
    return rotateLeft(node);
  }
  return node;
}

function removeMin<T>(node: IntervalNode<T>): IntervalNode<T> | null {
  if (node.left === null) return node.right;
  node.left = removeMin(node.left);
  return rebalance(node);
}

function minNode<T>(node: IntervalNode<T>): IntervalNode<T> {
  let cur = node;
  while (cur.left !== null) cur = cur.left;
  return cur;
}

export type IntervalTreeStats = Readonly<{ size: number; height: number; balanced: boolean }>;

export class IntervalTree<T> {
  private root: IntervalNode<T> | null = null;
  private count = 0;

  get size(): number {
    return this.count;
  }

  /**
   * Insert [start, end) under `key`. A (start, key) pair already present is
   * overwritten, so the size only grows for new pairs.
   */
  insert(start: number, end: number, key: number, value: T): void {
    this.root = this.insertNode(this.root, start, end, key, value);
  }

  /** Remove the interval stored under (start, key). Returns false when absent. */
  remove(start: number, key: number): boolean {
    const before = this.count;
    this.root = this.removeNode(this.root, start, key);
    return this.count < before;
  }

  /** Append every value whose interval contains `coord` to `out`. */
  queryPoint(coord: number, out: T[]): T[] {
    this.collectPoint(this.root, coord, out);
    return out;
  }

  /** Append every value whose interval overlaps [start, end) to `out`. */
  queryOverlap(start: number, end: number, out: T[]): T[] {
    if (!(start < end)) return out;
    this.collectOverlap(this.root, start, end, out);
    return out;
  }

  height(): number {
    return nodeHeight(this.root);
  }

  isBalanced(): boolean {
    const check = (node: IntervalNode<T> | null): boolean => {
      if (node === null) return true;
      if (Math.abs(balanceOf(node)) > 1) return false;
      return check(node.left) && check(node.right);
    };
    return check(this.root);
  }

  /**
   * Verify ordering, cached heights, cached maxEnd values, balance and the
   * node count. Returns false at the first inconsistency.
   */
  validate(): boolean {
    let seen = 0;
    const walk = (
      node: IntervalNode<T> | null,
      lo: IntervalNode<T> | null,
      hi: IntervalNode<T> | null,
    ): boolean => {
      if (node === null) return true;
      seen++;
      if (lo !== null && compareKey(node.start, node.key, lo) <= 0) return false;
      if (hi !== null && compareKey(node.start, node.key, hi) >= 0) return false;
      const expectedHeight = 1 + Math.max(nodeHeight(node.left), nodeHeight(node.right));
      if (node.height !== expectedHeight) return false;
      const expectedMax = Math.max(
        node.end,
        node.left?.maxEnd ?? Number.NEGATIVE_INFINITY,
        node.right?.maxEnd ?? Number.NEGATIVE_INFINITY,
      );
      if (node.maxEnd !== expectedMax) return false;
      if (Math.abs(balanceOf(node)) > 1) return false;
      return walk(node.left, lo, node) && walk(node.right, node, hi);
    };
    return walk(this.root, null, null) && seen === this.count;
  }

  stats(): IntervalTreeStats {
    return Object.freeze({ size: this.count, height: this.height(), balanced: this.isBalanced() });
  }

  clear(): void {
    this.root = null;
    this.count = 0;
  }

  private insertNode(
    node: IntervalNode<T> | null,
    start: number,
    end: number,
    key: number,
    value: T,
  ): IntervalNode<T> {
    if (node === null) {
      this.count++;
      return { start, end, key, value, maxEnd: end, height: 1, left: null, right: null };
    }
    const c = compareKey(start, key, node);
    if (c < 0) {
      node.left = this.insertNode(node.left, start, end, key, value);
    } else if (c > 0) {
      node.right = this.insertNode(node.right, start, end, key, value);
    } else {
      node.end = end;
      node.value = value;
    }
    return rebalance(node);
  }

  private removeNode(
    node: IntervalNode<T> | null,
    start: number,
    key: number,
  ): IntervalNode<T> | null {
    if (node === null) return null;
    const c = compareKey(start, key, node);
    if (c < 0) {
      node.left = this.removeNode(node.left, start, key);
      return rebalance(node);
    }
    if (c > 0) {
      node.right = this.removeNode(node.right, start, key);
      return rebalance(node);
    }

    this.count--;
    if (node.left === null) return node.right;
    if (node.right === null) return node.left;

    // Two children: take over the in-order successor's payload.
    const successor = minNode(node.right);
    node.start = successor.start;
    node.end = successor.end;
    node.key = successor.key;
    node.value = successor.value;
    node.right = removeMin(node.right);
    return rebalance(node);
  }

  private collectPoint(node: IntervalNode<T> | null, coord: number, out: T[]): void {
    if (node === null || node.maxEnd <= coord) return;
    this.collectPoint(node.left, coord, out);
    if (node.start <= coord && coord < node.end) out.push(node.value);
    // Everything to the right starts at or after node.start.
    if (node.start > coord) return;
    this.collectPoint(node.right, coord, out);
  }

  private collectOverlap(
    node: IntervalNode<T> | null,
    start: number,
    end: number,
    out: T[],
  ): void {
    if (node === null || node.maxEnd <= start) return;
    this.collectOverlap(node.left, start, end, out);
    if (node.start < node.end && node.start < end && start < node.end) out.push(node.value);
    if (node.start >= end) return;
    this.collectOverlap(node.right, start, end, out);
  }
}
