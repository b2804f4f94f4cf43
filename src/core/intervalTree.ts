/**
 * Augmented AVL interval tree
 *
 * Nodes are ordered by (beginMs, id) and store the maximum end of their
 * subtree, so overlap queries prune whole branches: O(log n + k).
 *
 * Intervals are half-open [begin, end). A zero-length interval at t is
 * treated as the point t: it overlaps [a, b) when a <= t < b.
 */

interface TreeNode<T> {
  id: string;
  beginMs: number;
  endMs: number;
  value: T;
  maxEnd: number;
  height: number;
  left: TreeNode<T> | null;
  right: TreeNode<T> | null;
}

function compareKeys(
  beginA: number,
  idA: string,
  beginB: number,
  idB: string
): number {
  if (beginA !== beginB) return beginA < beginB ? -1 : 1;
  if (idA === idB) return 0;
  return idA < idB ? -1 : 1;
}

const heightOf = <T>(node: TreeNode<T> | null): number =>
  node ? node.height : 0;

function refresh<T>(node: TreeNode<T>): void {
  node.height = Math.max(heightOf(node.left), heightOf(node.right)) + 1;
  let maxEnd = node.endMs;
  if (node.left && node.left.maxEnd > maxEnd) maxEnd = node.left.maxEnd;
  if (node.right && node.right.maxEnd > maxEnd) maxEnd = node.right.maxEnd;
  node.maxEnd = maxEnd;
}

function rotateRight<T>(node: TreeNode<T>): TreeNode<T> {
  const pivot = node.left;
  if (!pivot) return node;
  node.left = pivot.right;
  pivot.right = node;
  refresh(node);
  refresh(pivot);
  return pivot;
}

function rotateLeft<T>(node: TreeNode<T>): TreeNode<T> {
  const pivot = node.right;
  if (!pivot) return node;
  node.right = pivot.left;
  pivot.left = node;
  refresh(node);
  refresh(pivot);
  return pivot;
}

function rebalance<T>(node: TreeNode<T>): TreeNode<T> {
  refresh(node);
  const balance = heightOf(node.left) - heightOf(node.right);

  if (balance > 1 && node.left) {
    if (heightOf(node.left.left) < heightOf(node.left.right)) {
      node.left = rotateLeft(node.left);
    }
    return rotateRight(node);
  }

  if (balance < -1 && node.right) {
    if (heightOf(node.right.right) < heightOf(node.right.left)) {
      node.right = rotateRight(node.right);
    }
    return rotateLeft(node);
  }

  return node;
}

function overlaps(
  beginMs: number,
  endMs: number,
  fromMs: number,
  toMs: number
): boolean {
  if (fromMs === toMs) {
    // point query
    return beginMs === endMs
      ? beginMs === fromMs
      : beginMs <= fromMs && fromMs < endMs;
  }
  if (beginMs === endMs) {
    return fromMs <= beginMs && beginMs < toMs;
  }
  return beginMs < toMs && endMs > fromMs;
}

export class IntervalTree<T> {
  private root: TreeNode<T> | null = null;
  private count = 0;

  get size(): number {
    return this.count;
  }

  get height(): number {
    return heightOf(this.root);
  }

  clear(): void {
    this.root = null;
    this.count = 0;
  }

  insert(id: string, beginMs: number, endMs: number, value: T): void {
    if (endMs < beginMs) {
      throw new RangeError(`Interval end ${endMs} is before begin ${beginMs}`);
    }
    this.root = this.insertAt(this.root, {
      id,
      beginMs,
      endMs,
      value,
      maxEnd: endMs,
      height: 1,
      left: null,
      right: null,
    });
  }

  /**
   * Remove the interval stored under (beginMs, id). Returns false when absent.
   */
  remove(id: string, beginMs: number): boolean {
    const before = this.count;
    this.root = this.removeAt(this.root, id, beginMs);
    return this.count < before;
  }

  /**
   * Values whose interval overlaps [fromMs, toMs), ascending by begin.
   * fromMs === toMs queries the single point.
   */
  queryRange(fromMs: number, toMs: number): T[] {
    const out: T[] = [];
    this.search(this.root, fromMs, toMs, out);
    return out;
  }

  queryPoint(atMs: number): T[] {
    return this.queryRange(atMs, atMs);
  }

  /**
   * Values with afterMs < begin <= untilMs, ascending by begin
   */
  beginsBetween(afterMs: number, untilMs: number): T[] {
    const out: T[] = [];
    const visit = (node: TreeNode<T> | null): void => {
      if (!node) return;
      if (node.beginMs > afterMs) visit(node.left);
      if (node.beginMs > afterMs && node.beginMs <= untilMs) out.push(node.value);
      if (node.beginMs <= untilMs) visit(node.right);
    };
    visit(this.root);
    return out;
  }

  /**
   * Lazily iterate values with begin > afterMs in ascending begin order
   */
  *beginsAfter(afterMs: number): Generator<T> {
    const stack: TreeNode<T>[] = [];
    let node = this.root;

    while (node || stack.length > 0) {
      while (node) {
        if (node.beginMs > afterMs) {
          stack.push(node);
          node = node.left;
        } else {
          node = node.right;
        }
      }
      const next = stack.pop();
      if (!next) return;
      yield next.value;
      node = next.right;
    }
  }

  values(): T[] {
    const out: T[] = [];
    const visit = (node: TreeNode<T> | null): void => {
      if (!node) return;
      visit(node.left);
      out.push(node.value);
      visit(node.right);
    };
    visit(this.root);
    return out;
  }

  private search(
    node: TreeNode<T> | null,
    fromMs: number,
    toMs: number,
    out: T[]
  ): void {
    if (!node || node.maxEnd < fromMs) return;

    this.search(node.left, fromMs, toMs, out);

    if (overlaps(node.beginMs, node.endMs, fromMs, toMs)) {
      out.push(node.value);
    }

    const rightMayOverlap =
      fromMs === toMs ? node.beginMs <= fromMs : node.beginMs < toMs;
    if (rightMayOverlap) {
      this.search(node.right, fromMs, toMs, out);
    }
  }

  private insertAt(node: TreeNode<T> | null, fresh: TreeNode<T>): TreeNode<T> {
    if (!node) {
      this.count++;
      return fresh;
    }

    const order = compareKeys(fresh.beginMs, fresh.id, node.beginMs, node.id);
    if (order === 0) {
      node.endMs = fresh.endMs;
      node.value = fresh.value;
      refresh(node);
      return node;
    }

    if (order < 0) {
      node.left = this.insertAt(node.left, fresh);
    } else {
      node.right = this.insertAt(node.right, fresh);
    }
    return rebalance(node);
  }

  private removeAt(
    node: TreeNode<T> | null,
    id: string,
    beginMs: number
  ): TreeNode<T> | null {
    if (!node) return null;

    const order = compareKeys(beginMs, id, node.beginMs, node.id);
    if (order < 0) {
      node.left = this.removeAt(node.left, id, beginMs);
      return rebalance(node);
    }
    if (order > 0) {
      node.right = this.removeAt(node.right, id, beginMs);
      return rebalance(node);
    }

    if (!node.left || !node.right) {
      this.count--;
      return node.left ?? node.right;
    }

    // two children: replace with in-order successor
    let successor = node.right;
    while (successor.left) successor = successor.left;

    node.right = this.removeAt(node.right, successor.id, successor.beginMs);
    node.id = successor.id;
    node.beginMs = successor.beginMs;
    node.endMs = successor.endMs;
    node.value = successor.value;
    return rebalance(node);
  }
}
