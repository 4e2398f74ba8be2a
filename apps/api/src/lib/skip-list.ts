// =====================================================
// Indexable Skip List
// =====================================================
// Ordered collection with O(log n) insert, remove, rank and
// positional access. Each forward link records how many elements it
// skips (its span), the same layout Redis uses for sorted sets.

const MAX_LEVEL = 32;
const LEVEL_PROBABILITY = 0.25;

interface Links<T> {
  forward: Array<SkipNode<T> | null>;
  span: number[];
}

interface SkipNode<T> extends Links<T> {
  value: T;
}

export type Comparator<T> = (a: T, b: T) => number;

export class IndexableSkipList<T> {
  private readonly head: Links<T>;
  private level = 1;
  private length = 0;

  constructor(
    private readonly compare: Comparator<T>,
    private readonly random: () => number = Math.random
  ) {
    this.head = {
      forward: new Array<SkipNode<T> | null>(MAX_LEVEL).fill(null),
      span: new Array<number>(MAX_LEVEL).fill(0),
    };
  }

  get size(): number {
    return this.length;
  }

  /**
   * Insert a value. The comparator must order it strictly against every
   * element already present; equal values are not deduplicated.
   */
  insert(value: T): void {
    const update = new Array<Links<T>>(MAX_LEVEL);
    const rank = new Array<number>(MAX_LEVEL).fill(0);
    let x: Links<T> = this.head;

    for (let i = this.level - 1; i >= 0; i--) {
      rank[i] = i === this.level - 1 ? 0 : rank[i + 1];
      let next = x.forward[i];
      while (next && this.compare(next.value, value) < 0) {
        rank[i] += x.span[i];
        x = next;
        next = x.forward[i];
      }
      update[i] = x;
    }

    const nodeLevel = this.randomLevel();
    if (nodeLevel > this.level) {
      for (let i = this.level; i < nodeLevel; i++) {
        rank[i] = 0;
        update[i] = this.head;
        this.head.span[i] = this.length;
      }
      this.level = nodeLevel;
    }

    const node: SkipNode<T> = {
      value,
      forward: new Array<SkipNode<T> | null>(nodeLevel).fill(null),
      span: new Array<number>(nodeLevel).fill(0),
    };

    for (let i = 0; i < nodeLevel; i++) {
      const prev = update[i];
      node.forward[i] = prev.forward[i];
      prev.forward[i] = node;
      node.span[i] = prev.span[i] - (rank[0] - rank[i]);
      prev.span[i] = rank[0] - rank[i] + 1;
    }

    for (let i = nodeLevel; i < this.level; i++) {
      update[i].span[i]++;
    }

    this.length++;
  }

  /**
   * Remove the element comparing equal to value. Returns false when absent.
   */
  remove(value: T): boolean {
    const update = new Array<Links<T>>(MAX_LEVEL);
    let x: Links<T> = this.head;

    for (let i = this.level - 1; i >= 0; i--) {
      let next = x.forward[i];
      while (next && this.compare(next.value, value) < 0) {
        x = next;
        next = x.forward[i];
      }
      update[i] = x;
    }

    const target = x.forward[0];
    if (!target || this.compare(target.value, value) !== 0) {
      return false;
    }

    for (let i = 0; i < this.level; i++) {
      const prev = update[i];
      if (prev.forward[i] === target) {
        prev.span[i] += target.span[i] - 1;
        prev.forward[i] = target.forward[i];
      } else {
        prev.span[i] -= 1;
      }
    }

    while (this.level > 1 && this.head.forward[this.level - 1] === null) {
      this.level--;
    }

    this.length--;
    return true;
  }

  /**
   * 1-based position of the element comparing equal to value, or null.
   */
  rankOf(value: T): number | null {
    let rank = 0;
    let x: Links<T> = this.head;

    for (let i = this.level - 1; i >= 0; i--) {
      let next = x.forward[i];
      while (next && this.compare(next.value, value) <= 0) {
        rank += x.span[i];
        x = next;
        next = x.forward[i];
      }
      if (this.isNode(x) && this.compare(x.value, value) === 0) {
        return rank;
      }
    }

    return null;
  }

  /**
   * Number of elements ordered strictly before value, present or not.
   */
  countBefore(value: T): number {
    let count = 0;
    let x: Links<T> = this.head;

    for (let i = this.level - 1; i >= 0; i--) {
      let next = x.forward[i];
      while (next && this.compare(next.value, value) < 0) {
        count += x.span[i];
        x = next;
        next = x.forward[i];
      }
    }

    return count;
  }

  /**
   * Elements at 0-based offsets start..end (inclusive), clamped to the list.
   */
  range(start: number, end: number): T[] {
    const last = Math.min(end, this.length - 1);
    if (start < 0 || start > last) {
      return [];
    }

    const result: T[] = [];
    let node = this.nodeAt(start);
    for (let i = start; i <= last && node; i++) {
      result.push(node.value);
      node = node.forward[0];
    }
    return result;
  }

  values(): T[] {
    return this.range(0, this.length - 1);
  }

  private nodeAt(index: number): SkipNode<T> | null {
    const target = index + 1;
    let traversed = 0;
    let x: Links<T> = this.head;

    for (let i = this.level - 1; i >= 0; i--) {
      let next = x.forward[i];
      while (next && traversed + x.span[i] <= target) {
        traversed += x.span[i];
        x = next;
        next = x.forward[i];
      }
      if (traversed === target && this.isNode(x)) {
        return x;
      }
    }

    return null;
  }

  private isNode(links: Links<T>): links is SkipNode<T> {
    return links !== this.head;
  }

  private randomLevel(): number {
    let level = 1;
    while (level < MAX_LEVEL && this.random() < LEVEL_PROBABILITY) {
      level++;
    }
    return level;
  }
}
