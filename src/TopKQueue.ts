/**
 * Bounded priority queue keeping the best `capacity` items seen so far.
 *
 * A min-heap ordered so the worst retained item sits at the root: an
 * incoming item only enters when it beats that root, which is then evicted.
 * Selecting k of n items costs O(n log k).
 *
 * `compare(a, b)` is negative when a ranks ahead of b. It must be a total
 * order for the selection to be deterministic.
 */
export class TopKQueue<T> {
  private readonly items: T[] = [];

  constructor(
    private readonly capacity: number,
    private readonly compare: (a: T, b: T) => number
  ) {}

  get length(): number {
    return this.items.length;
  }

  /**
   * The item that would be evicted next
   */
  get worst(): T | undefined {
    return this.items[0];
  }

  /**
   * Offers an item; returns whether it was retained
   */
  push(item: T): boolean {
    if (this.capacity <= 0) {
      return false;
    }
    if (this.items.length < this.capacity) {
      this.items.push(item);
      this.upHeap(this.items.length - 1);
      return true;
    }
    if (this.compare(item, this.items[0]) >= 0) {
      return false;
    }
    this.items[0] = item;
    this.downHeap(0);
    return true;
  }

  /**
   * Retained items, best first
   */
  byRank(): T[] {
    return [...this.items].sort(this.compare);
  }

  // Heap order: a parent ranks at or behind both children
  private isBehind(a: T, b: T): boolean {
    return this.compare(a, b) > 0;
  }

  private upHeap(startAt: number): void {
    let i = startAt;
    const item = this.items[i];
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (!this.isBehind(item, this.items[parent])) {
        break;
      }
      this.items[i] = this.items[parent];
      i = parent;
    }
    this.items[i] = item;
  }

  private downHeap(startAt: number): void {
    let i = startAt;
    const count = this.items.length;
    const item = this.items[i];
    for (;;) {
      let child = 2 * i + 1;
      if (child >= count) {
        break;
      }
      // Pick the child further behind in rank
      if (
        child + 1 < count &&
        this.isBehind(this.items[child + 1], this.items[child])
      ) {
        child++;
      }
      if (!this.isBehind(this.items[child], item)) {
        break;
      }
      this.items[i] = this.items[child];
      i = child;
    }
    this.items[i] = item;
  }
}
