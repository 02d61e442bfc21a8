/**
 * Fixed-capacity binary max-heap used to keep the best `capacity` items seen so far.
 * The root is always the worst kept item, so a better newcomer replaces it in O(log k).
 */
export class BoundedMaxHeap<T> {
  private readonly items: T[] = [];

  constructor(
    private readonly capacity: number,
    private readonly compare: (a: T, b: T) => number,
  ) {}

  get size(): number {
    return this.items.length;
  }

  /** Worst kept item, or undefined when empty */
  peek(): T | undefined {
    return this.items[0];
  }

  /**
   * Keep `item` if there is room, or if it sorts strictly before the current worst.
   * Returns whether the item was kept.
   */
  offer(item: T): boolean {
    if (this.items.length < this.capacity) {
      this.items.push(item);
      this.siftUp(this.items.length - 1);
      return true;
    }

    const worst = this.items[0];
    if (worst === undefined || this.compare(item, worst) >= 0) return false;

    this.items[0] = item;
    this.siftDown(0);
    return true;
  }

  /** Kept items, best first */
  toSortedArray(): T[] {
    return [...this.items].sort(this.compare);
  }

  private swap(i: number, j: number): void {
    const a = this.items[i];
    const b = this.items[j];
    if (a === undefined || b === undefined) return;
    this.items[i] = b;
    this.items[j] = a;
  }

  /** True when the item at i belongs above the item at j */
  private above(i: number, j: number): boolean {
    const a = this.items[i];
    const b = this.items[j];
    if (a === undefined || b === undefined) return false;
    return this.compare(a, b) > 0;
  }

  private siftUp(index: number): void {
    let i = index;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (!this.above(i, parent)) break;
      this.swap(i, parent);
      i = parent;
    }
  }

  private siftDown(index: number): void {
    let i = index;
    for (;;) {
      const left = 2 * i + 1;
      const right = left + 1;
      let largest = i;
      if (left < this.items.length && this.above(left, largest)) largest = left;
      if (right < this.items.length && this.above(right, largest)) largest = right;
      if (largest === i) return;
      this.swap(i, largest);
      i = largest;
    }
  }
}
