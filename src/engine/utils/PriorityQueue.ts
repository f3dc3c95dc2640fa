// ─────────────────────────────────────────────
//  Priority Queue — binary min-heap
//  Keyed by a numeric accessor; no ordering among equal keys.
// ─────────────────────────────────────────────

export class PriorityQueue<T> {
  private heap: T[] = [];

  constructor(private readonly keyOf: (item: T) => number) {}

  get size(): number {
    return this.heap.length;
  }

  isEmpty(): boolean {
    return this.heap.length === 0;
  }

  insert(item: T): void {
    this.heap.push(item);
    this.siftUp(this.heap.length - 1);
  }

  /** Remove and return the lowest-key item, or undefined when empty. */
  extractMin(): T | undefined {
    const top = this.heap[0];
    const last = this.heap.pop();
    if (top === undefined || last === undefined) return undefined;

    if (this.heap.length > 0) {
      this.heap[0] = last;
      this.siftDown(0);
    }
    return top;
  }

  peek(): T | undefined {
    return this.heap[0];
  }

  clear(): void {
    this.heap = [];
  }

  private siftUp(index: number): void {
    let i = index;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (this.key(i) >= this.key(parent)) break;
      this.swap(i, parent);
      i = parent;
    }
  }

  private siftDown(index: number): void {
    const n = this.heap.length;
    let i = index;
    for (;;) {
      const left = 2 * i + 1;
      const right = left + 1;
      let smallest = i;
      if (left < n && this.key(left) < this.key(smallest)) smallest = left;
      if (right < n && this.key(right) < this.key(smallest)) smallest = right;
      if (smallest === i) return;
      this.swap(i, smallest);
      i = smallest;
    }
  }

  private key(i: number): number {
    const item = this.heap[i];
    return item === undefined ? Infinity : this.keyOf(item);
  }

  private swap(a: number, b: number): void {
    const tmp = this.heap[a];
    const other = this.heap[b];
    if (tmp === undefined || other === undefined) return;
    this.heap[a] = other;
    this.heap[b] = tmp;
  }
}
