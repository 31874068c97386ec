// =============================================================================
// PriorityQueue<T> — Binary heap, FIFO among equal priorities
// =============================================================================

interface HeapNode<T> {
  item: T;
  seq: number;
}

export class PriorityQueue<T> {
  private readonly heap: HeapNode<T>[] = [];
  private readonly compare: (a: T, b: T) => number;
  private nextSeq = 0;

  constructor(compare: (a: T, b: T) => number) {
    this.compare = compare;
  }

  get size(): number {
    return this.heap.length;
  }

  enqueue(item: T): void {
    this.heap.push({ item, seq: this.nextSeq++ });
    this.bubbleUp(this.heap.length - 1);
  }

  dequeue(): T | undefined {
    const top = this.heap[0];
    if (top === undefined) return undefined;
    const last = this.heap.pop();
    if (last !== undefined && this.heap.length > 0) {
      this.heap[0] = last;
      this.sinkDown(0);
    }
    return top.item;
  }

  /** Removes and returns every queued item in priority order. */
  drainAll(): T[] {
    const items: T[] = [];
    for (let item = this.dequeue(); item !== undefined; item = this.dequeue()) {
      items.push(item);
    }
    return items;
  }

  private before(i: number, j: number): boolean {
    const a = this.heap[i];
    const b = this.heap[j];
    const order = this.compare(a.item, b.item);
    return order < 0 || (order === 0 && a.seq < b.seq);
  }

  private swap(i: number, j: number): void {
    [this.heap[i], this.heap[j]] = [this.heap[j], this.heap[i]];
  }

  private bubbleUp(i: number): void {
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (!this.before(i, parent)) break;
      this.swap(i, parent);
      i = parent;
    }
  }

  private sinkDown(i: number): void {
    const n = this.heap.length;
    while (true) {
      let first = i;
      const left = 2 * i + 1;
      const right = 2 * i + 2;
      if (left < n && this.before(left, first)) first = left;
      if (right < n && this.before(right, first)) first = right;
      if (first === i) break;
      this.swap(i, first);
      i = first;
    }
  }
}
