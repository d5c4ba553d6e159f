/**
 * Binary min-heap used as the search frontier.
 * Ordering comes from the comparator; equal entries pop in insertion order.
 */

interface HeapNode<T> {
  value: T;
  seq: number;
}

export class Frontier<T> {
  private data: HeapNode<T>[] = [];
  private counter = 0;

  constructor(private readonly compare: (a: T, b: T) => number) {}

  get size(): number {
    return this.data.length;
  }

  push(value: T): void {
    this.data.push({ value, seq: this.counter++ });
    this.bubbleUp(this.data.length - 1);
  }

  pop(): T | undefined {
    const top = this.data[0];
    const last = this.data.pop();
    if (this.data.length > 0 && last) {
      this.data[0] = last;
      this.sinkDown(0);
    }
    return top?.value;
  }

  private less(i: number, j: number): boolean {
    const order = this.compare(this.data[i].value, this.data[j].value);
    return order < 0 || (order === 0 && this.data[i].seq < this.data[j].seq);
  }

  private bubbleUp(i: number): void {
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (this.less(i, parent)) {
        [this.data[i], this.data[parent]] = [this.data[parent], this.data[i]];
        i = parent;
      } else break;
    }
  }

  private sinkDown(i: number): void {
    const n = this.data.length;
    while (true) {
      let smallest = i;
      const l = 2 * i + 1,
        r = 2 * i + 2;
      if (l < n && this.less(l, smallest)) smallest = l;
      if (r < n && this.less(r, smallest)) smallest = r;
      if (smallest !== i) {
        [this.data[i], this.data[smallest]] = [this.data[smallest], this.data[i]];
        i = smallest;
      } else break;
    }
  }
}
