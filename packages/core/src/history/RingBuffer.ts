/**
 * Fixed-capacity FIFO. Pushing into a full buffer overwrites the oldest item.
 */
export class RingBuffer<T> {
  private items: (T | undefined)[];
  private head = 0;
  private count = 0;

  constructor(private cap: number) {
    if (!Number.isInteger(cap) || cap < 1) {
      throw new RangeError(`RingBuffer capacity must be a positive integer, got ${cap}`);
    }
    this.items = new Array<T | undefined>(cap);
  }

  get capacity(): number {
    return this.cap;
  }

  get length(): number {
    return this.count;
  }

  push(item: T): void {
    const tail = (this.head + this.count) % this.cap;
    this.items[tail] = item;
    if (this.count < this.cap) {
      this.count++;
    } else {
      this.head = (this.head + 1) % this.cap;
    }
  }

  /** Oldest first. */
  toArray(): T[] {
    const out: T[] = [];
    for (let i = 0; i < this.count; i++) {
      const item = this.items[(this.head + i) % this.cap];
      if (item !== undefined) out.push(item);
    }
    return out;
  }

  /** Keeps the newest `capacity` items. */
  resize(capacity: number): void {
    const kept = this.toArray().slice(-capacity);
    this.cap = capacity;
    this.items = new Array<T | undefined>(capacity);
    this.head = 0;
    this.count = 0;
    for (const item of kept) this.push(item);
  }

  clear(): void {
    this.items = new Array<T | undefined>(this.cap);
    this.head = 0;
    this.count = 0;
  }
}
