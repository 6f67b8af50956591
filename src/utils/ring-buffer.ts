/**
 * Fixed-capacity FIFO that overwrites its oldest entry when full.
 *
 * @module utils/ring-buffer
 */

export class RingBuffer<T> {
  private readonly buffer: (T | undefined)[];
  private head = 0;
  private length = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError('RingBuffer capacity must be a positive integer');
    }
    this.buffer = new Array<T | undefined>(capacity);
  }

  push(item: T): void {
    this.buffer[(this.head + this.length) % this.capacity] = item;
    if (this.length < this.capacity) {
      this.length += 1;
    } else {
      this.head = (this.head + 1) % this.capacity;
    }
  }

  /** Oldest-first copy of the contents */
  toArray(): T[] {
    return this.tail(this.length);
  }

  /** The newest `count` items, oldest first */
  tail(count: number): T[] {
    const n = Math.max(0, Math.min(count, this.length));
    const items: T[] = [];
    for (let i = this.length - n; i < this.length; i += 1) {
      items.push(this.at(i));
    }
    return items;
  }

  /** Newest item, if any */
  last(): T | undefined {
    return this.length === 0 ? undefined : this.at(this.length - 1);
  }

  clear(): void {
    this.buffer.fill(undefined);
    this.head = 0;
    this.length = 0;
  }

  isFull(): boolean {
    return this.length === this.capacity;
  }

  get size(): number {
    return this.length;
  }

  private at(offset: number): T {
    const item = this.buffer[(this.head + offset) % this.capacity];
    if (item === undefined) {
      throw new RangeError(`RingBuffer slot ${offset} is empty`);
    }
    return item;
  }
}
