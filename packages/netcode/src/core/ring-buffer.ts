/**
 * Fixed-capacity circular buffer. Once full, each push overwrites the oldest
 * entry, so memory stays bounded no matter how long a feed runs.
 */
export class RingBuffer<T> {
  private readonly slots: (T | undefined)[];
  private readonly capacity: number;
  /** Slot index of the oldest entry */
  private head = 0;
  private count = 0;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new Error(`RingBuffer capacity must be a positive integer. Got: ${capacity}`);
    }
    this.capacity = capacity;
    this.slots = new Array<T | undefined>(capacity).fill(undefined);
  }

  /**
   * Append an entry, evicting the oldest one when the buffer is full.
   * @returns the evicted entry, if any
   */
  push(value: T): T | undefined {
    if (this.count < this.capacity) {
      this.slots[(this.head + this.count) % this.capacity] = value;
      this.count++;
      return undefined;
    }
    const evicted = this.slots[this.head];
    this.slots[this.head] = value;
    this.head = (this.head + 1) % this.capacity;
    return evicted;
  }

  /**
   * Entry at logical position `index` (0 = oldest). Negative indices count
   * back from the newest entry, like `Array.prototype.at`.
   */
  at(index: number): T | undefined {
    const logical = index < 0 ? this.count + index : index;
    if (logical < 0 || logical >= this.count) {
      return undefined;
    }
    return this.slots[(this.head + logical) % this.capacity];
  }

  oldest(): T | undefined {
    return this.at(0);
  }

  newest(): T | undefined {
    return this.at(-1);
  }

  get size(): number {
    return this.count;
  }

  get maxSize(): number {
    return this.capacity;
  }

  clear(): void {
    this.slots.fill(undefined);
    this.head = 0;
    this.count = 0;
  }

  /**
   * Iterate oldest to newest.
   */
  *[Symbol.iterator](): IterableIterator<T> {
    for (let i = 0; i < this.count; i++) {
      const value = this.slots[(this.head + i) % this.capacity];
      if (value !== undefined) {
        yield value;
      }
    }
  }

  toArray(): T[] {
    return Array.from(this);
  }
}
