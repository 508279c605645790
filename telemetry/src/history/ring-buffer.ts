import { CapacityInvariantViolation } from "../utils/errors.js";

/**
 * Fixed-capacity circular buffer. When full, a push overwrites the oldest
 * entry, so memory stays constant no matter how many entries pass through.
 */
export class RingBuffer<T> {
  private buffer: (T | undefined)[];
  private head = 0;
  private size = 0;
  private totalPushed = 0;
  private totalEvicted = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(
        `Ring buffer capacity must be a positive integer, got ${capacity}`
      );
    }
    this.buffer = new Array<T | undefined>(capacity);
  }

  push(entry: T): void {
    this.buffer[this.head] = entry;
    this.head = (this.head + 1) % this.capacity;
    this.totalPushed++;

    if (this.size < this.capacity) {
      this.size++;
    } else {
      this.totalEvicted++;
    }

    if (this.size > this.capacity) {
      throw new CapacityInvariantViolation(this.size, this.capacity);
    }
  }

  /** Most recently pushed entry */
  last(): T | undefined {
    if (this.size === 0) return undefined;
    return this.buffer[(this.head - 1 + this.capacity) % this.capacity];
  }

  /**
   * Entries in insertion order, oldest first. Always a fresh array.
   */
  toArray(): T[] {
    const entries: T[] = [];
    const start = (this.head - this.size + this.capacity) % this.capacity;
    for (let i = 0; i < this.size; i++) {
      const entry = this.buffer[(start + i) % this.capacity];
      if (entry !== undefined) {
        entries.push(entry);
      }
    }
    return entries;
  }

  getSize(): number {
    return this.size;
  }

  isFull(): boolean {
    return this.size >= this.capacity;
  }

  stats(): { size: number; totalPushed: number; totalEvicted: number } {
    return {
      size: this.size,
      totalPushed: this.totalPushed,
      totalEvicted: this.totalEvicted,
    };
  }
}
