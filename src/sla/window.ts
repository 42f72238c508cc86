/**
 * Fixed-capacity FIFO of interval ratios backed by a ring buffer. Pushing onto
 * a full window evicts the oldest entry.
 */
export class SlidingWindow {
  readonly capacity: number;
  private readonly buffer: number[];
  private head = 0;
  private count = 0;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`window capacity must be a positive integer (got ${capacity})`);
    }
    this.capacity = capacity;
    this.buffer = new Array<number>(capacity).fill(0);
  }

  get size(): number {
    return this.count;
  }

  push(value: number): number | null {
    let evicted: number | null = null;
    const tail = (this.head + this.count) % this.capacity;
    if (this.count === this.capacity) {
      evicted = this.buffer[this.head] ?? null;
      this.head = (this.head + 1) % this.capacity;
    } else {
      this.count += 1;
    }
    this.buffer[tail] = value;
    return evicted;
  }

  values(): number[] {
    const result: number[] = [];
    for (let offset = 0; offset < this.count; offset += 1) {
      const value = this.buffer[(this.head + offset) % this.capacity];
      if (value !== undefined) {
        result.push(value);
      }
    }
    return result;
  }

  average(): number | null {
    if (this.count === 0) {
      return null;
    }
    let sum = 0;
    for (const value of this.values()) {
      sum += value;
    }
    return sum / this.count;
  }

  clear() {
    this.head = 0;
    this.count = 0;
    this.buffer.fill(0);
  }
}
