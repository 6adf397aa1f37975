/**
 * Append-only queue with a fixed capacity. Pushing past capacity evicts the
 * oldest entries first.
 */
export class BoundedQueue<T> {
  private items: T[] = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Capacity must be a positive integer, got ${capacity}`);
    }
  }

  push(...entries: T[]): void {
    this.items.push(...entries);
    const overflow = this.items.length - this.capacity;
    if (overflow > 0) {
      this.items.splice(0, overflow);
    }
  }

  toArray(): T[] {
    return [...this.items];
  }

  get size(): number {
    return this.items.length;
  }

  clear(): void {
    this.items = [];
  }
}
