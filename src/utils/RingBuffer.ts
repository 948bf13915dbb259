/**
 * Fixed-capacity buffer that overwrites its oldest item once full.
 */
export class RingBuffer<T> {
  private readonly items: T[] = [];
  private head = 0;
  private count = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`RingBuffer capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.count;
  }

  push(item: T): void {
    if (this.count < this.capacity) {
      this.items.push(item);
      this.count++;
      this.head = this.count % this.capacity;
    } else {
      this.items[this.head] = item;
      this.head = (this.head + 1) % this.capacity;
    }
  }

  // Oldest first
  toArray(): T[] {
    if (this.count < this.capacity) {
      return this.items.slice();
    }
    return [...this.items.slice(this.head), ...this.items.slice(0, this.head)];
  }

  clear(): void {
    this.items.length = 0;
    this.head = 0;
    this.count = 0;
  }
}
