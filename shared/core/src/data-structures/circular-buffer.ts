/**
 * Circular Buffer
 *
 * Fixed-capacity ring with O(1) push and shift. Used as FIFO storage behind
 * the opportunity queue (push/shift), as the eviction order of the data
 * source's seen-id set, and as rolling sample windows in the metrics
 * aggregator (pushOverwrite/toArray).
 */

export class CircularBuffer<T> {
  private readonly slots: (T | undefined)[];
  private head = 0;
  private count = 0;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new Error('CircularBuffer capacity must be a positive integer');
    }
    this.slots = new Array<T | undefined>(capacity).fill(undefined);
  }

  get capacity(): number {
    return this.slots.length;
  }

  get size(): number {
    return this.count;
  }

  get isEmpty(): boolean {
    return this.count === 0;
  }

  get isFull(): boolean {
    return this.count === this.slots.length;
  }

  /** Appends at the tail; false when full. */
  push(item: T): boolean {
    if (this.isFull) {
      return false;
    }
    this.slots[this.indexAt(this.count)] = item;
    this.count++;
    return true;
  }

  /** Appends at the tail, dropping the oldest entry when full. */
  pushOverwrite(item: T): void {
    if (!this.isFull) {
      this.push(item);
      return;
    }
    this.slots[this.head] = item;
    this.head = this.indexAt(1);
  }

  shift(): T | undefined {
    if (this.count === 0) {
      return undefined;
    }
    const item = this.slots[this.head];
    // release the slot so shifted objects can be collected
    this.slots[this.head] = undefined;
    this.head = this.indexAt(1);
    this.count--;
    return item;
  }

  clear(): void {
    this.slots.fill(undefined);
    this.head = 0;
    this.count = 0;
  }

  /** Oldest to newest. */
  toArray(): T[] {
    const result: T[] = [];
    for (let i = 0; i < this.count; i++) {
      const item = this.slots[this.indexAt(i)];
      if (item !== undefined) {
        result.push(item);
      }
    }
    return result;
  }

  private indexAt(offset: number): number {
    return (this.head + offset) % this.slots.length;
  }
}
