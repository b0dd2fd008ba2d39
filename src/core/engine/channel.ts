/**
 * Bounded, observed-time-ordered queue for one device stream.
 */

export interface Observed {
  readonly observedAt: number;
}

export class BoundedChannel<T extends Observed> {
  readonly capacity: number;

  private items: T[] = [];
  private overflowCount = 0;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Channel capacity must be a positive integer, got ${String(capacity)}`);
    }
    this.capacity = capacity;
  }

  /**
   * Enqueue an item. When full, the oldest item is dropped and returned.
   */
  push(item: T): T | null {
    // Stable insert: equal instants keep arrival order
    let index = this.items.length;
    while (index > 0 && (this.items[index - 1]?.observedAt ?? 0) > item.observedAt) {
      index--;
    }
    this.items.splice(index, 0, item);

    if (this.items.length > this.capacity) {
      this.overflowCount++;
      return this.items.shift() ?? null;
    }
    return null;
  }

  peek(): T | undefined {
    return this.items[0];
  }

  shift(): T | undefined {
    return this.items.shift();
  }

  get overflow(): number {
    return this.overflowCount;
  }
}
