// src/pending_queue.ts

/**
 * What the queue needs to order a waiting request.
 */
export interface Prioritized {
  priority: number;
  /** Arrival sequence, increasing. */
  seq: number;
}

export type PendingComparator<T extends Prioritized> = (a: T, b: T) => number;

/**
 * Higher priority first; equal priorities in arrival order.
 */
export function byPriorityThenArrival<T extends Prioritized>(a: T, b: T): number {
  if (a.priority !== b.priority) {
    return b.priority - a.priority;
  }
  return a.seq - b.seq;
}

/**
 * Requests waiting for an instance slot, kept sorted by the comparator.
 */
export class PendingRequestQueue<T extends Prioritized> {
  private readonly items: T[] = [];

  constructor(private readonly compare: PendingComparator<T> = byPriorityThenArrival) {}

  get size(): number {
    return this.items.length;
  }

  enqueue(item: T): void {
    let low = 0;
    let high = this.items.length;
    while (low < high) {
      const mid = (low + high) >>> 1;
      if (this.compare(this.items[mid], item) <= 0) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }
    this.items.splice(low, 0, item);
  }

  peek(): T | undefined {
    return this.items[0];
  }

  dequeue(): T | undefined {
    return this.items.shift();
  }

  /**
   * Removes the first item matching `predicate` and returns it.
   */
  remove(predicate: (item: T) => boolean): T | undefined {
    const index = this.items.findIndex(predicate);
    if (index < 0) {
      return undefined;
    }
    const [removed] = this.items.splice(index, 1);
    return removed;
  }

  removeWhere(predicate: (item: T) => boolean): T[] {
    const removed: T[] = [];
    for (let i = this.items.length - 1; i >= 0; i--) {
      if (predicate(this.items[i])) {
        removed.unshift(...this.items.splice(i, 1));
      }
    }
    return removed;
  }

  drain(): T[] {
    return this.items.splice(0);
  }

  toArray(): T[] {
    return [...this.items];
  }
}
