/**
 * Priority queue for pending requests
 */

import { PRIORITY_RANK } from './types.mjs';
import type { Prioritized, Priority } from './types.mjs';

/**
 * Priority queue that orders entries by band (urgent first) and insertion
 * sequence (FIFO within a band)
 */
export class PriorityQueue<T extends Prioritized> {
  private items: T[] = [];

  /**
   * Add an entry to the queue
   */
  enqueue(item: T): void {
    // Find insertion point using binary search
    let low = 0;
    let high = this.items.length;
    const rank = PRIORITY_RANK[item.priority];

    while (low < high) {
      const mid = Math.floor((low + high) / 2);
      const midItem = this.items[mid];
      const midRank = PRIORITY_RANK[midItem.priority];

      // Higher priority comes first
      if (midRank > rank) {
        low = mid + 1;
      } else if (midRank < rank) {
        high = mid;
      } else if (midItem.sequence <= item.sequence) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }

    this.items.splice(low, 0, item);
  }

  /**
   * Remove and return the highest priority entry
   */
  dequeue(): T | undefined {
    return this.items.shift();
  }

  /**
   * Peek at the highest priority entry without removing it
   */
  peek(): T | undefined {
    return this.items[0];
  }

  /**
   * Remove a specific entry
   *
   * @returns Whether the entry was queued
   */
  remove(item: T): boolean {
    const index = this.items.indexOf(item);
    if (index !== -1) {
      this.items.splice(index, 1);
      return true;
    }
    return false;
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  get size(): number {
    return this.items.length;
  }

  /**
   * Number of queued entries per band
   */
  countByPriority(): Record<Priority, number> {
    const counts: Record<Priority, number> = { low: 0, normal: 0, high: 0, urgent: 0 };
    for (const item of this.items) {
      counts[item.priority]++;
    }
    return counts;
  }

  /**
   * Clear all entries from the queue
   *
   * @returns Array of all removed entries
   */
  clear(): T[] {
    const items = this.items;
    this.items = [];
    return items;
  }
}
