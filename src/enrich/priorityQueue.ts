import { PRIORITY_ORDER } from './types.js';
import type { EnrichmentPriority } from './types.js';

interface Entry<T> {
  value: T;
  enqueuedAt: number;
}

/**
 * Four-lane queue: higher lanes drain first, FIFO inside a lane.
 */
export class PriorityQueue<T> {
  private readonly lanes = new Map<EnrichmentPriority, Entry<T>[]>(PRIORITY_ORDER.map((p) => [p, []]));
  private count = 0;

  push(value: T, priority: EnrichmentPriority, now = Date.now()): void {
    this.lane(priority).push({ value, enqueuedAt: now });
    this.count++;
  }

  /** Remove up to `max` entries, highest priority first. */
  take(max: number): T[] {
    const out: T[] = [];
    for (const priority of PRIORITY_ORDER) {
      const lane = this.lane(priority);
      while (out.length < max && lane.length > 0) {
        const entry = lane.shift();
        if (entry) out.push(entry.value);
      }
      if (out.length >= max) break;
    }
    this.count -= out.length;
    return out;
  }

  /** Arrival time of the oldest queued entry in any lane. */
  oldestEnqueuedAt(): number | null {
    let oldest: number | null = null;
    for (const lane of this.lanes.values()) {
      const head = lane[0];
      if (head && (oldest === null || head.enqueuedAt < oldest)) {
        oldest = head.enqueuedAt;
      }
    }
    return oldest;
  }

  sizeOf(priority: EnrichmentPriority): number {
    return this.lane(priority).length;
  }

  get size(): number {
    return this.count;
  }

  private lane(priority: EnrichmentPriority): Entry<T>[] {
    let lane = this.lanes.get(priority);
    if (!lane) {
      lane = [];
      this.lanes.set(priority, lane);
    }
    return lane;
  }
}
