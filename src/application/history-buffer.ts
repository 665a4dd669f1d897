import type { HistoryRecord } from '../domain/index.js';

/** Number of fetches kept for the trend charts. */
export const HISTORY_CAPACITY = 20;

/**
 * Rolling window behind the trend charts.
 *
 * Append-only and capacity-bounded: records stay in fetch order and the
 * oldest is evicted first. `append()` is the only mutator.
 */
export class HistoryBuffer {
  private readonly records: HistoryRecord[] = [];
  readonly capacity: number;

  constructor(capacity: number = HISTORY_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`History capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  append(record: HistoryRecord): void {
    this.records.push(record);
    while (this.records.length > this.capacity) {
      this.records.shift();
    }
  }

  /** Oldest → newest. A copy: callers cannot reach the buffer's storage. */
  snapshot(): readonly HistoryRecord[] {
    return this.records.slice();
  }

  get size(): number {
    return this.records.length;
  }
}
