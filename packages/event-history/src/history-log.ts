/**
 * History log.
 *
 * Append-only, insertion-ordered sequence of records.
 *
 * Properties:
 * - O(1) append (amortized), O(n) snapshot
 * - `snapshot()` returns a frozen copy, never the live array
 * - `clear()` swaps in a fresh array, so a snapshot taken before the
 *   clear keeps the full pre-clear contents
 * - Optional capacity; when full, the oldest records are evicted first
 */

import type { EventRecord } from "./types.js";
import { EventHistoryError } from "./types.js";

export class HistoryLog {
  private _entries: EventRecord[] = [];
  private readonly _capacity: number;

  /**
   * @param capacity - Maximum retained records; 0 means unbounded
   * @throws EventHistoryError INVALID_CAPACITY for negative or fractional values
   */
  constructor(capacity = 0) {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new EventHistoryError(
        "INVALID_CAPACITY",
        `History capacity must be a non-negative integer, got ${capacity}`,
      );
    }
    this._capacity = capacity;
  }

  /**
   * Add a record at the end.
   *
   * @returns Number of records evicted to stay within capacity
   */
  append(record: EventRecord): number {
    this._entries.push(record);
    if (this._capacity === 0 || this._entries.length <= this._capacity) {
      return 0;
    }
    // One append overflows by at most one record
    this._entries.shift();
    return 1;
  }

  clear(): void {
    this._entries = [];
  }

  snapshot(): readonly EventRecord[] {
    return Object.freeze(this._entries.slice());
  }

  get size(): number {
    return this._entries.length;
  }

  /** Maximum retained records (0 = unbounded). */
  get capacity(): number {
    return this._capacity;
  }
}
