/**
 * HistoryLog: append-only record of what a channel sent and received.
 *
 * Invariants:
 * - One entry per successful send and per successful receive
 * - Entries are never removed or reordered
 * - seq starts at 1 and increases by one per entry
 *
 * @remarks
 * **Single-writer assumption**: not safe for concurrent mutation. Channel
 * operations append only after their I/O settles, so interleaved awaits
 * produce entries in completion order.
 *
 * @module
 */

export type HistoryDirection = 'sent' | 'received'

export interface HistoryEntry<T> {
  readonly seq: number
  readonly direction: HistoryDirection
  readonly message: T
}

export class HistoryLog<T> implements Iterable<HistoryEntry<T>> {
  private readonly items: HistoryEntry<T>[] = []

  /**
   * Record a message. Returns the stored entry.
   */
  append(direction: HistoryDirection, message: T): HistoryEntry<T> {
    const entry: HistoryEntry<T> = { seq: this.items.length + 1, direction, message }
    this.items.push(entry)
    return entry
  }

  get size(): number {
    return this.items.length
  }

  /** Snapshot of all entries in order. */
  entries(): readonly HistoryEntry<T>[] {
    return [...this.items]
  }

  /** Messages in order, optionally limited to one direction. */
  messages(direction?: HistoryDirection): T[] {
    return this.items
      .filter((entry) => direction === undefined || entry.direction === direction)
      .map((entry) => entry.message)
  }

  [Symbol.iterator](): Iterator<HistoryEntry<T>> {
    return this.entries()[Symbol.iterator]()
  }
}
