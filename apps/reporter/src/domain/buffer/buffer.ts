/**
 * Append-only buffer with an atomic take-and-reset.
 *
 * Neither `append` nor `drainAll` awaits anything, so on the event loop each
 * runs to completion before any other task: an item appended before a drain
 * is returned by that drain (or an earlier one), never by a later one.
 * Moving this to worker threads would need a lock around `drainAll`.
 */
export interface DrainableBuffer<T> {
  /** Add single item to the current epoch */
  append(item: T): void;
  /** Add multiple items to the current epoch */
  appendMany(items: readonly T[]): void;
  /** Take the current epoch and start a new, empty one */
  drainAll(): T[];
  /** Check if the current epoch has any items */
  isEmpty(): boolean;
  /** Get current item count */
  size(): number;
}

export class SwapBuffer<T> implements DrainableBuffer<T> {
  private items: T[] = [];

  append(item: T): void {
    this.items.push(item);
  }

  appendMany(items: readonly T[]): void {
    this.items.push(...items);
  }

  drainAll(): T[] {
    const epoch = this.items;
    this.items = [];
    return epoch;
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  size(): number {
    return this.items.length;
  }
}
