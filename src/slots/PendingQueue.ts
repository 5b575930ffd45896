/**
 * FIFO buffer for values that arrived while their handler slot was empty.
 *
 * The queue is unbounded and never evicts. A client that never installs a
 * message handler keeps every message it receives.
 */

import type { HandlerSlot } from './HandlerSlot.ts';

interface Entry<T> {
  value: T;
  next: Entry<T> | null;
}

export class PendingQueue<T> {
  private _head: Entry<T> | null = null;
  private _tail: Entry<T> | null = null;
  private _length = 0;

  get length(): number {
    return this._length;
  }

  get isEmpty(): boolean {
    return this._length === 0;
  }

  push(value: T): void {
    const entry: Entry<T> = { value, next: null };
    if (this._tail) {
      this._tail.next = entry;
    } else {
      this._head = entry;
    }
    this._tail = entry;
    this._length++;
  }

  /**
   * Remove and return the front entry, or null when empty.
   * Boxed so that queued `undefined` values stay distinguishable.
   */
  shift(): { value: T } | null {
    const entry = this._head;
    if (!entry) return null;
    this._head = entry.next;
    if (!this._head) this._tail = null;
    this._length--;
    return { value: entry.value };
  }

  /**
   * Bound sink for `HandlerSlot.invokeOrBuffer`.
   */
  readonly sink = (value: T): void => {
    this.push(value);
  };

  /**
   * Pop values into `slot` while it is ready and the queue is non-empty.
   *
   * A handler that replaces itself mid-drain takes effect for the next value.
   * If it empties the slot, the rest stay queued in their original order.
   * Returns the number of values delivered.
   */
  drainInto(slot: HandlerSlot<T>): number {
    let delivered = 0;
    while (slot.ready) {
      const entry = this.shift();
      if (!entry) break;
      slot.invoke(entry.value);
      delivered++;
    }
    return delivered;
  }

  toArray(): T[] {
    const values: T[] = [];
    for (let entry = this._head; entry; entry = entry.next) {
      values.push(entry.value);
    }
    return values;
  }
}
