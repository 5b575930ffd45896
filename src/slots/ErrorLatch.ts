/**
 * Remembers at most one error until a handler consumes it.
 *
 * First error wins: while a value is latched, later errors are dropped. Only
 * the first unhandled problem is kept; install an error handler before a
 * second one arrives if every error matters.
 */

import type { HandlerSlot } from './HandlerSlot.ts';

export class ErrorLatch<E> {
  private _value: { error: E } | null = null;
  private _dropped = 0;

  get isSet(): boolean {
    return this._value !== null;
  }

  /**
   * Errors discarded because the latch was already holding one.
   */
  get droppedCount(): number {
    return this._dropped;
  }

  /**
   * Store `error` if the latch is empty. Returns false if it was dropped.
   */
  record(error: E): boolean {
    if (this._value !== null) {
      this._dropped++;
      return false;
    }
    this._value = { error };
    return true;
  }

  take(): { error: E } | null {
    const value = this._value;
    this._value = null;
    return value;
  }

  /**
   * Bound sink for `HandlerSlot.invokeOrBuffer`.
   */
  readonly sink = (error: E): void => {
    this.record(error);
  };

  /**
   * Hand the latched error to `slot` if it is ready. Re-checks afterwards,
   * since the handler may itself cause a new error to be latched.
   */
  drainInto(slot: HandlerSlot<E>): number {
    let delivered = 0;
    while (slot.ready) {
      const latched = this.take();
      if (!latched) break;
      slot.invoke(latched.error);
      delivered++;
    }
    return delivered;
  }
}
