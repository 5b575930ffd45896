/**
 * Single-handler slot that tolerates being reassigned from inside its own
 * handler.
 *
 * While the installed handler runs, the slot is marked active. An `install`
 * issued during that window does not touch the running handler; it is parked
 * as a pending swap and lands the moment the invocation returns (or throws).
 * Values routed into an active slot go to the caller's fallback sink instead
 * of re-entering the handler.
 */

export type Handler<T> = (value: T) => void;

/**
 * Where a value goes when the slot cannot take it right now.
 */
export type BufferSink<T> = (value: T) => void;

/**
 * - `applied`: the new handler is current; the caller should drain its buffer.
 * - `deferred`: recorded as a pending swap; the caller must not drain.
 */
export type InstallOutcome = 'applied' | 'deferred';

interface PendingSwap<T> {
  handler: Handler<T> | null;
}

export class HandlerSlot<T> {
  private _current: Handler<T> | null = null;
  private _active = false;
  private _pendingSwap: PendingSwap<T> | null = null;

  /**
   * Whether a handler is installed. Ignores any pending swap.
   */
  get installed(): boolean {
    return this._current !== null;
  }

  /**
   * Whether the installed handler is currently running.
   */
  get active(): boolean {
    return this._active;
  }

  /**
   * A handler is installed and not running, so `invoke` may be called.
   */
  get ready(): boolean {
    return this._current !== null && !this._active;
  }

  get hasPendingSwap(): boolean {
    return this._pendingSwap !== null;
  }

  /**
   * Call the handler with `value`, or hand `value` to `fallback` when no
   * handler can take it (none installed, or the handler is mid-invocation).
   */
  invokeOrBuffer(value: T, fallback: BufferSink<T>): void {
    if (!this.invoke(value)) {
      fallback(value);
    }
  }

  /**
   * Call the handler with `value` if the slot is ready.
   * Returns false, without side effects, otherwise.
   */
  invoke(value: T): boolean {
    const handler = this._current;
    if (handler === null || this._active) return false;

    this._active = true;
    try {
      handler(value);
    } finally {
      this._active = false;
      const swap = this._pendingSwap;
      if (swap !== null) {
        this._pendingSwap = null;
        this._current = swap.handler;
      }
    }
    return true;
  }

  /**
   * Replace the handler. Passing null empties the slot.
   * Several installs during one invocation collapse to the last one.
   */
  install(handler: Handler<T> | null): InstallOutcome {
    if (this._active) {
      this._pendingSwap = { handler };
      return 'deferred';
    }
    this._current = handler;
    this._pendingSwap = null;
    return 'applied';
  }
}
