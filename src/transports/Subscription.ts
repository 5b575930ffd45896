/**
 * Scoped transport subscriptions.
 *
 * A `Subscription` holds one token and releases it exactly once. A
 * `SubscriptionGroup` owns several and releases them together, which is how
 * a half-built client unwinds when a later subscribe fails.
 */

import type {
  ClientTransport,
  SubscriptionToken,
  TransportEventKind,
  TransportListener,
} from './ClientTransport.ts';

export class Subscription {
  private _transport: ClientTransport;
  private _token: SubscriptionToken | null;

  constructor(transport: ClientTransport, token: SubscriptionToken) {
    this._transport = transport;
    this._token = token;
  }

  get kind(): TransportEventKind | null {
    return this._token?.kind ?? null;
  }

  get disposed(): boolean {
    return this._token === null;
  }

  dispose(): void {
    const token = this._token;
    if (token === null) return;
    this._token = null;
    this._transport.unsubscribe(token);
  }
}

export class SubscriptionGroup {
  private _transport: ClientTransport;
  private _subscriptions: Subscription[] = [];
  private _disposed = false;

  constructor(transport: ClientTransport) {
    this._transport = transport;
  }

  get size(): number {
    return this._subscriptions.filter((s) => !s.disposed).length;
  }

  get disposed(): boolean {
    return this._disposed;
  }

  /**
   * Subscribe and take ownership of the resulting subscription.
   * If the transport throws, nothing is recorded and the error propagates.
   */
  add<K extends TransportEventKind>(kind: K, listener: TransportListener<K>): Subscription {
    if (this._disposed) {
      throw new Error('SubscriptionGroup already disposed');
    }
    const token = this._transport.subscribe(kind, listener);
    const subscription = new Subscription(this._transport, token);
    this._subscriptions.push(subscription);
    return subscription;
  }

  /**
   * Release every subscription in reverse order. Runs once.
   * A throwing unsubscribe does not stop the others; the first error is rethrown.
   */
  dispose(): void {
    if (this._disposed) return;
    this._disposed = true;

    let firstError: { error: unknown } | null = null;
    const subscriptions = this._subscriptions.splice(0).reverse();
    for (const subscription of subscriptions) {
      try {
        subscription.dispose();
      } catch (error) {
        firstError ??= { error };
      }
    }
    if (firstError) throw firstError.error;
  }
}
