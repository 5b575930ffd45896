/**
 * Test utilities: an in-process transport and polling helpers.
 */

import { ReadyState } from '../src/transports/ClientTransport.ts';
import type {
  ClientTransport,
  CloseInfo,
  ReadyStateValue,
  SubscriptionToken,
  TransportEventKind,
  TransportEventMap,
  TransportListener,
} from '../src/transports/ClientTransport.ts';
import type { Payload } from '../src/message.ts';
import type { WsOptions } from '../src/validation.ts';

type ListenerTable = { [K in TransportEventKind]: Map<number, TransportListener<K>> };

/**
 * Transport stand-in driven by the test.
 *
 * `emit*` methods deliver events synchronously to current subscribers.
 * Set `sendError` to make `send` throw; set `failSubscribeOn` to make
 * `subscribe` throw for that event kind.
 */
export class FakeTransport implements ClientTransport {
  readonly url: string;
  readonly options: WsOptions;
  readyState: ReadyStateValue = ReadyState.CONNECTING;
  readonly sent: Payload[] = [];
  sendError: Error | null = null;
  failSubscribeOn: TransportEventKind | null = null;
  closeCalls: Array<{ code?: number; reason?: string }> = [];
  unsubscribeCalls = 0;

  private _nextId = 1;
  private readonly _listeners: ListenerTable = {
    open: new Map(),
    message: new Map(),
    error: new Map(),
    close: new Map(),
  };

  constructor(url = 'ws://fake.test/', options: WsOptions = {}) {
    this.url = url;
    this.options = options;
  }

  send(payload: Payload): void {
    if (this.sendError) throw this.sendError;
    this.sent.push(payload);
  }

  close(code?: number, reason?: string): void {
    this.closeCalls.push({ code, reason });
    this.readyState = ReadyState.CLOSED;
  }

  subscribe<K extends TransportEventKind>(kind: K, listener: TransportListener<K>): SubscriptionToken {
    if (this.failSubscribeOn === kind) {
      throw new Error(`subscribe(${kind}) refused`);
    }
    const id = this._nextId++;
    this._listeners[kind].set(id, listener);
    return { kind, id };
  }

  unsubscribe(token: SubscriptionToken): void {
    this.unsubscribeCalls++;
    this._listeners[token.kind].delete(token.id);
  }

  listenerCount(kind: TransportEventKind): number {
    return this._listeners[kind].size;
  }

  get totalListeners(): number {
    return (
      this._listeners.open.size +
      this._listeners.message.size +
      this._listeners.error.size +
      this._listeners.close.size
    );
  }

  emitOpen(): void {
    this.readyState = ReadyState.OPEN;
    this._emit('open', undefined);
  }

  emitMessage(data: unknown): void {
    this._emit('message', data);
  }

  emitError(error: unknown): void {
    this._emit('error', error);
  }

  emitClose(info: CloseInfo): void {
    this.readyState = ReadyState.CLOSED;
    this._emit('close', info);
  }

  private _emit<K extends TransportEventKind>(kind: K, event: TransportEventMap[K]): void {
    for (const listener of [...this._listeners[kind].values()]) {
      listener(event);
    }
  }
}

/**
 * Factory that records the transport it builds, for `ClientOptions.transport`.
 */
export function fakeFactory(): { factory: (url: string, options: WsOptions) => FakeTransport; last: () => FakeTransport } {
  let built: FakeTransport | null = null;
  return {
    factory: (url, options) => {
      built = new FakeTransport(url, options);
      return built;
    },
    last: () => {
      if (!built) throw new Error('No transport built yet');
      return built;
    },
  };
}

/**
 * Promise-based delay.
 */
export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Wait until a condition becomes true, with polling and timeout.
 */
export async function waitUntil(
  condition: () => boolean,
  timeout = 5000,
  pollInterval = 10
): Promise<void> {
  const start = Date.now();
  while (!condition()) {
    if (Date.now() - start > timeout) {
      throw new Error(`Timeout waiting for condition after ${timeout}ms`);
    }
    await delay(pollInterval);
  }
}
