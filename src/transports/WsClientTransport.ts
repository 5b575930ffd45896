/**
 * Client transport using the `ws` package.
 *
 * Opens the socket immediately on construction. Binary frames are delivered
 * as ArrayBuffer, text frames as string. There is no reconnect: once the
 * socket closes, the transport is done.
 */

import { WebSocket } from 'ws';
import createDebug from 'debug';
import type { Payload } from '../message.ts';
import type { WsOptions } from '../validation.ts';
import { ReadyState } from './ClientTransport.ts';
import type {
  ClientTransport,
  CloseInfo,
  ReadyStateValue,
  SubscriptionToken,
  TransportEventKind,
  TransportEventMap,
  TransportListener,
} from './ClientTransport.ts';

const debug = createDebug('socket-slot:ws-client-transport');

type ListenerTable = { [K in TransportEventKind]: Map<number, TransportListener<K>> };

function toReadyState(value: number): ReadyStateValue {
  switch (value) {
    case ReadyState.CONNECTING:
      return ReadyState.CONNECTING;
    case ReadyState.OPEN:
      return ReadyState.OPEN;
    case ReadyState.CLOSING:
      return ReadyState.CLOSING;
    default:
      return ReadyState.CLOSED;
  }
}

export class WsClientTransport implements ClientTransport {
  private readonly _url: string;
  private readonly _ws: WebSocket;
  private _nextId = 1;
  private readonly _listeners: ListenerTable = {
    open: new Map(),
    message: new Map(),
    error: new Map(),
    close: new Map(),
  };

  /**
   * @throws SyntaxError when `url` is not a valid ws:// or wss:// URL
   */
  constructor(url: string, options: WsOptions = {}) {
    this._url = url;
    const { protocols, ...rest } = options;
    this._ws = new WebSocket(url, protocols, rest);
    this._ws.binaryType = 'arraybuffer';
    debug('Connecting to %s', url);

    this._ws.addEventListener('open', () => {
      debug('Connected to %s', url);
      this._emit('open', undefined);
    });

    this._ws.addEventListener('message', (event) => {
      this._emit('message', event.data);
    });

    // Keeps ws from treating socket errors as unhandled, subscribers or not.
    this._ws.addEventListener('error', (event) => {
      debug('WebSocket error on %s: %s', url, event.message);
      this._emit('error', event.error ?? new Error(event.message));
    });

    this._ws.addEventListener('close', (event) => {
      debug('Disconnected from %s (code: %d, clean: %s)', url, event.code, event.wasClean);
      const info: CloseInfo = { code: event.code, reason: event.reason, wasClean: event.wasClean };
      this._emit('close', info);
    });
  }

  get url(): string {
    return this._url;
  }

  get readyState(): ReadyStateValue {
    return toReadyState(this._ws.readyState);
  }

  send(payload: Payload): void {
    if (this._ws.readyState !== WebSocket.OPEN) {
      throw new Error(`WebSocket is not open: readyState ${this._ws.readyState}`);
    }
    this._ws.send(payload);
  }

  close(code?: number, reason?: string): void {
    if (this._ws.readyState === WebSocket.CLOSED) return;
    this._ws.close(code, reason);
  }

  subscribe<K extends TransportEventKind>(kind: K, listener: TransportListener<K>): SubscriptionToken {
    const id = this._nextId++;
    this._listeners[kind].set(id, listener);
    return { kind, id };
  }

  unsubscribe(token: SubscriptionToken): void {
    this._listeners[token.kind].delete(token.id);
  }

  private _emit<K extends TransportEventKind>(kind: K, event: TransportEventMap[K]): void {
    // Snapshot so listeners may unsubscribe while being called.
    for (const listener of [...this._listeners[kind].values()]) {
      listener(event);
    }
  }
}

/**
 * Default `TransportFactory`.
 */
export function createWsTransport(url: string, options: WsOptions): ClientTransport {
  return new WsClientTransport(url, options);
}
