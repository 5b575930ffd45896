/**
 * Generic client-side transport interface.
 *
 * The transport owns one full-duplex connection and reports four kinds of
 * events. Listeners are registered per kind and identified by a token.
 */

import type { Payload } from '../message.ts';
import type { WsOptions } from '../validation.ts';

/**
 * Mirrors the WebSocket readyState constants.
 */
export const ReadyState = {
  CONNECTING: 0,
  OPEN: 1,
  CLOSING: 2,
  CLOSED: 3,
} as const;

export type ReadyStateValue = (typeof ReadyState)[keyof typeof ReadyState];

export interface CloseInfo {
  code: number;
  reason: string;
  /** The closing handshake completed on both sides. */
  wasClean: boolean;
}

/**
 * Event payloads by kind. `message` carries the raw frame data, `error` the
 * raw error value; neither is interpreted by the transport.
 */
export interface TransportEventMap {
  open: undefined;
  message: unknown;
  error: unknown;
  close: CloseInfo;
}

export type TransportEventKind = keyof TransportEventMap;

export type TransportListener<K extends TransportEventKind> = (event: TransportEventMap[K]) => void;

export interface SubscriptionToken {
  readonly kind: TransportEventKind;
  readonly id: number;
}

export interface ClientTransport {
  readonly readyState: ReadyStateValue;

  /**
   * Transmit a payload. Throws if it cannot be handed to the connection.
   */
  send(payload: Payload): void;

  /**
   * Start the closing handshake (or abort a pending connect).
   */
  close(code?: number, reason?: string): void;

  subscribe<K extends TransportEventKind>(kind: K, listener: TransportListener<K>): SubscriptionToken;

  /**
   * Unknown or already released tokens are ignored, including after `close`.
   */
  unsubscribe(token: SubscriptionToken): void;
}

/**
 * Builds a transport for a URL. Throws if the URL is unusable.
 */
export type TransportFactory = (url: string, options: WsOptions) => ClientTransport;
