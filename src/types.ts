/**
 * Core type definitions for the client.
 */

import type { ClientError } from './errors.ts';
import type { Message } from './message.ts';
import type { Handler } from './slots/HandlerSlot.ts';
import type { TransportFactory } from './transports/ClientTransport.ts';
import type { WsOptions } from './validation.ts';

export type MessageHandler = Handler<Message>;

export type ErrorHandler = Handler<ClientError>;

/**
 * Client configuration.
 *
 * `protocols`, `handshakeTimeout`, `maxPayload` and `headers` are validated
 * and passed to the transport factory as-is.
 */
export type ClientOptions = WsOptions & {
  /**
   * Builds the underlying connection. Defaults to `WsClientTransport`.
   */
  transport?: TransportFactory;
};
