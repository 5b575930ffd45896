/**
 * socket-slot: event-driven WebSocket client with buffered handler slots.
 *
 * ## Public API
 * - `Client`: owns one connection, routes messages and errors to handlers
 * - `HandlerSlot`, `PendingQueue`, `ErrorLatch`: the building blocks, usable
 *   on their own
 * - `WsClientTransport`: the default transport on top of `ws`
 *
 * ## Example
 * ```ts
 * import { Client, textMessage } from 'socket-slot';
 *
 * const client = new Client('ws://127.0.0.1:3000/', textMessage('subscribe'));
 *
 * // Messages received before this point were queued and arrive now, in order.
 * client.setOnMessage((msg) => {
 *   console.log(msg.type === 'text' ? msg.data : `${msg.data.byteLength} bytes`);
 * });
 *
 * // Only the first unhandled error is remembered.
 * client.setOnError((err) => console.error(err.code, err.message));
 * ```
 *
 * @packageDocumentation
 */

export { Client } from './Client.ts';
export { HandlerSlot, PendingQueue, ErrorLatch } from './slots/index.ts';
export {
  ReadyState,
  Subscription,
  SubscriptionGroup,
  WsClientTransport,
  createWsTransport,
} from './transports/index.ts';
export {
  textMessage,
  binaryMessage,
  toMessage,
  payloadOf,
  isTextMessage,
  isBinaryMessage,
} from './message.ts';
export {
  ErrorCode,
  ConnectError,
  SendError,
  TransportError,
  UncleanCloseError,
  ValidationError,
  hasErrorCode,
  getErrorCode,
} from './errors.ts';
export { WsOptionsSchema, validateWsOptions } from './validation.ts';

// Type-only exports
export type { ClientOptions, MessageHandler, ErrorHandler } from './types.ts';
export type { Handler, BufferSink, InstallOutcome } from './slots/index.ts';
export type { Message, TextMessage, BinaryMessage, Payload } from './message.ts';
export type { ClientError, ErrorCodeType } from './errors.ts';
export type { WsOptions } from './validation.ts';
export type {
  ClientTransport,
  CloseInfo,
  ReadyStateValue,
  SubscriptionToken,
  TransportEventKind,
  TransportEventMap,
  TransportFactory,
  TransportListener,
} from './transports/index.ts';
