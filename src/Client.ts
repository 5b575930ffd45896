/**
 * Client class - event-driven facade over a single transport connection.
 *
 * Inbound messages and errors are routed into two handler slots. Messages
 * that arrive with no message handler installed are queued (unbounded) and
 * drained in order as soon as one is installed. Errors that arrive with no
 * error handler are latched, first error wins, and delivered on install.
 *
 * Clean closes surface as a final text message carrying the close reason.
 * Unclean closes surface as an `UncleanCloseError` on the error handler.
 */

import createDebug from 'debug';
import {
  ConnectError,
  SendError,
  UncleanCloseError,
  toTransportError,
} from './errors.ts';
import type { ClientError } from './errors.ts';
import { payloadOf, textMessage, toMessage } from './message.ts';
import type { Message, Payload } from './message.ts';
import { ErrorLatch } from './slots/ErrorLatch.ts';
import { HandlerSlot } from './slots/HandlerSlot.ts';
import type { InstallOutcome } from './slots/HandlerSlot.ts';
import { PendingQueue } from './slots/PendingQueue.ts';
import type {
  ClientTransport,
  CloseInfo,
  ReadyStateValue,
  TransportFactory,
} from './transports/ClientTransport.ts';
import { SubscriptionGroup } from './transports/Subscription.ts';
import { createWsTransport } from './transports/WsClientTransport.ts';
import type { ClientOptions, ErrorHandler, MessageHandler } from './types.ts';
import { validateWsOptions } from './validation.ts';
import type { WsOptions } from './validation.ts';

const debug = createDebug('socket-slot:client');

function errorText(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function openTransport(factory: TransportFactory, url: string, options: WsOptions): ClientTransport {
  try {
    return factory(url, options);
  } catch (err) {
    debug('Transport construction failed for %s: %o', url, err);
    throw new ConnectError(`Failed to connect to ${url}: ${errorText(err)}`, err);
  }
}

/**
 * @example
 * ```ts
 * const client = new Client('ws://127.0.0.1:8080/', textMessage('hello'));
 * client.setOnMessage((msg) => {
 *   if (msg.type === 'text') console.log(msg.data);
 * });
 * client.setOnError((err) => console.error(err.code, err.message));
 * ```
 */
export class Client {
  private readonly _url: string;
  private readonly _transport: ClientTransport;
  private readonly _subscriptions: SubscriptionGroup;
  private _closed = false;

  private readonly _onMessage = new HandlerSlot<Message>();
  private readonly _queue = new PendingQueue<Message>();
  private readonly _onError = new HandlerSlot<ClientError>();
  private readonly _latch = new ErrorLatch<ClientError>();

  /**
   * @param url - Address passed to the transport factory
   * @param initMessage - Sent once, when the transport reports open
   * @throws ValidationError if options are malformed
   * @throws ConnectError if the transport cannot be built or subscribed to
   */
  constructor(url: string, initMessage: Message | null = null, options: ClientOptions = {}) {
    const { transport: factory = createWsTransport, ...rest } = options;
    const wsOptions = validateWsOptions(rest);

    this._url = url;
    this._transport = openTransport(factory, url, wsOptions);
    this._subscriptions = new SubscriptionGroup(this._transport);

    try {
      if (initMessage) {
        const init = initMessage;
        const onOpen = this._subscriptions.add('open', () => {
          onOpen.dispose();
          debug('open, sending init message (%s)', init.type);
          this.sendMessage(init);
        });
      }
      this._subscriptions.add('message', (raw) => this._handleRawMessage(raw));
      this._subscriptions.add('error', (raw) => this._reportError(toTransportError(raw)));
      this._subscriptions.add('close', (info) => this._handleClose(info));
    } catch (err) {
      this._abort();
      throw new ConnectError(`Failed to subscribe to ${url}: ${errorText(err)}`, err);
    }

    debug('Client created for %s', url);
  }

  get url(): string {
    return this._url;
  }

  get readyState(): ReadyStateValue {
    return this._transport.readyState;
  }

  get closed(): boolean {
    return this._closed;
  }

  /**
   * Messages waiting for a message handler.
   */
  get pendingMessageCount(): number {
    return this._queue.length;
  }

  /**
   * Whether an error is latched, waiting for an error handler.
   */
  get hasPendingError(): boolean {
    return this._latch.isSet;
  }

  /**
   * Hand a payload to the transport. Failures go to the error handler.
   * After `close`, a `SendError` is latched instead.
   */
  send(payload: Payload): void {
    if (this._closed) {
      this._reportError(new SendError('Client is closed'));
      return;
    }
    try {
      this._transport.send(payload);
    } catch (err) {
      this._reportError(new SendError(`Send failed: ${errorText(err)}`, err));
    }
  }

  sendMessage(message: Message): void {
    this.send(payloadOf(message));
  }

  /**
   * Install (or, with null, remove) the message handler.
   *
   * Queued messages are delivered synchronously, in arrival order, before this
   * returns. Called from inside the current message handler, the swap is
   * deferred until that handler returns.
   */
  setOnMessage(handler: MessageHandler | null): InstallOutcome {
    const outcome = this._onMessage.install(handler);
    if (outcome === 'applied') {
      const delivered = this._queue.drainInto(this._onMessage);
      if (delivered > 0) debug('Delivered %d queued message(s)', delivered);
    } else {
      debug('Message handler swap deferred');
    }
    return outcome;
  }

  /**
   * Install (or, with null, remove) the error handler.
   * A latched error is delivered to it exactly once.
   */
  setOnError(handler: ErrorHandler | null): InstallOutcome {
    const outcome = this._onError.install(handler);
    if (outcome === 'applied') {
      this._latch.drainInto(this._onError);
    } else {
      debug('Error handler swap deferred');
    }
    return outcome;
  }

  /**
   * Release all event subscriptions, detach both handlers and close the
   * transport. Idempotent.
   *
   * Handlers installed before this call receive nothing afterwards. Called from
   * inside a handler, the detach lands when that handler returns, so a drain in
   * progress stops and the remaining messages stay queued.
   */
  close(code?: number, reason?: string): void {
    if (this._closed) return;
    this._closed = true;
    debug('Closing client for %s', this._url);
    this._onMessage.install(null);
    this._onError.install(null);
    try {
      this._subscriptions.dispose();
    } finally {
      this._transport.close(code, reason);
    }
  }

  private _abort(): void {
    this._closed = true;
    try {
      this._subscriptions.dispose();
    } catch (err) {
      debug('Releasing subscriptions after failed construction: %o', err);
    } finally {
      this._transport.close();
    }
  }

  private _handleRawMessage(raw: unknown): void {
    const message = toMessage(raw);
    if (!message) {
      debug('Discarding unrecognized payload (%s)', typeof raw);
      return;
    }
    this._deliverMessage(message);
  }

  private _handleClose(info: CloseInfo): void {
    debug('close code=%d clean=%s reason=%s', info.code, info.wasClean, info.reason);
    if (info.wasClean) {
      this._deliverMessage(textMessage(info.reason));
    } else {
      this._reportError(new UncleanCloseError(info.code, info.reason));
    }
  }

  private _deliverMessage(message: Message): void {
    // Never let a new message overtake queued ones.
    if (this._queue.isEmpty) {
      this._onMessage.invokeOrBuffer(message, this._queue.sink);
    } else {
      this._queue.push(message);
    }
    this._queue.drainInto(this._onMessage);
  }

  private _reportError(error: ClientError): void {
    if (this._latch.isSet) {
      this._latchError(error);
    } else {
      this._onError.invokeOrBuffer(error, (e) => this._latchError(e));
    }
    this._latch.drainInto(this._onError);
  }

  private _latchError(error: ClientError): void {
    if (this._latch.record(error)) {
      debug('Latched %s: %s', error.code, error.message);
    } else {
      debug('Dropped %s while another error is latched: %s', error.code, error.message);
    }
  }
}
