/**
 * WsClientTransport integration tests against an in-process ws server.
 */

import { describe, it, before, after } from 'node:test';
import assert from 'node:assert';
import { once } from 'node:events';
import { WebSocketServer } from 'ws';
import { Client } from '../src/Client.ts';
import { ConnectError, SendError, UncleanCloseError } from '../src/errors.ts';
import type { ClientError } from '../src/errors.ts';
import { textMessage } from '../src/message.ts';
import type { Message } from '../src/message.ts';
import { ReadyState } from '../src/transports/ClientTransport.ts';
import { WsClientTransport } from '../src/transports/WsClientTransport.ts';
import { waitUntil } from './helpers.ts';

describe('WsClientTransport', () => {
  let wss: WebSocketServer;
  let url: string;
  const received: string[] = [];
  const clients: Client[] = [];

  before(async () => {
    wss = new WebSocketServer({ host: '127.0.0.1', port: 0 });
    await once(wss, 'listening');
    const address = wss.address();
    if (address === null || typeof address === 'string') throw new Error(`Unexpected address ${address}`);
    url = `ws://127.0.0.1:${address.port}/`;

    wss.on('connection', (socket) => {
      socket.on('message', (data, isBinary) => {
        if (isBinary) return;
        const text = `text:${String(data)}`;
        received.push(text);

        if (text === 'text:greet') {
          socket.send(new Uint8Array([1, 2, 3]));
          socket.send('hi');
        } else if (text === 'text:bye please') {
          socket.close(1000, 'bye');
        } else if (text === 'text:drop') {
          socket.terminate();
        }
      });
    });
  });

  after(async () => {
    for (const client of clients) client.close();
    for (const socket of wss.clients) socket.terminate();
    await new Promise<void>((resolve) => wss.close(() => resolve()));
  });

  function connect(initMessage: Message | null): Client {
    const client = new Client(url, initMessage);
    clients.push(client);
    return client;
  }

  it('should send the init message and queue replies until a handler is installed', async () => {
    const client = connect(textMessage('greet'));

    await waitUntil(() => client.pendingMessageCount === 2, 3000);
    assert.ok(received.includes('text:greet'));

    const messages: string[] = [];
    client.setOnMessage((m) => {
      messages.push(m.type === 'text' ? `text:${m.data}` : `binary:${Array.from(m.data).join(',')}`);
    });

    assert.deepStrictEqual(messages, ['binary:1,2,3', 'text:hi']);
    assert.strictEqual(client.readyState, ReadyState.OPEN);
  });

  it('should deliver a clean close reason as a text message', async () => {
    const client = connect(textMessage('bye please'));
    const messages: string[] = [];
    const errors: ClientError[] = [];
    client.setOnMessage((m) => messages.push(m.type === 'text' ? m.data : 'binary'));
    client.setOnError((e) => errors.push(e));

    await waitUntil(() => messages.length === 1, 3000);

    assert.deepStrictEqual(messages, ['bye']);
    assert.deepStrictEqual(errors, []);
    assert.strictEqual(client.readyState, ReadyState.CLOSED);
  });

  it('should report an abrupt disconnect as an unclean close', async () => {
    const client = connect(textMessage('drop'));
    const messages: string[] = [];
    const errors: ClientError[] = [];
    client.setOnMessage((m) => messages.push(m.type));
    client.setOnError((e) => errors.push(e));

    // The socket may also surface a reset as a transport error first.
    await waitUntil(() => errors.some((e) => e instanceof UncleanCloseError), 3000);

    const err = errors.find((e) => e instanceof UncleanCloseError);
    assert.ok(err instanceof UncleanCloseError);
    assert.strictEqual(err.closeCode, 1006);
    assert.deepStrictEqual(messages, []);
  });

  it('should route a send before open to the error handler', () => {
    const client = connect(null);
    const errors: ClientError[] = [];
    client.setOnError((e) => errors.push(e));

    client.send('too early');

    const [err] = errors;
    assert.ok(err instanceof SendError);
    assert.strictEqual(err.message, 'Send failed: WebSocket is not open: readyState 0');
  });

  it('should fail construction for a malformed URL', () => {
    assert.throws(() => new Client('not a url'), ConnectError);
  });

  it('should tolerate unsubscribe and close after the socket closed', async () => {
    const transport = new WsClientTransport(url);
    let opened = false;
    const token = transport.subscribe('open', () => {
      opened = true;
    });

    await waitUntil(() => opened, 3000);
    transport.close(1000, 'done');
    await waitUntil(() => transport.readyState === ReadyState.CLOSED, 3000);

    transport.unsubscribe(token);
    transport.unsubscribe(token);
    transport.close();
    assert.strictEqual(transport.readyState, ReadyState.CLOSED);
  });
});
