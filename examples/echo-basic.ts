/**
 * Basic Echo Example
 *
 * Starts a local echo server, connects a Client with an init message, and
 * installs the message handler late to show that nothing is lost meanwhile.
 *
 * Run with: node --import tsx examples/echo-basic.ts
 * Set DEBUG=socket-slot:* to see the client's internal log.
 */

import { WebSocketServer } from 'ws';
import { Client, textMessage } from '../src/index.ts';

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

async function main() {
  // 1. Echo server that closes cleanly after the third frame
  const wss = new WebSocketServer({ host: '127.0.0.1', port: 3100 });
  wss.on('connection', (socket) => {
    let count = 0;
    socket.on('message', (data, isBinary) => {
      socket.send(data, { binary: isBinary });
      if (++count === 3) socket.close(1000, 'enough');
    });
  });

  // 2. Client sends "hello" as soon as the connection opens
  const client = new Client('ws://127.0.0.1:3100/', textMessage('hello'));
  client.setOnError((err) => console.error(`[${err.code}] ${err.message}`));

  await delay(100);
  client.send('second');
  client.send(new Uint8Array([0xca, 0xfe]));
  await delay(100);

  // 3. Everything received so far was queued; it is delivered right here
  console.log(`queued before handler: ${client.pendingMessageCount}`);
  client.setOnMessage((msg) => {
    if (msg.type === 'text') {
      console.log(`text: ${msg.data}`);
    } else {
      console.log(`binary: ${Buffer.from(msg.data).toString('hex')}`);
    }
  });

  await delay(100);
  client.close();
  wss.close();
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
