/**
 * Message shapes delivered to the message handler.
 *
 * A message is either a text frame or a binary frame. Anything else the
 * transport hands over is not a message and is discarded.
 */

export interface TextMessage {
  readonly type: 'text';
  readonly data: string;
}

export interface BinaryMessage {
  readonly type: 'binary';
  readonly data: Uint8Array;
}

export type Message = TextMessage | BinaryMessage;

/**
 * Raw payload accepted by `ClientTransport.send`.
 */
export type Payload = string | Uint8Array;

export function textMessage(data: string): TextMessage {
  return Object.freeze({ type: 'text', data });
}

/**
 * The bytes are copied, so later writes to `data` do not leak into the message.
 * The message object is frozen but its Uint8Array is not (typed arrays with
 * elements cannot be frozen); handlers must treat `data` as read-only.
 */
export function binaryMessage(data: ArrayBuffer | ArrayBufferView): BinaryMessage {
  const bytes = ArrayBuffer.isView(data)
    ? new Uint8Array(data.buffer, data.byteOffset, data.byteLength).slice()
    : new Uint8Array(data.slice(0));
  return Object.freeze({ type: 'binary', data: bytes });
}

/**
 * Classify a raw transport payload.
 * Returns null for payload shapes that are neither binary nor text.
 */
export function toMessage(raw: unknown): Message | null {
  if (typeof raw === 'string') return textMessage(raw);
  if (raw instanceof ArrayBuffer || ArrayBuffer.isView(raw)) return binaryMessage(raw);
  return null;
}

export function payloadOf(message: Message): Payload {
  return message.data;
}

export function isTextMessage(message: Message): message is TextMessage {
  return message.type === 'text';
}

export function isBinaryMessage(message: Message): message is BinaryMessage {
  return message.type === 'binary';
}
