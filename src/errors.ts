/**
 * Structured error classes for the client.
 *
 * Only `ConnectError` and `ValidationError` are ever thrown at the caller.
 * Everything that goes wrong after construction is delivered through the
 * error handler slot instead.
 */

/**
 * Error codes used throughout the library.
 */
export const ErrorCode = {
  VALIDATION_FAILED: 'VALIDATION_FAILED',
  CONNECTION_FAILED: 'CONNECTION_FAILED',
  SEND_FAILED: 'SEND_FAILED',
  TRANSPORT_ERROR: 'TRANSPORT_ERROR',
  UNCLEAN_CLOSE: 'UNCLEAN_CLOSE',
} as const;

/**
 * Type representing valid error codes.
 */
export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Base error class with code property.
 */
abstract class BaseError extends Error {
  abstract readonly code: ErrorCodeType;

  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = this.constructor.name;
    Error.captureStackTrace?.(this, this.constructor);
  }

  toJSON() {
    return {
      message: this.message,
      name: this.name,
      code: this.code,
      stack: this.stack,
    };
  }
}

/**
 * Thrown when client options fail schema validation.
 */
export class ValidationError extends BaseError {
  readonly code = 'VALIDATION_FAILED' as const;

  constructor(message: string) {
    super(`Validation failed! ${message}`);
  }
}

/**
 * Thrown when the transport cannot be constructed or subscribed to.
 */
export class ConnectError extends BaseError {
  readonly code = 'CONNECTION_FAILED' as const;

  constructor(message = 'Connection failed', cause?: unknown) {
    super(message, cause);
  }
}

/**
 * A payload could not be handed to the transport.
 */
export class SendError extends BaseError {
  readonly code = 'SEND_FAILED' as const;

  constructor(message = 'Send failed', cause?: unknown) {
    super(message, cause);
  }
}

/**
 * The transport reported an error event.
 */
export class TransportError extends BaseError {
  readonly code = 'TRANSPORT_ERROR' as const;

  constructor(message = 'Transport error', cause?: unknown) {
    super(message, cause);
  }
}

/**
 * The connection ended without a closing handshake.
 */
export class UncleanCloseError extends BaseError {
  readonly code = 'UNCLEAN_CLOSE' as const;
  readonly closeCode: number;
  readonly reason: string;

  constructor(closeCode: number, reason: string) {
    super(`Connection closed uncleanly (code: ${closeCode}${reason ? `, reason: ${reason}` : ''})`);
    this.closeCode = closeCode;
    this.reason = reason;
  }
}

/**
 * Everything the error handler can receive.
 */
export type ClientError = SendError | TransportError | UncleanCloseError;

/**
 * Wrap a raw transport error value, keeping it as `cause`.
 */
export function toTransportError(raw: unknown): TransportError {
  if (raw instanceof TransportError) return raw;
  const message = raw instanceof Error ? raw.message : String(raw);
  return new TransportError(message || 'Transport error', raw);
}

/**
 * Type guard for errors with a code property.
 */
export function hasErrorCode(err: unknown): err is Error & { code: string } {
  return err instanceof Error && 'code' in err && typeof err.code === 'string';
}

/**
 * Extract error code safely, returning undefined if not present.
 */
export function getErrorCode(err: unknown): string | undefined {
  if (hasErrorCode(err)) {
    return err.code;
  }
  return undefined;
}
