/**
 * Validation of client options using TypeBox.
 */

import { Type } from 'typebox';
import type { Static } from 'typebox';
import { Compile } from 'typebox/compile';
import { ValidationError } from './errors.ts';

/**
 * Options forwarded to the WebSocket transport.
 */
export const WsOptionsSchema = Type.Object({
  protocols: Type.Optional(Type.Union([Type.String(), Type.Array(Type.String())])),
  handshakeTimeout: Type.Optional(Type.Integer({ minimum: 0 })),
  maxPayload: Type.Optional(Type.Integer({ minimum: 1 })),
  headers: Type.Optional(Type.Record(Type.String(), Type.String())),
});

export type WsOptions = Static<typeof WsOptionsSchema>;

const wsOptionsValidator = Compile(WsOptionsSchema);

/**
 * TypeBox localized validation error type.
 */
interface LocalizedValidationError {
  keyword: string;
  schemaPath: string;
  instancePath: string;
  params: object;
  message: string;
}

/**
 * Format validation errors for display.
 */
function formatErrors(errors: LocalizedValidationError[]): string {
  if (errors.length === 0) {
    return 'Unknown validation error';
  }
  return errors.map((e) => `${e.instancePath || '/'}: ${e.message}`).join('; ');
}

/**
 * Check transport options, throwing ValidationError on mismatch.
 */
export function validateWsOptions(value: unknown): WsOptions {
  if (!wsOptionsValidator.Check(value)) {
    throw new ValidationError(formatErrors(wsOptionsValidator.Errors(value)));
  }
  return value;
}
