import { DecodeError, ServiceError } from '../../domain/errors/ConversationError.js';
import type { HttpResponse } from '../../domain/ports/IHttpTransport.js';
import type { JsonValue } from '../../domain/entities/JsonValue.js';
import type { RecordSchema } from '../codec/RecordCodec.js';
import { isJsonObject, parseJson } from '../codec/jsonValue.js';

/**
 * Outcome of one call: a decoded record, a success without payload, or a
 * service error
 */
export type ResponseOutcome<T> =
  | { kind: 'success'; value: T }
  | { kind: 'empty' }
  | { kind: 'error'; error: ServiceError };

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

function tryParseJson(text: string): JsonValue | undefined {
  try {
    return parseJson(text);
  } catch {
    return undefined;
  }
}

/**
 * Message of an error body, taken from its `error` string.
 * Returns null when the body is empty, not a JSON object, or has none.
 */
export function extractErrorMessage(body: string): string | null {
  if (body.trim().length === 0) {
    return null;
  }
  const parsed = tryParseJson(body);
  if (!isJsonObject(parsed)) {
    return null;
  }
  const { error } = parsed;
  return typeof error === 'string' ? error : null;
}

/**
 * Classify a response. Without a schema any 2xx is an empty success.
 * Throws `DecodeError` when a 2xx body does not match the schema.
 */
export function dispatchResponse<T extends object>(
  response: HttpResponse,
  schema?: RecordSchema<T>
): ResponseOutcome<T> {
  if (!isSuccessStatus(response.status)) {
    return {
      kind: 'error',
      error: new ServiceError(response.status, extractErrorMessage(response.body)),
    };
  }

  if (!schema || response.body.trim().length === 0) {
    return { kind: 'empty' };
  }

  let payload: JsonValue;
  try {
    payload = parseJson(response.body);
  } catch {
    throw new DecodeError('missing_or_wrong_type', '$', 'response body is not valid JSON');
  }

  return { kind: 'success', value: schema.decode(payload) };
}
