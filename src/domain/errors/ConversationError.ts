/**
 * Base class of every error raised by the client
 */
export class ConversationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConversationError';
  }
}

export type DecodeErrorReason = 'missing_required_field' | 'missing_or_wrong_type';

/**
 * JSON payload does not match the expected record schema
 */
export class DecodeError extends ConversationError {
  readonly reason: DecodeErrorReason;
  /** Location of the offending value, e.g. `$.intents[0].confidence` */
  readonly path: string;

  constructor(reason: DecodeErrorReason, path: string, detail?: string) {
    const prefix =
      reason === 'missing_required_field'
        ? `Missing required field at ${path}`
        : `Missing or wrong type at ${path}`;
    super(detail ? `${prefix}: ${detail}` : prefix);
    this.name = 'DecodeError';
    this.reason = reason;
    this.path = path;
  }
}

export type EncodeErrorReason = 'duplicate_key';

/**
 * Record cannot be mapped back to a JSON object
 */
export class EncodeError extends ConversationError {
  readonly reason: EncodeErrorReason;
  readonly key: string;

  constructor(reason: EncodeErrorReason, key: string) {
    super(`Additional property "${key}" collides with a known field`);
    this.name = 'EncodeError';
    this.reason = reason;
    this.key = key;
  }
}

/**
 * Path or query parameter cannot be encoded into the request URL
 */
export class EncodingError extends ConversationError {
  readonly parameter: string;

  constructor(parameter: string, detail: string, options?: { cause?: unknown }) {
    super(`Cannot encode parameter "${parameter}": ${detail}`, options);
    this.name = 'EncodingError';
    this.parameter = parameter;
  }
}

/**
 * Request body cannot be serialized to JSON
 */
export class SerializationError extends ConversationError {
  constructor(detail: string, options?: { cause?: unknown }) {
    super(`Cannot serialize request body: ${detail}`, options);
    this.name = 'SerializationError';
  }
}

/**
 * Request never produced an HTTP response (connection refused, timeout, ...)
 */
export class TransportError extends ConversationError {
  readonly code: string | null;

  constructor(message: string, code?: string | null, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
    this.code = code ?? null;
  }
}

/**
 * Service answered with a non-2xx status
 */
export class ServiceError extends ConversationError {
  readonly statusCode: number;
  /** Message extracted from the error body, if any */
  readonly serviceMessage: string | null;

  constructor(statusCode: number, serviceMessage?: string | null) {
    super(serviceMessage ?? `Request failed with status ${statusCode}`);
    this.name = 'ServiceError';
    this.statusCode = statusCode;
    this.serviceMessage = serviceMessage ?? null;
  }
}
