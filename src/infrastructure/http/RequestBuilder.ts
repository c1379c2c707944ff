import type { Credentials } from '../../domain/entities/Credentials.js';
import { EncodingError } from '../../domain/errors/ConversationError.js';
import type { HttpMethod, RequestDescriptor } from '../../domain/ports/IHttpTransport.js';
import { serializeRecord, type RecordSchema } from '../codec/RecordCodec.js';

/**
 * Immutable settings shared by every request of a client
 */
export interface ServiceSettings {
  serviceUrl: string;
  /** API version date, sent as the `version` query parameter */
  version: string;
  defaultHeaders?: Readonly<Record<string, string>>;
  credentials?: Credentials;
}

export type QueryValue = string | number | boolean | undefined;

/**
 * Record body, serialized when the request is built
 */
export interface RequestBody {
  readonly schemaName: string;
  serialize(): string;
}

/**
 * Logical description of one API call
 */
export interface ApiOperation {
  method: HttpMethod;
  /** Path template with `{name}` placeholders, e.g. `/v1/workspaces/{workspace_id}` */
  path: string;
  pathParams?: Readonly<Record<string, string>>;
  /** Optional query parameters, in URL order. `undefined` values are left out. */
  query?: Readonly<Record<string, QueryValue>>;
  body?: RequestBody;
}

const PLACEHOLDER = /\{(\w+)\}/g;

export function jsonBody<R extends object>(value: NoInfer<R>, schema: RecordSchema<R>): RequestBody {
  return {
    schemaName: schema.name,
    serialize: () => serializeRecord(value, schema),
  };
}

/**
 * Percent-encode a value so that it stays a single path segment
 */
export function encodePathSegment(name: string, value: string): string {
  if (value.length === 0) {
    throw new EncodingError(name, 'value is empty');
  }
  // Dot segments would be collapsed by URL normalization
  if (value === '.' || value === '..') {
    return value.replace(/\./g, '%2E');
  }
  try {
    return encodeURIComponent(value);
  } catch (error) {
    throw new EncodingError(name, 'value is not well-formed Unicode', { cause: error });
  }
}

export function buildPath(template: string, params: Readonly<Record<string, string>> = {}): string {
  return template.replace(PLACEHOLDER, (_placeholder, name: string) => {
    const value: string | undefined = Object.hasOwn(params, name) ? params[name] : undefined;
    if (value === undefined) {
      throw new EncodingError(name, 'no value supplied');
    }
    return encodePathSegment(name, value);
  });
}

function formatQueryValue(name: string, value: string | number | boolean): string {
  if (typeof value === 'number' && !Number.isSafeInteger(value)) {
    throw new EncodingError(name, `expected an integer, got ${value}`);
  }
  return String(value);
}

/**
 * Query items with `version` first, followed by every supplied parameter
 */
export function buildQuery(
  version: string,
  query: Readonly<Record<string, QueryValue>> = {}
): Array<[string, string]> {
  const items: Array<[string, string]> = [['version', version]];
  for (const [name, value] of Object.entries(query)) {
    if (value !== undefined) {
      items.push([name, formatQueryValue(name, value)]);
    }
  }
  return items;
}

export function authorizationHeader(credentials: Credentials): string {
  switch (credentials.type) {
    case 'basic':
      return `Basic ${Buffer.from(`${credentials.username}:${credentials.password}`).toString('base64')}`;
    case 'bearer':
      return `Bearer ${credentials.token}`;
  }
}

/**
 * Turn an operation into a request descriptor. Throws `EncodingError` or
 * `SerializationError` before anything is sent.
 */
export function buildRequest(operation: ApiOperation, settings: ServiceSettings): RequestDescriptor {
  const path = buildPath(operation.path, operation.pathParams);
  const query = buildQuery(settings.version, operation.query);
  const body = operation.body?.serialize();

  const headers: Record<string, string> = {
    ...settings.defaultHeaders,
    Accept: 'application/json',
  };
  if (body !== undefined) {
    headers['Content-Type'] = 'application/json';
  }
  if (settings.credentials) {
    headers.Authorization = authorizationHeader(settings.credentials);
  }

  const baseUrl = settings.serviceUrl.replace(/\/+$/, '');
  const search = new URLSearchParams(query).toString();

  return {
    method: operation.method,
    url: `${baseUrl}${path}?${search}`,
    path,
    query,
    headers,
    ...(body !== undefined && { body }),
  };
}
