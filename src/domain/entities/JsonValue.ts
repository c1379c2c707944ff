/**
 * Any value that can appear in a JSON document
 */
export type JsonValue = null | boolean | number | string | JsonValue[] | JsonObject;

/**
 * JSON object with string keys
 */
export interface JsonObject {
  [key: string]: JsonValue;
}

/**
 * Value of a string enumeration that this client does not know about yet.
 * Kept verbatim so it re-encodes to the same string.
 */
export interface Unrecognized {
  readonly unrecognized: string;
}

/**
 * Closed string enumeration with a forward-compatible fallback
 */
export type Enumerated<K extends string> = K | Unrecognized;

export function isUnrecognized<K extends string>(value: Enumerated<K>): value is Unrecognized {
  return typeof value !== 'string';
}

/**
 * Wire string of an enumerated value, known or not
 */
export function enumeratedValue<K extends string>(value: Enumerated<K>): string {
  return typeof value === 'string' ? value : value.unrecognized;
}
