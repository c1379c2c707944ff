import { z } from 'zod/v4';
import { enumeratedValue, type Enumerated, type JsonObject, type JsonValue } from '../../domain/entities/JsonValue.js';
import { DecodeError } from '../../domain/errors/ConversationError.js';
import { isJsonObject } from './jsonValue.js';

/**
 * Bidirectional mapping between a wire value and its in-memory form.
 *
 * Declared with method syntax so that a `FieldType<string>` can stand in
 * for a `FieldType<unknown>` inside a record schema.
 */
export interface FieldType<T> {
  readonly kind: string;
  decode(raw: JsonValue, path: string): T;
  encode(value: T, path: string): JsonValue;
}

function scalar<T extends JsonValue>(kind: string, schema: z.ZodType<T>): FieldType<T> {
  return {
    kind,
    decode(raw, path) {
      const result = schema.safeParse(raw);
      if (!result.success) {
        throw new DecodeError('missing_or_wrong_type', path, `expected ${kind}`);
      }
      return result.data;
    },
    encode(value) {
      return value;
    },
  };
}

export const string = (): FieldType<string> => scalar('string', z.string());

export const number = (): FieldType<number> => scalar('number', z.number());

/**
 * Integer within the IEEE-754 safe range (|n| <= 2^53 - 1). Larger wire
 * integers are rejected rather than rounded.
 */
export const integer = (): FieldType<number> =>
  scalar(
    'integer',
    z.number().refine((value) => Number.isSafeInteger(value))
  );

export const boolean = (): FieldType<boolean> => scalar('boolean', z.boolean());

/**
 * Free-form JSON object (output, context, metadata, ...), kept verbatim
 */
export const jsonObject = (): FieldType<JsonObject> => ({
  kind: 'object',
  decode(raw, path) {
    if (!isJsonObject(raw)) {
      throw new DecodeError('missing_or_wrong_type', path, 'expected object');
    }
    return raw;
  },
  encode(value) {
    return value;
  },
});

export function array<T>(item: FieldType<T>): FieldType<T[]> {
  return {
    kind: `array of ${item.kind}`,
    decode(raw, path) {
      if (!Array.isArray(raw)) {
        throw new DecodeError('missing_or_wrong_type', path, `expected array of ${item.kind}`);
      }
      return raw.map((element, index) => item.decode(element, `${path}[${index}]`));
    },
    encode(value, path) {
      return value.map((element, index) => item.encode(element, `${path}[${index}]`));
    },
  };
}

/**
 * String enumeration. Values outside `known` decode to `{ unrecognized }`
 * instead of failing.
 */
export function enumeration<K extends string>(known: readonly K[]): FieldType<Enumerated<K>> {
  const members = new Set<string>(known);
  const isKnown = (value: string): value is K => members.has(value);

  return {
    kind: 'enumeration',
    decode(raw, path) {
      if (typeof raw !== 'string') {
        throw new DecodeError('missing_or_wrong_type', path, 'expected string');
      }
      return isKnown(raw) ? raw : { unrecognized: raw };
    },
    encode(value) {
      return enumeratedValue(value);
    },
  };
}
