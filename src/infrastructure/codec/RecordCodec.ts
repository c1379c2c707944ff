import type { JsonObject, JsonValue } from '../../domain/entities/JsonValue.js';
import { DecodeError, EncodeError, SerializationError } from '../../domain/errors/ConversationError.js';
import type { FieldType } from './fields.js';
import { isJsonObject } from './jsonValue.js';

/**
 * Known field of a record: wire key, value type and whether it must be present
 */
export class Field<T, Required extends boolean = boolean> {
  constructor(
    readonly wireKey: string,
    readonly type: FieldType<T>,
    readonly required: Required
  ) {}
}

export function required<T>(wireKey: string, type: FieldType<T>): Field<T, true> {
  return new Field(wireKey, type, true);
}

export function optional<T>(wireKey: string, type: FieldType<T>): Field<T, false> {
  return new Field(wireKey, type, false);
}

type KnownKey<R> = Exclude<keyof R, 'additionalProperties'>;

type OptionalKey<R> = {
  [K in keyof R]-?: {} extends Pick<R, K> ? K : never;
}[keyof R];

/**
 * One field declaration per known property of `R`. Optional properties
 * must be declared with `optional()`, the others with `required()`.
 */
export type FieldMap<R> = {
  readonly [K in KnownKey<R>]-?: K extends OptionalKey<R>
    ? Field<Exclude<R[K], undefined>, false>
    : Field<R[K], true>;
};

interface FieldEntry {
  property: string;
  field: Field<unknown>;
}

/**
 * Schema of a record: its known fields in declaration order and whether
 * unknown wire keys are kept in `additionalProperties`.
 */
export class RecordSchema<R extends object> {
  private readonly entries: FieldEntry[] = [];
  private readonly wireKeys = new Set<string>();

  constructor(
    readonly name: string,
    fields: FieldMap<R>,
    readonly open: boolean
  ) {
    const declared: Array<[string, unknown]> = Object.entries(fields);
    for (const [property, field] of declared) {
      if (!(field instanceof Field)) {
        continue;
      }
      if (this.wireKeys.has(field.wireKey)) {
        throw new Error(`${name} declares wire key "${field.wireKey}" twice`);
      }
      this.wireKeys.add(field.wireKey);
      this.entries.push({ property, field });
    }
  }

  decode(raw: JsonValue, path = '$'): R {
    if (raw === null || typeof raw !== 'object' || Array.isArray(raw)) {
      throw new DecodeError('missing_or_wrong_type', path, `expected ${this.name} object`);
    }

    const decoded: Record<string, unknown> = {};

    for (const { property, field } of this.entries) {
      const fieldPath = `${path}.${field.wireKey}`;
      const value = Object.hasOwn(raw, field.wireKey) ? raw[field.wireKey] : undefined;

      // null and absent are the same thing on the wire
      if (value === undefined || value === null) {
        if (field.required) {
          throw new DecodeError('missing_required_field', fieldPath);
        }
        continue;
      }

      decoded[property] = field.type.decode(value, fieldPath);
    }

    if (this.open) {
      const extra = Object.entries(raw).filter(([key]) => !this.wireKeys.has(key));
      if (extra.length > 0) {
        decoded.additionalProperties = Object.fromEntries(extra);
      }
    }

    // Every property above went through its declared field type
    return decoded as R;
  }

  encode(record: R, path = '$'): JsonObject {
    const values = new Map<string, unknown>(Object.entries(record));
    const encoded: Array<[string, JsonValue]> = [];

    for (const { property, field } of this.entries) {
      const value = values.get(property);
      if (value === undefined) {
        continue;
      }
      encoded.push([field.wireKey, field.type.encode(value, `${path}.${field.wireKey}`)]);
    }

    const extra = this.open ? values.get('additionalProperties') : undefined;
    if (extra !== undefined) {
      if (!isJsonObject(extra)) {
        throw new SerializationError(`additionalProperties of ${this.name} at ${path} is not a JSON object`);
      }
      for (const [key, value] of Object.entries(extra)) {
        if (this.wireKeys.has(key)) {
          throw new EncodeError('duplicate_key', key);
        }
        encoded.push([key, value]);
      }
    }

    return Object.fromEntries(encoded);
  }
}

/**
 * Record whose unknown wire keys are dropped on decode
 */
export function defineRecord<R extends object>(name: string, fields: FieldMap<R>): RecordSchema<R> {
  return new RecordSchema(name, fields, false);
}

/**
 * Record whose unknown wire keys are kept in `additionalProperties`
 */
export function defineOpenRecord<R extends { additionalProperties?: JsonObject }>(
  name: string,
  fields: FieldMap<R>
): RecordSchema<R> {
  return new RecordSchema(name, fields, true);
}

/**
 * Nested record field
 */
export function record<R extends object>(schema: RecordSchema<R>): FieldType<R> {
  return {
    kind: schema.name,
    decode(raw, path) {
      return schema.decode(raw, path);
    },
    encode(value, path) {
      return schema.encode(value, path);
    },
  };
}

export function decodeRecord<R extends object>(raw: JsonValue, schema: RecordSchema<R>): R {
  return schema.decode(raw);
}

export function encodeRecord<R extends object>(value: NoInfer<R>, schema: RecordSchema<R>): JsonObject {
  return schema.encode(value);
}

/**
 * Encode a record and serialize it to JSON text
 */
export function serializeRecord<R extends object>(value: NoInfer<R>, schema: RecordSchema<R>): string {
  const encoded = schema.encode(value);

  try {
    return JSON.stringify(encoded, (_key, member: unknown) => {
      if (typeof member === 'number' && !Number.isFinite(member)) {
        throw new SerializationError(`${schema.name} contains the non-finite number ${member}`);
      }
      return member;
    });
  } catch (error) {
    if (error instanceof SerializationError) {
      throw error;
    }
    throw new SerializationError(error instanceof Error ? error.message : String(error), {
      cause: error,
    });
  }
}
