import { z } from 'zod/v4';
import type { JsonObject, JsonValue } from '../../domain/entities/JsonValue.js';

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.null(),
    z.boolean(),
    z.number(),
    z.string(),
    z.array(jsonValueSchema),
    z.record(z.string(), jsonValueSchema),
  ])
);

const jsonObjectSchema: z.ZodType<JsonObject> = z.record(z.string(), jsonValueSchema);

/**
 * Check that a value is a plain JSON object (not an array, not null)
 */
export function isJsonObject(value: unknown): value is JsonObject {
  return jsonObjectSchema.safeParse(value).success;
}

export function isJsonValue(value: unknown): value is JsonValue {
  return jsonValueSchema.safeParse(value).success;
}

/**
 * Parse JSON text into a JsonValue. Throws the JSON.parse SyntaxError as-is.
 *
 * The parsed tree is returned as built by JSON.parse: a `__proto__` key
 * stays an own property.
 */
export function parseJson(text: string): JsonValue {
  const parsed: unknown = JSON.parse(text);
  if (!isJsonValue(parsed)) {
    throw new SyntaxError('JSON text does not describe a JSON value');
  }
  return parsed;
}
