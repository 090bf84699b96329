import { z } from 'zod';
import { type SafeWrap, safeWrap } from '../utils/wrap.js';

/** A JSON Schema document as a plain object. */
export type JsonSchema = Record<string, unknown>;

/**
 * Exports a zod type as JSON Schema, without the `$schema` meta key.
 * Types JSON Schema cannot express (bigint, date, transforms) fail with an error tuple.
 *
 * @example
 * const [err, schema] = toSchema(z.object({ city: z.string() }));
 * // schema: { type: 'object', properties: { city: { type: 'string' } },
 * //   required: ['city'], additionalProperties: false }
 */
export function toSchema(schema: z.ZodType): SafeWrap<Error, JsonSchema> {
  const [err, json] = safeWrap(() => z.toJSONSchema(schema));
  if (err) {
    return [new Error('error exporting json schema in toSchema', { cause: err }), null];
  }

  const { $schema: _meta, ...rest } = json;
  return [null, rest];
}
