/**
 * Zod to JSON Schema Converter
 *
 * Converts Zod schemas to the JSON Schema shape Anthropic's tool use API
 * expects for `input_schema`.
 *
 * @module @expo-outreach/lib/structured-outputs
 */

import { zodToJsonSchema as convert } from 'zod-to-json-schema';
import type { ZodTypeAny } from 'zod';

/** Plain JSON Schema document */
export type JsonSchema = Record<string, unknown>;

/**
 * Convert a Zod schema to an inline JSON Schema (draft-07, no $ref, no $schema).
 *
 * @example
 * ```typescript
 * const schema = zodToJsonSchema(z.object({ subject: z.string().describe('Email subject') }));
 * // { type: 'object', properties: { subject: { type: 'string', description: 'Email subject' } },
 * //   required: ['subject'], additionalProperties: false }
 * ```
 */
export function zodToJsonSchema(schema: ZodTypeAny): JsonSchema {
  const clean: JsonSchema = {
    ...convert(schema, {
      $refStrategy: 'none',
      target: 'jsonSchema7',
    }),
  };
  delete clean.$schema;
  return clean;
}

/**
 * Check that a schema can be used as a tool input: an object with at least
 * one property whose `required` list only names declared properties.
 */
export function validateToolSchema(schema: JsonSchema): boolean {
  if (schema.type !== 'object') {
    throw new Error('Tool schema must describe an object');
  }

  const properties = schema.properties;
  if (typeof properties !== 'object' || properties === null || Object.keys(properties).length === 0) {
    throw new Error('Tool schema must declare at least one property');
  }

  const declared = Object.keys(properties);
  const required = Array.isArray(schema.required) ? schema.required : [];
  for (const name of required) {
    if (typeof name !== 'string' || !declared.includes(name)) {
      throw new Error(`Required property "${String(name)}" not found in schema properties`);
    }
  }

  return true;
}
