/**
 * Zod to JSON Schema Converter
 *
 * Converts Zod schemas to JSON Schema format compatible with
 * tool input schemas on the Messages API.
 *
 * @module @lead-intake/lib/structured-outputs
 */

import { zodToJsonSchema as zodToJsonSchemaLib } from 'zod-to-json-schema';
import type { ZodSchema } from 'zod';

/**
 * JSON Schema document compatible with a tool input_schema
 */
export type JsonSchema = Record<string, unknown>;

/**
 * Convert a Zod schema to JSON Schema (draft-07), without `$schema` or `$ref`.
 */
export function zodToJsonSchema(schema: ZodSchema): JsonSchema {
  const { $schema: _omitted, ...cleanSchema } = zodToJsonSchemaLib(schema, {
    $refStrategy: 'none',
    target: 'jsonSchema7',
  });

  return cleanSchema;
}
