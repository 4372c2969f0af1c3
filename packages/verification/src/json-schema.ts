/**
 * JSON Schema validation for save_json / load_json payloads, using Ajv.
 */

import { Ajv, type ErrorObject } from 'ajv';

// Caller-supplied schemas may carry annotation keywords Ajv does not know.
const ajv = new Ajv({
  allErrors: true,
  strict: false,
  useDefaults: false,
  coerceTypes: false,
});

export interface SchemaResult {
  valid: boolean;
  error?: string;
}

function formatErrors(errors: ErrorObject[] | null | undefined): string {
  if (!errors || errors.length === 0) {
    return 'Validation failed (no details available)';
  }
  return errors
    .map((err) => `${err.instancePath || '/'} ${err.message ?? err.keyword}`)
    .join('; ');
}

export function validateAgainstSchema(
  data: unknown,
  schema: Record<string, unknown>,
): SchemaResult {
  let validate: ReturnType<typeof ajv.compile>;
  try {
    validate = ajv.compile(schema);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    return { valid: false, error: `Schema could not be compiled: ${reason}` };
  }

  if (validate(data)) return { valid: true };
  return { valid: false, error: formatErrors(validate.errors) };
}

/** JSON type name of a parsed value. */
export function jsonTypeOf(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (typeof value === 'number' && Number.isInteger(value)) return 'integer';
  return typeof value;
}
