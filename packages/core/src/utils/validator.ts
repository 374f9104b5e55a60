import ajvModule from 'ajv';
import addFormatsModule from 'ajv-formats';
import type { Schema, ValidateFunction } from 'ajv';

// Both packages are CommonJS; under ESM the default import is module.exports.
const Ajv = ajvModule.default;
const addFormats = addFormatsModule.default;

const ajv = new Ajv({ allErrors: true, strict: false });
addFormats(ajv);

const validatorCache = new Map<string, ValidateFunction>();

/** A single schema violation, flattened from AJV's error objects. */
export interface SchemaIssue {
  path: string;
  message: string;
}

/**
 * Creates or retrieves a cached AJV validator for a JSON schema.
 *
 * @param schemaId - Unique identifier for caching (typically the schema title)
 */
export function createValidator(schema: Schema, schemaId: string): ValidateFunction {
  const cached = validatorCache.get(schemaId);
  if (cached) return cached;

  const validate = ajv.compile(schema);
  validatorCache.set(schemaId, validate);
  return validate;
}

/**
 * Compiles a schema whose accepted documents are described by `T`.
 * A passing check narrows the value to `T`; keep the two in step.
 */
export function compileSchema<T>(schema: Schema): ValidateFunction<T> {
  return ajv.compile<T>(schema);
}

/**
 * Validates data against a JSON schema and returns the violations (empty when valid).
 */
export function collectSchemaIssues(data: unknown, schema: Schema, schemaId: string): SchemaIssue[] {
  const validate = createValidator(schema, schemaId);
  if (validate(data)) return [];
  return (validate.errors ?? []).map((e) => ({
    path: e.instancePath || '/',
    message: e.message ?? 'unknown error',
  }));
}
