/**
 * Configuration Validator
 *
 * Validates declaration data against the JSON Schema using Ajv.
 */

import Ajv, { type ErrorObject } from 'ajv';
import addFormats from 'ajv-formats';
import type { VmforgeConfig } from './types.js';
import configSchema from './schema.json' with { type: 'json' };

/**
 * Schema validation error details
 */
export interface SchemaValidationError {
  /** JSON path to the invalid field */
  path: string;
  /** Human-readable error message */
  message: string;
  /** Additional error parameters from Ajv */
  params: Record<string, unknown>;
}

/**
 * Validation result - either success with config or failure with errors
 */
export type ValidationResult =
  | { valid: true; config: VmforgeConfig }
  | { valid: false; errors: SchemaValidationError[] };

// `strict: false` because free-form `default` and `value` schemas ({}) and
// the oneOf on `count` trip Ajv strict mode
const ajv = new Ajv.default({
  allErrors: true,
  verbose: true,
  strict: false,
});
addFormats.default(ajv);

// Compile the schema once
const validate = ajv.compile<VmforgeConfig>(configSchema);

/**
 * Validate declaration data against the JSON Schema.
 *
 * Checks shape only; expressions, variable rules and references are
 * checked later by the resolver and graph builder.
 *
 * @param data - Parsed YAML/JSON data to validate
 * @returns Validation result with either the typed config or detailed errors
 */
export function validateConfig(data: unknown): ValidationResult {
  if (validate(data)) {
    return { valid: true, config: data };
  }

  const errors: SchemaValidationError[] = (validate.errors ?? []).map(
    (error: ErrorObject) => ({
      path: error.instancePath || '/',
      message: error.message ?? 'Unknown validation error',
      params: { ...error.params },
    })
  );

  return { valid: false, errors };
}
