/**
 * Variable Resolution
 *
 * Binds every declared variable to a value and checks it against its type
 * and validation rules. Precedence, lowest first: declared default,
 * VMFORGE_VAR_<name> environment variables, variable files in the order
 * given, `name=value` assignments.
 *
 * All problems are collected and reported together as a single
 * ValidationError before any graph is built.
 */

import { ValidationError } from '../core/errors.js';
import type { JsonValue } from '../core/types.js';
import { isJsonObject, jsonEqual, toJsonValue } from '../lib/json.js';
import type {
  ResolvedVariable,
  ValidationRule,
  VariableConfig,
  VariableType,
} from './types.js';

/**
 * Prefix for environment variables that set declaration variables
 */
export const ENV_VAR_PREFIX = 'VMFORGE_VAR_';

/**
 * Raw variable values gathered from every source
 */
export interface VariableSources {
  /** Parsed variable files, lowest precedence first */
  files?: Array<Record<string, unknown>>;
  /** `name=value` assignments */
  assignments?: string[];
  env?: NodeJS.ProcessEnv;
}

/**
 * Parse a `name=value` assignment.
 *
 * @throws ValidationError if there is no `=` or the name is empty
 */
export function parseAssignment(assignment: string): { name: string; value: string } {
  const separator = assignment.indexOf('=');
  if (separator <= 0) {
    throw new ValidationError(
      `Invalid variable assignment "${assignment}": expected name=value`
    );
  }
  return {
    name: assignment.slice(0, separator).trim(),
    value: assignment.slice(separator + 1),
  };
}

/**
 * Convert a string from the command line or environment to the declared type.
 *
 * @returns The converted value, or an error message
 */
export function coerceString(
  raw: string,
  type: VariableType
): { value: JsonValue } | { error: string } {
  switch (type) {
    case 'string':
      return { value: raw };
    case 'number': {
      const value = Number(raw);
      if (raw.trim() === '' || !Number.isFinite(value)) {
        return { error: `expected a number, got "${raw}"` };
      }
      return { value };
    }
    case 'bool': {
      const lowered = raw.trim().toLowerCase();
      if (lowered === 'true' || lowered === '1') return { value: true };
      if (lowered === 'false' || lowered === '0') return { value: false };
      return { error: `expected true or false, got "${raw}"` };
    }
    case 'list':
    case 'map': {
      let parsed: unknown;
      try {
        parsed = JSON.parse(raw);
      } catch {
        return { error: `expected a JSON ${type}, got "${raw}"` };
      }
      const value = toJsonValue(parsed);
      if (value === undefined) {
        return { error: `expected a JSON ${type}, got "${raw}"` };
      }
      return { value };
    }
  }
}

/**
 * Check that a value matches a declared type.
 *
 * @returns An error message, or null when the value matches
 */
export function checkType(value: JsonValue, type: VariableType): string | null {
  switch (type) {
    case 'string':
      return typeof value === 'string' ? null : `expected a string, got ${describe(value)}`;
    case 'number':
      return typeof value === 'number' ? null : `expected a number, got ${describe(value)}`;
    case 'bool':
      return typeof value === 'boolean' ? null : `expected a bool, got ${describe(value)}`;
    case 'list':
      return Array.isArray(value) ? null : `expected a list, got ${describe(value)}`;
    case 'map':
      return isJsonObject(value) ? null : `expected a map, got ${describe(value)}`;
  }
}

function describe(value: JsonValue): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'a list';
  if (typeof value === 'object') return 'a map';
  return `${typeof value} ${JSON.stringify(value)}`;
}

/**
 * Check a value against one validation rule.
 *
 * @returns An error message, or null when the rule passes
 */
export function checkRule(value: JsonValue, rule: ValidationRule): string | null {
  const fail = (fallback: string): string => rule.message ?? fallback;

  if (rule.allowed !== undefined) {
    const allowed = rule.allowed;
    if (!allowed.some((candidate) => jsonEqual(candidate, value))) {
      return fail(`must be one of: ${allowed.map((a) => JSON.stringify(a)).join(', ')}`);
    }
  }

  if (rule.integer === true) {
    if (typeof value !== 'number' || !Number.isInteger(value)) {
      return fail('must be an integer');
    }
  }

  if (rule.min !== undefined) {
    if (typeof value !== 'number' || value < rule.min) {
      return fail(`must be at least ${rule.min}`);
    }
  }

  if (rule.max !== undefined) {
    if (typeof value !== 'number' || value > rule.max) {
      return fail(`must be at most ${rule.max}`);
    }
  }

  if (rule.pattern !== undefined) {
    if (typeof value !== 'string' || !new RegExp(rule.pattern).test(value)) {
      return fail(`must match pattern ${rule.pattern}`);
    }
  }

  const length = typeof value === 'string' || Array.isArray(value) ? value.length : null;

  if (rule.min_length !== undefined) {
    if (length === null || length < rule.min_length) {
      return fail(`must have length of at least ${rule.min_length}`);
    }
  }

  if (rule.max_length !== undefined) {
    if (length === null || length > rule.max_length) {
      return fail(`must have length of at most ${rule.max_length}`);
    }
  }

  return null;
}

/**
 * Resolve all declared variables from their sources.
 *
 * @param declared - Variable declarations from the YAML file
 * @param sources - Values supplied by files, assignments and environment
 * @returns Resolved variables keyed by name
 * @throws ValidationError listing every problem found
 */
export function resolveVariables(
  declared: Record<string, VariableConfig>,
  sources: VariableSources = {}
): Record<string, ResolvedVariable> {
  const problems: string[] = [];
  const values = new Map<string, JsonValue>();
  const env = sources.env ?? process.env;

  for (const [name, variable] of Object.entries(declared)) {
    if (variable.default !== undefined) {
      values.set(name, variable.default);
    }

    const fromEnv = env[`${ENV_VAR_PREFIX}${name}`];
    if (fromEnv !== undefined) {
      const coerced = coerceString(fromEnv, variable.type);
      if ('error' in coerced) {
        problems.push(`Variable "${name}" (${ENV_VAR_PREFIX}${name}): ${coerced.error}`);
      } else {
        values.set(name, coerced.value);
      }
    }
  }

  for (const file of sources.files ?? []) {
    for (const [name, raw] of Object.entries(file)) {
      if (!Object.hasOwn(declared, name)) {
        problems.push(`Variable "${name}" is not declared`);
        continue;
      }
      const value = toJsonValue(raw);
      if (value === undefined) {
        problems.push(`Variable "${name}": value cannot be represented as JSON`);
        continue;
      }
      values.set(name, value);
    }
  }

  for (const assignment of sources.assignments ?? []) {
    const { name, value: raw } = parseAssignment(assignment);
    const variable = Object.hasOwn(declared, name) ? declared[name] : undefined;
    if (!variable) {
      problems.push(`Variable "${name}" is not declared`);
      continue;
    }
    const coerced = coerceString(raw, variable.type);
    if ('error' in coerced) {
      problems.push(`Variable "${name}": ${coerced.error}`);
    } else {
      values.set(name, coerced.value);
    }
  }

  const resolved: Record<string, ResolvedVariable> = {};

  for (const [name, variable] of Object.entries(declared)) {
    const value = values.get(name);
    if (value === undefined) {
      problems.push(`Variable "${name}" has no value and no default`);
      continue;
    }

    const typeError = checkType(value, variable.type);
    if (typeError) {
      problems.push(`Variable "${name}": ${typeError}`);
      continue;
    }

    for (const rule of variable.validation ?? []) {
      const ruleError = checkRule(value, rule);
      if (ruleError) {
        problems.push(`Variable "${name}": ${ruleError}`);
      }
    }

    resolved[name] = {
      name,
      type: variable.type,
      value,
      sensitive: variable.sensitive === true,
    };
  }

  if (problems.length > 0) {
    throw new ValidationError(
      problems.length === 1 ? (problems[0] ?? 'Invalid variables') : `${problems.length} variable problems`,
      problems
    );
  }

  return resolved;
}
