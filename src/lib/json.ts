/**
 * JSON Value Utilities
 */

import { isDeepStrictEqual } from 'node:util';

import type { JsonObject, JsonValue } from '../core/types.js';

/**
 * Check whether a value is a plain JSON object (not an array, not null).
 */
export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Convert parsed YAML/JSON input into a JsonValue.
 *
 * YAML timestamps become ISO strings. Returns undefined for values with
 * no JSON form (functions, symbols, non-finite numbers).
 */
export function toJsonValue(value: unknown): JsonValue | undefined {
  if (value === null) {
    return null;
  }
  if (typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (Array.isArray(value)) {
    const items: JsonValue[] = [];
    for (const item of value) {
      const converted = toJsonValue(item);
      if (converted === undefined) {
        return undefined;
      }
      items.push(converted);
    }
    return items;
  }
  if (typeof value === 'object') {
    const result: JsonObject = {};
    for (const [key, item] of Object.entries(value)) {
      const converted = toJsonValue(item);
      if (converted === undefined) {
        return undefined;
      }
      result[key] = converted;
    }
    return result;
  }
  return undefined;
}

/**
 * Structural equality on JSON values.
 */
export function jsonEqual(a: JsonValue | undefined, b: JsonValue | undefined): boolean {
  return isDeepStrictEqual(a, b);
}

/**
 * Read a nested value by path. Returns undefined when any step is missing.
 */
export function readPath(value: JsonValue | undefined, path: readonly string[]): JsonValue | undefined {
  let current: JsonValue | undefined = value;
  for (const key of path) {
    if (Array.isArray(current) && /^\d+$/.test(key)) {
      current = current[Number(key)];
    } else if (isJsonObject(current) && Object.hasOwn(current, key)) {
      current = current[key];
    } else {
      return undefined;
    }
  }
  return current;
}

/**
 * Render a value for human output: strings as-is, everything else as JSON.
 */
export function formatJsonValue(value: JsonValue): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}
