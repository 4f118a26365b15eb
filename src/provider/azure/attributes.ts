/**
 * Attribute readers for Azure adapters. A wrongly typed attribute is a
 * permanent error for the operation.
 */

import { PermanentProviderError } from '../../core/errors.js';
import type { JsonObject, JsonValue } from '../../core/types.js';
import { isJsonObject, readPath } from '../../lib/json.js';

function invalid(name: string, expected: string, value: JsonValue | undefined): PermanentProviderError {
  return new PermanentProviderError(
    `Attribute "${name}" must be ${expected}, got ${JSON.stringify(value ?? null)}`,
    'INVALID_REQUEST'
  );
}

export function requireString(attributes: JsonObject, name: string): string {
  const value = attributes[name];
  if (typeof value !== 'string' || value === '') {
    throw invalid(name, 'a non-empty string', value);
  }
  return value;
}

export function optionalString(attributes: JsonObject, name: string): string | undefined {
  const value = attributes[name];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw invalid(name, 'a string', value);
  }
  return value;
}

export function optionalNumber(attributes: JsonObject, name: string): number | undefined {
  const value = attributes[name];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'number') {
    throw invalid(name, 'a number', value);
  }
  return value;
}

export function stringList(attributes: JsonObject, name: string): string[] {
  const value = attributes[name];
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw invalid(name, 'a list of strings', value);
  }
  return value;
}

export function objectList(attributes: JsonObject, name: string): JsonObject[] {
  const value = attributes[name];
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value) || !value.every(isJsonObject)) {
    throw invalid(name, 'a list of objects', value);
  }
  return value;
}

export function optionalObject(attributes: JsonObject, name: string): JsonObject | undefined {
  const value = attributes[name];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!isJsonObject(value)) {
    throw invalid(name, 'an object', value);
  }
  return value;
}

/**
 * `tags` as a string map; non-string values are stringified.
 */
export function tagsOf(attributes: JsonObject): Record<string, string> {
  const tags = optionalObject(attributes, 'tags') ?? {};
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(tags)) {
    result[key] = typeof value === 'string' ? value : JSON.stringify(value);
  }
  return result;
}

/**
 * Read a nested property of an ARM resource body.
 */
export function property(resource: JsonObject | null, ...path: string[]): JsonValue | undefined {
  return readPath(resource ?? undefined, path);
}

/**
 * Drop keys whose value is undefined, for building request bodies.
 */
export function compact(entries: Record<string, JsonValue | undefined>): JsonObject {
  const result: JsonObject = {};
  for (const [key, value] of Object.entries(entries)) {
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}
