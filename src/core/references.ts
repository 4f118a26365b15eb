/**
 * Reference Resolution
 *
 * Turns declared attribute values into concrete JSON by reading referenced
 * resources' recorded state. A reference to a resource that has not been
 * applied yet (or is about to change) resolves to an unknown placeholder.
 */

import type { StateRecord } from '../state/types.js';
import type {
  AttributeValue,
  JsonObject,
  JsonValue,
  ReferenceValue,
} from './types.js';
import { readPath } from '../lib/json.js';

/**
 * Placeholder rendered for values that only exist after apply
 */
export const UNKNOWN_VALUE = '(known after apply)';

/**
 * Outcome of looking up one reference
 */
export type LookupResult = { known: true; value: JsonValue } | { known: false };

/**
 * Resolves a single reference
 */
export type ReferenceLookup = (reference: ReferenceValue) => LookupResult;

/**
 * Attributes with references resolved
 */
export interface ResolvedAttributes {
  values: JsonObject;
  /** Targets whose values were unknown, in first-seen order */
  unknownTargets: string[];
}

/**
 * Read a referenced attribute from a state record.
 *
 * `id` is the provider id; other paths read provider outputs first, then
 * the applied input attributes. Missing values read as null.
 */
export function readRecordAttribute(record: StateRecord, path: readonly string[]): JsonValue {
  if (path.length === 1 && path[0] === 'id') {
    return record.providerId;
  }
  return readPath(record.outputs, path) ?? readPath(record.attributes, path) ?? null;
}

/**
 * Lookup against state records. Targets in `pending` are unknown because
 * their values will change when the plan applies.
 */
export function stateLookup(
  records: ReadonlyMap<string, StateRecord>,
  pending: ReadonlySet<string> = new Set()
): ReferenceLookup {
  return (reference) => {
    if (pending.has(reference.target)) {
      return { known: false };
    }
    const record = records.get(reference.target);
    if (!record) {
      return { known: false };
    }
    return { known: true, value: readRecordAttribute(record, reference.path) };
  };
}

function renderTemplatePart(value: JsonValue): string {
  if (typeof value === 'string') return value;
  if (value === null) return '';
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value);
}

/**
 * Resolve one attribute value, recording unknown targets.
 */
export function resolveAttributeValue(
  value: AttributeValue,
  lookup: ReferenceLookup,
  unknownTargets: Set<string> = new Set()
): JsonValue {
  switch (value.kind) {
    case 'literal':
      return value.value;
    case 'reference': {
      const result = lookup(value);
      if (!result.known) {
        unknownTargets.add(value.target);
        return UNKNOWN_VALUE;
      }
      return result.value;
    }
    case 'template': {
      let rendered = '';
      let unknown = false;
      for (const part of value.parts) {
        if (typeof part === 'string') {
          rendered += part;
          continue;
        }
        const result = lookup(part);
        if (!result.known) {
          unknownTargets.add(part.target);
          unknown = true;
          continue;
        }
        rendered += renderTemplatePart(result.value);
      }
      return unknown ? UNKNOWN_VALUE : rendered;
    }
    case 'list':
      return value.items.map((item) => resolveAttributeValue(item, lookup, unknownTargets));
    case 'object': {
      const result: JsonObject = {};
      for (const [key, entry] of Object.entries(value.entries)) {
        result[key] = resolveAttributeValue(entry, lookup, unknownTargets);
      }
      return result;
    }
  }
}

/**
 * Resolve a full attribute map.
 */
export function resolveAttributes(
  attributes: Readonly<Record<string, AttributeValue>>,
  lookup: ReferenceLookup
): ResolvedAttributes {
  const unknownTargets = new Set<string>();
  const values: JsonObject = {};
  for (const [key, value] of Object.entries(attributes)) {
    values[key] = resolveAttributeValue(value, lookup, unknownTargets);
  }
  return { values, unknownTargets: [...unknownTargets] };
}

/**
 * Collect every reference inside an attribute value.
 */
export function collectReferences(value: AttributeValue, into: ReferenceValue[] = []): ReferenceValue[] {
  switch (value.kind) {
    case 'literal':
      break;
    case 'reference':
      into.push(value);
      break;
    case 'template':
      for (const part of value.parts) {
        if (typeof part !== 'string') {
          into.push(part);
        }
      }
      break;
    case 'list':
      for (const item of value.items) {
        collectReferences(item, into);
      }
      break;
    case 'object':
      for (const entry of Object.values(value.entries)) {
        collectReferences(entry, into);
      }
      break;
  }
  return into;
}
