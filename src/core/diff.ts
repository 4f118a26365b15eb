/**
 * Diff Engine
 *
 * Classifies every declared resource instance and every recorded one as
 * create, update, delete or noop by comparing resolved desired attributes
 * against recorded state.
 */

import type { StateRecord } from '../state/types.js';
import { jsonEqual } from '../lib/json.js';
import { resolveAttributes, stateLookup } from './references.js';
import type { JsonObject, Operation, ResourceDefinition, ResourceGraph } from './types.js';

/**
 * Attribute names whose values differ between two attribute maps,
 * sorted for stable output.
 */
export function changedAttributeNames(
  oldAttributes: Readonly<JsonObject>,
  newAttributes: Readonly<JsonObject>
): string[] {
  const names = new Set([...Object.keys(oldAttributes), ...Object.keys(newAttributes)]);
  return [...names].filter((name) => !jsonEqual(oldAttributes[name], newAttributes[name])).sort();
}

function classify(
  definition: ResourceDefinition,
  records: ReadonlyMap<string, StateRecord>,
  pending: ReadonlySet<string>
): Operation {
  const record = records.get(definition.id);
  const resolved = resolveAttributes(definition.attributes, stateLookup(records, pending));

  const base = {
    resourceId: definition.id,
    resourceType: definition.type,
    definition,
    newAttributes: resolved.values,
    order: definition.order,
  };

  if (!record) {
    return {
      ...base,
      kind: 'create',
      oldAttributes: null,
      changedAttributes: Object.keys(resolved.values).sort(),
      changedDependencies: [],
    };
  }

  if (resolved.unknownTargets.length > 0) {
    return {
      ...base,
      kind: 'update',
      oldAttributes: record.attributes,
      changedAttributes: changedAttributeNames(record.attributes, resolved.values),
      changedDependencies: resolved.unknownTargets,
    };
  }

  const changedAttributes = changedAttributeNames(record.attributes, resolved.values);
  return {
    ...base,
    kind: changedAttributes.length > 0 ? 'update' : 'noop',
    oldAttributes: record.attributes,
    changedAttributes,
    changedDependencies: [],
  };
}

/**
 * Compare the desired graph against recorded state.
 *
 * Definitions are visited in graph order, so a resource planned for
 * create or update makes every resource referencing it an update
 * (its referenced values are unknown until apply). Records with no
 * matching definition become deletes.
 *
 * @returns Operations for declared resources in declaration order,
 *   followed by deletes in state order
 */
export function diffResources(
  graph: ResourceGraph,
  records: readonly StateRecord[]
): Operation[] {
  const byId = new Map(records.map((record) => [record.id, record]));
  const definitions = new Map(graph.resources.map((definition) => [definition.id, definition]));
  const pending = new Set<string>();
  const operations: Operation[] = [];

  for (const id of graph.order) {
    const definition = definitions.get(id);
    if (!definition) continue;
    const operation = classify(definition, byId, pending);
    if (operation.kind === 'create' || operation.kind === 'update') {
      pending.add(id);
    }
    operations.push(operation);
  }

  operations.sort((a, b) => a.order - b.order);

  let order = graph.resources.length;
  for (const record of records) {
    if (definitions.has(record.id)) continue;
    operations.push({
      kind: 'delete',
      resourceId: record.id,
      resourceType: record.type,
      definition: null,
      oldAttributes: record.attributes,
      newAttributes: null,
      changedAttributes: [],
      changedDependencies: [],
      order: order++,
    });
  }

  return operations;
}
