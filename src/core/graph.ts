/**
 * Resource Graph Builder
 *
 * Expands declared resources into instances (count-based replication) and
 * links them into a directed acyclic graph: an edge runs from each
 * referencing resource to every resource it references.
 */

import type { ResolvedConfig, ResolvedVariable } from '../config/types.js';
import {
  formatResourceId,
  parseAddress,
  parseTemplate,
  type Expression,
  type Segment,
} from '../config/expressions.js';
import { CycleError, UnresolvedReferenceError, ValidationError } from './errors.js';
import { collectReferences } from './references.js';
import type {
  AttributeValue,
  JsonValue,
  ReferenceValue,
  ResourceDefinition,
  ResourceGraph,
} from './types.js';

/**
 * Context for converting declared values into attribute values
 */
export interface ExpansionScope {
  variables: Readonly<Record<string, ResolvedVariable>>;
  /** `type.name` -> count, or null for uncounted resources */
  counts: ReadonlyMap<string, number | null>;
  /** Index of the instance being expanded, null outside counted resources */
  countIndex: number | null;
  /** Id of whatever is being expanded, for error messages */
  from: string;
  /** `type.name` -> attribute names that carry a sensitive value */
  sensitive?: ReadonlyMap<string, ReadonlySet<string>>;
}

/**
 * Converted value plus whether a sensitive value flowed into it, from a
 * variable or from another resource's sensitive attribute
 */
export interface Converted {
  value: AttributeValue;
  sensitive: boolean;
}

function isLiteral(value: AttributeValue): value is { kind: 'literal'; value: JsonValue } {
  return value.kind === 'literal';
}

function stringify(value: JsonValue): string {
  if (typeof value === 'string') return value;
  if (value === null) return '';
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value);
}

/**
 * Turn a resource expression into the ids it targets.
 * Splat yields every instance; anything else yields exactly one id.
 */
function resolveTargets(
  expr: Extract<Expression, { kind: 'resource' }>,
  scope: ExpansionScope
): { splat: false; id: string } | { splat: true; ids: string[] } {
  const key = `${expr.type}.${expr.name}`;
  if (!scope.counts.has(key)) {
    throw new UnresolvedReferenceError(
      `${scope.from} references undeclared resource ${key}`,
      scope.from,
      key
    );
  }
  const count = scope.counts.get(key) ?? null;

  switch (expr.index.kind) {
    case 'none':
      if (count !== null) {
        throw new UnresolvedReferenceError(
          `${scope.from} references ${key} without an index, but it has count; use ${key}[N] or ${key}[*]`,
          scope.from,
          key
        );
      }
      return { splat: false, id: key };

    case 'splat':
      if (count === null) {
        return { splat: true, ids: [key] };
      }
      return {
        splat: true,
        ids: Array.from({ length: count }, (_, i) => formatResourceId(expr.type, expr.name, i)),
      };

    case 'literal':
    case 'count': {
      let index: number;
      if (expr.index.kind === 'count') {
        if (scope.countIndex === null) {
          throw new ValidationError(`${scope.from}: count.index used outside a counted resource`);
        }
        index = scope.countIndex;
      } else {
        index = expr.index.value;
      }
      const target = formatResourceId(expr.type, expr.name, index);
      if (count === null) {
        throw new UnresolvedReferenceError(
          `${scope.from} references ${target}, but ${key} has no count`,
          scope.from,
          target
        );
      }
      if (index >= count) {
        throw new UnresolvedReferenceError(
          `${scope.from} references ${target}, but ${key} has only ${count} instance(s)`,
          scope.from,
          target
        );
      }
      return { splat: false, id: target };
    }
  }
}

function lookupVariable(
  variables: Readonly<Record<string, ResolvedVariable>>,
  name: string
): ResolvedVariable | undefined {
  return Object.hasOwn(variables, name) ? variables[name] : undefined;
}

function toReference(id: string, path: string[]): ReferenceValue {
  return { kind: 'reference', target: id, path: [...path] };
}

function convertString(raw: string, scope: ExpansionScope): Converted {
  let segments: Segment[];
  try {
    segments = parseTemplate(raw);
  } catch (error) {
    if (error instanceof ValidationError) {
      throw new ValidationError(`${scope.from}: ${error.message}`);
    }
    throw error;
  }

  let sensitive = false;

  const evaluate = (expr: Expression): AttributeValue => {
    switch (expr.kind) {
      case 'var': {
        const variable = lookupVariable(scope.variables, expr.name);
        if (!variable) {
          throw new ValidationError(`${scope.from}: undeclared variable "${expr.name}"`);
        }
        sensitive = sensitive || variable.sensitive;
        return { kind: 'literal', value: variable.value };
      }
      case 'count-index':
        if (scope.countIndex === null) {
          throw new ValidationError(`${scope.from}: count.index used outside a counted resource`);
        }
        return { kind: 'literal', value: scope.countIndex };
      case 'resource': {
        const targets = resolveTargets(expr, scope);
        const [attribute] = expr.path;
        if (attribute && scope.sensitive?.get(`${expr.type}.${expr.name}`)?.has(attribute)) {
          sensitive = true;
        }
        if (targets.splat) {
          return { kind: 'list', items: targets.ids.map((id) => toReference(id, expr.path)) };
        }
        return toReference(targets.id, expr.path);
      }
    }
  };

  const [only] = segments;
  if (segments.length === 1 && only?.kind === 'expr') {
    const value = evaluate(only.expr);
    return { value, sensitive };
  }

  const parts: Array<string | ReferenceValue> = [];
  const pushText = (text: string): void => {
    const last = parts[parts.length - 1];
    if (typeof last === 'string') {
      parts[parts.length - 1] = last + text;
    } else {
      parts.push(text);
    }
  };

  for (const segment of segments) {
    if (segment.kind === 'text') {
      pushText(segment.text);
      continue;
    }
    const value = evaluate(segment.expr);
    if (value.kind === 'literal') {
      pushText(stringify(value.value));
    } else if (value.kind === 'reference') {
      parts.push(value);
    } else {
      throw new ValidationError(
        `${scope.from}: "\${${segment.source.trim()}}" yields a list and cannot be embedded in a string`
      );
    }
  }

  if (parts.every((part): part is string => typeof part === 'string')) {
    return { value: { kind: 'literal', value: parts.join('') }, sensitive };
  }
  return { value: { kind: 'template', parts }, sensitive };
}

/**
 * Convert a declared value into an attribute value, substituting
 * variables and count.index and turning resource expressions into references.
 */
export function convertValue(raw: JsonValue, scope: ExpansionScope): Converted {
  if (typeof raw === 'string') {
    return convertString(raw, scope);
  }

  if (Array.isArray(raw)) {
    const converted = raw.map((item) => convertValue(item, scope));
    const items = converted.map((c) => c.value);
    const sensitive = converted.some((c) => c.sensitive);
    if (items.every(isLiteral)) {
      return { value: { kind: 'literal', value: items.map((item) => item.value) }, sensitive };
    }
    return { value: { kind: 'list', items }, sensitive };
  }

  if (raw !== null && typeof raw === 'object') {
    const entries: Record<string, AttributeValue> = {};
    let sensitive = false;
    let allLiteral = true;
    for (const [key, item] of Object.entries(raw)) {
      const converted = convertValue(item, scope);
      entries[key] = converted.value;
      sensitive = sensitive || converted.sensitive;
      allLiteral = allLiteral && isLiteral(converted.value);
    }
    if (allLiteral) {
      const value: Record<string, JsonValue> = {};
      for (const [key, entry] of Object.entries(entries)) {
        if (isLiteral(entry)) {
          value[key] = entry.value;
        }
      }
      return { value: { kind: 'literal', value }, sensitive };
    }
    return { value: { kind: 'object', entries }, sensitive };
  }

  return { value: { kind: 'literal', value: raw }, sensitive: false };
}

/**
 * Evaluate a `count` setting to a non-negative integer, or null when absent.
 */
function evaluateCount(
  raw: number | string | undefined,
  key: string,
  variables: Readonly<Record<string, ResolvedVariable>>
): number | null {
  if (raw === undefined) {
    return null;
  }

  let value: JsonValue = raw;
  if (typeof raw === 'string') {
    const segments = parseTemplate(raw);
    const [only] = segments;
    if (segments.length !== 1 || only?.kind !== 'expr' || only.expr.kind !== 'var') {
      throw new ValidationError(`count for ${key} must be an integer or "\${var.NAME}"`);
    }
    const variable = lookupVariable(variables, only.expr.name);
    if (!variable) {
      throw new ValidationError(`count for ${key}: undeclared variable "${only.expr.name}"`);
    }
    value = variable.value;
  }

  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new ValidationError(
      `count for ${key} must be a non-negative integer, got ${JSON.stringify(value)}`
    );
  }
  return value;
}

/**
 * Instance count per declared resource (`type.name`), null when uncounted.
 *
 * @throws ValidationError for duplicate resources and bad counts
 */
export function countInstances(
  config: Pick<ResolvedConfig, 'resources' | 'variables'>
): Map<string, number | null> {
  const counts = new Map<string, number | null>();
  for (const resource of config.resources) {
    const key = `${resource.type}.${resource.name}`;
    if (counts.has(key)) {
      throw new ValidationError(`Duplicate resource ${key}`);
    }
    counts.set(key, evaluateCount(resource.count, key, config.variables));
  }
  return counts;
}

/**
 * Attribute names per declared resource (`type.name`) that carry a
 * sensitive value, directly from a variable or through references to other
 * resources' sensitive attributes. Repeats until no new attribute is found.
 */
export function sensitiveAttributeNames(
  config: Pick<ResolvedConfig, 'resources' | 'variables'>,
  counts: ReadonlyMap<string, number | null>
): Map<string, Set<string>> {
  const sensitive = new Map<string, Set<string>>();
  for (const resource of config.resources) {
    sensitive.set(`${resource.type}.${resource.name}`, new Set());
  }

  let changed = true;
  while (changed) {
    changed = false;
    for (const resource of config.resources) {
      const key = `${resource.type}.${resource.name}`;
      const count = counts.get(key) ?? null;
      const known = sensitive.get(key);
      if (count === 0 || !known) {
        continue;
      }
      const countIndex = count === null ? null : 0;
      const id = formatResourceId(resource.type, resource.name, countIndex);
      for (const [name, raw] of Object.entries(resource.attributes)) {
        if (known.has(name)) {
          continue;
        }
        const converted = convertValue(raw, {
          variables: config.variables,
          counts,
          countIndex,
          from: `${id}.${name}`,
          sensitive,
        });
        if (converted.sensitive) {
          known.add(name);
          changed = true;
        }
      }
    }
  }

  return sensitive;
}

/**
 * Expand declared resources into instances.
 *
 * A resource with `count: N` yields N definitions with ids `type.name[i]`
 * and an explicit index; an uncounted resource yields one definition with
 * id `type.name`.
 *
 * @throws ValidationError for duplicate resources, bad counts and bad expressions
 * @throws UnresolvedReferenceError for references to undeclared resources or instances
 */
export function expandResources(
  config: Pick<ResolvedConfig, 'resources' | 'variables'>
): ResourceDefinition[] {
  const counts = countInstances(config);
  const sensitive = sensitiveAttributeNames(config, counts);
  const definitions: ResourceDefinition[] = [];

  for (const resource of config.resources) {
    const key = `${resource.type}.${resource.name}`;
    const count = counts.get(key) ?? null;
    const indices = count === null ? [null] : Array.from({ length: count }, (_, i) => i);

    for (const index of indices) {
      const id = formatResourceId(resource.type, resource.name, index);
      const scope: ExpansionScope = {
        variables: config.variables,
        counts,
        countIndex: index,
        from: id,
        sensitive,
      };

      const attributes: Record<string, AttributeValue> = {};
      const sensitiveAttributes: string[] = [];
      for (const [name, raw] of Object.entries(resource.attributes)) {
        const converted = convertValue(raw, { ...scope, from: `${id}.${name}` });
        attributes[name] = converted.value;
        if (converted.sensitive) {
          sensitiveAttributes.push(name);
        }
      }

      const dependsOn: string[] = [];
      for (const address of resource.depends_on ?? []) {
        const parsed = parseAddress(address);
        const targetKey = `${parsed.type}.${parsed.name}`;
        if (!counts.has(targetKey)) {
          throw new UnresolvedReferenceError(
            `${id} depends on undeclared resource ${targetKey}`,
            id,
            targetKey
          );
        }
        const targetCount = counts.get(targetKey) ?? null;
        if (parsed.index === null) {
          if (targetCount === null) {
            dependsOn.push(targetKey);
          } else {
            for (let i = 0; i < targetCount; i++) {
              dependsOn.push(formatResourceId(parsed.type, parsed.name, i));
            }
          }
        } else {
          let targetIndex: number;
          if (parsed.index === 'count') {
            if (index === null) {
              throw new ValidationError(`${id}: count.index used outside a counted resource`);
            }
            targetIndex = index;
          } else {
            targetIndex = parsed.index;
          }
          const target = formatResourceId(parsed.type, parsed.name, targetIndex);
          if (targetCount === null || targetIndex >= targetCount) {
            throw new UnresolvedReferenceError(
              `${id} depends on ${target}, which is not declared`,
              id,
              target
            );
          }
          dependsOn.push(target);
        }
      }

      definitions.push({
        id,
        type: resource.type,
        name: resource.name,
        index,
        order: definitions.length,
        attributes,
        dependsOn,
        sensitiveAttributes,
      });
    }
  }

  return definitions;
}

/**
 * Ids a definition depends on: attribute references then depends_on,
 * deduplicated in first-seen order.
 */
export function dependenciesOf(definition: ResourceDefinition): string[] {
  const targets = new Set<string>();
  for (const value of Object.values(definition.attributes)) {
    for (const reference of collectReferences(value)) {
      targets.add(reference.target);
    }
  }
  for (const target of definition.dependsOn) {
    targets.add(target);
  }
  return [...targets];
}

/**
 * Build the resource graph from expanded definitions. Pure.
 *
 * @throws ValidationError on duplicate ids
 * @throws UnresolvedReferenceError when an edge targets an undefined resource
 * @throws CycleError when the references form a cycle
 */
export function buildGraph(definitions: readonly ResourceDefinition[]): ResourceGraph {
  const byId = new Map<string, ResourceDefinition>();
  for (const definition of definitions) {
    if (byId.has(definition.id)) {
      throw new ValidationError(`Duplicate resource ${definition.id}`);
    }
    byId.set(definition.id, definition);
  }

  const edges = new Map<string, string[]>();
  for (const definition of definitions) {
    const targets = dependenciesOf(definition);
    for (const target of targets) {
      if (!byId.has(target)) {
        throw new UnresolvedReferenceError(
          `${definition.id} references undeclared resource ${target}`,
          definition.id,
          target
        );
      }
    }
    edges.set(definition.id, targets);
  }

  // Depth-first traversal; `stack` is the current recursion path
  const visited = new Set<string>();
  const onStack = new Set<string>();
  const stack: string[] = [];
  const order: string[] = [];

  const visit = (id: string): void => {
    if (onStack.has(id)) {
      throw new CycleError([...stack.slice(stack.indexOf(id)), id]);
    }
    if (visited.has(id)) {
      return;
    }

    onStack.add(id);
    stack.push(id);
    for (const target of edges.get(id) ?? []) {
      visit(target);
    }
    stack.pop();
    onStack.delete(id);

    visited.add(id);
    order.push(id);
  };

  for (const definition of definitions) {
    visit(definition.id);
  }

  return { resources: [...definitions], edges, order };
}

/**
 * Expand a resolved declaration and build its graph.
 */
export function buildResourceGraph(
  config: Pick<ResolvedConfig, 'resources' | 'variables'>
): ResourceGraph {
  return buildGraph(expandResources(config));
}
