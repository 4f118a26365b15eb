/**
 * Provider Registry
 *
 * Maps resource types to adapters and checks declared resources against
 * the adapters' attribute schemas before anything is applied.
 */

import { ValidationError } from '../core/errors.js';
import { collectReferences } from '../core/references.js';
import type { ResourceDefinition, ResourceGraph } from '../core/types.js';
import type { ProviderAdapter } from './types.js';

export class ProviderRegistry {
  private readonly adapters = new Map<string, ProviderAdapter>();

  constructor(adapters: readonly ProviderAdapter[] = []) {
    for (const adapter of adapters) {
      this.register(adapter);
    }
  }

  register(adapter: ProviderAdapter): this {
    if (this.adapters.has(adapter.kind)) {
      throw new Error(`Adapter for ${adapter.kind} is already registered`);
    }
    this.adapters.set(adapter.kind, adapter);
    return this;
  }

  has(kind: string): boolean {
    return this.adapters.has(kind);
  }

  /**
   * @throws ValidationError for an unsupported resource type
   */
  get(kind: string): ProviderAdapter {
    const adapter = this.adapters.get(kind);
    if (!adapter) {
      throw new ValidationError(
        `Unsupported resource type "${kind}" (supported: ${this.kinds().join(', ')})`
      );
    }
    return adapter;
  }

  kinds(): string[] {
    return [...this.adapters.keys()].sort();
  }

  /**
   * Problems with one definition: missing required attributes, unknown
   * attributes and references to attributes the target does not export.
   */
  private checkDefinition(
    definition: ResourceDefinition,
    byId: ReadonlyMap<string, ResourceDefinition>
  ): string[] {
    const adapter = this.adapters.get(definition.type);
    if (!adapter) {
      return [`${definition.id}: unsupported resource type "${definition.type}"`];
    }

    const problems: string[] = [];
    const declared = Object.keys(definition.attributes);
    for (const name of adapter.requiredAttributes) {
      if (!declared.includes(name)) {
        problems.push(`${definition.id}: missing required attribute "${name}"`);
      }
    }
    const known = new Set([...adapter.requiredAttributes, ...adapter.optionalAttributes]);
    for (const name of declared) {
      if (!known.has(name)) {
        problems.push(`${definition.id}: unknown attribute "${name}"`);
      }
    }

    for (const value of Object.values(definition.attributes)) {
      for (const reference of collectReferences(value)) {
        const target = byId.get(reference.target);
        const targetAdapter = target ? this.adapters.get(target.type) : undefined;
        const [head] = reference.path;
        if (!targetAdapter || head === undefined || head === 'id') continue;
        const exported =
          targetAdapter.computedAttributes.includes(head) ||
          targetAdapter.requiredAttributes.includes(head) ||
          targetAdapter.optionalAttributes.includes(head);
        if (!exported) {
          problems.push(
            `${definition.id}: ${reference.target} has no attribute "${head}"`
          );
        }
      }
    }

    return problems;
  }

  /**
   * Check every definition in a graph.
   *
   * @throws ValidationError listing every problem found
   */
  validateDefinitions(graph: ResourceGraph): void {
    const byId = new Map(graph.resources.map((definition) => [definition.id, definition]));
    const problems = graph.resources.flatMap((definition) => this.checkDefinition(definition, byId));
    if (problems.length === 1) {
      throw new ValidationError(problems[0] ?? '', problems);
    }
    if (problems.length > 1) {
      throw new ValidationError(`${problems.length} resource problems`, problems);
    }
  }
}
