/**
 * Base adapter for resources that map to one ARM resource path.
 */

import { PermanentProviderError } from '../../core/errors.js';
import type { JsonObject } from '../../core/types.js';
import { ArmOperations, type ArmOptions } from '../arm.js';
import type { ProviderAdapter, ProviderContext, ProviderResult } from '../types.js';
import { compact, property, requireString } from './attributes.js';

export abstract class ArmResourceAdapter implements ProviderAdapter {
  abstract readonly kind: string;
  abstract readonly requiredAttributes: readonly string[];
  abstract readonly optionalAttributes: readonly string[];
  readonly computedAttributes: readonly string[] = [];

  protected readonly arm: ArmOperations;

  constructor(options: ArmOptions, apiVersion: string) {
    this.arm = new ArmOperations(options, apiVersion);
  }

  /**
   * ARM path of the resource the attributes describe.
   */
  protected abstract resourcePath(attributes: JsonObject): string;

  /**
   * PUT body. `existing` is the live resource on update, so properties
   * managed elsewhere can be carried over.
   */
  protected abstract buildBody(attributes: JsonObject, existing: JsonObject | null): JsonObject;

  /**
   * Result attributes exposed to references.
   */
  protected resultAttributes(resource: JsonObject): JsonObject {
    return compact({
      name: property(resource, 'name'),
      provisioning_state: property(resource, 'properties', 'provisioningState'),
    });
  }

  /**
   * Path under the configured subscription and the declared resource group.
   */
  protected groupPath(attributes: JsonObject, provider: string): string {
    const subscription = this.arm.subscriptionId();
    const group = requireString(attributes, 'resource_group_name');
    return `/subscriptions/${subscription}/resourceGroups/${group}/providers/${provider}`;
  }

  private toResult(resource: JsonObject, fallbackId: string): ProviderResult {
    const id = property(resource, 'id');
    return {
      providerId: typeof id === 'string' ? id : fallbackId,
      attributes: this.resultAttributes(resource),
    };
  }

  async create(attributes: JsonObject, ctx: ProviderContext): Promise<ProviderResult> {
    const path = this.resourcePath(attributes);
    const resource = await this.arm.putAndWait(path, this.buildBody(attributes, null), ctx);
    return this.toResult(resource, path);
  }

  async read(providerId: string, ctx: ProviderContext): Promise<ProviderResult | null> {
    const resource = await this.arm.get(providerId, ctx);
    return resource ? this.toResult(resource, providerId) : null;
  }

  /**
   * @throws PermanentProviderError when the change moves the resource to
   *   another ARM path (name, group or parent), which needs replacement
   */
  async update(
    providerId: string,
    attributes: JsonObject,
    ctx: ProviderContext
  ): Promise<ProviderResult> {
    const path = this.resourcePath(attributes);
    if (path.toLowerCase() !== providerId.toLowerCase()) {
      throw new PermanentProviderError(
        `${ctx.resourceId}: changing the name, resource group or parent requires replacement; destroy and re-create it`,
        'INVALID_REQUEST'
      );
    }
    const existing = await this.arm.get(path, ctx);
    const resource = await this.arm.putAndWait(path, this.buildBody(attributes, existing), ctx);
    return this.toResult(resource, path);
  }

  async delete(providerId: string, ctx: ProviderContext): Promise<void> {
    await this.arm.deleteAndWait(providerId, ctx);
  }
}
