/**
 * Provider Types
 *
 * Contract between the plan executor and the adapters that talk to a
 * cloud API. Adapters are stateless: everything they need comes in
 * through the call arguments.
 */

import type { JsonObject } from '../core/types.js';

/**
 * Per-call context handed to an adapter
 */
export interface ProviderContext {
  /** Aborted when the operation's attempt times out */
  signal: AbortSignal;
  /** Resource id of the instance being reconciled, for messages */
  resourceId: string;
}

/**
 * Identity and result attributes of a remote resource
 */
export interface ProviderResult {
  /** Provider-assigned identity (ARM resource id) */
  providerId: string;
  /** Attributes reported by the provider, e.g. a public IP's address */
  attributes: JsonObject;
}

/**
 * Adapter for one resource kind.
 */
export interface ProviderAdapter {
  /** Resource type handled, e.g. azurerm_subnet */
  readonly kind: string;
  readonly requiredAttributes: readonly string[];
  readonly optionalAttributes: readonly string[];
  /** Result attributes other resources may reference, besides `id` */
  readonly computedAttributes: readonly string[];

  create(attributes: JsonObject, ctx: ProviderContext): Promise<ProviderResult>;
  /** Current state of the resource, or null when it no longer exists */
  read(providerId: string, ctx: ProviderContext): Promise<ProviderResult | null>;
  update(providerId: string, attributes: JsonObject, ctx: ProviderContext): Promise<ProviderResult>;
  /** Remove the resource. Succeeds when it is already gone. */
  delete(providerId: string, ctx: ProviderContext): Promise<void>;
}
