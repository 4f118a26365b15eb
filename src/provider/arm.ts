/**
 * ARM Transport
 *
 * Azure Resource Manager request interface plus the long-running
 * operation handling every adapter shares: PUT then poll until
 * provisioned, DELETE then poll until gone.
 */

import { setTimeout as sleep } from 'node:timers/promises';

import {
  PermanentProviderError,
  TransientProviderError,
  isNotFoundError,
} from '../core/errors.js';
import type { JsonObject } from '../core/types.js';
import { isJsonObject } from '../lib/json.js';
import type { ProviderContext } from './types.js';

/**
 * HTTP methods used against ARM
 */
export type ArmMethod = 'GET' | 'PUT' | 'DELETE';

/**
 * One ARM REST call
 */
export interface ArmRequest {
  method: ArmMethod;
  /** Resource path starting at /subscriptions/... */
  path: string;
  apiVersion: string;
  body?: JsonObject;
  signal?: AbortSignal;
}

/**
 * Sends ARM requests. Implementations raise TransientProviderError or
 * PermanentProviderError; a missing resource is a PermanentProviderError
 * with code NOT_FOUND.
 *
 * @returns The response body, or null when the response has none
 */
export interface ArmClient {
  request(request: ArmRequest): Promise<JsonObject | null>;
}

export const ARM_ENDPOINT = 'https://management.azure.com';

/**
 * Full request URL for an ARM path.
 */
export function armUrl(path: string, apiVersion: string): string {
  return `${ARM_ENDPOINT}${path}?api-version=${apiVersion}`;
}

/**
 * Options shared by every ARM-backed adapter
 */
export interface ArmOptions {
  client: ArmClient;
  /** Null when none is configured; calls then fail permanently */
  subscriptionId: string | null;
  /** Delay between provisioning polls (default: 5000) */
  pollIntervalMs?: number;
  /** Polls before giving up with a transient timeout (default: 360) */
  maxPolls?: number;
}

/**
 * `properties.provisioningState` of an ARM resource, if present.
 */
export function provisioningState(resource: JsonObject | null): string | null {
  const properties = resource?.['properties'];
  if (isJsonObject(properties) && typeof properties['provisioningState'] === 'string') {
    return properties['provisioningState'];
  }
  return null;
}

/**
 * Long-running ARM operations for one API version.
 */
export class ArmOperations {
  private readonly client: ArmClient;
  private readonly subscription: string | null;
  private readonly pollIntervalMs: number;
  private readonly maxPolls: number;

  constructor(
    options: ArmOptions,
    private readonly apiVersion: string
  ) {
    this.client = options.client;
    this.subscription = options.subscriptionId;
    this.pollIntervalMs = options.pollIntervalMs ?? 5000;
    this.maxPolls = options.maxPolls ?? 360;
  }

  /**
   * Configured subscription id.
   *
   * @throws PermanentProviderError when none is configured
   */
  subscriptionId(): string {
    if (!this.subscription) {
      throw new PermanentProviderError(
        'No Azure subscription configured; set settings.subscription_id or AZURE_SUBSCRIPTION_ID',
        'INVALID_REQUEST'
      );
    }
    return this.subscription;
  }

  /**
   * GET a resource, or null when it does not exist.
   */
  async get(path: string, ctx: ProviderContext): Promise<JsonObject | null> {
    try {
      return await this.client.request({
        method: 'GET',
        path,
        apiVersion: this.apiVersion,
        signal: ctx.signal,
      });
    } catch (error) {
      if (isNotFoundError(error)) {
        return null;
      }
      throw error;
    }
  }

  private async pause(ctx: ProviderContext): Promise<void> {
    try {
      await sleep(this.pollIntervalMs, undefined, { signal: ctx.signal });
    } catch {
      throw new TransientProviderError(`${ctx.resourceId}: polling aborted`, 'TIMEOUT');
    }
  }

  /**
   * PUT a resource body and poll until provisioning finishes.
   *
   * @returns The provisioned resource
   * @throws PermanentProviderError when provisioning fails
   */
  async putAndWait(path: string, body: JsonObject, ctx: ProviderContext): Promise<JsonObject> {
    const response = await this.client.request({
      method: 'PUT',
      path,
      apiVersion: this.apiVersion,
      body,
      signal: ctx.signal,
    });

    let resource = response;
    for (let poll = 0; poll <= this.maxPolls; poll++) {
      const state = provisioningState(resource);
      if (resource && (state === null || state === 'Succeeded')) {
        return resource;
      }
      if (state === 'Failed' || state === 'Canceled') {
        throw new PermanentProviderError(
          `${ctx.resourceId}: provisioning ${state.toLowerCase()}`,
          'PROVISIONING_FAILED'
        );
      }
      await this.pause(ctx);
      resource = await this.get(path, ctx);
    }

    throw new TransientProviderError(
      `${ctx.resourceId}: still provisioning after ${this.maxPolls} polls`,
      'TIMEOUT'
    );
  }

  /**
   * DELETE a resource and poll until it is gone. A resource that is
   * already gone counts as deleted.
   */
  async deleteAndWait(path: string, ctx: ProviderContext): Promise<void> {
    try {
      await this.client.request({
        method: 'DELETE',
        path,
        apiVersion: this.apiVersion,
        signal: ctx.signal,
      });
    } catch (error) {
      if (isNotFoundError(error)) {
        return;
      }
      throw error;
    }

    for (let poll = 0; poll <= this.maxPolls; poll++) {
      if ((await this.get(path, ctx)) === null) {
        return;
      }
      await this.pause(ctx);
    }

    throw new TransientProviderError(
      `${ctx.resourceId}: still deleting after ${this.maxPolls} polls`,
      'TIMEOUT'
    );
  }
}
