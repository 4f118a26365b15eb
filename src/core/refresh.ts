/**
 * Refresh
 *
 * Reads every recorded resource from the provider and returns a planning
 * view of state that reflects what actually exists. The store itself is
 * left untouched; only a successful apply writes state.
 */

import type { ProviderRegistry } from '../provider/registry.js';
import type { StateRecord } from '../state/types.js';
import { isTransientError } from './errors.js';
import { retryAsync, type RetryConfig } from './retry.js';

/**
 * Options for a refresh
 */
export interface RefreshOptions {
  registry: ProviderRegistry;
  /** Maximum reads in flight (default: 4) */
  concurrency?: number;
  retry?: RetryConfig;
  signal?: AbortSignal;
}

/**
 * Planning view after refresh
 */
export interface RefreshResult {
  /** Records still present remotely, with live outputs */
  records: StateRecord[];
  /** Ids whose remote resource is gone */
  removed: string[];
}

/**
 * Read every record from its provider.
 *
 * @throws The provider error of the first read that fails permanently
 */
export async function refreshRecords(
  records: readonly StateRecord[],
  options: RefreshOptions
): Promise<RefreshResult> {
  const { registry, concurrency = 4, retry = {}, signal = new AbortController().signal } = options;
  const limit = Math.max(1, Math.floor(concurrency));
  const refreshed: Array<StateRecord | null> = [];

  for (let start = 0; start < records.length; start += limit) {
    const batch = records.slice(start, start + limit);
    const results = await Promise.all(
      batch.map(async (record) => {
        const adapter = registry.get(record.type);
        const live = await retryAsync(
          () => adapter.read(record.providerId, { signal, resourceId: record.id }),
          { ...retry, label: record.id, shouldRetry: isTransientError }
        );
        if (!live) {
          return null;
        }
        return { ...record, providerId: live.providerId, outputs: live.attributes };
      })
    );
    refreshed.push(...results);
  }

  const kept: StateRecord[] = [];
  const removed: string[] = [];
  records.forEach((record, i) => {
    const live = refreshed[i];
    if (live) {
      kept.push(live);
    } else {
      removed.push(record.id);
    }
  });
  return { records: kept, removed };
}
