/**
 * State record builders shared by tests
 */

import type { JsonObject } from '../../src/core/types.js';
import type { StateRecord } from '../../src/state/types.js';

/**
 * Build a state record with fixed timestamps.
 */
export function makeRecord(
  id: string,
  overrides: {
    providerId?: string;
    attributes?: JsonObject;
    outputs?: JsonObject;
    dependencies?: string[];
  } = {}
): StateRecord {
  const type = id.split('.')[0] ?? id;
  return {
    id,
    type,
    providerId: overrides.providerId ?? `/providers/${id}`,
    attributes: overrides.attributes ?? {},
    outputs: overrides.outputs ?? {},
    dependencies: overrides.dependencies ?? [],
    createdAt: '2024-01-01T00:00:00.000Z',
    updatedAt: '2024-01-01T00:00:00.000Z',
  };
}
