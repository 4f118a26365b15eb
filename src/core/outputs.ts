/**
 * Output Evaluation
 *
 * Resolves declared outputs against recorded state.
 */

import type { ResolvedConfig } from '../config/types.js';
import type { StateRecord } from '../state/types.js';
import { convertValue, countInstances, sensitiveAttributeNames } from './graph.js';
import { resolveAttributeValue, stateLookup } from './references.js';
import type { JsonValue } from './types.js';

/**
 * Placeholder shown instead of sensitive values
 */
export const SENSITIVE_PLACEHOLDER = '(sensitive)';

/**
 * An output after evaluation
 */
export interface EvaluatedOutput {
  name: string;
  /** Resolved value, null when it cannot be resolved yet */
  value: JsonValue;
  /** Declared sensitive, or derived from a sensitive variable or attribute */
  sensitive: boolean;
  description?: string;
  /** Why the value is null, when it is unresolved */
  reason?: string;
}

/**
 * Evaluate every declared output in declaration order.
 *
 * Splat references yield lists ordered by index. Outputs referencing
 * resources that have no recorded state evaluate to null with a reason.
 */
export function evaluateOutputs(
  config: Pick<ResolvedConfig, 'outputs' | 'resources' | 'variables'>,
  records: readonly StateRecord[]
): EvaluatedOutput[] {
  const counts = countInstances(config);
  const sensitive = sensitiveAttributeNames(config, counts);
  const lookup = stateLookup(new Map(records.map((record) => [record.id, record])));

  return Object.entries(config.outputs).map(([name, output]) => {
    const converted = convertValue(output.value, {
      variables: config.variables,
      counts,
      countIndex: null,
      from: `output.${name}`,
      sensitive,
    });
    const unknown = new Set<string>();
    const value = resolveAttributeValue(converted.value, lookup, unknown);
    const evaluated: EvaluatedOutput = {
      name,
      value: unknown.size > 0 ? null : value,
      sensitive: (output.sensitive ?? false) || converted.sensitive,
    };
    if (output.description !== undefined) {
      evaluated.description = output.description;
    }
    if (unknown.size > 0) {
      evaluated.reason = `not yet applied: ${[...unknown].join(', ')}`;
    }
    return evaluated;
  });
}

/**
 * Value safe to print: sensitive values are masked.
 */
export function displayValue(output: EvaluatedOutput): JsonValue {
  return output.sensitive ? SENSITIVE_PLACEHOLDER : output.value;
}
