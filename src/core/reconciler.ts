/**
 * Plan Executor for vmforge
 *
 * Executes planned operations to converge remote resources to the desired
 * graph. Operations run in a bounded pool as soon as their predecessors
 * finish; state is updated after each successful provider call.
 */

import type { ProviderRegistry } from '../provider/registry.js';
import type { ProviderContext, ProviderResult } from '../provider/types.js';
import type { StateRecord, StateStore } from '../state/types.js';
import {
  PermanentProviderError,
  StoreUnavailableError,
  TransientProviderError,
  VmforgeError,
  errorMessage,
  isTransientError,
} from './errors.js';
import { dependenciesOf } from './graph.js';
import { resolveAttributes, stateLookup } from './references.js';
import { retryAsync, type RetryConfig } from './retry.js';
import type {
  ExecutionReport,
  JsonObject,
  Operation,
  OperationResult,
  Plan,
} from './types.js';

/**
 * Progress states reported while a plan runs
 */
export type OperationProgressStatus =
  | 'starting'
  | 'completed'
  | 'failed'
  | 'skipped'
  | 'retrying';

/**
 * Callback for reporting operation progress
 */
export type OperationProgressCallback = (
  operation: Operation,
  status: OperationProgressStatus,
  detail?: string
) => void;

/**
 * Options for plan execution
 */
export interface ExecuteOptions {
  registry: ProviderRegistry;
  store: StateStore;
  /** Maximum operations in flight (default: 4) */
  concurrency?: number;
  /** Backoff for transient provider errors */
  retry?: RetryConfig;
  /** Per-attempt timeout in milliseconds; 0 disables (default: 0) */
  operationTimeoutMs?: number;
  /** Stops dispatch of new operations when aborted */
  signal?: AbortSignal;
  /** Stop dispatching after the first failure (default: false) */
  stopOnFailure?: boolean;
  /** Callback for progress reporting */
  onProgress?: OperationProgressCallback;
}

const executedPlans = new WeakSet<Plan>();

/**
 * Run `call` with a fresh abort signal, failing the attempt as a
 * transient timeout after `timeoutMs`.
 */
async function withTimeout<T>(
  call: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  resourceId: string
): Promise<T> {
  const controller = new AbortController();
  if (timeoutMs <= 0) {
    return call(controller.signal);
  }

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      // Settle before aborting so the race reports the timeout, not the abort
      reject(
        new TransientProviderError(
          `${resourceId}: operation timed out after ${timeoutMs}ms`,
          'TIMEOUT'
        )
      );
      controller.abort();
    }, timeoutMs);
  });

  try {
    return await Promise.race([call(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Resolve an operation's attributes against the current store contents.
 * Dependencies have all finished, so every reference must be known.
 */
async function resolveForDispatch(operation: Operation, store: StateStore): Promise<JsonObject> {
  const { definition } = operation;
  if (!definition) {
    return {};
  }
  const records = new Map((await store.list()).map((record) => [record.id, record]));
  const resolved = resolveAttributes(definition.attributes, stateLookup(records));
  if (resolved.unknownTargets.length > 0) {
    throw new PermanentProviderError(
      `${operation.resourceId}: referenced resources have no recorded state: ${resolved.unknownTargets.join(', ')}`,
      'INVALID_REQUEST'
    );
  }
  return resolved.values;
}

function buildRecord(
  operation: Operation,
  attributes: JsonObject,
  result: ProviderResult,
  previous: StateRecord | undefined
): StateRecord {
  const now = new Date().toISOString();
  return {
    id: operation.resourceId,
    type: operation.resourceType,
    providerId: result.providerId,
    attributes,
    outputs: result.attributes,
    dependencies: operation.definition ? dependenciesOf(operation.definition) : [],
    createdAt: previous?.createdAt ?? now,
    updatedAt: now,
  };
}

/**
 * Execute a plan.
 *
 * An operation is dispatched only after every predecessor applied. When a
 * predecessor fails (or is skipped) the operation is skipped; operations
 * on independent branches keep running. Transient provider errors are
 * retried with backoff. A plan can be executed only once.
 *
 * @throws StoreUnavailableError if state cannot be persisted; in-flight
 *   operations are drained first
 */
export async function executePlan(
  plan: Plan,
  options: ExecuteOptions
): Promise<ExecutionReport> {
  if (executedPlans.has(plan)) {
    throw new VmforgeError(
      'Plan has already been executed; compute a new plan',
      'OPERATION_FAILED'
    );
  }
  executedPlans.add(plan);

  const {
    registry,
    store,
    concurrency = 4,
    retry = {},
    operationTimeoutMs = 0,
    signal,
    stopOnFailure = false,
    onProgress,
  } = options;
  const limit = Math.max(1, Math.floor(concurrency));

  const results = new Map<string, OperationResult>();
  const waiting = [...plan.operations];
  const inFlight = new Map<string, Promise<void>>();
  // Shared with in-flight operations
  const run: { halted: boolean; fatal: StoreUnavailableError | null } = {
    halted: false,
    fatal: null,
  };

  const runOperation = async (operation: Operation): Promise<void> => {
    const started = Date.now();
    let attempts = 0;

    if (operation.kind === 'noop') {
      results.set(operation.resourceId, { operation, status: 'applied', attempts, durationMs: 0 });
      return;
    }

    onProgress?.(operation, 'starting');
    try {
      const adapter = registry.get(operation.resourceType);
      const previous = await store.get(operation.resourceId);
      const attributes = await resolveForDispatch(operation, store);

      const call = (ctx: ProviderContext): Promise<ProviderResult | null> => {
        switch (operation.kind) {
          case 'create':
            return adapter.create(attributes, ctx);
          case 'update':
            return previous
              ? adapter.update(previous.providerId, attributes, ctx)
              : adapter.create(attributes, ctx);
          default:
            return previous
              ? adapter.delete(previous.providerId, ctx).then(() => null)
              : Promise.resolve(null);
        }
      };

      const result = await retryAsync(
        (attempt) => {
          attempts = attempt;
          return withTimeout(
            (attemptSignal) => call({ signal: attemptSignal, resourceId: operation.resourceId }),
            operationTimeoutMs,
            operation.resourceId
          );
        },
        {
          ...retry,
          label: operation.resourceId,
          shouldRetry: isTransientError,
          onRetry: (info) =>
            onProgress?.(
              operation,
              'retrying',
              `attempt ${info.attempt}/${info.maxAttempts} failed (${errorMessage(info.err)}), retrying in ${info.delayMs}ms`
            ),
        }
      );

      if (operation.kind === 'delete') {
        await store.delete(operation.resourceId);
      } else if (result) {
        await store.put(operation.resourceId, buildRecord(operation, attributes, result, previous));
      }

      results.set(operation.resourceId, {
        operation,
        status: 'applied',
        attempts,
        durationMs: Date.now() - started,
      });
      onProgress?.(operation, 'completed');
    } catch (error) {
      const message = errorMessage(error);
      if (error instanceof StoreUnavailableError) {
        run.fatal ??= error;
      }
      results.set(operation.resourceId, {
        operation,
        status: 'failed',
        error: message,
        attempts,
        durationMs: Date.now() - started,
      });
      if (stopOnFailure) {
        run.halted = true;
      }
      onProgress?.(operation, 'failed', message);
    }
  };

  const skip = (operation: Operation, skipReason: string, skippedDueTo?: string): void => {
    results.set(operation.resourceId, {
      operation,
      status: 'skipped',
      skipReason,
      skippedDueTo,
      attempts: 0,
      durationMs: 0,
    });
    onProgress?.(operation, 'skipped', skipReason);
  };

  for (;;) {
    // Plan order is topological, so one pass propagates skips transitively
    for (let i = 0; i < waiting.length; ) {
      const operation = waiting[i];
      if (!operation) break;
      const deps = plan.dependencies.get(operation.resourceId) ?? [];
      const blocked = deps.find((dep) => {
        const status = results.get(dep)?.status;
        return status === 'failed' || status === 'skipped';
      });

      if (blocked !== undefined) {
        const reason = results.get(blocked)?.status === 'failed' ? 'failed' : 'was skipped';
        skip(operation, `dependency ${blocked} ${reason}`, blocked);
      } else if (run.fatal) {
        skip(operation, 'state store unavailable');
      } else if (signal?.aborted) {
        skip(operation, 'cancelled');
      } else if (run.halted) {
        skip(operation, 'stopped after an earlier failure');
      } else if (
        inFlight.size < limit &&
        deps.every((dep) => results.get(dep)?.status === 'applied')
      ) {
        const id = operation.resourceId;
        inFlight.set(
          id,
          runOperation(operation).finally(() => {
            inFlight.delete(id);
          })
        );
      } else {
        i++;
        continue;
      }
      waiting.splice(i, 1);
    }

    if (inFlight.size === 0) {
      break;
    }
    await Promise.race(inFlight.values());
  }

  if (run.fatal) {
    throw run.fatal;
  }

  const ordered = plan.operations.flatMap((operation) => {
    const result = results.get(operation.resourceId);
    return result ? [result] : [];
  });
  const summary = { applied: 0, failed: 0, skipped: 0 };
  for (const result of ordered) {
    summary[result.status]++;
  }

  return {
    success: summary.applied === plan.operations.length,
    cancelled: signal?.aborted ?? false,
    results: ordered,
    summary,
  };
}

/**
 * Describe an operation for display.
 */
export function describeOperation(operation: Operation): string {
  switch (operation.kind) {
    case 'create':
      return `Create ${operation.resourceId}`;
    case 'update': {
      const parts: string[] = [];
      if (operation.changedAttributes.length > 0) {
        parts.push(`changed: ${operation.changedAttributes.join(', ')}`);
      }
      if (operation.changedDependencies.length > 0) {
        parts.push(`depends on pending: ${operation.changedDependencies.join(', ')}`);
      }
      return `Update ${operation.resourceId}${parts.length > 0 ? ` (${parts.join('; ')})` : ''}`;
    }
    case 'delete':
      return `Delete ${operation.resourceId}`;
    case 'noop':
      return `No changes ${operation.resourceId}`;
  }
}

/**
 * Get the operation symbol for display.
 */
export function getOperationSymbol(operation: Operation): string {
  switch (operation.kind) {
    case 'create':
      return '+';
    case 'update':
      return '~';
    case 'delete':
      return '-';
    case 'noop':
      return '=';
  }
}
