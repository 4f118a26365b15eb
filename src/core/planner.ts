/**
 * Planner for vmforge
 *
 * Computes the ordered set of operations needed to converge recorded
 * state to the desired resource graph.
 */

import type { StateRecord } from '../state/types.js';
import { diffResources } from './diff.js';
import { CycleError } from './errors.js';
import type { Operation, Plan, PlanSummary, ResourceGraph } from './types.js';

/**
 * Predecessor map for a set of operations.
 *
 * Create/update/noop of R waits on the operations of everything R
 * references. Delete of X waits on the operation of every resource whose
 * recorded dependencies include X, so dependents go first.
 */
function operationDependencies(
  operations: readonly Operation[],
  graph: ResourceGraph | null,
  records: readonly StateRecord[]
): Map<string, string[]> {
  const planned = new Set(operations.map((op) => op.resourceId));
  const dependencies = new Map<string, Set<string>>();
  for (const op of operations) {
    dependencies.set(op.resourceId, new Set());
  }

  for (const op of operations) {
    if (op.kind === 'delete') continue;
    const deps = dependencies.get(op.resourceId);
    for (const target of graph?.edges.get(op.resourceId) ?? []) {
      if (planned.has(target)) deps?.add(target);
    }
  }

  const deleted = new Set(operations.filter((op) => op.kind === 'delete').map((op) => op.resourceId));
  for (const record of records) {
    if (!planned.has(record.id)) continue;
    for (const target of record.dependencies) {
      if (deleted.has(target) && target !== record.id) {
        dependencies.get(target)?.add(record.id);
      }
    }
  }

  const result = new Map<string, string[]>();
  for (const [id, deps] of dependencies) {
    result.set(id, [...deps]);
  }
  return result;
}

function summarize(operations: readonly Operation[]): PlanSummary {
  const summary: PlanSummary = { create: 0, update: 0, delete: 0, noop: 0 };
  for (const op of operations) {
    summary[op.kind]++;
  }
  return summary;
}

/**
 * Order operations with Kahn's algorithm, always taking the ready
 * operation with the lowest order key.
 *
 * @throws CycleError if some operations can never become ready
 */
function orderOperations(
  workspace: string,
  operations: readonly Operation[],
  dependencies: ReadonlyMap<string, readonly string[]>
): Plan {
  const byId = new Map(operations.map((op) => [op.resourceId, op]));
  const remaining = new Map<string, number>();
  const dependents = new Map<string, string[]>();

  for (const op of operations) {
    const deps = dependencies.get(op.resourceId) ?? [];
    remaining.set(op.resourceId, deps.length);
    for (const dep of deps) {
      const list = dependents.get(dep) ?? [];
      list.push(op.resourceId);
      dependents.set(dep, list);
    }
  }

  const ready = operations.filter((op) => remaining.get(op.resourceId) === 0);
  const ordered: Operation[] = [];
  const depth = new Map<string, number>();

  while (ready.length > 0) {
    ready.sort((a, b) => a.order - b.order);
    const op = ready.shift();
    if (!op) break;
    ordered.push(op);

    const level = Math.max(
      0,
      ...(dependencies.get(op.resourceId) ?? []).map((dep) => (depth.get(dep) ?? 0) + 1)
    );
    depth.set(op.resourceId, level);

    for (const dependent of dependents.get(op.resourceId) ?? []) {
      const count = (remaining.get(dependent) ?? 0) - 1;
      remaining.set(dependent, count);
      const next = byId.get(dependent);
      if (count === 0 && next) {
        ready.push(next);
      }
    }
  }

  if (ordered.length !== operations.length) {
    const stuck = operations
      .filter((op) => !depth.has(op.resourceId))
      .map((op) => op.resourceId);
    throw new CycleError([...stuck, stuck[0] ?? '']);
  }

  const levels: string[][] = [];
  for (const op of ordered) {
    const level = depth.get(op.resourceId) ?? 0;
    (levels[level] ??= []).push(op.resourceId);
  }

  return {
    workspace,
    operations: ordered,
    dependencies,
    levels,
    summary: summarize(ordered),
  };
}

/**
 * Compute the plan to converge recorded state to the desired graph.
 *
 * @param graph - Desired resource graph
 * @param records - Recorded state (or a refreshed view of it)
 * @param workspace - Workspace the plan belongs to
 * @returns Plan with operations in topological order
 */
export function computePlan(
  graph: ResourceGraph,
  records: readonly StateRecord[],
  workspace: string
): Plan {
  const operations = diffResources(graph, records);
  const dependencies = operationDependencies(operations, graph, records);
  return orderOperations(workspace, operations, dependencies);
}

/**
 * Compute a plan deleting every recorded resource, dependents first.
 */
export function computeDestroyPlan(records: readonly StateRecord[], workspace: string): Plan {
  const operations: Operation[] = records.map((record, index) => ({
    kind: 'delete',
    resourceId: record.id,
    resourceType: record.type,
    definition: null,
    oldAttributes: record.attributes,
    newAttributes: null,
    changedAttributes: [],
    changedDependencies: [],
    order: index,
  }));
  const dependencies = operationDependencies(operations, null, records);
  return orderOperations(workspace, operations, dependencies);
}

/**
 * Whether a plan would change anything.
 */
export function hasChanges(plan: Plan): boolean {
  return plan.summary.create + plan.summary.update + plan.summary.delete > 0;
}

/**
 * One-line summary of a plan.
 */
export function formatPlanSummary(summary: Readonly<PlanSummary>): string {
  return `Plan: ${summary.create} to create, ${summary.update} to update, ${summary.delete} to delete, ${summary.noop} unchanged.`;
}
