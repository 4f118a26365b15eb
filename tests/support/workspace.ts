/**
 * Loads fixture declarations against the in-process ARM stand-in and a
 * file state store in a temporary directory
 */

import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { loadDeclaration } from '../../src/config/resolver.js';
import type { ResolvedConfig } from '../../src/config/types.js';
import { buildResourceGraph } from '../../src/core/graph.js';
import { computePlan } from '../../src/core/planner.js';
import { executePlan } from '../../src/core/reconciler.js';
import type { ExecutionReport, Plan, ResourceGraph } from '../../src/core/types.js';
import { createAzureRegistry } from '../../src/provider/azure/index.js';
import type { ProviderRegistry } from '../../src/provider/registry.js';
import { FileStateStore } from '../../src/state/manager.js';
import { FakeArm } from './fake-arm.js';

export const FIXTURES = fileURLToPath(new URL('../fixtures/', import.meta.url));
export const EXAMPLES = fileURLToPath(new URL('../../examples/', import.meta.url));

export interface TestWorkspace {
  config: ResolvedConfig;
  graph: ResourceGraph;
  registry: ProviderRegistry;
  store: FileStateStore;
  arm: FakeArm;
}

/**
 * Temporary directory holding state files for one test.
 */
export class StateDir {
  private constructor(readonly path: string) {}

  static async create(): Promise<StateDir> {
    return new StateDir(await mkdtemp(join(tmpdir(), 'vmforge-it-')));
  }

  statePath(): string {
    return join(this.path, 'state.json');
  }

  async remove(): Promise<void> {
    await rm(this.path, { recursive: true, force: true });
  }
}

/**
 * Load a declaration (relative to the fixtures), build and check its
 * graph and open its state. The process environment is replaced by
 * `env` so VMFORGE_VAR_* cannot leak in.
 */
export async function openWorkspace(
  file: string,
  dir: StateDir,
  options: { assignments?: string[]; varFiles?: string[]; env?: NodeJS.ProcessEnv; arm?: FakeArm } = {}
): Promise<TestWorkspace> {
  const config = await loadDeclaration(resolve(FIXTURES, file), {
    assignments: options.assignments ?? [],
    varFiles: options.varFiles ?? [],
    env: options.env ?? {},
  });
  const graph = buildResourceGraph(config);
  const arm = options.arm ?? new FakeArm();
  const registry = createAzureRegistry({
    client: arm,
    subscriptionId: config.settings.subscriptionId,
    pollIntervalMs: 0,
  });
  registry.validateDefinitions(graph);

  const store = new FileStateStore({
    statePath: dir.statePath(),
    workspace: config.workspace.name,
    configPath: config.configPath,
    configHash: config.configHash,
  });
  await store.open();
  return { config, graph, registry, store, arm };
}

/**
 * Plan against recorded state.
 */
export async function planFor(workspace: TestWorkspace): Promise<Plan> {
  return computePlan(workspace.graph, await workspace.store.list(), workspace.config.workspace.name);
}

/**
 * Execute a plan with retries that do not wait.
 */
export function run(workspace: TestWorkspace, plan: Plan): Promise<ExecutionReport> {
  return executePlan(plan, {
    registry: workspace.registry,
    store: workspace.store,
    retry: { attempts: workspace.config.settings.maxAttempts, minDelayMs: 0, maxDelayMs: 0 },
  });
}
