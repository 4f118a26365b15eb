/**
 * Apply Command Handler
 *
 * Computes the plan and executes it, recording state after every
 * successful operation. Ctrl-C stops dispatch and lets in-flight
 * operations finish.
 */

import { evaluateOutputs } from '../../core/outputs.js';
import { computePlan, hasChanges } from '../../core/planner.js';
import { executePlan } from '../../core/reconciler.js';
import type { ExecutionReport, Plan } from '../../core/types.js';
import { createOutput, type OutputFormatter } from '../output.js';
import { planningRecords } from './plan.js';
import {
  handleError,
  loadWorkspace,
  progressReporter,
  retryConfig,
  type Workspace,
  type WorkspaceCommandOptions,
} from './shared.js';

/**
 * Options for the apply command
 */
export interface ApplyCommandOptions extends WorkspaceCommandOptions {
  refresh?: boolean;
  concurrency?: number;
}

/**
 * Execute a plan with Ctrl-C wired to cancellation.
 */
export async function runPlan(
  plan: Plan,
  workspace: Workspace,
  concurrency: number | undefined,
  output: OutputFormatter
): Promise<ExecutionReport> {
  const controller = new AbortController();
  const onInterrupt = (): void => {
    output.warning('Interrupted; waiting for in-flight operations to finish...');
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);

  const { settings } = workspace.config;
  try {
    return await executePlan(plan, {
      registry: workspace.registry,
      store: workspace.store,
      concurrency: concurrency ?? settings.concurrency,
      retry: retryConfig(settings),
      operationTimeoutMs: settings.operationTimeoutMs,
      signal: controller.signal,
      onProgress: progressReporter(output),
    });
  } finally {
    process.off('SIGINT', onInterrupt);
    await workspace.store.close();
  }
}

/**
 * Execute the apply command.
 *
 * @param file - Path to the declaration file
 * @param options - Command options
 */
export async function applyCommand(
  file: string,
  options: ApplyCommandOptions
): Promise<void> {
  const output = createOutput('apply', options);

  try {
    const workspace = await loadWorkspace(file, options, output);
    const records = await planningRecords(workspace, options.refresh ?? false, output);
    const plan = computePlan(workspace.graph, records, workspace.config.workspace.name);

    output.newline();
    output.plan(plan);

    if (!hasChanges(plan)) {
      output.outputs(evaluateOutputs(workspace.config, records));
      output.flush();
      process.exit(0);
    }

    output.newline();
    const report = await runPlan(plan, workspace, options.concurrency, output);
    output.execution(report);

    const outputs = evaluateOutputs(workspace.config, await workspace.store.list());
    if (outputs.length > 0) {
      output.newline();
      output.outputs(outputs);
    }

    output.flush();
    process.exit(report.success ? 0 : 2);
  } catch (error) {
    handleError(output, error);
  }
}
