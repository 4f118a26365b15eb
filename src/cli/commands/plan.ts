/**
 * Plan Command Handler
 *
 * Shows the operations apply would perform without performing them.
 */

import { computePlan, hasChanges } from '../../core/planner.js';
import { refreshRecords } from '../../core/refresh.js';
import type { StateRecord } from '../../state/types.js';
import { createOutput, type OutputFormatter } from '../output.js';
import {
  handleError,
  loadWorkspace,
  retryConfig,
  type Workspace,
  type WorkspaceCommandOptions,
} from './shared.js';

/**
 * Options for the plan command
 */
export interface PlanCommandOptions extends WorkspaceCommandOptions {
  refresh?: boolean;
}

/**
 * Recorded state, or a refreshed view of it when requested.
 */
export async function planningRecords(
  workspace: Workspace,
  refresh: boolean,
  output: OutputFormatter
): Promise<StateRecord[]> {
  const records = await workspace.store.list();
  if (!refresh || records.length === 0) {
    return records;
  }

  output.info('Refreshing recorded resources...');
  const result = await refreshRecords(records, {
    registry: workspace.registry,
    concurrency: workspace.config.settings.concurrency,
    retry: retryConfig(workspace.config.settings),
  });
  for (const id of result.removed) {
    output.warning(`${id} no longer exists and will be planned again`);
  }
  return result.records;
}

/**
 * Execute the plan command.
 *
 * @param file - Path to the declaration file
 * @param options - Command options
 */
export async function planCommand(
  file: string,
  options: PlanCommandOptions
): Promise<void> {
  const output = createOutput('plan', options);

  try {
    const workspace = await loadWorkspace(file, options, output);
    const records = await planningRecords(workspace, options.refresh ?? false, output);
    const plan = computePlan(workspace.graph, records, workspace.config.workspace.name);

    output.newline();
    output.plan(plan);
    if (hasChanges(plan)) {
      output.info(`Run \`vmforge apply ${file}\` to apply.`);
    }

    output.flush();
    process.exit(0);
  } catch (error) {
    handleError(output, error);
  }
}
