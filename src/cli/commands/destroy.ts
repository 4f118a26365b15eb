/**
 * Destroy Command Handler
 *
 * Deletes every resource recorded for the workspace, dependents first.
 * Only resources in the state file are touched.
 */

import { ValidationError } from '../../core/errors.js';
import { computeDestroyPlan } from '../../core/planner.js';
import { createOutput } from '../output.js';
import { runPlan } from './apply.js';
import { handleError, loadWorkspace, type WorkspaceCommandOptions } from './shared.js';

/**
 * Options for the destroy command
 */
export interface DestroyCommandOptions extends WorkspaceCommandOptions {
  yes?: boolean;
  concurrency?: number;
}

/**
 * Execute the destroy command.
 *
 * @param file - Path to the declaration file
 * @param options - Command options
 */
export async function destroyCommand(
  file: string,
  options: DestroyCommandOptions
): Promise<void> {
  const output = createOutput('destroy', options);

  try {
    const workspace = await loadWorkspace(file, options, output);
    const records = await workspace.store.list();

    if (records.length === 0) {
      output.info(`No resources recorded for workspace ${workspace.config.workspace.name}.`);
      output.info('Nothing to destroy.');
      output.flush();
      process.exit(0);
    }

    const plan = computeDestroyPlan(records, workspace.config.workspace.name);
    output.newline();
    output.plan(plan);

    if (!options.yes) {
      throw new ValidationError(
        `Refusing to delete ${records.length} resource(s) without --yes`
      );
    }

    output.newline();
    const report = await runPlan(plan, workspace, options.concurrency, output);
    output.execution(report);

    output.flush();
    process.exit(report.success ? 0 : 2);
  } catch (error) {
    handleError(output, error);
  }
}
