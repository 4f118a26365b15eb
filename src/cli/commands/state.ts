/**
 * State Command Handler
 *
 * Lists the resources recorded for a workspace.
 */

import { createOutput } from '../output.js';
import { handleError, loadWorkspace, type WorkspaceCommandOptions } from './shared.js';

export type StateCommandOptions = WorkspaceCommandOptions;

/**
 * Execute the state command.
 *
 * @param file - Path to the declaration file
 * @param options - Command options
 */
export async function stateCommand(
  file: string,
  options: StateCommandOptions
): Promise<void> {
  const output = createOutput('state', options);

  try {
    const workspace = await loadWorkspace(file, options, output);
    output.info(`State file: ${workspace.store.getStatePath()}`);
    output.newline();
    output.state(workspace.config.workspace.name, await workspace.store.list());
    output.flush();
    process.exit(0);
  } catch (error) {
    handleError(output, error);
  }
}
