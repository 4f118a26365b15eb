/**
 * Output Command Handler
 *
 * Prints declared outputs evaluated against recorded state.
 */

import { ValidationError } from '../../core/errors.js';
import { evaluateOutputs } from '../../core/outputs.js';
import { createOutput } from '../output.js';
import { handleError, loadWorkspace, type WorkspaceCommandOptions } from './shared.js';

/**
 * Options for the output command
 */
export interface OutputCommandOptions extends WorkspaceCommandOptions {
  showSensitive?: boolean;
}

/**
 * Execute the output command.
 *
 * @param file - Path to the declaration file
 * @param name - Optional single output to print
 * @param options - Command options
 */
export async function outputCommand(
  file: string,
  name: string | undefined,
  options: OutputCommandOptions
): Promise<void> {
  const output = createOutput('output', options);

  try {
    const workspace = await loadWorkspace(file, options, output);
    let outputs = evaluateOutputs(workspace.config, await workspace.store.list());

    if (name !== undefined) {
      outputs = outputs.filter((entry) => entry.name === name);
      if (outputs.length === 0) {
        throw new ValidationError(`Output "${name}" is not declared`);
      }
    }

    output.newline();
    output.outputs(outputs, options.showSensitive ?? false);
    output.flush();
    process.exit(0);
  } catch (error) {
    handleError(output, error);
  }
}
