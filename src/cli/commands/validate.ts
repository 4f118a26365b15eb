/**
 * Validate Command Handler
 *
 * Checks a declaration without touching state or the provider: schema,
 * variables, references, cycles and resource attributes.
 */

import { loadDeclaration } from '../../config/resolver.js';
import { buildResourceGraph } from '../../core/graph.js';
import { AzCliClient } from '../../provider/azcli.js';
import { createAzureRegistry } from '../../provider/azure/index.js';
import { createOutput } from '../output.js';
import { handleError, type WorkspaceCommandOptions } from './shared.js';

export type ValidateCommandOptions = WorkspaceCommandOptions;

/**
 * Execute the validate command.
 *
 * @param file - Path to the declaration file
 * @param options - Command options
 */
export async function validateCommand(
  file: string,
  options: ValidateCommandOptions
): Promise<void> {
  const output = createOutput('validate', options);

  try {
    output.info(`Validating configuration: ${file}`);

    const config = await loadDeclaration(file, {
      varFiles: options.varFile ?? [],
      assignments: options.var ?? [],
    });
    const graph = buildResourceGraph(config);
    // The registry only checks schemas here; nothing is sent to Azure
    createAzureRegistry({ client: new AzCliClient(), subscriptionId: null }).validateDefinitions(graph);

    const types = [...new Set(graph.resources.map((resource) => resource.type))];
    output.validationSuccess(config.workspace.name, graph.resources.length, types);

    if (!config.settings.subscriptionId) {
      output.newline();
      output.warning('No subscription configured; set settings.subscription_id or AZURE_SUBSCRIPTION_ID before apply.');
    }

    output.flush();
    process.exit(0);
  } catch (error) {
    handleError(output, error);
  }
}
