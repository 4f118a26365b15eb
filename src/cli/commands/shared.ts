/**
 * Shared plumbing for command handlers: loading a workspace, progress
 * reporting and error exits.
 */

import { InvalidArgumentError } from 'commander';

import { ConfigLoadError } from '../../config/loader.js';
import { loadDeclaration } from '../../config/resolver.js';
import type { ResolvedConfig, ResolvedSettings } from '../../config/types.js';
import { ConfigError, getExitCode, isVmforgeError, ValidationError } from '../../core/errors.js';
import { buildResourceGraph } from '../../core/graph.js';
import type { OperationProgressCallback } from '../../core/reconciler.js';
import type { RetryConfig } from '../../core/retry.js';
import type { ResourceGraph } from '../../core/types.js';
import { getStatePath } from '../../lib/paths.js';
import { AzCliClient } from '../../provider/azcli.js';
import { createAzureRegistry } from '../../provider/azure/index.js';
import type { ProviderRegistry } from '../../provider/registry.js';
import { FileStateStore } from '../../state/manager.js';
import type { OutputFormatter } from '../output.js';

/**
 * Options every workspace command accepts
 */
export interface WorkspaceCommandOptions {
  json?: boolean;
  verbose?: boolean;
  varFile?: string[];
  var?: string[];
}

/**
 * Everything a command needs to plan or apply
 */
export interface Workspace {
  config: ResolvedConfig;
  graph: ResourceGraph;
  registry: ProviderRegistry;
  store: FileStateStore;
}

/**
 * Commander reducer for repeatable options.
 */
export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Commander parser for --concurrency.
 */
export function parseConcurrency(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1 || parsed > 64) {
    throw new InvalidArgumentError('Must be an integer between 1 and 64.');
  }
  return parsed;
}

/**
 * Load the declaration, build and check its graph, and open its state.
 *
 * Nothing here calls the provider: unknown resource types, missing
 * attributes and bad references all fail before any change is made.
 */
export async function loadWorkspace(
  file: string,
  options: WorkspaceCommandOptions,
  output: OutputFormatter
): Promise<Workspace> {
  output.info(`Loading configuration: ${file}`);
  const config = await loadDeclaration(file, {
    varFiles: options.varFile ?? [],
    assignments: options.var ?? [],
  });

  const graph = buildResourceGraph(config);
  const registry = createAzureRegistry({
    client: new AzCliClient({ verbose: options.verbose }),
    subscriptionId: config.settings.subscriptionId,
    pollIntervalMs: config.settings.pollIntervalMs,
  });
  registry.validateDefinitions(graph);
  output.success(`Configuration validated (workspace ${config.workspace.name})`);

  const store = new FileStateStore({
    statePath: getStatePath(config.settings.stateDir),
    workspace: config.workspace.name,
    configPath: config.configPath,
    configHash: config.configHash,
  });
  await store.open();

  return { config, graph, registry, store };
}

/**
 * Retry settings for the executor and refresh.
 */
export function retryConfig(settings: ResolvedSettings): RetryConfig {
  return {
    attempts: settings.maxAttempts,
    minDelayMs: settings.backoffMs,
    maxDelayMs: settings.maxBackoffMs,
  };
}

/**
 * Route executor progress to the formatter.
 */
export function progressReporter(output: OutputFormatter): OperationProgressCallback {
  return (operation, status, detail) => {
    switch (status) {
      case 'starting':
        output.operationStart(operation);
        break;
      case 'completed':
        output.operationComplete(operation);
        break;
      case 'failed':
        output.operationFailed(operation, detail ?? 'Unknown error');
        break;
      case 'skipped':
        output.operationSkipped(operation, detail ?? 'skipped');
        break;
      case 'retrying':
        output.operationRetrying(operation, detail ?? 'retrying');
        break;
    }
  };
}

/**
 * Report an error and exit with its exit code.
 */
export function handleError(output: OutputFormatter, error: unknown): never {
  let exitCode = getExitCode(error);

  if (error instanceof ConfigLoadError) {
    const configError = new ConfigError(
      error.message,
      error.message.startsWith('Invalid YAML') ? 'CONFIG_INVALID_YAML' : 'CONFIG_NOT_FOUND',
      'Ensure the file exists, is readable and is valid YAML or JSON.',
      error.filePath
    );
    output.error(configError.message, configError);
    exitCode = configError.exitCode;
  } else if (error instanceof ConfigError && error.validationErrors) {
    output.validationError(error.validationErrors);
  } else if (error instanceof ValidationError) {
    output.error(error.message, error, error.problems.length > 1 ? error.problems : undefined);
  } else if (isVmforgeError(error)) {
    output.error(error.message, error);
  } else if (error instanceof Error) {
    output.error(error.message);
  } else {
    output.error(String(error));
  }

  output.flush();
  process.exit(exitCode);
}
