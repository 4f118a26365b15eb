/**
 * Configuration Resolver
 *
 * Applies setting defaults, binds variables and resolves paths to produce
 * a fully resolved declaration ready for graph building.
 */

import { resolve } from 'node:path';

import { ConfigError } from '../core/errors.js';
import { computeConfigHash } from '../lib/hash.js';
import { getStateDir } from '../lib/paths.js';
import { loadVarFile, loadYamlFile } from './loader.js';
import { validateConfig } from './validator.js';
import { resolveVariables } from './variables.js';
import type {
  ResolvedConfig,
  ResolvedSettings,
  SettingsConfig,
  VariableInputs,
  VmforgeConfig,
} from './types.js';

/**
 * Default values when not specified in config
 */
export const DEFAULTS = {
  concurrency: 4,
  maxAttempts: 3,
  backoffMs: 500,
  maxBackoffMs: 30_000,
  operationTimeoutMs: 600_000,
  pollIntervalMs: 5_000,
};

/**
 * Apply defaults to the optional settings block.
 *
 * @param settings - Raw settings from YAML
 * @param configPath - Absolute path to the declaration file
 * @param workspaceName - `{project}-{environment}`
 * @param env - Environment for AZURE_SUBSCRIPTION_ID
 */
export function resolveSettings(
  settings: SettingsConfig | undefined,
  configPath: string,
  workspaceName: string,
  env: NodeJS.ProcessEnv = process.env
): ResolvedSettings {
  const backoffMs = settings?.backoff_ms ?? DEFAULTS.backoffMs;

  return {
    concurrency: settings?.concurrency ?? DEFAULTS.concurrency,
    maxAttempts: settings?.max_attempts ?? DEFAULTS.maxAttempts,
    backoffMs,
    maxBackoffMs: Math.max(backoffMs, settings?.max_backoff_ms ?? DEFAULTS.maxBackoffMs),
    operationTimeoutMs: settings?.operation_timeout_ms ?? DEFAULTS.operationTimeoutMs,
    pollIntervalMs: settings?.poll_interval_ms ?? DEFAULTS.pollIntervalMs,
    subscriptionId: settings?.subscription_id ?? env['AZURE_SUBSCRIPTION_ID'] ?? null,
    stateDir: getStateDir(configPath, workspaceName, settings?.state_dir),
  };
}

/**
 * Resolve a validated declaration: settings defaults, variable values, paths.
 *
 * @param config - Validated declaration from YAML
 * @param configPath - Path to the declaration file
 * @param inputs - Variable files, assignments and environment
 * @throws ValidationError if any variable is missing or invalid
 */
export async function resolveConfig(
  config: VmforgeConfig,
  configPath: string,
  inputs: VariableInputs = {}
): Promise<ResolvedConfig> {
  const absoluteConfigPath = resolve(configPath);
  const env = inputs.env ?? process.env;

  const configHash = await computeConfigHash(absoluteConfigPath);

  // Variable files are relative to the working directory, like any CLI path
  const files = await Promise.all(
    (inputs.varFiles ?? []).map((file) => loadVarFile(resolve(file)))
  );

  const variables = resolveVariables(config.variables ?? {}, {
    files,
    assignments: inputs.assignments ?? [],
    env,
  });

  const workspaceName = `${config.workspace.project}-${config.workspace.environment}`;

  return {
    workspace: {
      project: config.workspace.project,
      environment: config.workspace.environment,
      name: workspaceName,
    },
    settings: resolveSettings(config.settings, absoluteConfigPath, workspaceName, env),
    variables,
    resources: config.resources,
    outputs: config.outputs ?? {},
    configPath: absoluteConfigPath,
    configHash,
  };
}

/**
 * Load, validate and resolve a declaration file in one step.
 *
 * @throws ConfigLoadError if the file cannot be read or parsed
 * @throws ConfigError if the document fails schema validation
 * @throws ValidationError if any variable is missing or invalid
 */
export async function loadDeclaration(
  configPath: string,
  inputs: VariableInputs = {}
): Promise<ResolvedConfig> {
  const absoluteConfigPath = resolve(configPath);
  const raw = await loadYamlFile(absoluteConfigPath);
  const result = validateConfig(raw);

  if (!result.valid) {
    throw new ConfigError(
      'Configuration validation failed',
      'CONFIG_VALIDATION_FAILED',
      'Fix the listed fields in the declaration file.',
      absoluteConfigPath,
      result.errors.map((error) => ({ path: error.path, message: error.message }))
    );
  }

  return resolveConfig(result.config, absoluteConfigPath, inputs);
}
