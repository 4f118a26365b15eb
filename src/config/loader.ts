/**
 * Configuration Loader
 *
 * Loads YAML declaration files and variable-value files from the filesystem.
 */

import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import yaml from 'js-yaml';

/**
 * Error thrown when configuration loading fails
 */
export class ConfigLoadError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public override readonly cause?: Error
  ) {
    super(message);
    this.name = 'ConfigLoadError';
  }
}

async function readText(filePath: string, label: string): Promise<string> {
  try {
    return await readFile(filePath, 'utf-8');
  } catch (error) {
    const err = error as NodeJS.ErrnoException;
    if (err.code === 'ENOENT') {
      throw new ConfigLoadError(`${label} not found: ${filePath}`, filePath, err);
    }
    if (err.code === 'EACCES') {
      throw new ConfigLoadError(
        `Permission denied reading ${label.toLowerCase()}: ${filePath}`,
        filePath,
        err
      );
    }
    throw new ConfigLoadError(
      `Failed to read ${label.toLowerCase()}: ${filePath}`,
      filePath,
      err
    );
  }
}

/**
 * Load and parse a YAML declaration file.
 *
 * @returns Parsed YAML content as unknown (requires validation)
 * @throws ConfigLoadError if the file cannot be read or parsed
 */
export async function loadYamlFile(filePath: string): Promise<unknown> {
  const content = await readText(filePath, 'Configuration file');

  try {
    return yaml.load(content);
  } catch (error) {
    const err = error as yaml.YAMLException;
    throw new ConfigLoadError(
      `Invalid YAML syntax in ${filePath}: ${err.message}`,
      filePath,
      err
    );
  }
}

/**
 * Load a variable-values file. `.json` files are parsed as JSON,
 * anything else as YAML. The document must be a mapping.
 *
 * @throws ConfigLoadError if the file cannot be read, parsed, or is not a mapping
 */
export async function loadVarFile(filePath: string): Promise<Record<string, unknown>> {
  const content = await readText(filePath, 'Variable file');

  let parsed: unknown;
  try {
    parsed = extname(filePath).toLowerCase() === '.json'
      ? JSON.parse(content)
      : yaml.load(content);
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    throw new ConfigLoadError(
      `Invalid syntax in variable file ${filePath}: ${err.message}`,
      filePath,
      err
    );
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new ConfigLoadError(
      `Variable file must contain a mapping of names to values: ${filePath}`,
      filePath
    );
  }
  return { ...parsed };
}
