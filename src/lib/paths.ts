/**
 * Path Utilities
 *
 * Provides path expansion and resolution for declaration and state files.
 */

import { homedir } from 'node:os';
import { dirname, isAbsolute, join, resolve } from 'node:path';

/**
 * Name of the per-declaration state directory
 */
export const STATE_DIR_NAME = '.vmforge';

/**
 * Expand a path, resolving ~ to home directory and making relative paths absolute.
 *
 * @param inputPath - Path that may contain ~ or be relative
 * @param basePath - Base directory for resolving relative paths
 * @returns Absolute path with ~ expanded
 */
export function expandPath(inputPath: string, basePath: string): string {
  let expanded = inputPath;

  // Expand ~ to home directory
  if (expanded.startsWith('~')) {
    expanded = join(homedir(), expanded.slice(1));
  }

  // Expand environment variables (Windows-style %VAR% and Unix-style $VAR)
  expanded = expanded.replace(/%([^%]+)%/g, (_, varName: string) => {
    return process.env[varName] ?? '';
  });
  expanded = expanded.replace(
    /\$([A-Za-z_][A-Za-z0-9_]*)/g,
    (_, varName: string) => {
      return process.env[varName] ?? '';
    }
  );

  // Make relative paths absolute relative to the declaration directory
  if (!isAbsolute(expanded)) {
    expanded = resolve(basePath, expanded);
  }

  return expanded;
}

/**
 * Get the state directory for a workspace.
 *
 * @param configPath - Path to the declaration file
 * @param workspace - Workspace name (`{project}-{environment}`)
 * @param stateDir - Optional override from settings.state_dir
 * @returns `<stateDir or <config dir>/.vmforge>/<workspace>`
 */
export function getStateDir(configPath: string, workspace: string, stateDir?: string): string {
  const configDir = dirname(resolve(configPath));
  const root = stateDir
    ? expandPath(stateDir, configDir)
    : join(configDir, STATE_DIR_NAME);
  return join(root, workspace);
}

/**
 * Get the state file path inside a workspace state directory.
 */
export function getStatePath(stateDir: string): string {
  return join(stateDir, 'state.json');
}
