/**
 * Hash Utilities
 *
 * Short SHA256 fingerprints for declaration files. The state file records
 * the fingerprint of the declaration it was last applied from.
 */

import { createHash } from 'node:crypto';
import { readFile } from 'node:fs/promises';

/**
 * Fingerprint a string: first 8 hex characters of its SHA256.
 */
export function shortHash(content: string): string {
  return createHash('sha256').update(content).digest('hex').slice(0, 8);
}

/**
 * Fingerprint a declaration file's content.
 */
export async function computeConfigHash(filePath: string): Promise<string> {
  return shortHash(await readFile(filePath, 'utf-8'));
}
