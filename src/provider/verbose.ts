/**
 * Verbose Output Helpers
 *
 * Formats az commands for --verbose CLI output. Used by AzCliClient to
 * print commands to stderr before execution.
 */

import type { JsonValue } from '../core/types.js';

/**
 * Prefix for verbose command output lines.
 */
const PREFIX = '[az] ';

/**
 * Indent for continuation lines (matches PREFIX width).
 */
const CONTINUATION_INDENT = '     ';

/**
 * ANSI SGR 90, bright black (gray) foreground.
 */
const ANSI_GRAY = '\x1b[90m';

/**
 * ANSI SGR 0, reset all attributes.
 */
const ANSI_RESET = '\x1b[0m';

/**
 * Body keys whose values never reach the terminal.
 */
const SECRET_KEYS = new Set(['adminPassword', 'customData', 'keyData']);

export const REDACTED = '***';

/**
 * Check whether stderr supports ANSI escape codes.
 */
export function supportsAnsi(): boolean {
  return Boolean(process.stderr.isTTY);
}

/**
 * Copy of a request body with secret values replaced.
 */
export function redactSecrets(value: JsonValue): JsonValue {
  if (Array.isArray(value)) {
    return value.map(redactSecrets);
  }
  if (value !== null && typeof value === 'object') {
    const result: { [key: string]: JsonValue } = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = SECRET_KEYS.has(key) ? REDACTED : redactSecrets(entry);
    }
    return result;
  }
  return value;
}

/**
 * Format an az invocation for verbose output.
 *
 * The first line carries the `[az] ` prefix; a request body follows as
 * indented JSON. Wrapped in ANSI gray when `ansi` is true.
 */
export function formatCommand(
  args: readonly string[],
  body: JsonValue | undefined,
  ansi: boolean
): string {
  let text = `${PREFIX}az ${args.join(' ')}\n`;
  if (body !== undefined) {
    for (const line of JSON.stringify(redactSecrets(body), null, 2).split('\n')) {
      text += `${CONTINUATION_INDENT}${line}\n`;
    }
  }

  const plain = `\n${text}\n`;
  return ansi ? `${ANSI_GRAY}${plain}${ANSI_RESET}` : plain;
}
