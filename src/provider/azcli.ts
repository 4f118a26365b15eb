/**
 * Azure CLI Transport
 *
 * Spawns `az rest` to call Azure Resource Manager and parses JSON
 * responses. Relies on the caller's existing `az login` session.
 */

import { spawn } from 'node:child_process';

import {
  PermanentProviderError,
  TransientProviderError,
  type ProviderErrorCode,
} from '../core/errors.js';
import type { JsonObject } from '../core/types.js';
import { isJsonObject } from '../lib/json.js';
import { armUrl, type ArmClient, type ArmRequest } from './arm.js';
import { formatCommand, supportsAnsi } from './verbose.js';

/**
 * Failure category derived from az stderr
 */
export interface ArmErrorClass {
  code: ProviderErrorCode;
  transient: boolean;
}

const CLASSIFIERS: ReadonlyArray<{ pattern: RegExp } & ArmErrorClass> = [
  { pattern: /too many requests|throttl|\b429\b|RetryableError/i, code: 'THROTTLED', transient: true },
  { pattern: /AnotherOperationInProgress|OperationNotAllowed.*in progress/i, code: 'CONFLICT', transient: true },
  { pattern: /timed? ?out|GatewayTimeout|\b504\b/i, code: 'TIMEOUT', transient: true },
  {
    pattern: /ECONNRESET|ECONNREFUSED|ENOTFOUND|connection (aborted|reset|refused|error)|max retries exceeded|name resolution/i,
    code: 'CONNECTION',
    transient: true,
  },
  {
    pattern: /internal server error|service unavailable|bad gateway|InternalServerError|ServiceUnavailable|\b50[0-3]\b/i,
    code: 'SERVER_ERROR',
    transient: true,
  },
  { pattern: /not ?found|\b404\b/i, code: 'NOT_FOUND', transient: false },
  {
    pattern: /unauthorized|forbidden|AuthorizationFailed|InvalidAuthenticationToken|az login|\b40[13]\b/i,
    code: 'UNAUTHORIZED',
    transient: false,
  },
  { pattern: /conflict|\b409\b/i, code: 'CONFLICT', transient: false },
  { pattern: /bad request|\b400\b|Invalid[A-Z]\w*|validation/i, code: 'INVALID_REQUEST', transient: false },
];

/**
 * Classify an az rest failure from its stderr.
 */
export function classifyArmError(stderr: string): ArmErrorClass {
  for (const { pattern, code, transient } of CLASSIFIERS) {
    if (pattern.test(stderr)) {
      return { code, transient };
    }
  }
  return { code: 'EXECUTION_FAILED', transient: false };
}

/**
 * Strip ANSI escape codes and carriage returns.
 */
function stripAnsiCodes(str: string): string {
  // eslint-disable-next-line no-control-regex
  return str.replace(/\x1b\[[0-9;]*[a-zA-Z]/g, '').replace(/\r/g, '');
}

/**
 * `Code: message` from an ARM error body embedded in az output, if any.
 */
function armErrorFromBody(text: string): string | null {
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start === -1 || end < start) {
    return null;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(text.slice(start, end + 1));
  } catch {
    return null;
  }
  const error = isJsonObject(parsed) ? parsed['error'] : undefined;
  if (!isJsonObject(error) || typeof error['message'] !== 'string') {
    return null;
  }
  return typeof error['code'] === 'string' ? `${error['code']}: ${error['message']}` : error['message'];
}

/**
 * Most informative line of az stderr. ARM error bodies embedded in the
 * output are reduced to `Code: message`.
 */
export function extractErrorMessage(stderr: string, exitCode: number | null): string {
  const clean = stripAnsiCodes(stderr).trim();

  const fromBody = armErrorFromBody(clean);
  if (fromBody) {
    return fromBody;
  }

  const lines = clean
    .split('\n')
    .map((line) => line.replace(/^ERROR:\s*/, '').trim())
    .filter(Boolean);
  if (lines.length > 0) {
    return lines.slice(0, 3).join(' | ');
  }
  return `az exited with code ${exitCode}`;
}

/**
 * Options for constructing an AzCliClient
 */
export interface AzCliClientOptions {
  /** Path to the az executable (default: 'az') */
  azPath?: string;
  /** Print commands to stderr before execution (default: false) */
  verbose?: boolean;
  /** Kill az after this many milliseconds (default: 120000) */
  timeout?: number;
}

/**
 * ARM client that shells out to `az rest`.
 */
export class AzCliClient implements ArmClient {
  private readonly azPath: string;
  private readonly verbose: boolean;
  private readonly timeout: number;

  constructor(options?: AzCliClientOptions) {
    this.azPath = options?.azPath ?? 'az';
    this.verbose = options?.verbose ?? false;
    this.timeout = options?.timeout ?? 120000;
  }

  /**
   * Arguments for one az rest invocation.
   */
  buildArgs(request: ArmRequest): string[] {
    const args = [
      'rest',
      '--method',
      request.method.toLowerCase(),
      '--url',
      armUrl(request.path, request.apiVersion),
      '--output',
      'json',
    ];
    if (request.body !== undefined) {
      args.push('--headers', 'Content-Type=application/json', '--body', JSON.stringify(request.body));
    }
    return args;
  }

  /**
   * Execute one ARM request.
   *
   * @throws TransientProviderError for throttling, timeouts, 5xx and connection failures
   * @throws PermanentProviderError for everything else (NOT_FOUND when the resource is missing)
   */
  async request(request: ArmRequest): Promise<JsonObject | null> {
    const args = this.buildArgs(request);

    if (this.verbose) {
      const shown = args.filter((_, i) => args[i - 1] !== '--body');
      process.stderr.write(formatCommand(shown, request.body, supportsAnsi()));
    }

    return new Promise<JsonObject | null>((resolve, reject) => {
      const az = spawn(this.azPath, args, { signal: request.signal });

      let stdout = '';
      let stderr = '';
      let killed = false;

      const timeoutId = setTimeout(() => {
        killed = true;
        az.kill('SIGTERM');
        reject(
          new TransientProviderError(
            `az rest timed out after ${this.timeout}ms`,
            'TIMEOUT',
            stderr
          )
        );
      }, this.timeout);

      az.stdout.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      az.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      az.on('error', (error: NodeJS.ErrnoException) => {
        clearTimeout(timeoutId);
        if (killed) return;
        killed = true;
        if (error.name === 'AbortError') {
          reject(new TransientProviderError('az rest aborted', 'TIMEOUT', stderr));
          return;
        }
        reject(
          new PermanentProviderError(
            error.code === 'ENOENT'
              ? `Azure CLI not found at "${this.azPath}"; install it and run "az login"`
              : `Failed to spawn az: ${error.message}`,
            'CLI_NOT_AVAILABLE',
            stderr
          )
        );
      });

      az.on('close', (code: number | null) => {
        clearTimeout(timeoutId);
        if (killed) return;

        if (code !== 0) {
          const { code: providerCode, transient } = classifyArmError(stderr);
          const message = extractErrorMessage(stderr, code);
          reject(
            transient
              ? new TransientProviderError(message, providerCode, stderr)
              : new PermanentProviderError(message, providerCode, stderr)
          );
          return;
        }

        // DELETE and some PUTs return no body
        const trimmedOutput = stdout.trim();
        if (trimmedOutput === '' || trimmedOutput === 'null') {
          resolve(null);
          return;
        }

        try {
          const parsed: unknown = JSON.parse(trimmedOutput);
          resolve(isJsonObject(parsed) ? parsed : null);
        } catch {
          reject(
            new PermanentProviderError(
              `Invalid JSON response from az: ${trimmedOutput.slice(0, 200)}`,
              'EXECUTION_FAILED',
              stderr
            )
          );
        }
      });
    });
  }
}
