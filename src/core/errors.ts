/**
 * Error Types for vmforge
 *
 * Custom error classes with error codes for structured error handling.
 * Validation and graph errors abort a run before any provider call;
 * provider errors are scoped to the operation that raised them.
 */

/**
 * Error codes for all vmforge errors
 */
export type ErrorCode =
  | 'CONFIG_NOT_FOUND'
  | 'CONFIG_INVALID_YAML'
  | 'CONFIG_VALIDATION_FAILED'
  | 'VALIDATION_FAILED'
  | 'GRAPH_CYCLE'
  | 'UNRESOLVED_REFERENCE'
  | 'STORE_UNAVAILABLE'
  | 'PROVIDER_TRANSIENT'
  | 'PROVIDER_PERMANENT'
  | 'OPERATION_FAILED';

/**
 * Mapping of error codes to exit codes
 */
export const EXIT_CODES: Record<ErrorCode, number> = {
  CONFIG_NOT_FOUND: 1,
  CONFIG_INVALID_YAML: 1,
  CONFIG_VALIDATION_FAILED: 1,
  VALIDATION_FAILED: 1,
  GRAPH_CYCLE: 1,
  UNRESOLVED_REFERENCE: 1,
  STORE_UNAVAILABLE: 2,
  PROVIDER_TRANSIENT: 2,
  PROVIDER_PERMANENT: 2,
  OPERATION_FAILED: 2,
};

/**
 * Base error class for all vmforge errors.
 *
 * Provides structured error information with codes and suggestions.
 */
export class VmforgeError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly suggestion?: string
  ) {
    super(message);
    this.name = 'VmforgeError';
    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, VmforgeError.prototype);
  }

  /**
   * Get the exit code for this error.
   */
  get exitCode(): number {
    return EXIT_CODES[this.code];
  }

  /**
   * Format the error for display.
   */
  format(): string {
    let output = `Error: ${this.message}`;
    if (this.suggestion) {
      output += `\n\nFix: ${this.suggestion}`;
    }
    return output;
  }
}

/**
 * Error for declaration file issues (missing file, bad YAML, schema violations).
 */
export class ConfigError extends VmforgeError {
  constructor(
    message: string,
    code: 'CONFIG_NOT_FOUND' | 'CONFIG_INVALID_YAML' | 'CONFIG_VALIDATION_FAILED',
    suggestion?: string,
    public readonly path?: string,
    public readonly validationErrors?: Array<{
      path: string;
      message: string;
    }>
  ) {
    super(message, code, suggestion);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }

  override format(): string {
    let output = super.format();
    if (this.validationErrors && this.validationErrors.length > 0) {
      output += '\n\nValidation errors:';
      for (const error of this.validationErrors) {
        output += `\n  - ${error.path}: ${error.message}`;
      }
    }
    return output;
  }
}

/**
 * Bad input shape or a failed constraint: variable values, validation
 * rules, counts, resource attributes against the provider schema.
 */
export class ValidationError extends VmforgeError {
  constructor(
    message: string,
    public readonly problems: string[] = [message]
  ) {
    super(message, 'VALIDATION_FAILED', 'Correct the listed values and run again.');
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, ValidationError.prototype);
  }

  override format(): string {
    let output = `Error: ${this.message}`;
    if (this.problems.length > 1 || this.problems[0] !== this.message) {
      for (const problem of this.problems) {
        output += `\n  - ${problem}`;
      }
    }
    return output;
  }
}

/**
 * The resource graph contains a reference cycle.
 */
export class CycleError extends VmforgeError {
  constructor(public readonly cycle: string[]) {
    super(
      `Reference cycle detected: ${cycle.join(' -> ')}`,
      'GRAPH_CYCLE',
      'Break the cycle by removing one of the references or depends_on entries.'
    );
    this.name = 'CycleError';
    Object.setPrototypeOf(this, CycleError.prototype);
  }
}

/**
 * A reference names a resource (or instance) that is not declared.
 */
export class UnresolvedReferenceError extends VmforgeError {
  constructor(
    message: string,
    public readonly from: string,
    public readonly target: string
  ) {
    super(message, 'UNRESOLVED_REFERENCE');
    this.name = 'UnresolvedReferenceError';
    Object.setPrototypeOf(this, UnresolvedReferenceError.prototype);
  }
}

/**
 * The state backend cannot be read or written. Fatal for the whole run.
 */
export class StoreUnavailableError extends VmforgeError {
  constructor(
    message: string,
    public readonly statePath?: string,
    public readonly originalError?: unknown
  ) {
    super(
      message,
      'STORE_UNAVAILABLE',
      'Check that the state file is readable, valid JSON and belongs to this workspace.'
    );
    this.name = 'StoreUnavailableError';
    Object.setPrototypeOf(this, StoreUnavailableError.prototype);
  }
}

/**
 * Provider-side failure categories reported by the ARM transport
 */
export type ProviderErrorCode =
  | 'THROTTLED'
  | 'TIMEOUT'
  | 'SERVER_ERROR'
  | 'CONNECTION'
  | 'NOT_FOUND'
  | 'INVALID_REQUEST'
  | 'UNAUTHORIZED'
  | 'CONFLICT'
  | 'PROVISIONING_FAILED'
  | 'CLI_NOT_AVAILABLE'
  | 'EXECUTION_FAILED';

/**
 * A provider call failed in a way that is worth retrying
 * (rate limiting, timeouts, 5xx responses, dropped connections).
 */
export class TransientProviderError extends VmforgeError {
  constructor(
    message: string,
    public readonly providerCode: ProviderErrorCode,
    public readonly detail?: string
  ) {
    super(message, 'PROVIDER_TRANSIENT');
    this.name = 'TransientProviderError';
    Object.setPrototypeOf(this, TransientProviderError.prototype);
  }
}

/**
 * A provider call failed and retrying will not help
 * (invalid configuration, authorization, missing parent resources).
 */
export class PermanentProviderError extends VmforgeError {
  constructor(
    message: string,
    public readonly providerCode: ProviderErrorCode,
    public readonly detail?: string
  ) {
    super(message, 'PROVIDER_PERMANENT');
    this.name = 'PermanentProviderError';
    Object.setPrototypeOf(this, PermanentProviderError.prototype);
  }
}

/**
 * Check if an error is a VmforgeError.
 */
export function isVmforgeError(error: unknown): error is VmforgeError {
  return error instanceof VmforgeError;
}

/**
 * Whether an error should be retried by the plan executor.
 */
export function isTransientError(error: unknown): boolean {
  return error instanceof TransientProviderError;
}

/**
 * Whether an error means the remote resource does not exist.
 */
export function isNotFoundError(error: unknown): boolean {
  return (
    (error instanceof PermanentProviderError ||
      error instanceof TransientProviderError) &&
    error.providerCode === 'NOT_FOUND'
  );
}

/**
 * Get a display message for any thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Get the exit code for any error.
 */
export function getExitCode(error: unknown): number {
  if (isVmforgeError(error)) {
    return error.exitCode;
  }
  // Default to system error for unknown errors
  return 2;
}
