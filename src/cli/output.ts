/**
 * CLI Output Layer
 *
 * Provides consistent output formatting for CLI commands in both
 * human-readable and JSON modes.
 */

import type { ErrorCode, VmforgeError } from '../core/errors.js';
import { SENSITIVE_PLACEHOLDER, displayValue, type EvaluatedOutput } from '../core/outputs.js';
import { describeOperation, getOperationSymbol } from '../core/reconciler.js';
import { formatPlanSummary } from '../core/planner.js';
import { UNKNOWN_VALUE } from '../core/references.js';
import type {
  ExecutionReport,
  JsonObject,
  JsonValue,
  Operation,
  OperationKind,
  OperationStatus,
  Plan,
} from '../core/types.js';
import { formatJsonValue } from '../lib/json.js';
import type { StateRecord } from '../state/types.js';

// =============================================================================
// Output Types
// =============================================================================

/**
 * Standard output format for --json mode
 */
export interface CommandResult {
  success: boolean;
  command: string;
  workspace?: string;
  operations?: OperationOutput[];
  outputs?: Record<string, JsonValue>;
  resources?: ResourceOutput[];
  error?: ErrorOutput;
  summary?: Record<string, number>;
}

/**
 * One planned or executed operation
 */
export interface OperationOutput {
  kind: OperationKind;
  resource: string;
  type: string;
  status?: OperationStatus;
  changed?: string[];
  error?: string;
  skipReason?: string;
  attempts?: number;
  durationMs?: number;
}

/**
 * Recorded resource for state output
 */
export interface ResourceOutput {
  id: string;
  type: string;
  providerId: string;
  updatedAt: string;
}

/**
 * Error output format for JSON mode
 */
export interface ErrorOutput {
  code: ErrorCode | string;
  message: string;
  suggestion?: string;
  details?: Record<string, unknown>;
}

// =============================================================================
// OutputFormatter Class
// =============================================================================

/**
 * Output mode for the formatter
 */
export type OutputMode = 'human' | 'json';

/**
 * Attribute values for display: sensitive ones masked, unknown ones kept
 * as the placeholder.
 */
export function maskAttributes(
  attributes: Readonly<JsonObject> | null,
  sensitive: readonly string[]
): JsonObject {
  const result: JsonObject = {};
  for (const [key, value] of Object.entries(attributes ?? {})) {
    result[key] = sensitive.includes(key) ? SENSITIVE_PLACEHOLDER : value;
  }
  return result;
}

/**
 * CLI-specific output formatter.
 *
 * In JSON mode, output is collected and emitted as a single JSON object
 * at flush.
 */
export class OutputFormatter {
  private mode: OutputMode;
  private result: CommandResult;
  private indentLevel: number = 0;

  constructor(command: string, options: { json?: boolean } = {}) {
    this.mode = options.json ? 'json' : 'human';
    this.result = {
      success: true,
      command,
    };
  }

  getMode(): OutputMode {
    return this.mode;
  }

  isJson(): boolean {
    return this.mode === 'json';
  }

  // ===========================================================================
  // Indentation
  // ===========================================================================

  indent(): void {
    this.indentLevel++;
  }

  dedent(): void {
    if (this.indentLevel > 0) {
      this.indentLevel--;
    }
  }

  private getIndent(): string {
    return '  '.repeat(this.indentLevel);
  }

  // ===========================================================================
  // Basic Output Methods
  // ===========================================================================

  success(message: string): void {
    if (this.mode === 'human') {
      console.log(`${this.getIndent()}✓ ${message}`);
    }
  }

  /**
   * Print an error message and mark the result failed.
   */
  error(message: string, error?: VmforgeError, problems?: readonly string[]): void {
    this.result.success = false;

    if (this.mode === 'human') {
      console.error(`${this.getIndent()}✗ ${message}`);
      for (const problem of problems ?? []) {
        console.error(`${this.getIndent()}  - ${problem}`);
      }
      if (error?.suggestion) {
        console.error(`${this.getIndent()}  Fix: ${error.suggestion}`);
      }
    }

    this.result.error = {
      code: error?.code ?? 'UNKNOWN',
      message,
      suggestion: error?.suggestion,
      details: problems ? { problems: [...problems] } : undefined,
    };
  }

  info(message: string): void {
    if (this.mode === 'human') {
      console.log(`${this.getIndent()}${message}`);
    }
  }

  warning(message: string): void {
    if (this.mode === 'human') {
      console.warn(`${this.getIndent()}⚠ ${message}`);
    }
  }

  newline(): void {
    if (this.mode === 'human') {
      console.log();
    }
  }

  // ===========================================================================
  // Operation Progress
  // ===========================================================================

  operationStart(operation: Operation): void {
    if (this.mode === 'human') {
      console.log(`${this.getIndent()}${getOperationSymbol(operation)} ${this.getVerb(operation.kind)} ${operation.resourceId}...`);
    }
  }

  operationComplete(operation: Operation): void {
    if (this.mode === 'human') {
      console.log(`${this.getIndent()}  ✓ ${operation.resourceId} ${this.getPastTense(operation.kind)}`);
    }
  }

  operationFailed(operation: Operation, errorMessage: string): void {
    if (this.mode === 'human') {
      console.error(`${this.getIndent()}  ✗ ${operation.resourceId} ${operation.kind} failed: ${errorMessage}`);
    }
  }

  operationSkipped(operation: Operation, reason: string): void {
    if (this.mode === 'human') {
      console.log(`${this.getIndent()}  - ${operation.resourceId} skipped: ${reason}`);
    }
  }

  operationRetrying(operation: Operation, detail: string): void {
    if (this.mode === 'human') {
      console.warn(`${this.getIndent()}  ⚠ ${operation.resourceId}: ${detail}`);
    }
  }

  private getVerb(kind: OperationKind): string {
    switch (kind) {
      case 'create':
        return 'Creating';
      case 'update':
        return 'Updating';
      case 'delete':
        return 'Deleting';
      case 'noop':
        return 'Checking';
    }
  }

  private getPastTense(kind: OperationKind): string {
    switch (kind) {
      case 'create':
        return 'created';
      case 'update':
        return 'updated';
      case 'delete':
        return 'deleted';
      case 'noop':
        return 'unchanged';
    }
  }

  // ===========================================================================
  // Table Output
  // ===========================================================================

  /**
   * Print a table of data.
   */
  table(headers: string[], rows: string[][]): void {
    if (this.mode === 'human') {
      const widths = headers.map((h, i) => {
        const maxRowWidth = Math.max(0, ...rows.map((r) => (r[i] ?? '').length));
        return Math.max(h.length, maxRowWidth);
      });

      const headerLine = headers.map((h, i) => h.padEnd(widths[i] ?? 0)).join('  ');
      console.log(`${this.getIndent()}${headerLine}`);

      for (const row of rows) {
        const rowLine = row.map((cell, i) => cell.padEnd(widths[i] ?? 0)).join('  ');
        console.log(`${this.getIndent()}${rowLine}`);
      }
    }
  }

  // ===========================================================================
  // Plan Output
  // ===========================================================================

  /**
   * Print the operations of a plan with their attribute changes.
   * Unchanged resources are counted but not listed.
   */
  plan(plan: Plan): void {
    const changes = plan.operations.filter((op) => op.kind !== 'noop');

    if (this.mode === 'human') {
      if (changes.length === 0) {
        this.info('No changes. Infrastructure matches the declaration.');
      } else {
        for (const op of changes) {
          this.printOperation(op);
        }
        this.newline();
        this.info(formatPlanSummary(plan.summary));
      }
    }

    this.result.workspace = plan.workspace;
    this.result.operations = changes.map((op) => ({
      kind: op.kind,
      resource: op.resourceId,
      type: op.resourceType,
      changed: [...op.changedAttributes],
    }));
    this.result.summary = { ...plan.summary };
  }

  private printOperation(op: Operation): void {
    const sensitive = op.definition?.sensitiveAttributes ?? [];
    console.log(`  ${getOperationSymbol(op)} ${describeOperation(op)}`);

    if (op.kind === 'create') {
      for (const [key, value] of Object.entries(maskAttributes(op.newAttributes, sensitive))) {
        console.log(`      ${key} = ${formatJsonValue(value)}`);
      }
    } else if (op.kind === 'update') {
      const before = maskAttributes(op.oldAttributes, sensitive);
      const after = maskAttributes(op.newAttributes, sensitive);
      for (const key of op.changedAttributes) {
        const from = before[key];
        const to = after[key];
        console.log(
          `      ${key}: ${from === undefined ? '(none)' : formatJsonValue(from)} -> ${to === undefined ? '(none)' : formatJsonValue(to)}`
        );
      }
      for (const dep of op.changedDependencies) {
        console.log(`      (values from ${dep} are ${UNKNOWN_VALUE})`);
      }
    }
  }

  // ===========================================================================
  // Execution Output
  // ===========================================================================

  /**
   * Print the outcome of a plan run.
   */
  execution(report: ExecutionReport): void {
    this.result.operations = report.results
      .filter((r) => r.operation.kind !== 'noop')
      .map((r) => ({
        kind: r.operation.kind,
        resource: r.operation.resourceId,
        type: r.operation.resourceType,
        status: r.status,
        error: r.error,
        skipReason: r.skipReason,
        attempts: r.attempts,
        durationMs: r.durationMs,
      }));
    this.result.summary = { ...report.summary };
    this.result.success = report.success;

    if (this.mode === 'human') {
      this.newline();
      const { applied, failed, skipped } = report.summary;
      const line = `${applied} applied, ${failed} failed, ${skipped} skipped.`;
      if (report.cancelled) {
        this.warning(`Cancelled. ${line}`);
      } else if (report.success) {
        this.info(`Done. ${line}`);
      } else {
        this.error(`Some operations did not apply. ${line}`);
      }
    }
  }

  // ===========================================================================
  // Outputs and State
  // ===========================================================================

  /**
   * Print evaluated outputs. Sensitive values stay masked unless
   * `showSensitive` is set.
   */
  outputs(outputs: readonly EvaluatedOutput[], showSensitive = false): void {
    const values: Record<string, JsonValue> = {};
    for (const output of outputs) {
      values[output.name] = showSensitive ? output.value : displayValue(output);
    }

    if (this.mode === 'human') {
      if (outputs.length === 0) {
        this.info('No outputs declared.');
      }
      for (const output of outputs) {
        const value = values[output.name] ?? null;
        const suffix = output.reason ? `  # ${output.reason}` : '';
        console.log(`${output.name} = ${formatJsonValue(value)}${suffix}`);
      }
    }

    this.result.outputs = values;
  }

  /**
   * Print recorded resources.
   */
  state(workspace: string, records: readonly StateRecord[]): void {
    const resources = records.map((record) => ({
      id: record.id,
      type: record.type,
      providerId: record.providerId,
      updatedAt: record.updatedAt,
    }));

    if (this.mode === 'human') {
      this.info(`Workspace: ${workspace}`);
      this.newline();
      if (resources.length === 0) {
        this.info('No resources recorded.');
      } else {
        this.table(
          ['RESOURCE', 'PROVIDER ID', 'UPDATED'],
          resources.map((r) => [r.id, r.providerId, r.updatedAt])
        );
        this.newline();
        this.info(`${resources.length} resource${resources.length === 1 ? '' : 's'} recorded.`);
      }
    }

    this.result.workspace = workspace;
    this.result.resources = resources;
  }

  // ===========================================================================
  // Validate Output
  // ===========================================================================

  validationSuccess(workspace: string, instances: number, types: string[]): void {
    if (this.mode === 'human') {
      this.success('Configuration valid');
      this.indent();
      this.info(`Workspace: ${workspace}`);
      this.info(`Resources: ${instances} instance${instances === 1 ? '' : 's'} (${types.join(', ')})`);
      this.dedent();
    }

    this.result.workspace = workspace;
    this.result.summary = { resources: instances };
  }

  /**
   * Print schema validation errors.
   */
  validationError(errors: Array<{ path: string; message: string }>): void {
    this.result.success = false;

    if (this.mode === 'human') {
      this.error('Configuration invalid');
      this.newline();
      for (const err of errors) {
        console.log(`  - ${err.path}: ${err.message}`);
      }
    }

    this.result.error = {
      code: 'CONFIG_VALIDATION_FAILED',
      message: 'Configuration validation failed',
      details: { errors },
    };
  }

  // ===========================================================================
  // JSON Output
  // ===========================================================================

  setSuccess(success: boolean): void {
    this.result.success = success;
  }

  getResult(): CommandResult {
    return this.result;
  }

  /**
   * In JSON mode, prints the collected JSON. In human mode output was
   * printed inline.
   */
  flush(): void {
    if (this.mode === 'json') {
      console.log(JSON.stringify(this.result, null, 2));
    }
  }
}

/**
 * Create an OutputFormatter from CLI options.
 */
export function createOutput(
  command: string,
  options: { json?: boolean }
): OutputFormatter {
  return new OutputFormatter(command, options);
}
