/**
 * Core Types for vmforge
 *
 * Types for resource definitions, the resource graph, plans and
 * execution reports.
 */

// =============================================================================
// Values
// =============================================================================

/**
 * Any value that survives a JSON round trip
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * A JSON object
 */
export type JsonObject = { [key: string]: JsonValue };

/**
 * Deferred read of another resource's attribute.
 * `path` is the attribute path below the resource (`['id']`, `['ip_address']`).
 */
export interface ReferenceValue {
  kind: 'reference';
  /** Resource id of the referenced instance */
  target: string;
  path: string[];
}

/**
 * Attribute value as declared: a literal or something that depends on
 * other resources and is resolved against state.
 */
export type AttributeValue =
  | { kind: 'literal'; value: JsonValue }
  | ReferenceValue
  | { kind: 'template'; parts: Array<string | ReferenceValue> }
  | { kind: 'list'; items: AttributeValue[] }
  | { kind: 'object'; entries: Record<string, AttributeValue> };

// =============================================================================
// Resource Graph
// =============================================================================

/**
 * One resource instance after count expansion.
 * Immutable for the lifetime of a plan run.
 */
export interface ResourceDefinition {
  /** `type.name` or `type.name[index]` */
  readonly id: string;
  /** Resource kind, e.g. azurerm_linux_virtual_machine */
  readonly type: string;
  /** Declared name */
  readonly name: string;
  /** Replication index for counted resources, null otherwise */
  readonly index: number | null;
  /** Position in declaration order, used for stable tie-breaking */
  readonly order: number;
  readonly attributes: Readonly<Record<string, AttributeValue>>;
  /** Explicit depends_on targets (resource ids) */
  readonly dependsOn: readonly string[];
  /** Top-level attribute names whose value came from a sensitive variable */
  readonly sensitiveAttributes: readonly string[];
}

/**
 * Acyclic graph of resource definitions.
 * Every edge target is a defined resource.
 */
export interface ResourceGraph {
  /** Definitions in declaration order */
  readonly resources: readonly ResourceDefinition[];
  /** Resource id -> ids it references (its dependencies) */
  readonly edges: ReadonlyMap<string, readonly string[]>;
  /** Resource ids with every dependency before its dependents */
  readonly order: readonly string[];
}

// =============================================================================
// Plans
// =============================================================================

/**
 * Kinds of operation the planner can emit
 */
export type OperationKind = 'create' | 'update' | 'delete' | 'noop';

/**
 * A single reconciling step for one resource
 */
export interface Operation {
  readonly kind: OperationKind;
  readonly resourceId: string;
  readonly resourceType: string;
  /** Declared definition; null for deletions */
  readonly definition: ResourceDefinition | null;
  /** Attributes recorded in state, if any */
  readonly oldAttributes: Readonly<JsonObject> | null;
  /** Desired attributes with known references resolved, if any */
  readonly newAttributes: Readonly<JsonObject> | null;
  /** Attribute names that differ, for updates */
  readonly changedAttributes: readonly string[];
  /** Pending resources whose new values this update waits on */
  readonly changedDependencies: readonly string[];
  /** Order key: declaration order, then state order for deletions */
  readonly order: number;
}

/**
 * Operation counts by kind
 */
export interface PlanSummary {
  create: number;
  update: number;
  delete: number;
  noop: number;
}

/**
 * Ordered operations reconciling desired against recorded state.
 * Immutable once computed and consumed exactly once by the executor.
 */
export interface Plan {
  readonly workspace: string;
  /** Operations in topological order */
  readonly operations: readonly Operation[];
  /** Resource id -> resource ids whose operations must finish first */
  readonly dependencies: ReadonlyMap<string, readonly string[]>;
  /** Operations grouped by dependency depth */
  readonly levels: readonly (readonly string[])[];
  readonly summary: Readonly<PlanSummary>;
}

// =============================================================================
// Execution
// =============================================================================

/**
 * Final status of one operation
 */
export type OperationStatus = 'applied' | 'failed' | 'skipped';

/**
 * Result of a single operation execution
 */
export interface OperationResult {
  operation: Operation;
  status: OperationStatus;
  /** Failure reason when failed */
  error?: string;
  /** Why the operation was not attempted, when skipped */
  skipReason?: string;
  /** Failed or skipped predecessor that caused the skip */
  skippedDueTo?: string;
  /** Provider call attempts, 0 for noop and skipped */
  attempts: number;
  durationMs: number;
}

/**
 * Per-operation report of a plan run
 */
export interface ExecutionReport {
  /** Whether every operation applied */
  success: boolean;
  /** Whether dispatch stopped on cancellation */
  cancelled: boolean;
  /** Results in plan order */
  results: OperationResult[];
  summary: {
    applied: number;
    failed: number;
    skipped: number;
  };
}
