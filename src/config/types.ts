/**
 * Configuration Types for vmforge
 *
 * These types represent the YAML declaration structure and the resolved
 * configuration with defaults applied and variables bound.
 */

import type { JsonValue } from '../core/types.js';

// =============================================================================
// YAML Input Types
// =============================================================================

/**
 * Root declaration object parsed from a vmforge YAML file
 */
export interface VmforgeConfig {
  workspace: WorkspaceConfig;
  settings?: SettingsConfig;
  variables?: Record<string, VariableConfig>;
  resources: ResourceConfig[];
  outputs?: Record<string, OutputConfig>;
}

/**
 * Workspace identification. The pair scopes the state store.
 */
export interface WorkspaceConfig {
  /** 1-32 chars, lowercase alphanumeric + hyphen */
  project: string;
  /** 1-16 chars, lowercase alphanumeric + hyphen */
  environment: string;
}

/**
 * Optional engine settings
 */
export interface SettingsConfig {
  /** Parallel provider operations. Default: 4 */
  concurrency?: number;
  /** Attempts per operation for transient errors. Default: 3 */
  max_attempts?: number;
  /** First retry delay in ms, doubled per attempt. Default: 500 */
  backoff_ms?: number;
  /** Retry delay ceiling in ms. Default: 30000 */
  max_backoff_ms?: number;
  /** Per-attempt provider call timeout in ms. Default: 600000 */
  operation_timeout_ms?: number;
  /** Interval between provisioning-state polls in ms. Default: 5000 */
  poll_interval_ms?: number;
  /** Azure subscription. Default: $AZURE_SUBSCRIPTION_ID */
  subscription_id?: string;
  /** State directory. Default: .vmforge next to the declaration */
  state_dir?: string;
}

/**
 * Supported variable types
 */
export type VariableType = 'string' | 'number' | 'bool' | 'list' | 'map';

/**
 * A single validation predicate with an optional custom message
 */
export interface ValidationRule {
  allowed?: JsonValue[];
  min?: number;
  max?: number;
  integer?: boolean;
  pattern?: string;
  min_length?: number;
  max_length?: number;
  message?: string;
}

/**
 * Input variable declaration
 */
export interface VariableConfig {
  type: VariableType;
  default?: JsonValue;
  description?: string;
  /** Suppress the value in plan and output displays */
  sensitive?: boolean;
  validation?: ValidationRule[];
}

/**
 * Resource declaration, before count expansion
 */
export interface ResourceConfig {
  type: string;
  name: string;
  /** Integer or an expression such as "${var.vm_count}" */
  count?: number | string;
  depends_on?: string[];
  attributes: Record<string, JsonValue>;
}

/**
 * Named output over resource attributes or variables
 */
export interface OutputConfig {
  value: JsonValue;
  description?: string;
  sensitive?: boolean;
}

// =============================================================================
// Resolved Types
// =============================================================================

/**
 * Variable with its final value bound
 */
export interface ResolvedVariable {
  name: string;
  type: VariableType;
  value: JsonValue;
  sensitive: boolean;
}

/**
 * Settings with all defaults applied
 */
export interface ResolvedSettings {
  concurrency: number;
  maxAttempts: number;
  backoffMs: number;
  maxBackoffMs: number;
  operationTimeoutMs: number;
  pollIntervalMs: number;
  /** Null when neither the declaration nor the environment names one */
  subscriptionId: string | null;
  /** Absolute state directory for this workspace */
  stateDir: string;
}

/**
 * Fully resolved declaration ready for graph building
 */
export interface ResolvedConfig {
  workspace: {
    project: string;
    environment: string;
    /** `{project}-{environment}` */
    name: string;
  };
  settings: ResolvedSettings;
  variables: Record<string, ResolvedVariable>;
  resources: ResourceConfig[];
  outputs: Record<string, OutputConfig>;
  /** Absolute path to the YAML declaration */
  configPath: string;
  /** SHA256 hash of the declaration content (first 8 chars) */
  configHash: string;
}

/**
 * Variable value sources supplied on the command line or by callers
 */
export interface VariableInputs {
  /** Paths to JSON or YAML files holding name -> value mappings */
  varFiles?: string[];
  /** `name=value` assignments */
  assignments?: string[];
  /** Environment to read VMFORGE_VAR_<name> from. Default: process.env */
  env?: NodeJS.ProcessEnv;
}
