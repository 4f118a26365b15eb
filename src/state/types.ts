/**
 * State Types for vmforge
 *
 * These types represent the persisted state of a workspace: one record per
 * resource instance that has been successfully applied.
 */

import type { JsonObject } from '../core/types.js';

/**
 * Last-applied state of one resource instance.
 *
 * Created on first successful apply, replaced on successful update,
 * removed on successful delete.
 */
export interface StateRecord {
  /** Resource id: `type.name` or `type.name[index]` */
  id: string;
  /** Resource kind */
  type: string;
  /** Provider-assigned identity (ARM resource id) */
  providerId: string;
  /** Resolved input attributes as last applied */
  attributes: JsonObject;
  /** Result attributes returned by the provider */
  outputs: JsonObject;
  /** Resource ids this instance referenced when applied */
  dependencies: string[];
  /** ISO timestamp of creation */
  createdAt: string;
  /** ISO timestamp of last successful apply */
  updatedAt: string;
}

/**
 * Root state file structure persisted as
 * .vmforge/{project}-{environment}/state.json
 */
export interface StateFile {
  /** Schema version for migrations */
  version: 1;
  /** Workspace name the file belongs to */
  workspace: string;
  /** Absolute path to the declaration last applied */
  configPath: string;
  /** Fingerprint of the declaration last applied */
  configHash: string;
  /** Incremented on every write */
  serial: number;
  /** ISO timestamp of first creation */
  createdAt: string;
  /** ISO timestamp of last modification */
  updatedAt: string;
  /** Records keyed by resource id */
  resources: Record<string, StateRecord>;
}

/**
 * Durable key-value store of state records, scoped to one workspace.
 *
 * Operations are atomic per resource id; concurrent writers to different
 * ids are last-writer-wins. Implementations raise StoreUnavailableError
 * when the backing medium cannot be read or written.
 */
export interface StateStore {
  /** Workspace this store is scoped to */
  readonly workspace: string;
  /** Read the baseline. Must succeed before any other call. */
  open(): Promise<void>;
  get(resourceId: string): Promise<StateRecord | undefined>;
  put(resourceId: string, record: StateRecord): Promise<void>;
  delete(resourceId: string): Promise<void>;
  /** All records in insertion order */
  list(): Promise<StateRecord[]>;
  /** Wait for pending writes and release the store */
  close(): Promise<void>;
}
