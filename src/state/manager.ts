/**
 * File State Store
 *
 * Persists the state of one workspace as a JSON file.
 * Uses atomic writes to prevent corruption from interrupted saves.
 */

import { mkdir, readFile, rename, stat, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import { StoreUnavailableError } from '../core/errors.js';
import { isJsonObject } from '../lib/json.js';
import type { StateFile, StateRecord, StateStore } from './types.js';

/**
 * Options for a FileStateStore
 */
export interface FileStateStoreOptions {
  /** Absolute path to state.json */
  statePath: string;
  /** Workspace the file must belong to */
  workspace: string;
  /** Declaration path recorded in the file */
  configPath: string;
  /** Declaration fingerprint recorded in the file */
  configHash: string;
}

/**
 * State store backed by a JSON file.
 *
 * A missing file is an empty workspace; the file is created on the first
 * write. All writes are atomic (write to temp, then rename) and go through
 * a single-writer queue, so concurrent puts never interleave on disk.
 */
export class FileStateStore implements StateStore {
  readonly workspace: string;
  private readonly statePath: string;
  private readonly configPath: string;
  private readonly configHash: string;
  private state: StateFile | null = null;
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(options: FileStateStoreOptions) {
    this.workspace = options.workspace;
    this.statePath = options.statePath;
    this.configPath = options.configPath;
    this.configHash = options.configHash;
  }

  /**
   * Check if a state file exists for this workspace.
   */
  async exists(): Promise<boolean> {
    try {
      await stat(this.statePath);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Load state from disk.
   *
   * @throws StoreUnavailableError if the file cannot be read, is not valid
   *   JSON, has an unknown version or belongs to another workspace
   */
  async open(): Promise<void> {
    let content: string;
    try {
      content = await readFile(this.statePath, 'utf-8');
    } catch (error) {
      const err = error as NodeJS.ErrnoException;
      if (err.code === 'ENOENT') {
        this.state = this.emptyState();
        return;
      }
      throw new StoreUnavailableError(
        `Cannot read state file ${this.statePath}: ${err.message}`,
        this.statePath,
        err
      );
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new StoreUnavailableError(
        `State file ${this.statePath} is corrupted (invalid JSON)`,
        this.statePath,
        error
      );
    }

    this.state = this.checkStateFile(parsed);
  }

  private checkStateFile(parsed: unknown): StateFile {
    if (!isJsonObject(parsed) || !isJsonObject(parsed['resources'])) {
      throw new StoreUnavailableError(
        `State file ${this.statePath} is corrupted (missing resources)`,
        this.statePath
      );
    }
    if (parsed['version'] !== 1) {
      throw new StoreUnavailableError(
        `State file ${this.statePath} has unsupported version ${JSON.stringify(parsed['version'])}`,
        this.statePath
      );
    }
    if (parsed['workspace'] !== this.workspace) {
      throw new StoreUnavailableError(
        `State file ${this.statePath} belongs to workspace ${JSON.stringify(parsed['workspace'])}, not "${this.workspace}"`,
        this.statePath
      );
    }
    // Shape checked above; record contents are trusted as written by save()
    return parsed as unknown as StateFile;
  }

  private emptyState(): StateFile {
    const now = new Date().toISOString();
    return {
      version: 1,
      workspace: this.workspace,
      configPath: this.configPath,
      configHash: this.configHash,
      serial: 0,
      createdAt: now,
      updatedAt: now,
      resources: {},
    };
  }

  /**
   * Get currently loaded state without reading from disk.
   *
   * @throws If state hasn't been loaded yet
   */
  getState(): StateFile {
    if (!this.state) {
      throw new Error('State not loaded. Call open() first.');
    }
    return this.state;
  }

  async get(resourceId: string): Promise<StateRecord | undefined> {
    const record = this.getState().resources[resourceId];
    return record ? structuredClone(record) : undefined;
  }

  async put(resourceId: string, record: StateRecord): Promise<void> {
    const state = this.getState();
    state.resources[resourceId] = structuredClone(record);
    await this.enqueueSave();
  }

  async delete(resourceId: string): Promise<void> {
    const state = this.getState();
    if (!(resourceId in state.resources)) {
      return;
    }
    delete state.resources[resourceId];
    await this.enqueueSave();
  }

  async list(): Promise<StateRecord[]> {
    return Object.values(this.getState().resources).map((record) => structuredClone(record));
  }

  /**
   * Wait for queued writes. A failed write was already reported to the
   * put or delete that queued it.
   */
  async close(): Promise<void> {
    await this.writeQueue.catch(() => undefined);
  }

  /**
   * Queue a save behind any in-flight one. A failed save does not block
   * later saves; the caller of the failed one receives the error.
   */
  private enqueueSave(): Promise<void> {
    const next = this.writeQueue.catch(() => undefined).then(() => this.save());
    this.writeQueue = next;
    return next;
  }

  /**
   * Save current state to disk using atomic write.
   *
   * Writes to a temp file first, then renames to ensure atomicity.
   */
  private async save(): Promise<void> {
    const state = this.getState();

    state.serial += 1;
    state.updatedAt = new Date().toISOString();
    state.configPath = this.configPath;
    state.configHash = this.configHash;

    const tempPath = `${this.statePath}.tmp`;
    try {
      await mkdir(dirname(this.statePath), { recursive: true });
      await writeFile(tempPath, JSON.stringify(state, null, 2), 'utf-8');
      await rename(tempPath, this.statePath);
    } catch (error) {
      const err = error as NodeJS.ErrnoException;
      throw new StoreUnavailableError(
        `Cannot write state file ${this.statePath}: ${err.message}`,
        this.statePath,
        err
      );
    }
  }

  /**
   * Get the state file path.
   */
  getStatePath(): string {
    return this.statePath;
  }
}
