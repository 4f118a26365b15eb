/**
 * In-memory State Store
 *
 * Same contract as FileStateStore without persistence. Used for dry runs
 * and as the in-process stand-in in tests.
 */

import type { StateRecord, StateStore } from './types.js';

export class MemoryStateStore implements StateStore {
  readonly workspace: string;
  private readonly records = new Map<string, StateRecord>();
  private opened = false;

  constructor(workspace: string, initial: StateRecord[] = []) {
    this.workspace = workspace;
    for (const record of initial) {
      this.records.set(record.id, structuredClone(record));
    }
  }

  async open(): Promise<void> {
    this.opened = true;
  }

  private ensureOpen(): void {
    if (!this.opened) {
      throw new Error('State not loaded. Call open() first.');
    }
  }

  async get(resourceId: string): Promise<StateRecord | undefined> {
    this.ensureOpen();
    const record = this.records.get(resourceId);
    return record ? structuredClone(record) : undefined;
  }

  async put(resourceId: string, record: StateRecord): Promise<void> {
    this.ensureOpen();
    this.records.set(resourceId, structuredClone(record));
  }

  async delete(resourceId: string): Promise<void> {
    this.ensureOpen();
    this.records.delete(resourceId);
  }

  async list(): Promise<StateRecord[]> {
    this.ensureOpen();
    return [...this.records.values()].map((record) => structuredClone(record));
  }

  async close(): Promise<void> {
    this.opened = false;
  }
}
