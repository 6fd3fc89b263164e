/**
 * In-memory FlowStore
 *
 * Mirrors the `workflow_flow` table semantics (unique names, timestamps
 * maintained on write) without a database.
 *
 * @module storage
 */

import type { FlowRecord, FlowRecordChanges, NewFlowRecord } from '../types/core-types.js';
import { FlowExistsError } from '../errors/index.js';
import type { FlowStore } from './FlowStore.js';

export class InMemoryFlowStore implements FlowStore {
  private records: Map<string, FlowRecord> = new Map();

  constructor(private readonly now: () => Date = () => new Date()) {}

  async list(): Promise<FlowRecord[]> {
    return Array.from(this.records.values(), copyRecord).sort((a, b) =>
      a.name < b.name ? -1 : a.name > b.name ? 1 : 0
    );
  }

  async get(name: string): Promise<FlowRecord | undefined> {
    const record = this.records.get(name);
    return record ? copyRecord(record) : undefined;
  }

  async insert(record: NewFlowRecord): Promise<FlowRecord> {
    if (this.records.has(record.name)) {
      throw new FlowExistsError(record.name);
    }
    const timestamp = this.now();
    const stored: FlowRecord = { ...record, createdAt: timestamp, updatedAt: timestamp };
    this.records.set(record.name, stored);
    return copyRecord(stored);
  }

  async update(name: string, changes: FlowRecordChanges): Promise<boolean> {
    const current = this.records.get(name);
    if (!current) {
      return false;
    }

    const next: FlowRecord = {
      name: changes.name ?? current.name,
      flowJson: changes.flowJson ?? current.flowJson,
      enabled: changes.enabled ?? current.enabled,
      deleted: changes.deleted ?? current.deleted,
      createdAt: current.createdAt,
      updatedAt: this.now(),
    };
    if (next.name !== name) {
      if (this.records.has(next.name)) {
        throw new FlowExistsError(next.name);
      }
      this.records.delete(name);
    }
    this.records.set(next.name, next);
    return true;
  }

  async close(): Promise<void> {
    this.records.clear();
  }
}

function copyRecord(record: FlowRecord): FlowRecord {
  return {
    ...record,
    createdAt: new Date(record.createdAt.getTime()),
    updatedAt: new Date(record.updatedAt.getTime()),
  };
}
