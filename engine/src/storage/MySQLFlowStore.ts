/**
 * MySQL FlowStore
 *
 * Reads and writes the `workflow_flow` table (see sql/workflow.ddl.sql).
 * Every driver failure surfaces as a StorageError; a unique-key clash on
 * `flow_name` surfaces as FlowExistsError.
 *
 * @module storage
 */

import { z } from 'zod';
import type { FlowRecord, FlowRecordChanges, NewFlowRecord } from '../types/core-types.js';
import { ConfigurationError, FlowError, FlowExistsError, StorageError } from '../errors/index.js';
import { isPlainIdentifier, type FlowStore } from './FlowStore.js';
import type { SqlClient, SqlParam, SqlRow } from './SqlClient.js';

const DUPLICATE_ENTRY = 'ER_DUP_ENTRY';

const FlagSchema = z.coerce.number().transform((value) => value !== 0);

/**
 * mysql2 hands JSON columns back already decoded; the record keeps text
 */
const FlowRowSchema = z.object({
  flow_name: z.string(),
  flow_json: z.unknown().transform((value) => (typeof value === 'string' ? value : JSON.stringify(value))),
  enabled: FlagSchema,
  deleted: FlagSchema,
  created_at: z.coerce.date(),
  updated_at: z.coerce.date(),
});

const COLUMNS = 'flow_name, flow_json, enabled, deleted, created_at, updated_at';

export class MySQLFlowStore implements FlowStore {
  private readonly table: string;

  constructor(
    private readonly client: SqlClient,
    table: string = 'workflow_flow'
  ) {
    if (!isPlainIdentifier(table)) {
      throw ConfigurationError.invalidSettings(`Invalid flow table name "${table}"`, 'flow.table');
    }
    this.table = table;
  }

  async list(): Promise<FlowRecord[]> {
    const rows = await this.guard('list', () =>
      this.client.select(`SELECT ${COLUMNS} FROM \`${this.table}\` ORDER BY flow_name`)
    );
    return rows.map((row) => this.toRecord(row));
  }

  async get(name: string): Promise<FlowRecord | undefined> {
    const rows = await this.guard('get', () =>
      this.client.select(`SELECT ${COLUMNS} FROM \`${this.table}\` WHERE flow_name = ? LIMIT 1`, [name])
    );
    const [row] = rows;
    return row ? this.toRecord(row) : undefined;
  }

  async insert(record: NewFlowRecord): Promise<FlowRecord> {
    await this.guard(
      'insert',
      () =>
        this.client.run(
          `INSERT INTO \`${this.table}\` (flow_name, flow_json, enabled, deleted) VALUES (?, ?, ?, ?)`,
          [record.name, record.flowJson, flag(record.enabled), flag(record.deleted)]
        ),
      record.name
    );

    const stored = await this.get(record.name);
    if (!stored) {
      throw new StorageError('insert', `row for "${record.name}" missing after insert`);
    }
    return stored;
  }

  async update(name: string, changes: FlowRecordChanges): Promise<boolean> {
    const assignments: string[] = [];
    const params: SqlParam[] = [];

    if (changes.name !== undefined) {
      assignments.push('flow_name = ?');
      params.push(changes.name);
    }
    if (changes.flowJson !== undefined) {
      assignments.push('flow_json = ?');
      params.push(changes.flowJson);
    }
    if (changes.enabled !== undefined) {
      assignments.push('enabled = ?');
      params.push(flag(changes.enabled));
    }
    if (changes.deleted !== undefined) {
      assignments.push('deleted = ?');
      params.push(flag(changes.deleted));
    }

    if (assignments.length === 0) {
      return (await this.get(name)) !== undefined;
    }

    const result = await this.guard(
      'update',
      () =>
        this.client.run(`UPDATE \`${this.table}\` SET ${assignments.join(', ')} WHERE flow_name = ?`, [
          ...params,
          name,
        ]),
      changes.name
    );
    return result.affectedRows > 0;
  }

  async close(): Promise<void> {
    await this.client.close();
  }

  private toRecord(row: SqlRow): FlowRecord {
    const parsed = FlowRowSchema.safeParse(row);
    if (!parsed.success) {
      throw new StorageError('read', parsed.error);
    }
    const { data } = parsed;
    return {
      name: data.flow_name,
      flowJson: data.flow_json,
      enabled: data.enabled,
      deleted: data.deleted,
      createdAt: data.created_at,
      updatedAt: data.updated_at,
    };
  }

  /**
   * Run a driver call, translating its failures
   *
   * @param conflictName - Name to report when the call hits the unique key
   */
  private async guard<T>(operation: string, call: () => Promise<T>, conflictName?: string): Promise<T> {
    try {
      return await call();
    } catch (error) {
      if (error instanceof FlowError) {
        throw error;
      }
      if (conflictName !== undefined && isDuplicateEntry(error)) {
        throw new FlowExistsError(conflictName);
      }
      throw new StorageError(operation, error);
    }
  }
}

function flag(value: boolean): number {
  return value ? 1 : 0;
}

function isDuplicateEntry(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === DUPLICATE_ENTRY;
}
