/**
 * Flow Store Contract
 *
 * Key-value persistence for flow records. The engine only reads through
 * `get`; the catalog (FlowManager) uses the rest.
 *
 * Implementations:
 * - MySQLFlowStore: the `workflow_flow` table
 * - InMemoryFlowStore: tests and database-less tooling
 *
 * @module storage
 */

import type { FlowRecord, FlowRecordChanges, NewFlowRecord } from '../types/core-types.js';
import { FlowError, StorageError } from '../errors/index.js';

export interface FlowStore {
  /** Every record, deleted ones included, ordered by name */
  list(): Promise<FlowRecord[]>;

  /** The record with that name in whatever state, or undefined */
  get(name: string): Promise<FlowRecord | undefined>;

  /**
   * @throws {FlowExistsError} If the name is taken
   */
  insert(record: NewFlowRecord): Promise<FlowRecord>;

  /**
   * Apply changes to the named record
   *
   * @returns false when no record has that name
   * @throws {FlowExistsError} When renaming onto a taken name
   */
  update(name: string, changes: FlowRecordChanges): Promise<boolean>;

  close?(): Promise<void>;
}

const PLAIN_IDENTIFIER = /^[A-Za-z0-9_]+$/;

/**
 * Table names are interpolated into SQL, so only plain identifiers pass
 */
export function isPlainIdentifier(name: string): boolean {
  return PLAIN_IDENTIFIER.test(name);
}

/**
 * Run a store call, turning anything that is not already a FlowError into a StorageError
 */
export async function withStorageErrors<T>(operation: string, call: () => Promise<T>): Promise<T> {
  try {
    return await call();
  } catch (error) {
    throw error instanceof FlowError ? error : new StorageError(operation, error);
  }
}
