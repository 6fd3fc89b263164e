/**
 * Flow Manager
 *
 * Catalog operations over the FlowStore: list, show, create, update,
 * rename, soft-delete, enable and disable.
 *
 * - documents are validated with FlowParser and stored in canonical form
 * - deleted flows stay in the store for audit; they are hidden from `get`
 *   and `list` (unless asked) and keep their name reserved
 *
 * @module manager
 */

import type { FlowRecord, FlowRecordChanges, FlowSummary, TaskSpec } from '../types/core-types.js';
import type { FlowLogger } from '../types/log-types.js';
import { withStorageErrors, type FlowStore } from '../storage/FlowStore.js';
import { FlowParser } from '../parser/FlowParser.js';
import { ConfigurationError, FlowError, FlowExistsError, NotFoundError } from '../errors/index.js';

export const MAX_FLOW_NAME_LENGTH = 128;

/**
 * Document text, or an already-built task list
 */
export type FlowDocumentInput = string | readonly TaskSpec[];

export interface ListFlowsOptions {
  includeDeleted?: boolean;
}

export interface CreateFlowOptions {
  /** @default true */
  enabled?: boolean;
}

export interface FlowDetails {
  record: FlowRecord;
  tasks: TaskSpec[];
}

export class FlowManager {
  private readonly logger?: FlowLogger;

  constructor(
    private readonly store: FlowStore,
    logger?: FlowLogger
  ) {
    this.logger = logger?.child('FlowManager');
  }

  async list(options: ListFlowsOptions = {}): Promise<FlowSummary[]> {
    const records = await withStorageErrors('list', () => this.store.list());
    return records
      .filter((record) => options.includeDeleted || !record.deleted)
      .map((record) => ({
        name: record.name,
        enabled: record.enabled,
        deleted: record.deleted,
        taskCount: countTasks(record),
        createdAt: record.createdAt,
        updatedAt: record.updatedAt,
      }));
  }

  /**
   * The record, or undefined when it is missing or deleted
   */
  async get(name: string): Promise<FlowRecord | undefined> {
    const record = await withStorageErrors('get', () => this.store.get(name));
    return record && !record.deleted ? record : undefined;
  }

  /**
   * Record plus parsed tasks
   *
   * @throws {NotFoundError} When missing or deleted
   */
  async describe(name: string): Promise<FlowDetails> {
    const record = await this.requireActive(name);
    return { record, tasks: FlowParser.parseTasks(record.flowJson, `flow "${name}"`) };
  }

  /**
   * @throws {FlowExistsError} When the name is taken, by a deleted flow too
   */
  async create(name: string, document: FlowDocumentInput, options: CreateFlowOptions = {}): Promise<FlowRecord> {
    validateFlowName(name);
    const flowJson = canonicalize(document, name);

    if (await withStorageErrors('get', () => this.store.get(name))) {
      throw new FlowExistsError(name);
    }

    const record = await withStorageErrors('insert', () =>
      this.store.insert({ name, flowJson, enabled: options.enabled ?? true, deleted: false })
    );
    this.logger?.info('Flow created', { flowName: name, enabled: record.enabled });
    return record;
  }

  async update(name: string, document: FlowDocumentInput): Promise<void> {
    const flowJson = canonicalize(document, name);
    await this.requireActive(name);
    await this.apply(name, { flowJson }, 'update');
    this.logger?.info('Flow updated', { flowName: name });
  }

  /**
   * @throws {FlowExistsError} When `to` is taken
   */
  async rename(from: string, to: string): Promise<void> {
    validateFlowName(to);
    await this.requireActive(from);
    if (from === to) {
      return;
    }
    if (await withStorageErrors('get', () => this.store.get(to))) {
      throw new FlowExistsError(to);
    }
    await this.apply(from, { name: to }, 'rename');
    this.logger?.info('Flow renamed', { from, to });
  }

  /**
   * Soft delete: the record stays, flagged
   */
  async delete(name: string): Promise<void> {
    await this.requireActive(name);
    await this.apply(name, { deleted: true }, 'delete');
    this.logger?.info('Flow deleted', { flowName: name });
  }

  async enable(name: string): Promise<void> {
    await this.requireActive(name);
    await this.apply(name, { enabled: true }, 'enable');
    this.logger?.info('Flow enabled', { flowName: name });
  }

  async disable(name: string): Promise<void> {
    await this.requireActive(name);
    await this.apply(name, { enabled: false }, 'disable');
    this.logger?.info('Flow disabled', { flowName: name });
  }

  private async requireActive(name: string): Promise<FlowRecord> {
    const record = await withStorageErrors('get', () => this.store.get(name));
    if (!record) {
      throw new NotFoundError(name, 'missing');
    }
    if (record.deleted) {
      throw new NotFoundError(name, 'deleted');
    }
    return record;
  }

  private async apply(name: string, changes: FlowRecordChanges, operation: string): Promise<void> {
    const updated = await withStorageErrors(operation, () => this.store.update(name, changes));
    if (!updated) {
      throw new NotFoundError(name, 'missing');
    }
  }
}

/**
 * @throws {ConfigurationError} Unless the name is 1 to 128 characters
 */
export function validateFlowName(name: string): void {
  if (name.length === 0 || name.length > MAX_FLOW_NAME_LENGTH) {
    throw ConfigurationError.invalidFlowName(name);
  }
}

function canonicalize(document: FlowDocumentInput, name: string): string {
  const tasks =
    typeof document === 'string'
      ? FlowParser.parseTasks(document, `flow "${name}"`)
      : FlowParser.fromObject(FlowParser.toDocument(document));
  return FlowParser.stringify(tasks);
}

function countTasks(record: FlowRecord): number | undefined {
  try {
    return FlowParser.parseTasks(record.flowJson).length;
  } catch (error) {
    if (error instanceof FlowError) {
      return undefined;
    }
    throw error;
  }
}
