/**
 * Flow Loader
 *
 * Fetches a flow record from the FlowStore and hands back a parsed
 * definition. Only enabled, non-deleted flows are runnable.
 *
 * Also reads flow documents from disk for the catalog and CLI:
 *
 * ```ts
 * const tasks = await FlowLoader.fromFile('./flows/flow1.json');
 * await manager.create('flow1', tasks);
 * ```
 *
 * @module loader
 */

import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import type { FlowDefinition, FlowRecord, TaskSpec } from '../types/core-types.js';
import type { FlowLogger } from '../types/log-types.js';
import { withStorageErrors, type FlowStore } from '../storage/FlowStore.js';
import { ConfigurationError, NotFoundError } from '../errors/index.js';
import { FlowParser } from '../parser/FlowParser.js';

export class FlowLoader {
  private readonly logger?: FlowLogger;

  constructor(
    private readonly store: FlowStore,
    logger?: FlowLogger
  ) {
    this.logger = logger?.child('FlowLoader');
  }

  /**
   * @throws {NotFoundError} When no record exists, or it is disabled or deleted
   * @throws {ConfigurationError} When the stored document does not parse
   * @throws {StorageError} When the store fails
   */
  async load(flowName: string): Promise<FlowDefinition> {
    let record: FlowRecord | undefined;
    try {
      record = await withStorageErrors('get', () => this.store.get(flowName));
    } catch (error) {
      this.logger?.error('Flow store failed', error, { flowName });
      throw error;
    }

    if (!record) {
      this.logger?.warn('Flow does not exist', { flowName });
      throw new NotFoundError(flowName, 'missing');
    }
    if (record.deleted) {
      this.logger?.warn('Flow is deleted', { flowName });
      throw new NotFoundError(flowName, 'deleted');
    }
    if (!record.enabled) {
      this.logger?.warn('Flow is disabled', { flowName });
      throw new NotFoundError(flowName, 'disabled');
    }

    let definition: FlowDefinition;
    try {
      definition = FlowParser.parse(record);
    } catch (error) {
      this.logger?.error('Flow rejected', error, { flowName });
      throw error;
    }
    this.logger?.debug('Flow loaded', { flowName, taskCount: definition.tasks.length });
    return definition;
  }

  /**
   * Read and validate a flow document file
   *
   * @throws {ConfigurationError} When the file cannot be read or does not parse
   */
  static async fromFile(filePath: string): Promise<TaskSpec[]> {
    const resolvedPath = resolve(filePath);
    let content: string;
    try {
      content = await readFile(resolvedPath, 'utf-8');
    } catch (error) {
      throw ConfigurationError.invalidSettings(`Cannot read flow document ${resolvedPath}`, resolvedPath, error);
    }
    return FlowParser.parseTasks(content, resolvedPath);
  }
}
