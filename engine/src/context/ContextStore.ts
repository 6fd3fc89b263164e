/**
 * Context Store
 *
 * Per-run store of completed task results, keyed by task name, plus the
 * reserved `_runtime` slot for run metadata.
 *
 * Write discipline:
 * - only the engine writes, between task invocations
 * - every task name is written exactly once
 * - names starting with `_` are never task names
 * - tasks see a read-only view; every read hands out a copy
 *
 * @module context
 */

import type { JsonValue, RuntimeMetadata, TaskResult } from '../types/core-types.js';
import { ContextWriteError, ReferenceResolutionError } from '../errors/index.js';

export const RESERVED_PREFIX = '_';
export const RUNTIME_SLOT = '_runtime';

export function isReservedName(name: string): boolean {
  return name.startsWith(RESERVED_PREFIX);
}

/**
 * Lookup contract used by the parameter resolver
 */
export interface ContextReader {
  get(name: string): TaskResult;
  get(name: string, key: string): JsonValue;
}

/**
 * What a task implementation receives
 */
export interface ContextView extends ContextReader {
  has(name: string): boolean;
  /** Task names in write order */
  names(): string[];
  runtime(): RuntimeMetadata | undefined;
  toObject(): Record<string, TaskResult>;
}

export class ContextStore implements ContextReader {
  private results = new Map<string, TaskResult>();
  private runtimeMetadata?: RuntimeMetadata;
  private readonly readOnlyView: ContextView;

  constructor() {
    this.readOnlyView = new ReadOnlyContext(this);
  }

  /**
   * Seed the reserved namespace. Called once by the engine before any task runs.
   */
  initRuntime(metadata: RuntimeMetadata): void {
    if (this.runtimeMetadata) {
      throw ContextWriteError.runtimeInitialized();
    }
    this.runtimeMetadata = { ...metadata };
  }

  /**
   * Store a task result under its name
   *
   * @throws {ContextWriteError} On a reserved name or a second write
   */
  set(name: string, result: TaskResult): void {
    if (isReservedName(name)) {
      throw ContextWriteError.reservedName(name);
    }
    if (this.results.has(name)) {
      throw ContextWriteError.alreadyWritten(name);
    }
    this.results.set(name, structuredClone(result));
  }

  has(name: string): boolean {
    if (name === RUNTIME_SLOT) {
      return this.runtimeMetadata !== undefined;
    }
    return this.results.has(name);
  }

  /**
   * Read a full result, or one key of it
   *
   * @throws {ReferenceResolutionError} When the name or key is absent
   */
  get(name: string): TaskResult;
  get(name: string, key: string): JsonValue;
  get(name: string, key?: string): JsonValue {
    const slot = this.slot(name);
    if (slot === undefined) {
      throw ReferenceResolutionError.unknownTask(name);
    }
    if (key === undefined) {
      return structuredClone(slot);
    }
    if (!Object.prototype.hasOwnProperty.call(slot, key)) {
      throw ReferenceResolutionError.unknownKey(name, key, Object.keys(slot));
    }
    return structuredClone(slot[key]);
  }

  names(): string[] {
    return Array.from(this.results.keys());
  }

  runtime(): RuntimeMetadata | undefined {
    return this.runtimeMetadata ? { ...this.runtimeMetadata } : undefined;
  }

  get size(): number {
    return this.results.size;
  }

  /**
   * Task results in write order, without the reserved slot
   */
  toObject(): Record<string, TaskResult> {
    const out: Record<string, TaskResult> = {};
    for (const [name, result] of this.results) {
      out[name] = structuredClone(result);
    }
    return out;
  }

  view(): ContextView {
    return this.readOnlyView;
  }

  private slot(name: string): TaskResult | undefined {
    if (name === RUNTIME_SLOT) {
      return this.runtimeMetadata;
    }
    return this.results.get(name);
  }
}

/**
 * Read-only facade over a ContextStore
 */
class ReadOnlyContext implements ContextView {
  constructor(private readonly store: ContextStore) {}

  has(name: string): boolean {
    return this.store.has(name);
  }

  get(name: string): TaskResult;
  get(name: string, key: string): JsonValue;
  get(name: string, key?: string): JsonValue {
    return key === undefined ? this.store.get(name) : this.store.get(name, key);
  }

  names(): string[] {
    return this.store.names();
  }

  runtime(): RuntimeMetadata | undefined {
    return this.store.runtime();
  }

  toObject(): Record<string, TaskResult> {
    return this.store.toObject();
  }
}
