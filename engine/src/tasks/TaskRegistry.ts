/**
 * Task Registry
 *
 * Maps `(module, method)` identifiers to task implementations. Flows name
 * their implementations by that pair; the engine resolves through here and
 * never loads code by name.
 *
 * @module tasks
 */

import type { FlowDefinition } from '../types/core-types.js';
import { ConfigurationError } from '../errors/index.js';
import { taskKey, toTask, type Task, type TaskIdentifier, type TaskLike, type TaskModule } from './Task.js';

export class TaskRegistry {
  private tasks: Map<string, { id: TaskIdentifier; task: Task }> = new Map();

  /** Lookup key for the literal pair; `('a.b', 'c')` and `('a', 'b.c')` stay apart */
  private static keyOf(module: string, method: string): string {
    return JSON.stringify([module, method]);
  }

  /**
   * Register one implementation
   *
   * @throws {ConfigurationError} If the pair is already registered
   */
  register(module: string, method: string, task: TaskLike): this {
    const key = TaskRegistry.keyOf(module, method);
    if (this.tasks.has(key)) {
      throw ConfigurationError.duplicateRegistration(module, method);
    }
    this.tasks.set(key, { id: { module, method }, task: toTask(task) });
    return this;
  }

  /**
   * Register every method of a module
   */
  registerModule(module: string, methods: TaskModule): this {
    for (const [method, task] of Object.entries(methods)) {
      this.register(module, method, task);
    }
    return this;
  }

  unregister(module: string, method: string): boolean {
    return this.tasks.delete(TaskRegistry.keyOf(module, method));
  }

  has(module: string, method: string): boolean {
    return this.tasks.has(TaskRegistry.keyOf(module, method));
  }

  /**
   * @throws {ConfigurationError} If nothing is registered for the pair
   */
  resolve(module: string, method: string, taskName?: string): Task {
    const entry = this.tasks.get(TaskRegistry.keyOf(module, method));
    if (!entry) {
      throw ConfigurationError.unknownTask(module, method, this.names(), taskName);
    }
    return entry.task;
  }

  /**
   * Check that every task of a flow can be resolved, before anything runs
   *
   * @throws {ConfigurationError} On the first unknown pair, with its document path
   */
  validate(definition: FlowDefinition): void {
    definition.tasks.forEach((spec, index) => {
      if (!this.has(spec.module, spec.method)) {
        const error = ConfigurationError.unknownTask(spec.module, spec.method, this.names(), spec.name);
        throw new ConfigurationError({ ...error.diagnostic, path: `tasks[${index}]` });
      }
    });
  }

  /**
   * Registered pairs sorted by module, then method
   */
  list(): TaskIdentifier[] {
    return Array.from(this.tasks.values(), ({ id }) => ({ ...id })).sort(
      (a, b) => a.module.localeCompare(b.module) || a.method.localeCompare(b.method)
    );
  }

  names(): string[] {
    return this.list().map(({ module, method }) => taskKey(module, method));
  }

  get size(): number {
    return this.tasks.size;
  }
}
