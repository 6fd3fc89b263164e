/**
 * Task Executor
 *
 * Runs a single flow step against the current context:
 *
 * 1. resolve every param (`@` references, `@@` escapes)
 * 2. resolve the implementation through the registry
 * 3. invoke it with a read-only context view and await the result
 * 4. validate the result is a mapping of JSON values
 *
 * Storing the result is left to the caller. Errors thrown by the task
 * propagate as the same instance.
 *
 * @module execution
 */

import type { TaskResult, TaskSpec } from '../types/core-types.js';
import type { ContextStore } from '../context/ContextStore.js';
import { resolveParams } from '../context/ParameterResolver.js';
import type { TaskRegistry } from '../tasks/TaskRegistry.js';
import { ContractViolationError } from '../errors/index.js';
import { JsonObjectSchema } from '../parser/FlowSchema.js';

export class TaskExecutor {
  constructor(private readonly registry: TaskRegistry) {}

  async execute(spec: TaskSpec, context: ContextStore): Promise<TaskResult> {
    const params = resolveParams(spec.params, context);
    const task = this.registry.resolve(spec.module, spec.method, spec.name);
    const returned: unknown = await task.execute(context.view(), params);
    return validateResult(spec.name, returned);
  }
}

/**
 * Check a task's return value and produce the copy that gets stored
 *
 * @throws {ContractViolationError} Unless the value is a mapping of JSON values
 */
export function validateResult(taskName: string, returned: unknown): TaskResult {
  if (typeof returned !== 'object' || returned === null || Array.isArray(returned)) {
    throw ContractViolationError.invalidResult(taskName, describe(returned));
  }

  const parsed = JsonObjectSchema.safeParse(returned);
  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    const where = issue && issue.path.length > 0 ? `at "${issue.path.join('.')}"` : '';
    const detail = [where, issue?.message ?? 'not JSON-serializable'].filter(Boolean).join(': ');
    throw ContractViolationError.invalidResult(taskName, 'object', detail);
  }
  return parsed.data;
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'an array';
  return typeof value;
}
