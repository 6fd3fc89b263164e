/**
 * Task Contract
 *
 * A task is the unit of work a flow step dispatches to. It receives a
 * read-only view of the context and its resolved params, and returns a
 * mapping of JSON values (or a promise of one).
 *
 * The return type is deliberately `unknown`: the engine validates what comes
 * back instead of trusting the implementation.
 *
 * @module tasks
 */

import type { MaybePromise, TaskParams } from '../types/core-types.js';
import type { ContextView } from '../context/ContextStore.js';

export interface Task {
  execute(context: ContextView, params: TaskParams): MaybePromise<unknown>;
}

/**
 * Bare-function form accepted by the registry
 */
export type TaskFunction = (context: ContextView, params: TaskParams) => MaybePromise<unknown>;

export type TaskLike = Task | TaskFunction;

/**
 * Method name -> implementation, for registering a whole module at once
 */
export type TaskModule = Record<string, TaskLike>;

/**
 * A `(module, method)` pair as reported by `TaskRegistry.list()`
 */
export interface TaskIdentifier {
  module: string;
  method: string;
}

export function toTask(task: TaskLike): Task {
  return typeof task === 'function' ? { execute: task } : task;
}

/**
 * Display label for a pair. Not unique: module names carry dots.
 */
export function taskKey(module: string, method: string): string {
  return `${module}.${method}`;
}
