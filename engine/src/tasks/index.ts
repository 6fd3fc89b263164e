/**
 * Tasks Module
 *
 * @module tasks
 */

export * from './Task.js';
export * from './TaskRegistry.js';
export * from './builtins/CommonTasks.js';
