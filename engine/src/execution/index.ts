/**
 * Execution Module
 *
 * @module execution
 */

export * from './TaskExecutor.js';
