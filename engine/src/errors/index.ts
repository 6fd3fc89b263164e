/**
 * Taskline Error Infrastructure
 *
 * @module errors
 */

export * from './ErrorCodes.js';
export * from './FlowError.js';
export * from './ConfigurationError.js';
export * from './ExecutionErrors.js';
export * from './StorageErrors.js';
export * from './ErrorFormatter.js';
