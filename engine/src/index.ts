/**
 * Taskline Engine - sequential flow execution
 *
 * @example
 * ```ts
 * import { FlowEngine, FlowLoader, InMemoryFlowStore, TaskRegistry } from '@taskline/engine';
 *
 * const registry = new TaskRegistry().register('demo', 'hello', () => ({ msg: 'hi' }));
 * const engine = new FlowEngine({ registry, loader: new FlowLoader(store) });
 * const outcome = await engine.run('flow1');
 * ```
 */

// ============================================================================
// PRIMARY EXPORT - Start here!
// ============================================================================

export { FlowEngine, type FlowEngineOptions } from './core/FlowEngine.js';

// ============================================================================
// TYPES
// ============================================================================

export * from './types/core-types.js';
export * from './types/log-types.js';

// ============================================================================
// CONFIGURATION & LOGGING
// ============================================================================

export * from './core/EngineConfig.js';
export * from './core/EngineLogger.js';
export * from './logging/index.js';

// ============================================================================
// BUILDING BLOCKS
// ============================================================================

// Errors
export * from './errors/index.js';

// Context and reference resolution
export * from './context/index.js';

// Task registry and built-in tasks
export * from './tasks/index.js';

// Document parsing
export * from './parser/index.js';

// Loading and catalog
export * from './loader/index.js';
export * from './manager/index.js';

// Storage
export * from './storage/index.js';

// Execution internals
export * from './execution/index.js';

// Events
export * from './events/index.js';

// State management
export * from './state/index.js';
