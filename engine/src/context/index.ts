/**
 * Context Module
 *
 * Per-run result store and `@` reference resolution.
 *
 * @module context
 */

export * from './ContextStore.js';
export * from './ParameterResolver.js';
