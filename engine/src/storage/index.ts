/**
 * Storage Module
 *
 * @module storage
 */

export * from './FlowStore.js';
export * from './InMemoryFlowStore.js';
export * from './SqlClient.js';
export * from './MySQLFlowStore.js';
