/**
 * Manager Module
 *
 * @module manager
 */

export * from './FlowManager.js';
