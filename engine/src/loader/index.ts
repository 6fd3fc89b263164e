/**
 * Loader Module
 *
 * @module loader
 */

export * from './FlowLoader.js';
