/**
 * Parser Module
 *
 * @module parser
 */

export * from './FlowSchema.js';
export * from './FlowParser.js';
