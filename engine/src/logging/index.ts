/**
 * Logging Module
 *
 * @module logging
 */

export * from './LogFormatter.js';
export * from './createLogger.js';
export * from './sinks/ConsoleSink.js';
export * from './sinks/FileSink.js';
export * from './sinks/MySQLLogSink.js';
export * from './sinks/MemorySink.js';
