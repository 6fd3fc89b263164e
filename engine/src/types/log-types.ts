/**
 * Log levels, entries and sink contracts shared by the logging subsystem.
 */

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
  FATAL = 'fatal',
}

/**
 * Numeric severity used for level filtering
 */
export const LogLevelSeverity: Readonly<Record<LogLevel, number>> = {
  [LogLevel.DEBUG]: 10,
  [LogLevel.INFO]: 20,
  [LogLevel.WARN]: 30,
  [LogLevel.ERROR]: 40,
  [LogLevel.FATAL]: 50,
};

export type LogFormat = 'text' | 'json';

export interface SerializedError {
  name: string;
  message: string;
  code?: string;
  stack?: string;
}

/**
 * A single structured log entry
 */
export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  /** Logger name, e.g. 'FlowEngine' or 'FlowLoader' */
  source: string;
  message: string;
  context?: Record<string, unknown>;
  error?: SerializedError;
}

/**
 * Destination for log entries.
 *
 * `write` may return a promise for sinks backed by I/O; the logger tracks it
 * so that `flush()` can wait for it.
 */
export interface LogSink {
  readonly name: string;
  write(entry: LogEntry): void | Promise<void>;
  flush?(): Promise<void>;
  close?(): Promise<void>;
}

/**
 * Leveled logging contract injected into engine components
 */
export interface FlowLogger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: unknown, context?: Record<string, unknown>): void;
  child(source: string): FlowLogger;
}
