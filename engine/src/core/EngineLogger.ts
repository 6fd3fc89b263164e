/**
 * Engine Logger
 *
 * Structured, leveled logging fanned out to pluggable sinks. The engine,
 * loader and catalog receive a FlowLogger; nothing reaches for a global.
 *
 * Sink failures never propagate: a throwing or rejecting sink is turned into
 * a PersistenceError and handed to `onSinkFailure` (stderr by default).
 *
 * ```typescript
 * const logger = new EngineLogger({ level: LogLevel.DEBUG, sinks: [new ConsoleSink()] });
 * const engineLog = logger.child('FlowEngine');
 * engineLog.info('Run started', { flowName: 'flow1' });
 * await logger.close();
 * ```
 *
 * @module core
 */

import {
  LogLevel,
  LogLevelSeverity,
  type FlowLogger,
  type LogEntry,
  type LogSink,
} from '../types/log-types.js';
import { PersistenceError, serializeError } from '../errors/index.js';

export type SinkFailureHandler = (error: PersistenceError) => void;

export interface EngineLoggerOptions {
  /** Minimum level written to sinks */
  level?: LogLevel;
  /** Logger name recorded on every entry */
  source?: string;
  sinks?: LogSink[];
  onSinkFailure?: SinkFailureHandler;
  clock?: () => Date;
}

const reportToStderr: SinkFailureHandler = (error) => {
  process.stderr.write(`[taskline] ${error.message}\n`);
};

/**
 * Sink fan-out shared by a logger and all of its children
 */
export class LogDispatcher {
  level: LogLevel;
  readonly sinks: LogSink[];
  private readonly pending: Set<Promise<void>> = new Set();
  private readonly onSinkFailure: SinkFailureHandler;
  readonly clock: () => Date;

  constructor(options: EngineLoggerOptions) {
    this.level = options.level ?? LogLevel.INFO;
    this.sinks = [...(options.sinks ?? [])];
    this.onSinkFailure = options.onSinkFailure ?? reportToStderr;
    this.clock = options.clock ?? (() => new Date());
  }

  enabled(level: LogLevel): boolean {
    return LogLevelSeverity[level] >= LogLevelSeverity[this.level];
  }

  dispatch(entry: LogEntry): void {
    for (const sink of this.sinks) {
      try {
        const result = sink.write(entry);
        if (result instanceof Promise) {
          this.track(sink, result);
        }
      } catch (error) {
        this.fail(sink, error);
      }
    }
  }

  get pendingWrites(): number {
    return this.pending.size;
  }

  async flush(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all(Array.from(this.pending));
    }
    for (const sink of this.sinks) {
      if (sink.flush) {
        await sink.flush().catch((error: unknown) => this.fail(sink, error));
      }
    }
  }

  async close(): Promise<void> {
    await this.flush();
    for (const sink of this.sinks) {
      if (sink.close) {
        await sink.close().catch((error: unknown) => this.fail(sink, error));
      }
    }
  }

  private track(sink: LogSink, write: Promise<void>): void {
    const tracked: Promise<void> = write
      .then(
        () => undefined,
        (error: unknown) => this.fail(sink, error)
      )
      .finally(() => {
        this.pending.delete(tracked);
      });
    this.pending.add(tracked);
  }

  private fail(sink: LogSink, error: unknown): void {
    const failure = new PersistenceError(sink.name, error);
    try {
      this.onSinkFailure(failure);
    } catch (handlerError) {
      reportToStderr(failure);
      reportToStderr(new PersistenceError('onSinkFailure', handlerError));
    }
  }
}

export class EngineLogger implements FlowLogger {
  readonly source: string;
  private readonly dispatcher: LogDispatcher;

  constructor(options: EngineLoggerOptions = {}, dispatcher?: LogDispatcher) {
    this.source = options.source ?? 'taskline';
    this.dispatcher = dispatcher ?? new LogDispatcher(options);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, context);
  }

  error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, message, context, error);
  }

  fatal(message: string, error?: unknown, context?: Record<string, unknown>): void {
    this.log(LogLevel.FATAL, message, context, error);
  }

  /**
   * A logger with another source name, sharing sinks, level and pending writes
   */
  child(source: string): EngineLogger {
    return new EngineLogger({ source }, this.dispatcher);
  }

  addSink(sink: LogSink): void {
    this.dispatcher.sinks.push(sink);
  }

  setLevel(level: LogLevel): void {
    this.dispatcher.level = level;
  }

  get level(): LogLevel {
    return this.dispatcher.level;
  }

  willLog(level: LogLevel): boolean {
    return this.dispatcher.enabled(level);
  }

  get pendingWrites(): number {
    return this.dispatcher.pendingWrites;
  }

  /**
   * Wait for every asynchronous sink write issued so far
   */
  async flush(): Promise<void> {
    await this.dispatcher.flush();
  }

  async close(): Promise<void> {
    await this.dispatcher.close();
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>, error?: unknown): void {
    if (!this.dispatcher.enabled(level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: this.dispatcher.clock(),
      level,
      source: this.source,
      message,
    };
    if (context && Object.keys(context).length > 0) {
      entry.context = context;
    }
    if (error !== undefined) {
      entry.error = serializeError(error);
    }

    this.dispatcher.dispatch(entry);
  }
}
