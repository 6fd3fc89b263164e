/**
 * In-process sink that keeps every entry. Used by tests and by callers that
 * want to inspect a run's log afterwards.
 *
 * @module logging
 */

import type { LogEntry, LogLevel, LogSink } from '../../types/log-types.js';

export class MemorySink implements LogSink {
  readonly name = 'memory';
  readonly entries: LogEntry[] = [];

  write(entry: LogEntry): void {
    this.entries.push(entry);
  }

  messages(level?: LogLevel): string[] {
    return this.entries.filter((entry) => level === undefined || entry.level === level).map((entry) => entry.message);
  }

  clear(): void {
    this.entries.length = 0;
  }
}
