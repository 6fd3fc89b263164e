/**
 * Console sink: one text or JSON line per entry on stderr, so that stdout
 * stays free for command output.
 *
 * @module logging
 */

import type { LogEntry, LogFormat, LogSink } from '../../types/log-types.js';
import { formatEntry } from '../LogFormatter.js';

export interface TextStream {
  write(chunk: string): unknown;
}

export interface ConsoleSinkOptions {
  format?: LogFormat;
  colors?: boolean;
  stream?: TextStream;
}

export class ConsoleSink implements LogSink {
  readonly name = 'console';
  private readonly format: LogFormat;
  private readonly colors: boolean;
  private readonly stream: TextStream;

  constructor(options: ConsoleSinkOptions = {}) {
    this.format = options.format ?? 'text';
    this.colors = options.colors ?? true;
    this.stream = options.stream ?? process.stderr;
  }

  write(entry: LogEntry): void {
    this.stream.write(`${formatEntry(entry, this.format, this.colors)}\n`);
  }
}
