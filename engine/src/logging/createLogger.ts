/**
 * Build an EngineLogger from the `log` section of the configuration.
 *
 * The MySQL sink is only attached when a client is supplied; callers that
 * connect later can attach it with `logger.addSink(new MySQLLogSink(...))`.
 *
 * @module logging
 */

import { join } from 'node:path';
import type { LogSink } from '../types/log-types.js';
import type { LogSettings } from '../core/EngineConfig.js';
import { EngineLogger, type SinkFailureHandler } from '../core/EngineLogger.js';
import type { SqlClient } from '../storage/SqlClient.js';
import { ConsoleSink, type TextStream } from './sinks/ConsoleSink.js';
import { FileSink } from './sinks/FileSink.js';
import { MySQLLogSink } from './sinks/MySQLLogSink.js';

const BYTES_PER_MB = 1024 * 1024;

export interface CreateLoggerOptions {
  source?: string;
  client?: SqlClient;
  stream?: TextStream;
  onSinkFailure?: SinkFailureHandler;
}

export function createLogger(settings: LogSettings, options: CreateLoggerOptions = {}): EngineLogger {
  const sinks: LogSink[] = [];

  if (settings.console) {
    sinks.push(new ConsoleSink({ format: settings.format, colors: settings.colors, stream: options.stream }));
  }
  if (settings.file) {
    sinks.push(
      new FileSink({
        file: join(settings.path, settings.fileName),
        maxBytes: Math.floor(settings.rotate.maxSizeMb * BYTES_PER_MB),
        backupCount: settings.rotate.backupCount,
      })
    );
  }
  if (settings.database && options.client) {
    sinks.push(new MySQLLogSink(options.client, settings.table));
  }

  return new EngineLogger({
    level: settings.level,
    source: options.source,
    sinks,
    onSinkFailure: options.onSinkFailure,
  });
}
