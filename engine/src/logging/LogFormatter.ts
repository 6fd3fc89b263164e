/**
 * Log Formatter
 *
 * Renders log entries as a colored text line or a JSON line.
 *
 * Text:  `2024-01-01T00:00:00.000Z INFO  [FlowEngine] Task completed {"task":"s1"}`
 * JSON:  `{"timestamp":"...","level":"info","source":"FlowEngine","message":"..."}`
 *
 * @module logging
 */

import { Chalk, type ChalkInstance } from 'chalk';
import { LogLevel, type LogEntry, type LogFormat } from '../types/log-types.js';

const LEVEL_WIDTH = 5;

function levelColor(c: ChalkInstance, level: LogLevel): (text: string) => string {
  switch (level) {
    case LogLevel.DEBUG:
      return c.gray;
    case LogLevel.INFO:
      return c.cyan;
    case LogLevel.WARN:
      return c.yellow;
    case LogLevel.ERROR:
      return c.red;
    case LogLevel.FATAL:
      return c.bgRed.white;
  }
}

/**
 * Stringify a value for a log line, falling back when it has cycles or bigints
 */
export function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

export function formatText(entry: LogEntry, colors: boolean = false): string {
  const c = new Chalk({ level: colors ? 1 : 0 });
  const level = levelColor(c, entry.level)(entry.level.toUpperCase().padEnd(LEVEL_WIDTH));
  let line = `${c.dim(entry.timestamp.toISOString())} ${level} ${c.magenta(`[${entry.source}]`)} ${entry.message}`;

  if (entry.context && Object.keys(entry.context).length > 0) {
    line += ` ${c.gray(safeStringify(entry.context))}`;
  }
  if (entry.error) {
    const code = entry.error.code ? ` [${entry.error.code}]` : '';
    line += `\n  ${c.red(`${entry.error.name}${code}: ${entry.error.message}`)}`;
  }
  return line;
}

export function toRecord(entry: LogEntry): Record<string, unknown> {
  const record: Record<string, unknown> = {
    timestamp: entry.timestamp.toISOString(),
    level: entry.level,
    source: entry.source,
    message: entry.message,
  };
  if (entry.context) record.context = entry.context;
  if (entry.error) record.error = entry.error;
  return record;
}

export function formatJson(entry: LogEntry): string {
  try {
    return JSON.stringify(toRecord(entry));
  } catch {
    return JSON.stringify({ ...toRecord(entry), context: safeStringify(entry.context) });
  }
}

export function formatEntry(entry: LogEntry, format: LogFormat, colors: boolean = false): string {
  return format === 'json' ? formatJson(entry) : formatText(entry, colors);
}
