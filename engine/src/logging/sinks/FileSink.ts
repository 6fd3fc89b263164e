/**
 * File sink: JSON lines appended to a file, rotated by size.
 *
 * Rotation renames `taskline.log` to `taskline.log.1`, shifting older
 * backups up and dropping anything past `backupCount`.
 *
 * @module logging
 */

import { appendFileSync, existsSync, renameSync, rmSync, statSync } from 'node:fs';
import type { LogEntry, LogSink } from '../../types/log-types.js';
import { formatJson } from '../LogFormatter.js';

export interface FileSinkOptions {
  file: string;
  /** Rotate once the file would grow past this many bytes */
  maxBytes?: number;
  backupCount?: number;
}

export class FileSink implements LogSink {
  readonly name = 'file';
  readonly file: string;
  private readonly maxBytes: number;
  private readonly backupCount: number;
  private size?: number;

  constructor(options: FileSinkOptions) {
    this.file = options.file;
    this.maxBytes = options.maxBytes ?? 100 * 1024 * 1024;
    this.backupCount = options.backupCount ?? 5;
  }

  write(entry: LogEntry): void {
    const line = `${formatJson(entry)}\n`;
    const bytes = Buffer.byteLength(line);
    const size = this.size ?? this.currentSize();

    if (size > 0 && size + bytes > this.maxBytes) {
      try {
        this.rotate();
      } catch (error) {
        // re-read the size on the next write
        this.size = undefined;
        throw error;
      }
      this.size = 0;
    } else {
      this.size = size;
    }

    appendFileSync(this.file, line, 'utf-8');
    this.size = (this.size ?? 0) + bytes;
  }

  private currentSize(): number {
    return existsSync(this.file) ? statSync(this.file).size : 0;
  }

  private rotate(): void {
    if (this.backupCount === 0) {
      rmSync(this.file, { force: true });
      return;
    }
    for (let index = this.backupCount - 1; index >= 1; index--) {
      const from = `${this.file}.${index}`;
      if (existsSync(from)) {
        renameSync(from, `${this.file}.${index + 1}`);
      }
    }
    renameSync(this.file, `${this.file}.1`);
  }
}
