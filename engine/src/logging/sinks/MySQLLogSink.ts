/**
 * MySQL sink: one row per entry in the `workflow_syslog` table.
 *
 * Writes are asynchronous; the logger tracks them, and a failed insert is
 * reported as a PersistenceError without reaching the code that logged.
 *
 * @module logging
 */

import type { LogEntry, LogSink } from '../../types/log-types.js';
import type { SqlClient } from '../../storage/SqlClient.js';
import { isPlainIdentifier } from '../../storage/FlowStore.js';
import { ConfigurationError } from '../../errors/index.js';
import { safeStringify } from '../LogFormatter.js';

const LOGGER_NAME_LIMIT = 64;

export class MySQLLogSink implements LogSink {
  readonly name = 'mysql';
  private readonly table: string;

  constructor(
    private readonly client: SqlClient,
    table: string = 'workflow_syslog'
  ) {
    if (!isPlainIdentifier(table)) {
      throw ConfigurationError.invalidSettings(`Invalid log table name "${table}"`, 'log.table');
    }
    this.table = table;
  }

  async write(entry: LogEntry): Promise<void> {
    const message: Record<string, unknown> = { message: entry.message };
    if (entry.context) message.context = entry.context;
    if (entry.error) message.error = entry.error;

    await this.client.run(
      `INSERT INTO \`${this.table}\` (created_at, level, logger_name, message) VALUES (?, ?, ?, ?)`,
      [entry.timestamp, entry.level.toUpperCase(), entry.source.slice(0, LOGGER_NAME_LIMIT), safeStringify(message)]
    );
  }
}
