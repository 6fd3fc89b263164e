/**
 * SQL Client
 *
 * The narrow slice of a MySQL driver the stores and the log sink need.
 * MySQLClient implements it over a `mysql2/promise` pool; tests pass a
 * recording fake.
 *
 * @module storage
 */

import mysql, { type Pool, type ResultSetHeader, type RowDataPacket } from 'mysql2/promise';
import type { DatabaseSettings } from '../core/EngineConfig.js';

export type SqlParam = string | number | boolean | null | Date;

export type SqlRow = Record<string, unknown>;

export interface SqlRunResult {
  affectedRows: number;
  insertId?: number;
}

export interface SqlClient {
  select(sql: string, params?: SqlParam[]): Promise<SqlRow[]>;
  run(sql: string, params?: SqlParam[]): Promise<SqlRunResult>;
  close(): Promise<void>;
}

/**
 * Pooled MySQL client. Uses prepared statements for every query.
 */
export class MySQLClient implements SqlClient {
  private closed = false;

  constructor(private readonly pool: Pool) {}

  static connect(settings: DatabaseSettings): MySQLClient {
    const pool = mysql.createPool({
      host: settings.host,
      port: settings.port,
      user: settings.username,
      password: settings.password,
      database: settings.database,
      charset: settings.charset,
      connectionLimit: settings.connectionLimit,
      waitForConnections: true,
    });
    return new MySQLClient(pool);
  }

  async select(sql: string, params: SqlParam[] = []): Promise<SqlRow[]> {
    const [rows] = await this.pool.execute<RowDataPacket[]>(sql, params);
    return rows;
  }

  async run(sql: string, params: SqlParam[] = []): Promise<SqlRunResult> {
    const [result] = await this.pool.execute<ResultSetHeader>(sql, params);
    return { affectedRows: result.affectedRows, insertId: result.insertId };
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.pool.end();
  }
}
