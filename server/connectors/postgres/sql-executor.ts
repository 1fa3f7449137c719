/**
 * SQL executor for the relational capability.
 *
 * Talks to the *target* database (TARGET_DATABASE_URL), which is separate
 * from the execution log store. Statement timeouts are applied on the pool.
 */

import type pg from 'pg';
import type { ConnectionPool } from '../../db.js';

export interface SqlResult {
  command: string;
  columns: string[];
  rows: Array<Record<string, unknown>>;
  rowCount: number;
}

export interface TableSchema {
  table: string;
  columns: Array<{ name: string; type: string }>;
}

export interface ConnectionInfo {
  serverVersion: string;
  database: string;
}

export interface SqlExecutor {
  execute(sql: string, params?: unknown[]): Promise<SqlResult>;
  /** Runs `sql` in a READ ONLY transaction that is always rolled back. */
  executeReadOnly(sql: string): Promise<SqlResult>;
  describeConnection(): Promise<ConnectionInfo>;
  describeSchema(): Promise<TableSchema[]>;
}

export class PgSqlExecutor implements SqlExecutor {
  constructor(private db: ConnectionPool) {}

  async execute(sql: string, params?: unknown[]): Promise<SqlResult> {
    const result = await this.db.query<Record<string, unknown>>(sql, params);
    return toSqlResult(result, sql);
  }

  async executeReadOnly(sql: string): Promise<SqlResult> {
    const client = await this.db.connect();
    try {
      await client.query('BEGIN READ ONLY');
      const result = await client.query<Record<string, unknown>>(sql);
      await client.query('ROLLBACK');
      return toSqlResult(result, sql);
    } catch (err) {
      await client.query('ROLLBACK');
      throw err;
    } finally {
      client.release();
    }
  }

  async describeConnection(): Promise<ConnectionInfo> {
    const result = await this.db.query<{ version: string; database: string }>(
      `SELECT current_setting('server_version') AS version, current_database() AS database`
    );
    const row = result.rows[0];
    return {
      serverVersion: row?.version ?? 'unknown',
      database: row?.database ?? 'unknown',
    };
  }

  async describeSchema(): Promise<TableSchema[]> {
    const result = await this.db.query<{ table_name: string; column_name: string; data_type: string }>(
      `SELECT table_name, column_name, data_type
       FROM information_schema.columns
       WHERE table_schema = 'public'
       ORDER BY table_name, ordinal_position`
    );

    const tables = new Map<string, TableSchema>();
    for (const row of result.rows) {
      let table = tables.get(row.table_name);
      if (!table) {
        table = { table: row.table_name, columns: [] };
        tables.set(row.table_name, table);
      }
      table.columns.push({ name: row.column_name, type: row.data_type });
    }
    return Array.from(tables.values());
  }
}

function toSqlResult(result: pg.QueryResult<Record<string, unknown>>, sql: string): SqlResult {
  return {
    command: result.command || firstKeyword(sql),
    columns: (result.fields ?? []).map((f) => f.name),
    rows: result.rows ?? [],
    rowCount: result.rowCount ?? result.rows?.length ?? 0,
  };
}

export function firstKeyword(sql: string): string {
  const stripped = sql
    .replace(/--[^\n]*\n?/g, ' ')
    .replace(/\/\*[\s\S]*?\*\//g, ' ')
    .trim();
  return (stripped.split(/\s+/)[0] ?? '').replace(/[^A-Za-z]/g, '').toUpperCase();
}
