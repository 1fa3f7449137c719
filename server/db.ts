import pg from "pg";
import { createLogger } from "./utils/logger.js";

const logger = createLogger("db");

/**
 * Minimal query surface shared by pg.Pool, pg.PoolClient and test doubles.
 */
export interface Queryable {
  query<T extends pg.QueryResultRow = pg.QueryResultRow>(
    text: string,
    params?: unknown[],
  ): Promise<pg.QueryResult<T>>;
}

/**
 * A Queryable that can also check out a dedicated connection, for work that
 * must run inside one transaction.
 */
export interface ConnectionPool extends Queryable {
  connect(): Promise<Queryable & { release(err?: Error | boolean): void }>;
}

export interface PoolOptions {
  max?: number;
  statementTimeoutMs?: number;
}

export function createPool(
  connectionString: string,
  label: string,
  options: PoolOptions = {},
): pg.Pool {
  const pool = new pg.Pool({
    connectionString,
    max: options.max ?? 10,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 5000,
    ...(options.statementTimeoutMs
      ? { statement_timeout: options.statementTimeoutMs }
      : {}),
  });

  pool.on("error", (err: Error) => {
    logger.error(`Unexpected ${label} pool error`, err);
  });

  return pool;
}

export async function verifyConnection(pool: pg.Pool, label: string): Promise<void> {
  const client = await pool.connect();
  try {
    const result = await client.query<{ now: Date }>("SELECT NOW() AS now");
    logger.info(`Connected to PostgreSQL (${label})`, {
      at: result.rows[0]?.now.toISOString(),
    });
  } finally {
    client.release();
  }
}
