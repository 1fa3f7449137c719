import fs from "fs";
import path from "path";
import type pg from "pg";
import dotenv from "dotenv";
import { createPool } from "./db.js";
import { resolveProjectPath } from "./paths.js";
import { createLogger, toError } from "./utils/logger.js";

dotenv.config();

const logger = createLogger("migrate");

async function ensureMigrationsTable(pool: pg.Pool): Promise<void> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS migrations (
      id SERIAL PRIMARY KEY,
      name TEXT NOT NULL UNIQUE,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);
}

async function getAppliedMigrations(pool: pg.Pool): Promise<Set<string>> {
  const result = await pool.query<{ name: string }>("SELECT name FROM migrations ORDER BY id");
  return new Set(result.rows.map((r) => r.name));
}

async function migrate(pool: pg.Pool, migrationsDir: string): Promise<void> {
  await ensureMigrationsTable(pool);
  const applied = await getAppliedMigrations(pool);

  const files = fs
    .readdirSync(migrationsDir)
    .filter((f) => f.endsWith(".sql"))
    .sort();

  if (files.length === 0) {
    logger.info("No migration files found");
    return;
  }

  for (const file of files) {
    if (applied.has(file)) {
      logger.info(`Skipping ${file} (already applied)`);
      continue;
    }

    const sql = fs.readFileSync(path.join(migrationsDir, file), "utf-8");
    const client = await pool.connect();

    try {
      await client.query("BEGIN");
      await client.query(sql);
      await client.query("INSERT INTO migrations (name) VALUES ($1)", [file]);
      await client.query("COMMIT");
      logger.info(`Applied ${file}`);
    } catch (err) {
      await client.query("ROLLBACK");
      throw new Error(`Failed to apply ${file}: ${toError(err).message}`);
    } finally {
      client.release();
    }
  }

  logger.info("All migrations applied");
}

async function main(): Promise<void> {
  const databaseUrl = process.env.DATABASE_URL;
  if (!databaseUrl) {
    throw new Error("DATABASE_URL is required to run migrations");
  }

  const pool = createPool(databaseUrl, "execution log", { max: 1 });
  try {
    await migrate(pool, resolveProjectPath("migrations"));
  } finally {
    await pool.end();
  }
}

main()
  .then(() => process.exit(0))
  .catch((err: unknown) => {
    logger.error("Migration failed", toError(err));
    process.exit(1);
  });
