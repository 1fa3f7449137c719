import fs from "fs/promises";
import dotenv from "dotenv";
import type pg from "pg";
import { APP_VERSION, createApp } from "./app.js";
import { createCapabilityRegistry } from "./capabilities/index.js";
import { loadAppConfig, type AppConfig } from "./config/index.js";
import { GitHubClient } from "./connectors/github/client.js";
import { PgSqlExecutor } from "./connectors/postgres/sql-executor.js";
import { SessionContextStore } from "./conversations/session-context.js";
import { createPool, verifyConnection } from "./db.js";
import { InMemoryExecutionLog, PgExecutionLog, type ExecutionLogStore } from "./execution-log/index.js";
import { DispatchMetrics } from "./metrics/dispatch-metrics.js";
import { resolveProjectPath } from "./paths.js";
import { DispatchOrchestrator, KeywordRequestClassifier } from "./router/index.js";
import { LlmRouter } from "./utils/llm-router.js";
import { createLogger, parseLogLevel, setLogLevel, toError } from "./utils/logger.js";

dotenv.config();

const logger = createLogger("server");

const SESSION_SWEEP_INTERVAL_MS = 15 * 60 * 1000;

interface LogBackend {
  store: ExecutionLogStore;
  kind: string;
  check: (() => Promise<void>) | null;
}

async function initExecutionLog(config: AppConfig, pools: pg.Pool[]): Promise<LogBackend> {
  if (!config.databaseUrl) {
    logger.warn("DATABASE_URL not set, execution log is kept in memory only");
    return { store: new InMemoryExecutionLog(), kind: "memory", check: null };
  }

  const pool = createPool(config.databaseUrl, "execution log");
  pools.push(pool);
  await verifyConnection(pool, "execution log");
  return {
    store: new PgExecutionLog(pool),
    kind: "postgres",
    check: async () => {
      await pool.query("SELECT 1");
    },
  };
}

async function start(): Promise<void> {
  const config = loadAppConfig();
  setLogLevel(parseLogLevel(config.logLevel));

  const pools: pg.Pool[] = [];
  let ready = false;

  let log: LogBackend;
  try {
    log = await initExecutionLog(config, pools);
  } catch (err) {
    logger.error("Failed to connect to execution log database", toError(err));
    process.exit(1);
  }

  let sqlExecutor: PgSqlExecutor | null = null;
  if (config.targetDatabaseUrl) {
    const targetPool = createPool(config.targetDatabaseUrl, "target database", {
      max: 5,
      statementTimeoutMs: config.relational.statementTimeoutMs,
    });
    pools.push(targetPool);
    sqlExecutor = new PgSqlExecutor(targetPool);
  } else {
    logger.info("TARGET_DATABASE_URL not set, relational capability unavailable");
  }

  const registry = createCapabilityRegistry(config, {
    llm: new LlmRouter({ routes: config.llmRoutes, providerKeys: config.providerKeys }),
    github: config.github.token ? new GitHubClient({ token: config.github.token, apiUrl: config.github.apiUrl }) : null,
    sql: sqlExecutor,
    loadSchemaSql: () => fs.readFile(resolveProjectPath("sql", "workspace-tables.sql"), "utf-8"),
  });

  const sessions = new SessionContextStore({
    maxMessages: config.memory.maxMessages,
    ttlHours: config.memory.sessionTtlHours,
  });
  const metrics = new DispatchMetrics();
  const orchestrator = new DispatchOrchestrator({
    classifier: new KeywordRequestClassifier(),
    registry,
    log: log.store,
    sessions,
    metrics,
    options: {
      contextTurns: config.memory.contextTurns,
      parallelSecondaryRoutes: config.dispatch.parallelSecondaryRoutes,
    },
  });

  const sweep = setInterval(() => {
    const evicted = sessions.evictExpired();
    if (evicted > 0) logger.debug("Evicted idle sessions", { evicted });
  }, SESSION_SWEEP_INTERVAL_MS);
  sweep.unref();

  const app = createApp({
    orchestrator,
    registry,
    logReader: log.store,
    logStoreKind: log.kind,
    checkLogStore: log.check,
    metrics,
    isReady: () => ready,
  });

  const server = app.listen(config.port, "0.0.0.0", () => {
    ready = true;
    logger.info(`capability-router v${APP_VERSION} listening on port ${config.port}`);
  });

  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down gracefully`);
    ready = false;
    clearInterval(sweep);
    server.close(() => {
      Promise.all(pools.map((pool) => pool.end()))
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          logger.error("Error while closing database pools", toError(err));
          process.exit(1);
        });
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

start().catch((err: unknown) => {
  logger.error("Failed to start server", toError(err));
  process.exit(1);
});
