import express, { type Express } from "express";
import type { CapabilityRegistry } from "./capabilities/registry.js";
import type { ExecutionLogReader } from "./execution-log/types.js";
import type { DispatchMetrics } from "./metrics/dispatch-metrics.js";
import type { DispatchOrchestrator } from "./router/dispatcher.js";
import { createAnalyticsRouter } from "./routes/analytics.js";
import { createAssistantRouter } from "./routes/assistant.js";
import { createHealthRouter } from "./routes/health.js";

export const APP_VERSION = "0.1.0";

export interface AppDeps {
  orchestrator: DispatchOrchestrator;
  registry: CapabilityRegistry;
  logReader: ExecutionLogReader;
  logStoreKind: string;
  checkLogStore: (() => Promise<void>) | null;
  metrics: DispatchMetrics;
  isReady: () => boolean;
}

export function createApp(deps: AppDeps): Express {
  const app = express();

  app.use(express.json({ limit: "1mb" }));

  app.get("/", (_req, res) => {
    res.json({
      name: "capability-router",
      version: APP_VERSION,
      description: "Routes free-text requests to conversation, repository, code, planning, database and workflow capabilities",
    });
  });

  app.use(
    "/health",
    createHealthRouter({
      registry: deps.registry,
      logStoreKind: deps.logStoreKind,
      checkLogStore: deps.checkLogStore,
      isReady: deps.isReady,
      version: APP_VERSION,
    })
  );
  app.use("/api", createAssistantRouter({ orchestrator: deps.orchestrator, logReader: deps.logReader }));
  app.use("/api", createAnalyticsRouter({ logReader: deps.logReader, metrics: deps.metrics }));

  return app;
}
