import { Router, type Request, type Response } from "express";
import type { CapabilityRegistry } from "../capabilities/registry.js";
import { toError } from "../utils/logger.js";

export interface HealthRouterDeps {
  registry: CapabilityRegistry;
  /** Name of the execution log backend, e.g. "postgres" or "memory". */
  logStoreKind: string;
  /** Resolves when the log store answers; null when there is nothing to probe. */
  checkLogStore: (() => Promise<void>) | null;
  isReady: () => boolean;
  version: string;
}

export function createHealthRouter(deps: HealthRouterDeps): Router {
  const router = Router();

  router.get("/alive", (_req: Request, res: Response) => {
    res.json({ status: "alive", timestamp: new Date().toISOString() });
  });

  router.get("/ready", (_req: Request, res: Response) => {
    if (deps.isReady()) {
      res.json({ status: "ready", timestamp: new Date().toISOString() });
    } else {
      res.status(503).json({ status: "initializing", timestamp: new Date().toISOString() });
    }
  });

  router.get("/", async (_req: Request, res: Response) => {
    const capabilities = Object.fromEntries(
      deps.registry.availability().map((c) => [c.tag, { service: c.service, available: c.available }])
    );

    let logStore: { kind: string; status: "ok" | "error"; error?: string } = {
      kind: deps.logStoreKind,
      status: "ok",
    };
    if (deps.checkLogStore) {
      try {
        await deps.checkLogStore();
      } catch (err) {
        logStore = { kind: deps.logStoreKind, status: "error", error: toError(err).message };
      }
    }

    const healthy = logStore.status === "ok";
    res.status(healthy ? 200 : 503).json({
      status: healthy ? "ok" : "error",
      timestamp: new Date().toISOString(),
      version: deps.version,
      ready: deps.isReady(),
      services: { executionLog: logStore },
      capabilities,
    });
  });

  return router;
}
