import { Router, type Request, type Response } from 'express';
import type { ExecutionLogReader } from '../execution-log/types.js';
import type { DispatchMetrics } from '../metrics/dispatch-metrics.js';
import { createLogger, toError } from '../utils/logger.js';
import { RequestValidationError, parseOptionalString, parsePositiveInt } from './params.js';

const logger = createLogger('AnalyticsAPI');

export interface AnalyticsRouterDeps {
  logReader: ExecutionLogReader;
  metrics: DispatchMetrics;
}

export function createAnalyticsRouter(deps: AnalyticsRouterDeps): Router {
  const router = Router();

  // Per-operation call counts and error rates from the operation records
  router.get('/analytics/operations', async (req: Request, res: Response): Promise<void> => {
    try {
      const days = parsePositiveInt(req.query.days, 'days', 30, 365);
      const service = parseOptionalString(req.query.service, 'service');
      const operations = await deps.logReader.getOperationStats({ days, service });
      res.json({ days, service: service ?? null, operations });
    } catch (err) {
      if (err instanceof RequestValidationError) {
        res.status(400).json({ error: err.message, field: err.field });
        return;
      }
      const error = toError(err);
      logger.error('Operation stats failed', error);
      res.status(500).json({ error: 'Operation stats failed', details: error.message });
    }
  });

  router.get('/metrics', (_req: Request, res: Response) => {
    res.json(deps.metrics.report());
  });

  return router;
}
