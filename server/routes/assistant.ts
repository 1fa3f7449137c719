/**
 * Assistant API Endpoints
 *
 * - POST   /sessions                       → new session id
 * - POST   /sessions/:sessionId/dispatch   → classify + run handlers
 * - POST   /classify                       → classification only
 * - GET    /sessions/:sessionId/history    → persisted conversation turns
 * - GET    /sessions/:sessionId/stats      → counts + 7-day activity
 * - DELETE /sessions/:sessionId/context    → clear short-term memory
 */

import { Router, type NextFunction, type Request, type Response } from 'express';
import rateLimit from 'express-rate-limit';
import { v4 as uuidv4, validate as isUuid } from 'uuid';
import type { ExecutionLogReader } from '../execution-log/types.js';
import type { DispatchOrchestrator } from '../router/dispatcher.js';
import { createLogger, toError } from '../utils/logger.js';
import { RequestValidationError, parseInput, parsePositiveInt } from './params.js';

const logger = createLogger('AssistantAPI');

export interface AssistantRouterDeps {
  orchestrator: DispatchOrchestrator;
  logReader: ExecutionLogReader;
  /** Requests per minute per session (dispatch) or per client (classify). */
  rateLimitPerMinute?: number;
}

type SessionParams = { sessionId: string };

function requireSession(req: Request<SessionParams>, res: Response, next: NextFunction): void {
  if (!isUuid(req.params.sessionId)) {
    res.status(400).json({ error: 'sessionId must be a UUID' });
    return;
  }
  next();
}

function sendError(res: Response, err: unknown, action: string): void {
  if (err instanceof RequestValidationError) {
    res.status(400).json({ error: err.message, field: err.field });
    return;
  }
  const error = toError(err);
  logger.error(`${action} failed`, error);
  res.status(500).json({ error: `${action} failed`, details: error.message });
}

export function createAssistantRouter(deps: AssistantRouterDeps): Router {
  const router = Router();
  const perMinute = deps.rateLimitPerMinute ?? 30;

  const dispatchLimiter = rateLimit({
    windowMs: 60 * 1000,
    limit: perMinute,
    keyGenerator: (req) => req.params.sessionId ?? req.ip ?? 'unknown',
    message: { error: 'Dispatch rate limit exceeded. Try again in a minute.' },
  });
  const classifyLimiter = rateLimit({
    windowMs: 60 * 1000,
    limit: perMinute,
    message: { error: 'Classification rate limit exceeded. Try again in a minute.' },
  });

  router.post('/sessions', (_req: Request, res: Response) => {
    res.status(201).json({ sessionId: uuidv4() });
  });

  router.post(
    '/sessions/:sessionId/dispatch',
    requireSession,
    dispatchLimiter,
    async (req: Request<SessionParams>, res: Response): Promise<void> => {
      try {
        const input = parseInput(req.body);
        const result = await deps.orchestrator.dispatch(input, req.params.sessionId);
        res.json(result);
      } catch (err) {
        sendError(res, err, 'Dispatch');
      }
    }
  );

  router.post('/classify', classifyLimiter, (req: Request, res: Response) => {
    try {
      res.json(deps.orchestrator.classify(parseInput(req.body)));
    } catch (err) {
      sendError(res, err, 'Classification');
    }
  });

  router.get(
    '/sessions/:sessionId/history',
    requireSession,
    async (req: Request<SessionParams>, res: Response): Promise<void> => {
      try {
        const limit = parsePositiveInt(req.query.limit, 'limit', 50, 200);
        const turns = await deps.logReader.getSessionHistory(req.params.sessionId, limit);
        res.json({ sessionId: req.params.sessionId, turns });
      } catch (err) {
        sendError(res, err, 'History lookup');
      }
    }
  );

  router.get(
    '/sessions/:sessionId/stats',
    requireSession,
    async (req: Request<SessionParams>, res: Response): Promise<void> => {
      try {
        const stats = await deps.logReader.getSessionStatistics(req.params.sessionId);
        res.json({ sessionId: req.params.sessionId, ...stats });
      } catch (err) {
        sendError(res, err, 'Statistics lookup');
      }
    }
  );

  router.delete('/sessions/:sessionId/context', requireSession, (req: Request<SessionParams>, res: Response) => {
    const cleared = deps.orchestrator.clearContext(req.params.sessionId);
    res.json({ sessionId: req.params.sessionId, cleared });
  });

  return router;
}
