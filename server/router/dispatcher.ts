/**
 * Dispatch Orchestrator
 *
 * Turns one request into one ExecutionResult:
 *   1. classify
 *   2. freeze the request with the session's recent context
 *   3. run the primary handler, then each secondary handler
 *   4. merge sections in classification order and settle the status
 *   5. persist the execution record and conversation turns
 *
 * dispatch() never rejects. A fault escaping steps 1-4 yields status
 * `error` with the fixed apology output. Persistence failures are logged
 * and leave the result untouched.
 *
 * Dispatches for one session run one at a time in arrival order; other
 * sessions are not blocked.
 */

import pLimit, { type LimitFunction } from 'p-limit';
import type { CapabilityRegistry } from '../capabilities/registry.js';
import type { SessionContextStore, ConversationContext } from '../conversations/session-context.js';
import type { ExecutionLog } from '../execution-log/types.js';
import type { DispatchMetrics } from '../metrics/dispatch-metrics.js';
import { createLogger, toError } from '../utils/logger.js';
import { ExecutionState } from './execution-state.js';
import { ROUTE_HANDLERS, type HandlerContext, type RouteHandler } from './handlers/index.js';
import { DEFAULT_CONFIDENCE } from './request-classifier.js';
import type {
  CapabilityTag,
  Classification,
  DispatchRequest,
  ExecutionResult,
  RequestClassifier,
  TerminalStatus,
} from './types.js';

const logger = createLogger('Dispatcher');

export interface DispatchOptions {
  /** Exchanges of recent history passed to handlers as `context`. */
  contextTurns?: number;
  /** Run secondary handlers concurrently; sections still merge in order. */
  parallelSecondaryRoutes?: boolean;
}

export interface DispatchOrchestratorDeps {
  classifier: RequestClassifier;
  registry: CapabilityRegistry;
  log: ExecutionLog;
  sessions: SessionContextStore;
  handlers?: Record<CapabilityTag, RouteHandler>;
  metrics?: DispatchMetrics;
  options?: DispatchOptions;
  clock?: () => number;
  now?: () => Date;
}

function fallbackClassification(): Classification {
  return {
    primaryRoute: 'general_conversation',
    secondaryRoutes: [],
    confidence: DEFAULT_CONFIDENCE,
    declaredOperations: [],
  };
}

export class DispatchOrchestrator {
  private classifier: RequestClassifier;
  private registry: CapabilityRegistry;
  private log: ExecutionLog;
  private sessions: SessionContextStore;
  private handlers: Record<CapabilityTag, RouteHandler>;
  private metrics: DispatchMetrics | null;
  private contextTurns: number;
  private parallelSecondaryRoutes: boolean;
  private clock: () => number;
  private now: () => Date;
  private sessionQueues = new Map<string, LimitFunction>();

  constructor(deps: DispatchOrchestratorDeps) {
    this.classifier = deps.classifier;
    this.registry = deps.registry;
    this.log = deps.log;
    this.sessions = deps.sessions;
    this.handlers = deps.handlers ?? ROUTE_HANDLERS;
    this.metrics = deps.metrics ?? null;
    this.contextTurns = deps.options?.contextTurns ?? 10;
    this.parallelSecondaryRoutes = deps.options?.parallelSecondaryRoutes ?? false;
    this.clock = deps.clock ?? Date.now;
    this.now = deps.now ?? (() => new Date());
  }

  classify(text: string): Classification {
    return this.classifier.classify(text);
  }

  clearContext(sessionId: string): boolean {
    return this.sessions.clear(sessionId);
  }

  /**
   * Queue a dispatch behind any in-flight dispatch for the same session.
   */
  dispatch(requestText: string, sessionId: string): Promise<ExecutionResult> {
    let queue = this.sessionQueues.get(sessionId);
    if (!queue) {
      queue = pLimit(1);
      this.sessionQueues.set(sessionId, queue);
    }
    const sessionQueue = queue;

    return sessionQueue(async () => {
      try {
        return await this.run(requestText, sessionId);
      } finally {
        if (sessionQueue.activeCount <= 1 && sessionQueue.pendingCount === 0) {
          this.sessionQueues.delete(sessionId);
        }
      }
    });
  }

  private async run(requestText: string, sessionId: string): Promise<ExecutionResult> {
    const session = this.sessions.get(sessionId);
    let request: DispatchRequest = Object.freeze({ userRequest: requestText, sessionId, context: '' });
    let classification: Classification | null = null;
    let state: ExecutionState | null = null;

    try {
      classification = this.classifier.classify(requestText);
      request = Object.freeze({ userRequest: requestText, sessionId, context: session.getRecent(this.contextTurns) });
      state = new ExecutionState(request, classification.primaryRoute, this.clock);

      logger.info('Dispatching request', {
        sessionId,
        primaryRoute: classification.primaryRoute,
        secondaryRoutes: classification.secondaryRoutes,
        confidence: classification.confidence,
      });

      await this.runRoutes(classification, state, {
        request,
        history: session.getMessages(),
        registry: this.registry,
        invocation: { sessionId, log: this.log },
      });
      state.complete();
    } catch (err) {
      const error = toError(err);
      logger.error('Dispatch failed with a system fault', error, { sessionId });
      if (!state || state.status !== 'processing') {
        state = new ExecutionState(request, classification?.primaryRoute ?? 'general_conversation', this.clock);
      }
      state.fail(error.message);
    }

    const finalClassification = classification ?? fallbackClassification();
    const status = toTerminal(state);
    this.metrics?.record(status, state.elapsedMs);
    await this.persist(state, status, finalClassification, session);

    return {
      userRequest: requestText,
      sessionId,
      taskType: state.taskType,
      classification: finalClassification,
      finalOutput: state.finalOutput,
      status,
      elapsedMs: state.elapsedMs,
      operations: state.operations,
      declaredOperations: finalClassification.declaredOperations,
      errors: [...state.errors],
      timestamp: this.now().toISOString(),
    };
  }

  private async runRoutes(classification: Classification, state: ExecutionState, ctx: HandlerContext): Promise<void> {
    const primary = classification.primaryRoute;
    state.commit(primary, await this.handlers[primary](ctx));

    const secondary = classification.secondaryRoutes;
    if (this.parallelSecondaryRoutes && secondary.length > 1) {
      const sections = await Promise.all(
        secondary.map(async (tag) => ({ tag, section: await this.handlers[tag](ctx) }))
      );
      for (const { tag, section } of sections) {
        state.commit(tag, section);
      }
      return;
    }

    for (const tag of secondary) {
      state.commit(tag, await this.handlers[tag](ctx));
    }
  }

  private async persist(
    state: ExecutionState,
    status: TerminalStatus,
    classification: Classification,
    session: ConversationContext
  ): Promise<void> {
    const { request } = state;

    try {
      await this.log.appendExecutionRecord({
        sessionId: request.sessionId,
        taskType: state.taskType,
        input: { userRequest: request.userRequest, classification },
        output: { finalOutput: state.finalOutput, operations: state.operations },
        status,
        errorText: state.errors.length > 0 ? state.errors.join('\n') : null,
        elapsedMs: state.elapsedMs,
      });
    } catch (err) {
      logger.warn('Failed to append execution record', {
        sessionId: request.sessionId,
        error: toError(err).message,
      });
    }

    if (!state.finalOutput) return;

    session.append(request.userRequest, state.finalOutput);

    const turns = [
      { role: 'user' as const, content: request.userRequest },
      { role: 'assistant' as const, content: state.finalOutput },
    ];
    for (const turn of turns) {
      try {
        await this.log.appendConversationTurn({
          sessionId: request.sessionId,
          role: turn.role,
          content: turn.content,
          route: state.taskType,
        });
      } catch (err) {
        logger.warn('Failed to append conversation turn', {
          sessionId: request.sessionId,
          role: turn.role,
          error: toError(err).message,
        });
      }
    }
  }
}

function toTerminal(state: ExecutionState): TerminalStatus {
  const status = state.status;
  if (status === 'processing') {
    throw new Error('Execution state was not settled');
  }
  return status;
}
