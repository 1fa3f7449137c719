import type { CapabilityRegistry } from '../../capabilities/registry.js';
import type { CapabilityAdapter, InvocationContext, OperationOutcome } from '../../capabilities/types.js';
import type { HistoryMessage } from '../../conversations/session-context.js';
import { createLogger, toError } from '../../utils/logger.js';
import type { RouteSection } from '../execution-state.js';
import type { DispatchRequest, OperationSummary } from '../types.js';

const logger = createLogger('Handlers');

export interface HandlerContext {
  request: DispatchRequest;
  /** Snapshot of the session's messages taken before this dispatch. */
  history: HistoryMessage[];
  registry: CapabilityRegistry;
  invocation: InvocationContext;
}

export type RouteHandler = (ctx: HandlerContext) => Promise<RouteSection>;

export function failureLine(label: string, message: string): string {
  return `❌ ${label} failed: ${message}`;
}

/**
 * Accumulates one handler's output, errors and adapter call summaries.
 */
export class SectionBuilder {
  private parts: string[] = [];
  private errors: string[] = [];
  private operations: OperationSummary[] = [];

  constructor(private invocation: InvocationContext) {}

  async invoke<P extends { operation: string }, R>(
    adapter: CapabilityAdapter<P, R>,
    params: P
  ): Promise<OperationOutcome<R>> {
    const outcome = await adapter.invoke(params, this.invocation);
    this.operations.push(
      outcome.success
        ? { operation: params.operation, service: adapter.service, success: true }
        : { operation: params.operation, service: adapter.service, success: false, error: outcome.error }
    );
    return outcome;
  }

  write(text: string): this {
    this.parts.push(text.trim());
    return this;
  }

  fail(label: string, message: string): this {
    this.errors.push(message);
    return this.write(failureLine(label, message));
  }

  build(): RouteSection {
    return {
      output: this.parts.filter(Boolean).join('\n\n'),
      errors: [...this.errors],
      operations: [...this.operations],
    };
  }
}

/**
 * Any exception a handler lets escape becomes an error line in its
 * own section; sibling handlers still run.
 */
export function guardHandler(label: string, handler: RouteHandler): RouteHandler {
  return async (ctx) => {
    try {
      return await handler(ctx);
    } catch (err) {
      const error = toError(err);
      logger.error(`${label} handler threw`, error, { sessionId: ctx.request.sessionId });
      return { output: failureLine(label, error.message), errors: [error.message], operations: [] };
    }
  };
}

export function titleCase(value: string): string {
  return value ? value.charAt(0).toUpperCase() + value.slice(1) : value;
}

export function formatSeconds(ms: number): string {
  return `${(ms / 1000).toFixed(2)}s`;
}
