/**
 * Base Capability Adapter
 *
 * Implements the invoke() contract once so concrete adapters only supply
 * `execute()`:
 *
 *   unavailable backend       → failure outcome (AdapterUnavailableError message)
 *   precondition not met      → failure outcome (checkPreconditions throws)
 *   execute() throws          → failure outcome with the error message
 *   execute() resolves        → success outcome
 *
 * Each invocation appends exactly one operation record. A failed append is
 * logged as a warning and does not change the outcome.
 */

import type { CapabilityTag } from '../router/types.js';
import { createLogger, toError, type Logger } from '../utils/logger.js';
import {
  AdapterUnavailableError,
  failed,
  succeeded,
  type CapabilityAdapter,
  type InvocationContext,
  type OperationOutcome,
} from './types.js';

export interface OperationParams {
  operation: string;
}

export abstract class BaseCapabilityAdapter<P extends OperationParams, R> implements CapabilityAdapter<P, R> {
  abstract readonly tag: CapabilityTag;
  abstract readonly service: string;
  protected logger: Logger;

  constructor(loggerPrefix: string) {
    this.logger = createLogger(loggerPrefix);
  }

  abstract isAvailable(): boolean;

  protected abstract execute(params: P): Promise<R>;

  /**
   * Throw (typically AdapterRejectedError) to refuse the request before execute().
   */
  protected async checkPreconditions(_params: P): Promise<void> {}

  /** What gets stored as the operation's request payload. */
  protected describeRequest(params: P): unknown {
    return params;
  }

  /** What gets stored as the operation's response payload. */
  protected describeResponse(payload: R): unknown {
    return payload;
  }

  async invoke(params: P, ctx: InvocationContext): Promise<OperationOutcome<R>> {
    const start = Date.now();
    let outcome: OperationOutcome<R>;

    if (!this.isAvailable()) {
      outcome = failed(new AdapterUnavailableError(this.service, params.operation).message);
    } else {
      try {
        await this.checkPreconditions(params);
        outcome = succeeded(await this.execute(params));
      } catch (err) {
        const error = toError(err);
        this.logger.warn(`${params.operation} failed`, { error: error.message, errorType: error.name });
        outcome = failed(error.message);
      }
    }

    await this.record(params, outcome, ctx, Date.now() - start);
    return outcome;
  }

  private async record(
    params: P,
    outcome: OperationOutcome<R>,
    ctx: InvocationContext,
    durationMs: number
  ): Promise<void> {
    try {
      await ctx.log.appendOperationRecord({
        sessionId: ctx.sessionId,
        operation: params.operation,
        service: this.service,
        requestPayload: this.describeRequest(params),
        responsePayload: outcome.success
          ? { success: true, durationMs, data: this.describeResponse(outcome.payload) }
          : { success: false, durationMs, error: outcome.error },
        status: outcome.success ? 'success' : 'error',
      });
    } catch (err) {
      this.logger.warn('Failed to append operation record', {
        operation: params.operation,
        sessionId: ctx.sessionId,
        error: toError(err).message,
      });
    }
  }
}
