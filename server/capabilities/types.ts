/**
 * Capability Adapter Contract
 *
 * Every external capability (LLM chat, code generation, planning,
 * repository hosting, relational querying, composite workflows) is
 * wrapped in an adapter with one uniform shape:
 *
 * - `isAvailable()` answers whether the backend is configured at all
 * - `invoke()` resolves to an OperationOutcome and never rejects
 * - every invocation is appended to the execution log as an operation record
 */

import type { CapabilityTag } from '../router/types.js';
import type { ExecutionLog } from '../execution-log/types.js';

export type OperationOutcome<T> =
  | { success: true; payload: T }
  | { success: false; error: string; payload?: unknown };

export function succeeded<T>(payload: T): OperationOutcome<T> {
  return { success: true, payload };
}

export function failed<T>(error: string, payload?: unknown): OperationOutcome<T> {
  return payload === undefined ? { success: false, error } : { success: false, error, payload };
}

export interface InvocationContext {
  sessionId: string;
  log: ExecutionLog;
}

export interface CapabilityAdapter<P, R> {
  readonly tag: CapabilityTag;
  /** Backend identifier recorded on operation records, e.g. 'github'. */
  readonly service: string;
  isAvailable(): boolean;
  invoke(params: P, ctx: InvocationContext): Promise<OperationOutcome<R>>;
}

// ============================================================================
// Error Classes
// ============================================================================

export class AdapterUnavailableError extends Error {
  constructor(
    public service: string,
    public operation: string,
    message?: string
  ) {
    super(message ?? `${service} is not available or not configured`);
    this.name = 'AdapterUnavailableError';
  }
}

export class AdapterRejectedError extends Error {
  constructor(
    public service: string,
    public operation: string,
    message: string
  ) {
    super(message);
    this.name = 'AdapterRejectedError';
  }
}
