/**
 * Execution Log
 *
 * Append-only store for conversation turns, dispatch execution records,
 * and per-adapter operation records. Writers append one row per call;
 * readers back the history and analytics endpoints.
 */

import type { CapabilityTag, TerminalStatus } from '../router/types.js';

export type ConversationRole = 'user' | 'assistant' | 'system';

export interface ConversationTurnEntry {
  sessionId: string;
  role: ConversationRole;
  content: string;
  route?: CapabilityTag | null;
}

export interface ExecutionRecordEntry {
  sessionId: string;
  taskType: CapabilityTag;
  input: Record<string, unknown>;
  output: Record<string, unknown>;
  status: TerminalStatus;
  errorText: string | null;
  elapsedMs: number;
}

export type OperationStatus = 'success' | 'error';

export interface OperationRecordEntry {
  sessionId: string;
  operation: string;
  service: string;
  requestPayload: unknown;
  responsePayload: unknown;
  status: OperationStatus;
}

export interface ExecutionLog {
  appendConversationTurn(entry: ConversationTurnEntry): Promise<void>;
  appendExecutionRecord(entry: ExecutionRecordEntry): Promise<void>;
  appendOperationRecord(entry: OperationRecordEntry): Promise<void>;
}

// ─── Reader side ─────────────────────────────────────────────────────────────

export interface HistoryTurn {
  role: ConversationRole;
  content: string;
  route: CapabilityTag | null;
  createdAt: string;
}

export interface SessionStatistics {
  conversations: number;
  executions: number;
  operations: number;
  /** Conversation turns per day (YYYY-MM-DD) over the last 7 days, newest first. */
  recentActivity: Array<{ date: string; count: number }>;
}

export interface OperationStat {
  operation: string;
  service: string;
  callCount: number;
  errorRatePct: number;
  lastCalledAt: string | null;
}

export interface ExecutionLogReader {
  getSessionHistory(sessionId: string, limit?: number): Promise<HistoryTurn[]>;
  getSessionStatistics(sessionId: string): Promise<SessionStatistics>;
  getOperationStats(options?: { days?: number; service?: string }): Promise<OperationStat[]>;
}

export type ExecutionLogStore = ExecutionLog & ExecutionLogReader;

// ─── Serialization helpers ───────────────────────────────────────────────────

export const MAX_PAYLOAD_STRING_LENGTH = 2000;

/**
 * Deep-copy a payload into JSON-safe form, truncating long strings.
 * Values JSON cannot carry (functions, symbols, undefined) are dropped;
 * errors become their message; dates become ISO strings.
 */
export function toStorablePayload(value: unknown, depth = 0): unknown {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string') {
    return value.length > MAX_PAYLOAD_STRING_LENGTH
      ? `${value.slice(0, MAX_PAYLOAD_STRING_LENGTH)}...`
      : value;
  }
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'boolean') return value;
  if (typeof value === 'bigint') return value.toString();
  if (value instanceof Date) return value.toISOString();
  if (value instanceof Error) return { error: value.message };
  if (depth >= 8) return '[truncated]';
  if (Array.isArray(value)) return value.map((item) => toStorablePayload(item, depth + 1));
  if (typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      if (item === undefined || typeof item === 'function' || typeof item === 'symbol') continue;
      result[key] = toStorablePayload(item, depth + 1);
    }
    return result;
  }
  return null;
}
