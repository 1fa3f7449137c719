/**
 * PostgreSQL-backed execution log.
 *
 * One INSERT per append. Failures propagate to the caller, which decides
 * how to surface them (the dispatcher and adapters log a warning).
 */

import type { Queryable } from '../db.js';
import { isCapabilityTag } from '../router/types.js';
import {
  toStorablePayload,
  type ConversationRole,
  type ConversationTurnEntry,
  type ExecutionLogStore,
  type ExecutionRecordEntry,
  type HistoryTurn,
  type OperationRecordEntry,
  type OperationStat,
  type SessionStatistics,
} from './types.js';

function toRole(value: string): ConversationRole {
  return value === 'assistant' || value === 'system' ? value : 'user';
}

function toJson(value: unknown): string {
  return JSON.stringify(toStorablePayload(value));
}

export class PgExecutionLog implements ExecutionLogStore {
  constructor(private db: Queryable) {}

  async appendConversationTurn(entry: ConversationTurnEntry): Promise<void> {
    await this.db.query(
      `INSERT INTO conversation_turns (session_id, role, content, route)
       VALUES ($1, $2, $3, $4)`,
      [entry.sessionId, entry.role, entry.content, entry.route ?? null]
    );
  }

  async appendExecutionRecord(entry: ExecutionRecordEntry): Promise<void> {
    await this.db.query(
      `INSERT INTO execution_records
         (session_id, task_type, input, output, status, error_text, elapsed_ms)
       VALUES ($1, $2, $3::jsonb, $4::jsonb, $5, $6, $7)`,
      [
        entry.sessionId,
        entry.taskType,
        toJson(entry.input),
        toJson(entry.output),
        entry.status,
        entry.errorText,
        Math.round(entry.elapsedMs),
      ]
    );
  }

  async appendOperationRecord(entry: OperationRecordEntry): Promise<void> {
    await this.db.query(
      `INSERT INTO operation_records
         (session_id, operation, service, request_payload, response_payload, status)
       VALUES ($1, $2, $3, $4::jsonb, $5::jsonb, $6)`,
      [
        entry.sessionId,
        entry.operation,
        entry.service,
        toJson(entry.requestPayload),
        toJson(entry.responsePayload),
        entry.status,
      ]
    );
  }

  async getSessionHistory(sessionId: string, limit = 20): Promise<HistoryTurn[]> {
    const result = await this.db.query<{
      role: string;
      content: string;
      route: string | null;
      created_at: Date;
    }>(
      `SELECT role, content, route, created_at
       FROM (
         SELECT id, role, content, route, created_at
         FROM conversation_turns
         WHERE session_id = $1
         ORDER BY created_at DESC, id DESC
         LIMIT $2
       ) recent
       ORDER BY created_at ASC, id ASC`,
      [sessionId, limit]
    );

    return result.rows.map((row) => ({
      role: toRole(row.role),
      content: row.content,
      route: isCapabilityTag(row.route) ? row.route : null,
      createdAt: new Date(row.created_at).toISOString(),
    }));
  }

  async getSessionStatistics(sessionId: string): Promise<SessionStatistics> {
    const counts = await this.db.query<{
      conversations: number;
      executions: number;
      operations: number;
    }>(
      `SELECT
         (SELECT COUNT(*)::int FROM conversation_turns WHERE session_id = $1) AS conversations,
         (SELECT COUNT(*)::int FROM execution_records WHERE session_id = $1) AS executions,
         (SELECT COUNT(*)::int FROM operation_records WHERE session_id = $1) AS operations`,
      [sessionId]
    );

    const activity = await this.db.query<{ date: string; count: number }>(
      `SELECT to_char(created_at::date, 'YYYY-MM-DD') AS date, COUNT(*)::int AS count
       FROM conversation_turns
       WHERE session_id = $1 AND created_at >= NOW() - INTERVAL '7 days'
       GROUP BY created_at::date
       ORDER BY created_at::date DESC`,
      [sessionId]
    );

    const row = counts.rows[0];
    return {
      conversations: row?.conversations ?? 0,
      executions: row?.executions ?? 0,
      operations: row?.operations ?? 0,
      recentActivity: activity.rows.map((r) => ({ date: r.date, count: r.count })),
    };
  }

  async getOperationStats(options: { days?: number; service?: string } = {}): Promise<OperationStat[]> {
    const conditions = [`created_at >= NOW() - ($1 * INTERVAL '1 day')`];
    const values: unknown[] = [options.days ?? 7];

    if (options.service) {
      values.push(options.service);
      conditions.push(`service = $${values.length}`);
    }

    const result = await this.db.query<{
      operation: string;
      service: string;
      call_count: number;
      error_rate_pct: number;
      last_called_at: string | null;
    }>(
      `SELECT
         operation,
         service,
         COUNT(*)::int                                                          AS call_count,
         ROUND(100.0 * COUNT(*) FILTER (WHERE status = 'error') / COUNT(*))::int AS error_rate_pct,
         MAX(created_at)::text                                                  AS last_called_at
       FROM operation_records
       WHERE ${conditions.join(' AND ')}
       GROUP BY operation, service
       ORDER BY call_count DESC, operation ASC`,
      values
    );

    return result.rows.map((row) => ({
      operation: row.operation,
      service: row.service,
      callCount: row.call_count,
      errorRatePct: row.error_rate_pct,
      lastCalledAt: row.last_called_at,
    }));
  }
}
