/**
 * In-process execution log.
 *
 * Used when no DATABASE_URL is configured and as the log store in tests.
 * Keeps the same append-only semantics as the PostgreSQL store; rows are
 * held in insertion order and never mutated.
 */

import {
  toStorablePayload,
  type ConversationTurnEntry,
  type ExecutionLogStore,
  type ExecutionRecordEntry,
  type HistoryTurn,
  type OperationRecordEntry,
  type OperationStat,
  type SessionStatistics,
} from './types.js';

export interface StoredConversationTurn extends ConversationTurnEntry {
  id: number;
  createdAt: Date;
}

export interface StoredExecutionRecord extends ExecutionRecordEntry {
  id: number;
  createdAt: Date;
}

export interface StoredOperationRecord extends OperationRecordEntry {
  id: number;
  createdAt: Date;
}

const DAY_MS = 24 * 60 * 60 * 1000;

export class InMemoryExecutionLog implements ExecutionLogStore {
  readonly conversationTurns: StoredConversationTurn[] = [];
  readonly executionRecords: StoredExecutionRecord[] = [];
  readonly operationRecords: StoredOperationRecord[] = [];
  private nextId = 1;

  constructor(private now: () => Date = () => new Date()) {}

  async appendConversationTurn(entry: ConversationTurnEntry): Promise<void> {
    this.conversationTurns.push({ ...entry, id: this.nextId++, createdAt: this.now() });
  }

  async appendExecutionRecord(entry: ExecutionRecordEntry): Promise<void> {
    const input = toStorablePayload(entry.input);
    const output = toStorablePayload(entry.output);
    this.executionRecords.push({
      ...entry,
      input: isRecord(input) ? input : {},
      output: isRecord(output) ? output : {},
      id: this.nextId++,
      createdAt: this.now(),
    });
  }

  async appendOperationRecord(entry: OperationRecordEntry): Promise<void> {
    this.operationRecords.push({
      ...entry,
      requestPayload: toStorablePayload(entry.requestPayload),
      responsePayload: toStorablePayload(entry.responsePayload),
      id: this.nextId++,
      createdAt: this.now(),
    });
  }

  async getSessionHistory(sessionId: string, limit = 20): Promise<HistoryTurn[]> {
    return this.conversationTurns
      .filter((turn) => turn.sessionId === sessionId)
      .slice(-limit)
      .map((turn) => ({
        role: turn.role,
        content: turn.content,
        route: turn.route ?? null,
        createdAt: turn.createdAt.toISOString(),
      }));
  }

  async getSessionStatistics(sessionId: string): Promise<SessionStatistics> {
    const turns = this.conversationTurns.filter((t) => t.sessionId === sessionId);
    const since = this.now().getTime() - 7 * DAY_MS;

    const byDate = new Map<string, number>();
    for (const turn of turns) {
      if (turn.createdAt.getTime() < since) continue;
      const date = turn.createdAt.toISOString().slice(0, 10);
      byDate.set(date, (byDate.get(date) ?? 0) + 1);
    }

    return {
      conversations: turns.length,
      executions: this.executionRecords.filter((r) => r.sessionId === sessionId).length,
      operations: this.operationRecords.filter((r) => r.sessionId === sessionId).length,
      recentActivity: Array.from(byDate.entries())
        .sort(([a], [b]) => (a < b ? 1 : a > b ? -1 : 0))
        .map(([date, count]) => ({ date, count })),
    };
  }

  async getOperationStats(options: { days?: number; service?: string } = {}): Promise<OperationStat[]> {
    const since = this.now().getTime() - (options.days ?? 7) * DAY_MS;
    const groups = new Map<string, StoredOperationRecord[]>();

    for (const record of this.operationRecords) {
      if (record.createdAt.getTime() < since) continue;
      if (options.service && record.service !== options.service) continue;
      const key = `${record.service}\u0000${record.operation}`;
      const group = groups.get(key);
      if (group) group.push(record);
      else groups.set(key, [record]);
    }

    const stats: OperationStat[] = [];
    for (const records of groups.values()) {
      const first = records[0];
      const last = records[records.length - 1];
      if (!first || !last) continue;
      const errors = records.filter((r) => r.status === 'error').length;
      stats.push({
        operation: first.operation,
        service: first.service,
        callCount: records.length,
        errorRatePct: Math.round((100 * errors) / records.length),
        lastCalledAt: last.createdAt.toISOString(),
      });
    }

    return stats.sort(
      (a, b) => b.callCount - a.callCount || a.operation.localeCompare(b.operation)
    );
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
