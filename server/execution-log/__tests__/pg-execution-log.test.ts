import { describe, expect, it, vi } from 'vitest';
import { PgExecutionLog } from '../pg-execution-log.js';

function fakeDb() {
  const query = vi.fn();
  query.mockResolvedValue({ rows: [], rowCount: 0 });
  return { db: { query }, query };
}

describe('PgExecutionLog', () => {
  it('inserts execution records with JSON payloads', async () => {
    const { db, query } = fakeDb();

    await new PgExecutionLog(db).appendExecutionRecord({
      sessionId: 's1',
      taskType: 'planning',
      input: { userRequest: 'plan' },
      output: { finalOutput: 'done' },
      status: 'completed_with_errors',
      errorText: 'model offline',
      elapsedMs: 12.6,
    });

    const [sql, params] = query.mock.calls[0] ?? [];
    expect(sql).toContain('INSERT INTO execution_records');
    expect(params).toEqual([
      's1',
      'planning',
      '{"userRequest":"plan"}',
      '{"finalOutput":"done"}',
      'completed_with_errors',
      'model offline',
      13,
    ]);
  });

  it('stores a null route when the turn has none', async () => {
    const { db, query } = fakeDb();

    await new PgExecutionLog(db).appendConversationTurn({ sessionId: 's1', role: 'user', content: 'hi' });

    expect(query.mock.calls[0]?.[1]).toEqual(['s1', 'user', 'hi', null]);
  });

  it('truncates long operation payloads', async () => {
    const { db, query } = fakeDb();

    await new PgExecutionLog(db).appendOperationRecord({
      sessionId: 's1',
      operation: 'generate_code',
      service: 'llm_codegen',
      requestPayload: { prompt: 'a'.repeat(2100) },
      responsePayload: { success: true },
      status: 'success',
    });

    expect(query.mock.calls[0]?.[1]).toEqual([
      's1',
      'generate_code',
      'llm_codegen',
      JSON.stringify({ prompt: `${'a'.repeat(2000)}...` }),
      '{"success":true}',
      'success',
    ]);
  });

  it('propagates insert failures', async () => {
    const { db, query } = fakeDb();
    query.mockRejectedValueOnce(new Error('connection refused'));

    await expect(
      new PgExecutionLog(db).appendConversationTurn({ sessionId: 's1', role: 'user', content: 'hi' })
    ).rejects.toThrow('connection refused');
  });

  it('maps history rows', async () => {
    const { db, query } = fakeDb();
    query.mockResolvedValueOnce({
      rows: [
        { role: 'user', content: 'hi', route: 'planning', created_at: new Date('2026-04-01T09:00:00.000Z') },
        { role: 'tool', content: 'odd', route: 'nonsense', created_at: new Date('2026-04-01T09:00:01.000Z') },
      ],
    });

    const history = await new PgExecutionLog(db).getSessionHistory('s1', 5);

    expect(query.mock.calls[0]?.[1]).toEqual(['s1', 5]);
    expect(history).toEqual([
      { role: 'user', content: 'hi', route: 'planning', createdAt: '2026-04-01T09:00:00.000Z' },
      { role: 'user', content: 'odd', route: null, createdAt: '2026-04-01T09:00:01.000Z' },
    ]);
  });

  it('combines counts and recent activity', async () => {
    const { db, query } = fakeDb();
    query
      .mockResolvedValueOnce({ rows: [{ conversations: 4, executions: 2, operations: 3 }] })
      .mockResolvedValueOnce({ rows: [{ date: '2026-04-01', count: 4 }] });

    await expect(new PgExecutionLog(db).getSessionStatistics('s1')).resolves.toEqual({
      conversations: 4,
      executions: 2,
      operations: 3,
      recentActivity: [{ date: '2026-04-01', count: 4 }],
    });
  });

  it('filters operation stats by service', async () => {
    const { db, query } = fakeDb();
    query.mockResolvedValueOnce({
      rows: [
        { operation: 'create_repository', service: 'github', call_count: 3, error_rate_pct: 33, last_called_at: null },
      ],
    });

    const stats = await new PgExecutionLog(db).getOperationStats({ days: 30, service: 'github' });

    const [sql, params] = query.mock.calls[0] ?? [];
    expect(sql).toContain('service = $2');
    expect(params).toEqual([30, 'github']);
    expect(stats).toEqual([
      { operation: 'create_repository', service: 'github', callCount: 3, errorRatePct: 33, lastCalledAt: null },
    ]);
  });

  it('defaults operation stats to seven days', async () => {
    const { db, query } = fakeDb();

    await new PgExecutionLog(db).getOperationStats();

    const [sql, params] = query.mock.calls[0] ?? [];
    expect(sql).not.toContain('service =');
    expect(params).toEqual([7]);
  });
});
