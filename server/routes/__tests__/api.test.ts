import type { Server } from 'http';
import { afterEach, describe, expect, it, vi } from 'vitest';

vi.mock('../../utils/logger.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../utils/logger.js')>();
  return {
    ...actual,
    createLogger: () => ({ debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }),
  };
});

import { validate as isUuid } from 'uuid';
import { createApp, type AppDeps } from '../../app.js';
import { CapabilityRegistry } from '../../capabilities/registry.js';
import { SessionContextStore } from '../../conversations/session-context.js';
import { InMemoryExecutionLog } from '../../execution-log/index.js';
import { DispatchMetrics } from '../../metrics/dispatch-metrics.js';
import { DispatchOrchestrator, KeywordRequestClassifier } from '../../router/index.js';
import { createStubCapabilities } from '../../router/__tests__/stub-capabilities.js';

const SESSION = '3f2b8c1e-4a5d-4e6f-8a9b-0c1d2e3f4a5b';

const servers: Server[] = [];

async function startApp(overrides: Partial<AppDeps> = {}): Promise<string> {
  const log = new InMemoryExecutionLog();
  const registry = new CapabilityRegistry(createStubCapabilities());
  const metrics = new DispatchMetrics();
  const orchestrator = new DispatchOrchestrator({
    classifier: new KeywordRequestClassifier(),
    registry,
    log,
    sessions: new SessionContextStore(),
    metrics,
  });
  const app = createApp({
    orchestrator,
    registry,
    logReader: log,
    logStoreKind: 'memory',
    checkLogStore: null,
    metrics,
    isReady: () => true,
    ...overrides,
  });

  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
  });
  servers.push(server);
  const address = server.address();
  if (!address || typeof address === 'string') {
    throw new Error('Server did not bind to a TCP port');
  }
  return `http://127.0.0.1:${address.port}`;
}

function post(url: string, body: unknown): Promise<Response> {
  return fetch(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  });
}

afterEach(async () => {
  await Promise.all(
    servers.splice(0).map(
      (server) => new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())))
    )
  );
});

describe('assistant API', () => {
  it('issues UUID session ids', async () => {
    const base = await startApp();

    const res = await post(`${base}/api/sessions`, {});
    const body: unknown = await res.json();

    expect(res.status).toBe(201);
    expect(body).toEqual({ sessionId: expect.any(String) });
    const sessionId = typeof body === 'object' && body !== null && 'sessionId' in body ? body.sessionId : null;
    expect(typeof sessionId === 'string' && isUuid(sessionId)).toBe(true);
  });

  it('dispatches a request and exposes its history and statistics', async () => {
    const base = await startApp();

    const dispatched = await post(`${base}/api/sessions/${SESSION}/dispatch`, { input: ' create repository demo-app ' });
    expect(dispatched.status).toBe(200);
    expect(await dispatched.json()).toMatchObject({
      userRequest: 'create repository demo-app',
      sessionId: SESSION,
      taskType: 'repository_management',
      status: 'completed',
      errors: [],
    });

    const history = await fetch(`${base}/api/sessions/${SESSION}/history?limit=1`);
    expect(await history.json()).toMatchObject({
      sessionId: SESSION,
      turns: [{ role: 'assistant', route: 'repository_management' }],
    });

    const stats = await fetch(`${base}/api/sessions/${SESSION}/stats`);
    expect(await stats.json()).toMatchObject({ sessionId: SESSION, conversations: 2, executions: 1, operations: 0 });

    const metrics = await fetch(`${base}/api/metrics`);
    expect(await metrics.json()).toMatchObject({ requestsProcessed: 1, errorsEncountered: 0 });

    const cleared = await fetch(`${base}/api/sessions/${SESSION}/context`, { method: 'DELETE' });
    expect(await cleared.json()).toEqual({ sessionId: SESSION, cleared: true });
  });

  it('validates the session id and input', async () => {
    const base = await startApp();

    const badSession = await post(`${base}/api/sessions/not-a-uuid/dispatch`, { input: 'hi' });
    expect(badSession.status).toBe(400);
    expect(await badSession.json()).toEqual({ error: 'sessionId must be a UUID' });

    const badInput = await post(`${base}/api/sessions/${SESSION}/dispatch`, { input: '' });
    expect(badInput.status).toBe(400);
    expect(await badInput.json()).toEqual({ error: 'input is required and must be a non-empty string', field: 'input' });

    const badLimit = await fetch(`${base}/api/sessions/${SESSION}/history?limit=0`);
    expect(badLimit.status).toBe(400);
  });

  it('classifies without dispatching', async () => {
    const base = await startApp();

    const res = await post(`${base}/api/classify`, { input: 'generate code and plan a workflow' });

    expect(await res.json()).toEqual({
      primaryRoute: 'code_generation',
      secondaryRoutes: ['planning', 'composite_workflow'],
      confidence: 0.8,
      declaredOperations: ['generate_code', 'create_plan', 'create_workflow'],
    });
  });
});

describe('analytics API', () => {
  it('rejects a malformed day window', async () => {
    const base = await startApp();

    const res = await fetch(`${base}/api/analytics/operations?days=abc`);

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'days must be a positive integer', field: 'days' });
  });

  it('returns operation statistics', async () => {
    const base = await startApp();

    const res = await fetch(`${base}/api/analytics/operations?days=400&service=github`);

    expect(await res.json()).toEqual({ days: 365, service: 'github', operations: [] });
  });
});

describe('health API', () => {
  it('reports capabilities and the log store', async () => {
    const base = await startApp();

    const res = await fetch(`${base}/health`);

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      status: 'ok',
      version: '0.1.0',
      ready: true,
      services: { executionLog: { kind: 'memory', status: 'ok' } },
      capabilities: {
        general_conversation: { service: 'llm_chat', available: true },
        relational_query: { service: 'postgres', available: true },
      },
    });
  });

  it('fails when the log store does not answer', async () => {
    const base = await startApp({
      logStoreKind: 'postgres',
      checkLogStore: async () => {
        throw new Error('connection refused');
      },
    });

    const res = await fetch(`${base}/health`);

    expect(res.status).toBe(503);
    expect(await res.json()).toMatchObject({
      status: 'error',
      services: { executionLog: { kind: 'postgres', status: 'error', error: 'connection refused' } },
    });
  });

  it('is not ready until the server says so', async () => {
    const base = await startApp({ isReady: () => false });

    const res = await fetch(`${base}/health/ready`);

    expect(res.status).toBe(503);
    expect(await res.json()).toMatchObject({ status: 'initializing' });
  });
});
