import { describe, expect, it, vi } from 'vitest';

vi.mock('../../utils/logger.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../utils/logger.js')>();
  return {
    ...actual,
    createLogger: () => ({ debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }),
  };
});

import { InMemoryExecutionLog } from '../../execution-log/memory-execution-log.js';
import { ChatAdapter } from '../chat-adapter.js';
import { CodeGenerationAdapter } from '../code-generation-adapter.js';
import { PlanningAdapter } from '../planning-adapter.js';
import { WorkflowAdapter, fallbackWorkflowPlan, parseWorkflowPlan } from '../workflow-adapter.js';
import { stubLlm } from './stub-llm.js';

function invocation() {
  const log = new InMemoryExecutionLog();
  return { log, ctx: { sessionId: 'llm-session', log } };
}

describe('ChatAdapter', () => {
  it('sends alternating history with the new message', async () => {
    const llm = stubLlm('Doing well.');
    const { log, ctx } = invocation();

    const outcome = await new ChatAdapter(llm).invoke(
      {
        operation: 'chat',
        message: 'how are you',
        history: [
          { role: 'assistant', content: 'welcome' },
          { role: 'user', content: 'hi' },
        ],
      },
      ctx
    );

    expect(outcome).toEqual({ success: true, payload: { reply: 'Doing well.', model: 'stub-chat' } });
    expect(llm.call).toHaveBeenCalledWith(
      'chat',
      expect.objectContaining({
        messages: [{ role: 'user', content: 'hi\n\nhow are you' }],
        maxTokens: 2048,
        temperature: 0.3,
      })
    );
    expect(log.operationRecords[0]?.requestPayload).toEqual({ message: 'how are you', historyTurns: 2 });
  });

  it('fails on an empty reply', async () => {
    const { ctx } = invocation();

    const outcome = await new ChatAdapter(stubLlm('   ')).invoke({ operation: 'chat', message: 'hi', history: [] }, ctx);

    expect(outcome).toEqual({ success: false, error: 'Chat model returned an empty response' });
  });

  it('is unavailable without a chat model', async () => {
    const llm = stubLlm('unused', ['plan']);
    const { ctx } = invocation();
    const adapter = new ChatAdapter(llm);

    const outcome = await adapter.invoke({ operation: 'chat', message: 'hi', history: [] }, ctx);

    expect(adapter.isAvailable()).toBe(false);
    expect(outcome).toEqual({ success: false, error: 'llm_chat is not available or not configured' });
    expect(llm.call).not.toHaveBeenCalled();
  });
});

describe('CodeGenerationAdapter', () => {
  it('strips the fence from generated code', async () => {
    const llm = stubLlm('Here you go:\n```python\nprint("hi")\n```');
    const { ctx } = invocation();

    const outcome = await new CodeGenerationAdapter(llm).invoke(
      { operation: 'generate_code', prompt: 'print hi', language: 'python', style: 'beginner', includeTests: true },
      ctx
    );

    expect(outcome).toEqual({
      success: true,
      payload: {
        operation: 'generate_code',
        language: 'python',
        style: 'beginner',
        includeTests: true,
        code: 'print("hi")',
        durationMs: expect.any(Number),
      },
    });
    const options = llm.call.mock.calls[0]?.[1];
    expect(options?.systemPrompt).toContain('Include unit tests');
    expect(options?.systemPrompt).toContain('Write for a beginner');
    expect(options?.messages).toEqual([{ role: 'user', content: 'print hi' }]);
  });

  it('explains code', async () => {
    const llm = stubLlm('It adds one.');
    const { ctx } = invocation();

    const outcome = await new CodeGenerationAdapter(llm).invoke(
      { operation: 'explain_code', code: 'x + 1', language: 'js' },
      ctx
    );

    expect(outcome).toEqual({
      success: true,
      payload: { operation: 'explain_code', language: 'js', explanation: 'It adds one.' },
    });
    expect(llm.call).toHaveBeenCalledWith(
      'generate',
      expect.objectContaining({
        messages: [{ role: 'user', content: 'Explain this js code:\n\n```js\nx + 1\n```' }],
      })
    );
  });
});

describe('PlanningAdapter', () => {
  it('includes recent context in the goal message', async () => {
    const llm = stubLlm('1. Do it');
    const { log, ctx } = invocation();
    const adapter = new PlanningAdapter(llm, () => new Date('2026-05-01T08:00:00.000Z'));

    const outcome = await adapter.invoke({ operation: 'create_plan', goal: 'ship', context: 'User: hi' }, ctx);

    expect(outcome).toEqual({
      success: true,
      payload: {
        operation: 'create_plan',
        goal: 'ship',
        plan: '1. Do it',
        createdAt: '2026-05-01T08:00:00.000Z',
        durationMs: expect.any(Number),
      },
    });
    expect(llm.call.mock.calls[0]?.[1].messages).toEqual([
      { role: 'user', content: 'Goal: ship\n\nContext:\nUser: hi\n\nCreate a comprehensive plan.' },
    ]);
    expect(log.operationRecords[0]?.requestPayload).toEqual({ operation: 'create_plan', goal: 'ship', contextChars: 8 });
  });

  it('scales the breakdown to the complexity', async () => {
    const llm = stubLlm('Step 1');
    const { ctx } = invocation();

    const outcome = await new PlanningAdapter(llm).invoke(
      { operation: 'break_down_task', task: 'move house', complexity: 'simple' },
      ctx
    );

    expect(outcome).toEqual({
      success: true,
      payload: { operation: 'break_down_task', task: 'move house', complexity: 'simple', breakdown: 'Step 1' },
    });
    expect(llm.call.mock.calls[0]?.[1].systemPrompt).toContain('Use 3-5 basic steps');
  });
});

describe('parseWorkflowPlan', () => {
  it('reads a fenced JSON plan and fills in missing step fields', () => {
    const text = [
      '```json',
      JSON.stringify({
        services: ['github', 7],
        steps: [{ action: 'create_repository' }, { step: 5, action: 'plan', description: 'Plan sprint' }, 'junk'],
        success_criteria: ['repository exists'],
      }),
      '```',
    ].join('\n');

    expect(parseWorkflowPlan(text)).toEqual({
      services: ['github'],
      steps: [
        { step: 1, action: 'create_repository', description: '' },
        { step: 5, action: 'plan', description: 'Plan sprint' },
      ],
      inputs: [],
      outputs: [],
      successCriteria: ['repository exists'],
    });
  });

  it('reads JSON from an untagged fence', () => {
    expect(parseWorkflowPlan('```\n{"services":["github"],"steps":[]}\n```')).toEqual({
      services: ['github'],
      steps: [],
      inputs: [],
      outputs: [],
      successCriteria: [],
    });
  });

  it('accepts camelCase success criteria', () => {
    expect(parseWorkflowPlan('{"successCriteria": ["done"]}')?.successCriteria).toEqual(['done']);
  });

  it('returns null for text that is not a JSON object', () => {
    expect(parseWorkflowPlan('first create a repo')).toBeNull();
    expect(parseWorkflowPlan('[1, 2]')).toBeNull();
  });
});

describe('WorkflowAdapter', () => {
  it('asks for JSON and returns the structured plan', async () => {
    const llm = stubLlm('{"services": ["planning"], "steps": [{"step": 1, "action": "plan", "description": "Plan it"}]}');
    const { ctx } = invocation();

    const outcome = await new WorkflowAdapter(llm).invoke({ operation: 'analyze_workflow', description: 'plan it' }, ctx);

    expect(outcome).toEqual({
      success: true,
      payload: {
        description: 'plan it',
        plan: {
          services: ['planning'],
          steps: [{ step: 1, action: 'plan', description: 'Plan it' }],
          inputs: [],
          outputs: [],
          successCriteria: [],
        },
        structured: true,
      },
    });
    expect(llm.call).toHaveBeenCalledWith('workflow', expect.objectContaining({ jsonMode: true }));
  });

  it('falls back to a single analysis step for prose answers', async () => {
    const { ctx } = invocation();

    const outcome = await new WorkflowAdapter(stubLlm('  Create the repo, then plan.  ')).invoke(
      { operation: 'analyze_workflow', description: 'repo then plan' },
      ctx
    );

    expect(outcome).toEqual({
      success: true,
      payload: {
        description: 'repo then plan',
        plan: fallbackWorkflowPlan('repo then plan', 'Create the repo, then plan.'),
        structured: false,
      },
    });
    expect(fallbackWorkflowPlan('repo then plan', 'Create the repo, then plan.')).toEqual({
      services: ['planning'],
      steps: [{ step: 1, action: 'analyze_workflow', description: 'Create the repo, then plan.' }],
      inputs: ['repo then plan'],
      outputs: ['analysis_complete'],
      successCriteria: ['workflow_analyzed'],
    });
  });
});
