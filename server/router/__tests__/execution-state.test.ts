import { describe, it, expect } from 'vitest';
import { ExecutionState, InvalidStateTransitionError, SYSTEM_FAULT_OUTPUT } from '../execution-state.js';
import type { DispatchRequest } from '../types.js';

const request: DispatchRequest = Object.freeze({ userRequest: 'hello', sessionId: 'session-1', context: '' });

function makeClock(...times: number[]): () => number {
  let i = 0;
  return () => times[Math.min(i++, times.length - 1)] ?? 0;
}

describe('ExecutionState', () => {
  it('starts in processing with empty output', () => {
    const state = new ExecutionState(request, 'general_conversation');
    expect(state.status).toBe('processing');
    expect(state.finalOutput).toBe('');
    expect(state.errors).toEqual([]);
    expect(state.operations).toEqual({});
  });

  it('sets the first section and appends later ones after a blank line', () => {
    const state = new ExecutionState(request, 'code_generation');
    state.commit('code_generation', { output: 'first', errors: [], operations: [] });
    state.commit('planning', { output: 'second', errors: [], operations: [] });
    expect(state.finalOutput).toBe('first\n\nsecond');
  });

  it('skips empty sections when merging', () => {
    const state = new ExecutionState(request, 'planning');
    state.commit('planning', { output: '', errors: ['boom'], operations: [] });
    state.commit('composite_workflow', { output: 'after', errors: [], operations: [] });
    expect(state.finalOutput).toBe('after');
    expect(state.errors).toEqual(['boom']);
  });

  it('groups operation summaries by capability', () => {
    const state = new ExecutionState(request, 'repository_management');
    state.commit('repository_management', {
      output: 'x',
      errors: [],
      operations: [{ operation: 'list_repositories', service: 'github', success: true }],
    });
    state.commit('repository_management', {
      output: 'y',
      errors: [],
      operations: [{ operation: 'create_branch', service: 'github', success: false, error: 'nope' }],
    });
    expect(state.operations).toEqual({
      repository_management: [
        { operation: 'list_repositories', service: 'github', success: true },
        { operation: 'create_branch', service: 'github', success: false, error: 'nope' },
      ],
    });
  });

  it('completes without errors', () => {
    const state = new ExecutionState(request, 'general_conversation');
    expect(state.complete()).toBe('completed');
    expect(state.status).toBe('completed');
  });

  it('completes with errors when any section failed', () => {
    const state = new ExecutionState(request, 'general_conversation');
    state.commit('general_conversation', { output: '❌ Chat failed: down', errors: ['down'], operations: [] });
    expect(state.complete()).toBe('completed_with_errors');
  });

  it('replaces output and errors on a system fault', () => {
    const state = new ExecutionState(request, 'planning');
    state.commit('planning', { output: 'partial', errors: ['e1'], operations: [] });
    state.fail('disk on fire');
    expect(state.status).toBe('error');
    expect(state.finalOutput).toBe(SYSTEM_FAULT_OUTPUT);
    expect(state.errors).toEqual(['System error: disk on fire']);
  });

  it('rejects a second terminal transition', () => {
    const state = new ExecutionState(request, 'general_conversation');
    state.complete();
    expect(() => state.complete()).toThrow(InvalidStateTransitionError);
    expect(() => state.fail('late')).toThrow("Cannot transition execution state from 'completed' to 'error'");
  });

  it('rejects commits after settling', () => {
    const state = new ExecutionState(request, 'general_conversation');
    state.fail('x');
    expect(() => state.commit('planning', { output: 'late', errors: [], operations: [] })).toThrow(
      InvalidStateTransitionError
    );
  });

  it('freezes elapsed time at the terminal transition', () => {
    const state = new ExecutionState(request, 'general_conversation', makeClock(1000, 1250, 9999));
    state.complete();
    expect(state.elapsedMs).toBe(250);
    expect(state.elapsedMs).toBe(250);
  });
});
