import { vi } from 'vitest';
import type { ChatParams, ChatPayload } from '../../capabilities/chat-adapter.js';
import type { CodeGenerationParams, CodeGenerationPayload } from '../../capabilities/code-generation-adapter.js';
import type { PlanningParams, PlanningPayload } from '../../capabilities/planning-adapter.js';
import type { CapabilityAdapters } from '../../capabilities/registry.js';
import type { RelationalParams, RelationalPayload } from '../../capabilities/relational-query-adapter.js';
import type { RepositoryParams, RepositoryPayload } from '../../capabilities/repository-adapter.js';
import { failed, succeeded, type InvocationContext, type OperationOutcome } from '../../capabilities/types.js';
import type { WorkflowParams, WorkflowPayload } from '../../capabilities/workflow-adapter.js';
import type { GitHubRepository } from '../../connectors/github/types.js';
import type { CapabilityTag } from '../types.js';

export function stubAdapter<P extends { operation: string }, R>(
  tag: CapabilityTag,
  service: string,
  respond: (params: P) => OperationOutcome<R> | Promise<OperationOutcome<R>>,
  available = true
) {
  return {
    tag,
    service,
    isAvailable: vi.fn(() => available),
    invoke: vi.fn(async (params: P, _ctx: InvocationContext): Promise<OperationOutcome<R>> => respond(params)),
  };
}

export function makeRepository(name: string, overrides: Partial<GitHubRepository> = {}): GitHubRepository {
  return {
    name,
    fullName: `octo-user/${name}`,
    description: 'No description',
    htmlUrl: `https://github.example/octo-user/${name}`,
    cloneUrl: `https://github.example/octo-user/${name}.git`,
    sshUrl: `git@github.example:octo-user/${name}.git`,
    language: null,
    private: false,
    stars: 0,
    forks: 0,
    updatedAt: null,
    size: 0,
    ...overrides,
  };
}

export const STUB_CODE = 'def sort_list(items):\n    return sorted(items)';
export const STUB_PLAN = '1. Write unit tests\n2. Run them';

export function chatStub(available = true) {
  return stubAdapter<ChatParams, ChatPayload>(
    'general_conversation',
    'llm_chat',
    (params) => succeeded({ reply: `Echo: ${params.message}`, model: 'stub-model' }),
    available
  );
}

export function repositoryStub(
  respond: (params: RepositoryParams) => OperationOutcome<RepositoryPayload> = (params) => {
    switch (params.operation) {
      case 'create_repository':
        return succeeded({ operation: 'create_repository', repository: makeRepository(params.name) });
      case 'list_repositories':
        return succeeded({ operation: 'list_repositories', repositories: [makeRepository('demo-app')] });
      case 'create_branch':
        return succeeded({
          operation: 'create_branch',
          branch: {
            branchName: params.branchName,
            repoName: params.repoName,
            sourceBranch: params.sourceBranch,
            sha: 'abc1234def5678',
            refUrl: '',
          },
        });
      case 'list_branches':
        return succeeded({
          operation: 'list_branches',
          repoName: params.repoName,
          branches: [{ name: 'main', protected: true, commitSha: 'abc1234def5678' }],
        });
    }
  }
) {
  return stubAdapter<RepositoryParams, RepositoryPayload>('repository_management', 'github', respond);
}

export function codeStub() {
  return stubAdapter<CodeGenerationParams, CodeGenerationPayload>('code_generation', 'llm_codegen', (params) => {
    switch (params.operation) {
      case 'generate_code':
        return succeeded({
          operation: 'generate_code',
          language: params.language,
          style: params.style,
          includeTests: params.includeTests,
          code: STUB_CODE,
          durationMs: 1500,
        });
      case 'explain_code':
        return succeeded({ operation: 'explain_code', language: params.language, explanation: 'It sorts.' });
      case 'optimize_code':
        return succeeded({ operation: 'optimize_code', language: params.language, optimized: 'Already optimal.' });
    }
  });
}

export function planningStub() {
  return stubAdapter<PlanningParams, PlanningPayload>('planning', 'llm_planner', (params) =>
    params.operation === 'create_plan'
      ? succeeded({
          operation: 'create_plan',
          goal: params.goal,
          plan: STUB_PLAN,
          createdAt: '2026-01-01T00:00:00.000Z',
          durationMs: 500,
        })
      : succeeded({
          operation: 'break_down_task',
          task: params.task,
          complexity: params.complexity,
          breakdown: 'Step 1: start',
        })
  );
}

export function relationalStub() {
  return stubAdapter<RelationalParams, RelationalPayload>('relational_query', 'postgres', (params) =>
    params.operation === 'test_connection'
      ? succeeded({ operation: 'test_connection', connection: { serverVersion: '16.2', database: 'workspace' } })
      : failed(`${params.operation} not stubbed`)
  );
}

export function workflowStub() {
  return stubAdapter<WorkflowParams, WorkflowPayload>('composite_workflow', 'llm_workflow', (params) =>
    succeeded({
      description: params.description,
      plan: {
        services: ['github', 'planning'],
        steps: [{ step: 1, action: 'create_repository', description: 'Create the repository' }],
        inputs: [],
        outputs: [],
        successCriteria: ['repository exists'],
      },
      structured: true,
    })
  );
}

export function createStubCapabilities() {
  return {
    general_conversation: chatStub(),
    repository_management: repositoryStub(),
    code_generation: codeStub(),
    planning: planningStub(),
    relational_query: relationalStub(),
    composite_workflow: workflowStub(),
  } satisfies CapabilityAdapters;
}
