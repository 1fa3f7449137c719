import type { AppConfig } from '../config/index.js';
import type { RepositoryBackend } from './repository-adapter.js';
import type { SqlExecutor } from '../connectors/postgres/sql-executor.js';
import type { LlmClient } from '../utils/llm-router.js';
import { ChatAdapter } from './chat-adapter.js';
import { CodeGenerationAdapter } from './code-generation-adapter.js';
import { PlanningAdapter } from './planning-adapter.js';
import { RelationalQueryAdapter } from './relational-query-adapter.js';
import { RepositoryAdapter } from './repository-adapter.js';
import { WorkflowAdapter } from './workflow-adapter.js';
import { CapabilityRegistry } from './registry.js';

export * from './types.js';
export * from './base-adapter.js';
export * from './registry.js';
export * from './chat-adapter.js';
export * from './code-generation-adapter.js';
export * from './planning-adapter.js';
export * from './repository-adapter.js';
export * from './relational-query-adapter.js';
export * from './workflow-adapter.js';

export interface CapabilityBackends {
  llm: LlmClient;
  /** Null when no GitHub token is configured. */
  github: RepositoryBackend | null;
  /** Null when no target database is configured. */
  sql: SqlExecutor | null;
  loadSchemaSql: () => Promise<string>;
}

export function createCapabilityRegistry(config: AppConfig, backends: CapabilityBackends): CapabilityRegistry {
  return new CapabilityRegistry({
    general_conversation: new ChatAdapter(backends.llm),
    repository_management: new RepositoryAdapter(backends.github),
    code_generation: new CodeGenerationAdapter(backends.llm),
    planning: new PlanningAdapter(backends.llm),
    relational_query: new RelationalQueryAdapter(backends.sql, backends.llm, {
      allowWrites: config.relational.allowWrites,
      loadSchemaSql: backends.loadSchemaSql,
    }),
    composite_workflow: new WorkflowAdapter(backends.llm),
  });
}
