import type { ConnectionInfo, SqlExecutor, SqlResult, TableSchema } from '../connectors/postgres/sql-executor.js';
import { firstKeyword } from '../connectors/postgres/sql-executor.js';
import { stripCodeFence, type LlmClient } from '../utils/llm-router.js';
import { BaseCapabilityAdapter } from './base-adapter.js';
import { AdapterRejectedError, AdapterUnavailableError } from './types.js';

export type RelationalParams =
  | { operation: 'test_connection' }
  | { operation: 'setup_tables' }
  | { operation: 'natural_language_query'; question: string };

export type RelationalPayload =
  | { operation: 'test_connection'; connection: ConnectionInfo }
  | { operation: 'setup_tables'; tables: string[] }
  | { operation: 'natural_language_query'; question: string; generatedSql: string; result: SqlResult };

export interface RelationalAdapterOptions {
  allowWrites: boolean;
  /** Loads the DDL run by setup_tables. */
  loadSchemaSql: () => Promise<string>;
}

const READ_ONLY_KEYWORDS = new Set(['SELECT', 'WITH', 'SHOW', 'EXPLAIN', 'VALUES', 'TABLE']);
const WRITE_KEYWORD_PATTERN = /\b(insert|update|delete|drop|alter|truncate|create|grant|revoke)\b/i;

/**
 * True when the statement can only read. Multi-statement input is never
 * read-only, nor is EXPLAIN ANALYZE (it runs the statement) or
 * SELECT ... INTO (it creates a table). Queries that pass still run inside
 * a READ ONLY transaction.
 */
export function isReadOnlyStatement(sql: string): boolean {
  const body = sql.trim().replace(/;\s*$/, '');
  if (body.includes(';')) return false;
  const keyword = firstKeyword(body);
  if (!READ_ONLY_KEYWORDS.has(keyword)) return false;
  if (keyword === 'WITH' && WRITE_KEYWORD_PATTERN.test(body)) return false;
  if (keyword === 'EXPLAIN' && /\banaly[sz]e\b/i.test(body)) return false;
  if (/\binto\b/i.test(body)) return false;
  return true;
}

export function createdTableNames(ddl: string): string[] {
  const names: string[] = [];
  for (const match of ddl.matchAll(/create\s+table\s+(?:if\s+not\s+exists\s+)?("?[\w.]+"?)/gi)) {
    const name = match[1];
    if (name) names.push(name.replace(/"/g, ''));
  }
  return names;
}

export function formatSchema(tables: TableSchema[]): string {
  return tables
    .map((t) => `Table: ${t.table}\nColumns: ${t.columns.map((c) => `${c.name} (${c.type})`).join(', ')}`)
    .join('\n\n');
}

export class RelationalQueryAdapter extends BaseCapabilityAdapter<RelationalParams, RelationalPayload> {
  readonly tag = 'relational_query' as const;
  readonly service = 'postgres';

  constructor(
    private executor: SqlExecutor | null,
    private llm: LlmClient,
    private options: RelationalAdapterOptions
  ) {
    super('RelationalQueryAdapter');
  }

  isAvailable(): boolean {
    return this.executor !== null;
  }

  protected async checkPreconditions(params: RelationalParams): Promise<void> {
    if (params.operation === 'natural_language_query' && !this.llm.isAvailable('sql')) {
      throw new AdapterUnavailableError(
        'llm_sql',
        params.operation,
        'No language model is configured for SQL generation'
      );
    }
  }

  protected async execute(params: RelationalParams): Promise<RelationalPayload> {
    const executor = this.requireExecutor();

    switch (params.operation) {
      case 'test_connection':
        return { operation: 'test_connection', connection: await executor.describeConnection() };

      case 'setup_tables': {
        const ddl = await this.options.loadSchemaSql();
        await executor.execute(ddl);
        const tables = createdTableNames(ddl);
        this.logger.info('Workspace tables ensured', { tables });
        return { operation: 'setup_tables', tables };
      }

      case 'natural_language_query': {
        const schema = await executor.describeSchema();
        const response = await this.llm.call('sql', {
          systemPrompt: `You are a PostgreSQL expert. Convert the user's question into a single SQL statement for this schema:

${formatSchema(schema) || '(no tables)'}

Return only the SQL, without explanation or formatting.`,
          messages: [{ role: 'user', content: params.question }],
          maxTokens: 1000,
          temperature: 0,
        });

        const generatedSql = stripCodeFence(response.content, 'sql');
        if (!generatedSql) {
          throw new Error('Model returned no SQL');
        }
        if (!this.options.allowWrites && !isReadOnlyStatement(generatedSql)) {
          throw new AdapterRejectedError(
            this.service,
            params.operation,
            `Refusing to run a non read-only statement: ${firstKeyword(generatedSql) || 'unknown'}`
          );
        }

        const result = this.options.allowWrites
          ? await executor.execute(generatedSql)
          : await executor.executeReadOnly(generatedSql);
        return { operation: 'natural_language_query', question: params.question, generatedSql, result };
      }
    }
  }

  protected describeResponse(payload: RelationalPayload): unknown {
    if (payload.operation === 'natural_language_query') {
      return {
        operation: payload.operation,
        generatedSql: payload.generatedSql,
        command: payload.result.command,
        rowCount: payload.result.rowCount,
      };
    }
    return payload;
  }

  private requireExecutor(): SqlExecutor {
    if (!this.executor) {
      throw new Error('Target database is not configured');
    }
    return this.executor;
  }
}
