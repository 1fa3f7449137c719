import type { SqlResult } from '../../connectors/postgres/sql-executor.js';
import { SectionBuilder, type RouteHandler } from './section.js';

const NATURAL_QUERY_INDICATORS = ['show me', 'find', 'get', 'list', 'count', 'how many', 'what are'];
const MAX_TABLE_ROWS = 10;
const SAMPLE_ROWS = 5;

export const RELATIONAL_HELP = `## 🗄️ Database Operations Available

### 🔗 Connection Management
- **Test connection:** "connect to the database"
- **Set up tables:** "setup database tables"

### 🤖 Natural Language Queries
- **Show data:** "show me all users from the database"
- **Find data:** "find conversations from last week in the database"
- **Count records:** "how many workflows are in the table"

Generated SQL is read-only unless writes are enabled for this deployment.

What would you like to do with the database?`;

export function formatCell(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (value instanceof Date) return value.toISOString();
  const text = typeof value === 'object' ? JSON.stringify(value) : String(value);
  return text.replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');
}

export function markdownTable(columns: string[], rows: Array<Record<string, unknown>>): string {
  const header = `| ${columns.join(' | ')} |`;
  const separator = `| ${columns.map(() => '---').join(' | ')} |`;
  const body = rows.map((row) => `| ${columns.map((c) => formatCell(row[c])).join(' | ')} |`);
  return [header, separator, ...body].join('\n');
}

export function formatQueryResult(question: string, sql: string, result: SqlResult): string {
  const heading = `## 🗄️ Query Results\n\n**Question:** ${question}\n**Generated SQL:** \`${sql}\``;

  if (result.command !== 'SELECT' || result.rows.length === 0) {
    return `## ✅ Query Completed\n\n**Question:** ${question}\n**Generated SQL:** \`${sql}\`\n**Operation:** ${result.command}\n**Affected Rows:** ${result.rowCount}`;
  }

  if (result.rows.length <= MAX_TABLE_ROWS) {
    return `${heading}\n**Rows Found:** ${result.rows.length}\n\n### 📊 Data\n\n${markdownTable(result.columns, result.rows)}`;
  }

  const sample = JSON.stringify(result.rows.slice(0, SAMPLE_ROWS), null, 2);
  return `${heading}\n**Rows Found:** ${result.rows.length} (showing first ${SAMPLE_ROWS})\n\n### 📊 Sample Data\n\n\`\`\`json\n${sample}\n\`\`\``;
}

export const handleRelationalQuery: RouteHandler = async (ctx) => {
  const section = new SectionBuilder(ctx.invocation);
  const adapter = ctx.registry.get('relational_query');
  const text = ctx.request.userRequest;
  const lower = text.toLowerCase();

  if (NATURAL_QUERY_INDICATORS.some((w) => lower.includes(w))) {
    const outcome = await section.invoke(adapter, { operation: 'natural_language_query', question: text });
    if (outcome.success && outcome.payload.operation === 'natural_language_query') {
      section.write(formatQueryResult(text, outcome.payload.generatedSql, outcome.payload.result));
    } else if (!outcome.success) {
      section.fail('Database query', outcome.error);
    }
    return section.build();
  }

  if (lower.includes('setup') && lower.includes('tables')) {
    const outcome = await section.invoke(adapter, { operation: 'setup_tables' });
    if (outcome.success && outcome.payload.operation === 'setup_tables') {
      const tables = outcome.payload.tables.map((t) => `- **${t}**`).join('\n');
      section.write(`## ✅ Database Setup Complete\n\n### 📊 Tables Ready\n${tables}`);
    } else if (!outcome.success) {
      section.fail('Database setup', outcome.error);
    }
    return section.build();
  }

  if (lower.includes('connect') || lower.includes('setup')) {
    const outcome = await section.invoke(adapter, { operation: 'test_connection' });
    if (outcome.success && outcome.payload.operation === 'test_connection') {
      const { serverVersion, database } = outcome.payload.connection;
      section.write(
        `## ✅ Database Connection Successful\n\n**Server Version:** ${serverVersion}\n**Database:** ${database}\n\nReady to run queries.`
      );
    } else if (!outcome.success) {
      section.fail('Database connection', outcome.error);
    }
    return section.build();
  }

  return section.write(RELATIONAL_HELP).build();
};
