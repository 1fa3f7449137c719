/**
 * Application Configuration
 *
 * Reads process environment (after dotenv) into a typed AppConfig.
 * Every value has a default except credentials; a capability whose
 * credential is missing is reported as unavailable rather than failing
 * startup.
 */

export type LlmTask = 'chat' | 'plan' | 'generate' | 'sql' | 'workflow';

export const LLM_TASKS: readonly LlmTask[] = ['chat', 'plan', 'generate', 'sql', 'workflow'];

export type LlmProvider = 'anthropic' | 'groq' | 'openai' | 'fireworks';

const VALID_PROVIDERS = new Set<string>(['anthropic', 'groq', 'openai', 'fireworks']);

export interface LlmRoute {
  provider: LlmProvider;
  model: string;
}

export interface AppConfig {
  port: number;
  databaseUrl: string | null;
  targetDatabaseUrl: string | null;
  providerKeys: Record<LlmProvider, string>;
  llmRoutes: Record<LlmTask, LlmRoute>;
  github: {
    token: string;
    apiUrl: string;
  };
  memory: {
    maxMessages: number;
    contextTurns: number;
    sessionTtlHours: number;
  };
  dispatch: {
    parallelSecondaryRoutes: boolean;
  };
  relational: {
    allowWrites: boolean;
    statementTimeoutMs: number;
  };
  logLevel: string;
}

export const DEFAULT_LLM_ROUTES: Record<LlmTask, string> = {
  chat: 'groq/llama-3.3-70b-versatile',
  plan: 'groq/llama-3.3-70b-versatile',
  generate: 'anthropic/claude-sonnet-4-5',
  sql: 'anthropic/claude-sonnet-4-5',
  workflow: 'anthropic/claude-sonnet-4-5',
};

export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public field: string,
    public value: unknown
  ) {
    super(message);
    this.name = 'ConfigValidationError';
  }
}

type Env = Record<string, string | undefined>;

function optionalString(env: Env, name: string): string | null {
  const value = env[name]?.trim();
  return value ? value : null;
}

function positiveInt(env: Env, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;

  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigValidationError(`${name} must be a positive integer`, name, raw);
  }
  return parsed;
}

function booleanFlag(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) return fallback;
  if (['1', 'true', 'yes', 'on'].includes(raw)) return true;
  if (['0', 'false', 'no', 'off'].includes(raw)) return false;
  throw new ConfigValidationError(`${name} must be a boolean (true/false)`, name, raw);
}

function isProvider(value: string): value is LlmProvider {
  return VALID_PROVIDERS.has(value);
}

/**
 * Parse a `provider/model` route string.
 */
export function parseLlmRoute(route: string, field: string): LlmRoute {
  const slashIndex = route.indexOf('/');
  if (slashIndex <= 0 || slashIndex === route.length - 1) {
    throw new ConfigValidationError(
      `Invalid routing format '${route}'; expected 'provider/model'`,
      field,
      route
    );
  }

  const provider = route.substring(0, slashIndex);
  if (!isProvider(provider)) {
    throw new ConfigValidationError(
      `Unknown provider "${provider}". Must be one of: ${Array.from(VALID_PROVIDERS).join(', ')}`,
      field,
      route
    );
  }

  return { provider, model: route.substring(slashIndex + 1) };
}

export function loadAppConfig(env: Env = process.env): AppConfig {
  const route = (task: LlmTask): LlmRoute => {
    const field = `LLM_ROUTE_${task.toUpperCase()}`;
    return parseLlmRoute(optionalString(env, field) ?? DEFAULT_LLM_ROUTES[task], field);
  };
  const llmRoutes: Record<LlmTask, LlmRoute> = {
    chat: route('chat'),
    plan: route('plan'),
    generate: route('generate'),
    sql: route('sql'),
    workflow: route('workflow'),
  };

  const githubApiUrl = optionalString(env, 'GITHUB_API_URL') ?? 'https://api.github.com';
  if (!/^https?:\/\//.test(githubApiUrl)) {
    throw new ConfigValidationError('GITHUB_API_URL must be an http(s) URL', 'GITHUB_API_URL', githubApiUrl);
  }

  return {
    port: positiveInt(env, 'PORT', 3000),
    databaseUrl: optionalString(env, 'DATABASE_URL'),
    targetDatabaseUrl: optionalString(env, 'TARGET_DATABASE_URL'),
    providerKeys: {
      anthropic: optionalString(env, 'ANTHROPIC_API_KEY') ?? '',
      groq: optionalString(env, 'GROQ_API_KEY') ?? '',
      openai: optionalString(env, 'OPENAI_API_KEY') ?? '',
      fireworks: optionalString(env, 'FIREWORKS_API_KEY') ?? '',
    },
    llmRoutes,
    github: {
      token: optionalString(env, 'GITHUB_TOKEN') ?? '',
      apiUrl: githubApiUrl.replace(/\/+$/, ''),
    },
    memory: {
      maxMessages: positiveInt(env, 'MAX_MEMORY_MESSAGES', 50),
      contextTurns: positiveInt(env, 'CONTEXT_TURNS', 10),
      sessionTtlHours: positiveInt(env, 'SESSION_TTL_HOURS', 24),
    },
    dispatch: {
      parallelSecondaryRoutes: booleanFlag(env, 'DISPATCH_PARALLEL_SECONDARY', false),
    },
    relational: {
      allowWrites: booleanFlag(env, 'RELATIONAL_ALLOW_WRITES', false),
      statementTimeoutMs: positiveInt(env, 'RELATIONAL_STATEMENT_TIMEOUT_MS', 15000),
    },
    logLevel: optionalString(env, 'LOG_LEVEL') ?? 'info',
  };
}
