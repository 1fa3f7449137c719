import Anthropic from '@anthropic-ai/sdk';
import type { LlmProvider, LlmRoute, LlmTask } from '../config/app-config.js';
import { createLogger } from './logger.js';

const logger = createLogger('LLM');

export interface LlmMessage {
  role: 'user' | 'assistant';
  content: string;
}

export interface LlmCallOptions {
  systemPrompt?: string;
  messages: LlmMessage[];
  maxTokens?: number;
  temperature?: number;
  /** Ask OpenAI-compatible providers for a JSON object response. */
  jsonMode?: boolean;
}

export interface LlmResponse {
  content: string;
  model: string;
  stopReason: 'end_turn' | 'max_tokens';
  usage: {
    input: number;
    output: number;
  };
}

/**
 * What capability adapters depend on. Tests substitute a stub.
 */
export interface LlmClient {
  isAvailable(task: LlmTask): boolean;
  call(task: LlmTask, options: LlmCallOptions): Promise<LlmResponse>;
}

export interface LlmRouterConfig {
  routes: Record<LlmTask, LlmRoute>;
  providerKeys: Record<LlmProvider, string>;
  timeoutMs?: number;
}

export interface LlmRouterDeps {
  fetch?: typeof fetch;
  createAnthropic?: (apiKey: string, timeoutMs: number) => Anthropic;
}

const OPENAI_COMPATIBLE_BASE_URLS: Record<Exclude<LlmProvider, 'anthropic'>, string> = {
  groq: 'https://api.groq.com/openai/v1',
  openai: 'https://api.openai.com/v1',
  fireworks: 'https://api.fireworks.ai/inference/v1',
};

export class LlmRouter implements LlmClient {
  private anthropicClient: Anthropic | null = null;
  private fetchImpl: typeof fetch;
  private createAnthropic: (apiKey: string, timeoutMs: number) => Anthropic;
  private timeoutMs: number;

  constructor(private config: LlmRouterConfig, deps: LlmRouterDeps = {}) {
    this.fetchImpl = deps.fetch ?? fetch;
    this.createAnthropic = deps.createAnthropic ?? ((apiKey, timeout) => new Anthropic({ apiKey, timeout }));
    this.timeoutMs = config.timeoutMs ?? 60_000;
  }

  resolveRoute(task: LlmTask): LlmRoute {
    return this.config.routes[task];
  }

  isAvailable(task: LlmTask): boolean {
    const { provider } = this.resolveRoute(task);
    return this.config.providerKeys[provider].length > 0;
  }

  async call(task: LlmTask, options: LlmCallOptions): Promise<LlmResponse> {
    const { provider, model } = this.resolveRoute(task);
    const apiKey = this.config.providerKeys[provider];
    if (!apiKey) {
      throw new Error(`No API key configured for provider '${provider}' (task '${task}')`);
    }

    const start = Date.now();
    const response = provider === 'anthropic'
      ? await this.callAnthropic(model, options, apiKey)
      : await this.callOpenAICompatible(provider, model, options, apiKey);

    logger.debug('LLM call completed', {
      task,
      provider,
      model,
      durationMs: Date.now() - start,
      inputTokens: response.usage.input,
      outputTokens: response.usage.output,
    });

    return response;
  }

  private getAnthropicClient(apiKey: string): Anthropic {
    if (!this.anthropicClient) {
      this.anthropicClient = this.createAnthropic(apiKey, this.timeoutMs);
    }
    return this.anthropicClient;
  }

  private async callAnthropic(model: string, options: LlmCallOptions, apiKey: string): Promise<LlmResponse> {
    const client = this.getAnthropicClient(apiKey);

    const response = await client.messages.create({
      model,
      messages: options.messages.map((m) => ({ role: m.role, content: m.content })),
      max_tokens: options.maxTokens ?? 4096,
      temperature: options.temperature ?? 0.7,
      ...(options.systemPrompt ? { system: options.systemPrompt } : {}),
    });

    const content = response.content
      .flatMap((block) => (block.type === 'text' ? [block.text] : []))
      .join('\n');

    return {
      content,
      model,
      stopReason: response.stop_reason === 'max_tokens' ? 'max_tokens' : 'end_turn',
      usage: {
        input: response.usage.input_tokens,
        output: response.usage.output_tokens,
      },
    };
  }

  private async callOpenAICompatible(
    provider: Exclude<LlmProvider, 'anthropic'>,
    model: string,
    options: LlmCallOptions,
    apiKey: string
  ): Promise<LlmResponse> {
    const effectiveModel = provider === 'fireworks' && !model.startsWith('accounts/')
      ? `accounts/fireworks/models/${model}`
      : model;

    const messages: Array<{ role: string; content: string }> = [];
    if (options.systemPrompt) {
      messages.push({ role: 'system', content: options.systemPrompt });
    }
    messages.push(...options.messages);

    const requestBody: Record<string, unknown> = {
      model: effectiveModel,
      messages,
      max_tokens: options.maxTokens ?? 4096,
      temperature: options.temperature ?? 0.1,
    };

    if (options.jsonMode) {
      requestBody.response_format = { type: 'json_object' };
    }

    const response = await this.fetchImpl(`${OPENAI_COMPATIBLE_BASE_URLS[provider]}/chat/completions`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'Authorization': `Bearer ${apiKey}`,
      },
      body: JSON.stringify(requestBody),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw new Error(`${provider} API error ${response.status}: ${errorText}`);
    }

    const data: unknown = await response.json();
    return parseOpenAIResponse(data, effectiveModel);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function numberField(source: unknown, key: string): number {
  if (!isRecord(source)) return 0;
  const value = source[key];
  return typeof value === 'number' ? value : 0;
}

export function parseOpenAIResponse(data: unknown, model: string): LlmResponse {
  const choices = isRecord(data) && Array.isArray(data.choices) ? data.choices : [];
  const choice: unknown = choices[0];
  const usage = isRecord(data) ? data.usage : undefined;

  if (!isRecord(choice)) {
    return { content: '', model, stopReason: 'end_turn', usage: { input: 0, output: 0 } };
  }

  const message = choice.message;
  const content = isRecord(message) && typeof message.content === 'string' ? message.content : '';

  return {
    content,
    model,
    stopReason: choice.finish_reason === 'length' ? 'max_tokens' : 'end_turn',
    usage: {
      input: numberField(usage, 'prompt_tokens'),
      output: numberField(usage, 'completion_tokens'),
    },
  };
}

const ANY_FENCE = /```[\w+-]*[ \t]*\n?([\s\S]*?)```/;
const BARE_FENCE = /```[ \t]*\n([\s\S]*?)```/;

/**
 * Strip a single surrounding markdown code fence, if present. With a
 * language, a fence tagged with that language wins, then an untagged one.
 */
export function stripCodeFence(text: string, language?: string): string {
  const trimmed = text.trim();
  const fences = language
    ? [new RegExp('```' + language + '[ \\t]*\\n?([\\s\\S]*?)```', 'i'), BARE_FENCE]
    : [ANY_FENCE];
  for (const fence of fences) {
    const match = trimmed.match(fence);
    if (match?.[1] !== undefined) return match[1].trim();
  }
  return trimmed;
}
