import { stripCodeFence, type LlmClient } from '../utils/llm-router.js';
import { BaseCapabilityAdapter } from './base-adapter.js';

export type CodeStyle = 'clean' | 'performance' | 'beginner' | 'production';

export type CodeGenerationParams =
  | { operation: 'generate_code'; prompt: string; language: string; style: CodeStyle; includeTests: boolean }
  | { operation: 'explain_code'; code: string; language: string }
  | { operation: 'optimize_code'; code: string; language: string };

export type CodeGenerationPayload =
  | { operation: 'generate_code'; language: string; style: CodeStyle; includeTests: boolean; code: string; durationMs: number }
  | { operation: 'explain_code'; language: string; explanation: string }
  | { operation: 'optimize_code'; language: string; optimized: string };

const STYLE_INSTRUCTIONS: Record<CodeStyle, string> = {
  clean: 'Favor readable code: clear names, small functions, straightforward structure.',
  performance: 'Favor efficiency: pick suitable algorithms and data structures and avoid needless allocation.',
  beginner: 'Write for a beginner: simple constructs and generous explanatory comments.',
  production: 'Write production-grade code: input validation, error handling and logging where they belong.',
};

export class CodeGenerationAdapter extends BaseCapabilityAdapter<CodeGenerationParams, CodeGenerationPayload> {
  readonly tag = 'code_generation' as const;
  readonly service = 'llm_codegen';

  constructor(private llm: LlmClient) {
    super('CodeGenerationAdapter');
  }

  isAvailable(): boolean {
    return this.llm.isAvailable('generate');
  }

  protected async execute(params: CodeGenerationParams): Promise<CodeGenerationPayload> {
    switch (params.operation) {
      case 'generate_code': {
        const testInstruction = params.includeTests
          ? '\nInclude unit tests using the customary test framework for the language.'
          : '';
        const start = Date.now();
        const response = await this.llm.call('generate', {
          systemPrompt: `You are an expert ${params.language} developer. ${STYLE_INSTRUCTIONS[params.style]}
Produce well-structured ${params.language} code for the user's request with doc comments, error handling and type annotations where the language has them.${testInstruction}
Return only the code.`,
          messages: [{ role: 'user', content: params.prompt }],
          maxTokens: 4000,
          temperature: 0.3,
        });
        return {
          operation: 'generate_code',
          language: params.language,
          style: params.style,
          includeTests: params.includeTests,
          code: stripCodeFence(response.content),
          durationMs: Date.now() - start,
        };
      }

      case 'explain_code': {
        const response = await this.llm.call('generate', {
          systemPrompt: `You review and teach ${params.language}. Explain what the code does, walk through its key parts, point out defects or risky spots, and note performance concerns. Stay accessible.`,
          messages: [{ role: 'user', content: `Explain this ${params.language} code:\n\n\`\`\`${params.language}\n${params.code}\n\`\`\`` }],
          maxTokens: 3000,
          temperature: 0.2,
        });
        return { operation: 'explain_code', language: params.language, explanation: response.content };
      }

      case 'optimize_code': {
        const response = await this.llm.call('generate', {
          systemPrompt: `You optimize ${params.language} code. Identify bottlenecks, give an optimized version with identical behavior, and explain each change and its expected effect.`,
          messages: [{ role: 'user', content: `Optimize this ${params.language} code:\n\n\`\`\`${params.language}\n${params.code}\n\`\`\`` }],
          maxTokens: 4000,
          temperature: 0.2,
        });
        return { operation: 'optimize_code', language: params.language, optimized: response.content };
      }
    }
  }
}
