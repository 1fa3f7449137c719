import type { CodeStyle } from '../../capabilities/code-generation-adapter.js';
import { SectionBuilder, formatSeconds, titleCase, type RouteHandler } from './section.js';

const LANGUAGES = ['python', 'javascript', 'java', 'cpp', 'c++', 'go', 'rust', 'typescript', 'html', 'css'];
const DEFAULT_LANGUAGE = 'python';

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

/**
 * First known language named in the text, matched as a whole token so
 * "algorithm" does not read as Go.
 */
export function detectLanguage(text: string): string {
  const lower = text.toLowerCase();
  for (const language of LANGUAGES) {
    const token = new RegExp(`(^|[^a-z0-9+#])${escapeRegExp(language)}($|[^a-z0-9+#])`);
    if (token.test(lower)) return language;
  }
  return DEFAULT_LANGUAGE;
}

export function detectStyle(text: string): CodeStyle {
  const lower = text.toLowerCase();
  if (lower.includes('beginner') || lower.includes('simple')) return 'beginner';
  if (lower.includes('production') || lower.includes('enterprise')) return 'production';
  if (lower.includes('performance') || lower.includes('optimized')) return 'performance';
  return 'clean';
}

export function extractCodeBlock(text: string): { language: string | null; code: string } | null {
  const match = text.match(/```([\w+#-]*)[^\S\n]*\n([\s\S]*?)```/);
  const code = match?.[2]?.trim();
  if (!code) return null;
  const language = match?.[1]?.toLowerCase();
  return { language: language ? language : null, code };
}

export const handleCodeGeneration: RouteHandler = async (ctx) => {
  const section = new SectionBuilder(ctx.invocation);
  const adapter = ctx.registry.get('code_generation');
  const text = ctx.request.userRequest;
  const lower = text.toLowerCase();
  const block = extractCodeBlock(text);

  if (block && (lower.includes('explain') || lower.includes('optimize') || lower.includes('optimise'))) {
    const language = block.language ?? detectLanguage(text);
    if (lower.includes('explain')) {
      const outcome = await section.invoke(adapter, { operation: 'explain_code', code: block.code, language });
      if (outcome.success && outcome.payload.operation === 'explain_code') {
        section.write(`## 🔍 Code Explanation (${titleCase(language)})\n\n${outcome.payload.explanation}`);
      } else if (!outcome.success) {
        section.fail('Code explanation', outcome.error);
      }
    } else {
      const outcome = await section.invoke(adapter, { operation: 'optimize_code', code: block.code, language });
      if (outcome.success && outcome.payload.operation === 'optimize_code') {
        section.write(`## ⚡ Optimized ${titleCase(language)} Code\n\n${outcome.payload.optimized}`);
      } else if (!outcome.success) {
        section.fail('Code optimization', outcome.error);
      }
    }
    return section.build();
  }

  const language = detectLanguage(text);
  const style = detectStyle(text);
  const includeTests = lower.includes('test');

  const outcome = await section.invoke(adapter, {
    operation: 'generate_code',
    prompt: text,
    language,
    style,
    includeTests,
  });

  if (outcome.success && outcome.payload.operation === 'generate_code') {
    const generated = outcome.payload;
    section.write(`## 💻 Generated ${titleCase(language)} Code

**Style:** ${titleCase(style)}
**Generation Time:** ${formatSeconds(generated.durationMs)}

\`\`\`${language}
${generated.code}
\`\`\`

Generated following ${style} practices${includeTests ? ' with tests included' : ''}.`);
  } else if (!outcome.success) {
    section.fail('Code generation', outcome.error);
  }
  return section.build();
};
