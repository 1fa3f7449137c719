import type { TaskComplexity } from '../../capabilities/planning-adapter.js';
import { SectionBuilder, formatSeconds, titleCase, type RouteHandler } from './section.js';

export function detectComplexity(lower: string): TaskComplexity {
  if (lower.includes('simple') || lower.includes('basic')) return 'simple';
  if (lower.includes('complex') || lower.includes('detailed')) return 'complex';
  return 'medium';
}

export const handlePlanning: RouteHandler = async (ctx) => {
  const section = new SectionBuilder(ctx.invocation);
  const adapter = ctx.registry.get('planning');
  const text = ctx.request.userRequest;
  const lower = text.toLowerCase();

  if (['break down', 'breakdown', 'steps'].some((w) => lower.includes(w))) {
    const outcome = await section.invoke(adapter, {
      operation: 'break_down_task',
      task: text,
      complexity: detectComplexity(lower),
    });
    if (outcome.success && outcome.payload.operation === 'break_down_task') {
      section.write(
        `## 📋 Task Breakdown\n\n${outcome.payload.breakdown}\n\n**Complexity Level:** ${titleCase(outcome.payload.complexity)}`
      );
    } else if (!outcome.success) {
      section.fail('Task breakdown', outcome.error);
    }
    return section.build();
  }

  const outcome = await section.invoke(adapter, {
    operation: 'create_plan',
    goal: text,
    context: ctx.request.context,
  });
  if (outcome.success && outcome.payload.operation === 'create_plan') {
    section.write(
      `## 📋 Generated Plan\n\n${outcome.payload.plan}\n\n**Planning Time:** ${formatSeconds(outcome.payload.durationMs)}`
    );
  } else if (!outcome.success) {
    section.fail('Planning', outcome.error);
  }
  return section.build();
};
