import type { LlmClient } from '../utils/llm-router.js';
import { BaseCapabilityAdapter } from './base-adapter.js';

export type TaskComplexity = 'simple' | 'medium' | 'complex';

export type PlanningParams =
  | { operation: 'create_plan'; goal: string; context: string }
  | { operation: 'break_down_task'; task: string; complexity: TaskComplexity };

export type PlanningPayload =
  | { operation: 'create_plan'; goal: string; plan: string; createdAt: string; durationMs: number }
  | { operation: 'break_down_task'; task: string; complexity: TaskComplexity; breakdown: string };

const COMPLEXITY_INSTRUCTIONS: Record<TaskComplexity, string> = {
  simple: 'Use 3-5 basic steps',
  medium: 'Use 5-10 detailed steps with sub-steps',
  complex: 'Use 10 or more detailed steps with nested sub-tasks',
};

const PLAN_SYSTEM_PROMPT = `You are a planning agent. Turn the user's goal into an actionable plan covering:
1. Goal analysis and requirements
2. Step-by-step breakdown
3. Resources needed
4. Timeline estimate
5. Risks
6. Success criteria
7. Alternatives
Keep every item specific and measurable.`;

export class PlanningAdapter extends BaseCapabilityAdapter<PlanningParams, PlanningPayload> {
  readonly tag = 'planning' as const;
  readonly service = 'llm_planner';

  constructor(private llm: LlmClient, private now: () => Date = () => new Date()) {
    super('PlanningAdapter');
  }

  isAvailable(): boolean {
    return this.llm.isAvailable('plan');
  }

  protected async execute(params: PlanningParams): Promise<PlanningPayload> {
    if (params.operation === 'break_down_task') {
      const response = await this.llm.call('plan', {
        systemPrompt: `You decompose tasks. ${COMPLEXITY_INSTRUCTIONS[params.complexity]}.
For each step give a description, prerequisites, estimated time, difficulty and required resources, formatted so it is easy to follow.`,
        messages: [{ role: 'user', content: `Break down this task: ${params.task}` }],
        maxTokens: 3000,
        temperature: 0.1,
      });
      return {
        operation: 'break_down_task',
        task: params.task,
        complexity: params.complexity,
        breakdown: response.content,
      };
    }

    const start = Date.now();
    const contextBlock = params.context ? `\n\nContext:\n${params.context}` : '';
    const response = await this.llm.call('plan', {
      systemPrompt: PLAN_SYSTEM_PROMPT,
      messages: [{ role: 'user', content: `Goal: ${params.goal}${contextBlock}\n\nCreate a comprehensive plan.` }],
      maxTokens: 3000,
      temperature: 0.1,
    });
    return {
      operation: 'create_plan',
      goal: params.goal,
      plan: response.content,
      createdAt: this.now().toISOString(),
      durationMs: Date.now() - start,
    };
  }

  protected describeRequest(params: PlanningParams): unknown {
    return params.operation === 'create_plan'
      ? { operation: params.operation, goal: params.goal, contextChars: params.context.length }
      : params;
  }
}
