import type { LlmClient } from '../utils/llm-router.js';
import { stripCodeFence } from '../utils/llm-router.js';
import { BaseCapabilityAdapter } from './base-adapter.js';

export interface WorkflowStep {
  step: number;
  action: string;
  description: string;
}

export interface WorkflowPlan {
  services: string[];
  steps: WorkflowStep[];
  inputs: string[];
  outputs: string[];
  successCriteria: string[];
}

export interface WorkflowParams {
  operation: 'analyze_workflow';
  description: string;
}

export interface WorkflowPayload {
  description: string;
  plan: WorkflowPlan;
  /** False when the model's answer was not usable JSON and the text fallback was used. */
  structured: boolean;
}

const ANALYSIS_PROMPT = `Analyze the workflow the user describes and break it into executable steps.

Available services:
- github (repository and branch operations)
- postgres (database queries)
- code_generation
- planning

Respond with JSON only, shaped as:
{"services": string[], "steps": [{"step": number, "action": string, "description": string}],
 "inputs": string[], "outputs": string[], "success_criteria": string[]}`;

function stringList(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value.filter((v): v is string => typeof v === 'string');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse the model's JSON answer. Returns null when the text is not a JSON
 * object; missing fields default to empty lists.
 */
export function parseWorkflowPlan(text: string): WorkflowPlan | null {
  let data: unknown;
  try {
    data = JSON.parse(stripCodeFence(text, 'json'));
  } catch {
    return null;
  }
  if (!isRecord(data)) return null;

  const rawSteps = Array.isArray(data.steps) ? data.steps : [];
  const steps: WorkflowStep[] = [];
  for (const raw of rawSteps) {
    if (!isRecord(raw)) continue;
    steps.push({
      step: typeof raw.step === 'number' ? raw.step : steps.length + 1,
      action: typeof raw.action === 'string' ? raw.action : 'unknown',
      description: typeof raw.description === 'string' ? raw.description : '',
    });
  }

  return {
    services: stringList(data.services),
    steps,
    inputs: stringList(data.inputs),
    outputs: stringList(data.outputs),
    successCriteria: stringList(data.success_criteria ?? data.successCriteria),
  };
}

export function fallbackWorkflowPlan(description: string, analysis: string): WorkflowPlan {
  return {
    services: ['planning'],
    steps: [{ step: 1, action: 'analyze_workflow', description: analysis }],
    inputs: [description],
    outputs: ['analysis_complete'],
    successCriteria: ['workflow_analyzed'],
  };
}

export class WorkflowAdapter extends BaseCapabilityAdapter<WorkflowParams, WorkflowPayload> {
  readonly tag = 'composite_workflow' as const;
  readonly service = 'llm_workflow';

  constructor(private llm: LlmClient) {
    super('WorkflowAdapter');
  }

  isAvailable(): boolean {
    return this.llm.isAvailable('workflow');
  }

  protected async execute(params: WorkflowParams): Promise<WorkflowPayload> {
    const response = await this.llm.call('workflow', {
      systemPrompt: ANALYSIS_PROMPT,
      messages: [{ role: 'user', content: `Workflow description: ${params.description}` }],
      maxTokens: 2000,
      temperature: 0.2,
      jsonMode: true,
    });

    const plan = parseWorkflowPlan(response.content);
    if (!plan) {
      this.logger.debug('Workflow analysis was not JSON, using text fallback');
      return {
        description: params.description,
        plan: fallbackWorkflowPlan(params.description, response.content.trim()),
        structured: false,
      };
    }
    return { description: params.description, plan, structured: true };
  }
}
