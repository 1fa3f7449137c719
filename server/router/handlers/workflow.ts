import type { WorkflowPayload } from '../../capabilities/workflow-adapter.js';
import { SectionBuilder, type RouteHandler } from './section.js';

export function formatWorkflowPlan(payload: WorkflowPayload): string {
  const { plan } = payload;
  const steps = plan.steps.map((s) => `**Step ${s.step}:** ${s.action}\n└─ ${s.description}`);
  const services = plan.services.length > 0 ? plan.services.join(', ') : 'None identified';
  const criteria = plan.successCriteria.length > 0 ? plan.successCriteria.join(', ') : 'Workflow analyzed';

  const parts = [
    `## 🔄 Workflow Execution Plan\n\n**Description:** ${payload.description}\n**Services:** ${services}\n**Steps Planned:** ${plan.steps.length}`,
    `### 📋 Steps\n\n${steps.length > 0 ? steps.join('\n\n') : 'No steps were produced.'}`,
    `### 🎯 Success Criteria\n${criteria}`,
  ];
  if (!payload.structured) {
    parts.push('_The analysis was not structured JSON; the raw analysis is shown as a single step._');
  }
  return parts.join('\n\n');
}

export const handleWorkflow: RouteHandler = async (ctx) => {
  const section = new SectionBuilder(ctx.invocation);
  const outcome = await section.invoke(ctx.registry.get('composite_workflow'), {
    operation: 'analyze_workflow',
    description: ctx.request.userRequest,
  });

  if (outcome.success) {
    section.write(formatWorkflowPlan(outcome.payload));
  } else {
    section.fail('Workflow analysis', outcome.error);
  }
  return section.build();
};
