import type { CapabilityTag } from '../types.js';
import { handleCodeGeneration } from './code-generation.js';
import { handleConversation } from './conversation.js';
import { handlePlanning } from './planning.js';
import { handleRelationalQuery } from './relational-query.js';
import { handleRepository } from './repository.js';
import { guardHandler, type RouteHandler } from './section.js';
import { handleWorkflow } from './workflow.js';

export type { HandlerContext, RouteHandler } from './section.js';
export { SectionBuilder, failureLine, guardHandler } from './section.js';

export const ROUTE_HANDLERS: Record<CapabilityTag, RouteHandler> = {
  general_conversation: guardHandler('Conversation', handleConversation),
  repository_management: guardHandler('GitHub operation', handleRepository),
  code_generation: guardHandler('Code generation', handleCodeGeneration),
  planning: guardHandler('Planning', handlePlanning),
  relational_query: guardHandler('Database operation', handleRelationalQuery),
  composite_workflow: guardHandler('Workflow', handleWorkflow),
};
