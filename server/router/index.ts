/**
 * Router Module - Barrel Exports
 *
 * - Request Classifier: keyword routing to capability tags
 * - Execution State: per-dispatch status and merged output
 * - Dispatcher: orchestrates handlers and persistence
 */

// Types
export * from './types.js';

// Request Classifier
export { classifyRequest, KeywordRequestClassifier, DEFAULT_CONFIDENCE } from './request-classifier.js';

// Execution State
export {
  ExecutionState,
  InvalidStateTransitionError,
  SYSTEM_FAULT_OUTPUT,
  type RouteSection,
} from './execution-state.js';

// Handlers
export { ROUTE_HANDLERS, SectionBuilder, failureLine, guardHandler } from './handlers/index.js';
export type { HandlerContext, RouteHandler } from './handlers/index.js';

// Dispatcher
export {
  DispatchOrchestrator,
  type DispatchOptions,
  type DispatchOrchestratorDeps,
} from './dispatcher.js';
