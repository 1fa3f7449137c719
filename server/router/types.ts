/**
 * Router Types
 *
 * Shared vocabulary for classification and dispatch: the closed set of
 * capability tags, the immutable request, the classification, and the
 * result view returned to callers.
 */

export type CapabilityTag =
  | 'general_conversation'
  | 'repository_management'
  | 'code_generation'
  | 'planning'
  | 'relational_query'
  | 'composite_workflow';

export const CAPABILITY_TAGS: readonly CapabilityTag[] = [
  'general_conversation',
  'repository_management',
  'code_generation',
  'planning',
  'relational_query',
  'composite_workflow',
];

export function isCapabilityTag(value: unknown): value is CapabilityTag {
  return typeof value === 'string' && CAPABILITY_TAGS.some((tag) => tag === value);
}

export interface Classification {
  primaryRoute: CapabilityTag;
  secondaryRoutes: CapabilityTag[];
  /** Informational only; never gates execution. */
  confidence: number;
  /** Audit tags such as `create_repository`; never affect routing. */
  declaredOperations: string[];
}

export interface RequestClassifier {
  classify(text: string): Classification;
}

export interface DispatchRequest {
  readonly userRequest: string;
  readonly sessionId: string;
  /** Recent conversation rendered as "Role: text" lines, most recent last. */
  readonly context: string;
}

export type ExecutionStatus = 'processing' | 'completed' | 'completed_with_errors' | 'error';

export type TerminalStatus = Exclude<ExecutionStatus, 'processing'>;

export interface OperationSummary {
  operation: string;
  service: string;
  success: boolean;
  error?: string;
}

export interface ExecutionResult {
  userRequest: string;
  sessionId: string;
  taskType: CapabilityTag;
  classification: Classification;
  finalOutput: string;
  status: TerminalStatus;
  elapsedMs: number;
  operations: Partial<Record<CapabilityTag, OperationSummary[]>>;
  declaredOperations: string[];
  errors: string[];
  timestamp: string;
}
