import type {
  CapabilityTag,
  DispatchRequest,
  ExecutionStatus,
  OperationSummary,
  TerminalStatus,
} from './types.js';

export const SYSTEM_FAULT_OUTPUT =
  'I apologize, but I encountered an error while processing your request. Please try again.';

/**
 * What one handler produced: a formatted markdown section (possibly empty),
 * the errors it hit, and a summary of each adapter call it made.
 */
export interface RouteSection {
  output: string;
  errors: string[];
  operations: OperationSummary[];
}

export class InvalidStateTransitionError extends Error {
  constructor(
    public from: ExecutionStatus,
    public to: ExecutionStatus
  ) {
    super(`Cannot transition execution state from '${from}' to '${to}'`);
    this.name = 'InvalidStateTransitionError';
  }
}

/**
 * Mutable record of one dispatch. Starts in `processing`, moves to exactly
 * one terminal status, and rejects any change afterwards.
 */
export class ExecutionState {
  private statusValue: ExecutionStatus = 'processing';
  private output = '';
  private errorList: string[] = [];
  private operationLog: Partial<Record<CapabilityTag, OperationSummary[]>> = {};
  private readonly startedAt: number;
  private finishedAt: number | null = null;

  constructor(
    readonly request: DispatchRequest,
    readonly taskType: CapabilityTag,
    private clock: () => number = Date.now
  ) {
    this.startedAt = clock();
  }

  get status(): ExecutionStatus {
    return this.statusValue;
  }

  get finalOutput(): string {
    return this.output;
  }

  get errors(): readonly string[] {
    return this.errorList;
  }

  get operations(): Partial<Record<CapabilityTag, OperationSummary[]>> {
    return this.operationLog;
  }

  get elapsedMs(): number {
    return (this.finishedAt ?? this.clock()) - this.startedAt;
  }

  /**
   * Merge a handler's section: appended after a blank line when there is
   * already output, otherwise it becomes the output.
   */
  commit(tag: CapabilityTag, section: RouteSection): void {
    this.assertProcessing('processing');

    if (section.output) {
      this.output = this.output ? `${this.output}\n\n${section.output}` : section.output;
    }
    this.errorList.push(...section.errors);
    if (section.operations.length > 0) {
      const existing = this.operationLog[tag] ?? [];
      this.operationLog[tag] = [...existing, ...section.operations];
    }
  }

  complete(): TerminalStatus {
    const next: TerminalStatus = this.errorList.length === 0 ? 'completed' : 'completed_with_errors';
    this.transition(next);
    return next;
  }

  /**
   * System fault: discard partial output and keep a single error.
   */
  fail(message: string): void {
    this.transition('error');
    this.output = SYSTEM_FAULT_OUTPUT;
    this.errorList = [`System error: ${message}`];
  }

  private transition(next: TerminalStatus): void {
    this.assertProcessing(next);
    this.statusValue = next;
    this.finishedAt = this.clock();
  }

  private assertProcessing(next: ExecutionStatus): void {
    if (this.statusValue !== 'processing') {
      throw new InvalidStateTransitionError(this.statusValue, next);
    }
  }
}
