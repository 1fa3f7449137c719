/**
 * Execution Log Module - Barrel Exports
 */

export {
  toStorablePayload,
  MAX_PAYLOAD_STRING_LENGTH,
  type ConversationRole,
  type ConversationTurnEntry,
  type ExecutionRecordEntry,
  type OperationRecordEntry,
  type OperationStatus,
  type ExecutionLog,
  type ExecutionLogReader,
  type ExecutionLogStore,
  type HistoryTurn,
  type SessionStatistics,
  type OperationStat,
} from './types.js';

export { PgExecutionLog } from './pg-execution-log.js';
export { InMemoryExecutionLog } from './memory-execution-log.js';
