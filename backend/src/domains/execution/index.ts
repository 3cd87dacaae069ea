/**
 * Execution domain
 * @module domains/execution
 */
export { RetryPolicy, computeBackoffDelay } from './RetryPolicy';
export type { RetryOptions, RetryOutcome, RetryPolicyDependencies } from './RetryPolicy';
export { pollUntilTerminal, isJobSucceeded } from './JobPoller';
export type { PollOptions, PollOutcome } from './JobPoller';
export { PHASE_ORDER, assertTransition, canTransition, isAbortTransition, isForwardTransition } from './executionPhases';
export {
  resolveAnalysisRequest,
  resolveAnalysisRequests,
  DEFAULT_TARGET_COLLECTION,
} from './AnalysisRequestResolver';
export type { RequestDefaults } from './AnalysisRequestResolver';
export { ExecutionStateMachine } from './ExecutionStateMachine';
export type {
  ExecutionStateMachineDependencies,
  ResultVerificationOptions,
  RunOptions,
} from './ExecutionStateMachine';
export { validateStoredResults, RESULT_SAMPLE_SIZE } from './ResultValidator';
export type { ResultValidation } from './ResultValidator';
export { BatchRunner } from './BatchRunner';
export type { BatchOptions, BatchRunnerDependencies } from './BatchRunner';
export { EngineCleanupAuditor } from './EngineCleanupAuditor';
export type { AuditOptions, AuditReport, AuditFailure, EngineCleanupAuditorDependencies } from './EngineCleanupAuditor';
export { formatExecutionSummary, formatBatchSummary, summarizeBatch } from './summaries';
