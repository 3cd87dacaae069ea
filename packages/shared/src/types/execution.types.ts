/**
 * Execution Result Types
 *
 * Terminal output of the execution state machine and of batch runs.
 *
 * @module @graph-orchestrator/shared/types/execution
 */

import type { ErrorCode } from '../constants/errors';
import type { AlgorithmId } from './analysis.types';
import type { EngineHandle, JobHandle } from './engine.types';

/**
 * Ordered phases of one execution.
 *
 * `cleaned` is terminal and is reached either in order or through abort.
 */
export type ExecutionPhase =
  | 'init'
  | 'credential_ready'
  | 'engine_ready'
  | 'graph_loaded'
  | 'algorithm_running'
  | 'results_stored'
  | 'cleaned';

/**
 * Final status of an execution.
 * - `partial`: the algorithm finished but its results were not stored
 * - `skipped`: never started (batch stopped early)
 */
export type ExecutionStatus = 'completed' | 'failed' | 'partial' | 'cancelled' | 'skipped';

/**
 * Error reduced to a serializable, classified form.
 */
export interface ClassifiedError {
  code: ErrorCode;
  message: string;
  retryable: boolean;
  details?: Record<string, unknown>;
}

export interface PhaseTransition {
  from: ExecutionPhase;
  to: ExecutionPhase;
  /** Epoch ms */
  at: number;
  /** True when the transition is the abort path to `cleaned` */
  aborted: boolean;
}

export interface ExecutionResult {
  executionId: string;
  requestName: string;
  algorithm: AlgorithmId;
  status: ExecutionStatus;
  /** Last phase reached before cleanup */
  phase: ExecutionPhase;
  phaseHistory: PhaseTransition[];
  /** Final engine handle (status `stopped` after a clean teardown) */
  engine: EngineHandle | null;
  jobs: JobHandle[];
  graphId: string | null;
  vertexCount: number | null;
  edgeCount: number | null;
  documentsWritten: number;
  /** ISO timestamps */
  startedAt: string;
  finishedAt: string;
  elapsedMs: number;
  engineUptimeSeconds: number;
  estimatedCostUsd: number;
  error: ClassifiedError | null;
  cleanupError: ClassifiedError | null;
  warnings: string[];
  /** Attempts made per retried operation label (only when > 1) */
  attempts: Record<string, number>;
}

export interface BatchSummary {
  total: number;
  completed: number;
  failed: number;
  partial: number;
  cancelled: number;
  skipped: number;
  totalCostUsd: number;
  totalElapsedMs: number;
}

export interface BatchResult {
  results: ExecutionResult[];
  summary: BatchSummary;
}
