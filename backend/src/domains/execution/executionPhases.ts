/**
 * Execution phase table.
 *
 * Phases advance strictly in order; `cleaned` is also reachable from any
 * phase through the abort path. Anything else is a programming error.
 *
 * @module domains/execution/executionPhases
 */

import { ErrorCode, type ExecutionPhase } from '@graph-orchestrator/shared';
import { OrchestrationError } from '@/shared/errors';

export const PHASE_ORDER: readonly ExecutionPhase[] = [
  'init',
  'credential_ready',
  'engine_ready',
  'graph_loaded',
  'algorithm_running',
  'results_stored',
  'cleaned',
];

const FORWARD_TRANSITIONS: Readonly<Record<ExecutionPhase, ExecutionPhase | null>> = {
  init: 'credential_ready',
  credential_ready: 'engine_ready',
  engine_ready: 'graph_loaded',
  graph_loaded: 'algorithm_running',
  algorithm_running: 'results_stored',
  results_stored: 'cleaned',
  cleaned: null,
};

export function isForwardTransition(from: ExecutionPhase, to: ExecutionPhase): boolean {
  return FORWARD_TRANSITIONS[from] === to;
}

/**
 * Abort path: any phase except `cleaned` may jump to `cleaned`.
 */
export function isAbortTransition(from: ExecutionPhase, to: ExecutionPhase): boolean {
  return to === 'cleaned' && from !== 'cleaned' && !isForwardTransition(from, to);
}

export function canTransition(from: ExecutionPhase, to: ExecutionPhase): boolean {
  return isForwardTransition(from, to) || isAbortTransition(from, to);
}

/**
 * @throws OrchestrationError (INTERNAL_ERROR) for an illegal move
 */
export function assertTransition(from: ExecutionPhase, to: ExecutionPhase): void {
  if (!canTransition(from, to)) {
    throw new OrchestrationError(ErrorCode.INTERNAL_ERROR, `Illegal phase transition ${from} -> ${to}`, {
      details: { from, to },
    });
  }
}
