import { describe, it, expect } from 'vitest';
import { ErrorCode } from '@graph-orchestrator/shared';
import {
  PHASE_ORDER,
  assertTransition,
  canTransition,
  isAbortTransition,
  isForwardTransition,
} from '@/domains/execution/executionPhases';
import { OrchestrationError } from '@/shared/errors';

describe('execution phases', () => {
  it('should allow each phase to advance to the next one only', () => {
    for (let index = 0; index < PHASE_ORDER.length - 1; index++) {
      const from = PHASE_ORDER[index];
      const to = PHASE_ORDER[index + 1];
      if (!from || !to) continue;
      expect(isForwardTransition(from, to)).toBe(true);
    }
    expect(canTransition('init', 'engine_ready')).toBe(false);
    expect(canTransition('graph_loaded', 'credential_ready')).toBe(false);
  });

  it('should allow the abort path to cleaned from every earlier phase', () => {
    expect(isAbortTransition('init', 'cleaned')).toBe(true);
    expect(isAbortTransition('algorithm_running', 'cleaned')).toBe(true);
    expect(isAbortTransition('results_stored', 'cleaned')).toBe(false);
    expect(canTransition('results_stored', 'cleaned')).toBe(true);
  });

  it('should never leave cleaned', () => {
    for (const phase of PHASE_ORDER) {
      expect(canTransition('cleaned', phase)).toBe(false);
    }
  });

  it('should throw an internal error for illegal moves', () => {
    let thrown: unknown;
    try {
      assertTransition('init', 'results_stored');
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(OrchestrationError);
    if (!(thrown instanceof OrchestrationError)) return;
    expect(thrown.code).toBe(ErrorCode.INTERNAL_ERROR);
    expect(thrown.message).toBe('Illegal phase transition init -> results_stored');
    expect(() => assertTransition('engine_ready', 'graph_loaded')).not.toThrow();
  });
});
