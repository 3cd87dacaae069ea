import { describe, it, expect } from 'vitest';
import { ErrorCode, type ExecutionResult } from '@graph-orchestrator/shared';
import { formatBatchSummary, formatExecutionSummary, summarizeBatch } from '@/domains/execution/summaries';

function result(overrides: Partial<ExecutionResult> = {}): ExecutionResult {
  return {
    executionId: 'exec-1',
    requestName: 'rank customers',
    algorithm: 'pagerank',
    status: 'completed',
    phase: 'results_stored',
    phaseHistory: [],
    engine: null,
    jobs: [],
    graphId: 'graph-1',
    vertexCount: null,
    edgeCount: null,
    documentsWritten: 0,
    startedAt: '2026-01-01T00:00:00.000Z',
    finishedAt: '2026-01-01T00:00:42.000Z',
    elapsedMs: 42_000,
    engineUptimeSeconds: 42,
    estimatedCostUsd: 0,
    error: null,
    cleanupError: null,
    warnings: [],
    attempts: {},
    ...overrides,
  };
}

describe('formatExecutionSummary', () => {
  it('should print the basic lines for a minimal result', () => {
    expect(formatExecutionSummary(result())).toBe(
      ['Analysis: rank customers', 'Status: completed', 'Algorithm: pagerank', 'Duration: 42.0s'].join('\n')
    );
  });

  it('should add graph, results and cost lines with grouped digits', () => {
    const summary = formatExecutionSummary(
      result({ vertexCount: 1200, edgeCount: 5400, documentsWritten: 1200, estimatedCostUsd: 0.0047 })
    );

    expect(summary.split('\n').slice(4)).toEqual([
      'Graph: 1,200 vertices, 5,400 edges',
      'Results: 1,200 documents updated',
      'Cost: $0.0047',
    ]);
  });

  it('should add error and cleanup lines', () => {
    const summary = formatExecutionSummary(
      result({
        status: 'failed',
        error: { code: ErrorCode.JOB_FAILED, message: 'algorithm job a1 failed: boom', retryable: false },
        cleanupError: { code: ErrorCode.CLEANUP_ERROR, message: 'Failed to stop engine e1: busy', retryable: false },
      })
    );

    expect(summary.split('\n').slice(-2)).toEqual([
      'Error: algorithm job a1 failed: boom',
      'Cleanup: Failed to stop engine e1: busy',
    ]);
  });
});

describe('summarizeBatch', () => {
  it('should count statuses and total cost and time', () => {
    const summary = summarizeBatch([
      result({ estimatedCostUsd: 0.10001, elapsedMs: 1000 }),
      result({ status: 'failed', estimatedCostUsd: 0.20002, elapsedMs: 500 }),
      result({ status: 'skipped', estimatedCostUsd: 0, elapsedMs: 0 }),
    ]);

    expect(summary).toEqual({
      total: 3,
      completed: 1,
      failed: 1,
      partial: 0,
      cancelled: 0,
      skipped: 1,
      totalCostUsd: 0.3,
      totalElapsedMs: 1500,
    });
  });
});

describe('formatBatchSummary', () => {
  it('should list non-zero counts in a fixed order', () => {
    const summary = summarizeBatch([
      result({ status: 'skipped', elapsedMs: 0 }),
      result({ status: 'failed', elapsedMs: 2500 }),
      result({ elapsedMs: 10_000, estimatedCostUsd: 0.0125 }),
    ]);

    expect(formatBatchSummary(summary)).toBe('3 analyses: 1 completed, 1 failed, 1 skipped; cost $0.0125; 12.5s');
  });

  it('should say none run for an empty summary', () => {
    expect(formatBatchSummary(summarizeBatch([]))).toBe('0 analyses: none run; cost $0.0000; 0.0s');
  });
});
