/**
 * Human-readable execution summaries and batch aggregates for logs.
 *
 * @module domains/execution/summaries
 */

import type { BatchSummary, ExecutionResult } from '@graph-orchestrator/shared';
import { COST_DECIMALS } from '@/infrastructure/config';

const formatCount = (value: number): string => value.toLocaleString('en-US');

const formatCost = (value: number): string => `$${value.toFixed(COST_DECIMALS)}`;

/**
 * Multi-line summary of one execution.
 *
 * @example
 * ```
 * Analysis: rank customers
 * Status: completed
 * Algorithm: pagerank
 * Duration: 42.0s
 * Graph: 1,200 vertices, 5,400 edges
 * Results: 1,200 documents updated
 * Cost: $0.0047
 * ```
 */
export function formatExecutionSummary(result: ExecutionResult): string {
  const lines = [
    `Analysis: ${result.requestName}`,
    `Status: ${result.status}`,
    `Algorithm: ${result.algorithm}`,
    `Duration: ${(result.elapsedMs / 1000).toFixed(1)}s`,
  ];

  if (result.vertexCount !== null && result.edgeCount !== null) {
    lines.push(`Graph: ${formatCount(result.vertexCount)} vertices, ${formatCount(result.edgeCount)} edges`);
  }
  if (result.documentsWritten > 0) {
    lines.push(`Results: ${formatCount(result.documentsWritten)} documents updated`);
  }
  if (result.estimatedCostUsd > 0) {
    lines.push(`Cost: ${formatCost(result.estimatedCostUsd)}`);
  }
  if (result.error) {
    lines.push(`Error: ${result.error.message}`);
  }
  if (result.cleanupError) {
    lines.push(`Cleanup: ${result.cleanupError.message}`);
  }

  return lines.join('\n');
}

export function summarizeBatch(results: readonly ExecutionResult[]): BatchSummary {
  const summary: BatchSummary = {
    total: results.length,
    completed: 0,
    failed: 0,
    partial: 0,
    cancelled: 0,
    skipped: 0,
    totalCostUsd: 0,
    totalElapsedMs: 0,
  };

  for (const result of results) {
    summary[result.status] += 1;
    summary.totalCostUsd += result.estimatedCostUsd;
    summary.totalElapsedMs += result.elapsedMs;
  }

  const factor = Math.pow(10, COST_DECIMALS);
  summary.totalCostUsd = Math.round(summary.totalCostUsd * factor) / factor;
  return summary;
}

/**
 * One-line batch digest, e.g. `3 analyses: 1 completed, 1 failed, 1 skipped; cost $0.0000; 12.5s`.
 */
export function formatBatchSummary(summary: BatchSummary): string {
  const counts = (['completed', 'partial', 'failed', 'cancelled', 'skipped'] as const)
    .filter((status) => summary[status] > 0)
    .map((status) => `${summary[status]} ${status}`);

  return (
    `${summary.total} analyses: ${counts.length > 0 ? counts.join(', ') : 'none run'}; ` +
    `cost ${formatCost(summary.totalCostUsd)}; ${(summary.totalElapsedMs / 1000).toFixed(1)}s`
  );
}
