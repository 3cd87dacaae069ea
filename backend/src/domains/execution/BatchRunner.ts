/**
 * Batch Runner
 *
 * Runs analysis requests sequentially, one engine lifecycle each. Every
 * request is validated before the first engine is touched.
 *
 * @module domains/execution/BatchRunner
 */

import type { Logger } from 'pino';
import { v4 as uuidv4 } from 'uuid';
import type { AnalysisRequest, BatchResult, ExecutionResult } from '@graph-orchestrator/shared';
import { ConfigError } from '@/shared/errors';
import { createChildLogger } from '@/shared/utils/logger';
import { createLinkedAbortController } from '@/shared/utils/sleep';
import { resolveAnalysisRequests, type RequestDefaults } from './AnalysisRequestResolver';
import type { ExecutionStateMachine } from './ExecutionStateMachine';
import { formatBatchSummary, formatExecutionSummary, summarizeBatch } from './summaries';

export interface BatchOptions {
  /** Keep going after a non-completed result (default true) */
  continueOnError?: boolean;
  /** Aggregate wall-clock budget for the whole batch */
  batchTimeoutMs?: number;
  signal?: AbortSignal;
}

export interface BatchRunnerDependencies {
  stateMachine: Pick<ExecutionStateMachine, 'run'>;
  defaults: RequestDefaults;
  clock?: () => number;
  generateId?: () => string;
  logger?: Logger;
}

export class BatchRunner {
  private readonly stateMachine: Pick<ExecutionStateMachine, 'run'>;
  private readonly defaults: RequestDefaults;
  private readonly clock: () => number;
  private readonly generateId: () => string;
  private readonly log: Logger;

  constructor(deps: BatchRunnerDependencies) {
    this.stateMachine = deps.stateMachine;
    this.defaults = deps.defaults;
    this.clock = deps.clock ?? Date.now;
    this.generateId = deps.generateId ?? uuidv4;
    this.log = deps.logger ?? createChildLogger({ service: 'BatchRunner' });
  }

  /**
   * @throws ConfigError for an empty batch, invalid options or any invalid request
   */
  async runBatch(inputs: readonly unknown[], options: BatchOptions = {}): Promise<BatchResult> {
    const { continueOnError = true, batchTimeoutMs, signal } = options;

    if (inputs.length === 0) {
      throw new ConfigError('Batch must contain at least one request', ['requests: empty']);
    }
    if (typeof continueOnError !== 'boolean') {
      throw new ConfigError('continueOnError must be a boolean', ['continueOnError: expected boolean']);
    }
    if (batchTimeoutMs !== undefined && (!Number.isFinite(batchTimeoutMs) || batchTimeoutMs <= 0)) {
      throw new ConfigError('batchTimeoutMs must be a positive number', ['batchTimeoutMs: expected > 0']);
    }

    const requests = resolveAnalysisRequests(inputs, this.defaults);

    const { controller, dispose } = createLinkedAbortController(signal);
    let timedOut = false;
    const timer =
      batchTimeoutMs === undefined
        ? null
        : setTimeout(() => {
            timedOut = true;
            controller.abort();
          }, batchTimeoutMs);

    const results: ExecutionResult[] = [];
    let stopReason: string | null = null;

    this.log.info({ total: requests.length, continueOnError, batchTimeoutMs }, 'Batch started');

    try {
      for (const [index, request] of requests.entries()) {
        if (stopReason === null && controller.signal.aborted) {
          stopReason = timedOut ? `batch timeout of ${batchTimeoutMs}ms reached` : 'batch cancelled';
        }
        if (stopReason !== null) {
          results.push(this.skippedResult(request, stopReason));
          continue;
        }

        this.log.info({ index: index + 1, total: requests.length, request: request.name }, 'Running analysis');
        const result = await this.stateMachine.run(request, { signal: controller.signal });
        if (timedOut && result.status === 'cancelled') {
          result.warnings.push(`Batch timeout of ${batchTimeoutMs}ms reached`);
        }
        results.push(result);
        this.log.info({ index: index + 1, status: result.status }, formatExecutionSummary(result));

        if (result.status !== 'completed' && !continueOnError) {
          stopReason = `stopped after "${request.name}" ended ${result.status}`;
        }
      }
    } finally {
      if (timer) clearTimeout(timer);
      dispose();
    }

    const summary = summarizeBatch(results);
    this.log.info({ ...summary }, formatBatchSummary(summary));
    return { results, summary };
  }

  private skippedResult(request: AnalysisRequest, reason: string): ExecutionResult {
    const now = new Date(this.clock()).toISOString();
    return {
      executionId: this.generateId(),
      requestName: request.name,
      algorithm: request.algorithm,
      status: 'skipped',
      phase: 'init',
      phaseHistory: [],
      engine: null,
      jobs: [],
      graphId: null,
      vertexCount: null,
      edgeCount: null,
      documentsWritten: 0,
      startedAt: now,
      finishedAt: now,
      elapsedMs: 0,
      engineUptimeSeconds: 0,
      estimatedCostUsd: 0,
      error: null,
      cleanupError: null,
      warnings: [`Skipped: ${reason}`],
      attempts: {},
    };
  }
}
