/**
 * BatchRunner Unit Tests
 *
 * Sequential runs through a real ExecutionStateMachine on a shared
 * FakeEngineConnection. Poll counts carry over between runs, so one
 * algorithm script covers the whole batch.
 *
 * @module __tests__/unit/domains/execution/BatchRunner.test
 */

import { describe, it, expect, vi } from 'vitest';
import { BatchRunner } from '@/domains/execution/BatchRunner';
import { ExecutionStateMachine } from '@/domains/execution/ExecutionStateMachine';
import { RetryPolicy } from '@/domains/execution/RetryPolicy';
import { ConfigError } from '@/shared/errors';
import { FakeEngineConnection } from '../../../helpers/FakeEngineConnection';
import { TEST_RETRY_CONFIG, TEST_TIMING, TEST_TOKENS } from '../../../helpers/test.constants';
import { AnalysisRequestFixture, TEST_REQUEST_DEFAULTS } from '../../../fixtures/AnalysisRequestFixture';

function createRunner(connection: FakeEngineConnection) {
  const machine = new ExecutionStateMachine({
    connection,
    credentials: {
      getCredential: async () => ({ token: TEST_TOKENS.STATIC, issuedAt: 0, validityMs: 60_000, source: 'static' }),
    },
    retryPolicy: new RetryPolicy({ config: TEST_RETRY_CONFIG }),
    pollIntervalMs: TEST_TIMING.POLL_INTERVAL_MS,
  });
  const run = vi.spyOn(machine, 'run');
  const runner = new BatchRunner({
    stateMachine: machine,
    defaults: TEST_REQUEST_DEFAULTS,
    clock: () => 0,
    generateId: () => 'skipped-id',
  });
  return { runner, run };
}

const inputs = ['a', 'b', 'c'].map((name) => AnalysisRequestFixture.createInput({ name }));

describe('BatchRunner', () => {
  it('should stop after the first failure and skip the rest when continueOnError is false', async () => {
    const connection = new FakeEngineConnection({ metered: false }).scriptJob('algorithm', [
      'running',
      'completed',
      'failed',
    ]);
    const { runner, run } = createRunner(connection);

    const { results, summary } = await runner.runBatch(inputs, { continueOnError: false });

    expect(results.map((result) => [result.requestName, result.status])).toEqual([
      ['a', 'completed'],
      ['b', 'failed'],
      ['c', 'skipped'],
    ]);
    expect(results[2]?.warnings).toEqual(['Skipped: stopped after "b" ended failed']);
    expect(results[2]).toMatchObject({ executionId: 'skipped-id', phase: 'init', engine: null, elapsedMs: 0 });
    expect(summary).toMatchObject({ total: 3, completed: 1, failed: 1, partial: 0, cancelled: 0, skipped: 1 });
    expect(summary.totalCostUsd).toBe(0);
    expect(run).toHaveBeenCalledTimes(2);
    expect(connection.stoppedEngineIds).toEqual(['engine-1', 'engine-2']);
  });

  it('should keep going after a failure by default', async () => {
    const connection = new FakeEngineConnection({ metered: false }).scriptJob('algorithm', [
      'running',
      'completed',
      'failed',
      'completed',
    ]);
    const { runner } = createRunner(connection);

    const { results, summary } = await runner.runBatch(inputs);

    expect(results.map((result) => result.status)).toEqual(['completed', 'failed', 'completed']);
    expect(summary).toMatchObject({ completed: 2, failed: 1, skipped: 0 });
    expect(connection.calls.teardown).toBe(3);
  });

  it('should cancel the running analysis and skip the rest when the batch times out', async () => {
    const connection = new FakeEngineConnection({ metered: false }).scriptJob('algorithm', ['running']);
    const { runner } = createRunner(connection);
    const longInputs = inputs.map((input) => ({ ...input, timeoutMs: 60_000 }));

    const { results, summary } = await runner.runBatch(longInputs, { batchTimeoutMs: 20 });

    expect(results.map((result) => result.status)).toEqual(['cancelled', 'skipped', 'skipped']);
    expect(results[0]?.warnings).toEqual(['Batch timeout of 20ms reached']);
    expect(results[1]?.warnings).toEqual(['Skipped: batch timeout of 20ms reached']);
    expect(summary).toMatchObject({ cancelled: 1, skipped: 2 });
    expect(connection.calls.teardown).toBe(1);
  });

  it('should skip everything when the caller already cancelled', async () => {
    const connection = new FakeEngineConnection();
    const { runner, run } = createRunner(connection);
    const controller = new AbortController();
    controller.abort();

    const { results } = await runner.runBatch(inputs, { signal: controller.signal });

    expect(results.map((result) => result.warnings[0])).toEqual([
      'Skipped: batch cancelled',
      'Skipped: batch cancelled',
      'Skipped: batch cancelled',
    ]);
    expect(run).not.toHaveBeenCalled();
  });

  describe('validation', () => {
    it('should reject an empty batch', async () => {
      const { runner } = createRunner(new FakeEngineConnection());

      await expect(runner.runBatch([])).rejects.toThrow(
        new ConfigError('Batch must contain at least one request')
      );
    });

    it('should reject a non-positive batch timeout', async () => {
      const { runner } = createRunner(new FakeEngineConnection());

      await expect(runner.runBatch(inputs, { batchTimeoutMs: 0 })).rejects.toBeInstanceOf(ConfigError);
    });

    it('should validate every request before touching an engine', async () => {
      const connection = new FakeEngineConnection();
      const { runner, run } = createRunner(connection);

      await expect(
        runner.runBatch([AnalysisRequestFixture.createInput(), { name: 'no graph', algorithm: 'pagerank' }])
      ).rejects.toMatchObject({
        message: 'Invalid batch: 1 issue(s)',
        issues: ['requests[1].namedGraph: A graph source is required: namedGraph or vertexCollections/edgeCollections'],
      });
      expect(run).not.toHaveBeenCalled();
      expect(connection.calls.discover).toBe(0);
    });
  });
});
