import { describe, it, expect, vi } from 'vitest';
import type { JobHandle, JobStatus } from '@graph-orchestrator/shared';
import { isJobSucceeded, pollUntilTerminal } from '@/domains/execution/JobPoller';
import { CancelledError, JobFailedError, TimeoutExceededError } from '@/shared/errors';

function snapshot(status: JobStatus, extra: Partial<JobHandle> = {}): JobHandle {
  return { id: 'job-7', kind: 'algorithm', status, ...extra };
}

function scripted(statuses: JobStatus[]): () => Promise<JobHandle> {
  let index = 0;
  return async () => snapshot(statuses[Math.min(index++, statuses.length - 1)] ?? 'running');
}

describe('isJobSucceeded', () => {
  it('should be true only for completed jobs', () => {
    expect(isJobSucceeded(snapshot('completed'))).toBe(true);
    expect(isJobSucceeded(snapshot('running'))).toBe(false);
    expect(isJobSucceeded(snapshot('pending'))).toBe(false);
  });

  it('should throw JobFailedError with the engine reason for failed jobs', () => {
    expect(() => isJobSucceeded(snapshot('failed', { error: 'out of memory' }))).toThrow(
      new JobFailedError('job-7', 'algorithm job job-7 failed: out of memory')
    );
  });

  it('should describe remote cancellation and unknown failures', () => {
    expect(() => isJobSucceeded(snapshot('cancelled'))).toThrow('algorithm job job-7 cancelled: cancelled by the engine');
    expect(() => isJobSucceeded(snapshot('failed'))).toThrow('algorithm job job-7 failed: Unknown error');
  });
});

describe('pollUntilTerminal', () => {
  it('should poll until completed and count the polls', async () => {
    const onSnapshot = vi.fn<[JobHandle, number], void>();

    const outcome = await pollUntilTerminal(scripted(['pending', 'running', 'completed']), {
      intervalMs: 1,
      timeoutMs: 1000,
      onSnapshot,
    });

    expect(outcome.polls).toBe(3);
    expect(outcome.job.status).toBe('completed');
    expect(onSnapshot.mock.calls.map(([job, poll]) => [job.status, poll])).toEqual([
      ['pending', 1],
      ['running', 2],
      ['completed', 3],
    ]);
  });

  it('should return after one poll for a job that is already done', async () => {
    const fetchSnapshot = vi.fn(async () => snapshot('completed'));

    await expect(pollUntilTerminal(fetchSnapshot, { intervalMs: 1, timeoutMs: 10 })).resolves.toMatchObject({ polls: 1 });
  });

  it('should fail with the job error as soon as it is reported', async () => {
    await expect(
      pollUntilTerminal(scripted(['running', 'failed']), { intervalMs: 1, timeoutMs: 1000 })
    ).rejects.toBeInstanceOf(JobFailedError);
  });

  it('should time out when the budget runs out', async () => {
    let now = 0;
    const clock = (): number => now;
    const fetchSnapshot = vi.fn(async () => {
      now += 40;
      return snapshot('running');
    });

    const rejection = pollUntilTerminal(fetchSnapshot, { intervalMs: 1, timeoutMs: 100, clock });

    await expect(rejection).rejects.toThrow(new TimeoutExceededError(100, 'algorithm job job-7 did not finish within 100ms'));
    expect(fetchSnapshot).toHaveBeenCalledTimes(3);
  });

  it('should stop when the signal aborts between polls', async () => {
    const controller = new AbortController();
    const fetchSnapshot = vi.fn(async () => {
      controller.abort();
      return snapshot('running');
    });

    await expect(
      pollUntilTerminal(fetchSnapshot, { intervalMs: 60_000, timeoutMs: 120_000, signal: controller.signal })
    ).rejects.toBeInstanceOf(CancelledError);
    expect(fetchSnapshot).toHaveBeenCalledTimes(1);
  });
});
