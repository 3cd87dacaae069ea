/**
 * Job Poller
 *
 * Fixed-interval polling of a job until it reaches a terminal status or
 * its wait budget runs out. Waits are abortable.
 *
 * @module domains/execution/JobPoller
 */

import type { JobHandle } from '@graph-orchestrator/shared';
import { JobFailedError, TimeoutExceededError } from '@/shared/errors';
import { sleep, throwIfAborted } from '@/shared/utils/sleep';

export interface PollOptions {
  intervalMs: number;
  timeoutMs: number;
  signal?: AbortSignal;
  clock?: () => number;
  /** Called with every snapshot, terminal or not */
  onSnapshot?: (job: JobHandle, poll: number) => void;
}

export interface PollOutcome {
  job: JobHandle;
  polls: number;
}

/**
 * True when the snapshot is `completed`, false while it is still pending
 * or running.
 *
 * @throws JobFailedError when the job failed or was cancelled remotely
 */
export function isJobSucceeded(job: JobHandle): boolean {
  if (job.status === 'failed' || job.status === 'cancelled') {
    const reason = job.error ?? (job.status === 'cancelled' ? 'cancelled by the engine' : 'Unknown error');
    throw new JobFailedError(job.id, `${job.kind} job ${job.id} ${job.status}: ${reason}`, {
      details: { kind: job.kind, status: job.status },
    });
  }
  return job.status === 'completed';
}

/**
 * Poll `fetchSnapshot` until the job completes.
 *
 * @throws JobFailedError when the job fails or is cancelled remotely
 * @throws TimeoutExceededError when `timeoutMs` elapses first
 */
export async function pollUntilTerminal(
  fetchSnapshot: () => Promise<JobHandle>,
  options: PollOptions
): Promise<PollOutcome> {
  const { intervalMs, timeoutMs, signal, onSnapshot } = options;
  const clock = options.clock ?? Date.now;
  const startedAt = clock();

  for (let poll = 1; ; poll++) {
    throwIfAborted(signal);

    const job = await fetchSnapshot();
    onSnapshot?.(job, poll);

    if (isJobSucceeded(job)) {
      return { job, polls: poll };
    }

    const elapsed = clock() - startedAt;
    if (elapsed >= timeoutMs) {
      throw new TimeoutExceededError(
        timeoutMs,
        `${job.kind} job ${job.id} did not finish within ${timeoutMs}ms`,
        { details: { jobId: job.id, kind: job.kind, polls: poll } }
      );
    }

    await sleep(Math.min(intervalMs, timeoutMs - elapsed), signal);
  }
}
