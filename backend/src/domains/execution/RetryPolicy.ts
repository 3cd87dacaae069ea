/**
 * Retry Policy
 *
 * Wraps remote calls: retryable errors back off (linear, or capped
 * exponential with jitter) up to `maxAttempts` total attempts, then
 * surface as a fatal, non-retryable `TransientNetworkError`. Non-retryable errors are
 * rethrown on first sight. Cancellation wakes the backoff wait.
 *
 * @module domains/execution/RetryPolicy
 */

import type { Logger } from 'pino';
import type { RetryConfig } from '@/infrastructure/config';
import {
  OrchestrationError,
  TransientNetworkError,
  errorMessage,
  isRetryableError,
} from '@/shared/errors';
import { createChildLogger } from '@/shared/utils/logger';
import { sleep, throwIfAborted } from '@/shared/utils/sleep';

/**
 * Delay before retry number `retryIndex` (0 for the first retry).
 *
 * - exponential: `baseDelay * multiplier^retryIndex`
 * - linear: `baseDelay * (retryIndex + 1)`
 *
 * Capped at `maxDelayMs`, then jitter of up to `jitterFactor` of the
 * capped delay is added.
 */
export function computeBackoffDelay(
  retryIndex: number,
  config: RetryConfig,
  random: () => number = Math.random
): number {
  const { baseDelayMs, maxDelayMs, backoffMultiplier, jitterFactor, strategy } = config;

  const rawDelay =
    strategy === 'linear'
      ? baseDelayMs * (retryIndex + 1)
      : baseDelayMs * Math.pow(backoffMultiplier, retryIndex);

  const cappedDelay = Math.min(rawDelay, maxDelayMs);
  const jitter = cappedDelay * jitterFactor * random();

  return Math.floor(cappedDelay + jitter);
}

export interface RetryOptions {
  signal?: AbortSignal;
  /** Extra log context (executionId, phase, ...) */
  context?: Record<string, unknown>;
}

export interface RetryOutcome<T> {
  value: T;
  /** Attempts made, including the successful one */
  attempts: number;
}

export interface RetryPolicyDependencies {
  config: RetryConfig;
  random?: () => number;
  logger?: Logger;
}

export class RetryPolicy {
  private readonly config: RetryConfig;
  private readonly random: () => number;
  private readonly log: Logger;

  constructor(deps: RetryPolicyDependencies) {
    this.config = deps.config;
    this.random = deps.random ?? Math.random;
    this.log = deps.logger ?? createChildLogger({ service: 'RetryPolicy' });
  }

  get maxAttempts(): number {
    return this.config.maxAttempts;
  }

  /**
   * Run `operation` until it succeeds, fails fatally or exhausts attempts.
   *
   * @param label - Operation name used in logs and the exhaustion error
   */
  async execute<T>(
    label: string,
    operation: (attempt: number) => Promise<T>,
    options: RetryOptions = {}
  ): Promise<RetryOutcome<T>> {
    const { signal, context } = options;
    const maxAttempts = this.config.maxAttempts;

    for (let attempt = 1; ; attempt++) {
      throwIfAborted(signal);

      try {
        const value = await operation(attempt);
        return { value, attempts: attempt };
      } catch (error) {
        if (!isRetryableError(error)) {
          throw error;
        }

        if (attempt >= maxAttempts) {
          this.log.error({ ...context, label, attempts: attempt, error: errorMessage(error) }, 'Retries exhausted');
          throw new TransientNetworkError(
            `${label} failed after ${attempt} attempt(s): ${errorMessage(error)}`,
            error instanceof TransientNetworkError ? error.status : undefined,
            {
              cause: error,
              retryable: false,
              details: {
                ...(error instanceof OrchestrationError ? error.details : {}),
                label,
                attempts: attempt,
              },
            }
          );
        }

        const delayMs = computeBackoffDelay(attempt - 1, this.config, this.random);
        this.log.warn(
          { ...context, label, attempt, maxAttempts, delayMs, error: errorMessage(error) },
          'Transient failure, retrying'
        );
        await sleep(delayMs, signal);
      }
    }
  }
}
