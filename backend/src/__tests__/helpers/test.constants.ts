/**
 * Test Constants
 *
 * Centralized constants for unit tests. Delays are kept at a few
 * milliseconds so retry and polling loops finish quickly on real timers.
 *
 * @module __tests__/helpers/test.constants
 */

import type { RetryConfig } from '@/infrastructure/config';

/**
 * Retry settings with near-zero backoff and no jitter
 */
export const TEST_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  baseDelayMs: 1,
  maxDelayMs: 5,
  backoffMultiplier: 2,
  jitterFactor: 0,
  strategy: 'exponential',
};

export const TEST_TIMING = {
  /** Poll interval for job status loops */
  POLL_INTERVAL_MS: 2,
  /** Per-request HTTP timeout */
  REQUEST_TIMEOUT_MS: 1000,
  /** Engine readiness budget */
  READY_TIMEOUT_MS: 200,
  READY_PROBE_INTERVAL_MS: 2,
} as const;

export const TEST_TOKENS = {
  STATIC: 'test-token',
  MINTED: 'test-minted-token',
  API_KEY_ID: 'test-key-id',
  API_KEY_SECRET: 'test-secret',
} as const;
