/**
 * Orchestrator Configuration
 *
 * Centralized tuning for retries, polling, HTTP timeouts, engine readiness,
 * result verification and credential lifetime.
 *
 * Configuration hierarchy:
 * 1. Environment variables (highest priority)
 * 2. Default values
 *
 * @module infrastructure/config/orchestrator
 */

import { z } from 'zod';
import { ENGINE_SIZES, resolveEngineSize, type EngineSizeId } from '@graph-orchestrator/shared';

const engineSizeSchema = z.custom<EngineSizeId>(
  (value) => typeof value === 'string' && ENGINE_SIZES.some((size) => size === value),
  { message: 'Unknown engine size' }
);

/**
 * Orchestrator Configuration Schema
 */
export const OrchestratorConfigSchema = z.object({
  retry: z.object({
    /** Total attempts per remote call, including the first */
    maxAttempts: z.number().int().min(1).max(20).default(3),

    /** Base delay for backoff (ms) */
    baseDelayMs: z.number().int().min(0).max(60000).default(1000),

    /** Max delay cap (ms) */
    maxDelayMs: z.number().int().min(0).max(600000).default(30000),

    /** Backoff multiplier (delay = baseDelay * multiplier^retryIndex) */
    backoffMultiplier: z.number().min(1).max(10).default(2),

    /** Jitter factor (0-1) */
    jitterFactor: z.number().min(0).max(1).default(0.1),

    strategy: z.enum(['exponential', 'linear']).default('exponential'),
  }),

  polling: z.object({
    /** Fixed wait between job status checks (ms) */
    intervalMs: z.number().int().min(1).default(2000),

    /** Per-job wait budget when the request sets none (ms) */
    defaultJobTimeoutMs: z.number().int().min(1).default(3_600_000),
  }),

  http: z.object({
    requestTimeoutMs: z.number().int().min(1).default(30000),
  }),

  engine: z.object({
    /** Bounded wait for a new engine to report ready (ms) */
    readyTimeoutMs: z.number().int().min(1).default(120000),
    readyProbeIntervalMs: z.number().int().min(1).default(2000),
    defaultSize: engineSizeSchema.default('e16'),
  }),

  results: z.object({
    /** How long to wait for stored results to show up in the target collection (ms) */
    verifyTimeoutMs: z.number().int().min(0).default(60000),
    verifyIntervalMs: z.number().int().min(1).default(2000),
  }),

  credential: z.object({
    lifetimeHours: z.number().positive().max(168).default(24),
    refreshThresholdHours: z.number().min(0).max(24).default(1),
  }),
});

export type OrchestratorConfig = z.infer<typeof OrchestratorConfigSchema>;
export type RetryConfig = OrchestratorConfig['retry'];
export type RetryStrategy = RetryConfig['strategy'];

/**
 * Default configuration values
 */
export const DEFAULT_ORCHESTRATOR_CONFIG: OrchestratorConfig = {
  retry: {
    maxAttempts: 3,
    baseDelayMs: 1000,
    maxDelayMs: 30000,
    backoffMultiplier: 2,
    jitterFactor: 0.1,
    strategy: 'exponential',
  },
  polling: {
    intervalMs: 2000,
    defaultJobTimeoutMs: 3_600_000,
  },
  http: {
    requestTimeoutMs: 30000,
  },
  engine: {
    readyTimeoutMs: 120000,
    readyProbeIntervalMs: 2000,
    defaultSize: 'e16',
  },
  results: {
    verifyTimeoutMs: 60000,
    verifyIntervalMs: 2000,
  },
  credential: {
    lifetimeHours: 24,
    refreshThresholdHours: 1,
  },
};

let cachedConfig: OrchestratorConfig | null = null;

function parseEnvInt(envVar: string | undefined, fallback: number): number {
  if (!envVar) return fallback;
  const parsed = parseInt(envVar, 10);
  return isNaN(parsed) ? fallback : parsed;
}

function parseEnvFloat(envVar: string | undefined, fallback: number): number {
  if (!envVar) return fallback;
  const parsed = parseFloat(envVar);
  return isNaN(parsed) ? fallback : parsed;
}

function parseRetryStrategy(envVar: string | undefined, fallback: RetryStrategy): RetryStrategy {
  return envVar === 'linear' || envVar === 'exponential' ? envVar : fallback;
}

/**
 * Build a configuration from an environment map (no caching).
 *
 * Environment variables:
 * - RETRY_MAX_ATTEMPTS, RETRY_BASE_DELAY_MS, RETRY_MAX_DELAY_MS
 * - RETRY_BACKOFF_MULTIPLIER, RETRY_JITTER_FACTOR, RETRY_STRATEGY
 * - POLL_INTERVAL_MS, DEFAULT_JOB_TIMEOUT_MS
 * - HTTP_REQUEST_TIMEOUT_MS
 * - ENGINE_READY_TIMEOUT_MS, ENGINE_READY_PROBE_INTERVAL_MS, DEFAULT_ENGINE_SIZE
 * - RESULT_VERIFY_TIMEOUT_MS, RESULT_VERIFY_INTERVAL_MS
 * - TOKEN_LIFETIME_HOURS, TOKEN_REFRESH_THRESHOLD_HOURS
 */
export function buildOrchestratorConfig(source: NodeJS.ProcessEnv = process.env): OrchestratorConfig {
  const defaults = DEFAULT_ORCHESTRATOR_CONFIG;

  const envConfig = {
    retry: {
      maxAttempts: parseEnvInt(source.RETRY_MAX_ATTEMPTS, defaults.retry.maxAttempts),
      baseDelayMs: parseEnvInt(source.RETRY_BASE_DELAY_MS, defaults.retry.baseDelayMs),
      maxDelayMs: parseEnvInt(source.RETRY_MAX_DELAY_MS, defaults.retry.maxDelayMs),
      backoffMultiplier: parseEnvFloat(source.RETRY_BACKOFF_MULTIPLIER, defaults.retry.backoffMultiplier),
      jitterFactor: parseEnvFloat(source.RETRY_JITTER_FACTOR, defaults.retry.jitterFactor),
      strategy: parseRetryStrategy(source.RETRY_STRATEGY, defaults.retry.strategy),
    },
    polling: {
      intervalMs: parseEnvInt(source.POLL_INTERVAL_MS, defaults.polling.intervalMs),
      defaultJobTimeoutMs: parseEnvInt(source.DEFAULT_JOB_TIMEOUT_MS, defaults.polling.defaultJobTimeoutMs),
    },
    http: {
      requestTimeoutMs: parseEnvInt(source.HTTP_REQUEST_TIMEOUT_MS, defaults.http.requestTimeoutMs),
    },
    engine: {
      readyTimeoutMs: parseEnvInt(source.ENGINE_READY_TIMEOUT_MS, defaults.engine.readyTimeoutMs),
      readyProbeIntervalMs: parseEnvInt(
        source.ENGINE_READY_PROBE_INTERVAL_MS,
        defaults.engine.readyProbeIntervalMs
      ),
      defaultSize: resolveEngineSize(source.DEFAULT_ENGINE_SIZE, defaults.engine.defaultSize),
    },
    results: {
      verifyTimeoutMs: parseEnvInt(source.RESULT_VERIFY_TIMEOUT_MS, defaults.results.verifyTimeoutMs),
      verifyIntervalMs: parseEnvInt(source.RESULT_VERIFY_INTERVAL_MS, defaults.results.verifyIntervalMs),
    },
    credential: {
      lifetimeHours: parseEnvFloat(source.TOKEN_LIFETIME_HOURS, defaults.credential.lifetimeHours),
      refreshThresholdHours: parseEnvFloat(
        source.TOKEN_REFRESH_THRESHOLD_HOURS,
        defaults.credential.refreshThresholdHours
      ),
    },
  };

  return OrchestratorConfigSchema.parse(envConfig);
}

/**
 * Get orchestrator configuration
 *
 * Merges default values with environment variable overrides.
 * Configuration is cached after first call.
 */
export function getOrchestratorConfig(): OrchestratorConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  cachedConfig = buildOrchestratorConfig(process.env);
  return cachedConfig;
}

/**
 * Reset cached configuration (for testing)
 */
export function __resetOrchestratorConfig(): void {
  cachedConfig = null;
}
