/**
 * Environment Configuration
 *
 * Loads and validates the deployment and connection settings.
 * Tuning values (timeouts, retry, polling) live in orchestrator.config.
 *
 * @module infrastructure/config/environment
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError } from '@/shared/errors';

// Load .env file (override: false preserves existing env vars for testing)
dotenv.config({ override: false });

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value.trim() === '' ? undefined : value.trim()));

const booleanString = (fallback: 'true' | 'false') =>
  z
    .enum(['true', 'false'])
    .default(fallback)
    .transform((value) => value === 'true');

/**
 * Environment variables schema for validation
 */
export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Deployment regime
  DEPLOYMENT_MODE: z.enum(['amp', 'self_managed']).default('self_managed'),

  // Managed platform
  GAE_DEPLOYMENT_URL: optionalString.pipe(z.string().url().optional()),
  GAE_PORT: z.string().default('8829').transform(Number).pipe(z.number().int().min(1).max(65535)),
  GAE_ACCESS_TOKEN: optionalString,
  GAE_API_KEY_ID: optionalString,
  GAE_API_KEY_SECRET: optionalString,
  GAE_CLI_PATH: z.string().default('oasisctl'),

  // Database (self-managed engine host, named graph lookup, catalog)
  ARANGO_ENDPOINT: optionalString.pipe(z.string().url().optional()),
  ARANGO_DATABASE: z.string().default('_system'),
  ARANGO_USER: z.string().default('root'),
  ARANGO_PASSWORD: z.string().default(''),

  // Catalog
  CATALOG_COLLECTION: z.string().min(1).default('analysis_executions'),
  CATALOG_ENABLED: booleanString('true'),

  // Logging
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
  LOG_SERVICES: optionalString,
});

/**
 * Typed environment configuration
 */
export type Environment = z.infer<typeof envSchema>;

/**
 * Parse and validate an environment map.
 *
 * @throws ConfigError listing every invalid variable
 */
export function parseEnvironment(source: NodeJS.ProcessEnv = process.env): Environment {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError('Invalid environment variables', issues);
  }

  return parsed.data;
}

/**
 * Check that the selected deployment mode has what it needs to run.
 *
 * @returns Missing-setting messages; empty when the environment is usable
 */
export function findMissingSettings(env: Environment): string[] {
  const missing: string[] = [];

  if (env.DEPLOYMENT_MODE === 'amp') {
    if (!env.GAE_DEPLOYMENT_URL) {
      missing.push('GAE_DEPLOYMENT_URL is required in amp mode');
    }
    const hasKeyPair = Boolean(env.GAE_API_KEY_ID && env.GAE_API_KEY_SECRET);
    if (!env.GAE_ACCESS_TOKEN && !hasKeyPair) {
      missing.push('GAE_ACCESS_TOKEN or GAE_API_KEY_ID/GAE_API_KEY_SECRET is required in amp mode');
    }
  } else if (!env.ARANGO_ENDPOINT) {
    missing.push('ARANGO_ENDPOINT is required in self_managed mode');
  }

  return missing;
}

/**
 * Configuration summary safe to log (no secrets).
 */
export function describeEnvironment(env: Environment): Record<string, unknown> {
  return {
    nodeEnv: env.NODE_ENV,
    deploymentMode: env.DEPLOYMENT_MODE,
    managedUrl: env.GAE_DEPLOYMENT_URL ?? null,
    managedPort: env.GAE_PORT,
    managedAuth: env.GAE_ACCESS_TOKEN ? 'token' : env.GAE_API_KEY_ID ? 'api-key' : 'none',
    databaseEndpoint: env.ARANGO_ENDPOINT ?? null,
    database: env.ARANGO_DATABASE,
    catalogEnabled: env.CATALOG_ENABLED,
    catalogCollection: env.CATALOG_COLLECTION,
  };
}

let cachedEnv: Environment | null = null;

/**
 * Get the validated process environment (cached after first call).
 */
export function getEnv(): Environment {
  if (!cachedEnv) {
    cachedEnv = parseEnvironment(process.env);
  }
  return cachedEnv;
}

/**
 * Reset cached environment (for testing)
 */
export function __resetEnv(): void {
  cachedEnv = null;
}
