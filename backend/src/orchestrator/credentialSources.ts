/**
 * Credential source selection per deployment mode.
 *
 * - amp: the configured access token first, the CLI once it ages out;
 *   either one alone when only one is configured
 * - self_managed: database login
 *
 * @module orchestrator/credentialSources
 */

import type { Environment } from '@/infrastructure/config';
import {
  ChainedCredentialSource,
  CliCredentialSource,
  HttpLoginCredentialSource,
  StaticTokenCredentialSource,
  type ICredentialSource,
} from '@/services/auth';

export function buildManagedCredentialSource(env: Environment, requestTimeoutMs: number): ICredentialSource | null {
  const sources: ICredentialSource[] = [];

  if (env.GAE_ACCESS_TOKEN) {
    sources.push(new StaticTokenCredentialSource(env.GAE_ACCESS_TOKEN));
  }
  if (env.GAE_API_KEY_ID && env.GAE_API_KEY_SECRET) {
    sources.push(
      new CliCredentialSource({
        keyId: env.GAE_API_KEY_ID,
        keySecret: env.GAE_API_KEY_SECRET,
        cliPath: env.GAE_CLI_PATH,
        timeoutMs: requestTimeoutMs,
      })
    );
  }

  const [only] = sources;
  if (sources.length === 1 && only) {
    return only;
  }
  return sources.length === 0 ? null : new ChainedCredentialSource(sources);
}

/**
 * Login against the database endpoint. Null when no endpoint is configured.
 */
export function buildDatabaseCredentialSource(env: Environment, requestTimeoutMs: number): ICredentialSource | null {
  if (!env.ARANGO_ENDPOINT) {
    return null;
  }
  return new HttpLoginCredentialSource({
    endpoint: env.ARANGO_ENDPOINT,
    username: env.ARANGO_USER,
    password: env.ARANGO_PASSWORD,
    timeoutMs: requestTimeoutMs,
  });
}
