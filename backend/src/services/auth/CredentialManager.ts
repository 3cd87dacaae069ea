/**
 * Credential Manager
 *
 * Caches one bearer credential and refreshes it through an
 * `ICredentialSource` when it is within the refresh margin of expiry.
 *
 * - Concurrent callers during a refresh share one in-flight promise; the
 *   refresh itself ignores caller signals and each caller races its own
 * - A failed refresh rejects every waiter with `AuthError` and leaves the
 *   cache empty, so the next call tries again
 * - Instances are injected; there is no module-level credential state
 *
 * @module services/auth/CredentialManager
 */

import type { Credential } from '@graph-orchestrator/shared';
import type { Logger } from 'pino';
import { AuthError, errorMessage } from '@/shared/errors';
import { createChildLogger } from '@/shared/utils/logger';
import { raceAbort } from '@/shared/utils/sleep';
import type { ICredentialSource } from './ICredentialSource';

const HOUR_MS = 60 * 60 * 1000;

export interface CredentialManagerDependencies {
  /** Null when no credential source is configured */
  source: ICredentialSource | null;
  /** Assumed token validity when the source does not report one (default 24 h) */
  lifetimeMs?: number;
  /** Refresh this long before expiry (default 1 h) */
  refreshMarginMs?: number;
  clock?: () => number;
  logger?: Logger;
}

export class CredentialManager {
  private cached: Credential | null = null;

  // In-flight refresh shared by concurrent callers
  private refreshPromise: Promise<Credential> | null = null;

  private readonly source: ICredentialSource | null;
  private readonly lifetimeMs: number;
  private readonly refreshMarginMs: number;
  private readonly clock: () => number;
  private readonly log: Logger;

  constructor(deps: CredentialManagerDependencies) {
    this.source = deps.source;
    this.lifetimeMs = deps.lifetimeMs ?? 24 * HOUR_MS;
    this.refreshMarginMs = deps.refreshMarginMs ?? HOUR_MS;
    this.clock = deps.clock ?? Date.now;
    this.log = deps.logger ?? createChildLogger({ service: 'CredentialManager' });
  }

  /**
   * Cached credential, refreshed first when expired or absent.
   *
   * @throws AuthError when no source is configured or the refresh fails
   */
  async getCredential(signal?: AbortSignal): Promise<Credential> {
    const current = this.cached;
    if (current && !this.isExpired(current)) {
      return current;
    }
    return raceAbort(this.refresh(), signal);
  }

  /**
   * Refresh regardless of the cached credential's age.
   */
  forceRefresh(signal?: AbortSignal): Promise<Credential> {
    return raceAbort(this.refresh(), signal);
  }

  /**
   * Drop the cached credential (e.g. after the server answered 401).
   */
  invalidate(): void {
    if (this.cached) {
      this.log.debug({ source: this.cached.source }, 'Credential invalidated');
    }
    this.cached = null;
  }

  async getAuthorizationHeader(signal?: AbortSignal): Promise<string> {
    const credential = await this.getCredential(signal);
    return `bearer ${credential.token}`;
  }

  isExpired(credential: Credential): boolean {
    return this.clock() >= credential.issuedAt + credential.validityMs - this.refreshMarginMs;
  }

  /** True when a source is configured. */
  get hasSource(): boolean {
    return this.source !== null;
  }

  private refresh(): Promise<Credential> {
    const inFlight = this.refreshPromise;
    if (inFlight) {
      return inFlight;
    }

    const promise = this.acquireFromSource().finally(() => {
      this.refreshPromise = null;
    });
    this.refreshPromise = promise;
    return promise;
  }

  private async acquireFromSource(): Promise<Credential> {
    const source = this.source;
    if (!source) {
      throw new AuthError('No credential source is configured');
    }

    this.log.debug({ source: source.kind }, 'Refreshing credential');

    try {
      const acquired = await source.acquire();
      const credential: Credential = Object.freeze({
        token: acquired.token,
        issuedAt: this.clock(),
        validityMs: acquired.validityMs ?? this.lifetimeMs,
        source: source.kind,
      });
      this.cached = credential;
      this.log.info({ source: source.kind, validityMs: credential.validityMs }, 'Credential refreshed');
      return credential;
    } catch (error) {
      this.cached = null;
      this.log.error({ source: source.kind, error: errorMessage(error) }, 'Credential refresh failed');
      if (error instanceof AuthError) {
        throw error;
      }
      throw new AuthError(`Credential refresh failed: ${errorMessage(error)}`, { cause: error });
    }
  }
}
