/**
 * Chained Credential Source
 *
 * Tries sources in order. A non-reusable source (a pre-issued token) is
 * used once; later refreshes move on to the next source. This gives
 * "use the configured token, mint a new one when it ages out".
 *
 * @module services/auth/ChainedCredentialSource
 */

import { AuthError, errorMessage } from '@/shared/errors';
import { createChildLogger } from '@/shared/utils/logger';
import type { Logger } from 'pino';
import type { AcquiredToken, ICredentialSource } from './ICredentialSource';

export class ChainedCredentialSource implements ICredentialSource {
  readonly kind = 'chained' as const;
  readonly reusable = true;

  private cursor = 0;
  private readonly log: Logger;

  constructor(
    private readonly sources: readonly ICredentialSource[],
    logger?: Logger
  ) {
    if (sources.length === 0) {
      throw new AuthError('ChainedCredentialSource needs at least one source');
    }
    this.log = logger ?? createChildLogger({ service: 'ChainedCredentialSource' });
  }

  async acquire(signal?: AbortSignal): Promise<AcquiredToken> {
    const failures: string[] = [];

    for (let index = this.cursor; index < this.sources.length; index++) {
      const source = this.sources[index];
      if (!source) continue;

      try {
        const acquired = await source.acquire(signal);
        if (!source.reusable && index < this.sources.length - 1) {
          this.cursor = index + 1;
        }
        return acquired;
      } catch (error) {
        failures.push(`${source.kind}: ${errorMessage(error)}`);
        this.log.warn({ source: source.kind, error: errorMessage(error) }, 'Credential source failed, trying next');
      }
    }

    throw new AuthError(`All credential sources failed (${failures.join('; ')})`, {
      details: { failures },
    });
  }
}
