/**
 * Pre-issued token from configuration (GAE_ACCESS_TOKEN or a fixed JWT).
 *
 * @module services/auth/StaticTokenCredentialSource
 */

import { AuthError } from '@/shared/errors';
import type { AcquiredToken, ICredentialSource } from './ICredentialSource';

export class StaticTokenCredentialSource implements ICredentialSource {
  readonly kind = 'static' as const;
  readonly reusable = false;

  constructor(
    private readonly token: string,
    private readonly validityMs?: number
  ) {}

  async acquire(): Promise<AcquiredToken> {
    const token = this.token.trim();
    if (!token) {
      throw new AuthError('Configured access token is empty');
    }
    return this.validityMs === undefined ? { token } : { token, validityMs: this.validityMs };
  }
}
