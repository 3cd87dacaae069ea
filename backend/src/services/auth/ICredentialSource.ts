/**
 * Credential source contract.
 *
 * @module services/auth/ICredentialSource
 */

import type { CredentialSourceKind } from '@graph-orchestrator/shared';

/**
 * Token returned by a source. `validityMs` overrides the configured lifetime.
 */
export interface AcquiredToken {
  token: string;
  validityMs?: number;
}

export interface ICredentialSource {
  readonly kind: CredentialSourceKind;

  /**
   * False when re-acquiring would hand back the same stale token
   * (e.g. a pre-issued token). Chained sources move past such a source
   * once it has been used.
   */
  readonly reusable: boolean;

  acquire(signal?: AbortSignal): Promise<AcquiredToken>;
}
