/**
 * Credential Types
 *
 * Short-lived bearer credential used for every engine API call.
 *
 * @module @graph-orchestrator/shared/types/credential
 */

/**
 * Where a credential was obtained from.
 */
export type CredentialSourceKind = 'static' | 'cli' | 'http_login' | 'chained';

/**
 * Cached bearer credential.
 *
 * Replaced wholesale on refresh, never mutated in place.
 */
export interface Credential {
  /** Opaque bearer token */
  readonly token: string;
  /** Epoch milliseconds at which the token was issued (or first observed) */
  readonly issuedAt: number;
  /** Assumed validity window in milliseconds */
  readonly validityMs: number;
  /** Source that produced this credential */
  readonly source: CredentialSourceKind;
}
