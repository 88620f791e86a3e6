/**
 * Credential Types
 */

/**
 * Opaque bearer credential with an expiry. Never persisted.
 */
export interface CredentialToken {
  readonly token: string;
  readonly expiresOn: Date;
}

/**
 * A single source of bearer tokens.
 *
 * Implementations either return a token or throw `ProviderUnavailableError`.
 */
export interface TokenCredential {
  /** Provider name used in aggregated failure reports */
  readonly name: string;
  getToken(scope: string): Promise<CredentialToken>;
}

/** `fetch`-compatible function, injectable for tests */
export type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>;
