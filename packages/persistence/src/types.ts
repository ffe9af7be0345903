/**
 * Persistence layer type definitions
 *
 * Shared by the auth state machine (producer) and the host-side token
 * store (single writer).
 */

/**
 * Identifier of a registered OAuth provider ("google", "github", ...)
 */
export type ProviderId = string;

/**
 * Identity claims decoded from an id token or fetched from a user endpoint
 */
export interface IdentityClaims {
  sub?: string;
  email?: string;
  name?: string;
  picture?: string;
  [claim: string]: unknown;
}

/**
 * Access credentials issued by a provider.
 *
 * Immutable value: a refresh or a new sign-in produces a new Token that
 * replaces the previous one.
 */
export interface Token {
  readonly provider: ProviderId;
  readonly accessToken: string;
  readonly refreshToken?: string;
  readonly idToken?: string;
  /** Epoch milliseconds */
  readonly expiresAt: number;
  readonly scopes: readonly string[];
  readonly claims?: IdentityClaims;
}

/**
 * Token as held by the host-side store, stamped with the replacement counter
 */
export interface StoredToken extends Token {
  readonly version: number;
}

/**
 * Authorization-code flow waiting for the browser redirect.
 * At most one per provider.
 */
export interface PendingFlow {
  readonly provider: ProviderId;
  readonly stateNonce: string;
  readonly pkceVerifier: string;
  readonly pkceChallenge: string;
  readonly redirectUri: string;
  readonly scopes: readonly string[];
  /** Epoch milliseconds */
  readonly createdAt: number;
  /** Epoch milliseconds */
  readonly expiresAt: number;
}
