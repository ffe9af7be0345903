/**
 * OAuth provider types and error hierarchy
 */

import { z } from 'zod';
import type { ProviderKind } from '@hostloop/config';
import type { ProviderId } from '@hostloop/persistence';

export type { ProviderKind };

/**
 * Immutable description of a registered provider
 */
export interface ProviderConfig {
  readonly id: ProviderId;
  readonly kind: ProviderKind;
  readonly displayName: string;
  readonly authEndpoint: string;
  readonly tokenEndpoint: string;
  readonly userInfoEndpoint?: string;
  readonly clientId: string;
  readonly clientSecret: string;
  readonly scopes: readonly string[];
  /** Local port the redirect listener binds; shared by every provider */
  readonly redirectPort: number;
  /** Appended to the authorization URL after the standard parameters */
  readonly extraAuthParams?: Readonly<Record<string, string>>;
}

export type FetchLike = typeof fetch;

/**
 * Query parameters delivered to the local redirect endpoint
 */
export interface RedirectParams {
  code?: string;
  state?: string;
  error?: string;
  error_description?: string;
}

/**
 * Successful token endpoint body. `expires_in` arrives as a number from
 * most providers and as a string from a few.
 */
export const ProviderTokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().optional(),
  expires_in: z.coerce.number().positive().optional(),
  refresh_token: z.string().min(1).optional(),
  id_token: z.string().min(1).optional(),
  scope: z.string().optional(),
});

export type ProviderTokenResponse = z.infer<typeof ProviderTokenResponseSchema>;

/**
 * RFC 6749 §5.2 error body. GitHub also sends this with HTTP 200.
 */
export const ProviderErrorBodySchema = z.object({
  error: z.string(),
  error_description: z.string().optional(),
});

export type AuthErrorCode =
  | 'unknown_provider'
  | 'state_mismatch'
  | 'stale_flow'
  | 'auth_exchange_failed'
  | 'token_expired'
  | 'provider_denied'
  | 'firebase_auth_failed';

/**
 * Base class for authentication failures
 */
export class AuthError extends Error {
  constructor(
    message: string,
    public readonly code: AuthErrorCode,
    public readonly provider?: ProviderId
  ) {
    super(message);
    this.name = 'AuthError';
  }
}

export class UnknownProviderError extends AuthError {
  constructor(provider: ProviderId) {
    super(`Unknown OAuth provider: ${provider}`, 'unknown_provider', provider);
    this.name = 'UnknownProviderError';
  }
}

export class StateMismatchError extends AuthError {
  constructor(provider?: ProviderId) {
    super('OAuth state parameter does not match the pending authentication', 'state_mismatch', provider);
    this.name = 'StateMismatchError';
  }
}

export type StaleFlowReason = 'superseded' | 'expired';

export class StaleFlowError extends AuthError {
  constructor(provider: ProviderId, public readonly reason: StaleFlowReason) {
    super(`OAuth redirect arrived for a ${reason} authentication flow`, 'stale_flow', provider);
    this.name = 'StaleFlowError';
  }
}

export interface ExchangeFailureDetail {
  status?: number;
  error?: string;
  description?: string;
  body?: string;
}

export class AuthExchangeFailedError extends AuthError {
  constructor(
    message: string,
    provider: ProviderId,
    public readonly detail: ExchangeFailureDetail = {},
    /** Network failure, rate limit or server error: worth trying again */
    public readonly retryable = false
  ) {
    super(message, 'auth_exchange_failed', provider);
    this.name = 'AuthExchangeFailedError';
  }
}

export class TokenExpiredError extends AuthError {
  constructor(provider: ProviderId) {
    super('Access token expired and no refresh token is available', 'token_expired', provider);
    this.name = 'TokenExpiredError';
  }
}

export class ProviderDeniedError extends AuthError {
  constructor(
    provider: ProviderId,
    public readonly providerError: string,
    public readonly description?: string
  ) {
    super(`Provider denied authorization: ${providerError}${description ? ` (${description})` : ''}`, 'provider_denied', provider);
    this.name = 'ProviderDeniedError';
  }
}

/**
 * Firebase Authentication refused or could not be reached. `reason` is the
 * service's error message code, e.g. INVALID_IDP_RESPONSE or
 * CREDENTIAL_TOO_OLD_LOGIN_AGAIN.
 */
export class FirebaseAuthError extends AuthError {
  constructor(
    message: string,
    provider: ProviderId | undefined,
    public readonly reason?: string,
    public readonly status?: number,
    public readonly retryable = false
  ) {
    super(message, 'firebase_auth_failed', provider);
    this.name = 'FirebaseAuthError';
  }
}
