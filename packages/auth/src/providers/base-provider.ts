/**
 * Base OAuth provider implementation with common functionality
 *
 * A provider turns a PendingFlow into an authorization URL and talks to the
 * token endpoint. It holds no session state of its own; the auth state
 * machine owns the flow and the token.
 */

import { randomBytes, createHash } from 'node:crypto';
import { logger } from '@hostloop/observability';
import type { IdentityClaims, PendingFlow, Token } from '@hostloop/persistence';
import {
  AuthExchangeFailedError,
  ProviderErrorBodySchema,
  ProviderTokenResponseSchema,
  type FetchLike,
  type ProviderConfig,
  type ProviderTokenResponse,
} from './types.js';

/** Host named in every redirect URI and bound by the redirect listener */
export const REDIRECT_HOST = 'localhost';

export interface ProviderOptions {
  fetch?: FetchLike;
}

/**
 * Abstract base class providing common OAuth functionality
 */
export abstract class BaseOAuthProvider {
  protected readonly DEFAULT_TOKEN_EXPIRATION_SECONDS = 60 * 60; // 1 hour default when provider doesn't supply expiration
  protected readonly fetchFn: FetchLike;

  constructor(
    protected readonly _config: ProviderConfig,
    options: ProviderOptions = {}
  ) {
    this.fetchFn = options.fetch ?? globalThis.fetch;
  }

  get id(): string {
    return this._config.id;
  }

  get config(): ProviderConfig {
    return this._config;
  }

  getProviderName(): string {
    return this._config.displayName;
  }

  /**
   * Redirect URI registered with the provider; always the loopback root
   */
  getRedirectUri(): string {
    return `http://${REDIRECT_HOST}:${this._config.redirectPort}/`;
  }

  /**
   * Claims for a freshly issued token. Providers differ here: some put them
   * in an id token, some need an extra API call.
   */
  protected abstract resolveClaims(
    response: ProviderTokenResponse,
    signal: AbortSignal
  ): Promise<IdentityClaims | undefined>;

  /**
   * Generate PKCE code verifier and challenge
   */
  protected generatePKCE(): { codeVerifier: string; codeChallenge: string } {
    const codeVerifier = randomBytes(32).toString('base64url');
    const codeChallenge = createHash('sha256')
      .update(codeVerifier)
      .digest('base64url');

    return { codeVerifier, codeChallenge };
  }

  /**
   * Generate a secure random state parameter
   */
  protected generateState(): string {
    return randomBytes(16).toString('hex');
  }

  /**
   * New pending flow with fresh state nonce and PKCE pair
   */
  createPendingFlow(now: number, timeoutMs: number): PendingFlow {
    const { codeVerifier, codeChallenge } = this.generatePKCE();

    return {
      provider: this._config.id,
      stateNonce: this.generateState(),
      pkceVerifier: codeVerifier,
      pkceChallenge: codeChallenge,
      redirectUri: this.getRedirectUri(),
      scopes: this._config.scopes,
      createdAt: now,
      expiresAt: now + timeoutMs,
    };
  }

  /**
   * Build authorization URL with PKCE
   */
  buildAuthorizationUrl(flow: PendingFlow): string {
    const params = new URLSearchParams({
      client_id: this._config.clientId,
      redirect_uri: flow.redirectUri,
      response_type: 'code',
      scope: flow.scopes.join(' '),
      state: flow.stateNonce,
      code_challenge: flow.pkceChallenge,
      code_challenge_method: 'S256',
    });

    for (const [name, value] of Object.entries(this._config.extraAuthParams ?? {})) {
      params.set(name, value);
    }

    return `${this._config.authEndpoint}?${params.toString()}`;
  }

  /**
   * Exchange authorization code for tokens
   */
  async exchangeCode(code: string, flow: PendingFlow, signal: AbortSignal): Promise<Token> {
    logger.oauthDebug('Exchanging authorization code', {
      provider: this._config.id,
      statePrefix: flow.stateNonce.substring(0, 8),
    });

    const response = await this.postTokenRequest({
      client_id: this._config.clientId,
      client_secret: this._config.clientSecret,
      code,
      grant_type: 'authorization_code',
      redirect_uri: flow.redirectUri,
      code_verifier: flow.pkceVerifier,
    }, signal);

    const claims = await this.resolveClaimsSafely(response, signal);
    return this.toToken(response, claims);
  }

  /**
   * Refresh access token using refresh token
   */
  async refresh(previous: Token, signal: AbortSignal): Promise<Token> {
    if (!previous.refreshToken) {
      throw new AuthExchangeFailedError('No refresh token available', this._config.id);
    }

    const response = await this.postTokenRequest({
      client_id: this._config.clientId,
      client_secret: this._config.clientSecret,
      refresh_token: previous.refreshToken,
      grant_type: 'refresh_token',
    }, signal);

    // Refresh responses often omit the id token; keep the identity we had
    const claims = response.id_token
      ? await this.resolveClaimsSafely(response, signal)
      : previous.claims;

    return this.toToken(response, claims, previous);
  }

  protected async postTokenRequest(
    params: Record<string, string>,
    signal: AbortSignal
  ): Promise<ProviderTokenResponse> {
    const provider = this._config.id;
    let response: Response;

    try {
      response = await this.fetchFn(this._config.tokenEndpoint, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          'Accept': 'application/json',
        },
        body: new URLSearchParams(params).toString(),
        signal,
      });
    } catch (error) {
      if (signal.aborted) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new AuthExchangeFailedError(`Token endpoint unreachable: ${message}`, provider, {}, true);
    }

    const text = await response.text();
    const body = parseJson(text);
    const errorBody = ProviderErrorBodySchema.safeParse(body);

    if (!response.ok) {
      logger.oauthError('Token request failed', {
        provider,
        grantType: params.grant_type,
        status: response.status,
        statusText: response.statusText,
        providerError: errorBody.success ? errorBody.data.error : undefined,
      });
      throw new AuthExchangeFailedError(
        `Token request failed: ${response.status} ${response.statusText}`,
        provider,
        {
          status: response.status,
          error: errorBody.success ? errorBody.data.error : undefined,
          description: errorBody.success ? errorBody.data.error_description : undefined,
          body: errorBody.success ? undefined : text,
        },
        response.status === 429 || response.status >= 500
      );
    }

    if (errorBody.success) {
      logger.oauthError('Token request rejected', {
        provider,
        grantType: params.grant_type,
        providerError: errorBody.data.error,
      });
      throw new AuthExchangeFailedError(
        `Token request rejected: ${errorBody.data.error}`,
        provider,
        { status: response.status, error: errorBody.data.error, description: errorBody.data.error_description }
      );
    }

    const parsed = ProviderTokenResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new AuthExchangeFailedError(
        'Token endpoint returned an unrecognised response',
        provider,
        { status: response.status, body: text }
      );
    }

    return parsed.data;
  }

  /**
   * Identity lookup failures never fail the sign-in itself
   */
  private async resolveClaimsSafely(
    response: ProviderTokenResponse,
    signal: AbortSignal
  ): Promise<IdentityClaims | undefined> {
    try {
      return await this.resolveClaims(response, signal);
    } catch (error) {
      if (signal.aborted) {
        throw error;
      }
      logger.oauthWarn('Could not resolve identity claims', {
        provider: this._config.id,
        reason: error instanceof Error ? error.message : String(error),
      });
      return undefined;
    }
  }

  protected toToken(
    response: ProviderTokenResponse,
    claims: IdentityClaims | undefined,
    previous?: Token
  ): Token {
    const expiresIn = response.expires_in ?? this.DEFAULT_TOKEN_EXPIRATION_SECONDS;

    return {
      provider: this._config.id,
      accessToken: response.access_token,
      refreshToken: response.refresh_token ?? previous?.refreshToken,
      idToken: response.id_token ?? previous?.idToken,
      expiresAt: Date.now() + expiresIn * 1000,
      scopes: response.scope
        ? response.scope.split(/[\s,]+/).filter((scope) => scope.length > 0)
        : this._config.scopes,
      claims,
    };
  }

  /**
   * Fetch claims from a JSON user endpoint with the new access token
   */
  protected async fetchUserInfo(
    url: string,
    accessToken: string,
    signal: AbortSignal
  ): Promise<Record<string, unknown>> {
    const response = await this.fetchFn(url, {
      headers: {
        'Authorization': `Bearer ${accessToken}`,
        'Accept': 'application/json',
      },
      signal,
    });

    if (!response.ok) {
      throw new Error(`User info request failed: ${response.status}`);
    }

    const body: unknown = await response.json();
    if (!isRecord(body)) {
      throw new Error('User info response is not an object');
    }
    return body;
  }
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function stringClaim(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number') {
    return value.toString();
  }
  return undefined;
}
