/**
 * Firebase Authentication REST calls
 *
 * Trades an identity-provider token for a Firebase ID token
 * (`accounts:signInWithIdp`), refreshes that ID token through the secure
 * token service and deletes the signed-in account. The Firebase ID token is
 * what Firestore accepts as a bearer credential.
 */

import { z } from 'zod';
import { logger } from '@hostloop/observability';
import type { IdentityClaims, ProviderId, Token } from '@hostloop/persistence';
import { FirebaseAuthError, type FetchLike } from '../providers/types.js';

export const IDENTITY_TOOLKIT_URL = 'https://identitytoolkit.googleapis.com';
export const SECURE_TOKEN_URL = 'https://securetoken.googleapis.com';

const DEFAULT_FIREBASE_PROVIDER_IDS: Readonly<Record<ProviderId, string>> = {
  google: 'google.com',
  github: 'github.com',
};

export interface IdentityToolkitOptions {
  apiKey: string;
  /** host:port of the Auth emulator; plain http is used when set */
  emulatorHost?: string;
  /**
   * Firebase provider id per OAuth provider id. Google and GitHub map to
   * google.com and github.com; any other provider id is passed as is
   * (e.g. "oidc.corp").
   */
  providerIds?: Readonly<Record<ProviderId, string>>;
  fetch?: FetchLike;
}

const SignInResponseSchema = z.object({
  localId: z.string().min(1),
  idToken: z.string().min(1),
  refreshToken: z.string().min(1),
  // Sent as a string of seconds
  expiresIn: z.coerce.number().positive(),
  email: z.string().optional(),
  displayName: z.string().optional(),
  photoUrl: z.string().optional(),
});

const RefreshResponseSchema = z.object({
  id_token: z.string().min(1),
  refresh_token: z.string().min(1),
  expires_in: z.coerce.number().positive(),
  user_id: z.string().optional(),
});

const ServiceErrorSchema = z.object({
  error: z.object({
    code: z.number().optional(),
    message: z.string(),
    status: z.string().optional(),
  }),
});

interface ServiceRequest {
  url: string;
  provider: ProviderId | undefined;
  operation: string;
  contentType: 'application/json' | 'application/x-www-form-urlencoded';
  body: string;
}

export class IdentityToolkitClient {
  private readonly fetchFn: FetchLike;

  constructor(private readonly options: IdentityToolkitOptions) {
    this.fetchFn = options.fetch ?? fetch;
  }

  firebaseProviderId(provider: ProviderId): string {
    return this.options.providerIds?.[provider] ?? DEFAULT_FIREBASE_PROVIDER_IDS[provider] ?? provider;
  }

  /**
   * Sign in (or sign up) with the identity provider's token. The provider's
   * id token is preferred; without one its access token is sent.
   */
  async signInWithIdp(idp: Token, requestUri: string, signal: AbortSignal): Promise<Token> {
    const providerId = this.firebaseProviderId(idp.provider);
    const postBody = idp.idToken
      ? new URLSearchParams({ id_token: idp.idToken, providerId })
      : new URLSearchParams({ access_token: idp.accessToken, providerId });

    const body = await this.send({
      url: this.endpoint(IDENTITY_TOOLKIT_URL, '/v1/accounts:signInWithIdp'),
      provider: idp.provider,
      operation: 'signInWithIdp',
      contentType: 'application/json',
      body: JSON.stringify({
        postBody: postBody.toString(),
        requestUri,
        returnIdpCredential: true,
        returnSecureToken: true,
      }),
    }, signal);

    const parsed = SignInResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new FirebaseAuthError('Firebase sign-in returned an unrecognised response', idp.provider);
    }

    const account = parsed.data;
    const claims: IdentityClaims = { sub: account.localId };
    if (account.email) {
      claims.email = account.email;
    }
    if (account.displayName) {
      claims.name = account.displayName;
    }
    if (account.photoUrl) {
      claims.picture = account.photoUrl;
    }

    logger.oauthInfo('Signed in to Firebase', { provider: idp.provider, firebaseProvider: providerId });
    return {
      provider: idp.provider,
      accessToken: account.idToken,
      idToken: account.idToken,
      refreshToken: account.refreshToken,
      expiresAt: Date.now() + account.expiresIn * 1000,
      scopes: [],
      claims,
    };
  }

  /**
   * New ID token for a Firebase credential; the account claims carry over
   */
  async refresh(credential: Token, signal: AbortSignal): Promise<Token> {
    if (!credential.refreshToken) {
      throw new FirebaseAuthError('No Firebase refresh token available', credential.provider);
    }

    const body = await this.send({
      url: this.endpoint(SECURE_TOKEN_URL, '/v1/token'),
      provider: credential.provider,
      operation: 'refresh',
      contentType: 'application/x-www-form-urlencoded',
      body: new URLSearchParams({
        grant_type: 'refresh_token',
        refresh_token: credential.refreshToken,
      }).toString(),
    }, signal);

    const parsed = RefreshResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new FirebaseAuthError('Firebase token refresh returned an unrecognised response', credential.provider);
    }

    return {
      ...credential,
      accessToken: parsed.data.id_token,
      idToken: parsed.data.id_token,
      refreshToken: parsed.data.refresh_token,
      expiresAt: Date.now() + parsed.data.expires_in * 1000,
    };
  }

  /**
   * Delete the account the credential belongs to. Firebase answers
   * CREDENTIAL_TOO_OLD_LOGIN_AGAIN when the sign-in is not recent.
   */
  async deleteAccount(credential: Token, signal: AbortSignal): Promise<void> {
    await this.send({
      url: this.endpoint(IDENTITY_TOOLKIT_URL, '/v1/accounts:delete'),
      provider: credential.provider,
      operation: 'deleteAccount',
      contentType: 'application/json',
      body: JSON.stringify({ idToken: credential.idToken ?? credential.accessToken }),
    }, signal);

    logger.oauthInfo('Firebase account deleted', { provider: credential.provider });
  }

  endpoint(service: string, path: string): string {
    const key = `key=${encodeURIComponent(this.options.apiKey)}`;
    if (this.options.emulatorHost) {
      return `http://${this.options.emulatorHost}/${new URL(service).host}${path}?${key}`;
    }
    return `${service}${path}?${key}`;
  }

  private async send(request: ServiceRequest, signal: AbortSignal): Promise<unknown> {
    let response: Response;
    try {
      response = await this.fetchFn(request.url, {
        method: 'POST',
        headers: {
          'Content-Type': request.contentType,
          'Accept': 'application/json',
        },
        body: request.body,
        signal,
      });
    } catch (error) {
      if (signal.aborted) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new FirebaseAuthError(`Firebase Authentication unreachable: ${message}`, request.provider, undefined, undefined, true);
    }

    const text = await response.text();
    const body = parseJson(text);

    if (!response.ok) {
      const serviceError = ServiceErrorSchema.safeParse(body);
      // Messages look like "INVALID_IDP_RESPONSE : detail"
      const reason = serviceError.success ? serviceError.data.error.message.split(' ')[0] : undefined;
      logger.oauthError('Firebase Authentication request failed', {
        provider: request.provider,
        operation: request.operation,
        status: response.status,
        reason,
      });
      throw new FirebaseAuthError(
        `Firebase ${request.operation} failed: ${response.status}${reason ? ` ${reason}` : ''}`,
        request.provider,
        reason,
        response.status,
        response.status === 429 || response.status >= 500
      );
    }

    return body;
  }
}

function parseJson(text: string): unknown {
  if (text.length === 0) {
    return {};
  }
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
