/**
 * Google OAuth provider implementation
 */

import { decodeJwt } from 'jose';
import type { IdentityClaims } from '@hostloop/persistence';
import { BaseOAuthProvider, stringClaim } from './base-provider.js';
import type { ProviderTokenResponse } from './types.js';

export const GOOGLE_DEFAULTS = {
  displayName: 'Google',
  authEndpoint: 'https://accounts.google.com/o/oauth2/v2/auth',
  tokenEndpoint: 'https://oauth2.googleapis.com/token',
  userInfoEndpoint: 'https://www.googleapis.com/oauth2/v3/userinfo',
  scopes: ['openid', 'email', 'profile'],
  // offline access + consent so a refresh token is issued on every sign-in
  extraAuthParams: { access_type: 'offline', prompt: 'consent' },
} as const;

export class GoogleOAuthProvider extends BaseOAuthProvider {
  /**
   * Claims come from the id token; the userinfo endpoint is only asked when
   * the response carried none
   */
  protected async resolveClaims(
    response: ProviderTokenResponse,
    signal: AbortSignal
  ): Promise<IdentityClaims | undefined> {
    if (response.id_token) {
      const payload = decodeJwt(response.id_token);
      return {
        ...payload,
        sub: payload.sub,
        email: stringClaim(payload.email),
        name: stringClaim(payload.name),
        picture: stringClaim(payload.picture),
      };
    }

    const userInfoEndpoint = this._config.userInfoEndpoint;
    if (!userInfoEndpoint) {
      return undefined;
    }

    const userData = await this.fetchUserInfo(userInfoEndpoint, response.access_token, signal);
    return {
      sub: stringClaim(userData.sub),
      email: stringClaim(userData.email),
      name: stringClaim(userData.name) ?? stringClaim(userData.email),
      picture: stringClaim(userData.picture),
    };
  }
}
