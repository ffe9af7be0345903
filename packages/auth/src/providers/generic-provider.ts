/**
 * Generic OAuth provider implementation
 *
 * Supports any OAuth 2.0 / OpenID Connect provider
 */

import { decodeJwt } from 'jose';
import type { IdentityClaims } from '@hostloop/persistence';
import { BaseOAuthProvider, stringClaim } from './base-provider.js';
import type { ProviderTokenResponse } from './types.js';

export const GENERIC_DEFAULT_SCOPES = ['openid', 'email', 'profile'] as const;

export class GenericOAuthProvider extends BaseOAuthProvider {
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
        name: stringClaim(payload.name) ?? stringClaim(payload.preferred_username),
        picture: stringClaim(payload.picture),
      };
    }

    if (!this._config.userInfoEndpoint) {
      return undefined;
    }

    const userData = await this.fetchUserInfo(this._config.userInfoEndpoint, response.access_token, signal);
    return {
      ...userData,
      sub: stringClaim(userData.sub) ?? stringClaim(userData.id),
      email: stringClaim(userData.email),
      name: stringClaim(userData.name) ?? stringClaim(userData.preferred_username),
      picture: stringClaim(userData.picture),
    };
  }
}
