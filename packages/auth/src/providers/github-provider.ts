/**
 * GitHub OAuth provider implementation
 *
 * GitHub answers a failed token exchange with HTTP 200 and an `error`
 * body; the base class treats that as a rejection.
 */

import type { IdentityClaims } from '@hostloop/persistence';
import { logger } from '@hostloop/observability';
import { BaseOAuthProvider, stringClaim } from './base-provider.js';
import type { ProviderTokenResponse } from './types.js';

export const GITHUB_DEFAULTS = {
  displayName: 'GitHub',
  authEndpoint: 'https://github.com/login/oauth/authorize',
  tokenEndpoint: 'https://github.com/login/oauth/access_token',
  userInfoEndpoint: 'https://api.github.com/user',
  scopes: ['read:user', 'user:email'],
} as const;

export class GitHubOAuthProvider extends BaseOAuthProvider {
  protected async resolveClaims(
    response: ProviderTokenResponse,
    signal: AbortSignal
  ): Promise<IdentityClaims | undefined> {
    const userInfoEndpoint = this._config.userInfoEndpoint ?? GITHUB_DEFAULTS.userInfoEndpoint;
    const userData = await this.fetchUserInfo(userInfoEndpoint, response.access_token, signal);

    const id = stringClaim(userData.id);
    const login = stringClaim(userData.login);
    let email = stringClaim(userData.email);

    // Fallback to GitHub noreply email if no public email
    if (!email && id && login) {
      logger.oauthDebug('No public email on GitHub profile, using noreply address', { login });
      email = `${id}+${login}@users.noreply.github.com`;
    }

    return {
      sub: id,
      email,
      name: stringClaim(userData.name) ?? login,
      picture: stringClaim(userData.avatar_url),
      login,
    };
  }
}
