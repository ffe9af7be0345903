/**
 * Provider configuration: kind defaults and the environment mapping
 */

import { ConfigurationError, type OAuthSettings, type ProviderKeys } from '@hostloop/config';
import type { ProviderId } from '@hostloop/persistence';
import { GOOGLE_DEFAULTS } from './providers/google-provider.js';
import { GITHUB_DEFAULTS } from './providers/github-provider.js';
import { GENERIC_DEFAULT_SCOPES } from './providers/generic-provider.js';
import type { ProviderConfig, ProviderKind } from './providers/types.js';

export const DEFAULT_REDIRECT_PORT = 8085;

/**
 * Provider description as supplied by the host; unset fields take the
 * defaults of its kind
 */
export interface ProviderDefinition {
  kind: ProviderKind;
  clientId: string;
  clientSecret: string;
  id?: ProviderId;
  displayName?: string;
  authEndpoint?: string;
  tokenEndpoint?: string;
  userInfoEndpoint?: string;
  scopes?: readonly string[];
  redirectPort?: number;
  extraAuthParams?: Record<string, string>;
}

interface KindDefaults {
  displayName: string;
  authEndpoint?: string;
  tokenEndpoint?: string;
  userInfoEndpoint?: string;
  scopes: readonly string[];
  extraAuthParams?: Readonly<Record<string, string>>;
}

function kindDefaults(kind: ProviderKind): KindDefaults {
  switch (kind) {
    case 'google':
      return GOOGLE_DEFAULTS;
    case 'github':
      return GITHUB_DEFAULTS;
    case 'generic':
      return { displayName: 'OAuth', scopes: GENERIC_DEFAULT_SCOPES };
  }
}

/**
 * Resolve a definition into a frozen ProviderConfig
 */
export function defineProvider(definition: ProviderDefinition): ProviderConfig {
  const defaults = kindDefaults(definition.kind);
  const id = (definition.id ?? definition.kind).toLowerCase();

  const authEndpoint = definition.authEndpoint ?? defaults.authEndpoint;
  const tokenEndpoint = definition.tokenEndpoint ?? defaults.tokenEndpoint;
  if (!authEndpoint || !tokenEndpoint) {
    throw new ConfigurationError(`Provider "${id}" needs an authorization and a token endpoint`);
  }
  if (!definition.clientId || !definition.clientSecret) {
    throw new ConfigurationError(`Provider "${id}" is missing its client credentials`);
  }

  const extraAuthParams = { ...defaults.extraAuthParams, ...definition.extraAuthParams };

  return Object.freeze({
    id,
    kind: definition.kind,
    displayName: definition.displayName ?? defaults.displayName,
    authEndpoint,
    tokenEndpoint,
    userInfoEndpoint: definition.userInfoEndpoint ?? defaults.userInfoEndpoint,
    clientId: definition.clientId,
    clientSecret: definition.clientSecret,
    scopes: Object.freeze([...(definition.scopes ?? defaults.scopes)]),
    redirectPort: definition.redirectPort ?? DEFAULT_REDIRECT_PORT,
    extraAuthParams: Object.freeze(extraAuthParams),
  });
}

/**
 * Provider id → (client id, client secret) from the environment, plus the
 * shared OAuth settings, as ProviderConfigs
 */
export function buildProviderConfigs(
  keys: readonly ProviderKeys[],
  settings: OAuthSettings
): ProviderConfig[] {
  return keys.map((entry) => {
    const common = {
      id: entry.id,
      kind: entry.kind,
      clientId: entry.clientId,
      clientSecret: entry.clientSecret,
      redirectPort: settings.OAUTH_REDIRECT_PORT,
    };

    if (entry.kind !== 'generic') {
      return defineProvider(common);
    }

    return defineProvider({
      ...common,
      displayName: settings.OAUTH_PROVIDER_NAME,
      authEndpoint: settings.OAUTH_AUTHORIZATION_URL,
      tokenEndpoint: settings.OAUTH_TOKEN_URL,
      userInfoEndpoint: settings.OAUTH_USER_INFO_URL,
      scopes: settings.OAUTH_SCOPES?.split(/[\s,]+/).filter((scope) => scope.length > 0),
    });
  });
}
