/**
 * OAuth provider factory
 */

import { GoogleOAuthProvider } from './providers/google-provider.js';
import { GitHubOAuthProvider } from './providers/github-provider.js';
import { GenericOAuthProvider } from './providers/generic-provider.js';
import type { BaseOAuthProvider, ProviderOptions } from './providers/base-provider.js';
import type { ProviderConfig } from './providers/types.js';

export class OAuthProviderFactory {
  /**
   * Build the provider adapter for a config by its kind
   */
  static createProvider(config: ProviderConfig, options: ProviderOptions = {}): BaseOAuthProvider {
    switch (config.kind) {
      case 'google':
        return new GoogleOAuthProvider(config, options);
      case 'github':
        return new GitHubOAuthProvider(config, options);
      case 'generic':
        return new GenericOAuthProvider(config, options);
    }
  }
}
