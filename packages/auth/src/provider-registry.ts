/**
 * Provider Config Registry
 *
 * Read-only after construction. Ids are matched case-insensitively.
 */

import { ConfigurationError } from '@hostloop/config';
import { err, ok, type ProviderId, type Result } from '@hostloop/persistence';
import { UnknownProviderError, type ProviderConfig } from './providers/types.js';

export class ProviderRegistry {
  private readonly providers: ReadonlyMap<ProviderId, ProviderConfig>;

  private constructor(providers: Map<ProviderId, ProviderConfig>, readonly redirectPort: number) {
    this.providers = providers;
  }

  /**
   * Every provider must use the same redirect port; the listener binds
   * exactly one
   */
  static fromConfigs(configs: readonly ProviderConfig[]): ProviderRegistry {
    if (configs.length === 0) {
      throw new ConfigurationError('At least one OAuth provider must be configured');
    }

    const providers = new Map<ProviderId, ProviderConfig>();
    const redirectPort = configs[0].redirectPort;

    for (const config of configs) {
      const id = config.id.toLowerCase();
      if (providers.has(id)) {
        throw new ConfigurationError(`Duplicate OAuth provider id: ${config.id}`);
      }
      if (config.redirectPort !== redirectPort) {
        throw new ConfigurationError(
          `Provider "${config.id}" uses redirect port ${config.redirectPort}; all providers must share port ${redirectPort}`
        );
      }
      providers.set(id, config);
    }

    return new ProviderRegistry(providers, redirectPort);
  }

  get(id: ProviderId): Result<ProviderConfig, UnknownProviderError> {
    const config = this.providers.get(id.toLowerCase());
    return config ? ok(config) : err(new UnknownProviderError(id));
  }

  has(id: ProviderId): boolean {
    return this.providers.has(id.toLowerCase());
  }

  ids(): ProviderId[] {
    return Array.from(this.providers.keys());
  }

  list(): ProviderConfig[] {
    return Array.from(this.providers.values());
  }
}
