/**
 * In-memory token store
 *
 * Versions increase across clears, so a token restored after logout never
 * reuses the version of a token a document call already saw.
 */

import type { TokenStore } from '../../interfaces/token-store.js';
import type { StoredToken, Token } from '../../types.js';
import { logger } from '../../logger.js';

export class MemoryTokenStore implements TokenStore {
  private token: StoredToken | undefined;
  private counter = 0;

  current(): StoredToken | undefined {
    return this.token;
  }

  live(now: number = Date.now()): StoredToken | undefined {
    if (!this.token || this.token.expiresAt <= now) {
      return undefined;
    }
    return this.token;
  }

  replace(token: Token): StoredToken {
    this.counter += 1;
    const stored: StoredToken = Object.freeze({ ...token, version: this.counter });
    const previous = this.token;
    this.token = stored;

    logger.debug('Token replaced', {
      provider: token.provider,
      version: stored.version,
      previousProvider: previous?.provider,
      previousVersion: previous?.version,
      expiresAt: new Date(token.expiresAt).toISOString()
    });

    return stored;
  }

  clear(): StoredToken | undefined {
    const removed = this.token;
    this.token = undefined;

    if (removed) {
      logger.debug('Token cleared', { provider: removed.provider, version: removed.version });
    }

    return removed;
  }

  get version(): number {
    return this.counter;
  }
}
