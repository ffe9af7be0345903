/**
 * Token store interface
 *
 * Holds the single live Token of a session. Owned by the host loop: only
 * the host-side event application writes to it, background work reads
 * snapshots.
 */

import type { StoredToken, Token } from '../types.js';

export interface TokenStore {
  /**
   * Current token, whether or not it has expired
   */
  current(): StoredToken | undefined;

  /**
   * Current token if it has not expired at `now`
   */
  live(_now?: number): StoredToken | undefined;

  /**
   * Replace the current token (never merges); returns the stored value
   * with its new version
   */
  replace(_token: Token): StoredToken;

  /**
   * Drop the current token; returns what was removed
   */
  clear(): StoredToken | undefined;

  /**
   * Version of the last replacement (0 before the first)
   */
  readonly version: number;
}
