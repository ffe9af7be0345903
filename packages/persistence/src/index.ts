/**
 * @hostloop/persistence
 *
 * Token entity and the host-side store that owns it.
 *
 * ```typescript
 * import { MemoryTokenStore, setLogger } from '@hostloop/persistence';
 *
 * setLogger(myLogger); // optional, silent by default
 * const tokens = new MemoryTokenStore();
 * ```
 */

export * from './types.js';
export { ok, err, type Result } from './result.js';
export type { TokenStore } from './interfaces/token-store.js';
export { MemoryTokenStore } from './stores/memory/memory-token-store.js';
export { setLogger, getLogger, type PersistenceLogger } from './logger.js';
