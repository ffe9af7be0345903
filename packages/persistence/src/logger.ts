/**
 * Token stores log through whatever the host hands to `setLogger`.
 * Nothing is written before that.
 */

type LogMeta = Record<string, unknown>;

export interface PersistenceLogger {
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  debug(message: string, meta?: LogMeta): void;
}

const silent: PersistenceLogger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  debug: () => undefined,
};

let active: PersistenceLogger = silent;

export function setLogger(next: PersistenceLogger): void {
  active = next;
}

export function getLogger(): PersistenceLogger {
  return active;
}

/** Forwards to the logger installed at call time */
export const logger: PersistenceLogger = {
  info: (message, meta) => active.info(message, meta),
  warn: (message, meta) => active.warn(message, meta),
  error: (message, meta) => active.error(message, meta),
  debug: (message, meta) => active.debug(message, meta),
};
