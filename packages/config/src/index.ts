/**
 * @hostloop/config
 * Validated environment configuration for the host-loop client
 */

export * from './environment.js';
export * from './errors.js';
