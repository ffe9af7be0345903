/**
 * Base configuration schema
 * Runtime environment, logging and host-loop timing settings
 */

import { z } from 'zod';

/**
 * Base configuration schema (non-secret settings)
 */
export const BaseConfigSchema = z.object({
  // Environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),

  // How long a parked document call waits for fresh credentials
  RPC_REAUTH_WAIT_MS: z.number().int().min(0).default(10_000),

  // Events a stream may queue before it waits for the next host tick
  BRIDGE_HIGH_WATER_MARK: z.number().int().min(1).default(1000),
});

export type BaseConfig = z.infer<typeof BaseConfigSchema>;
