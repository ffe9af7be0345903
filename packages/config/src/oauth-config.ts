/**
 * OAuth configuration schema
 * Multi-provider OAuth 2.0 settings for the desktop authorization-code flow
 */

import { z } from 'zod';

/**
 * OAuth configuration schema (non-secret settings)
 */
export const OAuthConfigSchema = z.object({
  // Loopback redirect listener, shared by every provider
  OAUTH_REDIRECT_PORT: z.number().int().min(1).max(65535).default(8085),

  // Refresh this many seconds before the access token expires
  OAUTH_REFRESH_MARGIN_SECONDS: z.number().int().min(1).default(60),

  // A pending flow older than this is stale
  OAUTH_FLOW_TIMEOUT_SECONDS: z.number().int().min(1).default(600),

  // Generic OAuth
  OAUTH_AUTHORIZATION_URL: z.string().url().optional(),
  OAUTH_TOKEN_URL: z.string().url().optional(),
  OAUTH_USER_INFO_URL: z.string().url().optional(),
  OAUTH_PROVIDER_NAME: z.string().optional(),
  OAUTH_SCOPES: z.string().optional(),
});

export type OAuthSettings = z.infer<typeof OAuthConfigSchema>;

/**
 * OAuth secrets schema (client IDs and secrets)
 */
export const OAuthSecretsSchema = z.object({
  // Google OAuth secrets
  GOOGLE_CLIENT_ID: z.string().optional(),
  GOOGLE_CLIENT_SECRET: z.string().optional(),

  // GitHub OAuth secrets
  GITHUB_CLIENT_ID: z.string().optional(),
  GITHUB_CLIENT_SECRET: z.string().optional(),

  // Generic OAuth secrets
  OAUTH_CLIENT_ID: z.string().optional(),
  OAUTH_CLIENT_SECRET: z.string().optional(),
});

export type OAuthSecrets = z.infer<typeof OAuthSecretsSchema>;
