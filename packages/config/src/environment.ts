/**
 * Environment configuration for the host-loop client
 * Combines all configuration schemas
 */

import { z } from 'zod';
import { BaseConfigSchema } from './base-config.js';
import { OAuthConfigSchema, OAuthSecretsSchema } from './oauth-config.js';
import { FirestoreConfigSchema } from './firestore-config.js';
import { FirebaseConfigSchema, FirebaseSecretsSchema } from './firebase-config.js';
import { ConfigurationError } from './errors.js';

// Export all sub-schemas
export * from './base-config.js';
export * from './oauth-config.js';
export * from './firestore-config.js';
export * from './firebase-config.js';

/**
 * Non-secret configuration schema (safe to log)
 */
export const ConfigurationSchema = BaseConfigSchema
  .merge(OAuthConfigSchema)
  .merge(FirestoreConfigSchema)
  .merge(FirebaseConfigSchema);

/**
 * Secret configuration schema (never log)
 */
export const SecretsSchema = OAuthSecretsSchema.merge(FirebaseSecretsSchema);

/**
 * Combined environment schema
 */
export const EnvironmentSchema = ConfigurationSchema.merge(SecretsSchema);

export type Configuration = z.infer<typeof ConfigurationSchema>;
export type Secrets = z.infer<typeof SecretsSchema>;
export type Environment = z.infer<typeof EnvironmentSchema>;

export type ProviderKind = 'google' | 'github' | 'generic';

/**
 * Client credentials for one provider, as supplied by the environment
 */
export interface ProviderKeys {
  id: string;
  kind: ProviderKind;
  clientId: string;
  clientSecret: string;
}

/**
 * Configuration status interface
 */
export interface ConfigurationStatus {
  configuration: Configuration;
  secrets: {
    configured: string[];
    missing: string[];
    total: number;
  };
}

/**
 * Logger interface for optional logging
 */
export interface ConfigLogger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, error?: unknown): void;
}

function parseInteger(value: string | undefined): number | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  return Number.parseInt(value, 10);
}

function emptyToUndefined(value: string | undefined): string | undefined {
  return value === '' ? undefined : value;
}

/**
 * Environment configuration manager
 */
export class EnvironmentConfig {
  private static _instance: Environment | null = null;
  private static _configStatus: ConfigurationStatus | null = null;
  private static _logger: ConfigLogger | null = null;

  /**
   * Set optional logger for configuration messages
   */
  static setLogger(logger: ConfigLogger): void {
    this._logger = logger;
  }

  /**
   * Load and validate environment configuration
   */
  static load(): Environment {
    if (this._instance) {
      return this._instance;
    }

    // Parse environment variables with type conversion
    const env = {
      NODE_ENV: process.env.NODE_ENV ?? 'development',
      LOG_LEVEL: emptyToUndefined(process.env.LOG_LEVEL),
      RPC_REAUTH_WAIT_MS: parseInteger(process.env.RPC_REAUTH_WAIT_MS),
      BRIDGE_HIGH_WATER_MARK: parseInteger(process.env.BRIDGE_HIGH_WATER_MARK),

      // OAuth flow
      OAUTH_REDIRECT_PORT: parseInteger(process.env.OAUTH_REDIRECT_PORT),
      OAUTH_REFRESH_MARGIN_SECONDS: parseInteger(process.env.OAUTH_REFRESH_MARGIN_SECONDS),
      OAUTH_FLOW_TIMEOUT_SECONDS: parseInteger(process.env.OAUTH_FLOW_TIMEOUT_SECONDS),

      // Google OAuth
      GOOGLE_CLIENT_ID: emptyToUndefined(process.env.GOOGLE_CLIENT_ID),
      GOOGLE_CLIENT_SECRET: emptyToUndefined(process.env.GOOGLE_CLIENT_SECRET),

      // GitHub OAuth
      GITHUB_CLIENT_ID: emptyToUndefined(process.env.GITHUB_CLIENT_ID),
      GITHUB_CLIENT_SECRET: emptyToUndefined(process.env.GITHUB_CLIENT_SECRET),

      // Generic OAuth
      OAUTH_CLIENT_ID: emptyToUndefined(process.env.OAUTH_CLIENT_ID),
      OAUTH_CLIENT_SECRET: emptyToUndefined(process.env.OAUTH_CLIENT_SECRET),
      OAUTH_AUTHORIZATION_URL: emptyToUndefined(process.env.OAUTH_AUTHORIZATION_URL),
      OAUTH_TOKEN_URL: emptyToUndefined(process.env.OAUTH_TOKEN_URL),
      OAUTH_USER_INFO_URL: emptyToUndefined(process.env.OAUTH_USER_INFO_URL),
      OAUTH_PROVIDER_NAME: emptyToUndefined(process.env.OAUTH_PROVIDER_NAME),
      OAUTH_SCOPES: emptyToUndefined(process.env.OAUTH_SCOPES),

      // Firestore
      FIRESTORE_PROJECT_ID: emptyToUndefined(process.env.FIRESTORE_PROJECT_ID),
      FIRESTORE_DATABASE_ID: emptyToUndefined(process.env.FIRESTORE_DATABASE_ID),
      FIRESTORE_EMULATOR_HOST: emptyToUndefined(process.env.FIRESTORE_EMULATOR_HOST),
      FIRESTORE_WATCH_POLL_MS: parseInteger(process.env.FIRESTORE_WATCH_POLL_MS),

      // Firebase Authentication
      FIREBASE_API_KEY: emptyToUndefined(process.env.FIREBASE_API_KEY),
      FIREBASE_AUTH_EMULATOR_HOST: emptyToUndefined(process.env.FIREBASE_AUTH_EMULATOR_HOST),
    };

    const result = EnvironmentSchema.safeParse(env);
    if (!result.success) {
      if (this._logger) {
        this._logger.error('Environment configuration validation failed', result.error);
      }
      throw new ConfigurationError('Invalid environment configuration', result.error.issues);
    }

    this._instance = result.data;
    this._configStatus = this.analyzeConfiguration(result.data);
    return this._instance;
  }

  /**
   * Analyze configuration and separate secrets
   */
  private static analyzeConfiguration(env: Environment): ConfigurationStatus {
    const configuration = ConfigurationSchema.parse(env);

    // Analyze secrets without exposing their values
    const secretKeys = SecretsSchema.keyof().options;
    const configured: string[] = [];
    const missing: string[] = [];

    for (const key of secretKeys) {
      if (env[key]) {
        configured.push(key);
      } else {
        missing.push(key);
      }
    }

    return {
      configuration,
      secrets: {
        configured,
        missing,
        total: secretKeys.length
      }
    };
  }

  /**
   * Get current environment configuration
   */
  static get(): Environment {
    return this.load();
  }

  /**
   * Get configuration status
   */
  static getConfigurationStatus(): ConfigurationStatus {
    if (!this._configStatus) {
      this.load();
    }
    if (!this._configStatus) {
      throw new ConfigurationError('Configuration status not initialized after load()');
    }
    return this._configStatus;
  }

  /**
   * Log configuration status (requires logger to be set)
   */
  static logConfiguration(): void {
    if (!this._logger) {
      return;
    }

    const status = this.getConfigurationStatus();

    this._logger.info('Configuration loaded', { configuration: status.configuration });

    this._logger.info('Secrets Status', {
      totalSecrets: status.secrets.total,
      configuredCount: status.secrets.configured.length,
      configured: status.secrets.configured.join(', ') || 'none',
      missingCount: status.secrets.missing.length,
      missing: status.secrets.missing.join(', ') || 'none'
    });

    const providers = this.getProviderKeys().map((keys) => keys.id);
    if (providers.length > 0) {
      this._logger.info('OAuth providers configured', { providers });
    } else {
      this._logger.warn('OAuth: no providers configured');
    }
  }

  /**
   * Check if OAuth credentials are configured for a provider
   */
  static checkOAuthCredentials(provider: ProviderKind): boolean {
    const status = this.getConfigurationStatus();
    const [idKey, secretKey] = this.secretNames(provider);
    return status.secrets.configured.includes(idKey) &&
           status.secrets.configured.includes(secretKey);
  }

  private static secretNames(provider: ProviderKind): [keyof Secrets, keyof Secrets] {
    switch (provider) {
      case 'google':
        return ['GOOGLE_CLIENT_ID', 'GOOGLE_CLIENT_SECRET'];
      case 'github':
        return ['GITHUB_CLIENT_ID', 'GITHUB_CLIENT_SECRET'];
      case 'generic':
        return ['OAUTH_CLIENT_ID', 'OAUTH_CLIENT_SECRET'];
    }
  }

  /**
   * Provider id → client credentials for every fully configured provider
   */
  static getProviderKeys(): ProviderKeys[] {
    const env = this.get();
    const keys: ProviderKeys[] = [];

    if (env.GOOGLE_CLIENT_ID && env.GOOGLE_CLIENT_SECRET) {
      keys.push({ id: 'google', kind: 'google', clientId: env.GOOGLE_CLIENT_ID, clientSecret: env.GOOGLE_CLIENT_SECRET });
    }
    if (env.GITHUB_CLIENT_ID && env.GITHUB_CLIENT_SECRET) {
      keys.push({ id: 'github', kind: 'github', clientId: env.GITHUB_CLIENT_ID, clientSecret: env.GITHUB_CLIENT_SECRET });
    }
    if (env.OAUTH_CLIENT_ID && env.OAUTH_CLIENT_SECRET) {
      keys.push({
        id: (env.OAUTH_PROVIDER_NAME ?? 'generic').toLowerCase(),
        kind: 'generic',
        clientId: env.OAUTH_CLIENT_ID,
        clientSecret: env.OAUTH_CLIENT_SECRET
      });
    }

    return keys;
  }

  /**
   * Reset configuration (useful for testing)
   */
  static reset(): void {
    this._instance = null;
    this._configStatus = null;
  }

  /**
   * Check if running in production
   */
  static isProduction(): boolean {
    return this.get().NODE_ENV === 'production';
  }

  /**
   * Check if running in development
   */
  static isDevelopment(): boolean {
    return this.get().NODE_ENV === 'development';
  }

  /**
   * Timing settings for the auth state machine and document session
   */
  static getTimingConfig() {
    const env = this.get();

    return {
      refreshMarginMs: env.OAUTH_REFRESH_MARGIN_SECONDS * 1000,
      flowTimeoutMs: env.OAUTH_FLOW_TIMEOUT_SECONDS * 1000,
      reauthWaitMs: env.RPC_REAUTH_WAIT_MS,
      highWaterMark: env.BRIDGE_HIGH_WATER_MARK,
    };
  }

  /**
   * Get Firestore target configuration
   */
  static getFirestoreConfig() {
    const env = this.get();

    return {
      projectId: env.FIRESTORE_PROJECT_ID,
      databaseId: env.FIRESTORE_DATABASE_ID,
      emulatorHost: env.FIRESTORE_EMULATOR_HOST,
      pollIntervalMs: env.FIRESTORE_WATCH_POLL_MS,
    };
  }

  /**
   * Firebase sign-in settings; undefined without an API key
   */
  static getFirebaseConfig(): { apiKey: string; emulatorHost?: string } | undefined {
    const env = this.get();
    if (!env.FIREBASE_API_KEY) {
      return undefined;
    }

    return {
      apiKey: env.FIREBASE_API_KEY,
      emulatorHost: env.FIREBASE_AUTH_EMULATOR_HOST,
    };
  }
}
