/**
 * Unit tests for EnvironmentConfig
 */

import { vi } from 'vitest';
import { EnvironmentConfig, ConfigurationError } from '@hostloop/config';
import { preserveEnv } from '@hostloop/testing';

const PROVIDER_VARS = [
  'GOOGLE_CLIENT_ID', 'GOOGLE_CLIENT_SECRET',
  'GITHUB_CLIENT_ID', 'GITHUB_CLIENT_SECRET',
  'OAUTH_CLIENT_ID', 'OAUTH_CLIENT_SECRET', 'OAUTH_PROVIDER_NAME',
  'OAUTH_REDIRECT_PORT', 'OAUTH_REFRESH_MARGIN_SECONDS', 'OAUTH_FLOW_TIMEOUT_SECONDS',
  'RPC_REAUTH_WAIT_MS', 'BRIDGE_HIGH_WATER_MARK', 'LOG_LEVEL',
  'FIRESTORE_PROJECT_ID', 'FIRESTORE_DATABASE_ID', 'FIRESTORE_EMULATOR_HOST', 'FIRESTORE_WATCH_POLL_MS',
  'FIREBASE_API_KEY', 'FIREBASE_AUTH_EMULATOR_HOST',
];

describe('EnvironmentConfig', () => {
  let restoreEnv: () => void;

  beforeEach(() => {
    restoreEnv = preserveEnv();
    for (const key of PROVIDER_VARS) {
      delete process.env[key];
    }
    EnvironmentConfig.reset();
  });

  afterEach(() => {
    restoreEnv();
    EnvironmentConfig.reset();
  });

  it('applies defaults', () => {
    const env = EnvironmentConfig.load();

    expect(env.OAUTH_REDIRECT_PORT).toBe(8085);
    expect(env.OAUTH_REFRESH_MARGIN_SECONDS).toBe(60);
    expect(env.OAUTH_FLOW_TIMEOUT_SECONDS).toBe(600);
    expect(env.RPC_REAUTH_WAIT_MS).toBe(10_000);
    expect(env.FIRESTORE_DATABASE_ID).toBe('(default)');
  });

  it('caches the parsed environment until reset', () => {
    process.env.OAUTH_REDIRECT_PORT = '9000';
    expect(EnvironmentConfig.load().OAUTH_REDIRECT_PORT).toBe(9000);

    process.env.OAUTH_REDIRECT_PORT = '9001';
    expect(EnvironmentConfig.load().OAUTH_REDIRECT_PORT).toBe(9000);

    EnvironmentConfig.reset();
    expect(EnvironmentConfig.load().OAUTH_REDIRECT_PORT).toBe(9001);
  });

  it('rejects an out-of-range redirect port', () => {
    process.env.OAUTH_REDIRECT_PORT = '70000';
    expect(() => EnvironmentConfig.load()).toThrow(ConfigurationError);
  });

  it('rejects a zero refresh margin', () => {
    process.env.OAUTH_REFRESH_MARGIN_SECONDS = '0';
    expect(() => EnvironmentConfig.load()).toThrow(ConfigurationError);
  });

  it('reports validation failures to the configured logger', () => {
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    EnvironmentConfig.setLogger(logger);
    process.env.FIRESTORE_WATCH_POLL_MS = '5';

    expect(() => EnvironmentConfig.load()).toThrow('Invalid environment configuration');
    expect(logger.error).toHaveBeenCalledWith('Environment configuration validation failed', expect.anything());
  });

  it('lists only providers with both client id and secret', () => {
    process.env.GOOGLE_CLIENT_ID = 'google-client';
    process.env.GOOGLE_CLIENT_SECRET = 'test-secret';
    process.env.GITHUB_CLIENT_ID = 'github-client';

    expect(EnvironmentConfig.getProviderKeys()).toEqual([
      { id: 'google', kind: 'google', clientId: 'google-client', clientSecret: 'test-secret' },
    ]);
    expect(EnvironmentConfig.checkOAuthCredentials('google')).toBe(true);
    expect(EnvironmentConfig.checkOAuthCredentials('github')).toBe(false);
  });

  it('names the generic provider after OAUTH_PROVIDER_NAME', () => {
    process.env.OAUTH_CLIENT_ID = 'generic-client';
    process.env.OAUTH_CLIENT_SECRET = 'test-secret';
    process.env.OAUTH_PROVIDER_NAME = 'Okta';

    expect(EnvironmentConfig.getProviderKeys()).toEqual([
      { id: 'okta', kind: 'generic', clientId: 'generic-client', clientSecret: 'test-secret' },
    ]);
  });

  it('separates configured and missing secrets without exposing values', () => {
    process.env.GITHUB_CLIENT_ID = 'github-client';
    process.env.GITHUB_CLIENT_SECRET = 'test-secret';

    const status = EnvironmentConfig.getConfigurationStatus();

    expect(status.secrets.configured).toEqual(['GITHUB_CLIENT_ID', 'GITHUB_CLIENT_SECRET']);
    expect(status.secrets.total).toBe(7);
    expect(JSON.stringify(status.configuration)).not.toContain('test-secret');
  });

  it('converts timing settings to milliseconds', () => {
    process.env.OAUTH_REFRESH_MARGIN_SECONDS = '30';
    process.env.OAUTH_FLOW_TIMEOUT_SECONDS = '120';
    process.env.RPC_REAUTH_WAIT_MS = '2500';

    expect(EnvironmentConfig.getTimingConfig()).toEqual({
      refreshMarginMs: 30_000,
      flowTimeoutMs: 120_000,
      reauthWaitMs: 2500,
      highWaterMark: 1000,
    });
  });

  it('exposes the Firestore target', () => {
    process.env.FIRESTORE_PROJECT_ID = 'demo-project';
    process.env.FIRESTORE_EMULATOR_HOST = '127.0.0.1:8080';

    expect(EnvironmentConfig.getFirestoreConfig()).toEqual({
      projectId: 'demo-project',
      databaseId: '(default)',
      emulatorHost: '127.0.0.1:8080',
      pollIntervalMs: 1000,
    });
  });

  it('enables Firebase sign-in only with an API key', () => {
    expect(EnvironmentConfig.getFirebaseConfig()).toBeUndefined();

    EnvironmentConfig.reset();
    process.env.FIREBASE_API_KEY = 'test-api-key';
    process.env.FIREBASE_AUTH_EMULATOR_HOST = '127.0.0.1:9099';

    expect(EnvironmentConfig.getFirebaseConfig()).toEqual({
      apiKey: 'test-api-key',
      emulatorHost: '127.0.0.1:9099',
    });
    expect(EnvironmentConfig.getConfigurationStatus().secrets.configured).toEqual(['FIREBASE_API_KEY']);
  });
});
