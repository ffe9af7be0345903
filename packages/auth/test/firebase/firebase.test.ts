/**
 * Firebase sign-in: Identity Toolkit calls and the session that keeps the
 * Firebase ID token fresh
 */

import { vi } from 'vitest';
import { AsyncTaskBridge } from '@hostloop/bridge';
import { createMockTokenEndpoint, type MockTokenEndpoint } from '@hostloop/testing';
import type { Token } from '@hostloop/persistence';
import {
  FirebaseAuthError,
  FirebaseSession,
  IDENTITY_TOOLKIT_URL,
  IdentityToolkitClient,
  SECURE_TOKEN_URL,
  type AuthEvent,
} from '../../src/index.js';

const NOW = new Date('2026-03-01T12:00:00Z').getTime();
const SIGN_IN_URL = `${IDENTITY_TOOLKIT_URL}/v1/accounts:signInWithIdp`;
const REFRESH_URL = `${SECURE_TOKEN_URL}/v1/token`;
const DELETE_URL = `${IDENTITY_TOOLKIT_URL}/v1/accounts:delete`;

const SIGN_IN_REPLY = {
  kind: 'identitytoolkit#VerifyAssertionResponse',
  localId: 'fb-user-1',
  idToken: 'firebase-id-1',
  refreshToken: 'firebase-refresh-1',
  expiresIn: '3600',
  email: 'tester@example.com',
  displayName: 'Test User',
};

const REFRESH_REPLY = {
  id_token: 'firebase-id-2',
  refresh_token: 'firebase-refresh-2',
  expires_in: '3600',
  token_type: 'Bearer',
  user_id: 'fb-user-1',
};

function googleToken(): Token {
  return {
    provider: 'google',
    accessToken: 'google-access',
    idToken: 'google-id',
    expiresAt: NOW + 3_600_000,
    scopes: ['openid', 'email', 'profile'],
  };
}

function serviceError(status: number, message: string) {
  return { status, body: { error: { code: status, message, status: 'INVALID_ARGUMENT' } } };
}

describe('IdentityToolkitClient', () => {
  let endpoint: MockTokenEndpoint;
  let toolkit: IdentityToolkitClient;
  const signal = new AbortController().signal;

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(NOW);
    endpoint = createMockTokenEndpoint();
    toolkit = new IdentityToolkitClient({ apiKey: 'test-api-key', fetch: endpoint.fetch });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('signs in with the provider id token', async () => {
    endpoint.route(SIGN_IN_URL, { body: SIGN_IN_REPLY });

    const credential = await toolkit.signInWithIdp(googleToken(), 'http://localhost:8085/', signal);

    expect(endpoint.requests[0].url).toBe(
      'https://identitytoolkit.googleapis.com/v1/accounts:signInWithIdp?key=test-api-key'
    );
    expect(endpoint.requests[0].json).toEqual({
      postBody: 'id_token=google-id&providerId=google.com',
      requestUri: 'http://localhost:8085/',
      returnIdpCredential: true,
      returnSecureToken: true,
    });
    expect(credential).toEqual({
      provider: 'google',
      accessToken: 'firebase-id-1',
      idToken: 'firebase-id-1',
      refreshToken: 'firebase-refresh-1',
      expiresAt: NOW + 3_600_000,
      scopes: [],
      claims: { sub: 'fb-user-1', email: 'tester@example.com', name: 'Test User' },
    });
  });

  it('sends the access token when the provider issued no id token', async () => {
    endpoint.route(SIGN_IN_URL, { body: SIGN_IN_REPLY });
    const github: Token = { provider: 'github', accessToken: 'gh-access', expiresAt: NOW + 3_600_000, scopes: ['read:user'] };

    await toolkit.signInWithIdp(github, 'http://localhost:8085/', signal);

    expect(endpoint.requests[0].json).toMatchObject({ postBody: 'access_token=gh-access&providerId=github.com' });
  });

  it('passes other provider ids through unless mapped', () => {
    const mapped = new IdentityToolkitClient({ apiKey: 'test-api-key', providerIds: { corp: 'oidc.corp' } });

    expect(mapped.firebaseProviderId('corp')).toBe('oidc.corp');
    expect(mapped.firebaseProviderId('oidc.partner')).toBe('oidc.partner');
    expect(mapped.firebaseProviderId('google')).toBe('google.com');
  });

  it('addresses the Auth emulator when one is configured', () => {
    const emulated = new IdentityToolkitClient({ apiKey: 'test-api-key', emulatorHost: '127.0.0.1:9099' });

    expect(emulated.endpoint(SECURE_TOKEN_URL, '/v1/token')).toBe(
      'http://127.0.0.1:9099/securetoken.googleapis.com/v1/token?key=test-api-key'
    );
  });

  it('reports the service error reason', async () => {
    endpoint.route(SIGN_IN_URL, serviceError(400, 'INVALID_IDP_RESPONSE : The supplied auth credential is malformed'));

    const signingIn = toolkit.signInWithIdp(googleToken(), 'http://localhost:8085/', signal);

    await expect(signingIn).rejects.toBeInstanceOf(FirebaseAuthError);
    await expect(signingIn).rejects.toMatchObject({
      code: 'firebase_auth_failed',
      provider: 'google',
      reason: 'INVALID_IDP_RESPONSE',
      status: 400,
      retryable: false,
    });
  });

  it('marks an unreachable service as retryable', async () => {
    endpoint.enqueue({ networkError: 'fetch failed' });

    await expect(toolkit.signInWithIdp(googleToken(), 'http://localhost:8085/', signal)).rejects.toMatchObject({
      message: 'Firebase Authentication unreachable: fetch failed',
      retryable: true,
    });
  });

  it('refreshes through the secure token service and keeps the account claims', async () => {
    endpoint.route(REFRESH_URL, { body: REFRESH_REPLY });
    const credential: Token = {
      provider: 'google',
      accessToken: 'firebase-id-1',
      idToken: 'firebase-id-1',
      refreshToken: 'firebase-refresh-1',
      expiresAt: NOW + 10_000,
      scopes: [],
      claims: { sub: 'fb-user-1' },
    };

    const refreshed = await toolkit.refresh(credential, signal);

    expect(endpoint.requests[0].url).toBe('https://securetoken.googleapis.com/v1/token?key=test-api-key');
    expect(endpoint.posts()).toEqual([{ grant_type: 'refresh_token', refresh_token: 'firebase-refresh-1' }]);
    expect(refreshed).toEqual({
      ...credential,
      accessToken: 'firebase-id-2',
      idToken: 'firebase-id-2',
      refreshToken: 'firebase-refresh-2',
      expiresAt: NOW + 3_600_000,
    });
  });

  it('deletes the account with its id token', async () => {
    endpoint.route(DELETE_URL, { body: { kind: 'identitytoolkit#DeleteAccountResponse' } });
    const credential: Token = { provider: 'google', accessToken: 'firebase-id-1', idToken: 'firebase-id-1', expiresAt: NOW + 10_000, scopes: [] };

    await toolkit.deleteAccount(credential, signal);

    expect(endpoint.requests[0].url).toBe('https://identitytoolkit.googleapis.com/v1/accounts:delete?key=test-api-key');
    expect(endpoint.requests[0].json).toEqual({ idToken: 'firebase-id-1' });
  });
});

describe('FirebaseSession', () => {
  let bridge: AsyncTaskBridge<AuthEvent>;
  let endpoint: MockTokenEndpoint;
  let session: FirebaseSession;

  function settle(): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, 20));
  }

  beforeEach(() => {
    bridge = new AsyncTaskBridge<AuthEvent>();
    endpoint = createMockTokenEndpoint();
    const toolkit = new IdentityToolkitClient({ apiKey: 'test-api-key', fetch: endpoint.fetch });
    session = new FirebaseSession(toolkit, bridge, { requestUri: 'http://localhost:8085/' });
  });

  afterEach(async () => {
    await bridge.shutdown();
    vi.useRealTimers();
  });

  it('posts the Firebase credential after signing in', async () => {
    endpoint.route(SIGN_IN_URL, { body: SIGN_IN_REPLY });

    session.signIn(googleToken());
    expect(session.getState()).toBe('signingIn');
    expect(session.covers('google')).toBe(true);

    await vi.waitFor(() => expect(session.getState()).toBe('signedIn'));
    const events = bridge.drain();
    expect(events).toHaveLength(1);
    const [event] = events;
    if (event.type !== 'DocumentCredentialUpdated') {
      throw new Error(`unexpected ${event.type}`);
    }
    expect(event.credential.accessToken).toBe('firebase-id-1');
    expect(session.currentCredential()).toBe(event.credential);
    expect(session.covers('github')).toBe(false);
  });

  it('refreshes the ID token before it expires', async () => {
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout', 'Date'] });
    vi.setSystemTime(NOW);
    endpoint.route(SIGN_IN_URL, { body: SIGN_IN_REPLY });
    endpoint.route(REFRESH_URL, { body: REFRESH_REPLY });

    session.signIn(googleToken());
    await vi.waitFor(() => expect(session.getState()).toBe('signedIn'));
    expect(endpoint.requests).toHaveLength(1);

    await vi.advanceTimersByTimeAsync(3_550_000);
    await vi.waitFor(() => expect(session.currentCredential()?.accessToken).toBe('firebase-id-2'));

    expect(endpoint.requests[1].form).toEqual({ grant_type: 'refresh_token', refresh_token: 'firebase-refresh-1' });
    expect(bridge.drain().map((event) => event.type)).toEqual(['DocumentCredentialUpdated', 'DocumentCredentialUpdated']);
  });

  it('clears the credential when the refresh token is rejected', async () => {
    endpoint.route(SIGN_IN_URL, { body: SIGN_IN_REPLY });
    endpoint.route(REFRESH_URL, serviceError(400, 'TOKEN_EXPIRED'));
    session.signIn(googleToken());
    await vi.waitFor(() => expect(session.getState()).toBe('signedIn'));

    expect(session.refreshNow()).toBe(true);
    await vi.waitFor(() => expect(session.getState()).toBe('signedOut'));

    expect(session.currentCredential()).toBeUndefined();
    const [, failed] = bridge.drain();
    expect(failed).toMatchObject({ type: 'AuthFailed', provider: 'google', credentialsCleared: true });
    if (failed.type === 'AuthFailed') {
      expect(failed.error).toBeInstanceOf(FirebaseAuthError);
      expect(failed.error).toMatchObject({ reason: 'TOKEN_EXPIRED' });
    }
  });

  it('reports a refused sign-in without clearing anything', async () => {
    endpoint.route(SIGN_IN_URL, serviceError(400, 'INVALID_IDP_RESPONSE'));

    session.signIn(googleToken());
    await vi.waitFor(() => expect(bridge.getStatus().queued).toBe(1));

    expect(session.getState()).toBe('signedOut');
    expect(session.covers('google')).toBe(false);
    expect(bridge.drain()).toEqual([
      expect.objectContaining({ type: 'AuthFailed', provider: 'google', credentialsCleared: false }),
    ]);
  });

  it('discards a sign-in that completes after logout', async () => {
    const reply = endpoint.defer();

    session.signIn(googleToken());
    await vi.waitFor(() => expect(endpoint.requests).toHaveLength(1));
    session.logout();
    reply.resolve({ body: SIGN_IN_REPLY });
    await settle();

    expect(bridge.drain()).toEqual([]);
    expect(session.currentCredential()).toBeUndefined();
    expect(session.getState()).toBe('signedOut');
  });

  it('deletes the account and forgets the credential', async () => {
    endpoint.route(SIGN_IN_URL, { body: SIGN_IN_REPLY });
    endpoint.route(DELETE_URL, { body: {} });
    session.signIn(googleToken());
    await vi.waitFor(() => expect(session.getState()).toBe('signedIn'));
    bridge.drain();

    expect(session.deleteAccount()).toBe(true);
    await vi.waitFor(() => expect(session.currentCredential()).toBeUndefined());

    expect(bridge.drain()).toEqual([{ type: 'AccountDeleted', provider: 'google', accountId: 'fb-user-1' }]);
    expect(endpoint.requests[1].json).toEqual({ idToken: 'firebase-id-1' });
    expect(session.deleteAccount()).toBe(false);
  });

  it('refreshes a resumed credential that has already expired', async () => {
    endpoint.route(REFRESH_URL, { body: REFRESH_REPLY });

    session.resume({
      provider: 'google',
      accessToken: 'firebase-id-1',
      idToken: 'firebase-id-1',
      refreshToken: 'firebase-refresh-1',
      expiresAt: Date.now() - 1,
      scopes: [],
    });

    await vi.waitFor(() => expect(session.currentCredential()?.accessToken).toBe('firebase-id-2'));
    expect(session.covers('google')).toBe(true);
  });
});
