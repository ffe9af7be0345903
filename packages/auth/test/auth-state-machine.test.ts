/**
 * Authentication State Machine: flow validation, exchange, refresh, logout
 */

import { vi } from 'vitest';
import { AsyncTaskBridge } from '@hostloop/bridge';
import { createMockTokenEndpoint, MOCK_USER_DATA, type MockTokenEndpoint } from '@hostloop/testing';
import type { Token } from '@hostloop/persistence';
import {
  AuthExchangeFailedError,
  AuthStateMachine,
  GOOGLE_DEFAULTS,
  OAuthProviderFactory,
  ProviderDeniedError,
  StaleFlowError,
  StateMismatchError,
  TokenExpiredError,
  defineProvider,
  type AuthEvent,
  type AuthState,
  type AuthStateMachineOptions,
} from '../src/index.js';

const NOW = new Date('2026-03-01T12:00:00Z').getTime();

function stateOf(url: string): string {
  return new URL(url).searchParams.get('state') ?? '';
}

function settle(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 20));
}

describe('AuthStateMachine', () => {
  let bridge: AsyncTaskBridge<AuthEvent>;
  let endpoint: MockTokenEndpoint;
  let opened: string[];

  function createMachine(options: AuthStateMachineOptions = {}): AuthStateMachine {
    const config = defineProvider({ kind: 'google', clientId: 'C', clientSecret: 'test-secret', redirectPort: 8085 });
    const provider = OAuthProviderFactory.createProvider(config, { fetch: endpoint.fetch });
    return new AuthStateMachine(provider, bridge, {
      openUrl: (url) => {
        opened.push(url);
      },
      ...options,
    });
  }

  beforeEach(() => {
    bridge = new AsyncTaskBridge<AuthEvent>();
    endpoint = createMockTokenEndpoint();
    endpoint.route(GOOGLE_DEFAULTS.userInfoEndpoint, { body: MOCK_USER_DATA });
    opened = [];
  });

  afterEach(async () => {
    await bridge.shutdown();
    vi.useRealTimers();
  });

  describe('startFlow', () => {
    it('creates a pending flow and hands the URL to the opener', async () => {
      const machine = createMachine();

      const url = machine.startFlow();

      expect(machine.getState()).toBe('awaitingRedirect');
      expect(machine.getPendingFlow()?.stateNonce).toBe(stateOf(url));
      await vi.waitFor(() => expect(opened).toEqual([url]));
    });

    it('replaces the previous flow for the same provider', () => {
      const machine = createMachine();

      const first = machine.startFlow();
      const second = machine.startFlow();

      expect(stateOf(first)).not.toBe(stateOf(second));
      expect(machine.getPendingFlow()?.stateNonce).toBe(stateOf(second));
    });
  });

  describe('handleRedirect', () => {
    it('moves to exchangingCode when the state matches', () => {
      const machine = createMachine();
      const url = machine.startFlow();
      endpoint.defer();

      const result = machine.handleRedirect({ code: 'abc123', state: stateOf(url) });

      expect(result.ok).toBe(true);
      expect(machine.getState()).toBe('exchangingCode');
      expect(machine.getPendingFlow()).toBeUndefined();
    });

    it('rejects any other state and leaves the pending flow untouched', () => {
      const machine = createMachine();
      machine.startFlow();
      const flow = machine.getPendingFlow();

      const result = machine.handleRedirect({ code: 'abc123', state: 'forged-state' });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(StateMismatchError);
      }
      expect(machine.getPendingFlow()).toBe(flow);
      expect(machine.getState()).toBe('awaitingRedirect');
      expect(endpoint.requests).toHaveLength(0);
      expect(bridge.drain()).toEqual([]);
    });

    it('rejects a missing state as a mismatch', () => {
      const machine = createMachine();
      machine.startFlow();

      const result = machine.handleRedirect({ code: 'abc123' });

      expect(!result.ok && result.error instanceof StateMismatchError).toBe(true);
      expect(machine.getPendingFlow()).toBeDefined();
    });

    it('rejects the nonce of a superseded flow as stale', () => {
      const machine = createMachine();
      const oldUrl = machine.startFlow();
      const newUrl = machine.startFlow();

      const result = machine.handleRedirect({ code: 'abc123', state: stateOf(oldUrl) });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(StaleFlowError);
        expect(result.error.code).toBe('stale_flow');
      }
      expect(machine.getPendingFlow()?.stateNonce).toBe(stateOf(newUrl));
      expect(endpoint.requests).toHaveLength(0);
    });

    it('rejects a redirect that arrives after the flow timed out', () => {
      vi.useFakeTimers({ toFake: ['Date'] });
      vi.setSystemTime(NOW);
      const machine = createMachine({ flowTimeoutMs: 1000 });
      const url = machine.startFlow();

      vi.setSystemTime(NOW + 1000);
      const result = machine.handleRedirect({ code: 'abc123', state: stateOf(url) });

      expect(!result.ok && result.error instanceof StaleFlowError && result.error.reason === 'expired').toBe(true);
      expect(machine.getState()).toBe('idle');
      expect(machine.getPendingFlow()).toBeUndefined();

      const events = bridge.drain();
      expect(events).toHaveLength(1);
      expect(events[0]).toMatchObject({ type: 'AuthFailed', provider: 'google', credentialsCleared: false });
    });

    it('reports a provider denial and returns to idle', () => {
      const machine = createMachine();
      const url = machine.startFlow();

      const result = machine.handleRedirect({
        state: stateOf(url),
        error: 'access_denied',
        error_description: 'User declined',
      });

      expect(result.ok).toBe(false);
      expect(machine.getState()).toBe('idle');
      expect(machine.getPendingFlow()).toBeUndefined();

      const [event] = bridge.drain();
      expect(event.type).toBe('AuthFailed');
      if (event.type === 'AuthFailed') {
        expect(event.error).toBeInstanceOf(ProviderDeniedError);
        expect(event.error.message).toBe('Provider denied authorization: access_denied (User declined)');
      }
    });

    it('exchanges the code and publishes the token', async () => {
      const machine = createMachine();
      const states: AuthState[] = [];
      machine.onStateChange((state) => states.push(state));
      const url = machine.startFlow();
      const verifier = machine.getPendingFlow()?.pkceVerifier;
      endpoint.enqueue({ body: { access_token: 'tok1', expires_in: 3600, refresh_token: 'refresh-1' } });

      machine.handleRedirect({ code: 'abc123', state: stateOf(url) });
      await vi.waitFor(() => expect(machine.getState()).toBe('authenticated'));

      expect(states).toEqual(['flowStarted', 'awaitingRedirect', 'exchangingCode', 'authenticated']);
      expect(endpoint.posts()[0]).toMatchObject({ code: 'abc123', code_verifier: verifier });

      const events = bridge.drain();
      expect(events).toHaveLength(1);
      const [event] = events;
      expect(event.type).toBe('TokenUpdated');
      if (event.type === 'TokenUpdated') {
        expect(event.token.accessToken).toBe('tok1');
        expect(event.token.claims?.email).toBe(MOCK_USER_DATA.email);
      }
      expect(machine.currentToken()?.accessToken).toBe('tok1');
    });

    it('returns to idle with AuthFailed when the exchange is rejected', async () => {
      const machine = createMachine();
      const url = machine.startFlow();
      endpoint.enqueue({ status: 400, body: { error: 'invalid_grant' } });

      machine.handleRedirect({ code: 'abc123', state: stateOf(url) });
      await vi.waitFor(() => expect(machine.getState()).toBe('idle'));

      const [event] = bridge.drain();
      expect(event).toMatchObject({ type: 'AuthFailed', provider: 'google', credentialsCleared: false });
      if (event.type === 'AuthFailed') {
        expect(event.error).toBeInstanceOf(AuthExchangeFailedError);
      }
    });

    it('rejects a second redirect for a consumed flow as stale', async () => {
      const machine = createMachine();
      const url = machine.startFlow();
      endpoint.defer();

      machine.handleRedirect({ code: 'abc123', state: stateOf(url) });
      const duplicate = machine.handleRedirect({ code: 'abc123', state: stateOf(url) });

      expect(!duplicate.ok && duplicate.error instanceof StaleFlowError).toBe(true);
      await vi.waitFor(() => expect(endpoint.requests).toHaveLength(1));
      await settle();
      expect(endpoint.requests).toHaveLength(1);
    });
  });

  describe('flow timeout', () => {
    it('expires an unanswered flow', async () => {
      vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout', 'Date'] });
      vi.setSystemTime(NOW);
      const machine = createMachine({ flowTimeoutMs: 5000 });
      machine.startFlow();

      await vi.advanceTimersByTimeAsync(5000);

      expect(machine.getPendingFlow()).toBeUndefined();
      expect(machine.getState()).toBe('idle');
      const events = bridge.drain();
      expect(events).toHaveLength(1);
      const [event] = events;
      if (event.type === 'AuthFailed') {
        expect(event.error).toBeInstanceOf(StaleFlowError);
      }
    });
  });

  describe('scheduleRefresh', () => {
    const token: Token = {
      provider: 'google',
      accessToken: 'tok1',
      refreshToken: 'refresh-1',
      expiresAt: NOW + 3_600_000,
      scopes: ['openid'],
    };

    beforeEach(() => {
      vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout', 'Date'] });
      vi.setSystemTime(NOW);
    });

    it('wakes the margin before expiry', () => {
      const machine = createMachine();

      const wakeAt = machine.scheduleRefresh(token);

      expect(wakeAt).toBe(NOW + 3_540_000);
      expect(wakeAt).toBeLessThan(token.expiresAt);
    });

    it('keeps the wake strictly before expiry with a zero margin', () => {
      const machine = createMachine({ refreshMarginMs: 0 });

      expect(machine.scheduleRefresh(token)).toBe(NOW + 3_599_999);
    });

    it('wakes immediately for a token already inside the margin', () => {
      const machine = createMachine();

      expect(machine.scheduleRefresh({ ...token, expiresAt: NOW - 1 })).toBe(NOW);
    });

    it('refreshes short-lived tokens at half their remaining life', () => {
      const machine = createMachine();

      expect(machine.scheduleRefresh({ ...token, expiresAt: NOW + 30_000 })).toBe(NOW + 15_000);
    });

    it('refreshes at the wake time and carries the refresh token over', async () => {
      const machine = createMachine();
      machine.resume(token);
      endpoint.enqueue({ body: { access_token: 'tok2', expires_in: 3600 } });

      await vi.advanceTimersByTimeAsync(3_539_999);
      expect(endpoint.requests).toHaveLength(0);

      await vi.advanceTimersByTimeAsync(1);
      await vi.waitFor(() => expect(machine.currentToken()?.accessToken).toBe('tok2'));

      expect(machine.getState()).toBe('authenticated');
      expect(endpoint.posts()).toEqual([{
        client_id: 'C',
        client_secret: 'test-secret',
        refresh_token: 'refresh-1',
        grant_type: 'refresh_token',
      }]);
      const [event] = bridge.drain();
      expect(event.type).toBe('TokenUpdated');
      if (event.type === 'TokenUpdated') {
        expect(event.token.refreshToken).toBe('refresh-1');
      }
    });

    it('waits for a long-lived token instead of refreshing it at once', async () => {
      const day = 24 * 60 * 60 * 1000;
      const machine = createMachine();
      machine.resume({ ...token, expiresAt: NOW + 60 * day });
      endpoint.enqueue({ body: { access_token: 'tok-long', expires_in: 60 * 24 * 3600 } });

      await vi.advanceTimersByTimeAsync(25 * day);
      expect(endpoint.requests).toHaveLength(0);
      expect(machine.currentToken()?.accessToken).toBe('tok1');

      await vi.advanceTimersByTimeAsync(35 * day - 60_000);
      await vi.waitFor(() => expect(machine.currentToken()?.accessToken).toBe('tok-long'));
      expect(endpoint.requests).toHaveLength(1);
    });

    it('clears credentials when the refresh token is rejected', async () => {
      const machine = createMachine();
      machine.resume(token);
      endpoint.enqueue({ status: 400, body: { error: 'invalid_grant' } });

      expect(machine.refreshNow()).toBe(true);
      await vi.waitFor(() => expect(machine.getState()).toBe('idle'));

      expect(machine.currentToken()).toBeUndefined();
      const [event] = bridge.drain();
      expect(event).toMatchObject({ type: 'AuthFailed', credentialsCleared: true });
    });

    it('retries a transient refresh failure', async () => {
      const machine = createMachine({ refreshRetryDelaysMs: [1000] });
      machine.resume(token);
      endpoint.enqueue({ status: 503, body: { error: 'temporarily_unavailable' } });
      endpoint.enqueue({ body: { access_token: 'tok3', expires_in: 3600 } });

      machine.refreshNow();
      await vi.waitFor(() => expect(endpoint.requests).toHaveLength(1));
      await vi.advanceTimersByTimeAsync(1000);
      await vi.waitFor(() => expect(machine.currentToken()?.accessToken).toBe('tok3'));

      expect(bridge.drain().map((event) => event.type)).toEqual(['TokenUpdated']);
    });

    it('restarts the flow when a token without refresh token expires', async () => {
      const machine = createMachine();
      machine.resume({ ...token, refreshToken: undefined, expiresAt: NOW + 120_000 });

      await vi.advanceTimersByTimeAsync(60_000);

      expect(machine.getState()).toBe('awaitingRedirect');
      expect(machine.getPendingFlow()).toBeDefined();
      expect(machine.currentToken()).toBeUndefined();

      const [event] = bridge.drain();
      expect(event).toMatchObject({ type: 'AuthFailed', credentialsCleared: true });
      if (event.type === 'AuthFailed') {
        expect(event.error).toBeInstanceOf(TokenExpiredError);
      }
    });

    it('refreshNow does nothing without a refresh token', () => {
      const machine = createMachine();
      machine.resume({ ...token, refreshToken: undefined });

      expect(machine.refreshNow()).toBe(false);
    });
  });

  describe('logout', () => {
    it('discards an exchange that completes afterwards', async () => {
      const machine = createMachine();
      const url = machine.startFlow();
      const reply = endpoint.defer();

      machine.handleRedirect({ code: 'abc123', state: stateOf(url) });
      await vi.waitFor(() => expect(endpoint.requests).toHaveLength(1));
      machine.logout();
      reply.resolve({ body: { access_token: 'late', expires_in: 3600 } });
      await settle();

      expect(machine.getState()).toBe('idle');
      expect(machine.currentToken()).toBeUndefined();
      expect(bridge.drain()).toEqual([]);
    });

    it('cancels the refresh timer and the pending flow', async () => {
      vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout', 'Date'] });
      vi.setSystemTime(NOW);
      const machine = createMachine();
      machine.resume({
        provider: 'google',
        accessToken: 'tok1',
        refreshToken: 'refresh-1',
        expiresAt: NOW + 3_600_000,
        scopes: [],
      });
      const url = machine.startFlow();

      machine.logout();
      await vi.advanceTimersByTimeAsync(3_600_000);

      expect(endpoint.requests).toHaveLength(0);
      expect(machine.handleRedirect({ code: 'abc123', state: stateOf(url) }).ok).toBe(false);
      expect(bridge.drain()).toEqual([]);
    });
  });
});
