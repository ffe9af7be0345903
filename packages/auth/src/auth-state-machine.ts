/**
 * Authentication State Machine
 *
 * One instance per provider. Drives the authorization-code flow with PKCE,
 * then keeps the token fresh until logout.
 *
 *   idle → flowStarted → awaitingRedirect → exchangingCode → authenticated
 *   authenticated → refreshing → authenticated | idle
 *   authenticated → expired → flowStarted (no refresh token)
 *
 * Network work and timers run as bridge tasks. The machine's own fields
 * are the background side's private copies; the host only learns about
 * tokens through TokenUpdated / AuthFailed events.
 */

import { logger, recordOAuthEvent } from '@hostloop/observability';
import type { TaskContext, TaskHandle, TaskScheduler } from '@hostloop/bridge';
import { err, ok, type PendingFlow, type Result, type Token } from '@hostloop/persistence';
import type { BaseOAuthProvider } from './providers/base-provider.js';
import {
  AuthError,
  AuthExchangeFailedError,
  ProviderDeniedError,
  StaleFlowError,
  StateMismatchError,
  TokenExpiredError,
  type ProviderConfig,
  type RedirectParams,
  type StaleFlowReason,
} from './providers/types.js';
import type { AuthEvent, AuthFailedEvent, AuthState } from './events.js';

export type UrlOpener = (_url: string, _provider: ProviderConfig) => void | Promise<void>;

export type StateChangeListener = (_state: AuthState, _previous: AuthState) => void;

export interface AuthStateMachineOptions {
  /** Refresh this long before expiry (default 60 s, at least 1 ms) */
  refreshMarginMs?: number;
  /** Pending flows older than this are stale (default 10 min) */
  flowTimeoutMs?: number;
  /** Waits between attempts when a refresh fails for a transient reason */
  refreshRetryDelaysMs?: readonly number[];
  openUrl?: UrlOpener;
}

/**
 * How a redirect's state nonce relates to this machine
 */
export type RedirectMatch = 'current' | 'retired' | 'none';

const DEFAULT_REFRESH_MARGIN_MS = 60 * 1000;
const DEFAULT_FLOW_TIMEOUT_MS = 10 * 60 * 1000;
const DEFAULT_REFRESH_RETRY_DELAYS_MS = [1000, 5000, 15000];
const RETIRED_NONCE_LIMIT = 16;

const logUrl: UrlOpener = (url, provider) => {
  logger.oauthInfo(`Open this URL to sign in with ${provider.displayName}`, { url });
};

export class AuthStateMachine {
  private state: AuthState = 'idle';
  private pendingFlow: PendingFlow | undefined;
  private readonly retiredNonces = new Map<string, StaleFlowReason>();
  private token: Token | undefined;
  private generation = 0;
  private refreshTask: TaskHandle | undefined;
  private exchangeTask: TaskHandle | undefined;
  private flowTimeoutTask: TaskHandle | undefined;
  private readonly listeners = new Set<StateChangeListener>();

  private readonly refreshMarginMs: number;
  private readonly flowTimeoutMs: number;
  private readonly refreshRetryDelaysMs: readonly number[];
  private readonly openUrl: UrlOpener;

  constructor(
    private readonly provider: BaseOAuthProvider,
    private readonly scheduler: TaskScheduler<AuthEvent>,
    options: AuthStateMachineOptions = {}
  ) {
    // A zero margin would wake at the expiry instant itself
    this.refreshMarginMs = Math.max(1, options.refreshMarginMs ?? DEFAULT_REFRESH_MARGIN_MS);
    this.flowTimeoutMs = options.flowTimeoutMs ?? DEFAULT_FLOW_TIMEOUT_MS;
    this.refreshRetryDelaysMs = options.refreshRetryDelaysMs ?? DEFAULT_REFRESH_RETRY_DELAYS_MS;
    this.openUrl = options.openUrl ?? logUrl;
  }

  get providerId(): string {
    return this.provider.id;
  }

  getState(): AuthState {
    return this.state;
  }

  getPendingFlow(): PendingFlow | undefined {
    return this.pendingFlow;
  }

  /**
   * The machine's copy of the token it is keeping fresh
   */
  currentToken(): Token | undefined {
    return this.token;
  }

  onStateChange(listener: StateChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Begin a new authorization-code flow and hand its URL to the opener.
   * Any earlier flow for this provider stops being valid.
   */
  startFlow(): string {
    this.retirePendingFlow();
    this.exchangeTask?.cancel();
    this.exchangeTask = undefined;

    const flow = this.provider.createPendingFlow(Date.now(), this.flowTimeoutMs);
    this.pendingFlow = flow;
    this.transition('flowStarted');

    const url = this.provider.buildAuthorizationUrl(flow);
    this.scheduleFlowTimeout(flow);

    const config = this.provider.config;
    this.scheduler.submit(`open-url:${config.id}`, async () => {
      await this.openUrl(url, config);
    });

    recordOAuthEvent(config.id, 'started');
    logger.oauthInfo('Authorization flow started', {
      provider: config.id,
      statePrefix: flow.stateNonce.substring(0, 8),
      expiresAt: new Date(flow.expiresAt).toISOString(),
    });

    this.transition('awaitingRedirect');
    return url;
  }

  matchState(state: string | undefined): RedirectMatch {
    if (!state) {
      return 'none';
    }
    if (this.pendingFlow?.stateNonce === state) {
      return 'current';
    }
    return this.retiredNonces.has(state) ? 'retired' : 'none';
  }

  hasPendingFlow(): boolean {
    return this.pendingFlow !== undefined;
  }

  /**
   * Validate a redirect against the pending flow and start the code
   * exchange. A state that matches nothing leaves the flow untouched.
   */
  handleRedirect(params: RedirectParams): Result<void, AuthError> {
    const id = this.provider.id;
    const match = this.matchState(params.state);
    const flow = this.pendingFlow;

    const retiredAs = params.state === undefined ? undefined : this.retiredNonces.get(params.state);
    if (retiredAs) {
      logger.oauthWarn('Redirect for a retired flow', { provider: id, reason: retiredAs });
      return err(new StaleFlowError(id, retiredAs));
    }

    if (match === 'none' || !flow) {
      logger.oauthWarn('Redirect state does not match the pending flow', {
        provider: id,
        statePrefix: params.state?.substring(0, 8),
      });
      return err(new StateMismatchError(id));
    }

    if (Date.now() >= flow.expiresAt) {
      return err(this.abandonFlow(new StaleFlowError(id, 'expired'), 'expired'));
    }

    if (params.error) {
      return err(this.abandonFlow(new ProviderDeniedError(id, params.error, params.error_description)));
    }

    const code = params.code;
    if (!code) {
      return err(this.abandonFlow(new ProviderDeniedError(id, 'invalid_request', 'Missing authorization code')));
    }

    this.retirePendingFlow();
    this.transition('exchangingCode');

    const generation = this.generation;
    this.exchangeTask = this.scheduler.submit(`exchange:${id}`, async (ctx) => {
      let token: Token;
      try {
        token = await this.provider.exchangeCode(code, flow, ctx.signal);
      } catch (error) {
        if (!this.isCurrent(ctx, generation)) {
          return;
        }
        this.exchangeTask = undefined;
        this.transition(this.token ? 'authenticated' : 'idle');
        ctx.post(this.failure(toAuthError(error, id), false));
        return;
      }

      if (!this.isCurrent(ctx, generation)) {
        logger.oauthDebug('Discarding exchange result for a cancelled flow', { provider: id });
        return;
      }
      this.exchangeTask = undefined;
      logger.oauthInfo('Authorization code exchanged', { provider: id });
      recordOAuthEvent(id, 'completed');
      this.adopt(ctx, token);
    });

    return ok(undefined);
  }

  /**
   * Arrange a refresh strictly before `token.expiresAt`. Returns the wake
   * instant (epoch ms).
   */
  scheduleRefresh(token: Token): number {
    this.refreshTask?.cancel();

    const now = Date.now();
    // Short-lived tokens refresh at half their remaining life instead
    const lead = Math.min(this.refreshMarginMs, Math.max(0, (token.expiresAt - now) / 2));
    const wakeAt = Math.max(now, token.expiresAt - lead);
    const generation = this.generation;
    const id = this.provider.id;

    this.refreshTask = this.scheduler.submit(`refresh:${id}`, async (ctx) => {
      await ctx.sleep(wakeAt - Date.now());
      if (!this.isCurrent(ctx, generation)) {
        return;
      }
      await this.onRefreshDue(ctx, token, generation);
    });

    logger.oauthDebug('Token refresh scheduled', {
      provider: id,
      wakeAt: new Date(wakeAt).toISOString(),
      hasRefreshToken: token.refreshToken !== undefined,
    });

    return wakeAt;
  }

  /**
   * Refresh immediately, e.g. after the document server rejected the
   * credential. False when there is nothing to refresh with.
   */
  refreshNow(): boolean {
    const token = this.token;
    if (!token?.refreshToken || this.state === 'refreshing') {
      return false;
    }

    this.refreshTask?.cancel();
    this.transition('refreshing');

    const generation = this.generation;
    this.refreshTask = this.scheduler.submit(`refresh:${this.provider.id}`, (ctx) =>
      this.runRefresh(ctx, token, generation)
    );
    return true;
  }

  /**
   * Adopt a token persisted by the host from an earlier session
   */
  resume(token: Token): number {
    this.token = token;
    this.transition('authenticated');
    logger.oauthInfo('Resuming session', { provider: token.provider, hasRefreshToken: token.refreshToken !== undefined });
    return this.scheduleRefresh(token);
  }

  /**
   * Drop everything. Results of work still in flight are discarded.
   */
  logout(): void {
    this.generation++;
    this.refreshTask?.cancel();
    this.exchangeTask?.cancel();
    this.refreshTask = undefined;
    this.exchangeTask = undefined;
    this.retirePendingFlow();
    this.token = undefined;
    this.transition('idle');
    logger.oauthInfo('Logged out', { provider: this.provider.id });
  }

  private async onRefreshDue(ctx: TaskContext<AuthEvent>, token: Token, generation: number): Promise<void> {
    if (token.refreshToken) {
      await this.runRefresh(ctx, token, generation);
      return;
    }

    this.refreshTask = undefined;
    this.token = undefined;
    this.transition('expired');
    ctx.post(this.failure(new TokenExpiredError(this.provider.id), true));

    logger.oauthInfo('Token expired without a refresh token, restarting flow', { provider: this.provider.id });
    this.startFlow();
  }

  private async runRefresh(ctx: TaskContext<AuthEvent>, token: Token, generation: number): Promise<void> {
    const id = this.provider.id;
    this.transition('refreshing');

    for (let attempt = 0; ; attempt++) {
      try {
        const refreshed = await this.provider.refresh(token, ctx.signal);
        if (!this.isCurrent(ctx, generation)) {
          return;
        }
        this.refreshTask = undefined;
        logger.oauthInfo('Token refreshed', { provider: id });
        recordOAuthEvent(id, 'refreshed');
        this.adopt(ctx, refreshed);
        return;
      } catch (error) {
        if (!this.isCurrent(ctx, generation)) {
          return;
        }

        const authError = toAuthError(error, id);
        const delay = this.refreshRetryDelaysMs[attempt];
        const retryable = authError instanceof AuthExchangeFailedError && authError.retryable;
        if (retryable && delay !== undefined && Date.now() + delay < token.expiresAt) {
          logger.oauthWarn('Token refresh failed, retrying', { provider: id, attempt: attempt + 1, delayMs: delay });
          await ctx.sleep(delay);
          if (!this.isCurrent(ctx, generation)) {
            return;
          }
          continue;
        }

        this.refreshTask = undefined;
        this.token = undefined;
        this.transition('idle');
        ctx.post(this.failure(authError, true));
        return;
      }
    }
  }

  private adopt(ctx: TaskContext<AuthEvent>, token: Token): void {
    this.token = token;
    this.transition('authenticated');
    ctx.post({ type: 'TokenUpdated', token });
    this.scheduleRefresh(token);
  }

  /**
   * End the pending flow on the host side and tell the host why
   */
  private abandonFlow(error: AuthError, reason: StaleFlowReason = 'superseded'): AuthError {
    this.retirePendingFlow(reason);
    this.transition(this.token ? 'authenticated' : 'idle');
    this.scheduler.post(this.failure(error, false));
    logger.oauthWarn('Authorization flow abandoned', { provider: this.provider.id, code: error.code });
    return error;
  }

  private scheduleFlowTimeout(flow: PendingFlow): void {
    this.flowTimeoutTask = this.scheduler.submit(`flow-timeout:${flow.provider}`, async (ctx) => {
      await ctx.sleep(flow.expiresAt - Date.now());
      if (this.pendingFlow?.stateNonce !== flow.stateNonce) {
        return;
      }

      this.flowTimeoutTask = undefined;
      this.retireNonce(flow.stateNonce, 'expired');
      this.pendingFlow = undefined;
      this.transition(this.token ? 'authenticated' : 'idle');
      ctx.post(this.failure(new StaleFlowError(flow.provider, 'expired'), false));
      logger.oauthWarn('Authorization flow timed out', { provider: flow.provider });
    });
  }

  private retirePendingFlow(reason: StaleFlowReason = 'superseded'): void {
    this.flowTimeoutTask?.cancel();
    this.flowTimeoutTask = undefined;

    if (this.pendingFlow) {
      this.retireNonce(this.pendingFlow.stateNonce, reason);
      this.pendingFlow = undefined;
    }
  }

  private retireNonce(nonce: string, reason: StaleFlowReason): void {
    this.retiredNonces.set(nonce, reason);
    // Oldest first, in insertion order
    for (const oldest of this.retiredNonces.keys()) {
      if (this.retiredNonces.size <= RETIRED_NONCE_LIMIT) {
        break;
      }
      this.retiredNonces.delete(oldest);
    }
  }

  private isCurrent(ctx: TaskContext<AuthEvent>, generation: number): boolean {
    return !ctx.signal.aborted && generation === this.generation;
  }

  private failure(error: AuthError, credentialsCleared: boolean): AuthFailedEvent {
    recordOAuthEvent(this.provider.id, 'failed', error.code);
    return { type: 'AuthFailed', provider: this.provider.id, error, credentialsCleared };
  }

  private transition(next: AuthState): void {
    if (next === this.state) {
      return;
    }

    const previous = this.state;
    this.state = next;
    logger.oauthDebug('Auth state changed', { provider: this.provider.id, from: previous, to: next });

    for (const listener of this.listeners) {
      try {
        listener(next, previous);
      } catch (error) {
        logger.oauthError('State change listener failed', error);
      }
    }
  }
}

function toAuthError(error: unknown, provider: string): AuthError {
  if (error instanceof AuthError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new AuthExchangeFailedError(message, provider);
}
