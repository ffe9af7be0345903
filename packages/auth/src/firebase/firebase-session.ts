/**
 * Firebase sign-in stage
 *
 * Follows the identity-provider sign-in: the provider's token is traded for
 * a Firebase ID token, which is kept fresh until logout. Network work runs
 * on the task scheduler; results reach the host as `DocumentCredentialUpdated`,
 * `AccountDeleted` or `AuthFailed` carrying a FirebaseAuthError.
 */

import { logger, recordOAuthEvent } from '@hostloop/observability';
import type { TaskContext, TaskHandle, TaskScheduler } from '@hostloop/bridge';
import type { ProviderId, Token } from '@hostloop/persistence';
import { REDIRECT_HOST } from '../providers/base-provider.js';
import { AuthError, FirebaseAuthError } from '../providers/types.js';
import type { AuthEvent, AuthFailedEvent } from '../events.js';
import type { IdentityToolkitClient } from './identity-toolkit.js';

export type FirebaseSessionState = 'signedOut' | 'signingIn' | 'signedIn' | 'refreshing';

export interface FirebaseSessionOptions {
  /** Refresh the ID token this long before it expires (default 60 s) */
  refreshMarginMs?: number;
  /** Wait before retrying a refresh that failed for a transient reason (default 5 s) */
  retryDelayMs?: number;
  /** `requestUri` sent with the sign-in; the loopback redirect URI */
  requestUri?: string;
}

const DEFAULT_REFRESH_MARGIN_MS = 60 * 1000;
const DEFAULT_RETRY_DELAY_MS = 5000;
const METRIC_PROVIDER = 'firebase';

export class FirebaseSession {
  private state: FirebaseSessionState = 'signedOut';
  private credential: Token | undefined;
  private signingInWith: ProviderId | undefined;
  private generation = 0;
  private signInTask: TaskHandle | undefined;
  private refreshTask: TaskHandle | undefined;
  private deleteTask: TaskHandle | undefined;
  private readonly refreshMarginMs: number;
  private readonly retryDelayMs: number;
  private readonly requestUri: string;

  constructor(
    private readonly toolkit: IdentityToolkitClient,
    private readonly scheduler: TaskScheduler<AuthEvent>,
    options: FirebaseSessionOptions = {}
  ) {
    this.refreshMarginMs = Math.max(1, options.refreshMarginMs ?? DEFAULT_REFRESH_MARGIN_MS);
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    this.requestUri = options.requestUri ?? `http://${REDIRECT_HOST}/`;
  }

  getState(): FirebaseSessionState {
    return this.state;
  }

  currentCredential(): Token | undefined {
    return this.credential;
  }

  /**
   * True while the Firebase account stems from `provider`, or a sign-in with
   * it is under way
   */
  covers(provider: ProviderId): boolean {
    return this.signingInWith === provider || this.credential?.provider === provider;
  }

  /**
   * Trade an identity-provider token for a Firebase ID token. Replaces any
   * earlier Firebase session.
   */
  signIn(idp: Token): void {
    this.reset();
    const generation = this.generation;
    this.signingInWith = idp.provider;
    this.state = 'signingIn';

    this.signInTask = this.scheduler.submit(`firebase-sign-in:${idp.provider}`, async (ctx) => {
      let credential: Token;
      try {
        credential = await this.toolkit.signInWithIdp(idp, this.requestUri, ctx.signal);
      } catch (error) {
        if (!this.isCurrent(ctx, generation)) {
          return;
        }
        this.signInTask = undefined;
        this.signingInWith = undefined;
        this.state = 'signedOut';
        ctx.post(this.failure(toFirebaseError(error, idp.provider), false));
        return;
      }

      if (!this.isCurrent(ctx, generation)) {
        return;
      }
      this.signInTask = undefined;
      this.signingInWith = undefined;
      recordOAuthEvent(METRIC_PROVIDER, 'completed');
      this.adopt(ctx, credential);
    });
  }

  /**
   * Adopt a Firebase credential the host persisted earlier
   */
  resume(credential: Token): number {
    this.reset();
    this.credential = credential;
    this.state = 'signedIn';
    logger.oauthInfo('Resuming Firebase session', { provider: credential.provider });
    return this.scheduleRefresh(credential);
  }

  /**
   * Wake `refreshMarginMs` before the ID token expires (half the remaining
   * life for short tokens) and refresh it. Returns the wake instant.
   */
  scheduleRefresh(credential: Token): number {
    this.refreshTask?.cancel();

    const now = Date.now();
    const lead = Math.min(this.refreshMarginMs, Math.max(0, (credential.expiresAt - now) / 2));
    const wakeAt = Math.max(now, credential.expiresAt - lead);
    const generation = this.generation;

    this.refreshTask = this.scheduler.submit(`firebase-refresh:${credential.provider}`, async (ctx) => {
      await ctx.sleep(wakeAt - Date.now());
      if (!this.isCurrent(ctx, generation)) {
        return;
      }
      await this.runRefresh(ctx, credential, generation);
    });

    return wakeAt;
  }

  /**
   * Refresh at once, e.g. after Firestore rejected the ID token. False
   * without a credential or while a refresh is running.
   */
  refreshNow(): boolean {
    const credential = this.credential;
    if (!credential || this.state === 'refreshing') {
      return false;
    }

    this.refreshTask?.cancel();
    const generation = this.generation;
    this.refreshTask = this.scheduler.submit(`firebase-refresh:${credential.provider}`, (ctx) =>
      this.runRefresh(ctx, credential, generation)
    );
    return true;
  }

  /**
   * Delete the signed-in Firebase account. False when nobody is signed in.
   */
  deleteAccount(): boolean {
    const credential = this.credential;
    if (!credential) {
      return false;
    }

    const generation = this.generation;
    this.deleteTask?.cancel();
    this.deleteTask = this.scheduler.submit(`firebase-delete:${credential.provider}`, async (ctx) => {
      try {
        await this.toolkit.deleteAccount(credential, ctx.signal);
      } catch (error) {
        if (this.isCurrent(ctx, generation)) {
          this.deleteTask = undefined;
          ctx.post(this.failure(toFirebaseError(error, credential.provider), false));
        }
        return;
      }

      if (!this.isCurrent(ctx, generation)) {
        return;
      }
      this.deleteTask = undefined;
      this.generation++;
      this.refreshTask?.cancel();
      this.refreshTask = undefined;
      this.credential = undefined;
      this.state = 'signedOut';
      ctx.post({ type: 'AccountDeleted', provider: credential.provider, accountId: credential.claims?.sub });
    });
    return true;
  }

  /**
   * Forget the Firebase session; work in flight is discarded
   */
  logout(): void {
    this.reset();
    this.deleteTask?.cancel();
    this.deleteTask = undefined;
  }

  private async runRefresh(ctx: TaskContext<AuthEvent>, credential: Token, generation: number): Promise<void> {
    this.state = 'refreshing';

    for (;;) {
      try {
        const refreshed = await this.toolkit.refresh(credential, ctx.signal);
        if (!this.isCurrent(ctx, generation)) {
          return;
        }
        this.refreshTask = undefined;
        recordOAuthEvent(METRIC_PROVIDER, 'refreshed');
        this.adopt(ctx, refreshed);
        return;
      } catch (error) {
        if (!this.isCurrent(ctx, generation)) {
          return;
        }

        const failure = toFirebaseError(error, credential.provider);
        if (failure.retryable && Date.now() + this.retryDelayMs < credential.expiresAt) {
          logger.oauthWarn('Firebase token refresh failed, retrying', {
            provider: credential.provider,
            delayMs: this.retryDelayMs,
          });
          await ctx.sleep(this.retryDelayMs);
          if (!this.isCurrent(ctx, generation)) {
            return;
          }
          continue;
        }

        this.refreshTask = undefined;
        this.credential = undefined;
        this.state = 'signedOut';
        ctx.post(this.failure(failure, true));
        return;
      }
    }
  }

  private adopt(ctx: TaskContext<AuthEvent>, credential: Token): void {
    this.credential = credential;
    this.state = 'signedIn';
    ctx.post({ type: 'DocumentCredentialUpdated', credential });
    this.scheduleRefresh(credential);
  }

  private reset(): void {
    this.generation++;
    this.signInTask?.cancel();
    this.refreshTask?.cancel();
    this.signInTask = undefined;
    this.refreshTask = undefined;
    this.signingInWith = undefined;
    this.credential = undefined;
    this.state = 'signedOut';
  }

  private isCurrent(ctx: TaskContext<AuthEvent>, generation: number): boolean {
    return !ctx.signal.aborted && generation === this.generation;
  }

  private failure(error: FirebaseAuthError, credentialsCleared: boolean): AuthFailedEvent {
    recordOAuthEvent(METRIC_PROVIDER, 'failed', error.reason ?? error.code);
    logger.oauthWarn('Firebase Authentication failed', {
      provider: error.provider,
      reason: error.reason,
      credentialsCleared,
    });
    return { type: 'AuthFailed', provider: error.provider, error, credentialsCleared };
  }
}

function toFirebaseError(error: unknown, provider: ProviderId): FirebaseAuthError {
  if (error instanceof FirebaseAuthError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  if (error instanceof AuthError) {
    return new FirebaseAuthError(message, provider, error.code);
  }
  return new FirebaseAuthError(message, provider);
}
