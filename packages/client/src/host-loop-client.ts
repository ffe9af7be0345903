/**
 * Host Loop Client
 *
 * The one object a host application talks to. Every method returns
 * without waiting on the network; results arrive through `pollEvents()`,
 * which the host calls once per tick.
 *
 * ```typescript
 * const client = HostLoopClient.fromEnvironment({ openUrl: (url) => showLink(url) });
 * await client.start();
 *
 * // every tick
 * for (const event of client.pollEvents()) {
 *   handle(event);
 * }
 * ```
 */

import type { Express } from 'express';
import { logger } from '@hostloop/observability';
import { ConfigurationError, EnvironmentConfig } from '@hostloop/config';
import { AsyncTaskBridge, type BridgeStatus } from '@hostloop/bridge';
import {
  MemoryTokenStore,
  err,
  setLogger as setPersistenceLogger,
  ok,
  type IdentityClaims,
  type ProviderId,
  type Result,
  type StoredToken,
  type Token,
  type TokenStore,
} from '@hostloop/persistence';
import {
  AuthStateMachine,
  FirebaseAuthError,
  FirebaseSession,
  IdentityToolkitClient,
  OAuthProviderFactory,
  ProviderRegistry,
  RedirectDispatcher,
  RedirectListener,
  REDIRECT_HOST,
  UnknownProviderError,
  buildProviderConfigs,
  type AuthFailedEvent,
  type AuthState,
  type FetchLike,
  type FirebaseSessionState,
  type IdentityToolkitOptions,
  type ProviderConfig,
  type RedirectOutcome,
  type RedirectParams,
  type UrlOpener,
} from '@hostloop/auth';
import {
  DocumentSession,
  FirestoreRestClient,
  type CallFailure,
  type DocumentPayload,
  type DocumentRpcClient,
  type RpcCallHandle,
  type WatchSubscription,
} from '@hostloop/documents';
import type { BridgeEvent } from './events.js';

export interface HostLoopClientOptions {
  providers: readonly ProviderConfig[];
  documents: DocumentRpcClient;
  /** Host-side token owner (default: in memory) */
  tokens?: TokenStore;
  /** fetch used for provider token and user endpoints */
  fetch?: FetchLike;
  openUrl?: UrlOpener;
  refreshMarginMs?: number;
  flowTimeoutMs?: number;
  reauthWaitMs?: number;
  highWaterMark?: number;
  /** Interface the redirect listener binds (default localhost, the host in the redirect URIs) */
  listenerHost?: string;
  /**
   * Trade the provider token for a Firebase ID token and use that for
   * document calls
   */
  firebase?: Omit<IdentityToolkitOptions, 'fetch'>;
}

export type EnvironmentClientOptions = Partial<Omit<HostLoopClientOptions, 'providers'>>;

export interface ProviderStatus {
  id: ProviderId;
  displayName: string;
  state: AuthState;
}

export interface ClientStatus {
  started: boolean;
  authenticatedAs?: ProviderId;
  providers: ProviderStatus[];
  watches: number;
  /** Present when Firebase sign-in is configured */
  firebase?: FirebaseSessionState;
  bridge: BridgeStatus;
}

export class HostLoopClient {
  private readonly registry: ProviderRegistry;
  private readonly bridge: AsyncTaskBridge<BridgeEvent>;
  private readonly tokens: TokenStore;
  /** Credential for document calls: the provider token, or the Firebase ID token */
  private readonly documentTokens: TokenStore;
  private readonly firebase: FirebaseSession | undefined;
  private readonly machines = new Map<ProviderId, AuthStateMachine>();
  private readonly dispatcher: RedirectDispatcher;
  private readonly listener: RedirectListener;
  private readonly session: DocumentSession;
  private started = false;

  /**
   * Throws ConfigurationError for duplicate providers or providers on
   * different redirect ports
   */
  constructor(options: HostLoopClientOptions) {
    this.registry = ProviderRegistry.fromConfigs(options.providers);
    this.bridge = new AsyncTaskBridge<BridgeEvent>({ highWaterMark: options.highWaterMark });
    this.tokens = options.tokens ?? new MemoryTokenStore();

    for (const config of this.registry.list()) {
      const provider = OAuthProviderFactory.createProvider(config, { fetch: options.fetch });
      this.machines.set(config.id, new AuthStateMachine(provider, this.bridge, {
        refreshMarginMs: options.refreshMarginMs,
        flowTimeoutMs: options.flowTimeoutMs,
        openUrl: options.openUrl,
      }));
    }

    this.dispatcher = new RedirectDispatcher(this.machines.values());
    this.listener = new RedirectListener(this.dispatcher, {
      port: this.registry.redirectPort,
      host: options.listenerHost,
    });
    if (options.firebase) {
      const toolkit = new IdentityToolkitClient({ ...options.firebase, fetch: options.fetch });
      this.firebase = new FirebaseSession(toolkit, this.bridge, {
        refreshMarginMs: options.refreshMarginMs,
        requestUri: `http://${REDIRECT_HOST}:${this.registry.redirectPort}/`,
      });
      this.documentTokens = new MemoryTokenStore();
    } else {
      this.documentTokens = this.tokens;
    }

    this.session = new DocumentSession(options.documents, this.documentTokens, this.bridge, {
      reauthWaitMs: options.reauthWaitMs,
      onCredentialRejected: (token) => {
        if (this.firebase) {
          this.firebase.refreshNow();
        } else {
          this.machines.get(token.provider)?.refreshNow();
        }
      },
    });
  }

  /**
   * Build a client from environment variables: provider credentials, OAuth
   * timing and the Firestore target
   */
  static fromEnvironment(options: EnvironmentClientOptions = {}): HostLoopClient {
    EnvironmentConfig.setLogger(logger);
    setPersistenceLogger(logger);
    const env = EnvironmentConfig.get();
    EnvironmentConfig.logConfiguration();

    const keys = EnvironmentConfig.getProviderKeys();
    if (keys.length === 0) {
      throw new ConfigurationError('No OAuth provider credentials configured');
    }
    const providers = buildProviderConfigs(keys, env);
    const timing = EnvironmentConfig.getTimingConfig();

    let documents = options.documents;
    if (!documents) {
      const firestore = EnvironmentConfig.getFirestoreConfig();
      if (!firestore.projectId) {
        throw new ConfigurationError('FIRESTORE_PROJECT_ID is required when no document client is supplied');
      }
      documents = new FirestoreRestClient({
        projectId: firestore.projectId,
        databaseId: firestore.databaseId,
        emulatorHost: firestore.emulatorHost,
        pollIntervalMs: firestore.pollIntervalMs,
        fetch: options.fetch,
      });
    }

    return new HostLoopClient({
      ...timing,
      firebase: EnvironmentConfig.getFirebaseConfig(),
      ...options,
      providers,
      documents,
    });
  }

  /**
   * Bind the redirect port. Fails with RedirectPortInUseError when another
   * process holds it.
   */
  async start(): Promise<void> {
    if (this.started) {
      return;
    }
    await this.listener.start();
    this.started = true;
    logger.info('Host loop client started', {
      providers: this.registry.ids(),
      redirectPort: this.registry.redirectPort,
    });
  }

  /**
   * Cancel all background work and release the redirect port
   */
  async shutdown(): Promise<void> {
    this.session.closeAll();
    await this.bridge.shutdown();
    if (this.started) {
      await this.listener.stop();
      this.started = false;
    }
    logger.info('Host loop client shut down');
  }

  /**
   * Begin signing in with `providerId`; returns the authorization URL
   * that was handed to the URL opener
   */
  startFlow(providerId: ProviderId): Result<string, UnknownProviderError> {
    const machine = this.machine(providerId);
    if (!machine.ok) {
      return machine;
    }
    return ok(machine.value.startFlow());
  }

  /**
   * Forget the token and everything that depended on it
   */
  logout(): void {
    for (const machine of this.machines.values()) {
      machine.logout();
    }
    this.firebase?.logout();
    this.session.closeAll();
    this.tokens.clear();
    this.documentTokens.clear();
    this.session.credentialsChanged();
  }

  /**
   * Delete the Firebase account of the signed-in user. Completion arrives
   * as `AccountDeleted`, after which the client is signed out.
   */
  deleteAccount(): Result<void, FirebaseAuthError> {
    if (!this.firebase) {
      return err(new FirebaseAuthError('Firebase sign-in is not configured', undefined));
    }
    if (!this.firebase.deleteAccount()) {
      return err(new FirebaseAuthError('No Firebase account is signed in', undefined));
    }
    return ok(undefined);
  }

  currentIdentity(): IdentityClaims | undefined {
    return this.tokens.current()?.claims;
  }

  currentToken(): StoredToken | undefined {
    return this.tokens.current();
  }

  get(path: string): Result<RpcCallHandle, CallFailure> {
    return this.session.get(path);
  }

  set(path: string, payload: DocumentPayload): Result<RpcCallHandle, CallFailure> {
    return this.session.set(path, payload);
  }

  delete(path: string): Result<RpcCallHandle, CallFailure> {
    return this.session.delete(path);
  }

  watch(path: string): Result<RpcCallHandle, CallFailure> {
    return this.session.watch(path);
  }

  unwatch(path: string): RpcCallHandle | undefined {
    return this.session.unwatch(path);
  }

  watches(): WatchSubscription[] {
    return this.session.activeWatches();
  }

  /**
   * Events completed since the last tick, oldest first, after the host-side
   * state has absorbed them. Events for superseded handles are left out.
   */
  pollEvents(): BridgeEvent[] {
    const delivered: BridgeEvent[] = [];
    for (const event of this.bridge.drain()) {
      if (this.apply(event)) {
        delivered.push(event);
      }
    }
    return delivered;
  }

  /**
   * Adopt a token the host persisted in an earlier run
   */
  restoreSession(token: Token): Result<StoredToken, UnknownProviderError> {
    const machine = this.machine(token.provider);
    if (!machine.ok) {
      return machine;
    }

    this.releaseOtherProviders(machine.value.providerId);
    const stored = this.tokens.replace(token);
    this.session.credentialsChanged();
    machine.value.resume(token);
    this.signInToFirebase(token);
    return ok(stored);
  }

  /**
   * Adopt a Firebase credential the host persisted in an earlier run
   */
  restoreDocumentCredential(credential: Token): Result<StoredToken, FirebaseAuthError> {
    if (!this.firebase) {
      return err(new FirebaseAuthError('Firebase sign-in is not configured', credential.provider));
    }
    const stored = this.documentTokens.replace(credential);
    this.firebase.resume(credential);
    this.session.credentialsChanged();
    return ok(stored);
  }

  /**
   * Firebase credential for the host to persist; undefined when signed out
   * or when Firebase sign-in is not configured
   */
  exportDocumentCredential(): StoredToken | undefined {
    return this.firebase ? this.documentTokens.current() : undefined;
  }

  /**
   * Token for the host to persist; undefined when signed out
   */
  exportToken(): StoredToken | undefined {
    return this.tokens.current();
  }

  /**
   * Route redirect parameters received by a host-owned HTTP server
   */
  dispatchRedirect(params: RedirectParams): RedirectOutcome {
    return this.dispatcher.dispatch(params);
  }

  redirectApp(): Express {
    return this.listener.getApp();
  }

  getStatus(): ClientStatus {
    return {
      started: this.started,
      authenticatedAs: this.tokens.current()?.provider,
      providers: this.registry.list().map((config) => ({
        id: config.id,
        displayName: config.displayName,
        state: this.machines.get(config.id)?.getState() ?? 'idle',
      })),
      watches: this.session.activeWatches().length,
      firebase: this.firebase?.getState(),
      bridge: this.bridge.getStatus(),
    };
  }

  private apply(event: BridgeEvent): boolean {
    switch (event.type) {
      case 'TokenUpdated':
        this.releaseOtherProviders(event.token.provider);
        this.tokens.replace(event.token);
        this.signInToFirebase(event.token);
        this.session.credentialsChanged();
        return true;
      case 'DocumentCredentialUpdated':
        this.documentTokens.replace(event.credential);
        this.session.credentialsChanged();
        return true;
      case 'AccountDeleted':
        logger.info('Account deleted', { provider: event.provider });
        this.logout();
        return true;
      case 'AuthFailed':
        this.onAuthFailed(event);
        return true;
      case 'RpcResult':
      case 'DocumentChanged':
        return this.session.applyEvent(event);
    }
  }

  private onAuthFailed(event: AuthFailedEvent): void {
    logger.warn('Authentication failed', {
      provider: event.provider,
      code: event.error.code,
      credentialsCleared: event.credentialsCleared,
    });

    if (!event.credentialsCleared) {
      return;
    }

    if (event.error instanceof FirebaseAuthError) {
      this.documentTokens.clear();
    } else {
      if (this.tokens.current()?.provider !== event.provider) {
        return;
      }
      this.tokens.clear();
      this.firebase?.logout();
      this.documentTokens.clear();
    }

    this.session.dropAllWatches('credentials cleared');
    this.session.credentialsChanged();
  }

  /**
   * Start the Firebase stage for a provider token unless the Firebase
   * account already stems from that provider; refreshed provider tokens
   * leave the Firebase session alone
   */
  private signInToFirebase(token: Token): void {
    if (this.firebase && !this.firebase.covers(token.provider)) {
      this.firebase.signIn(token);
    }
  }

  /**
   * One token per session: a provider whose token is replaced by another
   * provider's stops refreshing it
   */
  private releaseOtherProviders(provider: ProviderId): void {
    for (const machine of this.machines.values()) {
      if (machine.providerId !== provider && machine.currentToken()) {
        machine.logout();
      }
    }
  }

  private machine(providerId: ProviderId): Result<AuthStateMachine, UnknownProviderError> {
    const config = this.registry.get(providerId);
    if (!config.ok) {
      return config;
    }
    const machine = this.machines.get(config.value.id);
    return machine ? ok(machine) : err(new UnknownProviderError(providerId));
  }
}
