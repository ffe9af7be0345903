/**
 * RPC Session
 *
 * Authorises document calls with the host's current token and multiplexes
 * them, together with watch streams, over the bridge.
 *
 * The subscription table and the set of outstanding handles are host-side
 * state. They change only in methods the host loop calls, `applyEvent`
 * included. Background tasks work from the token snapshot taken at
 * submission, or from the newer one the host published through
 * `credentialsChanged()`.
 */

import { logger, recordRpcCall } from '@hostloop/observability';
import type { TaskContext, TaskHandle, TaskScheduler } from '@hostloop/bridge';
import { err, ok, type Result, type StoredToken, type TokenStore } from '@hostloop/persistence';
import type { DocumentRpcClient } from './client.js';
import {
  DocumentNotFoundError,
  DocumentRpcError,
  RpcStatusError,
  StreamDroppedError,
  InvalidDocumentPayloadError,
  TransientRpcFailure,
  UnauthenticatedError,
  type InvalidDocumentPathError,
} from './errors.js';
import { validateDocumentPath } from './paths.js';
import type {
  DocumentEvent,
  DocumentPayload,
  RpcCallHandle,
  RpcCallKind,
  RpcResultEvent,
  RpcValue,
  WatchSubscription,
} from './types.js';

export type CredentialRejectedHandler = (_token: StoredToken) => void;

export interface DocumentSessionOptions {
  /** How long a call rejected for its credential waits for a newer token (default 10 s) */
  reauthWaitMs?: number;
  /** Called from a background task when the server rejects a credential */
  onCredentialRejected?: CredentialRejectedHandler;
}

export type CallFailure = UnauthenticatedError | InvalidDocumentPathError | InvalidDocumentPayloadError;

type Operation = (_credential: string, _signal: AbortSignal) => Promise<RpcValue>;

type CredentialWaiter = (_token: StoredToken | undefined) => void;

interface ActiveWatch {
  readonly subscription: WatchSubscription;
  readonly task: TaskHandle;
}

const DEFAULT_REAUTH_WAIT_MS = 10_000;

export class DocumentSession {
  private nextHandleId = 1;
  private readonly watches = new Map<string, ActiveWatch>();
  private readonly outstanding = new Set<number>();
  private readonly calls = new Map<number, TaskHandle>();
  private credential: StoredToken | undefined;
  private readonly credentialWaiters = new Set<CredentialWaiter>();

  private readonly reauthWaitMs: number;
  private readonly onCredentialRejected: CredentialRejectedHandler | undefined;

  constructor(
    private readonly client: DocumentRpcClient,
    private readonly tokens: TokenStore,
    private readonly scheduler: TaskScheduler<DocumentEvent>,
    options: DocumentSessionOptions = {}
  ) {
    this.reauthWaitMs = options.reauthWaitMs ?? DEFAULT_REAUTH_WAIT_MS;
    this.onCredentialRejected = options.onCredentialRejected;
    this.credential = tokens.current();
  }

  get(path: string): Result<RpcCallHandle, CallFailure> {
    return this.call('get', path, (credential, signal) => this.client.get(path, credential, signal));
  }

  set(path: string, payload: DocumentPayload): Result<RpcCallHandle, CallFailure> {
    // The host may keep mutating its object after this returns
    let snapshot: DocumentPayload;
    try {
      snapshot = structuredClone(payload);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      logger.rpcWarn('Document payload cannot be copied', { path, reason });
      return err(new InvalidDocumentPayloadError(path, reason));
    }
    return this.call('set', path, (credential, signal) => this.client.set(path, snapshot, credential, signal));
  }

  delete(path: string): Result<RpcCallHandle, CallFailure> {
    return this.call('delete', path, async (credential, signal) => {
      await this.client.delete(path, credential, signal);
      return null;
    });
  }

  /**
   * Start streaming changes for `path`. An existing watch on the same path
   * is stopped first and gets its own watchStop.
   */
  watch(path: string): Result<RpcCallHandle, CallFailure> {
    const checked = validateDocumentPath(path);
    if (!checked.ok) {
      return checked;
    }
    const token = this.tokens.live();
    if (!token) {
      logger.rpcWarn('Watch refused without a live token', { path });
      return err(new UnauthenticatedError());
    }

    const existing = this.watches.get(path);
    if (existing) {
      this.stop(existing);
    }

    const handle = this.allocate('watchStart', path);
    this.outstanding.add(handle.id);
    const task = this.scheduler.submit(`watch:${path}`, (ctx) => this.runWatch(ctx, handle, token));
    this.watches.set(path, { subscription: { path, handle }, task });

    logger.rpcDebug('Watch started', { path, handle: handle.id });
    return ok(handle);
  }

  /**
   * Stop watching `path`. Returns the watchStop handle, or undefined when
   * nothing was watched there.
   */
  unwatch(path: string): RpcCallHandle | undefined {
    const active = this.watches.get(path);
    if (!active) {
      return undefined;
    }
    return this.stop(active);
  }

  /**
   * Host-side bookkeeping for one drained event. False means the event
   * belongs to a handle that is no longer current and must not reach the
   * host application.
   */
  applyEvent(event: DocumentEvent): boolean {
    if (event.type === 'DocumentChanged') {
      const active = this.watches.get(event.path);
      if (!active || active.subscription.handle.id !== event.handle.id) {
        logger.rpcDebug('Dropping change for an inactive watch', { path: event.path, handle: event.handle.id });
        return false;
      }
      // A re-established stream repeats the state it last reported
      if (active.subscription.lastSeenVersion === event.version) {
        return false;
      }
      active.subscription.lastSeenVersion = event.version;
      return true;
    }

    const { handle } = event;
    if (!this.outstanding.delete(handle.id)) {
      logger.rpcDebug('Dropping result for a superseded call', { handle: handle.id, kind: handle.kind });
      return false;
    }
    this.calls.delete(handle.id);

    if (handle.kind === 'watchStart' && this.watches.get(handle.path)?.subscription.handle.id === handle.id) {
      this.watches.delete(handle.path);
    }
    return true;
  }

  /**
   * Publish the host's token to background tasks. Calls parked on a
   * rejected credential retry with a newer token, or fail at once when
   * the token was cleared.
   */
  credentialsChanged(): void {
    const token = this.tokens.current();
    this.credential = token;

    for (const waiter of Array.from(this.credentialWaiters)) {
      waiter(token);
    }
  }

  /**
   * End every watch with StreamDropped, e.g. after credentials were
   * cleared. The caller has to watch again.
   */
  dropAllWatches(reason: string): number {
    const active = Array.from(this.watches.values());
    this.watches.clear();

    for (const { subscription, task } of active) {
      task.cancel();
      this.scheduler.post(this.dropped(subscription.handle, reason));
    }

    if (active.length > 0) {
      logger.rpcWarn('Watches dropped', { count: active.length, reason });
    }
    return active.length;
  }

  /**
   * Cancel every watch without reporting it. Single calls already in
   * flight still deliver their result.
   */
  closeAll(): void {
    for (const { subscription, task } of this.watches.values()) {
      task.cancel();
      this.outstanding.delete(subscription.handle.id);
    }
    this.watches.clear();
  }

  getSubscription(path: string): WatchSubscription | undefined {
    return this.watches.get(path)?.subscription;
  }

  activeWatches(): WatchSubscription[] {
    return Array.from(this.watches.values(), (active) => active.subscription);
  }

  pendingCalls(): number {
    return this.calls.size;
  }

  private call(kind: RpcCallKind, path: string, operation: Operation): Result<RpcCallHandle, CallFailure> {
    const checked = validateDocumentPath(path);
    if (!checked.ok) {
      return checked;
    }
    const token = this.tokens.live();
    if (!token) {
      logger.rpcWarn('Document call refused without a live token', { kind, path });
      return err(new UnauthenticatedError());
    }

    const handle = this.allocate(kind, path);
    this.outstanding.add(handle.id);

    const task = this.scheduler.submit(`${kind}:${path}`, async (ctx) => {
      const startedAt = Date.now();
      const outcome = await this.execute(ctx, path, token, operation);
      recordRpcCall(kind, Date.now() - startedAt, outcome.ok, outcome.ok ? undefined : outcome.error.code);
      ctx.post({ type: 'RpcResult', handle, outcome });
    });
    this.calls.set(handle.id, task);

    return ok(handle);
  }

  private async execute(
    ctx: TaskContext<DocumentEvent>,
    path: string,
    token: StoredToken,
    operation: Operation
  ): Promise<Result<RpcValue, DocumentRpcError>> {
    let credential = token;
    let reauthorized = false;

    for (;;) {
      try {
        return ok(await operation(credential.accessToken, ctx.signal));
      } catch (error) {
        const failure = classify(error, path);
        if (!(failure instanceof UnauthenticatedError) || reauthorized) {
          if (!ctx.signal.aborted) {
            logger.rpcWarn('Document call failed', { path, code: failure.code, message: failure.message });
          }
          return err(failure);
        }

        reauthorized = true;
        const next = await this.awaitNewerCredential(ctx, credential);
        if (!next) {
          return err(new UnauthenticatedError('Credential rejected and no newer token arrived'));
        }
        credential = next;
      }
    }
  }

  private async runWatch(ctx: TaskContext<DocumentEvent>, handle: RpcCallHandle, token: StoredToken): Promise<void> {
    const { path } = handle;
    let credential = token;
    let reauthorized = false;

    for (;;) {
      try {
        for await (const change of this.client.watch(path, credential.accessToken, ctx.signal)) {
          await ctx.waitForCapacity();
          ctx.post({ type: 'DocumentChanged', path, handle, payload: change.payload, version: change.version });
          reauthorized = false;
        }
        if (!ctx.signal.aborted) {
          ctx.post(this.dropped(handle, 'stream ended'));
        }
        return;
      } catch (error) {
        if (ctx.signal.aborted) {
          return;
        }

        const failure = classify(error, path);
        if (failure instanceof UnauthenticatedError && !reauthorized) {
          reauthorized = true;
          const next = await this.awaitNewerCredential(ctx, credential);
          if (next) {
            logger.rpcDebug('Re-establishing watch with a newer token', { path, handle: handle.id });
            credential = next;
            continue;
          }
        }

        logger.rpcWarn('Watch stream dropped', { path, handle: handle.id, reason: failure.message });
        ctx.post(this.dropped(handle, failure.message));
        return;
      }
    }
  }

  /**
   * Resolves with a token newer than `rejected`, or undefined when none
   * arrives within the wait, the token is cleared or the task is cancelled
   */
  private awaitNewerCredential(
    ctx: TaskContext<DocumentEvent>,
    rejected: StoredToken
  ): Promise<StoredToken | undefined> {
    const latest = this.credential;
    if (latest && latest.version > rejected.version) {
      return Promise.resolve(latest);
    }

    this.notifyCredentialRejected(rejected);

    return new Promise((resolve) => {
      const finish = (token: StoredToken | undefined): void => {
        clearTimeout(timer);
        ctx.signal.removeEventListener('abort', onAbort);
        this.credentialWaiters.delete(onToken);
        resolve(token);
      };
      const onToken: CredentialWaiter = (token) => {
        if (!token || token.version > rejected.version) {
          finish(token);
        }
      };
      const onAbort = (): void => {
        finish(undefined);
      };
      const timer = setTimeout(() => {
        finish(undefined);
      }, this.reauthWaitMs);

      this.credentialWaiters.add(onToken);
      ctx.signal.addEventListener('abort', onAbort, { once: true });
    });
  }

  private notifyCredentialRejected(token: StoredToken): void {
    logger.rpcInfo('Server rejected the credential, waiting for a newer token', {
      provider: token.provider,
      version: token.version,
    });
    try {
      this.onCredentialRejected?.(token);
    } catch (error) {
      logger.rpcError('Credential rejection handler failed', error);
    }
  }

  /**
   * Stop a watch on the host side and acknowledge once its stream task
   * has unwound
   */
  private stop(active: ActiveWatch): RpcCallHandle {
    const { subscription, task } = active;
    this.watches.delete(subscription.path);
    this.outstanding.delete(subscription.handle.id);
    task.cancel();

    const handle = this.allocate('watchStop', subscription.path, subscription.handle.id);
    this.outstanding.add(handle.id);
    this.scheduler.submit(`watch-stop:${subscription.path}`, async (ctx) => {
      await task.settled;
      ctx.post({ type: 'RpcResult', handle, outcome: ok(null) });
    });

    logger.rpcDebug('Watch stopped', { path: subscription.path, handle: subscription.handle.id });
    return handle;
  }

  private allocate(kind: RpcCallKind, path: string, target?: number): RpcCallHandle {
    return { id: this.nextHandleId++, kind, path, target };
  }

  private dropped(handle: RpcCallHandle, reason: string): RpcResultEvent {
    return { type: 'RpcResult', handle, outcome: err(new StreamDroppedError(handle.path, reason)) };
  }
}

/**
 * Map whatever a document client threw onto the session's error taxonomy
 */
function classify(error: unknown, path: string): DocumentRpcError {
  if (error instanceof RpcStatusError) {
    switch (error.status) {
      case 'unauthenticated':
        return new UnauthenticatedError(error.message);
      case 'not_found':
        return new DocumentNotFoundError(path);
      case 'unavailable':
        return new TransientRpcFailure(error.message, error);
      default:
        return error;
    }
  }
  if (error instanceof DocumentRpcError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new TransientRpcFailure(message, error);
}
