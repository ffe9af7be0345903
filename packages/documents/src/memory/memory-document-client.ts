/**
 * In-memory document backend
 *
 * Stores documents in a Map and pushes changes to open watch streams.
 * Used by tests and for running the client without a server.
 */

import { RpcStatusError } from '../errors.js';
import type { DocumentRpcClient } from '../client.js';
import type { DocumentChange, DocumentPayload, DocumentSnapshot } from '../types.js';

export interface MemoryDocumentClientOptions {
  /** Which bearer credentials the backend accepts (default: any non-empty) */
  acceptCredential?: (_credential: string) => boolean;
}

interface StoredDocument {
  payload: DocumentPayload;
  version: string;
}

/**
 * One open watch stream. Changes are buffered until the consumer pulls.
 */
class WatchChannel {
  private buffer: DocumentChange[] = [];
  private wake: (() => void) | undefined;
  private ended: { error?: Error } | undefined;

  push(change: DocumentChange): void {
    this.buffer.push(change);
    this.wake?.();
  }

  end(error?: Error): void {
    this.ended = { error };
    this.wake?.();
  }

  async *iterate(signal: AbortSignal): AsyncGenerator<DocumentChange> {
    const onAbort = (): void => {
      this.wake?.();
    };
    signal.addEventListener('abort', onAbort, { once: true });

    try {
      for (;;) {
        if (signal.aborted) {
          return;
        }
        const next = this.buffer.shift();
        if (next) {
          yield next;
          continue;
        }
        if (this.ended) {
          if (this.ended.error) {
            throw this.ended.error;
          }
          return;
        }
        await new Promise<void>((resolve) => {
          this.wake = resolve;
        });
        this.wake = undefined;
      }
    } finally {
      signal.removeEventListener('abort', onAbort);
    }
  }
}

export class MemoryDocumentClient implements DocumentRpcClient {
  private readonly documents = new Map<string, StoredDocument>();
  private readonly channels = new Map<string, Set<WatchChannel>>();
  private readonly faults: Error[] = [];
  private acceptCredential: (_credential: string) => boolean;
  private clock = 0;

  constructor(options: MemoryDocumentClientOptions = {}) {
    this.acceptCredential = options.acceptCredential ?? ((credential) => credential.length > 0);
  }

  async get(path: string, credential: string, signal: AbortSignal): Promise<DocumentSnapshot> {
    await this.enter(credential, signal);

    const document = this.documents.get(path);
    if (!document) {
      throw new RpcStatusError('not_found', `No document at ${path}`, 404);
    }
    return { path, payload: structuredClone(document.payload), version: document.version };
  }

  async set(path: string, payload: DocumentPayload, credential: string, signal: AbortSignal): Promise<DocumentSnapshot> {
    await this.enter(credential, signal);

    const document = { payload: structuredClone(payload), version: this.nextVersion() };
    this.documents.set(path, document);
    this.publish(path, { payload: structuredClone(document.payload), version: document.version });

    return { path, payload: structuredClone(document.payload), version: document.version };
  }

  async delete(path: string, credential: string, signal: AbortSignal): Promise<void> {
    await this.enter(credential, signal);

    if (this.documents.delete(path)) {
      this.publish(path, { payload: null, version: this.nextVersion() });
    }
  }

  async *watch(path: string, credential: string, signal: AbortSignal): AsyncGenerator<DocumentChange> {
    await this.enter(credential, signal);

    const channel = new WatchChannel();
    const document = this.documents.get(path);
    channel.push(document
      ? { payload: structuredClone(document.payload), version: document.version }
      : { payload: null, version: '0' });

    let open = this.channels.get(path);
    if (!open) {
      open = new Set();
      this.channels.set(path, open);
    }
    open.add(channel);

    try {
      yield* channel.iterate(signal);
    } finally {
      open.delete(channel);
      if (open.size === 0) {
        this.channels.delete(path);
      }
    }
  }

  /**
   * The next call (of any kind) fails with `error` before touching data
   */
  failNextWith(error: Error): void {
    this.faults.push(error);
  }

  /**
   * End every open watch stream, cleanly or with `error`
   */
  dropWatches(error?: Error): void {
    for (const open of this.channels.values()) {
      for (const channel of open) {
        channel.end(error);
      }
    }
  }

  setCredentialPredicate(accept: (_credential: string) => boolean): void {
    this.acceptCredential = accept;
  }

  /**
   * Current content without going through the RPC surface
   */
  peek(path: string): DocumentPayload | undefined {
    return this.documents.get(path)?.payload;
  }

  watcherCount(path: string): number {
    return this.channels.get(path)?.size ?? 0;
  }

  private async enter(credential: string, signal: AbortSignal): Promise<void> {
    // Replies never arrive in the caller's own turn
    await Promise.resolve();
    signal.throwIfAborted();

    const fault = this.faults.shift();
    if (fault) {
      throw fault;
    }
    if (!this.acceptCredential(credential)) {
      throw new RpcStatusError('unauthenticated', 'Request had invalid authentication credentials', 401);
    }
  }

  private nextVersion(): string {
    this.clock++;
    return this.clock.toString();
  }

  private publish(path: string, change: DocumentChange): void {
    for (const channel of this.channels.get(path) ?? []) {
      channel.push(change);
    }
  }
}
