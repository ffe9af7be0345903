/**
 * Firestore REST v1 document client
 *
 * Talks to firestore.googleapis.com, or to a local emulator when an
 * emulator host is configured. Watch streams poll the document and yield
 * whenever its update time changes.
 */

import { z } from 'zod';
import { logger } from '@hostloop/observability';
import { RpcStatusError, type RpcStatus } from '../errors.js';
import type { DocumentRpcClient } from '../client.js';
import type { DocumentChange, DocumentPayload, DocumentSnapshot } from '../types.js';
import {
  FirestoreDocumentSchema,
  decodeFields,
  encodeFields,
  type FirestoreDocument,
} from './firestore-values.js';

export type FetchLike = typeof fetch;

export interface FirestoreRestClientOptions {
  projectId: string;
  databaseId?: string;
  /** host:port of an emulator; plain http is used when set */
  emulatorHost?: string;
  pollIntervalMs?: number;
  fetch?: FetchLike;
}

const PRODUCTION_BASE_URL = 'https://firestore.googleapis.com/v1';
const DEFAULT_DATABASE_ID = '(default)';
const DEFAULT_POLL_INTERVAL_MS = 1000;

const FirestoreErrorBodySchema = z.object({
  error: z.object({
    code: z.number().optional(),
    message: z.string().optional(),
    status: z.string().optional(),
  }),
});

/**
 * HTTP status → RPC status
 */
export function statusFromHttp(status: number): RpcStatus {
  if (status === 401) {
    return 'unauthenticated';
  }
  if (status === 403) {
    return 'permission_denied';
  }
  if (status === 404) {
    return 'not_found';
  }
  if (status === 400) {
    return 'invalid_argument';
  }
  if (status === 409 || status === 412) {
    return 'failed_precondition';
  }
  if (status === 429 || status >= 500) {
    return 'unavailable';
  }
  return 'internal';
}

export class FirestoreRestClient implements DocumentRpcClient {
  private readonly documentsUrl: string;
  private readonly pollIntervalMs: number;
  private readonly fetchFn: FetchLike;

  constructor(options: FirestoreRestClientOptions) {
    const baseUrl = options.emulatorHost ? `http://${options.emulatorHost}/v1` : PRODUCTION_BASE_URL;
    const database = options.databaseId ?? DEFAULT_DATABASE_ID;

    this.documentsUrl = `${baseUrl}/projects/${encodeURIComponent(options.projectId)}/databases/${encodeURIComponent(database)}/documents`;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.fetchFn = options.fetch ?? globalThis.fetch;
  }

  documentUrl(path: string): string {
    return `${this.documentsUrl}/${path.split('/').map(encodeURIComponent).join('/')}`;
  }

  async get(path: string, credential: string, signal: AbortSignal): Promise<DocumentSnapshot> {
    const document = await this.request('GET', path, credential, signal);
    return this.toSnapshot(path, document);
  }

  async set(path: string, payload: DocumentPayload, credential: string, signal: AbortSignal): Promise<DocumentSnapshot> {
    let fields: ReturnType<typeof encodeFields>;
    try {
      fields = encodeFields(payload);
    } catch (error) {
      if (error instanceof TypeError) {
        throw new RpcStatusError('invalid_argument', error.message);
      }
      throw error;
    }
    const document = await this.request('PATCH', path, credential, signal, { fields });
    return this.toSnapshot(path, document);
  }

  async delete(path: string, credential: string, signal: AbortSignal): Promise<void> {
    await this.send('DELETE', path, credential, signal);
  }

  async *watch(path: string, credential: string, signal: AbortSignal): AsyncGenerator<DocumentChange> {
    let lastVersion: string | undefined;
    let existed: boolean | undefined;

    while (!signal.aborted) {
      let change: DocumentChange | undefined;
      try {
        const snapshot = await this.get(path, credential, signal);
        if (existed !== true || snapshot.version !== lastVersion) {
          change = { payload: snapshot.payload, version: snapshot.version };
          lastVersion = snapshot.version;
        }
        existed = true;
      } catch (error) {
        if (!(error instanceof RpcStatusError) || error.status !== 'not_found') {
          throw error;
        }
        if (existed !== false) {
          // Deletions carry no server timestamp; the observation time stands in
          change = { payload: null, version: new Date().toISOString() };
        }
        existed = false;
      }

      if (change) {
        yield change;
      }
      await pause(this.pollIntervalMs, signal);
    }
  }

  private async request(
    method: 'GET' | 'PATCH',
    path: string,
    credential: string,
    signal: AbortSignal,
    body?: unknown
  ): Promise<FirestoreDocument> {
    const response = await this.send(method, path, credential, signal, body);
    const parsed = FirestoreDocumentSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new RpcStatusError('internal', 'Firestore returned an unrecognised document', response.status);
    }
    return parsed.data;
  }

  private async send(
    method: 'GET' | 'PATCH' | 'DELETE',
    path: string,
    credential: string,
    signal: AbortSignal,
    body?: unknown
  ): Promise<Response> {
    let response: Response;
    try {
      response = await this.fetchFn(this.documentUrl(path), {
        method,
        headers: {
          'Authorization': `Bearer ${credential}`,
          'Accept': 'application/json',
          ...(body === undefined ? {} : { 'Content-Type': 'application/json' }),
        },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal,
      });
    } catch (error) {
      if (signal.aborted) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new RpcStatusError('unavailable', `Firestore unreachable: ${message}`);
    }

    if (!response.ok) {
      const status = statusFromHttp(response.status);
      const detail = FirestoreErrorBodySchema.safeParse(await response.json().catch(() => undefined));
      const message = detail.success && detail.data.error.message
        ? detail.data.error.message
        : `Firestore ${method} failed: ${response.status}`;

      if (status !== 'not_found') {
        logger.rpcWarn('Firestore request failed', { method, path, status: response.status });
      }
      throw new RpcStatusError(status, message, response.status);
    }

    return response;
  }

  private toSnapshot(path: string, document: FirestoreDocument): DocumentSnapshot {
    return { path, payload: decodeFields(document.fields), version: document.updateTime };
  }
}

function pause(ms: number, signal: AbortSignal): Promise<void> {
  if (signal.aborted) {
    return Promise.resolve();
  }
  return new Promise((resolve) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}
