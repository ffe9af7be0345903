/**
 * Document RPC types
 */

import type { Result } from '@hostloop/persistence';
import type { DocumentRpcError } from './errors.js';

/** Plain data stored in a document */
export type DocumentPayload = Record<string, unknown>;

export type RpcCallKind = 'get' | 'set' | 'delete' | 'watchStart' | 'watchStop';

/**
 * Identifies one call from submission to its result. Ids only ever grow
 * within a session.
 */
export interface RpcCallHandle {
  readonly id: number;
  readonly kind: RpcCallKind;
  readonly path: string;
  /** For a watchStop: the id of the watch it ends */
  readonly target?: number;
}

export interface DocumentSnapshot {
  readonly path: string;
  readonly payload: DocumentPayload;
  readonly version: string;
}

/** One item of a watch stream; a null payload means the document is gone */
export interface DocumentChange {
  readonly payload: DocumentPayload | null;
  readonly version: string;
}

/**
 * Host-owned record of a live watch
 */
export interface WatchSubscription {
  readonly path: string;
  readonly handle: RpcCallHandle;
  lastSeenVersion?: string;
}

/** get → snapshot, set → the written snapshot, delete and watchStop → null */
export type RpcValue = DocumentSnapshot | null;

export interface RpcResultEvent {
  readonly type: 'RpcResult';
  readonly handle: RpcCallHandle;
  readonly outcome: Result<RpcValue, DocumentRpcError>;
}

export interface DocumentChangedEvent {
  readonly type: 'DocumentChanged';
  readonly path: string;
  readonly handle: RpcCallHandle;
  readonly payload: DocumentPayload | null;
  readonly version: string;
}

export type DocumentEvent = RpcResultEvent | DocumentChangedEvent;
