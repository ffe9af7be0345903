/**
 * Transport seam between the RPC session and a document backend
 */

import type { DocumentChange, DocumentPayload, DocumentSnapshot } from './types.js';

/**
 * Every call carries the bearer credential it should be authorised with.
 * Failures are thrown as RpcStatusError; an aborted signal rejects with
 * whatever the transport raises on abort.
 */
export interface DocumentRpcClient {
  get(_path: string, _credential: string, _signal: AbortSignal): Promise<DocumentSnapshot>;
  set(_path: string, _payload: DocumentPayload, _credential: string, _signal: AbortSignal): Promise<DocumentSnapshot>;
  delete(_path: string, _credential: string, _signal: AbortSignal): Promise<void>;
  /** Current state first, then one item per change until the signal aborts */
  watch(_path: string, _credential: string, _signal: AbortSignal): AsyncIterable<DocumentChange>;
}
