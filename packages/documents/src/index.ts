/**
 * @hostloop/documents
 *
 * Authorised document get/set/delete/watch over the host-loop bridge
 */

export { DocumentSession, type DocumentSessionOptions, type CredentialRejectedHandler, type CallFailure } from './document-session.js';
export type { DocumentRpcClient } from './client.js';
export { validateDocumentPath } from './paths.js';

export {
  DocumentRpcError,
  UnauthenticatedError,
  TransientRpcFailure,
  StreamDroppedError,
  DocumentNotFoundError,
  InvalidDocumentPathError,
  InvalidDocumentPayloadError,
  RpcStatusError,
  type DocumentErrorCode,
  type RpcStatus,
} from './errors.js';

export type {
  DocumentPayload,
  DocumentSnapshot,
  DocumentChange,
  DocumentEvent,
  DocumentChangedEvent,
  RpcResultEvent,
  RpcCallHandle,
  RpcCallKind,
  RpcValue,
  WatchSubscription,
} from './types.js';

// Backends
export { MemoryDocumentClient, type MemoryDocumentClientOptions } from './memory/memory-document-client.js';
export {
  FirestoreRestClient,
  statusFromHttp,
  type FirestoreRestClientOptions,
} from './firestore/firestore-rest-client.js';
export {
  encodeValue,
  encodeFields,
  decodeValue,
  decodeFields,
  type FirestoreValue,
} from './firestore/firestore-values.js';
