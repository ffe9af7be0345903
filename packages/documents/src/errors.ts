/**
 * Document RPC errors
 */

export type DocumentErrorCode =
  | 'unauthenticated'
  | 'transient'
  | 'stream_dropped'
  | 'not_found'
  | 'invalid_path'
  | 'invalid_payload'
  | 'rpc_status';

/**
 * Status reported by a document backend
 */
export type RpcStatus =
  | 'unauthenticated'
  | 'permission_denied'
  | 'not_found'
  | 'invalid_argument'
  | 'failed_precondition'
  | 'unavailable'
  | 'internal';

export class DocumentRpcError extends Error {
  constructor(
    message: string,
    public readonly code: DocumentErrorCode
  ) {
    super(message);
    this.name = 'DocumentRpcError';
  }
}

/**
 * No usable credential: none was held, or the server kept rejecting it
 */
export class UnauthenticatedError extends DocumentRpcError {
  constructor(message = 'No valid token for document call') {
    super(message, 'unauthenticated');
    this.name = 'UnauthenticatedError';
  }
}

export class TransientRpcFailure extends DocumentRpcError {
  constructor(message: string, public readonly underlying?: unknown) {
    super(message, 'transient');
    this.name = 'TransientRpcFailure';
  }
}

export class StreamDroppedError extends DocumentRpcError {
  constructor(
    public readonly path: string,
    public readonly reason: string
  ) {
    super(`Watch on ${path} ended: ${reason}`, 'stream_dropped');
    this.name = 'StreamDroppedError';
  }
}

export class DocumentNotFoundError extends DocumentRpcError {
  constructor(public readonly path: string) {
    super(`Document not found: ${path}`, 'not_found');
    this.name = 'DocumentNotFoundError';
  }
}

export class InvalidDocumentPathError extends DocumentRpcError {
  constructor(
    public readonly path: string,
    reason: string
  ) {
    super(`Invalid document path "${path}": ${reason}`, 'invalid_path');
    this.name = 'InvalidDocumentPathError';
  }
}

/**
 * The payload holds a value documents cannot carry, such as a function
 */
export class InvalidDocumentPayloadError extends DocumentRpcError {
  constructor(
    public readonly path: string,
    reason: string
  ) {
    super(`Invalid payload for "${path}": ${reason}`, 'invalid_payload');
    this.name = 'InvalidDocumentPayloadError';
  }
}

/**
 * Raised by document clients for any non-success status. The session maps
 * it onto the errors above.
 */
export class RpcStatusError extends DocumentRpcError {
  constructor(
    public readonly status: RpcStatus,
    message: string,
    public readonly httpStatus?: number
  ) {
    super(message, 'rpc_status');
    this.name = 'RpcStatusError';
  }
}
