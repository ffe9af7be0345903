/**
 * Events the auth side hands to the host loop
 */

import type { ProviderId, Token } from '@hostloop/persistence';
import type { AuthError } from './providers/types.js';

export interface TokenUpdatedEvent {
  readonly type: 'TokenUpdated';
  readonly token: Token;
}

export interface AuthFailedEvent {
  readonly type: 'AuthFailed';
  readonly provider?: ProviderId;
  readonly error: AuthError;
  /** The host must drop its stored token */
  readonly credentialsCleared: boolean;
}

/**
 * A new Firebase ID token for document calls. `credential.provider` names
 * the identity provider the Firebase account signed in with.
 */
export interface DocumentCredentialUpdatedEvent {
  readonly type: 'DocumentCredentialUpdated';
  readonly credential: Token;
}

export interface AccountDeletedEvent {
  readonly type: 'AccountDeleted';
  readonly provider: ProviderId;
  readonly accountId?: string;
}

export type AuthEvent =
  | TokenUpdatedEvent
  | AuthFailedEvent
  | DocumentCredentialUpdatedEvent
  | AccountDeletedEvent;

export type AuthState =
  | 'idle'
  | 'flowStarted'
  | 'awaitingRedirect'
  | 'exchangingCode'
  | 'authenticated'
  | 'refreshing'
  | 'expired';
