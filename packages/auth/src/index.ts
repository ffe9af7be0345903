/**
 * @hostloop/auth
 *
 * Multi-provider OAuth 2.0 authorization-code flow with PKCE for a
 * non-blocking host loop
 */

// Core factory and registry
export { OAuthProviderFactory } from './factory.js';
export { ProviderRegistry } from './provider-registry.js';
export {
  defineProvider,
  buildProviderConfigs,
  DEFAULT_REDIRECT_PORT,
  type ProviderDefinition,
} from './provider-config.js';

export type {
  ProviderConfig,
  ProviderKind,
  FetchLike,
  RedirectParams,
  ProviderTokenResponse,
  AuthErrorCode,
  ExchangeFailureDetail,
  StaleFlowReason,
} from './providers/types.js';

// Export error classes as values (not types)
export {
  AuthError,
  UnknownProviderError,
  StateMismatchError,
  StaleFlowError,
  AuthExchangeFailedError,
  TokenExpiredError,
  ProviderDeniedError,
  FirebaseAuthError,
} from './providers/types.js';

// Individual provider implementations
export { BaseOAuthProvider, REDIRECT_HOST, type ProviderOptions } from './providers/base-provider.js';
export { GoogleOAuthProvider, GOOGLE_DEFAULTS } from './providers/google-provider.js';
export { GitHubOAuthProvider, GITHUB_DEFAULTS } from './providers/github-provider.js';
export { GenericOAuthProvider } from './providers/generic-provider.js';

// State machine and redirect handling
export {
  AuthStateMachine,
  type AuthStateMachineOptions,
  type UrlOpener,
  type StateChangeListener,
  type RedirectMatch,
} from './auth-state-machine.js';
export { RedirectDispatcher, type RedirectOutcome } from './redirect-dispatcher.js';
export {
  RedirectListener,
  RedirectPortInUseError,
  parseRedirectQuery,
  type RedirectListenerOptions,
} from './redirect-listener.js';
export { renderRedirectPage, type RedirectPage } from './redirect-page.js';

// Firebase sign-in stage
export {
  IdentityToolkitClient,
  IDENTITY_TOOLKIT_URL,
  SECURE_TOKEN_URL,
  type IdentityToolkitOptions,
} from './firebase/identity-toolkit.js';
export {
  FirebaseSession,
  type FirebaseSessionOptions,
  type FirebaseSessionState,
} from './firebase/firebase-session.js';

export type {
  AuthEvent,
  AuthFailedEvent,
  TokenUpdatedEvent,
  DocumentCredentialUpdatedEvent,
  AccountDeletedEvent,
  AuthState,
} from './events.js';
