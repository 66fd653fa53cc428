// Types
export type {
  OAuthEndpoints,
  OAuthConfig,
  ConfigStatus,
  CreatedSession,
  PendingSession,
  SessionStore,
  SessionRedisClient,
  MemorySessionStoreOptions,
  RedisSessionStoreOptions,
  TokenSet,
  ProviderProfile,
  TokenClient,
  TokenClientOptions,
  FlowState,
  LoginRedirect,
  CallbackParams,
  AuthorizationFlowDeps,
  AuthorizationFlow,
} from './types.js';

// Configuration
export {
  loadOAuthConfig,
  assertOAuthConfigured,
  describeConfig,
  isPlaceholder,
  DEFAULT_ENDPOINTS,
  DEFAULT_SCOPES,
  DEFAULT_HTTP_TIMEOUT_MS,
  DEFAULT_SESSION_TTL_MS,
} from './config.js';

// PKCE
export {
  generateCodeVerifier,
  deriveCodeChallenge,
  isValidCodeVerifier,
  generateState,
} from './pkce.js';

// Session stores
export { MemorySessionStore, RedisSessionStore } from './sessionStore.js';

// Provider clients
export { createTokenClient } from './tokenClient.js';
export { isRecord, optionalString, providerErrorCode } from './providerResponse.js';

// Flow
export { createAuthorizationFlow } from './authorizationFlow.js';
