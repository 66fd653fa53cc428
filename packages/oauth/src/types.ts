import type { Logger } from '@riskscan/core';
import type { IdentityCredentials, IdentityRecord, IdentityRepository } from '@riskscan/store';
import type { AxiosInstance } from 'axios';

/** Provider endpoints; overridable for sandboxes and tests */
export interface OAuthEndpoints {
  authorizeUrl: string;
  tokenUrl: string;
  userInfoUrl: string;
  contentListUrl: string;
}

export interface OAuthConfig {
  clientKey: string;
  clientSecret: string;
  redirectUri: string;
  /** Comma-separated, as the provider expects */
  scopes: string;
  endpoints: OAuthEndpoints;
  httpTimeoutMs: number;
  sessionTtlMs: number;
}

/** Masked configuration for diagnostics; never includes the secret */
export interface ConfigStatus {
  clientKeySet: boolean;
  redirectUri: string;
  scopes: string;
}

/** A freshly started authorization session */
export interface CreatedSession {
  state: string;
  codeVerifier: string;
  codeChallenge: string;
}

/** What a session store keeps per state */
export interface PendingSession {
  codeVerifier: string;
  /** Epoch milliseconds */
  createdAt: number;
}

/**
 * Short-lived state → verifier mapping. `consume` removes and returns in one
 * atomic step, so a state can be redeemed at most once.
 */
export interface SessionStore {
  create(): Promise<CreatedSession>;
  /** @throws SessionNotFoundError when unknown, already consumed or expired */
  consume(state: string): Promise<string>;
  /** Evict expired sessions; returns how many were removed */
  sweep(): Promise<number>;
}

/**
 * Minimal Redis interface for the session store.
 * Compatible with ioredis; `getdel` needs Redis 6.2 or later.
 */
export interface SessionRedisClient {
  set(key: string, value: string, mode: 'PX', milliseconds: number): Promise<unknown>;
  getdel(key: string): Promise<string | null>;
  quit(): Promise<string>;
}

export interface MemorySessionStoreOptions {
  ttlMs?: number;
  now?: () => number;
  logger?: Logger;
}

export interface RedisSessionStoreOptions {
  redis: SessionRedisClient;
  ttlMs?: number;
  /** Redis key prefix. Defaults to 'pkce:' */
  keyPrefix?: string;
  now?: () => number;
  logger?: Logger;
}

/** Result of a code exchange */
export interface TokenSet extends IdentityCredentials {
  expiresAt: Date;
  openId: string | null;
  scope: string | null;
}

export interface ProviderProfile {
  openId: string;
  displayName: string | null;
  avatarUrl: string | null;
}

export interface TokenClient {
  /** @throws ExchangeError on any failure; never retried */
  exchange(code: string, codeVerifier: string): Promise<TokenSet>;
  /** @throws ExchangeError on any failure; never retried */
  fetchProfile(accessToken: string): Promise<ProviderProfile>;
}

export interface TokenClientOptions {
  config: OAuthConfig;
  /** Defaults to an instance with the configured timeout */
  http?: AxiosInstance;
  now?: () => number;
  logger?: Logger;
}

/** Steps of one login, in the only order they may occur */
export type FlowState =
  | 'Idle'
  | 'SessionCreated'
  | 'CodeReceived'
  | 'TokenExchanged'
  | 'ProfileFetched'
  | 'IdentityUpserted'
  | 'SessionExpired'
  | 'ExchangeFailed';

export interface LoginRedirect {
  redirectUrl: string;
  state: string;
}

/** Query parameters the provider sends to the redirect URI */
export interface CallbackParams {
  code?: string;
  state?: string;
  error?: string;
  errorDescription?: string;
}

export interface AuthorizationFlowDeps {
  config: OAuthConfig;
  sessions: SessionStore;
  tokens: TokenClient;
  identities: IdentityRepository;
  logger?: Logger;
}

export interface AuthorizationFlow {
  beginLogin(): Promise<LoginRedirect>;
  handleCallback(params: CallbackParams): Promise<IdentityRecord>;
  configStatus(): ConfigStatus;
}
