import { ConfigurationError } from '@riskscan/core';
import type { ConfigStatus, OAuthConfig, OAuthEndpoints } from './types.js';

export const DEFAULT_ENDPOINTS: OAuthEndpoints = {
  authorizeUrl: 'https://www.tiktok.com/v2/auth/authorize/',
  tokenUrl: 'https://open.tiktokapis.com/v2/oauth/token/',
  userInfoUrl: 'https://open.tiktokapis.com/v2/user/info/',
  contentListUrl: 'https://open.tiktokapis.com/v2/video/list/',
};

export const DEFAULT_SCOPES = 'user.info.basic,video.list';
export const DEFAULT_HTTP_TIMEOUT_MS = 30_000;
export const DEFAULT_SESSION_TTL_MS = 10 * 60 * 1000;

type Env = Record<string, string | undefined>;

/**
 * True for values nobody filled in: empty, or a template marker such as
 * `<your-client-key>`.
 */
export function isPlaceholder(value: string): boolean {
  const normalized = value.trim().toLowerCase();
  return normalized === '' || (normalized.startsWith('<') && normalized.endsWith('>'));
}

function readString(env: Env, name: string, fallback = ''): string {
  const value = env[name]?.trim();
  return value ? value : fallback;
}

function readPositiveInt(env: Env, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`${name} must be a positive integer`, { variable: name, value: raw });
  }
  return value;
}

/**
 * Read the OAuth configuration from the environment. Missing credentials are
 * not an error here; `assertOAuthConfigured` checks them before any call.
 */
export function loadOAuthConfig(env: Env = process.env): OAuthConfig {
  return {
    clientKey: readString(env, 'RISKSCAN_CLIENT_KEY'),
    clientSecret: readString(env, 'RISKSCAN_CLIENT_SECRET'),
    redirectUri: readString(env, 'RISKSCAN_REDIRECT_URI'),
    scopes: readString(env, 'RISKSCAN_SCOPES', DEFAULT_SCOPES),
    endpoints: {
      authorizeUrl: readString(env, 'RISKSCAN_AUTH_URL', DEFAULT_ENDPOINTS.authorizeUrl),
      tokenUrl: readString(env, 'RISKSCAN_TOKEN_URL', DEFAULT_ENDPOINTS.tokenUrl),
      userInfoUrl: readString(env, 'RISKSCAN_USER_INFO_URL', DEFAULT_ENDPOINTS.userInfoUrl),
      contentListUrl: readString(env, 'RISKSCAN_VIDEO_LIST_URL', DEFAULT_ENDPOINTS.contentListUrl),
    },
    httpTimeoutMs: readPositiveInt(env, 'RISKSCAN_HTTP_TIMEOUT_MS', DEFAULT_HTTP_TIMEOUT_MS),
    sessionTtlMs: readPositiveInt(env, 'RISKSCAN_SESSION_TTL_MS', DEFAULT_SESSION_TTL_MS),
  };
}

/**
 * @throws ConfigurationError naming the first missing or placeholder variable
 */
export function assertOAuthConfigured(config: OAuthConfig): void {
  const required: Array<[string, string]> = [
    ['RISKSCAN_CLIENT_KEY', config.clientKey],
    ['RISKSCAN_CLIENT_SECRET', config.clientSecret],
    ['RISKSCAN_REDIRECT_URI', config.redirectUri],
  ];

  for (const [name, value] of required) {
    if (isPlaceholder(value)) {
      throw new ConfigurationError(`${name} is not configured`, { variable: name });
    }
  }
}

export function describeConfig(config: OAuthConfig): ConfigStatus {
  return {
    clientKeySet: !isPlaceholder(config.clientKey),
    redirectUri: config.redirectUri,
    scopes: config.scopes,
  };
}
