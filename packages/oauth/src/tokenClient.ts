import axios from 'axios';
import type { AxiosResponse } from 'axios';
import { ExchangeError, silentLogger } from '@riskscan/core';
import { isRecord, optionalString, providerErrorCode } from './providerResponse.js';
import type { ProviderProfile, TokenClient, TokenClientOptions, TokenSet } from './types.js';

const PROFILE_FIELDS = 'open_id,display_name,avatar_url';

interface ProviderResponse {
  status: number;
  data: unknown;
}

async function send(
  action: string,
  call: () => Promise<AxiosResponse<unknown>>,
): Promise<ProviderResponse> {
  try {
    const response = await call();
    return { status: response.status, data: response.data };
  } catch (err) {
    if (axios.isAxiosError(err)) {
      const status = err.response?.status ?? null;
      const body: unknown = err.response ? err.response.data : err.message;
      const suffix = status === null ? `: ${err.message}` : ` with status ${status}`;
      throw new ExchangeError(`${action} failed${suffix}`, status, body);
    }
    throw err;
  }
}

function parseTokenSet(body: unknown, now: number): TokenSet | null {
  if (!isRecord(body)) return null;

  const accessToken = body['access_token'];
  if (typeof accessToken !== 'string' || accessToken === '') return null;

  const expiresIn = body['expires_in'];
  if (typeof expiresIn !== 'number' || !Number.isFinite(expiresIn)) return null;

  return {
    accessToken,
    refreshToken: optionalString(body['refresh_token']),
    expiresAt: new Date(now + expiresIn * 1000),
    openId: optionalString(body['open_id']),
    scope: optionalString(body['scope']),
  };
}

function parseProfile(body: unknown): ProviderProfile | null {
  if (!isRecord(body)) return null;
  const data = body['data'];
  if (!isRecord(data)) return null;
  const user = data['user'];
  if (!isRecord(user)) return null;

  const openId = optionalString(user['open_id']);
  if (openId === null) return null;

  return {
    openId,
    displayName: optionalString(user['display_name']),
    avatarUrl: optionalString(user['avatar_url']),
  };
}

/**
 * Create the client for the provider's token and user-info endpoints.
 * Failures of any kind become ExchangeError; nothing is retried.
 */
export function createTokenClient(options: TokenClientOptions): TokenClient {
  const { config } = options;
  const http = options.http ?? axios.create({ timeout: config.httpTimeoutMs });
  const now = options.now ?? Date.now;
  const logger = (options.logger ?? silentLogger).child({ component: 'token-client' });

  return {
    async exchange(code, codeVerifier) {
      const form = new URLSearchParams({
        client_key: config.clientKey,
        client_secret: config.clientSecret,
        grant_type: 'authorization_code',
        code,
        redirect_uri: config.redirectUri,
        code_verifier: codeVerifier,
      });

      const { status, data } = await send('Token exchange', () =>
        http.post<unknown>(config.endpoints.tokenUrl, form.toString(), {
          headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
          timeout: config.httpTimeoutMs,
        }),
      );

      const providerError = providerErrorCode(data);
      if (providerError !== null) {
        throw new ExchangeError(`Token exchange rejected: ${providerError}`, status, data);
      }

      const tokenSet = parseTokenSet(data, now());
      if (!tokenSet) {
        throw new ExchangeError('Token response is malformed', status, data);
      }

      logger.info('Token exchange succeeded', {
        hasRefreshToken: tokenSet.refreshToken !== null,
        expiresAt: tokenSet.expiresAt.toISOString(),
      });
      return tokenSet;
    },

    async fetchProfile(accessToken) {
      const { status, data } = await send('Profile request', () =>
        http.get<unknown>(config.endpoints.userInfoUrl, {
          params: { fields: PROFILE_FIELDS },
          headers: { Authorization: `Bearer ${accessToken}` },
          timeout: config.httpTimeoutMs,
        }),
      );

      const providerError = providerErrorCode(data);
      if (providerError !== null) {
        throw new ExchangeError(`Profile request rejected: ${providerError}`, status, data);
      }

      const profile = parseProfile(data);
      if (!profile) {
        throw new ExchangeError('Profile response is malformed', status, data);
      }
      return profile;
    },
  };
}
