import { describe, it, expect } from 'vitest';
import axios, { AxiosError } from 'axios';
import type { AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { RemoteApiError } from '@riskscan/core';
import { loadOAuthConfig } from '@riskscan/oauth';
import { createContentClient } from './contentClient.js';

type Handler = (config: InternalAxiosRequestConfig) => { status: number; data: unknown } | 'timeout';

function createFakeHttp(handler: Handler) {
  const requests: InternalAxiosRequestConfig[] = [];
  const http = axios.create({
    adapter: async (config) => {
      requests.push(config);
      const reply = handler(config);
      if (reply === 'timeout') {
        throw new AxiosError('timeout of 30000ms exceeded', AxiosError.ECONNABORTED, config);
      }

      const response: AxiosResponse = {
        data: reply.data,
        status: reply.status,
        statusText: String(reply.status),
        headers: {},
        config,
      };
      if (reply.status >= 200 && reply.status < 300) return response;
      throw new AxiosError(
        `Request failed with status code ${reply.status}`,
        AxiosError.ERR_BAD_RESPONSE,
        config,
        null,
        response,
      );
    },
  });
  return { http, requests };
}

const config = loadOAuthConfig({ RISKSCAN_VIDEO_LIST_URL: 'http://provider.test/videos' });

async function captureError(promise: Promise<unknown>): Promise<RemoteApiError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof RemoteApiError) return err;
    throw err;
  }
  throw new Error('Expected a RemoteApiError');
}

describe('createContentClient', () => {
  it('posts the page size with the bearer token and requested fields', async () => {
    const { http, requests } = createFakeHttp(() => ({
      status: 200,
      data: {
        data: { videos: [{ id: 'v1' }, { id: 'v2' }], cursor: 1_700_000_000_000, has_more: true },
        error: { code: 'ok', message: '' },
      },
    }));
    const client = createContentClient({ config, http });

    const page = await client.listContent('access-1', 20);

    expect(page).toEqual({ items: [{ id: 'v1' }, { id: 'v2' }], cursor: 1_700_000_000_000, hasMore: true });
    const request = requests[0]!;
    expect(request.method).toBe('post');
    expect(request.url).toBe('http://provider.test/videos');
    expect(request.params).toEqual({
      fields: 'id,title,video_description,create_time,cover_image_url,share_url',
    });
    expect(request.headers.get('Authorization')).toBe('Bearer access-1');
    expect(JSON.parse(String(request.data))).toEqual({ max_count: 20 });
  });

  it('caps the page size at 50', async () => {
    const { http, requests } = createFakeHttp(() => ({ status: 200, data: { data: { videos: [] } } }));
    const client = createContentClient({ config, http });

    const page = await client.listContent('access-1', 100);

    expect(JSON.parse(String(requests[0]!.data))).toEqual({ max_count: 50 });
    expect(page).toEqual({ items: [], cursor: null, hasMore: false });
  });

  it('carries status and body of a non-2xx reply', async () => {
    const { http } = createFakeHttp(() => ({ status: 401, data: { error: { code: 'access_token_invalid' } } }));
    const client = createContentClient({ config, http });

    const err = await captureError(client.listContent('access-1', 10));

    expect(err.status).toBe(401);
    expect(err.body).toEqual({ error: { code: 'access_token_invalid' } });
    expect(err.message).toBe('Content list failed with status 401');
    expect(err.code).toBe('REMOTE_API_ERROR');
  });

  it('treats a provider error inside a 2xx body as a failure', async () => {
    const { http } = createFakeHttp(() => ({
      status: 200,
      data: { data: {}, error: { code: 'scope_not_authorized', message: 'missing video.list' } },
    }));
    const client = createContentClient({ config, http });

    const err = await captureError(client.listContent('access-1', 10));

    expect(err.message).toBe('Content list rejected: scope_not_authorized');
    expect(err.status).toBe(200);
  });

  it('rejects an envelope without a video array', async () => {
    const { http } = createFakeHttp(() => ({ status: 200, data: { data: { videos: 'none' } } }));
    const client = createContentClient({ config, http });

    const err = await captureError(client.listContent('access-1', 10));

    expect(err.message).toBe('Content list response is malformed');
  });

  it('reports a timeout with a null status', async () => {
    const { http, requests } = createFakeHttp(() => 'timeout');
    const client = createContentClient({ config, http });

    const err = await captureError(client.listContent('access-1', 10));

    expect(err.status).toBeNull();
    expect(err.message).toBe('Content list failed: timeout of 30000ms exceeded');
    expect(requests).toHaveLength(1);
  });
});
