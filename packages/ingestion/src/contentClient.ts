import axios from 'axios';
import type { AxiosResponse } from 'axios';
import { RemoteApiError, silentLogger } from '@riskscan/core';
import { isRecord, providerErrorCode } from '@riskscan/oauth';
import type { ContentClient, ContentClientOptions, RemoteContentPage } from './types.js';

export const CONTENT_FIELDS = 'id,title,video_description,create_time,cover_image_url,share_url';

/** The provider refuses pages larger than this */
export const MAX_REMOTE_PAGE_SIZE = 50;

function parsePage(body: unknown): RemoteContentPage | null {
  if (!isRecord(body)) return null;
  const data = body['data'];
  if (!isRecord(data)) return null;

  const videos = data['videos'];
  if (!Array.isArray(videos)) return null;

  const cursor = data['cursor'];
  return {
    items: videos,
    cursor: typeof cursor === 'number' ? cursor : null,
    hasMore: data['has_more'] === true,
  };
}

/**
 * Create the client for the provider's content-list endpoint.
 */
export function createContentClient(options: ContentClientOptions): ContentClient {
  const { config } = options;
  const http = options.http ?? axios.create({ timeout: config.httpTimeoutMs });
  const logger = (options.logger ?? silentLogger).child({ component: 'content-client' });

  return {
    async listContent(accessToken, maxCount) {
      const pageSize = Math.max(1, Math.min(maxCount, MAX_REMOTE_PAGE_SIZE));

      let response: AxiosResponse<unknown>;
      try {
        response = await http.post<unknown>(
          config.endpoints.contentListUrl,
          { max_count: pageSize },
          {
            params: { fields: CONTENT_FIELDS },
            headers: { Authorization: `Bearer ${accessToken}` },
            timeout: config.httpTimeoutMs,
          },
        );
      } catch (err) {
        if (axios.isAxiosError(err)) {
          const status = err.response?.status ?? null;
          const body: unknown = err.response ? err.response.data : err.message;
          const suffix = status === null ? `: ${err.message}` : ` with status ${status}`;
          throw new RemoteApiError(`Content list failed${suffix}`, status, body);
        }
        throw err;
      }

      const { status, data } = response;
      const providerError = providerErrorCode(data);
      if (providerError !== null) {
        throw new RemoteApiError(`Content list rejected: ${providerError}`, status, data);
      }

      const page = parsePage(data);
      if (!page) {
        throw new RemoteApiError('Content list response is malformed', status, data);
      }

      logger.debug('Content page fetched', { count: page.items.length, hasMore: page.hasMore });
      return page;
    },
  };
}
