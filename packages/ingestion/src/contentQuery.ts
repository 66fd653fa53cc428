import { NotFoundError } from '@riskscan/core';
import type { ContentItemRecord, ContentRepository, IdentityRecord } from '@riskscan/store';
import type { ContentItemView, ContentQuery, IdentityView } from './types.js';

export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;

export function toContentItemView(record: ContentItemRecord): ContentItemView {
  return {
    externalItemId: record.externalItemId,
    identityId: record.identityId,
    caption: record.caption,
    coverUrl: record.coverUrl,
    createdAtRemote: record.createdAtRemote?.toISOString() ?? null,
    shareUrl: record.shareUrl,
    scannedAt: record.scannedAt.toISOString(),
    score: record.score,
    band: record.band,
    factors: record.factors,
    detections: record.detections,
    recommendations: record.recommendations,
  };
}

export function toIdentityView(record: IdentityRecord): IdentityView {
  return {
    id: record.id,
    externalId: record.externalId,
    displayName: record.displayName,
    avatarUrl: record.avatarUrl,
    expiresAt: record.expiresAt?.toISOString() ?? null,
  };
}

/** Non-integer or out-of-range values fall back to the nearest valid one */
function normalizePage(page: number | undefined): number {
  if (page === undefined || !Number.isFinite(page)) return 1;
  return Math.max(1, Math.floor(page));
}

function normalizePageSize(pageSize: number | undefined): number {
  if (pageSize === undefined || !Number.isFinite(pageSize)) return DEFAULT_PAGE_SIZE;
  return Math.min(MAX_PAGE_SIZE, Math.max(1, Math.floor(pageSize)));
}

/**
 * Read side over stored content, newest scan first.
 */
export function createContentQuery(content: ContentRepository): ContentQuery {
  return {
    async listContent(params = {}) {
      const page = normalizePage(params.page);
      const pageSize = normalizePageSize(params.pageSize);

      const { rows, total } = await content.list({ offset: (page - 1) * pageSize, limit: pageSize });

      return { items: rows.map(toContentItemView), page, pageSize, total };
    },

    async getContent(externalItemId) {
      const record = await content.findByExternalId(externalItemId);
      if (!record) {
        throw new NotFoundError(`No content item with id ${externalItemId}`);
      }
      return toContentItemView(record);
    },
  };
}
