import { isRecord, optionalString } from '@riskscan/oauth';
import type { RemoteItemParseResult } from './types.js';

const OPTIONAL_STRING_FIELDS = ['title', 'video_description', 'cover_image_url', 'share_url'] as const;

function isOptionalString(value: unknown): boolean {
  return value === undefined || value === null || typeof value === 'string';
}

function parseItemId(value: unknown): string | null {
  if (typeof value === 'string') return value.trim() === '' ? null : value;
  if (typeof value === 'number' && Number.isSafeInteger(value)) return String(value);
  return null;
}

/**
 * Validate one raw item from a content-list page. The caption is the
 * description when present, otherwise the title; `create_time` is epoch seconds.
 */
export function parseRemoteItem(raw: unknown): RemoteItemParseResult {
  if (!isRecord(raw)) {
    return { ok: false, reason: 'item is not an object' };
  }

  const externalItemId = parseItemId(raw['id']);
  if (externalItemId === null) {
    return { ok: false, reason: 'id must be a non-empty string or safe integer' };
  }

  for (const field of OPTIONAL_STRING_FIELDS) {
    if (!isOptionalString(raw[field])) {
      return { ok: false, reason: `${field} must be a string` };
    }
  }

  const createTime = raw['create_time'];
  if (createTime !== undefined && createTime !== null) {
    if (typeof createTime !== 'number' || !Number.isFinite(createTime) || createTime < 0) {
      return { ok: false, reason: 'create_time must be a non-negative number' };
    }
  }

  return {
    ok: true,
    item: {
      externalItemId,
      caption: optionalString(raw['video_description']) ?? optionalString(raw['title']),
      coverUrl: optionalString(raw['cover_image_url']),
      createdAtRemote: typeof createTime === 'number' ? new Date(createTime * 1000) : null,
      shareUrl: optionalString(raw['share_url']),
    },
  };
}
