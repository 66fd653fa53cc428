import type { AxiosInstance } from 'axios';
import type { Logger, RiskBand, RiskFactors, SignalTag } from '@riskscan/core';
import type { AuthorizationFlow, OAuthConfig } from '@riskscan/oauth';
import type { ContentRepository, IdentityRecord, IdentityRepository } from '@riskscan/store';

// ── Remote content ──────────────────────────────────────────

/** One page from the provider's content-list endpoint, items still unvalidated */
export interface RemoteContentPage {
  items: unknown[];
  /** Opaque paging cursor, null when the provider sent none */
  cursor: number | null;
  hasMore: boolean;
}

/** A remote item that passed validation */
export interface RemoteContentItem {
  externalItemId: string;
  caption: string | null;
  coverUrl: string | null;
  createdAtRemote: Date | null;
  shareUrl: string | null;
}

export type RemoteItemParseResult =
  | { ok: true; item: RemoteContentItem }
  | { ok: false; reason: string };

export interface ContentClient {
  /**
   * Fetch one page of the account's content.
   * @throws RemoteApiError on any failure; nothing is retried
   */
  listContent(accessToken: string, maxCount: number): Promise<RemoteContentPage>;
}

export interface ContentClientOptions {
  config: OAuthConfig;
  /** Injected for tests; defaults to an axios instance with the configured timeout */
  http?: AxiosInstance;
  logger?: Logger;
}

// ── Ingestion ───────────────────────────────────────────────

export interface IngestOptions {
  /** Integer in 1..100 */
  limit: number;
  /** Defaults to the most recently connected identity */
  identityId?: number;
}

export interface IngestionResult {
  ingestedCount: number;
  /** Already stored, repeated within the page, or lost an insert race */
  skippedCount: number;
  /** Failed item validation */
  rejectedCount: number;
}

export interface IngestionPipelineDeps {
  client: ContentClient;
  identities: IdentityRepository;
  content: ContentRepository;
  logger?: Logger;
  now?: () => Date;
}

export interface IngestionPipeline {
  ingest(options: IngestOptions): Promise<IngestionResult>;
}

// ── Content queries ─────────────────────────────────────────

/** A stored item as exposed over HTTP */
export interface ContentItemView {
  externalItemId: string;
  identityId: number;
  caption: string | null;
  coverUrl: string | null;
  createdAtRemote: string | null;
  shareUrl: string | null;
  scannedAt: string;
  score: number;
  band: RiskBand;
  factors: RiskFactors;
  detections: SignalTag[];
  recommendations: string[];
}

export interface ContentPage {
  items: ContentItemView[];
  page: number;
  pageSize: number;
  /** All stored items, not just this page */
  total: number;
}

export interface ContentPageParams {
  page?: number;
  pageSize?: number;
}

export interface ContentQuery {
  listContent(params?: ContentPageParams): Promise<ContentPage>;
  /** @throws NotFoundError when no item has this id */
  getContent(externalItemId: string): Promise<ContentItemView>;
}

/** A connected account as exposed over HTTP; tokens are never included */
export type IdentityView = Pick<IdentityRecord, 'id' | 'externalId' | 'displayName' | 'avatarUrl'> & {
  expiresAt: string | null;
};

// ── Router ──────────────────────────────────────────────────

export interface RiskScanRouterConfig {
  auth: AuthorizationFlow;
  pipeline: IngestionPipeline;
  query: ContentQuery;
  logger?: Logger;
}
