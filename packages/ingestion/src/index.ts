// Router factory
export { createRiskScanRouter } from './router.js';

// Services (for use without Express)
export { createIngestionPipeline, MIN_INGEST_LIMIT, MAX_INGEST_LIMIT } from './pipeline.js';
export { createContentClient, CONTENT_FIELDS, MAX_REMOTE_PAGE_SIZE } from './contentClient.js';
export {
  createContentQuery,
  toContentItemView,
  toIdentityView,
  DEFAULT_PAGE_SIZE,
  MAX_PAGE_SIZE,
} from './contentQuery.js';
export { parseRemoteItem } from './remoteItem.js';

// Controllers
export { createAuthController } from './authController.js';
export { createContentController, DEFAULT_INGEST_LIMIT } from './contentController.js';
export { createScanController } from './scanController.js';
export { sendError } from './http.js';

// Types
export type {
  RemoteContentPage,
  RemoteContentItem,
  RemoteItemParseResult,
  ContentClient,
  ContentClientOptions,
  IngestOptions,
  IngestionResult,
  IngestionPipelineDeps,
  IngestionPipeline,
  ContentItemView,
  ContentPage,
  ContentPageParams,
  ContentQuery,
  IdentityView,
  RiskScanRouterConfig,
} from './types.js';
