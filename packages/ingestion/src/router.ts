import { Router, json } from 'express';
import { silentLogger } from '@riskscan/core';
import type { RiskScanRouterConfig } from './types.js';
import { createAuthController } from './authController.js';
import { createContentController } from './contentController.js';
import { createScanController } from './scanController.js';

/**
 * Create an Express router with the login, ingestion, content and scan endpoints.
 *
 * Routes:
 *   GET  /auth/login               - Redirect to the provider (or JSON with ?format=json)
 *   GET  /auth/callback            - Complete the login, return the identity
 *   GET  /auth/config-status       - Masked OAuth configuration
 *   POST /ingestion/run            - Fetch, score and store one page of content
 *   GET  /content                  - Paginated scored content, newest first
 *   GET  /content/:externalItemId  - One scored item
 *   POST /scan                     - Score a caption and optional GPS without storing
 *
 * @example
 * ```typescript
 * import express from 'express';
 * import { createRiskScanRouter } from '@riskscan/ingestion';
 *
 * const app = express();
 * app.use('/', createRiskScanRouter({ auth, pipeline, query, logger }));
 * ```
 */
export function createRiskScanRouter(config: RiskScanRouterConfig): Router {
  const router = Router();
  const logger = (config.logger ?? silentLogger).child({ component: 'http' });
  const authController = createAuthController(config.auth, logger);
  const contentController = createContentController(config.pipeline, config.query, logger);
  const scanController = createScanController(logger);

  router.use(json());

  // ── Login ───────────────────────────────────────────────────
  router.get('/auth/login', (req, res) => {
    void authController.login(req, res);
  });
  router.get('/auth/callback', (req, res) => {
    void authController.callback(req, res);
  });
  router.get('/auth/config-status', (req, res) => {
    authController.configStatus(req, res);
  });

  // ── Ingestion and content ───────────────────────────────────
  router.post('/ingestion/run', (req, res) => {
    void contentController.runIngestion(req, res);
  });
  router.get('/content', (req, res) => {
    void contentController.list(req, res);
  });
  router.get('/content/:externalItemId', (req, res) => {
    void contentController.get(req, res);
  });

  // ── Direct upload scan ──────────────────────────────────────
  router.post('/scan', (req, res) => {
    scanController.scan(req, res);
  });

  return router;
}
