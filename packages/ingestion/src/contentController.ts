import type { Request, Response } from 'express';
import { ValidationError } from '@riskscan/core';
import type { Logger } from '@riskscan/core';
import { isRecord } from '@riskscan/oauth';
import type { ContentQuery, IngestionPipeline } from './types.js';
import { readNumber, sendError } from './http.js';

export const DEFAULT_INGEST_LIMIT = 20;

function readIdentityId(value: unknown): number | undefined {
  const identityId = readNumber(value);
  if (identityId === undefined) return undefined;
  if (!Number.isInteger(identityId) || identityId < 1) {
    throw new ValidationError('identityId must be a positive integer', { identityId: value });
  }
  return identityId;
}

/**
 * Create the ingestion and content endpoint handlers.
 */
export function createContentController(
  pipeline: IngestionPipeline,
  query: ContentQuery,
  logger: Logger,
) {
  return {
    /**
     * POST /ingestion/run
     * `limit` and `identityId` are read from the JSON body, then the query string.
     */
    async runIngestion(req: Request, res: Response): Promise<void> {
      try {
        const body: unknown = req.body;
        const params = isRecord(body) ? body : {};

        const limit = readNumber(params['limit'] ?? req.query['limit']) ?? DEFAULT_INGEST_LIMIT;
        const identityId = readIdentityId(params['identityId'] ?? req.query['identityId']);

        const result = await pipeline.ingest({ limit, identityId });
        res.json(result);
      } catch (err) {
        sendError(res, err, logger);
      }
    },

    /**
     * GET /content
     * Query params: page, pageSize
     */
    async list(req: Request, res: Response): Promise<void> {
      try {
        const result = await query.listContent({
          page: readNumber(req.query['page']),
          pageSize: readNumber(req.query['pageSize']),
        });
        res.json(result);
      } catch (err) {
        sendError(res, err, logger);
      }
    },

    /** GET /content/:externalItemId */
    async get(req: Request, res: Response): Promise<void> {
      try {
        const item = await query.getContent(req.params['externalItemId'] ?? '');
        res.json(item);
      } catch (err) {
        sendError(res, err, logger);
      }
    },
  };
}
