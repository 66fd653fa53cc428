import { NoIdentityError, ValidationError, describeError, scoreCaption, silentLogger } from '@riskscan/core';
import type { IdentityRecord, InsertOutcome, NewContentItem } from '@riskscan/store';
import { parseRemoteItem } from './remoteItem.js';
import type {
  IngestionPipeline,
  IngestionPipelineDeps,
  IngestionResult,
  IngestOptions,
  RemoteContentItem,
} from './types.js';

export const MIN_INGEST_LIMIT = 1;
export const MAX_INGEST_LIMIT = 100;

function assertLimit(limit: number): void {
  if (!Number.isInteger(limit) || limit < MIN_INGEST_LIMIT || limit > MAX_INGEST_LIMIT) {
    throw new ValidationError(
      `limit must be an integer between ${MIN_INGEST_LIMIT} and ${MAX_INGEST_LIMIT}`,
      { limit },
    );
  }
}

/**
 * Create the ingestion pipeline.
 *
 * One run fetches a single page for the target identity, validates each item
 * on its own, scores the new ones and inserts them one by one. A failed
 * fetch persists nothing. Items already stored are never re-scored; the unique
 * index on the external item id settles races between concurrent runs.
 */
export function createIngestionPipeline(deps: IngestionPipelineDeps): IngestionPipeline {
  const logger = (deps.logger ?? silentLogger).child({ component: 'ingestion' });
  const now = deps.now ?? (() => new Date());

  async function resolveIdentity(identityId: number | undefined): Promise<IdentityRecord> {
    if (identityId !== undefined) {
      const identity = await deps.identities.findById(identityId);
      if (!identity) {
        throw new NoIdentityError(`No connected account with id ${identityId}`);
      }
      return identity;
    }

    const identity = await deps.identities.mostRecentlyConnected();
    if (!identity) throw new NoIdentityError();
    return identity;
  }

  return {
    async ingest(options: IngestOptions): Promise<IngestionResult> {
      assertLimit(options.limit);
      const identity = await resolveIdentity(options.identityId);

      const page = await deps.client.listContent(identity.accessToken, options.limit);

      let rejectedCount = 0;
      let skippedCount = 0;
      const candidates = new Map<string, RemoteContentItem>();

      for (const [index, raw] of page.items.entries()) {
        const parsed = parseRemoteItem(raw);
        if (!parsed.ok) {
          rejectedCount++;
          logger.warn('Rejected remote item', { index, reason: parsed.reason });
          continue;
        }
        if (candidates.has(parsed.item.externalItemId)) {
          skippedCount++;
          continue;
        }
        candidates.set(parsed.item.externalItemId, parsed.item);
      }

      const existing = await deps.content.findExistingIds([...candidates.keys()]);
      const scannedAt = now();
      const staged: NewContentItem[] = [];

      for (const item of candidates.values()) {
        if (existing.has(item.externalItemId)) {
          skippedCount++;
          continue;
        }
        const assessment = scoreCaption(item.caption);
        staged.push({
          ...item,
          identityId: identity.id,
          scannedAt,
          score: assessment.score,
          band: assessment.band,
          factors: assessment.factors,
          detections: assessment.detections,
          recommendations: assessment.recommendations,
        });
      }

      let ingestedCount = 0;
      for (const item of staged) {
        let outcome: InsertOutcome;
        try {
          outcome = await deps.content.insert(item);
        } catch (err) {
          rejectedCount++;
          logger.warn('Failed to store content item', {
            externalItemId: item.externalItemId,
            error: describeError(err),
          });
          continue;
        }
        if (outcome === 'inserted') {
          ingestedCount++;
        } else {
          skippedCount++;
        }
      }

      logger.info('Ingestion finished', {
        identityId: identity.id,
        fetched: page.items.length,
        ingestedCount,
        skippedCount,
        rejectedCount,
      });

      return { ingestedCount, skippedCount, rejectedCount };
    },
  };
}
