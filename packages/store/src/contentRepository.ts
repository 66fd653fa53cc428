import { Op, UniqueConstraintError } from 'sequelize';
import type { Logger } from '@riskscan/core';
import type {
  ContentItemInstance,
  ContentItemModel,
  ContentItemRecord,
  ContentRepository,
} from './types.js';

interface ContentRepositoryDeps {
  ContentItem: ContentItemModel;
  logger: Logger;
}

function toRecord(instance: ContentItemInstance): ContentItemRecord {
  return instance.get({ plain: true });
}

/**
 * Create the content item repository implementation.
 */
export function createContentRepository(deps: ContentRepositoryDeps): ContentRepository {
  const { ContentItem, logger } = deps;

  return {
    async findExistingIds(externalItemIds) {
      if (externalItemIds.length === 0) return new Set<string>();

      const rows = await ContentItem.findAll({
        attributes: ['externalItemId'],
        where: { externalItemId: { [Op.in]: externalItemIds } },
      });

      return new Set(rows.map((row) => row.externalItemId));
    },

    async insert(item) {
      try {
        await ContentItem.create(item);
        return 'inserted';
      } catch (err) {
        if (!(err instanceof UniqueConstraintError)) throw err;

        logger.debug('Content item already stored', { externalItemId: item.externalItemId });
        return 'duplicate';
      }
    },

    async list({ offset, limit }) {
      const { rows, count } = await ContentItem.findAndCountAll({
        order: [
          ['scannedAt', 'DESC'],
          ['id', 'DESC'],
        ],
        offset,
        limit,
      });

      return { rows: rows.map(toRecord), total: count };
    },

    async findByExternalId(externalItemId) {
      const row = await ContentItem.findOne({ where: { externalItemId } });
      return row ? toRecord(row) : null;
    },
  };
}
