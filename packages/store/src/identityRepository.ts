import { UniqueConstraintError } from 'sequelize';
import type { Sequelize } from 'sequelize';
import type { Logger } from '@riskscan/core';
import type {
  IdentityCredentials,
  IdentityInstance,
  IdentityModel,
  IdentityProfile,
  IdentityRecord,
  IdentityRepository,
} from './types.js';

interface IdentityRepositoryDeps {
  sequelize: Sequelize;
  Identity: IdentityModel;
  logger: Logger;
}

function nonEmpty(value: string | null | undefined): string | null {
  return typeof value === 'string' && value.trim() !== '' ? value : null;
}

function toRecord(instance: IdentityInstance): IdentityRecord {
  return instance.get({ plain: true });
}

/**
 * Create the identity repository implementation.
 */
export function createIdentityRepository(deps: IdentityRepositoryDeps): IdentityRepository {
  const { sequelize, Identity, logger } = deps;

  async function upsertOnce(
    externalId: string,
    credentials: IdentityCredentials,
    profile: IdentityProfile,
  ): Promise<IdentityRecord> {
    const displayName = nonEmpty(profile.displayName);
    const avatarUrl = nonEmpty(profile.avatarUrl);

    return sequelize.transaction(async (transaction) => {
      const existing = await Identity.findOne({ where: { externalId }, transaction });

      if (!existing) {
        const created = await Identity.create(
          {
            externalId,
            accessToken: credentials.accessToken,
            refreshToken: credentials.refreshToken,
            expiresAt: credentials.expiresAt,
            displayName,
            avatarUrl,
          },
          { transaction },
        );
        logger.info('Identity created', { identityId: created.id });
        return toRecord(created);
      }

      existing.set({
        accessToken: credentials.accessToken,
        refreshToken: credentials.refreshToken,
        expiresAt: credentials.expiresAt,
      });
      if (displayName !== null) existing.set('displayName', displayName);
      if (avatarUrl !== null) existing.set('avatarUrl', avatarUrl);

      await existing.save({ transaction });
      logger.info('Identity updated', { identityId: existing.id });
      return toRecord(existing);
    });
  }

  return {
    async upsert(externalId, credentials, profile) {
      try {
        return await upsertOnce(externalId, credentials, profile);
      } catch (err) {
        if (!(err instanceof UniqueConstraintError)) throw err;

        // Another request inserted the same account between our read and write.
        logger.warn('Concurrent identity insert, retrying as update', { externalId });
        return upsertOnce(externalId, credentials, profile);
      }
    },

    async mostRecentlyConnected() {
      const row = await Identity.findOne({ order: [['id', 'DESC']] });
      return row ? toRecord(row) : null;
    },

    async findById(id) {
      const row = await Identity.findByPk(id);
      return row ? toRecord(row) : null;
    },

    async findByExternalId(externalId) {
      const row = await Identity.findOne({ where: { externalId } });
      return row ? toRecord(row) : null;
    },
  };
}
