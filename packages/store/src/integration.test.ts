import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Sequelize, DataTypes } from 'sequelize';
import { createStore } from './index.js';
import { storeMigrations } from './migrations/index.js';
import type { NewContentItem, Store } from './types.js';

/**
 * Integration tests using a SQLite in-memory database, migrated the same way
 * the app migrates Postgres.
 */
describe('Store Integration (SQLite)', () => {
  let sequelize: Sequelize;
  let store: Store;

  const credentials = {
    accessToken: 'access-1',
    refreshToken: 'refresh-1',
    expiresAt: new Date('2026-01-01T00:00:00Z'),
  };

  function item(externalItemId: string, identityId: number, scannedAt: Date): NewContentItem {
    return {
      externalItemId,
      identityId,
      caption: `caption ${externalItemId}`,
      coverUrl: null,
      createdAtRemote: new Date('2025-06-01T12:00:00Z'),
      shareUrl: `https://example.test/v/${externalItemId}`,
      scannedAt,
      score: 25,
      band: 'medium',
      factors: { captionLength: 10, ocrCoverText: null },
      detections: ['contact_info'],
      recommendations: ['Remove it.'],
    };
  }

  beforeEach(async () => {
    sequelize = new Sequelize({
      dialect: 'sqlite',
      storage: ':memory:',
      logging: false,
    });
    await storeMigrations.up(sequelize.getQueryInterface(), DataTypes);
    store = createStore({ database: sequelize });
  });

  afterEach(async () => {
    await sequelize.close();
  });

  describe('identities', () => {
    it('creates an identity on first connect', async () => {
      const identity = await store.identities.upsert('open-1', credentials, {
        displayName: 'Jess',
        avatarUrl: 'https://example.test/a.png',
      });

      expect(identity.id).toBe(1);
      expect(identity.externalId).toBe('open-1');
      expect(identity.accessToken).toBe('access-1');
      expect(identity.refreshToken).toBe('refresh-1');
      expect(identity.expiresAt?.toISOString()).toBe('2026-01-01T00:00:00.000Z');
      expect(identity.displayName).toBe('Jess');
    });

    it('updates tokens in place on re-authorization', async () => {
      const first = await store.identities.upsert('open-1', credentials, { displayName: 'Jess' });
      const second = await store.identities.upsert(
        'open-1',
        { accessToken: 'access-2', refreshToken: null, expiresAt: null },
        { displayName: 'Jess R.' },
      );

      expect(second.id).toBe(first.id);
      expect(second.accessToken).toBe('access-2');
      expect(second.refreshToken).toBeNull();
      expect(second.expiresAt).toBeNull();
      expect(second.displayName).toBe('Jess R.');

      const stored = await store.identities.findByExternalId('open-1');
      expect(stored?.accessToken).toBe('access-2');
    });

    it('keeps profile fields when the new values are empty or missing', async () => {
      await store.identities.upsert('open-1', credentials, {
        displayName: 'Jess',
        avatarUrl: 'https://example.test/a.png',
      });
      const updated = await store.identities.upsert('open-1', credentials, {
        displayName: '   ',
      });

      expect(updated.displayName).toBe('Jess');
      expect(updated.avatarUrl).toBe('https://example.test/a.png');
    });

    it('stores one row per external id', async () => {
      await store.identities.upsert('open-1', credentials, {});
      await store.identities.upsert('open-1', credentials, {});

      const [rows] = await sequelize.query('SELECT COUNT(*) AS n FROM identities');
      expect(rows).toEqual([{ n: 1 }]);
    });

    it('returns the most recently connected identity', async () => {
      expect(await store.identities.mostRecentlyConnected()).toBeNull();

      await store.identities.upsert('open-1', credentials, {});
      await store.identities.upsert('open-2', credentials, {});
      await store.identities.upsert('open-1', credentials, {});

      const latest = await store.identities.mostRecentlyConnected();
      expect(latest?.externalId).toBe('open-2');
    });

    it('finds identities by id', async () => {
      const created = await store.identities.upsert('open-1', credentials, {});

      expect((await store.identities.findById(created.id))?.externalId).toBe('open-1');
      expect(await store.identities.findById(999)).toBeNull();
    });
  });

  describe('content', () => {
    let identityId: number;

    beforeEach(async () => {
      identityId = (await store.identities.upsert('open-1', credentials, {})).id;
    });

    it('inserts an item and reads it back with JSON fields intact', async () => {
      const scannedAt = new Date('2025-06-02T00:00:00Z');
      expect(await store.content.insert(item('v1', identityId, scannedAt))).toBe('inserted');

      const stored = await store.content.findByExternalId('v1');
      expect(stored?.identityId).toBe(identityId);
      expect(stored?.band).toBe('medium');
      expect(stored?.factors).toEqual({ captionLength: 10, ocrCoverText: null });
      expect(stored?.detections).toEqual(['contact_info']);
      expect(stored?.recommendations).toEqual(['Remove it.']);
      expect(stored?.scannedAt.toISOString()).toBe('2025-06-02T00:00:00.000Z');
    });

    it('reports a duplicate external id without throwing', async () => {
      const scannedAt = new Date();
      await store.content.insert(item('v1', identityId, scannedAt));

      expect(await store.content.insert(item('v1', identityId, scannedAt))).toBe('duplicate');
    });

    it('finds which ids are already stored', async () => {
      await store.content.insert(item('v1', identityId, new Date()));

      const existing = await store.content.findExistingIds(['v1', 'v2']);
      expect([...existing]).toEqual(['v1']);
      expect((await store.content.findExistingIds([])).size).toBe(0);
    });

    it('lists newest scans first with the full count', async () => {
      await store.content.insert(item('v1', identityId, new Date('2025-06-01T00:00:00Z')));
      await store.content.insert(item('v2', identityId, new Date('2025-06-03T00:00:00Z')));
      await store.content.insert(item('v3', identityId, new Date('2025-06-02T00:00:00Z')));

      const firstPage = await store.content.list({ offset: 0, limit: 2 });
      expect(firstPage.total).toBe(3);
      expect(firstPage.rows.map((r) => r.externalItemId)).toEqual(['v2', 'v3']);

      const secondPage = await store.content.list({ offset: 2, limit: 2 });
      expect(secondPage.rows.map((r) => r.externalItemId)).toEqual(['v1']);
    });

    it('returns null for an unknown item', async () => {
      expect(await store.content.findByExternalId('missing')).toBeNull();
    });
  });
});
