// Types
export type {
  IdentityCredentials,
  IdentityProfile,
  IdentityRecord,
  ContentItemRecord,
  NewContentItem,
  InsertOutcome,
  ContentListOptions,
  ContentListResult,
  IdentityRepository,
  ContentRepository,
  StoreConfig,
  Store,
  StoreMigrations,
} from './types.js';

// Migrations
export { storeMigrations } from './migrations/index.js';

// Models
export { defineIdentity } from './models/identity.js';
export { defineContentItem } from './models/contentItem.js';

// Factory
import { silentLogger } from '@riskscan/core';
import type { StoreConfig, Store } from './types.js';
import { defineIdentity } from './models/identity.js';
import { defineContentItem } from './models/contentItem.js';
import { createIdentityRepository } from './identityRepository.js';
import { createContentRepository } from './contentRepository.js';

/**
 * Create the identity and content repositories on one Sequelize connection.
 * Run `storeMigrations.up` first; the models do not sync their tables.
 *
 * @example
 * ```typescript
 * import { createStore } from '@riskscan/store';
 *
 * const store = createStore({ database: sequelize, logger });
 * const identity = await store.identities.mostRecentlyConnected();
 * ```
 */
export function createStore(config: StoreConfig): Store {
  const logger = (config.logger ?? silentLogger).child({ component: 'store' });
  const Identity = defineIdentity(config.database);
  const ContentItem = defineContentItem(config.database);

  ContentItem.belongsTo(Identity, { foreignKey: 'identityId', as: 'identity' });

  return {
    identities: createIdentityRepository({ sequelize: config.database, Identity, logger }),
    content: createContentRepository({ ContentItem, logger }),
  };
}
