import type { StoreMigrations } from '../types.js';

/**
 * Store migrations.
 *
 * Creates `identities` and `content_items`. The unique index on
 * `content_items.external_item_id` is what ingestion relies on when two runs
 * race on the same item.
 *
 * Usage:
 * ```typescript
 * import { storeMigrations } from '@riskscan/store';
 * await storeMigrations.up(sequelize.getQueryInterface(), DataTypes);
 * ```
 */
export const storeMigrations: StoreMigrations = {
  async up(queryInterface, DataTypes): Promise<void> {
    await queryInterface.createTable('identities', {
      id: {
        type: DataTypes.INTEGER,
        autoIncrement: true,
        primaryKey: true,
        allowNull: false,
      },
      external_id: {
        type: DataTypes.STRING(255),
        allowNull: false,
        unique: true,
      },
      access_token: {
        type: DataTypes.TEXT,
        allowNull: false,
      },
      refresh_token: {
        type: DataTypes.TEXT,
        allowNull: true,
      },
      expires_at: {
        type: DataTypes.DATE,
        allowNull: true,
      },
      display_name: {
        type: DataTypes.STRING(255),
        allowNull: true,
      },
      avatar_url: {
        type: DataTypes.TEXT,
        allowNull: true,
      },
      created_at: {
        type: DataTypes.DATE,
        allowNull: false,
        defaultValue: DataTypes.NOW,
      },
      updated_at: {
        type: DataTypes.DATE,
        allowNull: false,
        defaultValue: DataTypes.NOW,
      },
    });

    await queryInterface.createTable('content_items', {
      id: {
        type: DataTypes.INTEGER,
        autoIncrement: true,
        primaryKey: true,
        allowNull: false,
      },
      external_item_id: {
        type: DataTypes.STRING(255),
        allowNull: false,
        unique: true,
      },
      identity_id: {
        type: DataTypes.INTEGER,
        allowNull: false,
        references: {
          model: 'identities',
          key: 'id',
        },
        onDelete: 'CASCADE',
      },
      caption: {
        type: DataTypes.TEXT,
        allowNull: true,
      },
      cover_url: {
        type: DataTypes.TEXT,
        allowNull: true,
      },
      created_at_remote: {
        type: DataTypes.DATE,
        allowNull: true,
      },
      share_url: {
        type: DataTypes.TEXT,
        allowNull: true,
      },
      scanned_at: {
        type: DataTypes.DATE,
        allowNull: false,
      },
      score: {
        type: DataTypes.INTEGER,
        allowNull: false,
      },
      band: {
        type: DataTypes.STRING(10),
        allowNull: false,
      },
      factors: {
        type: DataTypes.JSON,
        allowNull: false,
      },
      detections: {
        type: DataTypes.JSON,
        allowNull: false,
      },
      recommendations: {
        type: DataTypes.JSON,
        allowNull: false,
      },
      created_at: {
        type: DataTypes.DATE,
        allowNull: false,
        defaultValue: DataTypes.NOW,
      },
      updated_at: {
        type: DataTypes.DATE,
        allowNull: false,
        defaultValue: DataTypes.NOW,
      },
    });

    await queryInterface.addIndex('content_items', ['identity_id'], {
      name: 'idx_content_items_identity_id',
    });

    await queryInterface.addIndex('content_items', ['scanned_at'], {
      name: 'idx_content_items_scanned_at',
    });
  },

  async down(queryInterface): Promise<void> {
    await queryInterface.dropTable('content_items');
    await queryInterface.dropTable('identities');
  },
};
