import { DataTypes } from 'sequelize';
import type { Sequelize } from 'sequelize';
import { RISK_BANDS } from '@riskscan/core';
import type { ContentItemInstance, ContentItemModel } from '../types.js';

/**
 * Define the ContentItem model on a Sequelize instance.
 * Scores are written once at ingestion and never recomputed.
 */
export function defineContentItem(sequelize: Sequelize): ContentItemModel {
  return sequelize.define<ContentItemInstance>(
    'ContentItem',
    {
      id: {
        type: DataTypes.INTEGER,
        autoIncrement: true,
        primaryKey: true,
      },
      externalItemId: {
        type: DataTypes.STRING(255),
        allowNull: false,
        unique: true,
        field: 'external_item_id',
      },
      identityId: {
        type: DataTypes.INTEGER,
        allowNull: false,
        field: 'identity_id',
      },
      caption: {
        type: DataTypes.TEXT,
        allowNull: true,
      },
      coverUrl: {
        type: DataTypes.TEXT,
        allowNull: true,
        field: 'cover_url',
      },
      createdAtRemote: {
        type: DataTypes.DATE,
        allowNull: true,
        field: 'created_at_remote',
      },
      shareUrl: {
        type: DataTypes.TEXT,
        allowNull: true,
        field: 'share_url',
      },
      scannedAt: {
        type: DataTypes.DATE,
        allowNull: false,
        field: 'scanned_at',
      },
      score: {
        type: DataTypes.INTEGER,
        allowNull: false,
        validate: { min: 0 },
      },
      band: {
        type: DataTypes.STRING(10),
        allowNull: false,
        validate: {
          isIn: [[...RISK_BANDS]],
        },
      },
      factors: {
        type: DataTypes.JSON,
        allowNull: false,
      },
      detections: {
        type: DataTypes.JSON,
        allowNull: false,
        defaultValue: [],
      },
      recommendations: {
        type: DataTypes.JSON,
        allowNull: false,
        defaultValue: [],
      },
      createdAt: {
        type: DataTypes.DATE,
        allowNull: false,
        field: 'created_at',
      },
      updatedAt: {
        type: DataTypes.DATE,
        allowNull: false,
        field: 'updated_at',
      },
    },
    {
      tableName: 'content_items',
      underscored: true,
      timestamps: true,
      indexes: [
        { fields: ['identity_id'] },
        { fields: ['scanned_at'] },
      ],
    },
  );
}
