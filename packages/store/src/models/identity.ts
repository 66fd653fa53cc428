import { DataTypes } from 'sequelize';
import type { Sequelize } from 'sequelize';
import type { IdentityInstance, IdentityModel } from '../types.js';

/**
 * Define the Identity model on a Sequelize instance.
 * One row per connected provider account, keyed by `externalId`.
 */
export function defineIdentity(sequelize: Sequelize): IdentityModel {
  return sequelize.define<IdentityInstance>(
    'Identity',
    {
      id: {
        type: DataTypes.INTEGER,
        autoIncrement: true,
        primaryKey: true,
      },
      externalId: {
        type: DataTypes.STRING(255),
        allowNull: false,
        unique: true,
        field: 'external_id',
      },
      accessToken: {
        type: DataTypes.TEXT,
        allowNull: false,
        field: 'access_token',
      },
      refreshToken: {
        type: DataTypes.TEXT,
        allowNull: true,
        field: 'refresh_token',
      },
      expiresAt: {
        type: DataTypes.DATE,
        allowNull: true,
        field: 'expires_at',
      },
      displayName: {
        type: DataTypes.STRING(255),
        allowNull: true,
        field: 'display_name',
      },
      avatarUrl: {
        type: DataTypes.TEXT,
        allowNull: true,
        field: 'avatar_url',
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
      tableName: 'identities',
      underscored: true,
      timestamps: true,
    },
  );
}
