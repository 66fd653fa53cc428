import type {
  Sequelize,
  Model,
  ModelStatic,
  CreationOptional,
  InferAttributes,
  InferCreationAttributes,
  QueryInterface,
  DataTypes as DataTypesType,
} from 'sequelize';
import type { Logger, RiskBand, RiskFactors, SignalTag } from '@riskscan/core';

/** Credentials returned by a successful code exchange */
export interface IdentityCredentials {
  accessToken: string;
  /** Null when the provider issued no refresh token */
  refreshToken: string | null;
  /** Null when the provider gave no lifetime */
  expiresAt: Date | null;
}

/** Profile fields; empty or missing values never overwrite stored ones */
export interface IdentityProfile {
  displayName?: string | null;
  avatarUrl?: string | null;
}

/** A connected account as stored in the `identities` table */
export interface IdentityAttributes {
  id: number;
  /** Provider-assigned account id (open_id) */
  externalId: string;
  accessToken: string;
  refreshToken: string | null;
  expiresAt: Date | null;
  displayName: string | null;
  avatarUrl: string | null;
  createdAt: Date;
  updatedAt: Date;
}

/** A scored content item as stored in the `content_items` table */
export interface ContentItemAttributes {
  id: number;
  /** Provider-assigned item id; globally unique */
  externalItemId: string;
  identityId: number;
  caption: string | null;
  coverUrl: string | null;
  createdAtRemote: Date | null;
  shareUrl: string | null;
  scannedAt: Date;
  score: number;
  band: RiskBand;
  factors: RiskFactors;
  detections: SignalTag[];
  recommendations: string[];
  createdAt: Date;
  updatedAt: Date;
}

/** Identity model instance */
export interface IdentityInstance
  extends Model<InferAttributes<IdentityInstance>, InferCreationAttributes<IdentityInstance>>,
    IdentityAttributes {
  id: CreationOptional<number>;
  createdAt: CreationOptional<Date>;
  updatedAt: CreationOptional<Date>;
}

/** Content item model instance */
export interface ContentItemInstance
  extends Model<InferAttributes<ContentItemInstance>, InferCreationAttributes<ContentItemInstance>>,
    ContentItemAttributes {
  id: CreationOptional<number>;
  createdAt: CreationOptional<Date>;
  updatedAt: CreationOptional<Date>;
}

export type IdentityModel = ModelStatic<IdentityInstance>;
export type ContentItemModel = ModelStatic<ContentItemInstance>;

/** Plain identity row, detached from Sequelize */
export type IdentityRecord = IdentityAttributes;

/** Plain content item row, detached from Sequelize */
export type ContentItemRecord = ContentItemAttributes;

/** A scored item ready to insert */
export type NewContentItem = Omit<ContentItemAttributes, 'id' | 'createdAt' | 'updatedAt'>;

/** `duplicate` means the unique index already held the external item id */
export type InsertOutcome = 'inserted' | 'duplicate';

export interface ContentListOptions {
  offset: number;
  limit: number;
}

export interface ContentListResult {
  rows: ContentItemRecord[];
  /** Count of all rows, not just this page */
  total: number;
}

export interface IdentityRepository {
  /**
   * Insert or update the identity for `externalId` inside one transaction.
   * Tokens are always overwritten; profile fields only by non-empty strings.
   */
  upsert(
    externalId: string,
    credentials: IdentityCredentials,
    profile: IdentityProfile,
  ): Promise<IdentityRecord>;
  /** The identity with the highest id, or null when none is connected */
  mostRecentlyConnected(): Promise<IdentityRecord | null>;
  findById(id: number): Promise<IdentityRecord | null>;
  findByExternalId(externalId: string): Promise<IdentityRecord | null>;
}

export interface ContentRepository {
  /** Subset of `externalItemIds` already stored */
  findExistingIds(externalItemIds: string[]): Promise<Set<string>>;
  insert(item: NewContentItem): Promise<InsertOutcome>;
  /** Newest scan first */
  list(options: ContentListOptions): Promise<ContentListResult>;
  findByExternalId(externalItemId: string): Promise<ContentItemRecord | null>;
}

/** Configuration for creating the store */
export interface StoreConfig {
  /** Sequelize instance connected to the database */
  database: Sequelize;
  logger?: Logger;
}

export interface Store {
  identities: IdentityRepository;
  content: ContentRepository;
}

/** Migration interface for consumers */
export interface StoreMigrations {
  up(queryInterface: QueryInterface, DataTypes: typeof DataTypesType): Promise<void>;
  down(queryInterface: QueryInterface): Promise<void>;
}
