/**
 * Full Integration Example: Express + RiskScan
 *
 * Wires every @riskscan package together:
 * - Store (Sequelize; in-memory SQLite unless DATABASE_URL is set)
 * - OAuth login with PKCE (Redis session store when REDIS_URL is set)
 * - Content ingestion and scoring
 * - Content queries and direct-upload scans
 *
 * Run:
 *   npx tsx index.ts
 *
 * Environment (a .env file is read if present):
 *   RISKSCAN_CLIENT_KEY, RISKSCAN_CLIENT_SECRET, RISKSCAN_REDIRECT_URI
 *   PORT, DATABASE_URL, REDIS_URL, LOG_LEVEL
 */
import 'dotenv/config';
import express from 'express';
import { Sequelize, DataTypes } from 'sequelize';
import { Redis } from 'ioredis';

import { createLogger, describeError, isLogLevel } from '@riskscan/core';
import { createStore, storeMigrations } from '@riskscan/store';
import {
  MemorySessionStore,
  RedisSessionStore,
  createAuthorizationFlow,
  createTokenClient,
  loadOAuthConfig,
} from '@riskscan/oauth';
import type { SessionStore } from '@riskscan/oauth';
import {
  createContentClient,
  createContentQuery,
  createIngestionPipeline,
  createRiskScanRouter,
} from '@riskscan/ingestion';

// ── Configuration ──────────────────────────────────────────────

const PORT = Number(process.env['PORT']) || 3000;
const DB_URL = process.env['DATABASE_URL'] || 'sqlite::memory:';
const REDIS_URL = process.env['REDIS_URL'] ?? '';
const LOG_LEVEL = process.env['LOG_LEVEL'] ?? 'info';
const SWEEP_INTERVAL_MS = 60_000;

const logger = createLogger({ name: 'riskscan', level: isLogLevel(LOG_LEVEL) ? LOG_LEVEL : 'info' });

// ── Database ───────────────────────────────────────────────────

const sequelize = new Sequelize(DB_URL, { logging: false });

// ── Initialize Services ────────────────────────────────────────

async function bootstrap() {
  // 1. Run migrations
  await sequelize.authenticate();
  await storeMigrations.up(sequelize.getQueryInterface(), DataTypes);
  logger.info('Database ready', { dialect: sequelize.getDialect() });

  // 2. Repositories
  const store = createStore({ database: sequelize, logger });

  // 3. OAuth
  const config = loadOAuthConfig();
  let sessions: SessionStore;
  let redisSessions: RedisSessionStore | null = null;
  if (REDIS_URL) {
    redisSessions = new RedisSessionStore({ redis: new Redis(REDIS_URL), ttlMs: config.sessionTtlMs });
    sessions = redisSessions;
  } else {
    const memory = new MemorySessionStore({ ttlMs: config.sessionTtlMs });
    setInterval(() => {
      memory.sweep().catch((err: unknown) => {
        logger.warn('Session sweep failed', { error: describeError(err) });
      });
    }, SWEEP_INTERVAL_MS).unref();
    sessions = memory;
  }

  const auth = createAuthorizationFlow({
    config,
    sessions,
    tokens: createTokenClient({ config, logger }),
    identities: store.identities,
    logger,
  });

  // 4. Ingestion and queries
  const pipeline = createIngestionPipeline({
    client: createContentClient({ config, logger }),
    identities: store.identities,
    content: store.content,
    logger,
  });
  const query = createContentQuery(store.content);

  // ── Express App ────────────────────────────────────────────────

  const app = express();
  app.use('/', createRiskScanRouter({ auth, pipeline, query, logger }));

  const server = app.listen(PORT, () => {
    logger.info('RiskScan example running', {
      port: PORT,
      sessionStore: REDIS_URL ? 'redis' : 'memory',
      oauth: auth.configStatus(),
    });
  });

  // ── Shutdown ───────────────────────────────────────────────────

  const shutdown = async (signal: string) => {
    logger.info('Shutting down', { signal });
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
    if (redisSessions) await redisSessions.close();
    await sequelize.close();
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        logger.error('Shutdown failed', { error: describeError(err) });
        process.exitCode = 1;
      });
    });
  }
}

bootstrap().catch((err: unknown) => {
  logger.error('Failed to start', { error: describeError(err) });
  process.exit(1);
});
