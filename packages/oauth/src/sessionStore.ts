import { SessionNotFoundError, silentLogger } from '@riskscan/core';
import type { Logger } from '@riskscan/core';
import {
  deriveCodeChallenge,
  generateCodeVerifier,
  generateState,
  isValidCodeVerifier,
} from './pkce.js';
import { DEFAULT_SESSION_TTL_MS } from './config.js';
import type {
  CreatedSession,
  MemorySessionStoreOptions,
  PendingSession,
  RedisSessionStoreOptions,
  SessionRedisClient,
  SessionStore,
} from './types.js';

/**
 * Default Redis key prefix for authorization sessions.
 */
const DEFAULT_PREFIX = 'pkce:';

function newSession(): CreatedSession {
  const codeVerifier = generateCodeVerifier();
  return {
    state: generateState(),
    codeVerifier,
    codeChallenge: deriveCodeChallenge(codeVerifier),
  };
}

/**
 * Process-local session store. Expired entries are evicted lazily on access
 * and by `sweep()`.
 */
export class MemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, PendingSession>();
  private readonly ttlMs: number;
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(options: MemorySessionStoreOptions = {}) {
    this.ttlMs = options.ttlMs ?? DEFAULT_SESSION_TTL_MS;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? silentLogger;
  }

  async create(): Promise<CreatedSession> {
    const session = newSession();
    this.sessions.set(session.state, {
      codeVerifier: session.codeVerifier,
      createdAt: this.now(),
    });
    return session;
  }

  /**
   * Lookup and delete happen in one synchronous step; there is no await
   * between them, so concurrent consumers cannot both succeed.
   */
  async consume(state: string): Promise<string> {
    const session = this.sessions.get(state);
    this.sessions.delete(state);

    if (!session) {
      throw new SessionNotFoundError();
    }
    if (this.isExpired(session)) {
      this.logger.info('Authorization session expired', { ageMs: this.now() - session.createdAt });
      throw new SessionNotFoundError();
    }
    return session.codeVerifier;
  }

  async sweep(): Promise<number> {
    let removed = 0;
    for (const [state, session] of this.sessions) {
      if (this.isExpired(session)) {
        this.sessions.delete(state);
        removed++;
      }
    }
    if (removed > 0) {
      this.logger.debug('Swept expired authorization sessions', { removed });
    }
    return removed;
  }

  /** Number of sessions held, expired ones included until evicted */
  size(): number {
    return this.sessions.size;
  }

  private isExpired(session: PendingSession): boolean {
    return this.now() - session.createdAt > this.ttlMs;
  }
}

function isPendingSession(value: unknown): value is PendingSession {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'codeVerifier' in value &&
    typeof value.codeVerifier === 'string' &&
    isValidCodeVerifier(value.codeVerifier) &&
    'createdAt' in value &&
    typeof value.createdAt === 'number'
  );
}

/**
 * Redis-backed session store for multi-process deployments.
 *
 * Sessions are written with `SET ... PX ttl` and redeemed with `GETDEL`,
 * which reads and deletes in one command.
 */
export class RedisSessionStore implements SessionStore {
  private readonly redis: SessionRedisClient;
  private readonly ttlMs: number;
  private readonly prefix: string;
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(options: RedisSessionStoreOptions) {
    this.redis = options.redis;
    this.ttlMs = options.ttlMs ?? DEFAULT_SESSION_TTL_MS;
    this.prefix = options.keyPrefix ?? DEFAULT_PREFIX;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? silentLogger;
  }

  private buildKey(state: string): string {
    return `${this.prefix}${state}`;
  }

  async create(): Promise<CreatedSession> {
    const session = newSession();
    const payload: PendingSession = { codeVerifier: session.codeVerifier, createdAt: this.now() };
    await this.redis.set(this.buildKey(session.state), JSON.stringify(payload), 'PX', this.ttlMs);
    return session;
  }

  async consume(state: string): Promise<string> {
    const raw = await this.redis.getdel(this.buildKey(state));
    if (raw === null) {
      throw new SessionNotFoundError();
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      this.logger.warn('Unreadable authorization session', { error: String(err) });
      throw new SessionNotFoundError();
    }

    if (!isPendingSession(parsed)) {
      this.logger.warn('Malformed authorization session');
      throw new SessionNotFoundError();
    }
    if (this.now() - parsed.createdAt > this.ttlMs) {
      throw new SessionNotFoundError();
    }
    return parsed.codeVerifier;
  }

  /** Redis expires keys itself */
  async sweep(): Promise<number> {
    return 0;
  }

  /** Close the Redis connection */
  async close(): Promise<void> {
    await this.redis.quit();
  }
}
