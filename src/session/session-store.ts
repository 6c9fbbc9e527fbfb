import Redis from 'ioredis';
import { SessionRecord } from '../config/types';
import { SessionStore } from './types';
import { PersistenceError } from '../orchestrator/errors';
import { env } from '../config/env';
import { logger } from '../observability/logger';

const SESSION_TTL = () => env.session.ttlDays * 24 * 60 * 60;

/**
 * Redis-backed session store.
 * One JSON document per session, written with a single SET so a turn is
 * either fully stored or not at all.
 */
export class RedisSessionStore implements SessionStore {
  private redis: Redis;
  private prefix: string;

  constructor(redis: Redis) {
    this.redis = redis;
    this.prefix = `${env.redis.keyPrefix}session:`;
  }

  private key(sessionId: string): string {
    return `${this.prefix}${sessionId}`;
  }

  async get(sessionId: string): Promise<SessionRecord | null> {
    let raw: string | null;
    try {
      raw = await this.redis.get(this.key(sessionId));
    } catch (err) {
      logger.error({ err, sessionId }, 'Failed to read session from Redis');
      throw new PersistenceError(sessionId, 'Session could not be loaded', { cause: err });
    }
    if (!raw) return null;

    try {
      return JSON.parse(raw) as SessionRecord;
    } catch (err) {
      logger.error({ err, sessionId }, 'Stored session is not valid JSON');
      throw new PersistenceError(sessionId, 'Stored session is corrupt', { cause: err });
    }
  }

  async save(record: SessionRecord): Promise<void> {
    const payload = JSON.stringify(record);
    const ttl = SESSION_TTL();
    try {
      if (ttl > 0) {
        await this.redis.set(this.key(record.sessionId), payload, 'EX', ttl);
      } else {
        await this.redis.set(this.key(record.sessionId), payload);
      }
    } catch (err) {
      logger.error({ err, sessionId: record.sessionId }, 'Failed to save session to Redis');
      throw new PersistenceError(record.sessionId, 'Session could not be saved', { cause: err });
    }
  }
}

/**
 * In-memory session store (dev/test fallback).
 * Keeps serialized copies so callers never share objects with the store.
 */
export class InMemorySessionStore implements SessionStore {
  private store: Map<string, string> = new Map();

  async get(sessionId: string): Promise<SessionRecord | null> {
    const raw = this.store.get(sessionId);
    return raw ? (JSON.parse(raw) as SessionRecord) : null;
  }

  async save(record: SessionRecord): Promise<void> {
    this.store.set(record.sessionId, JSON.stringify(record));
  }

  get size(): number {
    return this.store.size;
  }
}

/**
 * Create the appropriate store based on environment.
 */
export function createSessionStore(redis?: Redis): SessionStore {
  if (redis) {
    return new RedisSessionStore(redis);
  }
  logger.warn('Using in-memory session store (no Redis)');
  return new InMemorySessionStore();
}
