/**
 * Cache Store
 *
 * Key/value + set storage shared by the sync cache, the operation tracker
 * and the document repositories. Backed by Upstash Redis when credentials
 * are configured, otherwise by an in-process map with TTL support.
 *
 * Values are JSON; readers validate what they get back.
 *
 * @module cache
 */

import { Redis } from '@upstash/redis';
import { systemClock, type Clock } from './clock';

// ===========================================
// Interface
// ===========================================

export type CacheBackend = 'redis' | 'memory';

export interface CacheStore {
  readonly backend: CacheBackend;

  /** Returns the decoded JSON value, or null when missing or expired */
  get(key: string): Promise<unknown>;

  set(key: string, value: unknown, ttlSeconds?: number): Promise<void>;

  delete(key: string): Promise<void>;

  /** Add a member to a set; refreshes the set TTL when given */
  addToSet(key: string, member: string, ttlSeconds?: number): Promise<void>;

  getSetMembers(key: string): Promise<string[]>;
}

// ===========================================
// Upstash Redis
// ===========================================

export interface RedisCacheConfig {
  url: string;
  token: string;
}

export class RedisCacheStore implements CacheStore {
  readonly backend = 'redis' as const;
  private readonly redis: Redis;

  constructor(config: RedisCacheConfig | Redis) {
    this.redis = config instanceof Redis ? config : new Redis({ url: config.url, token: config.token });
  }

  async get(key: string): Promise<unknown> {
    return this.redis.get<unknown>(key);
  }

  async set(key: string, value: unknown, ttlSeconds?: number): Promise<void> {
    if (ttlSeconds) {
      await this.redis.set(key, value, { ex: ttlSeconds });
    } else {
      await this.redis.set(key, value);
    }
  }

  async delete(key: string): Promise<void> {
    await this.redis.del(key);
  }

  async addToSet(key: string, member: string, ttlSeconds?: number): Promise<void> {
    const pipeline = this.redis.pipeline();
    pipeline.sadd(key, member);
    if (ttlSeconds) {
      pipeline.expire(key, ttlSeconds);
    }
    await pipeline.exec();
  }

  async getSetMembers(key: string): Promise<string[]> {
    const members = await this.redis.smembers(key);
    return members.map((member) => String(member));
  }

  /**
   * Ping Redis to verify connection.
   */
  async ping(): Promise<boolean> {
    const result = await this.redis.ping();
    return result === 'PONG';
  }
}

// ===========================================
// In-Memory
// ===========================================

interface MemoryEntry {
  value: unknown;
  expiresAt: number | null;
}

export class MemoryCacheStore implements CacheStore {
  readonly backend = 'memory' as const;
  private readonly values = new Map<string, MemoryEntry>();
  private readonly sets = new Map<string, { members: Set<string>; expiresAt: number | null }>();
  private readonly clock: Clock;

  constructor(clock: Clock = systemClock) {
    this.clock = clock;
  }

  async get(key: string): Promise<unknown> {
    const entry = this.values.get(key);
    if (!entry) return null;
    if (this.isExpired(entry.expiresAt)) {
      this.values.delete(key);
      return null;
    }
    // Hand out a copy so callers cannot mutate stored state
    return structuredClone(entry.value);
  }

  async set(key: string, value: unknown, ttlSeconds?: number): Promise<void> {
    this.values.set(key, {
      value: structuredClone(value),
      expiresAt: this.expiryFor(ttlSeconds),
    });
  }

  async delete(key: string): Promise<void> {
    this.values.delete(key);
    this.sets.delete(key);
  }

  async addToSet(key: string, member: string, ttlSeconds?: number): Promise<void> {
    let entry = this.sets.get(key);
    if (!entry || this.isExpired(entry.expiresAt)) {
      entry = { members: new Set(), expiresAt: null };
      this.sets.set(key, entry);
    }
    entry.members.add(member);
    if (ttlSeconds) {
      entry.expiresAt = this.expiryFor(ttlSeconds);
    }
  }

  async getSetMembers(key: string): Promise<string[]> {
    const entry = this.sets.get(key);
    if (!entry) return [];
    if (this.isExpired(entry.expiresAt)) {
      this.sets.delete(key);
      return [];
    }
    return [...entry.members];
  }

  /** Number of live keys, sets included */
  size(): number {
    return this.values.size + this.sets.size;
  }

  private expiryFor(ttlSeconds?: number): number | null {
    return ttlSeconds ? this.clock.now() + ttlSeconds * 1000 : null;
  }

  private isExpired(expiresAt: number | null): boolean {
    return expiresAt !== null && this.clock.now() >= expiresAt;
  }
}

// ===========================================
// Factory
// ===========================================

export interface CreateCacheStoreOptions {
  url?: string;
  token?: string;
  clock?: Clock;
}

/**
 * Create the cache store for this process.
 * Falls back to memory when Upstash credentials are absent.
 */
export function createCacheStore(options: CreateCacheStoreOptions = {}): CacheStore {
  if (options.url && options.token) {
    return new RedisCacheStore({ url: options.url, token: options.token });
  }
  return new MemoryCacheStore(options.clock);
}
