/**
 * MeetSync Library
 *
 * Shared utilities for the CRM sync packages.
 */

// Types
export * from './types';

// Clock
export { systemClock, isoNow, type Clock } from './clock';

// Cache store (Upstash Redis or in-memory)
export {
  RedisCacheStore,
  MemoryCacheStore,
  createCacheStore,
  type CacheStore,
  type CacheBackend,
  type RedisCacheConfig,
  type CreateCacheStoreOptions,
} from './cache';
