/**
 * Store
 *
 * @module store
 */

export {
  CacheValidationSessionRepository,
  CacheSyncRecordRepository,
  storeKeys,
  type ValidationSessionRepository,
  type SyncRecordRepository,
  type SyncRecordRepositoryDependencies,
  type NewSyncRecord,
  type SyncRecordPatch,
} from './repositories';
