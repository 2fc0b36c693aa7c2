/**
 * Repositories
 *
 * Persistence for validation sessions and sync records, stored as JSON
 * documents in the cache store (Upstash Redis in production, memory in
 * tests and local runs) with set-based indexes.
 *
 * Key patterns:
 * - meetsync:session:{id}                       - validation session
 * - meetsync:sessions                           - set of session ids
 * - meetsync:sync-record:{id}                   - sync record
 * - meetsync:sync-record:pair:{session}:{crm}   - record id for the pair
 * - meetsync:session-records:{session}          - set of record ids
 *
 * @module store/repositories
 */

import { randomUUID } from 'crypto';
import { isoNow, systemClock, type CacheStore, type Clock, type CRMSystem } from '@meetsync/lib';
import {
  SyncRecordSchema,
  ValidationSessionSchema,
  type SyncRecord,
  type ValidationSession,
} from '../contracts';
import { ErrorCodes, SyncValidationError, notFound } from '../errors';

// ===========================================
// Interfaces
// ===========================================

export interface ValidationSessionRepository {
  get(id: string): Promise<ValidationSession | null>;
  save(session: ValidationSession): Promise<ValidationSession>;
  /** Distinct meeting ids whose meeting was updated within [start, end] */
  listMeetingIdsUpdatedBetween(start: Date, end: Date): Promise<string[]>;
}

export type NewSyncRecord = Pick<SyncRecord, 'validation_session_id' | 'crm_system'> &
  Partial<
    Pick<SyncRecord, 'sync_status' | 'sync_payload' | 'crm_record_id' | 'error_message' | 'retry_count' | 'synced_at'>
  >;

export type SyncRecordPatch = Partial<
  Pick<SyncRecord, 'sync_status' | 'crm_record_id' | 'error_message' | 'retry_count' | 'sync_payload' | 'synced_at'>
>;

export interface SyncRecordRepository {
  get(id: string): Promise<SyncRecord | null>;
  findBySessionAndSystem(sessionId: string, system: CRMSystem): Promise<SyncRecord | null>;
  listBySession(sessionId: string): Promise<SyncRecord[]>;
  /** Fails when a record already exists for the pair */
  create(input: NewSyncRecord): Promise<SyncRecord>;
  update(id: string, patch: SyncRecordPatch): Promise<SyncRecord>;
}

// ===========================================
// Key Builders
// ===========================================

const KEY_PREFIX = 'meetsync';

export const storeKeys = {
  session: (id: string) => `${KEY_PREFIX}:session:${id}`,
  sessionIndex: () => `${KEY_PREFIX}:sessions`,
  syncRecord: (id: string) => `${KEY_PREFIX}:sync-record:${id}`,
  syncRecordPair: (sessionId: string, system: CRMSystem) =>
    `${KEY_PREFIX}:sync-record:pair:${sessionId}:${system}`,
  sessionRecords: (sessionId: string) => `${KEY_PREFIX}:session-records:${sessionId}`,
};

// ===========================================
// Validation Sessions
// ===========================================

export class CacheValidationSessionRepository implements ValidationSessionRepository {
  constructor(private readonly cache: CacheStore) {}

  async get(id: string): Promise<ValidationSession | null> {
    const raw = await this.cache.get(storeKeys.session(id));
    if (raw === null || raw === undefined) return null;

    const parsed = ValidationSessionSchema.safeParse(raw);
    if (!parsed.success) {
      throw new SyncValidationError(`Stored validation session ${id} is malformed`, ErrorCodes.INVALID_STATE, {
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }
    return parsed.data;
  }

  async save(session: ValidationSession): Promise<ValidationSession> {
    await this.cache.set(storeKeys.session(session.id), session);
    await this.cache.addToSet(storeKeys.sessionIndex(), session.id);
    return session;
  }

  async listMeetingIdsUpdatedBetween(start: Date, end: Date): Promise<string[]> {
    const ids = await this.cache.getSetMembers(storeKeys.sessionIndex());
    const meetingIds = new Set<string>();

    for (const id of ids) {
      const session = await this.get(id);
      if (!session) continue;
      const updatedAt = Date.parse(session.meeting.updated_at);
      if (updatedAt >= start.getTime() && updatedAt <= end.getTime()) {
        meetingIds.add(session.meeting.id);
      }
    }

    return [...meetingIds];
  }
}

// ===========================================
// Sync Records
// ===========================================

export interface SyncRecordRepositoryDependencies {
  clock?: Clock;
  generateId?: () => string;
}

export class CacheSyncRecordRepository implements SyncRecordRepository {
  private readonly clock: Clock;
  private readonly generateId: () => string;

  constructor(
    private readonly cache: CacheStore,
    deps: SyncRecordRepositoryDependencies = {}
  ) {
    this.clock = deps.clock ?? systemClock;
    this.generateId = deps.generateId ?? (() => randomUUID());
  }

  async get(id: string): Promise<SyncRecord | null> {
    const raw = await this.cache.get(storeKeys.syncRecord(id));
    if (raw === null || raw === undefined) return null;

    const parsed = SyncRecordSchema.safeParse(raw);
    if (!parsed.success) {
      throw new SyncValidationError(`Stored sync record ${id} is malformed`, ErrorCodes.INVALID_STATE);
    }
    return parsed.data;
  }

  async findBySessionAndSystem(sessionId: string, system: CRMSystem): Promise<SyncRecord | null> {
    const id = await this.cache.get(storeKeys.syncRecordPair(sessionId, system));
    return typeof id === 'string' ? this.get(id) : null;
  }

  async listBySession(sessionId: string): Promise<SyncRecord[]> {
    const ids = await this.cache.getSetMembers(storeKeys.sessionRecords(sessionId));
    const records: SyncRecord[] = [];
    for (const id of ids) {
      const record = await this.get(id);
      if (record) records.push(record);
    }
    return records.sort((a, b) => a.created_at.localeCompare(b.created_at) || a.crm_system.localeCompare(b.crm_system));
  }

  async create(input: NewSyncRecord): Promise<SyncRecord> {
    const existing = await this.findBySessionAndSystem(input.validation_session_id, input.crm_system);
    if (existing) {
      throw new SyncValidationError(
        `Sync record for ${input.validation_session_id}/${input.crm_system} already exists`,
        ErrorCodes.INVALID_STATE,
        { sync_record_id: existing.id }
      );
    }

    const now = isoNow(this.clock);
    const record: SyncRecord = {
      id: this.generateId(),
      validation_session_id: input.validation_session_id,
      crm_system: input.crm_system,
      sync_status: input.sync_status ?? 'pending',
      crm_record_id: input.crm_record_id ?? '',
      error_message: input.error_message ?? '',
      retry_count: input.retry_count ?? 0,
      sync_payload: input.sync_payload ?? {},
      created_at: now,
      updated_at: now,
      synced_at: input.synced_at ?? null,
    };

    await this.cache.set(storeKeys.syncRecord(record.id), record);
    await this.cache.set(storeKeys.syncRecordPair(record.validation_session_id, record.crm_system), record.id);
    await this.cache.addToSet(storeKeys.sessionRecords(record.validation_session_id), record.id);
    return record;
  }

  async update(id: string, patch: SyncRecordPatch): Promise<SyncRecord> {
    const current = await this.get(id);
    if (!current) {
      throw notFound('Sync record', id);
    }

    const updated: SyncRecord = {
      ...current,
      ...patch,
      // retry_count never decreases
      retry_count: Math.max(current.retry_count, patch.retry_count ?? current.retry_count),
      updated_at: isoNow(this.clock),
    };

    await this.cache.set(storeKeys.syncRecord(id), updated);
    return updated;
  }
}
