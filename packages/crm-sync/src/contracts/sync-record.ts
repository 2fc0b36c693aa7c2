/**
 * Sync Record Contracts
 *
 * Persisted per-(validation session, CRM system) sync state, and the status
 * vocabularies used for results and tracked operations.
 *
 * @module contracts/sync-record
 */

import { z } from 'zod';
import { CRM_SYSTEMS } from '@meetsync/lib';

// ===========================================
// Enums
// ===========================================

export const CRMSystemSchema = z.enum(CRM_SYSTEMS);

/** Persisted sync record lifecycle */
export const SyncRecordStatusSchema = z.enum([
  'pending',
  'in_progress',
  'completed',
  'failed',
  'retrying',
]);
export type SyncRecordStatus = z.infer<typeof SyncRecordStatusSchema>;

/** Status reported by sync results and tracked operations */
export const CRMSyncStatusSchema = z.enum(['pending', 'in_progress', 'success', 'failed', 'retry']);
export type CRMSyncStatus = z.infer<typeof CRMSyncStatusSchema>;

export const SyncOperationSchema = z.enum(['meeting_outcome', 'follow_up_tasks', 'lead_update']);
export type SyncOperation = z.infer<typeof SyncOperationSchema>;

// ===========================================
// Sync Record
// ===========================================

export const SyncRecordSchema = z.object({
  id: z.string().min(1),
  validation_session_id: z.string().min(1),
  crm_system: CRMSystemSchema,
  sync_status: SyncRecordStatusSchema,
  /** Remote record id, empty until the CRM reports one */
  crm_record_id: z.string(),
  /** Empty when the last attempt succeeded */
  error_message: z.string(),
  retry_count: z.number().int().nonnegative(),
  /** Exact data sent (or to be sent) to the CRM */
  sync_payload: z.record(z.unknown()),
  created_at: z.string(),
  updated_at: z.string(),
  synced_at: z.string().nullable(),
});
export type SyncRecord = z.infer<typeof SyncRecordSchema>;

/** Summary returned by status lookups */
export interface SyncRecordSummary {
  status: SyncRecordStatus;
  crm_record_id: string;
  last_sync: string | null;
  error_message: string;
  retry_count: number;
}

export function summarizeSyncRecord(record: SyncRecord): SyncRecordSummary {
  return {
    status: record.sync_status,
    crm_record_id: record.crm_record_id,
    last_sync: record.synced_at,
    error_message: record.error_message,
    retry_count: record.retry_count,
  };
}
