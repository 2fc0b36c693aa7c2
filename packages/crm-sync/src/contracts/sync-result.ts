/**
 * Sync Result Contracts
 *
 * Outcomes returned by the orchestrator, and the operation entries kept by
 * the sync tracker.
 *
 * @module contracts/sync-result
 */

import { z } from 'zod';
import type { CRMSystem } from '@meetsync/lib';
import {
  CRMSyncStatusSchema,
  SyncOperationSchema,
  type CRMSyncStatus,
} from './sync-record';

// ===========================================
// Sync Results
// ===========================================

export interface CRMSyncResult {
  status: CRMSyncStatus;
  message: string;
  crm_record_id?: string;
  error_details?: Record<string, unknown>;
  retry_count: number;
}

export interface TaskSyncResult extends CRMSyncResult {
  action_item: string;
}

export type MultiCRMSyncResult = Partial<Record<CRMSystem, CRMSyncResult>>;

export interface BulkSyncResult {
  meeting_sync: CRMSyncResult;
  task_sync: TaskSyncResult[];
  opportunity_sync?: CRMSyncResult;
}

export interface OpportunitySuggestions {
  suggested_stages: string[];
  probability_adjustment: number;
  next_steps: string;
  follow_up_required: boolean;
}

// ===========================================
// Tracked Operations
// ===========================================

export const TrackedOperationSchema = z.object({
  tracking_id: z.string(),
  meeting_id: z.string(),
  operation: SyncOperationSchema,
  status: CRMSyncStatusSchema,
  timestamp: z.string(),
  details: z.record(z.unknown()),
  retry_count: z.number().int().nonnegative(),
  error_message: z.string().nullable(),
  crm_record_ids: z.array(z.string()),
});
export type TrackedOperation = z.infer<typeof TrackedOperationSchema>;

export interface MeetingSyncStatus {
  meeting_id: string;
  operations: TrackedOperation[];
  summary: {
    total_operations: number;
    successful: number;
    failed: number;
    pending: number;
    last_sync: string | null;
  };
}

export type HealthStatus = 'healthy' | 'warning' | 'critical' | 'unknown';

export interface SyncHealthMetrics {
  health_status: HealthStatus;
  recent_meetings: number;
  recent_failures: number;
  failure_rate: number;
  last_updated: string;
  error?: string;
}

export interface SyncReport {
  report_period: { start_date: string; end_date: string };
  total_meetings: number;
  meetings_with_sync: number;
  total_operations: number;
  successful_operations: number;
  failed_operations: number;
  success_rate: number;
  operation_breakdown: Record<string, { total: number; successful: number; failed: number }>;
  error_summary: Record<string, number>;
}
