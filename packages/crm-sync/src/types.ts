/**
 * CRM Sync - Log Event Types
 *
 * Structured log events emitted by the sync services.
 *
 * @module types
 */

import type { CRMSystem } from '@meetsync/lib';
import type { CRMSyncStatus, SyncOperation, SyncRecordStatus } from './contracts';

// ===========================================
// Log Events
// ===========================================

export type LogEventType =
  | 'sync_requested'
  | 'sync_completed'
  | 'sync_failed'
  | 'tasks_synced'
  | 'token_acquired'
  | 'rate_limited'
  | 'request_retried'
  | 'crm_updates_approved'
  | 'sync_record_updated'
  | 'operation_tracked';

interface BaseLogEvent {
  event: LogEventType;
  timestamp: string;
}

export interface SyncRequestedEvent extends BaseLogEvent {
  event: 'sync_requested';
  validation_session_id: string;
  crm_system: CRMSystem;
  operation: SyncOperation;
}

export interface SyncCompletedEvent extends BaseLogEvent {
  event: 'sync_completed';
  validation_session_id: string;
  crm_system: CRMSystem;
  operation: SyncOperation;
  crm_record_id: string;
  cached: boolean;
  duration_ms: number;
}

export interface SyncFailedEvent extends BaseLogEvent {
  event: 'sync_failed';
  validation_session_id: string;
  crm_system: CRMSystem;
  operation: SyncOperation;
  error_code: string;
  error_message: string;
  retry_count: number;
}

export interface TasksSyncedEvent extends BaseLogEvent {
  event: 'tasks_synced';
  validation_session_id: string;
  crm_system: CRMSystem;
  tasks_created: number;
  tasks_failed: number;
}

export interface TokenAcquiredEvent extends BaseLogEvent {
  event: 'token_acquired';
  crm_system: CRMSystem;
  expires_at: string;
}

export interface RateLimitedEvent extends BaseLogEvent {
  event: 'rate_limited';
  crm_system: CRMSystem;
  wait_ms: number;
  source: 'local_quota' | 'remote_429';
}

export interface RequestRetriedEvent extends BaseLogEvent {
  event: 'request_retried';
  crm_system: CRMSystem;
  method: string;
  url: string;
  attempt: number;
  delay_ms: number;
  reason: string;
}

export interface CRMUpdatesApprovedEvent extends BaseLogEvent {
  event: 'crm_updates_approved';
  validation_session_id: string;
  crm_systems: CRMSystem[];
  records_created: number;
}

export interface SyncRecordUpdatedEvent extends BaseLogEvent {
  event: 'sync_record_updated';
  sync_record_id: string;
  crm_system: CRMSystem;
  from_status: SyncRecordStatus;
  to_status: SyncRecordStatus;
}

export interface OperationTrackedEvent extends BaseLogEvent {
  event: 'operation_tracked';
  tracking_id: string;
  meeting_id: string;
  operation: SyncOperation;
  status: CRMSyncStatus;
}

export type LogEvent =
  | SyncRequestedEvent
  | SyncCompletedEvent
  | SyncFailedEvent
  | TasksSyncedEvent
  | TokenAcquiredEvent
  | RateLimitedEvent
  | RequestRetriedEvent
  | CRMUpdatesApprovedEvent
  | SyncRecordUpdatedEvent
  | OperationTrackedEvent;
