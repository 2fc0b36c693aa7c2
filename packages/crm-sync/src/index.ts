/**
 * CRM Sync
 *
 * Pushes validated meeting outcomes to Salesforce, HubSpot, Creatio and
 * SAP C4C, with an approval step, persisted sync records and a tracker
 * for dashboards and health.
 *
 * @module crm-sync
 */

export * from './contracts';
export * from './errors';
export * from './clients';
export * from './store';
export type * from './types';
export { calculateDelay, parseRetryAfterMs, DEFAULT_RETRY_CONFIG, type RetryConfig } from './backoff';
export { SyncLogger, createLogger, getLogger, setLogger, type LoggerConfig, type LogLevel } from './logger';
export {
  SlackSyncNotifier,
  formatSyncFailureBlocks,
  DEFAULT_SLACK_NOTIFIER_CONFIG,
  type SyncFailureNotice,
  type SyncNotifier,
  type SlackNotifierConfig,
} from './notifier';
export {
  SyncTracker,
  createSyncTracker,
  classifyHealth,
  DEFAULT_SYNC_TRACKER_CONFIG,
  type SyncTrackerConfig,
  type MeetingActivitySource,
  type TrackDetails,
} from './sync-tracker';
export {
  CRMSyncService,
  createCRMSyncService,
  buildMeetingData,
  DEFAULT_CRM_SYNC_CONFIG,
  type CRMClientRegistry,
  type CRMSyncServiceConfig,
  type CRMSyncServiceDependencies,
  type OpportunityUpdateRequest,
  type OperationRetryResult,
} from './crm-service';
export {
  CRMApprovalService,
  createCRMApprovalService,
  analyzeChanges,
  type ApprovalSummary,
  type ChangesSummary,
  type SessionCrmSyncStatus,
} from './approval-service';
export { loadConfig, type AppConfig, type Env } from './config';
export { createSyncServices, type SyncServices, type SyncServiceOverrides } from './services';
