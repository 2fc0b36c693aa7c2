/**
 * Sync Tracker
 *
 * Cache-backed, time-windowed log of sync attempts kept alongside the
 * sync records. Feeds dashboards, failed-operation listings and a coarse
 * health score. Entries expire after 24 hours; eviction drops history
 * silently, and writes are best effort.
 *
 * Key patterns:
 * - sync_tracker:operation:{trackingId} - tracked operation
 * - sync_tracker:meeting:{meetingId}    - set of tracking ids
 *
 * @module sync-tracker
 */

import { isoNow, round2, systemClock, type CacheStore, type Clock } from '@meetsync/lib';
import {
  TrackedOperationSchema,
  type CRMSyncStatus,
  type HealthStatus,
  type MeetingSyncStatus,
  type SyncHealthMetrics,
  type SyncOperation,
  type SyncReport,
  type TrackedOperation,
} from './contracts';
import { getErrorMessage } from './errors';
import { getLogger, type SyncLogger } from './logger';

// ===========================================
// Configuration
// ===========================================

export interface SyncTrackerConfig {
  keyPrefix: string;
  ttlSeconds: number;
  /** Window used by health metrics */
  healthWindowHours: number;
  /** Failure rate (%) above which health is `warning` */
  warningThreshold: number;
  /** Failure rate (%) above which health is `critical` */
  criticalThreshold: number;
}

export const DEFAULT_SYNC_TRACKER_CONFIG: SyncTrackerConfig = {
  keyPrefix: 'sync_tracker',
  ttlSeconds: 24 * 60 * 60,
  healthWindowHours: 24,
  warningThreshold: 10,
  criticalThreshold: 20,
};

/** Anything that can tell which meetings changed recently */
export interface MeetingActivitySource {
  listMeetingIdsUpdatedBetween(start: Date, end: Date): Promise<string[]>;
}

export interface SyncTrackerDependencies {
  cache: CacheStore;
  meetings: MeetingActivitySource;
  clock?: Clock;
  logger?: SyncLogger;
}

/** Optional structured details recorded with an operation */
export interface TrackDetails {
  validation_session_id?: string;
  crm_system?: string;
  retry_count?: number;
  error_message?: string | null;
  crm_record_ids?: string[];
  [key: string]: unknown;
}

const HOUR_MS = 60 * 60 * 1000;

// ===========================================
// Health Classification
// ===========================================

/**
 * Classify a failure rate (percent): > critical → critical,
 * > warning → warning, otherwise healthy.
 */
export function classifyHealth(
  failureRate: number,
  thresholds: Pick<SyncTrackerConfig, 'warningThreshold' | 'criticalThreshold'> = DEFAULT_SYNC_TRACKER_CONFIG
): Exclude<HealthStatus, 'unknown'> {
  if (failureRate > thresholds.criticalThreshold) return 'critical';
  if (failureRate > thresholds.warningThreshold) return 'warning';
  return 'healthy';
}

// ===========================================
// Tracker
// ===========================================

export class SyncTracker {
  private readonly config: SyncTrackerConfig;
  private readonly cache: CacheStore;
  private readonly meetings: MeetingActivitySource;
  private readonly clock: Clock;
  private readonly logger: SyncLogger;

  constructor(deps: SyncTrackerDependencies, config?: Partial<SyncTrackerConfig>) {
    this.config = { ...DEFAULT_SYNC_TRACKER_CONFIG, ...config };
    this.cache = deps.cache;
    this.meetings = deps.meetings;
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? getLogger();
  }

  private operationKey(trackingId: string): string {
    return `${this.config.keyPrefix}:operation:${trackingId}`;
  }

  private meetingKey(meetingId: string): string {
    return `${this.config.keyPrefix}:meeting:${meetingId}`;
  }

  // ===========================================
  // Recording
  // ===========================================

  /**
   * Record a sync attempt. Returns the tracking id even when the cache
   * write fails.
   */
  async trackSyncOperation(
    meetingId: string,
    operation: SyncOperation,
    status: CRMSyncStatus,
    details: TrackDetails = {}
  ): Promise<string> {
    let trackingId = `${meetingId}_${operation}_${this.clock.now()}`;
    const timestamp = isoNow(this.clock);

    try {
      trackingId = await this.nextTrackingId(trackingId);
      const entry: TrackedOperation = {
        tracking_id: trackingId,
        meeting_id: meetingId,
        operation,
        status,
        timestamp,
        details,
        retry_count: details.retry_count ?? 0,
        error_message: details.error_message ?? null,
        crm_record_ids: details.crm_record_ids ?? [],
      };
      await this.cache.set(this.operationKey(trackingId), entry, this.config.ttlSeconds);
      await this.cache.addToSet(this.meetingKey(meetingId), trackingId, this.config.ttlSeconds);
      this.logger.operationTracked({ tracking_id: trackingId, meeting_id: meetingId, operation, status });
    } catch (error) {
      this.logger.warn('Failed to track sync operation', {
        tracking_id: trackingId,
        meeting_id: meetingId,
        error: getErrorMessage(error),
      });
    }

    return trackingId;
  }

  private async nextTrackingId(base: string): Promise<string> {
    let candidate = base;
    let suffix = 1;
    // Same meeting and operation within one millisecond
    while ((await this.cache.get(this.operationKey(candidate))) !== null) {
      candidate = `${base}_${suffix++}`;
    }
    return candidate;
  }

  // ===========================================
  // Queries
  // ===========================================

  async getOperation(trackingId: string): Promise<TrackedOperation | null> {
    const raw = await this.cache.get(this.operationKey(trackingId));
    const parsed = TrackedOperationSchema.safeParse(raw);
    return parsed.success ? parsed.data : null;
  }

  /** Tracked operations of a meeting, oldest first */
  async getMeetingOperations(meetingId: string): Promise<TrackedOperation[]> {
    const ids = await this.cache.getSetMembers(this.meetingKey(meetingId));
    const operations: TrackedOperation[] = [];
    for (const id of ids) {
      const operation = await this.getOperation(id);
      if (operation) operations.push(operation);
    }
    return operations.sort((a, b) => a.timestamp.localeCompare(b.timestamp));
  }

  async getSyncStatus(meetingId: string): Promise<MeetingSyncStatus> {
    const operations = await this.getMeetingOperations(meetingId);
    const successful = operations.filter((op) => op.status === 'success').length;
    const failed = operations.filter((op) => op.status === 'failed').length;
    const last = operations[operations.length - 1];

    return {
      meeting_id: meetingId,
      operations,
      summary: {
        total_operations: operations.length,
        successful,
        failed,
        pending: operations.length - successful - failed,
        last_sync: last ? last.timestamp : null,
      },
    };
  }

  /**
   * Failed operations recorded within the last `hoursBack` hours, newest first.
   * Scans meetings updated in the same window.
   */
  async getFailedOperations(hoursBack = 24): Promise<TrackedOperation[]> {
    try {
      return await this.collectFailedOperations(hoursBack);
    } catch (error) {
      this.logger.error('Failed to list failed sync operations', error, { hours_back: hoursBack });
      return [];
    }
  }

  private async collectFailedOperations(hoursBack: number): Promise<TrackedOperation[]> {
    const end = new Date(this.clock.now());
    const start = new Date(end.getTime() - hoursBack * HOUR_MS);
    const meetingIds = await this.meetings.listMeetingIdsUpdatedBetween(start, end);

    const failed: TrackedOperation[] = [];
    for (const meetingId of meetingIds) {
      for (const operation of await this.getMeetingOperations(meetingId)) {
        if (operation.status === 'failed' && Date.parse(operation.timestamp) >= start.getTime()) {
          failed.push(operation);
        }
      }
    }

    return failed.sort((a, b) => b.timestamp.localeCompare(a.timestamp));
  }

  async getSyncHealthMetrics(): Promise<SyncHealthMetrics> {
    const lastUpdated = isoNow(this.clock);

    try {
      const end = new Date(this.clock.now());
      const start = new Date(end.getTime() - this.config.healthWindowHours * HOUR_MS);
      const recentMeetings = (await this.meetings.listMeetingIdsUpdatedBetween(start, end)).length;
      const recentFailures = (await this.collectFailedOperations(this.config.healthWindowHours)).length;
      const failureRate = round2((recentFailures / Math.max(recentMeetings, 1)) * 100);

      return {
        health_status: classifyHealth(failureRate, this.config),
        recent_meetings: recentMeetings,
        recent_failures: recentFailures,
        failure_rate: failureRate,
        last_updated: lastUpdated,
      };
    } catch (error) {
      this.logger.error('Failed to compute sync health metrics', error);
      return {
        health_status: 'unknown',
        recent_meetings: 0,
        recent_failures: 0,
        failure_rate: 0,
        last_updated: lastUpdated,
        error: getErrorMessage(error),
      };
    }
  }

  async generateSyncReport(start: Date, end: Date): Promise<SyncReport> {
    const meetingIds = await this.meetings.listMeetingIdsUpdatedBetween(start, end);
    const report: SyncReport = {
      report_period: { start_date: start.toISOString(), end_date: end.toISOString() },
      total_meetings: meetingIds.length,
      meetings_with_sync: 0,
      total_operations: 0,
      successful_operations: 0,
      failed_operations: 0,
      success_rate: 0,
      operation_breakdown: {},
      error_summary: {},
    };

    for (const meetingId of meetingIds) {
      const operations = (await this.getMeetingOperations(meetingId)).filter((op) => {
        const at = Date.parse(op.timestamp);
        return at >= start.getTime() && at <= end.getTime();
      });
      if (operations.length === 0) continue;
      report.meetings_with_sync++;

      for (const op of operations) {
        const breakdown = (report.operation_breakdown[op.operation] ??= { total: 0, successful: 0, failed: 0 });
        report.total_operations++;
        breakdown.total++;

        if (op.status === 'success') {
          report.successful_operations++;
          breakdown.successful++;
        } else if (op.status === 'failed') {
          report.failed_operations++;
          breakdown.failed++;
          const key = (op.error_message ?? 'Unknown error').slice(0, 100);
          report.error_summary[key] = (report.error_summary[key] ?? 0) + 1;
        }
      }
    }

    report.success_rate =
      report.total_operations > 0 ? round2((report.successful_operations / report.total_operations) * 100) : 0;

    return report;
  }
}

export function createSyncTracker(
  deps: SyncTrackerDependencies,
  config?: Partial<SyncTrackerConfig>
): SyncTracker {
  return new SyncTracker(deps, config);
}
