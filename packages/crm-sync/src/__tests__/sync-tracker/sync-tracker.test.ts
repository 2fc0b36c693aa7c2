/**
 * Sync Tracker Tests
 *
 * @module __tests__/sync-tracker
 */

import { describe, test, expect, beforeEach, vi } from 'vitest';
import { MemoryCacheStore } from '@meetsync/lib';
import { VirtualClock } from '@meetsync/lib/testing';
import { createLogger } from '../../logger';
import { SyncTracker, classifyHealth, type MeetingActivitySource } from '../../sync-tracker';

// ===========================================
// Test Fixtures
// ===========================================

const START = Date.UTC(2024, 0, 15, 9, 0, 0);
const HOUR = 3_600_000;

function meetingsSource(ids: string[]): MeetingActivitySource {
  return { listMeetingIdsUpdatedBetween: async () => ids };
}

function tenMeetings(): string[] {
  return Array.from({ length: 10 }, (_, i) => `m${i + 1}`);
}

describe('classifyHealth', () => {
  test('uses strict thresholds at 10 and 20 percent', () => {
    expect(classifyHealth(0)).toBe('healthy');
    expect(classifyHealth(10)).toBe('healthy');
    expect(classifyHealth(10.01)).toBe('warning');
    expect(classifyHealth(20)).toBe('warning');
    expect(classifyHealth(20.01)).toBe('critical');
  });
});

describe('SyncTracker', () => {
  let clock: VirtualClock;
  let cache: MemoryCacheStore;

  function createTracker(meetings: MeetingActivitySource = meetingsSource(tenMeetings())) {
    return new SyncTracker({ cache, meetings, clock, logger: createLogger({ level: 'error' }) });
  }

  beforeEach(() => {
    clock = new VirtualClock(START);
    cache = new MemoryCacheStore(clock);
  });

  // ===========================================
  // Recording
  // ===========================================

  describe('trackSyncOperation', () => {
    test('stores the operation under a meeting/operation/time id', async () => {
      const tracker = createTracker();

      const id = await tracker.trackSyncOperation('m1', 'meeting_outcome', 'success', {
        crm_system: 'salesforce',
        crm_record_ids: ['lead-001'],
      });

      expect(id).toBe(`m1_meeting_outcome_${START}`);
      expect(await tracker.getOperation(id)).toEqual({
        tracking_id: id,
        meeting_id: 'm1',
        operation: 'meeting_outcome',
        status: 'success',
        timestamp: '2024-01-15T09:00:00.000Z',
        details: { crm_system: 'salesforce', crm_record_ids: ['lead-001'] },
        retry_count: 0,
        error_message: null,
        crm_record_ids: ['lead-001'],
      });
    });

    test('keeps ids unique within the same millisecond', async () => {
      const tracker = createTracker();

      const first = await tracker.trackSyncOperation('m1', 'follow_up_tasks', 'success');
      const second = await tracker.trackSyncOperation('m1', 'follow_up_tasks', 'failed');

      expect(first).toBe(`m1_follow_up_tasks_${START}`);
      expect(second).toBe(`m1_follow_up_tasks_${START}_1`);
    });

    test('forgets operations after 24 hours', async () => {
      const tracker = createTracker();
      const id = await tracker.trackSyncOperation('m1', 'meeting_outcome', 'success');

      clock.advance(24 * HOUR);

      expect(await tracker.getOperation(id)).toBeNull();
      expect((await tracker.getSyncStatus('m1')).operations).toEqual([]);
    });

    test('returns the base id without throwing when the cache is unreachable', async () => {
      const tracker = createTracker();
      vi.spyOn(cache, 'get').mockRejectedValue(new Error('redis unavailable'));
      const set = vi.spyOn(cache, 'set');

      const id = await tracker.trackSyncOperation('m1', 'meeting_outcome', 'success');

      expect(id).toBe(`m1_meeting_outcome_${START}`);
      expect(set).not.toHaveBeenCalled();
    });
  });

  // ===========================================
  // Queries
  // ===========================================

  describe('getSyncStatus', () => {
    test('summarizes the meeting operations', async () => {
      const tracker = createTracker();
      await tracker.trackSyncOperation('m1', 'meeting_outcome', 'failed', { error_message: 'boom' });
      clock.advance(1_000);
      await tracker.trackSyncOperation('m1', 'meeting_outcome', 'success');
      clock.advance(1_000);
      await tracker.trackSyncOperation('m1', 'follow_up_tasks', 'in_progress');

      const status = await tracker.getSyncStatus('m1');

      expect(status.operations.map((op) => op.status)).toEqual(['failed', 'success', 'in_progress']);
      expect(status.summary).toEqual({
        total_operations: 3,
        successful: 1,
        failed: 1,
        pending: 1,
        last_sync: '2024-01-15T09:00:02.000Z',
      });
    });
  });

  describe('getFailedOperations', () => {
    test('lists failures inside the window, newest first', async () => {
      const tracker = createTracker(meetingsSource(['m1', 'm2']));
      await tracker.trackSyncOperation('m1', 'meeting_outcome', 'failed');
      clock.advance(2 * HOUR);
      await tracker.trackSyncOperation('m1', 'lead_update', 'failed');
      clock.advance(1_000);
      await tracker.trackSyncOperation('m2', 'meeting_outcome', 'failed');
      await tracker.trackSyncOperation('m2', 'follow_up_tasks', 'success');

      const failed = await tracker.getFailedOperations(1);

      expect(failed.map((op) => `${op.meeting_id}:${op.operation}`)).toEqual(['m2:meeting_outcome', 'm1:lead_update']);
    });

    test('returns an empty list when the scan fails', async () => {
      const tracker = createTracker({
        listMeetingIdsUpdatedBetween: async () => {
          throw new Error('store offline');
        },
      });

      expect(await tracker.getFailedOperations()).toEqual([]);
    });
  });

  // ===========================================
  // Health
  // ===========================================

  describe('getSyncHealthMetrics', () => {
    async function failTimes(tracker: SyncTracker, count: number) {
      for (let i = 0; i < count; i++) {
        await tracker.trackSyncOperation(`m${i + 1}`, 'meeting_outcome', 'failed');
      }
    }

    test('is healthy at a 10% failure rate', async () => {
      const tracker = createTracker();
      await failTimes(tracker, 1);

      expect(await tracker.getSyncHealthMetrics()).toEqual({
        health_status: 'healthy',
        recent_meetings: 10,
        recent_failures: 1,
        failure_rate: 10,
        last_updated: '2024-01-15T09:00:00.000Z',
      });
    });

    test('warns at 20%', async () => {
      const tracker = createTracker();
      await failTimes(tracker, 2);

      expect(await tracker.getSyncHealthMetrics()).toMatchObject({ health_status: 'warning', failure_rate: 20 });
    });

    test('is critical above 20%', async () => {
      const tracker = createTracker();
      await failTimes(tracker, 3);

      expect(await tracker.getSyncHealthMetrics()).toMatchObject({ health_status: 'critical', failure_rate: 30 });
    });

    test('rounds the failure rate to two decimals', async () => {
      const tracker = createTracker(meetingsSource(['m1', 'm2', 'm3']));
      await failTimes(tracker, 1);

      expect((await tracker.getSyncHealthMetrics()).failure_rate).toBe(33.33);
    });

    test('divides by at least one meeting', async () => {
      const tracker = createTracker(meetingsSource([]));

      expect(await tracker.getSyncHealthMetrics()).toMatchObject({ health_status: 'healthy', failure_rate: 0 });
    });

    test('reports unknown when the scan fails', async () => {
      const tracker = createTracker({
        listMeetingIdsUpdatedBetween: async () => {
          throw new Error('store offline');
        },
      });

      expect(await tracker.getSyncHealthMetrics()).toEqual({
        health_status: 'unknown',
        recent_meetings: 0,
        recent_failures: 0,
        failure_rate: 0,
        last_updated: '2024-01-15T09:00:00.000Z',
        error: 'store offline',
      });
    });
  });

  // ===========================================
  // Reports
  // ===========================================

  describe('generateSyncReport', () => {
    test('aggregates operations per type and error', async () => {
      const tracker = createTracker(meetingsSource(['m1', 'm2']));
      await tracker.trackSyncOperation('m1', 'meeting_outcome', 'success');
      await tracker.trackSyncOperation('m1', 'follow_up_tasks', 'failed', { error_message: 'boom' });

      const report = await tracker.generateSyncReport(new Date(START - HOUR), new Date(START + HOUR));

      expect(report).toEqual({
        report_period: { start_date: '2024-01-15T08:00:00.000Z', end_date: '2024-01-15T10:00:00.000Z' },
        total_meetings: 2,
        meetings_with_sync: 1,
        total_operations: 2,
        successful_operations: 1,
        failed_operations: 1,
        success_rate: 50,
        operation_breakdown: {
          meeting_outcome: { total: 1, successful: 1, failed: 0 },
          follow_up_tasks: { total: 1, successful: 0, failed: 1 },
        },
        error_summary: { boom: 1 },
      });
    });
  });
});
