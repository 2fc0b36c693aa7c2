/**
 * CRM Sync Service
 *
 * Pushes a completed validation session's approved outcome to one or more
 * CRM systems: meeting outcome, follow-up tasks and opportunity stage.
 * CRM failures never escape as exceptions; every operation returns a
 * structured result, upserts the sync record, and reports to the tracker.
 *
 * Successful meeting syncs are cached per (session, system) for the cache
 * TTL. The check is best effort: two concurrent callers can both miss and
 * both update the remote record.
 *
 * @module crm-service
 */

import { z } from 'zod';
import {
  CRM_SYSTEMS,
  isCRMSystem,
  isoNow,
  systemClock,
  type CacheStore,
  type Clock,
  type CRMSystem,
} from '@meetsync/lib';
import {
  StageUpdateSchema,
  getApprovedActionItems,
  summarizeSyncRecord,
  type BulkSyncResult,
  type CRMSyncResult,
  type CRMWriteResult,
  type MeetingData,
  type MeetingOutcome,
  type MultiCRMSyncResult,
  type OpportunitySuggestions,
  type StageUpdate,
  type SyncOperation,
  type SyncRecord,
  type SyncRecordSummary,
  type TaskData,
  type TaskSyncResult,
  type TrackedOperation,
  type ValidationSession,
} from './contracts';
import type { BaseCRMClient, ConnectionTestResult, FormattedWriteResult } from './clients';
import {
  classifyError,
  getErrorMessage,
  invalidState,
  notFound,
  type ClassifiedError,
} from './errors';
import { getLogger, type SyncLogger } from './logger';
import type { SyncNotifier } from './notifier';
import type { SyncRecordPatch, SyncRecordRepository, ValidationSessionRepository } from './store';
import type { SyncTracker, TrackDetails } from './sync-tracker';

// ===========================================
// Configuration
// ===========================================

export interface CRMSyncServiceConfig {
  /** TTL of the success cache entry */
  cacheTtlSeconds: number;
  cacheKeyPrefix: string;
}

export const DEFAULT_CRM_SYNC_CONFIG: CRMSyncServiceConfig = {
  cacheTtlSeconds: 3600,
  cacheKeyPrefix: 'crm_sync:validation',
};

export type CRMClientRegistry = Record<CRMSystem, BaseCRMClient>;

export interface CRMSyncServiceDependencies {
  clients: CRMClientRegistry;
  sessions: ValidationSessionRepository;
  records: SyncRecordRepository;
  cache: CacheStore;
  tracker?: SyncTracker;
  notifier?: SyncNotifier;
  clock?: Clock;
  logger?: SyncLogger;
}

export interface OpportunityUpdateRequest {
  opportunityId: string;
  update: StageUpdate;
}

export interface OperationRetryResult {
  tracking_id: string;
  operation: SyncOperation;
  result: CRMSyncResult | TaskSyncResult[];
}

/** Internal: set when re-running a tracked operation */
interface SyncContext {
  trackedRetryCount?: number;
}

const CachedSyncSchema = z.object({
  status: z.literal('success'),
  crm_record_id: z.string(),
  synced_at: z.string(),
});

// ===========================================
// Opportunity Suggestions
// ===========================================

const STAGE_SUGGESTIONS: Record<MeetingOutcome, { stages: string[]; probabilityAdjustment: number }> = {
  very_positive: {
    stages: ['Proposal/Price Quote', 'Negotiation/Review', 'Closed Won'],
    probabilityAdjustment: 20,
  },
  positive: {
    stages: ['Qualification', 'Needs Analysis', 'Proposal/Price Quote'],
    probabilityAdjustment: 10,
  },
  neutral: {
    stages: ['Qualification', 'Needs Analysis'],
    probabilityAdjustment: 0,
  },
  negative: {
    stages: ['Closed Lost', 'On Hold'],
    probabilityAdjustment: -20,
  },
};

// ===========================================
// Payload Builders
// ===========================================

/**
 * Canonical meeting payload from a validation session.
 * The rep's validated summary wins over the AI draft.
 */
export function buildMeetingData(session: ValidationSession): MeetingData {
  const responses = session.rep_responses;
  let durationMinutes: number | null = null;
  if (session.bot_join_time && session.bot_leave_time) {
    const ms = Date.parse(session.bot_leave_time) - Date.parse(session.bot_join_time);
    durationMinutes = Number.isFinite(ms) && ms >= 0 ? Math.floor(ms / 60000) : null;
  }

  return {
    title: session.meeting.title,
    meeting_date: session.meeting.start_time,
    summary: session.validated_summary || session.ai_generated_summary,
    outcome: 'completed',
    notes: responses.meeting_notes ?? '',
    key_points: responses.key_points ?? [],
    action_items: responses.action_items ?? [],
    next_steps: responses.next_steps ?? '',
    decisions_made: responses.decisions_made ?? [],
    duration_minutes: durationMinutes,
    meeting_end_date: session.meeting.end_time,
  };
}

function failedResult(message: string, error?: ClassifiedError, retryCount = 0): CRMSyncResult {
  return {
    status: 'failed',
    message,
    error_details: error ? { error_type: error.errorType, error_code: error.code } : undefined,
    retry_count: retryCount,
  };
}

// ===========================================
// Service
// ===========================================

export class CRMSyncService {
  private readonly config: CRMSyncServiceConfig;
  private readonly deps: CRMSyncServiceDependencies;
  private readonly clock: Clock;
  private readonly logger: SyncLogger;

  constructor(deps: CRMSyncServiceDependencies, config?: Partial<CRMSyncServiceConfig>) {
    this.config = { ...DEFAULT_CRM_SYNC_CONFIG, ...config };
    this.deps = deps;
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? getLogger();
  }

  getClient(system: CRMSystem): BaseCRMClient {
    return this.deps.clients[system];
  }

  cacheKey(sessionId: string, system: CRMSystem): string {
    return `${this.config.cacheKeyPrefix}:${sessionId}:${system}`;
  }

  // ===========================================
  // Meeting Outcome
  // ===========================================

  async syncMeetingOutcome(
    sessionId: string,
    system: CRMSystem,
    context: SyncContext = {}
  ): Promise<CRMSyncResult> {
    const timer = this.logger.startTimer();
    const session = await this.deps.sessions.get(sessionId);
    if (!session) {
      return failedResult(`Validation session ${sessionId} not found`);
    }

    this.logger.syncRequested({ validation_session_id: sessionId, crm_system: system, operation: 'meeting_outcome' });

    const crmId = session.meeting.lead?.crm_id;
    if (!crmId) {
      const result = failedResult('No associated lead or CRM ID found', classifyError(notFound('Lead CRM ID for session', sessionId)));
      await this.track(session, 'meeting_outcome', result, system, context);
      return result;
    }

    const cacheKey = this.cacheKey(sessionId, system);
    const cached = await this.readCache(cacheKey);
    if (cached) {
      this.logger.syncCompleted({
        validation_session_id: sessionId,
        crm_system: system,
        operation: 'meeting_outcome',
        crm_record_id: cached.crm_record_id,
        cached: true,
        duration_ms: timer(),
      });
      return {
        status: 'success',
        message: 'Already synced (cached)',
        crm_record_id: cached.crm_record_id,
        retry_count: 0,
      };
    }

    const meetingData = buildMeetingData(session);
    let written: FormattedWriteResult;
    try {
      written = await this.getClient(system).updateMeetingOutcome(crmId, meetingData);
    } catch (error) {
      const classified = classifyError(error);
      const existing = await this.deps.records.findBySessionAndSystem(sessionId, system);
      const record = await this.upsertRecord(existing, sessionId, system, {
        sync_status: 'failed',
        error_message: classified.message,
        sync_payload: this.getClient(system).formatMeetingData(meetingData),
        retry_count: existing ? existing.retry_count + 1 : 0,
      });

      const result = failedResult(`CRM sync failed: ${classified.message}`, classified, record.retry_count);
      await this.handleFailure(session, 'meeting_outcome', system, classified, record.retry_count);
      await this.track(session, 'meeting_outcome', result, system, context);
      return result;
    }

    const crmRecordId = written.id ?? crmId;
    const syncedAt = isoNow(this.clock);
    const existing = await this.deps.records.findBySessionAndSystem(sessionId, system);
    const record = await this.upsertRecord(existing, sessionId, system, {
      sync_status: 'completed',
      crm_record_id: crmRecordId,
      sync_payload: written.payload,
      error_message: '',
      synced_at: syncedAt,
    });

    await this.writeCache(cacheKey, { status: 'success', crm_record_id: crmRecordId, synced_at: syncedAt });

    const result: CRMSyncResult = {
      status: 'success',
      message: 'Meeting outcome synced successfully',
      crm_record_id: crmRecordId,
      retry_count: record.retry_count,
    };
    await this.track(session, 'meeting_outcome', result, system, context, [crmRecordId]);

    this.logger.syncCompleted({
      validation_session_id: sessionId,
      crm_system: system,
      operation: 'meeting_outcome',
      crm_record_id: crmRecordId,
      cached: false,
      duration_ms: timer(),
    });
    return result;
  }

  // ===========================================
  // Follow-up Tasks
  // ===========================================

  async createFollowUpTasks(
    sessionId: string,
    system: CRMSystem,
    context: SyncContext = {}
  ): Promise<TaskSyncResult[]> {
    const session = await this.deps.sessions.get(sessionId);
    if (!session) {
      return [{ action_item: '', ...failedResult(`Validation session ${sessionId} not found`) }];
    }

    const crmId = session.meeting.lead?.crm_id;
    if (!crmId) {
      return [{ action_item: '', ...failedResult('No associated lead or CRM ID found') }];
    }

    const items = getApprovedActionItems(session);
    if (items.length === 0) {
      return [];
    }

    this.logger.syncRequested({ validation_session_id: sessionId, crm_system: system, operation: 'follow_up_tasks' });

    const client = this.getClient(system);
    const results: TaskSyncResult[] = [];
    let lastError: ClassifiedError | null = null;

    for (const item of items) {
      const task: TaskData = {
        title: item.title ?? item.description.slice(0, 50),
        description: item.description,
        due_date: item.due_date ?? null,
        assignee: item.assignee ?? null,
        priority: item.priority ?? 'Normal',
        start_date: isoNow(this.clock),
      };

      try {
        const written = await client.createFollowUpTask(crmId, task);
        results.push({
          action_item: task.title,
          status: 'success',
          message: 'Follow-up task created successfully',
          crm_record_id: written.id ?? '',
          retry_count: 0,
        });
      } catch (error) {
        lastError = classifyError(error);
        results.push({
          action_item: task.title,
          ...failedResult(`Task creation failed: ${lastError.message}`, lastError),
        });
      }
    }

    const failed = results.filter((r) => r.status === 'failed').length;
    this.logger.tasksSynced({
      validation_session_id: sessionId,
      crm_system: system,
      tasks_created: results.length - failed,
      tasks_failed: failed,
    });

    const createdIds = results.flatMap((r) => (r.status === 'success' && r.crm_record_id ? [r.crm_record_id] : []));
    const summary: CRMSyncResult =
      failed === 0
        ? { status: 'success', message: `${results.length} follow-up tasks created`, retry_count: 0 }
        : failedResult(`${failed} of ${results.length} follow-up tasks failed: ${lastError?.message ?? ''}`, lastError ?? undefined);

    if (lastError) {
      await this.handleFailure(session, 'follow_up_tasks', system, lastError, 0);
    }
    await this.track(session, 'follow_up_tasks', summary, system, context, createdIds);

    return results;
  }

  // ===========================================
  // Fan-out & Retry
  // ===========================================

  /**
   * Sync to each system in order; one system's failure does not stop the others.
   */
  async syncToMultipleCrms(sessionId: string, systems: CRMSystem[]): Promise<MultiCRMSyncResult> {
    const results: MultiCRMSyncResult = {};
    for (const system of systems) {
      try {
        results[system] = await this.syncMeetingOutcome(sessionId, system);
      } catch (error) {
        const classified = classifyError(error);
        this.logger.error('Unexpected error during CRM sync', error, {
          validation_session_id: sessionId,
          crm_system: system,
        });
        results[system] = failedResult(`Unexpected error: ${classified.message}`, classified);
      }
    }
    return results;
  }

  /**
   * Drop the success cache entry and sync again. Transient failures are
   * retried inside the client.
   */
  async retryFailedSync(sessionId: string, system: CRMSystem, context: SyncContext = {}): Promise<CRMSyncResult> {
    await this.deleteCache(this.cacheKey(sessionId, system));
    return this.syncMeetingOutcome(sessionId, system, context);
  }

  async getSyncStatus(sessionId: string, system: CRMSystem): Promise<SyncRecordSummary | null> {
    const record = await this.deps.records.findBySessionAndSystem(sessionId, system);
    return record ? summarizeSyncRecord(record) : null;
  }

  /**
   * Re-run a failed tracked operation, recording the new attempt with an
   * incremented retry count.
   */
  async retryFailedOperation(trackingId: string): Promise<OperationRetryResult> {
    const tracker = this.deps.tracker;
    const operation = tracker ? await tracker.getOperation(trackingId) : null;
    if (!operation) {
      throw notFound('Tracked operation', trackingId);
    }
    if (operation.status !== 'failed') {
      throw invalidState('Operation is not in failed state', { status: operation.status });
    }

    const { sessionId, system } = this.trackedTarget(operation);
    const context: SyncContext = { trackedRetryCount: operation.retry_count + 1 };

    switch (operation.operation) {
      case 'meeting_outcome':
        return {
          tracking_id: trackingId,
          operation: operation.operation,
          result: await this.retryFailedSync(sessionId, system, context),
        };
      case 'follow_up_tasks':
        return {
          tracking_id: trackingId,
          operation: operation.operation,
          result: await this.createFollowUpTasks(sessionId, system, context),
        };
      case 'lead_update': {
        const opportunityId = operation.details.opportunity_id;
        const update = StageUpdateSchema.safeParse(operation.details.stage_update);
        if (typeof opportunityId !== 'string' || !update.success) {
          throw invalidState('Tracked opportunity update lacks opportunity id or stage update');
        }
        return {
          tracking_id: trackingId,
          operation: operation.operation,
          result: await this.updateOpportunityFromMeeting(sessionId, system, opportunityId, update.data, context),
        };
      }
    }
  }

  private trackedTarget(operation: TrackedOperation): { sessionId: string; system: CRMSystem } {
    const sessionId = operation.details.validation_session_id;
    const system = operation.details.crm_system;
    if (typeof sessionId !== 'string' || typeof system !== 'string' || !isCRMSystem(system)) {
      throw invalidState('Tracked operation lacks validation session or CRM system');
    }
    return { sessionId, system };
  }

  // ===========================================
  // Opportunities
  // ===========================================

  async updateOpportunityFromMeeting(
    sessionId: string,
    system: CRMSystem,
    opportunityId: string,
    stageUpdate: StageUpdate,
    context: SyncContext = {}
  ): Promise<CRMSyncResult> {
    const session = await this.deps.sessions.get(sessionId);
    if (!session) {
      return failedResult(`Validation session ${sessionId} not found`);
    }

    this.logger.syncRequested({ validation_session_id: sessionId, crm_system: system, operation: 'lead_update' });

    const update: StageUpdate = {
      ...stageUpdate,
      description: stageUpdate.description ?? `Updated from meeting: ${session.meeting.title}`,
    };
    const trackingDetails = { opportunity_id: opportunityId, stage_update: stageUpdate };

    let written: FormattedWriteResult;
    try {
      written = await this.getClient(system).updateOpportunityStage(opportunityId, update);
    } catch (error) {
      const classified = classifyError(error);
      const result = failedResult(`Opportunity update failed: ${classified.message}`, classified);
      await this.handleFailure(session, 'lead_update', system, classified, 0);
      await this.track(session, 'lead_update', result, system, context, [], trackingDetails);
      return result;
    }

    const existing = await this.deps.records.findBySessionAndSystem(sessionId, system);
    if (existing) {
      await this.deps.records.update(existing.id, {
        sync_payload: { ...existing.sync_payload, opportunity_update: written.payload },
      });
    } else {
      await this.deps.records.create({
        validation_session_id: sessionId,
        crm_system: system,
        sync_status: 'completed',
        crm_record_id: opportunityId,
        sync_payload: { opportunity_update: written.payload },
        synced_at: isoNow(this.clock),
      });
    }

    const result: CRMSyncResult = {
      status: 'success',
      message: 'Opportunity updated successfully',
      crm_record_id: opportunityId,
      retry_count: 0,
    };
    await this.track(session, 'lead_update', result, system, context, [opportunityId], trackingDetails);
    return result;
  }

  async getOpportunitySyncSuggestions(sessionId: string): Promise<OpportunitySuggestions> {
    const session = await this.deps.sessions.get(sessionId);
    if (!session) {
      throw notFound('Validation session', sessionId);
    }

    const responses = session.rep_responses;
    const suggestion = STAGE_SUGGESTIONS[responses.meeting_outcome ?? 'neutral'];

    return {
      suggested_stages: suggestion.stages,
      probability_adjustment: suggestion.probabilityAdjustment,
      next_steps: responses.next_steps ?? '',
      follow_up_required: (responses.action_items?.length ?? 0) > 0,
    };
  }

  /** Raw opportunity from the CRM; client errors propagate */
  async getOpportunityDetails(system: CRMSystem, opportunityId: string): Promise<Record<string, unknown>> {
    return this.getClient(system).getOpportunityDetails(opportunityId);
  }

  // ===========================================
  // Bulk & Dispatch
  // ===========================================

  async bulkSyncValidationSession(
    sessionId: string,
    system: CRMSystem,
    options: { opportunity?: OpportunityUpdateRequest } = {}
  ): Promise<BulkSyncResult> {
    const result: BulkSyncResult = {
      meeting_sync: await this.syncMeetingOutcome(sessionId, system),
      task_sync: await this.createFollowUpTasks(sessionId, system),
    };

    if (options.opportunity) {
      result.opportunity_sync = await this.updateOpportunityFromMeeting(
        sessionId,
        system,
        options.opportunity.opportunityId,
        options.opportunity.update
      );
    }

    return result;
  }

  /**
   * Push an approved record's payload to its CRM and settle the record.
   * Only `pending` and `retrying` records are dispatched.
   */
  async dispatchSyncRecord(recordId: string): Promise<SyncRecord> {
    const record = await this.deps.records.get(recordId);
    if (!record) {
      throw notFound('Sync record', recordId);
    }
    if (record.sync_status !== 'pending' && record.sync_status !== 'retrying') {
      throw invalidState(`Sync record ${recordId} is ${record.sync_status}; only pending or retrying records can be dispatched`);
    }

    const session = await this.deps.sessions.get(record.validation_session_id);
    if (!session) {
      throw notFound('Validation session', record.validation_session_id);
    }

    const system = record.crm_system;
    const crmId = session.meeting.lead?.crm_id;
    if (!crmId) {
      return this.transition(record, {
        sync_status: 'failed',
        error_message: 'No associated lead or CRM ID found',
      });
    }

    const inProgress = await this.transition(record, { sync_status: 'in_progress' });

    let written: CRMWriteResult;
    try {
      written = await this.getClient(system).updateRecord(crmId, inProgress.sync_payload);
    } catch (error) {
      const classified = classifyError(error);
      const failed = await this.transition(inProgress, {
        sync_status: 'failed',
        error_message: classified.message,
      });
      await this.handleFailure(session, 'meeting_outcome', system, classified, failed.retry_count);
      await this.track(
        session,
        'meeting_outcome',
        failedResult(`CRM sync failed: ${classified.message}`, classified, failed.retry_count),
        system,
        {}
      );
      return failed;
    }

    const crmRecordId = written.id ?? crmId;
    const syncedAt = isoNow(this.clock);
    const completed = await this.transition(inProgress, {
      sync_status: 'completed',
      crm_record_id: crmRecordId,
      error_message: '',
      synced_at: syncedAt,
    });

    await this.writeCache(this.cacheKey(session.id, system), {
      status: 'success',
      crm_record_id: crmRecordId,
      synced_at: syncedAt,
    });
    await this.track(
      session,
      'meeting_outcome',
      { status: 'success', message: 'Approved payload synced', crm_record_id: crmRecordId, retry_count: completed.retry_count },
      system,
      {},
      [crmRecordId]
    );
    return completed;
  }

  async testConnection(system: CRMSystem): Promise<ConnectionTestResult> {
    return this.getClient(system).testConnection();
  }

  async testAllConnections(): Promise<ConnectionTestResult[]> {
    const results: ConnectionTestResult[] = [];
    for (const system of CRM_SYSTEMS) {
      results.push(await this.testConnection(system));
    }
    return results;
  }

  // ===========================================
  // Record Helpers
  // ===========================================

  private async upsertRecord(
    existing: SyncRecord | null,
    sessionId: string,
    system: CRMSystem,
    patch: SyncRecordPatch
  ): Promise<SyncRecord> {
    if (existing) {
      return this.transition(existing, patch);
    }
    return this.deps.records.create({ validation_session_id: sessionId, crm_system: system, ...patch });
  }

  private async transition(record: SyncRecord, patch: SyncRecordPatch): Promise<SyncRecord> {
    const updated = await this.deps.records.update(record.id, patch);
    if (updated.sync_status !== record.sync_status) {
      this.logger.syncRecordUpdated({
        sync_record_id: record.id,
        crm_system: record.crm_system,
        from_status: record.sync_status,
        to_status: updated.sync_status,
      });
    }
    return updated;
  }

  // ===========================================
  // Cache (best effort)
  // ===========================================

  private async readCache(key: string): Promise<z.infer<typeof CachedSyncSchema> | null> {
    try {
      const parsed = CachedSyncSchema.safeParse(await this.deps.cache.get(key));
      return parsed.success ? parsed.data : null;
    } catch (error) {
      this.logger.warn('Sync cache read failed', { key, error: getErrorMessage(error) });
      return null;
    }
  }

  private async writeCache(key: string, value: z.infer<typeof CachedSyncSchema>): Promise<void> {
    try {
      await this.deps.cache.set(key, value, this.config.cacheTtlSeconds);
    } catch (error) {
      this.logger.warn('Sync cache write failed', { key, error: getErrorMessage(error) });
    }
  }

  private async deleteCache(key: string): Promise<void> {
    try {
      await this.deps.cache.delete(key);
    } catch (error) {
      this.logger.warn('Sync cache delete failed', { key, error: getErrorMessage(error) });
    }
  }

  // ===========================================
  // Tracking & Notification
  // ===========================================

  private async track(
    session: ValidationSession,
    operation: SyncOperation,
    result: CRMSyncResult,
    system: CRMSystem,
    context: SyncContext,
    crmRecordIds: string[] = [],
    extra: Record<string, unknown> = {}
  ): Promise<void> {
    if (!this.deps.tracker) return;

    const details: TrackDetails = {
      ...extra,
      validation_session_id: session.id,
      crm_system: system,
      retry_count: context.trackedRetryCount ?? result.retry_count,
      error_message: result.status === 'failed' ? result.message : null,
      crm_record_ids: crmRecordIds,
    };
    try {
      await this.deps.tracker.trackSyncOperation(session.meeting.id, operation, result.status, details);
    } catch (error) {
      this.logger.warn('Sync operation tracking failed', {
        validation_session_id: session.id,
        crm_system: system,
        operation,
        error: getErrorMessage(error),
      });
    }
  }

  private async handleFailure(
    session: ValidationSession,
    operation: SyncOperation,
    system: CRMSystem,
    error: ClassifiedError,
    retryCount: number
  ): Promise<void> {
    this.logger.syncFailed({
      validation_session_id: session.id,
      crm_system: system,
      operation,
      error_code: error.code,
      error_message: error.message,
      retry_count: retryCount,
    });

    try {
      await this.deps.notifier?.notifyFailure({
        validationSessionId: session.id,
        meetingTitle: session.meeting.title,
        crmSystem: system,
        operation,
        error,
        retryCount,
      });
    } catch (notifyError) {
      this.logger.error('Sync failure notification failed', notifyError, {
        validation_session_id: session.id,
        crm_system: system,
      });
    }
  }
}

export function createCRMSyncService(
  deps: CRMSyncServiceDependencies,
  config?: Partial<CRMSyncServiceConfig>
): CRMSyncService {
  return new CRMSyncService(deps, config);
}
