/**
 * CRM Approval Service
 *
 * The rep's approve/reject step between a completed validation session and
 * the CRM writes. Approval stores one `pending` sync record per chosen CRM
 * with the exact payload to send; dispatch hands those records to the
 * orchestrator. Every state change is appended to the session audit trail.
 *
 * @module approval-service
 */

import {
  CRM_SYSTEMS,
  isCRMSystem,
  isoNow,
  round2,
  systemClock,
  type Clock,
  type CRMSystem,
} from '@meetsync/lib';
import {
  summarizeSyncRecord,
  type AuditEntry,
  type SyncRecord,
  type SyncRecordStatus,
  type SyncRecordSummary,
  type ValidationSession,
} from './contracts';
import type { ApprovalBasePayload } from './clients';
import type { CRMSyncService } from './crm-service';
import { SyncValidationError, invalidState, notFound } from './errors';
import { getLogger, type SyncLogger } from './logger';
import type { SyncRecordRepository, ValidationSessionRepository } from './store';

// ===========================================
// Types
// ===========================================

export interface CRMApprovalServiceDependencies {
  sessions: ValidationSessionRepository;
  records: SyncRecordRepository;
  syncService: CRMSyncService;
  clock?: Clock;
  logger?: SyncLogger;
}

export interface SessionSyncRecordView extends SyncRecordSummary {
  id: string;
  crm_system: CRMSystem;
  created_at: string;
}

export interface SessionCrmSyncStatus {
  session_id: string;
  validation_status: ValidationSession['validation_status'];
  has_approved_updates: boolean;
  sync_records: SessionSyncRecordView[];
}

export interface ChangesSummary {
  total_changes: number;
  response_submissions: number;
  corrections_made: number;
  crm_approvals: number;
  crm_rejections: number;
  timeline: { timestamp: string; action: string; description: string }[];
}

export interface ApprovalSummary {
  session_info: {
    id: string;
    sales_rep_email: string;
    validation_status: ValidationSession['validation_status'];
    started_at: string;
    completed_at: string | null;
    duration_minutes: number | null;
  };
  meeting_info: {
    id: string;
    title: string;
    start_time: string;
    lead_name: string | null;
    company: string | null;
  };
  validation_metrics: {
    total_fields: number;
    answered_fields: number;
    completion_rate: number;
  };
  changes_summary: ChangesSummary;
  crm_sync_status: SessionCrmSyncStatus;
  final_summary: string;
  approved_crm_updates: Record<string, unknown>;
  audit_trail: AuditEntry[];
}

type AuditInput = { action: string; [key: string]: unknown };

/** Rep response fields counted by the validation metrics */
const RESPONSE_FIELDS = [
  'meeting_notes',
  'key_points',
  'action_items',
  'next_steps',
  'decisions_made',
  'meeting_outcome',
] as const;

// ===========================================
// Helpers
// ===========================================

function hasValue(value: unknown): boolean {
  if (value === undefined || value === null) return false;
  if (typeof value === 'string') return value.trim().length > 0;
  if (Array.isArray(value)) return value.length > 0;
  return true;
}

function describeChange(change: AuditEntry): string {
  switch (change.action) {
    case 'response_submitted':
      return `Submitted response to question: ${String(change.question_id ?? 'unknown')}`;
    case 'session_completed':
      return 'Validation session completed';
    case 'crm_updates_approved': {
      const systems = Array.isArray(change.approved_systems) ? change.approved_systems.map(String) : [];
      return `Approved CRM updates for: ${systems.join(', ')}`;
    }
    case 'crm_updates_rejected':
      return `Rejected CRM updates: ${String(change.rejection_reason ?? 'No reason provided')}`;
    case 'crm_sync_retried':
      return `CRM sync retried for ${String(change.crm_system ?? 'unknown')}`;
    case 'crm_sync_status_updated':
      return `CRM sync status updated for ${String(change.crm_system ?? 'unknown')}: ${String(change.new_status ?? 'unknown')}`;
    default:
      return `Action: ${change.action}`;
  }
}

export function analyzeChanges(changes: AuditEntry[]): ChangesSummary {
  const summary: ChangesSummary = {
    total_changes: changes.length,
    response_submissions: 0,
    corrections_made: 0,
    crm_approvals: 0,
    crm_rejections: 0,
    timeline: [],
  };

  for (const change of changes) {
    if (change.action === 'response_submitted') summary.response_submissions++;
    else if (change.action === 'correction_made') summary.corrections_made++;
    else if (change.action === 'crm_updates_approved') summary.crm_approvals++;
    else if (change.action === 'crm_updates_rejected') summary.crm_rejections++;

    summary.timeline.push({
      timestamp: change.timestamp,
      action: change.action,
      description: describeChange(change),
    });
  }

  return summary;
}

// ===========================================
// Service
// ===========================================

export class CRMApprovalService {
  private readonly deps: CRMApprovalServiceDependencies;
  private readonly clock: Clock;
  private readonly logger: SyncLogger;

  constructor(deps: CRMApprovalServiceDependencies) {
    this.deps = deps;
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? getLogger();
  }

  private async requireSession(sessionId: string): Promise<ValidationSession> {
    const session = await this.deps.sessions.get(sessionId);
    if (!session) {
      throw notFound('Validation session', sessionId);
    }
    return session;
  }

  private async requireRecord(recordId: string): Promise<SyncRecord> {
    const record = await this.deps.records.get(recordId);
    if (!record) {
      throw notFound('CRM sync record', recordId);
    }
    return record;
  }

  private async appendAudit(session: ValidationSession, entry: AuditInput): Promise<ValidationSession> {
    const updated: ValidationSession = {
      ...session,
      changes_made: [...session.changes_made, { ...entry, timestamp: isoNow(this.clock) }],
    };
    return this.deps.sessions.save(updated);
  }

  // ===========================================
  // Approve / Reject
  // ===========================================

  /**
   * Approve the session's CRM updates for the given systems. Creates or
   * resets one `pending` record per system carrying the formatted payload.
   */
  async approveCrmUpdates(
    sessionId: string,
    approvedSystems: string[],
    customUpdates?: Record<string, unknown>
  ): Promise<SyncRecord[]> {
    const session = await this.requireSession(sessionId);
    if (session.validation_status !== 'completed') {
      throw invalidState('Can only approve CRM updates for completed validation sessions', {
        validation_status: session.validation_status,
      });
    }

    const invalid = approvedSystems.filter((system) => !isCRMSystem(system));
    if (invalid.length > 0) {
      throw new SyncValidationError(`Invalid CRM systems: ${invalid.join(', ')}`, undefined, {
        valid_systems: [...CRM_SYSTEMS],
      });
    }
    const systems = [...new Set(approvedSystems.filter(isCRMSystem))];
    if (systems.length === 0) {
      throw new SyncValidationError('At least one CRM system must be approved');
    }

    const updates = { ...session.approved_crm_updates, ...customUpdates };
    const base = this.buildBasePayload(session);

    // All checks run before the first write
    const planned: Array<{ system: CRMSystem; existing: SyncRecord | null }> = [];
    for (const system of systems) {
      const existing = await this.deps.records.findBySessionAndSystem(sessionId, system);
      if (existing?.sync_status === 'in_progress') {
        throw invalidState(`Sync record for ${system} is in progress`, { sync_record_id: existing.id });
      }
      planned.push({ system, existing });
    }

    const records: SyncRecord[] = [];
    for (const { system, existing } of planned) {
      const payload = this.deps.syncService.getClient(system).formatApprovalPayload(base, updates);
      records.push(
        existing
          ? await this.deps.records.update(existing.id, {
              sync_status: 'pending',
              sync_payload: payload,
              error_message: '',
            })
          : await this.deps.records.create({
              validation_session_id: sessionId,
              crm_system: system,
              sync_status: 'pending',
              sync_payload: payload,
            })
      );
    }

    await this.appendAudit(session, {
      action: 'crm_updates_approved',
      approved_systems: systems,
      custom_updates_applied: customUpdates !== undefined && Object.keys(customUpdates).length > 0,
    });

    this.logger.crmUpdatesApproved({
      validation_session_id: sessionId,
      crm_systems: systems,
      records_created: records.length,
    });

    return records;
  }

  buildBasePayload(session: ValidationSession): ApprovalBasePayload {
    const { meeting } = session;
    const base: ApprovalBasePayload = {
      meeting_id: meeting.id,
      meeting_title: meeting.title,
      meeting_date: meeting.start_time,
      attendees: meeting.attendees,
      summary: session.validated_summary,
      validation_completed_at: session.completed_at,
      sales_rep_email: session.sales_rep_email,
    };

    if (meeting.lead) {
      base.lead_id = meeting.lead.crm_id ?? undefined;
      base.lead_name = meeting.lead.name;
      base.lead_email = meeting.lead.email;
      base.company = meeting.lead.company;
    }
    return base;
  }

  async rejectCrmUpdates(sessionId: string, reason: string): Promise<ValidationSession> {
    const session = await this.requireSession(sessionId);
    if (session.validation_status !== 'completed') {
      throw invalidState('Can only reject CRM updates for completed validation sessions', {
        validation_status: session.validation_status,
      });
    }

    return this.appendAudit(
      { ...session, approved_crm_updates: {} },
      { action: 'crm_updates_rejected', rejection_reason: reason }
    );
  }

  // ===========================================
  // Record Lifecycle
  // ===========================================

  async getCrmSyncStatus(sessionId: string): Promise<SessionCrmSyncStatus> {
    const session = await this.requireSession(sessionId);
    const records = await this.deps.records.listBySession(sessionId);

    return {
      session_id: sessionId,
      validation_status: session.validation_status,
      has_approved_updates: Object.keys(session.approved_crm_updates).length > 0,
      sync_records: records.map((record) => ({
        id: record.id,
        crm_system: record.crm_system,
        created_at: record.created_at,
        ...summarizeSyncRecord(record),
      })),
    };
  }

  /** Failed records only: move to `retrying` with one more retry counted */
  async retryFailedSync(recordId: string): Promise<SyncRecord> {
    const record = await this.requireRecord(recordId);
    if (record.sync_status !== 'failed') {
      throw invalidState('Can only retry failed synchronizations', { sync_status: record.sync_status });
    }

    const updated = await this.deps.records.update(recordId, {
      sync_status: 'retrying',
      retry_count: record.retry_count + 1,
    });

    this.logger.syncRecordUpdated({
      sync_record_id: recordId,
      crm_system: record.crm_system,
      from_status: record.sync_status,
      to_status: updated.sync_status,
    });

    const session = await this.requireSession(record.validation_session_id);
    await this.appendAudit(session, {
      action: 'crm_sync_retried',
      crm_system: record.crm_system,
      retry_count: updated.retry_count,
    });

    return updated;
  }

  /**
   * Status report from an external sync process.
   */
  async updateSyncRecordStatus(
    recordId: string,
    status: SyncRecordStatus,
    crmRecordId?: string,
    errorMessage?: string
  ): Promise<SyncRecord> {
    const record = await this.requireRecord(recordId);

    const updated = await this.deps.records.update(recordId, {
      sync_status: status,
      ...(crmRecordId ? { crm_record_id: crmRecordId } : {}),
      ...(errorMessage ? { error_message: errorMessage } : {}),
      ...(status === 'completed' ? { synced_at: isoNow(this.clock) } : {}),
    });

    this.logger.syncRecordUpdated({
      sync_record_id: recordId,
      crm_system: record.crm_system,
      from_status: record.sync_status,
      to_status: status,
    });

    const session = await this.requireSession(record.validation_session_id);
    await this.appendAudit(session, {
      action: 'crm_sync_status_updated',
      crm_system: record.crm_system,
      new_status: status,
      crm_record_id: crmRecordId ?? null,
      has_error: Boolean(errorMessage),
    });

    return updated;
  }

  /**
   * Send every `pending` or `retrying` record of the session to its CRM.
   * Records are dispatched one at a time; a record that throws is logged,
   * returned as last stored, and does not stop the rest.
   */
  async dispatchApprovedRecords(sessionId: string): Promise<SyncRecord[]> {
    await this.requireSession(sessionId);
    const records = await this.deps.records.listBySession(sessionId);
    const dispatched: SyncRecord[] = [];

    for (const record of records) {
      if (record.sync_status !== 'pending' && record.sync_status !== 'retrying') continue;

      try {
        dispatched.push(await this.deps.syncService.dispatchSyncRecord(record.id));
      } catch (error) {
        this.logger.error('Failed to dispatch approved sync record', error, {
          sync_record_id: record.id,
          crm_system: record.crm_system,
          validation_session_id: sessionId,
        });
        dispatched.push((await this.deps.records.get(record.id)) ?? record);
      }
    }
    return dispatched;
  }

  // ===========================================
  // Summary
  // ===========================================

  async generateApprovalSummary(sessionId: string): Promise<ApprovalSummary> {
    const session = await this.requireSession(sessionId);
    const { meeting } = session;

    const answered = RESPONSE_FIELDS.filter((field) => hasValue(session.rep_responses[field])).length;
    const durationMinutes = session.completed_at
      ? round2((Date.parse(session.completed_at) - Date.parse(session.started_at)) / 60000)
      : null;

    return {
      session_info: {
        id: session.id,
        sales_rep_email: session.sales_rep_email,
        validation_status: session.validation_status,
        started_at: session.started_at,
        completed_at: session.completed_at,
        duration_minutes: durationMinutes,
      },
      meeting_info: {
        id: meeting.id,
        title: meeting.title,
        start_time: meeting.start_time,
        lead_name: meeting.lead?.name ?? null,
        company: meeting.lead?.company ?? null,
      },
      validation_metrics: {
        total_fields: RESPONSE_FIELDS.length,
        answered_fields: answered,
        completion_rate: round2((answered / RESPONSE_FIELDS.length) * 100),
      },
      changes_summary: analyzeChanges(session.changes_made),
      crm_sync_status: await this.getCrmSyncStatus(sessionId),
      final_summary: session.validated_summary,
      approved_crm_updates: session.approved_crm_updates,
      audit_trail: session.changes_made,
    };
  }
}

export function createCRMApprovalService(deps: CRMApprovalServiceDependencies): CRMApprovalService {
  return new CRMApprovalService(deps);
}
