/**
 * CRM Approval Service Tests
 *
 * Approve/reject, record lifecycle, dispatch and the approval summary,
 * including the approve-then-dispatch flow across two CRMs.
 *
 * @module __tests__/approval-service
 */

import { describe, test, expect, beforeEach, vi } from 'vitest';
import { SyncValidationError } from '../../errors';
import { buildSession, createTestContext, jsonResponse, type TestContext } from '../fixtures';

// ===========================================
// Test Fixtures
// ===========================================

const START_ISO = '2024-01-15T09:00:00.000Z';
const failing = () => jsonResponse({ error: 'down' }, 503);

describe('CRMApprovalService', () => {
  let ctx: TestContext;

  beforeEach(async () => {
    ctx = createTestContext();
    await ctx.sessions.save(buildSession({ approved_crm_updates: { stage: 'Proposal', amount: 75000 } }));
  });

  // ===========================================
  // End to end
  // ===========================================

  test('approves two CRMs and completes both records on dispatch', async () => {
    const approved = await ctx.approvalService.approveCrmUpdates('vs-1', ['salesforce', 'hubspot']);

    expect(approved.map((r) => [r.crm_system, r.sync_status])).toEqual([
      ['salesforce', 'pending'],
      ['hubspot', 'pending'],
    ]);
    expect(approved[0].sync_payload).toMatchObject({ StageName: 'Proposal', Amount: 75000 });
    expect(approved[1].sync_payload).toMatchObject({ dealstage: 'Proposal', amount: 75000 });

    const dispatched = await ctx.approvalService.dispatchApprovedRecords('vs-1');

    expect(dispatched.map((r) => [r.crm_system, r.sync_status, r.crm_record_id, r.synced_at])).toEqual([
      ['hubspot', 'completed', 'crm-rec-1', START_ISO],
      ['salesforce', 'completed', 'lead-001', START_ISO],
    ]);

    expect(ctx.server.apiRequests.map((r) => `${r.method} ${r.url}`)).toEqual([
      'PATCH https://hubspot.test/crm/v3/objects/contacts/lead-001',
      'PATCH https://sf.test/services/data/v58.0/sobjects/Activity/lead-001',
    ]);
    expect(ctx.server.apiBody(0)).toMatchObject({ properties: { dealstage: 'Proposal', amount: 75000 } });
    expect(ctx.server.apiBody(1)).toMatchObject({ StageName: 'Proposal', Amount: 75000, Subject: 'Acme discovery call' });

    const status = await ctx.approvalService.getCrmSyncStatus('vs-1');
    expect(status.sync_records.map((r) => r.status)).toEqual(['completed', 'completed']);
  });

  // ===========================================
  // Approve
  // ===========================================

  describe('approveCrmUpdates', () => {
    test('records the approval in the audit trail', async () => {
      await ctx.approvalService.approveCrmUpdates('vs-1', ['salesforce']);

      const session = await ctx.sessions.get('vs-1');
      expect(session?.changes_made).toEqual([
        {
          action: 'crm_updates_approved',
          approved_systems: ['salesforce'],
          custom_updates_applied: false,
          timestamp: START_ISO,
        },
      ]);
    });

    test('lets custom updates override the approved ones', async () => {
      const [record] = await ctx.approvalService.approveCrmUpdates('vs-1', ['sap_c4c'], { stage: 'Negotiation' });

      expect(record.sync_payload).toMatchObject({ SalesStage: 'Negotiation', ExpectedValue: 75000 });
      const session = await ctx.sessions.get('vs-1');
      expect(session?.changes_made[0]).toMatchObject({ custom_updates_applied: true });
    });

    test('resets an existing record instead of creating a second one', async () => {
      await ctx.approvalService.approveCrmUpdates('vs-1', ['creatio']);
      await ctx.approvalService.approveCrmUpdates('vs-1', ['creatio'], { amount: 90000 });

      const records = await ctx.records.listBySession('vs-1');
      expect(records).toHaveLength(1);
      expect(records[0].sync_payload).toMatchObject({ Budget: 90000 });
    });

    test('changes nothing when one of the records is in progress', async () => {
      const [hubspot] = await ctx.approvalService.approveCrmUpdates('vs-1', ['hubspot']);
      await ctx.records.update(hubspot.id, { sync_status: 'in_progress' });

      await expect(
        ctx.approvalService.approveCrmUpdates('vs-1', ['salesforce', 'hubspot'], { amount: 90000 })
      ).rejects.toMatchObject({ code: 'INVALID_STATE', message: 'Sync record for hubspot is in progress' });

      const records = await ctx.records.listBySession('vs-1');
      expect(records).toHaveLength(1);
      expect(records[0]).toMatchObject({ crm_system: 'hubspot', sync_status: 'in_progress' });
      expect(records[0].sync_payload).toMatchObject({ amount: 75000 });
      expect((await ctx.sessions.get('vs-1'))?.changes_made).toHaveLength(1);
    });

    test('only accepts completed sessions', async () => {
      await ctx.sessions.save(buildSession({ validation_status: 'in_progress', completed_at: null }));

      await expect(ctx.approvalService.approveCrmUpdates('vs-1', ['salesforce'])).rejects.toMatchObject({
        code: 'INVALID_STATE',
        message: 'Can only approve CRM updates for completed validation sessions',
      });
    });

    test('rejects unknown CRM systems', async () => {
      await expect(ctx.approvalService.approveCrmUpdates('vs-1', ['salesforce', 'pipedrive'])).rejects.toThrow(
        'Invalid CRM systems: pipedrive'
      );
      expect(await ctx.records.listBySession('vs-1')).toEqual([]);
    });

    test('rejects unknown sessions', async () => {
      await expect(ctx.approvalService.approveCrmUpdates('missing', ['salesforce'])).rejects.toBeInstanceOf(
        SyncValidationError
      );
    });
  });

  describe('rejectCrmUpdates', () => {
    test('clears the approved updates and records the reason', async () => {
      const session = await ctx.approvalService.rejectCrmUpdates('vs-1', 'Numbers not final');

      expect(session.approved_crm_updates).toEqual({});
      expect(session.changes_made).toEqual([
        { action: 'crm_updates_rejected', rejection_reason: 'Numbers not final', timestamp: START_ISO },
      ]);
      expect((await ctx.approvalService.getCrmSyncStatus('vs-1')).has_approved_updates).toBe(false);
    });
  });

  // ===========================================
  // Record lifecycle
  // ===========================================

  describe('retryFailedSync', () => {
    test('moves a failed record to retrying and dispatches it again', async () => {
      const [record] = await ctx.approvalService.approveCrmUpdates('vs-1', ['salesforce']);
      ctx.server.defaultResponder = failing;
      const [failed] = await ctx.approvalService.dispatchApprovedRecords('vs-1');

      expect(failed).toMatchObject({
        sync_status: 'failed',
        error_message: 'API request failed: HTTP 503: {"error":"down"}',
        retry_count: 0,
      });

      const retrying = await ctx.approvalService.retryFailedSync(record.id);
      expect(retrying).toMatchObject({ sync_status: 'retrying', retry_count: 1 });

      ctx.server.defaultResponder = () => jsonResponse({ id: 'ok' });
      const [completed] = await ctx.approvalService.dispatchApprovedRecords('vs-1');

      expect(completed).toMatchObject({ sync_status: 'completed', error_message: '', retry_count: 1 });

      const session = await ctx.sessions.get('vs-1');
      expect(session?.changes_made.map((c) => c.action)).toEqual(['crm_updates_approved', 'crm_sync_retried']);
    });

    test('refuses records that did not fail', async () => {
      const [record] = await ctx.approvalService.approveCrmUpdates('vs-1', ['salesforce']);

      await expect(ctx.approvalService.retryFailedSync(record.id)).rejects.toThrow(
        'Can only retry failed synchronizations'
      );
    });

    test('reports unknown records', async () => {
      await expect(ctx.approvalService.retryFailedSync('nope')).rejects.toThrow('CRM sync record nope not found');
    });
  });

  describe('updateSyncRecordStatus', () => {
    test('applies an external completion report', async () => {
      const [record] = await ctx.approvalService.approveCrmUpdates('vs-1', ['hubspot']);
      ctx.clock.advance(5_000);

      const updated = await ctx.approvalService.updateSyncRecordStatus(record.id, 'completed', 'EXT-1');

      expect(updated).toMatchObject({
        sync_status: 'completed',
        crm_record_id: 'EXT-1',
        synced_at: '2024-01-15T09:00:05.000Z',
      });
      const session = await ctx.sessions.get('vs-1');
      expect(session?.changes_made[1]).toEqual({
        action: 'crm_sync_status_updated',
        crm_system: 'hubspot',
        new_status: 'completed',
        crm_record_id: 'EXT-1',
        has_error: false,
        timestamp: '2024-01-15T09:00:05.000Z',
      });
    });

    test('keeps the error message of a failure report', async () => {
      const [record] = await ctx.approvalService.approveCrmUpdates('vs-1', ['hubspot']);

      const updated = await ctx.approvalService.updateSyncRecordStatus(record.id, 'failed', undefined, 'Quota exceeded');

      expect(updated).toMatchObject({ sync_status: 'failed', error_message: 'Quota exceeded', synced_at: null });
    });
  });

  describe('dispatchApprovedRecords', () => {
    test('keeps dispatching after one record throws', async () => {
      await ctx.approvalService.approveCrmUpdates('vs-1', ['salesforce', 'hubspot']);
      vi.spyOn(ctx.syncService, 'dispatchSyncRecord').mockRejectedValueOnce(new Error('store offline'));

      const dispatched = await ctx.approvalService.dispatchApprovedRecords('vs-1');

      expect(dispatched.map((r) => [r.crm_system, r.sync_status])).toEqual([
        ['hubspot', 'pending'],
        ['salesforce', 'completed'],
      ]);
      expect(ctx.server.apiRequests).toHaveLength(1);
    });
  });

  describe('dispatchSyncRecord', () => {
    test('refuses records that are not pending or retrying', async () => {
      const [record] = await ctx.approvalService.approveCrmUpdates('vs-1', ['salesforce']);
      await ctx.approvalService.dispatchApprovedRecords('vs-1');

      await expect(ctx.syncService.dispatchSyncRecord(record.id)).rejects.toMatchObject({ code: 'INVALID_STATE' });
    });

    test('fails the record when the lead has no CRM id', async () => {
      const [record] = await ctx.approvalService.approveCrmUpdates('vs-1', ['salesforce']);
      const base = buildSession();
      await ctx.sessions.save(
        buildSession({ meeting: { ...base.meeting, lead: null }, approved_crm_updates: { stage: 'Proposal' } })
      );

      const result = await ctx.syncService.dispatchSyncRecord(record.id);

      expect(result).toMatchObject({ sync_status: 'failed', error_message: 'No associated lead or CRM ID found' });
      expect(ctx.server.apiRequests).toHaveLength(0);
    });
  });

  // ===========================================
  // Summary
  // ===========================================

  describe('generateApprovalSummary', () => {
    test('combines session, metrics, audit trail and sync status', async () => {
      await ctx.approvalService.approveCrmUpdates('vs-1', ['salesforce']);

      const summary = await ctx.approvalService.generateApprovalSummary('vs-1');

      expect(summary.session_info).toEqual({
        id: 'vs-1',
        sales_rep_email: 'rep@example.com',
        validation_status: 'completed',
        started_at: '2024-01-15T08:50:00.000Z',
        completed_at: '2024-01-15T08:59:00.000Z',
        duration_minutes: 9,
      });
      expect(summary.meeting_info).toEqual({
        id: 'mtg-1',
        title: 'Acme discovery call',
        start_time: '2024-01-15T08:00:00.000Z',
        lead_name: 'Dana Buyer',
        company: 'Acme',
      });
      expect(summary.validation_metrics).toEqual({ total_fields: 6, answered_fields: 6, completion_rate: 100 });
      expect(summary.changes_summary).toEqual({
        total_changes: 1,
        response_submissions: 0,
        corrections_made: 0,
        crm_approvals: 1,
        crm_rejections: 0,
        timeline: [
          {
            timestamp: START_ISO,
            action: 'crm_updates_approved',
            description: 'Approved CRM updates for: salesforce',
          },
        ],
      });
      expect(summary.crm_sync_status.sync_records).toHaveLength(1);
      expect(summary.final_summary).toBe('Acme wants a pilot in Q2.');
    });
  });
});
