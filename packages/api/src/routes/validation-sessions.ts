/**
 * Validation session routes
 * Approval workflow and per-session CRM sync endpoints
 */
import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { ValidationSessionSchema, type SyncServices } from '@meetsync/crm-sync';
import {
  ApproveCrmRequestSchema,
  BulkSyncRequestSchema,
  CrmSystemQuerySchema,
  CrmSystemRequestSchema,
  CrmSystemsRequestSchema,
  RejectCrmRequestSchema,
  UpdateOpportunityRequestSchema,
} from '../contracts';
import { notFoundError, throwOnInvalid } from '../middleware/error-handler';
import type { AppEnv } from '../types';

export function validationSessionRoutes(services: SyncServices) {
  const { sessions, syncService, approvalService } = services;
  const validationSessions = new Hono<AppEnv>();

  /**
   * POST /api/validation-sessions
   * Register or replace a validation session
   */
  validationSessions.post('/', zValidator('json', ValidationSessionSchema, throwOnInvalid), async (c) => {
    const session = await sessions.save(c.req.valid('json'));
    return c.json({ success: true, data: session }, 201);
  });

  /**
   * GET /api/validation-sessions/:id
   */
  validationSessions.get('/:id', async (c) => {
    const id = c.req.param('id');
    const session = await sessions.get(id);

    if (!session) {
      throw notFoundError(`Validation session ${id}`);
    }

    return c.json({ success: true, data: session });
  });

  // ============================================================================
  // Approval
  // ============================================================================

  /**
   * POST /api/validation-sessions/:id/approve-crm
   * Approve updates for the given systems, optionally dispatching them
   */
  validationSessions.post(
    '/:id/approve-crm',
    zValidator('json', ApproveCrmRequestSchema, throwOnInvalid),
    async (c) => {
      const id = c.req.param('id');
      const { approved_systems, custom_updates, dispatch } = c.req.valid('json');

      const approved = await approvalService.approveCrmUpdates(id, approved_systems, custom_updates);
      const syncRecords = dispatch ? await approvalService.dispatchApprovedRecords(id) : approved;

      return c.json({ success: true, data: { sync_records: syncRecords, dispatched: dispatch } });
    }
  );

  /**
   * POST /api/validation-sessions/:id/reject-crm
   */
  validationSessions.post('/:id/reject-crm', zValidator('json', RejectCrmRequestSchema, throwOnInvalid), async (c) => {
    const session = await approvalService.rejectCrmUpdates(c.req.param('id'), c.req.valid('json').reason);
    return c.json({ success: true, data: session });
  });

  validationSessions.get('/:id/crm-sync-status', async (c) => {
    const status = await approvalService.getCrmSyncStatus(c.req.param('id'));
    return c.json({ success: true, data: status });
  });

  validationSessions.get('/:id/approval-summary', async (c) => {
    const summary = await approvalService.generateApprovalSummary(c.req.param('id'));
    return c.json({ success: true, data: summary });
  });

  // ============================================================================
  // Sync
  // ============================================================================

  /**
   * POST /api/validation-sessions/:id/sync
   * Sync the meeting outcome to several CRMs
   */
  validationSessions.post('/:id/sync', zValidator('json', CrmSystemsRequestSchema, throwOnInvalid), async (c) => {
    const results = await syncService.syncToMultipleCrms(c.req.param('id'), c.req.valid('json').crm_systems);
    return c.json({ success: true, data: results });
  });

  /**
   * GET /api/validation-sessions/:id/sync-status?crm_system=
   */
  validationSessions.get('/:id/sync-status', zValidator('query', CrmSystemQuerySchema, throwOnInvalid), async (c) => {
    const id = c.req.param('id');
    const { crm_system } = c.req.valid('query');
    const status = await syncService.getSyncStatus(id, crm_system);

    if (!status) {
      throw notFoundError(`Sync record for session ${id} on ${crm_system}`);
    }

    return c.json({ success: true, data: status });
  });

  validationSessions.post('/:id/tasks', zValidator('json', CrmSystemRequestSchema, throwOnInvalid), async (c) => {
    const results = await syncService.createFollowUpTasks(c.req.param('id'), c.req.valid('json').crm_system);
    return c.json({ success: true, data: results });
  });

  /**
   * POST /api/validation-sessions/:id/retry-sync
   * Re-run the meeting outcome sync, bypassing the success cache
   */
  validationSessions.post('/:id/retry-sync', zValidator('json', CrmSystemRequestSchema, throwOnInvalid), async (c) => {
    const result = await syncService.retryFailedSync(c.req.param('id'), c.req.valid('json').crm_system);
    return c.json({ success: true, data: result });
  });

  // ============================================================================
  // Opportunities
  // ============================================================================

  validationSessions.post(
    '/:id/update-opportunity',
    zValidator('json', UpdateOpportunityRequestSchema, throwOnInvalid),
    async (c) => {
      const { crm_system, opportunity_id, stage_update } = c.req.valid('json');
      const result = await syncService.updateOpportunityFromMeeting(
        c.req.param('id'),
        crm_system,
        opportunity_id,
        stage_update
      );
      return c.json({ success: true, data: result });
    }
  );

  validationSessions.get('/:id/opportunity-suggestions', async (c) => {
    const suggestions = await syncService.getOpportunitySyncSuggestions(c.req.param('id'));
    return c.json({ success: true, data: suggestions });
  });

  /**
   * POST /api/validation-sessions/:id/bulk-sync
   * Meeting outcome, follow-up tasks and an optional opportunity update
   */
  validationSessions.post('/:id/bulk-sync', zValidator('json', BulkSyncRequestSchema, throwOnInvalid), async (c) => {
    const { crm_system, opportunity_id, stage_update } = c.req.valid('json');
    const opportunity =
      opportunity_id !== undefined && stage_update !== undefined
        ? { opportunityId: opportunity_id, update: stage_update }
        : undefined;

    const result = await syncService.bulkSyncValidationSession(c.req.param('id'), crm_system, { opportunity });
    return c.json({ success: true, data: result });
  });

  return validationSessions;
}
