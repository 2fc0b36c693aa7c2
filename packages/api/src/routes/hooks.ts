/**
 * Status hooks
 * Open endpoints where external sync processes report record outcomes
 */
import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import type { SyncServices } from '@meetsync/crm-sync';
import { SyncRecordStatusReportSchema } from '../contracts';
import { throwOnInvalid } from '../middleware/error-handler';
import type { AppEnv } from '../types';

export function hookRoutes(services: SyncServices) {
  const hooks = new Hono<AppEnv>();

  /**
   * PUT /hooks/crm-sync-records/:id/status
   */
  hooks.put(
    '/crm-sync-records/:id/status',
    zValidator('json', SyncRecordStatusReportSchema, throwOnInvalid),
    async (c) => {
      const { status, crm_record_id, error_message } = c.req.valid('json');
      const record = await services.approvalService.updateSyncRecordStatus(
        c.req.param('id'),
        status,
        crm_record_id,
        error_message
      );
      return c.json({ success: true, data: record });
    }
  );

  return hooks;
}
