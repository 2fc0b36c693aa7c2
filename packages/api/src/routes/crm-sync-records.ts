/**
 * CRM sync record routes
 */
import { Hono } from 'hono';
import type { SyncServices } from '@meetsync/crm-sync';
import type { AppEnv } from '../types';

export function crmSyncRecordRoutes(services: SyncServices) {
  const { approvalService, syncService } = services;
  const crmSyncRecords = new Hono<AppEnv>();

  /**
   * POST /api/crm-sync-records/:id/retry
   * Move a failed record back to retrying and dispatch it again
   */
  crmSyncRecords.post('/:id/retry', async (c) => {
    const id = c.req.param('id');

    await approvalService.retryFailedSync(id);
    const record = await syncService.dispatchSyncRecord(id);

    return c.json({ success: true, data: record });
  });

  return crmSyncRecords;
}
