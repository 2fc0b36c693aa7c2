/**
 * Sync monitoring routes
 * Failed operations, retries, reports, health and CRM connectivity
 */
import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import type { SyncServices } from '@meetsync/crm-sync';
import { FailedOperationsQuerySchema, SyncReportQuerySchema } from '../contracts';
import { throwOnInvalid, validationError } from '../middleware/error-handler';
import type { AppEnv } from '../types';

const DEFAULT_REPORT_DAYS = 7;
const DAY_MS = 24 * 60 * 60 * 1000;

export function syncRoutes(services: SyncServices) {
  const { tracker, syncService, clock } = services;
  const sync = new Hono<AppEnv>();

  /**
   * GET /api/sync/failed-operations?hours_back=
   */
  sync.get('/failed-operations', zValidator('query', FailedOperationsQuerySchema, throwOnInvalid), async (c) => {
    const { hours_back } = c.req.valid('query');
    const operations = await tracker.getFailedOperations(hours_back);
    return c.json({ success: true, data: operations, total: operations.length });
  });

  /**
   * POST /api/sync/operations/:trackingId/retry
   */
  sync.post('/operations/:trackingId/retry', async (c) => {
    const result = await syncService.retryFailedOperation(c.req.param('trackingId'));
    return c.json({ success: true, data: result });
  });

  /**
   * GET /api/sync/report?start_date=&end_date=
   * Defaults to the last seven days
   */
  sync.get('/report', zValidator('query', SyncReportQuerySchema, throwOnInvalid), async (c) => {
    const query = c.req.valid('query');
    const end = query.end_date ? new Date(query.end_date) : new Date(clock.now());
    const start = query.start_date ? new Date(query.start_date) : new Date(end.getTime() - DEFAULT_REPORT_DAYS * DAY_MS);

    if (start.getTime() > end.getTime()) {
      throw validationError('start_date must not be after end_date');
    }

    const report = await tracker.generateSyncReport(start, end);
    return c.json({ success: true, data: report });
  });

  sync.get('/health', async (c) => {
    const health = await tracker.getSyncHealthMetrics();
    return c.json({ success: true, data: health });
  });

  /**
   * GET /api/sync/connections
   * OAuth2 token exchange against every CRM
   */
  sync.get('/connections', async (c) => {
    const results = await syncService.testAllConnections();
    return c.json({ success: true, data: results });
  });

  return sync;
}
