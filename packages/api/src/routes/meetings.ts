/**
 * Meeting routes
 */
import { Hono } from 'hono';
import type { SyncServices } from '@meetsync/crm-sync';
import type { AppEnv } from '../types';

export function meetingRoutes(services: SyncServices) {
  const meetings = new Hono<AppEnv>();

  /**
   * GET /api/meetings/:id/sync-status
   * Tracked operations of the last 24 hours
   */
  meetings.get('/:id/sync-status', async (c) => {
    const status = await services.tracker.getSyncStatus(c.req.param('id'));
    return c.json({ success: true, data: status });
  });

  return meetings;
}
