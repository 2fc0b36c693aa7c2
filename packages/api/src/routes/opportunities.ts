/**
 * Opportunity routes
 */
import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import type { SyncServices } from '@meetsync/crm-sync';
import { CrmSystemQuerySchema } from '../contracts';
import { throwOnInvalid } from '../middleware/error-handler';
import type { AppEnv } from '../types';

export function opportunityRoutes(services: SyncServices) {
  const opportunities = new Hono<AppEnv>();

  /**
   * GET /api/opportunities/:id?crm_system=
   * Raw opportunity as the CRM returns it
   */
  opportunities.get('/:id', zValidator('query', CrmSystemQuerySchema, throwOnInvalid), async (c) => {
    const { crm_system } = c.req.valid('query');
    const opportunity = await services.syncService.getOpportunityDetails(crm_system, c.req.param('id'));
    return c.json({ success: true, data: opportunity });
  });

  return opportunities;
}
