/**
 * Request schemas for the sync API
 *
 * @module contracts/requests
 */

import { z } from 'zod';
import { CRMSystemSchema, StageUpdateSchema, SyncRecordStatusSchema } from '@meetsync/crm-sync';

// ============================================================================
// Validation sessions
// ============================================================================

export const ApproveCrmRequestSchema = z.object({
  /** Checked against the supported systems by the approval service */
  approved_systems: z.array(z.string()).min(1),
  custom_updates: z.record(z.unknown()).optional(),
  /** Push the approved records right away */
  dispatch: z.boolean().default(false),
});
export type ApproveCrmRequest = z.infer<typeof ApproveCrmRequestSchema>;

export const RejectCrmRequestSchema = z.object({
  reason: z.string().min(1),
});

export const CrmSystemsRequestSchema = z.object({
  crm_systems: z.array(CRMSystemSchema).min(1),
});

export const CrmSystemRequestSchema = z.object({
  crm_system: CRMSystemSchema,
});

export const CrmSystemQuerySchema = CrmSystemRequestSchema;

export const UpdateOpportunityRequestSchema = z.object({
  crm_system: CRMSystemSchema,
  opportunity_id: z.string().min(1),
  stage_update: StageUpdateSchema,
});

export const BulkSyncRequestSchema = z
  .object({
    crm_system: CRMSystemSchema,
    opportunity_id: z.string().min(1).optional(),
    stage_update: StageUpdateSchema.optional(),
  })
  .refine((body) => (body.opportunity_id === undefined) === (body.stage_update === undefined), {
    message: 'opportunity_id and stage_update must be given together',
    path: ['opportunity_id'],
  });

// ============================================================================
// Sync records
// ============================================================================

export const SyncRecordStatusReportSchema = z.object({
  status: SyncRecordStatusSchema,
  crm_record_id: z.string().optional(),
  error_message: z.string().optional(),
});

// ============================================================================
// Tracker
// ============================================================================

export const FailedOperationsQuerySchema = z.object({
  hours_back: z.coerce.number().positive().max(24 * 30).default(24),
});

export const SyncReportQuerySchema = z.object({
  start_date: z.string().datetime().optional(),
  end_date: z.string().datetime().optional(),
});
