/**
 * Validation Session Contracts
 *
 * A validation session is the sales rep's review of a meeting's AI summary.
 * Once completed, its approved CRM updates drive every sync.
 *
 * @module contracts/validation-session
 */

import { z } from 'zod';

// ===========================================
// Lead & Meeting
// ===========================================

export const LeadSchema = z.object({
  /** Remote CRM id; syncs are impossible without it */
  crm_id: z.string().nullable(),
  name: z.string(),
  email: z.string(),
  company: z.string().default(''),
});
export type Lead = z.infer<typeof LeadSchema>;

export const MeetingSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  start_time: z.string(),
  end_time: z.string().nullable().default(null),
  attendees: z.array(z.string()).default([]),
  lead: LeadSchema.nullable().default(null),
  updated_at: z.string(),
});
export type Meeting = z.infer<typeof MeetingSchema>;

// ===========================================
// Rep Responses
// ===========================================

export const MeetingOutcomeSchema = z.enum(['very_positive', 'positive', 'neutral', 'negative']);
export type MeetingOutcome = z.infer<typeof MeetingOutcomeSchema>;

export const RepResponsesSchema = z.object({
  meeting_notes: z.string().optional(),
  key_points: z.array(z.string()).optional(),
  action_items: z.array(z.string()).optional(),
  next_steps: z.string().optional(),
  decisions_made: z.array(z.string()).optional(),
  meeting_outcome: MeetingOutcomeSchema.optional(),
});
export type RepResponses = z.infer<typeof RepResponsesSchema>;

/** Action item as approved for task creation */
export const ApprovedActionItemSchema = z.object({
  title: z.string().optional(),
  description: z.string().default(''),
  due_date: z.string().nullable().optional(),
  assignee: z.string().nullable().optional(),
  priority: z.string().optional(),
});
export type ApprovedActionItem = z.infer<typeof ApprovedActionItemSchema>;

// ===========================================
// Audit Trail
// ===========================================

export const AuditEntrySchema = z
  .object({
    action: z.string(),
    timestamp: z.string(),
  })
  .catchall(z.unknown());
export type AuditEntry = z.infer<typeof AuditEntrySchema>;

// ===========================================
// Validation Session
// ===========================================

export const ValidationStatusSchema = z.enum(['pending', 'in_progress', 'completed', 'expired']);
export type ValidationStatus = z.infer<typeof ValidationStatusSchema>;

export const ValidationSessionSchema = z.object({
  id: z.string().min(1),
  meeting: MeetingSchema,
  bot_join_time: z.string().nullable().default(null),
  bot_leave_time: z.string().nullable().default(null),
  sales_rep_email: z.string(),
  ai_generated_summary: z.string().default(''),
  validated_summary: z.string().default(''),
  rep_responses: RepResponsesSchema.default({}),
  approved_crm_updates: z.record(z.unknown()).default({}),
  validation_status: ValidationStatusSchema,
  changes_made: z.array(AuditEntrySchema).default([]),
  started_at: z.string(),
  completed_at: z.string().nullable().default(null),
});
export type ValidationSession = z.infer<typeof ValidationSessionSchema>;
export type ValidationSessionInput = z.input<typeof ValidationSessionSchema>;

/**
 * Action items approved for CRM task creation.
 * Entries that do not parse are skipped.
 */
export function getApprovedActionItems(session: ValidationSession): ApprovedActionItem[] {
  const raw = session.approved_crm_updates.action_items;
  if (!Array.isArray(raw)) return [];

  const items: ApprovedActionItem[] = [];
  for (const entry of raw) {
    const parsed = ApprovedActionItemSchema.safeParse(
      typeof entry === 'string' ? { description: entry } : entry
    );
    if (parsed.success) {
      items.push(parsed.data);
    }
  }
  return items;
}
