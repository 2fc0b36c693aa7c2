/**
 * CRM Data Contracts
 *
 * Canonical, CRM-neutral payloads. Each client maps these onto its own
 * field names before sending.
 *
 * @module contracts/crm-data
 */

import { z } from 'zod';

// ===========================================
// Meeting & Task
// ===========================================

export interface MeetingData {
  title: string;
  meeting_date: string;
  summary: string;
  outcome: string;
  notes: string;
  key_points: string[];
  action_items: string[];
  next_steps: string;
  decisions_made: string[];
  duration_minutes: number | null;
  meeting_end_date: string | null;
  owner_id?: string;
}

export interface TaskData {
  title: string;
  description: string;
  due_date: string | null;
  assignee: string | null;
  /** Free-form; clients normalize casing */
  priority: string;
  start_date: string;
  owner_id?: string;
}

// ===========================================
// Opportunity
// ===========================================

export const StageUpdateSchema = z.object({
  stage_name: z.string().optional(),
  /** Creatio references stages by id */
  stage_id: z.string().optional(),
  probability: z.number().min(0).max(100).optional(),
  close_date: z.string().optional(),
  amount: z.number().nonnegative().optional(),
  next_step: z.string().optional(),
  description: z.string().optional(),
});
export type StageUpdate = z.infer<typeof StageUpdateSchema>;

// ===========================================
// Remote Results
// ===========================================

export interface OAuth2Token {
  access_token: string;
  refresh_token?: string;
  /** Epoch ms, already reduced by the safety buffer */
  expires_at: number;
  token_type: string;
  scope?: string;
}

/** Result of a remote write */
export interface CRMWriteResult {
  /** Remote record id when the CRM returns one */
  id: string | null;
  raw: unknown;
}
