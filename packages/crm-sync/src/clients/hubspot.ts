/**
 * HubSpot Client
 *
 * CRM v3 objects API. Properties travel under `properties`; tasks are
 * associated to their record with association type 204.
 *
 * @module clients/hubspot
 */

import type { CRMWriteResult, MeetingData, StageUpdate, TaskData } from '../contracts';
import {
  BaseCRMClient,
  asRecord,
  compact,
  pickId,
  trimTrailingSlash,
  type ApprovalBasePayload,
  type CRMClientDependencies,
  type CRMClientOptions,
  type FormattedWriteResult,
} from './base-client';

export interface HubSpotConfig {
  baseUrl?: string;
  clientId: string;
  clientSecret: string;
}

export const HUBSPOT_DEFAULT_BASE_URL = 'https://api.hubapi.com';
export const HUBSPOT_TASK_ASSOCIATION_TYPE_ID = 204;

const HUBSPOT_SCOPES = 'contacts crm.objects.contacts.write crm.objects.deals.write';

const APPROVAL_FIELD_MAP: Record<string, string> = {
  stage: 'dealstage',
  deal_stage: 'dealstage',
  close_date: 'closedate',
  probability: 'hs_deal_stage_probability',
};

export class HubSpotClient extends BaseCRMClient {
  constructor(
    config: HubSpotConfig,
    deps: CRMClientDependencies = {},
    options: Partial<CRMClientOptions> = {}
  ) {
    const baseUrl = trimTrailingSlash(config.baseUrl || HUBSPOT_DEFAULT_BASE_URL);
    super(
      'hubspot',
      {
        baseUrl,
        tokenUrl: `${baseUrl}/oauth/v1/token`,
        clientId: config.clientId,
        clientSecret: config.clientSecret,
        scope: HUBSPOT_SCOPES,
      },
      deps,
      { requestsPerMinute: 100, ...options }
    );
  }

  private objectUrl(type: 'contacts' | 'tasks' | 'deals', id?: string): string {
    const root = `${this.baseUrl}/crm/v3/objects/${type}`;
    return id ? `${root}/${encodeURIComponent(id)}` : root;
  }

  async updateRecord(recordId: string, fields: Record<string, unknown>): Promise<CRMWriteResult> {
    const raw = await this.request('PATCH', this.objectUrl('contacts', recordId), { properties: fields });
    return { id: pickId(raw, ['id']) ?? recordId, raw };
  }

  async createTask(recordId: string, fields: Record<string, unknown>): Promise<CRMWriteResult> {
    const raw = await this.request('POST', this.objectUrl('tasks'), {
      properties: fields,
      associations: [
        {
          to: { id: recordId },
          types: [
            {
              associationCategory: 'HUBSPOT_DEFINED',
              associationTypeId: HUBSPOT_TASK_ASSOCIATION_TYPE_ID,
            },
          ],
        },
      ],
    });
    return { id: pickId(raw, ['id']), raw };
  }

  async updateOpportunityStage(opportunityId: string, update: StageUpdate): Promise<FormattedWriteResult> {
    const payload = compact({
      dealstage: update.stage_name,
      hs_deal_stage_probability: update.probability,
      closedate: update.close_date,
      amount: update.amount,
      notes_next_activity_note: update.next_step,
      description: update.description,
    });
    const raw = await this.request('PATCH', this.objectUrl('deals', opportunityId), { properties: payload });
    return { id: pickId(raw, ['id']) ?? opportunityId, raw, payload };
  }

  async getOpportunityDetails(opportunityId: string): Promise<Record<string, unknown>> {
    return asRecord(await this.request('GET', this.objectUrl('deals', opportunityId)));
  }

  formatMeetingData(data: MeetingData): Record<string, unknown> {
    return compact({
      hs_meeting_title: data.title,
      hs_meeting_body: data.summary,
      hs_meeting_start_time: data.meeting_date,
      hs_meeting_end_time: data.meeting_end_date,
      hs_meeting_outcome: 'COMPLETED',
      hs_meeting_notes: data.notes,
      hubspot_owner_id: data.owner_id,
      hs_activity_type: 'MEETING',
      hs_timestamp: data.meeting_date,
    });
  }

  formatTaskData(data: TaskData): Record<string, unknown> {
    return compact({
      hs_task_subject: data.title,
      hs_task_body: data.description,
      hs_task_status: 'NOT_STARTED',
      hs_task_priority: (data.priority || 'medium').toUpperCase(),
      hs_task_type: 'TODO',
      hs_timestamp: data.due_date,
      hubspot_owner_id: data.owner_id,
    });
  }

  formatApprovalPayload(base: ApprovalBasePayload, updates: Record<string, unknown>): Record<string, unknown> {
    return {
      ...base,
      hs_meeting_title: base.meeting_title,
      hs_meeting_body: base.summary,
      hs_meeting_start_time: base.meeting_date,
      hs_meeting_outcome: 'COMPLETED',
      ...this.mapApprovedUpdates(updates, APPROVAL_FIELD_MAP),
    };
  }
}
