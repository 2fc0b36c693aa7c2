/**
 * Salesforce Client
 *
 * REST sobjects API (v58.0). Meeting outcomes land on an Activity, follow-up
 * tasks are Tasks linked through WhatId.
 *
 * @module clients/salesforce
 */

import type { CRMWriteResult, MeetingData, StageUpdate, TaskData } from '../contracts';
import {
  BaseCRMClient,
  asRecord,
  bulletList,
  compact,
  pickId,
  titleCase,
  trimTrailingSlash,
  type ApprovalBasePayload,
  type CRMClientDependencies,
  type CRMClientOptions,
  type FormattedWriteResult,
} from './base-client';

export interface SalesforceConfig {
  instanceUrl: string;
  clientId: string;
  clientSecret: string;
  apiVersion?: string;
}

const APPROVAL_FIELD_MAP: Record<string, string> = {
  stage: 'StageName',
  deal_stage: 'StageName',
  next_action: 'NextStep',
  amount: 'Amount',
  close_date: 'CloseDate',
  probability: 'Probability',
};

export class SalesforceClient extends BaseCRMClient {
  private readonly apiVersion: string;

  constructor(
    config: SalesforceConfig,
    deps: CRMClientDependencies = {},
    options: Partial<CRMClientOptions> = {}
  ) {
    const instanceUrl = trimTrailingSlash(config.instanceUrl);
    super(
      'salesforce',
      {
        baseUrl: instanceUrl,
        tokenUrl: `${instanceUrl}/services/oauth2/token`,
        clientId: config.clientId,
        clientSecret: config.clientSecret,
        scope: 'api',
      },
      deps,
      { requestsPerMinute: 100, ...options }
    );
    this.apiVersion = config.apiVersion ?? 'v58.0';
  }

  private sobjectUrl(type: string, id?: string): string {
    const root = `${this.baseUrl}/services/data/${this.apiVersion}/sobjects/${type}`;
    return id ? `${root}/${encodeURIComponent(id)}` : root;
  }

  async updateRecord(recordId: string, fields: Record<string, unknown>): Promise<CRMWriteResult> {
    const raw = await this.request('PATCH', this.sobjectUrl('Activity', recordId), fields);
    // PATCH answers 204 No Content on success
    return { id: recordId, raw: raw ?? { Id: recordId, success: true } };
  }

  async createTask(recordId: string, fields: Record<string, unknown>): Promise<CRMWriteResult> {
    const raw = await this.request('POST', this.sobjectUrl('Task'), { ...fields, WhatId: recordId });
    return { id: pickId(raw, ['id', 'Id']), raw };
  }

  async updateOpportunityStage(opportunityId: string, update: StageUpdate): Promise<FormattedWriteResult> {
    const payload = compact({
      StageName: update.stage_name,
      Probability: update.probability,
      CloseDate: update.close_date,
      Amount: update.amount,
      NextStep: update.next_step,
      Description: update.description,
    });
    const raw = await this.request('PATCH', this.sobjectUrl('Opportunity', opportunityId), payload);
    return { id: opportunityId, raw: raw ?? { Id: opportunityId, success: true }, payload };
  }

  async getOpportunityDetails(opportunityId: string): Promise<Record<string, unknown>> {
    return asRecord(await this.request('GET', this.sobjectUrl('Opportunity', opportunityId)));
  }

  formatMeetingData(data: MeetingData): Record<string, unknown> {
    return {
      Description: data.summary,
      Subject: `Meeting: ${data.title || 'Meeting Summary'}`,
      ActivityDate: data.meeting_date.slice(0, 10),
      Status: 'Completed',
      Type: 'Meeting',
      Meeting_Notes__c: data.notes,
      Key_Points__c: bulletList(data.key_points),
      Action_Items__c: bulletList(data.action_items),
      Next_Steps__c: data.next_steps,
      Meeting_Duration__c: data.duration_minutes,
    };
  }

  formatTaskData(data: TaskData): Record<string, unknown> {
    return compact({
      Subject: data.title || 'Follow-up Task',
      Description: data.description,
      ActivityDate: data.due_date ? data.due_date.slice(0, 10) : null,
      Priority: titleCase(data.priority || 'Normal'),
      Status: 'Not Started',
      Type: 'Task',
      OwnerId: data.owner_id,
    });
  }

  formatApprovalPayload(base: ApprovalBasePayload, updates: Record<string, unknown>): Record<string, unknown> {
    return {
      ...base,
      Subject: base.meeting_title,
      Description: base.summary,
      ActivityDate: base.meeting_date.slice(0, 10),
      Status: 'Completed',
      Type: 'Meeting',
      ...this.mapApprovedUpdates(updates, APPROVAL_FIELD_MAP),
    };
  }
}
