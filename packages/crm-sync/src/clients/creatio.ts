/**
 * Creatio Client
 *
 * OData v4 under `{base}/0/odata`, tokens from a separate identity server.
 * Meeting outcomes are written onto the Lead; tasks are Activities.
 *
 * @module clients/creatio
 */

import type { CRMWriteResult, MeetingData, StageUpdate, TaskData } from '../contracts';
import {
  BaseCRMClient,
  asRecord,
  compact,
  pickId,
  titleCase,
  trimTrailingSlash,
  type ApprovalBasePayload,
  type CRMClientDependencies,
  type CRMClientOptions,
  type FormattedWriteResult,
} from './base-client';

export interface CreatioConfig {
  baseUrl: string;
  /** Identity server issuing tokens */
  identityUrl: string;
  clientId: string;
  clientSecret: string;
}

const APPROVAL_FIELD_MAP: Record<string, string> = {
  stage: 'Stage',
  deal_stage: 'Stage',
  amount: 'Budget',
  next_action: 'NextSteps',
};

export class CreatioClient extends BaseCRMClient {
  constructor(
    config: CreatioConfig,
    deps: CRMClientDependencies = {},
    options: Partial<CRMClientOptions> = {}
  ) {
    super(
      'creatio',
      {
        baseUrl: config.baseUrl,
        tokenUrl: config.identityUrl ? `${trimTrailingSlash(config.identityUrl)}/connect/token` : '',
        clientId: config.clientId,
        clientSecret: config.clientSecret,
        scope: 'api',
      },
      deps,
      { requestsPerMinute: 120, ...options }
    );
  }

  protected override extraHeaders(): Record<string, string> {
    return { ForceUseSession: 'true' };
  }

  private entityUrl(collection: string, id?: string): string {
    const root = `${this.baseUrl}/0/odata/${collection}`;
    return id ? `${root}(${encodeURIComponent(id)})` : root;
  }

  async updateRecord(recordId: string, fields: Record<string, unknown>): Promise<CRMWriteResult> {
    const raw = await this.request('PATCH', this.entityUrl('Lead', recordId), fields);
    return { id: recordId, raw: raw ?? { Id: recordId, success: true } };
  }

  async createTask(recordId: string, fields: Record<string, unknown>): Promise<CRMWriteResult> {
    const raw = await this.request('POST', this.entityUrl('Activity'), { ...fields, AccountId: recordId });
    return { id: pickId(raw, ['Id', 'id']), raw };
  }

  async updateOpportunityStage(opportunityId: string, update: StageUpdate): Promise<FormattedWriteResult> {
    const payload = compact({
      StageId: update.stage_id,
      Probability: update.probability,
      DueDate: update.close_date,
      Budget: update.amount,
      NextSteps: update.next_step,
      Notes: update.description,
      ModifiedOn: new Date(this.clock.now()).toISOString(),
    });
    const raw = await this.request('PATCH', this.entityUrl('Opportunity', opportunityId), payload);
    return { id: opportunityId, raw: raw ?? { Id: opportunityId, success: true }, payload };
  }

  async getOpportunityDetails(opportunityId: string): Promise<Record<string, unknown>> {
    return asRecord(await this.request('GET', this.entityUrl('Opportunity', opportunityId)));
  }

  formatMeetingData(data: MeetingData): Record<string, unknown> {
    return compact({
      UsrMeetingNotes: data.notes,
      UsrMeetingSummary: data.summary,
      UsrLastMeetingDate: data.meeting_date,
      UsrMeetingDuration: data.duration_minutes,
      UsrMeetingOutcome: data.outcome || 'completed',
      UsrNextSteps: data.next_steps,
      ModifiedOn: new Date(this.clock.now()).toISOString(),
    });
  }

  formatTaskData(data: TaskData): Record<string, unknown> {
    return compact({
      Title: data.title,
      Notes: data.description,
      DueDate: data.due_date,
      StartDate: data.start_date,
      Status: { Name: 'Not started' },
      Priority: { Name: titleCase(data.priority || 'Medium') },
      Type: { Name: 'Task' },
    });
  }

  formatApprovalPayload(base: ApprovalBasePayload, updates: Record<string, unknown>): Record<string, unknown> {
    return {
      ...base,
      Title: base.meeting_title,
      Notes: base.summary,
      StartDate: base.meeting_date,
      Status: 'Completed',
      ...this.mapApprovedUpdates(updates, APPROVAL_FIELD_MAP),
    };
  }
}
