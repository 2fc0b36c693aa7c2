/**
 * SAP C4C Client
 *
 * c4codataapi OData service. Activities and opportunities are addressed
 * by ObjectID keys: `ActivityCollection('id')`.
 *
 * @module clients/sap-c4c
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

export interface SapC4CConfig {
  baseUrl: string;
  clientId: string;
  clientSecret: string;
}

const APPROVAL_FIELD_MAP: Record<string, string> = {
  stage: 'SalesStage',
  deal_stage: 'SalesStage',
  amount: 'ExpectedValue',
  next_action: 'NextSteps',
  close_date: 'ExpectedCloseDate',
};

/** OData v2 wraps entities in `d` (and created ones in `d.results`) */
function extractObjectId(raw: unknown): string | null {
  const envelope = asRecord(raw);
  const d = asRecord(envelope.d);
  return pickId(d.results, ['ObjectID']) ?? pickId(d, ['ObjectID']) ?? pickId(envelope, ['ObjectID']);
}

export class SapC4CClient extends BaseCRMClient {
  constructor(
    config: SapC4CConfig,
    deps: CRMClientDependencies = {},
    options: Partial<CRMClientOptions> = {}
  ) {
    const baseUrl = trimTrailingSlash(config.baseUrl);
    super(
      'sap_c4c',
      {
        baseUrl,
        tokenUrl: `${baseUrl}/sap/bc/sec/oauth2/token`,
        clientId: config.clientId,
        clientSecret: config.clientSecret,
        scope: 'UIWC:CC_HOME',
      },
      deps,
      { requestsPerMinute: 60, ...options }
    );
  }

  private collectionUrl(collection: string, id?: string): string {
    const root = `${this.baseUrl}/sap/c4c/odata/v1/c4codataapi/${collection}`;
    return id ? `${root}('${encodeURIComponent(id)}')` : root;
  }

  async updateRecord(recordId: string, fields: Record<string, unknown>): Promise<CRMWriteResult> {
    const raw = await this.request('PATCH', this.collectionUrl('ActivityCollection', recordId), fields);
    return { id: recordId, raw: raw ?? { Id: recordId, success: true } };
  }

  async createTask(recordId: string, fields: Record<string, unknown>): Promise<CRMWriteResult> {
    const raw = await this.request('POST', this.collectionUrl('ActivityCollection'), {
      ...fields,
      AccountID: recordId,
    });
    return { id: extractObjectId(raw), raw };
  }

  async updateOpportunityStage(opportunityId: string, update: StageUpdate): Promise<FormattedWriteResult> {
    const payload = compact({
      SalesStage: update.stage_name,
      Probability: update.probability,
      ExpectedCloseDate: update.close_date,
      ExpectedValue: update.amount,
      NextSteps: update.next_step,
      Description: update.description,
    });
    const raw = await this.request('PATCH', this.collectionUrl('OpportunityCollection', opportunityId), payload);
    return { id: opportunityId, raw: raw ?? { Id: opportunityId, success: true }, payload };
  }

  async getOpportunityDetails(opportunityId: string): Promise<Record<string, unknown>> {
    const raw = asRecord(await this.request('GET', this.collectionUrl('OpportunityCollection', opportunityId)));
    const d = raw.d;
    return d === undefined ? raw : asRecord(d);
  }

  formatMeetingData(data: MeetingData): Record<string, unknown> {
    return compact({
      Subject: data.title,
      Description: data.summary,
      ActivityDate: data.meeting_date,
      ActivityType: 'MEETING',
      Status: 'COMPLETED',
      Notes: data.notes,
      Duration: data.duration_minutes,
      NextSteps: data.next_steps,
    });
  }

  formatTaskData(data: TaskData): Record<string, unknown> {
    return compact({
      Subject: data.title,
      Description: data.description,
      DueDate: data.due_date,
      Priority: (data.priority || 'medium').toUpperCase(),
      Status: 'OPEN',
      ActivityType: 'TASK',
    });
  }

  formatApprovalPayload(base: ApprovalBasePayload, updates: Record<string, unknown>): Record<string, unknown> {
    return {
      ...base,
      Subject: base.meeting_title,
      Description: base.summary,
      ActivityDate: base.meeting_date.slice(0, 10),
      Status: 'COMPLETED',
      ...this.mapApprovedUpdates(updates, APPROVAL_FIELD_MAP),
    };
  }
}
