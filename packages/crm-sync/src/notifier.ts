/**
 * Sync Failure Notifier
 *
 * Posts a Slack escalation when a sync fails after the client exhausted
 * its own retries. Notification errors are logged, never thrown.
 *
 * @module notifier
 */

import type { Block, KnownBlock, WebClient } from '@slack/web-api';
import { CRM_SYSTEM_LABELS, type CRMSystem } from '@meetsync/lib';
import type { SyncOperation } from './contracts';
import type { ClassifiedError } from './errors';
import type { SyncLogger } from './logger';

export interface SyncFailureNotice {
  validationSessionId: string;
  meetingTitle?: string;
  crmSystem: CRMSystem;
  operation: SyncOperation;
  error: ClassifiedError;
  retryCount: number;
}

export interface SyncNotifier {
  notifyFailure(notice: SyncFailureNotice): Promise<void>;
}

export interface SlackNotifierConfig {
  channel: string;
}

export const DEFAULT_SLACK_NOTIFIER_CONFIG: SlackNotifierConfig = {
  channel: 'crm-sync-escalations',
};

const OPERATION_LABELS: Record<SyncOperation, string> = {
  meeting_outcome: 'Meeting outcome',
  follow_up_tasks: 'Follow-up tasks',
  lead_update: 'Opportunity update',
};

/**
 * Build the Slack blocks for a failed sync.
 */
export function formatSyncFailureBlocks(notice: SyncFailureNotice): (Block | KnownBlock)[] {
  const system = CRM_SYSTEM_LABELS[notice.crmSystem];
  return [
    {
      type: 'header',
      text: { type: 'plain_text', text: `:warning: ${system} sync failed` },
    },
    {
      type: 'section',
      fields: [
        { type: 'mrkdwn', text: `*Operation:*\n${OPERATION_LABELS[notice.operation]}` },
        { type: 'mrkdwn', text: `*Validation session:*\n${notice.validationSessionId}` },
        { type: 'mrkdwn', text: `*Meeting:*\n${notice.meetingTitle ?? 'Unknown'}` },
        { type: 'mrkdwn', text: `*Error code:*\n${notice.error.code}` },
      ],
    },
    {
      type: 'section',
      text: { type: 'mrkdwn', text: `\`\`\`${notice.error.message.slice(0, 500)}\`\`\`` },
    },
    { type: 'divider' },
    {
      type: 'context',
      elements: [
        {
          type: 'mrkdwn',
          text: `:rotating_light: *Escalation* - retry count ${notice.retryCount}. Use the retry action on the sync record once the cause is fixed.`,
        },
      ],
    },
  ];
}

export class SlackSyncNotifier implements SyncNotifier {
  private readonly config: SlackNotifierConfig;

  constructor(
    private readonly deps: { slackClient: WebClient; logger: SyncLogger },
    config?: Partial<SlackNotifierConfig>
  ) {
    this.config = { ...DEFAULT_SLACK_NOTIFIER_CONFIG, ...config };
  }

  async notifyFailure(notice: SyncFailureNotice): Promise<void> {
    try {
      await this.deps.slackClient.chat.postMessage({
        channel: this.config.channel,
        text: `${CRM_SYSTEM_LABELS[notice.crmSystem]} sync failed for validation session ${notice.validationSessionId}`,
        blocks: formatSyncFailureBlocks(notice),
      });

      this.deps.logger.info('Failure notification sent to Slack', {
        channel: this.config.channel,
        validation_session_id: notice.validationSessionId,
        crm_system: notice.crmSystem,
      });
    } catch (error) {
      this.deps.logger.error('Failed to send failure notification to Slack', error, {
        channel: this.config.channel,
        validation_session_id: notice.validationSessionId,
      });
    }
  }
}
