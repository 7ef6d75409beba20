/**
 * Chat Webhook Channel
 *
 * Posts a new-lead alert to a Slack incoming webhook. High-intent leads
 * get a channel-wide mention and the urgent colour.
 *
 * @module lead-intake/channels/slack-webhook
 */

import type { IncomingWebhook, IncomingWebhookSendArguments } from '@slack/webhook';
import {
  formatIntentScore,
  isHighIntent,
} from '../contracts/processed-lead';
import type { LeadNotification, NotificationChannelSender } from './types';

// ===========================================
// Constants
// ===========================================

export const URGENT_COLOR = '#E74C3C';
export const NORMAL_COLOR = '#58B9FF';

/** Request timeout for webhook posts */
export const CHAT_WEBHOOK_TIMEOUT_MS = 10_000;

/** Maximum characters for a field value */
const FIELD_MAX_CHARS = 2000;

const TRUNCATION_ELLIPSIS = '...';

export type ChatWebhookClient = Pick<IncomingWebhook, 'send'>;

// ===========================================
// Message Building
// ===========================================

function truncate(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;
  return text.slice(0, maxChars - TRUNCATION_ELLIPSIS.length) + TRUNCATION_ELLIPSIS;
}

function field(title: string, value: string, short: boolean) {
  return { title, value: truncate(value, FIELD_MAX_CHARS), short };
}

/**
 * Build the webhook payload for a lead
 */
export function buildChatMessage(
  notification: LeadNotification,
  now: Date = new Date()
): IncomingWebhookSendArguments {
  const { lead, processed, meetLink } = notification;
  const urgent = isHighIntent(processed);

  const fields = [
    field('Email', lead.email, true),
    field('Phone', processed.phone, true),
    field('Model', processed.model, true),
    field('Intent Score', `${formatIntentScore(processed.intent_score)}/1.0`, true),
    field('Lead ID', lead.lead_id, true),
    field('Appointment', processed.datetime, false),
  ];

  if (meetLink) {
    fields.push(field('Meeting Link', `<${meetLink}|Join Meeting>`, false));
  }

  return {
    text: urgent ? '<!here> New lead received!' : 'New lead received',
    attachments: [
      {
        color: urgent ? URGENT_COLOR : NORMAL_COLOR,
        title: `New Lead: ${processed.name}`,
        fields,
        footer: 'Lead Intake',
        ts: String(Math.floor(now.getTime() / 1000)),
      },
    ],
  };
}

// ===========================================
// Channel
// ===========================================

export class SlackWebhookChannel implements NotificationChannelSender {
  readonly channel = 'chat_webhook' as const;

  /**
   * @param webhook - Incoming webhook client, null when no URL is configured
   */
  constructor(private readonly webhook: ChatWebhookClient | null) {}

  isConfigured(): boolean {
    return this.webhook !== null;
  }

  async send(notification: LeadNotification): Promise<void> {
    if (!this.webhook) {
      throw new Error('Chat webhook URL is not configured');
    }
    await this.webhook.send(buildChatMessage(notification));
  }
}
