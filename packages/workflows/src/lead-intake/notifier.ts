/**
 * Notifier
 *
 * Dispatches a lead announcement to one channel. Single attempt, no retry.
 *
 * @module lead-intake/notifier
 */

import { stepFailure } from '@lead-intake/lib';
import type { Lead } from './contracts/lead-input';
import type { ProcessedLead } from './contracts/processed-lead';
import type { NotificationChannelSender } from './channels/types';
import { classifyError } from './error-handler';
import { logger as defaultLogger, type LeadIntakeLogger } from './logger';
import { NotificationChannelSchema, type NotificationChannel, type NotifyOutput } from './types';

export class Notifier {
  private readonly senders = new Map<NotificationChannel, NotificationChannelSender>();
  private readonly logger: LeadIntakeLogger;

  constructor(
    senders: readonly NotificationChannelSender[],
    options: { logger?: LeadIntakeLogger } = {}
  ) {
    for (const sender of senders) {
      this.senders.set(sender.channel, sender);
    }
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Channels with credentials in place
   */
  configuredChannels(): NotificationChannel[] {
    return [...this.senders.values()]
      .filter((sender) => sender.isConfigured())
      .map((sender) => sender.channel);
  }

  async notify(
    lead: Lead,
    processed: ProcessedLead,
    meetLink: string | null,
    channel: string
  ): Promise<NotifyOutput> {
    const parsedChannel = NotificationChannelSchema.safeParse(channel);
    const sender = parsedChannel.success ? this.senders.get(parsedChannel.data) : undefined;

    if (!parsedChannel.success || !sender || !sender.isConfigured()) {
      const error = `Notification channel ${channel} not configured`;
      this.logger.notificationFailed({
        lead_id: lead.lead_id,
        channel,
        error_code: 'NOT_CONFIGURED',
        error_message: error,
      });
      return stepFailure('NOT_CONFIGURED', error);
    }

    try {
      await sender.send({ lead, processed, meetLink });
      this.logger.notificationSent({ lead_id: lead.lead_id, channel: sender.channel });
      return { success: true, channel: sender.channel };
    } catch (error) {
      const classified = classifyError(error);
      this.logger.notificationFailed({
        lead_id: lead.lead_id,
        channel,
        error_code: classified.code,
        error_message: classified.message,
      });
      return stepFailure('DELIVERY_ERROR', classified.message);
    }
  }
}
