/**
 * Notification Channel Types
 *
 * @module lead-intake/channels/types
 */

import type { Lead } from '../contracts/lead-input';
import type { ProcessedLead } from '../contracts/processed-lead';
import type { NotificationChannel } from '../types';

/**
 * Everything a channel needs to announce one lead
 */
export interface LeadNotification {
  lead: Lead;
  processed: ProcessedLead;
  meetLink: string | null;
}

/**
 * One outbound notification channel. `send` makes a single attempt and
 * rejects on any delivery fault.
 */
export interface NotificationChannelSender {
  readonly channel: NotificationChannel;
  /** Whether credentials or a target are configured */
  isConfigured(): boolean;
  send(notification: LeadNotification): Promise<void>;
}
