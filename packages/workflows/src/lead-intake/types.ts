/**
 * Lead Intake Types
 *
 * Internal types used by the lead intake workflow and its collaborators.
 * For contract types, see ./contracts/
 *
 * @module lead-intake/types
 */

import { z } from 'zod';
import type { StepOutput } from '@lead-intake/lib';

// ===========================================
// Workflow Stages
// ===========================================

/**
 * Stages of a single request, strictly sequential
 */
export type WorkflowStage =
  | 'received'
  | 'validated'
  | 'identified'
  | 'dedupe_checked'
  | 'scored'
  | 'stored'
  | 'scheduled'
  | 'notified'
  | 'done';

// ===========================================
// Notification Channels
// ===========================================

export const NotificationChannelSchema = z.enum(['chat_webhook', 'email']);

export type NotificationChannel = z.infer<typeof NotificationChannelSchema>;

export const DEFAULT_NOTIFICATION_CHANNELS: readonly NotificationChannel[] = [
  'chat_webhook',
  'email',
];

// ===========================================
// Step Outputs
// ===========================================

export type StoreErrorCode = 'DUPLICATE' | 'NOT_FOUND' | 'STORE_ERROR';

export type AppendOutput = StepOutput<{ row: LeadRowValues }, StoreErrorCode>;

export type UpdateStatusOutput = StepOutput<{ row: number }, StoreErrorCode>;

export type ScheduleErrorCode = 'INVALID_DATETIME' | 'CALENDAR_ERROR';

export type ScheduleOutput = StepOutput<
  { meetLink: string; eventId: string; eventLink: string },
  ScheduleErrorCode
>;

export type NotifyErrorCode = 'NOT_CONFIGURED' | 'DELIVERY_ERROR';

export type NotifyOutput = StepOutput<{ channel: NotificationChannel }, NotifyErrorCode>;

// ===========================================
// Store Rows
// ===========================================

/** Header row of the lead sheet, in column order */
export const LEAD_SHEET_HEADERS = [
  'Timestamp',
  'Name',
  'Email',
  'Phone',
  'Car Model',
  'Appointment',
  'Intent Score',
] as const;

export type LeadSheetHeader = (typeof LEAD_SHEET_HEADERS)[number];

/** Values written for one lead, in header order */
export type LeadRowValues = [string, string, string, string, string, string, number];

/** A sheet row keyed by header name */
export type LeadRecord = Record<string, string>;
