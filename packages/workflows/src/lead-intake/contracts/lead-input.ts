/**
 * Lead Input Contract
 *
 * Defines the inbound lead submission and the immutable Lead built from it.
 * This contract is used by:
 * - Website / form webhook (sender)
 * - Lead Intake workflow (receiver)
 *
 * @module lead-intake/contracts/lead-input
 */

import { z } from 'zod';
import type { LeadId } from '@lead-intake/lib';

// ===========================================
// Required Fields
// ===========================================

/**
 * Fields every submission must carry, in reporting order
 */
export const REQUIRED_LEAD_FIELDS = [
  'name',
  'email',
  'phone',
  'car_model',
  'appointment_datetime',
] as const;

export type RequiredLeadField = (typeof REQUIRED_LEAD_FIELDS)[number];

export function missingFieldMessage(field: RequiredLeadField): string {
  return `Missing required field: ${field}`;
}

function requiredText(field: RequiredLeadField) {
  const message = missingFieldMessage(field);
  return z
    .string({ required_error: message, invalid_type_error: message })
    .min(1, message);
}

// ===========================================
// Lead Submission Schema
// ===========================================

/**
 * Presence check for a raw submission.
 * Issues are reported in REQUIRED_LEAD_FIELDS order, one per missing field.
 */
export const LeadSubmissionSchema = z.object({
  name: requiredText('name').describe('Lead full name'),
  email: requiredText('email').describe('Lead email address'),
  phone: requiredText('phone').describe('Lead phone number'),
  car_model: requiredText('car_model').describe('Vehicle the lead is interested in'),
  appointment_datetime: requiredText('appointment_datetime').describe(
    'Requested appointment time (ISO 8601)'
  ),
  timestamp: z
    .string()
    .optional()
    .catch(undefined)
    .describe('Submission time (ISO 8601), defaults to receipt time'),
});

export type LeadSubmission = z.infer<typeof LeadSubmissionSchema>;

// ===========================================
// Lead
// ===========================================

/**
 * A validated submission with its derived identity.
 * Built once per request and frozen.
 */
export interface Lead {
  readonly name: string;
  readonly email: string;
  readonly phone: string;
  readonly car_model: string;
  readonly appointment_datetime: string;
  readonly timestamp: string;
  readonly lead_id: LeadId;
}
