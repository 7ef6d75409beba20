/**
 * Lead identity
 *
 * @module lead-intake/lead
 */

import { createHash } from 'node:crypto';
import { toLeadId, type LeadId } from '@lead-intake/lib';
import type { Lead, LeadSubmission } from './contracts/lead-input';

const LEAD_ID_LENGTH = 12;

/**
 * Deterministic id for a contact: first 12 hex chars of
 * md5(lowercase(email + phone)). Name, model and time do not contribute.
 */
export function deriveLeadId(email: string, phone: string): LeadId {
  const digest = createHash('md5')
    .update(`${email}${phone}`.toLowerCase())
    .digest('hex');
  return toLeadId(digest.slice(0, LEAD_ID_LENGTH));
}

/**
 * Build the immutable Lead for a validated submission
 */
export function createLead(submission: LeadSubmission, now: Date = new Date()): Lead {
  return Object.freeze({
    name: submission.name,
    email: submission.email,
    phone: submission.phone,
    car_model: submission.car_model,
    appointment_datetime: submission.appointment_datetime,
    timestamp: submission.timestamp || now.toISOString(),
    lead_id: deriveLeadId(submission.email, submission.phone),
  });
}
