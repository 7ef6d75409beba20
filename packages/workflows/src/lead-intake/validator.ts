/**
 * Lead Validator
 *
 * Pure checks over a raw submission: required fields first, then email,
 * phone and appointment time formats. Errors accumulate in a fixed order.
 *
 * @module lead-intake/validator
 */

import { DateTime } from 'luxon';
import { LeadSubmissionSchema, type LeadSubmission } from './contracts/lead-input';
import { logger as defaultLogger, type LeadIntakeLogger } from './logger';

// ===========================================
// Constants
// ===========================================

const EMAIL_PATTERN = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;

const PHONE_PATTERN = /^\+?1?\d{9,15}$/;

/** Separators removed from a phone number before matching */
const PHONE_SEPARATORS = /[-\s()]/g;

/** Appointments older than this are accepted but logged as past-dated */
export const PAST_APPOINTMENT_GRACE_MINUTES = 5;

export const VALIDATION_MESSAGES = {
  INVALID_EMAIL: 'Invalid email format',
  INVALID_PHONE: 'Invalid phone format',
  INVALID_DATETIME: 'Invalid datetime format (use ISO 8601)',
} as const;

// ===========================================
// Types
// ===========================================

export type ValidationResult =
  | { valid: true; errors: []; submission: LeadSubmission }
  | { valid: false; errors: string[] };

export interface ValidatorOptions {
  logger?: LeadIntakeLogger;
  /** Clock used for the past-appointment check */
  now?: () => Date;
}

// ===========================================
// Field Checks
// ===========================================

export function validateEmail(email: string): boolean {
  return EMAIL_PATTERN.test(email);
}

export function validatePhone(phone: string): boolean {
  return PHONE_PATTERN.test(phone.replace(PHONE_SEPARATORS, ''));
}

/** Calendar date first; luxon alone also takes a bare time, a year or a week date */
const CALENDAR_DATE_PREFIX = /^\d{4}-\d{2}-\d{2}/;

/**
 * Parse an ISO 8601 timestamp. A trailing Z is UTC; values without an
 * offset are read in the process's local zone.
 */
export function parseAppointmentDatetime(value: string): DateTime | null {
  const trimmed = value.trim();
  if (!CALENDAR_DATE_PREFIX.test(trimmed)) return null;

  const parsed = DateTime.fromISO(trimmed, { setZone: true });
  return parsed.isValid ? parsed : null;
}

/**
 * Whether a value parses as ISO 8601. Past values are valid; they are
 * logged as past appointments.
 */
export function validateDatetime(value: string, options: ValidatorOptions = {}): boolean {
  const parsed = parseAppointmentDatetime(value);
  if (!parsed) return false;

  const now = DateTime.fromJSDate(options.now?.() ?? new Date());
  if (parsed < now.minus({ minutes: PAST_APPOINTMENT_GRACE_MINUTES })) {
    (options.logger ?? defaultLogger).pastAppointment({ appointment_datetime: value });
  }

  return true;
}

// ===========================================
// Submission Validation
// ===========================================

/**
 * Validate a raw submission.
 * Anything that is not a plain object is treated as an empty submission.
 */
export function validateLeadData(
  fields: unknown,
  options: ValidatorOptions = {}
): ValidationResult {
  const input = typeof fields === 'object' && fields !== null && !Array.isArray(fields) ? fields : {};

  const parsed = LeadSubmissionSchema.safeParse(input);
  if (!parsed.success) {
    return { valid: false, errors: parsed.error.issues.map((issue) => issue.message) };
  }

  const submission = parsed.data;
  const errors: string[] = [];

  if (!validateEmail(submission.email)) {
    errors.push(VALIDATION_MESSAGES.INVALID_EMAIL);
  }

  if (!validatePhone(submission.phone)) {
    errors.push(VALIDATION_MESSAGES.INVALID_PHONE);
  }

  if (!validateDatetime(submission.appointment_datetime, options)) {
    errors.push(VALIDATION_MESSAGES.INVALID_DATETIME);
  }

  if (errors.length > 0) {
    return { valid: false, errors };
  }

  return { valid: true, errors: [], submission };
}
