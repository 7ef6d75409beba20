/**
 * Appointment Scheduler
 *
 * Books a one-hour consultation for a scored lead. The meeting link is a
 * fixed placeholder: the calendar identity cannot generate conference
 * links. A failed booking is not rolled back.
 *
 * @module lead-intake/scheduler
 */

import { DateTime } from 'luxon';
import { google, type calendar_v3 } from 'googleapis';
import { getErrorMessage, stepFailure } from '@lead-intake/lib';
import type { Lead } from './contracts/lead-input';
import { formatIntentScore, type ProcessedLead } from './contracts/processed-lead';
import { classifyError } from './error-handler';
import type { GoogleApiAuth } from './lead-store';
import { logger as defaultLogger, type LeadIntakeLogger } from './logger';
import type { ScheduleOutput } from './types';

// ===========================================
// Constants
// ===========================================

export const PLACEHOLDER_MEET_LINK = 'https://meet.google.com/new';

export const DEFAULT_TIMEZONE = 'America/New_York';

export const EVENT_DURATION_HOURS = 1;

/** Popup reminders, minutes before the start */
export const REMINDER_MINUTES = [30, 60] as const;

// ===========================================
// Calendar Service
// ===========================================

export interface CalendarEventRequest {
  summary: string;
  description: string;
  start: { dateTime: string; timeZone: string };
  end: { dateTime: string; timeZone: string };
  reminders: {
    useDefault: false;
    overrides: Array<{ method: 'popup'; minutes: number }>;
  };
}

export interface CreatedCalendarEvent {
  id: string;
  htmlLink: string;
}

export interface CalendarService {
  createEvent(event: CalendarEventRequest): Promise<CreatedCalendarEvent>;
}

/**
 * CalendarService backed by Google Calendar v3
 */
export class GoogleCalendarService implements CalendarService {
  private readonly calendar: calendar_v3.Calendar;

  constructor(
    auth: GoogleApiAuth,
    private readonly calendarId: string = 'primary'
  ) {
    this.calendar = google.calendar({ version: 'v3', auth });
  }

  async createEvent(event: CalendarEventRequest): Promise<CreatedCalendarEvent> {
    const response = await this.calendar.events.insert({
      calendarId: this.calendarId,
      requestBody: event,
    });

    return {
      id: response.data.id ?? '',
      htmlLink: response.data.htmlLink ?? '',
    };
  }
}

// ===========================================
// Event Building
// ===========================================

export function buildEventDescription(lead: Lead, processed: ProcessedLead): string {
  return [
    `Lead consultation with ${processed.name}`,
    '',
    `Email: ${lead.email}`,
    `Phone: ${processed.phone}`,
    `Intent Score: ${formatIntentScore(processed.intent_score)}`,
    `Lead ID: ${lead.lead_id}`,
    '',
    `Meeting Link: ${PLACEHOLDER_MEET_LINK}`,
    '',
    'Please review lead details before the meeting.',
    `Send calendar invite manually to: ${lead.email}`,
  ].join('\n');
}

/**
 * Build the event for a lead, or null when processed.datetime does not
 * parse. A datetime without an offset is read in `timezone`.
 */
export function buildCalendarEvent(
  lead: Lead,
  processed: ProcessedLead,
  timezone: string
): CalendarEventRequest | null {
  const start = DateTime.fromISO(processed.datetime.trim(), { zone: timezone });
  if (!start.isValid) return null;

  const end = start.plus({ hours: EVENT_DURATION_HOURS });
  const startIso = start.toISO();
  const endIso = end.toISO();
  if (!startIso || !endIso) return null;

  return {
    summary: `Car Consultation - ${processed.model}`,
    description: buildEventDescription(lead, processed),
    start: { dateTime: startIso, timeZone: timezone },
    end: { dateTime: endIso, timeZone: timezone },
    reminders: {
      useDefault: false,
      overrides: REMINDER_MINUTES.map((minutes) => ({ method: 'popup' as const, minutes })),
    },
  };
}

// ===========================================
// Scheduler
// ===========================================

export class AppointmentScheduler {
  private readonly logger: LeadIntakeLogger;

  constructor(
    private readonly calendar: CalendarService,
    options: { logger?: LeadIntakeLogger } = {}
  ) {
    this.logger = options.logger ?? defaultLogger;
  }

  async createEvent(
    lead: Lead,
    processed: ProcessedLead,
    timezone: string = DEFAULT_TIMEZONE
  ): Promise<ScheduleOutput> {
    const event = buildCalendarEvent(lead, processed, timezone);
    if (!event) {
      const error = `Cannot schedule unparseable datetime: ${processed.datetime}`;
      this.logger.scheduleFailed({
        lead_id: lead.lead_id,
        error_code: 'INVALID_DATETIME',
        error_message: error,
      });
      return stepFailure('INVALID_DATETIME', error);
    }

    try {
      const created = await this.calendar.createEvent(event);
      this.logger.eventScheduled({
        lead_id: lead.lead_id,
        event_id: created.id,
        event_link: created.htmlLink,
      });
      return {
        success: true,
        meetLink: PLACEHOLDER_MEET_LINK,
        eventId: created.id,
        eventLink: created.htmlLink,
      };
    } catch (error) {
      const classified = classifyError(error);
      this.logger.scheduleFailed({
        lead_id: lead.lead_id,
        error_code: classified.code,
        error_message: classified.message,
      });
      return stepFailure('CALENDAR_ERROR', getErrorMessage(error));
    }
  }
}
