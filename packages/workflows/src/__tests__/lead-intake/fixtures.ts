/**
 * Test fixtures for lead intake
 *
 * In-process stand-ins for the spreadsheet, calendar, scoring service and
 * notification channels.
 *
 * @module __tests__/lead-intake/fixtures
 */

import type { LeadSubmission } from '../../lead-intake/contracts/lead-input';
import type { ProcessedLead } from '../../lead-intake/contracts/processed-lead';
import type { LeadNotification, NotificationChannelSender } from '../../lead-intake/channels/types';
import type { ScoringService } from '../../lead-intake/intent-scorer';
import { toRecords, type SheetTable } from '../../lead-intake/lead-store';
import { createLogger, type LeadIntakeLogger } from '../../lead-intake/logger';
import type {
  CalendarEventRequest,
  CalendarService,
  CreatedCalendarEvent,
} from '../../lead-intake/scheduler';
import type { LeadRecord, NotificationChannel } from '../../lead-intake/types';

// ===========================================
// Clock
// ===========================================

export const NOW = new Date('2026-03-02T15:00:00.000Z');

export const now = (): Date => NOW;

/** ISO timestamp `days` after NOW */
export function daysFromNow(days: number): string {
  return new Date(NOW.getTime() + days * 24 * 60 * 60 * 1000).toISOString();
}

// ===========================================
// Logger
// ===========================================

export interface CapturingLogger {
  logger: LeadIntakeLogger;
  lines: string[];
  events: () => Array<Record<string, unknown>>;
}

export function createCapturingLogger(): CapturingLogger {
  const lines: string[] = [];
  const logger = createLogger({ level: 'debug', prettyPrint: false, output: (line) => lines.push(line) });
  return {
    logger,
    lines,
    events: () => lines.map((line): Record<string, unknown> => JSON.parse(line)),
  };
}

export function createSilentLogger(): LeadIntakeLogger {
  return createLogger({ output: () => undefined });
}

// ===========================================
// Leads
// ===========================================

export function createSubmission(overrides: Partial<LeadSubmission> = {}): LeadSubmission {
  return {
    name: 'Jane Doe',
    email: 'jane@corp.com',
    phone: '+1-212-555-0100',
    car_model: 'Luxury Sedan X',
    appointment_datetime: daysFromNow(2),
    ...overrides,
  };
}

export function createProcessedLead(overrides: Partial<ProcessedLead> = {}): ProcessedLead {
  return {
    name: 'Jane Doe',
    phone: '+1-212-555-0100',
    model: 'Luxury Sedan X',
    datetime: '2026-03-04T15:00:00.000Z',
    intent_score: 0.9,
    ...overrides,
  };
}

// ===========================================
// Sheet Table
// ===========================================

type SheetOperation = keyof SheetTable;

export class InMemorySheetTable implements SheetTable {
  readonly rows: Array<Array<string | number>> = [];
  readonly failing = new Set<SheetOperation>();

  constructor(rows: Array<Array<string | number>> = []) {
    this.rows.push(...rows.map((row) => [...row]));
  }

  private check(operation: SheetOperation): void {
    if (this.failing.has(operation)) {
      throw new Error(`network error during ${operation}`);
    }
  }

  async getHeaderRow(): Promise<string[]> {
    this.check('getHeaderRow');
    return (this.rows[0] ?? []).map(String);
  }

  async getAllRecords(): Promise<LeadRecord[]> {
    this.check('getAllRecords');
    return toRecords(this.rows);
  }

  async appendRow(values: ReadonlyArray<string | number>): Promise<void> {
    this.check('appendRow');
    this.rows.push([...values]);
  }

  async findInColumn(column: number, value: string): Promise<number | null> {
    this.check('findInColumn');
    const index = this.rows.findIndex((row) => String(row[column - 1] ?? '') === value);
    return index === -1 ? null : index + 1;
  }

  async updateCell(row: number, column: number, value: string): Promise<void> {
    this.check('updateCell');
    const target = this.rows[row - 1];
    if (!target) throw new Error(`row ${row} out of range`);
    while (target.length < column) target.push('');
    target[column - 1] = value;
  }
}

// ===========================================
// Scoring Service
// ===========================================

export class FakeScoringService implements ScoringService {
  readonly prompts: string[] = [];
  private readonly replies: Array<unknown>;

  /**
   * @param replies - Answer for each call in turn; an Error is thrown.
   * The last reply repeats once the list is used up.
   */
  constructor(...replies: unknown[]) {
    this.replies = replies;
  }

  async complete(prompt: string): Promise<unknown> {
    this.prompts.push(prompt);
    const reply = this.replies.length > 1 ? this.replies.shift() : this.replies[0];
    if (reply instanceof Error) throw reply;
    return reply;
  }
}

/** A well-formed scoring answer for the default submission */
export function scoringAnswer(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    name: 'Jane Doe',
    phone: '+1-212-555-0100',
    model: 'Luxury Sedan X',
    datetime: daysFromNow(2),
    intent_score: 1.2,
    ...overrides,
  };
}

// ===========================================
// Calendar
// ===========================================

export class FakeCalendarService implements CalendarService {
  readonly events: CalendarEventRequest[] = [];
  fail: Error | null = null;

  async createEvent(event: CalendarEventRequest): Promise<CreatedCalendarEvent> {
    if (this.fail) throw this.fail;
    this.events.push(event);
    return {
      id: `evt_${this.events.length}`,
      htmlLink: `https://calendar.example.com/event/${this.events.length}`,
    };
  }
}

// ===========================================
// Notification Channels
// ===========================================

export class FakeChannel implements NotificationChannelSender {
  readonly sent: LeadNotification[] = [];
  fail: Error | null = null;

  constructor(
    readonly channel: NotificationChannel,
    private configured = true
  ) {}

  isConfigured(): boolean {
    return this.configured;
  }

  async send(notification: LeadNotification): Promise<void> {
    if (this.fail) throw this.fail;
    this.sent.push(notification);
  }
}
