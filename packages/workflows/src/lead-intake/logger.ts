/**
 * Structured JSON Logger for Lead Intake
 *
 * Provides structured logging for lead intake events:
 * - lead_received / validation_failed / past_appointment
 * - duplicate_detected
 * - lead_scored / scoring_attempt_failed / scoring_fallback
 * - lead_stored / store_failed
 * - event_scheduled / schedule_failed
 * - notification_sent / notification_failed
 * - workflow_completed / workflow_failed
 * - webhook_received
 *
 * @module lead-intake/logger
 */

import type { NotificationChannel, WorkflowStage } from './types';

// ===========================================
// Logger Configuration
// ===========================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggerConfig {
  /** Minimum log level to output */
  level: LogLevel;

  /** Pretty print JSON (development only) */
  prettyPrint: boolean;

  /** Custom output function (defaults to console.log) */
  output?: (message: string) => void;
}

const DEFAULT_CONFIG: LoggerConfig = {
  level: 'info',
  prettyPrint: process.env.NODE_ENV === 'development',
};

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export type LogEventType =
  | 'lead_received'
  | 'validation_failed'
  | 'past_appointment'
  | 'duplicate_detected'
  | 'lead_scored'
  | 'scoring_attempt_failed'
  | 'scoring_fallback'
  | 'lead_stored'
  | 'store_failed'
  | 'event_scheduled'
  | 'schedule_failed'
  | 'notification_sent'
  | 'notification_failed'
  | 'workflow_completed'
  | 'workflow_failed'
  | 'webhook_received'
  | 'message';

export interface LogEvent {
  event: LogEventType;
  level: LogLevel;
  timestamp: string;
}

// ===========================================
// Masking
// ===========================================

/**
 * Mask a phone number for logs.
 * "+1-212-555-0100" -> "+1***0100"
 */
export function maskPhone(phone: string): string {
  const digits = phone.replace(/\D/g, '');
  if (digits.length < 4) return '***';

  const prefix = phone.trim().startsWith('+') ? '+' : '';
  return `${prefix}${digits[0]}***${digits.slice(-4)}`;
}

// ===========================================
// Logger Class
// ===========================================

export class LeadIntakeLogger {
  private config: LoggerConfig;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.config.level];
  }

  private log(level: LogLevel, event: LogEventType, data: Record<string, unknown>): void {
    if (!this.shouldLog(level)) return;

    const entry: LogEvent & Record<string, unknown> = {
      event,
      level,
      timestamp: new Date().toISOString(),
      ...data,
    };

    // Remove undefined values
    for (const key in entry) {
      if (entry[key] === undefined) {
        delete entry[key];
      }
    }

    const output = this.config.output ?? console.log;
    const message = this.config.prettyPrint
      ? JSON.stringify(entry, null, 2)
      : JSON.stringify(entry);

    output(message);
  }

  // ===========================================
  // Intake Events
  // ===========================================

  leadReceived(data: { lead_id: string; name: string; phone: string }): void {
    this.log('info', 'lead_received', { ...data, phone: maskPhone(data.phone) });
  }

  validationFailed(data: { errors: string[] }): void {
    this.log('warn', 'validation_failed', data);
  }

  /**
   * Appointment earlier than the grace window; accepted, not rejected
   */
  pastAppointment(data: { appointment_datetime: string }): void {
    this.log('warn', 'past_appointment', data);
  }

  duplicateDetected(data: { lead_id: string }): void {
    this.log('warn', 'duplicate_detected', data);
  }

  // ===========================================
  // Scoring Events
  // ===========================================

  leadScored(data: { lead_id: string; intent_score: number; attempts: number }): void {
    this.log('info', 'lead_scored', data);
  }

  scoringAttemptFailed(data: {
    lead_id: string;
    attempt: number;
    max_attempts: number;
    error_code: string;
    error_message: string;
  }): void {
    this.log('error', 'scoring_attempt_failed', data);
  }

  scoringFallback(data: { lead_id: string; attempts: number }): void {
    this.log('warn', 'scoring_fallback', data);
  }

  // ===========================================
  // Step Events
  // ===========================================

  leadStored(data: { lead_id: string; name: string }): void {
    this.log('info', 'lead_stored', data);
  }

  storeFailed(data: { operation: string; error_code: string; error_message: string; lead_id?: string }): void {
    this.log('error', 'store_failed', data);
  }

  eventScheduled(data: { lead_id: string; event_id: string; event_link: string }): void {
    this.log('info', 'event_scheduled', data);
  }

  scheduleFailed(data: { lead_id: string; error_code: string; error_message: string }): void {
    this.log('error', 'schedule_failed', data);
  }

  notificationSent(data: { lead_id: string; channel: NotificationChannel }): void {
    this.log('info', 'notification_sent', data);
  }

  notificationFailed(data: {
    lead_id: string;
    channel: string;
    error_code: string;
    error_message: string;
  }): void {
    const level = data.error_code === 'NOT_CONFIGURED' ? 'warn' : 'error';
    this.log(level, 'notification_failed', data);
  }

  // ===========================================
  // Workflow Events
  // ===========================================

  workflowCompleted(data: {
    lead_id: string;
    intent_score: number;
    errors_count: number;
    warnings_count: number;
    processing_time_ms: number;
  }): void {
    this.log('info', 'workflow_completed', data);
  }

  workflowFailed(data: {
    lead_id?: string;
    stage: WorkflowStage;
    error_code: string;
    error_message: string;
  }): void {
    this.log('error', 'workflow_failed', data);
  }

  // ===========================================
  // Webhook Events
  // ===========================================

  webhookReceived(data: {
    route: string;
    status_code: number;
    lead_id?: string | null;
    processing_time_ms?: number;
  }): void {
    const level = data.status_code >= 500 ? 'error' : data.status_code >= 400 ? 'warn' : 'info';
    this.log(level, 'webhook_received', data);
  }

  // ===========================================
  // Generic Methods
  // ===========================================

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('debug', 'message', { message, ...data });
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', 'message', { message, ...data });
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', 'message', { message, ...data });
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log('error', 'message', { message, ...data });
  }
}

// ===========================================
// Default Logger Instance
// ===========================================

/**
 * Default logger instance for the lead intake module
 */
export const logger = new LeadIntakeLogger();

/**
 * Create a new logger with custom configuration
 */
export function createLogger(config?: Partial<LoggerConfig>): LeadIntakeLogger {
  return new LeadIntakeLogger(config);
}
