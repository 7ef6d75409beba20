/**
 * Lead Intake - Service Construction
 *
 * Builds the workflow collaborators from configuration. Anything that
 * cannot be built is left null and reported through ComponentStatus.
 *
 * @module lead-intake/services
 */

import Anthropic from '@anthropic-ai/sdk';
import { IncomingWebhook } from '@slack/webhook';
import { google } from 'googleapis';
import nodemailer from 'nodemailer';
import { getErrorMessage } from '@lead-intake/lib';
import type { ComponentStatus } from './app';
import { EmailChannel, SMTP_TIMEOUT_MS } from './channels/email';
import { CHAT_WEBHOOK_TIMEOUT_MS, SlackWebhookChannel } from './channels/slack-webhook';
import {
  CREDENTIAL_SOURCES,
  loadServiceAccount,
  type CredentialSource,
  type EnvConfig,
  type LoadCredentialsOptions,
  type ServiceAccountCredentials,
} from './config';
import { AnthropicScoringService, IntentScorer } from './intent-scorer';
import { GoogleSheetTable, SheetLeadStore, type LeadStore } from './lead-store';
import type { LeadIntakeLogger } from './logger';
import { Notifier } from './notifier';
import { AppointmentScheduler, GoogleCalendarService } from './scheduler';
import { LeadWorkflow } from './workflow';

const SHEETS_SCOPES = [
  'https://www.googleapis.com/auth/spreadsheets',
  'https://www.googleapis.com/auth/drive.readonly',
];

const CALENDAR_SCOPES = ['https://www.googleapis.com/auth/calendar'];

// ===========================================
// Service Construction
// ===========================================

export interface LeadIntakeServices {
  workflow: LeadWorkflow | null;
  store: LeadStore | null;
  components: ComponentStatus;
}

function googleAuth(credentials: ServiceAccountCredentials, scopes: string[]) {
  return new google.auth.GoogleAuth({
    credentials: {
      client_email: credentials.client_email,
      private_key: credentials.private_key,
    },
    scopes,
  });
}

function buildNotifier(config: EnvConfig, logger: LeadIntakeLogger): Notifier {
  const webhook = config.SLACK_WEBHOOK_URL
    ? new IncomingWebhook(config.SLACK_WEBHOOK_URL, { timeout: CHAT_WEBHOOK_TIMEOUT_MS })
    : null;
  if (!webhook) {
    logger.warn('Chat webhook not configured - chat notifications disabled');
  }

  const transport =
    config.SMTP_USER && config.SMTP_APP_PASSWORD
      ? nodemailer.createTransport({
          host: config.SMTP_HOST,
          port: config.SMTP_PORT,
          secure: false,
          requireTLS: true,
          auth: { user: config.SMTP_USER, pass: config.SMTP_APP_PASSWORD },
          connectionTimeout: SMTP_TIMEOUT_MS,
          greetingTimeout: SMTP_TIMEOUT_MS,
          socketTimeout: SMTP_TIMEOUT_MS,
        })
      : null;
  if (!transport) {
    logger.warn('SMTP credentials not configured - email notifications disabled');
  }

  return new Notifier(
    [new SlackWebhookChannel(webhook), new EmailChannel(transport, { from: config.SMTP_USER })],
    { logger }
  );
}

/**
 * Service account for a source, or null when it is missing or unreadable
 */
function tryLoadServiceAccount(
  source: CredentialSource,
  options: LoadCredentialsOptions
): ServiceAccountCredentials | null {
  try {
    return loadServiceAccount(source, options);
  } catch (error) {
    options.logger?.error('Failed to load credentials', {
      source: source.name,
      error: getErrorMessage(error),
    });
    return null;
  }
}

/**
 * Build every collaborator. A missing scoring key, or Google credentials
 * that are missing or malformed, leave the workflow null; the server still
 * starts and reports itself degraded.
 */
export function buildServices(
  config: EnvConfig,
  logger: LeadIntakeLogger,
  credentials: Omit<LoadCredentialsOptions, 'logger'> = {}
): LeadIntakeServices {
  const notifier = buildNotifier(config, logger);
  const sheetsCredentials = tryLoadServiceAccount(CREDENTIAL_SOURCES.sheets, {
    ...credentials,
    logger,
  });
  const calendarCredentials = tryLoadServiceAccount(CREDENTIAL_SOURCES.calendar, {
    ...credentials,
    logger,
  });

  const store = sheetsCredentials
    ? new SheetLeadStore(
        new GoogleSheetTable({
          auth: googleAuth(sheetsCredentials, SHEETS_SCOPES),
          spreadsheetId: config.SPREADSHEET_ID,
          spreadsheetName: config.SPREADSHEET_NAME,
        }),
        { logger }
      )
    : null;

  const scheduler = calendarCredentials
    ? new AppointmentScheduler(
        new GoogleCalendarService(
          googleAuth(calendarCredentials, CALENDAR_SCOPES),
          config.CALENDAR_ID
        ),
        { logger }
      )
    : null;

  const scorer = config.ANTHROPIC_API_KEY
    ? new IntentScorer(
        new AnthropicScoringService(new Anthropic({ apiKey: config.ANTHROPIC_API_KEY }), {
          model: config.SCORING_MODEL,
        }),
        { logger, retry: { maxAttempts: config.SCORING_MAX_ATTEMPTS } }
      )
    : null;

  const components: ComponentStatus = {
    scoring: scorer !== null,
    sheets: store !== null,
    calendar: scheduler !== null,
    notifications: notifier.configuredChannels(),
  };

  if (!scorer || !store || !scheduler) {
    logger.error('Lead workflow not initialized - check configuration', { ...components });
    return { workflow: null, store, components };
  }

  const workflow = new LeadWorkflow({
    store,
    scorer,
    scheduler,
    notifier,
    channels: config.NOTIFICATION_CHANNELS,
    timezone: config.TIMEZONE,
    logger,
  });

  return { workflow, store, components };
}
