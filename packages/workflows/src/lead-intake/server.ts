/**
 * Lead Intake - Server Entry Point
 *
 * Builds the collaborators from the environment, wires the workflow and
 * starts the HTTP server.
 *
 * Usage:
 *   npm start
 *
 * Required environment variables:
 *   ANTHROPIC_API_KEY                       - Scoring service key
 *   GOOGLE_SHEETS_CREDS[_BASE64|_FILE]      - Service account for the lead sheet
 *   GOOGLE_CALENDAR_CREDS[_BASE64|_FILE]    - Service account for the calendar
 *
 * Optional environment variables:
 *   SPREADSHEET_NAME / SPREADSHEET_ID - Lead sheet (default: "Lead Tracker")
 *   CALENDAR_ID                       - Calendar (default: primary)
 *   TIMEZONE                          - Event timezone (default: America/New_York)
 *   NOTIFICATION_CHANNELS             - Comma-separated (default: chat_webhook,email)
 *   SLACK_WEBHOOK_URL                 - Incoming webhook for lead alerts
 *   SMTP_HOST, SMTP_PORT, SMTP_USER, SMTP_APP_PASSWORD - Confirmation email
 *   LEAD_INTAKE_PORT                  - Port to listen on (default: 5000)
 *   LEAD_INTAKE_SECRET                - Require X-Webhook-Secret when set
 *   TRUST_PROXY                       - Rate limit on X-Forwarded-For (default: false)
 *
 * @module lead-intake/server
 */

import dotenv from 'dotenv';
import { serve } from '@hono/node-server';
import { getErrorMessage } from '@lead-intake/lib';
import { createApp } from './app';
import { loadConfig } from './config';
import { createLogger } from './logger';
import { buildServices } from './services';

// ===========================================
// Main Server
// ===========================================

async function main(): Promise<void> {
  dotenv.config();

  const config = loadConfig();
  const logger = createLogger({ level: config.LOG_LEVEL });
  const services = buildServices(config, logger);

  const app = createApp({
    workflow: services.workflow,
    store: services.store,
    components: services.components,
    webhookSecret: config.LEAD_INTAKE_SECRET,
    rateLimitPerMinute: config.RATE_LIMIT_PER_MINUTE,
    rateLimitPerHour: config.RATE_LIMIT_PER_HOUR,
    trustProxy: config.TRUST_PROXY,
    logger,
  });

  const server = serve({ fetch: app.fetch, port: config.LEAD_INTAKE_PORT }, (info) => {
    logger.info('Lead intake server listening', {
      port: info.port,
      workflow_ready: services.workflow !== null,
    });
  });

  const shutdown = (signal: string) => {
    logger.info('Shutting down', { signal });
    server.close((error) => {
      if (error) {
        logger.error('Server close failed', { error: error.message });
        process.exit(1);
      }
      process.exit(0);
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  console.error(JSON.stringify({ event: 'startup_failed', error: getErrorMessage(error) }));
  process.exit(1);
});
