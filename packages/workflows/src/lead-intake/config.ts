/**
 * Lead Intake Configuration
 *
 * Environment variables are parsed once with zod. Google service account
 * credentials are read from, in order: `<NAME>_BASE64`, `<NAME>`, then the
 * file named by `<NAME>_FILE` (or the default path).
 *
 * @module lead-intake/config
 */

import { existsSync, readFileSync } from 'node:fs';
import { z } from 'zod';
import { getErrorMessage } from '@lead-intake/lib';
import { DEFAULT_SMTP_HOST, DEFAULT_SMTP_PORT } from './channels/email';
import { logger as defaultLogger, type LeadIntakeLogger } from './logger';
import { DEFAULT_TIMEZONE } from './scheduler';
import { NotificationChannelSchema } from './types';

// ===========================================
// Environment Schema
// ===========================================

const optionalText = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

export const EnvSchema = z.object({
  // Scoring
  ANTHROPIC_API_KEY: optionalText,
  SCORING_MODEL: z.string().default('claude-3-5-haiku-20241022'),
  SCORING_MAX_ATTEMPTS: positiveInt(3),

  // Spreadsheet
  SPREADSHEET_NAME: z.string().min(1).default('Lead Tracker'),
  SPREADSHEET_ID: optionalText,

  // Calendar
  CALENDAR_ID: z.string().min(1).default('primary'),
  TIMEZONE: z.string().min(1).default(DEFAULT_TIMEZONE),

  // Notifications
  NOTIFICATION_CHANNELS: z
    .string()
    .default('chat_webhook,email')
    .transform((value) =>
      value
        .split(',')
        .map((channel) => channel.trim())
        .filter(Boolean)
    )
    .pipe(z.array(NotificationChannelSchema)),
  SLACK_WEBHOOK_URL: optionalText.pipe(z.string().url().optional()),
  SMTP_HOST: z.string().min(1).default(DEFAULT_SMTP_HOST),
  SMTP_PORT: positiveInt(DEFAULT_SMTP_PORT),
  SMTP_USER: optionalText,
  SMTP_APP_PASSWORD: optionalText,

  // HTTP
  LEAD_INTAKE_PORT: positiveInt(5000),
  LEAD_INTAKE_SECRET: optionalText,
  RATE_LIMIT_PER_MINUTE: positiveInt(10),
  RATE_LIMIT_PER_HOUR: positiveInt(100),
  TRUST_PROXY: z
    .enum(['true', 'false', '1', '0'])
    .default('false')
    .transform((value) => value === 'true' || value === '1'),

  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type EnvConfig = z.infer<typeof EnvSchema>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Parse configuration from an environment map
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${problems}`);
  }
  return parsed.data;
}

// ===========================================
// Credentials
// ===========================================

export const ServiceAccountCredentialsSchema = z
  .object({
    client_email: z.string().min(1),
    private_key: z.string().min(1),
  })
  .passthrough();

export type ServiceAccountCredentials = z.infer<typeof ServiceAccountCredentialsSchema>;

export const CREDENTIAL_SOURCES = {
  sheets: { name: 'GOOGLE_SHEETS_CREDS', defaultFile: './credentials/sheets_creds.json' },
  calendar: { name: 'GOOGLE_CALENDAR_CREDS', defaultFile: './credentials/calendar_creds.json' },
} as const;

export interface CredentialSource {
  /** Base variable name, e.g. GOOGLE_SHEETS_CREDS */
  name: string;
  defaultFile: string;
}

export interface LoadCredentialsOptions {
  env?: NodeJS.ProcessEnv;
  logger?: LeadIntakeLogger;
  readFile?: (path: string) => string;
  fileExists?: (path: string) => boolean;
}

function parseJsonObject(text: string): Record<string, unknown> {
  const value: unknown = JSON.parse(text);
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new SyntaxError('Credentials must be a JSON object');
  }
  return { ...value };
}

/**
 * Load credentials JSON. Resolves to null when no source is set.
 * A base64 value that does not decode to JSON is skipped; a file that is
 * not JSON is a ConfigError.
 */
export function loadCredentials(
  source: CredentialSource,
  options: LoadCredentialsOptions = {}
): Record<string, unknown> | null {
  const env = options.env ?? process.env;
  const log = options.logger ?? defaultLogger;
  const readFile = options.readFile ?? ((path: string) => readFileSync(path, 'utf-8'));
  const fileExists = options.fileExists ?? existsSync;

  const encoded = env[`${source.name}_BASE64`];
  if (encoded) {
    try {
      const credentials = parseJsonObject(Buffer.from(encoded, 'base64').toString('utf-8'));
      log.info('Loaded credentials from base64 environment variable', { source: source.name });
      return credentials;
    } catch (error) {
      log.error('Failed to decode base64 credentials', {
        source: source.name,
        error: getErrorMessage(error),
      });
    }
  }

  const raw = env[source.name];
  if (raw) {
    try {
      const credentials = parseJsonObject(raw);
      log.info('Loaded credentials from environment variable', { source: source.name });
      return credentials;
    } catch (error) {
      throw new ConfigError(`Invalid JSON in ${source.name}: ${getErrorMessage(error)}`);
    }
  }

  const filePath = env[`${source.name}_FILE`] || source.defaultFile;
  if (fileExists(filePath)) {
    try {
      const credentials = parseJsonObject(readFile(filePath).trim());
      log.info('Loaded credentials from file', { source: source.name, path: filePath });
      return credentials;
    } catch (error) {
      throw new ConfigError(`Invalid JSON in ${filePath}: ${getErrorMessage(error)}`);
    }
  }

  log.warn('No credentials found', { source: source.name });
  return null;
}

/**
 * Load and check service account credentials
 */
export function loadServiceAccount(
  source: CredentialSource,
  options: LoadCredentialsOptions = {}
): ServiceAccountCredentials | null {
  const credentials = loadCredentials(source, options);
  if (!credentials) return null;

  const parsed = ServiceAccountCredentialsSchema.safeParse(credentials);
  if (!parsed.success) {
    throw new ConfigError(`${source.name} is not a service account key`);
  }
  return parsed.data;
}
