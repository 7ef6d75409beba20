/**
 * Lead Intake HTTP app
 *
 * Hono routes for the lead webhook, health and the lead sheet views.
 * The app is built from already-constructed collaborators; a null workflow
 * means configuration failed and lead routes answer 503.
 *
 * @module lead-intake/app
 */

import { Hono, type MiddlewareHandler } from 'hono';
import { cors } from 'hono/cors';
import { createMiddleware } from 'hono/factory';
import { zValidator } from '@hono/zod-validator';
import {
  HTTP_STATUS,
  StatusUpdateRequestSchema,
  WEBHOOK_SECRET_HEADER,
  buildErrorResponse,
  validateWebhookAuth,
  workflowResultStatus,
} from './contracts/webhook-api';
import type { LeadStore } from './lead-store';
import { logger as defaultLogger, type LeadIntakeLogger } from './logger';
import { HOUR_MS, MINUTE_MS, rateLimit, type RateLimitOptions } from './rate-limiter';
import type { NotificationChannel } from './types';
import type { LeadWorkflow } from './workflow';

// ===========================================
// Types
// ===========================================

export interface ComponentStatus {
  scoring: boolean;
  sheets: boolean;
  calendar: boolean;
  notifications: NotificationChannel[];
}

export interface LeadIntakeAppDependencies {
  workflow: Pick<LeadWorkflow, 'processLead'> | null;
  store: LeadStore | null;
  components?: ComponentStatus;
  /** Shared secret for X-Webhook-Secret; auth is off when unset */
  webhookSecret?: string;
  rateLimitPerMinute?: number;
  rateLimitPerHour?: number;
  /** Key rate limits on X-Forwarded-For; set only behind a trusted proxy */
  trustProxy?: boolean;
  /** Overrides for the rate limiters, e.g. a fixed clock in tests */
  rateLimitOverrides?: Pick<RateLimitOptions, 'now' | 'keyGenerator'>;
  logger?: LeadIntakeLogger;
}

export const SERVICE_BANNER = 'Lead Intake API is running';

const NOT_INITIALIZED_MESSAGE = 'System not initialized - check configuration';

const NO_COMPONENTS: ComponentStatus = {
  scoring: false,
  sheets: false,
  calendar: false,
  notifications: [],
};

/**
 * A body counts as provided when it is not empty ({} and [] are empty)
 */
export function hasLeadData(body: unknown): boolean {
  if (body === null || body === undefined || body === '' || body === false || body === 0) {
    return false;
  }
  if (Array.isArray(body)) return body.length > 0;
  if (typeof body === 'object') return Object.keys(body).length > 0;
  return true;
}

function authMiddleware(secret: string | undefined): MiddlewareHandler {
  return createMiddleware(async (c, next) => {
    if (!secret) {
      await next();
      return;
    }

    const auth = validateWebhookAuth(c.req.raw.headers, secret);
    if (!auth.valid) {
      return c.json(
        buildErrorResponse('AUTH_FAILED', auth.error ?? 'Unauthorized'),
        HTTP_STATUS.UNAUTHORIZED
      );
    }

    await next();
  });
}

// ===========================================
// App
// ===========================================

export function createApp(deps: LeadIntakeAppDependencies): Hono {
  const log = deps.logger ?? defaultLogger;
  const { workflow, store } = deps;
  const components = deps.components ?? NO_COMPONENTS;
  const requireSecret = authMiddleware(deps.webhookSecret);

  const app = new Hono();

  app.use(
    '*',
    cors({
      origin: '*',
      allowMethods: ['GET', 'POST', 'PUT', 'OPTIONS'],
      allowHeaders: ['Content-Type', WEBHOOK_SECRET_HEADER],
      maxAge: 86400,
    })
  );

  // Global limit, per client
  app.use(
    '*',
    rateLimit({
      limit: deps.rateLimitPerHour ?? 100,
      windowMs: HOUR_MS,
      trustProxy: deps.trustProxy,
      logger: log,
      ...deps.rateLimitOverrides,
    })
  );

  app.get('/', (c) => c.text(SERVICE_BANNER));

  app.get('/health', (c) => {
    const healthy = workflow !== null;
    return c.json(
      {
        status: healthy ? 'healthy' : 'degraded',
        timestamp: new Date().toISOString(),
        components: {
          workflow: healthy,
          ...(healthy ? components : NO_COMPONENTS),
        },
      },
      healthy ? HTTP_STATUS.OK : HTTP_STATUS.SERVICE_UNAVAILABLE
    );
  });

  app.post(
    '/webhook/lead',
    rateLimit({
      limit: deps.rateLimitPerMinute ?? 10,
      windowMs: MINUTE_MS,
      trustProxy: deps.trustProxy,
      logger: log,
      ...deps.rateLimitOverrides,
    }),
    requireSecret,
    async (c) => {
      const startTime = Date.now();

      if (!workflow) {
        log.webhookReceived({ route: c.req.path, status_code: HTTP_STATUS.SERVICE_UNAVAILABLE });
        return c.json(
          buildErrorResponse('NOT_INITIALIZED', NOT_INITIALIZED_MESSAGE),
          HTTP_STATUS.SERVICE_UNAVAILABLE
        );
      }

      let body: unknown = null;
      try {
        body = await c.req.json();
      } catch {
        // Unparseable bodies are reported as missing data below
        body = null;
      }

      if (!hasLeadData(body)) {
        log.webhookReceived({ route: c.req.path, status_code: HTTP_STATUS.BAD_REQUEST });
        return c.json(buildErrorResponse('INVALID_INPUT', 'No data provided'), HTTP_STATUS.BAD_REQUEST);
      }

      const result = await workflow.processLead(body);
      const status = workflowResultStatus(result);

      log.webhookReceived({
        route: c.req.path,
        status_code: status,
        lead_id: result.lead_id,
        processing_time_ms: Date.now() - startTime,
      });

      return c.json(result, status);
    }
  );

  app.get('/dashboard', requireSecret, async (c) => {
    if (!store) {
      return c.json(
        buildErrorResponse('NOT_INITIALIZED', NOT_INITIALIZED_MESSAGE),
        HTTP_STATUS.SERVICE_UNAVAILABLE
      );
    }

    const leads = await store.listAll();
    return c.json({ success: true, count: leads.length, leads });
  });

  app.get('/lead/:key', requireSecret, async (c) => {
    if (!store) {
      return c.json(
        buildErrorResponse('NOT_INITIALIZED', NOT_INITIALIZED_MESSAGE),
        HTTP_STATUS.SERVICE_UNAVAILABLE
      );
    }

    const lead = await store.find(c.req.param('key'));
    if (!lead) {
      return c.json(buildErrorResponse('NOT_FOUND', 'Lead not found'), HTTP_STATUS.NOT_FOUND);
    }
    return c.json({ success: true, lead });
  });

  app.put(
    '/lead/:key/status',
    requireSecret,
    zValidator('json', StatusUpdateRequestSchema, (result, c) => {
      if (!result.success) {
        return c.json(
          buildErrorResponse('INVALID_INPUT', 'Invalid status update', {
            issues: result.error.issues.map((issue) => issue.message),
          }),
          HTTP_STATUS.BAD_REQUEST
        );
      }
    }),
    async (c) => {
      if (!store) {
        return c.json(
          buildErrorResponse('NOT_INITIALIZED', NOT_INITIALIZED_MESSAGE),
          HTTP_STATUS.SERVICE_UNAVAILABLE
        );
      }

      const key = c.req.param('key');
      const { status, notes } = c.req.valid('json');
      const updated = await store.updateStatus(key, status, notes);

      if (!updated.success) {
        return c.json(buildErrorResponse('UPDATE_FAILED', 'Failed to update lead'), HTTP_STATUS.BAD_REQUEST);
      }
      return c.json({ success: true, message: `Lead ${key} updated successfully` });
    }
  );

  app.notFound((c) =>
    c.json(buildErrorResponse('NOT_FOUND', 'Endpoint not found'), HTTP_STATUS.NOT_FOUND)
  );

  app.onError((error, c) => {
    log.error('Unhandled request error', {
      path: c.req.path,
      error: error.message,
    });
    return c.json(
      buildErrorResponse('INTERNAL_ERROR', 'Internal server error'),
      HTTP_STATUS.INTERNAL_ERROR
    );
  });

  return app;
}
