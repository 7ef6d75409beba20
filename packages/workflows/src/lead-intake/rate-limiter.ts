/**
 * Rate limiting middleware
 * Fixed-window request counting per client address, in process memory
 */
import type { Context, MiddlewareHandler } from 'hono';
import { createMiddleware } from 'hono/factory';
import { getConnInfo } from '@hono/node-server/conninfo';
import { HTTP_STATUS, buildErrorResponse } from './contracts/webhook-api';
import type { LeadIntakeLogger } from './logger';

export const MINUTE_MS = 60_000;
export const HOUR_MS = 60 * MINUTE_MS;

export const RATE_LIMIT_MESSAGE = 'Rate limit exceeded. Please try again later.';

/** Stored windows above which expired entries are swept */
const SWEEP_THRESHOLD = 10_000;

export interface RateLimitOptions {
  /** Requests allowed per window */
  limit: number;
  windowMs: number;
  /** Client key; defaults to the client address */
  keyGenerator?: (c: Context) => string;
  /** Key on the first X-Forwarded-For hop; only behind a proxy that sets it */
  trustProxy?: boolean;
  now?: () => number;
  logger?: LeadIntakeLogger;
}

interface RateWindow {
  count: number;
  resetAt: number;
}

/**
 * Socket address of the client. The first X-Forwarded-For hop is used
 * instead only when trustProxy is set, since clients can write that header.
 */
export function clientAddress(c: Context, trustProxy = false): string {
  if (trustProxy) {
    const first = c.req.header('x-forwarded-for')?.split(',')[0]?.trim();
    if (first) return first;
  }

  try {
    return getConnInfo(c).remote.address ?? 'unknown';
  } catch {
    // No socket outside the node server (e.g. app.request in tests)
    return 'unknown';
  }
}

/**
 * In-memory fixed-window counter
 */
export class FixedWindowCounter {
  private readonly windows = new Map<string, RateWindow>();

  constructor(
    private readonly limit: number,
    private readonly windowMs: number
  ) {}

  /**
   * Count a hit. Returns the ms until the window resets when over the limit,
   * otherwise null.
   */
  hit(key: string, now: number): number | null {
    if (this.windows.size > SWEEP_THRESHOLD) {
      this.sweep(now);
    }

    let window = this.windows.get(key);
    if (!window || window.resetAt <= now) {
      window = { count: 0, resetAt: now + this.windowMs };
      this.windows.set(key, window);
    }

    window.count++;
    return window.count > this.limit ? window.resetAt - now : null;
  }

  private sweep(now: number): void {
    for (const [key, window] of this.windows) {
      if (window.resetAt <= now) this.windows.delete(key);
    }
  }
}

/**
 * Rate limit middleware factory
 */
export function rateLimit(options: RateLimitOptions): MiddlewareHandler {
  const counter = new FixedWindowCounter(options.limit, options.windowMs);
  const keyOf = options.keyGenerator ?? ((c: Context) => clientAddress(c, options.trustProxy));
  const now = options.now ?? Date.now;

  return createMiddleware(async (c, next) => {
    const key = keyOf(c);
    const retryAfterMs = counter.hit(key, now());

    if (retryAfterMs !== null) {
      options.logger?.warn('Rate limit exceeded', {
        path: c.req.path,
        limit: options.limit,
        window_ms: options.windowMs,
      });
      c.header('Retry-After', String(Math.ceil(retryAfterMs / 1000)));
      return c.json(
        buildErrorResponse('RATE_LIMITED', RATE_LIMIT_MESSAGE),
        HTTP_STATUS.TOO_MANY_REQUESTS
      );
    }

    await next();
  });
}
