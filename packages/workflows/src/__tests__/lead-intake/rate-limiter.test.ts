/**
 * Rate Limiter Tests
 *
 * @module __tests__/lead-intake/rate-limiter.test
 */

import { describe, it, expect } from 'vitest';
import { Hono } from 'hono';
import {
  FixedWindowCounter,
  MINUTE_MS,
  RATE_LIMIT_MESSAGE,
  rateLimit,
} from '../../lead-intake/rate-limiter';

describe('FixedWindowCounter', () => {
  it('should allow up to the limit within a window', () => {
    const counter = new FixedWindowCounter(2, 1000);

    expect(counter.hit('10.0.0.1', 0)).toBeNull();
    expect(counter.hit('10.0.0.1', 100)).toBeNull();
    expect(counter.hit('10.0.0.1', 200)).toBe(800);
  });

  it('should count each key separately', () => {
    const counter = new FixedWindowCounter(1, 1000);

    expect(counter.hit('10.0.0.1', 0)).toBeNull();
    expect(counter.hit('10.0.0.2', 0)).toBeNull();
    expect(counter.hit('10.0.0.1', 0)).toBe(1000);
  });

  it('should start a new window once the old one ends', () => {
    const counter = new FixedWindowCounter(1, 1000);

    counter.hit('10.0.0.1', 0);
    expect(counter.hit('10.0.0.1', 999)).toBe(1);
    expect(counter.hit('10.0.0.1', 1000)).toBeNull();
  });
});

describe('rateLimit middleware', () => {
  function createLimitedApp(limit: number, trustProxy?: boolean) {
    let clock = 0;
    const app = new Hono();
    app.use('*', rateLimit({ limit, windowMs: MINUTE_MS, trustProxy, now: () => clock }));
    app.get('/', (c) => c.text('ok'));
    return {
      app,
      advance: (ms: number) => {
        clock += ms;
      },
    };
  }

  // Node server bindings as getConnInfo reads them
  const socket = (address: string) => ({ incoming: { socket: { remoteAddress: address } } });
  const forwardedFor = (address: string) => ({
    headers: { 'x-forwarded-for': `${address}, 10.9.9.9` },
  });

  it('should answer 429 with Retry-After once the limit is spent', async () => {
    const { app, advance } = createLimitedApp(1);

    expect((await app.request('/', {}, socket('10.0.0.1'))).status).toBe(200);
    advance(15_000);
    const limited = await app.request('/', {}, socket('10.0.0.1'));

    expect(limited.status).toBe(429);
    expect(limited.headers.get('Retry-After')).toBe('45');
    expect(await limited.json()).toEqual({
      success: false,
      error: { code: 'RATE_LIMITED', message: RATE_LIMIT_MESSAGE },
    });
  });

  it('should key clients by socket address', async () => {
    const { app } = createLimitedApp(1);

    expect((await app.request('/', {}, socket('10.0.0.1'))).status).toBe(200);
    expect((await app.request('/', {}, socket('10.0.0.2'))).status).toBe(200);
    expect((await app.request('/', {}, socket('10.0.0.1'))).status).toBe(429);
  });

  it('should keep limiting a client that rotates X-Forwarded-For', async () => {
    const { app } = createLimitedApp(2);
    const statuses: number[] = [];

    for (let i = 1; i <= 5; i++) {
      const res = await app.request('/', forwardedFor(`10.0.0.${i}`), socket('10.1.1.1'));
      statuses.push(res.status);
    }

    expect(statuses).toEqual([200, 200, 429, 429, 429]);
  });

  it('should key on the first forwarded hop behind a trusted proxy', async () => {
    const { app } = createLimitedApp(1, true);
    const proxy = socket('10.1.1.1');

    expect((await app.request('/', forwardedFor('10.0.0.1'), proxy)).status).toBe(200);
    expect((await app.request('/', forwardedFor('10.0.0.2'), proxy)).status).toBe(200);
    expect((await app.request('/', forwardedFor('10.0.0.1'), proxy)).status).toBe(429);
  });

  it('should share one bucket for requests without an address', async () => {
    const { app } = createLimitedApp(1);

    expect((await app.request('/')).status).toBe(200);
    expect((await app.request('/')).status).toBe(429);
  });
});
