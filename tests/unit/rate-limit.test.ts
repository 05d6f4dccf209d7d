/**
 * Rate Limiter Tests
 *
 * Window counting and expiry of per-client entries, driven through a small
 * Hono app with a mocked clock.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Hono } from 'hono';
import { rateLimiter, type RateLimitEntry } from '../../src/api/middleware';

const START = new Date('2024-01-15T12:00:00.000Z');

function limitedApp(store: Map<string, RateLimitEntry>, maxRequests = 5): Hono {
  const app = new Hono();
  app.use('*', rateLimiter({ windowMs: 1_000, maxRequests, store }));
  app.get('/', (c) => c.text('ok'));
  return app;
}

function from(client: string): RequestInit {
  return { headers: { 'x-forwarded-for': client } };
}

describe('rateLimiter', () => {
  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(START);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should reject requests over the limit until the window passes', async () => {
    const app = limitedApp(new Map(), 1);

    expect((await app.request('/', from('10.0.0.1'))).status).toBe(200);
    const limited = await app.request('/', from('10.0.0.1'));
    expect(limited.status).toBe(429);
    expect(limited.headers.get('Retry-After')).toBe('1');

    vi.setSystemTime(START.getTime() + 1_000);
    expect((await app.request('/', from('10.0.0.1'))).status).toBe(200);
  });

  it('should drop entries of clients whose window has passed', async () => {
    const store = new Map<string, RateLimitEntry>();
    const app = limitedApp(store);

    await app.request('/', from('10.0.0.1'));
    await app.request('/', from('10.0.0.2'));
    vi.setSystemTime(START.getTime() + 600);
    await app.request('/', from('10.0.0.3'));
    expect(store.size).toBe(3);

    vi.setSystemTime(START.getTime() + 1_000);
    await app.request('/', from('10.0.0.4'));

    expect(Array.from(store.keys())).toEqual(['10.0.0.3', '10.0.0.4']);
  });

  it('should keep an expired entry until the next sweep is due', async () => {
    const store = new Map<string, RateLimitEntry>();
    const app = limitedApp(store);

    await app.request('/', from('10.0.0.1'));
    vi.setSystemTime(START.getTime() + 500);
    await app.request('/', from('10.0.0.2'));
    vi.setSystemTime(START.getTime() + 1_000);
    await app.request('/', from('10.0.0.2'));
    expect(Array.from(store.keys())).toEqual(['10.0.0.2']);

    // 10.0.0.2 expired at +1500; the next sweep runs at +2000
    vi.setSystemTime(START.getTime() + 1_600);
    await app.request('/', from('10.0.0.3'));
    expect(Array.from(store.keys())).toEqual(['10.0.0.2', '10.0.0.3']);

    vi.setSystemTime(START.getTime() + 2_000);
    await app.request('/', from('10.0.0.3'));
    expect(Array.from(store.keys())).toEqual(['10.0.0.3']);
  });
});
