/**
 * Tests for the fixed-window rate limiter
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { Hono } from 'hono';
import { clientAddress, rateLimitMiddleware, resetRateLimits, type RateLimitConfig } from './rate-limit.js';

function appWith(config: Partial<RateLimitConfig>) {
  const app = new Hono();
  app.use('/drill/*', rateLimitMiddleware({ windowMs: 60000, ...config }));
  app.get('/drill/:id', (c) => c.json({ id: c.req.param('id') }));
  app.post('/drill/:id', (c) => c.json({ id: c.req.param('id') }));
  return app;
}

function from(ip: string, method = 'GET'): RequestInit {
  return { method, headers: { 'x-forwarded-for': `${ip}, 10.0.0.1` } };
}

describe('rateLimitMiddleware', () => {
  beforeEach(() => {
    resetRateLimits();
  });

  it('should give each path its own window without a scope', async () => {
    const app = appWith({ maxRequests: 1 });

    expect((await app.request('/drill/a', from('1.1.1.1'))).status).toBe(200);
    expect((await app.request('/drill/b', from('1.1.1.1'))).status).toBe(200);
    expect((await app.request('/drill/a', from('1.1.1.1'))).status).toBe(429);
  });

  it('should share a scoped budget across paths', async () => {
    const app = appWith({ maxRequests: 2, scope: 'model calls' });

    const first = await app.request('/drill/a', from('1.1.1.1'));
    await app.request('/drill/b', from('1.1.1.1'));
    const third = await app.request('/drill/c', from('1.1.1.1'));

    expect(first.headers.get('X-RateLimit-Limit')).toBe('2');
    expect(first.headers.get('X-RateLimit-Remaining')).toBe('1');
    expect(third.status).toBe(429);
    expect(third.headers.get('Retry-After')).toBeTruthy();
    expect(await third.json()).toEqual({
      success: false,
      error: 'RATE_LIMITED',
      message: expect.stringContaining('Too many model calls.'),
    });
  });

  it('should let uncounted requests through without touching the budget', async () => {
    const app = appWith({ maxRequests: 1, scope: 'model calls', counts: (c) => c.req.method === 'POST' });

    const lookups = [await app.request('/drill/a', from('1.1.1.1')), await app.request('/drill/a', from('1.1.1.1'))];
    const charged = await app.request('/drill/a', from('1.1.1.1', 'POST'));
    const overLimit = await app.request('/drill/b', from('1.1.1.1', 'POST'));

    expect(lookups.map(res => res.status)).toEqual([200, 200]);
    expect(lookups[0].headers.get('X-RateLimit-Limit')).toBeNull();
    expect(charged.status).toBe(200);
    expect(overLimit.status).toBe(429);
  });

  it('should count clients separately', async () => {
    const app = appWith({ maxRequests: 1, scope: 'model calls' });

    expect((await app.request('/drill/a', from('1.1.1.1'))).status).toBe(200);
    expect((await app.request('/drill/a', from('2.2.2.2'))).status).toBe(200);
    expect((await app.request('/drill/a', from('1.1.1.1'))).status).toBe(429);
  });
});

describe('clientAddress', () => {
  it('should take the first forwarded address', async () => {
    const app = new Hono();
    app.get('/', (c) => c.text(clientAddress(c)));

    expect(await (await app.request('/', from('3.3.3.3'))).text()).toBe('3.3.3.3');
    expect(await (await app.request('/')).text()).toBe('unknown');
  });
});
