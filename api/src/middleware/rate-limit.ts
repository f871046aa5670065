/**
 * Fixed-window rate limiting per client.
 *
 * Without a `scope` each path gets its own window. A scoped limiter shares
 * one budget across every path it is mounted on, so `/questions/a/answer` and
 * `/questions/b/answer` draw from the same allowance.
 */

import type { Context, Next } from 'hono';
import type { ApiError } from './error-handler.js';

export interface RateLimitConfig {
  windowMs: number;
  maxRequests: number;
  /** Budget name shared by all matching paths */
  scope?: string;
  /** Requests this rejects pass through uncounted */
  counts?: (c: Context) => boolean;
}

interface RateLimitEntry {
  count: number;
  resetTime: number;
}

const DEFAULT_CONFIG: RateLimitConfig = {
  windowMs: 60 * 1000,
  maxRequests: 60,
};

const requestCounts = new Map<string, RateLimitEntry>();

const cleanup = setInterval(() => {
  const now = Date.now();
  for (const [key, entry] of requestCounts.entries()) {
    if (now > entry.resetTime) {
      requestCounts.delete(key);
    }
  }
}, 60 * 1000);
cleanup.unref();

export function resetRateLimits(): void {
  requestCounts.clear();
}

export function clientAddress(c: Context): string {
  const forwarded = c.req.header('x-forwarded-for');
  return forwarded?.split(',')[0]?.trim() || 'unknown';
}

export function rateLimitMiddleware(config: Partial<RateLimitConfig> = {}) {
  const { windowMs, maxRequests, scope, counts } = { ...DEFAULT_CONFIG, ...config };

  return async (c: Context, next: Next) => {
    if (counts && !counts(c)) {
      await next();
      return;
    }

    const key = scope ? `${clientAddress(c)}#${scope}` : `${clientAddress(c)}:${c.req.path}`;
    const now = Date.now();
    let entry = requestCounts.get(key);

    if (!entry || now > entry.resetTime) {
      entry = {
        count: 0,
        resetTime: now + windowMs,
      };
    }

    entry.count++;
    requestCounts.set(key, entry);

    c.header('X-RateLimit-Limit', String(maxRequests));
    c.header('X-RateLimit-Remaining', String(Math.max(0, maxRequests - entry.count)));
    c.header('X-RateLimit-Reset', String(Math.ceil(entry.resetTime / 1000)));

    if (entry.count > maxRequests) {
      const retryAfter = Math.ceil((entry.resetTime - now) / 1000);
      c.header('Retry-After', String(retryAfter));
      const response: ApiError = {
        success: false,
        error: 'RATE_LIMITED',
        message: `Too many ${scope ?? 'requests'}. Please try again in ${retryAfter} seconds.`,
      };
      return c.json(response, 429);
    }

    await next();
  };
}
