/**
 * Path validation, error sanitization, rate limiting and safe JSON columns
 */

import { resolve, normalize, isAbsolute } from 'path';
import type { z } from 'zod';

/**
 * Resolve `filepath` to an absolute path, rejecting null bytes and paths
 * outside `allowedBaseDirs` when given
 */
export function validateFilePath(filepath: string, allowedBaseDirs?: string[]): string {
  if (!filepath) {
    throw new Error('Invalid file path: path must be a non-empty string');
  }
  if (filepath.includes('\0')) {
    throw new Error('Invalid file path: null bytes not allowed');
  }

  const normalizedPath = normalize(filepath);
  const absolutePath = isAbsolute(normalizedPath)
    ? normalizedPath
    : resolve(process.cwd(), normalizedPath);

  if (allowedBaseDirs && allowedBaseDirs.length > 0) {
    const isAllowed = allowedBaseDirs.some(baseDir => {
      const base = resolve(baseDir);
      return absolutePath.startsWith(base + '/') || absolutePath === base;
    });
    if (!isAllowed) {
      throw new Error('Invalid file path: path is outside allowed directories');
    }
  }

  return absolutePath;
}

/**
 * Strip keys, tokens, paths, addresses and stack frames from an error
 * message before it reaches a client
 */
export function sanitizeError(error: unknown): string {
  if (!(error instanceof Error)) {
    return 'An unexpected error occurred';
  }

  let sanitized = error.message
    .replace(/sk-[a-zA-Z0-9]{20,}/g, '[REDACTED_API_KEY]')
    .replace(/Bearer\s+[a-zA-Z0-9._-]+/gi, 'Bearer [REDACTED]')
    .replace(/\/(?:home|usr|var|tmp|etc|opt|root)\/[^\s:'"]+/g, '[REDACTED_PATH]')
    .replace(/[A-Z]:\\[^\s:'"]+/gi, '[REDACTED_PATH]')
    .replace(/\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3}(:\d+)?/g, '[REDACTED_IP]')
    .replace(/https?:\/\/[a-zA-Z0-9.-]+\.(internal|local|corp|intranet)[^\s]*/gi, '[REDACTED_URL]')
    .replace(/\n\s+at\s+.+/g, '')
    .replace(/^(Error|TypeError|ReferenceError|SyntaxError):\s*/i, '');

  if (sanitized.length > 500) {
    sanitized = sanitized.substring(0, 497) + '...';
  }

  return sanitized || 'An error occurred while processing your request';
}

/**
 * Failure shape returned by MCP tools
 */
export function createSafeErrorResponse(error: unknown, context?: string): {
  success: false;
  error: string;
} {
  const message = sanitizeError(error);
  return {
    success: false,
    error: context ? `${context}: ${message}` : message,
  };
}

/**
 * Sliding-window request counter per key
 */
export class RateLimiter {
  private requests: Map<string, number[]> = new Map();

  constructor(
    private readonly maxRequests: number = 100,
    private readonly windowMs: number = 60000
  ) {}

  isAllowed(key: string = 'global'): boolean {
    const windowStart = Date.now() - this.windowMs;
    const recent = (this.requests.get(key) ?? []).filter(time => time > windowStart);

    if (recent.length >= this.maxRequests) {
      this.requests.set(key, recent);
      return false;
    }

    recent.push(Date.now());
    this.requests.set(key, recent);
    return true;
  }

  reset(key?: string): void {
    if (key) {
      this.requests.delete(key);
    } else {
      this.requests.clear();
    }
  }
}

// Model-backed drill calls are the expensive ones
export const drillRateLimiter = new RateLimiter(30, 60000);
export const indexRateLimiter = new RateLimiter(20, 60000);

/**
 * Parse a JSON column, falling back when it is malformed or does not match
 * the schema
 */
export function safeJsonParse<T>(
  json: string | null | undefined,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  defaultValue: T
): T {
  if (!json) return defaultValue;
  try {
    const parsed = schema.safeParse(JSON.parse(json));
    return parsed.success ? parsed.data : defaultValue;
  } catch {
    return defaultValue;
  }
}

/**
 * Serializes async work per key; used so one file is never indexed twice at
 * the same time
 */
export class KeyedLock {
  private tails: Map<string, Promise<void>> = new Map();

  async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => {};
    const current = new Promise<void>(resolve => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}

export const documentLock = new KeyedLock();
