/**
 * Error handling for the REST API
 */

import type { Context, Next } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { HTTPException } from 'hono/http-exception';
import { ZodError } from 'zod';
import { KnowledgeSystemError, type ErrorCode } from '../../../src/core/errors.js';
import { sanitizeError } from '../../../src/utils/security.js';

export type ApiEnv = {
  Variables: {
    requestId: string;
  };
};

export interface ApiError {
  success: false;
  error: string;
  message: string;
  details?: unknown;
  requestId?: string;
}

const STATUS_BY_CODE: Record<ErrorCode, ContentfulStatusCode> = {
  VALIDATION_FAILED: 400,
  KNOWLEDGE_BASE_NOT_FOUND: 404,
  QUESTION_NOT_FOUND: 404,
  EMPTY_KNOWLEDGE_BASE: 409,
  QUESTION_GENERATION_FAILED: 503,
  MODEL_UNAVAILABLE: 503,
  MODEL_RESPONSE_INVALID: 500,
  EVALUATION_PARSE_FAILED: 500,
  RETRIEVAL_FAILED: 500,
  DEADLINE_EXCEEDED: 500,
  OPERATION_CANCELLED: 500,
};

export function statusForError(err: unknown): ContentfulStatusCode {
  if (err instanceof ZodError) return 400;
  if (err instanceof KnowledgeSystemError) return STATUS_BY_CODE[err.code];
  if (err instanceof HTTPException) return err.status;
  return 500;
}

/**
 * Tags each request with an id echoed in X-Request-Id
 */
export async function requestId(c: Context<ApiEnv>, next: Next) {
  const id = crypto.randomUUID();
  c.header('X-Request-Id', id);
  c.set('requestId', id);
  await next();
}

export function errorHandler(err: Error, c: Context<ApiEnv>) {
  const requestId = c.get('requestId');
  const status = statusForError(err);

  if (err instanceof ZodError) {
    const response: ApiError = {
      success: false,
      error: 'VALIDATION_FAILED',
      message: 'Invalid request parameters',
      details: err.errors.map(e => ({
        path: e.path.join('.'),
        message: e.message,
      })),
      requestId,
    };
    return c.json(response, status);
  }

  if (status >= 500) {
    console.error(`[api] [${requestId}] ${c.req.method} ${c.req.path} failed:`, err);
  }

  const response: ApiError = {
    success: false,
    error: err instanceof KnowledgeSystemError ? err.code : status === 500 ? 'INTERNAL_ERROR' : err.message,
    message: status === 500 && process.env.NODE_ENV === 'production'
      ? 'An unexpected error occurred'
      : sanitizeError(err),
    requestId,
  };
  return c.json(response, status);
}

export function notFoundHandler(c: Context<ApiEnv>) {
  const response: ApiError = {
    success: false,
    error: 'NOT_FOUND',
    message: `Route ${c.req.method} ${c.req.path} not found`,
    requestId: c.get('requestId'),
  };
  return c.json(response, 404);
}
