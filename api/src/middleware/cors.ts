/**
 * CORS configuration
 */

import { cors } from 'hono/cors';

const DEFAULT_ORIGINS = ['http://localhost:5173', 'http://127.0.0.1:5173'];

export function allowedOrigins(value = process.env.API_CORS_ORIGINS): string[] {
  const origins = value?.split(',').map(origin => origin.trim()).filter(Boolean);
  return origins && origins.length > 0 ? origins : DEFAULT_ORIGINS;
}

export const corsMiddleware = cors({
  origin: allowedOrigins(),
  allowMethods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
  allowHeaders: ['Content-Type', 'Authorization'],
  exposeHeaders: ['X-Request-Id', 'X-RateLimit-Remaining'],
  maxAge: 86400,
});
