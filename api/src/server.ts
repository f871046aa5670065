/**
 * Hono REST API
 */

import { Hono, type Context } from 'hono';
import { logger } from 'hono/logger';
import { secureHeaders } from 'hono/secure-headers';
import { timing } from 'hono/timing';

import { corsMiddleware } from './middleware/cors.js';
import { rateLimitMiddleware } from './middleware/rate-limit.js';
import { errorHandler, notFoundHandler, requestId, type ApiEnv } from './middleware/error-handler.js';

import health from './routes/health.js';
import knowledgeBases from './routes/knowledge-bases.js';
import drill from './routes/drill.js';
import history from './routes/history.js';

export interface AppOptions {
  /** Request logging, off in tests */
  log?: boolean;
}

const MODEL_ROUTE = /\/api\/drill\/questions(\/[^/]+\/answer)?$/;

/** Generating a question and grading an answer each cost a model call */
export function callsModel(c: Context): boolean {
  return c.req.method === 'POST' && MODEL_ROUTE.test(c.req.path);
}

export function createApp(options: AppOptions = {}) {
  const app = new Hono<ApiEnv>();

  app.use('*', requestId);
  app.use('*', timing());
  if (options.log ?? true) {
    app.use('*', logger((message) => console.error(message)));
  }
  app.use('*', secureHeaders());
  app.use('*', corsMiddleware);

  app.use('/api/*', rateLimitMiddleware({ windowMs: 60000, maxRequests: 100 }));
  app.use('/api/drill/*', rateLimitMiddleware({
    windowMs: 60000,
    maxRequests: 30,
    scope: 'model calls',
    counts: callsModel,
  }));

  app.route('/api/health', health);
  app.route('/api/knowledge-bases', knowledgeBases);
  app.route('/api/drill', drill);
  app.route('/api/history', history);

  app.get('/', (c) => {
    return c.json({
      name: 'Knowledge Drill API',
      version: '1.0.0',
      endpoints: {
        health: '/api/health',
        knowledgeBases: '/api/knowledge-bases',
        drill: '/api/drill/questions',
        history: '/api/history/:kb',
      },
    });
  });

  app.onError(errorHandler);
  app.notFound(notFoundHandler);

  return app;
}

export type App = ReturnType<typeof createApp>;
