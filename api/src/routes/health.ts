/**
 * Health check routes
 */

import { Hono } from 'hono';
import { getDatabase } from '../../../src/storage/sqlite.js';
import { getCollectionInfo } from '../../../src/storage/qdrant.js';
import type { ApiEnv } from '../middleware/error-handler.js';

const health = new Hono<ApiEnv>();

health.get('/', (c) => {
  return c.json({
    status: 'healthy',
    timestamp: new Date().toISOString(),
    version: '1.0.0',
  });
});

health.get('/ready', async (c) => {
  let sqlite = false;
  try {
    getDatabase().prepare('SELECT 1').get();
    sqlite = true;
  } catch (error) {
    console.error('[api] sqlite not ready:', error instanceof Error ? error.message : error);
  }

  const collection = await getCollectionInfo();
  const checks = {
    sqlite,
    qdrant: collection.status !== 'not_initialized',
  };

  const allReady = Object.values(checks).every(Boolean);

  return c.json(
    {
      ready: allReady,
      checks,
      timestamp: new Date().toISOString(),
    },
    allReady ? 200 : 503
  );
});

export default health;
