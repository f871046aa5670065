/**
 * REST API entry point
 */

import { serve } from '@hono/node-server';
import { createApp } from './server.js';
import { getDatabase, closeDatabase } from '../../src/storage/sqlite.js';
import { ensureCollection } from '../../src/storage/qdrant.js';

const PORT = parseInt(process.env.API_PORT || '3001', 10);
const HOST = process.env.API_HOST || '127.0.0.1';

async function start(): Promise<void> {
  getDatabase();
  await ensureCollection();

  const server = serve({
    fetch: createApp().fetch,
    port: PORT,
    hostname: HOST,
  });

  console.error(`[api] listening on http://${HOST}:${PORT}`);

  const shutdown = () => {
    server.close();
    closeDatabase();
    process.exit(0);
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

start().catch((error: unknown) => {
  console.error('[api] failed to start:', error);
  process.exit(1);
});
