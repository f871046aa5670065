/**
 * Knowledge base management and indexing routes
 */

import { Hono } from 'hono';
import { z } from 'zod';
import { zValidator } from '@hono/zod-validator';
import {
  getKnowledgeBaseService,
  knowledgeBaseNameSchema,
  toKnowledgeBaseSummary,
} from '../../../src/core/knowledge-base/service.js';
import { getIngestionService } from '../../../src/core/ingestion/service.js';
import type { IngestionResult } from '../../../src/types/index.js';
import type { ApiEnv } from '../middleware/error-handler.js';

const knowledgeBases = new Hono<ApiEnv>();

const createSchema = z.object({
  name: knowledgeBaseNameSchema,
  description: z.string().max(1000).optional(),
});

const indexDocumentSchema = z.object({
  path: z.string().min(1),
  force: z.boolean().optional(),
});

const indexTextSchema = z.object({
  content: z.string().min(1).max(1_000_000),
  title: z.string().min(1).max(500),
});

function indexed(result: IngestionResult) {
  return {
    documentId: result.documentId,
    filename: result.filename,
    status: result.status,
    chunkCount: result.chunkCount,
  };
}

/**
 * GET /api/knowledge-bases
 */
knowledgeBases.get('/', (c) => {
  const items = getKnowledgeBaseService().listKnowledgeBases().map(toKnowledgeBaseSummary);
  return c.json({ success: true, data: { knowledgeBases: items, total: items.length } });
});

/**
 * POST /api/knowledge-bases
 */
knowledgeBases.post('/', zValidator('json', createSchema), (c) => {
  const body = c.req.valid('json');
  const kb = getKnowledgeBaseService().createKnowledgeBase(body.name, body.description);
  return c.json({ success: true, data: toKnowledgeBaseSummary(kb) }, 201);
});

/**
 * GET /api/knowledge-bases/:name
 */
knowledgeBases.get('/:name', (c) => {
  const service = getKnowledgeBaseService();
  const kb = service.getKnowledgeBase(c.req.param('name'));
  return c.json({
    success: true,
    data: { ...toKnowledgeBaseSummary(kb), stats: service.getStats(kb.name) },
  });
});

/**
 * DELETE /api/knowledge-bases/:name
 */
knowledgeBases.delete('/:name', async (c) => {
  const name = c.req.param('name');
  await getKnowledgeBaseService().deleteKnowledgeBase(name);
  return c.json({ success: true, data: { deleted: name } });
});

/**
 * Index a file already on the server's disk
 * POST /api/knowledge-bases/:name/documents
 */
knowledgeBases.post('/:name/documents', zValidator('json', indexDocumentSchema), async (c) => {
  const body = c.req.valid('json');
  const result = await getIngestionService().indexDocument(c.req.param('name'), body.path, {
    forceReindex: body.force,
  });

  if (result.status === 'failed') {
    return c.json({ success: false, error: result.error ?? 'Document indexing failed' }, 422);
  }
  return c.json({ success: true, data: indexed(result) }, result.status === 'success' ? 201 : 200);
});

/**
 * POST /api/knowledge-bases/:name/text
 */
knowledgeBases.post('/:name/text', zValidator('json', indexTextSchema), async (c) => {
  const body = c.req.valid('json');
  const result = await getIngestionService().indexText(c.req.param('name'), body.content, body.title);

  if (result.status === 'failed') {
    return c.json({ success: false, error: result.error ?? 'Text indexing failed' }, 422);
  }
  return c.json({ success: true, data: indexed(result) }, 201);
});

export default knowledgeBases;
