/**
 * Answer history routes
 */

import { Hono } from 'hono';
import { z } from 'zod';
import { zValidator } from '@hono/zod-validator';
import { getHistoryService } from '../../../src/core/history/service.js';
import type { ApiEnv } from '../middleware/error-handler.js';

const history = new Hono<ApiEnv>();

const listQuerySchema = z.object({
  page: z.coerce.number().int().min(1).optional(),
  pageSize: z.coerce.number().int().min(1).max(100).optional(),
  onlyIncorrect: z.enum(['true', 'false']).optional(),
});

/**
 * GET /api/history/:kb
 */
history.get('/:kb', zValidator('query', listQuerySchema), (c) => {
  const query = c.req.valid('query');
  const page = getHistoryService().getHistoryPage(c.req.param('kb'), {
    page: query.page,
    pageSize: query.pageSize,
    onlyIncorrect: query.onlyIncorrect === 'true',
  });

  const records = page.records.map(record => ({
    id: record.id,
    questionId: record.questionId,
    question: record.question,
    userAnswer: record.userAnswer,
    difficulty: record.difficulty,
    strategy: record.strategy,
    evaluated: record.evaluated,
    isCorrect: record.evaluated ? record.evaluation.isCorrect : undefined,
    score: record.evaluated ? record.evaluation.score : undefined,
    feedback: record.evaluation.feedback,
    createdAt: record.createdAt.toISOString(),
  }));

  return c.json({ success: true, data: { ...page, records } });
});

/**
 * GET /api/history/:kb/stats
 */
history.get('/:kb/stats', (c) => {
  return c.json({ success: true, data: getHistoryService().getStatistics(c.req.param('kb')) });
});

export default history;
