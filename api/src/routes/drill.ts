/**
 * Drill routes: issue questions and grade answers
 */

import { Hono } from 'hono';
import { z } from 'zod';
import { zValidator } from '@hono/zod-validator';
import { getDrillService } from '../../../src/core/drill/service.js';
import { toEvaluationView, toQuestionView } from '../../../src/core/drill/view.js';
import { QuestionNotFoundError } from '../../../src/core/errors.js';
import { DIFFICULTIES, SELECTION_STRATEGIES } from '../../../src/types/index.js';
import type { ApiEnv } from '../middleware/error-handler.js';

const drill = new Hono<ApiEnv>();

const questionSchema = z.object({
  kb: z.string().min(1),
  difficulty: z.enum(DIFFICULTIES).optional(),
  strategy: z.enum(SELECTION_STRATEGIES).optional(),
});

const answerSchema = z.object({
  answer: z.string().max(10000),
});

const resetSchema = z.object({
  kb: z.string().min(1).optional(),
});

/**
 * POST /api/drill/questions
 */
drill.post('/questions', zValidator('json', questionSchema), async (c) => {
  const body = c.req.valid('json');
  const question = await getDrillService().nextQuestion(body.kb, {
    difficulty: body.difficulty,
    strategy: body.strategy,
    signal: c.req.raw.signal,
  });
  return c.json({ success: true, data: toQuestionView(question) }, 201);
});

/**
 * GET /api/drill/questions/:id
 */
drill.get('/questions/:id', (c) => {
  const id = c.req.param('id');
  const question = getDrillService().getQuestion(id);
  if (!question) {
    throw new QuestionNotFoundError(id);
  }
  return c.json({ success: true, data: toQuestionView(question) });
});

/**
 * POST /api/drill/questions/:id/answer
 */
drill.post('/questions/:id/answer', zValidator('json', answerSchema), async (c) => {
  const body = c.req.valid('json');
  const result = await getDrillService().submitAnswer(c.req.param('id'), body.answer, {
    signal: c.req.raw.signal,
  });
  return c.json({
    success: true,
    data: { ...toEvaluationView(result.evaluation), recordId: result.recordId },
  });
});

/**
 * Forget which fragments were already asked in this process
 * POST /api/drill/session/reset
 */
drill.post('/session/reset', zValidator('json', resetSchema), (c) => {
  const body = c.req.valid('json');
  getDrillService().resetSession(body.kb);
  return c.json({ success: true, data: { reset: body.kb ?? 'all' } });
});

export default drill;
