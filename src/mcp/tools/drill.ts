/**
 * MCP tools for the question/answer drill
 */

import { z } from 'zod';
import { getDrillService } from '../../core/drill/service.js';
import { toEvaluationView, toQuestionView, type EvaluationView, type QuestionView } from '../../core/drill/view.js';
import { drillRateLimiter, createSafeErrorResponse } from '../../utils/security.js';
import { DIFFICULTIES, SELECTION_STRATEGIES, type ToolResult } from '../../types/index.js';

export const generateQuestionSchema = z.object({
  kb: z.string().min(1).describe('Knowledge base to quiz on'),
  difficulty: z.enum(DIFFICULTIES).optional().describe('Question difficulty'),
  strategy: z.enum(SELECTION_STRATEGIES).optional()
    .describe('How to pick the source content: random, diverse, recent or comprehensive'),
});

export const submitAnswerSchema = z.object({
  questionId: z.string().min(1).describe('Id returned by generate_question'),
  answer: z.string().max(10000).describe('Free-text answer to grade'),
});

export async function generateQuestion(
  params: z.infer<typeof generateQuestionSchema>
): Promise<ToolResult<QuestionView>> {
  try {
    if (!drillRateLimiter.isAllowed('drill')) {
      return { success: false, error: 'Rate limit exceeded. Please wait before requesting more questions.' };
    }

    const question = await getDrillService().nextQuestion(params.kb, {
      difficulty: params.difficulty,
      strategy: params.strategy,
    });
    return { success: true, data: toQuestionView(question) };
  } catch (error) {
    return createSafeErrorResponse(error);
  }
}

export async function submitAnswer(
  params: z.infer<typeof submitAnswerSchema>
): Promise<ToolResult<EvaluationView & { recordId: string | null }>> {
  try {
    if (!drillRateLimiter.isAllowed('drill')) {
      return { success: false, error: 'Rate limit exceeded. Please wait before submitting more answers.' };
    }

    const result = await getDrillService().submitAnswer(params.questionId, params.answer);
    return {
      success: true,
      data: { ...toEvaluationView(result.evaluation), recordId: result.recordId },
    };
  } catch (error) {
    return createSafeErrorResponse(error);
  }
}
