/**
 * MCP tools for answer history
 */

import { z } from 'zod';
import { getHistoryService, type HistoryPage } from '../../core/history/service.js';
import { createSafeErrorResponse } from '../../utils/security.js';
import type { HistoryStatistics, ToolResult } from '../../types/index.js';

export const getHistorySchema = z.object({
  kb: z.string().min(1).describe('Knowledge base name'),
  page: z.number().int().min(1).optional().describe('1-based page number'),
  pageSize: z.number().int().min(1).max(100).optional().describe('Records per page (default 20)'),
  onlyIncorrect: z.boolean().optional().describe('Only graded answers that were wrong'),
});

export const getStatisticsSchema = z.object({
  kb: z.string().min(1).describe('Knowledge base name'),
});

export interface HistoryEntry {
  id: string;
  question: string;
  userAnswer: string;
  evaluated: boolean;
  isCorrect?: boolean;
  score?: number;
  feedback: string;
  difficulty: string;
  createdAt: string;
}

export async function getHistory(
  params: z.infer<typeof getHistorySchema>
): Promise<ToolResult<Omit<HistoryPage, 'records'> & { records: HistoryEntry[] }>> {
  try {
    const page = getHistoryService().getHistoryPage(params.kb, {
      page: params.page,
      pageSize: params.pageSize,
      onlyIncorrect: params.onlyIncorrect,
    });

    const records: HistoryEntry[] = page.records.map(record => ({
      id: record.id,
      question: record.question,
      userAnswer: record.userAnswer,
      evaluated: record.evaluated,
      isCorrect: record.evaluated ? record.evaluation.isCorrect : undefined,
      score: record.evaluated ? record.evaluation.score : undefined,
      feedback: record.evaluation.feedback,
      difficulty: record.difficulty,
      createdAt: record.createdAt.toISOString(),
    }));

    return { success: true, data: { ...page, records } };
  } catch (error) {
    return createSafeErrorResponse(error);
  }
}

export async function getStatistics(
  params: z.infer<typeof getStatisticsSchema>
): Promise<ToolResult<HistoryStatistics>> {
  try {
    return { success: true, data: getHistoryService().getStatistics(params.kb) };
  } catch (error) {
    return createSafeErrorResponse(error);
  }
}
