/**
 * MCP tools for knowledge base management
 */

import { z } from 'zod';
import {
  getKnowledgeBaseService,
  knowledgeBaseNameSchema,
  toKnowledgeBaseSummary,
  type KnowledgeBaseSummary,
} from '../../core/knowledge-base/service.js';
import { createSafeErrorResponse } from '../../utils/security.js';
import type { ToolResult } from '../../types/index.js';

export const createKnowledgeBaseSchema = z.object({
  name: knowledgeBaseNameSchema.describe('Knowledge base name (letters, digits, "_" and "-")'),
  description: z.string().max(1000).optional().describe('What the knowledge base covers'),
});

export const listKnowledgeBasesSchema = z.object({});

export const deleteKnowledgeBaseSchema = z.object({
  name: z.string().min(1).describe('Knowledge base to delete, with its documents and history'),
});

export async function createKnowledgeBase(
  params: z.infer<typeof createKnowledgeBaseSchema>
): Promise<ToolResult<KnowledgeBaseSummary>> {
  try {
    const kb = getKnowledgeBaseService().createKnowledgeBase(params.name, params.description);
    return { success: true, data: toKnowledgeBaseSummary(kb) };
  } catch (error) {
    return createSafeErrorResponse(error);
  }
}

export async function listKnowledgeBases(): Promise<ToolResult<{ knowledgeBases: KnowledgeBaseSummary[]; total: number }>> {
  try {
    const knowledgeBases = getKnowledgeBaseService().listKnowledgeBases().map(toKnowledgeBaseSummary);
    return { success: true, data: { knowledgeBases, total: knowledgeBases.length } };
  } catch (error) {
    return createSafeErrorResponse(error);
  }
}

export async function deleteKnowledgeBase(
  params: z.infer<typeof deleteKnowledgeBaseSchema>
): Promise<ToolResult<{ deleted: string }>> {
  try {
    await getKnowledgeBaseService().deleteKnowledgeBase(params.name);
    return { success: true, data: { deleted: params.name } };
  } catch (error) {
    return createSafeErrorResponse(error);
  }
}
