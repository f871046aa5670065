/**
 * MCP tools for indexing content into a knowledge base
 */

import { z } from 'zod';
import { getIngestionService } from '../../core/ingestion/service.js';
import { indexRateLimiter, createSafeErrorResponse } from '../../utils/security.js';
import type { IngestionResult, ToolResult } from '../../types/index.js';

const MAX_CONTENT_SIZE = 1_000_000;

export const indexDocumentSchema = z.object({
  kb: z.string().min(1).describe('Knowledge base to index into'),
  path: z.string().min(1).describe('Absolute path to a .txt or .md file'),
  force: z.boolean().optional().describe('Reindex even if the file is unchanged'),
});

export const indexTextSchema = z.object({
  kb: z.string().min(1).describe('Knowledge base to index into'),
  content: z.string()
    .min(1)
    .max(MAX_CONTENT_SIZE, { message: `Content exceeds maximum size of ${MAX_CONTENT_SIZE} characters` })
    .describe('Text content to index'),
  title: z.string()
    .min(1)
    .max(500, { message: 'Title exceeds maximum length of 500 characters' })
    .describe('Title for the indexed content'),
});

type IndexedData = Pick<IngestionResult, 'documentId' | 'filename' | 'status' | 'chunkCount'>;

function toToolResult(result: IngestionResult): ToolResult<IndexedData> {
  if (result.status === 'failed') {
    return { success: false, error: result.error ?? 'Failed to index document' };
  }
  return {
    success: true,
    data: {
      documentId: result.documentId,
      filename: result.filename,
      status: result.status,
      chunkCount: result.chunkCount,
    },
  };
}

export async function indexDocument(
  params: z.infer<typeof indexDocumentSchema>
): Promise<ToolResult<IndexedData>> {
  try {
    if (!indexRateLimiter.isAllowed('index')) {
      return { success: false, error: 'Rate limit exceeded. Please wait before indexing more documents.' };
    }

    const result = await getIngestionService().indexDocument(params.kb, params.path, {
      forceReindex: params.force,
    });
    return toToolResult(result);
  } catch (error) {
    return createSafeErrorResponse(error);
  }
}

export async function indexText(
  params: z.infer<typeof indexTextSchema>
): Promise<ToolResult<IndexedData>> {
  try {
    if (!indexRateLimiter.isAllowed('index')) {
      return { success: false, error: 'Rate limit exceeded. Please wait before indexing more documents.' };
    }

    const result = await getIngestionService().indexText(params.kb, params.content, params.title);
    return toToolResult(result);
  } catch (error) {
    return createSafeErrorResponse(error);
  }
}
