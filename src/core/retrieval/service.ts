/**
 * Retrieval service - similarity search over one knowledge base
 */

import { getEmbeddingService } from '../embedding/service.js';
import { searchVectors, ensureCollection } from '../../storage/qdrant.js';
import { getKnowledgeBaseByName } from '../../storage/sqlite.js';
import { config } from '../../config/index.js';
import { KnowledgeBaseNotFoundError, OperationCancelledError, RetrievalError } from '../errors.js';
import type { ContentFragment, FragmentRetriever } from '../../types/index.js';

export class RetrievalService implements FragmentRetriever {
  private embeddingService = getEmbeddingService();
  private initialized = false;

  async initialize(): Promise<void> {
    if (this.initialized) return;
    await ensureCollection();
    this.initialized = true;
  }

  /**
   * Top `k` chunks of `kbName` closest to `query`, best first.
   * Unknown knowledge bases throw KnowledgeBaseNotFoundError; backend
   * failures are wrapped in RetrievalError.
   */
  async similaritySearch(
    kbName: string,
    query: string,
    k: number,
    signal?: AbortSignal
  ): Promise<ContentFragment[]> {
    if (!getKnowledgeBaseByName(kbName)) {
      throw new KnowledgeBaseNotFoundError(kbName);
    }
    if (!query.trim() || k <= 0) {
      return [];
    }

    try {
      await this.initialize();
      const vector = await this.embeddingService.embedSingle(query, signal);
      if (signal?.aborted) {
        throw new OperationCancelledError('Similarity search');
      }
      const hits = await searchVectors(vector, kbName, k, config.search.defaultThreshold);

      return hits.map(hit => ({
        id: hit.chunkId,
        text: hit.content,
        sourceId: hit.documentId,
        createdAt: hit.createdAt,
        metadata: { ...hit.metadata, score: hit.score },
      }));
    } catch (error) {
      if (error instanceof OperationCancelledError) throw error;
      const message = error instanceof Error ? error.message : String(error);
      throw new RetrievalError(`Similarity search failed: ${message}`, error);
    }
  }
}

// Singleton instance
let retrievalService: RetrievalService | null = null;

export function getRetrievalService(): RetrievalService {
  if (!retrievalService) {
    retrievalService = new RetrievalService();
  }
  return retrievalService;
}
