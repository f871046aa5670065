/**
 * Knowledge base lifecycle, and the fragment catalog the drill selects from
 */

import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import {
  countChunksByKnowledgeBase,
  countQARecords,
  deleteKnowledgeBase as deleteKnowledgeBaseRow,
  getAllKnowledgeBases,
  getAskedFragmentIds,
  getDocumentsByKnowledgeBase,
  getFragmentsByKnowledgeBase,
  getInsightsByKnowledgeBase,
  getKnowledgeBaseByName,
  getQAScores,
  insertKnowledgeBase,
} from '../../storage/sqlite.js';
import { deleteVectorsByKnowledgeBase } from '../../storage/qdrant.js';
import { KnowledgeBaseNotFoundError, ValidationError } from '../errors.js';
import type {
  ContentFragment,
  FragmentCatalog,
  KnowledgeBase,
  KnowledgeBaseStats,
  MetadataIndex,
} from '../../types/index.js';

export const knowledgeBaseNameSchema = z
  .string()
  .trim()
  .min(1, 'Knowledge base name is required')
  .max(100, 'Knowledge base name must be at most 100 characters')
  .regex(/^[\p{L}\p{N}_-]+$/u, 'Knowledge base name may only contain letters, digits, "_" and "-"');

export function validateKnowledgeBaseName(name: string): string {
  const parsed = knowledgeBaseNameSchema.safeParse(name);
  if (!parsed.success) {
    throw new ValidationError(parsed.error.errors[0]?.message ?? 'Invalid knowledge base name', { name });
  }
  return parsed.data;
}

export interface KnowledgeBaseSummary {
  name: string;
  description?: string;
  documentCount: number;
  createdAt: string;
  updatedAt: string;
}

export function toKnowledgeBaseSummary(kb: KnowledgeBase): KnowledgeBaseSummary {
  return {
    name: kb.name,
    description: kb.description,
    documentCount: kb.documentCount,
    createdAt: kb.createdAt.toISOString(),
    updatedAt: kb.updatedAt.toISOString(),
  };
}

export class KnowledgeBaseService implements FragmentCatalog {
  createKnowledgeBase(name: string, description?: string): KnowledgeBase {
    const validName = validateKnowledgeBaseName(name);
    if (getKnowledgeBaseByName(validName)) {
      throw new ValidationError(`Knowledge base "${validName}" already exists`, { name: validName });
    }

    const kb = insertKnowledgeBase({ id: uuidv4(), name: validName, description: description?.trim() || undefined });
    console.error(`[knowledge-base] created "${validName}"`);
    return kb;
  }

  listKnowledgeBases(): KnowledgeBase[] {
    return getAllKnowledgeBases();
  }

  /**
   * Throws KnowledgeBaseNotFoundError
   */
  getKnowledgeBase(name: string): KnowledgeBase {
    const kb = getKnowledgeBaseByName(name);
    if (!kb) {
      throw new KnowledgeBaseNotFoundError(name);
    }
    return kb;
  }

  /**
   * Remove the knowledge base with its documents, chunks, insights, vectors
   * and history
   */
  async deleteKnowledgeBase(name: string): Promise<void> {
    const kb = this.getKnowledgeBase(name);
    await deleteVectorsByKnowledgeBase(kb.name);
    deleteKnowledgeBaseRow(kb.id);
    console.error(`[knowledge-base] deleted "${kb.name}"`);
  }

  getStats(name: string): KnowledgeBaseStats {
    const kb = this.getKnowledgeBase(name);
    const evaluated = getQAScores(kb.id).filter(row => row.evaluated);
    const correct = evaluated.filter(row => row.isCorrect).length;

    return {
      name: kb.name,
      documentCount: getDocumentsByKnowledgeBase(kb.id).filter(doc => doc.status === 'indexed').length,
      chunkCount: countChunksByKnowledgeBase(kb.id),
      questionCount: countQARecords(kb.id),
      accuracy: evaluated.length > 0 ? Math.round((correct / evaluated.length) * 1000) / 10 : 0,
    };
  }

  async listFragments(kbName: string): Promise<ContentFragment[]> {
    const kb = this.getKnowledgeBase(kbName);
    return getFragmentsByKnowledgeBase(kb.id).map(fragment => ({
      id: fragment.id,
      text: fragment.content,
      sourceId: fragment.documentId,
      createdAt: fragment.createdAt,
      metadata: fragment.metadata,
    }));
  }

  async getMetadataIndex(kbName: string): Promise<MetadataIndex> {
    const kb = this.getKnowledgeBase(kbName);
    const index: MetadataIndex = new Map();
    for (const insights of getInsightsByKnowledgeBase(kb.id)) {
      index.set(insights.fragmentId, insights);
    }
    return index;
  }

  async getAskedFragmentIds(kbName: string): Promise<Set<string>> {
    const kb = this.getKnowledgeBase(kbName);
    return getAskedFragmentIds(kb.id);
  }
}

// Singleton instance
let knowledgeBaseService: KnowledgeBaseService | null = null;

export function getKnowledgeBaseService(): KnowledgeBaseService {
  if (!knowledgeBaseService) {
    knowledgeBaseService = new KnowledgeBaseService();
  }
  return knowledgeBaseService;
}
