/**
 * Qdrant vector store. One collection holds every knowledge base; points
 * carry a `kb_name` payload used as a search filter.
 */

import { QdrantClient } from '@qdrant/js-client-rest';
import { z } from 'zod';
import { config } from '../config/index.js';
import type { ChunkMetadata } from '../types/index.js';

let client: QdrantClient | null = null;

export function getQdrantClient(): QdrantClient {
  if (client) return client;

  client = new QdrantClient({
    url: config.qdrant.url,
  });

  return client;
}

export async function ensureCollection(): Promise<void> {
  const qdrant = getQdrantClient();
  const collectionName = config.qdrant.collectionName;

  const { exists } = await qdrant.collectionExists(collectionName);
  if (exists) return;

  await qdrant.createCollection(collectionName, {
    vectors: {
      size: config.qdrant.vectorSize,
      distance: 'Cosine',
    },
    optimizers_config: {
      default_segment_number: 2,
    },
    replication_factor: 1,
  });

  for (const field of ['kb_name', 'document_id']) {
    await qdrant.createPayloadIndex(collectionName, {
      field_name: field,
      field_schema: 'keyword',
    });
  }
}

export interface VectorPayload {
  kb_name: string;
  chunk_id: string;
  document_id: string;
  content: string;
  chunk_index: number;
  created_at: string;
  metadata: ChunkMetadata;
}

export interface VectorPoint {
  id: string;
  vector: number[];
  payload: VectorPayload;
}

export interface VectorHit {
  chunkId: string;
  documentId: string;
  content: string;
  score: number;
  createdAt: Date;
  metadata: ChunkMetadata;
}

const payloadSchema = z.object({
  chunk_id: z.string(),
  document_id: z.string(),
  content: z.string(),
  created_at: z.string().optional(),
  metadata: z.record(z.unknown()).optional(),
});

export async function upsertVectors(points: VectorPoint[]): Promise<void> {
  if (points.length === 0) return;
  const qdrant = getQdrantClient();

  await qdrant.upsert(config.qdrant.collectionName, {
    wait: true,
    points: points.map(p => ({
      id: p.id,
      vector: p.vector,
      payload: { ...p.payload },
    })),
  });
}

async function deleteByField(key: string, value: string): Promise<void> {
  const qdrant = getQdrantClient();

  await qdrant.delete(config.qdrant.collectionName, {
    wait: true,
    filter: {
      must: [{ key, match: { value } }],
    },
  });
}

export async function deleteVectorsByDocumentId(documentId: string): Promise<void> {
  await deleteByField('document_id', documentId);
}

export async function deleteVectorsByKnowledgeBase(kbName: string): Promise<void> {
  await deleteByField('kb_name', kbName);
}

/**
 * Nearest chunks of one knowledge base. Points whose payload does not have
 * the expected shape are skipped.
 */
export async function searchVectors(
  queryVector: number[],
  kbName: string,
  limit: number,
  threshold: number
): Promise<VectorHit[]> {
  const qdrant = getQdrantClient();

  const results = await qdrant.search(config.qdrant.collectionName, {
    vector: queryVector,
    limit,
    score_threshold: threshold,
    with_payload: true,
    with_vector: false,
    filter: {
      must: [{ key: 'kb_name', match: { value: kbName } }],
    },
  });

  const hits: VectorHit[] = [];
  for (const result of results) {
    const payload = payloadSchema.safeParse(result.payload);
    if (!payload.success) {
      console.warn(`[qdrant] skipping point ${String(result.id)} with malformed payload`);
      continue;
    }
    hits.push({
      chunkId: payload.data.chunk_id,
      documentId: payload.data.document_id,
      content: payload.data.content,
      score: result.score,
      createdAt: payload.data.created_at ? new Date(payload.data.created_at) : new Date(0),
      metadata: payload.data.metadata ?? {},
    });
  }
  return hits;
}

export async function getCollectionInfo(): Promise<{
  vectorCount: number;
  status: string;
}> {
  const qdrant = getQdrantClient();

  try {
    const info = await qdrant.getCollection(config.qdrant.collectionName);
    return {
      vectorCount: info.points_count ?? 0,
      status: info.status,
    };
  } catch (error) {
    console.error('[qdrant] collection info unavailable:', error instanceof Error ? error.message : error);
    return {
      vectorCount: 0,
      status: 'not_initialized',
    };
  }
}
