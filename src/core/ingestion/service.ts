/**
 * Document ingestion service - parses, chunks, embeds and stores documents
 * into a knowledge base
 */

import { stat } from 'fs/promises';
import { createReadStream } from 'fs';
import { basename } from 'path';
import { createHash } from 'crypto';
import { v4 as uuidv4 } from 'uuid';

import { parseDocument, getFileType, getMimeType } from './parsers/index.js';
import { validateFilePath, documentLock } from '../../utils/security.js';
import { getChunkingService } from '../chunking/service.js';
import { getEmbeddingService } from '../embedding/service.js';
import { getLLMService } from '../llm/service.js';
import { MetadataExtractor } from '../metadata/extractor.js';
import { KnowledgeBaseNotFoundError, ValidationError } from '../errors.js';
import { config } from '../../config/index.js';
import {
  insertDocument,
  updateDocument,
  getDocumentByPath,
  getKnowledgeBaseByName,
  deleteDocument as deleteDocumentFromDb,
  insertChunks,
  deleteChunksByDocumentId,
  touchKnowledgeBase,
  upsertInsights,
  withTransaction,
  type ChunkInput,
} from '../../storage/sqlite.js';
import {
  ensureCollection,
  upsertVectors,
  deleteVectorsByDocumentId,
  type VectorPoint,
} from '../../storage/qdrant.js';
import type {
  Document,
  DocumentMetadata,
  FileType,
  FragmentInsights,
  IngestionOptions,
  IngestionResult,
  KnowledgeBase,
} from '../../types/index.js';

type ExistingCheck =
  | { type: 'unchanged'; documentId: string; chunkCount: number }
  | { type: 'reindex'; existingId: string }
  | { type: 'new' };

export class IngestionService {
  private chunkingService = getChunkingService();
  private embeddingService = getEmbeddingService();
  private extractor: MetadataExtractor | null;
  private initialized = false;

  constructor(extractor?: MetadataExtractor | null) {
    if (extractor !== undefined) {
      this.extractor = extractor;
    } else {
      this.extractor = config.llm.extractInsights ? new MetadataExtractor({ model: getLLMService() }) : null;
    }
  }

  /**
   * Initialize storage backends
   */
  async initialize(): Promise<void> {
    if (this.initialized) return;
    await ensureCollection();
    this.initialized = true;
  }

  /**
   * Index a .txt or .md file into `kbName`. An unchanged file that is
   * already indexed is skipped unless `forceReindex` is set; a changed file
   * replaces its previous version.
   *
   * Throws KnowledgeBaseNotFoundError; every other failure is reported in
   * the result.
   */
  async indexDocument(
    kbName: string,
    filepath: string,
    options: IngestionOptions = {},
    signal?: AbortSignal
  ): Promise<IngestionResult> {
    const kb = this.requireKnowledgeBase(kbName);
    await this.initialize();

    let validatedPath: string;
    try {
      validatedPath = validateFilePath(filepath);
    } catch (error) {
      return failedResult(basename(filepath), error);
    }
    const filename = basename(validatedPath);

    return documentLock.run(`${kb.id}:${validatedPath}`, async () => {
      try {
        const fileType = getFileType(validatedPath);
        if (!fileType) {
          throw new ValidationError(`Unsupported file type: ${filename}`);
        }

        const fileStat = await stat(validatedPath);
        if (!fileStat.isFile()) {
          throw new ValidationError(`Not a file: ${filename}`);
        }

        const checksum = await this.computeChecksum(validatedPath);

        const check = withTransaction((): ExistingCheck => {
          const existing = getDocumentByPath(kb.id, validatedPath);
          if (!existing) {
            return { type: 'new' };
          }
          if (!options.forceReindex && existing.checksum === checksum && existing.status === 'indexed') {
            return { type: 'unchanged', documentId: existing.id, chunkCount: existing.chunkCount };
          }
          return { type: 'reindex', existingId: existing.id };
        });

        if (check.type === 'unchanged') {
          return {
            documentId: check.documentId,
            filename,
            status: 'skipped',
            chunkCount: check.chunkCount,
          };
        }

        if (check.type === 'reindex') {
          await this.deleteDocument(check.existingId);
        }

        const documentId = uuidv4();
        insertDocument(this.newDocument(kb, documentId, {
          filename,
          filepath: validatedPath,
          fileType,
          fileSize: fileStat.size,
          checksum,
          metadata: {},
        }));

        try {
          const parsed = await parseDocument(validatedPath);
          updateDocument(documentId, { metadata: parsed.metadata });
          const chunkCount = await this.indexContent(kb, documentId, parsed.content, options, signal);

          return { documentId, filename, status: 'success', chunkCount };
        } catch (error) {
          updateDocument(documentId, {
            status: 'failed',
            metadata: { error: error instanceof Error ? error.message : String(error) },
          });
          throw error;
        }
      } catch (error) {
        return failedResult(filename, error);
      }
    });
  }

  /**
   * Index raw text without a file behind it
   */
  async indexText(
    kbName: string,
    content: string,
    title: string,
    signal?: AbortSignal
  ): Promise<IngestionResult> {
    const kb = this.requireKnowledgeBase(kbName);
    await this.initialize();

    const documentId = uuidv4();
    const filename = `${title}.txt`;

    if (content.trim().length === 0) {
      return failedResult(filename, new ValidationError('Content cannot be empty'));
    }

    const metadata: DocumentMetadata = { title, source: 'text' };
    insertDocument(this.newDocument(kb, documentId, {
      filename,
      filepath: `memory://${documentId}`,
      fileType: 'txt',
      fileSize: Buffer.byteLength(content, 'utf8'),
      checksum: createHash('sha256').update(content).digest('hex'),
      metadata,
    }));

    try {
      const chunkCount = await this.indexContent(kb, documentId, content, {}, signal);
      return { documentId, filename, status: 'success', chunkCount };
    } catch (error) {
      updateDocument(documentId, {
        status: 'failed',
        metadata: { ...metadata, error: error instanceof Error ? error.message : String(error) },
      });
      return failedResult(filename, error);
    }
  }

  /**
   * Delete a document with its chunks, insights and vectors
   */
  async deleteDocument(documentId: string): Promise<boolean> {
    await this.initialize();
    await deleteVectorsByDocumentId(documentId);
    deleteChunksByDocumentId(documentId);
    return deleteDocumentFromDb(documentId);
  }

  /**
   * Chunk, embed and store `content` for an existing document record, then
   * mark it indexed. Returns the chunk count.
   */
  private async indexContent(
    kb: KnowledgeBase,
    documentId: string,
    content: string,
    options: IngestionOptions,
    signal?: AbortSignal
  ): Promise<number> {
    const chunks = this.chunkingService.chunk(content, {
      chunkSize: options.chunkSize,
      chunkOverlap: options.chunkOverlap,
    });

    if (chunks.length === 0) {
      throw new ValidationError('No content to index');
    }

    const createdAt = new Date();
    const chunkData: ChunkInput[] = chunks.map((chunk, index) => ({
      id: uuidv4(),
      documentId,
      content: chunk.content,
      chunkIndex: index,
      startOffset: chunk.startOffset,
      endOffset: chunk.endOffset,
      tokenCount: chunk.tokenCount,
      metadata: chunk.metadata,
    }));

    const { embeddings } = await this.embeddingService.embed(chunkData.map(c => c.content), signal);
    if (embeddings.length !== chunkData.length) {
      throw new Error(`Embedding count mismatch: expected ${chunkData.length}, got ${embeddings.length}`);
    }

    const expectedDimension = config.qdrant.vectorSize;
    const points: VectorPoint[] = chunkData.map((chunk, index) => {
      const vector = embeddings[index];
      if (!vector) {
        throw new Error(`Missing embedding for chunk index ${index}`);
      }
      if (vector.length !== expectedDimension) {
        throw new Error(
          `Embedding dimension mismatch at index ${index}: expected ${expectedDimension}, got ${vector.length}`
        );
      }
      return {
        id: chunk.id,
        vector,
        payload: {
          kb_name: kb.name,
          chunk_id: chunk.id,
          document_id: documentId,
          content: chunk.content,
          chunk_index: chunk.chunkIndex,
          created_at: createdAt.toISOString(),
          metadata: chunk.metadata,
        },
      };
    });

    insertChunks(chunkData);
    await upsertVectors(points);

    if (this.extractor) {
      upsertInsights(await this.extractInsights(chunkData, signal));
    }

    updateDocument(documentId, {
      status: 'indexed',
      chunkCount: chunkData.length,
      indexedAt: new Date(),
    });
    touchKnowledgeBase(kb.id);

    console.error(`[ingestion] indexed ${chunkData.length} chunks into "${kb.name}"`);
    return chunkData.length;
  }

  /**
   * One model call per chunk, in order
   */
  private async extractInsights(chunks: ChunkInput[], signal?: AbortSignal): Promise<FragmentInsights[]> {
    const insights: FragmentInsights[] = [];
    if (!this.extractor) return insights;

    for (const chunk of chunks) {
      insights.push(await this.extractor.extract(chunk.id, chunk.content, signal));
    }
    return insights;
  }

  private requireKnowledgeBase(kbName: string): KnowledgeBase {
    const kb = getKnowledgeBaseByName(kbName);
    if (!kb) {
      throw new KnowledgeBaseNotFoundError(kbName);
    }
    return kb;
  }

  private newDocument(
    kb: KnowledgeBase,
    id: string,
    fields: {
      filename: string;
      filepath: string;
      fileType: FileType;
      fileSize: number;
      checksum: string;
      metadata: DocumentMetadata;
    }
  ): Omit<Document, 'createdAt' | 'updatedAt'> {
    return {
      id,
      kbId: kb.id,
      ...fields,
      mimeType: getMimeType(fields.fileType),
      status: 'processing',
      chunkCount: 0,
      indexedAt: null,
    };
  }

  /**
   * Compute file checksum using streaming to avoid loading entire file into memory
   */
  private computeChecksum(filepath: string): Promise<string> {
    return new Promise((resolve, reject) => {
      const hash = createHash('sha256');
      const stream = createReadStream(filepath);

      stream.on('data', (chunk) => hash.update(chunk));
      stream.on('end', () => resolve(hash.digest('hex')));
      stream.on('error', (err) => reject(err));
    });
  }
}

function failedResult(filename: string, error: unknown): IngestionResult {
  return {
    documentId: '',
    filename,
    status: 'failed',
    chunkCount: 0,
    error: error instanceof Error ? error.message : String(error),
  };
}

// Singleton instance
let ingestionService: IngestionService | null = null;

export function getIngestionService(): IngestionService {
  if (!ingestionService) {
    ingestionService = new IngestionService();
  }
  return ingestionService;
}
