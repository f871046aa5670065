/**
 * Core type definitions for the knowledge drill
 */

import type { DrillConfig } from '../config/drill.js';

export type { DrillConfig } from '../config/drill.js';

// Drill enumerations
export const DIFFICULTIES = ['easy', 'medium', 'hard'] as const;
export type Difficulty = (typeof DIFFICULTIES)[number];

export const SELECTION_STRATEGIES = ['random', 'diverse', 'recent', 'comprehensive'] as const;
export type SelectionStrategy = (typeof SELECTION_STRATEGIES)[number];

// Knowledge base types
export interface KnowledgeBase {
  id: string;
  name: string;
  description?: string;
  documentCount: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface KnowledgeBaseStats {
  name: string;
  documentCount: number;
  chunkCount: number;
  questionCount: number;
  accuracy: number;
}

// Document types
export interface Document {
  id: string;
  kbId: string;
  filename: string;
  filepath: string;
  fileType: FileType;
  fileSize: number;
  mimeType: string;
  checksum: string;
  createdAt: Date;
  updatedAt: Date;
  indexedAt: Date | null;
  status: DocumentStatus;
  chunkCount: number;
  metadata: DocumentMetadata;
}

export interface DocumentMetadata {
  title?: string;
  source?: string;
  [key: string]: unknown;
}

export type FileType = 'txt' | 'md';
export type DocumentStatus = 'pending' | 'processing' | 'indexed' | 'failed';

// Chunk types
export interface Chunk {
  id: string;
  documentId: string;
  content: string;
  chunkIndex: number;
  startOffset: number;
  endOffset: number;
  tokenCount: number;
  metadata: ChunkMetadata;
}

export interface ChunkMetadata {
  sectionTitle?: string;
  headings?: string[];
  [key: string]: unknown;
}

/**
 * A retrievable unit of text with its provenance.
 * `id` identifies the chunk, `sourceId` the document it came from.
 */
export interface ContentFragment {
  id: string;
  text: string;
  sourceId: string;
  createdAt: Date;
  metadata: Record<string, unknown>;
}

/**
 * Precomputed enrichment for one fragment, built at ingestion time
 */
export interface FragmentInsights {
  fragmentId: string;
  keyConcepts: string[];
  qaPairs: QAPair[];
}

export interface QAPair {
  question: string;
  answer: string;
}

export type MetadataIndex = Map<string, FragmentInsights>;

// Question / evaluation types
export interface Question {
  id: string;
  content: string;
  kbName: string;
  /** Exact text shown to the model when the question was written */
  sourceContext: string;
  sourceFragmentId: string;
  sourceId: string;
  difficulty: Difficulty;
  strategy: SelectionStrategy;
  background?: string;
  createdAt: Date;
}

export type EvaluationStatus = 'evaluated' | 'degraded' | 'invalid_answer';

export interface EvaluationResult {
  isCorrect: boolean;
  score: number;
  feedback: string;
  missingPoints: string[];
  strengths: string[];
  referenceAnswer: string;
  status: EvaluationStatus;
}

export interface QARecord {
  id: string;
  kbName: string;
  questionId: string;
  question: string;
  sourceFragmentId: string;
  difficulty: Difficulty;
  strategy: SelectionStrategy;
  sourceContext: string;
  userAnswer: string;
  evaluation: EvaluationResult;
  evaluated: boolean;
  createdAt: Date;
}

export interface HistoryStatistics {
  kbName: string;
  total: number;
  evaluated: number;
  correct: number;
  accuracy: number;
  averageScore: number;
  scoreDistribution: Record<string, number>;
}

// Collaborator contracts consumed by the drill pipelines
export interface FragmentRetriever {
  similaritySearch(
    kbName: string,
    query: string,
    k: number,
    signal?: AbortSignal
  ): Promise<ContentFragment[]>;
}

export interface FragmentCatalog {
  /** Throws KnowledgeBaseNotFoundError for an unknown knowledge base */
  listFragments(kbName: string): Promise<ContentFragment[]>;
  getMetadataIndex(kbName: string): Promise<MetadataIndex>;
  getAskedFragmentIds(kbName: string): Promise<Set<string>>;
}

export interface CompletionRequest {
  prompt: string;
  systemPrompt?: string;
  temperature: number;
  maxTokens: number;
  signal?: AbortSignal;
}

export interface TextCompletionModel {
  complete(request: CompletionRequest): Promise<string>;
}

export interface AttemptRecord {
  question: Question;
  userAnswer: string;
  evaluation: EvaluationResult;
  timestamp: Date;
}

export interface HistoryRecorder {
  record(attempt: AttemptRecord): Promise<string>;
}

// Embedding types
export interface EmbeddingResponse {
  embeddings: number[][];
  model: string;
  usage: {
    promptTokens: number;
    totalTokens: number;
  };
}

// Parser types
export interface ParsedDocument {
  content: string;
  metadata: DocumentMetadata;
}

// Ingestion types
export interface IngestionResult {
  documentId: string;
  filename: string;
  status: 'success' | 'skipped' | 'failed';
  chunkCount: number;
  error?: string;
}

export interface IngestionOptions {
  chunkSize?: number;
  chunkOverlap?: number;
  forceReindex?: boolean;
}

// MCP Tool types
export interface ToolResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
}

// Config types
export interface Config {
  qdrant: {
    url: string;
    collectionName: string;
    vectorSize: number;
  };
  litellm: {
    apiKey: string;
    baseUrl: string;
    embeddingModel: string;
    timeout: number;
  };
  sqlite: {
    path: string;
  };
  chunking: {
    defaultSize: number;
    defaultOverlap: number;
    minChunkSize: number;
  };
  search: {
    defaultLimit: number;
    defaultThreshold: number;
  };
  llm: {
    model: string;
    extractInsights: boolean;
  };
  drill: DrillConfig;
}
