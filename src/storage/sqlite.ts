/**
 * SQLite storage for knowledge bases, documents, chunks, chunk insights and
 * the Q/A history
 */

import Database from 'better-sqlite3';
import { mkdirSync, existsSync } from 'fs';
import { dirname } from 'path';
import { z } from 'zod';
import { config } from '../config/index.js';
import { DIFFICULTIES, SELECTION_STRATEGIES } from '../types/index.js';
import type {
  ChunkMetadata,
  Document,
  DocumentMetadata,
  DocumentStatus,
  EvaluationStatus,
  FileType,
  FragmentInsights,
  KnowledgeBase,
  QAPair,
  QARecord,
} from '../types/index.js';
import { safeJsonParse } from '../utils/security.js';

let db: Database.Database | null = null;

const SCHEMA = `
CREATE TABLE IF NOT EXISTS knowledge_bases (
  id TEXT PRIMARY KEY,
  name TEXT UNIQUE NOT NULL,
  description TEXT,
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  updated_at TEXT NOT NULL DEFAULT (datetime('now'))
);

CREATE TABLE IF NOT EXISTS documents (
  id TEXT PRIMARY KEY,
  kb_id TEXT NOT NULL,
  filename TEXT NOT NULL,
  filepath TEXT NOT NULL,
  file_type TEXT NOT NULL,
  file_size INTEGER NOT NULL,
  mime_type TEXT NOT NULL,
  checksum TEXT NOT NULL,
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  updated_at TEXT NOT NULL DEFAULT (datetime('now')),
  indexed_at TEXT,
  status TEXT NOT NULL DEFAULT 'pending',
  chunk_count INTEGER NOT NULL DEFAULT 0,
  metadata TEXT NOT NULL DEFAULT '{}',
  UNIQUE (kb_id, filepath),
  FOREIGN KEY (kb_id) REFERENCES knowledge_bases(id) ON DELETE CASCADE
);

CREATE TABLE IF NOT EXISTS chunks (
  id TEXT PRIMARY KEY,
  document_id TEXT NOT NULL,
  content TEXT NOT NULL,
  chunk_index INTEGER NOT NULL,
  start_offset INTEGER NOT NULL,
  end_offset INTEGER NOT NULL,
  token_count INTEGER NOT NULL,
  metadata TEXT NOT NULL DEFAULT '{}',
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  FOREIGN KEY (document_id) REFERENCES documents(id) ON DELETE CASCADE
);

CREATE TABLE IF NOT EXISTS chunk_insights (
  chunk_id TEXT PRIMARY KEY,
  key_concepts TEXT NOT NULL DEFAULT '[]',
  qa_pairs TEXT NOT NULL DEFAULT '[]',
  FOREIGN KEY (chunk_id) REFERENCES chunks(id) ON DELETE CASCADE
);

CREATE TABLE IF NOT EXISTS qa_records (
  id TEXT PRIMARY KEY,
  kb_id TEXT NOT NULL,
  question_id TEXT NOT NULL,
  question TEXT NOT NULL,
  source_fragment_id TEXT NOT NULL,
  difficulty TEXT NOT NULL,
  strategy TEXT NOT NULL,
  source_context TEXT NOT NULL,
  user_answer TEXT NOT NULL,
  is_correct INTEGER NOT NULL,
  score REAL NOT NULL,
  feedback TEXT NOT NULL,
  missing_points TEXT NOT NULL DEFAULT '[]',
  strengths TEXT NOT NULL DEFAULT '[]',
  reference_answer TEXT NOT NULL DEFAULT '',
  status TEXT NOT NULL,
  evaluated INTEGER NOT NULL,
  created_at TEXT NOT NULL,
  FOREIGN KEY (kb_id) REFERENCES knowledge_bases(id) ON DELETE CASCADE
);

CREATE INDEX IF NOT EXISTS idx_documents_kb_id ON documents(kb_id);
CREATE INDEX IF NOT EXISTS idx_documents_status ON documents(status);
CREATE INDEX IF NOT EXISTS idx_chunks_document_id ON chunks(document_id);
CREATE INDEX IF NOT EXISTS idx_chunks_chunk_index ON chunks(document_id, chunk_index);
CREATE INDEX IF NOT EXISTS idx_qa_records_kb_created ON qa_records(kb_id, created_at);
`;

export function getDatabase(): Database.Database {
  if (db) return db;

  const dbPath = config.sqlite.path;
  const dbDir = dirname(dbPath);

  if (!existsSync(dbDir)) {
    mkdirSync(dbDir, { recursive: true });
  }

  db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  db.exec(SCHEMA);

  return db;
}

export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
  }
}

/**
 * Execute a function within a database transaction
 * Rolls back on error and re-throws
 */
export function withTransaction<T>(fn: () => T): T {
  const database = getDatabase();
  const transaction = database.transaction(fn);
  return transaction();
}

const stringList = z.array(z.string());
const qaPairList = z.array(z.object({ question: z.string(), answer: z.string() }));
const jsonObject = z.record(z.unknown());

const fileTypeSchema = z.enum(['txt', 'md']).catch('txt');
const statusSchema = z.enum(['pending', 'processing', 'indexed', 'failed']).catch('failed');
const difficultySchema = z.enum(DIFFICULTIES).catch('medium');
const strategySchema = z.enum(SELECTION_STRATEGIES).catch('random');
const evaluationStatusSchema = z.enum(['evaluated', 'degraded', 'invalid_answer']).catch('degraded');

// Knowledge base operations
interface KnowledgeBaseRow {
  id: string;
  name: string;
  description: string | null;
  created_at: string;
  updated_at: string;
  document_count: number;
}

const KB_SELECT = `
  SELECT kb.*, (
    SELECT COUNT(*) FROM documents d WHERE d.kb_id = kb.id AND d.status = 'indexed'
  ) AS document_count
  FROM knowledge_bases kb
`;

function rowToKnowledgeBase(row: KnowledgeBaseRow): KnowledgeBase {
  return {
    id: row.id,
    name: row.name,
    description: row.description ?? undefined,
    documentCount: row.document_count,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

export function insertKnowledgeBase(kb: { id: string; name: string; description?: string }): KnowledgeBase {
  const database = getDatabase();
  const now = new Date().toISOString();

  database.prepare(`
    INSERT INTO knowledge_bases (id, name, description, created_at, updated_at)
    VALUES (?, ?, ?, ?, ?)
  `).run(kb.id, kb.name, kb.description ?? null, now, now);

  return {
    id: kb.id,
    name: kb.name,
    description: kb.description,
    documentCount: 0,
    createdAt: new Date(now),
    updatedAt: new Date(now),
  };
}

export function getKnowledgeBaseByName(name: string): KnowledgeBase | null {
  const database = getDatabase();
  const row = database.prepare<[string], KnowledgeBaseRow>(`${KB_SELECT} WHERE kb.name = ?`).get(name);
  return row ? rowToKnowledgeBase(row) : null;
}

export function getAllKnowledgeBases(): KnowledgeBase[] {
  const database = getDatabase();
  const rows = database.prepare<[], KnowledgeBaseRow>(`${KB_SELECT} ORDER BY kb.created_at DESC`).all();
  return rows.map(rowToKnowledgeBase);
}

/**
 * Deletes the knowledge base; documents, chunks, insights and history go
 * with it through cascading foreign keys
 */
export function deleteKnowledgeBase(id: string): boolean {
  const database = getDatabase();
  const result = database.prepare('DELETE FROM knowledge_bases WHERE id = ?').run(id);
  return result.changes > 0;
}

export function touchKnowledgeBase(id: string): void {
  const database = getDatabase();
  database.prepare('UPDATE knowledge_bases SET updated_at = ? WHERE id = ?').run(new Date().toISOString(), id);
}

// Document operations
interface DocumentRow {
  id: string;
  kb_id: string;
  filename: string;
  filepath: string;
  file_type: string;
  file_size: number;
  mime_type: string;
  checksum: string;
  created_at: string;
  updated_at: string;
  indexed_at: string | null;
  status: string;
  chunk_count: number;
  metadata: string;
}

function rowToDocument(row: DocumentRow): Document {
  const fileType: FileType = fileTypeSchema.parse(row.file_type);
  const status: DocumentStatus = statusSchema.parse(row.status);
  const metadata: DocumentMetadata = safeJsonParse(row.metadata, jsonObject, {});
  return {
    id: row.id,
    kbId: row.kb_id,
    filename: row.filename,
    filepath: row.filepath,
    fileType,
    fileSize: row.file_size,
    mimeType: row.mime_type,
    checksum: row.checksum,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
    indexedAt: row.indexed_at ? new Date(row.indexed_at) : null,
    status,
    chunkCount: row.chunk_count,
    metadata,
  };
}

export function insertDocument(doc: Omit<Document, 'createdAt' | 'updatedAt'>): Document {
  const database = getDatabase();
  const now = new Date().toISOString();

  database.prepare(`
    INSERT INTO documents (id, kb_id, filename, filepath, file_type, file_size, mime_type, checksum, status, chunk_count, metadata, indexed_at, created_at, updated_at)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
  `).run(
    doc.id,
    doc.kbId,
    doc.filename,
    doc.filepath,
    doc.fileType,
    doc.fileSize,
    doc.mimeType,
    doc.checksum,
    doc.status,
    doc.chunkCount,
    JSON.stringify(doc.metadata),
    doc.indexedAt?.toISOString() ?? null,
    now,
    now
  );

  return {
    ...doc,
    createdAt: new Date(now),
    updatedAt: new Date(now),
  };
}

export function updateDocument(
  id: string,
  updates: Partial<Pick<Document, 'status' | 'chunkCount' | 'indexedAt' | 'metadata' | 'checksum' | 'fileSize'>>
): void {
  const database = getDatabase();
  const fields: string[] = [];
  const values: Array<string | number | null> = [];

  if (updates.status !== undefined) {
    fields.push('status = ?');
    values.push(updates.status);
  }
  if (updates.chunkCount !== undefined) {
    fields.push('chunk_count = ?');
    values.push(updates.chunkCount);
  }
  if (updates.indexedAt !== undefined) {
    fields.push('indexed_at = ?');
    values.push(updates.indexedAt?.toISOString() ?? null);
  }
  if (updates.metadata !== undefined) {
    fields.push('metadata = ?');
    values.push(JSON.stringify(updates.metadata));
  }
  if (updates.checksum !== undefined) {
    fields.push('checksum = ?');
    values.push(updates.checksum);
  }
  if (updates.fileSize !== undefined) {
    fields.push('file_size = ?');
    values.push(updates.fileSize);
  }

  if (fields.length === 0) return;

  fields.push('updated_at = ?');
  values.push(new Date().toISOString());
  values.push(id);

  database.prepare(`UPDATE documents SET ${fields.join(', ')} WHERE id = ?`).run(...values);
}

export function getDocumentById(id: string): Document | null {
  const database = getDatabase();
  const row = database.prepare<[string], DocumentRow>('SELECT * FROM documents WHERE id = ?').get(id);
  return row ? rowToDocument(row) : null;
}

export function getDocumentByPath(kbId: string, filepath: string): Document | null {
  const database = getDatabase();
  const row = database
    .prepare<[string, string], DocumentRow>('SELECT * FROM documents WHERE kb_id = ? AND filepath = ?')
    .get(kbId, filepath);
  return row ? rowToDocument(row) : null;
}

export function getDocumentsByKnowledgeBase(kbId: string): Document[] {
  const database = getDatabase();
  const rows = database
    .prepare<[string], DocumentRow>('SELECT * FROM documents WHERE kb_id = ? ORDER BY created_at DESC')
    .all(kbId);
  return rows.map(rowToDocument);
}

export function deleteDocument(id: string): boolean {
  const database = getDatabase();
  const result = database.prepare('DELETE FROM documents WHERE id = ?').run(id);
  return result.changes > 0;
}

// Chunk operations
export interface ChunkInput {
  id: string;
  documentId: string;
  content: string;
  chunkIndex: number;
  startOffset: number;
  endOffset: number;
  tokenCount: number;
  metadata: ChunkMetadata;
}

export function insertChunks(chunks: ChunkInput[]): void {
  const database = getDatabase();
  const now = new Date().toISOString();

  const stmt = database.prepare(`
    INSERT INTO chunks (id, document_id, content, chunk_index, start_offset, end_offset, token_count, metadata, created_at)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
  `);

  const insertMany = database.transaction((items: ChunkInput[]) => {
    for (const chunk of items) {
      stmt.run(
        chunk.id,
        chunk.documentId,
        chunk.content,
        chunk.chunkIndex,
        chunk.startOffset,
        chunk.endOffset,
        chunk.tokenCount,
        JSON.stringify(chunk.metadata),
        now
      );
    }
  });

  insertMany(chunks);
}

export function deleteChunksByDocumentId(documentId: string): void {
  const database = getDatabase();
  database.prepare('DELETE FROM chunks WHERE document_id = ?').run(documentId);
}

interface FragmentRow {
  id: string;
  document_id: string;
  content: string;
  metadata: string;
  created_at: string;
}

export interface StoredFragment {
  id: string;
  documentId: string;
  content: string;
  metadata: Record<string, unknown>;
  createdAt: Date;
}

/**
 * Every chunk of every indexed document in the knowledge base
 */
export function getFragmentsByKnowledgeBase(kbId: string): StoredFragment[] {
  const database = getDatabase();
  const rows = database.prepare<[string], FragmentRow>(`
    SELECT c.id, c.document_id, c.content, c.metadata, c.created_at
    FROM chunks c
    JOIN documents d ON d.id = c.document_id
    WHERE d.kb_id = ? AND d.status = 'indexed'
    ORDER BY d.created_at, c.chunk_index
  `).all(kbId);

  return rows.map(row => ({
    id: row.id,
    documentId: row.document_id,
    content: row.content,
    metadata: safeJsonParse(row.metadata, jsonObject, {}),
    createdAt: new Date(row.created_at),
  }));
}

export function countChunksByKnowledgeBase(kbId: string): number {
  const database = getDatabase();
  const row = database.prepare<[string], { count: number }>(`
    SELECT COUNT(*) AS count FROM chunks c
    JOIN documents d ON d.id = c.document_id
    WHERE d.kb_id = ? AND d.status = 'indexed'
  `).get(kbId);
  return row?.count ?? 0;
}

// Chunk insight operations
interface InsightRow {
  chunk_id: string;
  key_concepts: string;
  qa_pairs: string;
}

export function upsertInsights(insights: FragmentInsights[]): void {
  if (insights.length === 0) return;
  const database = getDatabase();

  const stmt = database.prepare(`
    INSERT INTO chunk_insights (chunk_id, key_concepts, qa_pairs) VALUES (?, ?, ?)
    ON CONFLICT(chunk_id) DO UPDATE SET key_concepts = excluded.key_concepts, qa_pairs = excluded.qa_pairs
  `);

  const upsertMany = database.transaction((items: FragmentInsights[]) => {
    for (const item of items) {
      stmt.run(item.fragmentId, JSON.stringify(item.keyConcepts), JSON.stringify(item.qaPairs));
    }
  });

  upsertMany(insights);
}

export function getInsightsByKnowledgeBase(kbId: string): FragmentInsights[] {
  const database = getDatabase();
  const rows = database.prepare<[string], InsightRow>(`
    SELECT i.chunk_id, i.key_concepts, i.qa_pairs
    FROM chunk_insights i
    JOIN chunks c ON c.id = i.chunk_id
    JOIN documents d ON d.id = c.document_id
    WHERE d.kb_id = ? AND d.status = 'indexed'
  `).all(kbId);

  return rows.map(row => {
    const qaPairs: QAPair[] = safeJsonParse(row.qa_pairs, qaPairList, []);
    return {
      fragmentId: row.chunk_id,
      keyConcepts: safeJsonParse(row.key_concepts, stringList, []),
      qaPairs,
    };
  });
}

// Q/A history operations
interface QARecordRow {
  id: string;
  kb_id: string;
  kb_name: string;
  question_id: string;
  question: string;
  source_fragment_id: string;
  difficulty: string;
  strategy: string;
  source_context: string;
  user_answer: string;
  is_correct: number;
  score: number;
  feedback: string;
  missing_points: string;
  strengths: string;
  reference_answer: string;
  status: string;
  evaluated: number;
  created_at: string;
}

function rowToQARecord(row: QARecordRow): QARecord {
  const status: EvaluationStatus = evaluationStatusSchema.parse(row.status);
  return {
    id: row.id,
    kbName: row.kb_name,
    questionId: row.question_id,
    question: row.question,
    sourceFragmentId: row.source_fragment_id,
    difficulty: difficultySchema.parse(row.difficulty),
    strategy: strategySchema.parse(row.strategy),
    sourceContext: row.source_context,
    userAnswer: row.user_answer,
    evaluation: {
      isCorrect: row.is_correct === 1,
      score: row.score,
      feedback: row.feedback,
      missingPoints: safeJsonParse(row.missing_points, stringList, []),
      strengths: safeJsonParse(row.strengths, stringList, []),
      referenceAnswer: row.reference_answer,
      status,
    },
    evaluated: row.evaluated === 1,
    createdAt: new Date(row.created_at),
  };
}

const QA_SELECT = `
  SELECT r.*, kb.name AS kb_name
  FROM qa_records r
  JOIN knowledge_bases kb ON kb.id = r.kb_id
`;

export function insertQARecord(kbId: string, record: QARecord): void {
  const database = getDatabase();
  const { evaluation } = record;

  database.prepare(`
    INSERT INTO qa_records (
      id, kb_id, question_id, question, source_fragment_id, difficulty, strategy, source_context,
      user_answer, is_correct, score, feedback, missing_points, strengths, reference_answer,
      status, evaluated, created_at
    ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
  `).run(
    record.id,
    kbId,
    record.questionId,
    record.question,
    record.sourceFragmentId,
    record.difficulty,
    record.strategy,
    record.sourceContext,
    record.userAnswer,
    evaluation.isCorrect ? 1 : 0,
    evaluation.score,
    evaluation.feedback,
    JSON.stringify(evaluation.missingPoints),
    JSON.stringify(evaluation.strengths),
    evaluation.referenceAnswer,
    evaluation.status,
    record.evaluated ? 1 : 0,
    record.createdAt.toISOString()
  );
}

export interface QARecordQuery {
  limit: number;
  offset: number;
  onlyIncorrect?: boolean;
}

function incorrectClause(onlyIncorrect?: boolean): string {
  return onlyIncorrect ? ' AND r.evaluated = 1 AND r.is_correct = 0' : '';
}

/**
 * Newest first
 */
export function getQARecords(kbId: string, query: QARecordQuery): QARecord[] {
  const database = getDatabase();
  const rows = database.prepare<[string, number, number], QARecordRow>(
    `${QA_SELECT} WHERE r.kb_id = ?${incorrectClause(query.onlyIncorrect)} ORDER BY r.created_at DESC, r.rowid DESC LIMIT ? OFFSET ?`
  ).all(kbId, query.limit, query.offset);
  return rows.map(rowToQARecord);
}

export function countQARecords(kbId: string, onlyIncorrect?: boolean): number {
  const database = getDatabase();
  const row = database.prepare<[string], { count: number }>(
    `SELECT COUNT(*) AS count FROM qa_records r WHERE r.kb_id = ?${incorrectClause(onlyIncorrect)}`
  ).get(kbId);
  return row?.count ?? 0;
}

export function getQARecordById(id: string): QARecord | null {
  const database = getDatabase();
  const row = database.prepare<[string], QARecordRow>(`${QA_SELECT} WHERE r.id = ?`).get(id);
  return row ? rowToQARecord(row) : null;
}

export interface ScoreRow {
  score: number;
  isCorrect: boolean;
  evaluated: boolean;
}

export function getQAScores(kbId: string): ScoreRow[] {
  const database = getDatabase();
  const rows = database.prepare<[string], { score: number; is_correct: number; evaluated: number }>(
    'SELECT score, is_correct, evaluated FROM qa_records WHERE kb_id = ?'
  ).all(kbId);
  return rows.map(row => ({
    score: row.score,
    isCorrect: row.is_correct === 1,
    evaluated: row.evaluated === 1,
  }));
}

export function getAskedFragmentIds(kbId: string): Set<string> {
  const database = getDatabase();
  const rows = database.prepare<[string], { source_fragment_id: string }>(
    'SELECT DISTINCT source_fragment_id FROM qa_records WHERE kb_id = ?'
  ).all(kbId);
  return new Set(rows.map(row => row.source_fragment_id));
}

export function deleteQARecordsByKnowledgeBase(kbId: string): number {
  const database = getDatabase();
  return database.prepare('DELETE FROM qa_records WHERE kb_id = ?').run(kbId).changes;
}
