/**
 * Tests for SQLite storage - schema, row mapping, history queries
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

const {
  mockPrepare,
  mockExec,
  mockPragma,
  mockClose,
  mockTransaction,
  mockRun,
  mockGet,
  mockAll,
  MockDatabase,
} = vi.hoisted(() => {
  const mockRun = vi.fn().mockReturnValue({ changes: 1 });
  const mockGet = vi.fn();
  const mockAll = vi.fn().mockReturnValue([]);

  const mockPrepare = vi.fn().mockReturnValue({
    run: mockRun,
    get: mockGet,
    all: mockAll,
  });
  const mockExec = vi.fn();
  const mockPragma = vi.fn();
  const mockClose = vi.fn();
  const mockTransaction = vi.fn((fn) => fn);

  function MockDatabase() {
    return {
      prepare: mockPrepare,
      exec: mockExec,
      pragma: mockPragma,
      close: mockClose,
      transaction: mockTransaction,
    };
  }

  return {
    mockPrepare,
    mockExec,
    mockPragma,
    mockClose,
    mockTransaction,
    mockRun,
    mockGet,
    mockAll,
    MockDatabase,
  };
});

vi.mock('better-sqlite3', () => ({
  default: MockDatabase,
}));

vi.mock('fs', () => ({
  existsSync: vi.fn().mockReturnValue(true),
  mkdirSync: vi.fn(),
}));

vi.mock('../config/index.js', () => ({
  config: {
    sqlite: {
      path: '/tmp/test.db',
    },
  },
}));

import {
  getDatabase,
  closeDatabase,
  insertKnowledgeBase,
  getKnowledgeBaseByName,
  getDocumentById,
  updateDocument,
  insertChunks,
  getFragmentsByKnowledgeBase,
  getInsightsByKnowledgeBase,
  insertQARecord,
  getQARecords,
  getAskedFragmentIds,
  getQAScores,
} from './sqlite.js';
import type { QARecord } from '../types/index.js';

const RECORD: QARecord = {
  id: 'rec-1',
  kbName: 'python',
  questionId: 'q-1',
  question: '为什么Python适合初学者？',
  sourceFragmentId: 'chunk-1',
  difficulty: 'medium',
  strategy: 'random',
  sourceContext: 'Python 语法简洁。',
  userAnswer: '语法简单',
  evaluation: {
    isCorrect: true,
    score: 7.5,
    feedback: '不错',
    missingPoints: ['社区活跃'],
    strengths: ['语法'],
    referenceAnswer: '语法简洁、库丰富',
    status: 'evaluated',
  },
  evaluated: true,
  createdAt: new Date('2026-03-01T08:00:00.000Z'),
};

describe('SQLite Storage', () => {
  beforeEach(() => {
    mockRun.mockReturnValue({ changes: 1 });
    mockGet.mockReturnValue(undefined);
    mockAll.mockReturnValue([]);
    mockTransaction.mockImplementation((fn) => fn);
    closeDatabase();
  });

  afterEach(() => {
    vi.clearAllMocks();
    closeDatabase();
  });

  describe('getDatabase', () => {
    it('should enable WAL mode and foreign keys', () => {
      getDatabase();

      expect(mockPragma).toHaveBeenCalledWith('journal_mode = WAL');
      expect(mockPragma).toHaveBeenCalledWith('foreign_keys = ON');
    });

    it('should create every table', () => {
      getDatabase();

      const schema = mockExec.mock.calls[0][0];
      for (const table of ['knowledge_bases', 'documents', 'chunks', 'chunk_insights', 'qa_records']) {
        expect(schema).toContain(`CREATE TABLE IF NOT EXISTS ${table}`);
      }
    });

    it('should reuse the open connection', () => {
      expect(getDatabase()).toBe(getDatabase());
    });
  });

  describe('knowledge bases', () => {
    it('should insert with a null description when none is given', () => {
      const kb = insertKnowledgeBase({ id: 'kb-1', name: 'python' });

      const args = mockRun.mock.calls[0];
      expect(args.slice(0, 3)).toEqual(['kb-1', 'python', null]);
      expect(kb.documentCount).toBe(0);
    });

    it('should map a row with its indexed document count', () => {
      mockGet.mockReturnValue({
        id: 'kb-1',
        name: 'python',
        description: null,
        created_at: '2026-01-01T00:00:00.000Z',
        updated_at: '2026-01-02T00:00:00.000Z',
        document_count: 3,
      });

      expect(getKnowledgeBaseByName('python')).toEqual({
        id: 'kb-1',
        name: 'python',
        description: undefined,
        documentCount: 3,
        createdAt: new Date('2026-01-01T00:00:00.000Z'),
        updatedAt: new Date('2026-01-02T00:00:00.000Z'),
      });
    });

    it('should return null for an unknown name', () => {
      expect(getKnowledgeBaseByName('missing')).toBeNull();
    });
  });

  describe('documents', () => {
    it('should fall back for unknown enum values and malformed metadata', () => {
      mockGet.mockReturnValue({
        id: 'doc-1',
        kb_id: 'kb-1',
        filename: 'a.md',
        filepath: '/docs/a.md',
        file_type: 'pdf',
        file_size: 10,
        mime_type: 'text/markdown',
        checksum: 'abc',
        created_at: '2026-01-01T00:00:00.000Z',
        updated_at: '2026-01-01T00:00:00.000Z',
        indexed_at: null,
        status: 'weird',
        chunk_count: 2,
        metadata: '{not json',
      });

      const doc = getDocumentById('doc-1');

      expect(doc?.fileType).toBe('txt');
      expect(doc?.status).toBe('failed');
      expect(doc?.metadata).toEqual({});
      expect(doc?.indexedAt).toBeNull();
    });

    it('should skip the update when nothing changes', () => {
      updateDocument('doc-1', {});

      expect(mockPrepare).not.toHaveBeenCalled();
    });

    it('should write only the changed columns', () => {
      updateDocument('doc-1', { status: 'indexed', chunkCount: 4 });

      const sql = mockPrepare.mock.calls[0][0];
      expect(sql).toContain('status = ?, chunk_count = ?, updated_at = ?');
      const args = mockRun.mock.calls[0];
      expect(args[0]).toBe('indexed');
      expect(args[1]).toBe(4);
      expect(args[3]).toBe('doc-1');
    });
  });

  describe('chunks', () => {
    it('should insert chunks inside a transaction', () => {
      insertChunks([
        { id: 'c1', documentId: 'doc-1', content: 'a', chunkIndex: 0, startOffset: 0, endOffset: 1, tokenCount: 1, metadata: {} },
        { id: 'c2', documentId: 'doc-1', content: 'b', chunkIndex: 1, startOffset: 1, endOffset: 2, tokenCount: 1, metadata: { sectionTitle: 'x' } },
      ]);

      expect(mockTransaction).toHaveBeenCalledTimes(1);
      expect(mockRun).toHaveBeenCalledTimes(2);
      expect(mockRun.mock.calls[1][7]).toBe('{"sectionTitle":"x"}');
    });

    it('should map fragments of indexed documents', () => {
      mockAll.mockReturnValue([
        { id: 'c1', document_id: 'doc-1', content: 'text', metadata: '{"sectionTitle":"概述"}', created_at: '2026-02-01T00:00:00.000Z' },
      ]);

      expect(getFragmentsByKnowledgeBase('kb-1')).toEqual([
        {
          id: 'c1',
          documentId: 'doc-1',
          content: 'text',
          metadata: { sectionTitle: '概述' },
          createdAt: new Date('2026-02-01T00:00:00.000Z'),
        },
      ]);
    });

    it('should read insights and drop malformed lists', () => {
      mockAll.mockReturnValue([
        { chunk_id: 'c1', key_concepts: '["装饰器"]', qa_pairs: '[{"question":"q?","answer":"a"}]' },
        { chunk_id: 'c2', key_concepts: '[1, 2]', qa_pairs: 'oops' },
      ]);

      expect(getInsightsByKnowledgeBase('kb-1')).toEqual([
        { fragmentId: 'c1', keyConcepts: ['装饰器'], qaPairs: [{ question: 'q?', answer: 'a' }] },
        { fragmentId: 'c2', keyConcepts: [], qaPairs: [] },
      ]);
    });
  });

  describe('Q/A records', () => {
    it('should serialize the evaluation', () => {
      insertQARecord('kb-1', RECORD);

      expect(mockRun.mock.calls[0]).toEqual([
        'rec-1',
        'kb-1',
        'q-1',
        '为什么Python适合初学者？',
        'chunk-1',
        'medium',
        'random',
        'Python 语法简洁。',
        '语法简单',
        1,
        7.5,
        '不错',
        '["社区活跃"]',
        '["语法"]',
        '语法简洁、库丰富',
        'evaluated',
        1,
        '2026-03-01T08:00:00.000Z',
      ]);
    });

    it('should map rows back to records', () => {
      mockAll.mockReturnValue([
        {
          id: 'rec-1',
          kb_id: 'kb-1',
          kb_name: 'python',
          question_id: 'q-1',
          question: '为什么Python适合初学者？',
          source_fragment_id: 'chunk-1',
          difficulty: 'medium',
          strategy: 'random',
          source_context: 'Python 语法简洁。',
          user_answer: '语法简单',
          is_correct: 1,
          score: 7.5,
          feedback: '不错',
          missing_points: '["社区活跃"]',
          strengths: '["语法"]',
          reference_answer: '语法简洁、库丰富',
          status: 'evaluated',
          evaluated: 1,
          created_at: '2026-03-01T08:00:00.000Z',
        },
      ]);

      expect(getQARecords('kb-1', { limit: 10, offset: 0 })).toEqual([RECORD]);
      expect(mockAll).toHaveBeenCalledWith('kb-1', 10, 0);
    });

    it('should filter to evaluated incorrect answers on request', () => {
      getQARecords('kb-1', { limit: 5, offset: 5, onlyIncorrect: true });

      expect(mockPrepare.mock.calls.at(-1)?.[0]).toContain('AND r.evaluated = 1 AND r.is_correct = 0');
    });

    it('should collect asked fragment ids', () => {
      mockAll.mockReturnValue([{ source_fragment_id: 'c1' }, { source_fragment_id: 'c2' }]);

      expect(getAskedFragmentIds('kb-1')).toEqual(new Set(['c1', 'c2']));
    });

    it('should convert score flags to booleans', () => {
      mockAll.mockReturnValue([{ score: 4, is_correct: 0, evaluated: 1 }]);

      expect(getQAScores('kb-1')).toEqual([{ score: 4, isCorrect: false, evaluated: true }]);
    });
  });
});
