/**
 * Tests for MCP indexing tools - schema validation, result mapping, rate limits
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

const { mockIndexDocument, mockIndexText } = vi.hoisted(() => ({
  mockIndexDocument: vi.fn(),
  mockIndexText: vi.fn(),
}));

vi.mock('../../core/ingestion/service.js', () => ({
  getIngestionService: () => ({
    indexDocument: mockIndexDocument,
    indexText: mockIndexText,
  }),
}));

import { indexDocument, indexDocumentSchema, indexText, indexTextSchema } from './documents.js';
import { indexRateLimiter } from '../../utils/security.js';
import { KnowledgeBaseNotFoundError } from '../../core/errors.js';

describe('Document Tools', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    indexRateLimiter.reset();
  });

  describe('indexDocumentSchema', () => {
    it('should require a knowledge base and a path', () => {
      expect(indexDocumentSchema.safeParse({ kb: 'python', path: '/docs/a.md' }).success).toBe(true);
      expect(indexDocumentSchema.safeParse({ path: '/docs/a.md' }).success).toBe(false);
      expect(indexDocumentSchema.safeParse({ kb: 'python' }).success).toBe(false);
    });
  });

  describe('indexTextSchema', () => {
    it('should reject empty content and long titles', () => {
      expect(indexTextSchema.safeParse({ kb: 'python', content: '', title: 't' }).success).toBe(false);
      expect(indexTextSchema.safeParse({ kb: 'python', content: 'x', title: 't'.repeat(501) }).success).toBe(false);
    });
  });

  describe('indexDocument', () => {
    it('should pass the force flag as a reindex option', async () => {
      mockIndexDocument.mockResolvedValue({
        documentId: 'doc-1',
        filename: 'a.md',
        status: 'success',
        chunkCount: 3,
      });

      const result = await indexDocument({ kb: 'python', path: '/docs/a.md', force: true });

      expect(mockIndexDocument).toHaveBeenCalledWith('python', '/docs/a.md', { forceReindex: true });
      expect(result).toEqual({
        success: true,
        data: { documentId: 'doc-1', filename: 'a.md', status: 'success', chunkCount: 3 },
      });
    });

    it('should report skipped documents as successful', async () => {
      mockIndexDocument.mockResolvedValue({ documentId: 'doc-1', filename: 'a.md', status: 'skipped', chunkCount: 3 });

      const result = await indexDocument({ kb: 'python', path: '/docs/a.md' });

      expect(result.success).toBe(true);
      expect(result.data?.status).toBe('skipped');
    });

    it('should surface an ingestion failure', async () => {
      mockIndexDocument.mockResolvedValue({
        documentId: '',
        filename: 'a.pdf',
        status: 'failed',
        chunkCount: 0,
        error: 'Unsupported file type: a.pdf',
      });

      const result = await indexDocument({ kb: 'python', path: '/docs/a.pdf' });

      expect(result).toEqual({ success: false, error: 'Unsupported file type: a.pdf' });
    });

    it('should report an unknown knowledge base', async () => {
      mockIndexDocument.mockRejectedValue(new KnowledgeBaseNotFoundError('missing'));

      const result = await indexDocument({ kb: 'missing', path: '/docs/a.md' });

      expect(result).toEqual({ success: false, error: 'Knowledge base "missing" does not exist' });
    });

    it('should stop after the rate limit is reached', async () => {
      mockIndexDocument.mockResolvedValue({ documentId: 'doc-1', filename: 'a.md', status: 'skipped', chunkCount: 1 });

      for (let i = 0; i < 20; i++) {
        await indexDocument({ kb: 'python', path: '/docs/a.md' });
      }
      const result = await indexDocument({ kb: 'python', path: '/docs/a.md' });

      expect(result.success).toBe(false);
      expect(result.error).toContain('Rate limit exceeded');
      expect(mockIndexDocument).toHaveBeenCalledTimes(20);
    });
  });

  describe('indexText', () => {
    it('should index text under its title', async () => {
      mockIndexText.mockResolvedValue({ documentId: 'doc-2', filename: '笔记.txt', status: 'success', chunkCount: 1 });

      const result = await indexText({ kb: 'python', content: 'Python 是一门编程语言。', title: '笔记' });

      expect(mockIndexText).toHaveBeenCalledWith('python', 'Python 是一门编程语言。', '笔记');
      expect(result.data?.filename).toBe('笔记.txt');
    });
  });
});
