/**
 * Tests for MCP knowledge base tools
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

const service = vi.hoisted(() => ({
  createKnowledgeBase: vi.fn(),
  listKnowledgeBases: vi.fn(),
  deleteKnowledgeBase: vi.fn(),
}));

vi.mock('../../core/knowledge-base/service.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../core/knowledge-base/service.js')>();
  return {
    ...actual,
    getKnowledgeBaseService: () => service,
  };
});

import {
  createKnowledgeBase,
  createKnowledgeBaseSchema,
  deleteKnowledgeBase,
  listKnowledgeBases,
} from './knowledge-bases.js';
import { KnowledgeBaseNotFoundError, ValidationError } from '../../core/errors.js';

const KB = {
  id: 'kb-1',
  name: 'python',
  description: 'Python 基础',
  documentCount: 2,
  createdAt: new Date('2026-01-01T00:00:00.000Z'),
  updatedAt: new Date('2026-01-02T00:00:00.000Z'),
};

describe('Knowledge Base Tools', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('createKnowledgeBaseSchema', () => {
    it('should accept a name with an optional description', () => {
      expect(createKnowledgeBaseSchema.safeParse({ name: 'python' }).success).toBe(true);
      expect(createKnowledgeBaseSchema.safeParse({ name: '机器学习', description: '笔记' }).success).toBe(true);
    });

    it('should reject names with spaces', () => {
      expect(createKnowledgeBaseSchema.safeParse({ name: 'has space' }).success).toBe(false);
    });
  });

  it('should return the created knowledge base', async () => {
    service.createKnowledgeBase.mockReturnValue(KB);

    const result = await createKnowledgeBase({ name: 'python', description: 'Python 基础' });

    expect(service.createKnowledgeBase).toHaveBeenCalledWith('python', 'Python 基础');
    expect(result).toEqual({
      success: true,
      data: {
        name: 'python',
        description: 'Python 基础',
        documentCount: 2,
        createdAt: '2026-01-01T00:00:00.000Z',
        updatedAt: '2026-01-02T00:00:00.000Z',
      },
    });
  });

  it('should report a duplicate name as a failure', async () => {
    service.createKnowledgeBase.mockImplementation(() => {
      throw new ValidationError('Knowledge base "python" already exists');
    });

    const result = await createKnowledgeBase({ name: 'python' });

    expect(result).toEqual({ success: false, error: 'Knowledge base "python" already exists' });
  });

  it('should list knowledge bases with a total', async () => {
    service.listKnowledgeBases.mockReturnValue([KB]);

    const result = await listKnowledgeBases();

    expect(result.success).toBe(true);
    expect(result.data?.total).toBe(1);
    expect(result.data?.knowledgeBases[0].name).toBe('python');
  });

  it('should report an unknown knowledge base on delete', async () => {
    service.deleteKnowledgeBase.mockRejectedValue(new KnowledgeBaseNotFoundError('missing'));

    const result = await deleteKnowledgeBase({ name: 'missing' });

    expect(result).toEqual({ success: false, error: 'Knowledge base "missing" does not exist' });
  });

  it('should confirm a deletion', async () => {
    service.deleteKnowledgeBase.mockResolvedValue(undefined);

    await expect(deleteKnowledgeBase({ name: 'python' })).resolves.toEqual({
      success: true,
      data: { deleted: 'python' },
    });
  });
});
