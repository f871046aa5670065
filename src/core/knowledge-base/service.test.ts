/**
 * Tests for KnowledgeBaseService - naming rules, lifecycle, catalog mapping
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

const sqlite = vi.hoisted(() => ({
  countChunksByKnowledgeBase: vi.fn(),
  countQARecords: vi.fn(),
  deleteKnowledgeBase: vi.fn(),
  getAllKnowledgeBases: vi.fn(),
  getAskedFragmentIds: vi.fn(),
  getDocumentsByKnowledgeBase: vi.fn(),
  getFragmentsByKnowledgeBase: vi.fn(),
  getInsightsByKnowledgeBase: vi.fn(),
  getKnowledgeBaseByName: vi.fn(),
  getQAScores: vi.fn(),
  insertKnowledgeBase: vi.fn(),
}));

const { mockDeleteVectors } = vi.hoisted(() => ({
  mockDeleteVectors: vi.fn(),
}));

vi.mock('../../storage/sqlite.js', () => sqlite);
vi.mock('../../storage/qdrant.js', () => ({
  deleteVectorsByKnowledgeBase: mockDeleteVectors,
}));

import { KnowledgeBaseService, validateKnowledgeBaseName } from './service.js';
import { KnowledgeBaseNotFoundError, ValidationError } from '../errors.js';

const KB = {
  id: 'kb-1',
  name: 'python',
  documentCount: 1,
  createdAt: new Date('2026-01-01T00:00:00Z'),
  updatedAt: new Date('2026-01-01T00:00:00Z'),
};

describe('validateKnowledgeBaseName', () => {
  it.each(['python', '机器学习', 'ml_notes-2026'])('should accept %s', (name) => {
    expect(validateKnowledgeBaseName(name)).toBe(name);
  });

  it.each(['', 'has space', 'dots.not.allowed', 'x'.repeat(101)])('should reject "%s"', (name) => {
    expect(() => validateKnowledgeBaseName(name)).toThrow(ValidationError);
  });
});

describe('KnowledgeBaseService', () => {
  let service: KnowledgeBaseService;

  beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(console, 'error').mockImplementation(() => {});
    sqlite.getKnowledgeBaseByName.mockImplementation((name: string) => (name === 'python' ? KB : null));
    service = new KnowledgeBaseService();
  });

  it('should create a knowledge base with a generated id', () => {
    sqlite.insertKnowledgeBase.mockImplementation((kb: { id: string; name: string }) => ({ ...KB, ...kb }));

    const kb = service.createKnowledgeBase('rust', '  系统编程  ');

    expect(kb.name).toBe('rust');
    const [input] = sqlite.insertKnowledgeBase.mock.calls[0];
    expect(input.id).toMatch(/^[0-9a-f-]{36}$/);
    expect(input.description).toBe('系统编程');
  });

  it('should refuse a duplicate name', () => {
    expect(() => service.createKnowledgeBase('python')).toThrow('Knowledge base "python" already exists');
    expect(sqlite.insertKnowledgeBase).not.toHaveBeenCalled();
  });

  it('should throw KnowledgeBaseNotFoundError for unknown names', async () => {
    expect(() => service.getKnowledgeBase('missing')).toThrow(KnowledgeBaseNotFoundError);
    await expect(service.listFragments('missing')).rejects.toBeInstanceOf(KnowledgeBaseNotFoundError);
  });

  it('should delete vectors before rows', async () => {
    mockDeleteVectors.mockResolvedValue(undefined);

    await service.deleteKnowledgeBase('python');

    expect(mockDeleteVectors).toHaveBeenCalledWith('python');
    expect(sqlite.deleteKnowledgeBase).toHaveBeenCalledWith('kb-1');
  });

  it('should keep the rows when vector deletion fails', async () => {
    mockDeleteVectors.mockRejectedValue(new Error('qdrant down'));

    await expect(service.deleteKnowledgeBase('python')).rejects.toThrow('qdrant down');
    expect(sqlite.deleteKnowledgeBase).not.toHaveBeenCalled();
  });

  it('should map stored chunks to fragments', async () => {
    const createdAt = new Date('2026-02-01T00:00:00Z');
    sqlite.getFragmentsByKnowledgeBase.mockReturnValue([
      { id: 'c1', documentId: 'doc-1', content: 'text', metadata: { sectionTitle: '概述' }, createdAt },
    ]);

    await expect(service.listFragments('python')).resolves.toEqual([
      { id: 'c1', text: 'text', sourceId: 'doc-1', createdAt, metadata: { sectionTitle: '概述' } },
    ]);
  });

  it('should index insights by fragment id', async () => {
    sqlite.getInsightsByKnowledgeBase.mockReturnValue([
      { fragmentId: 'c1', keyConcepts: ['装饰器'], qaPairs: [] },
    ]);

    const index = await service.getMetadataIndex('python');

    expect(index.get('c1')?.keyConcepts).toEqual(['装饰器']);
  });

  it('should compute accuracy over evaluated answers only', () => {
    sqlite.getQAScores.mockReturnValue([
      { score: 8, isCorrect: true, evaluated: true },
      { score: 3, isCorrect: false, evaluated: true },
      { score: 9, isCorrect: true, evaluated: true },
      { score: 0, isCorrect: false, evaluated: false },
    ]);
    sqlite.getDocumentsByKnowledgeBase.mockReturnValue([{ status: 'indexed' }, { status: 'failed' }]);
    sqlite.countChunksByKnowledgeBase.mockReturnValue(12);
    sqlite.countQARecords.mockReturnValue(4);

    expect(service.getStats('python')).toEqual({
      name: 'python',
      documentCount: 1,
      chunkCount: 12,
      questionCount: 4,
      accuracy: 66.7,
    });
  });
});
