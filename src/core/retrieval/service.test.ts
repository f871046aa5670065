/**
 * Tests for RetrievalService - knowledge base scoping, result mapping, error wrapping
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

const { mockEmbedSingle, mockSearchVectors, mockGetKnowledgeBase } = vi.hoisted(() => ({
  mockEmbedSingle: vi.fn(),
  mockSearchVectors: vi.fn(),
  mockGetKnowledgeBase: vi.fn(),
}));

vi.mock('../embedding/service.js', () => ({
  getEmbeddingService: () => ({
    embedSingle: mockEmbedSingle,
  }),
}));

vi.mock('../../storage/qdrant.js', () => ({
  ensureCollection: vi.fn().mockResolvedValue(undefined),
  searchVectors: mockSearchVectors,
}));

vi.mock('../../storage/sqlite.js', () => ({
  getKnowledgeBaseByName: mockGetKnowledgeBase,
}));

vi.mock('../../config/index.js', () => ({
  config: {
    search: {
      defaultLimit: 10,
      defaultThreshold: 0.5,
    },
  },
}));

import { RetrievalService } from './service.js';
import { KnowledgeBaseNotFoundError, OperationCancelledError, RetrievalError } from '../errors.js';

describe('RetrievalService', () => {
  let service: RetrievalService;

  beforeEach(() => {
    vi.clearAllMocks();
    mockGetKnowledgeBase.mockReturnValue({ id: 'kb-1', name: 'python' });
    mockEmbedSingle.mockResolvedValue([0.1, 0.2]);
    mockSearchVectors.mockResolvedValue([
      {
        chunkId: 'chunk-1',
        documentId: 'doc-1',
        content: 'Python 语法简洁。',
        score: 0.91,
        createdAt: new Date('2026-02-01T00:00:00Z'),
        metadata: { sectionTitle: '概述' },
      },
    ]);
    service = new RetrievalService();
  });

  it('should search within the knowledge base and map hits to fragments', async () => {
    const fragments = await service.similaritySearch('python', '为什么选择Python？', 5);

    expect(mockSearchVectors).toHaveBeenCalledWith([0.1, 0.2], 'python', 5, 0.5);
    expect(fragments).toEqual([
      {
        id: 'chunk-1',
        text: 'Python 语法简洁。',
        sourceId: 'doc-1',
        createdAt: new Date('2026-02-01T00:00:00Z'),
        metadata: { sectionTitle: '概述', score: 0.91 },
      },
    ]);
  });

  it('should pass the caller signal to the embedding request', async () => {
    const controller = new AbortController();

    await service.similaritySearch('python', 'query', 3, controller.signal);

    expect(mockEmbedSingle).toHaveBeenCalledWith('query', controller.signal);
  });

  it('should reject an unknown knowledge base before searching', async () => {
    mockGetKnowledgeBase.mockReturnValue(null);

    await expect(service.similaritySearch('missing', 'query', 3)).rejects.toBeInstanceOf(KnowledgeBaseNotFoundError);
    expect(mockEmbedSingle).not.toHaveBeenCalled();
  });

  it('should return nothing for a blank query', async () => {
    await expect(service.similaritySearch('python', '   ', 3)).resolves.toEqual([]);
    expect(mockSearchVectors).not.toHaveBeenCalled();
  });

  it('should wrap backend failures in RetrievalError', async () => {
    mockSearchVectors.mockRejectedValue(new Error('connection refused'));

    const error = await service.similaritySearch('python', 'query', 3).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RetrievalError);
    expect(error).toHaveProperty('message', 'Similarity search failed: connection refused');
  });

  it('should stop before searching when cancelled during embedding', async () => {
    const controller = new AbortController();
    mockEmbedSingle.mockImplementation(async () => {
      controller.abort();
      return [0.1];
    });

    await expect(service.similaritySearch('python', 'query', 3, controller.signal))
      .rejects.toBeInstanceOf(OperationCancelledError);
    expect(mockSearchVectors).not.toHaveBeenCalled();
  });
});
