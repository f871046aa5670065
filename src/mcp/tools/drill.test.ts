/**
 * Tests for MCP drill tools
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

const { mockNextQuestion, mockSubmitAnswer } = vi.hoisted(() => ({
  mockNextQuestion: vi.fn(),
  mockSubmitAnswer: vi.fn(),
}));

vi.mock('../../core/drill/service.js', () => ({
  getDrillService: () => ({
    nextQuestion: mockNextQuestion,
    submitAnswer: mockSubmitAnswer,
  }),
}));

import { generateQuestion, generateQuestionSchema, submitAnswer } from './drill.js';
import { drillRateLimiter } from '../../utils/security.js';
import { EmptyKnowledgeBaseError, QuestionNotFoundError } from '../../core/errors.js';

const QUESTION = {
  id: 'q-1',
  content: '为什么Python适合初学者？',
  kbName: 'python',
  sourceContext: 'Python 语法简洁。',
  sourceFragmentId: 'chunk-1',
  sourceId: 'doc-1',
  difficulty: 'medium',
  strategy: 'diverse',
  background: '入门语言',
  createdAt: new Date('2026-03-01T00:00:00.000Z'),
};

describe('Drill Tools', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    drillRateLimiter.reset();
  });

  it('should reject unknown difficulties', () => {
    expect(generateQuestionSchema.safeParse({ kb: 'python', difficulty: 'extreme' }).success).toBe(false);
    expect(generateQuestionSchema.safeParse({ kb: 'python', strategy: 'recent' }).success).toBe(true);
  });

  it('should return the question without its source context', async () => {
    mockNextQuestion.mockResolvedValue(QUESTION);

    const result = await generateQuestion({ kb: 'python', difficulty: 'medium' });

    expect(mockNextQuestion).toHaveBeenCalledWith('python', { difficulty: 'medium', strategy: undefined });
    expect(result).toEqual({
      success: true,
      data: {
        id: 'q-1',
        kbName: 'python',
        question: '为什么Python适合初学者？',
        background: '入门语言',
        difficulty: 'medium',
        strategy: 'diverse',
        createdAt: '2026-03-01T00:00:00.000Z',
      },
    });
  });

  it('should report an empty knowledge base', async () => {
    mockNextQuestion.mockRejectedValue(new EmptyKnowledgeBaseError('python'));

    const result = await generateQuestion({ kb: 'python' });

    expect(result).toEqual({ success: false, error: 'Knowledge base "python" has no indexed content' });
  });

  it('should return the grade with the record id', async () => {
    mockSubmitAnswer.mockResolvedValue({
      evaluation: {
        isCorrect: true,
        score: 8,
        feedback: '不错',
        missingPoints: [],
        strengths: ['语法'],
        referenceAnswer: '语法简洁',
        status: 'evaluated',
      },
      recordId: 'rec-1',
      evaluated: true,
    });

    const result = await submitAnswer({ questionId: 'q-1', answer: '语法简单' });

    expect(mockSubmitAnswer).toHaveBeenCalledWith('q-1', '语法简单');
    expect(result.data).toMatchObject({ score: 8, isCorrect: true, evaluated: true, recordId: 'rec-1' });
  });

  it('should hide the score of a degraded grade', async () => {
    mockSubmitAnswer.mockResolvedValue({
      evaluation: {
        isCorrect: false,
        score: 0,
        feedback: 'Grade unavailable',
        missingPoints: [],
        strengths: [],
        referenceAnswer: '',
        status: 'degraded',
      },
      recordId: 'rec-2',
      evaluated: false,
    });

    const result = await submitAnswer({ questionId: 'q-1', answer: '语法简单' });

    expect(result.data).toEqual({
      status: 'degraded',
      evaluated: false,
      feedback: 'Grade unavailable',
      missingPoints: [],
      strengths: [],
      recordId: 'rec-2',
    });
  });

  it('should report an expired question id', async () => {
    mockSubmitAnswer.mockRejectedValue(new QuestionNotFoundError('q-9'));

    const result = await submitAnswer({ questionId: 'q-9', answer: '答案' });

    expect(result).toEqual({
      success: false,
      error: 'Question q-9 was not issued by this session or has expired',
    });
  });
});
