/**
 * Tests for CLI argument parsing and the interactive drill loop
 */

import { describe, it, expect, vi } from 'vitest';
import { parseArgs, runDrill, type DrillIO } from './index.js';
import { EmptyKnowledgeBaseError, QuestionGenerationError } from './core/errors.js';
import type { EvaluationResult, Question } from './types/index.js';

function question(id: string): Question {
  return {
    id,
    content: `问题 ${id}`,
    kbName: 'python',
    sourceContext: '上下文',
    sourceFragmentId: `chunk-${id}`,
    sourceId: 'doc-1',
    difficulty: 'medium',
    strategy: 'diverse',
    createdAt: new Date('2026-03-01T00:00:00.000Z'),
  };
}

const GRADED: EvaluationResult = {
  isCorrect: true,
  score: 8,
  feedback: '很好',
  missingPoints: [],
  strengths: [],
  referenceAnswer: '',
  status: 'evaluated',
};

function scriptedIO(answers: string[]): DrillIO & { lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    ask: vi.fn(async () => answers.shift() ?? ':q'),
    print: (line: string) => {
      lines.push(line);
    },
  };
}

describe('parseArgs', () => {
  it('should split positionals from flags', () => {
    const parsed = parseArgs(['python', '--difficulty', 'hard', 'notes', '--force']);

    expect(parsed.positional).toEqual(['python', 'notes']);
    expect(parsed.flags.get('difficulty')).toBe('hard');
    expect(parsed.flags.get('force')).toBe(true);
  });

  it('should treat a flag followed by another flag as a switch', () => {
    const parsed = parseArgs(['--incorrect', '--page', '2']);

    expect(parsed.flags.get('incorrect')).toBe(true);
    expect(parsed.flags.get('page')).toBe('2');
  });
});

describe('runDrill', () => {
  it('should ask, grade and count correct answers', async () => {
    const drill = {
      nextQuestion: vi.fn()
        .mockResolvedValueOnce(question('1'))
        .mockResolvedValueOnce(question('2')),
      submitAnswer: vi.fn().mockResolvedValue({ evaluation: GRADED, recordId: 'rec-1', evaluated: true }),
    };
    const io = scriptedIO(['答案一', '']);

    const summary = await runDrill(drill, 'python', { difficulty: 'hard', limit: 2 }, io);

    expect(summary).toEqual({ asked: 2, answered: 1, correct: 1 });
    expect(drill.nextQuestion).toHaveBeenCalledWith('python', { difficulty: 'hard', strategy: undefined });
    expect(drill.submitAnswer).toHaveBeenCalledTimes(1);
    expect(drill.submitAnswer).toHaveBeenCalledWith(question('1'), '答案一');
    expect(io.lines).toContain('Q1 [medium] 问题 1');
    expect(io.lines).toContain('Correct (score 8/10)\n很好');
    expect(io.lines).toContain('Skipped.');
  });

  it('should stop on the quit command without grading', async () => {
    const drill = {
      nextQuestion: vi.fn().mockResolvedValue(question('1')),
      submitAnswer: vi.fn(),
    };

    const summary = await runDrill(drill, 'python', {}, scriptedIO([':q']));

    expect(summary).toEqual({ asked: 1, answered: 0, correct: 0 });
    expect(drill.submitAnswer).not.toHaveBeenCalled();
  });

  it('should not count a degraded grade as correct', async () => {
    const drill = {
      nextQuestion: vi.fn().mockResolvedValue(question('1')),
      submitAnswer: vi.fn().mockResolvedValue({
        evaluation: { ...GRADED, isCorrect: false, score: 0, status: 'degraded', feedback: 'Grade unavailable' },
        recordId: 'rec-1',
        evaluated: false,
      }),
    };
    const io = scriptedIO(['答案']);

    const summary = await runDrill(drill, 'python', { limit: 1 }, io);

    expect(summary).toEqual({ asked: 1, answered: 1, correct: 0 });
    expect(io.lines).toContain('Grade unavailable');
  });

  it('should offer a retry after a generation failure', async () => {
    const failure = new QuestionGenerationError('python', 3, null, ['empty question']);
    const drill = {
      nextQuestion: vi.fn()
        .mockRejectedValueOnce(failure)
        .mockResolvedValueOnce(question('2')),
      submitAnswer: vi.fn(),
    };
    const io = scriptedIO(['', ':q']);

    const summary = await runDrill(drill, 'python', {}, io);

    expect(io.lines[0]).toBe(failure.message);
    expect(drill.nextQuestion).toHaveBeenCalledTimes(2);
    expect(summary.asked).toBe(1);
  });

  it('should end the session when the retry is declined', async () => {
    const drill = {
      nextQuestion: vi.fn().mockRejectedValue(new QuestionGenerationError('python', 3, null, [])),
      submitAnswer: vi.fn(),
    };

    const summary = await runDrill(drill, 'python', {}, scriptedIO(['n']));

    expect(summary).toEqual({ asked: 0, answered: 0, correct: 0 });
    expect(drill.nextQuestion).toHaveBeenCalledTimes(1);
  });

  it('should propagate an empty knowledge base', async () => {
    const drill = {
      nextQuestion: vi.fn().mockRejectedValue(new EmptyKnowledgeBaseError('python')),
      submitAnswer: vi.fn(),
    };

    await expect(runDrill(drill, 'python', {}, scriptedIO([]))).rejects.toBeInstanceOf(EmptyKnowledgeBaseError);
  });
});
