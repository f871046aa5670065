/**
 * Client-facing shapes for questions and grades. A grade that could not be
 * produced carries no score or verdict.
 */

import type { Difficulty, EvaluationResult, EvaluationStatus, Question, SelectionStrategy } from '../../types/index.js';

export interface QuestionView {
  id: string;
  kbName: string;
  question: string;
  background?: string;
  difficulty: Difficulty;
  strategy: SelectionStrategy;
  createdAt: string;
}

export interface EvaluationView {
  status: EvaluationStatus;
  evaluated: boolean;
  isCorrect?: boolean;
  score?: number;
  feedback: string;
  missingPoints: string[];
  strengths: string[];
  referenceAnswer?: string;
}

export function toQuestionView(question: Question): QuestionView {
  return {
    id: question.id,
    kbName: question.kbName,
    question: question.content,
    background: question.background,
    difficulty: question.difficulty,
    strategy: question.strategy,
    createdAt: question.createdAt.toISOString(),
  };
}

export function toEvaluationView(evaluation: EvaluationResult): EvaluationView {
  if (evaluation.status !== 'evaluated') {
    return {
      status: evaluation.status,
      evaluated: false,
      feedback: evaluation.feedback,
      missingPoints: [],
      strengths: [],
    };
  }

  return {
    status: evaluation.status,
    evaluated: true,
    isCorrect: evaluation.isCorrect,
    score: evaluation.score,
    feedback: evaluation.feedback,
    missingPoints: evaluation.missingPoints,
    strengths: evaluation.strengths,
    referenceAnswer: evaluation.referenceAnswer,
  };
}

/**
 * Plain-text rendering for the terminal
 */
export function formatEvaluation(evaluation: EvaluationResult): string {
  if (evaluation.status !== 'evaluated') {
    return evaluation.feedback;
  }

  const lines = [
    `${evaluation.isCorrect ? 'Correct' : 'Incorrect'} (score ${evaluation.score}/10)`,
    evaluation.feedback,
  ];
  if (evaluation.strengths.length > 0) {
    lines.push('', 'Strengths:', ...evaluation.strengths.map(s => `  - ${s}`));
  }
  if (evaluation.missingPoints.length > 0) {
    lines.push('', 'Missing points:', ...evaluation.missingPoints.map(p => `  - ${p}`));
  }
  if (evaluation.referenceAnswer) {
    lines.push('', `Reference answer: ${evaluation.referenceAnswer}`);
  }
  return lines.join('\n');
}
