/**
 * EvaluationPipeline - retrieve context, grade with the model, parse, retry,
 * and fall back to a degraded result instead of failing
 */

import { sanitizeDetailed } from '../llm/sanitizer.js';
import { buildGradingContext } from './context.js';
import { parseEvaluation, type ParsedEvaluation } from './parser.js';
import { validateAnswer } from './answer.js';
import { buildEvaluationPrompt, EVALUATION_SYSTEM_PROMPT } from './prompts.js';
import { KnowledgeBaseNotFoundError, OperationCancelledError } from '../errors.js';
import {
  retryBounded,
  type AttemptFailure,
  type AttemptOutcome,
  type BoundedRetryResult,
} from '../../utils/retry.js';
import { withDeadline } from '../../utils/timeout.js';
import type { DrillConfig } from '../../config/drill.js';
import type {
  EvaluationResult,
  FragmentRetriever,
  Question,
  TextCompletionModel,
} from '../../types/index.js';

const OPERATION = 'Answer evaluation';

export const DEGRADED_FEEDBACK =
  'Grade unavailable: the answer could not be evaluated automatically and was recorded as unevaluated. Please try again later.';

export const INVALID_ANSWER_FEEDBACK =
  'No gradable answer was given. Write down what you know about the question to receive a score.';

export interface EvaluationPipelineDeps {
  retriever: FragmentRetriever;
  model: TextCompletionModel;
  config: DrillConfig;
}

export interface EvaluateOptions {
  signal?: AbortSignal;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Errors that end the call instead of consuming the retry budget */
function isFatal(error: unknown): boolean {
  return error instanceof OperationCancelledError || error instanceof KnowledgeBaseNotFoundError;
}

export function degradedResult(): EvaluationResult {
  return {
    isCorrect: false,
    score: 0,
    feedback: DEGRADED_FEEDBACK,
    missingPoints: [],
    strengths: [],
    referenceAnswer: '',
    status: 'degraded',
  };
}

export class EvaluationPipeline {
  private readonly retriever: FragmentRetriever;
  private readonly model: TextCompletionModel;
  private readonly config: DrillConfig;

  constructor(deps: EvaluationPipelineDeps) {
    this.retriever = deps.retriever;
    this.model = deps.model;
    this.config = deps.config;
  }

  /**
   * Grade `userAnswer`. Resolves with a result for any known knowledge base;
   * rejects only with KnowledgeBaseNotFoundError or, on cancellation,
   * OperationCancelledError.
   */
  async evaluate(
    question: Question,
    userAnswer: string,
    kbName: string = question.kbName,
    options: EvaluateOptions = {}
  ): Promise<EvaluationResult> {
    const { signal } = options;
    if (signal?.aborted) {
      throw new OperationCancelledError(OPERATION);
    }

    const answerIssues = validateAnswer(userAnswer);
    if (answerIssues.length > 0) {
      return {
        isCorrect: false,
        score: 0,
        feedback: INVALID_ANSWER_FEEDBACK,
        missingPoints: [],
        strengths: [],
        referenceAnswer: '',
        status: 'invalid_answer',
      };
    }

    // Retrieved once; later attempts reuse it
    let context: string | undefined;

    const attempt = async (n: number, previous: AttemptFailure | undefined): Promise<AttemptOutcome<ParsedEvaluation>> => {
      let gradingContext = context;
      if (gradingContext === undefined) {
        try {
          gradingContext = await this.retrieveContext(question, kbName, signal);
        } catch (error) {
          if (isFatal(error)) throw error;
          return { ok: false, reason: `context retrieval failed: ${describeError(error)}`, error };
        }
        context = gradingContext;
      }
      return this.grade(question, userAnswer, gradingContext, n, previous, signal);
    };

    let outcome: BoundedRetryResult<ParsedEvaluation>;
    try {
      outcome = await retryBounded(attempt, {
        operation: OPERATION,
        maxAttempts: this.config.maxRetries,
        delayMs: this.config.retryDelayMs,
        signal,
        onFailure: (n, failure) => {
          console.warn(`[evaluation] attempt ${n}/${this.config.maxRetries} for question ${question.id} failed: ${failure.reason}`);
        },
      });
    } catch (error) {
      if (isFatal(error)) throw error;
      console.error(`[evaluation] unexpected failure for question ${question.id}:`, error);
      return degradedResult();
    }

    if (signal?.aborted) {
      throw new OperationCancelledError(OPERATION);
    }

    if (!outcome.ok) {
      console.warn(`[evaluation] giving up after ${outcome.attempts} attempt(s); recording question ${question.id} as unevaluated`);
      return degradedResult();
    }

    return this.toResult(outcome.value);
  }

  private async retrieveContext(question: Question, kbName: string, signal: AbortSignal | undefined): Promise<string> {
    const retrieved = await withDeadline(
      `${OPERATION} retrieval`,
      this.config.retrievalTimeoutMs,
      (callSignal) => this.retriever.similaritySearch(kbName, question.content, this.config.evaluationTopK, callSignal),
      signal
    );

    return buildGradingContext({
      sourceContext: question.sourceContext,
      sourceFragmentId: question.sourceFragmentId,
      retrieved,
      maxLength: this.config.maxContextLength,
    }).text;
  }

  private async grade(
    question: Question,
    userAnswer: string,
    context: string,
    attempt: number,
    previous: AttemptFailure | undefined,
    signal: AbortSignal | undefined
  ): Promise<AttemptOutcome<ParsedEvaluation>> {
    const prompt = buildEvaluationPrompt({
      question: question.content,
      userAnswer: userAnswer.trim(),
      context,
      correctThreshold: this.config.correctThreshold,
      previousIssue: previous?.raw !== undefined ? previous.reason : undefined,
    });

    let raw: string;
    try {
      raw = await withDeadline(
        `${OPERATION} model call`,
        this.config.modelTimeoutMs,
        (callSignal) => this.model.complete({
          prompt,
          systemPrompt: EVALUATION_SYSTEM_PROMPT,
          temperature: this.config.evaluationTemperature,
          maxTokens: this.config.evaluationMaxTokens,
          signal: callSignal,
        }),
        signal
      );
    } catch (error) {
      if (isFatal(error)) throw error;
      return { ok: false, reason: describeError(error), error };
    }

    const sanitized = sanitizeDetailed(raw);
    if (sanitized.truncated) {
      console.warn(`[evaluation] unterminated reasoning block removed from model output (attempt ${attempt})`);
    }

    const parsed = parseEvaluation(sanitized.text);
    if (!parsed.ok) {
      return { ok: false, reason: parsed.error.message, error: parsed.error, raw };
    }
    return { ok: true, value: parsed.value };
  }

  private toResult(parsed: ParsedEvaluation): EvaluationResult {
    const isCorrect = parsed.score >= this.config.correctThreshold;
    if (parsed.verdict !== isCorrect) {
      console.warn(`[evaluation] verdict "${parsed.verdict ? 'correct' : 'incorrect'}" disagrees with score ${parsed.score}; using the score`);
    }

    return {
      isCorrect,
      score: parsed.score,
      feedback: parsed.feedback,
      missingPoints: parsed.missingPoints,
      strengths: parsed.strengths,
      referenceAnswer: parsed.referenceAnswer,
      status: 'evaluated',
    };
  }
}
