/**
 * QuestionPipeline - select content, prompt the model, sanitize, validate, retry
 */

import { v4 as uuidv4 } from 'uuid';
import { sanitizeDetailed } from '../llm/sanitizer.js';
import { extractDraft, type QuestionDraft } from './draft.js';
import { validateQuestion } from './validator.js';
import { buildQuestionPrompt, QUESTION_SYSTEM_PROMPT } from './prompts.js';
import { OperationCancelledError, QuestionGenerationError } from '../errors.js';
import { retryBounded, type AttemptFailure, type AttemptOutcome } from '../../utils/retry.js';
import { withDeadline } from '../../utils/timeout.js';
import { truncateEnd } from '../../utils/text.js';
import type { ContentSelector } from '../selection/selector.js';
import type { SessionMemory } from '../session/memory.js';
import type { DrillConfig } from '../../config/drill.js';
import type {
  Difficulty,
  Question,
  SelectionStrategy,
  TextCompletionModel,
} from '../../types/index.js';

const OPERATION = 'Question generation';
const MAX_TEMPERATURE = 1.5;

export interface QuestionPipelineDeps {
  selector: ContentSelector;
  model: TextCompletionModel;
  memory: SessionMemory;
  config: DrillConfig;
}

export interface GenerateOptions {
  signal?: AbortSignal;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class QuestionPipeline {
  private readonly selector: ContentSelector;
  private readonly model: TextCompletionModel;
  private readonly memory: SessionMemory;
  private readonly config: DrillConfig;

  constructor(deps: QuestionPipelineDeps) {
    this.selector = deps.selector;
    this.model = deps.model;
    this.memory = deps.memory;
    this.config = deps.config;
  }

  /**
   * Temperature for a 1-based attempt number; nudged upward on each retry
   */
  temperatureFor(attempt: number): number {
    const { questionTemperature, temperatureStep } = this.config;
    return Math.min(questionTemperature + (attempt - 1) * temperatureStep, MAX_TEMPERATURE);
  }

  async generate(
    kbName: string,
    difficulty: Difficulty = this.config.defaultDifficulty,
    strategy: SelectionStrategy = this.config.defaultStrategy,
    options: GenerateOptions = {}
  ): Promise<Question> {
    const { signal } = options;
    if (signal?.aborted) {
      throw new OperationCancelledError(OPERATION);
    }

    const fragment = await this.selector.select(kbName, strategy, difficulty);
    const sourceContext = truncateEnd(fragment.text, this.config.maxContextLength);

    const result = await retryBounded<QuestionDraft>(
      (attempt, previous) => this.attempt(kbName, sourceContext, difficulty, attempt, previous, signal),
      {
        operation: OPERATION,
        maxAttempts: this.config.maxRetries,
        delayMs: this.config.retryDelayMs,
        signal,
        onFailure: (attempt, failure) => {
          console.warn(`[question] attempt ${attempt}/${this.config.maxRetries} for "${kbName}" failed: ${failure.reason}`);
        },
      }
    );

    if (!result.ok) {
      const lastRaw = [...result.failures].reverse().find(f => f.raw !== undefined)?.raw ?? null;
      throw new QuestionGenerationError(
        kbName,
        result.attempts,
        lastRaw,
        result.lastFailure.reason.split('; '),
        result.lastFailure.error
      );
    }

    // A cancellation that lands after the last await still yields nothing
    if (signal?.aborted) {
      throw new OperationCancelledError(OPERATION);
    }

    const draft = result.value;
    this.memory.rememberQuestion(kbName, draft.question);

    return {
      id: uuidv4(),
      content: draft.question,
      kbName,
      sourceContext,
      sourceFragmentId: fragment.id,
      sourceId: fragment.sourceId,
      difficulty,
      strategy,
      background: draft.background,
      createdAt: new Date(),
    };
  }

  private async attempt(
    kbName: string,
    sourceContext: string,
    difficulty: Difficulty,
    attempt: number,
    previous: AttemptFailure | undefined,
    signal: AbortSignal | undefined
  ): Promise<AttemptOutcome<QuestionDraft>> {
    const prompt = buildQuestionPrompt({
      content: sourceContext,
      difficulty,
      previousIssues: previous?.raw !== undefined ? previous.reason : undefined,
    });

    let raw: string;
    try {
      raw = await withDeadline(
        `${OPERATION} model call`,
        this.config.modelTimeoutMs,
        (callSignal) => this.model.complete({
          prompt,
          systemPrompt: QUESTION_SYSTEM_PROMPT,
          temperature: this.temperatureFor(attempt),
          maxTokens: this.config.questionMaxTokens,
          signal: callSignal,
        }),
        signal
      );
    } catch (error) {
      if (error instanceof OperationCancelledError) {
        throw error;
      }
      return { ok: false, reason: describeError(error), error };
    }

    const sanitized = sanitizeDetailed(raw);
    if (sanitized.truncated) {
      console.warn(`[question] unterminated reasoning block removed from model output for "${kbName}"`);
    }

    const draft = extractDraft(sanitized.text);
    const issues = validateQuestion(draft.question, {
      maxLength: this.config.maxQuestionLength,
      duplicateSimilarity: this.config.duplicateSimilarity,
      recentQuestions: this.memory.recentQuestions(kbName),
    });

    if (issues.length > 0) {
      return { ok: false, reason: issues.join('; '), raw };
    }
    return { ok: true, value: draft };
  }
}
