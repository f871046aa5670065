/**
 * DrillService - issues questions, grades answers and records each attempt.
 *
 * Owns the session memory shared by selection and generation, and keeps
 * issued questions in a bounded cache so answers can refer to them by id.
 */

import { ContentSelector } from '../selection/selector.js';
import { SessionMemory } from '../session/memory.js';
import { QuestionPipeline } from '../question/pipeline.js';
import { EvaluationPipeline } from '../evaluation/pipeline.js';
import { QuestionNotFoundError } from '../errors.js';
import { LRUCache } from '../../utils/lru-cache.js';
import { config as appConfig } from '../../config/index.js';
import { getKnowledgeBaseService } from '../knowledge-base/service.js';
import { getRetrievalService } from '../retrieval/service.js';
import { getLLMService } from '../llm/service.js';
import { getHistoryService } from '../history/service.js';
import type { DrillConfig } from '../../config/drill.js';
import type {
  Difficulty,
  EvaluationResult,
  FragmentCatalog,
  FragmentRetriever,
  HistoryRecorder,
  Question,
  SelectionStrategy,
  TextCompletionModel,
} from '../../types/index.js';

const DEFAULT_MAX_PENDING_QUESTIONS = 500;

export interface DrillServiceDeps {
  catalog: FragmentCatalog;
  retriever: FragmentRetriever;
  model: TextCompletionModel;
  history: HistoryRecorder;
  config: DrillConfig;
  /** Questions kept for answering by id */
  maxPendingQuestions?: number;
  random?: () => number;
}

export interface NextQuestionOptions {
  difficulty?: Difficulty;
  strategy?: SelectionStrategy;
  signal?: AbortSignal;
}

export interface SubmitAnswerOptions {
  signal?: AbortSignal;
}

export interface SubmissionResult {
  evaluation: EvaluationResult;
  /** null when the attempt could not be stored */
  recordId: string | null;
  evaluated: boolean;
}

export class DrillService {
  private readonly memory: SessionMemory;
  private readonly questions: QuestionPipeline;
  private readonly evaluations: EvaluationPipeline;
  private readonly history: HistoryRecorder;
  private readonly issued: LRUCache<string, Question>;

  constructor(deps: DrillServiceDeps) {
    const { config } = deps;
    this.memory = new SessionMemory({
      usedFragmentLimit: config.usedFragmentLimit,
      recentQuestionLimit: config.recentQuestionLimit,
    });
    const selector = new ContentSelector(deps.catalog, this.memory, {
      recentTierRatio: config.recentTierRatio,
      random: deps.random,
    });

    this.questions = new QuestionPipeline({ selector, model: deps.model, memory: this.memory, config });
    this.evaluations = new EvaluationPipeline({ retriever: deps.retriever, model: deps.model, config });
    this.history = deps.history;
    this.issued = new LRUCache(deps.maxPendingQuestions ?? DEFAULT_MAX_PENDING_QUESTIONS);
  }

  /**
   * Generate the next question for `kbName`. Propagates
   * KnowledgeBaseNotFoundError, EmptyKnowledgeBaseError,
   * QuestionGenerationError and OperationCancelledError.
   */
  async nextQuestion(kbName: string, options: NextQuestionOptions = {}): Promise<Question> {
    const question = await this.questions.generate(kbName, options.difficulty, options.strategy, {
      signal: options.signal,
    });
    this.issued.set(question.id, question);
    return question;
  }

  getQuestion(questionId: string): Question | undefined {
    return this.issued.peek(questionId);
  }

  /**
   * Grade `answer` and store the attempt. Takes a question issued by this
   * service (by id) or a full Question. A failed history write is logged and
   * reported as `recordId: null`.
   */
  async submitAnswer(
    questionOrId: string | Question,
    answer: string,
    options: SubmitAnswerOptions = {}
  ): Promise<SubmissionResult> {
    const question = typeof questionOrId === 'string' ? this.issued.get(questionOrId) : questionOrId;
    if (!question) {
      throw new QuestionNotFoundError(typeof questionOrId === 'string' ? questionOrId : '');
    }

    const evaluation = await this.evaluations.evaluate(question, answer, question.kbName, {
      signal: options.signal,
    });

    let recordId: string | null = null;
    try {
      recordId = await this.history.record({
        question,
        userAnswer: answer,
        evaluation,
        timestamp: new Date(),
      });
    } catch (error) {
      console.error(
        `[drill] failed to record answer for question ${question.id}:`,
        error instanceof Error ? error.message : error
      );
    }

    return {
      evaluation,
      recordId,
      evaluated: evaluation.status === 'evaluated',
    };
  }

  /**
   * Forget selection and duplicate-question memory
   */
  resetSession(kbName?: string): void {
    this.memory.clear(kbName);
  }
}

// Singleton instance
let drillService: DrillService | null = null;

export function getDrillService(): DrillService {
  if (!drillService) {
    drillService = new DrillService({
      catalog: getKnowledgeBaseService(),
      retriever: getRetrievalService(),
      model: getLLMService(),
      history: getHistoryService(),
      config: appConfig.drill,
    });
  }
  return drillService;
}
