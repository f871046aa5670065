/**
 * Error taxonomy shared by the drill pipelines and their collaborators
 */

export type ErrorCode =
  | 'EMPTY_KNOWLEDGE_BASE'
  | 'KNOWLEDGE_BASE_NOT_FOUND'
  | 'QUESTION_GENERATION_FAILED'
  | 'QUESTION_NOT_FOUND'
  | 'MODEL_UNAVAILABLE'
  | 'MODEL_RESPONSE_INVALID'
  | 'EVALUATION_PARSE_FAILED'
  | 'RETRIEVAL_FAILED'
  | 'DEADLINE_EXCEEDED'
  | 'OPERATION_CANCELLED'
  | 'VALIDATION_FAILED';

export class KnowledgeSystemError extends Error {
  readonly code: ErrorCode;
  readonly details: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, details: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

export class EmptyKnowledgeBaseError extends KnowledgeSystemError {
  constructor(readonly kbName: string) {
    super('EMPTY_KNOWLEDGE_BASE', `Knowledge base "${kbName}" has no indexed content`, { kbName });
  }
}

export class KnowledgeBaseNotFoundError extends KnowledgeSystemError {
  constructor(readonly kbName: string) {
    super('KNOWLEDGE_BASE_NOT_FOUND', `Knowledge base "${kbName}" does not exist`, { kbName });
  }
}

export class QuestionNotFoundError extends KnowledgeSystemError {
  constructor(readonly questionId: string) {
    super('QUESTION_NOT_FOUND', `Question ${questionId} was not issued by this session or has expired`, { questionId });
  }
}

/**
 * Raised once the generation retry budget is spent. Carries the last raw
 * model output for diagnostics.
 */
export class QuestionGenerationError extends KnowledgeSystemError {
  readonly attempts: number;
  readonly lastRawOutput: string | null;
  readonly issues: string[];

  constructor(
    kbName: string,
    attempts: number,
    lastRawOutput: string | null,
    issues: string[],
    cause?: unknown
  ) {
    super(
      'QUESTION_GENERATION_FAILED',
      `Could not produce a question for "${kbName}" after ${attempts} attempt(s). Please try again.`,
      { kbName, attempts, issues },
      { cause }
    );
    this.attempts = attempts;
    this.lastRawOutput = lastRawOutput;
    this.issues = issues;
  }
}

/** Connection failure, timeout or overloaded upstream */
export class ModelUnavailableError extends KnowledgeSystemError {
  constructor(message: string, details: Record<string, unknown> = {}, cause?: unknown) {
    super('MODEL_UNAVAILABLE', message, details, { cause });
  }
}

/** The model answered, but with nothing usable */
export class ModelResponseError extends KnowledgeSystemError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('MODEL_RESPONSE_INVALID', message, details);
  }
}

/**
 * Never surfaced to callers: evaluation downgrades it to a degraded result.
 */
export class EvaluationParseError extends KnowledgeSystemError {
  readonly missingFields: string[];

  constructor(missingFields: string[], readonly rawOutput: string) {
    super('EVALUATION_PARSE_FAILED', `Evaluation response is missing: ${missingFields.join(', ')}`, { missingFields });
    this.missingFields = missingFields;
  }
}

export class RetrievalError extends KnowledgeSystemError {
  constructor(message: string, cause?: unknown) {
    super('RETRIEVAL_FAILED', message, {}, { cause });
  }
}

export class DeadlineExceededError extends KnowledgeSystemError {
  constructor(operation: string, readonly timeoutMs: number) {
    super('DEADLINE_EXCEEDED', `${operation} timed out after ${timeoutMs}ms`, { operation, timeoutMs });
  }
}

export class OperationCancelledError extends KnowledgeSystemError {
  constructor(operation: string) {
    super('OPERATION_CANCELLED', `${operation} was cancelled`, { operation });
  }
}

export class ValidationError extends KnowledgeSystemError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('VALIDATION_FAILED', message, details);
  }
}
