// backend/src/errors/quizErrors.ts

import type { SubmitAnswerResult } from "../state/quizState";

export class QuizError extends Error {
  readonly status: number;
  readonly code: string;

  constructor(message: string, status: number, code: string) {
    super(message);
    this.name = new.target.name;
    this.status = status;
    this.code = code;
  }

  // Extra fields merged into the JSON error body.
  details(): Record<string, unknown> {
    return {};
  }
}

export class InvalidPhaseError extends QuizError {
  constructor(message: string) {
    super(message, 400, "INVALID_PHASE");
  }
}

export class InvalidAnswerError extends QuizError {
  constructor(answer: unknown) {
    super(`Answer must be one of A, B, C or D (got ${JSON.stringify(answer)})`, 400, "INVALID_ANSWER");
  }
}

export class SessionNotFoundError extends QuizError {
  constructor(message = "Quiz session not found or expired") {
    super(message, 404, "NOT_FOUND");
  }
}

export class GenerationParseError extends QuizError {
  readonly problems: string[];

  constructor(message: string, problems: string[] = []) {
    super(message, 502, "GENERATION_FAILED");
    this.problems = problems;
  }

  details(): Record<string, unknown> {
    return this.problems.length > 0 ? { problems: this.problems } : {};
  }
}

/**
 * Raised after the answer was scored and persisted but the feedback text
 * could not be produced. `result` is authoritative.
 */
export class FeedbackGenerationError extends QuizError {
  readonly result: SubmitAnswerResult;

  constructor(result: SubmitAnswerResult, cause?: unknown) {
    const reason = cause instanceof Error ? cause.message : "empty feedback";
    super(`Answer recorded but feedback generation failed: ${reason}`, 502, "FEEDBACK_FAILED");
    this.result = result;
  }

  details(): Record<string, unknown> {
    return { result: this.result };
  }
}

export class ConcurrentModificationError extends QuizError {
  constructor(message = "Quiz session was modified concurrently, please retry") {
    super(message, 409, "CONFLICT");
  }
}

export function isQuizError(err: unknown): err is QuizError {
  return err instanceof QuizError;
}
