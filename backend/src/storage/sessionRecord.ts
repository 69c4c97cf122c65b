// backend/src/storage/sessionRecord.ts

import {
  ANSWER_LABELS,
  type QuestionOptions,
  type QuizState,
  type QuizStatus,
  type QuizSummary,
} from "../state/quizState";
import { normalizeAnswerLabel } from "../state/answerEvaluator";
import { clampDifficulty } from "../state/difficultyPolicy";
import type { CompletedQuizRecord, QuizSessionRecord } from "./sessionStore";

function toOptions(raw: Record<string, string> | undefined): Partial<QuestionOptions> {
  const out: Partial<QuestionOptions> = {};
  if (!raw) return out;
  for (const label of ANSWER_LABELS) {
    const text = raw[label];
    if (typeof text === "string" && text.length > 0) out[label] = text;
  }
  return out;
}

export function recordToState(record: QuizSessionRecord): QuizState {
  return {
    sessionId: record.sessionId,
    studentId: record.studentId,
    course: record.course,
    topic: record.topic,
    difficulty: clampDifficulty(record.difficulty),
    currentQuestion: record.currentQuestion || "",
    options: toOptions(record.options),
    correctAnswer: normalizeAnswerLabel(record.correctAnswer) ?? "",
    explanation: record.explanation || "",
    userAnswer: normalizeAnswerLabel(record.userAnswer) ?? "",
    score: record.score,
    totalQuestions: record.totalQuestions,
    feedback: record.feedback || "",
    phase: record.phase === "AWAITING_ANSWER" ? "AWAITING_ANSWER" : "AWAITING_QUESTION",
    questionHistory: Array.isArray(record.questionHistory) ? [...record.questionHistory] : [],
    createdAt: new Date(record.createdAt),
  };
}

export function stateToRecord(state: QuizState, version: number, updatedAt: Date): QuizSessionRecord {
  return {
    sessionId: state.sessionId,
    studentId: state.studentId,
    course: state.course,
    topic: state.topic,
    difficulty: state.difficulty,
    currentQuestion: state.currentQuestion,
    options: {
      A: state.options.A ?? "",
      B: state.options.B ?? "",
      C: state.options.C ?? "",
      D: state.options.D ?? "",
    },
    correctAnswer: state.correctAnswer,
    explanation: state.explanation,
    userAnswer: state.userAnswer,
    score: state.score,
    totalQuestions: state.totalQuestions,
    feedback: state.feedback,
    phase: state.phase,
    questionHistory: [...state.questionHistory],
    version,
    createdAt: state.createdAt,
    updatedAt,
  };
}

export function toStatus(state: QuizState): QuizStatus {
  return {
    sessionId: state.sessionId,
    course: state.course,
    topic: state.topic,
    score: state.score,
    totalQuestions: state.totalQuestions,
    difficulty: state.difficulty,
    phase: state.phase,
    createdAt: state.createdAt.toISOString(),
  };
}

// Percentage rounded to two decimals; 0 when nothing was answered.
export function computeAccuracy(score: number, totalQuestions: number): number {
  if (totalQuestions <= 0) return 0;
  return Math.round((score / totalQuestions) * 100 * 100) / 100;
}

export function summarize(state: QuizState): QuizSummary {
  return {
    sessionId: state.sessionId,
    score: state.score,
    totalQuestions: state.totalQuestions,
    accuracy: computeAccuracy(state.score, state.totalQuestions),
    finalDifficulty: state.difficulty,
  };
}

export function toCompletedQuiz(state: QuizState, endedAt: Date): CompletedQuizRecord {
  return {
    sessionId: state.sessionId,
    studentId: state.studentId,
    course: state.course,
    topic: state.topic,
    finalDifficulty: state.difficulty,
    score: state.score,
    totalQuestions: state.totalQuestions,
    createdAt: state.createdAt,
    updatedAt: endedAt,
  };
}
