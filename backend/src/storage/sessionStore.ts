// backend/src/storage/sessionStore.ts

import type { AnswerLabel, QuizPhase } from "../state/quizState";

export type SessionKey = {
  studentId: string;
  sessionId: string;
};

// Durable layout of a live session. Options always carry all four labels;
// an empty string means "not generated yet".
export type QuizSessionRecord = {
  sessionId: string;
  studentId: string;
  course: string;
  topic: string;
  difficulty: number;
  currentQuestion: string;
  options: Record<AnswerLabel, string>;
  correctAnswer: string;
  explanation: string;
  userAnswer: string;
  score: number;
  totalQuestions: number;
  feedback: string;
  phase: QuizPhase;
  questionHistory: string[];
  version: number;
  createdAt: Date;
  updatedAt: Date;
};

export type CompletedQuizRecord = {
  sessionId: string;
  studentId: string;
  course: string;
  topic: string;
  finalDifficulty: number;
  score: number;
  totalQuestions: number;
  createdAt: Date;
  updatedAt: Date;
};

export type PageOptions = {
  skip: number;
  limit: number;
};

/**
 * Keyed storage for live sessions and the completed-quiz archive.
 *
 * `update` is a compare-and-set on `version`: it succeeds only when the stored
 * record still has the version the caller read, and writes `version + 1`.
 * A stale write rejects with ConcurrentModificationError.
 */
export interface SessionStore {
  get(key: SessionKey): Promise<QuizSessionRecord | null>;
  insert(record: QuizSessionRecord): Promise<QuizSessionRecord>;
  update(record: QuizSessionRecord): Promise<QuizSessionRecord>;
  delete(key: SessionKey): Promise<boolean>;

  countSessions(): Promise<number>;
  countStudents(): Promise<number>;
  sessionIdsByStudent(): Promise<Record<string, string[]>>;

  // Idempotent per (studentId, sessionId, createdAt): a repeated call for the
  // same ended session returns the first archive.
  archive(completed: CompletedQuizRecord): Promise<CompletedQuizRecord>;
  listCompleted(studentId: string, page: PageOptions): Promise<CompletedQuizRecord[]>;
}

// Ids may contain any character, so the pair is encoded rather than joined.
export function sessionKeyString(key: SessionKey): string {
  return JSON.stringify([key.studentId, key.sessionId]);
}

// One archive entry per ended session. A reused sessionId starts a new
// session with its own createdAt, so the triple tells them apart.
export function completedKeyString(completed: CompletedQuizRecord): string {
  return JSON.stringify([completed.studentId, completed.sessionId, completed.createdAt.toISOString()]);
}
