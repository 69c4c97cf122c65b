// backend/src/services/quizSessionService.ts

import { randomUUID } from "node:crypto";
import type { QuizConfig } from "../config/quizConfig";
import { SessionNotFoundError } from "../errors/quizErrors";
import { clampDifficulty } from "../state/difficultyPolicy";
import {
  generateQuestion,
  submitAnswer as submitAnswerTransition,
  type ActiveQuizState,
  type MachineOptions,
} from "../state/quizMachine";
import type {
  QuestionOptions,
  QuizState,
  QuizStatus,
  QuizSummary,
  SubmitAnswerResult,
} from "../state/quizState";
import {
  recordToState,
  stateToRecord,
  summarize,
  toCompletedQuiz,
  toStatus,
} from "../storage/sessionRecord";
import {
  sessionKeyString,
  type CompletedQuizRecord,
  type SessionKey,
  type SessionStore,
} from "../storage/sessionStore";
import { createKeyedLock, type KeyedLock } from "../utils/keyedLock";
import { logEvent } from "../utils/logger";
import type { FeedbackSource } from "./feedbackSource";
import type { QuestionSource } from "./questionSource";

const DEFAULT_CONFIG: QuizConfig = {
  defaultDifficulty: 2,
  historySize: 5,
  trustSourceDifficulty: false,
};

const MAX_PAGE_SIZE = 100;

export type QuizSessionServiceDeps = {
  store: SessionStore;
  questionSource: QuestionSource;
  feedbackSource: FeedbackSource;
  config?: Partial<QuizConfig>;
  clock?: () => Date;
  newSessionId?: () => string;
  lock?: KeyedLock;
};

export type StartQuizParams = {
  studentId: string;
  course: string;
  topic: string;
  initialDifficulty?: number;
  sessionId?: string;
};

// Never carries the answer key.
export type StartQuizResult = {
  sessionId: string;
  course: string;
  topic: string;
  difficulty: number;
  question: string;
  options: QuestionOptions;
  questionNumber: number;
  resumed: boolean;
};

export type SubmitAnswerParams = SessionKey & { answer: unknown };

export type HealthReport = {
  status: "healthy";
  activeUserCount: number;
  quizSessionCount: number;
  quizSessionIds: Record<string, string[]>;
  timestamp: string;
};

export type QuizSessionService = ReturnType<typeof createQuizSessionService>;

function toStartResult(state: ActiveQuizState, resumed: boolean): StartQuizResult {
  return {
    sessionId: state.sessionId,
    course: state.course,
    topic: state.topic,
    difficulty: state.difficulty,
    question: state.currentQuestion,
    options: { ...state.options },
    questionNumber: state.totalQuestions + 1,
    resumed,
  };
}

function clampPage(skip: unknown, limit: unknown): { skip: number; limit: number } {
  const s = typeof skip === "number" && Number.isInteger(skip) && skip > 0 ? skip : 0;
  const l =
    typeof limit === "number" && Number.isInteger(limit) && limit > 0
      ? Math.min(limit, MAX_PAGE_SIZE)
      : MAX_PAGE_SIZE;
  return { skip: s, limit: l };
}

export function createQuizSessionService(deps: QuizSessionServiceDeps) {
  const { store, questionSource, feedbackSource } = deps;
  const config: QuizConfig = { ...DEFAULT_CONFIG, ...deps.config };
  const clock = deps.clock ?? (() => new Date());
  const newSessionId = deps.newSessionId ?? randomUUID;
  const lock = deps.lock ?? createKeyedLock();

  const machineOpts: MachineOptions = {
    historySize: config.historySize,
    trustSourceDifficulty: config.trustSourceDifficulty,
  };

  function newState(params: StartQuizParams, sessionId: string): QuizState {
    const difficulty =
      typeof params.initialDifficulty === "number"
        ? clampDifficulty(params.initialDifficulty, config.defaultDifficulty)
        : config.defaultDifficulty;

    return {
      sessionId,
      studentId: params.studentId,
      course: params.course,
      topic: params.topic,
      difficulty,
      currentQuestion: "",
      options: {},
      correctAnswer: "",
      explanation: "",
      userAnswer: "",
      score: 0,
      totalQuestions: 0,
      feedback: "",
      phase: "AWAITING_QUESTION",
      questionHistory: [],
      createdAt: clock(),
    };
  }

  async function loadState(key: SessionKey) {
    const record = await store.get(key);
    if (!record) throw new SessionNotFoundError();
    return { record, state: recordToState(record) };
  }

  /**
   * Resumes `sessionId` when it exists for this student, otherwise starts a
   * new session (reusing the requested id if one was given). Either way one
   * question is generated and persisted.
   */
  async function startOrResume(params: StartQuizParams): Promise<StartQuizResult> {
    const requestedId = params.sessionId?.trim();
    const key: SessionKey = {
      studentId: params.studentId,
      sessionId: requestedId || newSessionId(),
    };

    return lock.run(sessionKeyString(key), async () => {
      const existing = requestedId ? await store.get(key) : null;

      if (existing) {
        const next = await generateQuestion(recordToState(existing), questionSource, machineOpts);
        await store.update(stateToRecord(next, existing.version, clock()));
        logEvent("quiz_question_generated", {
          sessionId: key.sessionId,
          difficulty: next.difficulty,
          questionNumber: next.totalQuestions + 1,
          resumed: true,
        });
        return toStartResult(next, true);
      }

      const next = await generateQuestion(newState(params, key.sessionId), questionSource, machineOpts);
      await store.insert(stateToRecord(next, 0, clock()));
      logEvent("quiz_session_started", {
        sessionId: key.sessionId,
        difficulty: next.difficulty,
      });
      return toStartResult(next, false);
    });
  }

  async function submitAnswer(params: SubmitAnswerParams): Promise<SubmitAnswerResult> {
    const key: SessionKey = { studentId: params.studentId, sessionId: params.sessionId };

    return lock.run(sessionKeyString(key), async () => {
      const { record, state } = await loadState(key);
      const outcome = await submitAnswerTransition(state, params.answer, feedbackSource);

      // Scoring is persisted before a feedback failure is surfaced.
      await store.update(stateToRecord(outcome.state, record.version, clock()));

      logEvent("quiz_answer_scored", {
        sessionId: key.sessionId,
        isCorrect: outcome.result.isCorrect,
        score: outcome.result.score,
        totalQuestions: outcome.result.totalQuestions,
        difficulty: outcome.result.difficulty,
        feedbackFailed: Boolean(outcome.feedbackError),
      });

      if (outcome.feedbackError) throw outcome.feedbackError;
      return outcome.result;
    });
  }

  async function getStatus(studentId: string, sessionId: string): Promise<QuizStatus> {
    const { state } = await loadState({ studentId, sessionId });
    return toStatus(state);
  }

  async function end(studentId: string, sessionId: string): Promise<QuizSummary> {
    const key: SessionKey = { studentId, sessionId };

    return lock.run(sessionKeyString(key), async () => {
      const { state } = await loadState(key);
      const summary = summarize(state);

      await store.archive(toCompletedQuiz(state, clock()));
      await store.delete(key);

      logEvent("quiz_session_ended", { ...summary });
      return summary;
    });
  }

  async function getHealth(): Promise<HealthReport> {
    const [activeUserCount, quizSessionCount, quizSessionIds] = await Promise.all([
      store.countStudents(),
      store.countSessions(),
      store.sessionIdsByStudent(),
    ]);

    return {
      status: "healthy",
      activeUserCount,
      quizSessionCount,
      quizSessionIds,
      timestamp: clock().toISOString(),
    };
  }

  async function listCompletedQuizzes(
    studentId: string,
    page: { skip?: unknown; limit?: unknown } = {}
  ): Promise<CompletedQuizRecord[]> {
    return store.listCompleted(studentId, clampPage(page.skip, page.limit));
  }

  return {
    startOrResume,
    submitAnswer,
    getStatus,
    end,
    getHealth,
    listCompletedQuizzes,
  };
}
