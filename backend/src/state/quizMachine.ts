// backend/src/state/quizMachine.ts
//
// Two-phase session machine. Each transition takes a snapshot and returns a
// new one; the input is never mutated, so a failed transition leaves the
// caller holding the previous state.

import {
  FeedbackGenerationError,
  GenerationParseError,
  InvalidAnswerError,
  InvalidPhaseError,
} from "../errors/quizErrors";
import type { FeedbackSource } from "../services/feedbackSource";
import type { QuestionSource } from "../services/questionSource";
import { isCorrectAnswer, normalizeAnswerLabel } from "./answerEvaluator";
import { nextDifficulty } from "./difficultyPolicy";
import type {
  AnswerLabel,
  GeneratedQuestion,
  QuestionOptions,
  QuizState,
  SubmitAnswerResult,
} from "./quizState";

export type MachineOptions = {
  historySize: number;
  // When false the echoed difficulty is validated but the tracked value wins.
  trustSourceDifficulty: boolean;
};

// A session with a question on screen: all four options and the key are set.
export type ActiveQuizState = QuizState & {
  phase: "AWAITING_ANSWER";
  options: QuestionOptions;
  correctAnswer: AnswerLabel;
};

export type SubmitOutcome = {
  state: QuizState;
  result: SubmitAnswerResult;
  feedbackError?: FeedbackGenerationError;
};

export function isAwaitingAnswer(
  state: QuizState
): state is QuizState & { correctAnswer: AnswerLabel } {
  return state.phase === "AWAITING_ANSWER" && state.correctAnswer !== "";
}

export async function generateQuestion(
  state: QuizState,
  source: QuestionSource,
  opts: MachineOptions
): Promise<ActiveQuizState> {
  if (state.phase !== "AWAITING_QUESTION") {
    throw new InvalidPhaseError("A question is already active");
  }

  let generated: GeneratedQuestion;
  try {
    generated = await source.generateQuestion({
      course: state.course,
      topic: state.topic,
      difficulty: state.difficulty,
      history: state.questionHistory,
    });
  } catch (err) {
    if (err instanceof GenerationParseError) throw err;
    const reason = err instanceof Error ? err.message : String(err);
    throw new GenerationParseError(`Question source failed: ${reason}`);
  }

  const questionHistory = [...state.questionHistory, generated.question].slice(-opts.historySize);

  return {
    ...state,
    currentQuestion: generated.question,
    options: { ...generated.options },
    correctAnswer: generated.correctAnswer,
    explanation: generated.explanation,
    difficulty: opts.trustSourceDifficulty ? generated.difficulty : state.difficulty,
    questionHistory,
    phase: "AWAITING_ANSWER",
  };
}

export async function submitAnswer(
  state: QuizState,
  answer: unknown,
  source: FeedbackSource
): Promise<SubmitOutcome> {
  if (!isAwaitingAnswer(state)) {
    throw new InvalidPhaseError("No active question to answer");
  }

  const userAnswer = normalizeAnswerLabel(answer);
  if (!userAnswer) throw new InvalidAnswerError(answer);

  const correctAnswer = state.correctAnswer;
  const isCorrect = isCorrectAnswer(userAnswer, correctAnswer);

  // Score, count and difficulty move together in one snapshot.
  const scored: QuizState = {
    ...state,
    userAnswer,
    score: state.score + (isCorrect ? 1 : 0),
    totalQuestions: state.totalQuestions + 1,
    difficulty: nextDifficulty(state.difficulty, isCorrect),
    feedback: "",
    phase: "AWAITING_QUESTION",
  };

  const baseResult: SubmitAnswerResult = {
    isCorrect,
    correctAnswer,
    feedback: null,
    score: scored.score,
    totalQuestions: scored.totalQuestions,
    difficulty: scored.difficulty,
  };

  let feedback: string;
  try {
    feedback = (
      await source.generateFeedback({
        course: state.course,
        topic: state.topic,
        question: state.currentQuestion,
        userAnswer,
        correctAnswer,
        explanation: state.explanation,
      })
    ).trim();
  } catch (err) {
    return {
      state: scored,
      result: baseResult,
      feedbackError: new FeedbackGenerationError(baseResult, err),
    };
  }

  if (!feedback) {
    return {
      state: scored,
      result: baseResult,
      feedbackError: new FeedbackGenerationError(baseResult),
    };
  }

  return {
    state: { ...scored, feedback },
    result: { ...baseResult, feedback },
  };
}
