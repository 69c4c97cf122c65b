// backend/src/state/quizState.ts

export const ANSWER_LABELS = ["A", "B", "C", "D"] as const;

export type AnswerLabel = (typeof ANSWER_LABELS)[number];

export type QuizPhase = "AWAITING_QUESTION" | "AWAITING_ANSWER";

export const MIN_DIFFICULTY = 1;
export const MAX_DIFFICULTY = 5;

export type QuestionOptions = Record<AnswerLabel, string>;

// What the question source hands back after parsing + validation.
export type GeneratedQuestion = {
  question: string;
  options: QuestionOptions;
  correctAnswer: AnswerLabel;
  explanation: string;
  difficulty: number;
};

// In-memory projection of one session. Rebuilt from the store on every request.
export type QuizState = {
  sessionId: string;
  studentId: string;
  course: string;
  topic: string;
  difficulty: number;

  currentQuestion: string;
  // Empty until the first question is generated.
  options: Partial<QuestionOptions>;
  correctAnswer: AnswerLabel | "";
  explanation: string;
  userAnswer: AnswerLabel | "";

  score: number;
  totalQuestions: number;
  feedback: string;
  phase: QuizPhase;

  questionHistory: string[];
  createdAt: Date;
};

export type SubmitAnswerResult = {
  isCorrect: boolean;
  correctAnswer: AnswerLabel;
  feedback: string | null;
  score: number;
  totalQuestions: number;
  difficulty: number;
};

export type QuizStatus = {
  sessionId: string;
  course: string;
  topic: string;
  score: number;
  totalQuestions: number;
  difficulty: number;
  phase: QuizPhase;
  createdAt: string;
};

export type QuizSummary = {
  sessionId: string;
  score: number;
  totalQuestions: number;
  accuracy: number;
  finalDifficulty: number;
};
