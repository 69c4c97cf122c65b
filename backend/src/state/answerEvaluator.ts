// backend/src/state/answerEvaluator.ts

import { ANSWER_LABELS, type AnswerLabel } from "./quizState";

const LABELS = new Set<string>(ANSWER_LABELS);

export function isAnswerLabel(value: unknown): value is AnswerLabel {
  return typeof value === "string" && LABELS.has(value);
}

// "b", " B " and "B" all map to "B"; anything outside A-D is null.
export function normalizeAnswerLabel(raw: unknown): AnswerLabel | null {
  if (typeof raw !== "string") return null;
  const label = raw.trim().toUpperCase();
  return isAnswerLabel(label) ? label : null;
}

export function isCorrectAnswer(submitted: AnswerLabel, correct: string): boolean {
  return submitted === correct.trim().toUpperCase();
}
