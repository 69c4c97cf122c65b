// backend/src/state/difficultyPolicy.ts

import { MAX_DIFFICULTY, MIN_DIFFICULTY } from "./quizState";

export function isValidDifficulty(value: unknown): value is number {
  return (
    typeof value === "number" &&
    Number.isInteger(value) &&
    value >= MIN_DIFFICULTY &&
    value <= MAX_DIFFICULTY
  );
}

export function clampDifficulty(value: number, fallback = 2): number {
  if (!Number.isFinite(value)) return fallback;
  return Math.min(MAX_DIFFICULTY, Math.max(MIN_DIFFICULTY, Math.round(value)));
}

/**
 * One step up on a correct answer, one step down on a wrong one,
 * saturating at both ends.
 */
export function nextDifficulty(current: number, isCorrect: boolean): number {
  if (isCorrect && current < MAX_DIFFICULTY) return current + 1;
  if (!isCorrect && current > MIN_DIFFICULTY) return current - 1;
  return current;
}
