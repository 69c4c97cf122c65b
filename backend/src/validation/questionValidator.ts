// backend/src/validation/questionValidator.ts

import { GenerationParseError } from "../errors/quizErrors";
import { ANSWER_LABELS, type GeneratedQuestion, type QuestionOptions } from "../state/quizState";
import { normalizeAnswerLabel } from "../state/answerEvaluator";
import { isValidDifficulty } from "../state/difficultyPolicy";

type ValidationResult =
  | { ok: true; value: GeneratedQuestion }
  | { ok: false; errors: string[] };

const CODE_FENCE = /^```(?:json)?\s*\n?([\s\S]*?)\n?```\s*$/i;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

export function stripCodeFences(text: string): string {
  const raw = text.trim();
  const m = raw.match(CODE_FENCE);
  return m ? m[1].trim() : raw;
}

/**
 * Returns the first top-level `{...}` block in `text`, matching braces and
 * skipping over string literals. Null when there is no balanced block.
 */
export function extractJsonBlock(text: string): string | null {
  const raw = stripCodeFences(text);
  const start = raw.indexOf("{");
  if (start < 0) return null;

  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < raw.length; i++) {
    const ch = raw[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === "{") depth++;
    else if (ch === "}") {
      depth--;
      if (depth === 0) return raw.slice(start, i + 1);
    }
  }

  return null;
}

function readDifficulty(value: unknown): number | undefined {
  if (typeof value === "number") return value;
  if (typeof value === "string" && value.trim() !== "") {
    const n = Number(value.trim());
    return Number.isFinite(n) ? n : undefined;
  }
  return undefined;
}

export function validateQuestionPayload(input: unknown): ValidationResult {
  if (!isRecord(input)) {
    return { ok: false, errors: ["payload must be an object"] };
  }

  const errors: string[] = [];

  if (!isNonEmptyString(input.question)) errors.push("question is required");

  const options: Partial<QuestionOptions> = {};
  if (!isRecord(input.options)) {
    errors.push("options must be an object with keys A, B, C, D");
  } else {
    for (const label of ANSWER_LABELS) {
      const text = input.options[label];
      if (isNonEmptyString(text)) options[label] = text.trim();
      else errors.push(`options.${label} is required`);
    }
  }

  const correctRaw = input.correct_answer ?? input.correctAnswer;
  const correctAnswer = normalizeAnswerLabel(correctRaw);
  if (!correctAnswer) errors.push("correct_answer must be one of A, B, C, D");

  if (!isNonEmptyString(input.explanation)) errors.push("explanation is required");

  const difficulty = readDifficulty(input.difficulty);
  if (input.difficulty === undefined || input.difficulty === null) {
    errors.push("difficulty is required");
  } else if (!isValidDifficulty(difficulty)) {
    errors.push("difficulty must be an integer between 1 and 5");
  }

  const { A, B, C, D } = options;
  if (
    errors.length > 0 ||
    !correctAnswer ||
    !isNonEmptyString(input.question) ||
    !isNonEmptyString(input.explanation) ||
    !isValidDifficulty(difficulty) ||
    A === undefined ||
    B === undefined ||
    C === undefined ||
    D === undefined
  ) {
    return { ok: false, errors };
  }

  return {
    ok: true,
    value: {
      question: input.question.trim(),
      options: { A, B, C, D },
      correctAnswer,
      explanation: input.explanation.trim(),
      difficulty,
    },
  };
}

// Strict parse-or-fail: never guesses beyond locating the JSON block.
export function parseQuestionText(raw: string): GeneratedQuestion {
  const block = extractJsonBlock(raw || "");
  if (!block) {
    throw new GenerationParseError("Question source returned no JSON object");
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(block);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new GenerationParseError(`Question source returned malformed JSON: ${reason}`);
  }

  const result = validateQuestionPayload(parsed);
  if (!result.ok) {
    throw new GenerationParseError("Question source returned an invalid question", result.errors);
  }
  return result.value;
}
