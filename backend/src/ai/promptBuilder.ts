// backend/src/ai/promptBuilder.ts

import type { QuestionRequest } from "../services/questionSource";
import type { FeedbackRequest } from "../services/feedbackSource";

const DIFFICULTY_GUIDE: Record<number, string> = {
  1: "Beginner: basic definitions and simple recall. Clearly wrong distractors.",
  2: "Elementary: simple relationships and direct application. Some plausible distractors.",
  3: "Intermediate: apply knowledge to a scenario, connect concepts. Moderately challenging distractors.",
  4: "Advanced: multi-step problem solving and evaluation. Subtle differences between options.",
  5: "Expert: edge cases, nuanced distinctions, complex real-world scenarios. Sophisticated distractors.",
};

function formatHistory(history: string[]): string {
  const items = history.map((q) => q.trim()).filter(Boolean);
  if (items.length === 0) return "No previous questions.";
  return items.map((q, i) => `${i + 1}. ${q}`).join("\n");
}

export function buildQuestionPrompt(req: QuestionRequest): string {
  const guide = DIFFICULTY_GUIDE[req.difficulty] ?? DIFFICULTY_GUIDE[3];

  return [
    "You write ONE multiple-choice question for an adaptive quiz.",
    "Return ONLY valid JSON. No markdown. No extra text.",
    "",
    "Parameters:",
    `- Course: ${req.course}`,
    `- Topic: ${req.topic}`,
    `- Difficulty: ${req.difficulty}/5 (${guide})`,
    "",
    "RULES",
    "-Exactly four options labelled A, B, C, D with exactly one correct answer.",
    `-The question must be about ${req.topic} within ${req.course}.`,
    "-Distractors should reflect common misconceptions.",
    "-Do not repeat any of the previous questions listed below.",
    "",
    "JSON schema (keys must match exactly):",
    `{
      "question": string,
      "options": { "A": string, "B": string, "C": string, "D": string },
      "correct_answer": "A" | "B" | "C" | "D",
      "explanation": string (2-3 sentences),
      "difficulty": ${req.difficulty}
    }`,
    "",
    "Previous questions in this session:",
    formatHistory(req.history),
  ].join("\n");
}

export function buildFeedbackPrompt(req: FeedbackRequest): string {
  const isCorrect = req.userAnswer === req.correctAnswer;

  return [
    "You are an encouraging tutor giving feedback on one quiz answer.",
    `The student answered a question about ${req.course} - ${req.topic}.`,
    "",
    `Question: ${req.question}`,
    `Student's answer: ${req.userAnswer}`,
    `Correct answer: ${req.correctAnswer}`,
    `Explanation: ${req.explanation}`,
    `Result: ${isCorrect ? "CORRECT" : "INCORRECT"}`,
    "",
    isCorrect
      ? "Congratulate briefly and name the concept they showed they understand."
      : "Acknowledge gently, state the correct answer, explain why in 2-3 sentences, end with encouragement.",
    "",
    "Plain text only. No markdown, no emojis. 50-100 words.",
  ].join("\n");
}
