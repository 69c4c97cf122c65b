// backend/src/services/feedbackSource.ts

import { buildFeedbackPrompt } from "../ai/promptBuilder";
import type { AnswerLabel } from "../state/quizState";

export type FeedbackRequest = {
  course: string;
  topic: string;
  question: string;
  userAnswer: AnswerLabel;
  correctAnswer: AnswerLabel;
  explanation: string;
};

export interface FeedbackSource {
  generateFeedback(req: FeedbackRequest): Promise<string>;
}

export type FeedbackAIClient = {
  generateFeedbackText: (prompt: string) => Promise<string>;
};

export function createAIFeedbackSource(aiClient: FeedbackAIClient): FeedbackSource {
  return {
    async generateFeedback(req) {
      const text = await aiClient.generateFeedbackText(buildFeedbackPrompt(req));
      return text.trim();
    },
  };
}
