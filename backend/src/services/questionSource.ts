// backend/src/services/questionSource.ts

import { GenerationParseError } from "../errors/quizErrors";
import { buildQuestionPrompt } from "../ai/promptBuilder";
import type { GeneratedQuestion } from "../state/quizState";
import { parseQuestionText } from "../validation/questionValidator";

export type QuestionRequest = {
  course: string;
  topic: string;
  difficulty: number;
  history: string[];
};

export interface QuestionSource {
  generateQuestion(req: QuestionRequest): Promise<GeneratedQuestion>;
}

// Kept behind a tiny interface so tests can hand in a fake.
export type QuestionAIClient = {
  generateQuestionJSON: (prompt: string) => Promise<string>;
};

export function createAIQuestionSource(aiClient: QuestionAIClient): QuestionSource {
  return {
    async generateQuestion(req) {
      const prompt = buildQuestionPrompt(req);

      let raw: string;
      try {
        raw = await aiClient.generateQuestionJSON(prompt);
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new GenerationParseError(`Question source failed: ${reason}`);
      }

      return parseQuestionText(raw);
    },
  };
}
