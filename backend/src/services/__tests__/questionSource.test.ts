// backend/src/services/__tests__/questionSource.test.ts

import { describe, it, expect, vi } from "vitest";
import { createAIQuestionSource } from "../questionSource";
import { createAIFeedbackSource } from "../feedbackSource";
import { GenerationParseError } from "../../errors/quizErrors";

const REQ = { course: "Art", topic: "Impressionism", difficulty: 2, history: [] };

describe("createAIQuestionSource", () => {
  it("parses the model output into a question", async () => {
    const aiClient = {
      generateQuestionJSON: vi.fn(async (_prompt: string) =>
        JSON.stringify({
          question: "Who painted Water Lilies?",
          options: { A: "Monet", B: "Dali", C: "Goya", D: "Klimt" },
          correct_answer: "A",
          explanation: "Monet painted the series at Giverny.",
          difficulty: 2,
        })
      ),
    };
    const source = createAIQuestionSource(aiClient);

    const q = await source.generateQuestion(REQ);
    expect(q).toEqual({
      question: "Who painted Water Lilies?",
      options: { A: "Monet", B: "Dali", C: "Goya", D: "Klimt" },
      correctAnswer: "A",
      explanation: "Monet painted the series at Giverny.",
      difficulty: 2,
    });
    expect(aiClient.generateQuestionJSON).toHaveBeenCalledTimes(1);
    expect(aiClient.generateQuestionJSON.mock.calls[0][0]).toContain("- Topic: Impressionism");
  });

  it("turns client failures into GenerationParseError", async () => {
    const source = createAIQuestionSource({
      generateQuestionJSON: vi.fn(async () => Promise.reject(new Error("timeout"))),
    });

    const err = await source.generateQuestion(REQ).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(GenerationParseError);
    expect(err instanceof Error && err.message).toBe("Question source failed: timeout");
  });

  it("rejects a question without a difficulty echo", async () => {
    const source = createAIQuestionSource({
      generateQuestionJSON: vi.fn(async () =>
        JSON.stringify({
          question: "Who painted Water Lilies?",
          options: { A: "Monet", B: "Dali", C: "Goya", D: "Klimt" },
          correct_answer: "A",
          explanation: "Monet painted the series at Giverny.",
        })
      ),
    });

    const err = await source.generateQuestion(REQ).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(GenerationParseError);
    expect(err instanceof GenerationParseError && err.problems).toEqual(["difficulty is required"]);
  });

  it("rejects output that is not a question", async () => {
    const source = createAIQuestionSource({
      generateQuestionJSON: vi.fn(async () => "Sorry, I can't do that."),
    });
    await expect(source.generateQuestion(REQ)).rejects.toBeInstanceOf(GenerationParseError);
  });
});

describe("createAIFeedbackSource", () => {
  it("returns trimmed feedback text", async () => {
    const source = createAIFeedbackSource({
      generateFeedbackText: vi.fn(async () => "\n  Well done.  \n"),
    });

    const text = await source.generateFeedback({
      course: "Art",
      topic: "Impressionism",
      question: "Who painted Water Lilies?",
      userAnswer: "A",
      correctAnswer: "A",
      explanation: "Monet painted the series at Giverny.",
    });
    expect(text).toBe("Well done.");
  });
});
