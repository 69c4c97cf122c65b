// backend/src/ai/__tests__/promptBuilder.test.ts

import { describe, it, expect } from "vitest";
import { buildFeedbackPrompt, buildQuestionPrompt } from "../promptBuilder";

describe("buildQuestionPrompt", () => {
  it("names course, topic and difficulty", () => {
    const prompt = buildQuestionPrompt({
      course: "Biology",
      topic: "Genetics",
      difficulty: 4,
      history: [],
    });

    expect(prompt).toContain("Return ONLY valid JSON");
    expect(prompt).toContain("- Course: Biology");
    expect(prompt).toContain("- Topic: Genetics");
    expect(prompt).toContain(
      "- Difficulty: 4/5 (Advanced: multi-step problem solving and evaluation. Subtle differences between options.)"
    );
    expect(prompt.endsWith("Previous questions in this session:\nNo previous questions.")).toBe(true);
  });

  it("numbers the previous questions", () => {
    const prompt = buildQuestionPrompt({
      course: "Biology",
      topic: "Genetics",
      difficulty: 2,
      history: ["What is a gene?", "  ", "What is an allele?"],
    });

    expect(prompt.endsWith("1. What is a gene?\n2. What is an allele?")).toBe(true);
  });
});

describe("buildFeedbackPrompt", () => {
  const base = {
    course: "Biology",
    topic: "Genetics",
    question: "What is a gene?",
    correctAnswer: "C" as const,
    explanation: "A gene is a unit of heredity.",
  };

  it("marks a correct answer", () => {
    const prompt = buildFeedbackPrompt({ ...base, userAnswer: "C" });
    expect(prompt).toContain("Student's answer: C");
    expect(prompt).toContain("Result: CORRECT");
  });

  it("marks an incorrect answer", () => {
    const prompt = buildFeedbackPrompt({ ...base, userAnswer: "A" });
    expect(prompt).toContain("Correct answer: C");
    expect(prompt).toContain("Result: INCORRECT");
  });
});
