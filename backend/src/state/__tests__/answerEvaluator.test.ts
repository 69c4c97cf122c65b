// backend/src/state/__tests__/answerEvaluator.test.ts

import { describe, it, expect } from "vitest";
import { isCorrectAnswer, normalizeAnswerLabel } from "../answerEvaluator";

describe("normalizeAnswerLabel", () => {
  it("upper-cases and trims valid labels", () => {
    expect(normalizeAnswerLabel("b")).toBe("B");
    expect(normalizeAnswerLabel(" d ")).toBe("D");
    expect(normalizeAnswerLabel("A")).toBe("A");
  });

  it("rejects anything outside A-D", () => {
    expect(normalizeAnswerLabel("E")).toBeNull();
    expect(normalizeAnswerLabel("AB")).toBeNull();
    expect(normalizeAnswerLabel("")).toBeNull();
    expect(normalizeAnswerLabel(1)).toBeNull();
    expect(normalizeAnswerLabel(undefined)).toBeNull();
  });
});

describe("isCorrectAnswer", () => {
  it("compares against an upper-cased key", () => {
    expect(isCorrectAnswer("B", "b")).toBe(true);
    expect(isCorrectAnswer("B", "B")).toBe(true);
    expect(isCorrectAnswer("C", "B")).toBe(false);
  });
});
