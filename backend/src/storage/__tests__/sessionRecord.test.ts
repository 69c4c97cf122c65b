// backend/src/storage/__tests__/sessionRecord.test.ts

import { describe, it, expect } from "vitest";
import { computeAccuracy, recordToState, stateToRecord, summarize } from "../sessionRecord";
import type { QuizSessionRecord } from "../sessionStore";

const AT = new Date("2026-02-10T12:00:00.000Z");

function record(overrides: Partial<QuizSessionRecord> = {}): QuizSessionRecord {
  return {
    sessionId: "s1",
    studentId: "u1",
    course: "Physics",
    topic: "Optics",
    difficulty: 4,
    currentQuestion: "What bends light in a prism?",
    options: { A: "Refraction", B: "Reflection", C: "Diffraction", D: "Absorption" },
    correctAnswer: "A",
    explanation: "Light changes speed between media.",
    userAnswer: "",
    score: 2,
    totalQuestions: 3,
    feedback: "",
    phase: "AWAITING_ANSWER",
    questionHistory: ["q1", "What bends light in a prism?"],
    version: 7,
    createdAt: AT,
    updatedAt: AT,
    ...overrides,
  };
}

describe("computeAccuracy", () => {
  it("rounds to two decimals", () => {
    expect(computeAccuracy(3, 5)).toBe(60);
    expect(computeAccuracy(2, 3)).toBe(66.67);
    expect(computeAccuracy(1, 1)).toBe(100);
  });

  it("is zero when nothing was answered", () => {
    expect(computeAccuracy(0, 0)).toBe(0);
  });
});

describe("recordToState / stateToRecord", () => {
  it("carries every field through unchanged", () => {
    const state = recordToState(record());
    expect(stateToRecord(state, 7, AT)).toEqual(record());
  });

  it("drops empty option slots and unknown labels", () => {
    const state = recordToState(
      record({
        phase: "AWAITING_QUESTION",
        options: { A: "", B: "", C: "", D: "" },
        correctAnswer: "",
        userAnswer: "x",
      })
    );
    expect(state.options).toEqual({});
    expect(state.correctAnswer).toBe("");
    expect(state.userAnswer).toBe("");
  });

  it("clamps an out-of-range stored difficulty", () => {
    expect(recordToState(record({ difficulty: 11 })).difficulty).toBe(5);
  });
});

describe("summarize", () => {
  it("reports accuracy and final difficulty", () => {
    expect(summarize(recordToState(record()))).toEqual({
      sessionId: "s1",
      score: 2,
      totalQuestions: 3,
      accuracy: 66.67,
      finalDifficulty: 4,
    });
  });
});
