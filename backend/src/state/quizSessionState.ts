// backend/src/state/quizSessionState.ts

import mongoose from "mongoose";
import type { QuizSessionRecord } from "../storage/sessionStore";

const OptionsSchema = new mongoose.Schema(
  {
    A: { type: String, default: "" },
    B: { type: String, default: "" },
    C: { type: String, default: "" },
    D: { type: String, default: "" },
  },
  { _id: false },
);

const QuizSessionSchema = new mongoose.Schema<QuizSessionRecord>(
  {
    sessionId: { type: String, required: true, maxlength: 50 },
    studentId: { type: String, required: true, maxlength: 50 },
    course: { type: String, required: true, maxlength: 200 },
    topic: { type: String, required: true, maxlength: 200 },
    difficulty: { type: Number, required: true, min: 1, max: 5 },

    currentQuestion: { type: String, default: "" },
    options: { type: OptionsSchema, default: () => ({}) },
    correctAnswer: { type: String, default: "" },
    explanation: { type: String, default: "" },
    userAnswer: { type: String, default: "" },

    score: { type: Number, default: 0, min: 0 },
    totalQuestions: { type: Number, default: 0, min: 0 },
    feedback: { type: String, default: "" },
    phase: {
      type: String,
      enum: ["AWAITING_QUESTION", "AWAITING_ANSWER"],
      required: true,
      default: "AWAITING_QUESTION",
    },

    questionHistory: { type: [String], default: [] },

    // Compare-and-set counter, see SessionStore.update.
    version: { type: Number, required: true, default: 0 },

    createdAt: { type: Date, required: true, immutable: true },
    updatedAt: { type: Date, required: true },
  },
  { versionKey: false },
);

QuizSessionSchema.index({ studentId: 1, sessionId: 1 }, { unique: true });
QuizSessionSchema.index({ sessionId: 1 });

export const QuizSessionModel = mongoose.model<QuizSessionRecord>("QuizSession", QuizSessionSchema);
