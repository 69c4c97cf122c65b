// backend/src/state/completedQuizState.ts

import mongoose from "mongoose";
import type { CompletedQuizRecord } from "../storage/sessionStore";

const CompletedQuizSchema = new mongoose.Schema<CompletedQuizRecord>(
  {
    sessionId: { type: String, required: true },
    studentId: { type: String, required: true },
    course: { type: String, required: true },
    topic: { type: String, required: true },
    finalDifficulty: { type: Number, required: true, min: 1, max: 5 },
    score: { type: Number, required: true },
    totalQuestions: { type: Number, required: true },

    createdAt: { type: Date, required: true },
    updatedAt: { type: Date, required: true },
  },
  { versionKey: false },
);

CompletedQuizSchema.index({ studentId: 1, sessionId: 1, createdAt: 1 }, { unique: true });
CompletedQuizSchema.index({ studentId: 1, updatedAt: -1 });

export const CompletedQuizModel = mongoose.model<CompletedQuizRecord>(
  "CompletedQuiz",
  CompletedQuizSchema,
  "quizzes",
);
