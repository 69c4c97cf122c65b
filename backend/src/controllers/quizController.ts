// backend/src/controllers/quizController.ts

import type { Request, Response } from "express";
import { sendError, sendQuizError } from "../http/sendError";
import type { QuizSessionService } from "../services/quizSessionService";

const MAX_ID = 50;
const MAX_TEXT = 200;

function readString(v: unknown, max: number): string | null {
  if (typeof v !== "string") return null;
  const t = v.trim();
  if (!t || t.length > max) return null;
  return t;
}

function readOptionalInt(v: unknown): number | undefined | null {
  if (v === undefined || v === null || v === "") return undefined;
  const n = typeof v === "number" ? v : Number(v);
  return Number.isInteger(n) ? n : null;
}

export function createQuizController(service: QuizSessionService) {
  // POST /quiz/mcqs
  const startQuiz = async (req: Request, res: Response) => {
    const body: Record<string, unknown> = req.body ?? {};
    const userId = readString(body.userId, MAX_ID);
    const course = readString(body.course, MAX_TEXT);
    const topic = readString(body.topic, MAX_TEXT);
    const initialDifficulty = readOptionalInt(body.initialDifficulty);
    const sessionId = body.sessionId === undefined ? undefined : readString(body.sessionId, MAX_ID);

    if (!userId) return sendError(res, 400, "userId is required", "INVALID_REQUEST");
    if (!course || !topic) {
      return sendError(res, 400, "course and topic are required", "INVALID_REQUEST");
    }
    if (initialDifficulty === null) {
      return sendError(res, 400, "initialDifficulty must be an integer", "INVALID_REQUEST");
    }
    if (sessionId === null) return sendError(res, 400, "sessionId is invalid", "INVALID_REQUEST");

    try {
      const result = await service.startOrResume({
        studentId: userId,
        course,
        topic,
        initialDifficulty,
        sessionId,
      });
      const { resumed, ...payload } = result;
      return res.status(resumed ? 200 : 201).json({
        ...payload,
        message: resumed ? "Next question generated" : "Quiz session started successfully",
      });
    } catch (err) {
      return sendQuizError(res, "startQuiz", err);
    }
  };

  // POST /quiz/answer
  const submitAnswer = async (req: Request, res: Response) => {
    const body: Record<string, unknown> = req.body ?? {};
    const userId = readString(body.userId, MAX_ID);
    const sessionId = readString(body.sessionId, MAX_ID);

    if (!userId || !sessionId || typeof body.answer !== "string") {
      return sendError(
        res,
        400,
        "Invalid Payload (userId, sessionId and answer are required)",
        "INVALID_REQUEST",
      );
    }

    try {
      const result = await service.submitAnswer({ studentId: userId, sessionId, answer: body.answer });
      return res.status(200).json({ sessionId, ...result });
    } catch (err) {
      return sendQuizError(res, "submitAnswer", err);
    }
  };

  // GET /quiz/status/:userId/:sessionId
  const getStatus = async (req: Request, res: Response) => {
    const { userId, sessionId } = req.params;
    try {
      const status = await service.getStatus(userId, sessionId);
      return res.status(200).json(status);
    } catch (err) {
      return sendQuizError(res, "getStatus", err);
    }
  };

  // GET|POST|DELETE /quiz/end/:userId/:sessionId
  const endQuiz = async (req: Request, res: Response) => {
    const { userId, sessionId } = req.params;
    try {
      const finalResults = await service.end(userId, sessionId);
      return res.status(200).json({ message: "Quiz session ended successfully", finalResults });
    } catch (err) {
      return sendQuizError(res, "endQuiz", err);
    }
  };

  // GET /quiz/history/:userId?skip=&limit=
  const getHistory = async (req: Request, res: Response) => {
    const { userId } = req.params;
    const skip = readOptionalInt(req.query.skip);
    const limit = readOptionalInt(req.query.limit);
    if (skip === null || limit === null) {
      return sendError(res, 400, "skip and limit must be integers", "INVALID_REQUEST");
    }

    try {
      const quizzes = await service.listCompletedQuizzes(userId, { skip, limit });
      return res.status(200).json({ quizzes });
    } catch (err) {
      return sendQuizError(res, "getHistory", err);
    }
  };

  // GET /health
  const health = async (_req: Request, res: Response) => {
    try {
      return res.status(200).json(await service.getHealth());
    } catch (err) {
      return sendQuizError(res, "health", err);
    }
  };

  return { startQuiz, submitAnswer, getStatus, endQuiz, getHistory, health };
}

export type QuizController = ReturnType<typeof createQuizController>;
