// backend/src/http/sendError.ts

import type { Response } from "express";
import { isQuizError } from "../errors/quizErrors";
import { logServerError } from "../utils/logger";

function requestIdOf(res: Response): string | undefined {
  const rid: unknown = res.locals?.requestId;
  return typeof rid === "string" ? rid : undefined;
}

export function sendError(
  res: Response,
  status: number,
  message: string,
  code?: string,
  details?: Record<string, unknown>
): Response {
  const requestId = requestIdOf(res);

  return res.status(status).json({
    error: message,
    ...(code ? { code } : {}),
    ...(details ?? {}),
    ...(requestId ? { requestId } : {}),
  });
}

// Maps domain errors to their status; anything else is logged and answered 500.
export function sendQuizError(res: Response, context: string, err: unknown): Response {
  if (isQuizError(err)) {
    if (err.status >= 500) logServerError(context, err, requestIdOf(res));
    return sendError(res, err.status, err.message, err.code, err.details());
  }

  logServerError(context, err, requestIdOf(res));
  return sendError(res, 500, "Server error", "SERVER_ERROR");
}
