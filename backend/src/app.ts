// backend/src/app.ts

import cors from "cors";
import express, { type NextFunction, type Request, type Response } from "express";
import { createQuizController } from "./controllers/quizController";
import { sendError } from "./http/sendError";
import { requestContextMiddleware } from "./middleware/requestContext";
import { createQuizRouter } from "./routes/quiz";
import type { QuizSessionService } from "./services/quizSessionService";
import { logServerError } from "./utils/logger";

export function createApp(service: QuizSessionService) {
  const app = express();
  const controller = createQuizController(service);

  app.use(
    cors({
      origin: "*",
      methods: ["GET", "POST", "DELETE"],
    })
  );

  //body size limit
  app.use(express.json({ limit: "1mb" }));
  app.use(requestContextMiddleware);

  app.get("/health", controller.health);
  app.use("/quiz", createQuizRouter(controller));

  //404
  app.use((_req: Request, res: Response) => sendError(res, 404, "Not Found", "NOT_FOUND"));

  //error handler (malformed JSON bodies land here too)
  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) return next(err);
    if (err instanceof SyntaxError) {
      return sendError(res, 400, "Malformed JSON body", "INVALID_REQUEST");
    }
    const requestId = typeof res.locals.requestId === "string" ? res.locals.requestId : undefined;
    logServerError("unhandled_error", err, requestId);
    return sendError(res, 500, "Server error", "SERVER_ERROR");
  });

  return app;
}
