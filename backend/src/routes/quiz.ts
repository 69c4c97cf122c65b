// backend/src/routes/quiz.ts

import { Router } from "express";
import type { QuizController } from "../controllers/quizController";

export function createQuizRouter(controller: QuizController): Router {
  const router = Router();

  router.post("/mcqs", controller.startQuiz);
  router.post("/answer", controller.submitAnswer);
  router.get("/status/:userId/:sessionId", controller.getStatus);

  router.get("/end/:userId/:sessionId", controller.endQuiz);
  router.post("/end/:userId/:sessionId", controller.endQuiz);
  router.delete("/end/:userId/:sessionId", controller.endQuiz);

  router.get("/history/:userId", controller.getHistory);

  return router;
}
