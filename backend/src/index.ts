// src/index.ts
// this is also known as the backend entry file

import "dotenv/config";
import { createAIFeedbackSource } from "./services/feedbackSource";
import { createAIQuestionSource } from "./services/questionSource";
import { createQuizSessionService } from "./services/quizSessionService";
import { generateFeedbackText, generateQuestionJSON } from "./ai/openaiClient";
import { createApp } from "./app";
import { getPort, getSessionStoreKind, loadQuizConfig } from "./config/quizConfig";
import { connectMongo } from "./db/mongo";
import { MemorySessionStore } from "./storage/memorySessionStore";
import { MongoSessionStore } from "./storage/mongoSessionStore";
import type { SessionStore } from "./storage/sessionStore";
import { logEvent, logServerError, logWarning } from "./utils/logger";

async function main() {
  if (!process.env.OPENAI_API_KEY) {
    logWarning("OPENAI_API_KEY is not set; question generation will fail");
  }

  let store: SessionStore;
  if (getSessionStoreKind() === "memory") {
    store = new MemorySessionStore();
  } else {
    await connectMongo();
    store = new MongoSessionStore();
  }

  const service = createQuizSessionService({
    store,
    questionSource: createAIQuestionSource({ generateQuestionJSON }),
    feedbackSource: createAIFeedbackSource({ generateFeedbackText }),
    config: loadQuizConfig(),
  });

  const port = getPort();
  createApp(service).listen(port, () => {
    logEvent("server_started", { port, store: getSessionStoreKind() });
  });
}

main().catch((err) => {
  logServerError("startup", err);
  process.exit(1);
});
