// backend/src/config/quizConfig.ts

export type SessionStoreKind = "mongo" | "memory";

export type QuizConfig = {
  defaultDifficulty: number;
  historySize: number;
  trustSourceDifficulty: boolean;
};

function readInt(name: string, fallback: number): number {
  const raw = String(process.env[name] ?? "").trim();
  if (!raw) return fallback;
  const n = Number(raw);
  return Number.isInteger(n) ? n : fallback;
}

function readBool(name: string): boolean {
  const raw = String(process.env[name] || "").toLowerCase().trim();
  return raw === "1" || raw === "true";
}

export function getPort(): number {
  return readInt("PORT", 3000);
}

export function getSessionStoreKind(): SessionStoreKind {
  const raw = String(process.env.SESSION_STORE || "").toLowerCase().trim();
  return raw === "memory" ? "memory" : "mongo";
}

export function getMongoUri(): string {
  const uri = process.env.MONGO_URI?.trim();
  if (!uri) throw new Error("MONGO_URI is not set");
  return uri;
}

export function getOpenAIModel(): string {
  return process.env.OPENAI_MODEL?.trim() || "gpt-4o-mini";
}

export function getAITimeoutMs(): number {
  const ms = readInt("AI_TIMEOUT_MS", 30_000);
  return ms > 0 ? ms : 30_000;
}

export function isSourceDifficultyTrusted(): boolean {
  return readBool("QUIZ_TRUST_SOURCE_DIFFICULTY");
}

export function loadQuizConfig(): QuizConfig {
  const defaultDifficulty = readInt("QUIZ_DEFAULT_DIFFICULTY", 2);
  const historySize = readInt("QUIZ_HISTORY_SIZE", 5);

  return {
    defaultDifficulty: Math.min(5, Math.max(1, defaultDifficulty)),
    historySize: historySize > 0 ? historySize : 5,
    trustSourceDifficulty: isSourceDifficultyTrusted(),
  };
}
