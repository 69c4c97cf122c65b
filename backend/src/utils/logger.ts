// backend/src/utils/logger.ts

const MAX_MESSAGE = 500;

function truncate(msg: string): string {
  return msg.length > MAX_MESSAGE ? `${msg.slice(0, MAX_MESSAGE)}…` : msg;
}

export function logEvent(msg: string, fields: Record<string, unknown> = {}) {
  console.log(JSON.stringify({ level: "info", msg, ...fields }));
}

export function logWarning(msg: string, fields: Record<string, unknown> = {}) {
  console.warn(JSON.stringify({ level: "warn", msg, ...fields }));
}

export function logServerError(context: string, err: unknown, requestId?: string) {
  const rid =
    typeof requestId === "string" && requestId.trim() ? ` requestId=${requestId.trim()}` : "";
  const name = err instanceof Error && err.name ? ` ${err.name}` : "";
  const msg = err instanceof Error ? err.message : String(err || "unknown error");

  console.error(`[${context}]${rid}${name} ${truncate(msg)}`.trim());
}
