// backend/src/storage/memorySessionStore.ts

import { ConcurrentModificationError, SessionNotFoundError } from "../errors/quizErrors";
import {
  completedKeyString,
  sessionKeyString,
  type CompletedQuizRecord,
  type PageOptions,
  type QuizSessionRecord,
  type SessionKey,
  type SessionStore,
} from "./sessionStore";

// Process-local store for tests and SESSION_STORE=memory. Records are copied
// on the way in and out so callers never share objects with the store.
export class MemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, QuizSessionRecord>();
  private readonly completed = new Map<string, CompletedQuizRecord>();

  async get(key: SessionKey): Promise<QuizSessionRecord | null> {
    const record = this.sessions.get(sessionKeyString(key));
    return record ? structuredClone(record) : null;
  }

  async insert(record: QuizSessionRecord): Promise<QuizSessionRecord> {
    const k = sessionKeyString(record);
    if (this.sessions.has(k)) {
      throw new ConcurrentModificationError("Quiz session already exists");
    }
    this.sessions.set(k, structuredClone(record));
    return structuredClone(record);
  }

  async update(record: QuizSessionRecord): Promise<QuizSessionRecord> {
    const k = sessionKeyString(record);
    const current = this.sessions.get(k);
    if (!current) throw new SessionNotFoundError();
    if (current.version !== record.version) throw new ConcurrentModificationError();

    const next: QuizSessionRecord = {
      ...structuredClone(record),
      createdAt: current.createdAt,
      version: record.version + 1,
    };
    this.sessions.set(k, next);
    return structuredClone(next);
  }

  async delete(key: SessionKey): Promise<boolean> {
    return this.sessions.delete(sessionKeyString(key));
  }

  async countSessions(): Promise<number> {
    return this.sessions.size;
  }

  async countStudents(): Promise<number> {
    const students = new Set<string>();
    for (const record of this.sessions.values()) students.add(record.studentId);
    return students.size;
  }

  async sessionIdsByStudent(): Promise<Record<string, string[]>> {
    const grouped: Record<string, string[]> = {};
    for (const record of this.sessions.values()) {
      if (!grouped[record.studentId]) grouped[record.studentId] = [];
      grouped[record.studentId].push(record.sessionId);
    }
    return grouped;
  }

  async archive(completed: CompletedQuizRecord): Promise<CompletedQuizRecord> {
    const k = completedKeyString(completed);
    const existing = this.completed.get(k);
    if (existing) return structuredClone(existing);
    this.completed.set(k, structuredClone(completed));
    return structuredClone(completed);
  }

  async listCompleted(studentId: string, page: PageOptions): Promise<CompletedQuizRecord[]> {
    return [...this.completed.values()]
      .filter((q) => q.studentId === studentId)
      .sort((a, b) => b.updatedAt.getTime() - a.updatedAt.getTime())
      .slice(page.skip, page.skip + page.limit)
      .map((q) => structuredClone(q));
  }
}
