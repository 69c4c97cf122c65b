// backend/src/storage/__tests__/mongoSessionStore.test.ts

import { beforeEach, describe, it, expect, vi } from "vitest";

const mocks = vi.hoisted(() => ({
  session: {
    findOne: vi.fn(),
    create: vi.fn(),
    updateOne: vi.fn(),
    exists: vi.fn(),
    deleteOne: vi.fn(),
    countDocuments: vi.fn(),
    distinct: vi.fn(),
    find: vi.fn(),
  },
  completed: {
    updateOne: vi.fn(),
    findOne: vi.fn(),
    find: vi.fn(),
  },
}));

vi.mock("../../state/quizSessionState", () => ({ QuizSessionModel: mocks.session }));
vi.mock("../../state/completedQuizState", () => ({ CompletedQuizModel: mocks.completed }));

import { MongoSessionStore } from "../mongoSessionStore";
import type { CompletedQuizRecord, QuizSessionRecord } from "../sessionStore";
import { ConcurrentModificationError, SessionNotFoundError } from "../../errors/quizErrors";

const AT = new Date("2026-02-01T09:00:00.000Z");

function makeRecord(overrides: Partial<QuizSessionRecord> = {}): QuizSessionRecord {
  return {
    sessionId: "s1",
    studentId: "u1",
    course: "History",
    topic: "Rome",
    difficulty: 2,
    currentQuestion: "",
    options: { A: "", B: "", C: "", D: "" },
    correctAnswer: "",
    explanation: "",
    userAnswer: "",
    score: 0,
    totalQuestions: 0,
    feedback: "",
    phase: "AWAITING_QUESTION",
    questionHistory: [],
    version: 3,
    createdAt: AT,
    updatedAt: AT,
    ...overrides,
  };
}

const COMPLETED: CompletedQuizRecord = {
  sessionId: "s1",
  studentId: "u1",
  course: "History",
  topic: "Rome",
  finalDifficulty: 2,
  score: 1,
  totalQuestions: 2,
  createdAt: AT,
  updatedAt: AT,
};

describe("MongoSessionStore", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("looks sessions up by student and session id", async () => {
    mocks.session.findOne.mockResolvedValueOnce(makeRecord());
    const store = new MongoSessionStore();

    const found = await store.get({ studentId: "u1", sessionId: "s1" });
    expect(mocks.session.findOne).toHaveBeenCalledWith({ studentId: "u1", sessionId: "s1" });
    expect(found).toEqual(makeRecord());
  });

  it("maps a duplicate key on insert to a conflict", async () => {
    mocks.session.create.mockRejectedValueOnce(Object.assign(new Error("E11000"), { code: 11000 }));
    const store = new MongoSessionStore();

    await expect(store.insert(makeRecord())).rejects.toBeInstanceOf(ConcurrentModificationError);
  });

  it("updates with a compare-and-set on version", async () => {
    mocks.session.updateOne.mockResolvedValueOnce({ matchedCount: 1 });
    const store = new MongoSessionStore();

    const next = await store.update(makeRecord({ score: 1 }));
    expect(next.version).toBe(4);

    const [filter, update] = mocks.session.updateOne.mock.calls[0];
    expect(filter).toEqual({ studentId: "u1", sessionId: "s1", version: 3 });
    expect(update.$set.version).toBe(4);
    expect(update.$set.score).toBe(1);
    expect(update.$set).not.toHaveProperty("createdAt");
  });

  it("reports a conflict when the version moved", async () => {
    mocks.session.updateOne.mockResolvedValueOnce({ matchedCount: 0 });
    mocks.session.exists.mockResolvedValueOnce({ _id: "x" });
    const store = new MongoSessionStore();

    await expect(store.update(makeRecord())).rejects.toBeInstanceOf(ConcurrentModificationError);
  });

  it("reports not found when the session is gone", async () => {
    mocks.session.updateOne.mockResolvedValueOnce({ matchedCount: 0 });
    mocks.session.exists.mockResolvedValueOnce(null);
    const store = new MongoSessionStore();

    await expect(store.update(makeRecord())).rejects.toBeInstanceOf(SessionNotFoundError);
  });

  it("groups session ids by student", async () => {
    mocks.session.find.mockResolvedValueOnce([
      { studentId: "u1", sessionId: "s1" },
      { studentId: "u2", sessionId: "s2" },
      { studentId: "u1", sessionId: "s3" },
    ]);
    mocks.session.distinct.mockResolvedValueOnce(["u1", "u2"]);
    const store = new MongoSessionStore();

    expect(await store.sessionIdsByStudent()).toEqual({ u1: ["s1", "s3"], u2: ["s2"] });
    expect(await store.countStudents()).toBe(2);
  });

  it("archives with an insert-only upsert", async () => {
    mocks.completed.updateOne.mockResolvedValueOnce({ matchedCount: 0, upsertedCount: 1 });
    mocks.completed.findOne.mockResolvedValueOnce(COMPLETED);
    const store = new MongoSessionStore();

    expect(await store.archive(COMPLETED)).toEqual(COMPLETED);
    const filter = { studentId: "u1", sessionId: "s1", createdAt: AT };
    expect(mocks.completed.updateOne).toHaveBeenCalledWith(
      filter,
      { $setOnInsert: COMPLETED },
      { upsert: true }
    );
    expect(mocks.completed.findOne).toHaveBeenCalledWith(filter);
  });

  it("pages completed quizzes newest first", async () => {
    const limit = vi.fn().mockResolvedValueOnce([COMPLETED]);
    const skip = vi.fn(() => ({ limit }));
    const sort = vi.fn(() => ({ skip }));
    mocks.completed.find.mockReturnValueOnce({ sort });
    const store = new MongoSessionStore();

    expect(await store.listCompleted("u1", { skip: 10, limit: 5 })).toEqual([COMPLETED]);
    expect(mocks.completed.find).toHaveBeenCalledWith({ studentId: "u1" });
    expect(sort).toHaveBeenCalledWith({ updatedAt: -1 });
    expect(skip).toHaveBeenCalledWith(10);
    expect(limit).toHaveBeenCalledWith(5);
  });
});
