// backend/src/storage/mongoSessionStore.ts

import { ConcurrentModificationError, SessionNotFoundError } from "../errors/quizErrors";
import { CompletedQuizModel } from "../state/completedQuizState";
import { QuizSessionModel } from "../state/quizSessionState";
import type {
  CompletedQuizRecord,
  PageOptions,
  QuizSessionRecord,
  SessionKey,
  SessionStore,
} from "./sessionStore";

const DUPLICATE_KEY = 11000;

function isDuplicateKeyError(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === DUPLICATE_KEY;
}

function fromSessionDoc(doc: QuizSessionRecord): QuizSessionRecord {
  return {
    sessionId: doc.sessionId,
    studentId: doc.studentId,
    course: doc.course,
    topic: doc.topic,
    difficulty: doc.difficulty,
    currentQuestion: doc.currentQuestion,
    options: {
      A: doc.options?.A ?? "",
      B: doc.options?.B ?? "",
      C: doc.options?.C ?? "",
      D: doc.options?.D ?? "",
    },
    correctAnswer: doc.correctAnswer,
    explanation: doc.explanation,
    userAnswer: doc.userAnswer,
    score: doc.score,
    totalQuestions: doc.totalQuestions,
    feedback: doc.feedback,
    phase: doc.phase,
    questionHistory: Array.from(doc.questionHistory ?? []),
    version: doc.version,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

function fromCompletedDoc(doc: CompletedQuizRecord): CompletedQuizRecord {
  return {
    sessionId: doc.sessionId,
    studentId: doc.studentId,
    course: doc.course,
    topic: doc.topic,
    finalDifficulty: doc.finalDifficulty,
    score: doc.score,
    totalQuestions: doc.totalQuestions,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

export class MongoSessionStore implements SessionStore {
  async get(key: SessionKey): Promise<QuizSessionRecord | null> {
    const doc = await QuizSessionModel.findOne({
      studentId: key.studentId,
      sessionId: key.sessionId,
    });
    return doc ? fromSessionDoc(doc) : null;
  }

  async insert(record: QuizSessionRecord): Promise<QuizSessionRecord> {
    try {
      const doc = await QuizSessionModel.create(record);
      return fromSessionDoc(doc);
    } catch (err) {
      if (isDuplicateKeyError(err)) {
        throw new ConcurrentModificationError("Quiz session already exists");
      }
      throw err;
    }
  }

  async update(record: QuizSessionRecord): Promise<QuizSessionRecord> {
    // createdAt is immutable; never part of the $set.
    const { sessionId, studentId, createdAt: _createdAt, version, ...fields } = record;
    const next = { ...record, version: version + 1 };

    const res = await QuizSessionModel.updateOne(
      { studentId, sessionId, version },
      { $set: { ...fields, version: next.version } },
    );

    if (res.matchedCount === 0) {
      const exists = await QuizSessionModel.exists({ studentId, sessionId });
      if (!exists) throw new SessionNotFoundError();
      throw new ConcurrentModificationError();
    }
    return next;
  }

  async delete(key: SessionKey): Promise<boolean> {
    const res = await QuizSessionModel.deleteOne({
      studentId: key.studentId,
      sessionId: key.sessionId,
    });
    return res.deletedCount > 0;
  }

  async countSessions(): Promise<number> {
    return await QuizSessionModel.countDocuments({});
  }

  async countStudents(): Promise<number> {
    const ids = await QuizSessionModel.distinct("studentId");
    return ids.length;
  }

  async sessionIdsByStudent(): Promise<Record<string, string[]>> {
    const docs = await QuizSessionModel.find({}, { studentId: 1, sessionId: 1 });
    const grouped: Record<string, string[]> = {};
    for (const doc of docs) {
      if (!grouped[doc.studentId]) grouped[doc.studentId] = [];
      grouped[doc.studentId].push(doc.sessionId);
    }
    return grouped;
  }

  async archive(completed: CompletedQuizRecord): Promise<CompletedQuizRecord> {
    const filter = {
      studentId: completed.studentId,
      sessionId: completed.sessionId,
      createdAt: completed.createdAt,
    };
    await CompletedQuizModel.updateOne(filter, { $setOnInsert: completed }, { upsert: true });
    const doc = await CompletedQuizModel.findOne(filter);
    return doc ? fromCompletedDoc(doc) : completed;
  }

  async listCompleted(studentId: string, page: PageOptions): Promise<CompletedQuizRecord[]> {
    const docs = await CompletedQuizModel.find({ studentId })
      .sort({ updatedAt: -1 })
      .skip(page.skip)
      .limit(page.limit);
    return docs.map(fromCompletedDoc);
  }
}
