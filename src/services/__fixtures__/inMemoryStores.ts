// src/services/__fixtures__/inMemoryStores.ts
//
// In-process stand-ins for the Mongo stores, used by the migration tests.

import { CanonicalQuestionSet, LegacyDocument } from "../../types/migrationTypes";
import { isPlainRecord } from "../../utils/legacyFields";
import { DocumentCursor, QuestionSetStore, ResponseStore, ScanFilter } from "../migrationStore";
import { QuestionKey, QuestionLookup } from "../questionCache";

const clone = <T>(value: T): T => structuredClone(value);

export class InMemoryCursor implements DocumentCursor {
  closed = false;

  constructor(
    private readonly docs: LegacyDocument[],
    private readonly failAt?: number
  ) {}

  async *[Symbol.asyncIterator](): AsyncIterator<LegacyDocument> {
    for (let index = 0; index < this.docs.length; index += 1) {
      if (index === this.failAt) {
        throw new Error("cursor lost connection");
      }
      yield this.docs[index];
    }
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

abstract class InMemoryCollection {
  readonly cursors: InMemoryCursor[] = [];
  writes = 0;
  failScanAt?: number;

  constructor(readonly docs: LegacyDocument[]) {}

  protected open(matches: (doc: LegacyDocument) => boolean, limit?: number): DocumentCursor {
    const selected = this.docs.filter(matches).map(clone);
    const cursor = new InMemoryCursor(limit ? selected.slice(0, limit) : selected, this.failScanAt);
    this.cursors.push(cursor);
    return cursor;
  }

  find(id: unknown): LegacyDocument | undefined {
    return this.docs.find((doc) => doc._id === id);
  }
}

export class InMemoryQuestionSetStore
  extends InMemoryCollection
  implements QuestionSetStore, QuestionLookup
{
  scan({ surveyId, limit }: ScanFilter): DocumentCursor {
    return this.open(
      (doc) =>
        !surveyId || doc.survey_id === surveyId || doc.surveyId === surveyId || doc.survey === surveyId,
      limit
    );
  }

  async findByLegacyId(legacyId: unknown): Promise<LegacyDocument | null> {
    const doc = this.docs.find((candidate) => candidate.legacy_id === legacyId);
    return doc ? clone(doc) : null;
  }

  async upsert({ _id, ...fields }: CanonicalQuestionSet): Promise<void> {
    this.writes += 1;
    const existing = this.find(_id);
    if (existing) {
      Object.assign(existing, clone(fields));
    } else {
      this.docs.push({ _id, ...clone(fields) });
    }
  }

  async findQuestion(questionId: QuestionKey): Promise<LegacyDocument | null> {
    for (const doc of this.docs) {
      const questions = Array.isArray(doc.questions) ? doc.questions : [];
      const match = questions.find(
        (question) => isPlainRecord(question) && question.question_id === questionId
      );
      if (isPlainRecord(match)) return clone(match);
    }
    return null;
  }
}

export class InMemoryResponseStore extends InMemoryCollection implements ResponseStore {
  scan({ surveyId, limit }: ScanFilter): DocumentCursor {
    return this.open(
      (doc) =>
        Array.isArray(doc.answers) &&
        doc.answers.length > 0 &&
        (!surveyId || doc.survey_id === surveyId),
      limit
    );
  }

  async update(id: unknown, fields: Record<string, unknown>): Promise<void> {
    this.writes += 1;
    const existing = this.find(id);
    if (existing) {
      Object.assign(existing, clone(fields));
    }
  }
}
