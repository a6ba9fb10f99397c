// src/services/migrationStore.ts

import { FilterQuery } from "mongoose";
import { getConfig } from "../config/env";
import QuestionSet, { IQuestionSet } from "../models/QuestionSet";
import SurveyResponse, { ISurveyResponse } from "../models/SurveyResponse";
import { CanonicalQuestionSet, LegacyDocument } from "../types/migrationTypes";
import { isPlainRecord } from "../utils/legacyFields";
import { QuestionKey, QuestionLookup } from "./questionCache";

export interface ScanFilter {
  surveyId?: string;
  limit?: number;
}

/** Sequential read handle; callers must close it, including on error. */
export interface DocumentCursor extends AsyncIterable<LegacyDocument> {
  close(): Promise<void>;
}

export interface QuestionSetStore {
  scan(filter: ScanFilter): DocumentCursor;
  findByLegacyId(legacyId: unknown): Promise<LegacyDocument | null>;
  /** Targeted `$set` of the canonical fields, inserting when the id is new. */
  upsert(document: CanonicalQuestionSet): Promise<void>;
}

export interface ResponseStore {
  scan(filter: ScanFilter): DocumentCursor;
  update(id: unknown, fields: Record<string, unknown>): Promise<void>;
}

export class MongoQuestionSetStore implements QuestionSetStore, QuestionLookup {
  constructor(private readonly batchSize: number = getConfig().MIGRATION_BATCH_SIZE) {}

  scan({ surveyId, limit }: ScanFilter): DocumentCursor {
    const filter: FilterQuery<IQuestionSet> = surveyId
      ? { $or: [{ survey_id: surveyId }, { surveyId }, { survey: surveyId }] }
      : {};
    let query = QuestionSet.find(filter).batchSize(this.batchSize);
    if (limit) query = query.limit(limit);
    return query.lean<LegacyDocument[]>().cursor();
  }

  async findByLegacyId(legacyId: unknown): Promise<LegacyDocument | null> {
    const doc = await QuestionSet.findOne({ legacy_id: legacyId }).lean<LegacyDocument>();
    return doc;
  }

  async upsert({ _id, ...fields }: CanonicalQuestionSet): Promise<void> {
    await QuestionSet.updateOne({ _id }, { $set: fields }, { upsert: true });
  }

  async findQuestion(questionId: QuestionKey): Promise<LegacyDocument | null> {
    const doc = await QuestionSet.findOne(
      { "questions.question_id": questionId },
      { "questions.$": 1 }
    ).lean<LegacyDocument>();
    const match = doc && Array.isArray(doc.questions) ? doc.questions[0] : undefined;
    return isPlainRecord(match) ? match : null;
  }
}

export class MongoResponseStore implements ResponseStore {
  constructor(private readonly batchSize: number = getConfig().MIGRATION_BATCH_SIZE) {}

  scan({ surveyId, limit }: ScanFilter): DocumentCursor {
    const filter: FilterQuery<ISurveyResponse> = { answers: { $exists: true, $ne: [] } };
    if (surveyId) filter.survey_id = surveyId;
    let query = SurveyResponse.find(filter).batchSize(this.batchSize);
    if (limit) query = query.limit(limit);
    return query.lean<LegacyDocument[]>().cursor();
  }

  async update(id: unknown, fields: Record<string, unknown>): Promise<void> {
    await SurveyResponse.updateOne({ _id: id }, { $set: fields });
  }
}
