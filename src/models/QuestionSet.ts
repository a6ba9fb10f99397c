// src/models/QuestionSet.ts

import mongoose, { Schema } from "mongoose";
import { getConfig } from "../config/env";

// Legacy documents arrive in many shapes, so only the canonical fields are
// declared and everything else is kept as stored.
export interface IQuestionSet {
  _id: unknown;
  survey_id?: unknown;
  questions?: unknown[];
  created_at?: string;
  updated_at?: string;
  legacy_id?: unknown;
}

const QuestionSetSchema = new Schema<IQuestionSet>(
  {
    _id: { type: Schema.Types.Mixed },
    survey_id: { type: Schema.Types.Mixed, index: true },
    questions: { type: [Schema.Types.Mixed], default: undefined },
    created_at: { type: String },
    updated_at: { type: String },
    legacy_id: { type: Schema.Types.Mixed, index: true, sparse: true },
  },
  {
    collection: getConfig().QUESTIONS_COL,
    strict: false,
    strictQuery: false,
    versionKey: false,
  }
);

// Answer resolution looks questions up by their embedded id
QuestionSetSchema.index({ "questions.question_id": 1 });

const QuestionSet = mongoose.model<IQuestionSet>("QuestionSet", QuestionSetSchema);

export default QuestionSet;
