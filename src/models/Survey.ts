// src/models/Survey.ts

import mongoose, { Schema } from "mongoose";
import { makeGuid } from "../utils/guid";

export interface ISurvey {
  _id: string;
  title: string;
  description: string;
  created_by: string | null;
  participant_count: number;
  question_count: number;
  created_at: string;
  updated_at: string;
}

const SurveySchema = new Schema<ISurvey>(
  {
    _id: { type: String, default: makeGuid },
    title: { type: String, required: true, trim: true },
    description: { type: String, default: "" },
    created_by: { type: String, default: null },
    participant_count: { type: Number, default: 0 },
    question_count: { type: Number, default: 0 },
    created_at: { type: String },
    updated_at: { type: String },
  },
  { collection: "surveys", versionKey: false }
);

const Survey = mongoose.model<ISurvey>("Survey", SurveySchema);

export default Survey;
