// src/models/SurveyResponse.ts

import mongoose, { Schema } from "mongoose";
import { getConfig } from "../config/env";

export interface ISurveyResponse {
  _id: unknown;
  survey_id?: unknown;
  cycle_id?: unknown;
  surveyor_id?: unknown;
  participant_id?: unknown;
  answers?: unknown[];
  location?: unknown;
  status?: string;
  rating?: number | null;
  timestamp?: string;
  created_at?: string;
}

const SurveyResponseSchema = new Schema<ISurveyResponse>(
  {
    _id: { type: Schema.Types.Mixed },
    survey_id: { type: Schema.Types.Mixed, index: true },
    cycle_id: { type: Schema.Types.Mixed },
    surveyor_id: { type: Schema.Types.Mixed },
    participant_id: { type: Schema.Types.Mixed },
    answers: { type: [Schema.Types.Mixed], default: undefined },
    location: { type: Schema.Types.Mixed },
    status: { type: String },
    rating: { type: Number },
    timestamp: { type: String },
    created_at: { type: String },
  },
  {
    collection: getConfig().RESPONSES_COL,
    strict: false,
    strictQuery: false,
    versionKey: false,
  }
);

const SurveyResponse = mongoose.model<ISurveyResponse>("SurveyResponse", SurveyResponseSchema);

export default SurveyResponse;
