// src/models/SurveyAnalysis.ts

import mongoose, { Schema } from "mongoose";
import { makeGuid } from "../utils/guid";

export interface ISurveyAnalysis {
  _id: string;
  survey_id: string;
  cycle: number;
  // Map markers are stored as the dashboard sends them
  map_pins: unknown[];
  summary: string;
}

const SurveyAnalysisSchema = new Schema<ISurveyAnalysis>(
  {
    _id: { type: String, default: makeGuid },
    survey_id: { type: String, required: true, index: true },
    cycle: { type: Number, default: 1 },
    map_pins: { type: [Schema.Types.Mixed], default: [] },
    summary: { type: String, default: "" },
  },
  { collection: "analysis", versionKey: false }
);

const SurveyAnalysis = mongoose.model<ISurveyAnalysis>("SurveyAnalysis", SurveyAnalysisSchema);

export default SurveyAnalysis;
