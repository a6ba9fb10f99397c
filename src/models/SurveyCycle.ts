// src/models/SurveyCycle.ts

import mongoose, { Schema } from "mongoose";
import { makeGuid } from "../utils/guid";

export interface ISurveyCycle {
  _id: string;
  survey_id: string;
  start_date: string | null;
  end_date: string | null;
}

const SurveyCycleSchema = new Schema<ISurveyCycle>(
  {
    _id: { type: String, default: makeGuid },
    survey_id: { type: String, required: true, index: true },
    start_date: { type: String, default: null },
    end_date: { type: String, default: null },
  },
  { collection: "survey_cycles", versionKey: false }
);

const SurveyCycle = mongoose.model<ISurveyCycle>("SurveyCycle", SurveyCycleSchema);

export default SurveyCycle;
