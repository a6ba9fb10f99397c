// src/models/Participant.ts

import mongoose, { Schema } from "mongoose";
import { NormalizedLocation } from "../types/migrationTypes";
import { makeGuid } from "../utils/guid";

export const GENDERS = ["male", "female", "other", "prefer_not_to_say"] as const;

export interface IParticipant {
  _id: string;
  first_name: string;
  age: number | null;
  gender: (typeof GENDERS)[number] | null;
  survey_id: string | null;
  phone: string | null;
  email: string | null;
  location: NormalizedLocation | null;
  created_at: string;
  updated_at?: string;
}

const ParticipantSchema = new Schema<IParticipant>(
  {
    _id: { type: String, default: makeGuid },
    first_name: { type: String, required: true },
    age: { type: Number, min: 0, max: 120, default: null },
    gender: { type: String, enum: [...GENDERS, null], default: null },
    survey_id: { type: String, index: true, default: null },
    phone: { type: String, default: null },
    email: { type: String, default: null },
    location: { type: Schema.Types.Mixed, default: null },
    created_at: { type: String },
    updated_at: { type: String },
  },
  { collection: "participants", versionKey: false }
);

const Participant = mongoose.model<IParticipant>("Participant", ParticipantSchema);

export default Participant;
