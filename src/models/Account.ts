// src/models/Account.ts

import { Schema } from "mongoose";
import { makeGuid } from "../utils/guid";

/** Admins and surveyors share one account shape in separate collections. */
export interface IAccount {
  _id: string;
  name: string;
  email: string;
  password: string;
  created_at: string;
  updated_at?: string;
}

export const createAccountSchema = (collection: string) =>
  new Schema<IAccount>(
    {
      _id: { type: String, default: makeGuid },
      name: { type: String, required: true },
      email: {
        type: String,
        required: true,
        unique: true,
        trim: true,
        lowercase: true,
      },
      // Stored as a bcrypt hash, never returned by queries
      password: { type: String, required: true, select: false },
      created_at: { type: String },
      updated_at: { type: String },
    },
    { collection, versionKey: false }
  );
