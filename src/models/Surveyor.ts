// src/models/Surveyor.ts

import mongoose from "mongoose";
import { createAccountSchema, IAccount } from "./Account";

const Surveyor = mongoose.model<IAccount>("Surveyor", createAccountSchema("surveyors"));

export default Surveyor;
