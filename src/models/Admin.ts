// src/models/Admin.ts

import mongoose from "mongoose";
import { createAccountSchema, IAccount } from "./Account";

const Admin = mongoose.model<IAccount>("Admin", createAccountSchema("admins"));

export default Admin;
