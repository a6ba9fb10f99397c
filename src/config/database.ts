// src/config/database.ts

import mongoose from "mongoose";
import { getConfig } from "./env";

const connectDB = async (): Promise<typeof mongoose> => {
  const { MONGODB_URI, DB_NAME } = getConfig();
  const conn = await mongoose.connect(MONGODB_URI, { dbName: DB_NAME });
  console.log(`MongoDB connected: ${conn.connection.host}/${DB_NAME}`);
  return conn;
};

export const disconnectDB = async (): Promise<void> => {
  await mongoose.disconnect();
};

export default connectDB;
