// src/config/env.ts

import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const envSchema = z.object({
  MONGODB_URI: z.string().min(1).default("mongodb://localhost:27017"),
  DB_NAME: z.string().min(1).default("SurveyAPI"),
  QUESTIONS_COL: z.string().min(1).default("questions"),
  RESPONSES_COL: z.string().min(1).default("responses"),
  PORT: z.coerce.number().int().positive().default(5000),
  MIGRATION_BATCH_SIZE: z.coerce.number().int().positive().default(100),
});

export type AppConfig = Readonly<z.infer<typeof envSchema>>;

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

/**
 * Validates the given environment (process.env by default). Every bad key is
 * reported at once.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }
  return Object.freeze(parsed.data);
}

let cached: AppConfig | undefined;

export const getConfig = (): AppConfig => {
  if (!cached) cached = loadConfig();
  return cached;
};
