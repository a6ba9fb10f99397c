// src/scripts/migrationCli.ts

import { Command, InvalidArgumentError } from "commander";
import connectDB, { disconnectDB } from "../config/database";
import { getConfig } from "../config/env";
import { MigrationOptions } from "../types/migrationTypes";

export const parseLimit = (value: string): number => {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("limit must be a positive integer");
  }
  return parsed;
};

interface CliFlags {
  dryRun: boolean;
  limit?: number;
  surveyId?: string;
}

export const toMigrationOptions = (flags: CliFlags): MigrationOptions => ({
  dry_run: flags.dryRun,
  ...(flags.limit !== undefined ? { limit: flags.limit } : {}),
  ...(flags.surveyId ? { survey_id: flags.surveyId } : {}),
});

/**
 * Builds the shared `--dry-run / --limit / --survey-id` command. `migrate`
 * runs between connect and disconnect; a failure sets a non-zero exit code.
 */
export function buildMigrationCommand(
  name: string,
  description: string,
  migrate: (options: MigrationOptions) => Promise<void>
): Command {
  return new Command()
    .name(name)
    .description(description)
    .option("--dry-run", "Preview changes without writing", false)
    .option("--limit <n>", "Scan at most n documents", parseLimit)
    .option("--survey-id <id>", "Only scan documents of this survey")
    .action(async (flags: CliFlags) => {
      const options = toMigrationOptions(flags);
      console.log(`Connecting to: ${getConfig().MONGODB_URI}`);
      try {
        await connectDB();
        await migrate(options);
        console.log("done.");
      } catch (error) {
        console.error("Migration failed:", error);
        process.exitCode = 1;
      } finally {
        await disconnectDB();
      }
    });
}
