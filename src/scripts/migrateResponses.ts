// src/scripts/migrateResponses.ts
//
// Run after migrateQuestions: answers are resolved against canonical question ids.
// Usage: node dist/scripts/migrateResponses.js [--dry-run] [--limit 50] [--survey-id <id>]

import { MongoQuestionSetStore, MongoResponseStore } from "../services/migrationStore";
import { logMigrationSummary, runResponseMigration } from "../services/migrationService";
import { buildMigrationCommand } from "./migrationCli";

const program = buildMigrationCommand(
  "migrate-responses",
  "Normalize response answers and locations against canonical questions",
  async (options) => {
    const stats = await runResponseMigration(
      new MongoResponseStore(),
      new MongoQuestionSetStore(),
      options
    );
    logMigrationSummary("summary", stats, options.dry_run);
  }
);

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error("Error running response migration:", error);
  process.exit(1);
});
