// src/scripts/migrateQuestions.ts
//
// Usage: node dist/scripts/migrateQuestions.js [--dry-run] [--limit 50] [--survey-id <id>]

import { MongoQuestionSetStore } from "../services/migrationStore";
import { logMigrationSummary, runQuestionMigration } from "../services/migrationService";
import { buildMigrationCommand } from "./migrationCli";

const program = buildMigrationCommand(
  "migrate-questions",
  "Normalize legacy question sets into the canonical schema",
  async (options) => {
    const stats = await runQuestionMigration(new MongoQuestionSetStore(), options);
    logMigrationSummary("migration summary", stats, options.dry_run);
  }
);

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error("Error running question migration:", error);
  process.exit(1);
});
