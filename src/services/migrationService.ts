// src/services/migrationService.ts

import { z } from "zod";
import {
  MigrationOptions,
  QuestionMigrationStats,
  ResponseMigrationStats,
} from "../types/migrationTypes";
import { isGuid } from "../utils/guid";
import { DocumentCursor, QuestionSetStore, ResponseStore } from "./migrationStore";
import { QuestionCache, QuestionLookup } from "./questionCache";
import { normalizeQuestionSet } from "./questionNormalizer";
import { normalizeResponse } from "./responseNormalizer";

export const MigrationOptionsSchema = z.object({
  dry_run: z.boolean().default(true),
  limit: z.number().int().positive().optional(),
  survey_id: z.string().min(1).optional(),
});

const modeTag = (options: MigrationOptions): string => (options.dry_run ? "DRY" : "LIVE");

const formatId = (id: unknown): string => {
  if (id === undefined || id === null) return String(id);
  return typeof id === "object" ? JSON.stringify(id) : String(id);
};

/**
 * Runs `visit` over every scanned document and releases the cursor whatever
 * happens. Store errors propagate to the caller.
 */
async function forEachDocument(
  cursor: DocumentCursor,
  visit: (doc: Record<string, unknown>) => Promise<void>
): Promise<void> {
  try {
    for await (const doc of cursor) {
      await visit(doc);
    }
  } finally {
    await cursor.close();
  }
}

export function logMigrationSummary(
  title: string,
  stats: QuestionMigrationStats | ResponseMigrationStats,
  dryRun: boolean
): void {
  console.log(`\n--- ${title} ---`);
  for (const [key, value] of Object.entries(stats)) {
    console.log(`${key}: ${value}`);
  }
  console.log(`dry_run: ${dryRun}`);
}

/**
 * Question sets first: response migration resolves answers against the ids
 * assigned here.
 */
export async function runQuestionMigration(
  store: QuestionSetStore,
  options: MigrationOptions,
  now: () => Date = () => new Date()
): Promise<QuestionMigrationStats> {
  const stats: QuestionMigrationStats = { scanned: 0, modified: 0, skipped: 0 };
  const cursor = store.scan({ surveyId: options.survey_id, limit: options.limit });

  await forEachDocument(cursor, async (doc) => {
    stats.scanned += 1;

    if (!isGuid(doc._id)) {
      const migrated = await store.findByLegacyId(doc._id);
      if (migrated) {
        console.log(
          `[${modeTag(options)}] Skipping doc _id=${formatId(doc._id)} already migrated as ${formatId(migrated._id)}`
        );
        stats.skipped += 1;
        return;
      }
    }

    const { document, needsWrite } = normalizeQuestionSet(doc, now);
    console.log(
      `[${modeTag(options)}] Processing doc _id=${document._id} need_update=${needsWrite}`
    );

    if (!needsWrite) {
      stats.skipped += 1;
      return;
    }
    if (!options.dry_run) {
      await store.upsert(document);
    }
    stats.modified += 1;
  });

  return stats;
}

export async function runResponseMigration(
  store: ResponseStore,
  questions: QuestionLookup,
  options: MigrationOptions
): Promise<ResponseMigrationStats> {
  const stats: ResponseMigrationStats = {
    docs: 0,
    modified: 0,
    answers_scanned: 0,
    answers_fixed: 0,
    answers_legacy: 0,
    answers_skipped: 0,
  };
  const cache = new QuestionCache(questions);
  const cursor = store.scan({ surveyId: options.survey_id, limit: options.limit });

  await forEachDocument(cursor, async (doc) => {
    stats.docs += 1;
    const result = await normalizeResponse(doc, cache);

    for (const outcome of result.outcomes) {
      stats.answers_scanned += 1;
      if (outcome === "fixed") stats.answers_fixed += 1;
      else if (outcome === "legacy") stats.answers_legacy += 1;
      else if (outcome === "skipped") stats.answers_skipped += 1;
    }

    const update: Record<string, unknown> = {};
    if (result.answersChanged) update.answers = result.answers;
    if (result.location) update.location = result.location;
    const changed = Object.keys(update).length > 0;

    if (changed) {
      if (!options.dry_run) {
        await store.update(doc._id, update);
      }
      stats.modified += 1;
    }
    console.log(`[${modeTag(options)}] Doc ${formatId(doc._id)} changed=${changed}`);
  });

  return stats;
}
