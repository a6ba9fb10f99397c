// src/services/questionCache.ts

import { LegacyDocument } from "../types/migrationTypes";

export type QuestionKey = string | number;

export interface QuestionLookup {
  findQuestion(questionId: QuestionKey): Promise<LegacyDocument | null>;
}

/**
 * Memoizes question lookups for a single response migration run, misses
 * included. Build one per run and drop it afterwards.
 */
export class QuestionCache {
  private readonly entries = new Map<QuestionKey, LegacyDocument | null>();
  private lookups = 0;

  constructor(private readonly lookup: QuestionLookup) {}

  async get(questionId: QuestionKey): Promise<LegacyDocument | null> {
    if (this.entries.has(questionId)) {
      return this.entries.get(questionId) ?? null;
    }
    this.lookups += 1;
    const question = await this.lookup.findQuestion(questionId);
    this.entries.set(questionId, question);
    return question;
  }

  get size(): number {
    return this.entries.size;
  }

  get lookupCount(): number {
    return this.lookups;
  }
}
