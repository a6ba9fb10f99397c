// src/types/migrationTypes.ts

export const QUESTION_TYPES = [
  "mcq",
  "yes_no",
  "text",
  "number",
  "dropdown",
  "multi_select",
] as const;

export type QuestionType = (typeof QUESTION_TYPES)[number];

export const isQuestionType = (value: unknown): value is QuestionType =>
  QUESTION_TYPES.some((type) => type === value);

// Questions whose answer must be one of the offered options
export const CHOICE_QUESTION_TYPES: ReadonlySet<string> = new Set<QuestionType>([
  "mcq",
  "dropdown",
  "multi_select",
  "yes_no",
]);

/** Anything read back from the store before normalization. */
export type LegacyDocument = Record<string, unknown>;

export interface CanonicalOption {
  option_id: string;
  label: string | null;
  value: string | null;
}

export interface CanonicalQuestion {
  question_id: string;
  question_text: string;
  question_type: QuestionType;
  options: CanonicalOption[];
  required: boolean;
  order: number;
  metadata: Record<string, unknown>;
}

export interface CanonicalQuestionSet {
  _id: string;
  survey_id: unknown;
  questions: CanonicalQuestion[];
  created_at: string;
  updated_at: string;
  legacy_id?: unknown;
}

export interface QuestionSetNormalization {
  document: CanonicalQuestionSet;
  needsWrite: boolean;
  // Set when the stored primary key was not a GUID and a new one was minted
  legacyId?: unknown;
}

export interface NormalizedLocation {
  lat: number;
  lng: number;
  accuracy_m: number | null;
}

export interface AnswerValue {
  value_text: string | null;
  value_number: number | null;
}

/**
 * Answers keep every field they arrived with; normalization only adds or
 * overwrites the canonical ones.
 */
export interface NormalizedAnswer extends Record<string, unknown> {
  question_id?: unknown;
  question_type?: unknown;
  option_id?: unknown;
  value_text?: string | null;
  value_number?: number | null;
  legacy?: boolean;
}

export type AnswerOutcome = "skipped" | "fixed" | "legacy" | "unchanged";

export interface ResponseNormalization {
  answers: NormalizedAnswer[];
  outcomes: AnswerOutcome[];
  answersChanged: boolean;
  // Present only when the stored location must be rewritten
  location?: NormalizedLocation;
}

export interface MigrationOptions {
  dry_run: boolean;
  limit?: number;
  survey_id?: string;
}

export interface QuestionMigrationStats {
  scanned: number;
  modified: number;
  skipped: number;
}

export interface ResponseMigrationStats {
  docs: number;
  modified: number;
  answers_scanned: number;
  answers_fixed: number;
  answers_legacy: number;
  answers_skipped: number;
}
