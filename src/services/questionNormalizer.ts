// src/services/questionNormalizer.ts

import {
  CanonicalOption,
  CanonicalQuestion,
  LegacyDocument,
  isQuestionType,
  QuestionSetNormalization,
  QuestionType,
} from "../types/migrationTypes";
import { claimGuid, isGuid, makeGuid } from "../utils/guid";
import {
  isPlainRecord,
  normalizeText,
  pickDefined,
  pickField,
  pickFilled,
  toIntegerOrNull,
} from "../utils/legacyFields";

// Legacy key spellings, highest priority first
const SURVEY_ID_KEYS = ["survey_id", "surveyId", "survey"];
const QUESTION_LIST_KEYS = ["questions", "question", "qs"];
const QUESTION_ID_KEYS = ["question_id", "questionId"];
const QUESTION_TEXT_KEYS = ["question_text", "text", "label", "q"];
const QUESTION_TYPE_KEYS = ["question_type", "type"];
const OPTION_LIST_KEYS = ["options", "choices", "opts"];
const ORDER_KEYS = ["order", "qno"];
const OPTION_ID_KEYS = ["option_id", "optionId", "id"];
const OPTION_LABEL_KEYS = ["label", "option", "text", "value"];

/** A legacy question entry, resolved once from whatever shape was stored. */
export type LegacyQuestionEntry =
  | { kind: "record"; fields: Record<string, unknown> }
  | { kind: "text"; text: string }
  | { kind: "scalar"; value: unknown };

export function classifyQuestionEntry(entry: unknown): LegacyQuestionEntry {
  if (isPlainRecord(entry)) return { kind: "record", fields: entry };
  if (typeof entry === "string") return { kind: "text", text: entry };
  return { kind: "scalar", value: entry };
}


/**
 * Options present => mcq, otherwise text.
 */
export const inferQuestionType = (rawOptions: unknown): QuestionType =>
  Array.isArray(rawOptions) && rawOptions.length > 0 ? "mcq" : "text";

const toRequired = (value: unknown): boolean =>
  value === true || value === 1 || (typeof value === "string" && value.trim().toLowerCase() === "true");

interface OptionResult {
  option: CanonicalOption;
  minted: boolean;
}

/**
 * Accepts `{ option_id, label }`, `{ optionId: 1, option: "Yes" }`, a bare
 * string or any other scalar. Returns null for entries with nothing to keep.
 */
export function normalizeOption(raw: unknown, seenIds: Set<string>): OptionResult | null {
  if (raw === undefined || raw === null) return null;

  if (isPlainRecord(raw)) {
    const label = normalizeText(pickFilled(raw, OPTION_LABEL_KEYS));
    const value = normalizeText(pickFilled(raw, ["value"])) ?? label;
    const { id, minted } = claimGuid(pickFilled(raw, OPTION_ID_KEYS), seenIds);
    return { option: { option_id: id, label, value }, minted };
  }

  const text = normalizeText(raw);
  const { id } = claimGuid(undefined, seenIds);
  return { option: { option_id: id, label: text, value: text }, minted: true };
}

interface QuestionResult {
  question: CanonicalQuestion;
  idsMinted: boolean;
}

function normalizeQuestion(
  entry: LegacyQuestionEntry,
  position: number,
  seenQuestionIds: Set<string>
): QuestionResult {
  if (entry.kind !== "record") {
    const text = entry.kind === "text" ? entry.text : normalizeText(entry.value) ?? "";
    return {
      question: {
        question_id: claimGuid(undefined, seenQuestionIds).id,
        question_text: text.trim(),
        question_type: "text",
        options: [],
        required: false,
        order: position,
        metadata: {},
      },
      idsMinted: true,
    };
  }

  const { fields } = entry;
  const rawOptions = pickFilled(fields, OPTION_LIST_KEYS);
  const explicitType = pickFilled(fields, QUESTION_TYPE_KEYS);

  let idsMinted = false;
  const options: CanonicalOption[] = [];
  const seenOptionIds = new Set<string>();
  if (Array.isArray(rawOptions)) {
    for (const rawOption of rawOptions) {
      const result = normalizeOption(rawOption, seenOptionIds);
      if (!result) continue;
      options.push(result.option);
      idsMinted = idsMinted || result.minted;
    }
  }

  const claimed = claimGuid(pickField(fields, QUESTION_ID_KEYS), seenQuestionIds);
  const metadata = pickField(fields, ["metadata"]);

  return {
    question: {
      question_id: claimed.id,
      question_text: normalizeText(pickFilled(fields, QUESTION_TEXT_KEYS)) ?? "",
      question_type: isQuestionType(explicitType) ? explicitType : inferQuestionType(rawOptions),
      options,
      required: toRequired(pickField(fields, ["required"])),
      order: toIntegerOrNull(pickDefined(fields, ORDER_KEYS)) ?? position,
      metadata: isPlainRecord(metadata) ? metadata : {},
    },
    idsMinted: idsMinted || claimed.minted,
  };
}

const CANONICAL_QUESTION_FIELDS = [
  "question_id",
  "question_text",
  "question_type",
  "required",
  "order",
] as const;

const CANONICAL_OPTION_FIELDS = ["option_id", "label", "value"] as const;

function isStoredAs(stored: unknown, question: CanonicalQuestion): boolean {
  if (!isPlainRecord(stored) || !isPlainRecord(stored.metadata)) return false;
  if (CANONICAL_QUESTION_FIELDS.some((field) => stored[field] !== question[field])) {
    return false;
  }
  const storedOptions = stored.options;
  return (
    Array.isArray(storedOptions) &&
    storedOptions.length === question.options.length &&
    question.options.every((option, index) => {
      const storedOption = storedOptions[index];
      return (
        isPlainRecord(storedOption) &&
        CANONICAL_OPTION_FIELDS.every((field) => storedOption[field] === option[field])
      );
    })
  );
}

/**
 * True when `doc.questions` already holds exactly these questions under their
 * canonical keys. Ids found under `questionId`/`optionId`/`id`, lists under
 * `qs`/`question`/`choices` and legacy type names all fail this check.
 */
export function hasCanonicalQuestions(doc: LegacyDocument, questions: CanonicalQuestion[]): boolean {
  const stored = doc.questions;
  return (
    Array.isArray(stored) &&
    stored.length === questions.length &&
    questions.every((question, index) => isStoredAs(stored[index], question))
  );
}

/**
 * Rewrites one legacy question set into canonical shape. A write is needed
 * when an identifier had to be minted, a field had to move, or the stored
 * questions differ from their canonical form, so a second pass over its own
 * output reports no change.
 */
export function normalizeQuestionSet(
  doc: LegacyDocument,
  now: () => Date = () => new Date()
): QuestionSetNormalization {
  let needsWrite = false;
  let legacyId: unknown;

  let id: string;
  if (isGuid(doc._id)) {
    id = doc._id;
  } else {
    id = makeGuid();
    legacyId = doc._id;
    needsWrite = true;
  }

  // A non-GUID survey reference is a foreign key we cannot rewrite, only relocate
  const surveyId = pickFilled(doc, SURVEY_ID_KEYS);
  if (surveyId !== undefined && doc.survey_id !== surveyId) {
    needsWrite = true;
  }

  const rawQuestions = pickFilled(doc, QUESTION_LIST_KEYS);
  const seenQuestionIds = new Set<string>();
  const questions: CanonicalQuestion[] = [];
  if (Array.isArray(rawQuestions)) {
    rawQuestions.forEach((rawQuestion, index) => {
      const result = normalizeQuestion(classifyQuestionEntry(rawQuestion), index + 1, seenQuestionIds);
      questions.push(result.question);
      needsWrite = needsWrite || result.idsMinted;
    });
  }

  needsWrite = needsWrite || !hasCanonicalQuestions(doc, questions);

  const timestamp = now().toISOString();
  const createdAt = pickFilled(doc, ["created_at"]);

  return {
    document: {
      _id: id,
      survey_id: surveyId ?? null,
      questions,
      created_at:
        typeof createdAt === "string"
          ? createdAt
          : createdAt instanceof Date
            ? createdAt.toISOString()
            : timestamp,
      updated_at: timestamp,
      ...(legacyId !== undefined ? { legacy_id: legacyId } : {}),
    },
    needsWrite,
    legacyId,
  };
}
