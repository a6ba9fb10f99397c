// src/services/responseNormalizer.ts

import {
  AnswerOutcome,
  CHOICE_QUESTION_TYPES,
  LegacyDocument,
  NormalizedAnswer,
  ResponseNormalization,
} from "../types/migrationTypes";
import {
  coerceAnswerValue,
  isPlainRecord,
  normalizeForMatch,
  pickFilled,
} from "../utils/legacyFields";
import { isSameLocation, normalizeLocation } from "./locationNormalizer";
import { QuestionCache } from "./questionCache";

const QUESTION_ID_KEYS = ["question_id", "questionId"];

const isSet = (value: unknown): boolean => value !== undefined && value !== null;

const isFilledText = (value: unknown): boolean =>
  isSet(value) && !(typeof value === "string" && value.length === 0);

/**
 * Already normalized: carries a question type and at least one of option id,
 * text value or numeric value.
 */
export const isNormalizedAnswer = (answer: Record<string, unknown>): boolean =>
  isFilledText(answer.question_type) &&
  (isFilledText(answer.option_id) || isSet(answer.value_text) || isSet(answer.value_number));

export function readRawValue(answer: Record<string, unknown>): unknown {
  if (Object.prototype.hasOwnProperty.call(answer, "value")) return answer.value;
  if (Object.prototype.hasOwnProperty.call(answer, "answer")) return answer.answer;
  return undefined;
}

/**
 * Exact case/whitespace-insensitive match on label or value first, then the
 * first option whose label contains the raw value. Declaration order wins.
 */
export function matchOption(
  question: LegacyDocument | null,
  rawValue: unknown
): Record<string, unknown> | null {
  if (!question || !Array.isArray(question.options)) return null;
  const options = question.options.filter(isPlainRecord);
  const needle = normalizeForMatch(rawValue);
  if (needle === null) return null;

  const exact = options.find(
    (option) =>
      normalizeForMatch(option.label) === needle || normalizeForMatch(option.value) === needle
  );
  if (exact) return exact;

  if (!needle) return null;
  return (
    options.find((option) => {
      const label = normalizeForMatch(option.label);
      return !!label && label.includes(needle);
    }) ?? null
  );
}

const CANONICAL_ANSWER_FIELDS = [
  "question_type",
  "option_id",
  "value_text",
  "value_number",
  "legacy",
] as const;

const differs = (before: Record<string, unknown>, after: Record<string, unknown>): boolean =>
  CANONICAL_ANSWER_FIELDS.some((field) => before[field] !== after[field]);

interface AnswerResult {
  answer: NormalizedAnswer;
  outcome: AnswerOutcome;
  changed: boolean;
}

const flagLegacy = (before: Record<string, unknown>, answer: NormalizedAnswer): AnswerResult => {
  answer.legacy = true;
  return { answer, outcome: "legacy", changed: differs(before, answer) };
};

export async function normalizeAnswer(entry: unknown, cache: QuestionCache): Promise<AnswerResult> {
  if (!isPlainRecord(entry)) {
    // Bare values cannot carry a question reference
    return { answer: { value: entry, legacy: true }, outcome: "legacy", changed: true };
  }
  if (isNormalizedAnswer(entry)) {
    return { answer: { ...entry }, outcome: "skipped", changed: false };
  }

  const answer: NormalizedAnswer = { ...entry };
  const questionId = pickFilled(answer, QUESTION_ID_KEYS);
  const rawValue = readRawValue(answer);

  if (typeof questionId !== "string" && typeof questionId !== "number") {
    return flagLegacy(entry, answer);
  }

  const question = await cache.get(questionId);
  if (!question) {
    return flagLegacy(entry, answer);
  }

  if (!isFilledText(answer.question_type)) {
    answer.question_type = question.question_type;
  }

  const questionType = answer.question_type;
  const values = coerceAnswerValue(rawValue);

  if (typeof questionType === "string" && CHOICE_QUESTION_TYPES.has(questionType)) {
    if (!isFilledText(answer.option_id)) {
      const matched = values ? matchOption(question, rawValue) : null;
      if (!matched) {
        return flagLegacy(entry, answer);
      }
      answer.option_id = matched.option_id;
    }
    if (values) {
      answer.value_text = values.value_text;
      answer.value_number = values.value_number;
    }
  } else {
    if (!values) {
      return flagLegacy(entry, answer);
    }
    answer.value_text = values.value_text;
    answer.value_number = values.value_number;
  }

  delete answer.legacy;
  const changed = differs(entry, answer);
  return { answer, outcome: changed ? "fixed" : "unchanged", changed };
}

/**
 * Rewrites every answer of one response and reshapes its location. The
 * returned `location` is set only when the stored one has to be replaced.
 */
export async function normalizeResponse(
  doc: LegacyDocument,
  cache: QuestionCache
): Promise<ResponseNormalization> {
  const rawAnswers = Array.isArray(doc.answers) ? doc.answers : [];
  const answers: NormalizedAnswer[] = [];
  const outcomes: AnswerOutcome[] = [];
  let answersChanged = false;

  for (const entry of rawAnswers) {
    const result = await normalizeAnswer(entry, cache);
    answers.push(result.answer);
    outcomes.push(result.outcome);
    answersChanged = answersChanged || result.changed;
  }

  const location = normalizeLocation(doc.location);
  return {
    answers,
    outcomes,
    answersChanged,
    ...(location && !isSameLocation(doc.location, location) ? { location } : {}),
  };
}
