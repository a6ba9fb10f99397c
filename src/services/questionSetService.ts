// src/services/questionSetService.ts

import { z } from "zod";
import QuestionSet from "../models/QuestionSet";
import { LegacyDocument } from "../types/migrationTypes";
import { isGuid, makeGuid } from "../utils/guid";
import { isPlainRecord, normalizeText, pickField, toIntegerOrNull } from "../utils/legacyFields";
import { ServiceResult, toFieldErrors, validationFailure } from "../utils/validation";

// Legacy sets may carry the survey reference under an older key
export const bySurvey = (surveyId: string) => ({
  $or: [{ survey_id: surveyId }, { surveyId }, { survey: surveyId }],
});

const updatedAt = (doc: LegacyDocument): string =>
  typeof doc.updated_at === "string" ? doc.updated_at : "";

/**
 * Picks the set a survey currently answers with. A legacy original whose id
 * was archived by the migration loses to its migrated copy; after that GUID
 * ids win, then the latest `updated_at`.
 */
export function selectCurrentQuestionSet(sets: LegacyDocument[]): LegacyDocument | null {
  const archived = new Set(
    sets
      .map((set) => set.legacy_id)
      .filter((id) => id !== undefined && id !== null)
      .map(String)
  );
  const current = sets
    .filter((set) => !archived.has(String(set._id)))
    .sort(
      (a, b) =>
        Number(isGuid(b._id)) - Number(isGuid(a._id)) || updatedAt(b).localeCompare(updatedAt(a))
    );
  return current[0] ?? null;
}

export async function findCurrentQuestionSet(surveyId: string): Promise<LegacyDocument | null> {
  const sets = await QuestionSet.find(bySurvey(surveyId)).lean<LegacyDocument[]>();
  return selectCurrentQuestionSet(sets);
}

const requiredText = (message: string) =>
  z.string({ required_error: message, invalid_type_error: message }).trim().min(1, message);

const OptionInputSchema = z.object(
  {
    option: requiredText("Option text is required."),
    option_id: z.number().int().nullable(),
  },
  { invalid_type_error: "Each option must be an object." }
);

const QuestionInputSchema = z.object(
  {
    qno: z.number().int().nullable(),
    text: requiredText("text is required and must be a non-empty string."),
    options: z.array(OptionInputSchema, {
      invalid_type_error: "options must be an array (can be empty).",
    }),
  },
  { invalid_type_error: "Each question must be an object." }
);

const QuestionSetInputSchema = z.object({
  questions: z
    .array(QuestionInputSchema, {
      required_error: "questions must be a non-empty array.",
      invalid_type_error: "questions must be a non-empty array.",
    })
    .min(1, "questions must be a non-empty array."),
});

export type QuestionInput = z.infer<typeof QuestionInputSchema>;

export interface QuestionEntry {
  qno: number;
  text: string;
  options: { option_id: number; option: string }[];
}

// Clients send PascalCase or snake/camel keys; fold them before validating
const readOption = (raw: unknown): unknown =>
  isPlainRecord(raw)
    ? {
        option: pickField(raw, ["Option", "option"]),
        option_id: toIntegerOrNull(pickField(raw, ["OptionId", "optionId", "option_id"])),
      }
    : raw;

const readQuestion = (raw: unknown): unknown => {
  if (!isPlainRecord(raw)) return raw;
  const options = pickField(raw, ["Options", "options"]) ?? [];
  return {
    qno: toIntegerOrNull(pickField(raw, ["Qno", "qno"])),
    text: pickField(raw, ["Text", "text"]),
    options: Array.isArray(options) ? options.map(readOption) : options,
  };
};

const highest = (values: (number | null)[]): number =>
  values.reduce<number>((max, value) => (value !== null && value > max ? value : max), 0);

const storedNumber = (entry: unknown, keys: readonly string[]): number | null =>
  toIntegerOrNull(pickField(entry, keys));

/**
 * Fills in missing question numbers and option ids, continuing after the
 * highest one already stored for the survey or given in the same request.
 */
export function assignQuestionNumbers(
  inputs: QuestionInput[],
  existing: unknown[]
): QuestionEntry[] {
  let nextQno: number | undefined;

  return inputs.map((input) => {
    let qno = input.qno;
    if (qno === null) {
      if (nextQno === undefined) {
        nextQno =
          highest([
            ...existing.map((question) => storedNumber(question, ["qno"])),
            ...inputs.map((other) => other.qno),
          ]) + 1;
      }
      qno = nextQno;
      nextQno += 1;
    }

    const stored = existing.find((question) => storedNumber(question, ["qno"]) === qno);
    const storedOptions = pickField(stored, ["options"]);
    let nextOptionId: number | undefined;

    const options = input.options.map((option) => {
      if (option.option_id !== null) {
        return { option_id: option.option_id, option: option.option };
      }
      if (nextOptionId === undefined) {
        nextOptionId =
          highest([
            ...(Array.isArray(storedOptions) ? storedOptions : []).map((option) =>
              storedNumber(option, ["option_id"])
            ),
            ...input.options.map((other) => other.option_id),
          ]) + 1;
      }
      const optionId = nextOptionId;
      nextOptionId += 1;
      return { option_id: optionId, option: option.option };
    });

    return { qno, text: input.text, options };
  });
}

export interface SavedQuestionSet {
  surveyQuestionsId: unknown;
  surveyId: string;
  created: boolean;
}

/**
 * Creates or replaces the question list of one survey. The survey id comes
 * from `surveyId`, `survey_id` or `id`; a new GUID is used when none is given.
 */
export async function saveQuestionSet(
  body: unknown,
  now: () => Date = () => new Date()
): Promise<ServiceResult<SavedQuestionSet>> {
  if (!isPlainRecord(body)) {
    return { success: false, statusCode: 400, message: "Missing JSON body" };
  }

  const surveyId = normalizeText(pickField(body, ["surveyId", "survey_id", "id"])) || makeGuid();
  const rawQuestions = pickField(body, ["Questions", "questions"]);
  const parsed = QuestionSetInputSchema.safeParse({
    questions: Array.isArray(rawQuestions) ? rawQuestions.map(readQuestion) : rawQuestions,
  });
  if (!parsed.success) {
    return validationFailure(toFieldErrors(parsed.error));
  }

  const existing = await findCurrentQuestionSet(surveyId);
  const existingQuestions = existing && Array.isArray(existing.questions) ? existing.questions : [];
  const questions = assignQuestionNumbers(parsed.data.questions, existingQuestions);
  const timestamp = now().toISOString();

  if (existing) {
    await QuestionSet.updateOne(
      { _id: existing._id },
      { $set: { questions, updated_at: timestamp } }
    );
    return { success: true, data: { surveyQuestionsId: existing._id, surveyId, created: false } };
  }

  const id = makeGuid();
  await QuestionSet.create({
    _id: id,
    survey_id: surveyId,
    questions,
    created_at: timestamp,
    updated_at: timestamp,
  });
  return { success: true, data: { surveyQuestionsId: id, surveyId, created: true } };
}
