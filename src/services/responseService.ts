// src/services/responseService.ts

import SurveyResponse from "../models/SurveyResponse";
import { isQuestionType, LegacyDocument, QUESTION_TYPES } from "../types/migrationTypes";
import { makeGuid } from "../utils/guid";
import {
  isPlainRecord,
  normalizeText,
  pickField,
  toFloatOrNull,
  toIntegerOrNull,
} from "../utils/legacyFields";
import { FieldError, ServiceResult, validationFailure } from "../utils/validation";
import { readSubmittedLocation } from "./locationNormalizer";
import { findCurrentQuestionSet } from "./questionSetService";

const QUESTION_INDEX_KEYS = ["questionIndex", "question_index"];
const OPTION_INDEX_KEYS = ["optionIndex", "option_index"];
const QUESTION_ID_KEYS = ["questionId", "QuestionId", "question_id"];
const OPTION_ID_KEYS = ["optionId", "OptionId", "option_id"];

export type AnswerId = number | string;

/** An answer as recorded at submission time, before any migration. */
export interface SubmittedAnswer {
  question_id: AnswerId | null;
  question_type: string | null;
  option_id: AnswerId | null;
  value: unknown;
  value_text: string | null;
  value_number: number | null;
  rating?: number;
}

const isPresent = (value: unknown): boolean => value !== undefined && value !== null;

// Integers stay numbers; any other non-empty id is kept as text
const toAnswerId = (value: unknown): AnswerId | null => {
  const asInteger = toIntegerOrNull(value);
  if (asInteger !== null) return asInteger;
  const text = normalizeText(value);
  return text ? text : null;
};

const matchesQuestion = (question: unknown, id: unknown): boolean =>
  isPlainRecord(question) &&
  isPresent(id) &&
  (question.qno === id || question.question_id === id);

const optionsOf = (question: unknown): unknown[] => {
  const options = pickField(question, ["options"]);
  return Array.isArray(options) ? options : [];
};

/**
 * Replaces `questionIndex` / `optionIndex` with the ids stored at those
 * positions of the survey's question list. The question id is the stored
 * `qno` when the question has one, else its `question_id`.
 */
export function mapIndexesToIds(
  questions: unknown[],
  answers: unknown[]
): { answers: unknown[]; errors: FieldError[] } {
  const errors: FieldError[] = [];

  const mapped = answers.map((answer, i) => {
    if (!isPlainRecord(answer)) return answer;
    const field = `answers.${i}`;
    const copy: LegacyDocument = { ...answer };
    const questionIndex = pickField(answer, QUESTION_INDEX_KEYS);
    const optionIndex = pickField(answer, OPTION_INDEX_KEYS);
    let question: Record<string, unknown> | undefined;

    if (isPresent(questionIndex)) {
      const index = toIntegerOrNull(questionIndex);
      const found = index === null || index < 0 ? undefined : questions[index];
      if (!isPlainRecord(found)) {
        errors.push({ field, message: "invalid questionIndex" });
      } else {
        question = found;
        const id = "qno" in found ? found.qno : found.question_id;
        if (isPresent(id)) {
          copy.questionId = id;
        } else {
          errors.push({ field, message: "cannot resolve question id for index" });
        }
      }
    }

    if (isPresent(optionIndex)) {
      const index = toIntegerOrNull(optionIndex);
      const questionId = pickField(copy, QUESTION_ID_KEYS);
      const owner = question ?? questions.find((candidate) => matchesQuestion(candidate, questionId));
      if (index === null) {
        errors.push({ field, message: "invalid optionIndex" });
      } else if (owner === undefined) {
        errors.push({ field, message: "cannot resolve optionIndex without question present" });
      } else {
        const options = optionsOf(owner);
        if (index < 0 || index >= options.length) {
          errors.push({ field, message: "optionIndex out of range" });
        } else {
          copy.optionId = pickField(options[index], ["option_id"]);
        }
      }
    }

    return copy;
  });

  return { answers: mapped, errors };
}

const usesIndexes = (answers: unknown[]): boolean =>
  answers.some(
    (answer) =>
      isPresent(pickField(answer, QUESTION_INDEX_KEYS)) ||
      isPresent(pickField(answer, OPTION_INDEX_KEYS))
  );

const readAnswer = (
  answer: unknown,
  i: number,
  errors: FieldError[]
): SubmittedAnswer | undefined => {
  if (!isPlainRecord(answer)) {
    errors.push({ field: `answers.${i}`, message: "Each answer must be an object." });
    return undefined;
  }

  const questionId = toAnswerId(pickField(answer, QUESTION_ID_KEYS));
  const optionId = toAnswerId(pickField(answer, OPTION_ID_KEYS));
  const questionType = pickField(answer, ["questionType", "question_type", "QuestionType"]);
  const value = pickField(answer, ["option", "value", "Option", "Value"]);

  if (questionId === null) {
    errors.push({
      field: `answers.${i}.question_id`,
      message: "questionId/question_id is required (int or GUID).",
    });
  }
  if (isPresent(questionType) && questionType !== "" && !isQuestionType(questionType)) {
    errors.push({
      field: `answers.${i}.question_type`,
      message: `Invalid question_type. Must be one of ${[...QUESTION_TYPES].sort().join(", ")}.`,
    });
  }

  let valueNumber: number | null = null;
  if (typeof value === "boolean") {
    valueNumber = value ? 1 : 0;
  } else if (typeof value === "number" && Number.isFinite(value)) {
    valueNumber = value;
  }

  return {
    question_id: questionId,
    question_type: isQuestionType(questionType) ? questionType : null,
    option_id: optionId,
    value: value ?? null,
    value_text: typeof value === "string" ? value : null,
    value_number: valueNumber,
  };
};

const optionRating = (questions: unknown[], questionId: AnswerId, optionId: AnswerId): number => {
  for (const question of questions) {
    if (!matchesQuestion(question, questionId)) continue;
    const option = optionsOf(question).find(
      (candidate) => pickField(candidate, ["option_id"]) === optionId
    );
    if (option !== undefined) {
      const rating = toFloatOrNull(pickField(option, ["rating"]));
      return rating ?? 0;
    }
  }
  return 0;
};

/**
 * Copies each chosen option's `rating` onto its answer (0 when the option has
 * none) and returns the mean of the positive ratings, or null without any.
 */
export function rateAnswers(
  questions: unknown[],
  answers: SubmittedAnswer[]
): { answers: SubmittedAnswer[]; rating: number | null } {
  let sum = 0;
  let count = 0;
  const rated = answers.map((answer) => {
    if (answer.question_id === null || answer.option_id === null) return answer;
    const rating = optionRating(questions, answer.question_id, answer.option_id);
    if (rating > 0) {
      sum += rating;
      count += 1;
    }
    return { ...answer, rating };
  });
  return { answers: rated, rating: count > 0 ? sum / count : null };
}

const isFilledBody = (body: unknown): body is Record<string, unknown> =>
  isPlainRecord(body) && Object.keys(body).length > 0;

/**
 * Records a submitted response. Answers may reference questions and options
 * by position; those are resolved against the survey's current question set,
 * which also supplies the option ratings.
 */
export async function createResponse(
  body: unknown,
  now: () => Date = () => new Date()
): Promise<ServiceResult<{ response_id: string }>> {
  if (!isFilledBody(body)) {
    return { success: false, statusCode: 400, message: "Missing JSON body" };
  }

  const errors: FieldError[] = [];
  const surveyId = pickField(body, ["surveyId", "survey_id", "SurveyId", "id"]);
  const rawAnswers = pickField(body, ["Answers", "answers"]);
  let answers: unknown[] = Array.isArray(rawAnswers) ? rawAnswers : [];

  if (!surveyId) {
    errors.push({ field: "survey_id", message: "survey_id is required." });
  }

  const location = readSubmittedLocation(pickField(body, ["Location", "location"]) ?? {});
  if (typeof location === "string") {
    errors.push({ field: "location", message: location });
  }

  if (answers.length === 0) {
    errors.push({ field: "answers", message: "answers list is required." });
  }

  const questionSet = surveyId ? await findCurrentQuestionSet(String(surveyId)) : null;
  const storedQuestions = questionSet?.questions;
  const questions = Array.isArray(storedQuestions) ? storedQuestions : [];

  if (usesIndexes(answers)) {
    if (questionSet) {
      const mapped = mapIndexesToIds(questions, answers);
      answers = mapped.answers;
      errors.push(...mapped.errors);
    } else {
      errors.push({
        field: "survey_id",
        message: "questions for survey not found to resolve indexes",
      });
    }
  }

  const submitted: SubmittedAnswer[] = [];
  answers.forEach((answer, i) => {
    const read = readAnswer(answer, i, errors);
    if (read) submitted.push(read);
  });

  if (errors.length > 0 || typeof location === "string") {
    return validationFailure(errors);
  }

  const rated = rateAnswers(questions, submitted);
  const createdAt = now().toISOString();
  const responseId = makeGuid();

  await SurveyResponse.create({
    _id: responseId,
    survey_id: surveyId,
    cycle_id: pickField(body, ["cycleId", "cycle_id", "CycleId"]) ?? null,
    participant_id: pickField(body, ["participantId", "participant_id", "ParticipantId"]) ?? null,
    surveyor_id: pickField(body, ["surveyorId", "surveyor_id", "SurveyorId"]) ?? null,
    status: "submitted",
    timestamp: normalizeText(pickField(body, ["Timestamp", "timestamp"])) || createdAt,
    location,
    answers: rated.answers,
    rating: rated.rating,
    created_at: createdAt,
  });

  return { success: true, data: { response_id: responseId } };
}

/**
 * Replaces the answers and/or location of a stored response and stamps a new
 * `timestamp`. A location without both coordinates is ignored.
 */
export async function updateResponse(
  responseId: string,
  body: unknown,
  now: () => Date = () => new Date()
): Promise<ServiceResult<LegacyDocument>> {
  if (!isFilledBody(body)) {
    return { success: false, statusCode: 400, message: "Missing JSON body" };
  }

  const updates: LegacyDocument = {};
  if ("answers" in body || "Answers" in body) {
    updates.answers = pickField(body, ["answers", "Answers"]);
  }
  if ("location" in body || "Location" in body) {
    const raw = pickField(body, ["location", "Location"]);
    if (isPresent(pickField(raw, ["lat", "latitude"])) && isPresent(pickField(raw, ["lng", "longitude"]))) {
      const location = readSubmittedLocation(raw);
      if (typeof location === "string") {
        return { success: false, statusCode: 400, message: "Invalid location values" };
      }
      updates.location = location;
    }
  }
  updates.timestamp = now().toISOString();

  const updated = await SurveyResponse.findOneAndUpdate(
    { _id: responseId },
    { $set: updates },
    { new: true }
  ).lean<LegacyDocument | null>();
  if (!updated) {
    return { success: false, statusCode: 404, message: "Response not found" };
  }
  return { success: true, data: updated };
}
