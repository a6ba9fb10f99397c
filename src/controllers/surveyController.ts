// src/controllers/surveyController.ts

import { Request, Response } from "express";
import { z } from "zod";
import Participant from "../models/Participant";
import Survey, { ISurvey } from "../models/Survey";
import { findCurrentQuestionSet } from "../services/questionSetService";
import { GUID_PATTERN, makeGuid } from "../utils/guid";
import { definedFields, validationErrorBody } from "../utils/validation";
import { sendServerError } from "./httpErrors";

const TITLE_REQUIRED = "title is required and must be a non-empty string.";

const guid = (message: string) =>
  z.string({ invalid_type_error: message }).regex(GUID_PATTERN, message);

const count = (field: string) =>
  z.coerce
    .number({ invalid_type_error: `${field} must be an integer.` })
    .int(`${field} must be an integer.`);

const SurveyCreateSchema = z.object({
  title: z
    .string({ required_error: TITLE_REQUIRED, invalid_type_error: TITLE_REQUIRED })
    .trim()
    .min(1, TITLE_REQUIRED),
  description: z
    .string()
    .nullish()
    .transform((value) => value ?? ""),
  created_by: guid("created_by must be a GUID if provided.").nullish(),
  participant_count: count("participant_count").default(0),
  question_count: count("question_count").default(0),
});

const SurveyUpdateSchema = z
  .object({
    title: z
      .string({ invalid_type_error: "title must be a non-empty string." })
      .trim()
      .min(1, "title must be a non-empty string."),
    description: z
      .string()
      .nullable()
      .transform((value) => value ?? ""),
    created_by: guid("created_by must be a GUID."),
    participant_count: count("participant_count"),
    question_count: count("question_count"),
  })
  .partial();

/**
 * @desc Accepts `{ title, description?, created_by?, participant_count?, question_count? }`
 */
export const handleCreateSurvey = async (req: Request, res: Response): Promise<void> => {
  try {
    const parsed = SurveyCreateSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json(validationErrorBody(parsed.error));
      return;
    }

    const now = new Date().toISOString();
    const survey: ISurvey = {
      ...parsed.data,
      _id: makeGuid(),
      created_by: parsed.data.created_by ?? null,
      created_at: now,
      updated_at: now,
    };
    await Survey.create(survey);

    res.status(201).json({
      success: true,
      message: "Survey created successfully.",
      data: { survey_id: survey._id },
    });
  } catch (error) {
    console.error("Error creating survey:", error);
    sendServerError(res, error);
  }
};

export const handleGetAllSurveys = async (req: Request, res: Response): Promise<void> => {
  try {
    const surveys = await Survey.find({}).lean();
    res.status(200).json({ success: true, data: surveys });
  } catch (error) {
    sendServerError(res, error);
  }
};

export const handleGetSurvey = async (req: Request, res: Response): Promise<void> => {
  try {
    const survey = await Survey.findOne({ _id: req.params.surveyId }).lean();
    if (!survey) {
      res.status(404).json({ success: false, message: "Survey not found" });
      return;
    }
    res.status(200).json({ success: true, data: survey });
  } catch (error) {
    sendServerError(res, error);
  }
};

export const handleUpdateSurvey = async (req: Request, res: Response): Promise<void> => {
  try {
    const parsed = SurveyUpdateSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json(validationErrorBody(parsed.error));
      return;
    }
    const updates = definedFields(parsed.data);
    if (Object.keys(updates).length === 0) {
      res.status(400).json({ success: false, message: "No updatable fields provided" });
      return;
    }

    const survey = await Survey.findOneAndUpdate(
      { _id: req.params.surveyId },
      { $set: { ...updates, updated_at: new Date().toISOString() } },
      { new: true }
    ).lean();
    if (!survey) {
      res.status(404).json({ success: false, message: "Survey not found" });
      return;
    }
    res.status(200).json({ success: true, message: "Survey updated", data: survey });
  } catch (error) {
    sendServerError(res, error);
  }
};

export const handleDeleteSurvey = async (req: Request, res: Response): Promise<void> => {
  try {
    const result = await Survey.deleteOne({ _id: req.params.surveyId });
    if (result.deletedCount === 0) {
      res.status(404).json({ success: false, message: "Survey not found" });
      return;
    }
    res.status(200).json({ success: true, message: "Survey deleted successfully" });
  } catch (error) {
    sendServerError(res, error);
  }
};

/**
 * @desc Recounts questions from the survey's current question set and
 * participants registered for the survey
 */
export const handleRecalculateCounts = async (req: Request, res: Response): Promise<void> => {
  try {
    const { surveyId } = req.params;
    const [questionSet, participantCount] = await Promise.all([
      findCurrentQuestionSet(surveyId),
      Participant.countDocuments({ survey_id: surveyId }),
    ]);
    const questions = questionSet?.questions;

    const survey = await Survey.findOneAndUpdate(
      { _id: surveyId },
      {
        $set: {
          question_count: Array.isArray(questions) ? questions.length : 0,
          participant_count: participantCount,
          updated_at: new Date().toISOString(),
        },
      },
      { new: true }
    ).lean();
    if (!survey) {
      res.status(404).json({ success: false, message: "Survey not found" });
      return;
    }
    res.status(200).json({ success: true, message: "Counts recalculated", data: survey });
  } catch (error) {
    sendServerError(res, error);
  }
};
