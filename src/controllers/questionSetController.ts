// src/controllers/questionSetController.ts

import { Request, Response } from "express";
import QuestionSet from "../models/QuestionSet";
import {
  bySurvey,
  findCurrentQuestionSet,
  saveQuestionSet,
} from "../services/questionSetService";

/**
 * @desc Accepts `{ surveyId, questions: [{ qno?, text, options: [{ optionId?, option }] }] }`
 */
export const handleCreateQuestionSet = async (
  req: Request,
  res: Response
): Promise<void> => {
  try {
    const result = await saveQuestionSet(req.body);
    if (!result.success) {
      const { statusCode, ...body } = result;
      res.status(statusCode).json(body);
      return;
    }
    res.status(201).json({
      success: true,
      message: "Survey questions created/updated successfully.",
      data: result.data,
    });
  } catch (error) {
    console.error("Error saving survey questions:", error);
    res.status(500).json({
      success: false,
      message: error instanceof Error ? error.message : "Unknown error occurred",
    });
  }
};

export const handleGetAllQuestionSets = async (
  req: Request,
  res: Response
): Promise<void> => {
  try {
    const questionSets = await QuestionSet.find({}).lean();
    res.status(200).json({ success: true, data: questionSets });
  } catch (error) {
    res.status(500).json({
      success: false,
      message: error instanceof Error ? error.message : "Unknown error occurred",
    });
  }
};

export const handleGetQuestionSetBySurvey = async (
  req: Request,
  res: Response
): Promise<void> => {
  try {
    const questionSet = await findCurrentQuestionSet(req.params.surveyId);
    if (!questionSet) {
      res
        .status(404)
        .json({ success: false, message: "Questions not found for this survey" });
      return;
    }
    res.status(200).json({ success: true, data: questionSet });
  } catch (error) {
    res.status(500).json({
      success: false,
      message: error instanceof Error ? error.message : "Unknown error occurred",
    });
  }
};

// Removes the migrated set together with any legacy original left beside it
export const handleDeleteQuestionSet = async (
  req: Request,
  res: Response
): Promise<void> => {
  try {
    const { surveyId } = req.params;
    const result = await QuestionSet.deleteMany(bySurvey(surveyId));
    if (result.deletedCount === 0) {
      res
        .status(404)
        .json({ success: false, message: "Questions not found for this survey" });
      return;
    }
    res.status(200).json({
      success: true,
      message: "Survey questions deleted successfully",
      data: { deletedCount: result.deletedCount },
    });
  } catch (error) {
    res.status(500).json({
      success: false,
      message: error instanceof Error ? error.message : "Unknown error occurred",
    });
  }
};
