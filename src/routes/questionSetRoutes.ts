// src/routes/questionSetRoutes.ts

import { Router } from "express";
import {
  handleCreateQuestionSet,
  handleDeleteQuestionSet,
  handleGetAllQuestionSets,
  handleGetQuestionSetBySurvey,
} from "../controllers/questionSetController";

const router = Router();

/**
 * @route   GET /api/questions
 * @desc    List every question set
 */
router.get("/", handleGetAllQuestionSets);

/**
 * @route   POST /api/questions
 * @desc    Create or replace the question list of a survey
 */
router.post("/", handleCreateQuestionSet);

/**
 * @route   GET /api/questions/:surveyId
 * @desc    Get the question set of one survey
 */
router.get("/:surveyId", handleGetQuestionSetBySurvey);

/**
 * @route   DELETE /api/questions/:surveyId
 */
router.delete("/:surveyId", handleDeleteQuestionSet);

export default router;
