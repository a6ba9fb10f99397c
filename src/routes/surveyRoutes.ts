// src/routes/surveyRoutes.ts

import { Router } from "express";
import {
  handleCreateSurvey,
  handleDeleteSurvey,
  handleGetAllSurveys,
  handleGetSurvey,
  handleRecalculateCounts,
  handleUpdateSurvey,
} from "../controllers/surveyController";
import { requireGuidParam, requireJsonBody } from "../middleware/requestGuards";

const router = Router();
const surveyGuid = requireGuidParam("surveyId", "survey_id");

/**
 * @route   POST /api/surveys
 * @desc    Create a survey
 */
router.post("/", requireJsonBody, handleCreateSurvey);

router.get("/", handleGetAllSurveys);

router.get("/:surveyId", surveyGuid, handleGetSurvey);

router.put("/:surveyId", surveyGuid, requireJsonBody, handleUpdateSurvey);

router.delete("/:surveyId", surveyGuid, handleDeleteSurvey);

/**
 * @route   POST /api/surveys/:surveyId/recalculate_counts
 * @desc    Refresh question_count and participant_count from stored data
 */
router.post("/:surveyId/recalculate_counts", surveyGuid, handleRecalculateCounts);

export default router;
