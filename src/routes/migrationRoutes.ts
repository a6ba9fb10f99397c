// src/routes/migrationRoutes.ts

import { Router } from "express";
import {
  handleQuestionMigration,
  handleResponseMigration,
} from "../controllers/migrationController";

const router = Router();

/**
 * @route   POST /api/migrations/questions
 * @desc    Normalize question sets. Body: { dry_run?, limit?, survey_id? }
 */
router.post("/questions", handleQuestionMigration);

/**
 * @route   POST /api/migrations/responses
 * @desc    Normalize response answers and locations; run after /questions
 */
router.post("/responses", handleResponseMigration);

export default router;
