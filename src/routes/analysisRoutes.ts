// src/routes/analysisRoutes.ts

import { Router } from "express";
import {
  handleCreateAnalysis,
  handleDeleteAnalysis,
  handleGetAllAnalyses,
  handleGetAnalysis,
  handleUpdateAnalysis,
} from "../controllers/analysisController";
import { requireJsonBody } from "../middleware/requestGuards";

const router = Router();

router.post("/", requireJsonBody, handleCreateAnalysis);

/**
 * @route   GET /api/analysis?survey_id=<id>
 * @desc    List analysis records, optionally for one survey
 */
router.get("/", handleGetAllAnalyses);

router.get("/:id", handleGetAnalysis);

router.put("/:id", requireJsonBody, handleUpdateAnalysis);

router.delete("/:id", handleDeleteAnalysis);

export default router;
