// src/routes/responseRoutes.ts

import { Router } from "express";
import {
  handleCreateResponse,
  handleDeleteResponse,
  handleGetAllResponses,
  handleGetResponse,
  handleUpdateResponse,
} from "../controllers/responseController";

const router = Router();

/**
 * @route   GET /api/responses?survey_id=<id>
 * @desc    List responses, optionally for one survey
 */
router.get("/", handleGetAllResponses);

/**
 * @route   POST /api/responses
 * @desc    Record a submitted response, resolving question/option indexes
 */
router.post("/", handleCreateResponse);

router.get("/:responseId", handleGetResponse);

/**
 * @route   PUT /api/responses/:responseId
 * @desc    Replace answers and/or location
 */
router.put("/:responseId", handleUpdateResponse);

router.delete("/:responseId", handleDeleteResponse);

export default router;
