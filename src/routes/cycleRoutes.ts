// src/routes/cycleRoutes.ts

import { Router } from "express";
import {
  handleCreateCycle,
  handleDeleteCycle,
  handleGetAllCycles,
  handleGetCycle,
  handleUpdateCycle,
} from "../controllers/cycleController";
import { requireJsonBody } from "../middleware/requestGuards";

const router = Router();

router.post("/", requireJsonBody, handleCreateCycle);

/**
 * @route   GET /api/cycles?survey_id=<id>
 * @desc    List survey cycles, optionally for one survey
 */
router.get("/", handleGetAllCycles);

router.get("/:id", handleGetCycle);

router.put("/:id", requireJsonBody, handleUpdateCycle);

router.delete("/:id", handleDeleteCycle);

export default router;
