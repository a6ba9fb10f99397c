// src/routes/participantRoutes.ts

import { Router } from "express";
import {
  handleCreateParticipant,
  handleDeleteParticipant,
  handleGetAllParticipants,
  handleGetParticipant,
  handleUpdateParticipant,
} from "../controllers/participantController";
import { requireGuidParam, requireJsonBody } from "../middleware/requestGuards";

const router = Router();
const participantGuid = requireGuidParam("participantId", "participant_id");

/**
 * @route   POST /api/participants
 * @desc    Register a participant, optionally for a survey
 */
router.post("/", requireJsonBody, handleCreateParticipant);

router.get("/", handleGetAllParticipants);

router.get("/:participantId", participantGuid, handleGetParticipant);

router.put("/:participantId", participantGuid, requireJsonBody, handleUpdateParticipant);

router.delete("/:participantId", participantGuid, handleDeleteParticipant);

export default router;
