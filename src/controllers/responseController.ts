// src/controllers/responseController.ts

import { Request, Response } from "express";
import SurveyResponse from "../models/SurveyResponse";
import { createResponse, updateResponse } from "../services/responseService";

/**
 * @desc Accepts `{ surveyId, cycleId?, participantId?, surveyorId?, location, answers }`.
 * Answers may name questions and options by `questionIndex` / `optionIndex`.
 */
export const handleCreateResponse = async (
  req: Request,
  res: Response
): Promise<void> => {
  try {
    const result = await createResponse(req.body);
    if (!result.success) {
      const { statusCode, ...body } = result;
      res.status(statusCode).json(body);
      return;
    }
    res.status(201).json({
      success: true,
      message: "Response recorded successfully.",
      data: result.data,
    });
  } catch (error) {
    console.error("Error recording response:", error);
    res.status(500).json({
      success: false,
      message: error instanceof Error ? error.message : "Unknown error occurred",
    });
  }
};

export const handleUpdateResponse = async (
  req: Request,
  res: Response
): Promise<void> => {
  try {
    const result = await updateResponse(req.params.responseId, req.body);
    if (!result.success) {
      const { statusCode, ...body } = result;
      res.status(statusCode).json(body);
      return;
    }
    res.status(200).json({
      success: true,
      message: "Response updated successfully",
      data: result.data,
    });
  } catch (error) {
    res.status(500).json({
      success: false,
      message: error instanceof Error ? error.message : "Unknown error occurred",
    });
  }
};

export const handleGetAllResponses = async (
  req: Request,
  res: Response
): Promise<void> => {
  try {
    const filter = typeof req.query.survey_id === "string" ? { survey_id: req.query.survey_id } : {};
    const responses = await SurveyResponse.find(filter).lean();
    res.status(200).json({ success: true, data: responses });
  } catch (error) {
    res.status(500).json({
      success: false,
      message: error instanceof Error ? error.message : "Unknown error occurred",
    });
  }
};

export const handleGetResponse = async (
  req: Request,
  res: Response
): Promise<void> => {
  try {
    const response = await SurveyResponse.findOne({ _id: req.params.responseId }).lean();
    if (!response) {
      res.status(404).json({ success: false, message: "Response not found" });
      return;
    }
    res.status(200).json({ success: true, data: response });
  } catch (error) {
    res.status(500).json({
      success: false,
      message: error instanceof Error ? error.message : "Unknown error occurred",
    });
  }
};

export const handleDeleteResponse = async (
  req: Request,
  res: Response
): Promise<void> => {
  try {
    const result = await SurveyResponse.deleteOne({ _id: req.params.responseId });
    if (result.deletedCount === 0) {
      res.status(404).json({ success: false, message: "Response not found" });
      return;
    }
    res.status(200).json({ success: true, message: "Response deleted successfully" });
  } catch (error) {
    res.status(500).json({
      success: false,
      message: error instanceof Error ? error.message : "Unknown error occurred",
    });
  }
};
