// src/controllers/analysisController.ts

import { Request, Response } from "express";
import { z } from "zod";
import SurveyAnalysis, { ISurveyAnalysis } from "../models/SurveyAnalysis";
import { makeGuid } from "../utils/guid";
import { definedFields, validationErrorBody } from "../utils/validation";
import { sendServerError } from "./httpErrors";

const analysisFields = {
  survey_id: z
    .string({ required_error: "survey_id is required.", invalid_type_error: "survey_id must be a string." })
    .trim()
    .min(1, "survey_id is required."),
  cycle: z.coerce
    .number({ invalid_type_error: "cycle must be a positive integer." })
    .int("cycle must be a positive integer.")
    .positive("cycle must be a positive integer."),
  map_pins: z.array(z.unknown(), { invalid_type_error: "map_pins must be an array." }),
  summary: z.string({ invalid_type_error: "summary must be a string." }),
};

const AnalysisCreateSchema = z.object({
  survey_id: analysisFields.survey_id,
  cycle: analysisFields.cycle.default(1),
  map_pins: analysisFields.map_pins.default([]),
  summary: analysisFields.summary.default(""),
});

const AnalysisUpdateSchema = z.object(analysisFields).partial();

/**
 * @desc Accepts `{ survey_id, cycle = 1, map_pins = [], summary = "" }`
 */
export const handleCreateAnalysis = async (req: Request, res: Response): Promise<void> => {
  try {
    const parsed = AnalysisCreateSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json(validationErrorBody(parsed.error));
      return;
    }

    const analysis: ISurveyAnalysis = { _id: makeGuid(), ...parsed.data };
    await SurveyAnalysis.create(analysis);

    res.status(201).json({
      success: true,
      message: "Analysis created successfully.",
      data: analysis,
    });
  } catch (error) {
    console.error("Error creating analysis:", error);
    sendServerError(res, error);
  }
};

export const handleGetAllAnalyses = async (req: Request, res: Response): Promise<void> => {
  try {
    const filter = typeof req.query.survey_id === "string" ? { survey_id: req.query.survey_id } : {};
    const analyses = await SurveyAnalysis.find(filter).lean();
    res.status(200).json({ success: true, data: analyses });
  } catch (error) {
    sendServerError(res, error);
  }
};

export const handleGetAnalysis = async (req: Request, res: Response): Promise<void> => {
  try {
    const analysis = await SurveyAnalysis.findOne({ _id: req.params.id }).lean();
    if (!analysis) {
      res.status(404).json({ success: false, message: "Analysis not found" });
      return;
    }
    res.status(200).json({ success: true, data: analysis });
  } catch (error) {
    sendServerError(res, error);
  }
};

export const handleUpdateAnalysis = async (req: Request, res: Response): Promise<void> => {
  try {
    const parsed = AnalysisUpdateSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json(validationErrorBody(parsed.error));
      return;
    }
    const updates = definedFields(parsed.data);
    if (Object.keys(updates).length === 0) {
      res.status(400).json({ success: false, message: "No updatable fields provided" });
      return;
    }

    const analysis = await SurveyAnalysis.findOneAndUpdate(
      { _id: req.params.id },
      { $set: updates },
      { new: true }
    ).lean();
    if (!analysis) {
      res.status(404).json({ success: false, message: "Analysis not found" });
      return;
    }
    res.status(200).json({ success: true, message: "Analysis updated successfully", data: analysis });
  } catch (error) {
    sendServerError(res, error);
  }
};

export const handleDeleteAnalysis = async (req: Request, res: Response): Promise<void> => {
  try {
    const result = await SurveyAnalysis.deleteOne({ _id: req.params.id });
    if (result.deletedCount === 0) {
      res.status(404).json({ success: false, message: "Analysis not found" });
      return;
    }
    res.status(200).json({ success: true, message: "Analysis deleted successfully" });
  } catch (error) {
    sendServerError(res, error);
  }
};
