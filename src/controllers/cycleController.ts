// src/controllers/cycleController.ts

import { Request, Response } from "express";
import { z } from "zod";
import SurveyCycle, { ISurveyCycle } from "../models/SurveyCycle";
import { makeGuid } from "../utils/guid";
import { definedFields, validationErrorBody } from "../utils/validation";
import { sendServerError } from "./httpErrors";

const cycleFields = {
  survey_id: z
    .string({ required_error: "survey_id is required.", invalid_type_error: "survey_id must be a string." })
    .trim()
    .min(1, "survey_id is required."),
  start_date: z.string({ invalid_type_error: "start_date must be a string." }).nullable(),
  end_date: z.string({ invalid_type_error: "end_date must be a string." }).nullable(),
};

const CycleCreateSchema = z.object({
  survey_id: cycleFields.survey_id,
  start_date: cycleFields.start_date.optional(),
  end_date: cycleFields.end_date.optional(),
});

const CycleUpdateSchema = z.object(cycleFields).partial();

export const handleCreateCycle = async (req: Request, res: Response): Promise<void> => {
  try {
    const parsed = CycleCreateSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json(validationErrorBody(parsed.error));
      return;
    }

    const cycle: ISurveyCycle = {
      _id: makeGuid(),
      survey_id: parsed.data.survey_id,
      start_date: parsed.data.start_date ?? null,
      end_date: parsed.data.end_date ?? null,
    };
    await SurveyCycle.create(cycle);

    res.status(201).json({
      success: true,
      message: "Survey cycle created successfully.",
      data: cycle,
    });
  } catch (error) {
    console.error("Error creating survey cycle:", error);
    sendServerError(res, error);
  }
};

export const handleGetAllCycles = async (req: Request, res: Response): Promise<void> => {
  try {
    const filter = typeof req.query.survey_id === "string" ? { survey_id: req.query.survey_id } : {};
    const cycles = await SurveyCycle.find(filter).lean();
    res.status(200).json({ success: true, data: cycles });
  } catch (error) {
    sendServerError(res, error);
  }
};

export const handleGetCycle = async (req: Request, res: Response): Promise<void> => {
  try {
    const cycle = await SurveyCycle.findOne({ _id: req.params.id }).lean();
    if (!cycle) {
      res.status(404).json({ success: false, message: "Cycle not found" });
      return;
    }
    res.status(200).json({ success: true, data: cycle });
  } catch (error) {
    sendServerError(res, error);
  }
};

export const handleUpdateCycle = async (req: Request, res: Response): Promise<void> => {
  try {
    const parsed = CycleUpdateSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json(validationErrorBody(parsed.error));
      return;
    }
    const updates = definedFields(parsed.data);
    if (Object.keys(updates).length === 0) {
      res.status(400).json({ success: false, message: "No updatable fields provided" });
      return;
    }

    const cycle = await SurveyCycle.findOneAndUpdate(
      { _id: req.params.id },
      { $set: updates },
      { new: true }
    ).lean();
    if (!cycle) {
      res.status(404).json({ success: false, message: "Cycle not found" });
      return;
    }
    res.status(200).json({ success: true, message: "Cycle updated successfully", data: cycle });
  } catch (error) {
    sendServerError(res, error);
  }
};

export const handleDeleteCycle = async (req: Request, res: Response): Promise<void> => {
  try {
    const result = await SurveyCycle.deleteOne({ _id: req.params.id });
    if (result.deletedCount === 0) {
      res.status(404).json({ success: false, message: "Cycle not found" });
      return;
    }
    res.status(200).json({ success: true, message: "Cycle deleted successfully" });
  } catch (error) {
    sendServerError(res, error);
  }
};
