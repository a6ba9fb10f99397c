// src/controllers/migrationController.ts

import { Request, Response } from "express";
import { MongoQuestionSetStore, MongoResponseStore } from "../services/migrationStore";
import {
  MigrationOptionsSchema,
  runQuestionMigration,
  runResponseMigration,
} from "../services/migrationService";
import { MigrationOptions } from "../types/migrationTypes";
import { toFieldErrors } from "../utils/validation";

/**
 * Parses the request body into migration options. Writes a 400 and returns
 * null when the body is invalid.
 */
const parseOptions = (req: Request, res: Response): MigrationOptions | null => {
  const parsed = MigrationOptionsSchema.safeParse(req.body ?? {});
  if (!parsed.success) {
    res.status(400).json({
      success: false,
      message: "Invalid migration options",
      errors: toFieldErrors(parsed.error),
    });
    return null;
  }
  return parsed.data;
};

/**
 * @desc Dry run unless the body says `{ "dry_run": false }`
 */
export const handleQuestionMigration = async (
  req: Request,
  res: Response
): Promise<void> => {
  const options = parseOptions(req, res);
  if (!options) return;
  try {
    const stats = await runQuestionMigration(new MongoQuestionSetStore(), options);
    res.status(200).json({ success: true, data: { dry_run: options.dry_run, stats } });
  } catch (error) {
    console.error("Error running question migration:", error);
    res.status(500).json({
      success: false,
      message: error instanceof Error ? error.message : "Unknown error occurred",
    });
  }
};

export const handleResponseMigration = async (
  req: Request,
  res: Response
): Promise<void> => {
  const options = parseOptions(req, res);
  if (!options) return;
  try {
    const stats = await runResponseMigration(
      new MongoResponseStore(),
      new MongoQuestionSetStore(),
      options
    );
    res.status(200).json({ success: true, data: { dry_run: options.dry_run, stats } });
  } catch (error) {
    console.error("Error running response migration:", error);
    res.status(500).json({
      success: false,
      message: error instanceof Error ? error.message : "Unknown error occurred",
    });
  }
};
