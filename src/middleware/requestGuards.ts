// src/middleware/requestGuards.ts

import { NextFunction, Request, Response } from "express";
import { isGuid } from "../utils/guid";
import { isPlainRecord } from "../utils/legacyFields";

export const requireJsonBody = (req: Request, res: Response, next: NextFunction): void => {
  if (isPlainRecord(req.body) && Object.keys(req.body).length > 0) {
    next();
    return;
  }
  res.status(400).json({ success: false, message: "Missing JSON body" });
};

/**
 * Rejects requests whose route parameter is not a GUID, e.g.
 * `requireGuidParam("surveyId", "survey_id")`.
 */
export const requireGuidParam =
  (param: string, label: string) =>
  (req: Request, res: Response, next: NextFunction): void => {
    if (isGuid(req.params[param])) {
      next();
      return;
    }
    res.status(400).json({ success: false, message: `Invalid ${label} (GUID expected).` });
  };
