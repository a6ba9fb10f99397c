// src/controllers/httpErrors.ts

import { Response } from "express";

export const sendServerError = (res: Response, error: unknown): void => {
  res.status(500).json({
    success: false,
    message: error instanceof Error ? error.message : "Unknown error occurred",
  });
};
