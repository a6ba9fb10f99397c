// src/middleware/errorHandler.ts

import { NextFunction, Request, Response } from "express";

// body-parser sets `status`, our own errors set `statusCode`
export interface CustomError extends Error {
  statusCode?: number;
  status?: number;
}

export const errorHandler = (
  err: CustomError,
  req: Request,
  res: Response,
  // Express only treats four-argument middleware as an error handler
  next: NextFunction
): void => {
  console.error(err.stack);

  const statusCode = err.statusCode ?? err.status ?? 500;
  res.status(statusCode).json({
    success: false,
    error: err.message || "Internal Server Error",
    timestamp: new Date().toISOString(),
  });
};

export const notFound = (req: Request, res: Response): void => {
  res.status(404).json({ success: false, message: `Route not found: ${req.originalUrl}` });
};
