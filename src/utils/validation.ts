// src/utils/validation.ts

import { ZodError } from "zod";

export interface FieldError {
  field: string;
  message: string;
}

export const toFieldErrors = (error: ZodError): FieldError[] =>
  error.issues.map((issue) => ({
    field: issue.path.join("."),
    message: issue.message,
  }));

// Response body for a request that failed schema validation
export const validationErrorBody = (error: ZodError) => ({
  success: false,
  message: "Validation failed",
  errors: toFieldErrors(error),
});

/**
 * Outcome of a write-side service call. Failures carry the HTTP status the
 * controller should answer with.
 */
export type ServiceResult<T> =
  | { success: true; data: T }
  | { success: false; statusCode: 400 | 404; message: string; errors?: FieldError[] };

export const validationFailure = (errors: FieldError[]): ServiceResult<never> => ({
  success: false,
  statusCode: 400,
  message: "Validation failed",
  errors,
});

/** Drops the keys a partial update left out, so `$set` only touches sent fields. */
export const definedFields = (data: Record<string, unknown>): Record<string, unknown> =>
  Object.fromEntries(Object.entries(data).filter(([, value]) => value !== undefined));
