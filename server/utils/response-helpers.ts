/**
 * Response helper utilities for standardizing API responses.
 *
 * Success bodies are `{ success: true, ...payload }`; error bodies are
 * `{ success: false, error: { code, message, details? } }`.
 */

import type { Response } from "express";

export type ErrorCode =
  | "VALIDATION_ERROR"
  | "INVALID_BASE64"
  | "FILE_TOO_LARGE"
  | "INVALID_OPERATION"
  | "INVALID_DOCUMENT"
  | "PROCESSING_FAILED";

export interface ApiErrorBody {
  success: false;
  error: {
    code: ErrorCode;
    message: string;
    details?: Record<string, unknown>;
  };
}

/**
 * Send a successful JSON response.
 *
 * @example
 * jsonSuccess(res, { result, format: "json" });
 */
export function jsonSuccess<T extends object>(res: Response, payload: T, status: number = 200): void {
  res.status(status).json({ success: true, ...payload });
}

/**
 * Send an error JSON response.
 *
 * @example
 * jsonError(res, "INVALID_BASE64", "Invalid base64 data");
 * jsonError(res, "INVALID_DOCUMENT", "Invalid or corrupted PDF file", 422);
 */
export function jsonError(
  res: Response,
  code: ErrorCode,
  message: string,
  status: number = 400,
  details?: Record<string, unknown>
): void {
  const body: ApiErrorBody = {
    success: false,
    error: details ? { code, message, details } : { code, message },
  };
  res.status(status).json(body);
}

export function jsonValidationError(res: Response, message: string): void {
  jsonError(res, "VALIDATION_ERROR", message, 400);
}
