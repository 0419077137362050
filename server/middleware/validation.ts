/**
 * Validation middleware for Express routes.
 *
 * Provides reusable validation functions for common patterns:
 * - Uploaded file presence
 * - Generic Zod schema body validation
 * - Base64 payload decoding with a size limit
 */

import type { Request, Response, NextFunction } from "express";
import { z } from "zod";
import { createLogger } from "../logger";
import { jsonValidationError, type ErrorCode } from "../utils/response-helpers";

const log = createLogger("validation");

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

export type UploadHandler = (req: Request, res: Response, file: Express.Multer.File) => Promise<void>;

/**
 * Wrap an upload handler so it only runs when multer stored a file.
 */
export function withUploadedFile(handler: UploadHandler) {
  return function validateFile(req: Request, res: Response): Promise<void> | void {
    if (!req.file) {
      jsonValidationError(res, "No file provided");
      return;
    }
    return handler(req, res, req.file);
  };
}

/**
 * Format Zod validation errors into a user-friendly message.
 */
export function formatZodError(error: z.ZodError): string {
  const issues = error.issues.map((issue) => {
    const path = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    return `${path}${issue.message}`;
  });
  return issues.join("; ");
}

/**
 * Create a middleware that validates request body against a Zod schema.
 *
 * @example
 * app.post("/process", createBodyValidator(processRequestSchema), (req, res) => {
 *   // req.body has been parsed (defaults applied)
 * });
 */
export function createBodyValidator<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>) {
  return function validateBody(req: Request, res: Response, next: NextFunction): void {
    const result = schema.safeParse(req.body);

    if (!result.success) {
      const message = formatZodError(result.error);
      log.debug("Body validation failed", { errors: result.error.issues });
      jsonValidationError(res, message);
      return;
    }

    // Replace body with parsed data (applies transformations)
    req.body = result.data;
    next();
  };
}

export type DecodedPayload =
  | { ok: true; data: Buffer }
  | { ok: false; code: ErrorCode; message: string };

/**
 * Strictly decode a base64 document and enforce the upload size limit.
 */
export function decodeBase64Payload(encoded: string, maxBytes: number): DecodedPayload {
  const compact = encoded.replace(/\s+/g, "");
  if (compact.length === 0 || compact.length % 4 !== 0 || !BASE64_PATTERN.test(compact)) {
    return { ok: false, code: "INVALID_BASE64", message: "Invalid base64 data" };
  }

  const data = Buffer.from(compact, "base64");
  if (data.length > maxBytes) {
    return {
      ok: false,
      code: "FILE_TOO_LARGE",
      message: `File exceeds maximum size of ${Math.floor(maxBytes / (1024 * 1024))}MB`,
    };
  }
  return { ok: true, data };
}
