import type { Express, Request, Response, NextFunction } from "express";
import type { Server } from "http";
import multer, { MulterError } from "multer";
import { processRequestSchema, type OperationResult, type ProcessRequest } from "@shared/schema";
import { defaultConfig, type ServiceConfig } from "./config/env";
import { createLogger, logFailure } from "./logger";
import {
  errorMessage,
  isDocumentDecodeError,
  isUnsupportedOperationError,
  isValidationError,
  type PdfEngine,
} from "./extraction";
import { pdfjsEngine } from "./extraction/pdfjs-engine";
import { listOperations, processDocument, supportsOperation } from "./operations";
import { createBodyValidator, decodeBase64Payload, withUploadedFile } from "./middleware/validation";
import { jsonError, jsonSuccess } from "./utils/response-helpers";

const log = createLogger("routes");

const SERVICE_VERSION = process.env.npm_package_version ?? "1.0.0";

const MIME_TYPES = {
  json: "application/json",
  html: "text/html",
} as const;

export interface RouteOptions {
  config?: ServiceConfig;
  engine?: PdfEngine;
}

/**
 * Multipart form fields (and JSON option maps) as a flat string map.
 * Non-string values are dropped.
 */
function stringFields(source: unknown): Record<string, string> {
  const fields: Record<string, string> = {};
  if (typeof source !== "object" || source === null) return fields;
  for (const [key, value] of Object.entries(source)) {
    if (typeof value === "string") fields[key] = value;
  }
  return fields;
}

function sendResult(res: Response, result: OperationResult, startTime: number): void {
  const body: unknown = result.format === "json" ? JSON.parse(result.output) : result.output;
  jsonSuccess(res, {
    result: body,
    format: MIME_TYPES[result.format],
    metadata: result.metadata,
    processing_time_ms: Date.now() - startTime,
  });
}

function sendOperationError(res: Response, error: unknown, operation: string): void {
  if (isValidationError(error)) {
    jsonError(res, "VALIDATION_ERROR", error.message, 400);
    return;
  }
  if (isUnsupportedOperationError(error)) {
    jsonError(res, "INVALID_OPERATION", error.message, 400, { supported_operations: listOperations() });
    return;
  }
  if (isDocumentDecodeError(error)) {
    jsonError(res, "INVALID_DOCUMENT", error.message, 422);
    return;
  }
  logFailure(log, "Processing failed", error, { operation });
  jsonError(res, "PROCESSING_FAILED", errorMessage(error), 500);
}

export async function registerRoutes(
  httpServer: Server,
  app: Express,
  options: RouteOptions = {}
): Promise<Server> {
  const config = options.config ?? defaultConfig;
  const engine = options.engine ?? pdfjsEngine;
  const maxBytes = config.extraction.maxFileSizeMb * 1024 * 1024;

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: maxBytes },
  });

  // Error handling middleware for multer
  function handleMulterError(err: unknown, _req: Request, res: Response, next: NextFunction): void {
    if (err instanceof MulterError) {
      if (err.code === "LIMIT_FILE_SIZE") {
        jsonError(res, "FILE_TOO_LARGE", `File exceeds maximum size of ${config.extraction.maxFileSizeMb}MB`);
        return;
      }
      jsonError(res, "VALIDATION_ERROR", err.message);
      return;
    }
    next(err);
  }

  function runUpload(operation: string) {
    return withUploadedFile(async (req, res, file) => {
      const startTime = Date.now();
      try {
        const result = await processDocument(operation, file.buffer, stringFields(req.body), config.extraction, engine);
        log.info("Document processed", { operation, filename: file.originalname, ...result.metadata });
        sendResult(res, result, startTime);
      } catch (error) {
        sendOperationError(res, error, operation);
      }
    });
  }

  app.get("/health", (_req, res) => {
    res.json({
      status: "ok",
      operations: listOperations(),
      version: SERVICE_VERSION,
    });
  });

  app.get("/ready", (_req, res) => {
    res.json({ status: "ready" });
  });

  app.get("/api/v1/operations/:operation", (req, res) => {
    const { operation } = req.params;
    const supported = supportsOperation(operation);
    res.json({
      supported,
      message: supported ? `Operation '${operation}' is supported` : `Operation '${operation}' is not supported`,
    });
  });

  // Multipart upload: file plus output_format, pages, include_images form fields
  app.post("/api/extract", upload.single("file"), handleMulterError, runUpload("extract"));

  app.post("/api/detect-text-layer", upload.single("file"), handleMulterError, runUpload("detect_text_layer"));

  // Base64 JSON payload, for callers that cannot send multipart
  app.post("/process", createBodyValidator(processRequestSchema), async (req: Request, res: Response) => {
    const startTime = Date.now();
    const request: ProcessRequest = processRequestSchema.parse(req.body);

    const payload = decodeBase64Payload(request.data, maxBytes);
    if (!payload.ok) {
      jsonError(res, payload.code, payload.message);
      return;
    }

    try {
      const result = await processDocument(request.operation, payload.data, stringFields(request.options), config.extraction, engine);
      log.info("Document processed", { operation: request.operation, bytes: payload.data.length, ...result.metadata });
      sendResult(res, result, startTime);
    } catch (error) {
      sendOperationError(res, error, request.operation);
    }
  });

  return httpServer;
}
