/**
 * Operation registry.
 *
 * Maps operation names to handlers. Options arrive as a flat string map,
 * the same shape for multipart form fields and the base64 JSON endpoint,
 * and are validated here before any document data is touched.
 */

import { z } from "zod";
import {
  extractOptionsSchema,
  operationNames,
  textLayerOptionsSchema,
  type OperationName,
  type OperationResult,
} from "@shared/schema";
import type { ExtractionConfig } from "./config/env";
import {
  extractDocument,
  detectTextLayer,
  UnsupportedOperationError,
  ValidationError,
  type PdfEngine,
} from "./extraction";
import { pdfjsEngine } from "./extraction/pdfjs-engine";
import { formatZodError } from "./middleware/validation";

type OperationHandler = (
  data: Uint8Array,
  options: Record<string, string>,
  config: ExtractionConfig,
  engine: PdfEngine
) => Promise<OperationResult>;

function parseOptions<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, options: Record<string, string>): T {
  const result = schema.safeParse(options);
  if (!result.success) {
    throw new ValidationError(formatZodError(result.error));
  }
  return result.data;
}

const handlers: Record<OperationName, OperationHandler> = {
  extract: async (data, options, config, engine) => {
    const parsed = parseOptions(extractOptionsSchema, options);
    return extractDocument(
      data,
      { outputFormat: parsed.output_format, includeImages: parsed.include_images, pages: parsed.pages },
      config,
      engine
    );
  },
  detect_text_layer: async (data, options, config, engine) => {
    const parsed = parseOptions(textLayerOptionsSchema, options);
    return detectTextLayer(data, { charThreshold: parsed.char_threshold }, config, engine);
  },
};

function isOperationName(operation: string): operation is OperationName {
  return operationNames.some((name) => name === operation);
}

export function supportsOperation(operation: string): boolean {
  return isOperationName(operation);
}

export function listOperations(): string[] {
  return [...operationNames].sort();
}

/**
 * Dispatch a document to the named operation.
 *
 * @throws UnsupportedOperationError for unknown operation names
 * @throws ValidationError for malformed options
 * @throws DocumentDecodeError when the document cannot be opened
 */
export async function processDocument(
  operation: string,
  data: Uint8Array,
  options: Record<string, string>,
  config: ExtractionConfig,
  engine: PdfEngine = pdfjsEngine
): Promise<OperationResult> {
  if (!isOperationName(operation)) {
    throw new UnsupportedOperationError(operation);
  }
  return handlers[operation](data, options, config, engine);
}
