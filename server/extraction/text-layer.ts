/**
 * Text-layer detection.
 *
 * Reports, per page, how many characters (trimmed) the page's
 * text layer carries and whether that clears the threshold. Pages under the
 * threshold are likely scans.
 */

import type { ExtractionConfig } from "../config/env";
import { createLogger } from "../logger";
import type { OperationResult } from "@shared/schema";
import { ValidationError } from "./errors";
import { pdfjsEngine } from "./pdfjs-engine";
import type { PdfEngine, TextLayerPage, TextLayerReport } from "./types";

const log = createLogger("text-layer");

export interface TextLayerOptions {
  charThreshold?: number;
}

export async function detectTextLayer(
  data: Uint8Array,
  options: TextLayerOptions,
  config: ExtractionConfig,
  engine: PdfEngine = pdfjsEngine
): Promise<OperationResult> {
  const threshold = options.charThreshold ?? config.textLayerCharThreshold;
  if (!Number.isInteger(threshold) || threshold < 0) {
    throw new ValidationError(`Invalid char_threshold: ${threshold}`);
  }

  const doc = await engine.open(data);
  try {
    const pages: TextLayerPage[] = [];
    for (let pageNumber = 1; pageNumber <= doc.pageCount; pageNumber++) {
      const page = await doc.getPage(pageNumber);
      const charCount = (await page.getText()).trim().length;
      pages.push({ page: pageNumber, has_text_layer: charCount >= threshold, char_count: charCount });
    }

    const report: TextLayerReport = { total_pages: doc.pageCount, pages };
    const pagesWithText = pages.filter((page) => page.has_text_layer).length;
    log.info("Text layer detected", { totalPages: doc.pageCount, pagesWithText, threshold });

    return {
      output: JSON.stringify(report, null, 2),
      format: "json",
      metadata: {
        total_pages: String(doc.pageCount),
        pages_with_text: String(pagesWithText),
        threshold: String(threshold),
      },
    };
  } finally {
    await doc.close();
  }
}
