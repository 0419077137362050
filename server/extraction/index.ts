/**
 * Document extraction pipeline.
 *
 * Opens a PDF through a PdfEngine, converts each selected page's primitives
 * into paragraphs, tables and images, classifies paragraph roles, assembles
 * the ordered document model and renders it as JSON or HTML.
 *
 * Table detection and individual images may fail on a page without failing
 * the document; those failures are logged and skipped. A document that
 * cannot be opened is fatal.
 */

import type { DocumentImage, OperationResult, Paragraph, Table } from "@shared/schema";
import type { ExtractionConfig } from "../config/env";
import { createLogger } from "../logger";
import { assembleDocument } from "./assembler";
import { errorMessage } from "./errors";
import { renderHtml } from "./html-renderer";
import { countPages, parsePageRange, selectPages } from "./page-range";
import { pdfjsEngine } from "./pdfjs-engine";
import { imageFromRaw, paragraphFromBlock, tableFromGrid } from "./primitives";
import { classifyRoles } from "./role-classifier";
import { serializeDocument } from "./serializer";
import type { EnginePage, ExtractOptions, PdfEngine } from "./types";

const log = createLogger("extraction");

interface PageContent {
  paragraphs: Paragraph[];
  tables: Table[];
  images: DocumentImage[];
}

interface IdCounters {
  paragraph: number;
  table: number;
  image: number;
}

async function extractPage(
  page: EnginePage,
  pageNumber: number,
  includeImages: boolean,
  ids: IdCounters
): Promise<PageContent> {
  const content: PageContent = { paragraphs: [], tables: [], images: [] };

  for (const block of await page.getTextBlocks()) {
    const para = paragraphFromBlock(block, pageNumber, `para-${ids.paragraph}`);
    if (para) {
      ids.paragraph++;
      content.paragraphs.push(para);
    }
  }

  try {
    for (const raw of await page.findTables()) {
      const table = tableFromGrid(raw, pageNumber, `table-${ids.table}`);
      if (table) {
        ids.table++;
        content.tables.push(table);
      }
    }
  } catch (error) {
    log.warn("Table extraction failed, skipping page tables", { page: pageNumber, error: errorMessage(error) });
  }

  if (includeImages) {
    for (const ref of await page.listImages()) {
      try {
        const raw = await page.extractImage(ref);
        if (!raw) continue;
        content.images.push(imageFromRaw(raw, pageNumber, `img-${ids.image}`));
        ids.image++;
      } catch (error) {
        log.warn("Image extraction failed, skipping image", {
          page: pageNumber,
          image: ref.name,
          error: errorMessage(error),
        });
      }
    }
  }

  return content;
}

/**
 * Run the full extraction pipeline over a PDF.
 *
 * @throws ValidationError when the page range is malformed (before the document is opened)
 * @throws DocumentDecodeError when the engine cannot open the document
 */
export async function extractDocument(
  data: Uint8Array,
  options: ExtractOptions,
  config: ExtractionConfig,
  engine: PdfEngine = pdfjsEngine
): Promise<OperationResult> {
  const requested = options.pages ? parsePageRange(options.pages) : null;

  const doc = await engine.open(data);
  try {
    const totalPages = doc.pageCount;
    const pageNumbers = requested
      ? selectPages(requested, totalPages)
      : Array.from({ length: totalPages }, (_, i) => i + 1);

    log.info("Extracting document", {
      totalPages,
      selectedPages: pageNumbers.length,
      includeImages: options.includeImages,
    });

    const ids: IdCounters = { paragraph: 0, table: 0, image: 0 };
    const paragraphs: Paragraph[] = [];
    const tables: Table[] = [];
    const images: DocumentImage[] = [];

    for (const pageNumber of pageNumbers) {
      const page = await doc.getPage(pageNumber);
      const content = await extractPage(page, pageNumber, options.includeImages, ids);
      paragraphs.push(...content.paragraphs);
      tables.push(...content.tables);
      images.push(...content.images);
    }

    classifyRoles(paragraphs, {
      title: config.titleFontSizeThreshold,
      heading: config.headingFontSizeThreshold,
    });

    // A range reports every requested page, including pages the document lacks
    const pagesReported = requested ? countPages(requested) : totalPages;
    const model = assembleDocument(paragraphs, tables, images, pagesReported, engine.name);

    const output = options.outputFormat === "html"
      ? renderHtml(model)
      : JSON.stringify(serializeDocument(model), null, 2);

    log.info("Extraction complete", {
      paragraphs: model.paragraphs.length,
      tables: tables.length,
      images: images.length,
    });

    return {
      output,
      format: options.outputFormat,
      metadata: {
        pages_processed: String(pageNumbers.length),
        total_paragraphs: String(paragraphs.length),
        total_tables: String(tables.length),
        model_used: engine.name,
      },
    };
  } finally {
    await doc.close();
  }
}

export { parsePageRange, countPages, selectPages, type PageInterval } from "./page-range";
export { classifyRoles, classifyParagraph, detectBodyFontSize } from "./role-classifier";
export { filterTableOverlaps } from "./overlap-filter";
export { sequenceContent } from "./content-sequencer";
export { assembleDocument } from "./assembler";
export { renderHtml, escapeHtml } from "./html-renderer";
export { serializeDocument } from "./serializer";
export { detectTextLayer } from "./text-layer";
export { pdfjsEngine, createPdfjsEngine } from "./pdfjs-engine";
export * from "./errors";
export type * from "./types";
