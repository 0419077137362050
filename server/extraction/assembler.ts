/**
 * Assembles extracted content into a single document model.
 */

import type { DocumentImage, DocumentModel, Paragraph, Table } from "@shared/schema";
import { filterTableOverlaps } from "./overlap-filter";
import { sequenceContent } from "./content-sequencer";

export const DEFAULT_MODEL_USED = "pdfjs";

/**
 * Compose the document model.
 *
 * fullText follows extraction order of the retained paragraphs, not the
 * geometric order of contentBlocks. `totalPages` is reported as given.
 */
export function assembleDocument(
  paragraphs: Paragraph[],
  tables: Table[],
  images: DocumentImage[] = [],
  totalPages = 0,
  modelUsed = DEFAULT_MODEL_USED
): DocumentModel {
  const retained = filterTableOverlaps(paragraphs, tables);

  return {
    modelUsed,
    pages: totalPages,
    paragraphs: retained,
    tables,
    images,
    fullText: retained.map((para) => para.content).join("\n"),
    contentBlocks: sequenceContent(retained, tables, images),
  };
}
