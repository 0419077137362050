/**
 * Shared types for the extraction module.
 *
 * The engine-facing primitives mirror what a PDF engine reports per page:
 * text blocks made of lines of font-tagged spans, ruled tables as grids of
 * cell strings, and embedded images with their placement rectangles.
 */

import type {
  BoundingBox,
  ContentBlock,
  DocumentImage,
  DocumentModel,
  OperationMetadata,
  OperationResult,
  OutputFormat,
  Paragraph,
  ParagraphRole,
  Table,
  TableCell,
} from "@shared/schema";

/** Span flag bit set by engines for bold text. */
export const SPAN_FLAG_BOLD = 16;

/** Span flag bit set by engines for italic text. */
export const SPAN_FLAG_ITALIC = 2;

export interface TextSpan {
  text: string;
  size: number;
  fontName: string;
  flags: number;
}

export interface TextLine {
  spans: TextSpan[];
}

export interface TextBlock {
  bbox: BoundingBox;
  lines: TextLine[];
}

/**
 * A detected table: its outline and a row-major grid of cell strings.
 * Row 0 is the header row.
 */
export interface RawTable {
  bbox: BoundingBox;
  grid: Array<Array<string | null>>;
}

/** Handle to an image resource on a page, resolved with EnginePage.extractImage. */
export interface ImageRef {
  name: string;
}

export interface RawImage {
  data: Uint8Array;
  /** File extension hint, e.g. "png" or "jpeg". */
  extension: string;
  /** Placement rectangles, in paint order. */
  rects: BoundingBox[];
}

export interface EnginePage {
  getTextBlocks(): Promise<TextBlock[]>;
  findTables(): Promise<RawTable[]>;
  listImages(): Promise<ImageRef[]>;
  extractImage(ref: ImageRef): Promise<RawImage | null>;
  getText(): Promise<string>;
}

export interface EngineDocument {
  readonly pageCount: number;
  getPage(pageNumber: number): Promise<EnginePage>;
  close(): Promise<void>;
}

export interface PdfEngine {
  /** Label reported as model_used in extraction output. */
  readonly name: string;
  open(data: Uint8Array): Promise<EngineDocument>;
}

/**
 * Font-size thresholds for role classification.
 */
export interface RoleThresholds {
  title: number;
  heading: number;
}

export const DEFAULT_ROLE_THRESHOLDS: RoleThresholds = {
  title: 18,
  heading: 14,
};

export interface ExtractOptions {
  outputFormat: OutputFormat;
  includeImages: boolean;
  pages?: string;
}

export interface TextLayerPage {
  page: number;
  has_text_layer: boolean;
  char_count: number;
}

export interface TextLayerReport {
  total_pages: number;
  pages: TextLayerPage[];
}

// Re-export commonly used shared types
export type {
  BoundingBox,
  ContentBlock,
  DocumentImage,
  DocumentModel,
  OperationMetadata,
  OperationResult,
  OutputFormat,
  Paragraph,
  ParagraphRole,
  Table,
  TableCell,
};
