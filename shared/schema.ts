import { z } from "zod";

// ============================================================================
// Geometry & Fonts
// ============================================================================

export const boundingBoxSchema = z.object({
  xMin: z.number(),
  yMin: z.number(),
  xMax: z.number(),
  yMax: z.number(),
});

export type BoundingBox = z.infer<typeof boundingBoxSchema>;

export const fontInfoSchema = z.object({
  name: z.string(),
  size: z.number(),
  bold: z.boolean(),
});

export type FontInfo = z.infer<typeof fontInfoSchema>;

// ============================================================================
// Document Content
// ============================================================================

export const paragraphRoles = ["title", "sectionHeading"] as const;
export type ParagraphRole = (typeof paragraphRoles)[number];

export const paragraphSchema = z.object({
  id: z.string().min(1),
  content: z.string(),
  pageNumber: z.number().int().positive(),
  boundingBox: boundingBoxSchema,
  font: fontInfoSchema,
  // null = body text (or not yet classified)
  role: z.enum(paragraphRoles).nullable(),
});

export type Paragraph = z.infer<typeof paragraphSchema>;

export const tableCellKinds = ["columnHeader", "content"] as const;
export type TableCellKind = (typeof tableCellKinds)[number];

export const tableCellSchema = z.object({
  rowIndex: z.number().int().nonnegative(),
  columnIndex: z.number().int().nonnegative(),
  rowSpan: z.number().int().positive(),
  columnSpan: z.number().int().positive(),
  content: z.string(),
  kind: z.enum(tableCellKinds),
});

export type TableCell = z.infer<typeof tableCellSchema>;

export const tableSchema = z.object({
  id: z.string().min(1),
  pageNumber: z.number().int().positive(),
  boundingBox: boundingBoxSchema,
  rows: z.number().int().nonnegative(),
  columns: z.number().int().nonnegative(),
  cells: z.array(tableCellSchema),
});

export type Table = z.infer<typeof tableSchema>;

export const documentImageSchema = z.object({
  id: z.string().min(1),
  pageNumber: z.number().int().positive(),
  mimeType: z.string(),
  data: z.instanceof(Uint8Array),
  boundingBox: boundingBoxSchema,
});

export type DocumentImage = z.infer<typeof documentImageSchema>;

export const contentBlockTypes = ["paragraph", "table", "image"] as const;
export type ContentBlockType = (typeof contentBlockTypes)[number];

export const contentBlockSchema = z.object({
  type: z.enum(contentBlockTypes),
  pageNumber: z.number().int().positive(),
  yPosition: z.number(),
  contentId: z.string(),
});

export type ContentBlock = z.infer<typeof contentBlockSchema>;

export interface DocumentModel {
  modelUsed: string;
  pages: number;
  paragraphs: Paragraph[];
  tables: Table[];
  images: DocumentImage[];
  fullText: string;
  contentBlocks: ContentBlock[];
}

// ============================================================================
// Operations & Options
// ============================================================================

export const operationNames = ["extract", "detect_text_layer"] as const;
export type OperationName = (typeof operationNames)[number];

export const outputFormats = ["json", "html"] as const;
export type OutputFormat = (typeof outputFormats)[number];

/**
 * Options accepted by the extract operation, as they arrive on the wire
 * (every value is a string).
 */
export const extractOptionsSchema = z.object({
  output_format: z.enum(outputFormats).default("json"),
  include_images: z
    .string()
    .default("false")
    .transform((value) => value.toLowerCase() === "true"),
  pages: z.string().optional(),
});

export const textLayerOptionsSchema = z.object({
  char_threshold: z
    .string()
    .regex(/^\d+$/, "char_threshold must be a non-negative integer")
    .transform((value) => parseInt(value, 10))
    .optional(),
});

export const processRequestSchema = z.object({
  operation: z.string().min(1, "operation is required"),
  data: z.string().min(1, "data is required"),
  options: z.record(z.string()).default({}),
});

export type ProcessRequest = z.infer<typeof processRequestSchema>;

export type OperationMetadata = Record<string, string>;

export interface OperationResult {
  output: string;
  format: OutputFormat;
  metadata: OperationMetadata;
}
