/**
 * Serialization of the document model to its wire JSON shape
 * (snake_case field names, image bytes as base64).
 */

import type { BoundingBox, ContentBlock, DocumentImage, DocumentModel, Paragraph, Table } from "@shared/schema";

export interface BoundingBoxJson {
  x_min: number;
  y_min: number;
  x_max: number;
  y_max: number;
}

export interface ParagraphJson {
  id: string;
  content: string;
  role: Paragraph["role"];
  page_number: number;
  bounding_box: BoundingBoxJson;
  font: { name: string; size: number; bold: boolean };
}

export interface TableCellJson {
  row_index: number;
  column_index: number;
  row_span: number;
  column_span: number;
  content: string;
  kind: Table["cells"][number]["kind"];
}

export interface TableJson {
  id: string;
  page_number: number;
  rows: number;
  columns: number;
  cells: TableCellJson[];
  bounding_box: BoundingBoxJson;
}

export interface ImageJson {
  id: string;
  page_number: number;
  mime_type: string;
  data: string;
  bounding_box: BoundingBoxJson;
}

export interface ContentBlockJson {
  type: ContentBlock["type"];
  page_number: number;
  y_position: number;
  content_id: string;
}

export interface DocumentJson {
  model_used: string;
  pages: number;
  paragraphs: ParagraphJson[];
  tables: TableJson[];
  images: ImageJson[];
  full_text: string;
  content_blocks: ContentBlockJson[];
}

function boxJson(box: BoundingBox): BoundingBoxJson {
  return { x_min: box.xMin, y_min: box.yMin, x_max: box.xMax, y_max: box.yMax };
}

function paragraphJson(para: Paragraph): ParagraphJson {
  return {
    id: para.id,
    content: para.content,
    role: para.role,
    page_number: para.pageNumber,
    bounding_box: boxJson(para.boundingBox),
    font: { name: para.font.name, size: para.font.size, bold: para.font.bold },
  };
}

function tableJson(table: Table): TableJson {
  return {
    id: table.id,
    page_number: table.pageNumber,
    rows: table.rows,
    columns: table.columns,
    cells: table.cells.map((cell) => ({
      row_index: cell.rowIndex,
      column_index: cell.columnIndex,
      row_span: cell.rowSpan,
      column_span: cell.columnSpan,
      content: cell.content,
      kind: cell.kind,
    })),
    bounding_box: boxJson(table.boundingBox),
  };
}

function imageJson(image: DocumentImage): ImageJson {
  return {
    id: image.id,
    page_number: image.pageNumber,
    mime_type: image.mimeType,
    data: Buffer.from(image.data).toString("base64"),
    bounding_box: boxJson(image.boundingBox),
  };
}

export function serializeDocument(model: DocumentModel): DocumentJson {
  return {
    model_used: model.modelUsed,
    pages: model.pages,
    paragraphs: model.paragraphs.map(paragraphJson),
    tables: model.tables.map(tableJson),
    images: model.images.map(imageJson),
    full_text: model.fullText,
    content_blocks: model.contentBlocks.map((block) => ({
      type: block.type,
      page_number: block.pageNumber,
      y_position: block.yPosition,
      content_id: block.contentId,
    })),
  };
}
