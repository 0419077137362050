/**
 * Renders a document model as HTML mirroring the structure produced by
 * document-intelligence "convert to HTML" output.
 */

import type { DocumentImage, DocumentModel, Paragraph, ParagraphRole, Table, TableCell } from "@shared/schema";

const HTML_OPEN = '<html><head><meta charset="utf-8"></head><body>';
const HTML_CLOSE = "</body></html>";

/**
 * Escape HTML special characters. Ampersands go first so the entities
 * introduced by later substitutions are not escaped again.
 */
export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#039;");
}

function roleTag(role: ParagraphRole | null): "h1" | "h2" | "p" {
  if (role === "title") return "h1";
  if (role === "sectionHeading") return "h2";
  return "p";
}

function renderParagraph(para: Paragraph): string {
  const tag = roleTag(para.role);
  return `<${tag}>${escapeHtml(para.content)}</${tag}>`;
}

function renderCell(cell: TableCell): string {
  const tag = cell.kind === "columnHeader" ? "th" : "td";
  const colspan = cell.columnSpan > 1 ? ` colspan="${cell.columnSpan}"` : "";
  const rowspan = cell.rowSpan > 1 ? ` rowspan="${cell.rowSpan}"` : "";
  return `<${tag}${colspan}${rowspan}>${escapeHtml(cell.content)}</${tag}>`;
}

function renderTable(table: Table): string {
  const grid: Array<Array<TableCell | undefined>> = Array.from(
    { length: table.rows },
    () => new Array<TableCell | undefined>(table.columns).fill(undefined)
  );

  for (const cell of table.cells) {
    if (cell.rowIndex < table.rows && cell.columnIndex < table.columns) {
      grid[cell.rowIndex][cell.columnIndex] = cell;
    }
  }

  let html = `<table border="1" id="${table.id}"><tbody>`;
  for (const row of grid) {
    html += "<tr>";
    for (const cell of row) {
      html += cell ? renderCell(cell) : "<td></td>";
    }
    html += "</tr>";
  }
  html += "</tbody></table>";
  return html;
}

function renderImage(image: DocumentImage): string {
  if (image.data.length === 0) return "";
  const base64 = Buffer.from(image.data).toString("base64");
  return `<img src="data:${image.mimeType};base64,${base64}" />`;
}

/**
 * Render content blocks in order. Blocks pointing at ids missing from their
 * collection are skipped.
 */
export function renderHtml(model: DocumentModel): string {
  const paragraphsById = new Map(model.paragraphs.map((para) => [para.id, para]));
  const tablesById = new Map(model.tables.map((table) => [table.id, table]));
  const imagesById = new Map(model.images.map((image) => [image.id, image]));

  let html = HTML_OPEN;

  for (const block of model.contentBlocks) {
    switch (block.type) {
      case "paragraph": {
        const para = paragraphsById.get(block.contentId);
        if (para) html += renderParagraph(para);
        break;
      }
      case "table": {
        const table = tablesById.get(block.contentId);
        if (table) html += renderTable(table);
        break;
      }
      case "image": {
        const image = imagesById.get(block.contentId);
        if (image) html += renderImage(image);
        break;
      }
    }
  }

  return html + HTML_CLOSE;
}
