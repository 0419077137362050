/**
 * Conversion of engine primitives into document records.
 *
 * Each builder takes the running id counter for its collection and returns
 * the record (or null when the primitive carries nothing to keep) so ids stay
 * sequential across pages in discovery order.
 */

import type { BoundingBox, DocumentImage, Paragraph, Table, TableCell } from "@shared/schema";
import { SPAN_FLAG_BOLD, type RawImage, type RawTable, type TextBlock } from "./types";

const DEFAULT_FONT_SIZE = 12.0;

export const EMPTY_BBOX: BoundingBox = { xMin: 0, yMin: 0, xMax: 0, yMax: 0 };

export function roundToTenth(value: number): number {
  return Math.round(value * 10) / 10;
}

/**
 * Most frequent value, first-seen wins on ties.
 */
function mostCommon(values: string[]): string {
  const counts = new Map<string, number>();
  let best = "";
  let bestCount = 0;
  for (const value of values) {
    const count = (counts.get(value) ?? 0) + 1;
    counts.set(value, count);
    if (count > bestCount) {
      best = value;
      bestCount = count;
    }
  }
  return best;
}

export function paragraphFromBlock(block: TextBlock, pageNumber: number, id: string): Paragraph | null {
  const lineTexts: string[] = [];
  const sizes: number[] = [];
  const fontNames: string[] = [];
  let bold = false;

  for (const line of block.lines) {
    const parts: string[] = [];
    for (const span of line.spans) {
      if (!span.text.trim()) continue;
      parts.push(span.text);
      sizes.push(span.size);
      fontNames.push(span.fontName);
      if (span.flags & SPAN_FLAG_BOLD) {
        bold = true;
      }
    }
    if (parts.length > 0) {
      lineTexts.push(parts.join(" "));
    }
  }

  const content = lineTexts.join("\n").trim();
  if (!content) return null;

  const averageSize = sizes.length > 0
    ? sizes.reduce((sum, size) => sum + size, 0) / sizes.length
    : DEFAULT_FONT_SIZE;

  return {
    id,
    content,
    role: null,
    pageNumber,
    boundingBox: { ...block.bbox },
    font: {
      name: mostCommon(fontNames),
      size: roundToTenth(averageSize),
      bold,
    },
  };
}

/**
 * Engines that cannot report merged cells leave every span at 1.
 */
export function tableFromGrid(raw: RawTable, pageNumber: number, id: string): Table | null {
  if (raw.grid.length === 0) return null;

  const cells: TableCell[] = [];
  const columns = Math.max(...raw.grid.map((row) => row.length));

  raw.grid.forEach((row, rowIndex) => {
    row.forEach((content, columnIndex) => {
      cells.push({
        rowIndex,
        columnIndex,
        rowSpan: 1,
        columnSpan: 1,
        content: content ?? "",
        kind: rowIndex === 0 ? "columnHeader" : "content",
      });
    });
  });

  return {
    id,
    pageNumber,
    boundingBox: { ...raw.bbox },
    rows: raw.grid.length,
    columns,
    cells,
  };
}

export function imageFromRaw(raw: RawImage, pageNumber: number, id: string): DocumentImage {
  const [placement] = raw.rects;
  return {
    id,
    pageNumber,
    mimeType: `image/${raw.extension}`,
    data: raw.data,
    boundingBox: placement ? { ...placement } : { ...EMPTY_BBOX },
  };
}
