import type { BoundingBox, Paragraph, Table } from "@shared/schema";

/**
 * Positive-area intersection test between two boxes.
 * Boxes that only touch along an edge do not overlap.
 */
export function boxesOverlap(a: BoundingBox, b: BoundingBox): boolean {
  const overlapX = Math.max(0, Math.min(a.xMax, b.xMax) - Math.max(a.xMin, b.xMin));
  const overlapY = Math.max(0, Math.min(a.yMax, b.yMax) - Math.max(a.yMin, b.yMin));
  return overlapX > 0 && overlapY > 0;
}

function overlapsAnyTable(para: Paragraph, tables: Table[]): boolean {
  return tables.some(
    (table) => table.pageNumber === para.pageNumber && boxesOverlap(para.boundingBox, table.boundingBox)
  );
}

/**
 * Drop paragraphs whose region is already covered by a table on the same
 * page. Tables and images are never filtered; survivors keep their order.
 */
export function filterTableOverlaps(paragraphs: Paragraph[], tables: Table[]): Paragraph[] {
  if (tables.length === 0) {
    return paragraphs;
  }
  return paragraphs.filter((para) => !overlapsAnyTable(para, tables));
}
