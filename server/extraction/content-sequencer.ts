import type { BoundingBox, ContentBlock, DocumentImage, Paragraph, Table } from "@shared/schema";

interface Positioned {
  id: string;
  pageNumber: number;
  boundingBox: BoundingBox;
}

function toBlock(type: ContentBlock["type"], item: Positioned): ContentBlock {
  return {
    type,
    pageNumber: item.pageNumber,
    yPosition: item.boundingBox.yMin,
    contentId: item.id,
  };
}

/**
 * Merge paragraphs, tables and images into one reading-order sequence.
 *
 * Blocks are appended paragraphs first, then tables, then images, and
 * sorted by (page, y). Array.prototype.sort is stable, so blocks sharing a
 * position keep that append order.
 */
export function sequenceContent(
  paragraphs: Paragraph[],
  tables: Table[],
  images: DocumentImage[]
): ContentBlock[] {
  const blocks: ContentBlock[] = [
    ...paragraphs.map((para) => toBlock("paragraph", para)),
    ...tables.map((table) => toBlock("table", table)),
    ...images.map((image) => toBlock("image", image)),
  ];

  return blocks.sort((a, b) => a.pageNumber - b.pageNumber || a.yPosition - b.yPosition);
}
