/**
 * Groups positioned text runs into spans, lines and blocks.
 *
 * Runs arrive in content-stream order with top-left origin boxes. A run
 * continues the current line while its vertical centre stays within half a
 * font size of the line; lines join the current block while the gap to the
 * previous line stays within BLOCK_GAP_FACTOR line heights and the two
 * lines overlap horizontally.
 */

import type { BoundingBox } from "@shared/schema";
import type { TextBlock, TextLine, TextSpan } from "./types";

export interface PositionedRun {
  text: string;
  bbox: BoundingBox;
  size: number;
  fontName: string;
  flags: number;
  /** The engine reported a line break after this run. */
  endOfLine: boolean;
}

interface LineDraft {
  spans: Array<TextSpan & { bbox: BoundingBox }>;
  bbox: BoundingBox;
}

const BLOCK_GAP_FACTOR = 0.8;
const WORD_GAP_FACTOR = 0.15;

function union(a: BoundingBox, b: BoundingBox): BoundingBox {
  return {
    xMin: Math.min(a.xMin, b.xMin),
    yMin: Math.min(a.yMin, b.yMin),
    xMax: Math.max(a.xMax, b.xMax),
    yMax: Math.max(a.yMax, b.yMax),
  };
}

function centreY(box: BoundingBox): number {
  return (box.yMin + box.yMax) / 2;
}

function sameStyle(span: TextSpan, run: PositionedRun): boolean {
  return span.fontName === run.fontName && span.flags === run.flags && Math.abs(span.size - run.size) < 0.05;
}

function appendRun(line: LineDraft, run: PositionedRun): void {
  const last = line.spans[line.spans.length - 1];
  if (last && sameStyle(last, run)) {
    const gap = run.bbox.xMin - last.bbox.xMax;
    const boundaryHasSpace = /\s$/.test(last.text) || /^\s/.test(run.text);
    const separator = !boundaryHasSpace && gap > run.size * WORD_GAP_FACTOR ? " " : "";
    last.text += separator + run.text;
    last.bbox = union(last.bbox, run.bbox);
  } else {
    line.spans.push({
      text: run.text,
      size: run.size,
      fontName: run.fontName,
      flags: run.flags,
      bbox: { ...run.bbox },
    });
  }
  line.bbox = union(line.bbox, run.bbox);
}

export function groupRunsIntoLines(runs: PositionedRun[]): LineDraft[] {
  const lines: LineDraft[] = [];
  let current: LineDraft | undefined;
  let breakPending = false;

  for (const run of runs) {
    if (run.text.length > 0) {
      const continuesLine =
        current !== undefined &&
        !breakPending &&
        Math.abs(centreY(run.bbox) - centreY(current.bbox)) <= run.size / 2;

      if (!current || !continuesLine) {
        current = { spans: [], bbox: { ...run.bbox } };
        lines.push(current);
      }
      appendRun(current, run);
      breakPending = false;
    }
    if (run.endOfLine) {
      breakPending = true;
    }
  }

  return lines;
}

function startsNewBlock(previous: LineDraft, line: LineDraft): boolean {
  const height = previous.bbox.yMax - previous.bbox.yMin;
  const gap = line.bbox.yMin - previous.bbox.yMax;
  if (gap > height * BLOCK_GAP_FACTOR) return true;
  // Moving back up the page means a new column or a new region
  if (line.bbox.yMax <= previous.bbox.yMin) return true;
  return line.bbox.xMin > previous.bbox.xMax || line.bbox.xMax < previous.bbox.xMin;
}

function toTextLine(draft: LineDraft): TextLine {
  return {
    spans: draft.spans.map(({ text, size, fontName, flags }) => ({ text, size, fontName, flags })),
  };
}

export function groupRunsIntoBlocks(runs: PositionedRun[]): TextBlock[] {
  const blocks: TextBlock[] = [];
  let previous: LineDraft | undefined;

  for (const line of groupRunsIntoLines(runs)) {
    const block = blocks[blocks.length - 1];
    if (block && previous && !startsNewBlock(previous, line)) {
      block.lines.push(toTextLine(line));
      block.bbox = union(block.bbox, line.bbox);
    } else {
      blocks.push({ bbox: { ...line.bbox }, lines: [toTextLine(line)] });
    }
    previous = line;
  }

  return blocks;
}
