/**
 * Semantic role detection from font statistics.
 *
 * Two passes over the paragraphs of a document:
 * 1. Detect the body font size: the most frequent size, weighted by content
 *    length so long runs of body text dominate short captions and headings.
 * 2. Classify each paragraph against absolute thresholds and the body size.
 */

import type { Paragraph, ParagraphRole } from "@shared/schema";
import { DEFAULT_ROLE_THRESHOLDS, type RoleThresholds } from "./types";
import { roundToTenth } from "./primitives";
import { createLogger } from "../logger";

const log = createLogger("role-classifier");

const DEFAULT_BODY_SIZE = 12.0;
const MAX_WEIGHT = 200;
const TITLE_BODY_RATIO = 1.5;
const HEADING_BODY_RATIO = 1.1;

/**
 * Find the dominant font size. Ties between equally weighted sizes go to the
 * smallest size.
 */
export function detectBodyFontSize(paragraphs: Paragraph[]): number {
  const weights = new Map<number, number>();

  for (const para of paragraphs) {
    const weight = Math.min(para.content.length, MAX_WEIGHT);
    if (weight === 0) continue;
    const size = roundToTenth(para.font.size);
    weights.set(size, (weights.get(size) ?? 0) + weight);
  }

  let bodySize = DEFAULT_BODY_SIZE;
  let bestWeight = 0;
  for (const [size, weight] of weights) {
    if (weight > bestWeight || (weight === bestWeight && size < bodySize)) {
      bodySize = size;
      bestWeight = weight;
    }
  }

  return bodySize;
}

export function classifyParagraph(
  fontSize: number,
  isBold: boolean,
  bodySize: number,
  thresholds: RoleThresholds
): ParagraphRole | null {
  if (fontSize >= thresholds.title) {
    return "title";
  }
  if (fontSize >= bodySize * TITLE_BODY_RATIO && isBold) {
    return "title";
  }
  if (fontSize >= thresholds.heading) {
    return "sectionHeading";
  }
  if (isBold && fontSize > bodySize * HEADING_BODY_RATIO) {
    return "sectionHeading";
  }
  return null;
}

/**
 * Assign a role to every paragraph in place.
 * Running it twice with the same thresholds yields the same roles.
 */
export function classifyRoles(
  paragraphs: Paragraph[],
  thresholds: RoleThresholds = DEFAULT_ROLE_THRESHOLDS
): void {
  if (paragraphs.length === 0) return;

  const bodySize = detectBodyFontSize(paragraphs);
  log.debug("Detected body font size", { bodySize });

  for (const para of paragraphs) {
    para.role = classifyParagraph(para.font.size, para.font.bold, bodySize, thresholds);
  }
}
