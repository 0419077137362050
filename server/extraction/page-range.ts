import { ValidationError } from "./errors";

const PAGE_NUMBER = /^\d+$/;

/**
 * Inclusive run of 1-indexed page numbers.
 */
export interface PageInterval {
  start: number;
  end: number;
}

function parsePageNumber(raw: string, part: string): number {
  const value = raw.trim();
  if (!PAGE_NUMBER.test(value)) {
    throw new ValidationError(`Invalid page range: "${part}" (not a page number)`);
  }
  const page = Number(value);
  if (page < 1) {
    throw new ValidationError(`Invalid page range: "${part}" (pages start at 1)`);
  }
  if (!Number.isSafeInteger(page)) {
    throw new ValidationError(`Invalid page range: "${part}" (page number too large)`);
  }
  return page;
}

function mergeIntervals(intervals: PageInterval[]): PageInterval[] {
  const sorted = [...intervals].sort((a, b) => a.start - b.start);
  const merged: PageInterval[] = [];
  for (const interval of sorted) {
    const last = merged[merged.length - 1];
    if (last && interval.start <= last.end + 1) {
      last.end = Math.max(last.end, interval.end);
    } else {
      merged.push({ ...interval });
    }
  }
  return merged;
}

/**
 * Parse a page selection string into sorted, disjoint page intervals.
 * Supports formats like "1,3,5-10" (1-indexed, ranges inclusive).
 *
 * Pages beyond the end of the document are not rejected here; use
 * {@link selectPages} once the page count is known.
 *
 * @throws ValidationError on malformed parts or a range whose start exceeds its end
 */
export function parsePageRange(pageRange: string): PageInterval[] {
  const intervals: PageInterval[] = [];

  for (const rawPart of pageRange.split(",")) {
    const part = rawPart.trim();
    if (!part) {
      throw new ValidationError(`Invalid page range: "${pageRange}" (empty entry)`);
    }

    const dash = part.indexOf("-");
    if (dash === -1) {
      const page = parsePageNumber(part, part);
      intervals.push({ start: page, end: page });
      continue;
    }

    const start = parsePageNumber(part.slice(0, dash), part);
    const end = parsePageNumber(part.slice(dash + 1), part);
    if (start > end) {
      throw new ValidationError(`Invalid page range: ${part} (start > end)`);
    }
    intervals.push({ start, end });
  }

  return mergeIntervals(intervals);
}

/**
 * Number of distinct pages requested, whether or not the document has them.
 */
export function countPages(intervals: PageInterval[]): number {
  return intervals.reduce((total, { start, end }) => total + (end - start + 1), 0);
}

/**
 * Expand intervals into page numbers, dropping pages past `pageCount`.
 */
export function selectPages(intervals: PageInterval[], pageCount: number): number[] {
  const pages: number[] = [];
  for (const { start, end } of intervals) {
    for (let page = start; page <= Math.min(end, pageCount); page++) {
      pages.push(page);
    }
  }
  return pages;
}
