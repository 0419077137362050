/**
 * Ruled-table detection.
 *
 * Horizontal and vertical rules drawn on a page are clustered by
 * intersection; each cluster with at least two rules in both directions
 * defines a grid whose distinct rule positions are the row and column
 * boundaries. Text is assigned to the cell containing its centre point.
 * Merged cells are not recognised.
 */

import type { BoundingBox } from "@shared/schema";
import type { RawTable } from "./types";

export interface Rule {
  orientation: "horizontal" | "vertical";
  /** y for horizontal rules, x for vertical rules */
  position: number;
  start: number;
  end: number;
}

export interface PlacedText {
  text: string;
  bbox: BoundingBox;
}

const RULE_THICKNESS = 2;
const SNAP_TOLERANCE = 3;
const MIN_RULE_LENGTH = 3;
const MIN_CELLS = 2;

/**
 * Classify a straight segment as a rule, or null for diagonals and dots.
 */
export function segmentToRule(x0: number, y0: number, x1: number, y1: number): Rule | null {
  const dx = Math.abs(x1 - x0);
  const dy = Math.abs(y1 - y0);
  if (dy <= RULE_THICKNESS && dx >= MIN_RULE_LENGTH) {
    return { orientation: "horizontal", position: (y0 + y1) / 2, start: Math.min(x0, x1), end: Math.max(x0, x1) };
  }
  if (dx <= RULE_THICKNESS && dy >= MIN_RULE_LENGTH) {
    return { orientation: "vertical", position: (x0 + x1) / 2, start: Math.min(y0, y1), end: Math.max(y0, y1) };
  }
  return null;
}

/**
 * Thin rectangles are rules themselves; other rectangles contribute their
 * four edges.
 */
export function rectangleToRules(box: BoundingBox): Rule[] {
  const width = box.xMax - box.xMin;
  const height = box.yMax - box.yMin;
  if (height <= RULE_THICKNESS) {
    const midY = (box.yMin + box.yMax) / 2;
    const rule = segmentToRule(box.xMin, midY, box.xMax, midY);
    return rule ? [rule] : [];
  }
  if (width <= RULE_THICKNESS) {
    const midX = (box.xMin + box.xMax) / 2;
    const rule = segmentToRule(midX, box.yMin, midX, box.yMax);
    return rule ? [rule] : [];
  }
  return [
    { orientation: "horizontal", position: box.yMin, start: box.xMin, end: box.xMax },
    { orientation: "horizontal", position: box.yMax, start: box.xMin, end: box.xMax },
    { orientation: "vertical", position: box.xMin, start: box.yMin, end: box.yMax },
    { orientation: "vertical", position: box.xMax, start: box.yMin, end: box.yMax },
  ];
}

function intersects(h: Rule, v: Rule): boolean {
  return (
    v.position >= h.start - SNAP_TOLERANCE &&
    v.position <= h.end + SNAP_TOLERANCE &&
    h.position >= v.start - SNAP_TOLERANCE &&
    h.position <= v.end + SNAP_TOLERANCE
  );
}

function clusterRules(rules: Rule[]): Rule[][] {
  const parent = rules.map((_, i) => i);
  const find = (i: number): number => {
    while (parent[i] !== i) {
      parent[i] = parent[parent[i]];
      i = parent[i];
    }
    return i;
  };

  for (let i = 0; i < rules.length; i++) {
    for (let j = i + 1; j < rules.length; j++) {
      const a = rules[i];
      const b = rules[j];
      if (a.orientation === b.orientation) continue;
      const [h, v] = a.orientation === "horizontal" ? [a, b] : [b, a];
      if (intersects(h, v)) {
        parent[find(i)] = find(j);
      }
    }
  }

  const clusters = new Map<number, Rule[]>();
  rules.forEach((rule, i) => {
    const root = find(i);
    const cluster = clusters.get(root) ?? [];
    cluster.push(rule);
    clusters.set(root, cluster);
  });
  return Array.from(clusters.values());
}

/**
 * Sorted distinct positions; values within SNAP_TOLERANCE of the first
 * member of a group collapse to the group mean.
 */
export function snapPositions(values: number[]): number[] {
  const sorted = [...values].sort((a, b) => a - b);
  const snapped: number[] = [];
  let group: number[] = [];

  for (const value of sorted) {
    if (group.length > 0 && value - group[0] > SNAP_TOLERANCE) {
      snapped.push(group.reduce((sum, v) => sum + v, 0) / group.length);
      group = [];
    }
    group.push(value);
  }
  if (group.length > 0) {
    snapped.push(group.reduce((sum, v) => sum + v, 0) / group.length);
  }
  return snapped;
}

function indexOfBand(bounds: number[], value: number): number {
  for (let i = 0; i < bounds.length - 1; i++) {
    if (value >= bounds[i] && value < bounds[i + 1]) return i;
  }
  return -1;
}

function fillGrid(xs: number[], ys: number[], texts: PlacedText[]): Array<Array<string | null>> {
  const buckets: PlacedText[][][] = Array.from({ length: ys.length - 1 }, () =>
    Array.from({ length: xs.length - 1 }, (): PlacedText[] => [])
  );

  for (const text of texts) {
    const row = indexOfBand(ys, (text.bbox.yMin + text.bbox.yMax) / 2);
    const column = indexOfBand(xs, (text.bbox.xMin + text.bbox.xMax) / 2);
    if (row >= 0 && column >= 0) {
      buckets[row][column].push(text);
    }
  }

  return buckets.map((row) =>
    row.map((cell) => {
      const content = cell
        .sort((a, b) => a.bbox.yMin - b.bbox.yMin || a.bbox.xMin - b.bbox.xMin)
        .map((text) => text.text.trim())
        .filter(Boolean)
        .join(" ");
      return content || null;
    })
  );
}

export function findRuledTables(rules: Rule[], texts: PlacedText[]): RawTable[] {
  const tables: RawTable[] = [];

  for (const cluster of clusterRules(rules)) {
    const ys = snapPositions(cluster.filter((r) => r.orientation === "horizontal").map((r) => r.position));
    const xs = snapPositions(cluster.filter((r) => r.orientation === "vertical").map((r) => r.position));
    if (xs.length < 2 || ys.length < 2) continue;
    if ((xs.length - 1) * (ys.length - 1) < MIN_CELLS) continue;

    tables.push({
      bbox: { xMin: xs[0], yMin: ys[0], xMax: xs[xs.length - 1], yMax: ys[ys.length - 1] },
      grid: fillGrid(xs, ys, texts),
    });
  }

  return tables.sort((a, b) => a.bbox.yMin - b.bbox.yMin || a.bbox.xMin - b.bbox.xMin);
}
