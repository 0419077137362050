/**
 * PDF engine built on pdfjs-dist.
 *
 * Supplies per-page primitives: text blocks with font metadata, ruled
 * tables found from path operators, and embedded images re-encoded as PNG.
 * All geometry is reported in viewport space (top-left origin, points).
 *
 * pdfjs-dist is loaded lazily on first use, after the DOMMatrix polyfill.
 */

import "./polyfills";

import type { BoundingBox } from "@shared/schema";
import {
  SPAN_FLAG_BOLD,
  SPAN_FLAG_ITALIC,
  type EngineDocument,
  type EnginePage,
  type ImageRef,
  type PdfEngine,
  type RawImage,
  type RawTable,
  type TextBlock,
} from "./types";
import { groupRunsIntoBlocks, type PositionedRun } from "./text-blocks";
import { findRuledTables, rectangleToRules, segmentToRule, type Rule } from "./table-finder";
import { encodePng, isPixelKind, type PixelKind } from "./png-encoder";
import { EMPTY_BBOX } from "./primitives";
import { DocumentDecodeError, errorMessage } from "./errors";
import { createLogger } from "../logger";

const log = createLogger("pdfjs-engine");

type PdfjsModule = typeof import("pdfjs-dist/legacy/build/pdf.mjs");

export type OperatorCodes = Pick<
  PdfjsModule["OPS"],
  | "save"
  | "restore"
  | "transform"
  | "constructPath"
  | "rectangle"
  | "moveTo"
  | "lineTo"
  | "curveTo"
  | "curveTo2"
  | "curveTo3"
  | "closePath"
  | "stroke"
  | "closeStroke"
  | "fill"
  | "eoFill"
  | "fillStroke"
  | "eoFillStroke"
  | "closeFillStroke"
  | "closeEOFillStroke"
  | "endPath"
  | "paintImageXObject"
  | "paintInlineImageXObject"
>;

// Structural views of the pdfjs objects this engine touches

interface PdfjsTextItem {
  str: string;
  transform: number[];
  width: number;
  height: number;
  fontName: string;
  hasEOL: boolean;
}

interface PdfjsTextContent {
  items: Array<PdfjsTextItem | { type: string }>;
  styles: Record<string, { fontFamily: string }>;
}

interface PdfjsObjectStore {
  has(id: string): boolean;
  get(id: string, callback: (data: unknown) => void): unknown;
}

export interface PdfjsPageLike {
  getViewport(params: { scale: number }): { transform: number[] };
  getTextContent(): Promise<PdfjsTextContent>;
  getOperatorList(): Promise<{ fnArray: number[]; argsArray: unknown[] }>;
  objs: PdfjsObjectStore;
  commonObjs: PdfjsObjectStore;
}

export interface PdfjsDocumentLike {
  numPages: number;
  getPage(pageNumber: number): Promise<PdfjsPageLike>;
  destroy(): Promise<void>;
}

type Matrix = [number, number, number, number, number, number];

interface ImagePlacement {
  name: string;
  rect: BoundingBox;
  inline?: unknown;
}

interface OperatorScan {
  rules: Rule[];
  placements: ImagePlacement[];
}

interface FontDescriptor {
  name: string;
  flags: number;
}

interface PixelData {
  data: Uint8Array;
  width: number;
  height: number;
  kind: PixelKind;
}

const IDENTITY: Matrix = [1, 0, 0, 1, 0, 0];
const DEFAULT_FONT_SIZE = 12;
const DESCENT_RATIO = 0.2;
const OBJECT_TIMEOUT_MS = 2000;
const SUBSET_PREFIX = /^[A-Z]{6}\+/;

// ============================================================================
// Geometry
// ============================================================================

function multiply(m: Matrix, n: Matrix): Matrix {
  return [
    m[0] * n[0] + m[2] * n[1],
    m[1] * n[0] + m[3] * n[1],
    m[0] * n[2] + m[2] * n[3],
    m[1] * n[2] + m[3] * n[3],
    m[0] * n[4] + m[2] * n[5] + m[4],
    m[1] * n[4] + m[3] * n[5] + m[5],
  ];
}

function apply(m: Matrix, x: number, y: number): [number, number] {
  return [m[0] * x + m[2] * y + m[4], m[1] * x + m[3] * y + m[5]];
}

function toMatrix(value: unknown): Matrix | null {
  if (!isNumberList(value) || value.length < 6) return null;
  return [value[0], value[1], value[2], value[3], value[4], value[5]];
}

function isNumberList(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((n) => typeof n === "number");
}

/**
 * Axis-aligned bounds of a rectangle after transformation.
 */
export function transformBox(m: Matrix, x0: number, y0: number, x1: number, y1: number): BoundingBox {
  const corners = [apply(m, x0, y0), apply(m, x1, y0), apply(m, x0, y1), apply(m, x1, y1)];
  const xs = corners.map(([x]) => x);
  const ys = corners.map(([, y]) => y);
  return { xMin: Math.min(...xs), yMin: Math.min(...ys), xMax: Math.max(...xs), yMax: Math.max(...ys) };
}

// ============================================================================
// Operator list scanning
// ============================================================================

function pathRules(args: unknown, ops: OperatorCodes, m: Matrix): Rule[] {
  if (!Array.isArray(args)) return [];
  const [pathOps, coords] = args;
  if (!isNumberList(pathOps) || !isNumberList(coords)) return [];

  const rules: Rule[] = [];
  const addSegment = (x0: number, y0: number, x1: number, y1: number) => {
    const [ax, ay] = apply(m, x0, y0);
    const [bx, by] = apply(m, x1, y1);
    const rule = segmentToRule(ax, ay, bx, by);
    if (rule) rules.push(rule);
  };

  let j = 0;
  let cx = 0, cy = 0, sx = 0, sy = 0;
  for (const op of pathOps) {
    if (op === ops.rectangle) {
      const [x, y, w, h] = coords.slice(j, j + 4);
      j += 4;
      rules.push(...rectangleToRules(transformBox(m, x, y, x + w, y + h)));
      cx = sx = x;
      cy = sy = y;
    } else if (op === ops.moveTo) {
      cx = sx = coords[j];
      cy = sy = coords[j + 1];
      j += 2;
    } else if (op === ops.lineTo) {
      const x = coords[j];
      const y = coords[j + 1];
      j += 2;
      addSegment(cx, cy, x, y);
      cx = x;
      cy = y;
    } else if (op === ops.curveTo) {
      cx = coords[j + 4];
      cy = coords[j + 5];
      j += 6;
    } else if (op === ops.curveTo2 || op === ops.curveTo3) {
      cx = coords[j + 2];
      cy = coords[j + 3];
      j += 4;
    } else if (op === ops.closePath) {
      addSegment(cx, cy, sx, sy);
      cx = sx;
      cy = sy;
    }
  }
  return rules;
}

/**
 * Single pass over a page's operator list tracking the CTM through
 * save/restore/transform. Painted paths become rules; image paints become
 * placements of the unit square.
 */
export function scanOperators(
  opList: { fnArray: number[]; argsArray: unknown[] },
  ops: OperatorCodes,
  viewportTransform: Matrix
): OperatorScan {
  const rules: Rule[] = [];
  const placements: ImagePlacement[] = [];
  const stack: Matrix[] = [];
  let ctm: Matrix = IDENTITY;
  let pending: Rule[] = [];
  let inlineCount = 0;

  opList.fnArray.forEach((fn, i) => {
    const args = opList.argsArray[i];
    switch (fn) {
      case ops.save:
        stack.push(ctm);
        break;
      case ops.restore:
        ctm = stack.pop() ?? ctm;
        break;
      case ops.transform: {
        const m = toMatrix(args);
        if (m) ctm = multiply(ctm, m);
        break;
      }
      case ops.constructPath:
        pending.push(...pathRules(args, ops, multiply(viewportTransform, ctm)));
        break;
      case ops.stroke:
      case ops.closeStroke:
      case ops.fill:
      case ops.eoFill:
      case ops.fillStroke:
      case ops.eoFillStroke:
      case ops.closeFillStroke:
      case ops.closeEOFillStroke:
        rules.push(...pending);
        pending = [];
        break;
      case ops.endPath:
        pending = [];
        break;
      case ops.paintImageXObject: {
        const name = Array.isArray(args) ? args[0] : undefined;
        if (typeof name === "string") {
          placements.push({ name, rect: transformBox(multiply(viewportTransform, ctm), 0, 0, 1, 1) });
        }
        break;
      }
      case ops.paintInlineImageXObject: {
        placements.push({
          name: `inline-${inlineCount++}`,
          rect: transformBox(multiply(viewportTransform, ctm), 0, 0, 1, 1),
          inline: Array.isArray(args) ? args[0] : undefined,
        });
        break;
      }
    }
  });

  return { rules, placements };
}

// ============================================================================
// Object resolution
// ============================================================================

function resolveObject(store: PdfjsObjectStore, id: string): Promise<unknown> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => reject(new Error(`Timed out resolving object ${id}`)), OBJECT_TIMEOUT_MS);
    store.get(id, (data) => {
      clearTimeout(timer);
      resolve(data);
    });
  });
}

function toPixelData(value: unknown): PixelData | null {
  if (typeof value !== "object" || value === null) return null;
  if (!("data" in value) || !("width" in value) || !("height" in value) || !("kind" in value)) return null;

  const { data, width, height, kind } = value;
  if (typeof width !== "number" || typeof height !== "number" || !isPixelKind(kind)) return null;
  if (data instanceof Uint8ClampedArray) {
    return { data: new Uint8Array(data.buffer, data.byteOffset, data.byteLength), width, height, kind };
  }
  if (data instanceof Uint8Array) {
    return { data, width, height, kind };
  }
  return null;
}

export function describeFontObject(fallbackName: string, font: unknown): FontDescriptor {
  let name = fallbackName;
  let bold = false;
  let italic = false;

  if (typeof font === "object" && font !== null) {
    if ("name" in font && typeof font.name === "string" && font.name) name = font.name;
    if ("bold" in font && font.bold === true) bold = true;
    if ("black" in font && font.black === true) bold = true;
    if ("italic" in font && font.italic === true) italic = true;
  }

  name = name.replace(SUBSET_PREFIX, "");
  if (/bold|black|heavy|semibold|demibold/i.test(name)) bold = true;
  if (/italic|oblique/i.test(name)) italic = true;

  return {
    name,
    flags: (bold ? SPAN_FLAG_BOLD : 0) | (italic ? SPAN_FLAG_ITALIC : 0),
  };
}

function isTextItem(item: PdfjsTextItem | { type: string }): item is PdfjsTextItem {
  return "str" in item;
}

// ============================================================================
// Engine
// ============================================================================

export class PdfjsEnginePage implements EnginePage {
  private readonly viewportTransform: Matrix;
  private readonly fonts = new Map<string, Promise<FontDescriptor>>();
  private textContentPromise?: Promise<PdfjsTextContent>;
  private scanPromise?: Promise<OperatorScan>;
  private runsPromise?: Promise<PositionedRun[]>;

  constructor(
    private readonly page: PdfjsPageLike,
    private readonly ops: OperatorCodes,
    readonly pageNumber: number
  ) {
    this.viewportTransform = toMatrix(page.getViewport({ scale: 1 }).transform) ?? IDENTITY;
  }

  private textContent(): Promise<PdfjsTextContent> {
    this.textContentPromise ??= this.page.getTextContent();
    return this.textContentPromise;
  }

  // Running the operator list also loads the page's fonts into commonObjs
  private scan(): Promise<OperatorScan> {
    this.scanPromise ??= this.page
      .getOperatorList()
      .then((opList) => scanOperators(opList, this.ops, this.viewportTransform));
    return this.scanPromise;
  }

  private storeFor(id: string): PdfjsObjectStore {
    return id.startsWith("g_") ? this.page.commonObjs : this.page.objs;
  }

  private describeFont(fontKey: string, fallbackName: string): Promise<FontDescriptor> {
    let descriptor = this.fonts.get(fontKey);
    if (!descriptor) {
      const store = this.page.commonObjs;
      descriptor = (store.has(fontKey) ? resolveObject(store, fontKey) : Promise.resolve(null))
        .catch((error: unknown) => {
          log.debug("Font lookup failed, using style name", { page: this.pageNumber, fontKey, error: errorMessage(error) });
          return null;
        })
        .then((font) => describeFontObject(fallbackName, font));
      this.fonts.set(fontKey, descriptor);
    }
    return descriptor;
  }

  private async toRun(item: PdfjsTextItem, content: PdfjsTextContent): Promise<PositionedRun> {
    if (!item.str) {
      return { text: "", bbox: EMPTY_BBOX, size: 0, fontName: "", flags: 0, endOfLine: item.hasEOL };
    }

    const [, , c, d, e, f] = item.transform;
    const size = Math.hypot(c, d) || item.height || DEFAULT_FONT_SIZE;
    const bottom = f - size * DESCENT_RATIO;
    const font = await this.describeFont(item.fontName, content.styles[item.fontName]?.fontFamily ?? item.fontName);

    return {
      text: item.str,
      bbox: transformBox(this.viewportTransform, e, bottom, e + item.width, bottom + size),
      size,
      fontName: font.name,
      flags: font.flags,
      endOfLine: item.hasEOL,
    };
  }

  private runs(): Promise<PositionedRun[]> {
    this.runsPromise ??= (async () => {
      await this.scan();
      const content = await this.textContent();
      const runs: PositionedRun[] = [];
      for (const item of content.items) {
        if (isTextItem(item)) {
          runs.push(await this.toRun(item, content));
        }
      }
      return runs;
    })();
    return this.runsPromise;
  }

  async getTextBlocks(): Promise<TextBlock[]> {
    return groupRunsIntoBlocks(await this.runs());
  }

  async findTables(): Promise<RawTable[]> {
    const [{ rules }, runs] = await Promise.all([this.scan(), this.runs()]);
    return findRuledTables(
      rules,
      runs.filter((run) => run.text.trim()).map((run) => ({ text: run.text, bbox: run.bbox }))
    );
  }

  async listImages(): Promise<ImageRef[]> {
    const { placements } = await this.scan();
    const names = new Set(placements.map((placement) => placement.name));
    return Array.from(names, (name) => ({ name }));
  }

  async extractImage(ref: ImageRef): Promise<RawImage | null> {
    const { placements } = await this.scan();
    const matching = placements.filter((placement) => placement.name === ref.name);
    if (matching.length === 0) return null;

    const [first] = matching;
    const source = first.inline !== undefined ? first.inline : await resolveObject(this.storeFor(ref.name), ref.name);
    const pixels = toPixelData(source);
    if (!pixels) {
      throw new Error(`Image ${ref.name} has no decoded pixel data`);
    }

    return {
      data: encodePng(pixels.data, pixels.width, pixels.height, pixels.kind),
      extension: "png",
      rects: matching.map((placement) => placement.rect),
    };
  }

  async getText(): Promise<string> {
    const content = await this.textContent();
    let text = "";
    for (const item of content.items) {
      if (isTextItem(item)) {
        text += item.str;
        if (item.hasEOL) text += "\n";
      }
    }
    return text;
  }
}

export class PdfjsEngineDocument implements EngineDocument {
  constructor(
    private readonly doc: PdfjsDocumentLike,
    private readonly ops: OperatorCodes
  ) {}

  get pageCount(): number {
    return this.doc.numPages;
  }

  async getPage(pageNumber: number): Promise<EnginePage> {
    return new PdfjsEnginePage(await this.doc.getPage(pageNumber), this.ops, pageNumber);
  }

  close(): Promise<void> {
    return this.doc.destroy();
  }
}

let pdfjsModule: Promise<PdfjsModule> | undefined;

function loadPdfjs(): Promise<PdfjsModule> {
  // Use legacy build for Node.js compatibility
  pdfjsModule ??= import("pdfjs-dist/legacy/build/pdf.mjs");
  return pdfjsModule;
}

export function createPdfjsEngine(): PdfEngine {
  return {
    name: "pdfjs",
    async open(data: Uint8Array): Promise<EngineDocument> {
      const pdfjsLib = await loadPdfjs();
      try {
        const doc = await pdfjsLib.getDocument({
          // pdfjs transfers the buffer it is given; hand it a copy
          data: new Uint8Array(data),
          useSystemFonts: true,
          isEvalSupported: false,
          isOffscreenCanvasSupported: false,
          disableFontFace: true,
          verbosity: 0,
        }).promise;
        return new PdfjsEngineDocument(doc, pdfjsLib.OPS);
      } catch (error) {
        log.warn("Failed to open PDF", { error: errorMessage(error) });
        throw new DocumentDecodeError("Invalid or corrupted PDF file", { cause: error });
      }
    },
  };
}

export const pdfjsEngine: PdfEngine = createPdfjsEngine();
