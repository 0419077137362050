import { describe, it, expect } from "vitest";
import {
  describeFontObject,
  PdfjsEnginePage,
  scanOperators,
  transformBox,
  type OperatorCodes,
  type PdfjsPageLike,
} from "../../extraction/pdfjs-engine";

const OPS: OperatorCodes = {
  save: 10,
  restore: 11,
  transform: 12,
  constructPath: 91,
  rectangle: 19,
  moveTo: 13,
  lineTo: 14,
  curveTo: 15,
  curveTo2: 16,
  curveTo3: 17,
  closePath: 18,
  stroke: 20,
  closeStroke: 21,
  fill: 22,
  eoFill: 23,
  fillStroke: 24,
  eoFillStroke: 25,
  closeFillStroke: 26,
  closeEOFillStroke: 27,
  endPath: 28,
  paintImageXObject: 85,
  paintInlineImageXObject: 86,
};

// Letter-height page: PDF y-up coordinates flipped into a top-left viewport
const FLIP: [number, number, number, number, number, number] = [1, 0, 0, -1, 0, 800];
const IDENTITY: [number, number, number, number, number, number] = [1, 0, 0, 1, 0, 0];

function objectStore(objects: Record<string, unknown>): PdfjsPageLike["objs"] {
  return {
    has: (id) => id in objects,
    get: (id, callback) => callback(objects[id]),
  };
}

function fakePage(options: {
  items?: Array<{ str: string; x: number; y: number; width: number; hasEOL?: boolean }>;
  fnArray?: number[];
  argsArray?: unknown[];
  objs?: Record<string, unknown>;
  fonts?: Record<string, unknown>;
}): PdfjsPageLike {
  return {
    getViewport: () => ({ transform: [...FLIP] }),
    getTextContent: async () => ({
      items: (options.items ?? []).map((item) => ({
        str: item.str,
        transform: [12, 0, 0, 12, item.x, item.y],
        width: item.width,
        height: 12,
        fontName: "g_d0_f1",
        hasEOL: item.hasEOL ?? false,
      })),
      styles: { g_d0_f1: { fontFamily: "sans-serif" } },
    }),
    getOperatorList: async () => ({ fnArray: options.fnArray ?? [], argsArray: options.argsArray ?? [] }),
    objs: objectStore(options.objs ?? {}),
    commonObjs: objectStore(options.fonts ?? {}),
  };
}

describe("pdfjs engine adapter", () => {
  describe("transformBox", () => {
    it("should return axis-aligned bounds in viewport space", () => {
      expect(transformBox(FLIP, 10, 700, 110, 750)).toEqual({ xMin: 10, yMin: 50, xMax: 110, yMax: 100 });
    });
  });

  describe("scanOperators", () => {
    it("should turn stroked rectangles into rules under the current transform", () => {
      const scan = scanOperators(
        {
          fnArray: [OPS.save, OPS.transform, OPS.constructPath, OPS.stroke, OPS.restore],
          argsArray: [null, [2, 0, 0, 2, 10, 10], [[OPS.rectangle], [0, 0, 100, 50], null], null, null],
        },
        OPS,
        FLIP
      );

      expect(scan.rules).toEqual([
        { orientation: "horizontal", position: 690, start: 10, end: 210 },
        { orientation: "horizontal", position: 790, start: 10, end: 210 },
        { orientation: "vertical", position: 10, start: 690, end: 790 },
        { orientation: "vertical", position: 210, start: 690, end: 790 },
      ]);
    });

    it("should collect line segments and drop paths ended without painting", () => {
      const scan = scanOperators(
        {
          fnArray: [OPS.constructPath, OPS.fill, OPS.constructPath, OPS.endPath],
          argsArray: [
            [[OPS.moveTo, OPS.lineTo], [0, 0, 100, 0], null],
            null,
            [[OPS.moveTo, OPS.lineTo], [0, 50, 0, 150], null],
            null,
          ],
        },
        OPS,
        IDENTITY
      );

      expect(scan.rules).toEqual([{ orientation: "horizontal", position: 0, start: 0, end: 100 }]);
    });

    it("should record image placements from the unit square", () => {
      const scan = scanOperators(
        {
          fnArray: [OPS.save, OPS.transform, OPS.paintImageXObject, OPS.restore, OPS.paintInlineImageXObject],
          argsArray: [null, [100, 0, 0, 50, 20, 30], ["img_p0_1", 100, 50], null, [{ width: 1 }]],
        },
        OPS,
        FLIP
      );

      expect(scan.placements).toEqual([
        { name: "img_p0_1", rect: { xMin: 20, yMin: 720, xMax: 120, yMax: 770 } },
        { name: "inline-0", rect: { xMin: 0, yMin: 799, xMax: 1, yMax: 800 }, inline: { width: 1 } },
      ]);
    });
  });

  describe("describeFontObject", () => {
    it("should strip subset prefixes and detect bold from the name", () => {
      expect(describeFontObject("g_d0_f1", { name: "ABCDEF+Arial-BoldMT", bold: false })).toEqual({
        name: "Arial-BoldMT",
        flags: 16,
      });
    });

    it("should read italic from font flags", () => {
      expect(describeFontObject("g_d0_f2", { name: "Times", italic: true })).toEqual({ name: "Times", flags: 2 });
    });

    it("should fall back to the given name when the font is unavailable", () => {
      expect(describeFontObject("sans-serif", null)).toEqual({ name: "sans-serif", flags: 0 });
    });
  });

  describe("PdfjsEnginePage", () => {
    const items = [
      { str: "Hello", x: 72, y: 700, width: 30 },
      { str: "world", x: 105, y: 700, width: 30, hasEOL: true },
      { str: "Next", x: 72, y: 686, width: 24 },
    ];

    it("should group text items into blocks with font metadata", async () => {
      const page = new PdfjsEnginePage(
        fakePage({ items, fonts: { g_d0_f1: { name: "ABCDEF+Helvetica-Bold", bold: true } } }),
        OPS,
        1
      );

      const blocks = await page.getTextBlocks();

      expect(blocks).toHaveLength(1);
      expect(blocks[0].lines).toEqual([
        { spans: [{ text: "Hello world", size: 12, fontName: "Helvetica-Bold", flags: 16 }] },
        { spans: [{ text: "Next", size: 12, fontName: "Helvetica-Bold", flags: 16 }] },
      ]);
    });

    it("should use the style font family when the font object is missing", async () => {
      const page = new PdfjsEnginePage(fakePage({ items }), OPS, 1);

      const [block] = await page.getTextBlocks();

      expect(block.lines[0].spans[0].fontName).toBe("sans-serif");
      expect(block.lines[0].spans[0].flags).toBe(0);
    });

    it("should return the raw text layer", async () => {
      const page = new PdfjsEnginePage(fakePage({ items }), OPS, 1);

      expect(await page.getText()).toBe("Helloworld\nNext");
    });

    it("should encode painted images as PNG with their placement", async () => {
      const page = new PdfjsEnginePage(
        fakePage({
          fnArray: [OPS.transform, OPS.paintImageXObject],
          argsArray: [[10, 0, 0, 10, 0, 0], ["img_p0_1", 1, 1]],
          objs: { img_p0_1: { width: 1, height: 1, kind: 2, data: new Uint8ClampedArray([1, 2, 3]) } },
        }),
        OPS,
        1
      );

      expect(await page.listImages()).toEqual([{ name: "img_p0_1" }]);
      const image = await page.extractImage({ name: "img_p0_1" });

      expect(image?.extension).toBe("png");
      expect(image?.rects).toEqual([{ xMin: 0, yMin: 790, xMax: 10, yMax: 800 }]);
      expect(Array.from(image?.data.subarray(0, 4) ?? [])).toEqual([0x89, 0x50, 0x4e, 0x47]);
    });

    it("should reject images without decoded pixels", async () => {
      const page = new PdfjsEnginePage(
        fakePage({
          fnArray: [OPS.paintImageXObject],
          argsArray: [["img_p0_2", 1, 1]],
          objs: { img_p0_2: { width: 1, height: 1 } },
        }),
        OPS,
        1
      );

      await expect(page.extractImage({ name: "img_p0_2" })).rejects.toThrow("Image img_p0_2 has no decoded pixel data");
    });

    it("should return null for images that are never painted", async () => {
      const page = new PdfjsEnginePage(fakePage({}), OPS, 1);

      expect(await page.extractImage({ name: "img_missing" })).toBeNull();
    });

    it("should find ruled tables around the text", async () => {
      const page = new PdfjsEnginePage(
        fakePage({
          items: [
            { str: "Key", x: 110, y: 730, width: 20 },
            { str: "Val", x: 210, y: 730, width: 20 },
            { str: "a", x: 110, y: 680, width: 6 },
            { str: "1", x: 210, y: 680, width: 6 },
          ],
          fnArray: [OPS.constructPath, OPS.stroke],
          argsArray: [
            [
              [OPS.rectangle, OPS.rectangle, OPS.rectangle, OPS.rectangle],
              [100, 700, 100, 50, 200, 700, 100, 50, 100, 650, 100, 50, 200, 650, 100, 50],
              null,
            ],
            null,
          ],
        }),
        OPS,
        1
      );

      const tables = await page.findTables();

      expect(tables).toEqual([
        {
          bbox: { xMin: 100, yMin: 50, xMax: 300, yMax: 150 },
          grid: [
            ["Key", "Val"],
            ["a", "1"],
          ],
        },
      ]);
    });
  });
});
