import { describe, it, expect } from "vitest";
import type { DocumentModel } from "@shared/schema";
import { escapeHtml, renderHtml } from "../../extraction/html-renderer";
import { assembleDocument } from "../../extraction/assembler";
import { box, makeImage, makeParagraph, makeTable } from "../fixtures/documents";

const OPEN = '<html><head><meta charset="utf-8"></head><body>';
const CLOSE = "</body></html>";

function emptyModel(overrides: Partial<DocumentModel> = {}): DocumentModel {
  return {
    modelUsed: "pdfjs",
    pages: 1,
    paragraphs: [],
    tables: [],
    images: [],
    fullText: "",
    contentBlocks: [],
    ...overrides,
  };
}

describe("HTML Renderer", () => {
  describe("escapeHtml", () => {
    it("should escape the five special characters", () => {
      expect(escapeHtml(`<a href="x">Tom & Jerry's</a>`)).toBe(
        "&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&#039;s&lt;/a&gt;"
      );
    });

    it("should escape existing entities exactly once", () => {
      expect(escapeHtml("&amp;")).toBe("&amp;amp;");
    });
  });

  describe("renderHtml", () => {
    it("should render a title paragraph as h1", () => {
      const para = makeParagraph("para-1", "Hi");
      para.role = "title";
      const model = emptyModel({
        paragraphs: [para],
        fullText: "Hi",
        contentBlocks: [{ type: "paragraph", pageNumber: 1, yPosition: 0, contentId: "para-1" }],
      });

      expect(renderHtml(model)).toBe('<html><head><meta charset="utf-8"></head><body><h1>Hi</h1></body></html>');
    });

    it("should render headings as h2 and body text as escaped p", () => {
      const heading = makeParagraph("para-1", "Results", { bbox: box(0, 0, 100, 20) });
      heading.role = "sectionHeading";
      const body = makeParagraph("para-2", "x < y & z", { bbox: box(0, 30, 100, 50) });

      const html = renderHtml(assembleDocument([heading, body], [], [], 1));

      expect(html).toBe(`${OPEN}<h2>Results</h2><p>x &lt; y &amp; z</p>${CLOSE}`);
    });

    it("should render tables with header cells", () => {
      const html = renderHtml(assembleDocument([], [makeTable("table-1")], [], 1));

      expect(html).toBe(
        `${OPEN}<table border="1" id="table-1"><tbody>` +
          "<tr><th>Name</th><th>Value</th></tr>" +
          "<tr><td>a</td><td>1</td></tr>" +
          `</tbody></table>${CLOSE}`
      );
    });

    it("should emit span attributes and fill uncovered grid positions", () => {
      const table = {
        ...makeTable("table-1"),
        rows: 1,
        columns: 2,
        cells: [
          { rowIndex: 0, columnIndex: 0, rowSpan: 1, columnSpan: 2, content: "A & B", kind: "columnHeader" as const },
          { rowIndex: 3, columnIndex: 0, rowSpan: 1, columnSpan: 1, content: "outside", kind: "content" as const },
        ],
      };

      const html = renderHtml(assembleDocument([], [table], [], 1));

      expect(html).toBe(
        `${OPEN}<table border="1" id="table-1"><tbody><tr><th colspan="2">A &amp; B</th><td></td></tr></tbody></table>${CLOSE}`
      );
    });

    it("should inline images as base64 data URIs", () => {
      const image = makeImage("img-1", { data: new Uint8Array([0x68, 0x69]) });

      const html = renderHtml(assembleDocument([], [], [image], 1));

      expect(html).toBe(`${OPEN}<img src="data:image/png;base64,aGk=" />${CLOSE}`);
    });

    it("should skip images without data", () => {
      const image = makeImage("img-1", { data: new Uint8Array(0) });

      expect(renderHtml(assembleDocument([], [], [image], 1))).toBe(`${OPEN}${CLOSE}`);
    });

    it("should skip blocks that reference missing items", () => {
      const model = emptyModel({
        contentBlocks: [
          { type: "paragraph", pageNumber: 1, yPosition: 0, contentId: "para-9" },
          { type: "table", pageNumber: 1, yPosition: 10, contentId: "table-9" },
          { type: "image", pageNumber: 1, yPosition: 20, contentId: "img-9" },
        ],
      });

      expect(renderHtml(model)).toBe(`${OPEN}${CLOSE}`);
    });

    it("should follow content block order across pages", () => {
      const paragraphs = [
        makeParagraph("para-1", "Page two", { page: 2, bbox: box(0, 0, 100, 20) }),
        makeParagraph("para-2", "Page one", { page: 1, bbox: box(0, 400, 100, 420) }),
      ];

      expect(renderHtml(assembleDocument(paragraphs, [], [], 2))).toBe(`${OPEN}<p>Page one</p><p>Page two</p>${CLOSE}`);
    });
  });
});
