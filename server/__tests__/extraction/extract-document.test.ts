import { describe, it, expect } from "vitest";
import { extractDocument } from "../../extraction";
import { DocumentDecodeError, ValidationError } from "../../extraction/errors";
import { loadConfig } from "../../config/env";
import { box, FakeEngine, textBlock, type FakePage } from "../fixtures/documents";

const config = loadConfig({}).extraction;
const data = new Uint8Array([0x25, 0x50, 0x44, 0x46]);
const BODY = "Body ".repeat(40).trim();
const OPEN = '<html><head><meta charset="utf-8"></head><body>';
const CLOSE = "</body></html>";

function samplePages(): FakePage[] {
  return [
    {
      blocks: [
        textBlock("Annual Report", { size: 24, bold: true, bbox: box(0, 0, 300, 30) }),
        textBlock(BODY, { size: 12, bbox: box(0, 40, 300, 100) }),
        textBlock("Cell text", { size: 12, bbox: box(10, 210, 90, 220) }),
      ],
      tables: [{ bbox: box(0, 200, 300, 300), grid: [["H1", "H2"], ["v1", "v2"]] }],
      images: [
        { name: "img_p0_1", result: { data: new Uint8Array([1, 2]), extension: "png", rects: [box(0, 400, 100, 500)] } },
        { name: "img_p0_2", result: new Error("decode failed") },
        { name: "img_p0_3", result: null },
      ],
    },
    {
      blocks: [textBlock("Summary", { size: 15, bbox: box(0, 0, 100, 20) })],
      tables: new Error("ruling failed"),
    },
  ];
}

describe("extractDocument", () => {
  it("should build the JSON document model across pages", async () => {
    const engine = new FakeEngine(samplePages());

    const result = await extractDocument(data, { outputFormat: "json", includeImages: true }, config, engine);
    const json = JSON.parse(result.output);

    expect(result.format).toBe("json");
    expect(result.metadata).toEqual({
      pages_processed: "2",
      total_paragraphs: "4",
      total_tables: "1",
      model_used: "fake-engine",
    });
    expect(json.model_used).toBe("fake-engine");
    expect(json.pages).toBe(2);
    expect(json.paragraphs.map((para: { id: string; role: string | null }) => [para.id, para.role])).toEqual([
      ["para-0", "title"],
      ["para-1", null],
      ["para-3", "sectionHeading"],
    ]);
    expect(json.full_text).toBe(`Annual Report\n${BODY}\nSummary`);
    expect(json.images).toHaveLength(1);
    expect(json.images[0].id).toBe("img-0");
    expect(json.content_blocks.map((block: { content_id: string }) => block.content_id)).toEqual([
      "para-0",
      "para-1",
      "table-0",
      "img-0",
      "para-3",
    ]);
    expect(engine.closed).toBe(1);
  });

  it("should pretty-print JSON output with two spaces", async () => {
    const engine = new FakeEngine([{ blocks: [textBlock("Only")] }]);

    const result = await extractDocument(data, { outputFormat: "json", includeImages: false }, config, engine);

    expect(result.output.startsWith('{\n  "model_used": "fake-engine",\n  "pages": 1,')).toBe(true);
  });

  it("should render the same content as HTML", async () => {
    const engine = new FakeEngine(samplePages());

    const result = await extractDocument(data, { outputFormat: "html", includeImages: true }, config, engine);

    expect(result.format).toBe("html");
    expect(result.output).toBe(
      `${OPEN}<h1>Annual Report</h1><p>${BODY}</p>` +
        '<table border="1" id="table-0"><tbody><tr><th>H1</th><th>H2</th></tr><tr><td>v1</td><td>v2</td></tr></tbody></table>' +
        '<img src="data:image/png;base64,AQI=" />' +
        `<h2>Summary</h2>${CLOSE}`
    );
  });

  it("should skip images unless requested", async () => {
    const engine = new FakeEngine(samplePages());

    const result = await extractDocument(data, { outputFormat: "json", includeImages: false }, config, engine);

    expect(JSON.parse(result.output).images).toEqual([]);
  });

  it("should only read the requested pages", async () => {
    const engine = new FakeEngine(samplePages());

    const result = await extractDocument(data, { outputFormat: "json", includeImages: false, pages: "2" }, config, engine);
    const json = JSON.parse(result.output);

    expect(engine.pagesRead).toEqual([2]);
    expect(result.metadata.pages_processed).toBe("1");
    expect(json.pages).toBe(1);
    expect(json.paragraphs).toHaveLength(1);
    expect(json.paragraphs[0].id).toBe("para-0");
    expect(json.paragraphs[0].page_number).toBe(2);
  });

  it("should drop requested pages beyond the end of the document", async () => {
    const engine = new FakeEngine(samplePages());

    const result = await extractDocument(data, { outputFormat: "json", includeImages: false, pages: "2-5" }, config, engine);

    expect(engine.pagesRead).toEqual([2]);
    expect(result.metadata.pages_processed).toBe("1");
    expect(JSON.parse(result.output).pages).toBe(4);
  });

  it("should clamp a huge page range to the document", async () => {
    const engine = new FakeEngine([{ blocks: [textBlock("Only")] }]);

    const result = await extractDocument(
      data,
      { outputFormat: "json", includeImages: false, pages: "1-20000000" },
      config,
      engine
    );
    const json = JSON.parse(result.output);

    expect(engine.pagesRead).toEqual([1]);
    expect(result.metadata.pages_processed).toBe("1");
    expect(json.pages).toBe(20000000);
    expect(json.full_text).toBe("Only");
  });

  it("should reject a malformed page range before opening the document", async () => {
    const engine = new FakeEngine(samplePages());

    await expect(
      extractDocument(data, { outputFormat: "json", includeImages: false, pages: "10-5" }, config, engine)
    ).rejects.toThrow(ValidationError);
    expect(engine.opened).toBe(0);
  });

  it("should fail when the document cannot be opened", async () => {
    const engine = new FakeEngine([], true);

    await expect(
      extractDocument(data, { outputFormat: "json", includeImages: false }, config, engine)
    ).rejects.toThrow(DocumentDecodeError);
  });

  it("should close the document when a page fails", async () => {
    const engine = new FakeEngine([{ blocks: new Error("page stream broken") }]);

    await expect(
      extractDocument(data, { outputFormat: "json", includeImages: false }, config, engine)
    ).rejects.toThrow("page stream broken");
    expect(engine.closed).toBe(1);
  });

  it("should classify with the configured thresholds", async () => {
    const engine = new FakeEngine([
      { blocks: [textBlock("Big", { size: 20, bbox: box(0, 0, 50, 20) }), textBlock(BODY, { bbox: box(0, 30, 300, 90) })] },
    ]);

    const result = await extractDocument(
      data,
      { outputFormat: "json", includeImages: false },
      { ...config, titleFontSizeThreshold: 30, headingFontSizeThreshold: 25 },
      engine
    );

    expect(JSON.parse(result.output).paragraphs[0].role).toBeNull();
  });
});
