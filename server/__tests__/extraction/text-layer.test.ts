import { describe, it, expect } from "vitest";
import { detectTextLayer } from "../../extraction/text-layer";
import { ValidationError } from "../../extraction/errors";
import { loadConfig } from "../../config/env";
import { FakeEngine } from "../fixtures/documents";

const config = loadConfig({}).extraction;
const data = new Uint8Array([0x25, 0x50, 0x44, 0x46]);

function engine(): FakeEngine {
  return new FakeEngine([{ text: "x".repeat(60) }, { text: "   short   " }, { text: "" }]);
}

describe("detectTextLayer", () => {
  it("should report per-page character counts against the default threshold", async () => {
    const fake = engine();

    const result = await detectTextLayer(data, {}, config, fake);

    expect(JSON.parse(result.output)).toEqual({
      total_pages: 3,
      pages: [
        { page: 1, has_text_layer: true, char_count: 60 },
        { page: 2, has_text_layer: false, char_count: 5 },
        { page: 3, has_text_layer: false, char_count: 0 },
      ],
    });
    expect(result.metadata).toEqual({ total_pages: "3", pages_with_text: "1", threshold: "50" });
    expect(fake.closed).toBe(1);
  });

  it("should let the request override the threshold", async () => {
    const result = await detectTextLayer(data, { charThreshold: 5 }, config, engine());

    expect(result.metadata.pages_with_text).toBe("2");
    expect(result.metadata.threshold).toBe("5");
  });

  it("should treat every page as text at a zero threshold", async () => {
    const result = await detectTextLayer(data, { charThreshold: 0 }, config, engine());

    expect(result.metadata.pages_with_text).toBe("3");
  });

  it("should reject negative thresholds", async () => {
    await expect(detectTextLayer(data, { charThreshold: -1 }, config, engine())).rejects.toThrow(ValidationError);
  });
});
