import { unwrap } from "@ocr-structure/types";
import { ExtractionConfig } from "../value-objects/ExtractionConfig.value-object";
import { TextReconstructor } from "./TextReconstructor.service";
import { LineAssembler } from "./LineAssembler.service";

const payload = (
  text: string,
  y: number,
  confidence = 70,
  x = 0,
): Record<string, unknown> => ({
  text,
  confidence,
  x,
  y,
  width: 40,
  height: 20,
});

describe("TextReconstructor", () => {
  const reconstructor = new TextReconstructor();
  const config = unwrap(ExtractionConfig.create({ confidenceThreshold: 0 }));

  it("should rebuild lines and paragraphs", () => {
    const result = reconstructor.reconstruct(
      [payload("Hello", 10), payload("World", 10, 70, 50), payload("Foo", 40)],
      config,
    );

    expect(result.isSuccess()).toBe(true);
    expect(result.getLines()).toEqual(["Hello World", "Foo"]);
    expect(result.getText()).toBe("Hello World\n\nFoo");
    expect(result.getConfidence()).toBe(70);
    expect(result.getConfidenceScores()).toEqual([70, 70, 70]);
    expect(result.getBoundingBoxes()).toHaveLength(3);
  });

  it("should drop tokens at or below the threshold", () => {
    const strict = unwrap(ExtractionConfig.create({ confidenceThreshold: 60 }));
    const result = reconstructor.reconstruct(
      [payload("keep", 10, 61), payload("drop", 10, 60, 50)],
      strict,
    );

    expect(result.getText()).toBe("keep");
    expect(result.getConfidenceScores()).toEqual([61]);
  });

  it("should succeed with empty text when nothing survives", () => {
    const result = reconstructor.reconstruct([payload("x", 0, 0)], config);

    expect(result.isSuccess()).toBe(true);
    expect(result.getText()).toBe("");
    expect(result.getConfidence()).toBe(0);
  });

  it("should fail the whole call on a malformed payload", () => {
    const result = reconstructor.reconstruct(
      [payload("fine", 10), { text: "broken", confidence: 80, x: 0, y: 0 }],
      unwrap(ExtractionConfig.create({ language: "fra", profile: "document" })),
    );

    expect(result.isSuccess()).toBe(false);
    expect(result.getError()).toMatch(/^Malformed token at index 1: /);
    expect(result.getLanguage()).toBe("fra");
    expect(result.getConfig()).toBe("document");
    expect(result.getLines()).toEqual([]);
  });

  it("should convert unexpected faults into a failed result", () => {
    const failing = new LineAssembler();
    jest.spyOn(failing, "assemble").mockImplementation(() => {
      throw new Error("boom");
    });

    const result = new TextReconstructor(undefined, failing).reconstruct(
      [payload("a", 0)],
      config,
    );

    expect(result.isSuccess()).toBe(false);
    expect(result.getError()).toBe("boom");
  });
});
