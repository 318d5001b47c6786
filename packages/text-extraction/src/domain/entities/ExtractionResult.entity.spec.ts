import { isErr, unwrap } from "@ocr-structure/types";
import { ExtractionResult } from "./ExtractionResult.entity";

const box = { x: 0, y: 0, width: 10, height: 10 };

describe("ExtractionResult", () => {
  it("should average the token confidences", () => {
    const result = unwrap(
      ExtractionResult.create({
        text: "a b",
        lines: ["a b"],
        confidenceScores: [80, 90],
        boundingBoxes: [box, box],
        language: "eng",
        config: "default",
      }),
    );

    expect(result.isSuccess()).toBe(true);
    expect(result.getConfidence()).toBe(85);
  });

  it("should report zero confidence without tokens", () => {
    const result = unwrap(
      ExtractionResult.create({
        text: "",
        lines: [],
        confidenceScores: [],
        boundingBoxes: [],
        language: "eng",
        config: "default",
      }),
    );

    expect(result.isSuccess()).toBe(true);
    expect(result.getConfidence()).toBe(0);
  });

  it("should reject misaligned scores and boxes", () => {
    const result = ExtractionResult.create({
      text: "a",
      lines: ["a"],
      confidenceScores: [80],
      boundingBoxes: [],
      language: "eng",
      config: "default",
    });

    expect(isErr(result)).toBe(true);
  });

  it("should echo language and config on failure", () => {
    const result = ExtractionResult.failure("deu", "poster", "engine down");

    expect(result.isSuccess()).toBe(false);
    expect(result.getError()).toBe("engine down");
    expect(result.getLanguage()).toBe("deu");
    expect(result.getConfig()).toBe("poster");
    expect(result.getText()).toBe("");
    expect(result.getConfidence()).toBe(0);
  });

  it("should not mutate when replacing text or metrics", () => {
    const original = ExtractionResult.failure("eng", "default", "x");
    const changed = original
      .withText("y")
      .withParagraphMetrics({ paragraphCount: 1, avgParagraphLength: 1 });

    expect(original.getText()).toBe("");
    expect(original.getParagraphMetrics()).toBeUndefined();
    expect(changed.getText()).toBe("y");
    expect(changed.getParagraphMetrics()).toEqual({
      paragraphCount: 1,
      avgParagraphLength: 1,
    });
  });
});
