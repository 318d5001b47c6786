import { InfrastructureError } from "@ocr-structure/types";
import { MockAdapter } from "../../infrastructure/adapters/MockAdapter";
import { ExtractTextUseCase } from "./ExtractText.use-case";

const token = (
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

const HELLO_TOKENS = [
  token("Hello", 10),
  token("World", 10, 70, 50),
  token("Foo", 40),
];

const DOCUMENT_TOKENS = [
  token("This line is long enough to not trigger an early close", 10, 90),
  token("Short end.", 40, 80),
];

describe("ExtractTextUseCase", () => {
  describe("execute", () => {
    it("should return lines, paragraphs and confidence", async () => {
      const adapter = new MockAdapter({ tokens: HELLO_TOKENS });
      const useCase = new ExtractTextUseCase(adapter);

      const result = await useCase.execute("page.png");

      expect(result).toEqual({
        text: "Hello World\n\nFoo",
        lines: ["Hello World", "Foo"],
        confidence: 70,
        confidenceScores: [70, 70, 70],
        boundingBoxes: [
          { x: 0, y: 10, width: 40, height: 20 },
          { x: 50, y: 10, width: 40, height: 20 },
          { x: 0, y: 40, width: 40, height: 20 },
        ],
        language: "eng",
        config: "default",
        success: true,
      });
      expect(adapter.calls[0].flags).toBe("--oem 3 --psm 6");
    });

    it("should echo an unknown profile while using default flags", async () => {
      const adapter = new MockAdapter({ tokens: [] });

      const result = await new ExtractTextUseCase(adapter).execute("a.png", {
        profile: "poster",
        language: "fra",
      });

      expect(result.success).toBe(true);
      expect(result.config).toBe("poster");
      expect(result.language).toBe("fra");
      expect(result.text).toBe("");
      expect(result.confidence).toBe(0);
      expect(adapter.calls[0].flags).toBe("--oem 3 --psm 6");
    });

    it("should turn an engine failure into a failed result", async () => {
      const adapter = new MockAdapter({
        failWith: new InfrastructureError("engine offline"),
      });

      const result = await new ExtractTextUseCase(adapter).execute("a.png", {
        language: "deu",
        profile: "sparse_text",
      });

      expect(result).toEqual({
        text: "",
        lines: [],
        confidence: 0,
        confidenceScores: [],
        boundingBoxes: [],
        language: "deu",
        config: "sparse_text",
        success: false,
        error: "engine offline",
      });
    });

    it("should turn a thrown error into a failed result", async () => {
      const adapter = new MockAdapter();
      jest.spyOn(adapter, "recognize").mockRejectedValue(new Error("boom"));

      const result = await new ExtractTextUseCase(adapter).execute("a.png");

      expect(result.success).toBe(false);
      expect(result.error).toBe("boom");
    });

    it("should reject an out-of-range threshold without calling the engine", async () => {
      const adapter = new MockAdapter();

      const result = await new ExtractTextUseCase(adapter).execute("a.png", {
        confidenceThreshold: 150,
      });

      expect(result.success).toBe(false);
      expect(result.error).toBe(
        "Confidence threshold must be between 0 and 100",
      );
      expect(adapter.calls).toHaveLength(0);
    });

    it("should fail on a malformed token", async () => {
      const adapter = new MockAdapter({
        tokens: [token("ok", 0), { text: "no geometry", confidence: 90 }],
      });

      const result = await new ExtractTextUseCase(adapter).execute("a.png");

      expect(result.success).toBe(false);
      expect(result.error).toMatch(/^Malformed token at index 1/);
      expect(result.confidenceScores).toEqual([]);
    });

    it("should keep scores and boxes aligned", async () => {
      const adapter = new MockAdapter({
        tokens: [token("a", 0, 90), token(" ", 0, 90, 50), token("b", 30, 40)],
      });

      const result = await new ExtractTextUseCase(adapter).execute("a.png");

      expect(result.confidenceScores).toEqual([90]);
      expect(result.boundingBoxes).toHaveLength(1);
    });
  });

  describe("executeLongText", () => {
    it("should use the document profile and reflow paragraphs", async () => {
      const adapter = new MockAdapter({ tokens: DOCUMENT_TOKENS });

      const result = await new ExtractTextUseCase(adapter).executeLongText(
        "doc.png",
        { profile: "single_word" },
      );

      expect(result.success).toBe(true);
      expect(result.config).toBe("document");
      expect(result.text).toBe(
        "This line is long enough to not trigger an early close Short end.",
      );
      expect(result.lines).toEqual([
        "This line is long enough to not trigger an early close",
        "Short end.",
      ]);
      expect(adapter.calls[0].flags).toBe(
        "--oem 3 --psm 6 -c preserve_interword_spaces=1",
      );
    });
  });

  describe("executeOptimizedForParagraphs", () => {
    it("should add paragraph metrics", async () => {
      const adapter = new MockAdapter({ tokens: DOCUMENT_TOKENS });

      const result = await new ExtractTextUseCase(
        adapter,
      ).executeOptimizedForParagraphs("doc.png");

      expect(result.paragraphCount).toBe(1);
      expect(result.avgParagraphLength).toBe(13);
      expect(result.confidence).toBe(85);
    });

    it("should leave metrics out of a failed result", async () => {
      const adapter = new MockAdapter({
        failWith: new InfrastructureError("engine offline"),
      });

      const result = await new ExtractTextUseCase(
        adapter,
      ).executeOptimizedForParagraphs("doc.png");

      expect(result.success).toBe(false);
      expect(result.config).toBe("document");
      expect(result).not.toHaveProperty("paragraphCount");
    });
  });

  describe("executeWithBoxes", () => {
    it("should list positive-confidence words regardless of threshold", async () => {
      const adapter = new MockAdapter({
        tokens: [
          token("zero", 0, 0),
          token("  ", 0, 50, 40),
          token(" low ", 0, 12, 80),
        ],
      });

      const boxes = await new ExtractTextUseCase(adapter).executeWithBoxes(
        "a.png",
      );

      expect(boxes).toEqual([
        {
          text: "low",
          confidence: 12,
          bbox: { x: 80, y: 0, width: 40, height: 20 },
        },
      ]);
    });

    it("should not validate a threshold it never applies", async () => {
      const adapter = new MockAdapter({ tokens: [token("low", 0, 12)] });

      const boxes = await new ExtractTextUseCase(adapter).executeWithBoxes(
        "a.png",
        { confidenceThreshold: 150 },
      );

      expect(boxes.map((box) => box.text)).toEqual(["low"]);
    });

    it("should return an empty list on failure", async () => {
      const adapter = new MockAdapter({
        failWith: new InfrastructureError("engine offline"),
      });

      expect(
        await new ExtractTextUseCase(adapter).executeWithBoxes("a.png"),
      ).toEqual([]);
    });

    it("should return an empty list on malformed tokens", async () => {
      const adapter = new MockAdapter({ tokens: [{ text: 1 }] });

      expect(
        await new ExtractTextUseCase(adapter).executeWithBoxes("a.png"),
      ).toEqual([]);
    });
  });
});
