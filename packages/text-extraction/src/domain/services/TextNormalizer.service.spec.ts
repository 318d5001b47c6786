import { TextNormalizer } from "./TextNormalizer.service";

describe("TextNormalizer", () => {
  const normalizer = new TextNormalizer();

  describe("clean", () => {
    it("should collapse surrounding and inner whitespace", () => {
      expect(normalizer.clean("  Hello   World!  ")).toBe("Hello World!");
    });

    it("should return an empty string for empty input", () => {
      expect(normalizer.clean("")).toBe("");
    });

    it("should substitute misreads by default", () => {
      expect(normalizer.clean("|tem 10 sold")).toBe("Item lO sold");
    });

    it("should leave digits alone when substitution is off", () => {
      expect(
        normalizer.clean("|tem 10 sold", { substituteMisreads: false }),
      ).toBe("|tem 10 sold");
    });

    it("should capitalize each sentence start", () => {
      expect(normalizer.clean("first one.  second one. third")).toBe(
        "First one. Second one. Third",
      );
    });
  });

  describe("substituteCommonMisreads", () => {
    it("should apply the substitutions in order", () => {
      expect(normalizer.substituteCommonMisreads("|01|")).toBe("IOlI");
    });
  });

  describe("capitalizeSentences", () => {
    it("should only change the first character", () => {
      expect(normalizer.capitalizeSentences("abc DEF. gHI")).toBe(
        "Abc DEF. GHI",
      );
    });

    it("should drop blank fragments", () => {
      expect(normalizer.capitalizeSentences("a. . b")).toBe("A. B");
    });

    it("should not split on a period without a following space", () => {
      expect(normalizer.capitalizeSentences("v1.2 is out")).toBe(
        "V1.2 is out",
      );
    });
  });

  describe("collapseWhitespace", () => {
    it("should handle tabs and newlines", () => {
      expect(normalizer.collapseWhitespace("a\t\tb\n\nc")).toBe("a b c");
    });

    it("should return an empty string for whitespace only", () => {
      expect(normalizer.collapseWhitespace(" \n\t ")).toBe("");
    });
  });
});
