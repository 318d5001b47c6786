import { AnalyzeTextUseCase } from "./AnalyzeText.use-case";

describe("AnalyzeTextUseCase", () => {
  const useCase = new AnalyzeTextUseCase();
  const text = "Contact us at test@example.com or call 123-456-7890";

  it("should clean, extract and count", () => {
    expect(useCase.execute(text)).toEqual({
      cleanedText: "Contact us at test@example.com or call l23-456-789O",
      structuredData: {
        emails: ["test@example.com"],
        phoneNumbers: ["123-456-7890"],
        urls: [],
        numbers: ["123", "456", "7890"],
        dates: [],
      },
      statistics: {
        characters: 45,
        words: 7,
        sentences: 2,
        paragraphs: 1,
      },
    });
  });

  it("should skip misread substitution on request", () => {
    expect(
      useCase.execute(text, { substituteMisreads: false }).cleanedText,
    ).toBe(text);
  });

  it("should handle empty text", () => {
    expect(useCase.execute("")).toEqual({
      cleanedText: "",
      structuredData: {
        emails: [],
        phoneNumbers: [],
        urls: [],
        numbers: [],
        dates: [],
      },
      statistics: { characters: 0, words: 0, sentences: 0, paragraphs: 0 },
    });
  });
});
