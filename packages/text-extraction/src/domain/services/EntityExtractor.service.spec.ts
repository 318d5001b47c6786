import { EntityExtractor } from "./EntityExtractor.service";

describe("EntityExtractor", () => {
  const extractor = new EntityExtractor();

  it("should find an email and a phone number as written", () => {
    const data = extractor.extract(
      "Contact us at test@example.com or call 123-456-7890",
    );

    expect(data.emails).toEqual(["test@example.com"]);
    expect(data.phoneNumbers).toEqual(["123-456-7890"]);
    expect(data.numbers).toEqual(["123", "456", "7890"]);
    expect(data.urls).toEqual([]);
    expect(data.dates).toEqual([]);
  });

  it("should keep the country code and parentheses of a phone number", () => {
    const data = extractor.extract("Office: +1 (555) 010-2000");
    expect(data.phoneNumbers).toEqual(["+1 (555) 010-2000"]);
  });

  it("should find urls up to the first space", () => {
    const data = extractor.extract(
      "See https://example.org/docs?page=2 and http://test.local now",
    );
    expect(data.urls).toEqual([
      "https://example.org/docs?page=2",
      "http://test.local",
    ]);
  });

  it("should find decimal numbers", () => {
    expect(extractor.extract("Total 42.50 for 3 items").numbers).toEqual([
      "42.50",
      "3",
    ]);
  });

  it("should find dates with either separator", () => {
    expect(extractor.extract("Due 12/31/2024 or 1-2-25").dates).toEqual([
      "12/31/2024",
      "1-2-25",
    ]);
  });

  it("should find digits of other scripts", () => {
    const data = extractor.extract("Total ١٢٣ on ١٢/٠٣/٢٠٢٤ and 45");

    expect(data.numbers).toEqual(["١٢٣", "١٢", "٠٣", "٢٠٢٤", "45"]);
    expect(data.dates).toEqual(["١٢/٠٣/٢٠٢٤"]);
  });

  it("should not split numbers out of words in other scripts", () => {
    expect(extractor.extract("é12 12é 12").numbers).toEqual(["12"]);
  });

  it("should keep duplicates in order", () => {
    expect(extractor.extract("a@b.io then a@b.io").emails).toEqual([
      "a@b.io",
      "a@b.io",
    ]);
  });

  it("should return empty categories for empty text", () => {
    expect(extractor.extract("")).toEqual({
      emails: [],
      phoneNumbers: [],
      urls: [],
      numbers: [],
      dates: [],
    });
  });

  it("should be reusable across calls", () => {
    extractor.extract("call 123-456-7890");
    expect(extractor.extract("call 123-456-7890").phoneNumbers).toEqual([
      "123-456-7890",
    ]);
  });
});
