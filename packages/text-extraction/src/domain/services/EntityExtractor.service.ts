import { StructuredData } from "../entities/TextAnalysis.entity.js";

const WORD_CHAR = String.raw`[\p{L}\p{N}_]`;
const WORD_BOUNDARY = `(?:(?<=${WORD_CHAR})(?!${WORD_CHAR})|(?<!${WORD_CHAR})(?=${WORD_CHAR}))`;

/**
 * `\b` and `\d` in `source` follow Unicode word and digit classes, so digits
 * of any script (e.g. Arabic-Indic) are found.
 */
const unicodePattern = (source: string): RegExp =>
  new RegExp(
    source
      .replaceAll(String.raw`\b`, WORD_BOUNDARY)
      .replaceAll(String.raw`\d`, String.raw`\p{Nd}`),
    "gu",
  );

const PATTERNS: Record<keyof StructuredData, RegExp> = {
  emails: unicodePattern(
    String.raw`\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b`,
  ),
  phoneNumbers: unicodePattern(
    String.raw`(?:\+\d{1,3}[-.\s]?)?\(?\d{3}\)?[-.\s]?\d{3}[-.\s]?\d{4}`,
  ),
  urls: unicodePattern(
    String.raw`https?://(?:[a-zA-Z]|[0-9]|[$-_@.&+]|[!*(),]|(?:%[0-9a-fA-F][0-9a-fA-F]))+`,
  ),
  numbers: unicodePattern(String.raw`\b\d+(?:\.\d+)?\b`),
  dates: unicodePattern(String.raw`\b\d{1,2}[/-]\d{1,2}[/-]\d{2,4}\b`),
};

/**
 * Finds emails, phone numbers, URLs, numbers and dates in free text.
 * Each category is an independent scan; a phone number also shows up under
 * numbers, and duplicates are kept.
 */
export class EntityExtractor {
  extract(text: string): StructuredData {
    return {
      emails: this.scan(text, PATTERNS.emails),
      phoneNumbers: this.scan(text, PATTERNS.phoneNumbers),
      urls: this.scan(text, PATTERNS.urls),
      numbers: this.scan(text, PATTERNS.numbers),
      dates: this.scan(text, PATTERNS.dates),
    };
  }

  private scan(text: string, pattern: RegExp): string[] {
    return Array.from(text.matchAll(pattern), (match) => match[0]);
  }
}
