const PARAGRAPH_SEPARATOR = "\n\n";
const SHORT_LINE_LENGTH = 50;
const SHORT_SENTENCE_WORDS = 3;

/**
 * Turns lines into paragraphs.
 *
 * `join` is the plain variant used by every extraction: blank lines separate
 * paragraphs. Lines coming out of the assembler are never blank, so in that
 * pipeline each line ends up as its own paragraph.
 *
 * `improveFormatting` is the document variant, a line-by-line heuristic
 * that reflows extracted text into paragraphs for long documents.
 */
export class ParagraphAssembler {
  join(lines: readonly string[]): string {
    const paragraphs: string[] = [];
    let current: string[] = [];

    for (const raw of lines) {
      const line = raw.trim();
      if (line.length === 0) {
        if (current.length > 0) {
          paragraphs.push(current.join(" "));
          current = [];
        }
        continue;
      }
      current.push(line);
    }

    if (current.length > 0) {
      paragraphs.push(current.join(" "));
    }

    return paragraphs.join(PARAGRAPH_SEPARATOR);
  }

  improveFormatting(text: string): string {
    if (text.length === 0) {
      return text;
    }

    const lines = text
      .split("\n")
      .map((line) => line.trim().replace(/\s+/g, " "))
      .filter((line) => line.length > 0);

    const paragraphs: string[] = [];
    let buffer: string[] = [];

    for (const line of lines) {
      buffer.push(line);
      if (this.endsParagraph(line)) {
        paragraphs.push(buffer.join(" "));
        buffer = [];
      }
    }

    if (buffer.length > 0) {
      paragraphs.push(buffer.join(" "));
    }

    return this.collapseExcessiveLineBreaks(
      paragraphs.join(PARAGRAPH_SEPARATOR),
    ).trim();
  }

  /**
   * Replaces every run of three or more newlines with exactly two.
   */
  collapseExcessiveLineBreaks(text: string): string {
    return text.replace(/\n{3,}/g, PARAGRAPH_SEPARATOR);
  }

  private endsParagraph(line: string): boolean {
    if (line.length < SHORT_LINE_LENGTH) {
      return true;
    }
    if (/[.!?]$/.test(line)) {
      return true;
    }
    if (this.isUpperCase(line)) {
      return true;
    }
    return (
      line.split(/\s+/).length <= SHORT_SENTENCE_WORDS && line.endsWith(".")
    );
  }

  // headings: at least one cased character and nothing lowercase
  private isUpperCase(line: string): boolean {
    return line === line.toUpperCase() && line !== line.toLowerCase();
  }
}
